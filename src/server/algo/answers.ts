import { ANSWER_WEIGHTS, type AnswerWeight } from './types';

/**
 * Graded answer helpers
 */

/**
 * Nearest graded level. Ties go to the lower level (0.5 -> 0.25).
 */
export function snapToAnswerWeight(weight: number): AnswerWeight {
  let best: AnswerWeight = ANSWER_WEIGHTS[0];
  for (const level of ANSWER_WEIGHTS) {
    if (Math.abs(level - weight) < Math.abs(best - weight)) {
      best = level;
    }
  }
  return best;
}

/**
 * Opposite graded level (yes <-> no, probably yes <-> probably no)
 */
export function invertAnswerWeight(weight: AnswerWeight): AnswerWeight {
  return snapToAnswerWeight(1 - weight);
}
