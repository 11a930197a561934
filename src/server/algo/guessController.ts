import type { EntityId, Scores } from './types';
import { rankScores } from './scoring';

/**
 * Guess controller
 *
 * ASKING -> GUESSING -> (WON | RETRYING), RETRYING -> (ASKING | GUESSING | NO_CANDIDATES)
 */

export type GamePhase = 'ASKING' | 'GUESSING' | 'RETRYING' | 'WON' | 'NO_CANDIDATES';

const TRANSITIONS: Record<GamePhase, readonly GamePhase[]> = {
  ASKING: ['ASKING', 'GUESSING'],
  GUESSING: ['WON', 'RETRYING'],
  RETRYING: ['ASKING', 'GUESSING', 'NO_CANDIDATES'],
  WON: [],
  NO_CANDIDATES: [],
};

export function canTransition(from: GamePhase, to: GamePhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: GamePhase, to: GamePhase): void {
  if (!canTransition(from, to)) {
    throw new Error(`Invalid phase transition: ${from} -> ${to}`);
  }
}

export function isTerminalPhase(phase: GamePhase): boolean {
  return TRANSITIONS[phase].length === 0;
}

export interface GuessPolicy {
  /** minimum score gap between top1 and top2 to stop asking */
  marginThreshold: number;
  /** hard cap on answers processed */
  maxTurns: number;
}

export type GuessReason = 'SINGLE_CANDIDATE' | 'MARGIN' | 'NO_QUESTIONS' | 'MAX_TURNS';

export interface GuessDecision {
  guess: boolean;
  reason: GuessReason | null;
  /** top1 score - top2 score (Infinity with a single candidate) */
  margin: number;
}

/**
 * Stop condition. Triggers are independent: margin, no questions left, turn cap.
 * With no candidate at all there is nothing to guess.
 */
export function shouldGuess(
  scores: Scores,
  excluded: readonly EntityId[],
  turnCount: number,
  policy: GuessPolicy,
  questionsRemain: boolean = true
): GuessDecision {
  const [top1, top2] = rankScores(scores, excluded, 2);

  if (!top1) {
    return { guess: false, reason: null, margin: 0 };
  }
  if (!top2) {
    return { guess: true, reason: 'SINGLE_CANDIDATE', margin: Infinity };
  }

  const margin = top1.score - top2.score;

  if (margin >= policy.marginThreshold) {
    return { guess: true, reason: 'MARGIN', margin };
  }
  if (!questionsRemain) {
    return { guess: true, reason: 'NO_QUESTIONS', margin };
  }
  if (turnCount >= policy.maxTurns) {
    return { guess: true, reason: 'MAX_TURNS', margin };
  }

  return { guess: false, reason: null, margin };
}

/**
 * Excluded ids after rejecting a guess (append-only, no duplicates)
 */
export function applyRejection(
  excluded: readonly EntityId[],
  entityId: EntityId
): EntityId[] {
  return excluded.includes(entityId) ? [...excluded] : [...excluded, entityId];
}
