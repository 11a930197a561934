/**
 * Simulation: play a whole game with the given entity as the answer.
 * Answers come from the target's own attribute weights, snapped to the graded
 * levels; with probability `noise` the opposite level is given instead.
 */

import type { Catalog, EntityId } from '@/server/algo/types';
import type { EngineConfig } from '@/server/config/schema';
import { attributeWeight, rankScores } from '@/server/algo/scoring';
import { invertAnswerWeight, snapToAnswerWeight } from '@/server/algo/answers';
import { answer, confirmGuess, newGame, rejectGuess } from './engine';
import type { GameState, Prompt, RankedCandidate } from './types';

export interface SimulationStep {
  turn: number;
  questionId: string;
  attributeKey: string;
  answerWeight: number;
  /** answer flipped by noise */
  wasNoisy: boolean;
  top1EntityId: string;
  confidence: number;
}

export interface SimulationGuess {
  turn: number;
  entityId: EntityId;
  certainty: number;
  correct: boolean;
}

export type SimulationOutcome = 'SUCCESS' | 'NO_CANDIDATES';

export interface SimulationResult {
  targetEntityId: EntityId;
  outcome: SimulationOutcome;
  questionCount: number;
  steps: SimulationStep[];
  guesses: SimulationGuess[];
  /** 1-based rank of the target when the game ended, -1 if it was excluded */
  finalRank: number;
  topCandidates: RankedCandidate[];
}

export interface SimulationOptions {
  noise?: number;
  random?: () => number;
}

export function simulateGame(
  catalog: Catalog,
  config: EngineConfig,
  targetEntityId: EntityId,
  options: SimulationOptions = {}
): SimulationResult {
  const target = catalog.entityById.get(targetEntityId);
  if (!target) {
    throw new Error(`Unknown target entity: ${targetEntityId}`);
  }
  const noise = options.noise ?? 0;
  const random = options.random ?? Math.random;

  const steps: SimulationStep[] = [];
  const guesses: SimulationGuess[] = [];
  let { state, prompt }: { state: GameState; prompt: Prompt } = newGame(catalog, config);

  const finish = (outcome: SimulationOutcome, topCandidates: RankedCandidate[]): SimulationResult => {
    const rank = rankScores(state.scores, state.excludedEntities)
      .findIndex(r => r.entityId === targetEntityId);
    return {
      targetEntityId,
      outcome,
      questionCount: state.turnCount,
      steps,
      guesses,
      finalRank: rank === -1 ? -1 : rank + 1,
      topCandidates,
    };
  };

  for (;;) {
    if (prompt.kind === 'NO_CANDIDATES') {
      return finish('NO_CANDIDATES', []);
    }

    if (prompt.kind === 'GUESS') {
      const correct = prompt.entity.id === targetEntityId;
      guesses.push({
        turn: state.turnCount,
        entityId: prompt.entity.id,
        certainty: prompt.certainty,
        correct,
      });
      if (correct) {
        return finish('SUCCESS', confirmGuess(state, catalog, prompt.entity.id, config));
      }
      ({ state, prompt } = rejectGuess(state, catalog, prompt.entity.id, config));
      continue;
    }

    const { question } = prompt;
    const truthful = snapToAnswerWeight(
      attributeWeight(target, question.attributeKey, config.scoring.missingAttributeWeight)
    );
    const wasNoisy = noise > 0 && random() < noise;
    const answerWeight = wasNoisy ? invertAnswerWeight(truthful) : truthful;

    ({ state, prompt } = answer(state, catalog, question.attributeKey, answerWeight, config));

    steps.push({
      turn: state.turnCount,
      questionId: question.id,
      attributeKey: question.attributeKey,
      answerWeight,
      wasNoisy,
      top1EntityId: rankScores(state.scores, state.excludedEntities, 1)[0]?.entityId ?? '',
      confidence: prompt.kind === 'QUESTION' ? prompt.confidence : prompt.kind === 'GUESS' ? prompt.certainty : 0,
    });
  }
}
