/**
 * Game engine (connects scoring, question selection and the guess controller)
 *
 * Every operation takes a GameState and returns a new one; the input is never
 * mutated, so a rejected move leaves the caller's state exactly as it was.
 * The phase is derived from the state and checked against the transition table
 * before any move is applied.
 */

import type { AttributeKey, Catalog, EntityId, Question } from '@/server/algo/types';
import type { EngineConfig } from '@/server/config/schema';
import {
  calculateConfidence,
  initializeScores,
  rankScores,
  toProbabilities,
  updateScores,
} from '@/server/algo/scoring';
import { selectNextQuestion, type SelectionOptions } from '@/server/algo/questionSelection';
import {
  applyRejection,
  assertTransition,
  canTransition,
  isTerminalPhase,
  shouldGuess,
  type GamePhase,
} from '@/server/algo/guessController';
import { InvalidAnswerError, InvalidGuessError } from '@/server/errors';
import type { GameState, MoveResult, Prompt, RankedCandidate } from './types';

export { serialize, deserialize } from './stateCodec';

export function toSelectionOptions(config: EngineConfig): SelectionOptions {
  return {
    window: config.selection.window,
    minVariance: config.selection.minVariance,
    missingAttributeWeight: config.scoring.missingAttributeWeight,
  };
}

/**
 * Top candidates with display probabilities (softmax over every remaining entity)
 */
export function topCandidates(
  state: GameState,
  catalog: Catalog,
  topN: number
): RankedCandidate[] {
  const ranked = rankScores(state.scores, state.excludedEntities);
  const probabilities = toProbabilities(ranked);

  return ranked.slice(0, topN).map((r, i) => ({
    entityId: r.entityId,
    name: catalog.entityById.get(r.entityId)?.name ?? r.entityId,
    score: r.score,
    probability: probabilities[i].probability,
  }));
}

/**
 * Phase of a stored state: a pending guess means GUESSING, an empty ranking
 * means NO_CANDIDATES, anything else is ASKING
 */
export function currentPhase(state: GameState): GamePhase {
  if (state.pendingGuess !== null) {
    return 'GUESSING';
  }
  if (rankScores(state.scores, state.excludedEntities, 1).length === 0) {
    return 'NO_CANDIDATES';
  }
  return 'ASKING';
}

/**
 * Decide the next prompt for a state: ask, guess, or give up
 */
export function nextPrompt(
  state: GameState,
  catalog: Catalog,
  config: EngineConfig,
  from: GamePhase
): Prompt {
  const ranked = rankScores(state.scores, state.excludedEntities);
  const top = ranked[0];

  if (!top) {
    assertTransition(from, 'NO_CANDIDATES');
    return { kind: 'NO_CANDIDATES', phase: 'NO_CANDIDATES' };
  }

  const question = selectNextQuestion(
    catalog,
    state.asked,
    state.scores,
    state.excludedEntities,
    toSelectionOptions(config)
  );
  const decision = shouldGuess(
    state.scores,
    state.excludedEntities,
    state.turnCount,
    config.guess,
    question !== null
  );
  const probabilities = toProbabilities(ranked);

  if (decision.guess || question === null) {
    assertTransition(from, 'GUESSING');
    const entity = catalog.entityById.get(top.entityId);
    if (!entity) {
      throw new Error(`Ranked entity not in catalog: ${top.entityId}`);
    }
    return {
      kind: 'GUESS',
      phase: 'GUESSING',
      entity,
      certainty: probabilities[0].probability,
      reason: decision.reason ?? 'NO_QUESTIONS',
      candidates: topCandidates(state, catalog, config.guess.topN),
    };
  }

  assertTransition(from, 'ASKING');
  return {
    kind: 'QUESTION',
    phase: 'ASKING',
    question,
    confidence: calculateConfidence(probabilities),
  };
}

/**
 * Compute the prompt for a state and record the guess it offers, if any
 */
function settle(
  state: GameState,
  catalog: Catalog,
  config: EngineConfig,
  from: GamePhase
): MoveResult {
  const prompt = nextPrompt(state, catalog, config, from);
  return {
    state: { ...state, pendingGuess: prompt.kind === 'GUESS' ? prompt.entity.id : null },
    prompt,
  };
}

export function newGame(catalog: Catalog, config: EngineConfig): MoveResult {
  const state: GameState = {
    scores: initializeScores(catalog),
    asked: [],
    excludedEntities: [],
    turnCount: 0,
    pendingGuess: null,
  };
  return settle(state, catalog, config, 'ASKING');
}

/**
 * Unasked questions bound to an attribute; throws when the game is not
 * waiting for an answer or there is nothing left to answer
 */
function openQuestionsFor(
  state: GameState,
  catalog: Catalog,
  attributeKey: AttributeKey
): Question[] {
  const phase = currentPhase(state);
  if (isTerminalPhase(phase)) {
    throw new InvalidAnswerError('No candidates left in this game');
  }
  if (!canTransition(phase, 'ASKING')) {
    throw new InvalidAnswerError(`A guess is waiting for confirmation: ${state.pendingGuess}`);
  }

  const questions = catalog.questionsByAttribute.get(attributeKey);
  if (!questions) {
    throw new InvalidAnswerError(`Unknown attribute: ${attributeKey}`);
  }
  const askedSet = new Set(state.asked);
  const open = questions.filter(q => !askedSet.has(q.id));
  if (open.length === 0) {
    throw new InvalidAnswerError(`Attribute already answered: ${attributeKey}`);
  }
  return open;
}

/**
 * Apply a graded answer (weight in [0,1]) to the question(s) probing attributeKey
 */
export function answer(
  state: GameState,
  catalog: Catalog,
  attributeKey: AttributeKey,
  answerWeight: number,
  config: EngineConfig
): MoveResult {
  if (!Number.isFinite(answerWeight) || answerWeight < 0 || answerWeight > 1) {
    throw new InvalidAnswerError(`Answer weight out of range: ${answerWeight}`);
  }
  const open = openQuestionsFor(state, catalog, attributeKey);

  const next: GameState = {
    scores: updateScores(
      state.scores,
      catalog,
      attributeKey,
      answerWeight,
      state.excludedEntities,
      config.scoring.missingAttributeWeight
    ),
    asked: [...state.asked, ...open.map(q => q.id)],
    excludedEntities: [...state.excludedEntities],
    turnCount: state.turnCount + 1,
    pendingGuess: null,
  };

  return settle(next, catalog, config, 'ASKING');
}

/**
 * "Don't know": consume the question without touching scores
 */
export function skipQuestion(
  state: GameState,
  catalog: Catalog,
  attributeKey: AttributeKey,
  config: EngineConfig
): MoveResult {
  const open = openQuestionsFor(state, catalog, attributeKey);

  const next: GameState = {
    scores: { ...state.scores },
    asked: [...state.asked, ...open.map(q => q.id)],
    excludedEntities: [...state.excludedEntities],
    turnCount: state.turnCount + 1,
    pendingGuess: null,
  };

  return settle(next, catalog, config, 'ASKING');
}

/**
 * Only the entity offered by the last GUESS prompt can be confirmed or rejected
 */
function assertGuessable(
  state: GameState,
  catalog: Catalog,
  entityId: EntityId,
  to: Extract<GamePhase, 'WON' | 'RETRYING'>
): void {
  if (!catalog.entityById.has(entityId)) {
    throw new InvalidGuessError(`Unknown entity: ${entityId}`);
  }
  if (state.excludedEntities.includes(entityId)) {
    throw new InvalidGuessError(`Entity already excluded: ${entityId}`);
  }
  const phase = currentPhase(state);
  if (!canTransition(phase, to)) {
    throw new InvalidGuessError(`No guess is pending (phase ${phase})`);
  }
  if (state.pendingGuess !== entityId) {
    throw new InvalidGuessError(`Not the pending guess: ${entityId}`);
  }
}

/**
 * Wrong guess: exclude the entity and resume on the remaining ranking
 */
export function rejectGuess(
  state: GameState,
  catalog: Catalog,
  entityId: EntityId,
  config: EngineConfig
): MoveResult {
  assertGuessable(state, catalog, entityId, 'RETRYING');

  const next: GameState = {
    scores: { ...state.scores },
    asked: [...state.asked],
    excludedEntities: applyRejection(state.excludedEntities, entityId),
    turnCount: state.turnCount,
    pendingGuess: null,
  };

  return settle(next, catalog, config, 'RETRYING');
}

/**
 * Correct guess: the game is over. Returns the top candidates for display.
 */
export function confirmGuess(
  state: GameState,
  catalog: Catalog,
  entityId: EntityId,
  config: EngineConfig
): RankedCandidate[] {
  assertGuessable(state, catalog, entityId, 'WON');
  return topCandidates(state, catalog, config.guess.topN);
}
