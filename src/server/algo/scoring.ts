import type {
  AttributeKey,
  Catalog,
  Entity,
  EntityId,
  EntityProbability,
  EntityScore,
  Scores,
} from './types';

/**
 * Scoring model
 *
 * score(e) += 1 - 2 * |weight(e, key) - answerWeight|
 *
 * Each turn contributes a value in [-1, 1], so scores stay small and
 * additive regardless of answer order.
 */

/** Neutral baseline every entity starts from */
export const BASELINE_SCORE = 0;

/**
 * Weight of an attribute for an entity.
 * Attributes absent from the entity's map read as missingWeight.
 */
export function attributeWeight(
  entity: Entity,
  attributeKey: AttributeKey,
  missingWeight: number = 0
): number {
  return entity.attributes[attributeKey] ?? missingWeight;
}

/**
 * Per-turn contribution: 1 at exact agreement, -1 at maximal disagreement
 */
export function agreement(entityWeight: number, answerWeight: number): number {
  return 1 - 2 * Math.abs(entityWeight - answerWeight);
}

export function initializeScores(catalog: Catalog): Scores {
  const scores: Scores = {};
  for (const entity of catalog.entities) {
    scores[entity.id] = BASELINE_SCORE;
  }
  return scores;
}

/**
 * Apply one graded answer. Excluded entities keep their last score untouched.
 * Returns a new record; the input is left as is.
 */
export function updateScores(
  scores: Scores,
  catalog: Catalog,
  attributeKey: AttributeKey,
  answerWeight: number,
  excluded: readonly EntityId[] = [],
  missingWeight: number = 0
): Scores {
  const excludedSet = new Set(excluded);
  const updated: Scores = { ...scores };

  for (const entity of catalog.entities) {
    if (excludedSet.has(entity.id)) {
      continue;
    }
    const current = scores[entity.id] ?? BASELINE_SCORE;
    updated[entity.id] =
      current + agreement(attributeWeight(entity, attributeKey, missingWeight), answerWeight);
  }

  return updated;
}

/**
 * Identifier order by UTF-16 code units, independent of the runtime locale
 */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort order used everywhere: score desc, then entityId asc
 */
export function compareEntityScores(a: EntityScore, b: EntityScore): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  return compareIds(a.entityId, b.entityId);
}

/**
 * Ranking of non-excluded entities
 */
export function rankScores(
  scores: Scores,
  excluded: readonly EntityId[] = [],
  topN?: number
): EntityScore[] {
  const excludedSet = new Set(excluded);
  const ranked = Object.entries(scores)
    .filter(([entityId]) => !excludedSet.has(entityId))
    .map(([entityId, score]) => ({ entityId, score }))
    .sort(compareEntityScores);

  return topN === undefined ? ranked : ranked.slice(0, Math.max(0, topN));
}

/**
 * Softmax over scores, shifted by the max score so exp() never overflows.
 * Only used for display (certainty / confidence), never for decisions.
 */
export function toProbabilities(ranked: readonly EntityScore[]): EntityProbability[] {
  if (ranked.length === 0) {
    return [];
  }

  const maxScore = ranked.reduce((max, r) => Math.max(max, r.score), -Infinity);
  const exps = ranked.map(r => Math.exp(r.score - maxScore));
  const total = exps.reduce((sum, v) => sum + v, 0);

  return ranked.map((r, i) => ({
    entityId: r.entityId,
    probability: exps[i] / total,
  }));
}

/**
 * confidence = P(top1)
 */
export function calculateConfidence(probabilities: readonly EntityProbability[]): number {
  if (probabilities.length === 0) {
    return 0;
  }

  return probabilities.reduce((max, p) => Math.max(max, p.probability), 0);
}
