import type { Catalog, Entity, EntityId, Question, QuestionId, Scores } from './types';
import { attributeWeight, compareIds, rankScores } from './scoring';

/**
 * Question selection
 *
 * Among unasked questions, pick the one whose attribute weights vary the most
 * across the top-K ranked candidates. An attribute with no variance in that
 * window is already resolved for the current top cluster and is not eligible.
 * Tie-break: questionId asc.
 */

export interface CandidateWindow {
  /** minimum number of top candidates considered */
  min: number;
  /** share of remaining candidates considered, when that is larger than min */
  ratio: number;
}

export interface SelectionOptions {
  window: CandidateWindow;
  minVariance: number;
  missingAttributeWeight: number;
}

export interface QuestionCandidate {
  question: Question;
  variance: number;
}

/**
 * K = min(remaining, max(window.min, ceil(window.ratio * remaining)))
 */
export function candidateWindowSize(remaining: number, window: CandidateWindow): number {
  if (remaining <= 0) {
    return 0;
  }
  const byRatio = Math.ceil(window.ratio * remaining);
  return Math.min(remaining, Math.max(window.min, byRatio));
}

/**
 * Population variance
 */
export function variance(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
}

/**
 * Every eligible question with its variance, best first
 */
export function rankQuestionCandidates(
  catalog: Catalog,
  asked: readonly QuestionId[],
  scores: Scores,
  excluded: readonly EntityId[],
  options: SelectionOptions
): QuestionCandidate[] {
  const ranked = rankScores(scores, excluded);
  const windowSize = candidateWindowSize(ranked.length, options.window);
  const windowEntities = ranked
    .slice(0, windowSize)
    .map(r => catalog.entityById.get(r.entityId))
    .filter((e): e is Entity => e !== undefined);

  if (windowEntities.length === 0) {
    return [];
  }

  const askedSet = new Set(asked);
  const candidates: QuestionCandidate[] = [];

  for (const question of catalog.questions) {
    if (askedSet.has(question.id)) {
      continue;
    }
    const weights = windowEntities.map(e =>
      attributeWeight(e, question.attributeKey, options.missingAttributeWeight)
    );
    const v = variance(weights);
    if (v > options.minVariance) {
      candidates.push({ question, variance: v });
    }
  }

  candidates.sort((a, b) => {
    if (a.variance !== b.variance) {
      return b.variance - a.variance;
    }
    return compareIds(a.question.id, b.question.id);
  });

  return candidates;
}

/**
 * Next question, or null when nothing discriminates the top candidates anymore
 */
export function selectNextQuestion(
  catalog: Catalog,
  asked: readonly QuestionId[],
  scores: Scores,
  excluded: readonly EntityId[],
  options: SelectionOptions
): Question | null {
  const candidates = rankQuestionCandidates(catalog, asked, scores, excluded, options);
  const selected = candidates[0];

  if (!selected) {
    if (process.env.ENGINE_DEBUG === '1') {
      console.log('[selectNextQuestion] no discriminating question left');
    }
    return null;
  }

  if (process.env.ENGINE_DEBUG === '1') {
    console.log(
      `[selectNextQuestion] ${selected.question.id} (${selected.question.attributeKey}, variance: ${selected.variance.toFixed(3)}, eligible: ${candidates.length})`
    );
  }
  return selected.question;
}
