/**
 * Algorithm-level type definitions
 */

export type EntityId = string;
export type QuestionId = string;
export type AttributeKey = string;

export interface Entity {
  id: EntityId;
  name: string;
  attributes: Readonly<Record<AttributeKey, number>>;
}

export interface Question {
  id: QuestionId;
  attributeKey: AttributeKey;
  text: string;
}

export interface Catalog {
  entities: readonly Entity[];
  questions: readonly Question[];
  entityById: ReadonlyMap<EntityId, Entity>;
  questionById: ReadonlyMap<QuestionId, Question>;
  questionsByAttribute: ReadonlyMap<AttributeKey, readonly Question[]>;
}

/** entityId -> running score */
export type Scores = Record<EntityId, number>;

export interface EntityScore {
  entityId: EntityId;
  score: number;
}

export interface EntityProbability {
  entityId: EntityId;
  probability: number;
}

export type AnswerWeight = 0 | 0.25 | 0.75 | 1;

/**
 * Graded answer choices accepted at the boundary.
 * DONT_KNOW carries no weight: the question is consumed without scoring.
 */
export const ANSWER_WEIGHT_MAP = {
  NO: 0,
  PROBABLY_NO: 0.25,
  PROBABLY_YES: 0.75,
  YES: 1,
} as const satisfies Record<string, AnswerWeight>;

export type AnswerChoice = keyof typeof ANSWER_WEIGHT_MAP | 'DONT_KNOW';

export const ANSWER_WEIGHTS: readonly AnswerWeight[] = [0, 0.25, 0.75, 1];
