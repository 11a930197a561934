import type { Entity, EntityId, Question, QuestionId, Scores } from '@/server/algo/types';
import type { GamePhase, GuessReason } from '@/server/algo/guessController';

/**
 * Complete state of one game. No hidden fields: decodeState rebuilds it fully.
 */
export interface GameState {
  scores: Scores;
  /** append-only */
  asked: QuestionId[];
  /** append-only */
  excludedEntities: EntityId[];
  turnCount: number;
  /** entity offered by the last GUESS prompt, until it is confirmed or rejected */
  pendingGuess: EntityId | null;
}

export interface RankedCandidate {
  entityId: EntityId;
  name: string;
  score: number;
  probability: number;
}

export type Prompt =
  | {
      kind: 'QUESTION';
      phase: Extract<GamePhase, 'ASKING'>;
      question: Question;
      confidence: number;
    }
  | {
      kind: 'GUESS';
      phase: Extract<GamePhase, 'GUESSING'>;
      entity: Entity;
      certainty: number;
      reason: GuessReason;
      candidates: RankedCandidate[];
    }
  | {
      kind: 'NO_CANDIDATES';
      phase: Extract<GamePhase, 'NO_CANDIDATES'>;
    };

export interface MoveResult {
  state: GameState;
  prompt: Prompt;
}
