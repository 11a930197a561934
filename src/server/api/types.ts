/**
 * API response types (only what the client needs to display)
 */

import type { GamePhase } from '@/server/algo/guessController';

export interface QuestionResponse {
  questionId: string;
  attributeKey: string;
  displayText: string;
}

export interface CandidateResponse {
  entityId: string;
  name: string;
  probability: number;
}

export interface GuessResponse {
  entityId: string;
  name: string;
  certainty: number;
  candidates: CandidateResponse[];
}

export interface SessionStateResponse {
  questionCount: number;
  confidence: number;
}

export interface PromptPayload {
  state: GamePhase;
  question?: QuestionResponse;
  guess?: GuessResponse;
  message?: string;
  sessionState: SessionStateResponse;
}

export interface WonPayload {
  sessionId: string;
  state: 'WON';
  message: string;
  guess: string;
  certainty: number;
  topCandidates: CandidateResponse[];
}
