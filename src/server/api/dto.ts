/**
 * DTO conversion
 * Raw scores stay on the server; responses carry ids, names, text and probabilities.
 */

import type { Question } from '@/server/algo/types';
import type { GameState, Prompt, RankedCandidate } from '@/server/game/types';
import type { CandidateResponse, PromptPayload, QuestionResponse } from './types';

export const NO_CANDIDATES_MESSAGE = "I don't know this one. You win!";

export function toQuestionResponse(question: Question): QuestionResponse {
  return {
    questionId: question.id,
    attributeKey: question.attributeKey,
    displayText: question.text,
  };
}

export function toCandidateResponse(candidate: RankedCandidate): CandidateResponse {
  return {
    entityId: candidate.entityId,
    name: candidate.name,
    probability: candidate.probability,
    // score is not returned
  };
}

export function toPromptPayload(prompt: Prompt, state: GameState): PromptPayload {
  switch (prompt.kind) {
    case 'QUESTION':
      return {
        state: prompt.phase,
        question: toQuestionResponse(prompt.question),
        sessionState: { questionCount: state.turnCount, confidence: prompt.confidence },
      };
    case 'GUESS':
      return {
        state: prompt.phase,
        guess: {
          entityId: prompt.entity.id,
          name: prompt.entity.name,
          certainty: prompt.certainty,
          candidates: prompt.candidates.map(toCandidateResponse),
        },
        sessionState: { questionCount: state.turnCount, confidence: prompt.certainty },
      };
    case 'NO_CANDIDATES':
      return {
        state: prompt.phase,
        message: NO_CANDIDATES_MESSAGE,
        sessionState: { questionCount: state.turnCount, confidence: 0 },
      };
  }
}
