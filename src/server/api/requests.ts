/**
 * Request bodies accepted by the API routes
 */

import type { NextRequest } from 'next/server';
import { z } from 'zod';
import { ANSWER_WEIGHT_MAP, type AnswerChoice } from '@/server/algo/types';
import { ApiError } from './errorHandler';

export const AnswerRequestSchema = z.object({
  sessionId: z.string().uuid(),
  attributeKey: z.string().min(1),
  answer: z.string().min(1),
});

export const ConfirmRequestSchema = z.object({
  sessionId: z.string().uuid(),
  entityId: z.string().min(1),
  correct: z.boolean(),
});

/** Accepted answer strings (case-insensitive, "_" reads as a space) */
const ANSWER_CHOICES = new Map<string, AnswerChoice>([
  ['no', 'NO'],
  ['probably no', 'PROBABLY_NO'],
  ["don't know", 'DONT_KNOW'],
  ['dont know', 'DONT_KNOW'],
  ['probably yes', 'PROBABLY_YES'],
  ['yes', 'YES'],
]);

export const ACCEPTED_ANSWERS = ['no', 'probably no', "don't know", 'probably yes', 'yes'];

export function parseAnswerChoice(answer: string): AnswerChoice | null {
  const normalized = answer.trim().toLowerCase().replace(/_/g, ' ').replace(/\s+/g, ' ');
  return ANSWER_CHOICES.get(normalized) ?? null;
}

export type ParsedAnswer =
  | { kind: 'WEIGHT'; weight: number }
  | { kind: 'SKIP' };

/**
 * Answer string -> graded weight (or skip for "don't know")
 */
export function toParsedAnswer(answer: string): ParsedAnswer {
  const choice = parseAnswerChoice(answer);
  if (choice === null) {
    throw new ApiError(
      400,
      `Invalid answer. Expected one of: ${ACCEPTED_ANSWERS.join(', ')}`,
      `Unknown answer: ${answer}`
    );
  }
  if (choice === 'DONT_KNOW') {
    return { kind: 'SKIP' };
  }
  return { kind: 'WEIGHT', weight: ANSWER_WEIGHT_MAP[choice] };
}

/**
 * Parse the JSON body; an unreadable body is a 400, not a 500
 */
export async function readJsonBody(request: NextRequest): Promise<unknown> {
  try {
    const body: unknown = await request.json();
    return body;
  } catch (error) {
    throw new ApiError(400, 'The request body must be JSON.', String(error));
  }
}
