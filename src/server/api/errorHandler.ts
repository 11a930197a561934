/**
 * API error handling
 * Maps thrown errors to JSON responses with a user-facing message
 */

import { NextResponse } from 'next/server';
import { ZodError } from 'zod';
import { GameError, type GameErrorCode } from '@/server/errors';

/**
 * API error class
 */
export class ApiError extends Error {
  constructor(
    public statusCode: number,
    public userMessage: string,
    public technicalMessage?: string
  ) {
    super(technicalMessage || userMessage);
    this.name = 'ApiError';
  }
}

const isDevelopment = (): boolean => process.env.NODE_ENV === 'development';

const GAME_ERROR_RESPONSES: Record<GameErrorCode, { status: number; message: string }> = {
  INVALID_ANSWER: { status: 400, message: 'That answer cannot be used for this game.' },
  INVALID_GUESS: { status: 400, message: 'That guess does not belong to this game.' },
  STATE_CORRUPT: { status: 409, message: 'This game could not be resumed. Please start a new game.' },
  DATASET_ERROR: { status: 500, message: 'The game catalog could not be loaded.' },
};

/**
 * Convert an error to a NextResponse
 */
export function handleApiError(error: unknown): NextResponse {
  if (error instanceof ApiError) {
    return NextResponse.json(
      {
        error: error.userMessage,
        ...(isDevelopment() && error.technicalMessage !== undefined && {
          technical: error.technicalMessage,
        }),
      },
      { status: error.statusCode }
    );
  }

  // Request validation (zod)
  if (error instanceof ZodError) {
    const messages = error.issues.map(issue => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    return NextResponse.json(
      {
        error: 'The request is invalid.',
        details: messages,
      },
      { status: 400 }
    );
  }

  if (error instanceof GameError) {
    const { status, message } = GAME_ERROR_RESPONSES[error.code];
    return NextResponse.json(
      {
        error: message,
        code: error.code,
        ...(isDevelopment() && {
          technical: error.message,
          details: error.details,
        }),
      },
      { status }
    );
  }

  if (error instanceof Error) {
    return NextResponse.json(
      {
        error: translateErrorMessage(error.message),
        ...(isDevelopment() && {
          technical: error.message,
          stack: error.stack,
        }),
      },
      { status: 500 }
    );
  }

  return NextResponse.json(
    {
      error: 'An unexpected error occurred.',
      ...(isDevelopment() && {
        technical: String(error),
      }),
    },
    { status: 500 }
  );
}

/**
 * Known internal messages -> user-facing messages
 */
function translateErrorMessage(message: string): string {
  if (message.includes('Session not found')) {
    return 'The game session was not found. Please start a new game.';
  }
  if (message.includes('DATABASE_URL') || message.includes('SQLITE')) {
    return 'The session store is unavailable. Check DATABASE_URL.';
  }
  if (message.includes('Failed to load config')) {
    return 'The game configuration could not be loaded.';
  }
  return 'Something went wrong. Please try again.';
}

/**
 * Error handling wrapper for route handlers
 */
export function withErrorHandler<T extends unknown[]>(
  route: string,
  handler: (...args: T) => Promise<NextResponse>
) {
  return async (...args: T): Promise<NextResponse> => {
    try {
      return await handler(...args);
    } catch (error) {
      console.error(`Error in ${route}:`, error);
      return handleApiError(error);
    }
  };
}
