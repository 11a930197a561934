/**
 * Game error kinds
 * Every error the engine raises extends GameError and carries a stable code.
 */

export type GameErrorCode =
  | 'DATASET_ERROR'
  | 'INVALID_ANSWER'
  | 'INVALID_GUESS'
  | 'STATE_CORRUPT';

export class GameError extends Error {
  constructor(
    public readonly code: GameErrorCode,
    message: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'GameError';
  }
}

/** Malformed or inconsistent catalog. Fatal at load. */
export class DatasetError extends GameError {
  constructor(message: string, details: string[] = []) {
    super('DATASET_ERROR', message, details);
    this.name = 'DatasetError';
  }
}

/** Answer rejected before any state change. */
export class InvalidAnswerError extends GameError {
  constructor(message: string) {
    super('INVALID_ANSWER', message);
    this.name = 'InvalidAnswerError';
  }
}

/** Confirm/reject of an entity that is unknown or already excluded. */
export class InvalidGuessError extends GameError {
  constructor(message: string) {
    super('INVALID_GUESS', message);
    this.name = 'InvalidGuessError';
  }
}

/** A persisted state blob could not be decoded against the catalog. */
export class StateCorruptError extends GameError {
  constructor(message: string, details: string[] = []) {
    super('STATE_CORRUPT', message, details);
    this.name = 'StateCorruptError';
  }
}
