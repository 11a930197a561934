/**
 * GameState <-> flat record <-> opaque blob
 * decode never fills in defaults: anything missing or unknown is StateCorruptError.
 */

import { z } from 'zod';
import type { Catalog } from '@/server/algo/types';
import { StateCorruptError } from '@/server/errors';
import { CatalogKeySchema } from '@/server/catalog/schema';
import type { GameState } from './types';

export const STATE_VERSION = 1;

export const EncodedGameStateSchema = z.object({
  version: z.literal(STATE_VERSION),
  scores: z.record(CatalogKeySchema, z.number().finite()),
  asked: z.array(z.string()),
  excludedEntities: z.array(z.string()),
  turnCount: z.number().int().nonnegative(),
  pendingGuess: z.string().nullable(),
}).strict();

export type EncodedGameState = z.infer<typeof EncodedGameStateSchema>;

export function encodeState(state: GameState): EncodedGameState {
  return {
    version: STATE_VERSION,
    scores: { ...state.scores },
    asked: [...state.asked],
    excludedEntities: [...state.excludedEntities],
    turnCount: state.turnCount,
    pendingGuess: state.pendingGuess,
  };
}

function duplicatesOf(ids: readonly string[]): string[] {
  return ids.filter((id, i) => ids.indexOf(id) !== i);
}

export function decodeState(record: unknown, catalog: Catalog): GameState {
  const result = EncodedGameStateSchema.safeParse(record);
  if (!result.success) {
    throw new StateCorruptError(
      'State record is malformed',
      result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const { scores, asked, excludedEntities, turnCount, pendingGuess } = result.data;
  const details: string[] = [];

  for (const entityId of Object.keys(scores)) {
    if (!catalog.entityById.has(entityId)) {
      details.push(`unknown entity in scores: ${entityId}`);
    }
  }
  for (const entity of catalog.entities) {
    if (!Object.prototype.hasOwnProperty.call(scores, entity.id)) {
      details.push(`entity missing from scores: ${entity.id}`);
    }
  }
  for (const questionId of asked) {
    if (!catalog.questionById.has(questionId)) {
      details.push(`unknown question in asked: ${questionId}`);
    }
  }
  for (const entityId of excludedEntities) {
    if (!catalog.entityById.has(entityId)) {
      details.push(`unknown entity in excludedEntities: ${entityId}`);
    }
  }
  for (const id of duplicatesOf(asked)) {
    details.push(`duplicate question in asked: ${id}`);
  }
  for (const id of duplicatesOf(excludedEntities)) {
    details.push(`duplicate entity in excludedEntities: ${id}`);
  }
  if (pendingGuess !== null) {
    if (!catalog.entityById.has(pendingGuess)) {
      details.push(`unknown entity in pendingGuess: ${pendingGuess}`);
    } else if (excludedEntities.includes(pendingGuess)) {
      details.push(`pendingGuess is excluded: ${pendingGuess}`);
    }
  }
  // every processed turn consumes at least one question
  if (turnCount > asked.length) {
    details.push(`turnCount ${turnCount} exceeds asked questions ${asked.length}`);
  }

  if (details.length > 0) {
    throw new StateCorruptError('State record does not match the catalog', details);
  }

  return {
    scores: { ...scores },
    asked: [...asked],
    excludedEntities: [...excludedEntities],
    turnCount,
    pendingGuess,
  };
}

export function serialize(state: GameState): string {
  return JSON.stringify(encodeState(state));
}

export function deserialize(blob: string, catalog: Catalog): GameState {
  let record: unknown;
  try {
    record = JSON.parse(blob);
  } catch (error) {
    throw new StateCorruptError('State blob is not valid JSON', [String(error)]);
  }
  return decodeState(record, catalog);
}
