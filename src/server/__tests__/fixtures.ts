/**
 * Shared test fixtures
 */

import type { Catalog } from '@/server/algo/types';
import type { EngineConfig } from '@/server/config/schema';
import { loadCatalog } from '@/server/catalog/loader';

export const TEST_CONFIG: EngineConfig = {
  version: 'v1',
  guess: { marginThreshold: 3, maxTurns: 20, topN: 5 },
  selection: { window: { min: 10, ratio: 0.2 }, minVariance: 0.0001 },
  scoring: { missingAttributeWeight: 0 },
};

export function withGuess(overrides: Partial<EngineConfig['guess']>): EngineConfig {
  return { ...TEST_CONFIG, guess: { ...TEST_CONFIG.guess, ...overrides } };
}

/** A is tall, B is not; one question */
export function tallCatalog(): Catalog {
  return loadCatalog(
    {
      entities: [
        { id: 'A', name: 'Tall', attributes: { tall: 1 } },
        { id: 'B', name: 'Short', attributes: { tall: 0 } },
      ],
    },
    {
      questions: [{ id: 'Q1', attributeKey: 'tall', text: 'Is it tall?' }],
    }
  );
}

export function animalCatalog(): Catalog {
  return loadCatalog(
    {
      entities: [
        { id: 'cat', name: 'Cat', attributes: { fur: 1, swims: 0.25, pet: 1 } },
        { id: 'dog', name: 'Dog', attributes: { fur: 1, swims: 0.75, pet: 1, barks: 1 } },
        { id: 'duck', name: 'Duck', attributes: { feathers: 1, flies: 1, swims: 1, pet: 0.25 } },
        { id: 'eagle', name: 'Eagle', attributes: { feathers: 1, flies: 1 } },
        { id: 'shark', name: 'Shark', attributes: { swims: 1 } },
      ],
    },
    {
      questions: [
        { id: 'q1', attributeKey: 'fur', text: 'Does it have fur?' },
        { id: 'q2', attributeKey: 'feathers', text: 'Does it have feathers?' },
        { id: 'q3', attributeKey: 'flies', text: 'Can it fly?' },
        { id: 'q4', attributeKey: 'swims', text: 'Can it swim?' },
        { id: 'q5', attributeKey: 'pet', text: 'Is it a common pet?' },
        { id: 'q6', attributeKey: 'barks', text: 'Does it bark?' },
      ],
    }
  );
}

/**
 * Run fn and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
