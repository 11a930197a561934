/**
 * State codec tests
 */

import { decodeState, deserialize, encodeState, serialize } from '../stateCodec';
import { answer, newGame, rejectGuess } from '../engine';
import { StateCorruptError } from '@/server/errors';
import {
  TEST_CONFIG,
  animalCatalog,
  captureError,
  tallCatalog,
  withGuess,
} from '@/server/__tests__/fixtures';

const VALID = {
  version: 1,
  scores: { A: 0, B: 0 },
  asked: [],
  excludedEntities: [],
  turnCount: 0,
  pendingGuess: null,
};

function corruptDetails(record: unknown): string[] {
  const error = captureError(() => decodeState(record, tallCatalog()));
  if (!(error instanceof StateCorruptError)) {
    throw new Error(`Expected StateCorruptError, got ${String(error)}`);
  }
  return error.details;
}

describe('stateCodec', () => {
  it('should encode a fresh game as a flat record', () => {
    const { state } = newGame(tallCatalog(), TEST_CONFIG);
    expect(encodeState(state)).toEqual(VALID);
  });

  it('should round-trip a played state exactly', () => {
    const catalog = animalCatalog();
    const config = withGuess({ maxTurns: 1 });
    const started = newGame(catalog, config);
    const answered = answer(started.state, catalog, 'swims', 0.75, config);
    if (answered.prompt.kind !== 'GUESS') {
      throw new Error('expected a guess after the turn cap');
    }
    const rejected = rejectGuess(answered.state, catalog, answered.prompt.entity.id, config);

    expect(answered.state.pendingGuess).toBe(answered.prompt.entity.id);
    expect(deserialize(serialize(answered.state), catalog)).toEqual(answered.state);
    expect(decodeState(encodeState(rejected.state), catalog)).toEqual(rejected.state);
    expect(deserialize(serialize(rejected.state), catalog)).toEqual(rejected.state);
  });

  it('should keep fractional scores bit-exact', () => {
    const state = {
      scores: { A: 0.1 + 0.2, B: -1 / 3 },
      asked: ['Q1'],
      excludedEntities: [],
      turnCount: 1,
      pendingGuess: null,
    };
    const decoded = deserialize(serialize(state), tallCatalog());
    expect(decoded.scores.A).toBe(0.1 + 0.2);
    expect(decoded.scores.B).toBe(-1 / 3);
  });

  it('should reject a blob that is not JSON', () => {
    expect(() => deserialize('{not json', tallCatalog())).toThrow(StateCorruptError);
  });

  it('should reject missing fields instead of defaulting', () => {
    const { turnCount: _omitted, ...withoutTurnCount } = VALID;
    expect(corruptDetails(withoutTurnCount)).toEqual(['turnCount: Required']);
  });

  it('should reject unknown fields and versions', () => {
    expect(corruptDetails({ ...VALID, extra: true }).length).toBeGreaterThan(0);
    expect(corruptDetails({ ...VALID, version: 2 }).length).toBeGreaterThan(0);
  });

  it('should reject ids missing from the catalog', () => {
    expect(corruptDetails({ ...VALID, scores: { A: 0, B: 0, Z: 1 } })).toEqual([
      'unknown entity in scores: Z',
    ]);
    expect(corruptDetails({ ...VALID, scores: { A: 0 } })).toEqual([
      'entity missing from scores: B',
    ]);
    expect(corruptDetails({ ...VALID, asked: ['Q9'], turnCount: 0 })).toEqual([
      'unknown question in asked: Q9',
    ]);
    expect(corruptDetails({ ...VALID, excludedEntities: ['Z'] })).toEqual([
      'unknown entity in excludedEntities: Z',
    ]);
  });

  it('should reject a pending guess that cannot be confirmed', () => {
    expect(corruptDetails({ ...VALID, pendingGuess: 'Z' })).toEqual([
      'unknown entity in pendingGuess: Z',
    ]);
    expect(corruptDetails({ ...VALID, excludedEntities: ['A'], pendingGuess: 'A' })).toEqual([
      'pendingGuess is excluded: A',
    ]);
    const { pendingGuess: _pending, ...withoutPending } = VALID;
    expect(corruptDetails(withoutPending)).toEqual(['pendingGuess: Required']);
  });

  it('should reject reserved keys in scores', () => {
    const blob = '{"version":1,"scores":{"__proto__":0,"A":0,"B":0},"asked":[],"excludedEntities":[],"turnCount":0,"pendingGuess":null}';
    expect(() => deserialize(blob, tallCatalog())).toThrow('State record is malformed');
  });

  it('should reject duplicates and impossible turn counts', () => {
    expect(corruptDetails({ ...VALID, excludedEntities: ['A', 'A'] })).toEqual([
      'duplicate entity in excludedEntities: A',
    ]);
    expect(corruptDetails({ ...VALID, turnCount: 1 })).toEqual([
      'turnCount 1 exceeds asked questions 0',
    ]);
  });
});
