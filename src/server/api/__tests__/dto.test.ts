/**
 * DTO conversion tests
 */

import { NO_CANDIDATES_MESSAGE, toPromptPayload } from '../dto';
import { answer, newGame } from '@/server/game/engine';
import { TEST_CONFIG, tallCatalog } from '@/server/__tests__/fixtures';

describe('toPromptPayload', () => {
  const catalog = tallCatalog();

  it('should expose the question text but no scores', () => {
    const { state, prompt } = newGame(catalog, TEST_CONFIG);

    expect(toPromptPayload(prompt, state)).toEqual({
      state: 'ASKING',
      question: { questionId: 'Q1', attributeKey: 'tall', displayText: 'Is it tall?' },
      sessionState: { questionCount: 0, confidence: 0.5 },
    });
  });

  it('should describe a guess with candidate probabilities', () => {
    const started = newGame(catalog, TEST_CONFIG);
    const { state, prompt } = answer(started.state, catalog, 'tall', 0, TEST_CONFIG);
    const payload = toPromptPayload(prompt, state);
    const certainty = 1 / (1 + Math.exp(-2));

    expect(payload.state).toBe('GUESSING');
    expect(payload.guess).toEqual({
      entityId: 'B',
      name: 'Short',
      certainty,
      candidates: [
        { entityId: 'B', name: 'Short', probability: certainty },
        { entityId: 'A', name: 'Tall', probability: Math.exp(-2) / (1 + Math.exp(-2)) },
      ],
    });
    expect(payload.sessionState).toEqual({ questionCount: 1, confidence: certainty });
  });

  it('should carry the give-up message', () => {
    const { state } = newGame(catalog, TEST_CONFIG);
    const payload = toPromptPayload({ kind: 'NO_CANDIDATES', phase: 'NO_CANDIDATES' }, state);

    expect(payload).toEqual({
      state: 'NO_CANDIDATES',
      message: NO_CANDIDATES_MESSAGE,
      sessionState: { questionCount: 0, confidence: 0 },
    });
  });
});
