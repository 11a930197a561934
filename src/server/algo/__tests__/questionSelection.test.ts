/**
 * Question selection tests
 */

import {
  candidateWindowSize,
  rankQuestionCandidates,
  selectNextQuestion,
  variance,
  type SelectionOptions,
} from '../questionSelection';
import { loadCatalog } from '@/server/catalog/loader';
import type { Catalog } from '../types';

const OPTIONS: SelectionOptions = {
  window: { min: 10, ratio: 0.2 },
  minVariance: 0.0001,
  missingAttributeWeight: 0,
};

/** split divides the catalog in half, rare singles out e1 */
function splitCatalog(): Catalog {
  return loadCatalog(
    {
      entities: [
        { id: 'e1', name: 'E1', attributes: { split: 1, rare: 1, common: 1 } },
        { id: 'e2', name: 'E2', attributes: { split: 1, common: 1 } },
        { id: 'e3', name: 'E3', attributes: { common: 1 } },
        { id: 'e4', name: 'E4', attributes: { common: 1 } },
      ],
    },
    {
      questions: [
        { id: 'q1', attributeKey: 'rare', text: 'Rare?' },
        { id: 'q2', attributeKey: 'split', text: 'Split?' },
        { id: 'q3', attributeKey: 'common', text: 'Common?' },
      ],
    }
  );
}

const ZERO = { e1: 0, e2: 0, e3: 0, e4: 0 };

describe('questionSelection', () => {
  describe('candidateWindowSize', () => {
    it('should use the larger of min and ratio, capped by remaining', () => {
      const window = { min: 10, ratio: 0.2 };
      expect(candidateWindowSize(0, window)).toBe(0);
      expect(candidateWindowSize(5, window)).toBe(5);
      expect(candidateWindowSize(30, window)).toBe(10);
      expect(candidateWindowSize(100, window)).toBe(20);
    });
  });

  describe('variance', () => {
    it('should compute population variance', () => {
      expect(variance([1, 0])).toBe(0.25);
      expect(variance([0.5, 0.5])).toBe(0);
      expect(variance([])).toBe(0);
    });
  });

  describe('selectNextQuestion', () => {
    it('should prefer the attribute that splits the candidates', () => {
      const question = selectNextQuestion(splitCatalog(), [], ZERO, [], OPTIONS);
      expect(question?.id).toBe('q2');
    });

    it('should skip asked questions', () => {
      const question = selectNextQuestion(splitCatalog(), ['q2'], ZERO, [], OPTIONS);
      expect(question?.id).toBe('q1');
    });

    it('should treat an attribute shared by every candidate as resolved', () => {
      const candidates = rankQuestionCandidates(splitCatalog(), [], ZERO, [], OPTIONS);
      expect(candidates.map(c => c.question.id)).toEqual(['q2', 'q1']);
      expect(candidates[0].variance).toBe(0.25);
      expect(candidates[1].variance).toBe(0.1875);
    });

    it('should return null when nothing discriminates', () => {
      expect(selectNextQuestion(splitCatalog(), ['q1', 'q2'], ZERO, [], OPTIONS)).toBeNull();
    });

    it('should only look at the top-K window', () => {
      const scores = { e1: 2, e2: 1, e3: 0, e4: 0 };
      const narrow: SelectionOptions = { ...OPTIONS, window: { min: 2, ratio: 0 } };

      // e1 and e2 both have split, so only rare separates them
      expect(selectNextQuestion(splitCatalog(), [], scores, [], narrow)?.id).toBe('q1');
      expect(selectNextQuestion(splitCatalog(), [], scores, [], OPTIONS)?.id).toBe('q2');
    });

    it('should ignore excluded entities', () => {
      // without e1, rare has no variance left
      const candidates = rankQuestionCandidates(splitCatalog(), ['q2'], ZERO, ['e1'], OPTIONS);
      expect(candidates).toEqual([]);
    });

    it('should break ties by questionId asc', () => {
      const catalog = loadCatalog(
        {
          entities: [
            { id: 'x', name: 'X', attributes: { tall: 1 } },
            { id: 'y', name: 'Y', attributes: { tall: 0 } },
          ],
        },
        {
          questions: [
            { id: 'q-b', attributeKey: 'tall', text: 'Is it tall?' },
            { id: 'q-a', attributeKey: 'tall', text: 'Is it big?' },
          ],
        }
      );
      expect(selectNextQuestion(catalog, [], { x: 0, y: 0 }, [], OPTIONS)?.id).toBe('q-a');
    });
  });
});
