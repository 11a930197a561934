/**
 * Graded answer helper tests
 */

import { invertAnswerWeight, snapToAnswerWeight } from '../answers';

describe('answers', () => {
  it('should snap weights to the nearest graded level', () => {
    expect(snapToAnswerWeight(0)).toBe(0);
    expect(snapToAnswerWeight(0.1)).toBe(0);
    expect(snapToAnswerWeight(0.6)).toBe(0.75);
    expect(snapToAnswerWeight(0.9)).toBe(1);
  });

  it('should send a midpoint to the lower level', () => {
    expect(snapToAnswerWeight(0.5)).toBe(0.25);
  });

  it('should invert graded levels', () => {
    expect(invertAnswerWeight(1)).toBe(0);
    expect(invertAnswerWeight(0.25)).toBe(0.75);
  });
});
