import { describe, it, expect } from 'vitest';
import {
  clamp,
  getNextBetLevel,
  getPreviousBetLevel,
  normalizeBetLevels,
  snapToBetLevel
} from '../betUtils';

describe('betUtils', () => {
  it('should clamp into the range', () => {
    expect(clamp(0, 1, 10)).toBe(1);
    expect(clamp(11, 1, 10)).toBe(10);
    expect(clamp(4, 1, 10)).toBe(4);
  });

  it('should normalize bet levels', () => {
    expect(normalizeBetLevels([10, 2.4, 5, 2, -3, 0, Number.NaN, 5, Number.POSITIVE_INFINITY])).toEqual([2, 5, 10]);
    expect(normalizeBetLevels([])).toEqual([]);
  });

  it('should step to the neighbouring levels', () => {
    const levels = [1, 2, 5, 10];
    expect(getNextBetLevel(levels, 2)).toBe(5);
    expect(getNextBetLevel(levels, 3)).toBe(5);
    expect(getNextBetLevel(levels, 10)).toBeUndefined();
    expect(getPreviousBetLevel(levels, 5)).toBe(2);
    expect(getPreviousBetLevel(levels, 4)).toBe(2);
    expect(getPreviousBetLevel(levels, 1)).toBeUndefined();
  });

  it('should snap to the greatest level not above the value', () => {
    const levels = [2, 5, 10];
    expect(snapToBetLevel(levels, 7)).toBe(5);
    expect(snapToBetLevel(levels, 10)).toBe(10);
    expect(snapToBetLevel(levels, 1)).toBe(2);
  });
});
