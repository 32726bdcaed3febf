import { describe, it, expect } from 'vitest';
import { parseSelection, isSelectionExpression, GeometryError } from '../src/index.js';

describe('parseSelection', () => {
  it('* selects everything', () => {
    expect(parseSelection('*', 3)).toEqual([0, 1, 2]);
  });

  it('single indices', () => {
    expect(parseSelection('3', 5)).toEqual([3]);
  });

  it('ranges are half-open', () => {
    expect(parseSelection('0..4', 6)).toEqual([0, 1, 2, 3]);
    expect(parseSelection('3..3', 6)).toEqual([]);
  });

  it('terms are comma separated, sorted and deduplicated', () => {
    expect(parseSelection('1, 5..7', 10)).toEqual([1, 5, 6]);
    expect(parseSelection(' 6 , 2, 2 ', 10)).toEqual([2, 6]);
  });

  it('empty expression selects nothing', () => {
    expect(parseSelection('', 4)).toEqual([]);
  });

  it('rejects malformed terms', () => {
    expect(() => parseSelection('a', 4)).toThrow(GeometryError);
    expect(() => parseSelection('1..', 4)).toThrow(/Invalid selection term/);
    expect(() => parseSelection('4..2', 6)).toThrow(/ends before it starts/);
  });

  it('rejects indices past the element count', () => {
    expect(() => parseSelection('5', 5)).toThrow(GeometryError);
    expect(() => parseSelection('0..6', 5)).toThrow(/exceeds element count 5/);
  });
});

describe('isSelectionExpression', () => {
  it('accepts every form without an element count', () => {
    expect(isSelectionExpression('*')).toBe(true);
    expect(isSelectionExpression('0..100, 7')).toBe(true);
    expect(isSelectionExpression('')).toBe(true);
  });

  it('rejects malformed terms', () => {
    expect(isSelectionExpression('x')).toBe(false);
    expect(isSelectionExpression('1..')).toBe(false);
  });
});
