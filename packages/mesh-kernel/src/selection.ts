/**
 * Selection expressions pick element indices by string:
 *
 *   "*"          every element
 *   "3"          element 3
 *   "0..4"       elements 0, 1, 2, 3 (end is exclusive)
 *   "1, 5..7"    elements 1, 5, 6
 *
 * An empty expression selects nothing.
 */

import { GeometryError } from './errors.js';

const SINGLE = /^\d+$/;
const RANGE = /^(\d+)\s*\.\.\s*(\d+)$/;

/** Resolve an expression against `count` elements. Sorted, without duplicates. */
export function parseSelection(expression: string, count: number): number[] {
  const picked = new Set<number>();
  for (const raw of expression.split(',')) {
    const term = raw.trim();
    if (term === '') continue;
    if (term === '*') {
      for (let i = 0; i < count; i++) picked.add(i);
      continue;
    }
    if (SINGLE.test(term)) {
      picked.add(checkIndex(Number(term), count, expression));
      continue;
    }
    const range = RANGE.exec(term);
    if (!range) {
      throw new GeometryError(`Invalid selection term "${term}" in "${expression}"`);
    }
    const start = Number(range[1]);
    const end = Number(range[2]);
    if (end < start) {
      throw new GeometryError(`Selection range ${term} ends before it starts`);
    }
    if (end > count) {
      throw new GeometryError(`Selection range ${term} exceeds element count ${count}`);
    }
    for (let i = start; i < end; i++) picked.add(i);
  }
  return [...picked].sort((a, b) => a - b);
}

function checkIndex(index: number, count: number, expression: string): number {
  if (index >= count) {
    throw new GeometryError(`Selection "${expression}" references element ${index}, but there are only ${count}`);
  }
  return index;
}

/** Validate an explicit index list against `count` elements. Sorted, without duplicates. */
export function checkSelection(indices: readonly number[], count: number, what: string): number[] {
  for (const i of indices) {
    if (!Number.isInteger(i) || i < 0 || i >= count) {
      throw new GeometryError(`${what} index ${i} is out of range (0..${count})`);
    }
  }
  return [...new Set(indices)].sort((a, b) => a - b);
}

/** True when `expression` parses, independent of any element count. */
export function isSelectionExpression(expression: string): boolean {
  return expression
    .split(',')
    .map((t) => t.trim())
    .every((t) => t === '' || t === '*' || SINGLE.test(t) || RANGE.test(t));
}
