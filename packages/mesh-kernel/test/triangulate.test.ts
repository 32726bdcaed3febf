import { describe, it, expect } from 'vitest';
import { box, circle, triangulate } from '../src/index.js';

describe('triangulate', () => {
  it('fans every quad of a box into two triangles', () => {
    const t = triangulate(box([0, 0, 0], [2, 2, 2]).snapshot());
    expect(t.vertexCount).toBe(8);
    expect(t.triangleCount).toBe(12);
    expect(t.indices.slice(0, 6)).toEqual([0, 1, 5, 0, 5, 4]);
    expect(t.bounds).toEqual({ min: [-1, -1, -1], max: [1, 1, 1] });
  });

  it('fans an n-gon into n - 2 triangles', () => {
    const t = triangulate(circle([0, 0, 0], 1, 6).snapshot());
    expect(t.triangleCount).toBe(4);
    expect(t.indices).toEqual([0, 1, 2, 0, 2, 3, 0, 3, 4, 0, 4, 5]);
  });

  it('returns mutable copies of the frozen snapshot', () => {
    const snap = box([0, 0, 0], [1, 1, 1]).snapshot();
    const t = triangulate(snap);
    expect(Object.isFrozen(t.vertices[0])).toBe(false);
  });
});
