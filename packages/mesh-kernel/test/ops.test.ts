import { describe, it, expect } from 'vitest';
import {
  Mesh, box, circle, quad, merge, transform, jitter, computeNormals, makeChannel,
  translation, scaling, compose, GeometryError,
} from '../src/index.js';
import { expectOutward, near, nearVec } from './helpers.js';

describe('merge', () => {
  const a = box([0, 0, 0], [2, 2, 2]);
  const b = circle([5, 0, 0], 1, 5);

  it('adds vertex and face counts', () => {
    const m = merge(a, b);
    expect(m.vertexCount).toBe(13);
    expect(m.faceCount).toBe(7);
  });

  it('offsets the second mesh by the first vertex count', () => {
    const m = merge(a, b);
    expect(m.faces[6]).toEqual([8, 9, 10, 11, 12]);
    expect(m.faces.slice(0, 6)).toEqual(a.faces);
  });

  it('does not weld coincident vertices', () => {
    const m = merge(a, a);
    expect(m.vertexCount).toBe(16);
    expect(m.positions[8]).toEqual(m.positions[0]);
  });

  it('fills channels missing on one side with defaults', () => {
    const m = merge(computeNormals(a), quad([0, 0, 0], [0, 1, 0], [1, 0, 0], [1, 1]));
    const normals = m.channel('vertex', 'normal');
    expect(normals?.values).toHaveLength(12);
    expect(normals?.values[8]).toEqual([0, 0, 0]);
    expect(m.channel('face', 'normal')?.values).toHaveLength(7);
  });

  it('rejects a channel name used with two types', () => {
    const left = Mesh.fromPolygons(a.positions, a.faces, [makeChannel('face', 'f32', 'tag', [0, 0, 0, 0, 0, 0])]);
    const right = Mesh.fromPolygons(b.positions, b.faces, [makeChannel('face', 'bool', 'tag', [true])]);
    expect(() => merge(left, right)).toThrow(GeometryError);
  });
});

describe('transform', () => {
  const b = box([0, 0, 0], [2, 2, 2]);

  it('moves every vertex and keeps faces', () => {
    const m = transform(b, translation([1, 2, 3]));
    expect(m.positions[0]).toEqual([0, 1, 2]);
    expect(m.faces).toEqual(b.faces);
  });

  it('composes scale, rotation and translation', () => {
    const m = transform(b, compose([0, 5, 0], [0, 0, 90], [2, 1, 1]));
    // (1, 1, 1) → scaled (2, 1, 1) → rotated 90° about Z (-1, 2, 1) → moved (-1, 7, 1)
    nearVec(m.positions[7], [-1, 7, 1]);
  });

  it('reverses winding under a mirror so faces stay outward', () => {
    const m = transform(b, scaling([-1, 1, 1]));
    expect(m.faces[0]).toEqual([0, 4, 5, 1]);
    expectOutward(m);
  });

  it('transforms normals with the inverse-transpose', () => {
    const m = transform(computeNormals(b), scaling([2, 1, 1]));
    const n = m.channel('vertex', 'normal');
    expect(n?.type).toBe('vec3');
    if (n?.type !== 'vec3') return;
    nearVec(n.values[7], [1 / 3, 2 / 3, 2 / 3]);
  });

  it('drops normals under a singular matrix', () => {
    const m = transform(computeNormals(b), scaling([1, 0, 1]));
    expect(m.channel('vertex', 'normal')).toBeUndefined();
    expect(m.channel('face', 'normal')).toBeUndefined();
    near(m.bounds().max[1], 0);
  });

  it('moves halfedge values with their edges when mirroring', () => {
    const q = quad([0, 0, 0], [0, 1, 0], [1, 0, 0], [1, 1]);
    const tagged = Mesh.fromPolygons(q.positions, q.faces, [makeChannel('halfedge', 'f32', 'edge', [0, 1, 2, 3])]);
    const m = transform(tagged, scaling([1, 1, -1]));
    expect(m.faces[0]).toEqual([0, 3, 2, 1]);
    expect(m.channel('halfedge', 'edge')?.values).toEqual([3, 2, 1, 0]);
  });

  it('rejects malformed matrices', () => {
    expect(() => transform(b, [1, 0, 0])).toThrow(GeometryError);
  });
});

describe('jitter', () => {
  const b = box([0, 0, 0], [2, 2, 2]);

  it('is deterministic per seed', () => {
    expect(jitter(b, 0.1, 7).positions).toEqual(jitter(b, 0.1, 7).positions);
    expect(jitter(b, 0.1, 7).positions).not.toEqual(jitter(b, 0.1, 8).positions);
  });

  it('stays within the amount on every axis', () => {
    const m = jitter(b, 0.1, 42);
    m.positions.forEach((p, i) => {
      for (let k = 0; k < 3; k++) expect(Math.abs(p[k] - b.positions[i][k])).toBeLessThanOrEqual(0.1);
    });
    expect(m.faces).toEqual(b.faces);
  });

  it('rejects a negative amount', () => {
    expect(() => jitter(b, -1, 0)).toThrow(GeometryError);
  });
});
