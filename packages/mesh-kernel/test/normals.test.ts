import { describe, it, expect } from 'vitest';
import { Mesh, box, computeNormals, faceArea, faceNormal, makeChannel } from '../src/index.js';
import { near, nearVec } from './helpers.js';

describe('computeNormals', () => {
  const cube = box([0, 0, 0], [2, 2, 2]);

  it('writes face normals', () => {
    const m = computeNormals(cube);
    const n = m.channel('face', 'normal');
    expect(n?.type).toBe('vec3');
    if (n?.type !== 'vec3') return;
    nearVec(n.values[1], [0, 1, 0]);
    nearVec(n.values[0], [0, -1, 0]);
  });

  it('writes area-weighted vertex normals', () => {
    const m = computeNormals(cube);
    const n = m.channel('vertex', 'normal');
    if (n?.type !== 'vec3') throw new Error('vertex:normal missing');
    const k = 1 / Math.sqrt(3);
    nearVec(n.values[7], [k, k, k]);
    nearVec(n.values[0], [-k, -k, -k]);
  });

  it('gives zero-area faces and their vertices a zero normal', () => {
    const sliver = Mesh.fromPolygons([[0, 0, 0], [1, 0, 0], [2, 0, 0]], [[0, 1, 2]]);
    const m = computeNormals(sliver);
    expect(m.channel('face', 'normal')?.values).toEqual([[0, 0, 0]]);
    expect(m.channel('vertex', 'normal')?.values).toEqual([[0, 0, 0], [0, 0, 0], [0, 0, 0]]);
  });

  it('keeps other channels', () => {
    const tagged = Mesh.fromPolygons(cube.positions, cube.faces, [makeChannel('face', 'bool', 'hidden', new Array<boolean>(6).fill(false))]);
    expect(computeNormals(tagged).channel('face', 'hidden')?.values).toHaveLength(6);
  });
});

describe('face measures', () => {
  it('area and normal of a box face', () => {
    const cube = box([0, 0, 0], [2, 3, 4]);
    near(faceArea(cube, 1), 8);
    nearVec(faceNormal(cube, 5), [1, 0, 0]);
  });
});
