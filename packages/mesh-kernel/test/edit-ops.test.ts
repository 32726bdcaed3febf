import { describe, it, expect } from 'vitest';
import {
  Mesh, box, quad, extrudeFaces, insetFaces, chamferVertices, faceNormal, makeChannel, GeometryError,
} from '../src/index.js';
import { expectClosed, expectOutward, near, nearVec } from './helpers.js';

const cube = box([0, 0, 0], [2, 2, 2]);
const TOP = 1;
const FRONT = 2;

describe('extrudeFaces', () => {
  it('lifts the top face and adds four side quads', () => {
    const m = extrudeFaces(cube, [TOP], 1);
    expect(m.vertexCount).toBe(12);
    expect(m.faceCount).toBe(10);
    expect(m.faces[TOP]).toEqual([8, 9, 10, 11]);
    nearVec(m.positions[8], [-1, 2, -1]);
    near(m.bounds().max[1], 2);
  });

  it('keeps the result closed and outward', () => {
    const m = extrudeFaces(cube, [TOP], 1);
    expectClosed(m);
    for (let f = 6; f < 10; f++) near(faceNormal(m, f)[1], 0);
    expectOutward(m, [0, 0.5, 0]);
  });

  it('extrudes adjacent faces as one region', () => {
    const m = extrudeFaces(cube, [TOP, FRONT], 0.5);
    expect(m.vertexCount).toBe(14);
    expect(m.faceCount).toBe(12);
    expectClosed(m);
    // Vertex 7 sits on both faces and moves along their averaged normal.
    const s = 0.5 / Math.SQRT2;
    const lifted = m.faces[TOP][2];
    nearVec(m.positions[lifted], [1, 1 + s, 1 + s]);
  });

  it('extrudes an open quad into a box without a bottom', () => {
    const q = quad([0, 0, 0], [0, 1, 0], [1, 0, 0], [2, 2]);
    const m = extrudeFaces(q, [0], 2);
    expect(m.vertexCount).toBe(8);
    expect(m.faceCount).toBe(5);
  });

  it('copies face channels onto side faces', () => {
    const tagged = Mesh.fromPolygons(cube.positions, cube.faces, [
      makeChannel('face', 'f32', 'mat', [0, 1, 2, 3, 4, 5]),
    ]);
    const m = extrudeFaces(tagged, [TOP], 1);
    expect(m.channel('face', 'mat')?.values).toEqual([0, 1, 2, 3, 4, 5, 1, 1, 1, 1]);
  });

  it('returns an unchanged copy for an empty selection', () => {
    const m = extrudeFaces(cube, [], 1);
    expect(m.positions).toEqual(cube.positions);
    expect(m.faces).toEqual(cube.faces);
  });

  it('rejects out-of-range faces', () => {
    expect(() => extrudeFaces(cube, [6], 1)).toThrow(GeometryError);
  });
});

describe('insetFaces', () => {
  it('replaces the face with an inner copy and a ring of quads', () => {
    const m = insetFaces(cube, [TOP], 0.5);
    expect(m.vertexCount).toBe(12);
    expect(m.faceCount).toBe(10);
    expect(m.faces[TOP]).toEqual([8, 9, 10, 11]);
    nearVec(m.positions[8], [-0.5, 1, -0.5]);
    expect(m.faces[6]).toEqual([2, 6, 9, 8]);
    expectClosed(m);
    expectOutward(m);
  });

  it('keeps the inner face coplanar and facing the same way', () => {
    const m = insetFaces(cube, [TOP], 0.25);
    nearVec(faceNormal(m, TOP), [0, 1, 0]);
    for (let f = 6; f < 10; f++) nearVec(faceNormal(m, f), [0, 1, 0]);
  });

  it('rejects fractions outside (0, 1)', () => {
    expect(() => insetFaces(cube, [TOP], 0)).toThrow(GeometryError);
    expect(() => insetFaces(cube, [TOP], 1)).toThrow(GeometryError);
  });
});

describe('chamferVertices', () => {
  it('cuts a cube corner into a triangle', () => {
    const m = chamferVertices(cube, [7], 0.5);
    expect(m.vertexCount).toBe(10);
    expect(m.faceCount).toBe(7);
    expect(m.faces[TOP]).toEqual([2, 6, 7, 8, 3]);
    expect(m.faces[6]).toEqual([8, 7, 9]);
    nearVec(m.positions[7], [0.5, 1, 1]);
    nearVec(faceNormal(m, 6), [1 / Math.sqrt(3), 1 / Math.sqrt(3), 1 / Math.sqrt(3)]);
    expectClosed(m);
    expectOutward(m);
  });

  it('clamps the cut to half an edge', () => {
    const m = chamferVertices(cube, [7], 5);
    nearVec(m.positions[7], [0, 1, 1]);
  });

  it('skips boundary vertices', () => {
    const q = quad([0, 0, 0], [0, 1, 0], [1, 0, 0], [2, 2]);
    const m = chamferVertices(q, [0, 1], 0.1);
    expect(m.vertexCount).toBe(4);
    expect(m.faceCount).toBe(1);
  });

  it('rejects a non-positive amount', () => {
    expect(() => chamferVertices(cube, [0], 0)).toThrow(GeometryError);
  });
});
