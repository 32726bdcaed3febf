import { describe, it, expect } from 'vitest';
import {
  Mesh, MeshBuilder, GeometryError, box, quad, makeChannel, buildHalfEdges, isInteriorVertex,
} from '../src/index.js';

const TRI: [number, number, number][] = [[0, 0, 0], [1, 0, 0], [0, 1, 0]];

describe('Mesh.fromPolygons', () => {
  it('builds a mesh from positions and faces', () => {
    const m = Mesh.fromPolygons(TRI, [[0, 1, 2]]);
    expect(m.vertexCount).toBe(3);
    expect(m.faceCount).toBe(1);
    expect(m.cornerCount).toBe(3);
  });

  it('copies its inputs', () => {
    const positions: [number, number, number][] = [[0, 0, 0], [1, 0, 0], [0, 1, 0]];
    const faces = [[0, 1, 2]];
    const m = Mesh.fromPolygons(positions, faces);
    positions[0][0] = 99;
    faces[0][0] = 2;
    expect(m.positions[0]).toEqual([0, 0, 0]);
    expect(m.faces[0]).toEqual([0, 1, 2]);
  });

  it('rejects out-of-range vertex indices', () => {
    expect(() => Mesh.fromPolygons(TRI, [[0, 1, 3]])).toThrow(GeometryError);
    expect(() => Mesh.fromPolygons(TRI, [[0, 1, 3]])).toThrow(/references vertex 3/);
    expect(() => Mesh.fromPolygons(TRI, [[0, 1, -1]])).toThrow(GeometryError);
  });

  it('rejects faces with fewer than 3 corners', () => {
    expect(() => Mesh.fromPolygons(TRI, [[0, 1]])).toThrow(/at least 3/);
  });

  it('rejects repeated consecutive corners', () => {
    expect(() => Mesh.fromPolygons(TRI, [[0, 1, 1, 2]])).toThrow(/repeats vertex 1/);
    expect(() => Mesh.fromPolygons(TRI, [[0, 1, 2, 0]])).toThrow(/repeats vertex 0/);
  });

  it('rejects non-finite coordinates', () => {
    expect(() => Mesh.fromPolygons([[0, 0, NaN], [1, 0, 0], [0, 1, 0]], [[0, 1, 2]])).toThrow(GeometryError);
  });

  it('rejects channels of the wrong length', () => {
    const ch = makeChannel('vertex', 'f32', 'weight', [1, 2]);
    expect(() => Mesh.fromPolygons(TRI, [[0, 1, 2]], [ch])).toThrow(/expected 3/);
  });
});

describe('Mesh', () => {
  it('empty mesh has nothing', () => {
    const m = Mesh.empty();
    expect(m.vertexCount).toBe(0);
    expect(m.faceCount).toBe(0);
    expect(m.bounds()).toEqual({ min: [0, 0, 0], max: [0, 0, 0] });
  });

  it('lists each undirected edge once', () => {
    expect(box([0, 0, 0], [1, 1, 1]).edges()).toHaveLength(12);
    expect(quad([0, 0, 0], [0, 0, 1], [1, 0, 0], [1, 1]).edges()).toEqual([[0, 1], [1, 2], [2, 3], [0, 3]]);
  });

  it('snapshot is deep-frozen and detached', () => {
    const m = Mesh.fromPolygons(TRI, [[0, 1, 2]], [makeChannel('vertex', 'vec2', 'uv', [[0, 0], [1, 0], [0, 1]])]);
    const snap = m.snapshot();
    expect(Object.isFrozen(snap)).toBe(true);
    expect(Object.isFrozen(snap.positions)).toBe(true);
    expect(Object.isFrozen(snap.positions[0])).toBe(true);
    expect(Object.isFrozen(snap.faces[0])).toBe(true);
    expect(Object.isFrozen(snap.channels[0].values[1])).toBe(true);
    expect(snap.positions[0]).not.toBe(m.positions[0]);
    expect(snap.bounds).toEqual({ min: [0, 0, 0], max: [1, 1, 0] });
  });

  it('clone shares no storage', () => {
    const m = box([0, 0, 0], [1, 1, 1]);
    const c = m.clone();
    expect(c.positions).toEqual(m.positions);
    expect(c.positions[0]).not.toBe(m.positions[0]);
    expect(c.faces[0]).not.toBe(m.faces[0]);
  });
});

describe('MeshBuilder', () => {
  it('fills undeclared channel values with the type default', () => {
    const b = new MeshBuilder();
    b.declareChannel('vertex', 'f32', 'weight');
    b.addVertex([0, 0, 0], new Map([['weight', 0.5]]));
    b.addVertex([1, 0, 0]);
    b.addVertex([0, 1, 0]);
    b.addFace([0, 1, 2]);
    const m = b.build();
    expect(m.channel('vertex', 'weight')?.values).toEqual([0.5, 0, 0]);
  });

  it('declaring after elements exist back-fills defaults', () => {
    const b = new MeshBuilder();
    b.addVertex([0, 0, 0]);
    b.addVertex([1, 0, 0]);
    b.addVertex([0, 1, 0]);
    b.addFace([0, 1, 2]);
    b.declareChannel('face', 'bool', 'selected');
    b.setValue('face', 'selected', 0, true);
    expect(b.build().channel('face', 'selected')?.values).toEqual([true]);
  });

  it('rejects redeclaring a channel with another type', () => {
    const b = new MeshBuilder();
    b.declareChannel('vertex', 'f32', 'w');
    expect(() => b.declareChannel('vertex', 'vec3', 'w')).toThrow(GeometryError);
  });

  it('rejects values for undeclared channels', () => {
    const b = new MeshBuilder();
    b.addVertex([0, 0, 0]);
    expect(() => b.setValue('vertex', 'missing', 0, 1)).toThrow(/not declared/);
  });
});

describe('Half-edges', () => {
  it('every box halfedge has a twin', () => {
    const t = buildHalfEdges(box([0, 0, 0], [1, 1, 1]));
    expect(t.halfedges).toHaveLength(24);
    for (const [i, h] of t.halfedges.entries()) {
      expect(h.twin).not.toBeNull();
      const twin = h.twin === null ? undefined : t.halfedges[h.twin];
      expect(twin?.from).toBe(h.to);
      expect(twin?.twin).toBe(i);
    }
    expect(isInteriorVertex(t, 0)).toBe(true);
  });

  it('quad edges are all boundary', () => {
    const t = buildHalfEdges(quad([0, 0, 0], [0, 0, 1], [1, 0, 0], [1, 1]));
    expect(t.halfedges.every((h) => h.twin === null)).toBe(true);
    expect(isInteriorVertex(t, 0)).toBe(false);
  });
});
