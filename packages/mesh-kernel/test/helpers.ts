import { expect } from 'vitest';
import { buildHalfEdges, centroid, dot, faceNormal, sub, type Mesh, type ReadonlyVec3 } from '../src/index.js';

export const EPSILON = 1e-9;

export function near(actual: number, expected: number, tol = EPSILON) {
  expect(Math.abs(actual - expected)).toBeLessThan(tol);
}

export function nearVec(actual: ReadonlyVec3, expected: ReadonlyVec3, tol = EPSILON) {
  for (let i = 0; i < 3; i++) near(actual[i], expected[i], tol);
}

/** Every face normal points away from `center`. */
export function expectOutward(mesh: Mesh, center: ReadonlyVec3 = [0, 0, 0]) {
  for (let f = 0; f < mesh.faceCount; f++) {
    const c = centroid(mesh.faces[f].map((v) => mesh.positions[v]));
    expect(dot(faceNormal(mesh, f), sub(c, center))).toBeGreaterThan(0);
  }
}

/** Every halfedge has an opposite one: the surface is closed and consistently wound. */
export function expectClosed(mesh: Mesh) {
  const table = buildHalfEdges(mesh);
  expect(table.halfedges.every((h) => h.twin !== null)).toBe(true);
}
