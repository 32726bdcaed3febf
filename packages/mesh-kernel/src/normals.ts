/**
 * Face and vertex normals.
 *
 * Degenerate policy: zero-area faces get a [0, 0, 0] face normal and add
 * nothing to their vertices; a vertex with no non-degenerate face gets
 * [0, 0, 0].
 */

import { makeChannel } from './channels.js';
import { Mesh, type Face } from './mesh.js';
import { type ReadonlyVec3, type Vec3, add, normalize } from './vec3.js';

/**
 * Newell's method. The result is perpendicular to the face, points to the
 * side the corners wind counter-clockwise around, and its length is twice
 * the face area. Works for non-planar and concave polygons.
 */
export function newellNormal(positions: readonly ReadonlyVec3[], face: Face): Vec3 {
  const n: Vec3 = [0, 0, 0];
  for (let i = 0; i < face.length; i++) {
    const a = positions[face[i]];
    const b = positions[face[(i + 1) % face.length]];
    n[0] += (a[1] - b[1]) * (a[2] + b[2]);
    n[1] += (a[2] - b[2]) * (a[0] + b[0]);
    n[2] += (a[0] - b[0]) * (a[1] + b[1]);
  }
  return n;
}

/** Unit face normal, or [0, 0, 0] for a zero-area face. */
export function faceNormal(mesh: Mesh, f: number): Vec3 {
  return normalize(newellNormal(mesh.positions, mesh.faces[f]));
}

export function faceArea(mesh: Mesh, f: number): number {
  const n = newellNormal(mesh.positions, mesh.faces[f]);
  return Math.hypot(n[0], n[1], n[2]) / 2;
}

/**
 * Area-weighted vertex normals plus face normals, written to the
 * "vertex:normal" and "face:normal" vec3 channels (replacing existing ones).
 */
export function computeNormals(mesh: Mesh): Mesh {
  const perVertex: Vec3[] = Array.from({ length: mesh.vertexCount }, (): Vec3 => [0, 0, 0]);
  const perFace: Vec3[] = [];
  mesh.faces.forEach((face) => {
    const weighted = newellNormal(mesh.positions, face);
    perFace.push(normalize(weighted));
    for (const v of face) perVertex[v] = add(perVertex[v], weighted);
  });

  const channels = mesh.channelSet();
  channels.set(makeChannel('vertex', 'vec3', 'normal', perVertex.map(normalize)));
  channels.set(makeChannel('face', 'vec3', 'normal', perFace));
  return Mesh.fromPolygons(mesh.positions, mesh.faces, channels.list());
}
