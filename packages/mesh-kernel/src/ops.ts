/**
 * Whole-mesh operations: merge, transform, jitter.
 */

import { type Channel, filledChannel, makeChannel } from './channels.js';
import { GeometryError } from './errors.js';
import { type Mat4, determinant3, normalMatrix, transformDirection, transformPoint } from './matrix.js';
import { Mesh } from './mesh.js';
import { mulberry32 } from './random.js';
import { type Vec3, normalize } from './vec3.js';

/**
 * Disjoint union. The result has a.vertexCount + b.vertexCount vertices and
 * a.faceCount + b.faceCount faces; b's indices are offset by a.vertexCount.
 * Coincident vertices are not welded.
 *
 * Channels present on only one side are filled with the type default on the
 * other. A channel name used with two different types is a GeometryError.
 */
export function merge(a: Mesh, b: Mesh): Mesh {
  const offset = a.vertexCount;
  const positions = [...a.positions, ...b.positions];
  const faces = [...a.faces, ...b.faces.map((f) => f.map((v) => v + offset))];

  const channels: Channel[] = [];
  const names = new Map<string, Readonly<Channel>>();
  for (const ch of [...a.channels(), ...b.channels()]) {
    const id = `${ch.key}:${ch.name}`;
    const seen = names.get(id);
    if (seen && seen.type !== ch.type) {
      throw new GeometryError(`Cannot merge channel "${id}": ${seen.type} vs ${ch.type}`);
    }
    if (!seen) names.set(id, ch);
  }
  for (const ch of names.values()) {
    const left = a.channel(ch.key, ch.name) ?? filledChannel(ch.key, ch.type, ch.name, countFor(a, ch.key));
    const right = b.channel(ch.key, ch.name) ?? filledChannel(ch.key, ch.type, ch.name, countFor(b, ch.key));
    channels.push(makeChannel(ch.key, ch.type, ch.name, [...left.values, ...right.values]));
  }
  return Mesh.fromPolygons(positions, faces, channels);
}

function countFor(mesh: Mesh, key: Channel['key']): number {
  switch (key) {
    case 'vertex': return mesh.vertexCount;
    case 'face': return mesh.faceCount;
    case 'halfedge': return mesh.cornerCount;
  }
}

/**
 * Apply an affine matrix to every vertex.
 *
 * The "normal" vertex channel is transformed with the inverse-transpose and
 * renormalized. Mirroring matrices (negative determinant) reverse every face
 * so faces keep pointing outward; halfedge channels are reversed with them.
 * A singular matrix is allowed: the result is flattened and its "normal"
 * channel is dropped, since it can no longer be derived from the old one.
 */
export function transform(mesh: Mesh, matrix: Mat4): Mesh {
  if (matrix.length !== 16 || !matrix.every(Number.isFinite)) {
    throw new GeometryError('transform matrix must have 16 finite entries');
  }
  const positions = mesh.positions.map((p) => transformPoint(matrix, p));
  const flip = determinant3(matrix) < 0;
  const faces = flip ? mesh.faces.map(reverseFace) : mesh.faces.map((f) => [...f]);
  const nm = normalMatrix(matrix);

  const channels: Channel[] = [];
  for (const ch of mesh.channels()) {
    if (ch.key === 'vertex' && ch.name === 'normal' && ch.type === 'vec3') {
      if (!nm) continue;
      channels.push(makeChannel('vertex', 'vec3', 'normal', ch.values.map((n) => normalize(transformDirection(nm, n)))));
    } else if (ch.key === 'face' && ch.name === 'normal' && ch.type === 'vec3') {
      if (!nm) continue;
      channels.push(makeChannel('face', 'vec3', 'normal', ch.values.map((n) => normalize(transformDirection(nm, n)))));
    } else if (ch.key === 'halfedge' && flip) {
      channels.push(makeChannel(ch.key, ch.type, ch.name, reverseCorners(mesh, ch.values)));
    } else {
      channels.push(makeChannel(ch.key, ch.type, ch.name, ch.values));
    }
  }
  return Mesh.fromPolygons(positions, faces, channels);
}

/** Keep the first corner, reverse the rest: [a, b, c, d] → [a, d, c, b]. */
function reverseFace(face: readonly number[]): number[] {
  return [face[0], ...face.slice(1).reverse()];
}

/**
 * Halfedge values follow their edge when a face is reversed: the edge
 * a→b of corner 0 becomes b→a, which is the last corner of the reversed face.
 */
function reverseCorners(mesh: Mesh, values: readonly unknown[]): unknown[] {
  const out: unknown[] = [];
  let base = 0;
  for (const face of mesh.faces) {
    const n = face.length;
    for (let c = 0; c < n; c++) {
      // Reversed face corner c starts at original corner (n - c) % n and
      // runs backwards, i.e. along original halfedge (n - c - 1 + n) % n.
      out.push(values[base + ((2 * n - c - 1) % n)]);
    }
    base += n;
  }
  return out;
}

/**
 * Move every vertex by a random offset in [-amount, amount] per axis.
 * The sequence depends only on `seed`, so equal inputs give equal outputs.
 */
export function jitter(mesh: Mesh, amount: number, seed: number): Mesh {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new GeometryError(`jitter amount must be a non-negative number, got ${amount}`);
  }
  const rand = mulberry32(seed);
  const positions = mesh.positions.map((p): Vec3 => [
    p[0] + (rand() * 2 - 1) * amount,
    p[1] + (rand() * 2 - 1) * amount,
    p[2] + (rand() * 2 - 1) * amount,
  ]);
  return Mesh.fromPolygons(positions, mesh.faces, mesh.channels());
}
