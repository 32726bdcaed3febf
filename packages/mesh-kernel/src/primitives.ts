/**
 * Primitive constructors. Every primitive is closed or single-sided with
 * outward counter-clockwise faces, Y up.
 *
 *   box([0, 0, 0], [2, 2, 2])       →  8 vertices, 6 quads
 *   cylinder([0, 0, 0], 1, 2, 16)   → 32 vertices, 16 quads + 2 caps
 */

import { GeometryError } from './errors.js';
import { Mesh } from './mesh.js';
import { type ReadonlyVec3, type Vec2, type Vec3, add, cross, dot, length, normalize, scale, sub } from './vec3.js';

function requirePositive(what: string, value: number): void {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new GeometryError(`${what} must be a positive number, got ${value}`);
  }
}

function requireSegments(what: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new GeometryError(`${what} must be an integer >= ${min}, got ${value}`);
  }
}

/** Point on the XZ ring, counter-clockwise when seen from +Y. */
function ring(center: ReadonlyVec3, radius: number, i: number, segments: number, y = 0): Vec3 {
  const a = (2 * Math.PI * i) / segments;
  return [center[0] + radius * Math.cos(a), center[1] + y, center[2] - radius * Math.sin(a)];
}

/**
 * Axis-aligned box. Faces in order: bottom, top, front (+Z), back, left, right.
 */
export function box(center: ReadonlyVec3, size: ReadonlyVec3): Mesh {
  size.forEach((s, i) => requirePositive(`box size[${i}]`, s));
  const h = scale(size, 0.5);
  // Vertex i sits at (x, y, z) = bit0, bit1, bit2 of i → max side.
  const positions: Vec3[] = [];
  for (let i = 0; i < 8; i++) {
    positions.push([
      center[0] + (i & 1 ? h[0] : -h[0]),
      center[1] + (i & 2 ? h[1] : -h[1]),
      center[2] + (i & 4 ? h[2] : -h[2]),
    ]);
  }
  return Mesh.fromPolygons(positions, [
    [0, 1, 5, 4],
    [2, 6, 7, 3],
    [4, 5, 7, 6],
    [0, 2, 3, 1],
    [0, 4, 6, 2],
    [1, 3, 7, 5],
  ]);
}

/**
 * Single quad facing `normal`. `right` is projected onto the plane of the
 * quad; it must not be parallel to `normal`.
 */
export function quad(center: ReadonlyVec3, normal: ReadonlyVec3, right: ReadonlyVec3, size: Vec2): Mesh {
  requirePositive('quad width', size[0]);
  requirePositive('quad height', size[1]);
  const n = normalize(normal);
  if (length(n) === 0) throw new GeometryError('quad normal must be non-zero');
  const r = normalize(sub(right, scale(n, dot(n, right))));
  if (length(r) === 0) throw new GeometryError('quad right vector must not be parallel to the normal');
  const f = cross(n, r);
  const hx = size[0] / 2, hy = size[1] / 2;
  const corner = (sx: number, sy: number): Vec3 => add(center, add(scale(r, sx * hx), scale(f, sy * hy)));
  return Mesh.fromPolygons([corner(1, 1), corner(-1, 1), corner(-1, -1), corner(1, -1)], [[0, 1, 2, 3]]);
}

/** Flat n-gon in the XZ plane facing +Y. */
export function circle(center: ReadonlyVec3, radius: number, segments: number): Mesh {
  requirePositive('circle radius', radius);
  requireSegments('circle segments', segments, 3);
  const positions = Array.from({ length: segments }, (_, i) => ring(center, radius, i, segments));
  return Mesh.fromPolygons(positions, [positions.map((_, i) => i)]);
}

/** Capped cylinder along Y, centered on `center`. */
export function cylinder(center: ReadonlyVec3, radius: number, height: number, segments: number): Mesh {
  requirePositive('cylinder radius', radius);
  requirePositive('cylinder height', height);
  requireSegments('cylinder segments', segments, 3);
  const n = segments;
  const positions: Vec3[] = [];
  for (let i = 0; i < n; i++) positions.push(ring(center, radius, i, n, -height / 2));
  for (let i = 0; i < n; i++) positions.push(ring(center, radius, i, n, height / 2));

  const faces: number[][] = [];
  for (let i = 0; i < n; i++) {
    const j = (i + 1) % n;
    faces.push([i, j, n + j, n + i]);
  }
  faces.push(Array.from({ length: n }, (_, i) => n + i));
  faces.push(Array.from({ length: n }, (_, i) => n - 1 - i));
  return Mesh.fromPolygons(positions, faces);
}

/**
 * Latitude/longitude sphere: two poles, `rings - 1` latitude rings of
 * `segments` vertices, triangle fans at the poles and quads in between.
 */
export function uvSphere(center: ReadonlyVec3, radius: number, rings: number, segments: number): Mesh {
  requirePositive('sphere radius', radius);
  requireSegments('sphere rings', rings, 2);
  requireSegments('sphere segments', segments, 3);
  const positions: Vec3[] = [[center[0], center[1] + radius, center[2]]];
  for (let k = 1; k < rings; k++) {
    const phi = (Math.PI * k) / rings;
    const r = radius * Math.sin(phi);
    for (let i = 0; i < segments; i++) {
      positions.push(ring(center, r, i, segments, radius * Math.cos(phi)));
    }
  }
  const south = positions.length;
  positions.push([center[0], center[1] - radius, center[2]]);

  const at = (k: number, i: number): number => 1 + (k - 1) * segments + (i % segments);
  const faces: number[][] = [];
  for (let i = 0; i < segments; i++) faces.push([0, at(1, i), at(1, i + 1)]);
  for (let k = 1; k < rings - 1; k++) {
    for (let i = 0; i < segments; i++) {
      faces.push([at(k, i), at(k + 1, i), at(k + 1, i + 1), at(k, i + 1)]);
    }
  }
  for (let i = 0; i < segments; i++) faces.push([south, at(rings - 1, i + 1), at(rings - 1, i)]);
  return Mesh.fromPolygons(positions, faces);
}
