/**
 * Affine 4×4 matrices, row-major, applied to column vectors:
 *
 *   p' = M · [x, y, z, 1]ᵀ
 *
 * Only the upper 3×4 block is meaningful for the transforms built here.
 */

import type { ReadonlyVec3, Vec3 } from './vec3.js';

export type Mat4 = readonly number[];

const DEG = Math.PI / 180;

export function identity(): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ];
}

export function translation(t: ReadonlyVec3): Mat4 {
  return [
    1, 0, 0, t[0],
    0, 1, 0, t[1],
    0, 0, 1, t[2],
    0, 0, 0, 1,
  ];
}

export function scaling(s: ReadonlyVec3): Mat4 {
  return [
    s[0], 0, 0, 0,
    0, s[1], 0, 0,
    0, 0, s[2], 0,
    0, 0, 0, 1,
  ];
}

export function rotationX(degrees: number): Mat4 {
  const c = Math.cos(degrees * DEG), s = Math.sin(degrees * DEG);
  return [
    1, 0, 0, 0,
    0, c, -s, 0,
    0, s, c, 0,
    0, 0, 0, 1,
  ];
}

export function rotationY(degrees: number): Mat4 {
  const c = Math.cos(degrees * DEG), s = Math.sin(degrees * DEG);
  return [
    c, 0, s, 0,
    0, 1, 0, 0,
    -s, 0, c, 0,
    0, 0, 0, 1,
  ];
}

export function rotationZ(degrees: number): Mat4 {
  const c = Math.cos(degrees * DEG), s = Math.sin(degrees * DEG);
  return [
    c, -s, 0, 0,
    s, c, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ];
}

/** a · b, so b is applied first. */
export function multiply(a: Mat4, b: Mat4): Mat4 {
  const out: number[] = new Array<number>(16).fill(0);
  for (let r = 0; r < 4; r++) {
    for (let c = 0; c < 4; c++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) sum += a[r * 4 + k] * b[k * 4 + c];
      out[r * 4 + c] = sum;
    }
  }
  return out;
}

/**
 * Scale, then rotate (X, then Y, then Z, in degrees), then translate.
 */
export function compose(translate: ReadonlyVec3, rotateDeg: ReadonlyVec3, scale: ReadonlyVec3): Mat4 {
  const rotation = multiply(rotationZ(rotateDeg[2]), multiply(rotationY(rotateDeg[1]), rotationX(rotateDeg[0])));
  return multiply(translation(translate), multiply(rotation, scaling(scale)));
}

export function transformPoint(m: Mat4, p: ReadonlyVec3): Vec3 {
  return [
    m[0] * p[0] + m[1] * p[1] + m[2] * p[2] + m[3],
    m[4] * p[0] + m[5] * p[1] + m[6] * p[2] + m[7],
    m[8] * p[0] + m[9] * p[1] + m[10] * p[2] + m[11],
  ];
}

/** Determinant of the linear 3×3 block. */
export function determinant3(m: Mat4): number {
  return (
    m[0] * (m[5] * m[10] - m[6] * m[9]) -
    m[1] * (m[4] * m[10] - m[6] * m[8]) +
    m[2] * (m[4] * m[9] - m[5] * m[8])
  );
}

/**
 * Inverse-transpose of the linear 3×3 block, as a Mat4 with no translation.
 * Returns null for singular matrices.
 */
export function normalMatrix(m: Mat4): Mat4 | null {
  const det = determinant3(m);
  if (det === 0 || !Number.isFinite(det)) return null;
  const inv = 1 / det;
  // Cofactor matrix divided by det is the inverse-transpose.
  return [
    (m[5] * m[10] - m[6] * m[9]) * inv, -(m[4] * m[10] - m[6] * m[8]) * inv, (m[4] * m[9] - m[5] * m[8]) * inv, 0,
    -(m[1] * m[10] - m[2] * m[9]) * inv, (m[0] * m[10] - m[2] * m[8]) * inv, -(m[0] * m[9] - m[1] * m[8]) * inv, 0,
    (m[1] * m[6] - m[2] * m[5]) * inv, -(m[0] * m[6] - m[2] * m[4]) * inv, (m[0] * m[5] - m[1] * m[4]) * inv, 0,
    0, 0, 0, 1,
  ];
}

export function transformDirection(m: Mat4, d: ReadonlyVec3): Vec3 {
  return [
    m[0] * d[0] + m[1] * d[1] + m[2] * d[2],
    m[4] * d[0] + m[5] * d[1] + m[6] * d[2],
    m[8] * d[0] + m[9] * d[1] + m[10] * d[2],
  ];
}
