import { OperatorLibrary, type NativeOperator } from './library.js';
import { Box, Circle, Cylinder, Quad, Sphere } from './primitives.js';
import { Chamfer, ComputeNormals, Extrude, Inset, Jitter, Merge, Subdivide, Transform } from './edits.js';
import { MakeScalar, MakeVector, ScalarMath, VectorMath } from './values.js';

export const BUILTIN_OPERATORS: readonly NativeOperator[] = [
  Box, Quad, Circle, Cylinder, Sphere,
  Transform, Merge,
  Extrude, Inset, Chamfer, Subdivide, ComputeNormals, Jitter,
  MakeScalar, MakeVector, ScalarMath, VectorMath,
];

/** A fresh library holding every built-in operator. */
export function createDefaultLibrary(): OperatorLibrary {
  return new OperatorLibrary(BUILTIN_OPERATORS);
}

export { OperatorLibrary, OperatorInputs, defineOperator, meshValue, scalarValue, vectorValue } from './library.js';
export type { NativeOperator, OperatorCategory } from './library.js';
