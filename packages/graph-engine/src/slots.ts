/**
 * Slot typing: the coercion table, parameter literal validation, and the
 * conversion of literals into evaluation values.
 *
 * Coercions (source → destination):
 *   scalar → vector      splat to [s, s, s]
 *   enum   → string      option name
 *   string → selection   parsed by the consuming operator
 */

import { Mesh, isSelectionExpression, type Vec3 } from '@meshgraph/mesh-kernel';
import { InvalidParameterError, OperatorError, TypeMismatchError } from './errors.js';
import type { DataType, InputSlot, Literal, Value } from './types.js';

const COERCIONS: ReadonlySet<string> = new Set(['scalar>vector', 'enum>string', 'string>selection']);

export function canConnect(from: DataType, to: DataType): boolean {
  return from === to || COERCIONS.has(`${from}>${to}`);
}

/** Convert a value flowing along an edge into the destination slot's type. */
export function coerceValue(value: Value, to: DataType): Value {
  if (value.type === to) return value;
  if (value.type === 'scalar' && to === 'vector') {
    return { type: 'vector', value: [value.value, value.value, value.value] };
  }
  if (value.type === 'enum' && to === 'string') return { type: 'string', value: value.value };
  if (value.type === 'string' && to === 'selection') return { type: 'selection', value: value.value };
  throw new OperatorError(`Cannot convert ${value.type} to ${to}`);
}

function isVec3(value: unknown): value is Vec3 {
  return Array.isArray(value) && value.length === 3 && value.every((c) => typeof c === 'number' && Number.isFinite(c));
}

/**
 * Check a literal against an input slot. Wrong kind of value is a
 * TypeMismatchError; right kind but outside the slot's range or options is
 * an InvalidParameterError. Returns a copy safe to store.
 */
export function validateLiteral(slot: InputSlot, value: unknown): Literal {
  const where = `parameter "${slot.name}"`;
  switch (slot.type) {
    case 'scalar': {
      if (typeof value !== 'number') throw new TypeMismatchError(`${where} expects a scalar, got ${describe(value)}`);
      if (!Number.isFinite(value)) throw new InvalidParameterError(`${where} must be finite, got ${value}`);
      if (slot.integer && !Number.isInteger(value)) throw new InvalidParameterError(`${where} must be an integer, got ${value}`);
      if (slot.min !== undefined && value < slot.min) throw new InvalidParameterError(`${where} must be >= ${slot.min}, got ${value}`);
      if (slot.max !== undefined && value > slot.max) throw new InvalidParameterError(`${where} must be <= ${slot.max}, got ${value}`);
      return value;
    }
    case 'vector':
      if (!Array.isArray(value) || value.length !== 3) throw new TypeMismatchError(`${where} expects a vector [x, y, z], got ${describe(value)}`);
      if (!isVec3(value)) throw new InvalidParameterError(`${where} components must be finite numbers`);
      return [value[0], value[1], value[2]];
    case 'string':
      if (typeof value !== 'string') throw new TypeMismatchError(`${where} expects a string, got ${describe(value)}`);
      return value;
    case 'enum':
      if (typeof value !== 'string') throw new TypeMismatchError(`${where} expects one of [${slot.options.join(', ')}], got ${describe(value)}`);
      if (!slot.options.includes(value)) throw new InvalidParameterError(`${where} must be one of [${slot.options.join(', ')}], got "${value}"`);
      return value;
    case 'selection':
      if (typeof value !== 'string') throw new TypeMismatchError(`${where} expects a selection expression, got ${describe(value)}`);
      if (!isSelectionExpression(value)) throw new InvalidParameterError(`${where} is not a valid selection expression: "${value}"`);
      return value;
    case 'mesh':
      throw new TypeMismatchError(`${where} is a mesh input; it can only be connected, not set`);
  }
}

function describe(value: unknown): string {
  if (Array.isArray(value)) return `array of ${value.length}`;
  if (value === null) return 'null';
  return typeof value;
}

/** Default literal of a slot; mesh inputs have none. */
export function defaultLiteral(slot: InputSlot): Literal | undefined {
  switch (slot.type) {
    case 'vector': return [slot.default[0], slot.default[1], slot.default[2]];
    case 'mesh': return undefined;
    default: return slot.default;
  }
}

/**
 * Resolve an unconnected input. `literal` is the stored parameter, already
 * validated against this slot; absent parameters fall back to the default.
 * Unconnected mesh inputs yield an empty mesh.
 */
export function literalToValue(slot: InputSlot, literal: Literal | undefined): Value {
  switch (slot.type) {
    case 'mesh':
      return { type: 'mesh', value: Mesh.empty() };
    case 'scalar':
      return { type: 'scalar', value: typeof literal === 'number' ? literal : slot.default };
    case 'vector': {
      const v = isVec3(literal) ? literal : slot.default;
      return { type: 'vector', value: [v[0], v[1], v[2]] };
    }
    case 'string':
    case 'enum':
    case 'selection':
      return { type: slot.type, value: typeof literal === 'string' ? literal : slot.default };
  }
}

/** JSON-friendly view of a value, for summaries and tool output. */
export function describeValue(value: Value): unknown {
  if (value.type === 'mesh') {
    const b = value.value.bounds();
    return { vertices: value.value.vertexCount, faces: value.value.faceCount, bounds: b };
  }
  return value.value;
}
