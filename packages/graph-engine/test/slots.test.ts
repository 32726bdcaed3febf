import { describe, it, expect } from 'vitest';
import {
  InvalidParameterError, OperatorError, TypeMismatchError, canConnect, coerceValue, defaultLiteral, literalToValue,
  validateLiteral, type InputSlot,
} from '../src/index.js';

describe('canConnect', () => {
  it('accepts identical types and the three coercions', () => {
    expect(canConnect('mesh', 'mesh')).toBe(true);
    expect(canConnect('scalar', 'vector')).toBe(true);
    expect(canConnect('enum', 'string')).toBe(true);
    expect(canConnect('string', 'selection')).toBe(true);
  });

  it('rejects everything else', () => {
    expect(canConnect('vector', 'scalar')).toBe(false);
    expect(canConnect('selection', 'string')).toBe(false);
    expect(canConnect('scalar', 'mesh')).toBe(false);
  });
});

describe('coerceValue', () => {
  it('splats a scalar into a vector', () => {
    expect(coerceValue({ type: 'scalar', value: 2 }, 'vector')).toEqual({ type: 'vector', value: [2, 2, 2] });
  });

  it('turns an enum into a string', () => {
    expect(coerceValue({ type: 'enum', value: 'linear' }, 'string')).toEqual({ type: 'string', value: 'linear' });
  });

  it('refuses an unsupported conversion', () => {
    expect(() => coerceValue({ type: 'vector', value: [1, 2, 3] }, 'scalar')).toThrow(OperatorError);
  });
});

describe('validateLiteral', () => {
  const radius: InputSlot = { name: 'radius', type: 'scalar', default: 1, min: 0, max: 10 };
  const mode: InputSlot = { name: 'mode', type: 'enum', default: 'a', options: ['a', 'b'] };

  it('separates wrong kinds from out-of-range values', () => {
    expect(() => validateLiteral(radius, '3')).toThrow(TypeMismatchError);
    expect(() => validateLiteral(radius, 11)).toThrow('parameter "radius" must be <= 10, got 11');
    expect(() => validateLiteral(radius, Number.NaN)).toThrow(InvalidParameterError);
    expect(validateLiteral(radius, 4)).toBe(4);
  });

  it('checks enum options', () => {
    expect(() => validateLiteral(mode, 'c')).toThrow('parameter "mode" must be one of [a, b], got "c"');
    expect(validateLiteral(mode, 'b')).toBe('b');
  });

  it('copies vectors', () => {
    const input = [1, 2, 3];
    const stored = validateLiteral({ name: 'v', type: 'vector', default: [0, 0, 0] }, input);
    input[0] = 9;
    expect(stored).toEqual([1, 2, 3]);
  });

  it('never accepts a literal for a mesh input', () => {
    expect(() => validateLiteral({ name: 'mesh', type: 'mesh' }, 1)).toThrow(TypeMismatchError);
  });
});

describe('literalToValue', () => {
  it('falls back to the slot default', () => {
    expect(literalToValue(radiusSlot(), undefined)).toEqual({ type: 'scalar', value: 1 });
    expect(defaultLiteral({ name: 'v', type: 'vector', default: [1, 2, 3] })).toEqual([1, 2, 3]);
  });

  it('gives unconnected mesh inputs an empty mesh', () => {
    const value = literalToValue({ name: 'mesh', type: 'mesh' }, undefined);
    expect(value.type).toBe('mesh');
    if (value.type === 'mesh') expect(value.value.vertexCount).toBe(0);
  });
});

function radiusSlot(): InputSlot {
  return { name: 'radius', type: 'scalar', default: 1 };
}
