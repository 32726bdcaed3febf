import { describe, it, expect } from 'vitest';
import {
  GeometryError, MeshChannels, defaultChannelValue, filledChannel, isChannelValue, makeChannel,
} from '../src/index.js';

describe('Channels', () => {
  it('checks values against their type', () => {
    expect(isChannelValue('f32', 1.5)).toBe(true);
    expect(isChannelValue('f32', Infinity)).toBe(false);
    expect(isChannelValue('vec2', [1, 2])).toBe(true);
    expect(isChannelValue('vec2', [1, 2, 3])).toBe(false);
    expect(isChannelValue('bool', 0)).toBe(false);
  });

  it('makeChannel rejects malformed values with their index', () => {
    expect(() => makeChannel('vertex', 'vec3', 'normal', [[0, 0, 1], [0, 1]])).toThrow(GeometryError);
    expect(() => makeChannel('vertex', 'vec3', 'normal', [[0, 0, 1], [0, 1]])).toThrow(/value 1/);
  });

  it('makeChannel copies tuples', () => {
    const source: [number, number][] = [[1, 2]];
    const ch = makeChannel('halfedge', 'vec2', 'uv', source);
    source[0][0] = 9;
    expect(ch.values).toEqual([[1, 2]]);
  });

  it('defaults per type', () => {
    expect(defaultChannelValue('f32')).toBe(0);
    expect(defaultChannelValue('vec4')).toEqual([0, 0, 0, 0]);
    expect(defaultChannelValue('bool')).toBe(false);
    expect(filledChannel('face', 'vec2', 'uv', 2).values).toEqual([[0, 0], [0, 0]]);
  });

  it('MeshChannels is keyed by element kind and name', () => {
    const set = new MeshChannels();
    set.set(makeChannel('vertex', 'f32', 'w', [1]));
    set.set(makeChannel('face', 'f32', 'w', [2]));
    expect(set.size).toBe(2);
    expect(set.get('face', 'w')?.values).toEqual([2]);
    expect(set.list('vertex')).toHaveLength(1);
    expect(set.remove('vertex', 'w')).toBe(true);
    expect(set.has('vertex', 'w')).toBe(false);
  });

  it('clone is deep', () => {
    const set = new MeshChannels([makeChannel('vertex', 'vec3', 'c', [[1, 1, 1]])]);
    const copy = set.clone();
    expect(copy.get('vertex', 'c')?.values[0]).not.toBe(set.get('vertex', 'c')?.values[0]);
    expect(copy.get('vertex', 'c')?.values).toEqual([[1, 1, 1]]);
  });
});
