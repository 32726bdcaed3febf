/**
 * Attribute channels: named per-element data carried alongside a mesh.
 *
 * A channel is addressed by element kind + name ("vertex:normal",
 * "face:material") and holds exactly one value per element:
 *
 *   vertex    → one value per vertex
 *   face      → one value per face
 *   halfedge  → one value per face corner, in face order
 */

import { GeometryError } from './errors.js';
import type { Vec2, Vec3, Vec4 } from './vec3.js';

export type ChannelKey = 'vertex' | 'face' | 'halfedge';

export type ChannelType = 'f32' | 'vec2' | 'vec3' | 'vec4' | 'bool';

export type ChannelData =
  | { type: 'f32'; values: number[] }
  | { type: 'vec2'; values: Vec2[] }
  | { type: 'vec3'; values: Vec3[] }
  | { type: 'vec4'; values: Vec4[] }
  | { type: 'bool'; values: boolean[] };

export type Channel = ChannelData & { key: ChannelKey; name: string };

export type ChannelValue = number | boolean | Vec2 | Vec3 | Vec4;

export const CHANNEL_KEYS: readonly ChannelKey[] = ['vertex', 'face', 'halfedge'];
export const CHANNEL_TYPES: readonly ChannelType[] = ['f32', 'vec2', 'vec3', 'vec4', 'bool'];

const WIDTH: Record<ChannelType, number> = { f32: 1, vec2: 2, vec3: 3, vec4: 4, bool: 1 };

export function channelId(key: ChannelKey, name: string): string {
  return `${key}:${name}`;
}

/** Type default used when a channel has to be filled for new elements. */
export function defaultChannelValue(type: ChannelType): ChannelValue {
  switch (type) {
    case 'f32': return 0;
    case 'vec2': return [0, 0];
    case 'vec3': return [0, 0, 0];
    case 'vec4': return [0, 0, 0, 0];
    case 'bool': return false;
  }
}

/** Check a value against a channel type (tuple width, finite numbers). */
export function isChannelValue(type: ChannelType, value: unknown): value is ChannelValue {
  if (type === 'bool') return typeof value === 'boolean';
  if (type === 'f32') return typeof value === 'number' && Number.isFinite(value);
  return (
    Array.isArray(value) &&
    value.length === WIDTH[type] &&
    value.every((c) => typeof c === 'number' && Number.isFinite(c))
  );
}

function cloneValue(value: ChannelValue): ChannelValue {
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (value.length === 2) return [value[0], value[1]];
  if (value.length === 3) return [value[0], value[1], value[2]];
  return [value[0], value[1], value[2], value[3]];
}

/** Build a channel from untyped values, checking every entry. */
export function makeChannel(key: ChannelKey, type: ChannelType, name: string, values: readonly unknown[]): Channel {
  for (let i = 0; i < values.length; i++) {
    if (!isChannelValue(type, values[i])) {
      throw new GeometryError(`Channel "${channelId(key, name)}" value ${i} is not a valid ${type}`);
    }
  }
  // Every entry was checked above, so the narrowing below is exact per type.
  switch (type) {
    case 'f32': return { key, name, type, values: values.filter((v): v is number => typeof v === 'number') };
    case 'bool': return { key, name, type, values: values.filter((v): v is boolean => typeof v === 'boolean') };
    case 'vec2': return { key, name, type, values: values.filter(isTuple(2)).map((v): Vec2 => [v[0], v[1]]) };
    case 'vec3': return { key, name, type, values: values.filter(isTuple(3)).map((v): Vec3 => [v[0], v[1], v[2]]) };
    case 'vec4': return { key, name, type, values: values.filter(isTuple(4)).map((v): Vec4 => [v[0], v[1], v[2], v[3]]) };
  }
}

function isTuple(width: number) {
  return (v: unknown): v is number[] => Array.isArray(v) && v.length === width;
}

/** Fill a channel of `count` elements with the type default. */
export function filledChannel(key: ChannelKey, type: ChannelType, name: string, count: number): Channel {
  const fill = defaultChannelValue(type);
  return makeChannel(key, type, name, Array.from({ length: count }, () => cloneValue(fill)));
}

export function cloneChannel(channel: Channel): Channel {
  return makeChannel(channel.key, channel.type, channel.name, channel.values);
}

/** Value at index i, copied. */
export function channelValue(channel: Channel, i: number): ChannelValue {
  const v = channel.values[i];
  return cloneValue(v);
}

/**
 * Pick values by source index: out[i] = values[sources[i]].
 * Used by topological edits where each new element inherits from one source.
 */
export function gatherChannel(channel: Channel, sources: readonly number[]): Channel {
  return makeChannel(channel.key, channel.type, channel.name, sources.map((s) => channelValue(channel, s)));
}

/**
 * Average of several values of one channel. Numeric types are averaged
 * component-wise; bool channels are true only if every input is true.
 */
export function mixChannelValues(channel: Channel, indices: readonly number[]): ChannelValue {
  if (channel.type === 'bool') {
    return indices.length > 0 && indices.every((i) => channel.values[i] === true);
  }
  const width = WIDTH[channel.type];
  const acc = new Array<number>(width).fill(0);
  for (const i of indices) {
    const v = channel.values[i];
    if (typeof v === 'number') acc[0] += v;
    else if (Array.isArray(v)) for (let c = 0; c < width; c++) acc[c] += v[c];
  }
  const n = Math.max(indices.length, 1);
  const a = acc.map((c) => c / n);
  switch (channel.type) {
    case 'f32': return a[0];
    case 'vec2': return [a[0], a[1]];
    case 'vec3': return [a[0], a[1], a[2]];
    case 'vec4': return [a[0], a[1], a[2], a[3]];
  }
}

/**
 * A set of channels, unique per (key, name).
 */
export class MeshChannels {
  private readonly channels = new Map<string, Channel>();

  constructor(channels: Iterable<Channel> = []) {
    for (const ch of channels) this.set(ch);
  }

  get size(): number {
    return this.channels.size;
  }

  list(key?: ChannelKey): Channel[] {
    const all = [...this.channels.values()];
    return key ? all.filter((c) => c.key === key) : all;
  }

  get(key: ChannelKey, name: string): Channel | undefined {
    return this.channels.get(channelId(key, name));
  }

  has(key: ChannelKey, name: string): boolean {
    return this.channels.has(channelId(key, name));
  }

  /** Insert or replace a channel. */
  set(channel: Channel): void {
    this.channels.set(channelId(channel.key, channel.name), channel);
  }

  remove(key: ChannelKey, name: string): boolean {
    return this.channels.delete(channelId(key, name));
  }

  /** Deep copy. */
  clone(): MeshChannels {
    return new MeshChannels(this.list().map(cloneChannel));
  }
}
