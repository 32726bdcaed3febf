/**
 * Value conversion at the script boundary. Scripts only ever see plain JSON:
 *
 *   scalar                      number
 *   vector                      [x, y, z]
 *   string, enum, selection     string
 *   mesh                        { positions, faces, channels }
 *
 * Anything coming back is parsed with zod before it becomes a native value.
 */

import { Mesh, makeChannel, type Vec3 } from '@meshgraph/mesh-kernel';
import { z } from 'zod';
import type { DataType, Value } from '../types.js';

const finite = z.number().finite();
const vec3Schema = z.tuple([finite, finite, finite]);

const channelKeySchema = z.enum(['vertex', 'face', 'halfedge']);
const channelTypeSchema = z.enum(['f32', 'vec2', 'vec3', 'vec4', 'bool']);

export const MeshRecordSchema = z.object({
  positions: z.array(vec3Schema),
  faces: z.array(z.array(z.number().int().nonnegative())),
  channels: z
    .array(z.object({
      key: channelKeySchema,
      type: channelTypeSchema,
      name: z.string().min(1),
      values: z.array(z.unknown()),
    }))
    .default([]),
});

export type MeshRecord = z.infer<typeof MeshRecordSchema>;

export type ScriptValue = number | string | Vec3 | MeshRecord;

export function meshToRecord(mesh: Mesh): MeshRecord {
  return {
    positions: mesh.positions.map((p): Vec3 => [p[0], p[1], p[2]]),
    faces: mesh.faces.map((f) => [...f]),
    channels: mesh.channels().map((ch) => ({ key: ch.key, type: ch.type, name: ch.name, values: [...ch.values] })),
  };
}

/** Throws GeometryError when the record does not describe a valid mesh. */
export function meshFromRecord(record: MeshRecord): Mesh {
  return Mesh.fromPolygons(
    record.positions,
    record.faces,
    record.channels.map((ch) => makeChannel(ch.key, ch.type, ch.name, ch.values)),
  );
}

export function toScript(value: Value): ScriptValue {
  switch (value.type) {
    case 'scalar': return value.value;
    case 'vector': return [value.value[0], value.value[1], value.value[2]];
    case 'string':
    case 'enum':
    case 'selection': return value.value;
    case 'mesh': return meshToRecord(value.value);
  }
}

export type MarshalResult = { ok: true; value: Value } | { ok: false; error: string };

/** Parse a script-side value as `type`. Never throws. */
export function fromScript(type: DataType, raw: unknown): MarshalResult {
  switch (type) {
    case 'scalar': {
      const parsed = finite.safeParse(raw);
      return parsed.success ? { ok: true, value: { type, value: parsed.data } } : { ok: false, error: 'expected a finite number' };
    }
    case 'vector': {
      const parsed = vec3Schema.safeParse(raw);
      return parsed.success ? { ok: true, value: { type, value: parsed.data } } : { ok: false, error: 'expected [x, y, z] of finite numbers' };
    }
    case 'string':
    case 'enum':
    case 'selection': {
      if (typeof raw !== 'string') return { ok: false, error: 'expected a string' };
      return { ok: true, value: { type, value: raw } };
    }
    case 'mesh': {
      const parsed = MeshRecordSchema.safeParse(raw);
      if (!parsed.success) {
        return { ok: false, error: `expected a mesh record: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}` };
      }
      try {
        return { ok: true, value: { type, value: meshFromRecord(parsed.data) } };
      } catch (err) {
        return { ok: false, error: err instanceof Error ? err.message : String(err) };
      }
    }
  }
}
