/**
 * The `Ops` table handed to scripts: mesh kernel operations over mesh
 * records. Arguments and results cross the boundary as JSON strings only;
 * the host side never throws into the script context, it answers with an
 * `{ ok, value | error }` envelope.
 */

import {
  box, chamferVertices, circle, compose, computeNormals, cylinder, extrudeFaces, insetFaces, jitter, merge,
  Mesh, parseSelection, quad, subdivide, transform, uvSphere,
} from '@meshgraph/mesh-kernel';
import { z } from 'zod';
import { MeshRecordSchema, meshFromRecord, meshToRecord } from './marshal.js';

const finite = z.number().finite();
const vec3 = z.tuple([finite, finite, finite]);
const count = z.number().int();
const meshArg = MeshRecordSchema.transform(meshFromRecord);

export type HostCall = (name: string, argsJson: string) => string;

type OpHandler = (args: unknown) => unknown;

function op<T extends z.ZodTypeAny>(args: T, run: (parsed: z.output<T>) => unknown): OpHandler {
  return (raw) => {
    const result = run(args.parse(raw));
    return result instanceof Mesh ? meshToRecord(result) : result;
  };
}

const SCRIPT_OPS: ReadonlyMap<string, OpHandler> = new Map<string, OpHandler>([
  ['box', op(z.tuple([vec3, vec3]), ([c, size]) => box(c, size))],
  ['quad', op(z.tuple([vec3, vec3, vec3, finite, finite]), ([c, n, r, w, h]) => quad(c, n, r, [w, h]))],
  ['circle', op(z.tuple([vec3, finite, count]), ([c, r, s]) => circle(c, r, s))],
  ['cylinder', op(z.tuple([vec3, finite, finite, count]), ([c, r, h, s]) => cylinder(c, r, h, s))],
  ['sphere', op(z.tuple([vec3, finite, count, count]), ([c, r, rings, s]) => uvSphere(c, r, rings, s))],
  ['merge', op(z.tuple([meshArg, meshArg]), ([a, b]) => merge(a, b))],
  ['transform', op(z.tuple([meshArg, vec3, vec3, vec3]), ([m, t, r, s]) => transform(m, compose(t, r, s)))],
  ['extrude', op(z.tuple([meshArg, z.string(), finite]), ([m, sel, amount]) =>
    extrudeFaces(m, parseSelection(sel, m.faceCount), amount))],
  ['inset', op(z.tuple([meshArg, z.string(), finite]), ([m, sel, fraction]) =>
    insetFaces(m, parseSelection(sel, m.faceCount), fraction))],
  ['chamfer', op(z.tuple([meshArg, z.string(), finite]), ([m, sel, amount]) =>
    chamferVertices(m, parseSelection(sel, m.vertexCount), amount))],
  ['subdivide', op(z.tuple([meshArg, count, z.enum(['linear', 'catmull-clark'])]), ([m, n, technique]) =>
    subdivide(m, n, technique))],
  ['computeNormals', op(z.tuple([meshArg]), ([m]) => computeNormals(m))],
  ['jitter', op(z.tuple([meshArg, finite, count]), ([m, amount, seed]) => jitter(m, amount, seed))],
  ['bounds', op(z.tuple([meshArg]), ([m]) => m.bounds())],
]);

export const SCRIPT_OP_NAMES: readonly string[] = [...SCRIPT_OPS.keys()];

function describeFailure(err: unknown): string {
  if (err instanceof z.ZodError) {
    return `bad arguments: ${err.issues.map((i) => `${i.path.length > 0 ? `[${i.path.join('.')}] ` : ''}${i.message}`).join('; ')}`;
  }
  return err instanceof Error ? err.message : String(err);
}

/** Host side of every `Ops.<name>(...)` call made by a script. */
export const hostCall: HostCall = (name, argsJson) => {
  const handler = SCRIPT_OPS.get(name);
  if (!handler) return JSON.stringify({ ok: false, error: `Ops.${name} does not exist` });
  try {
    const args: unknown = JSON.parse(argsJson);
    return JSON.stringify({ ok: true, value: handler(args) });
  } catch (err) {
    return JSON.stringify({ ok: false, error: `Ops.${name}: ${describeFailure(err)}` });
  }
};
