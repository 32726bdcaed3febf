/**
 * Node fingerprints: the cache key of a node's outputs.
 *
 *   sha256( node id, operator version, each input slot in schema order )
 *
 * where an input is either its literal (canonical JSON) or the fingerprint
 * of the upstream node plus the output slot the edge reads. A change anywhere
 * upstream therefore changes every fingerprint below it, and nothing else.
 */

import { createHash } from 'node:crypto';
import type { Literal, NodeId } from './types.js';

export type Fingerprint = string;

export type FingerprintInput =
  | { slot: string; kind: 'literal'; value: Literal | null }
  | { slot: string; kind: 'edge'; upstream: Fingerprint; fromSlot: string };

/**
 * Deterministic JSON: object keys sorted, arrays in order, undefined
 * properties dropped, -0 written as 0.
 */
export function canonicalJson(value: unknown): string {
  if (value === undefined) return 'null';
  if (typeof value === 'number') return JSON.stringify(Object.is(value, -0) ? 0 : value);
  if (value === null || typeof value !== 'object') return JSON.stringify(value);
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(',')}]`;
  const entries = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
  return `{${entries.join(',')}}`;
}

export function fingerprintNode(nodeId: NodeId, operatorVersion: string, inputs: readonly FingerprintInput[]): Fingerprint {
  const hash = createHash('sha256');
  hash.update(`node:${nodeId}\n`);
  hash.update(`op:${operatorVersion}\n`);
  for (const input of inputs) {
    if (input.kind === 'literal') {
      hash.update(`in:${input.slot}=lit:${canonicalJson(input.value)}\n`);
    } else {
      hash.update(`in:${input.slot}=edge:${input.upstream}.${input.fromSlot}\n`);
    }
  }
  return hash.digest('hex');
}

export function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}
