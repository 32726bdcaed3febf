/**
 * Persisted graph documents (JSON).
 *
 *   {
 *     "format": "meshgraph", "version": 1,
 *     "nextNodeId": 4, "output": 3,
 *     "nodes":   [{ "id": 1, "operator": { "kind": "native", "name": "Box" }, "params": { "size": [2, 1, 1] } }],
 *     "edges":   [{ "from": { "node": 1, "slot": "mesh" }, "to": { "node": 3, "slot": "mesh" } }],
 *     "scripts": [{ "id": "pillar", "source": "defineNode({ ... })" }]
 *   }
 *
 * Node ids and script sources are stored verbatim, so a loaded document
 * produces the same fingerprints (and therefore reuses the same cache
 * entries) as the session it was saved from. A script whose last reload
 * failed also stores `loadedSource`, the source its slot layout came from;
 * loading replays that source before the failing one.
 */

import { z } from 'zod';
import { DocumentFormatError, EngineError } from './errors.js';
import { EngineSession, type EngineSessionOptions } from './session.js';
import type { Literal } from './types.js';

export const DOCUMENT_FORMAT = 'meshgraph';
export const DOCUMENT_VERSION = 1;

const finite = z.number().finite();
const nodeId = z.number().int().positive();

const LiteralSchema = z.union([finite, z.string(), z.tuple([finite, finite, finite])]);

const OperatorRefSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('native'), name: z.string().min(1) }),
  z.object({ kind: z.literal('scripted'), scriptId: z.string().min(1) }),
]);

const EndpointSchema = z.object({ node: nodeId, slot: z.string().min(1) });

export const GraphDocumentSchema = z.object({
  format: z.literal(DOCUMENT_FORMAT),
  version: z.literal(DOCUMENT_VERSION),
  nextNodeId: nodeId,
  output: nodeId.nullable(),
  nodes: z.array(z.object({
    id: nodeId,
    operator: OperatorRefSchema,
    label: z.string().optional(),
    params: z.record(LiteralSchema).default({}),
  })),
  edges: z.array(z.object({ from: EndpointSchema, to: EndpointSchema })).default([]),
  scripts: z.array(z.object({
    id: z.string().min(1),
    source: z.string(),
    loadedSource: z.string().optional(),
  })).default([]),
});

export type GraphDocument = z.infer<typeof GraphDocumentSchema>;

/** Capture a session's graph and scripts. Only explicitly set parameters are stored. */
export function serializeSession(session: EngineSession): GraphDocument {
  const graph = session.graph;
  return {
    format: DOCUMENT_FORMAT,
    version: DOCUMENT_VERSION,
    nextNodeId: graph.nextNodeId,
    output: graph.output,
    nodes: graph.nodes().map((node) => {
      const params: Record<string, Literal> = {};
      for (const [slot, value] of node.params) params[slot] = Array.isArray(value) ? [value[0], value[1], value[2]] : value;
      return node.label === undefined
        ? { id: node.id, operator: { ...node.operator }, params }
        : { id: node.id, operator: { ...node.operator }, label: node.label, params };
    }),
    edges: graph.edges().map((e) => ({ from: { node: e.from, slot: e.fromSlot }, to: { node: e.to, slot: e.toSlot } })),
    scripts: session.bridge.list().map((s) => (s.loadedSource === null || s.loadedSource === s.source
      ? { id: s.id, source: s.source }
      : { id: s.id, source: s.source, loadedSource: s.loadedSource })),
  };
}

export function parseDocument(input: unknown): GraphDocument {
  const parsed = GraphDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new DocumentFormatError(`Invalid graph document: ${issues}`);
  }
  return parsed.data;
}

/**
 * Build a new session from a document. Scripts are registered first (the
 * last loaded source, where stored, then the current one), then
 * nodes (by id), edges and the output designation. Any inconsistency is a
 * DocumentFormatError naming the offending entry.
 */
export function deserializeSession(input: unknown, options: EngineSessionOptions = {}): EngineSession {
  const doc = parseDocument(input);
  const session = new EngineSession(options);
  const graph = session.graph;

  const step = (what: string, run: () => void): void => {
    try {
      run();
    } catch (err) {
      if (err instanceof EngineError) throw new DocumentFormatError(`${what}: ${err.message}`, { cause: err });
      throw err;
    }
  };

  for (const script of doc.scripts) {
    step(`script "${script.id}"`, () => {
      if (script.loadedSource !== undefined) {
        session.bridge.applyChange({ scriptId: script.id, source: script.loadedSource });
      }
      const result = session.bridge.applyChange({ scriptId: script.id, source: script.source });
      if (result.error) session.logger.warn('document script failed to load', { scriptId: script.id, detail: result.error.detail });
    });
  }
  for (const node of [...doc.nodes].sort((a, b) => a.id - b.id)) {
    step(`node ${node.id}`, () => graph.restoreNode(node.id, node.operator, node.params, node.label));
  }
  for (const edge of doc.edges) {
    step(`edge ${edge.from.node}.${edge.from.slot} -> ${edge.to.node}.${edge.to.slot}`, () => {
      graph.addEdge(edge.from.node, edge.from.slot, edge.to.node, edge.to.slot);
    });
  }
  step('output', () => graph.setOutput(doc.output));
  graph.reserveIds(doc.nextNodeId);
  return session;
}

export function documentToJson(doc: GraphDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

export function documentFromJson(text: string): GraphDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new DocumentFormatError(`Graph document is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  return parseDocument(raw);
}
