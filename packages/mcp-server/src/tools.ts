/**
 * MCP tool registrations: 15 tools over the graph engine.
 *
 * Every mutating tool returns JSON with the document id and a readback of
 * what changed, so the agent always knows the state of the graph.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  createDefaultLibrary,
  deserializeSession,
  documentFromJson,
  documentToJson,
  serializeSession,
  type EngineSession,
  type EvaluationResult,
  type EvaluationStats,
  type Outputs,
} from '@meshgraph/graph-engine';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { type DocumentRegistry, describeNode } from './registry.js';

export interface ToolOptions {
  /** Where save_document writes and load_document resolves relative paths. */
  documentDir?: string;
}

function reply(data: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(data) }] };
}

function statsReadback(stats: EvaluationStats) {
  return {
    visited: stats.visited,
    cache_hits: stats.cacheHits,
    invocations: stats.invocations,
    computed: stats.computed,
    duration_ms: stats.durationMs,
  };
}

function outputsReadback(outputs: Outputs) {
  const out: Record<string, unknown> = {};
  for (const [slot, value] of outputs) {
    out[slot] = value.type === 'mesh'
      ? { type: 'mesh', vertex_count: value.value.vertexCount, face_count: value.value.faceCount }
      : { type: value.type, value: value.value };
  }
  return out;
}

export function evaluationReadback(documentId: string, result: EvaluationResult) {
  switch (result.status) {
    case 'ok':
      return {
        document_id: documentId,
        status: result.status,
        target: result.target,
        fingerprint: result.fingerprint,
        outputs: outputsReadback(result.outputs),
        mesh_info: result.mesh && {
          vertex_count: result.mesh.vertexCount,
          face_count: result.mesh.faceCount,
          bounds: result.mesh.bounds,
          channels: result.mesh.channels.map((ch) => `${ch.key}:${ch.name}`),
        },
        stats: statsReadback(result.stats),
      };
    case 'failed':
      return {
        document_id: documentId,
        status: result.status,
        target: result.target,
        failures: result.failures.map((f) => ({ node_id: f.nodeId, code: f.error.code, error: f.error.message })),
        blocked: result.blocked,
        stats: statsReadback(result.stats),
      };
    case 'superseded':
    case 'no-target':
      return { document_id: documentId, status: result.status, request_id: result.requestId };
  }
}

function operatorsReadback(session: EngineSession | null) {
  const library = session?.library ?? createDefaultLibrary();
  return {
    native: library.list().map((op) => ({
      operator: op.name,
      category: op.category,
      description: op.description,
      inputs: op.inputs,
      outputs: op.outputs,
    })),
    scripts: (session?.bridge.list() ?? []).map((s) => ({
      operator: `script:${s.id}`,
      name: s.definition?.name ?? null,
      loaded: s.loadError === null,
      error: s.loadError?.detail ?? null,
      inputs: s.definition?.inputs ?? [],
      outputs: s.definition?.outputs ?? [],
    })),
  };
}

const documentParam = z.string().describe('ID of the document');
const nodeParam = z.number().int().positive();

export function registerTools(server: McpServer, registry: DocumentRegistry, options: ToolOptions = {}): void {
  const documentDir = options.documentDir ?? path.join(process.env.TMPDIR ?? '/tmp', 'meshgraph');

  // ─── Documents (3) ──────────────────────────────────────────

  server.tool(
    'create_document',
    'Create an empty node graph document. Scripts from the configured script directory are preloaded.',
    {
      name: z.string().optional().describe('Optional document name (letters, digits, hyphens, underscores only)'),
    },
    async ({ name }) => reply(registry.create(name))
  );

  server.tool(
    'list_documents',
    'List all open documents with node and edge counts.',
    {},
    async () => {
      const documents = registry.list();
      return reply({ count: documents.length, documents });
    }
  );

  server.tool(
    'delete_document',
    'Close a document and drop its evaluation cache.',
    {
      document: documentParam,
    },
    async ({ document }) => {
      registry.remove(document);
      return reply({ deleted: document, remaining: registry.list().length });
    }
  );

  // ─── Graph edits (6) ────────────────────────────────────────

  server.tool(
    'add_node',
    'Add an operator node. Use a native operator name (e.g. "Box", "Extrude") or "script:<id>" for a defined script. Unset parameters use their defaults.',
    {
      document: documentParam,
      operator: z.string().min(1).describe('Operator name, or "script:<id>"'),
      params: z.record(z.unknown()).optional().describe('Parameter literals by input slot name'),
      label: z.string().optional().describe('Optional display label'),
    },
    async ({ document, operator, params, label }) => {
      const session = registry.get(document);
      const id = session.addNode(operator, params ?? {}, label);
      return reply({ document_id: document, node: describeNode(session, id) });
    }
  );

  server.tool(
    'remove_node',
    'Remove a node and every edge touching it.',
    {
      document: documentParam,
      node: nodeParam.describe('ID of the node to remove'),
    },
    async ({ document, node }) => {
      const session = registry.get(document);
      const removed = session.removeNode(node);
      return reply({
        document_id: document,
        removed_node: node,
        removed_edges: removed.map((e) => `${e.from}.${e.fromSlot} -> ${e.to}.${e.toSlot}`),
      });
    }
  );

  server.tool(
    'connect',
    'Connect an output slot to an input slot. Scalars connect to vector inputs by broadcasting.',
    {
      document: documentParam,
      from: nodeParam.describe('Source node ID'),
      from_slot: z.string().describe('Output slot of the source node'),
      to: nodeParam.describe('Destination node ID'),
      to_slot: z.string().describe('Input slot of the destination node'),
      replace: z.boolean().default(false).describe('Replace an existing incoming edge instead of failing'),
    },
    async ({ document, from, from_slot, to, to_slot, replace }) => {
      const session = registry.get(document);
      session.addEdge(from, from_slot, to, to_slot, { replace });
      return reply({ document_id: document, node: describeNode(session, to) });
    }
  );

  server.tool(
    'disconnect',
    'Remove the edge feeding an input slot.',
    {
      document: documentParam,
      to: nodeParam.describe('Destination node ID'),
      to_slot: z.string().describe('Input slot to disconnect'),
    },
    async ({ document, to, to_slot }) => {
      const session = registry.get(document);
      const edge = session.removeEdge(to, to_slot);
      return reply({ document_id: document, removed: edge !== undefined, node: describeNode(session, to) });
    }
  );

  server.tool(
    'set_param',
    'Set a parameter literal on an unconnected input slot. Vectors are [x, y, z].',
    {
      document: documentParam,
      node: nodeParam.describe('Node ID'),
      slot: z.string().describe('Input slot name'),
      value: z.union([z.number(), z.string(), z.array(z.number())]).describe('Scalar, string or [x, y, z]'),
    },
    async ({ document, node, slot, value }) => {
      const session = registry.get(document);
      session.setParam(node, slot, value);
      return reply({ document_id: document, node: describeNode(session, node) });
    }
  );

  server.tool(
    'set_output',
    'Designate the node whose result evaluate returns. Pass null to clear it.',
    {
      document: documentParam,
      node: nodeParam.nullable().describe('Node ID, or null'),
    },
    async ({ document, node }) => {
      const session = registry.get(document);
      session.setOutput(node);
      return reply(registry.describe(document));
    }
  );

  // ─── Inspection (2) ─────────────────────────────────────────

  server.tool(
    'list_operators',
    'List native operators with their slots, plus the scripts of a document when one is given.',
    {
      document: documentParam.optional(),
    },
    async ({ document }) => reply(operatorsReadback(document === undefined ? null : registry.get(document)))
  );

  server.tool(
    'describe_graph',
    'Full readback of a document: every node with its parameters and incoming edges.',
    {
      document: documentParam,
    },
    async ({ document }) => {
      const session = registry.get(document);
      return reply({
        ...registry.describe(document),
        nodes: session.graph.nodes().map((n) => describeNode(session, n.id)),
        cache: session.cacheStats(),
      });
    }
  );

  // ─── Scripting (1) ──────────────────────────────────────────

  server.tool(
    'define_script',
    'Define or replace a scripted operator. The source must call defineNode({ name, inputs, outputs, run }) once; run(inputs, Ops) returns an object keyed by output name.',
    {
      document: documentParam,
      script_id: z.string().describe('Script ID; nodes use the operator "script:<id>"'),
      source: z.string().max(200_000).describe('JavaScript source'),
    },
    async ({ document, script_id, source }) => {
      const session = registry.get(document);
      const update = session.applyScriptChange({ scriptId: script_id, source });
      return reply({
        document_id: document,
        script_id,
        hash: update.hash,
        loaded: update.loaded,
        changed: update.changed,
        schema_changed: update.schemaChanged,
        error: update.error && { reason: update.error.reason, detail: update.error.detail },
        reconciled: update.reconciled.map((r) => ({
          node_id: r.nodeId,
          removed_edges: r.removedEdges.map((e) => `${e.from}.${e.fromSlot} -> ${e.to}.${e.toSlot}`),
          removed_params: r.removedParams,
        })),
      });
    }
  );

  // ─── Evaluation (1) ─────────────────────────────────────────

  server.tool(
    'evaluate',
    'Evaluate the graph for the output node (or the given node). Unchanged nodes are served from the cache. Returns mesh stats, per-slot outputs and the first failure, if any.',
    {
      document: documentParam,
      node: nodeParam.optional().describe('Node to evaluate instead of the designated output'),
    },
    async ({ document, node }) => {
      const session = registry.get(document);
      const result = await session.requestEvaluation(node);
      return reply(evaluationReadback(document, result));
    }
  );

  // ─── Persistence (2) ────────────────────────────────────────

  server.tool(
    'save_document',
    'Write a document as a JSON graph file (nodes, edges, output and script sources).',
    {
      document: documentParam,
      filename: z.string().optional().describe('Output filename (default: <document>.meshgraph.json)'),
    },
    async ({ document, filename }) => {
      const session = registry.get(document);
      const json = documentToJson(serializeSession(session));

      fs.mkdirSync(documentDir, { recursive: true });
      const safeName = (filename ?? `${document}.meshgraph.json`).replace(/[^a-zA-Z0-9_.-]/g, '_');
      const filePath = path.join(documentDir, safeName);
      fs.writeFileSync(filePath, json, 'utf-8');

      return reply({
        document_id: document,
        type: 'graph_export',
        file_path: filePath,
        file_size_bytes: Buffer.byteLength(json),
      });
    }
  );

  server.tool(
    'load_document',
    'Open a JSON graph file as a new document. Relative paths resolve against the document directory.',
    {
      file_path: z.string().describe('Path of the graph file'),
      name: z.string().optional().describe('Optional document name (letters, digits, hyphens, underscores only)'),
    },
    async ({ file_path, name }) => {
      const resolved = path.resolve(documentDir, file_path);
      const doc = documentFromJson(fs.readFileSync(resolved, 'utf-8'));
      const session = deserializeSession(doc, { config: registry.config, logger: registry.logger });
      return reply({ ...registry.adopt(session, name), file_path: resolved });
    }
  );
}
