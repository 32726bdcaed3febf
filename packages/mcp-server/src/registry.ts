/**
 * Document Registry: named graph sessions held by the server.
 *
 * Every mutating MCP tool works on one document and returns a structured
 * readback so the agent always knows the current state of the graph.
 */

import {
  EngineSession,
  operatorLabel,
  type EngineConfig,
  type Literal,
  type Logger,
  type NodeId,
} from '@meshgraph/graph-engine';

export interface DocumentReadback {
  document_id: string;
  node_count: number;
  edge_count: number;
  output: NodeId | null;
  graph_version: number;
  scripts: string[];
}

export interface NodeReadback {
  node_id: NodeId;
  operator: string;
  label?: string;
  /** Explicitly set parameters; unset inputs use their defaults. */
  params: Record<string, Literal>;
  inputs: { slot: string; type: string; source: { node: NodeId; slot: string } | null }[];
  outputs: { slot: string; type: string }[];
}

export interface DocumentRegistryOptions {
  config: EngineConfig;
  logger: Logger;
}

const NAME = /^[a-zA-Z0-9_-]+$/;

export class DocumentRegistry {
  readonly config: EngineConfig;
  readonly logger: Logger;
  private readonly documents = new Map<string, EngineSession>();
  private nextId = 1;

  constructor(options: DocumentRegistryOptions) {
    this.config = options.config;
    this.logger = options.logger;
  }

  /** New empty document. Without a name, ids run doc_1, doc_2, ... */
  create(name?: string): DocumentReadback {
    const session = new EngineSession({ config: this.config, logger: this.logger });
    return this.adopt(session, name);
  }

  /** Store an existing session (a loaded document) under a name. */
  adopt(session: EngineSession, name?: string): DocumentReadback {
    const id = this.claim(name);
    this.documents.set(id, session);
    this.logger.info('document opened', { documentId: id, nodes: session.graph.nodes().length });
    return describeDocument(id, session);
  }

  /** Retrieve a document or throw a clear error. */
  get(id: string): EngineSession {
    const session = this.documents.get(id);
    if (!session) {
      throw new Error(`Document "${id}" not found. Available documents: [${[...this.documents.keys()].join(', ')}]`);
    }
    return session;
  }

  has(id: string): boolean {
    return this.documents.has(id);
  }

  remove(id: string): void {
    if (!this.documents.delete(id)) {
      throw new Error(`Document "${id}" not found; cannot delete.`);
    }
    this.logger.info('document closed', { documentId: id });
  }

  list(): DocumentReadback[] {
    return [...this.documents.entries()].map(([id, session]) => describeDocument(id, session));
  }

  describe(id: string): DocumentReadback {
    return describeDocument(id, this.get(id));
  }

  private claim(name?: string): string {
    if (name !== undefined) {
      if (!NAME.test(name)) {
        throw new Error(`Invalid document name "${name}". Use only letters, digits, hyphens, underscores.`);
      }
      if (this.documents.has(name)) {
        throw new Error(`Document "${name}" already exists. Use a different name or delete the existing document.`);
      }
      return name;
    }
    let id = `doc_${this.nextId++}`;
    while (this.documents.has(id)) id = `doc_${this.nextId++}`;
    return id;
  }
}

export function describeDocument(id: string, session: EngineSession): DocumentReadback {
  const graph = session.graph;
  return {
    document_id: id,
    node_count: graph.nodes().length,
    edge_count: graph.edges().length,
    output: graph.output,
    graph_version: graph.version,
    scripts: session.bridge.list().map((s) => s.id),
  };
}

export function describeNode(session: EngineSession, id: NodeId): NodeReadback {
  const graph = session.graph;
  const node = graph.node(id);
  const params: Record<string, Literal> = {};
  for (const [slot, value] of node.params) params[slot] = value;
  const readback: NodeReadback = {
    node_id: node.id,
    operator: operatorLabel(node.operator),
    params,
    inputs: node.schema.inputs.map((slot) => {
      const edge = graph.edgeInto(id, slot.name);
      return { slot: slot.name, type: slot.type, source: edge ? { node: edge.from, slot: edge.fromSlot } : null };
    }),
    outputs: node.schema.outputs.map((slot) => ({ slot: slot.name, type: slot.type })),
  };
  if (node.label !== undefined) readback.label = node.label;
  return readback;
}
