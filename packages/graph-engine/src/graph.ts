/**
 * Graph Model: an arena of nodes addressed by integer handles, plus the
 * inbound edge of each connected input slot.
 *
 * Every edit validates first and mutates last, so a rejected edit leaves the
 * graph exactly as it was. Edges are stored per destination slot, which
 * makes "at most one incoming edge per input" structural.
 */

import {
  CycleError, GraphStructureError, SlotOccupiedError, TypeMismatchError, UnknownNodeError, UnknownSlotError,
} from './errors.js';
import { canConnect, defaultLiteral, validateLiteral } from './slots.js';
import type { InputSlot, Literal, NodeId, OperatorRef, OperatorSchema, OutputSlot } from './types.js';

export interface GraphNode {
  readonly id: NodeId;
  readonly operator: OperatorRef;
  readonly label?: string;
  /** Stored parameter literals, by input slot name. Absent slots use their default. */
  readonly params: ReadonlyMap<string, Literal>;
  readonly schema: OperatorSchema;
}

export interface Edge {
  readonly from: NodeId;
  readonly fromSlot: string;
  readonly to: NodeId;
  readonly toSlot: string;
}

/** Resolves the current slot schema of an operator. */
export interface OperatorCatalog {
  /** Throws UnknownOperatorError when the operator is not available. */
  schemaOf(ref: OperatorRef): OperatorSchema;
}

export interface ReconcileReport {
  removedEdges: Edge[];
  removedParams: string[];
}

interface NodeRecord {
  id: NodeId;
  operator: OperatorRef;
  label?: string;
  params: Map<string, Literal>;
  schema: OperatorSchema;
}

const slotKey = (node: NodeId, slot: string): string => `${node}:${slot}`;

function copyLiteral(value: Literal): Literal {
  return Array.isArray(value) ? [value[0], value[1], value[2]] : value;
}

export class Graph {
  private readonly records = new Map<NodeId, NodeRecord>();
  private readonly inbound = new Map<string, Edge>();
  private nextId = 1;
  private outputNode: NodeId | null = null;
  private structural = 0;
  private edits = 0;

  constructor(private readonly catalog: OperatorCatalog) {}

  /** Incremented by edits that change nodes or edges. */
  get structureVersion(): number {
    return this.structural;
  }

  /** Incremented by every successful edit, parameters and output included; labels excluded. */
  get version(): number {
    return this.edits;
  }

  /** Id the next added node will get. */
  get nextNodeId(): NodeId {
    return this.nextId;
  }

  get output(): NodeId | null {
    return this.outputNode;
  }

  get size(): number {
    return this.records.size;
  }

  // ─── Nodes ──────────────────────────────────────────────────────

  /** Add a node with a fresh id. Parameters are validated against the operator's inputs. */
  addNode(operator: OperatorRef, params: Readonly<Record<string, unknown>> = {}, label?: string): NodeId {
    const id = this.nextId;
    this.insert(id, operator, params, label);
    this.nextId = id + 1;
    return id;
  }

  /**
   * Re-create a node under a known id (document loading). The id must be
   * unused; later fresh ids continue above it.
   */
  restoreNode(id: NodeId, operator: OperatorRef, params: Readonly<Record<string, unknown>> = {}, label?: string): void {
    if (!Number.isInteger(id) || id < 1) throw new UnknownNodeError(id);
    if (this.records.has(id)) {
      throw new GraphStructureError('duplicate-node', `Node ${id} already exists`);
    }
    this.insert(id, operator, params, label);
    this.nextId = Math.max(this.nextId, id + 1);
  }

  /** Raise the id counter, so ids of deleted nodes are not handed out again after a reload. */
  reserveIds(nextNodeId: NodeId): void {
    this.nextId = Math.max(this.nextId, nextNodeId);
  }

  private insert(id: NodeId, operator: OperatorRef, params: Readonly<Record<string, unknown>>, label?: string): void {
    const schema = this.catalog.schemaOf(operator);
    const stored = new Map<string, Literal>();
    for (const [slot, value] of Object.entries(params)) {
      stored.set(slot, validateLiteral(findInput(id, schema, slot), value));
    }
    const record: NodeRecord = { id, operator, params: stored, schema };
    if (label !== undefined) record.label = label;
    this.records.set(id, record);
    this.touch(true);
  }

  /** Remove a node and every edge touching it. Clears the output if it pointed here. */
  removeNode(id: NodeId): Edge[] {
    this.record(id);
    const removed = [...this.inbound.values()].filter((e) => e.from === id || e.to === id);
    for (const e of removed) this.inbound.delete(slotKey(e.to, e.toSlot));
    this.records.delete(id);
    if (this.outputNode === id) this.outputNode = null;
    this.touch(true);
    return removed;
  }

  node(id: NodeId): GraphNode {
    return this.record(id);
  }

  has(id: NodeId): boolean {
    return this.records.has(id);
  }

  /** All nodes in id order. */
  nodes(): GraphNode[] {
    return [...this.records.values()].sort((a, b) => a.id - b.id);
  }

  setLabel(id: NodeId, label: string | undefined): void {
    const record = this.record(id);
    if (label === undefined) delete record.label;
    else record.label = label;
  }

  // ─── Edges ──────────────────────────────────────────────────────

  /**
   * Connect an output slot to an input slot.
   *
   * Rejects unknown nodes or slots, incompatible slot types, an occupied
   * destination (unless `replace` is set), and any edge that would close a
   * cycle.
   */
  addEdge(from: NodeId, fromSlot: string, to: NodeId, toSlot: string, options: { replace?: boolean } = {}): Edge {
    const source = findOutput(from, this.record(from).schema, fromSlot);
    const target = findInput(to, this.record(to).schema, toSlot);
    if (!canConnect(source.type, target.type)) {
      throw new TypeMismatchError(
        `Cannot connect ${source.type} output "${fromSlot}" of node ${from} to ${target.type} input "${toSlot}" of node ${to}`
      );
    }
    const key = slotKey(to, toSlot);
    const existing = this.inbound.get(key);
    if (existing && !options.replace) throw new SlotOccupiedError(to, toSlot);
    if (from === to || this.reaches(to, from)) throw new CycleError(from, to);

    const edge: Edge = { from, fromSlot, to, toSlot };
    this.inbound.set(key, edge);
    this.touch(true);
    return edge;
  }

  /** Disconnect an input slot. Returns the removed edge, if there was one. */
  removeEdge(to: NodeId, toSlot: string): Edge | undefined {
    findInput(to, this.record(to).schema, toSlot);
    const key = slotKey(to, toSlot);
    const edge = this.inbound.get(key);
    if (!edge) return undefined;
    this.inbound.delete(key);
    this.touch(true);
    return edge;
  }

  /** Inbound edge of an input slot. */
  edgeInto(to: NodeId, toSlot: string): Edge | undefined {
    return this.inbound.get(slotKey(to, toSlot));
  }

  /** All edges, ordered by destination node then slot order. */
  edges(): Edge[] {
    const order = (e: Edge): number => {
      const inputs = this.records.get(e.to)?.schema.inputs ?? [];
      return inputs.findIndex((s) => s.name === e.toSlot);
    };
    return [...this.inbound.values()].sort((a, b) => a.to - b.to || order(a) - order(b));
  }

  outgoing(id: NodeId): Edge[] {
    return this.edges().filter((e) => e.from === id);
  }

  // ─── Parameters and output ──────────────────────────────────────

  /** Set the literal of an unconnected input. */
  setParam(id: NodeId, slot: string, value: unknown): void {
    const record = this.record(id);
    const input = findInput(id, record.schema, slot);
    if (this.inbound.has(slotKey(id, slot))) throw new SlotOccupiedError(id, slot);
    record.params.set(slot, validateLiteral(input, value));
    this.touch(false);
  }

  /** Effective literal of an input: the stored parameter, else the slot default. Mesh inputs have none. */
  getParam(id: NodeId, slot: string): Literal | undefined {
    const record = this.record(id);
    const input = findInput(id, record.schema, slot);
    const stored = record.params.get(slot);
    return stored === undefined ? defaultLiteral(input) : copyLiteral(stored);
  }

  setOutput(id: NodeId | null): void {
    if (id !== null) this.record(id);
    this.outputNode = id;
    this.touch(false);
  }

  // ─── Traversal ──────────────────────────────────────────────────

  /**
   * Ancestors of `target` and `target` itself, dependencies first. Inputs are
   * visited in slot order, so the order is deterministic for a given graph.
   */
  topologicalOrder(target: NodeId): NodeId[] {
    this.record(target);
    const order: NodeId[] = [];
    const state = new Map<NodeId, 'visiting' | 'done'>();
    const visit = (id: NodeId, via: NodeId): void => {
      const s = state.get(id);
      if (s === 'done') return;
      if (s === 'visiting') throw new CycleError(id, via);
      state.set(id, 'visiting');
      for (const slot of this.record(id).schema.inputs) {
        const edge = this.inbound.get(slotKey(id, slot.name));
        if (edge) visit(edge.from, id);
      }
      state.set(id, 'done');
      order.push(id);
    };
    visit(target, target);
    return order;
  }

  /** Nodes that depend on `id`, directly or transitively, in id order. */
  downstream(id: NodeId): NodeId[] {
    this.record(id);
    const seen = new Set<NodeId>();
    const stack = [id];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const e of this.inbound.values()) {
        if (e.from === current && !seen.has(e.to)) {
          seen.add(e.to);
          stack.push(e.to);
        }
      }
    }
    seen.delete(id);
    return [...seen].sort((a, b) => a - b);
  }

  /**
   * Re-read a node's schema from the catalog after its operator changed
   * (script reload). Edges and parameters that no longer fit are removed and
   * reported.
   */
  reconcileNode(id: NodeId): ReconcileReport {
    const record = this.record(id);
    const schema = this.catalog.schemaOf(record.operator);
    const removedEdges: Edge[] = [];

    for (const edge of [...this.inbound.values()]) {
      if (edge.to === id) {
        const input = schema.inputs.find((s) => s.name === edge.toSlot);
        const source = this.records.get(edge.from)?.schema.outputs.find((s) => s.name === edge.fromSlot);
        if (!input || !source || !canConnect(source.type, input.type)) removedEdges.push(edge);
      } else if (edge.from === id) {
        const output = schema.outputs.find((s) => s.name === edge.fromSlot);
        const target = this.records.get(edge.to)?.schema.inputs.find((s) => s.name === edge.toSlot);
        if (!output || !target || !canConnect(output.type, target.type)) removedEdges.push(edge);
      }
    }

    const removedParams: string[] = [];
    for (const [slot, value] of record.params) {
      const input = schema.inputs.find((s) => s.name === slot);
      if (!input || !fits(input, value)) removedParams.push(slot);
    }

    for (const e of removedEdges) this.inbound.delete(slotKey(e.to, e.toSlot));
    for (const slot of removedParams) record.params.delete(slot);
    record.schema = schema;
    this.touch(true);
    return { removedEdges, removedParams };
  }

  // ─── Internals ──────────────────────────────────────────────────

  private record(id: NodeId): NodeRecord {
    const record = this.records.get(id);
    if (!record) throw new UnknownNodeError(id);
    return record;
  }

  /** True when `goal` is reachable from `start` along edge direction. */
  private reaches(start: NodeId, goal: NodeId): boolean {
    const seen = new Set<NodeId>([start]);
    const stack = [start];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      if (current === goal) return true;
      for (const e of this.inbound.values()) {
        if (e.from === current && !seen.has(e.to)) {
          seen.add(e.to);
          stack.push(e.to);
        }
      }
    }
    return false;
  }

  private touch(structural: boolean): void {
    this.edits++;
    if (structural) this.structural++;
  }
}

function findInput(node: NodeId, schema: OperatorSchema, name: string): InputSlot {
  const slot = schema.inputs.find((s) => s.name === name);
  if (!slot) throw new UnknownSlotError(node, name, 'input', schema.inputs.map((s) => s.name));
  return slot;
}

function findOutput(node: NodeId, schema: OperatorSchema, name: string): OutputSlot {
  const slot = schema.outputs.find((s) => s.name === name);
  if (!slot) throw new UnknownSlotError(node, name, 'output', schema.outputs.map((s) => s.name));
  return slot;
}

function fits(slot: InputSlot, value: Literal): boolean {
  try {
    validateLiteral(slot, value);
    return true;
  } catch {
    return false;
  }
}
