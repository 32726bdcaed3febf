/**
 * Evaluation plan: everything one evaluation request needs, captured when
 * the request is made. Edits after that point change the graph, never the
 * plan, so an in-flight evaluation always sees one consistent graph.
 */

import type { Graph, GraphNode } from './graph.js';
import type { NativeOperator, OperatorLibrary } from './operators/library.js';
import type { ScriptBridge, ScriptRecord } from './scripting/bridge.js';
import { scriptVersion } from './scripting/bridge.js';
import { ScriptError } from './errors.js';
import type { DataType, InputSlot, Literal, NodeId, OutputSlot } from './types.js';

export type PlannedSource =
  | { kind: 'literal'; literal: Literal | undefined }
  | { kind: 'edge'; from: NodeId; fromSlot: string; fromType: DataType };

export interface PlannedInput {
  readonly slot: InputSlot;
  readonly source: PlannedSource;
}

export type PlannedOperator =
  | { kind: 'native'; operator: NativeOperator }
  | { kind: 'scripted'; record: ScriptRecord }
  /** The script was removed after the node was created. */
  | { kind: 'unavailable'; error: ScriptError };

export interface PlannedNode {
  readonly id: NodeId;
  readonly label?: string;
  readonly operator: PlannedOperator;
  /** Operator version string that goes into the fingerprint. */
  readonly version: string;
  readonly inputs: readonly PlannedInput[];
  readonly outputs: readonly OutputSlot[];
}

export interface EvaluationPlan {
  readonly requestId: number;
  readonly graphVersion: number;
  readonly target: NodeId;
  /** Ancestors of the target and the target itself, dependencies first. */
  readonly nodes: readonly PlannedNode[];
}

function planOperator(node: GraphNode, library: OperatorLibrary, bridge: ScriptBridge): { operator: PlannedOperator; version: string } {
  const ref = node.operator;
  if (ref.kind === 'native') {
    const operator = library.get(ref.name);
    return { operator: { kind: 'native', operator }, version: `native:${operator.name}@${operator.version}` };
  }
  if (!bridge.has(ref.scriptId)) {
    return {
      operator: { kind: 'unavailable', error: new ScriptError('not-loaded', ref.scriptId, 'script is not registered', node.id) },
      version: `script:${ref.scriptId}@missing`,
    };
  }
  const record = bridge.get(ref.scriptId);
  return { operator: { kind: 'scripted', record }, version: scriptVersion(record) };
}

/**
 * Capture the plan for evaluating `target`. Throws CycleError if the graph
 * somehow holds a cycle, and UnknownNodeError for an unknown target.
 */
export function buildPlan(
  graph: Graph,
  library: OperatorLibrary,
  bridge: ScriptBridge,
  target: NodeId,
  requestId: number,
): EvaluationPlan {
  const nodes = graph.topologicalOrder(target).map((id): PlannedNode => {
    const node = graph.node(id);
    const { operator, version } = planOperator(node, library, bridge);
    const inputs = node.schema.inputs.map((slot): PlannedInput => {
      const edge = graph.edgeInto(id, slot.name);
      if (!edge) return Object.freeze({ slot, source: Object.freeze({ kind: 'literal', literal: graph.getParam(id, slot.name) }) });
      const fromType = graph.node(edge.from).schema.outputs.find((o) => o.name === edge.fromSlot)?.type ?? slot.type;
      return Object.freeze({ slot, source: Object.freeze({ kind: 'edge', from: edge.from, fromSlot: edge.fromSlot, fromType }) });
    });
    const planned: PlannedNode = {
      id,
      operator: Object.freeze(operator),
      version,
      inputs: Object.freeze(inputs),
      outputs: node.schema.outputs,
    };
    return Object.freeze(node.label === undefined ? planned : { ...planned, label: node.label });
  });
  return Object.freeze({ requestId, graphVersion: graph.version, target, nodes: Object.freeze(nodes) });
}
