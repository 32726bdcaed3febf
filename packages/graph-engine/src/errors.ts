/**
 * Error taxonomy. Every engine error carries a machine-readable `code`.
 *
 * Edit-time errors (the GraphStructureError family) are thrown synchronously
 * and leave the graph untouched. Evaluation-time errors (EvalError) are
 * captured per node and reported in the evaluation result.
 */

import { GeometryError } from '@meshgraph/mesh-kernel';
import type { NodeId } from './types.js';

export class EngineError extends Error {
  constructor(readonly code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
  }
}

// ─── Edit time ──────────────────────────────────────────────────

export class GraphStructureError extends EngineError {
  constructor(code: string, message: string) {
    super(code, message);
    this.name = 'GraphStructureError';
  }
}

export class CycleError extends GraphStructureError {
  constructor(readonly from: NodeId, readonly to: NodeId) {
    super('cycle', `Connecting node ${from} to node ${to} would create a cycle`);
    this.name = 'CycleError';
  }
}

export class TypeMismatchError extends GraphStructureError {
  constructor(message: string) {
    super('type-mismatch', message);
    this.name = 'TypeMismatchError';
  }
}

export class SlotOccupiedError extends GraphStructureError {
  constructor(readonly node: NodeId, readonly slot: string) {
    super('slot-occupied', `Input "${slot}" of node ${node} already has an incoming edge`);
    this.name = 'SlotOccupiedError';
  }
}

export class UnknownNodeError extends GraphStructureError {
  constructor(readonly node: NodeId) {
    super('unknown-node', `Node ${node} does not exist`);
    this.name = 'UnknownNodeError';
  }
}

export class UnknownSlotError extends GraphStructureError {
  constructor(readonly node: NodeId, readonly slot: string, direction: 'input' | 'output', available: readonly string[]) {
    super(
      'unknown-slot',
      `Node ${node} has no ${direction} "${slot}". Available: [${available.join(', ')}]`
    );
    this.name = 'UnknownSlotError';
  }
}

export class UnknownOperatorError extends GraphStructureError {
  constructor(readonly operator: string) {
    super('unknown-operator', `Operator "${operator}" is not registered`);
    this.name = 'UnknownOperatorError';
  }
}

export class InvalidParameterError extends GraphStructureError {
  constructor(message: string) {
    super('invalid-parameter', message);
    this.name = 'InvalidParameterError';
  }
}

// ─── Evaluation time ────────────────────────────────────────────

/** A native operator broke its contract or rejected its inputs. */
export class OperatorError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('operator', message, options);
    this.name = 'OperatorError';
  }
}

export type ScriptFailure = 'compile' | 'validation' | 'runtime' | 'timeout' | 'invalid-output' | 'not-loaded';

export class ScriptError extends EngineError {
  constructor(
    readonly reason: ScriptFailure,
    readonly scriptId: string,
    readonly detail: string,
    readonly nodeId: NodeId | null = null,
  ) {
    super('script', nodeId === null
      ? `Script "${scriptId}" ${reason}: ${detail}`
      : `Script "${scriptId}" on node ${nodeId} ${reason}: ${detail}`);
    this.name = 'ScriptError';
  }

  /** Same failure, attributed to the node that ran the script. */
  atNode(nodeId: NodeId): ScriptError {
    return new ScriptError(this.reason, this.scriptId, this.detail, nodeId);
  }
}

export type EvalError = GeometryError | OperatorError | ScriptError;

export function isEvalError(error: unknown): error is EvalError {
  return error instanceof GeometryError || error instanceof OperatorError || error instanceof ScriptError;
}

/** A cache entry does not belong to the node that looked it up. Always an engine bug. */
export class CacheConsistencyError extends EngineError {
  constructor(message: string) {
    super('cache-consistency', message);
    this.name = 'CacheConsistencyError';
  }
}

/** A persisted document could not be read. */
export class DocumentFormatError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('document-format', message, options);
    this.name = 'DocumentFormatError';
  }
}

export { GeometryError };
