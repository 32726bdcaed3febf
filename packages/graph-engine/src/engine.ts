/**
 * Evaluation Engine: runs an evaluation plan node by node, reusing cached
 * outputs where fingerprints match.
 *
 * A node that fails is recorded and everything fed by it is skipped, but
 * independent branches keep evaluating (and keep warming the cache). Work
 * yields to the event loop every `yieldEvery` nodes; a request that has
 * been superseded stops at its next yield.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import type { MeshSnapshot } from '@meshgraph/mesh-kernel';
import type { EvaluationCache } from './cache.js';
import { CacheConsistencyError, type EvalError, OperatorError, ScriptError, isEvalError } from './errors.js';
import { type Fingerprint, type FingerprintInput, fingerprintNode } from './fingerprint.js';
import { type Logger, silentLogger } from './logger.js';
import { OperatorInputs } from './operators/library.js';
import type { EvaluationPlan, PlannedNode } from './plan.js';
import type { ScriptBridge } from './scripting/bridge.js';
import { coerceValue, literalToValue } from './slots.js';
import type { NodeId, OutputSlot, Outputs, Value } from './types.js';

export interface NodeFailure {
  readonly nodeId: NodeId;
  readonly error: EvalError;
}

export interface EvaluationStats {
  /** Nodes in the plan that were reached (computed, cached or failed). */
  visited: number;
  cacheHits: number;
  /** Operator or script invocations, successful or not. */
  invocations: number;
  /** Ids of nodes whose outputs were computed rather than reused. */
  computed: NodeId[];
  durationMs: number;
}

export type EvaluationResult =
  | {
      status: 'ok';
      requestId: number;
      target: NodeId;
      fingerprint: Fingerprint;
      outputs: Outputs;
      /** Snapshot of the target's first mesh output, if it has one. */
      mesh: MeshSnapshot | null;
      stats: EvaluationStats;
    }
  | {
      status: 'failed';
      requestId: number;
      target: NodeId;
      /** The first node that failed, in evaluation order. */
      failure: NodeFailure;
      failures: NodeFailure[];
      /** Nodes skipped because an input depended on a failed node. */
      blocked: NodeId[];
      stats: EvaluationStats;
    }
  | { status: 'superseded'; requestId: number; stats: EvaluationStats }
  | { status: 'no-target'; requestId: number; stats: EvaluationStats };

export interface EvaluationEngineOptions {
  cache: EvaluationCache;
  bridge: ScriptBridge;
  logger?: Logger;
  yieldEvery?: number;
}

function emptyStats(): EvaluationStats {
  return { visited: 0, cacheHits: 0, invocations: 0, computed: [], durationMs: 0 };
}

export function noTargetResult(requestId: number): EvaluationResult {
  return { status: 'no-target', requestId, stats: emptyStats() };
}

/**
 * Every declared output present with its declared type, nothing else.
 * Returns the reason it is not, or null.
 */
function checkOutputs(declared: readonly OutputSlot[], outputs: ReadonlyMap<string, Value>): string | null {
  for (const slot of declared) {
    const value = outputs.get(slot.name);
    if (!value) return `missing output "${slot.name}"`;
    if (value.type !== slot.type) return `output "${slot.name}" should be ${slot.type}, got ${value.type}`;
  }
  for (const name of outputs.keys()) {
    if (!declared.some((s) => s.name === name)) return `undeclared output "${name}"`;
  }
  return null;
}

export class EvaluationEngine {
  private readonly cache: EvaluationCache;
  private readonly bridge: ScriptBridge;
  private readonly logger: Logger;
  private readonly yieldEvery: number;

  constructor(options: EvaluationEngineOptions) {
    this.cache = options.cache;
    this.bridge = options.bridge;
    this.logger = options.logger ?? silentLogger;
    this.yieldEvery = options.yieldEvery ?? 16;
  }

  /**
   * Evaluate a plan. Resolves with the result; rejects only with
   * CacheConsistencyError (or another engine bug).
   */
  async run(plan: EvaluationPlan, isCurrent: () => boolean = () => true): Promise<EvaluationResult> {
    const started = performance.now();
    const stats = emptyStats();
    const finish = (): EvaluationStats => ({ ...stats, durationMs: performance.now() - started });

    const results = new Map<NodeId, Outputs>();
    const fingerprints = new Map<NodeId, Fingerprint>();
    const failures: NodeFailure[] = [];
    const unavailable = new Set<NodeId>();
    const blocked: NodeId[] = [];

    await yieldToEventLoop();
    if (!isCurrent()) return { status: 'superseded', requestId: plan.requestId, stats: finish() };

    for (let i = 0; i < plan.nodes.length; i++) {
      if (i > 0 && i % this.yieldEvery === 0) {
        await yieldToEventLoop();
        if (!isCurrent()) return { status: 'superseded', requestId: plan.requestId, stats: finish() };
      }
      const node = plan.nodes[i];
      if (node.inputs.some((input) => input.source.kind === 'edge' && unavailable.has(input.source.from))) {
        unavailable.add(node.id);
        blocked.push(node.id);
        continue;
      }
      stats.visited++;

      const fingerprint = this.fingerprint(node, fingerprints);
      fingerprints.set(node.id, fingerprint);

      const cached = this.cache.get(fingerprint);
      if (cached) {
        this.checkEntry(node, fingerprint, cached.nodeId, cached.fingerprint, cached.outputs);
        results.set(node.id, cached.outputs);
        stats.cacheHits++;
        continue;
      }

      stats.invocations++;
      try {
        const outputs = this.invoke(node, this.resolveInputs(node, results));
        this.cache.set({ nodeId: node.id, fingerprint, outputs });
        results.set(node.id, outputs);
        stats.computed.push(node.id);
      } catch (err) {
        const error = this.asEvalError(node, err);
        failures.push({ nodeId: node.id, error });
        unavailable.add(node.id);
        this.logger.warn('node failed', { requestId: plan.requestId, nodeId: node.id, code: error.code, error: error.message });
      }
    }

    if (!isCurrent()) return { status: 'superseded', requestId: plan.requestId, stats: finish() };
    const summary = finish();
    this.logger.debug('evaluation finished', {
      requestId: plan.requestId,
      target: plan.target,
      visited: summary.visited,
      cacheHits: summary.cacheHits,
      invocations: summary.invocations,
      failures: failures.length,
      durationMs: Math.round(summary.durationMs * 1000) / 1000,
    });

    const outputs = results.get(plan.target);
    const fingerprint = fingerprints.get(plan.target);
    if (failures.length > 0 || !outputs || fingerprint === undefined) {
      const [first] = failures;
      if (!first) throw new CacheConsistencyError(`Target ${plan.target} produced no outputs and no failure`);
      return { status: 'failed', requestId: plan.requestId, target: plan.target, failure: first, failures, blocked, stats: summary };
    }
    const mesh = [...outputs.values()].find((v) => v.type === 'mesh');
    return {
      status: 'ok',
      requestId: plan.requestId,
      target: plan.target,
      fingerprint,
      outputs,
      mesh: mesh && mesh.type === 'mesh' ? mesh.value.snapshot() : null,
      stats: summary,
    };
  }

  private fingerprint(node: PlannedNode, fingerprints: ReadonlyMap<NodeId, Fingerprint>): Fingerprint {
    const inputs = node.inputs.map((input): FingerprintInput => {
      const source = input.source;
      if (source.kind === 'literal') {
        return { slot: input.slot.name, kind: 'literal', value: source.literal ?? null };
      }
      const upstream = fingerprints.get(source.from);
      if (upstream === undefined) {
        throw new CacheConsistencyError(`Node ${node.id} was reached before its input node ${source.from}`);
      }
      return { slot: input.slot.name, kind: 'edge', upstream, fromSlot: source.fromSlot };
    });
    return fingerprintNode(node.id, node.version, inputs);
  }

  private checkEntry(node: PlannedNode, fingerprint: Fingerprint, owner: NodeId, stored: Fingerprint, outputs: Outputs): void {
    if (owner !== node.id || stored !== fingerprint) {
      throw new CacheConsistencyError(`Cache entry ${fingerprint.slice(0, 12)} belongs to node ${owner}, not node ${node.id}`);
    }
    const problem = checkOutputs(node.outputs, outputs);
    if (problem) throw new CacheConsistencyError(`Cache entry for node ${node.id}: ${problem}`);
  }

  private resolveInputs(node: PlannedNode, results: ReadonlyMap<NodeId, Outputs>): Map<string, Value> {
    const values = new Map<string, Value>();
    for (const { slot, source } of node.inputs) {
      if (source.kind === 'literal') {
        values.set(slot.name, literalToValue(slot, source.literal));
        continue;
      }
      const value = results.get(source.from)?.get(source.fromSlot);
      if (!value) {
        throw new OperatorError(`Input "${slot.name}" of node ${node.id}: node ${source.from} has no output "${source.fromSlot}"`);
      }
      values.set(slot.name, coerceValue(value, slot.type));
    }
    return values;
  }

  /** Dispatch on the operator tag. Outputs are checked before anything is stored. */
  private invoke(node: PlannedNode, inputs: ReadonlyMap<string, Value>): Outputs {
    const op = node.operator;
    switch (op.kind) {
      case 'unavailable':
        throw op.error;
      case 'scripted':
        return this.bridge.invoke(op.record, inputs, node.id);
      case 'native': {
        const raw = op.operator.evaluate(new OperatorInputs(inputs));
        const outputs = new Map<string, Value>(Object.entries(raw));
        const problem = checkOutputs(node.outputs, outputs);
        if (problem) throw new OperatorError(`Operator ${op.operator.name} on node ${node.id}: ${problem}`);
        return outputs;
      }
    }
  }

  private asEvalError(node: PlannedNode, err: unknown): EvalError {
    if (err instanceof CacheConsistencyError) throw err;
    if (err instanceof ScriptError) return err.nodeId === null ? err.atNode(node.id) : err;
    if (isEvalError(err)) return err;
    const name = node.operator.kind === 'native' ? node.operator.operator.name : `node ${node.id}`;
    return new OperatorError(`${name} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
}
