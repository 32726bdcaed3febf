/**
 * EngineSession: the editor-facing facade. Owns one graph, its operator
 * library, script bridge, evaluation cache and configuration.
 *
 * Evaluation requests are numbered. A request is current while it is the
 * latest one and nothing has been edited since it was made; only current
 * results are published to subscribers.
 */

import { EvaluationCache, type EvaluationCacheStats } from './cache.js';
import { type EngineConfig, parseConfig } from './config.js';
import { EvaluationEngine, type EvaluationResult, noTargetResult } from './engine.js';
import { type Edge, Graph, type OperatorCatalog, type ReconcileReport } from './graph.js';
import { type Logger, StructuredLogger } from './logger.js';
import { createDefaultLibrary } from './operators/index.js';
import type { OperatorLibrary } from './operators/library.js';
import { type EvaluationPlan, buildPlan } from './plan.js';
import { ScriptBridge, type ScriptChangeResult, type ScriptSourceChange } from './scripting/bridge.js';
import { loadScriptDirectory } from './scripting/library-loader.js';
import type { Literal, NodeId, OperatorRef, OperatorSchema } from './types.js';

export interface EngineSessionOptions {
  /** Raw configuration; validated with EngineConfigSchema. */
  config?: unknown;
  library?: OperatorLibrary;
  logger?: Logger;
}

export type EvaluationListener = (result: EvaluationResult) => void;

export interface ReconciledNode extends ReconcileReport {
  nodeId: NodeId;
}

export interface ScriptUpdate extends ScriptChangeResult {
  /** Nodes whose slots were re-read because the script's schema changed. */
  reconciled: ReconciledNode[];
}

/** `"Box"` is shorthand for `{ kind: 'native', name: 'Box' }`, `"script:id"` for a scripted operator. */
export function toOperatorRef(operator: OperatorRef | string): OperatorRef {
  if (typeof operator !== 'string') return operator;
  return operator.startsWith('script:')
    ? { kind: 'scripted', scriptId: operator.slice('script:'.length) }
    : { kind: 'native', name: operator };
}

export class EngineSession implements OperatorCatalog {
  readonly config: EngineConfig;
  readonly library: OperatorLibrary;
  readonly bridge: ScriptBridge;
  readonly cache: EvaluationCache;
  readonly graph: Graph;
  readonly logger: Logger;
  private readonly engine: EvaluationEngine;
  private readonly listeners = new Set<EvaluationListener>();
  private requests = 0;
  private scriptEpoch = 0;
  private last: EvaluationResult | null = null;

  constructor(options: EngineSessionOptions = {}) {
    this.config = parseConfig(options.config ?? {});
    this.logger = options.logger ?? new StructuredLogger({ level: this.config.logLevel });
    this.library = options.library ?? createDefaultLibrary();
    this.bridge = new ScriptBridge({ timeoutMs: this.config.scriptTimeoutMs, logger: this.logger });
    this.cache = new EvaluationCache(this.config.cacheMaxEntries);
    this.graph = new Graph(this);
    this.engine = new EvaluationEngine({
      cache: this.cache,
      bridge: this.bridge,
      logger: this.logger,
      yieldEvery: this.config.yieldEvery,
    });
    if (this.config.scriptDirectory) {
      const loaded = loadScriptDirectory(this.config.scriptDirectory, this.bridge);
      this.logger.info('script directory loaded', {
        directory: this.config.scriptDirectory,
        scripts: loaded.length,
        failed: loaded.filter((r) => !r.loaded).map((r) => r.scriptId),
      });
    }
  }

  /** OperatorCatalog: the graph reads slot layouts through the session. */
  schemaOf(ref: OperatorRef): OperatorSchema {
    return ref.kind === 'native' ? this.library.get(ref.name) : this.bridge.schemaOf(ref.scriptId);
  }

  /** Result of the latest published evaluation. */
  get latestResult(): EvaluationResult | null {
    return this.last;
  }

  // ─── Edits ──────────────────────────────────────────────────────

  addNode(operator: OperatorRef | string, params: Readonly<Record<string, unknown>> = {}, label?: string): NodeId {
    const id = this.graph.addNode(toOperatorRef(operator), params, label);
    this.edited(true);
    return id;
  }

  removeNode(id: NodeId): Edge[] {
    const removed = this.graph.removeNode(id);
    this.edited(true);
    return removed;
  }

  addEdge(from: NodeId, fromSlot: string, to: NodeId, toSlot: string, options: { replace?: boolean } = {}): Edge {
    const edge = this.graph.addEdge(from, fromSlot, to, toSlot, options);
    this.edited(true);
    return edge;
  }

  removeEdge(to: NodeId, toSlot: string): Edge | undefined {
    const edge = this.graph.removeEdge(to, toSlot);
    if (edge) this.edited(true);
    return edge;
  }

  setParam(id: NodeId, slot: string, value: unknown): void {
    this.graph.setParam(id, slot, value);
    this.edited(false);
  }

  getParam(id: NodeId, slot: string): Literal | undefined {
    return this.graph.getParam(id, slot);
  }

  setLabel(id: NodeId, label: string | undefined): void {
    this.graph.setLabel(id, label);
  }

  setOutput(id: NodeId | null): void {
    this.graph.setOutput(id);
    this.edited(false);
  }

  // ─── Scripts ────────────────────────────────────────────────────

  defineScript(scriptId: string, source: string): ScriptUpdate {
    return this.applyScriptChange({ scriptId, source });
  }

  /**
   * Hot reload. The new source hash changes the fingerprint of every node
   * running the script; when the slot layout changed, those nodes are
   * reconciled and edges or parameters that no longer fit are dropped.
   */
  applyScriptChange(change: ScriptSourceChange): ScriptUpdate {
    const result = this.bridge.applyChange(change);
    const reconciled: ReconciledNode[] = [];
    if (result.schemaChanged) {
      for (const node of this.graph.nodes()) {
        if (node.operator.kind !== 'scripted' || node.operator.scriptId !== change.scriptId) continue;
        const report = this.graph.reconcileNode(node.id);
        reconciled.push({ nodeId: node.id, ...report });
        if (report.removedEdges.length > 0 || report.removedParams.length > 0) {
          this.logger.warn('script reload pruned node connections', {
            scriptId: change.scriptId,
            nodeId: node.id,
            removedEdges: report.removedEdges.map((e) => `${e.from}.${e.fromSlot} -> ${e.to}.${e.toSlot}`),
            removedParams: report.removedParams,
          });
        }
      }
    }
    if (result.changed) {
      this.scriptEpoch++;
      this.edited(reconciled.length > 0);
    }
    return { ...result, reconciled };
  }

  /**
   * Forget a script, e.g. when its file is deleted. Nodes running it keep
   * their slots and fail as not-loaded until the script is defined again.
   */
  removeScript(scriptId: string): boolean {
    if (!this.bridge.remove(scriptId)) return false;
    this.logger.info('script removed', { scriptId });
    this.scriptEpoch++;
    this.edited(false);
    return true;
  }

  // ─── Evaluation ─────────────────────────────────────────────────

  /**
   * Evaluate `target` (default: the designated output). The plan is
   * captured synchronously; the returned promise settles with this
   * request's result, which is published only if it is still current.
   */
  requestEvaluation(target: NodeId | null = this.graph.output): Promise<EvaluationResult> {
    const requestId = ++this.requests;
    if (target === null) {
      const result = noTargetResult(requestId);
      this.publish(result);
      return Promise.resolve(result);
    }
    let plan: EvaluationPlan;
    try {
      plan = buildPlan(this.graph, this.library, this.bridge, target, requestId);
    } catch (err) {
      return Promise.reject(err);
    }
    const stamp = this.stamp();
    const isCurrent = (): boolean => requestId === this.requests && stamp === this.stamp();
    return this.engine.run(plan, isCurrent).then((result) => {
      if (result.status !== 'superseded' && isCurrent()) this.publish(result);
      return result;
    });
  }

  /** Listen for published results. Returns the unsubscribe function. */
  subscribe(listener: EvaluationListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  cacheStats(): EvaluationCacheStats {
    return this.cache.stats();
  }

  clearCache(): void {
    this.cache.clear();
  }

  // ─── Internals ──────────────────────────────────────────────────

  private stamp(): string {
    return `${this.graph.version}:${this.scriptEpoch}`;
  }

  private edited(structural: boolean): void {
    if (structural && this.config.clearCacheOnStructuralEdit) this.cache.clear();
    if (this.config.autoEvaluate && this.graph.output !== null) this.scheduleEvaluation();
  }

  private scheduleEvaluation(): void {
    this.requestEvaluation().catch((err: unknown) => {
      this.logger.error('scheduled evaluation failed', err instanceof Error ? err : { error: String(err) });
    });
  }

  private publish(result: EvaluationResult): void {
    this.last = result;
    for (const listener of this.listeners) {
      try {
        listener(result);
      } catch (err) {
        this.logger.error('evaluation listener threw', err instanceof Error ? err : { error: String(err) });
      }
    }
  }
}
