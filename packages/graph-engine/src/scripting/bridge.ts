/**
 * Scripted Node Bridge: the registry of script operators.
 *
 * A script's operator version is the SHA-256 of its source, so changing the
 * source changes the fingerprint of every node running it and nothing else.
 * A reload that fails keeps the last good schema (so the graph keeps its
 * shape) and records the failure; nodes running the script then fail with
 * that error until a good source arrives.
 */

import { ScriptError, UnknownOperatorError } from '../errors.js';
import { sha256 } from '../fingerprint.js';
import { type Logger, silentLogger } from '../logger.js';
import type { NodeId, OperatorSchema, Outputs, Value } from '../types.js';
import type { NodeDefinition } from './definition.js';
import { fromScript, toScript } from './marshal.js';
import { type CompiledScript, ScriptSandbox } from './sandbox.js';

/** Immutable view of one script; replaced, never mutated, on change. */
export interface ScriptRecord {
  readonly id: string;
  readonly source: string;
  readonly hash: string;
  /** Last successfully loaded definition. */
  readonly definition: NodeDefinition | null;
  /** Source `definition` was loaded from; differs from `source` after a failed reload. */
  readonly loadedSource: string | null;
  readonly compiled: CompiledScript | null;
  /** Set when the current source failed to load. */
  readonly loadError: ScriptError | null;
}

/** Notification that a script's source text changed. */
export interface ScriptSourceChange {
  scriptId: string;
  source: string;
}

export interface ScriptChangeResult {
  scriptId: string;
  hash: string;
  loaded: boolean;
  error: ScriptError | null;
  /** True when the slot layout differs from the previous definition. */
  schemaChanged: boolean;
  /** False when the source is identical to the registered one. */
  changed: boolean;
}

export interface ScriptBridgeOptions {
  timeoutMs: number;
  logger?: Logger;
  sandbox?: ScriptSandbox;
}

const SCRIPT_ID = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

export function scriptVersion(record: ScriptRecord): string {
  return `script:${record.id}@${record.hash}`;
}

function sameSchema(a: OperatorSchema | null, b: OperatorSchema | null): boolean {
  return JSON.stringify(a && { inputs: a.inputs, outputs: a.outputs }) === JSON.stringify(b && { inputs: b.inputs, outputs: b.outputs });
}

export class ScriptBridge {
  private readonly scripts = new Map<string, ScriptRecord>();
  private readonly sandbox: ScriptSandbox;
  private readonly logger: Logger;

  constructor(options: ScriptBridgeOptions) {
    this.sandbox = options.sandbox ?? new ScriptSandbox({ timeoutMs: options.timeoutMs });
    this.logger = options.logger ?? silentLogger;
  }

  /** Register a new script or replace the source of an existing one. */
  applyChange(change: ScriptSourceChange): ScriptChangeResult {
    const { scriptId, source } = change;
    if (!SCRIPT_ID.test(scriptId)) {
      throw new ScriptError('validation', scriptId, 'script ids may only contain letters, digits, "_", "-" and "."');
    }
    const previous = this.scripts.get(scriptId) ?? null;
    const hash = sha256(source);
    if (previous && previous.hash === hash) {
      return { scriptId, hash, loaded: previous.loadError === null, error: previous.loadError, schemaChanged: false, changed: false };
    }

    let record: ScriptRecord;
    try {
      const compiled = this.sandbox.compile(scriptId, source);
      const definition = this.sandbox.load(compiled);
      record = { id: scriptId, source, hash, definition, loadedSource: source, compiled, loadError: null };
      this.logger.debug('script loaded', { scriptId, hash });
    } catch (err) {
      if (!(err instanceof ScriptError)) throw err;
      record = {
        id: scriptId,
        source,
        hash,
        definition: previous?.definition ?? null,
        loadedSource: previous?.loadedSource ?? null,
        compiled: null,
        loadError: err,
      };
      this.logger.warn('script failed to load', { scriptId, reason: err.reason, detail: err.detail });
    }
    this.scripts.set(scriptId, record);
    return {
      scriptId,
      hash,
      loaded: record.loadError === null,
      error: record.loadError,
      schemaChanged: !sameSchema(previous?.definition ?? null, record.definition),
      changed: true,
    };
  }

  /** Shorthand for applyChange when defining a script. */
  register(scriptId: string, source: string): ScriptChangeResult {
    return this.applyChange({ scriptId, source });
  }

  remove(scriptId: string): boolean {
    return this.scripts.delete(scriptId);
  }

  has(scriptId: string): boolean {
    return this.scripts.has(scriptId);
  }

  get(scriptId: string): ScriptRecord {
    const record = this.scripts.get(scriptId);
    if (!record) throw new UnknownOperatorError(`script:${scriptId}`);
    return record;
  }

  list(): ScriptRecord[] {
    return [...this.scripts.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  }

  /**
   * Slot layout of a script operator. A script that has never loaded has no
   * layout, so nodes cannot be created for it yet.
   */
  schemaOf(scriptId: string): OperatorSchema {
    const record = this.get(scriptId);
    if (!record.definition) {
      throw new UnknownOperatorError(`script:${scriptId} (not loaded: ${record.loadError?.detail ?? 'no definition'})`);
    }
    return { inputs: record.definition.inputs, outputs: record.definition.outputs };
  }

  /**
   * Run a script for one node. Inputs are marshalled to JSON, outputs are
   * parsed back and must cover exactly the declared output slots. Every
   * failure surfaces as a ScriptError naming the node.
   */
  invoke(record: ScriptRecord, inputs: ReadonlyMap<string, Value>, nodeId: NodeId): Outputs {
    try {
      if (record.loadError) throw record.loadError;
      if (!record.compiled || !record.definition) {
        throw new ScriptError('not-loaded', record.id, 'script has no loaded definition');
      }
      const args: Record<string, unknown> = {};
      for (const [name, value] of inputs) args[name] = toScript(value);
      const raw = this.sandbox.invoke(record.compiled, args);
      return this.readOutputs(record, record.definition, raw);
    } catch (err) {
      if (err instanceof ScriptError) throw err.atNode(nodeId);
      throw new ScriptError('runtime', record.id, err instanceof Error ? err.message : String(err), nodeId);
    }
  }

  private readOutputs(record: ScriptRecord, definition: NodeDefinition, raw: unknown): Outputs {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new ScriptError('invalid-output', record.id, 'run must return an object keyed by output name');
    }
    const declared = new Set(definition.outputs.map((o) => o.name));
    for (const key of Object.keys(raw)) {
      if (!declared.has(key)) throw new ScriptError('invalid-output', record.id, `undeclared output "${key}"`);
    }
    const entries = new Map<string, unknown>(Object.entries(raw));
    const outputs = new Map<string, Value>();
    for (const slot of definition.outputs) {
      if (!entries.has(slot.name)) throw new ScriptError('invalid-output', record.id, `missing output "${slot.name}"`);
      const parsed = fromScript(slot.type, entries.get(slot.name));
      if (!parsed.ok) throw new ScriptError('invalid-output', record.id, `output "${slot.name}": ${parsed.error}`);
      outputs.set(slot.name, parsed.value);
    }
    return outputs;
  }
}
