/**
 * Script execution in `node:vm` contexts.
 *
 * Every load and every invocation gets a fresh context, so scripts share no
 * state between calls. Code generation from strings is disabled inside the
 * context, promise jobs run before control returns (so they count against
 * the timeout), and everything the host reads back is a JSON string
 * produced inside the context: the host never touches a script object.
 */

import * as vm from 'node:vm';
import { z } from 'zod';
import { ScriptError } from '../errors.js';
import { type NodeDefinition, parseDefinition } from './definition.js';
import { type HostCall, SCRIPT_OP_NAMES, hostCall } from './ops.js';
import { validateScript } from './validate.js';

/**
 * Installed into each context before the script runs. Captures the builtins
 * it relies on, so a script replacing `JSON` cannot confuse the host.
 */
const PRELUDE = new vm.Script(`(function (root) {
  'use strict';
  var stringify = JSON.stringify;
  var parse = JSON.parse;
  var freeze = Object.freeze;
  var defineProperty = Object.defineProperty;
  var ErrorCtor = Error;

  return function install(hostCall, opNamesJson) {
    var definition = null;
    var calls = 0;
    var thrown = null;

    function describe(e) {
      try {
        if (e instanceof ErrorCtor) return String(e.name) + ': ' + String(e.message);
        return String(e);
      } catch (_) {
        return 'unprintable error';
      }
    }

    var Ops = {};
    var names = parse(opNamesJson);
    for (var i = 0; i < names.length; i++) {
      (function (name) {
        Ops[name] = function () {
          var args = [];
          for (var j = 0; j < arguments.length; j++) args.push(arguments[j]);
          var reply = parse(hostCall(name, stringify(args)));
          if (!reply.ok) throw new ErrorCtor(reply.error);
          return reply.value;
        };
      })(names[i]);
    }
    freeze(Ops);

    defineProperty(root, 'defineNode', {
      value: function defineNode(def) {
        calls++;
        if (calls === 1) definition = def;
      },
    });

    defineProperty(root, '__meshgraph', {
      value: freeze({
        fail: function (e) {
          if (thrown === null) thrown = describe(e);
        },
        status: function () {
          if (thrown !== null) return stringify({ ok: false, reason: 'runtime', error: thrown });
          if (calls === 0) return stringify({ ok: false, reason: 'validation', error: 'script did not call defineNode' });
          if (calls > 1) return stringify({ ok: false, reason: 'validation', error: 'defineNode may only be called once' });
          if (definition === null || typeof definition !== 'object') {
            return stringify({ ok: false, reason: 'validation', error: 'defineNode expects an object' });
          }
          try {
            return stringify({
              ok: true,
              value: {
                name: definition.name,
                description: definition.description,
                inputs: definition.inputs,
                outputs: definition.outputs,
                runnable: typeof definition.run === 'function',
              },
            });
          } catch (e) {
            return stringify({ ok: false, reason: 'validation', error: 'node definition is not serializable: ' + describe(e) });
          }
        },
        invoke: function (inputJson) {
          var result;
          try {
            result = definition.run(parse(inputJson), Ops);
          } catch (e) {
            return stringify({ ok: false, reason: 'runtime', error: describe(e) });
          }
          if (result !== null && typeof result === 'object' && typeof result.then === 'function') {
            return stringify({ ok: false, reason: 'invalid-output', error: 'run must return its outputs synchronously' });
          }
          try {
            return stringify({ ok: true, value: result === undefined ? null : result });
          } catch (e) {
            return stringify({ ok: false, reason: 'invalid-output', error: 'outputs are not serializable: ' + describe(e) });
          }
        },
      }),
    });
  };
})(this)`, { filename: 'meshgraph:prelude' });

const EnvelopeSchema = z.discriminatedUnion('ok', [
  z.object({ ok: z.literal(true), value: z.unknown() }),
  z.object({ ok: z.literal(false), reason: z.enum(['runtime', 'validation', 'invalid-output']), error: z.string() }),
]);

type Envelope = z.infer<typeof EnvelopeSchema>;

export interface SandboxOptions {
  /** Wall-clock budget of each load and each invocation. */
  timeoutMs: number;
  /** Host side of the `Ops` table. */
  hostCall?: HostCall;
  opNames?: readonly string[];
}

/** A script source that passed static validation and compiled. */
export interface CompiledScript {
  readonly scriptId: string;
  readonly script: vm.Script;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ERR_SCRIPT_EXECUTION_TIMEOUT';
}

export class ScriptSandbox {
  private readonly timeoutMs: number;
  private readonly hostCall: HostCall;
  private readonly opNames: string;

  constructor(options: SandboxOptions) {
    this.timeoutMs = options.timeoutMs;
    this.hostCall = options.hostCall ?? hostCall;
    this.opNames = JSON.stringify(options.opNames ?? SCRIPT_OP_NAMES);
  }

  /** Static validation and compilation. Throws ScriptError (compile | validation). */
  compile(scriptId: string, source: string): CompiledScript {
    const check = validateScript(source);
    if (!check.valid) {
      throw new ScriptError(check.kind === 'syntax' ? 'compile' : 'validation', scriptId, check.error);
    }
    try {
      // The source is wrapped so a top-level throw is described inside the
      // context; the trailing status() call is the script's completion value.
      const wrapped = `try {\n${source}\n} catch (e) { __meshgraph.fail(e); }\n__meshgraph.status();`;
      return { scriptId, script: new vm.Script(wrapped, { filename: `${scriptId}.js`, lineOffset: -1 }) };
    } catch (err) {
      throw new ScriptError('compile', scriptId, err instanceof Error ? err.message : 'compilation failed');
    }
  }

  /** Run the script once and read back the node it defines. */
  load(compiled: CompiledScript): NodeDefinition {
    const context = this.createContext(compiled.scriptId);
    const raw = this.unwrap(compiled.scriptId, this.run(compiled, () => compiled.script.runInContext(context, { timeout: this.timeoutMs })));
    const result = parseDefinition(raw, compiled.scriptId);
    if (!result.ok) throw new ScriptError('validation', compiled.scriptId, result.error);
    return result.definition;
  }

  /**
   * Run the script's `run(inputs, Ops)` in a fresh context and return its
   * raw (JSON-parsed) result. Output types are checked by the caller.
   */
  invoke(compiled: CompiledScript, inputs: Readonly<Record<string, unknown>>): unknown {
    const context = this.createContext(compiled.scriptId);
    const deadline = Date.now() + this.timeoutMs;
    this.unwrap(compiled.scriptId, this.run(compiled, () => compiled.script.runInContext(context, { timeout: this.timeoutMs })));
    const remaining = Math.max(1, deadline - Date.now());
    const call = `__meshgraph.invoke(${JSON.stringify(JSON.stringify(inputs))})`;
    return this.unwrap(compiled.scriptId, this.run(compiled, () => vm.runInContext(call, context, { timeout: remaining })));
  }

  private createContext(scriptId: string): vm.Context {
    const context = vm.createContext({}, {
      name: `script:${scriptId}`,
      codeGeneration: { strings: false, wasm: false },
      microtaskMode: 'afterEvaluate',
    });
    const install: unknown = PRELUDE.runInContext(context);
    if (typeof install !== 'function') throw new ScriptError('runtime', scriptId, 'sandbox prelude did not initialize');
    install(this.hostCall, this.opNames);
    return context;
  }

  private run(compiled: CompiledScript, body: () => unknown): Envelope {
    let reply: unknown;
    try {
      reply = body();
    } catch (err) {
      if (isTimeout(err)) {
        throw new ScriptError('timeout', compiled.scriptId, `exceeded ${this.timeoutMs} ms`);
      }
      throw new ScriptError('runtime', compiled.scriptId, err instanceof Error ? err.message : 'script aborted');
    }
    if (typeof reply !== 'string') {
      throw new ScriptError('runtime', compiled.scriptId, 'script produced no result');
    }
    let json: unknown;
    try {
      json = JSON.parse(reply);
    } catch {
      throw new ScriptError('runtime', compiled.scriptId, 'malformed reply from script context');
    }
    const parsed = EnvelopeSchema.safeParse(json);
    if (!parsed.success) throw new ScriptError('runtime', compiled.scriptId, 'malformed reply from script context');
    return parsed.data;
  }

  private unwrap(scriptId: string, envelope: Envelope): unknown {
    if (!envelope.ok) throw new ScriptError(envelope.reason, scriptId, envelope.error);
    return envelope.value;
  }
}
