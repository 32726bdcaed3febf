import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, describe, it, expect } from 'vitest';
import { box } from '@meshgraph/mesh-kernel';
import {
  ScriptBridge, ScriptError, UnknownOperatorError, fromScript, hostCall, loadScriptDirectory, meshToRecord,
  validateScript,
} from '../src/index.js';
import { expectFailed, expectOk, quietSession } from './helpers.js';

const PILLAR = `
defineNode({
  name: 'Pillar',
  inputs: [{ name: 'height', type: 'scalar', default: 2, min: 0 }],
  outputs: [{ name: 'mesh', type: 'mesh' }],
  run: function (inputs, Ops) {
    return { mesh: Ops.box([0, inputs.height / 2, 0], [1, inputs.height, 1]) };
  },
});
`;

const PILLAR_WIDE = `
defineNode({
  name: 'Pillar',
  inputs: [{ name: 'width', type: 'scalar', default: 1, min: 0 }],
  outputs: [{ name: 'mesh', type: 'mesh' }],
  run: function (inputs, Ops) {
    return { mesh: Ops.box([0, 1, 0], [inputs.width, 2, inputs.width]) };
  },
});
`;

function failingNode(source: string, config: Record<string, unknown> = {}) {
  const s = quietSession(config);
  const update = s.defineScript('probe', source);
  expect(update.error).toBeNull();
  const id = s.addNode('script:probe');
  s.setOutput(id);
  return { s, id };
}

async function scriptFailure(source: string, config: Record<string, unknown> = {}): Promise<ScriptError> {
  const { s } = failingNode(source, config);
  const { failure } = expectFailed(await s.requestEvaluation());
  if (!(failure.error instanceof ScriptError)) throw new Error(`expected a ScriptError, got ${failure.error.name}`);
  return failure.error;
}

describe('validateScript', () => {
  it('accepts a plain node definition', () => {
    expect(validateScript(PILLAR)).toEqual({ valid: true });
  });

  it('rejects blocked globals', () => {
    expect(validateScript('var fs = require("fs");')).toEqual({
      valid: false,
      kind: 'blocked',
      error: 'Blocked identifier "require" is not allowed in scripts',
    });
    expect(validateScript('process.exit(1);')).toMatchObject({ valid: false, kind: 'blocked' });
  });

  it('rejects blocked names used as string keys', () => {
    expect(validateScript('var f = [].map["constructor"];')).toEqual({
      valid: false,
      kind: 'blocked',
      error: 'Blocked string "constructor" is not allowed in scripts',
    });
  });

  it('rejects dynamic import', () => {
    expect(validateScript('import("fs");')).toEqual({
      valid: false,
      kind: 'blocked',
      error: 'Dynamic import() is not allowed in scripts',
    });
  });

  it('reports syntax errors', () => {
    expect(validateScript('defineNode({')).toMatchObject({ valid: false, kind: 'syntax' });
  });
});

describe('defining scripts', () => {
  it('reads the declared slots', () => {
    const s = quietSession();
    const update = s.defineScript('pillar', PILLAR);
    expect(update.loaded).toBe(true);
    expect(update.hash).toMatch(/^[0-9a-f]{64}$/);
    expect(s.schemaOf({ kind: 'scripted', scriptId: 'pillar' })).toEqual({
      inputs: [{ name: 'height', type: 'scalar', default: 2, min: 0 }],
      outputs: [{ name: 'mesh', type: 'mesh' }],
    });
    expect(s.bridge.get('pillar').definition?.name).toBe('Pillar');
  });

  it('names an anonymous node after its script', () => {
    const s = quietSession();
    s.defineScript('anon', 'defineNode({ outputs: [{ name: "n", type: "scalar" }], run: function () { return { n: 1 }; } });');
    expect(s.bridge.get('anon').definition?.name).toBe('anon');
  });

  it('reports a top-level throw as a runtime failure', () => {
    const s = quietSession();
    const update = s.defineScript('bad', 'throw new Error("bad");');
    expect(update.loaded).toBe(false);
    expect(update.error?.reason).toBe('runtime');
    expect(update.error?.detail).toBe('Error: bad');
  });

  it('requires exactly one defineNode call', () => {
    const s = quietSession();
    expect(s.defineScript('none', 'var x = 1;').error?.detail).toBe('script did not call defineNode');
    const twice = 'var d = { outputs: [{ name: "n", type: "scalar" }], run: function () { return { n: 1 }; } }; defineNode(d); defineNode(d);';
    expect(s.defineScript('twice', twice).error?.detail).toBe('defineNode may only be called once');
  });

  it('validates the declared schema', () => {
    const s = quietSession();
    const update = s.defineScript('empty', 'defineNode({ outputs: [], run: function () { return {}; } });');
    expect(update.error?.reason).toBe('validation');
    expect(update.error?.detail).toBe('outputs: a node needs at least one output');
  });

  it('rejects an enum default outside its options', () => {
    const s = quietSession();
    const source = 'defineNode({ inputs: [{ name: "m", type: "enum", options: ["a"], default: "b" }], outputs: [{ name: "n", type: "scalar" }], run: function () { return { n: 1 }; } });';
    const update = s.defineScript('enum', source);
    expect(update.error?.reason).toBe('validation');
    expect(update.error?.detail).toBe('default of input "m": parameter "m" must be one of [a], got "b"');
  });

  it('maps syntax errors to compile and blocked names to validation', () => {
    const s = quietSession();
    expect(s.defineScript('syntax', 'defineNode({').error?.reason).toBe('compile');
    expect(s.defineScript('blocked', 'globalThis.x = 1;').error?.reason).toBe('validation');
  });

  it('stops a script that never finishes loading', () => {
    const s = quietSession({ scriptTimeoutMs: 50 });
    const update = s.defineScript('spin', 'while (true) {}');
    expect(update.error?.reason).toBe('timeout');
    expect(update.error?.detail).toBe('exceeded 50 ms');
  });

  it('cannot create nodes for a script that never loaded', () => {
    const s = quietSession();
    s.defineScript('bad', 'throw new Error("bad");');
    expect(() => s.addNode('script:bad')).toThrow(UnknownOperatorError);
    expect(() => s.addNode('script:missing')).toThrow(UnknownOperatorError);
  });
});

describe('running scripts', () => {
  it('builds meshes through Ops', async () => {
    const s = quietSession();
    s.defineScript('pillar', PILLAR);
    const p = s.addNode('script:pillar', { height: 4 });
    s.setOutput(p);
    const result = expectOk(await s.requestEvaluation());
    expect(result.mesh?.vertexCount).toBe(8);
    expect(result.mesh?.bounds).toEqual({ min: [-0.5, 0, -0.5], max: [0.5, 4, 0.5] });
  });

  it('receives mesh inputs as records and returns several outputs', async () => {
    const s = quietSession();
    s.defineScript('counter', `
      defineNode({
        inputs: [{ name: 'mesh', type: 'mesh' }],
        outputs: [{ name: 'mesh', type: 'mesh' }, { name: 'faces', type: 'scalar' }],
        run: function (inputs) {
          return { mesh: inputs.mesh, faces: inputs.mesh.faces.length };
        },
      });
    `);
    const b = s.addNode('Box');
    const c = s.addNode('script:counter');
    s.addEdge(b, 'mesh', c, 'mesh');
    s.setOutput(c);
    const result = expectOk(await s.requestEvaluation());
    expect(result.outputs.get('faces')).toEqual({ type: 'scalar', value: 6 });
    expect(result.mesh?.vertexCount).toBe(8);
  });

  it('chains kernel operations', async () => {
    const s = quietSession();
    s.defineScript('tower', `
      defineNode({
        inputs: [{ name: 'mesh', type: 'mesh' }],
        outputs: [{ name: 'mesh', type: 'mesh' }],
        run: function (inputs, Ops) {
          return { mesh: Ops.subdivide(Ops.extrude(inputs.mesh, '1', 1), 1, 'linear') };
        },
      });
    `);
    const b = s.addNode('Box');
    const t = s.addNode('script:tower');
    s.addEdge(b, 'mesh', t, 'mesh');
    s.setOutput(t);
    const result = expectOk(await s.requestEvaluation());
    expect(result.mesh?.vertexCount).toBe(42);
    expect(result.mesh?.faceCount).toBe(40);
  });

  it('reports a throwing script as a ScriptError naming the node', async () => {
    const { s, id } = failingNode(`
      defineNode({ outputs: [{ name: 'mesh', type: 'mesh' }], run: function () { throw new Error('boom'); } });
    `);
    const result = expectFailed(await s.requestEvaluation());
    expect(result.failure.nodeId).toBe(id);
    expect(result.failure.error).toBeInstanceOf(ScriptError);
    expect(result.failure.error.message).toBe(`Script "probe" on node ${id} runtime: Error: boom`);
  });

  it('passes kernel errors from Ops back as runtime failures', async () => {
    const error = await scriptFailure(`
      defineNode({ outputs: [{ name: 'mesh', type: 'mesh' }], run: function (i, Ops) { return { mesh: Ops.box([0, 0, 0], [0, 1, 1]) }; } });
    `);
    expect(error.reason).toBe('runtime');
    expect(error.detail).toBe('Error: Ops.box: box size[0] must be a positive number, got 0');
  });

  it('times out a script that never returns', async () => {
    const error = await scriptFailure(`
      defineNode({ outputs: [{ name: 'mesh', type: 'mesh' }], run: function () { while (true) {} } });
    `, { scriptTimeoutMs: 50 });
    expect(error.reason).toBe('timeout');
  });

  it('rejects outputs of the wrong type', async () => {
    const error = await scriptFailure(`
      defineNode({ outputs: [{ name: 'mesh', type: 'mesh' }], run: function () { return { mesh: 42 }; } });
    `);
    expect(error.reason).toBe('invalid-output');
    expect(error.detail).toMatch(/^output "mesh": expected a mesh record/);
  });

  it('rejects missing and undeclared outputs', async () => {
    const missing = await scriptFailure(`
      defineNode({ outputs: [{ name: 'mesh', type: 'mesh' }], run: function () { return {}; } });
    `);
    expect(missing.detail).toBe('missing output "mesh"');
    const extra = await scriptFailure(`
      defineNode({ outputs: [{ name: 'n', type: 'scalar' }], run: function () { return { n: 1, m: 2 }; } });
    `);
    expect(extra.detail).toBe('undeclared output "m"');
  });

  it('rejects asynchronous results', async () => {
    const error = await scriptFailure(`
      defineNode({ outputs: [{ name: 'n', type: 'scalar' }], run: function () { return Promise.resolve({ n: 1 }); } });
    `);
    expect(error.reason).toBe('invalid-output');
    expect(error.detail).toBe('run must return its outputs synchronously');
  });

  it('rejects meshes with out-of-range faces', async () => {
    const error = await scriptFailure(`
      defineNode({
        outputs: [{ name: 'mesh', type: 'mesh' }],
        run: function () { return { mesh: { positions: [[0, 0, 0], [1, 0, 0], [0, 1, 0]], faces: [[0, 1, 3]] } }; },
      });
    `);
    expect(error.detail).toBe('output "mesh": Face 0 references vertex 3, but the mesh has 3 vertices');
  });
});

describe('sandbox boundary', () => {
  it('gives scripts no host globals', async () => {
    const { s } = failingNode(`
      var root = this;
      defineNode({
        outputs: [{ name: 'kind', type: 'string' }],
        run: function () { return { kind: typeof root['pro' + 'cess'] + '/' + typeof root['req' + 'uire'] }; },
      });
    `);
    const result = expectOk(await s.requestEvaluation());
    expect(result.outputs.get('kind')).toEqual({ type: 'string', value: 'undefined/undefined' });
  });

  it('disables code generation from strings', async () => {
    const error = await scriptFailure(`
      defineNode({
        outputs: [{ name: 'n', type: 'scalar' }],
        run: function () { var F = [].map['const' + 'ructor']; return { n: F('return 1')() }; },
      });
    `);
    expect(error.reason).toBe('runtime');
    expect(error.detail).toMatch(/^EvalError/);
  });

  it('runs every invocation in a fresh context', async () => {
    const s = quietSession();
    s.defineScript('counter', `
      var calls = 0;
      defineNode({ outputs: [{ name: 'calls', type: 'scalar' }], run: function () { calls++; return { calls: calls }; } });
    `);
    const a = s.addNode('script:counter');
    const b = s.addNode('script:counter');
    const first = expectOk(await s.requestEvaluation(a));
    const second = expectOk(await s.requestEvaluation(b));
    expect(first.outputs.get('calls')).toEqual({ type: 'scalar', value: 1 });
    expect(second.outputs.get('calls')).toEqual({ type: 'scalar', value: 1 });
  });

  it('answers unknown or malformed Ops calls with an error envelope', () => {
    expect(JSON.parse(hostCall('teleport', '[]'))).toEqual({ ok: false, error: 'Ops.teleport does not exist' });
    expect(JSON.parse(hostCall('box', '[1]'))).toMatchObject({ ok: false });
    const reply = JSON.parse(hostCall('box', JSON.stringify([[0, 0, 0], [2, 2, 2]])));
    expect(reply.ok).toBe(true);
    expect(reply.value.positions[7]).toEqual([1, 1, 1]);
  });
});

describe('marshalling', () => {
  it('round-trips a mesh record', () => {
    const record = meshToRecord(box([0, 0, 0], [2, 2, 2]));
    const back = fromScript('mesh', record);
    expect(back.ok).toBe(true);
    if (back.ok && back.value.type === 'mesh') expect(back.value.value.faces).toEqual(record.faces);
  });

  it('rejects non-finite numbers and short vectors', () => {
    expect(fromScript('scalar', null)).toEqual({ ok: false, error: 'expected a finite number' });
    expect(fromScript('vector', [1, 2])).toEqual({ ok: false, error: 'expected [x, y, z] of finite numbers' });
    expect(fromScript('selection', '0..2')).toEqual({ ok: true, value: { type: 'selection', value: '0..2' } });
  });
});

describe('hot reload', () => {
  function pillarScene() {
    const s = quietSession();
    s.defineScript('pillar', PILLAR);
    const p = s.addNode('script:pillar', { height: 4 });
    const b = s.addNode('Box', { center: [3, 0, 0] });
    const m = s.addNode('Merge');
    s.addEdge(p, 'mesh', m, 'a');
    s.addEdge(b, 'mesh', m, 'b');
    s.setOutput(m);
    return { s, p, b, m };
  }

  it('ignores a change to identical source', async () => {
    const { s } = pillarScene();
    await s.requestEvaluation();
    expect(s.applyScriptChange({ scriptId: 'pillar', source: PILLAR }).changed).toBe(false);
    expect(expectOk(await s.requestEvaluation()).stats.invocations).toBe(0);
  });

  it('fails the nodes of a removed script as not loaded', async () => {
    const { s, p, m } = pillarScene();
    expectOk(await s.requestEvaluation());
    expect(s.removeScript('pillar')).toBe(true);
    expect(s.removeScript('pillar')).toBe(false);

    const result = expectFailed(await s.requestEvaluation());
    expect(result.failure.nodeId).toBe(p);
    expect(result.failure.error).toBeInstanceOf(ScriptError);
    expect(result.failure.error.message).toBe(`Script "pillar" on node ${p} not-loaded: script is not registered`);
    expect(result.blocked).toEqual([m]);

    s.defineScript('pillar', PILLAR);
    expect(expectOk(await s.requestEvaluation()).stats.cacheHits).toBe(3);
  });

  it('recomputes exactly the nodes that run the script and their dependents', async () => {
    const { s, p, m } = pillarScene();
    await s.requestEvaluation();
    const update = s.applyScriptChange({ scriptId: 'pillar', source: PILLAR.replace('inputs.height / 2', 'inputs.height') });
    expect(update.loaded).toBe(true);
    expect(update.schemaChanged).toBe(false);
    const result = expectOk(await s.requestEvaluation());
    expect(result.stats.computed).toEqual([p, m]);
    expect(result.stats.cacheHits).toBe(1);
  });

  it('prunes edges and parameters that no longer fit the new schema', () => {
    const s = quietSession();
    s.defineScript('pillar', PILLAR);
    const k = s.addNode('MakeScalar', { value: 3 });
    const p = s.addNode('script:pillar');
    const q = s.addNode('script:pillar', { height: 5 });
    s.addEdge(k, 'value', p, 'height');

    const update = s.applyScriptChange({ scriptId: 'pillar', source: PILLAR_WIDE });
    expect(update.schemaChanged).toBe(true);
    expect(update.reconciled).toEqual([
      { nodeId: p, removedEdges: [{ from: k, fromSlot: 'value', to: p, toSlot: 'height' }], removedParams: [] },
      { nodeId: q, removedEdges: [], removedParams: ['height'] },
    ]);
    expect(s.graph.edges()).toEqual([]);
    expect(s.getParam(q, 'width')).toBe(1);
    expect(s.entries.filter((e) => e.message === 'script reload pruned node connections')).toHaveLength(2);
  });

  it('keeps nodes failing with the load error until the source is fixed', async () => {
    const { s, p } = pillarScene();
    const first = expectOk(await s.requestEvaluation());

    const broken = s.applyScriptChange({ scriptId: 'pillar', source: 'defineNode({' });
    expect(broken.loaded).toBe(false);
    expect(s.schemaOf({ kind: 'scripted', scriptId: 'pillar' }).inputs.map((i) => i.name)).toEqual(['height']);

    const failed = expectFailed(await s.requestEvaluation());
    expect(failed.failure.nodeId).toBe(p);
    expect(failed.failure.error).toBeInstanceOf(ScriptError);
    if (failed.failure.error instanceof ScriptError) expect(failed.failure.error.reason).toBe('compile');

    s.applyScriptChange({ scriptId: 'pillar', source: PILLAR });
    const restored = expectOk(await s.requestEvaluation());
    expect(restored.fingerprint).toBe(first.fingerprint);
    expect(restored.stats.invocations).toBe(0);
  });
});

describe('loadScriptDirectory', () => {
  let dir: string | undefined;
  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('registers every .js file under its base name', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'meshgraph-scripts-'));
    fs.writeFileSync(path.join(dir, 'pillar.js'), PILLAR);
    fs.writeFileSync(path.join(dir, 'broken.js'), 'defineNode({');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'not a script');

    const bridge = new ScriptBridge({ timeoutMs: 250 });
    const results = loadScriptDirectory(dir, bridge);
    expect(results.map((r) => [r.scriptId, r.loaded])).toEqual([['broken', false], ['pillar', true]]);
    expect(bridge.list().map((r) => r.id)).toEqual(['broken', 'pillar']);
  });

  it('is used by a session configured with a script directory', () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'meshgraph-scripts-'));
    fs.writeFileSync(path.join(dir, 'pillar.js'), PILLAR);
    const s = quietSession({ scriptDirectory: dir });
    expect(s.addNode('script:pillar')).toBe(1);
  });
});
