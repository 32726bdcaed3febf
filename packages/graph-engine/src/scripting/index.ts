export { ScriptBridge, scriptVersion } from './bridge.js';
export type { ScriptBridgeOptions, ScriptChangeResult, ScriptRecord, ScriptSourceChange } from './bridge.js';
export { ScriptSandbox } from './sandbox.js';
export type { CompiledScript, SandboxOptions } from './sandbox.js';
export { parseDefinition } from './definition.js';
export type { NodeDefinition } from './definition.js';
export { MeshRecordSchema, fromScript, meshFromRecord, meshToRecord, toScript } from './marshal.js';
export type { MeshRecord, ScriptValue } from './marshal.js';
export { SCRIPT_OP_NAMES, hostCall } from './ops.js';
export { validateScript } from './validate.js';
export type { ValidationResult } from './validate.js';
export { loadScriptDirectory } from './library-loader.js';
