// Session and graph
export { EngineSession, toOperatorRef } from './session.js';
export type { EngineSessionOptions, EvaluationListener, ReconciledNode, ScriptUpdate } from './session.js';
export { Graph } from './graph.js';
export type { Edge, GraphNode, OperatorCatalog, ReconcileReport } from './graph.js';
export type {
  DataType, InputSlot, Literal, NodeId, OperatorRef, OperatorSchema, OutputSlot, Outputs, Value,
} from './types.js';
export { DATA_TYPES, operatorLabel } from './types.js';
export { canConnect, coerceValue, defaultLiteral, describeValue, literalToValue, validateLiteral } from './slots.js';

// Evaluation
export { EvaluationEngine, noTargetResult } from './engine.js';
export type { EvaluationEngineOptions, EvaluationResult, EvaluationStats, NodeFailure } from './engine.js';
export { buildPlan } from './plan.js';
export type { EvaluationPlan, PlannedInput, PlannedNode, PlannedOperator, PlannedSource } from './plan.js';
export { EvaluationCache } from './cache.js';
export type { CacheEntry, EvaluationCacheStats } from './cache.js';
export { canonicalJson, fingerprintNode, sha256 } from './fingerprint.js';
export type { Fingerprint, FingerprintInput } from './fingerprint.js';

// Operators
export {
  BUILTIN_OPERATORS, createDefaultLibrary, OperatorLibrary, OperatorInputs, defineOperator,
  meshValue, scalarValue, vectorValue,
} from './operators/index.js';
export type { NativeOperator, OperatorCategory } from './operators/index.js';

// Scripting
export * from './scripting/index.js';

// Persistence
export {
  DOCUMENT_FORMAT, DOCUMENT_VERSION, GraphDocumentSchema,
  deserializeSession, documentFromJson, documentToJson, parseDocument, serializeSession,
} from './serialization.js';
export type { GraphDocument } from './serialization.js';

// Ambient
export {
  CacheConsistencyError, CycleError, DocumentFormatError, EngineError, GeometryError, GraphStructureError,
  InvalidParameterError, OperatorError, ScriptError, SlotOccupiedError, TypeMismatchError, UnknownNodeError,
  UnknownOperatorError, UnknownSlotError, isEvalError,
} from './errors.js';
export type { EvalError, ScriptFailure } from './errors.js';
export { EngineConfigSchema, loadConfig, parseConfig } from './config.js';
export type { EngineConfig, EngineConfigInput } from './config.js';
export { LOG_LEVELS, StructuredLogger, silentLogger } from './logger.js';
export type { LogEntry, LogLevel, Logger, LoggerOptions } from './logger.js';
