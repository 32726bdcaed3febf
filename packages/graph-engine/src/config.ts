/**
 * Engine configuration. Every field has a default; `loadConfig` reads
 * overrides from MESHGRAPH_* environment variables:
 *
 *   MESHGRAPH_CACHE_MAX_ENTRIES           cacheMaxEntries
 *   MESHGRAPH_SCRIPT_TIMEOUT_MS           scriptTimeoutMs
 *   MESHGRAPH_YIELD_EVERY                 yieldEvery
 *   MESHGRAPH_CLEAR_CACHE_ON_STRUCTURAL_EDIT   clearCacheOnStructuralEdit
 *   MESHGRAPH_AUTO_EVALUATE               autoEvaluate
 *   MESHGRAPH_LOG_LEVEL                   logLevel
 *   MESHGRAPH_SCRIPT_DIR                  scriptDirectory
 */

import { z } from 'zod';
import { EngineError } from './errors.js';

const TRUE_LITERALS = new Set(['1', 'true', 'yes', 'on']);
const FALSE_LITERALS = new Set(['0', 'false', 'no', 'off']);

const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((v, ctx) => {
    if (typeof v === 'boolean') return v;
    const lower = v.trim().toLowerCase();
    if (TRUE_LITERALS.has(lower)) return true;
    if (FALSE_LITERALS.has(lower)) return false;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
    return z.NEVER;
  });

export const EngineConfigSchema = z.object({
  /** LRU budget of the evaluation cache, in entries (one entry per node result). */
  cacheMaxEntries: z.coerce.number().int().positive().default(256),
  /** Hard wall-clock budget of one script invocation. */
  scriptTimeoutMs: z.coerce.number().int().positive().default(250),
  /** Nodes evaluated between cooperative yields to the event loop. */
  yieldEvery: z.coerce.number().int().positive().default(16),
  clearCacheOnStructuralEdit: envBoolean.default(false),
  /** Schedule an evaluation after every edit. */
  autoEvaluate: envBoolean.default(false),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  /** Directory of *.js script operators loaded at startup. */
  scriptDirectory: z.string().min(1).optional(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

const ENV_KEYS: Record<keyof EngineConfig, string> = {
  cacheMaxEntries: 'MESHGRAPH_CACHE_MAX_ENTRIES',
  scriptTimeoutMs: 'MESHGRAPH_SCRIPT_TIMEOUT_MS',
  yieldEvery: 'MESHGRAPH_YIELD_EVERY',
  clearCacheOnStructuralEdit: 'MESHGRAPH_CLEAR_CACHE_ON_STRUCTURAL_EDIT',
  autoEvaluate: 'MESHGRAPH_AUTO_EVALUATE',
  logLevel: 'MESHGRAPH_LOG_LEVEL',
  scriptDirectory: 'MESHGRAPH_SCRIPT_DIR',
};

export function parseConfig(input: unknown = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new EngineError('config', `Invalid engine configuration: ${issues}`);
  }
  return result.data;
}

/** Defaults, overridden by environment variables, overridden by `overrides`. */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: EngineConfigInput = {},
): EngineConfig {
  const fromEnv: Record<string, string> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const raw = env[name]?.trim();
    if (raw) fromEnv[key] = raw;
  }
  return parseConfig({ ...fromEnv, ...overrides });
}
