/**
 * Leveled logger emitting one JSON line per entry.
 *
 * The MCP server writes to stderr because stdout carries the protocol;
 * tests pass `sink: 'silent'` or collect entries through `onEntry`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface Logger {
  debug(message: string, payload?: unknown): void;
  info(message: string, payload?: unknown): void;
  warn(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: 'stdout' | 'stderr' | 'silent';
  /** Called with every entry at or above the level, whatever the sink. */
  onEntry?: (entry: LogEntry) => void;
}

export class StructuredLogger implements Logger {
  private readonly threshold: number;
  private readonly sink: 'stdout' | 'stderr' | 'silent';
  private readonly onEntry?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
    this.sink = options.sink ?? 'stderr';
    this.onEntry = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log('debug', message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log('info', message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log('warn', message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log('error', message, payload);
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return;
    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (payload !== undefined) entry.payload = serializePayload(payload);
    this.onEntry?.(entry);
    if (this.sink === 'silent') return;
    const line = `${JSON.stringify(entry)}\n`;
    if (this.sink === 'stdout') process.stdout.write(line);
    else process.stderr.write(line);
  }
}

/** Errors do not survive JSON.stringify; flatten them first. */
function serializePayload(payload: unknown): unknown {
  if (payload instanceof Error) {
    return { name: payload.name, message: payload.message };
  }
  if (payload && typeof payload === 'object' && !Array.isArray(payload)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(payload)) {
      out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return out;
  }
  return payload;
}

export const silentLogger: Logger = new StructuredLogger({ sink: 'silent' });
