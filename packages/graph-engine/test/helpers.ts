import { EngineSession, StructuredLogger, type EvaluationResult, type LogEntry } from '../src/index.js';

/** Session with a silent logger; `entries` collects whatever was logged. */
export function quietSession(config: Record<string, unknown> = {}): EngineSession & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({ level: 'debug', sink: 'silent', onEntry: (e) => entries.push(e) });
  return Object.assign(new EngineSession({ config, logger }), { entries });
}

export function expectOk(result: EvaluationResult): Extract<EvaluationResult, { status: 'ok' }> {
  if (result.status !== 'ok') {
    const detail = result.status === 'failed' ? `: ${result.failure.error.message}` : '';
    throw new Error(`expected an ok evaluation, got ${result.status}${detail}`);
  }
  return result;
}

export function expectFailed(result: EvaluationResult): Extract<EvaluationResult, { status: 'failed' }> {
  if (result.status !== 'failed') throw new Error(`expected a failed evaluation, got ${result.status}`);
  return result;
}
