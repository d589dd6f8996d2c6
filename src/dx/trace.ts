import { performance } from 'node:perf_hooks';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

export const TRACE_ENV_VAR = 'BACKEND_CC_PROBE_TRACE';
export const TRACE_LEVEL_ENV_VAR = 'BACKEND_CC_PROBE_TRACE_LEVEL';

type TracePayload = {
  t: number;
  pid: number;
  level: TraceLevel;
  event: string;
  data?: unknown;
};

function envTraceEnabled(): boolean {
  const v = process.env[TRACE_ENV_VAR];
  return v === '1' || v === 'true' || v === 'yes';
}

function envTraceLevel(): TraceLevel {
  const v = (process.env[TRACE_LEVEL_ENV_VAR] ?? '').toLowerCase();
  if (v === 'error' || v === 'warn' || v === 'info' || v === 'debug') return v;
  return 'info';
}

const order: Record<TraceLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function shouldTrace(level: TraceLevel): boolean {
  if (!envTraceEnabled()) return false;
  return order[level] <= order[envTraceLevel()];
}

export function trace(level: TraceLevel, event: string, data?: unknown) {
  if (!shouldTrace(level)) return;

  const payload: TracePayload = {
    t: Number(performance.now().toFixed(3)),
    pid: process.pid,
    level,
    event,
  };
  if (data !== undefined) payload.data = data;

  // eslint-disable-next-line no-console
  console.error('[backend-cc-probe:trace]', JSON.stringify(payload));
}

export function traceWarn(event: string, data?: unknown) {
  trace('warn', event, data);
}

export function traceInfo(event: string, data?: unknown) {
  trace('info', event, data);
}

export function traceDebug(event: string, data?: unknown) {
  trace('debug', event, data);
}
