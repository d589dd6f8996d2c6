import { describe, it, expect, afterEach, vi } from 'vitest';

import { TRACE_ENV_VAR, TRACE_LEVEL_ENV_VAR, shouldTrace, traceInfo } from './trace.js';

describe('dx trace', () => {
  const prevTrace = process.env[TRACE_ENV_VAR];
  const prevLevel = process.env[TRACE_LEVEL_ENV_VAR];

  afterEach(() => {
    vi.restoreAllMocks();
    if (prevTrace == null) delete process.env[TRACE_ENV_VAR];
    else process.env[TRACE_ENV_VAR] = prevTrace;
    if (prevLevel == null) delete process.env[TRACE_LEVEL_ENV_VAR];
    else process.env[TRACE_LEVEL_ENV_VAR] = prevLevel;
  });

  it('is off unless the env var is set', () => {
    delete process.env[TRACE_ENV_VAR];
    expect(shouldTrace('error')).toBe(false);
  });

  it('defaults to info level', () => {
    process.env[TRACE_ENV_VAR] = '1';
    delete process.env[TRACE_LEVEL_ENV_VAR];
    expect(shouldTrace('info')).toBe(true);
    expect(shouldTrace('debug')).toBe(false);
  });

  it('honours an explicit level', () => {
    process.env[TRACE_ENV_VAR] = 'yes';
    process.env[TRACE_LEVEL_ENV_VAR] = 'DEBUG';
    expect(shouldTrace('debug')).toBe(true);
  });

  it('writes one JSON line per event', () => {
    process.env[TRACE_ENV_VAR] = 'true';
    delete process.env[TRACE_LEVEL_ENV_VAR];
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    traceInfo('version.resolved', { compiler: 'gnu' });

    expect(log).toHaveBeenCalledTimes(1);
    const [prefix, line] = log.mock.calls[0];
    expect(prefix).toBe('[backend-cc-probe:trace]');
    const payload = JSON.parse(String(line));
    expect(payload.level).toBe('info');
    expect(payload.event).toBe('version.resolved');
    expect(payload.data).toEqual({ compiler: 'gnu' });
    expect(payload.pid).toBe(process.pid);
  });
});
