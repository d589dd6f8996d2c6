import { describe, it, expect } from 'vitest';

import { resolveCompilerName } from './compilerName.js';

describe('resolveCompilerName', () => {
  it('maps every GNU-family id to gcc', () => {
    for (const id of ['gnu', 'cray-prgenv-gnu', 'mpi-gnu', 'gnu-cross']) {
      expect(resolveCompilerName(id)).toBe('gcc');
    }
  });

  it('prefers the aarch64 cross compiler over the generic GNU rule', () => {
    expect(resolveCompilerName('aarch64-gnu')).toBe('aarch64-unknown-linux-gnu-gcc');
  });

  it('maps Cray PrgEnv wrappers to cc', () => {
    expect(resolveCompilerName('cray-prgenv-cray')).toBe('cc');
    expect(resolveCompilerName('cray-prgenv-intel')).toBe('cc');
    expect(resolveCompilerName('cray-prgenv-pgi')).toBe('cc');
  });

  it('maps exact vendor tags', () => {
    expect(resolveCompilerName('clang')).toBe('clang');
    expect(resolveCompilerName('intel')).toBe('icc');
    expect(resolveCompilerName('pgi')).toBe('pgcc');
  });

  it('falls back to other', () => {
    expect(resolveCompilerName('unknown-xyz')).toBe('other');
    expect(resolveCompilerName('')).toBe('other');
    // exact matches only
    expect(resolveCompilerName('clang-included')).toBe('other');
    expect(resolveCompilerName('cray-prgenv')).toBe('other');
  });
});
