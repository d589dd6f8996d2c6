import type { CompilerId, CompilerName } from './compilerTypes.js';

export const AARCH64_GNU_ID = 'aarch64-gnu';
export const PRGENV_PREFIX = 'cray-prgenv';

export function resolveCompilerName(compiler: CompilerId): CompilerName {
  if (compiler === AARCH64_GNU_ID) return 'aarch64-unknown-linux-gnu-gcc';
  if (compiler.includes('gnu')) return 'gcc';
  if (compiler.startsWith(`${PRGENV_PREFIX}-`)) return 'cc';
  if (compiler === 'clang') return 'clang';
  if (compiler === 'intel') return 'icc';
  if (compiler === 'pgi') return 'pgcc';
  return 'other';
}
