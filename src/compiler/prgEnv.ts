import type { ProbeEnv } from '../dx/config.js';
import { PRGENV_PREFIX } from './compilerName.js';
import type { CompilerId } from './compilerTypes.js';

/**
 * True when the compiler is a Cray PrgEnv wrapper, or when the compiler that
 * was originally requested (before a wrapper replaced it) was one.
 */
export function isPrgEnvCompiler(compiler: CompilerId, env: ProbeEnv): boolean {
  return (
    compiler.startsWith(PRGENV_PREFIX) ||
    (env.origTargetCompiler ?? '').startsWith(PRGENV_PREFIX)
  );
}
