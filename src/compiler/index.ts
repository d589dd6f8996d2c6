import type { AtomicsProbeResult, CompilerId, CompilerName, CompilerVersion } from './compilerTypes.js';
import { createCompilerProbe, type BackendCompilerSummary, type CompilerProbe } from './probe.js';

let defaultProbe: CompilerProbe | null = null;

function probe(): CompilerProbe {
  if (!defaultProbe) defaultProbe = createCompilerProbe();
  return defaultProbe;
}

/** Drops the process-wide probe and everything it cached. For tests only. */
export function resetDefaultProbe() {
  defaultProbe = null;
}

export function getCompilerName(compiler: CompilerId): CompilerName {
  return probe().getCompilerName(compiler);
}

export function getCompilerVersion(compiler: CompilerId): CompilerVersion {
  return probe().getCompilerVersion(compiler);
}

export function compilerIsPrgEnv(compiler: CompilerId): boolean {
  return probe().compilerIsPrgEnv(compiler);
}

export function probeStdAtomics(compiler: CompilerId): AtomicsProbeResult {
  return probe().probeStdAtomics(compiler);
}

export function hasStdAtomics(compiler: CompilerId): boolean {
  return probe().hasStdAtomics(compiler);
}

export function describeBackendCompiler(compiler: CompilerId): BackendCompilerSummary {
  return probe().describe(compiler);
}

export { createCompilerProbe } from './probe.js';
export type { BackendCompilerSummary, CompilerProbe, CompilerProbeOptions } from './probe.js';
export {
  CompilerVersionError,
  compareCompilerVersions,
  compilerVersionAtLeast,
  formatCompilerVersion,
  parseCompilerVersion,
} from './compilerVersion.js';
export { AtomicsProbeOutputError } from './stdAtomics.js';
export type {
  AtomicsProbeResult,
  AtomicsUnsupportedReason,
  CompilerId,
  CompilerName,
  CompilerVersion,
} from './compilerTypes.js';
