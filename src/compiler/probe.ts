import { MemoStore } from '../cache/memoize.js';
import { readProbeEnv } from '../dx/config.js';
import { logDebug } from '../dx/logger.js';
import { traceInfo } from '../dx/trace.js';
import { runCommand, type CommandRunner } from '../utils/runCommand.js';
import { which } from '../utils/which.js';
import { resolveCompilerName } from './compilerName.js';
import { resolveCompilerVersion } from './compilerVersion.js';
import type {
  AtomicsProbeResult,
  CompilerId,
  CompilerName,
  CompilerVersion,
} from './compilerTypes.js';
import { isPrgEnvCompiler } from './prgEnv.js';
import { probeStdAtomicsWith } from './stdAtomics.js';

export type CompilerProbeOptions = {
  /** Process runner; defaults to `runCommand`. */
  run?: CommandRunner;
  /** Environment to read; defaults to the live `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** PATH lookup used for summaries; defaults to `which`. */
  which?: (cmd: string) => string | null;
};

export type BackendCompilerSummary = {
  id: CompilerId;
  name: CompilerName;
  /** Absolute path of `name` on PATH, if found. */
  path: string | null;
  version: CompilerVersion | null;
  /** Set when the version could not be determined. */
  versionError?: string;
  prgEnv: boolean;
  stdAtomics: AtomicsProbeResult;
};

export type CompilerProbe = {
  getCompilerName(compiler: CompilerId): CompilerName;
  /** @throws CommandError, CompilerVersionError */
  getCompilerVersion(compiler: CompilerId): CompilerVersion;
  /** Not memoized: reads the environment on every call. */
  compilerIsPrgEnv(compiler: CompilerId): boolean;
  probeStdAtomics(compiler: CompilerId): AtomicsProbeResult;
  /** `probeStdAtomics` collapsed to a boolean. Never throws. */
  hasStdAtomics(compiler: CompilerId): boolean;
  describe(compiler: CompilerId): BackendCompilerSummary;
  /** Results cached by this probe, for diagnostics and tests. */
  readonly cache: MemoStore;
};

/**
 * Creates a probe whose answers are cached for its own lifetime, which is
 * meant to be one configuration run.
 */
export function createCompilerProbe(options: CompilerProbeOptions = {}): CompilerProbe {
  const run = options.run ?? runCommand;
  const env = options.env ?? process.env;
  const lookup = options.which ?? ((cmd: string) => which(cmd));
  const cache = new MemoStore();

  const getCompilerName = cache.memoize('getCompilerName', resolveCompilerName);

  const getCompilerVersion = cache.memoize('getCompilerVersion', (compiler: CompilerId) =>
    resolveCompilerVersion(compiler, run, readProbeEnv(env)),
  );

  const compilerIsPrgEnv = (compiler: CompilerId) =>
    isPrgEnvCompiler(compiler, readProbeEnv(env));

  const probeStdAtomics = cache.memoize('probeStdAtomics', (compiler: CompilerId) => {
    const result = probeStdAtomicsWith(getCompilerName(compiler), run);
    if (result.status === 'failed') {
      logDebug('std atomics probe failed', { compiler, error: result.error.message });
    }
    traceInfo('atomics.probed', { compiler, status: result.status });
    return result;
  });

  const hasStdAtomics = (compiler: CompilerId) =>
    probeStdAtomics(compiler).status === 'supported';

  function describe(compiler: CompilerId): BackendCompilerSummary {
    const name = getCompilerName(compiler);
    const summary: BackendCompilerSummary = {
      id: compiler,
      name,
      path: name === 'other' ? null : lookup(name),
      version: null,
      prgEnv: compilerIsPrgEnv(compiler),
      stdAtomics: probeStdAtomics(compiler),
    };
    try {
      summary.version = getCompilerVersion(compiler);
    } catch (err) {
      summary.versionError = err instanceof Error ? err.message : String(err);
    }
    return summary;
  }

  return {
    getCompilerName,
    getCompilerVersion,
    compilerIsPrgEnv,
    probeStdAtomics,
    hasStdAtomics,
    describe,
    cache,
  };
}
