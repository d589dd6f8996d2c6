import { MemoStore } from '../cache/memoize.js';
import type { ProbeEnv } from '../dx/config.js';
import { logInfo } from '../dx/logger.js';
import type { CommandRunner } from '../utils/runCommand.js';
import { resolveCompilerName } from './compilerName.js';
import type { CompilerId, CompilerVersion } from './compilerTypes.js';

export class CompilerVersionError extends Error {
  override name = 'CompilerVersionError';
  readonly code = 'VERSION_UNPARSABLE';
  readonly input: string;

  constructor(input: string) {
    super(`Could not convert version '${input}' to a tuple`);
    this.input = input;
  }
}

const VERSION_RE = /(\d+)(\.(\d+))?(\.(\d+))?(\.(\d+))?/;

function group(v: string | undefined, input: string): number {
  if (v === undefined) return 0;
  const n = Number.parseInt(v, 10);
  // Digit runs past 2^53 would lose precision; no real compiler reports one.
  if (!Number.isSafeInteger(n)) throw new CompilerVersionError(input);
  return n;
}

function parseUncached(input: string): CompilerVersion {
  const match = VERSION_RE.exec(input);
  if (!match) throw new CompilerVersionError(input);

  return Object.freeze({
    major: group(match[1], input),
    minor: group(match[3], input),
    revision: group(match[5], input),
    build: group(match[7], input),
  });
}

// Pure, so one table serves the whole process.
const processMemo = new MemoStore();

/**
 * Parses `major`, `major.minor`, `major.minor.revision` or
 * `major.minor.revision.build` found anywhere in `input`. Missing parts are 0.
 *
 * @throws CompilerVersionError when `input` contains no digits.
 */
export const parseCompilerVersion: (input: string) => CompilerVersion = processMemo.memoize(
  'parseCompilerVersion',
  parseUncached,
);

/**
 * Picks the string the version is parsed from.
 *
 * GNU-family ids ask the compiler itself (`-dumpversion`); this assumes a
 * wrapper such as mpicc reports the version of the gcc underneath. The Cray
 * PrgEnv-cray id reads `CRAY_CC_VERSION`. Everything else is `'0'`.
 */
export function resolveVersionString(
  compiler: CompilerId,
  run: CommandRunner,
  env: ProbeEnv,
): string {
  if (compiler.includes('gnu')) {
    return run([resolveCompilerName(compiler), '-dumpversion']);
  }
  if (compiler === 'cray-prgenv-cray') {
    return env.crayCcVersion ?? '0';
  }
  return '0';
}

export function resolveCompilerVersion(
  compiler: CompilerId,
  run: CommandRunner,
  env: ProbeEnv,
): CompilerVersion {
  const raw = resolveVersionString(compiler, run, env);
  const version = parseCompilerVersion(raw);
  logInfo('compiler version', { compiler, raw: raw.trim(), version: formatCompilerVersion(version) });
  return version;
}

const PARTS = ['major', 'minor', 'revision', 'build'] as const;

/** Lexicographic over major, minor, revision, build. */
export function compareCompilerVersions(a: CompilerVersion, b: CompilerVersion): -1 | 0 | 1 {
  for (const part of PARTS) {
    if (a[part] < b[part]) return -1;
    if (a[part] > b[part]) return 1;
  }
  return 0;
}

export function compilerVersionAtLeast(
  version: CompilerVersion,
  minimum: CompilerVersion | string,
): boolean {
  const min = typeof minimum === 'string' ? parseCompilerVersion(minimum) : minimum;
  return compareCompilerVersions(version, min) >= 0;
}

export function formatCompilerVersion(v: CompilerVersion): string {
  return `${v.major}.${v.minor}.${v.revision}.${v.build}`;
}
