import type { CommandRunner } from '../utils/runCommand.js';
import type { AtomicsProbeResult, CompilerName } from './compilerTypes.js';

const STDC_VERSION = '__STDC_VERSION__';
const STDC_NO_ATOMICS = '__STDC_NO_ATOMICS__';
const C11 = 201112;

export class AtomicsProbeOutputError extends Error {
  override name = 'AtomicsProbeOutputError';
  readonly output: string;

  constructor(message: string, output: string) {
    super(message);
    this.output = output;
  }
}

/**
 * Shell pipeline that preprocesses the two feature-test macros as C and drops
 * line markers. The flags work for gcc, clang and icc; other drivers may not
 * accept them.
 */
export function atomicsProbeCommand(compiler: CompilerName): string[] {
  return [
    'sh',
    '-c',
    `echo ${STDC_VERSION} ${STDC_NO_ATOMICS} | ${compiler} -E -x c - | sed -e '/^#/d'`,
  ];
}

/**
 * Reads the preprocessed `__STDC_VERSION__ __STDC_NO_ATOMICS__` pair.
 *
 * Standard atomics count as available only when the default mode is C11 or
 * newer and `__STDC_NO_ATOMICS__` stayed unexpanded. A compiler that defines
 * the macro for any other reason is still reported as unsupported.
 */
export function interpretAtomicsOutput(output: string): AtomicsProbeResult {
  const tokens = output.split(/\s+/).filter(Boolean);
  // Anything past the first two tokens is ignored.
  if (tokens.length < 2) {
    return {
      status: 'failed',
      error: new AtomicsProbeOutputError(
        `Expected 2 tokens from the preprocessor, got ${tokens.length}`,
        output,
      ),
    };
  }

  const [versionToken, atomicsToken] = tokens;
  const version = versionToken.replace(/L+$/, '');

  if (version === STDC_VERSION) {
    return { status: 'unsupported', reason: 'pre-c11' };
  }
  if (!/^\d+$/.test(version)) {
    return {
      status: 'failed',
      error: new AtomicsProbeOutputError(`Unexpected ${STDC_VERSION} value '${versionToken}'`, output),
    };
  }

  const stdcVersion = Number.parseInt(version, 10);
  if (stdcVersion < C11) {
    return { status: 'unsupported', reason: 'pre-c11', stdcVersion };
  }
  if (atomicsToken !== STDC_NO_ATOMICS) {
    return { status: 'unsupported', reason: 'no-atomics-macro', stdcVersion };
  }
  return { status: 'supported', stdcVersion };
}

export function probeStdAtomicsWith(compiler: CompilerName, run: CommandRunner): AtomicsProbeResult {
  if (compiler === 'other') {
    return { status: 'unsupported', reason: 'unknown-compiler' };
  }
  try {
    return interpretAtomicsOutput(run(atomicsProbeCommand(compiler)));
  } catch (err) {
    return { status: 'failed', error: err instanceof Error ? err : new Error(String(err)) };
  }
}
