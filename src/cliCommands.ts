import { readProbeEnv } from './dx/config.js';
import { setDebugEnabled } from './dx/logger.js';
import { formatCompilerVersion } from './compiler/compilerVersion.js';
import type { AtomicsProbeResult } from './compiler/compilerTypes.js';
import {
  createCompilerProbe,
  type BackendCompilerSummary,
  type CompilerProbe,
} from './compiler/probe.js';

export type CliIo = {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
};

const COMMANDS = ['name', 'version', 'prgenv', 'atomics', 'show'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(v: string): v is Command {
  return COMMANDS.some((c) => c === v);
}

export function usage(): string {
  return `backend-cc-probe

Usage:
	backend-cc-probe name <compiler>
	backend-cc-probe version <compiler>
	backend-cc-probe prgenv <compiler>
	backend-cc-probe atomics <compiler>
	backend-cc-probe show <compiler> [--json]

Options:
	--json    show: print the summary as JSON
	--debug   log probe details to stderr

Notes:
	- <compiler> defaults to $CHPL_TARGET_COMPILER
	- Examples: gnu, clang, intel, pgi, aarch64-gnu, cray-prgenv-gnu
`;
}

function describeAtomics(r: AtomicsProbeResult): string {
  switch (r.status) {
    case 'supported':
      return `supported (__STDC_VERSION__ ${r.stdcVersion})`;
    case 'unsupported':
      return `unsupported (${r.reason})`;
    case 'failed':
      return `failed (${r.error.message})`;
  }
}

function summaryLines(s: BackendCompilerSummary): string[] {
  const version = s.version
    ? formatCompilerVersion(s.version)
    : `unknown (${s.versionError ?? 'no version'})`;
  return [
    `id: ${s.id}`,
    `name: ${s.name}`,
    `path: ${s.path ?? '(not found)'}`,
    `version: ${version}`,
    `prgenv: ${s.prgEnv}`,
    `std-atomics: ${describeAtomics(s.stdAtomics)}`,
  ];
}

function summaryJson(s: BackendCompilerSummary): string {
  const stdAtomics =
    s.stdAtomics.status === 'failed'
      ? { status: 'failed', error: s.stdAtomics.error.message }
      : s.stdAtomics;
  return JSON.stringify({ ...s, stdAtomics }, null, 2);
}

/**
 * Runs one CLI invocation and returns its exit code.
 *
 * `argv` excludes the node binary and script path.
 */
export function runCli(argv: string[], io: CliIo, probe?: CompilerProbe): number {
  const flags = argv.filter((a) => a.startsWith('--'));
  const [cmd, compilerArg] = argv.filter((a) => !a.startsWith('--'));

  if (flags.includes('--debug') || readProbeEnv(io.env).debug) setDebugEnabled(true);

  if (!cmd || cmd === 'help' || flags.includes('--help')) {
    io.out(usage());
    return 0;
  }

  if (!isCommand(cmd)) {
    io.err(`Unknown command: ${cmd}`);
    io.err(usage());
    return 1;
  }

  const compiler = compilerArg ?? readProbeEnv(io.env).targetCompiler;
  if (!compiler) {
    io.err('Missing compiler id (pass one or set CHPL_TARGET_COMPILER)');
    return 1;
  }

  const p = probe ?? createCompilerProbe({ env: io.env });

  try {
    switch (cmd) {
      case 'name':
        io.out(p.getCompilerName(compiler));
        break;
      case 'version':
        io.out(formatCompilerVersion(p.getCompilerVersion(compiler)));
        break;
      case 'prgenv':
        io.out(String(p.compilerIsPrgEnv(compiler)));
        break;
      case 'atomics':
        io.out(String(p.hasStdAtomics(compiler)));
        break;
      case 'show': {
        const summary = p.describe(compiler);
        if (flags.includes('--json')) io.out(summaryJson(summary));
        else for (const line of summaryLines(summary)) io.out(line);
        break;
      }
    }
  } catch (e) {
    io.err(`error: ${e instanceof Error ? e.message : String(e)}`);
    return 1;
  }

  return 0;
}
