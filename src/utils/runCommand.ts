import { execFileSync } from 'child_process';

import { traceDebug, traceWarn } from '../dx/trace.js';

/** Runs argv[0] with the remaining arguments and returns captured stdout. */
export type CommandRunner = (argv: readonly string[]) => string;

export type CommandErrorCode = 'COMMAND_NOT_FOUND' | 'COMMAND_FAILED';

export class CommandError extends Error {
  override name = 'CommandError';
  readonly code: CommandErrorCode;
  readonly command: readonly string[];
  readonly status: number | null;
  readonly stderr: string;

  constructor(
    code: CommandErrorCode,
    message: string,
    details: { command: readonly string[]; status?: number | null; stderr?: string },
  ) {
    super(message);
    this.code = code;
    this.command = details.command;
    this.status = details.status ?? null;
    this.stderr = details.stderr ?? '';
  }
}

function outputText(v: unknown): string {
  if (typeof v === 'string') return v;
  if (Buffer.isBuffer(v)) return v.toString('utf8');
  return '';
}

function toCommandError(argv: readonly string[], err: unknown): CommandError {
  const shown = argv.join(' ');
  if (!(err instanceof Error)) {
    return new CommandError('COMMAND_FAILED', `Command failed: ${shown}`, { command: argv });
  }

  if ('code' in err && err.code === 'ENOENT') {
    return new CommandError('COMMAND_NOT_FOUND', `Command not found: ${argv[0]}`, {
      command: argv,
    });
  }

  const status = 'status' in err && typeof err.status === 'number' ? err.status : null;
  const stderr = 'stderr' in err ? outputText(err.stderr).trim() : '';
  const suffix = stderr ? `\n${stderr}` : '';
  return new CommandError(
    'COMMAND_FAILED',
    `Command failed (exit ${status ?? 'unknown'}): ${shown}${suffix}`,
    { command: argv, status, stderr },
  );
}

export const runCommand: CommandRunner = (argv) => {
  const [file, ...args] = argv;
  if (!file) {
    throw new CommandError('COMMAND_NOT_FOUND', 'Empty command', { command: argv });
  }

  traceDebug('command.spawn', { argv });
  try {
    return execFileSync(file, args, {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (err) {
    const wrapped = toCommandError(argv, err);
    traceWarn('command.failed', { argv, code: wrapped.code, status: wrapped.status });
    throw wrapped;
  }
};
