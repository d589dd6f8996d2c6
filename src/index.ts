export * from './compiler/index.js';
export { readProbeEnv, type ProbeEnv } from './dx/config.js';
export { isDebugEnabled, setDebugEnabled } from './dx/logger.js';
export { CommandError, runCommand, type CommandRunner } from './utils/runCommand.js';
export { MemoStore } from './cache/memoize.js';
