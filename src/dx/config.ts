import { DEBUG_ENV_VAR } from './logger.js';

/** Cray compiler version exported by the PrgEnv-cray modules. */
export const ENV_CRAY_CC_VERSION = 'CRAY_CC_VERSION';
/** Target compiler chosen before a PrgEnv wrapper replaced it. */
export const ENV_ORIG_TARGET_COMPILER = 'CHPL_ORIG_TARGET_COMPILER';
/** Compiler id used by the CLI when none is given on the command line. */
export const ENV_TARGET_COMPILER = 'CHPL_TARGET_COMPILER';

export type ProbeEnv = {
  crayCcVersion?: string;
  origTargetCompiler?: string;
  targetCompiler?: string;
  debug: boolean;
};

function nonEmpty(v: string | undefined): string | undefined {
  return v === undefined || v === '' ? undefined : v;
}

/**
 * Reads the variables the probe consumes into a typed record.
 *
 * Nothing is cached: the PrgEnv predicate must see the environment as it is
 * at call time.
 */
export function readProbeEnv(env: NodeJS.ProcessEnv = process.env): ProbeEnv {
  return {
    // Set-but-empty is kept so the version parser rejects it.
    crayCcVersion: env[ENV_CRAY_CC_VERSION],
    origTargetCompiler: nonEmpty(env[ENV_ORIG_TARGET_COMPILER]),
    targetCompiler: nonEmpty(env[ENV_TARGET_COMPILER]),
    debug: env[DEBUG_ENV_VAR] === '1',
  };
}
