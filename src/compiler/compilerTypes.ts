/**
 * Opaque compiler tag supplied by the build configuration,
 * e.g. `gnu`, `cray-prgenv-intel`, `clang`.
 */
export type CompilerId = string;

/** Executable used to actually invoke a backend compiler. */
export type CompilerName =
  | 'aarch64-unknown-linux-gnu-gcc'
  | 'gcc'
  | 'cc'
  | 'clang'
  | 'icc'
  | 'pgcc'
  | 'other';

export type CompilerVersion = Readonly<{
  major: number;
  minor: number;
  revision: number;
  build: number;
}>;

export type AtomicsUnsupportedReason =
  /** The id resolved to `other`; the probe never runs for those. */
  | 'unknown-compiler'
  /** `__STDC_VERSION__` was left unexpanded or is below C11. */
  | 'pre-c11'
  /** `__STDC_NO_ATOMICS__` expanded to something. */
  | 'no-atomics-macro';

export type AtomicsProbeResult =
  | { status: 'supported'; stdcVersion: number }
  | { status: 'unsupported'; reason: AtomicsUnsupportedReason; stdcVersion?: number }
  | { status: 'failed'; error: Error };
