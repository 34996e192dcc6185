/**
 * Compiler configuration.
 *
 * @module
 */

/** Names of the rewrite passes, in the order the pipeline runs them */
export type PassName = 'remove-deindex' | 'constant-fold' | 'fuse-operators' | 'dead-code';

export interface CompilerOptions {
  /** Run the rewrite pipeline after lowering */
  optimize: boolean;

  /**
   * Pipeline to run when `optimize` is set. Passes run in exactly this order;
   * a name may appear more than once.
   */
  passes: PassName[];

  /** Throw the first error diagnostic instead of accumulating it */
  throwOnError: boolean;

  /** Warn about tables no view reads */
  warnUnusedTables: boolean;
}

export const DEFAULT_PIPELINE: readonly PassName[] = [
  'remove-deindex',
  'constant-fold',
  'fuse-operators',
  'constant-fold',
  'dead-code',
];

export const DEFAULT_COMPILER_OPTIONS: Readonly<CompilerOptions> = {
  optimize: true,
  passes: [...DEFAULT_PIPELINE],
  throwOnError: false,
  warnUnusedTables: true,
};

export function resolveOptions(options: Partial<CompilerOptions> = {}): CompilerOptions {
  return {
    ...DEFAULT_COMPILER_OPTIONS,
    ...options,
    passes: [...(options.passes ?? DEFAULT_COMPILER_OPTIONS.passes)],
  };
}
