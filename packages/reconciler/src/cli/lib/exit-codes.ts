/**
 * Process exit codes shared by the CLI entry point and its commands.
 *
 * @module cli/lib/exit-codes
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Completed, but with per-pole failures or warnings */
  WARNINGS: 1,
  /** Fatal input error; nothing was processed */
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
