/**
 * CLI exit codes. A verification warning still exits with SUCCESS.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
