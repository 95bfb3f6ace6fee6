/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  INVALID_CONFIG: 2,
  PRECONDITION_FAILED: 3,
  BUILD_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
