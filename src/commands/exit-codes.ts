/**
 * CLI exit codes. Absent reports never change the exit code of `aggregate`.
 */
export const EXIT = {
  SUCCESS: 0,
  VALIDATION_FAILED: 1,
  INVALID_ARGS: 3,
} as const;
