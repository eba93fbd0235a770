/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution, including help and declined prompts */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Missing or malformed command arguments */
  INVALID_ARGS: 2,

  /** Database connection or statement failure */
  DATABASE_ERROR: 7,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Exit the process with a specific exit code.
 * Use this instead of process.exit() for better tracking.
 */
export function exitWithCode(code: ExitCode): never {
  process.exit(code);
}
