/**
 * Exit Code Reference for the dotlex CLI
 *
 * | Code | Category      | Description                                 |
 * |------|---------------|---------------------------------------------|
 * | 0    | Success       | Command completed successfully              |
 * | 1    | General Error | Bad arguments, missing config, read failure |
 * | 2    | Check Command | At least one file failed to parse           |
 *
 * ## Usage in CI/CD
 *
 * ```bash
 * npx dotlex check 'locales/**'
 * if [ $? -eq 2 ]; then
 *   echo "Broken translation files"
 * fi
 * ```
 */

/**
 * General exit codes used across all commands.
 */
export const GENERAL_EXIT_CODES = {
  /** Success - no issues found */
  SUCCESS: 0,
  /** General error (catch-all for exceptions) */
  ERROR: 1,
} as const;

/**
 * Exit codes for the `check` command.
 */
export const CHECK_EXIT_CODES = {
  /** One or more files could not be parsed */
  PARSE_ERRORS: 2,
} as const;

export type CheckExitCode = (typeof CHECK_EXIT_CODES)[keyof typeof CHECK_EXIT_CODES];

export const CHECK_EXIT_DESCRIPTIONS: Record<number, string> = {
  [CHECK_EXIT_CODES.PARSE_ERRORS]: 'Translation files failed to parse',
};

export const GENERAL_EXIT_DESCRIPTIONS: Record<number, string> = {
  [GENERAL_EXIT_CODES.SUCCESS]: 'Success - no issues found',
  [GENERAL_EXIT_CODES.ERROR]: 'General error',
};

/**
 * Get a human-readable description for an exit code.
 *
 * @param context - Look in the command's own table first
 */
export function getExitCodeDescription(code: number, context?: 'check'): string {
  if (context === 'check' && CHECK_EXIT_DESCRIPTIONS[code]) {
    return CHECK_EXIT_DESCRIPTIONS[code];
  }

  return GENERAL_EXIT_DESCRIPTIONS[code] ?? CHECK_EXIT_DESCRIPTIONS[code] ?? `Unknown exit code: ${code}`;
}

/**
 * Helper to set process exit code with optional logging.
 */
export function setExitCode(code: number, options?: { silent?: boolean }): void {
  process.exitCode = code;
  if (!options?.silent && code !== 0) {
    // Only log in debug mode
    if (process.env.DEBUG?.includes('dotlex')) {
      console.error(`[dotlex] Exit code ${code}: ${getExitCodeDescription(code)}`);
    }
  }
}
