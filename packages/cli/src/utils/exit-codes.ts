/**
 * Exit codes for the glot CLI.
 *
 * | Code | Meaning                                                        |
 * |------|----------------------------------------------------------------|
 * | 0    | Success                                                        |
 * | 1    | Unsuppressed errors found, an edit conflict, or a general error |
 * | 2    | Configuration error; no findings were produced                 |
 *
 * ```bash
 * npx glot check
 * case $? in
 *   0) echo "All clear" ;;
 *   1) echo "Problems found" ;;
 *   2) echo "Fix .glotrc.json first" ;;
 * esac
 * ```
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** `check` found findings of severity error, or an edit could not be applied */
  FINDINGS: 1,
  /** Catch-all for unexpected exceptions */
  ERROR: 1,
  /** Invalid configuration, unreadable roots or missing locale tables */
  CONFIG: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const EXIT_CODE_DESCRIPTIONS: Record<ExitCode, string> = {
  [EXIT_CODES.SUCCESS]: 'Success - no issues found',
  [EXIT_CODES.FINDINGS]: 'Problems found',
  [EXIT_CODES.CONFIG]: 'Configuration error',
};

export function getExitCodeDescription(code: number): string {
  for (const [value, description] of Object.entries(EXIT_CODE_DESCRIPTIONS)) {
    if (Number(value) === code) {
      return description;
    }
  }
  return `Unknown exit code: ${code}`;
}

/**
 * Sets the exit code without lowering one an earlier step already raised.
 */
export function setExitCode(code: ExitCode): void {
  if (typeof process.exitCode === 'number' && process.exitCode > code) {
    return;
  }
  process.exitCode = code;
  if (code !== EXIT_CODES.SUCCESS && process.env.DEBUG?.includes('glot')) {
    console.error(`[glot] Exit code ${code}: ${getExitCodeDescription(code)}`);
  }
}
