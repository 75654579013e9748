/**
 * Error types raised by the checking engine.
 *
 * Per-file problems (malformed sources or locale files) are never thrown: they
 * surface as `parse-error` findings. Only the two failures below escape.
 */

/**
 * Fatal to a run. Raised before any finding is produced when the resolved
 * configuration cannot be honoured (bad values, missing locale tables,
 * unreadable roots).
 */
export class ConfigurationError extends Error {
  constructor(message: string, public readonly issues: readonly string[] = []) {
    super(issues.length ? `${message}\n${issues.map((issue) => `• ${issue}`).join('\n')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised by an editor when a target no longer matches the text it is asked to
 * rewrite. The apply entry points catch it per file and report a conflict.
 */
export class EditConflictError extends Error {
  constructor(message: string, public readonly target?: string) {
    super(message);
    this.name = 'EditConflictError';
  }
}
