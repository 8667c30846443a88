/**
 * Errors that abort a run
 *
 * Per-candidate failures never throw; they become a status on the result.
 * Only conditions detected before any candidate is processed are raised.
 */

export class VerifierError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or incomplete run configuration (e.g. API mode without a token)
 */
export class ConfigurationError extends VerifierError {}

/**
 * Input file missing or unreadable
 */
export class InputError extends VerifierError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.path = path;
  }
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
