/**
 * Newscast — Error Types
 */

/**
 * Normalize an unknown thrown value to a message string.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Invalid configuration. Raised once at startup; fatal.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Speech synthesis failed for one record. Always caught per record.
 */
export class SynthesisError extends Error {
  constructor(
    message: string,
    readonly recordId: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SynthesisError';
  }
}
