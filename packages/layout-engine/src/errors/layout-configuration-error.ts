import type { ZodError } from 'zod';

/**
 * LayoutConfigurationError
 *
 * Thrown at construction when an option is outside its domain
 * (non-positive widths, `bandCount < 1`, ...). Every downstream threshold is
 * derived from these values, so they are never clamped silently.
 */
export class LayoutConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'LayoutConfigurationError';
  }

  /**
   * Build from a failed zod parse, one issue per line.
   *
   * @param component - Component whose options were rejected
   */
  static fromZodError(
    component: string,
    error: ZodError,
  ): LayoutConfigurationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new LayoutConfigurationError(
      `Invalid ${component} options: ${issues.join('; ')}`,
      issues,
      { cause: error },
    );
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
