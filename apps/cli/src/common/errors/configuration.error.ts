import type { ZodError } from 'zod';

export interface ConfigurationIssue {
  path: string;
  message: string;
}

/**
 * Raised when a comparator, match or target is built from invalid options.
 * Never raised while resolving; a resolution miss is a `null` result.
 */
export class ConfigurationError extends Error {
  readonly issues: ConfigurationIssue[];

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  static fromZod(subject: string, error: ZodError): ConfigurationError {
    const issues = error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
    }));
    const detail = issues
      .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
      .join('; ');
    return new ConfigurationError(`Invalid ${subject}: ${detail}`, issues);
  }
}
