/**
 * Error types raised by the simulation
 */

export interface ConfigIssue {
  path: string;
  message: string;
}

/**
 * Raised when a world configuration cannot be used.
 * Always thrown before any path runs.
 */
export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(public readonly issues: ConfigIssue[]) {
    super(
      `Invalid world configuration: ${issues
        .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        .join('; ')}`
    );
    this.name = 'ConfigError';
  }
}
