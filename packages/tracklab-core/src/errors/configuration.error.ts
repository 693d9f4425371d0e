import { BaseError } from './base.error';

/**
 * Configuration error - raised at startup, never retried
 */
export class ConfigurationError extends BaseError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Invalid worker configuration. Fix the following: ${issues.join('; ')}`,
      'CONFIGURATION_ERROR',
      500,
      { issues },
      false
    );
    this.issues = issues;
  }
}
