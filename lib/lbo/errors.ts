// lib/lbo/errors.ts

/**
 * Rejected assumptions. Raised before any projection work starts.
 */
export class LboInputError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid LBO assumptions: ${issues.join('; ')}`);
    this.name = 'LboInputError';
    this.issues = issues;
  }
}
