/**
 * Raised when a batch cannot be enriched at all: empty uploads, a missing
 * `company_name` column, or more companies than the configured limit.
 * Always thrown before the first completion call is made.
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}
