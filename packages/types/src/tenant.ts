/**
 * Tenant & Identity Types
 */

/**
 * An isolated organization owning its own chart of accounts
 * and entry-numbering sequence.
 */
export interface Tenant {
  readonly id: string;
  readonly name: string;
  /** ISO 8601 timestamp */
  readonly created: string;
}

/**
 * A person recorded in audit fields (created by, posted by, ...).
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly created: string;
}
