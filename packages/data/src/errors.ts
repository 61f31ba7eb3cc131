/**
 * Repository errors.
 */

export type RepositoryErrorCode =
  | "INVALID_ARGUMENT"
  | "INVALID_TRANSITION"
  | "DUPLICATE_KEY";

/**
 * Structured error from a repository.
 * Always thrown; never returned as an error code.
 */
export class RepositoryError extends Error {
  public readonly code: RepositoryErrorCode;

  constructor(code: RepositoryErrorCode, message: string) {
    super(message);
    this.name = "RepositoryError";
    this.code = code;
  }
}
