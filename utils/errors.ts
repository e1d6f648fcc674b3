/**
 * Raised when the credential store cannot be reached or rejects an operation
 * for reasons unrelated to the request itself.
 */
export class StoreFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreFailure";
  }
}

export class DuplicateUserError extends Error {
  constructor(readonly username: string) {
    super(`Username already exists: ${username}`);
    this.name = "DuplicateUserError";
  }
}

export class UnknownUserError extends Error {
  constructor(readonly username: string) {
    super(`No user record for: ${username}`);
    this.name = "UnknownUserError";
  }
}
