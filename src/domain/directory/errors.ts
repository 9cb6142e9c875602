export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised when the directory file cannot be read, parsed, validated or written.
 * Never raised for a missing file: that is the empty directory.
 */
export class PersistenceError extends DomainError {
  constructor(
    public readonly filePath: string,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(`${message} (${filePath})`);
  }
}
