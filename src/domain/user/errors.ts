export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type UserLookupKey = 'id' | 'email' | 'username';

export class UserNotFoundError extends DomainError {
  constructor(
    public readonly key: UserLookupKey,
    public readonly value: string | number
  ) {
    super(`User with ${key} ${value} not found`);
  }
}

export type UniqueUserField = 'email' | 'username';

/**
 * Raised when a write would give two users the same email or username.
 * `field` is undefined when the store did not say which constraint failed.
 */
export class UniquenessViolationError extends DomainError {
  constructor(public readonly field?: UniqueUserField) {
    super(
      field
        ? `User with this ${field} already exists`
        : 'User with this email or username already exists'
    );
  }
}
