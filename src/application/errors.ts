import { ZodError } from 'zod';

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Raised when a command or query fails its declared constraints.
 * Thrown at the transfer-object boundary, before any repository call.
 */
export class ValidationError extends Error {
  constructor(
    public readonly issues: ValidationIssue[],
    message = 'Validation failed'
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static fromZod(error: ZodError): ValidationError {
    return new ValidationError(
      error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    );
  }
}
