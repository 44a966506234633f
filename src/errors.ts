import { type ZodError } from 'zod/v4';

/**
 * Base class for errors a caller can act on. Each kind carries the HTTP status
 * the REST layer answers with.
 */
export abstract class FinanceError extends Error {
  abstract readonly status: number;

  constructor (message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed, duplicate or out-of-range input. */
export class ValidationError extends FinanceError {
  readonly status = 400;
}

/** A referenced entity id does not exist. */
export class NotFoundError extends FinanceError {
  readonly status = 404;

  static forEntity (entity: string, id: number): NotFoundError {
    return new NotFoundError(`${entity} ${id} not found`);
  }
}

/** Foreign-key, uniqueness or check violation reported by the store. */
export class IntegrityError extends FinanceError {
  readonly status = 409;
}

export const isFinanceError = (error: unknown): error is FinanceError => error instanceof FinanceError;

export const fromZodError = (error: ZodError): ValidationError => {
  const message = error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  return new ValidationError(message === '' ? 'Invalid input' : message);
};
