/**
 * Errors raised by the review core.
 *
 * Both kinds are terminal for the request; the HTTP layer maps `not_found`
 * to 404 and `validation` to 400.
 */

export type EntityName = 'Pos' | 'User' | 'Review';

export type ServiceErrorKind = 'not_found' | 'validation';

export abstract class ServiceError extends Error {
  abstract readonly kind: ServiceErrorKind;
}

/** A referenced POS, user or review does not exist */
export class NotFoundError extends ServiceError {
  readonly kind = 'not_found' as const;

  constructor(
    readonly entity: EntityName,
    readonly id: number | null,
  ) {
    super(`${entity} with ID ${id} does not exist.`);
    this.name = 'NotFoundError';
  }
}

/** A business rule was violated (duplicate review, self-approval) */
export class ValidationError extends ServiceError {
  readonly kind = 'validation' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function duplicateReviewError(authorId: number, posId: number): ValidationError {
  return new ValidationError(`User ${authorId} has already reviewed POS ${posId}.`);
}
