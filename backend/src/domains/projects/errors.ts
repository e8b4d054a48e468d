/**
 * Domain errors
 *
 * Raised by the domain store for conditions the caller can act on. The tool
 * dispatcher turns them into `Error: <message>` strings for the model; any
 * other error is a fault and propagates.
 *
 * @module domains/projects/errors
 */

export abstract class DomainError extends Error {
  abstract readonly kind: 'not_found' | 'conflict' | 'service';

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends DomainError {
  readonly kind = 'not_found';

  static entity(entity: string, id: number | string): NotFoundError {
    return new NotFoundError(`${entity} ${id} not found.`);
  }
}

export class ConflictError extends DomainError {
  readonly kind = 'conflict';
}

/** Rule violations that are neither missing data nor conflicts. */
export class ServiceError extends DomainError {
  readonly kind = 'service';
}

export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}
