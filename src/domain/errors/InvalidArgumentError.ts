import { DomainError } from './DomainError';

/**
 * Thrown when an operation receives a value of the wrong shape,
 * e.g. a raw string where a parsed value object is required
 */
export class InvalidArgumentError extends DomainError {
  public readonly kind = 'InvalidArgument';
}
