/**
 * Failure categories the command layer distinguishes
 */
export type DomainErrorKind = 'InvalidFormat' | 'NotFound' | 'InvalidArgument';

/**
 * Base class for all domain errors
 * `name` is the concrete class name; `kind` groups errors by how they are reported
 */
export abstract class DomainError extends Error {
  public abstract readonly kind: DomainErrorKind;

  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}
