/**
 * Error types for programmer mistakes, as opposed to data problems
 * (those travel as Result values and candidate failure reasons).
 */

export type ClassifierConfigErrorKind =
  | 'duplicate-output'
  | 'missing-requirement'
  | 'cycle'
  | 'solver-order'
  | 'invalid-config';

/** Wiring or configuration mistake; raised before any page is classified. */
export class ClassifierConfigError extends Error {
  readonly kind: ClassifierConfigErrorKind;

  constructor(kind: ClassifierConfigErrorKind, message: string) {
    super(message);
    this.name = 'ClassifierConfigError';
    this.kind = kind;
  }
}

/** A global invariant of the classification result does not hold. */
export class InvariantViolationError extends Error {
  readonly violations: readonly string[];

  constructor(violations: readonly string[]) {
    super(`Classification invariant violated: ${violations.join('; ')}`);
    this.name = 'InvariantViolationError';
    this.violations = violations;
  }
}
