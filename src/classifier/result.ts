/**
 * Result type for expected, recoverable failures.
 *
 * Element construction returns a Result instead of throwing: an unparseable
 * token is ordinary data, recorded as the candidate's failure reason.
 */

export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const Ok = <T>(value: T): Result<T, never> => ({
  ok: true,
  value,
});

export const Err = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});
