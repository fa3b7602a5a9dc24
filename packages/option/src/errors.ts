/**
 * Thrown when `get` is called on an Absent value.
 *
 * Reading an Absent value is a misuse of the API, not an expected runtime
 * outcome: check with `isPresent`, iterate, or `match` instead. When the
 * Absent value carries a cause, it is chained as the standard `cause`.
 */
export class AbsentValueError extends Error {
  constructor(cause?: Error) {
    super("Cannot resolve value on Absent", cause === undefined ? undefined : { cause });
    this.name = "AbsentValueError";
  }
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(thrown: unknown): Error {
  return thrown instanceof Error ? thrown : new Error(String(thrown));
}
