/**
 * Show Typeclass
 *
 * A type class for converting values to their string representation.
 */

export interface Show<A> {
  readonly show: (a: A) => string;
}

/**
 * Show for strings (with quotes)
 */
export const showString: Show<string> = {
  show: (s) => JSON.stringify(s),
};

/**
 * Falls back to `String(a)`
 */
export const showDefault: Show<unknown> = {
  show: (a) => String(a),
};
