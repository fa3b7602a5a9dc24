/**
 * Eq Typeclass
 *
 * Laws:
 *   - Reflexivity: equals(x, x) === true
 *   - Symmetry: equals(x, y) === equals(y, x)
 *   - Transitivity: equals(x, y) && equals(y, z) => equals(x, z)
 */

// ============================================================================
// Eq
// ============================================================================

/**
 * Eq typeclass - equality comparison
 */
export interface Eq<A> {
  readonly equals: (x: A, y: A) => boolean;
}

/**
 * Values that define their own equality.
 */
export interface Equatable {
  equals(other: unknown): boolean;
}

export function isEquatable(value: unknown): value is Equatable {
  return (
    typeof value === "object" &&
    value !== null &&
    "equals" in value &&
    typeof value.equals === "function"
  );
}

// ============================================================================
// Instances
// ============================================================================

/**
 * Equality by `Object.is` (NaN equals NaN, 0 does not equal -0)
 */
export const eqStrict: Eq<unknown> = {
  equals: (x, y) => Object.is(x, y),
};

/**
 * Delegates to `x.equals(y)` when x is Equatable, `y.equals(x)` when only y
 * is, and `Object.is` otherwise.
 */
export const eqDefault: Eq<unknown> = {
  equals: (x, y) => {
    if (isEquatable(x)) return x.equals(y);
    if (isEquatable(y)) return y.equals(x);
    return Object.is(x, y);
  },
};

/**
 * Build an Eq from a projection.
 */
export function eqBy<A, K>(f: (a: A) => K, E: Eq<K> = eqDefault): Eq<A> {
  return {
    equals: (x, y) => E.equals(f(x), f(y)),
  };
}
