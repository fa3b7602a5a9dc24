/**
 * Hash Typeclass
 *
 * A Hash instance must agree with the Eq instance it is paired with:
 * equals(x, y) => hash(x) === hash(y). Hashes are 32-bit integers.
 */

import { isEquatable } from "./eq.js";

// ============================================================================
// Hash
// ============================================================================

export interface Hash<A> {
  readonly hash: (a: A) => number;
}

/**
 * Values that define their own hash code.
 */
export interface Hashable {
  hashCode(): number;
}

export function isHashable(value: unknown): value is Hashable {
  return (
    typeof value === "object" &&
    value !== null &&
    "hashCode" in value &&
    typeof value.hashCode === "function"
  );
}

// ============================================================================
// Primitive Instances
// ============================================================================

/**
 * Polynomial string hash, base 31
 */
export const hashString: Hash<string> = {
  hash: (s) => {
    let hash = 0;
    for (let i = 0; i < s.length; i++) {
      hash = (Math.imul(31, hash) + s.charCodeAt(i)) | 0;
    }
    return hash;
  },
};

export const hashNumber: Hash<number> = {
  hash: (n) => {
    // Small integers hash to themselves, everything else through the string form
    if (Number.isInteger(n) && Math.abs(n) < 2 ** 31) {
      return n | 0;
    }
    return hashString.hash(String(n));
  },
};

export const hashBoolean: Hash<boolean> = {
  hash: (b) => (b ? 1231 : 1237),
};

export const hashBigInt: Hash<bigint> = {
  hash: (n) => hashString.hash(n.toString()),
};

// ============================================================================
// Identity Hash
// ============================================================================

const identities = new WeakMap<object, number>();
let nextIdentity = 1;

/**
 * Stable per-object hash, consistent with reference equality.
 */
export const hashIdentity: Hash<object> = {
  hash: (o) => {
    let id = identities.get(o);
    if (id === undefined) {
      id = nextIdentity++ | 0;
      identities.set(o, id);
    }
    return id;
  },
};

// ============================================================================
// Default Instance
// ============================================================================

const EQUATABLE_HASH = 0;

/**
 * Hash consistent with `eqDefault`: Hashable values use `hashCode()`,
 * Equatable values without one share a constant, primitives hash by value,
 * other objects by identity.
 */
export const hashDefault: Hash<unknown> = {
  hash: (a) => {
    switch (typeof a) {
      case "string":
        return hashString.hash(a);
      case "number":
        return hashNumber.hash(a);
      case "boolean":
        return hashBoolean.hash(a);
      case "bigint":
        return hashBigInt.hash(a);
      case "symbol":
        return hashString.hash(String(a));
      case "function":
        return hashIdentity.hash(a);
      case "object":
        if (a === null) return 0;
        if (isHashable(a)) return a.hashCode() | 0;
        return isEquatable(a) ? EQUATABLE_HASH : hashIdentity.hash(a);
      default:
        return 0;
    }
  },
};
