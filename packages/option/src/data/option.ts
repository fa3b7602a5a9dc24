/**
 * Option Data Type
 *
 * Option represents an optional value: every Option<A> is either a
 * Present<A> wrapping a value or an Absent, optionally carrying the Error
 * that explains why there is no value.
 *
 * ## Runtime Representation
 *
 * ```typescript
 * present(42)              // { _tag: "Present", value: 42 }
 * absent()                 // { _tag: "Absent", cause: undefined }
 * absent(new Error("x"))   // { _tag: "Absent", cause: Error("x") }
 * ```
 *
 * Instances are frozen and iterable: a Present yields its value once, an
 * Absent yields nothing.
 */

import { config, isReportLevel, report, type ReportLevel } from "@optio/core";
import { AbsentValueError, toError } from "../errors.js";
import { eqDefault, type Eq, type Equatable } from "../typeclasses/eq.js";
import { hashDefault, type Hash, type Hashable } from "../typeclasses/hash.js";
import { showDefault, type Show } from "../typeclasses/show.js";

// ============================================================================
// Option Type Definition
// ============================================================================

/**
 * The variant holding a value. `value` is never null or undefined.
 */
export interface Present<A> extends Equatable, Hashable {
  readonly _tag: "Present";
  readonly value: A;
  [Symbol.iterator](): IterableIterator<A>;
}

/**
 * The variant holding no value. `cause` is carried for diagnostics only and
 * does not take part in equality or hashing.
 */
export interface Absent extends Equatable, Hashable {
  readonly _tag: "Absent";
  readonly cause: Error | undefined;
  [Symbol.iterator](): IterableIterator<never>;
}

export type Option<A> = Present<A> | Absent;

// ============================================================================
// Constructors
// ============================================================================

// Every instance built here, so nested Options are recognized by `equals`
const instances = new WeakSet<object>();

/**
 * Check whether a value is an Option built by this module.
 */
export function isOption(value: unknown): value is Option<unknown> {
  return typeof value === "object" && value !== null && instances.has(value);
}

function makePresent<A>(value: A): Present<A> {
  const self: Present<A> = Object.freeze({
    _tag: "Present" as const,
    value,
    *[Symbol.iterator](): Generator<A, void, undefined> {
      yield value;
    },
    equals(other: unknown): boolean {
      return isOption(other) && eqOption.equals(self, other);
    },
    hashCode(): number {
      return hashOption.hash(self);
    },
  });
  instances.add(self);
  return self;
}

function makeAbsent(cause: Error | undefined): Absent {
  const self: Absent = Object.freeze({
    _tag: "Absent" as const,
    cause,
    *[Symbol.iterator](): Generator<never, void, undefined> {},
    equals(other: unknown): boolean {
      return isOption(other) && eqOption.equals(self, other);
    },
    hashCode(): number {
      return hashOption.hash(self);
    },
  });
  instances.add(self);
  return self;
}

/**
 * The shared Absent without a cause. Compare with `equals`, not `===`.
 */
export const NONE: Absent = makeAbsent(undefined);

/**
 * Wrap a value. A null or undefined value yields Absent instead, so a
 * Present never holds a nullish value.
 */
export function present<A>(value: A): Option<NonNullable<A>> {
  if (value === null || value === undefined) {
    return NONE;
  }
  return makePresent(value);
}

/**
 * Create an Absent, optionally carrying the cause of the absence.
 */
export function absent(cause?: Error): Absent {
  return cause === undefined ? NONE : makeAbsent(cause);
}

/**
 * Create an Option from a nullable value
 */
export function fromNullable<A>(value: A | null | undefined): Option<A> {
  return value === null || value === undefined ? NONE : makePresent(value);
}

/**
 * Run `thunk`, keeping whatever it throws as the cause of an Absent.
 */
export function tryCatch<A>(thunk: () => A): Option<NonNullable<A>> {
  try {
    return present(thunk());
  } catch (error) {
    return absent(toError(error));
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isPresent<A>(opt: Option<A>): opt is Present<A> {
  return opt._tag === "Present";
}

export function isAbsent<A>(opt: Option<A>): opt is Absent {
  return !isPresent(opt);
}

// ============================================================================
// Extraction
// ============================================================================

function absentAccessLevel(): ReportLevel {
  const configured = config.get("option.absentAccess");
  const level = isReportLevel(configured) ? configured : "off";
  return level === "off" && config.has("debug") ? "info" : level;
}

/**
 * Get the wrapped value.
 *
 * @throws AbsentValueError when called on an Absent, with the Absent's cause
 * chained as `cause`
 */
export function get<A>(opt: Option<A>): A {
  if (isPresent(opt)) return opt.value;

  const { cause } = opt;
  report(
    absentAccessLevel(),
    "option",
    cause === undefined
      ? "get() called on Absent"
      : `get() called on Absent (cause: ${cause.name}: ${cause.message})`
  );
  throw new AbsentValueError(cause);
}

/**
 * The cause attached to an Absent, or undefined. Never throws.
 */
export function causeOf<A>(opt: Option<A>): Error | undefined {
  return isPresent(opt) ? undefined : opt.cause;
}

/**
 * Get the value or a default
 */
export function getOrElse<A>(opt: Option<A>, fallback: () => A): A {
  return isPresent(opt) ? opt.value : fallback();
}

/**
 * Match over Option - exactly one handler runs
 */
export function match<A, B>(
  opt: Option<A>,
  patterns: { Present: (value: A) => B; Absent: (cause: Error | undefined) => B }
): B {
  switch (opt._tag) {
    case "Present":
      return patterns.Present(opt.value);
    case "Absent":
      return patterns.Absent(opt.cause);
  }
}

/**
 * Convert Option to array
 */
export function toArray<A>(opt: Option<A>): A[] {
  return isPresent(opt) ? [opt.value] : [];
}

/**
 * Convert Option to nullable
 */
export function toNullable<A>(opt: Option<A>): A | null {
  return isPresent(opt) ? opt.value : null;
}

// ============================================================================
// Iteration
// ============================================================================

/**
 * Start a fresh single-pass iteration over the zero or one values in `opt`.
 */
export function iterate<A>(opt: Option<A>): IterableIterator<A> {
  return opt[Symbol.iterator]();
}

// ============================================================================
// Collection Operations
// ============================================================================

/**
 * Keep the values of every Present, in order, skipping Absents.
 */
export function compact<A>(options: Iterable<Option<A>>): A[] {
  const results: A[] = [];
  for (const opt of options) {
    if (isPresent(opt)) results.push(opt.value);
  }
  return results;
}

/**
 * Apply `f` to the value of every Present, in order, skipping Absents.
 * `f` runs once per Present and never for an Absent; whatever it throws
 * propagates as-is.
 */
export function mapPresent<A, B>(f: (a: A) => B, options: Iterable<Option<A>>): B[] {
  const results: B[] = [];
  for (const opt of options) {
    if (isPresent(opt)) results.push(f(opt.value));
  }
  return results;
}

export { compact as cat, mapPresent as map };

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Eq instance for Option. Every Absent equals every other Absent,
 * whatever its cause.
 */
export function getEq<A>(E: Eq<A> = eqDefault): Eq<Option<A>> {
  return {
    equals: (x, y) => {
      if (isPresent(x) && isPresent(y)) return E.equals(x.value, y.value);
      return isAbsent(x) && isAbsent(y);
    },
  };
}

const ABSENT_HASH = 31;

/**
 * Hash instance for Option, consistent with `getEq` when `H` is consistent
 * with its Eq.
 */
export function getHash<A>(H: Hash<A> = hashDefault): Hash<Option<A>> {
  return {
    hash: (opt) => (isPresent(opt) ? (ABSENT_HASH + H.hash(opt.value)) | 0 : ABSENT_HASH),
  };
}

/**
 * Show instance for Option
 */
export function getShow<A>(S: Show<A> = showDefault): Show<Option<A>> {
  return {
    show: (opt) => {
      if (isPresent(opt)) return `Present(${S.show(opt.value)})`;
      return opt.cause === undefined ? "Absent" : `Absent(${opt.cause.name}: ${opt.cause.message})`;
    },
  };
}

const eqOption = getEq<unknown>();
const hashOption = getHash<unknown>();
const showOption = getShow<unknown>();

/**
 * Compare two Options with the default Eq.
 */
export function equals<A>(x: Option<A>, y: Option<A>): boolean {
  return eqOption.equals(x, y);
}

/**
 * Hash an Option with the default Hash.
 */
export function hash<A>(opt: Option<A>): number {
  return hashOption.hash(opt);
}

export function show<A>(opt: Option<A>): string {
  return showOption.show(opt);
}
