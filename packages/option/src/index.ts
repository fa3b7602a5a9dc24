/**
 * @optio/option: an Option type for TypeScript
 *
 * Features:
 * - `Option<A>`: a closed union of `Present<A>` and `Absent`
 * - Null-safe construction: `present(null)` is Absent
 * - Misuse failures that keep their cause (`AbsentValueError`)
 * - Iteration, equality and hashing
 * - `compact` and `mapPresent` over collections of Options
 *
 * @example
 * ```typescript
 * import { present, absent, get, compact, mapPresent } from "@optio/option";
 *
 * get(present(2));                                        // 2
 * compact([present(1), absent(), present(3)]);            // [1, 3]
 * mapPresent((s: string) => s + "!", [absent(), present("a")]); // ["a!"]
 * get(absent(new RangeError("no port")));                 // throws AbsentValueError
 * ```
 */

export * from "./data/index.js";
export * from "./typeclasses/index.js";
export { AbsentValueError, toError } from "./errors.js";
