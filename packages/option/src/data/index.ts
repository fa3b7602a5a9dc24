/**
 * Data Types Index
 *
 * Clean API design:
 * - Type: `Option<A>` = `Present<A> | Absent`
 * - Constructors: `present(...)`, `absent(...)`, `fromNullable(...)`, `tryCatch(...)`
 * - Collection operations: `compact(...)`, `mapPresent(...)`
 */

export {
  NONE,
  present,
  absent,
  fromNullable,
  tryCatch,
  isOption,
  isPresent,
  isAbsent,
  get,
  causeOf,
  getOrElse,
  match,
  toArray,
  toNullable,
  iterate,
  compact,
  cat,
  mapPresent,
  map,
  getEq,
  getHash,
  getShow,
  equals,
  hash,
  show,
} from "./option.js";
export type { Option, Present, Absent } from "./option.js";
