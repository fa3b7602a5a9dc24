/**
 * Typeclasses: Eq, Hash and Show with their default instances
 */

export { eqDefault, eqStrict, eqBy, isEquatable, type Eq, type Equatable } from "./eq.js";
export {
  hashDefault,
  hashString,
  hashNumber,
  hashBoolean,
  hashBigInt,
  hashIdentity,
  isHashable,
  type Hash,
  type Hashable,
} from "./hash.js";
export { showDefault, showString, type Show } from "./show.js";
