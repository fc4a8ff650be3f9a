export {
  hashingEqualityBy,
  isHashingEquality,
  isOrderingEquality,
  makeEquality,
  makeEquivalence,
  makeHashingEquality,
  makeOrderingEquality,
  orderingEqualityBy,
} from "./equality.js";
export type { Equality, Equivalence, HashingEquality, OrderingEquality } from "./equality.js";

export {
  defaultEquality,
  defaultHashingEquality,
  defaultOrderingEquality,
  hashNumber,
  hashSequence,
  hashString,
  isEquals,
  naturalCompare,
  naturalEquals,
  naturalHash,
  naturalOrderingEquality,
} from "./natural.js";
export type { Comparable, Equals } from "./natural.js";

export {
  makeNormalization,
  normalizingEquality,
  normalizingHashingEquality,
  normalizingOrderingEquality,
} from "./normalization.js";
export type { Normalization } from "./normalization.js";

export { isUniformity, makeUniformity } from "./uniformity.js";
export type { Uniformity } from "./uniformity.js";
