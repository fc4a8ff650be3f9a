import { makeUniformity } from "@equasets/equality";
import { Collections, SortedCollections } from "../src/index.js";

const isString = (b: unknown): b is string => typeof b === "string";

export const lowerCased = makeUniformity((s: string) => s.toLowerCase(), isString);
export const trimmed = makeUniformity((s: string) => s.trim(), isString);

// One policy object shared by the hash-backed and tree-backed factories
export const lowerOrdering = lowerCased.toOrderingEquality();
export const lower = Collections.of(lowerOrdering, "lower");
export const sortedLower = SortedCollections.of(lowerOrdering, "lower");

export const trimmedPath = Collections.of(trimmed.toHashingEquality(), "trimmed");

export const number = SortedCollections.native<number>();
export const nativeNumber = Collections.native<number>();
