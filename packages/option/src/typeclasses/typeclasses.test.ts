import { describe, it, expect } from "vitest";
import { eqBy, eqDefault, eqStrict, isEquatable } from "./eq.js";
import {
  hashBigInt,
  hashBoolean,
  hashDefault,
  hashIdentity,
  hashNumber,
  hashString,
  isHashable,
} from "./hash.js";
import { showDefault, showString } from "./show.js";

describe("Eq", () => {
  it("eqStrict should follow Object.is", () => {
    expect(eqStrict.equals(NaN, NaN)).toBe(true);
    expect(eqStrict.equals(0, -0)).toBe(false);
    expect(eqStrict.equals({}, {})).toBe(false);
  });

  it("eqDefault should use equals when the value has one", () => {
    const alwaysEqual = { equals: (_other: unknown) => true };
    expect(isEquatable(alwaysEqual)).toBe(true);
    expect(eqDefault.equals(alwaysEqual, 42)).toBe(true);
    expect(eqDefault.equals("a", "a")).toBe(true);
    expect(eqDefault.equals([1], [1])).toBe(false);
  });

  it("eqDefault should be symmetric when only one side is Equatable", () => {
    const alwaysEqual = { equals: (_other: unknown) => true };
    expect(eqDefault.equals(42, alwaysEqual)).toBe(true);
    expect(eqDefault.equals(42, alwaysEqual)).toBe(eqDefault.equals(alwaysEqual, 42));
    expect(eqDefault.equals(1, 2)).toBe(false);
  });

  it("isEquatable should reject non-functions and primitives", () => {
    expect(isEquatable({ equals: true })).toBe(false);
    expect(isEquatable("x")).toBe(false);
    expect(isEquatable(null)).toBe(false);
  });

  it("eqBy should compare projections", () => {
    const byId = eqBy((u: { id: number; name: string }) => u.id);
    expect(byId.equals({ id: 1, name: "a" }, { id: 1, name: "b" })).toBe(true);
    expect(byId.equals({ id: 1, name: "a" }, { id: 2, name: "a" })).toBe(false);
  });
});

describe("Hash", () => {
  it("hashString should be the base-31 polynomial", () => {
    expect(hashString.hash("")).toBe(0);
    expect(hashString.hash("a")).toBe(97);
    expect(hashString.hash("ab")).toBe(3105);
  });

  it("hashNumber should keep small integers and hash the rest by string", () => {
    expect(hashNumber.hash(42)).toBe(42);
    expect(hashNumber.hash(-7)).toBe(-7);
    expect(hashNumber.hash(1.5)).toBe(hashString.hash("1.5"));
    expect(hashNumber.hash(NaN)).toBe(hashNumber.hash(NaN));
  });

  it("hashBoolean and hashBigInt", () => {
    expect(hashBoolean.hash(true)).toBe(1231);
    expect(hashBoolean.hash(false)).toBe(1237);
    expect(hashBigInt.hash(12n)).toBe(hashString.hash("12"));
  });

  it("hashIdentity should be stable per object and differ across objects", () => {
    const a = {};
    const b = {};
    expect(hashIdentity.hash(a)).toBe(hashIdentity.hash(a));
    expect(hashIdentity.hash(a)).not.toBe(hashIdentity.hash(b));
  });

  it("hashDefault should use hashCode when the value has one", () => {
    const fixed = { hashCode: () => 77 };
    expect(isHashable(fixed)).toBe(true);
    expect(hashDefault.hash(fixed)).toBe(77);
  });

  it("hashDefault should give Equatable values without hashCode a shared hash", () => {
    const a = { equals: (_other: unknown) => true };
    const b = { equals: (_other: unknown) => true };
    expect(eqDefault.equals(a, b)).toBe(true);
    expect(hashDefault.hash(a)).toBe(0);
    expect(hashDefault.hash(a)).toBe(hashDefault.hash(b));
  });

  it("hashDefault should dispatch on the primitive type", () => {
    expect(hashDefault.hash("a")).toBe(97);
    expect(hashDefault.hash(5)).toBe(5);
    expect(hashDefault.hash(true)).toBe(1231);
    expect(hashDefault.hash(null)).toBe(0);
    expect(hashDefault.hash(undefined)).toBe(0);
    expect(hashDefault.hash(Symbol.for("k"))).toBe(hashString.hash("Symbol(k)"));
  });
});

describe("Show", () => {
  it("showString should quote", () => {
    expect(showString.show("a")).toBe('"a"');
  });

  it("showDefault should use String", () => {
    expect(showDefault.show(12)).toBe("12");
    expect(showDefault.show(null)).toBe("null");
  });
});
