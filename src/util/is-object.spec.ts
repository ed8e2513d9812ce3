/**
 * @file Tests for object guards
 */
import { hasMethods, hasOwn, isObject } from "./is-object";

describe("util/is-object", () => {
  it("narrows non-null objects", () => {
    expect(isObject({})).toBe(true);
    expect(isObject(null)).toBe(false);
    expect(isObject("x")).toBe(false);
  });
  it("checks own keys only", () => {
    expect(hasOwn({ default: 1 }, "default")).toBe(true);
    expect(hasOwn(Object.create({ default: 1 }), "default")).toBe(false);
  });
  it("checks methods", () => {
    expect(hasMethods({ warn() {}, error() {} }, "warn", "error")).toBe(true);
    expect(hasMethods({ warn() {} }, "warn", "error")).toBe(false);
    expect(hasMethods(undefined, "now")).toBe(false);
  });
});
