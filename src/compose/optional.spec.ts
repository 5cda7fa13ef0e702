/**
 * @file Specs: optional values
 */
import { LengthOverflowError } from "../errors";
import { variants } from "../linearize/ext";
import { bool } from "../primitives/bool";
import { u8 } from "../primitives/integers";
import { never } from "../primitives/never";
import { optional } from "./optional";

describe("compose/optional", () => {
  it("puts null first, then the inner values", () => {
    const o = optional(bool);
    expect(o.LENGTH).toBe(3);
    expect(o.name).toBe("boolean | null");
    expect(variants(o).collect()).toEqual([null, false, true]);
    expect(o.linearize(true)).toBe(2);
    expect(o.describe(null)).toBe("null");
    expect(o.describe(false)).toBe("false");
  });

  it("an optional uninhabited type has only null", () => {
    expect(variants(optional(never)).collect()).toEqual([null]);
  });

  it("checks the cardinality", () => {
    expect(() => optional({ ...u8, LENGTH: Number.MAX_SAFE_INTEGER })).toThrow(LengthOverflowError);
  });
});
