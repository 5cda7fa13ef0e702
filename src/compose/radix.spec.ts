/**
 * @file Specs: cardinality arithmetic
 */
import { LengthOverflowError } from "../errors";
import { mixedRadix, rangePartition, upperBound } from "./radix";

describe("compose/radix", () => {
  it("mixedRadix computes suffix products", () => {
    expect(mixedRadix([2, 3], "T")).toEqual({ LENGTH: 6, strides: [3, 1] });
    expect(mixedRadix([4, 2, 3], "T")).toEqual({ LENGTH: 24, strides: [6, 3, 1] });
    expect(mixedRadix([], "T")).toEqual({ LENGTH: 1, strides: [] });
  });

  it("a zero length anywhere empties the product", () => {
    expect(mixedRadix([2, 0, 3], "T").LENGTH).toBe(0);
    expect(mixedRadix([0, 2 ** 40, 2 ** 40], "T").LENGTH).toBe(0);
  });

  it("rejects products beyond the safe integer range", () => {
    expect(() => mixedRadix([2 ** 32, 2 ** 32], "Big")).toThrow(LengthOverflowError);
    expect(() => mixedRadix([2 ** 32, 2 ** 32], "Big")).toThrow("cardinality of Big exceeds Number.MAX_SAFE_INTEGER");
    expect(mixedRadix([2 ** 26, 2 ** 26], "T").LENGTH).toBe(2 ** 52);
  });

  it("rangePartition computes prefix sums", () => {
    expect(rangePartition([1, 2, 2], "U")).toEqual({ LENGTH: 5, bases: [0, 1, 3] });
    expect(rangePartition([], "U")).toEqual({ LENGTH: 0, bases: [] });
    expect(() => rangePartition([Number.MAX_SAFE_INTEGER, 1], "U")).toThrow(LengthOverflowError);
  });

  it("upperBound counts elements not above x", () => {
    const starts = [0, 1, 3];
    expect(upperBound(starts, 0)).toBe(1);
    expect(upperBound(starts, 2)).toBe(2);
    expect(upperBound(starts, 3)).toBe(3);
    expect(upperBound(starts, 4)).toBe(3);
    expect(upperBound([], 4)).toBe(0);
  });
});
