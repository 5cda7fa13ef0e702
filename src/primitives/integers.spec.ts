/**
 * @file Specs: fixed-width integer linearizers
 */
import { variants } from "../linearize/ext";
import { i16, i32, i8, u16, u32, u8 } from "./integers";

describe("primitives/integers", () => {
  it("has LENGTH 2^bits", () => {
    expect([u8, u16, u32, i8, i16, i32].map((l) => l.LENGTH)).toEqual([256, 65536, 4294967296, 256, 65536, 4294967296]);
  });

  it("unsigned values map to themselves", () => {
    expect(u8.linearize(0)).toBe(0);
    expect(u8.linearize(255)).toBe(255);
    expect(u32.delinearizeUnchecked(4294967295)).toBe(4294967295);
  });

  it("signed values are shifted by MIN", () => {
    expect(i8.linearize(-128)).toBe(0);
    expect(i8.linearize(0)).toBe(128);
    expect(i8.linearize(127)).toBe(255);
    expect(i8.delinearizeUnchecked(0)).toBe(-128);
    expect(i32.linearize(-2147483648)).toBe(0);
    expect(i32.delinearizeUnchecked(4294967295)).toBe(2147483647);
  });

  it("every i8 round-trips and enumeration is ascending", () => {
    const all = variants(i8).collect();
    expect(all).toHaveLength(256);
    expect(all[0]).toBe(-128);
    expect(all[255]).toBe(127);
    all.forEach((v, i) => {
      expect(i8.linearize(v)).toBe(i);
    });
  });

  it("describes values in decimal", () => {
    expect(i16.describe(-300)).toBe("-300");
    expect(u16.name).toBe("u16");
    expect(i32.name).toBe("i32");
  });
});
