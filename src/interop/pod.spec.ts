/**
 * @file Specs: byte views
 */
import { LengthMismatchError, PodCastError } from "../errors";
import { StaticCopyMap } from "../map/static_map";
import { bool } from "../primitives/bool";
import { asBytes, fromBytes, fromBytesCopy } from "./pod";

describe("interop/pod", () => {
  it("asBytes views the typed storage without copying", () => {
    const m = StaticCopyMap.typed(bool, Uint16Array, (b) => (b ? 0x0102 : 0x0304));
    const bytes = asBytes(m);
    expect(bytes).toEqual(new Uint8Array(new Uint16Array([0x0304, 0x0102]).buffer));
    bytes.fill(0, 0, 2);
    expect(m.get(false)).toBe(0);
  });

  it("asBytes refuses array-backed maps", () => {
    expect(() => asBytes(StaticCopyMap.filled<boolean, number>(bool, 1))).toThrow(PodCastError);
  });

  it("fromBytes reinterprets a buffer", () => {
    const source = StaticCopyMap.typed(bool, Float64Array, (b) => (b ? 2.5 : -1));
    const view = fromBytes(bool, Float64Array, asBytes(source));
    expect(view.get(true)).toBe(2.5);
    expect(view.asStorage()).toBeInstanceOf(Float64Array);
    view.set(false, 7);
    expect(source.get(false)).toBe(7);
  });

  it("fromBytes checks size, alignment and length", () => {
    expect(() => fromBytes(bool, Uint16Array, new Uint8Array(3))).toThrow(PodCastError);
    expect(() => fromBytes(bool, Uint16Array, new Uint8Array(3))).toThrow("3 bytes is not a whole number of Uint16Array elements");
    expect(() => fromBytes(bool, Uint16Array, new Uint8Array(6))).toThrow(LengthMismatchError);
    const misaligned = new Uint8Array(5).subarray(1);
    expect(() => fromBytes(bool, Uint16Array, misaligned)).toThrow("byte offset 1 is not aligned to 2 for Uint16Array");
    expect(fromBytesCopy(bool, Uint16Array, misaligned).asStorage()).toEqual(new Uint16Array(2));
  });
});
