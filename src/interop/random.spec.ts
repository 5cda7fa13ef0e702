/**
 * @file Specs: seeded randomness
 */
import { InvalidShapeError } from "../errors";
import { bool } from "../primitives/bool";
import { enumOf } from "../primitives/enums";
import { u32 } from "../primitives/integers";
import { never } from "../primitives/never";
import {
  bernoulli,
  createRng,
  mapSizeHint,
  open01,
  openClosed01,
  sampleStaticCopyMap,
  sampleStaticMap,
  standard,
  uniform,
  uniformIndex,
  weightedIndex,
} from "./random";

const color = enumOf(["red", "green", "blue"] as const, "Color");

function draws<T>(n: number, draw: () => T): T[] {
  return Array.from({ length: n }, draw);
}

describe("interop/random", () => {
  it("createRng is a deterministic xorshift", () => {
    expect(createRng(1)()).toBe(270369 / 4294967296);
    expect(createRng(0)()).toBe(createRng(1)());
    const a = createRng(42);
    const b = createRng(42);
    expect(draws(5, a)).toEqual(draws(5, b));
    for (const x of draws(100, createRng(7))) {
      expect(x).toBeGreaterThanOrEqual(0);
      expect(x).toBeLessThan(1);
    }
  });

  it("uniformIndex covers large ranges with 53 random bits", () => {
    expect(uniformIndex(() => 0.5, 6)).toBe(3);
    expect(uniformIndex(() => 0.5, 2 ** 40)).toBe(2 ** 39 + 2 ** 13);
  });

  it("standard draws any value of a type", () => {
    const rng = createRng(3);
    const seen = new Set(draws(50, () => standard(color).sample(rng)));
    expect([...seen].every((c) => c === "red" || c === "green" || c === "blue")).toBe(true);
    expect(() => standard(never)).toThrow(InvalidShapeError);
  });

  it("validates distribution parameters", () => {
    expect(() => uniform(3, 3)).toThrow(RangeError);
    expect(() => bernoulli(1.5)).toThrow(RangeError);
    expect(() => weightedIndex([0, 0])).toThrow(RangeError);
    expect(() => weightedIndex([1, -1])).toThrow("weightedIndex: weight 1 is -1");
  });

  it("samples within the documented ranges", () => {
    const rng = createRng(11);
    for (let i = 0; i < 100; i++) {
      const u = uniform(2, 3).sample(rng);
      expect(u >= 2 && u < 3).toBe(true);
      const o = open01.sample(rng);
      expect(o > 0 && o < 1).toBe(true);
      const oc = openClosed01.sample(rng);
      expect(oc > 0 && oc <= 1).toBe(true);
    }
    expect(draws(20, () => bernoulli(0).sample(rng)).some(Boolean)).toBe(false);
    expect(draws(20, () => bernoulli(1).sample(rng)).every(Boolean)).toBe(true);
    expect(open01.sample(() => 0)).toBe(0.5 / 4294967296);
    expect(openClosed01.sample(() => 0)).toBe(1);
  });

  it("weightedIndex skips zero weights", () => {
    expect(weightedIndex([1, 1, 2]).sample(() => 0.5)).toBe(2);
    expect(weightedIndex([1, 1, 2]).sample(() => 0)).toBe(0);
    expect(weightedIndex([0, 1]).sample(() => 0)).toBe(1);
    const rng = createRng(5);
    expect(draws(50, () => weightedIndex([0, 1, 0]).sample(rng)).every((i) => i === 1)).toBe(true);
  });

  it("fills maps reproducibly", () => {
    const a = sampleStaticMap(color, standard(bool), createRng(9));
    const b = sampleStaticMap(color, standard(bool), createRng(9));
    expect(a.length).toBe(3);
    expect(a.equals(b)).toBe(true);
    const c = sampleStaticCopyMap(bool, uniform(0, 1), createRng(9));
    expect(c.values().collect().every((x) => x >= 0 && x < 1)).toBe(true);
  });

  it("mapSizeHint scales per-value bounds by LENGTH", () => {
    expect(mapSizeHint(bool, [1, 2])).toEqual([2, 4]);
    expect(mapSizeHint(bool, [0, undefined])).toEqual([0, undefined]);
    expect(mapSizeHint(u32, [2 ** 22, 2 ** 22])).toEqual([Number.MAX_SAFE_INTEGER, undefined]);
  });
});
