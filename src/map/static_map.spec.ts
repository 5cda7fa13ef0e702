/**
 * @file Specs: StaticMap and StaticCopyMap
 */
import { inspect } from "node:util";
import { configure, resetConfig } from "../config";
import { LengthMismatchError } from "../errors";
import { Linearized } from "../linearize/linearized";
import { bool } from "../primitives/bool";
import { enumOf } from "../primitives/enums";
import { u8 } from "../primitives/integers";
import { StaticCopyMap, StaticMap } from "./static_map";

const color = enumOf(["red", "green", "blue"] as const, "Color");

describe("map/static_map", () => {
  afterEach(() => {
    resetConfig();
  });

  describe("construction", () => {
    it("fromFn calls the generator once per key in index order", () => {
      const calls: string[] = [];
      const m = StaticMap.fromFn(color, (c) => {
        calls.push(c);
        return c.length;
      });
      expect(calls).toEqual(["red", "green", "blue"]);
      expect(m.length).toBe(3);
      expect(m.get("green")).toBe(5);
    });

    it("fromStorage wraps without copying and checks the length", () => {
      const slots = [1, 2];
      const m = StaticMap.fromStorage(bool, slots);
      m.set(true, 5);
      expect(slots).toEqual([1, 5]);
      expect(m.asStorage()).toBe(slots);
      expect(() => StaticMap.fromStorage(bool, [1, 2, 3])).toThrow(LengthMismatchError);
      expect(() => StaticMap.fromStorage(bool, [1])).toThrow("length mismatch: expected 2 elements, got 1");
    });

    it("tryFrom copies", () => {
      const slots = [1, 2];
      const m = StaticMap.tryFrom(bool, slots);
      slots[0] = 9;
      expect(m.get(false)).toBe(1);
      try {
        StaticMap.tryFrom(color, slots);
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(LengthMismatchError);
        if (e instanceof LengthMismatchError) {
          expect(e.expected).toBe(3);
          expect(e.actual).toBe(2);
        }
      }
    });

    it("filled shares one value, withDefault makes one per slot", () => {
      const shared = StaticMap.filled(bool, { n: 0 });
      expect(shared.get(false)).toBe(shared.get(true));
      const fresh = StaticMap.withDefault(bool, () => ({ n: 0 }));
      expect(fresh.get(false)).not.toBe(fresh.get(true));
      expect(fresh.get(false)).toEqual({ n: 0 });
    });

    it("fromEntries starts from defaults and applies entries in order", () => {
      const m = StaticMap.fromEntries(
        color,
        [
          ["blue", 1],
          ["red", 2],
          ["blue", 3],
        ],
        () => 0,
      );
      expect(m.asStorage()).toEqual([2, 0, 3]);
    });
  });

  describe("access", () => {
    it("reads and writes through cached indices", () => {
      const m = StaticMap.filled(u8, 0);
      const k = Linearized.of(u8, 200);
      m.setAt(k, 7);
      expect(m.getAt(k)).toBe(7);
      expect(m.get(200)).toBe(7);
    });

    it("update replaces a value and returns it", () => {
      const m = StaticMap.filled(color, 1);
      expect(m.update("green", (v, k) => v + k.length)).toBe(6);
      expect(m.asStorage()).toEqual([1, 6, 1]);
    });

    it("clear and extend", () => {
      const m = StaticMap.fromFn(color, (c): string => c);
      m.clear(() => "-");
      expect(m.asStorage()).toEqual(["-", "-", "-"]);
      m.extend([["red", "r"]]);
      expect(m.asStorage()).toEqual(["r", "-", "-"]);
    });
  });

  describe("transforms and iteration", () => {
    const scores = StaticMap.fromFn(bool, (b) => (b ? 22 : 11));

    it("map and mapValues build new maps", () => {
      expect(scores.map((k, v) => `${k}=${v}`).asStorage()).toEqual(["false=11", "true=22"]);
      expect(scores.mapValues((v) => v * 2).get(true)).toBe(44);
      expect(scores.get(true)).toBe(22);
    });

    it("iterates keys, values and entries in index order", () => {
      expect(scores.keys().collect()).toEqual([false, true]);
      expect(scores.values().collect()).toEqual([11, 22]);
      expect([...scores]).toEqual([
        [false, 11],
        [true, 22],
      ]);
      expect(scores.iter().nextBack()).toEqual([true, 22]);
      expect(scores.intoIter().collect()).toEqual(scores.entries().collect());
    });

    it("iterMut writes through to the map", () => {
      const m = StaticMap.fromFn(color, () => 0);
      for (const entry of m.iterMut()) {
        entry.value = entry.index * 10;
      }
      expect(m.asStorage()).toEqual([0, 10, 20]);
    });

    it("clone copies the storage", () => {
      const box = StaticMap.fromFn(bool, () => ({ n: 1 }));
      const shallow = box.clone();
      const deep = box.clone((v) => ({ ...v }));
      expect(shallow.asStorage()).not.toBe(box.asStorage());
      expect(shallow.get(true)).toBe(box.get(true));
      expect(deep.get(true)).not.toBe(box.get(true));
      expect(deep.get(true)).toEqual({ n: 1 });
    });
  });

  describe("comparison and output", () => {
    it("equals, compare and hash look at slots in index order", () => {
      const a = StaticMap.tryFrom(bool, [1, 2]);
      const b = StaticMap.tryFrom(bool, [1, 3]);
      expect(a.equals(StaticMap.tryFrom(bool, [1, 2]))).toBe(true);
      expect(a.equals(b)).toBe(false);
      expect(a.compare(b)).toBe(-1);
      expect(b.compare(a)).toBe(1);
      expect(a.compare(a.clone())).toBe(0);
      expect(a.hash()).toBe(StaticMap.tryFrom(bool, [1, 2]).hash());
      expect(a.hash()).not.toBe(b.hash());
    });

    it("custom comparators", () => {
      const a = StaticMap.tryFrom(bool, [{ n: 1 }, { n: 2 }]);
      const b = StaticMap.tryFrom(bool, [{ n: 1 }, { n: 2 }]);
      expect(a.equals(b)).toBe(false);
      expect(a.equals(b, (x, y) => x.n === y.n)).toBe(true);
      expect(a.compare(b, (x, y) => x.n - y.n)).toBe(0);
      expect(() => a.compare(b)).toThrow(TypeError);
    });

    it("formats as {key: value}", () => {
      const m = StaticMap.fromFn(bool, (b) => (b ? 22 : 11));
      expect(m.format()).toBe("{false: 11, true: 22}");
      expect(String(m)).toBe("{false: 11, true: 22}");
      expect(inspect(m)).toBe("StaticMap(2) {false: 11, true: 22}");
      expect(StaticMap.fromFn(color, (c) => c[0]).format()).toBe("{\"red\": 'r', \"green\": 'g', \"blue\": 'b'}");
    });

    it("serializes through JSON.stringify", () => {
      const m = StaticMap.fromFn(bool, (b) => (b ? 22 : 11));
      expect(JSON.stringify(m)).toBe('{"false":11,"true":22}');
      expect(JSON.stringify(StaticMap.fromFn(color, (c) => c.length))).toBe('{"red":3,"green":5,"blue":4}');
    });
  });

  it("warns once per key type when a map exceeds the size threshold", () => {
    const warn = vi.fn();
    configure({ largeMapWarningThreshold: 2, logger: { debug: () => {}, warn } });
    const big = enumOf(["p", "q", "r"], "pqr");
    StaticMap.filled(big, 0);
    StaticMap.fromFn(big, () => 1);
    StaticMap.filled(bool, 0);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("allocating 3 slots for a map keyed by pqr (threshold 2)");
  });

  it("stays quiet when logging is silenced", () => {
    const warn = vi.fn();
    configure({ largeMapWarningThreshold: 0, logLevel: "silent", logger: { debug: () => {}, warn } });
    StaticMap.filled(enumOf(["s"], "s"), 0);
    expect(warn).not.toHaveBeenCalled();
  });
});

describe("map/static_copy_map", () => {
  it("typed maps keep their typed-array storage through copies", () => {
    const m = StaticCopyMap.typed(bool, Float64Array, (b) => (b ? 0.75 : 0.25));
    expect(m.asStorage()).toBeInstanceOf(Float64Array);
    const c = m.copy();
    c.set(true, 1);
    expect(c.asStorage()).toBeInstanceOf(Float64Array);
    expect(m.get(true)).toBe(0.75);
    expect(c.get(true)).toBe(1);
  });

  it("converts to and from StaticMap over shared storage", () => {
    const m = StaticMap.fromFn(bool, (b): number => (b ? 1 : 0));
    const c = m.asCopy();
    c.set(false, 9);
    expect(m.get(false)).toBe(9);
    const back = c.asStaticMap();
    back.set(true, 8);
    expect(c.get(true)).toBe(8);
    expect(c.intoStaticMap().asStorage()).toBe(m.asStorage());
    expect(m.intoCopy().asStorage()).toBe(m.asStorage());
  });

  it("shares the StaticMap operations", () => {
    const c = StaticCopyMap.fromEntries<"red" | "green" | "blue", string>(color, [["green", "g"]], "");
    expect(c.asStorage()).toEqual(["", "g", ""]);
    expect(c.mapValues((s) => s.length).asStorage()).toEqual([0, 1, 0]);
    expect(c.map((k, v) => v || k).asStorage()).toEqual(["red", "g", "blue"]);
    expect(c.clone().equals(c)).toBe(true);
    expect(StaticCopyMap.tryFrom<boolean, bigint>(bool, [1n, 2n]).compare(StaticCopyMap.filled<boolean, bigint>(bool, 1n))).toBe(1);
    expect(StaticCopyMap.fromFn(bool, (b) => !b).format()).toBe("{false: true, true: false}");
  });
});
