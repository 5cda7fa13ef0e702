/**
 * @file Specs: StaticMapBuilder
 */
import { configure, resetConfig } from "../config";
import { IndexOutOfRangeError, UnsetSlotError } from "../errors";
import { bool } from "../primitives/bool";
import { StaticCopyMap, StaticMap } from "./static_map";

describe("map/builder", () => {
  afterEach(() => {
    resetConfig();
  });

  it("fills slots by index or by key", () => {
    const b = StaticMap.builder<boolean, string>(bool);
    expect(b.length).toBe(2);
    b.setUnchecked(1, "yes");
    b.set(false, "no");
    const m = b.finish();
    expect(m).toBeInstanceOf(StaticMap);
    expect(m.asStorage()).toEqual(["no", "yes"]);
  });

  it("builds copy maps too", () => {
    const b = StaticCopyMap.builder<boolean, number>(bool);
    b.set(true, 1);
    b.set(false, 0);
    expect(b.finish()).toBeInstanceOf(StaticCopyMap);
  });

  it("checks coverage and indices only with debug assertions", () => {
    const unchecked = StaticMap.builder<boolean, string>(bool);
    unchecked.setUnchecked(0, "a");
    expect(unchecked.finish().length).toBe(2);

    configure({ debugAssertions: true });
    const checked = StaticMap.builder<boolean, string>(bool);
    checked.setUnchecked(0, "a");
    expect(() => checked.setUnchecked(2, "c")).toThrow(IndexOutOfRangeError);
    expect(() => checked.finish()).toThrow(UnsetSlotError);
    expect(() => checked.finish()).toThrow("static map builder finished with slot 1 unset");
    checked.setUnchecked(1, "b");
    expect(checked.finish().asStorage()).toEqual(["a", "b"]);
  });
});
