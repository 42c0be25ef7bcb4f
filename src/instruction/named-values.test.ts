import { describe, it, expect } from "vitest";
import { NamedValueConflictError } from "../errors.js";
import { NamedValueMap } from "./named-values.js";

describe("NamedValueMap", () => {
  function sample(): NamedValueMap {
    return new NamedValueMap([
      { slot: 0, value: 3, name: "kStateIdle" },
      { slot: 0, value: 4, name: "kStateWalk" },
      { slot: 2, value: 3, name: "kLayerFront" },
    ]);
  }

  it("should look up names by value and values by name", () => {
    const map = sample();
    expect(map.getName(0, 3)).toBe("kStateIdle");
    expect(map.getValue(0, "kStateWalk")).toBe(4);
  });

  it("should scope bindings to their slot", () => {
    const map = sample();
    expect(map.getName(2, 3)).toBe("kLayerFront");
    expect(map.getName(1, 3)).toBeUndefined();
    expect(map.getValue(2, "kStateIdle")).toBeUndefined();
  });

  it("should be empty by default", () => {
    const map = new NamedValueMap();
    expect(map.size).toBe(0);
    expect(map.all()).toEqual([]);
    expect(map.slots()).toEqual([]);
  });

  it("should reject a second name for the same value", () => {
    const build = () =>
      new NamedValueMap([
        { slot: 0, value: 3, name: "kStateIdle" },
        { slot: 0, value: 3, name: "kStateOther" },
      ]);
    expect(build).toThrow(NamedValueConflictError);
    expect(build).toThrow("value 3 is already named in slot 0");
  });

  it("should reject a second value for the same name", () => {
    let caught: unknown;
    try {
      new NamedValueMap([
        { slot: 1, value: 0, name: "kZero" },
        { slot: 0, value: 3, name: "kStateIdle" },
        { slot: 0, value: 9, name: "kStateIdle" },
      ]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NamedValueConflictError);
    if (caught instanceof NamedValueConflictError) {
      expect(caught.conflict).toBe("duplicate-name");
      expect(caught.index).toBe(2);
      expect(caught.message).toBe('name "kStateIdle" is already bound in slot 0');
    }
  });

  it("should keep negative values distinct", () => {
    const map = new NamedValueMap([
      { slot: 1, value: -1, name: "kNone" },
      { slot: 1, value: 1, name: "kOne" },
    ]);
    expect(map.getName(1, -1)).toBe("kNone");
    expect(map.getName(1, 1)).toBe("kOne");
  });

  it("should list bindings and slots", () => {
    const map = sample();
    expect(map.all()).toEqual([
      { slot: 0, value: 3, name: "kStateIdle" },
      { slot: 0, value: 4, name: "kStateWalk" },
      { slot: 2, value: 3, name: "kLayerFront" },
    ]);
    expect(map.slots()).toEqual([0, 2]);
  });

  it("should not follow later changes to the bindings it was built from", () => {
    const bindings = [{ slot: 0, value: 3, name: "kStateIdle" }];
    const map = new NamedValueMap(bindings);
    bindings[0].slot = 7;
    bindings.push({ slot: 0, value: 99, name: "kInjected" });
    expect(map.all()).toEqual([{ slot: 0, value: 3, name: "kStateIdle" }]);
    expect(map.getName(0, 99)).toBeUndefined();
  });

  it("should expose frozen bindings", () => {
    const all = sample().all();
    expect(Object.isFrozen(all)).toBe(true);
    expect(all.every((entry) => Object.isFrozen(entry))).toBe(true);
  });
});
