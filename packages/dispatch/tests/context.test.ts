/**
 * Tests for DispatchContext and ResultStore
 */

import { describe, it, expect, vi } from "vitest";
import { DispatchContext, ResultStore } from "@tokenloom/dispatch";

interface State {
  depth: number;
  label: string;
}

interface Lists {
  imports: string;
}

describe("DispatchContext", () => {
  it("should store and remove values", () => {
    const context = new DispatchContext<State, Lists>();
    expect(context.get("depth")).toBeUndefined();
    expect(context.has("depth")).toBe(false);

    context.set("depth", 2);
    expect(context.get("depth")).toBe(2);
    expect(context.has("depth")).toBe(true);

    expect(context.remove("depth")).toBe(true);
    expect(context.remove("depth")).toBe(false);
    expect(context.getOrDefault("depth", 7)).toBe(7);
  });

  it("should create a value once", () => {
    const context = new DispatchContext<State, Lists>();
    const factory = vi.fn(() => "first");
    expect(context.getOrAdd("label", factory)).toBe("first");
    expect(context.getOrAdd("label", factory)).toBe("first");
    expect(factory).toHaveBeenCalledTimes(1);
  });

  it("should append to lists", () => {
    const context = new DispatchContext<State, Lists>();
    expect(context.getList("imports")).toEqual([]);
    context.addToList("imports", "a");
    context.addToList("imports", "b");
    expect(context.getList("imports")).toEqual(["a", "b"]);
  });

  it("should clear values and lists", () => {
    const context = new DispatchContext<State, Lists>();
    context.set("label", "x");
    context.addToList("imports", "a");
    context.clear();
    expect(context.has("label")).toBe(false);
    expect(context.getList("imports")).toEqual([]);
  });
});

describe("ResultStore", () => {
  const isString = (value: unknown): value is string => typeof value === "string";

  it("should keep results per handler in order", () => {
    const store = new ResultStore();
    store.add("a", 1);
    store.add("b", "x");
    store.add("a", 2);
    store.add("a", undefined);

    expect(store.size).toBe(3);
    expect(store.all("a")).toEqual([1, 2]);
    expect(store.last("a")).toBe(2);
    expect(store.last("missing")).toBeUndefined();
    expect(store.all("missing")).toEqual([]);
  });

  it("should search across handlers with a guard", () => {
    const store = new ResultStore();
    store.add("a", "one");
    store.add("b", 2);
    store.add("c", "three");
    expect(store.latest(isString)).toBe("three");
    expect(store.every(isString)).toEqual(["one", "three"]);
    expect(store.last("b", isString)).toBeUndefined();
  });

  it("should hand out copies of its lists", () => {
    const store = new ResultStore();
    store.add("a", 1);
    const first = store.all("a");
    store.add("a", 2);
    expect(first).toEqual([1]);
  });

  it("should empty on clear", () => {
    const store = new ResultStore();
    store.add("a", 1);
    store.clear();
    expect(store.size).toBe(0);
    expect(store.last("a")).toBeUndefined();
  });
});
