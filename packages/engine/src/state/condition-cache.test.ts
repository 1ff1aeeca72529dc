import { describe, it, expect } from "vitest";
import { ConditionCache } from "./condition-cache";

describe("ConditionCache", () => {
  it("hits when slot, key, fingerprint and epoch all match", () => {
    const cache = new ConditionCache();
    cache.store(3, "steel", "deck:52", 4);
    expect(cache.lookup(3, "steel", "deck:52")).toBe(4);
    expect(cache.stats()).toMatchObject({ hits: 1, misses: 0, entries: 1 });
  });

  it("misses on a different fingerprint or slot", () => {
    const cache = new ConditionCache();
    cache.store(3, "steel", "deck:52", 4);
    expect(cache.lookup(3, "steel", "deck:51")).toBeUndefined();
    expect(cache.lookup(4, "steel", "deck:52")).toBeUndefined();
    expect(cache.stats().misses).toBe(2);
  });

  it("invalidates everything on an epoch bump", () => {
    const cache = new ConditionCache();
    cache.store(1, "a", "x", true);
    cache.store(2, "b", "y", "spades");
    cache.bumpEpoch();
    expect(cache.lookup(1, "a", "x")).toBeUndefined();
    expect(cache.lookup(2, "b", "y")).toBeUndefined();
    expect(cache.epoch).toBe(1);
  });

  it("overwrites a stale entry in place", () => {
    const cache = new ConditionCache();
    cache.store(1, "a", "x", 1);
    cache.bumpEpoch();
    cache.store(1, "a", "x", 2);
    expect(cache.lookup(1, "a", "x")).toBe(2);
    expect(cache.stats().entries).toBe(1);
  });

  it("forgets one instance without touching the others", () => {
    const cache = new ConditionCache();
    cache.store(1, "a", "x", 1);
    cache.store(12, "a", "x", 2);
    cache.forget(1);
    expect(cache.lookup(1, "a", "x")).toBeUndefined();
    expect(cache.lookup(12, "a", "x")).toBe(2);
  });

  it("never hits when disabled", () => {
    const cache = new ConditionCache(false);
    cache.store(1, "a", "x", 1);
    expect(cache.lookup(1, "a", "x")).toBeUndefined();
    expect(cache.hitRate()).toBe(0);
  });

  it("reports the hit rate", () => {
    const cache = new ConditionCache();
    cache.store(1, "a", "x", 1);
    cache.lookup(1, "a", "x");
    cache.lookup(1, "a", "x");
    cache.lookup(1, "a", "x");
    cache.lookup(1, "b", "x");
    expect(cache.hitRate()).toBe(0.75);
  });
});
