import { describe, it, expect, afterEach } from "vitest";
import { JOKER_IDS, type UnlockCondition } from "@jester/schema";
import { CatalogError } from "../errors";
import { ALL_DEFINITIONS } from "../jokers/index";
import { JokerRun } from "../run/joker-run";
import { cards } from "../testing/fixtures";
import { createRunSnapshot } from "../types/snapshot";
import { readCatalog } from "./catalog";
import { BehaviorRegistry, getRegistry, isUnlocked, resetRegistryForTests } from "./registry";

afterEach(() => {
  resetRegistryForTests();
});

describe("getRegistry", () => {
  it("publishes one registry per process", () => {
    expect(getRegistry()).toBe(getRegistry());
  });

  it("covers every identifier with metadata and a working constructor", () => {
    const registry = getRegistry();
    expect(registry.size).toBe(JOKER_IDS.length);
    expect(registry.ids()).toEqual(JOKER_IDS);
    for (const id of JOKER_IDS) {
      const entry = registry.entry(id);
      expect(entry?.metadata.id).toBe(id);
      const behavior = entry?.construct();
      expect(behavior?.identity.id).toBe(id);
    }
  });

  it("marks a joker copyable exactly when it has a gameplay role", () => {
    const registry = getRegistry();
    for (const id of registry.ids()) {
      const entry = registry.entry(id);
      expect({ id, copyable: entry?.construct().gameplay !== undefined }).toEqual({
        id,
        copyable: entry?.metadata.copyable,
      });
    }
  });
});

describe("stateful jokers", () => {
  const registry = getRegistry();
  const stateful = JOKER_IDS.filter((id) => registry.entry(id)?.construct().state !== undefined);

  it("includes the scaling and rotating jokers", () => {
    expect(stateful).toEqual(expect.arrayContaining(["ice_cream", "popcorn", "rocket", "castle"]));
  });

  it.each(stateful)("%s keeps its state when given a malformed payload", (id) => {
    const state = registry.entry(id)?.construct().state;
    expect(state).toBeDefined();
    if (state === undefined) return;
    const before = state.serializeState();
    expect(() => state.deserializeState("corrupt", state.stateVersion)).toThrow();
    expect(() => state.deserializeState([1, 2, 3], state.stateVersion)).toThrow();
    expect(state.serializeState()).toEqual(before);
  });

  it.each(stateful)("%s restores into a fresh instance with equal state", (id) => {
    const snapshot = createRunSnapshot({ seed: 11 });
    const run = new JokerRun();
    run.acquire(id);
    run.process({ played: cards("KS KH 5D"), held: cards("2C") }, snapshot);
    run.endRound(snapshot);

    const restored = new JokerRun();
    const report = restored.deserializeAll(run.serializeAll());
    expect(report.lost).toEqual([]);
    expect(restored.serializeAll()).toEqual(run.serializeAll());
  });
});

describe("BehaviorRegistry.build", () => {
  const catalog = readCatalog();

  it("rejects a definition without a catalog entry", () => {
    const partial = catalog.filter((m) => m.id !== "joker");
    expect(() => BehaviorRegistry.build(partial, ALL_DEFINITIONS)).toThrow(
      'Joker "joker" has no catalog entry'
    );
  });

  it("rejects a catalog entry without a definition", () => {
    const definitions = ALL_DEFINITIONS.filter((d) => d.id !== "hack");
    expect(() => BehaviorRegistry.build(catalog, definitions)).toThrow(CatalogError);
  });

  it("rejects an identifier defined twice", () => {
    const [first] = ALL_DEFINITIONS;
    const doubled = first === undefined ? ALL_DEFINITIONS : [...ALL_DEFINITIONS, first];
    expect(() => BehaviorRegistry.build(catalog, doubled)).toThrow("is defined twice");
  });

  it("filters by rarity in declaration order", () => {
    const legendaries = getRegistry().byRarity("legendary").map((m) => m.id);
    expect(legendaries).toEqual(["canio", "triboulet", "yorick", "chicot", "perkeo"]);
  });
});

describe("isUnlocked", () => {
  const progress = { ante: 2, flags: ["gros_michel_extinct"] };

  it("reads every unlock kind", () => {
    expect(isUnlocked({ kind: "always" }, progress)).toBe(true);
    expect(isUnlocked({ kind: "min_ante", ante: 3 }, progress)).toBe(false);
    expect(isUnlocked({ kind: "run_flag", flag: "gros_michel_extinct" }, progress)).toBe(true);
    expect(isUnlocked({ kind: "never_in_shop" }, progress)).toBe(false);
  });

  it("keeps Cavendish out of the shop until Gros Michel dies out", () => {
    const unlock: UnlockCondition = getRegistry().metadata("cavendish")?.unlock ?? { kind: "always" };
    expect(unlock).toEqual({ kind: "run_flag", flag: "gros_michel_extinct" });
    expect(isUnlocked(unlock, { ante: 5, flags: [] })).toBe(false);
    expect(isUnlocked(unlock, progress)).toBe(true);
  });

  it("publishes frozen unlock conditions", () => {
    const metadata = getRegistry().metadata("cavendish");
    expect(Object.isFrozen(metadata)).toBe(true);
    expect(Object.isFrozen(metadata?.unlock)).toBe(true);
  });
});
