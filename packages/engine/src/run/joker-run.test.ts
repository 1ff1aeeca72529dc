import { describe, it, expect } from "vitest";
import { loadConfig } from "../config";
import { AcquisitionError } from "../errors";
import { cards } from "../testing/fixtures";
import { createRunSnapshot } from "../types/snapshot";
import { JokerRun } from "./joker-run";

const snapshot = createRunSnapshot({ seed: 7 });

function hand(text: string) {
  return { played: cards(text), held: [] };
}

describe("JokerRun membership", () => {
  it("hands out increasing slots in acquisition order", () => {
    const run = new JokerRun();
    const a = run.acquire("joker");
    const b = run.acquire("greedy_joker");
    expect(a).toEqual({ id: "joker", slot: 0 });
    expect(b).toEqual({ id: "greedy_joker", slot: 1 });
    expect(run.handles()).toEqual([a, b]);
  });

  it("refuses a duplicate unless duplicates are allowed", () => {
    const run = new JokerRun();
    run.acquire("joker");
    const refused = run.tryAcquire("joker");
    expect(refused.ok).toBe(false);
    if (!refused.ok) expect(refused.error.reason).toBe("duplicate");

    run.acquire("showman");
    expect(run.tryAcquire("joker").ok).toBe(true);
  });

  it("refuses acquisition past the slot count", () => {
    const run = new JokerRun({ config: loadConfig({ jokerSlots: 2 }, {}) });
    run.acquire("joker");
    run.acquire("greedy_joker");
    expect(() => run.acquire("hack")).toThrow(AcquisitionError);
    expect(run.size).toBe(2);
  });

  it("reports unknown identifiers as construction failures", () => {
    const result = new JokerRun().tryAcquire("not_a_joker");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe("unknown_identifier");
  });

  it("refuses to destroy a joker it does not hold", () => {
    const run = new JokerRun();
    expect(() => run.destroy({ id: "joker", slot: 3 })).toThrow(AcquisitionError);
  });
});

describe("JokerRun passes", () => {
  it("scores a hand through the pipeline", () => {
    const run = new JokerRun();
    run.acquire("ice_cream");
    const result = run.process(hand("KS"), snapshot);
    expect(result.effect.chips).toBe(100);
    expect(result.score.chips).toBe(105);
    expect(run.serializeAll().entries[0]?.state).toEqual({ chips: 95 });
  });

  it("removes a joker that destroyed itself once the pass is over", () => {
    const run = new JokerRun();
    const handle = run.acquire("ice_cream");
    run.deserializeAll({
      format: "jester.jokers",
      version: 2,
      entries: [{ id: "ice_cream", slot: handle.slot, version: 1, sellBonus: 0, state: { chips: 5 } }],
    });
    const result = run.process(hand("KS"), snapshot);
    expect(result.effect.chips).toBe(5);
    expect(result.settlement.removed).toEqual([handle]);
    expect(run.size).toBe(0);
  });

  it("adds sell value from round-end directives", () => {
    const run = new JokerRun();
    const egg = run.acquire("egg");
    expect(run.sellValue(egg)).toBe(2);
    run.endRound(snapshot);
    expect(run.sellValue(egg)).toBe(5);
    expect(run.sell(egg).value).toBe(5);
    expect(run.size).toBe(0);
  });

  it("tells the remaining jokers about a sale", () => {
    const run = new JokerRun();
    run.acquire("campfire");
    const joker = run.acquire("joker");
    const sale = run.sell(joker, snapshot);
    expect(sale.value).toBe(1);
    expect(run.serializeAll().entries[0]?.state).toEqual({ value: 1.25 });
  });

  it("starts a new cache epoch every round", () => {
    const run = new JokerRun();
    const before = run.cacheStats().epoch;
    run.startRound(snapshot);
    expect(run.cacheStats().epoch).toBe(before + 1);
  });
});

describe("JokerRun persistence", () => {
  it("restores jokers, slots and state from the gzipped blob", () => {
    const run = new JokerRun();
    run.acquire("joker");
    const iceCream = run.acquire("ice_cream");
    run.process(hand("KS"), snapshot);

    const restored = new JokerRun();
    const report = restored.deserializeAll(run.save());
    expect(report.lost).toEqual([]);
    expect(report.loaded).toEqual(run.handles());
    expect(restored.process(hand("KS"), snapshot).effect.chips).toBe(95);
    expect(restored.acquire("greedy_joker").slot).toBe(iceCream.slot + 1);
  });

  it("loads what it can and reports the rest", () => {
    const run = new JokerRun();
    const report = run.deserializeAll({
      format: "jester.jokers",
      version: 2,
      entries: [
        { id: "joker", slot: 0, version: 0, state: null },
        { id: "not_a_joker", slot: 1, version: 0, state: null },
        { id: "ice_cream", slot: 2, version: 9, state: { chips: 50 } },
        { id: "popcorn", slot: 3, version: 1, state: null },
      ],
    });
    expect(report.loaded).toEqual([{ id: "joker", slot: 0 }]);
    expect(report.lost).toEqual([
      { index: 1, id: "not_a_joker", reason: 'Unknown joker identifier: "not_a_joker"' },
      { index: 2, id: "ice_cream", reason: "Unsupported state version 9 (this build reads up to 1)" },
      { index: 3, id: "popcorn", reason: 'Saved state for "popcorn" is missing' },
    ]);
    expect(run.lost()).toEqual(report.lost);
  });
});
