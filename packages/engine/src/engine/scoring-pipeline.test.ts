import { describe, it, expect } from "vitest";
import type { Effect, InstanceHandle, JokerId } from "@jester/schema";
import { DEFAULT_CONFIG, loadConfig } from "../config";
import { createBehavior } from "../registry/factory";
import { ConditionCache } from "../state/condition-cache";
import { BehaviorStateStore } from "../state/state-store";
import { cards } from "../testing/fixtures";
import type { Behavior, Identity, ScoringContext } from "../types/behavior";
import { createRunSnapshot } from "../types/snapshot";
import { IDENTITY_EFFECT, effect } from "./effect";
import { ScoringPipeline, type PipelineEntry } from "./scoring-pipeline";

function pipeline(config = DEFAULT_CONFIG): ScoringPipeline {
  return new ScoringPipeline({ config, cache: new ConditionCache(), store: new BehaviorStateStore() });
}

function entry(behavior: Behavior, slot: number): PipelineEntry {
  const handle: InstanceHandle = { id: behavior.identity.id, slot };
  return { handle, behavior, sellValue: 2 };
}

function registered(id: JokerId, slot: number): PipelineEntry {
  return entry(createBehavior(id), slot);
}

const TEST_IDENTITY: Identity = {
  id: "joker",
  name: "Test Joker",
  description: "",
  rarity: "common",
  baseCost: 2,
  copyable: true,
};

/** A behavior whose hand hook returns `onHand` and whose card hook returns `onCard`. */
function scripted(
  onHand: (ctx: ScoringContext) => Effect,
  onCard: (ctx: ScoringContext) => Effect = () => IDENTITY_EFFECT
): Behavior {
  return {
    identity: TEST_IDENTITY,
    gameplay: { onHandPlayed: onHand, onCardScored: (ctx) => onCard(ctx) },
  };
}

const snapshot = createRunSnapshot({ seed: 42 });

describe("ScoringPipeline.process", () => {
  it("returns the identity effect with no behaviors", () => {
    const result = pipeline().process([], { played: cards("KS KH"), held: [] }, snapshot);
    expect(result.effect).toEqual(IDENTITY_EFFECT);
    expect(result.jokersEvaluated).toBe(0);
    expect(result.issues).toEqual([]);
    expect(result.score).toEqual({ chips: 10, mult: 2, score: 20 });
  });

  it("adds mult in acquisition order and applies the multiplier to the sum", () => {
    const entries = [registered("joker", 0), registered("joker", 1), registered("the_duo", 2)];
    const result = pipeline().process(entries, { played: cards("KS KH"), held: [] }, snapshot);
    expect(result.effect.mult).toBe(8);
    expect(result.effect.multMultiplier).toBe(2);
    expect(result.hand.handType).toBe("pair");
    // (2 + 8) × 2
    expect(result.score).toEqual({ chips: 10, mult: 20, score: 200 });
    expect(result.jokersEvaluated).toBe(3);
  });

  it("clamps a huge mult contribution to maxMult", () => {
    const huge = entry(scripted(() => effect({ mult: 2_000_000 })), 0);
    const result = pipeline().process([huge], { played: cards("KS"), held: [] }, snapshot);
    expect(result.effect.mult).toBe(1_000_000);
    expect(result.score.mult).toBe(1_000_000);
    expect(result.issues).toEqual([]);
  });

  it("is deterministic for the same seed and inputs", () => {
    const rolling = () => entry(scripted((ctx) => effect({ mult: ctx.rng.nextInt(1, 100) })), 0);
    const hand = { played: cards("AS AD"), held: [] };
    const a = pipeline().process([rolling()], hand, snapshot);
    const b = pipeline().process([rolling()], hand, snapshot);
    expect(a.effect).toEqual(b.effect);
  });

  it("reports a throwing hook and keeps evaluating the rest", () => {
    const broken = entry(
      scripted(() => {
        throw new Error("boom");
      }),
      0
    );
    const result = pipeline().process([broken, registered("joker", 1)], { played: cards("KS"), held: [] }, snapshot);
    expect(result.effect.mult).toBe(4);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]?.code).toBe("hook_failed");
    expect(result.issues[0]?.hook).toBe("onHandPlayed");
    expect(result.issues[0]?.error.message).toBe("joker.onHandPlayed failed: boom");
  });

  it("keeps the previous value of a non-finite field and reports it", () => {
    const bad = entry(scripted(() => effect({ chips: Number.POSITIVE_INFINITY, mult: 3 })), 0);
    const result = pipeline().process([registered("joker", 1), bad], { played: cards("KS"), held: [] }, snapshot);
    expect(result.effect.chips).toBe(0);
    expect(result.effect.mult).toBe(7);
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]?.code).toBe("numeric_bound");
  });

  it("collects self-destroy requests without removing mid-pass", () => {
    const doomed = entry(scripted(() => effect({ mult: 1, destroySelf: true })), 3);
    const result = pipeline().process([doomed, registered("joker", 4)], { played: cards("KS"), held: [] }, snapshot);
    expect(result.removals).toEqual([{ id: "joker", slot: 3 }]);
    expect(result.effect.mult).toBe(5);
  });

  it("repeats a card's pass for the retriggers asked on its first pass", () => {
    const entries = [registered("hack", 0), registered("greedy_joker", 1)];
    const result = pipeline().process(entries, { played: cards("2D 2D"), held: [] }, snapshot);
    // two cards × (first pass + one retrigger) × 3 mult
    expect(result.effect.mult).toBe(12);
    expect(result.retriggers).toBe(2);
    expect(result.effect.retriggers).toBe(2);
  });

  it("stops retriggering at the per-hand cap", () => {
    const config = loadConfig({ maxTotalRetriggers: 1 }, {});
    const entries = [registered("hack", 0), registered("greedy_joker", 1)];
    const result = pipeline(config).process(entries, { played: cards("2D 2D"), held: [] }, snapshot);
    expect(result.effect.mult).toBe(9);
    expect(result.retriggers).toBe(1);
    expect(result.effect.retriggers).toBe(1);
  });

  it("passes over cards when nothing scores", () => {
    let cardCalls = 0;
    const counting = entry(
      scripted(
        () => IDENTITY_EFFECT,
        () => {
          cardCalls++;
          return IDENTITY_EFFECT;
        }
      ),
      0
    );
    const result = pipeline().process([counting], { played: [], held: [] }, snapshot);
    expect(cardCalls).toBe(0);
    expect(result.effect).toEqual(IDENTITY_EFFECT);
  });
});

describe("ScoringPipeline.resolveRules", () => {
  it("folds modifiers over the configured base", () => {
    const rules = pipeline().resolveRules([registered("juggler", 0), registered("drunkard", 1)], snapshot);
    expect(rules.handSize).toBe(9);
    expect(rules.discards).toBe(4);
  });
});

describe("ScoringPipeline.lifecycle", () => {
  it("skips behaviors without the hook", () => {
    const withRoundEnd: Behavior = {
      identity: TEST_IDENTITY,
      lifecycle: { onRoundEnd: () => effect({ money: 4 }) },
    };
    const result = pipeline().lifecycle(
      [entry(withRoundEnd, 0), registered("joker", 1)],
      snapshot,
      "onRoundEnd",
      (behavior, ctx) => behavior.lifecycle?.onRoundEnd?.(ctx)
    );
    expect(result.effect.money).toBe(4);
    expect(result.jokersEvaluated).toBe(1);
  });
});
