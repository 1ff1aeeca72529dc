import { describe, it, expect } from "vitest";
import type { Effect } from "@jester/schema";
import {
  EffectAccumulator,
  IDENTITY_EFFECT,
  MAX_SAFE,
  accumulate,
  applyScore,
  applyToWallet,
  combineEffects,
  effect,
  isIdentityEffect,
  saturatingAdd,
} from "./effect";
import { createRng } from "./prng";

const MAX_MULT = 1_000_000;

describe("effect identity", () => {
  it("has neutral values in every field", () => {
    expect(IDENTITY_EFFECT.chips).toBe(0);
    expect(IDENTITY_EFFECT.mult).toBe(0);
    expect(IDENTITY_EFFECT.multMultiplier).toBe(1);
    expect(IDENTITY_EFFECT.money).toBe(0);
    expect(IDENTITY_EFFECT.destroySelf).toBe(false);
    expect(isIdentityEffect(IDENTITY_EFFECT)).toBe(true);
  });

  it("is neutral under combination", () => {
    const e = effect({ chips: 30, multMultiplier: 1.5, message: "hi" });
    expect(combineEffects(IDENTITY_EFFECT, e)).toEqual(e);
    expect(combineEffects(e, IDENTITY_EFFECT)).toEqual(e);
  });
});

describe("combineEffects", () => {
  it("sums, multiplies, ORs and concatenates", () => {
    const a = effect({
      chips: 10,
      mult: 4,
      multMultiplier: 2,
      money: 3,
      destroySelf: true,
      directives: [{ kind: "prevent_death" }],
      message: "first",
    });
    const b = effect({
      chips: 5,
      mult: 1,
      multMultiplier: 1.5,
      money: -1,
      directives: [{ kind: "disable_boss_blind" }],
      message: "",
    });
    const c = combineEffects(a, b);
    expect(c.chips).toBe(15);
    expect(c.mult).toBe(5);
    expect(c.multMultiplier).toBe(3);
    expect(c.money).toBe(2);
    expect(c.destroySelf).toBe(true);
    expect(c.directives).toEqual([{ kind: "prevent_death" }, { kind: "disable_boss_blind" }]);
    expect(c.message).toBe("first");
  });

  it("keeps the last non-empty message", () => {
    const c = combineEffects(effect({ message: "a" }), effect({ message: "b" }));
    expect(c.message).toBe("b");
  });
});

describe("saturatingAdd", () => {
  it("saturates at the safe-integer bounds", () => {
    expect(saturatingAdd(MAX_SAFE, 10)).toBe(MAX_SAFE);
    expect(saturatingAdd(-MAX_SAFE, -10)).toBe(-MAX_SAFE);
  });

  it("reports non-finite operands as NaN", () => {
    expect(saturatingAdd(1, Number.POSITIVE_INFINITY)).toBeNaN();
    expect(saturatingAdd(Number.NaN, 1)).toBeNaN();
  });
});

describe("EffectAccumulator", () => {
  it("adds +4, +4 and ×2 in order", () => {
    const total = accumulate(
      [effect({ mult: 4 }), effect({ mult: 4 }), effect({ multMultiplier: 2 })],
      MAX_MULT
    );
    expect(total.mult).toBe(8);
    expect(total.multMultiplier).toBe(2);
    expect(applyScore({ chips: 10, mult: 2 }, total, { maxMult: MAX_MULT })).toEqual({
      chips: 10,
      mult: 20,
      score: 200,
    });
  });

  it("clamps a 2,000,000 mult contribution to exactly 1,000,000", () => {
    const total = accumulate([effect({ mult: 2_000_000 })], MAX_MULT);
    expect(total.mult).toBe(1_000_000);
  });

  it("clamps the multiplier to [0, maxMult]", () => {
    expect(accumulate([effect({ multMultiplier: -3 })], MAX_MULT).multMultiplier).toBe(0);
    expect(
      accumulate([effect({ multMultiplier: 5000 }), effect({ multMultiplier: 5000 })], MAX_MULT)
        .multMultiplier
    ).toBe(MAX_MULT);
  });

  it("rejects a non-finite field and keeps the previous value", () => {
    const acc = new EffectAccumulator(MAX_MULT);
    acc.add(effect({ chips: 20, mult: 3 }));
    const rejected = acc.add(effect({ chips: Number.NaN, mult: 2 }));
    expect(rejected).toEqual([{ field: "chips", value: Number.NaN }]);
    expect(acc.total.chips).toBe(20);
    expect(acc.total.mult).toBe(5);
  });

  it("rejects an infinite multiplier", () => {
    const acc = new EffectAccumulator(MAX_MULT);
    acc.add(effect({ multMultiplier: 3 }));
    const rejected = acc.add(effect({ multMultiplier: Number.POSITIVE_INFINITY }));
    expect(rejected.map((r) => r.field)).toEqual(["multMultiplier"]);
    expect(acc.total.multMultiplier).toBe(3);
  });

  it("lets money go negative inside the aggregate", () => {
    const total = accumulate([effect({ money: 3 }), effect({ money: -10 })], MAX_MULT);
    expect(total.money).toBe(-7);
  });
});

describe("applyScore", () => {
  it("clamps the applied product to maxMult", () => {
    const total = accumulate(
      [effect({ mult: 900_000 }), effect({ multMultiplier: 3 })],
      MAX_MULT
    );
    expect(applyScore({ chips: 1, mult: 100_000 }, total, { maxMult: MAX_MULT }).mult).toBe(
      MAX_MULT
    );
  });

  it("keeps mult and money within bounds for random effect sequences", () => {
    const rng = createRng(2024);
    for (let run = 0; run < 200; run++) {
      const effects: Effect[] = [];
      const length = rng.nextInt(0, 12);
      for (let i = 0; i < length; i++) {
        effects.push(
          effect({
            mult: rng.nextInt(-500_000, 3_000_000),
            multMultiplier: rng.next() * 40,
            money: rng.nextInt(-50, 50),
          })
        );
      }
      const total = accumulate(effects, MAX_MULT);
      const applied = applyScore({ chips: 50, mult: 4 }, total, { maxMult: MAX_MULT });
      expect(applied.mult).toBeLessThanOrEqual(MAX_MULT);
      expect(applied.mult).toBeGreaterThanOrEqual(0);
      expect(applyToWallet(rng.nextInt(0, 30), total)).toBeGreaterThanOrEqual(0);
    }
  });
});

describe("applyToWallet", () => {
  it("adds money and interest", () => {
    expect(applyToWallet(10, effect({ money: 4, interestBonus: 2 }))).toBe(16);
  });

  it("clamps at zero", () => {
    expect(applyToWallet(5, effect({ money: -12 }))).toBe(0);
  });

  it("clamps at the credit floor", () => {
    expect(applyToWallet(5, effect({ money: -12 }), -20)).toBe(-7);
    expect(applyToWallet(5, effect({ money: -40 }), -20)).toBe(-20);
  });
});
