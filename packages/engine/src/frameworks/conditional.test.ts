import { describe, it, expect } from "vitest";
import { ConstructionError, StateDeserializeError } from "../errors";
import { cards, createTestContext, testIdentity } from "../testing/fixtures";
import { ConditionalBehavior } from "./conditional";

const pairHand = { played: cards("KS KH 4D"), held: [] };

describe("ConditionalBehavior", () => {
  it("fires a rule when its expression holds", () => {
    const joker = new ConditionalBehavior(testIdentity(), {
      rules: [{ on: "hand", when: 'hand_type == "pair"', effect: { mult: 8 } }],
    });
    expect(joker.gameplay?.onHandPlayed(createTestContext({ hand: pairHand })).mult).toBe(8);
    expect(
      joker.gameplay?.onHandPlayed(createTestContext({ hand: { played: cards("KS"), held: [] } })).mult
    ).toBe(0);
  });

  it("composes conditions with allOf, anyOf and not", () => {
    const joker = new ConditionalBehavior(testIdentity(), {
      rules: [
        {
          on: "hand",
          when: {
            allOf: ['hand_type == "pair"', { not: "played_count > 2" }, { anyOf: ["false", "money >= 0"] }],
          },
          effect: { chips: 50 },
        },
      ],
    });
    const two = createTestContext({ hand: { played: cards("QS QD"), held: [] } });
    const three = createTestContext({ hand: pairHand });
    expect(joker.gameplay?.onHandPlayed(two).chips).toBe(50);
    expect(joker.gameplay?.onHandPlayed(three).chips).toBe(0);
  });

  it("updates counters before paying out", () => {
    const joker = new ConditionalBehavior(testIdentity("ride_the_bus"), {
      counters: { streak: 0 },
      rules: [{ on: "hand", update: { streak: "self.streak + 1" }, effect: { mult: "self.streak" } }],
    });
    const ctx = createTestContext({ hand: pairHand });
    expect(joker.gameplay?.onHandPlayed(ctx).mult).toBe(1);
    expect(joker.gameplay?.onHandPlayed(ctx).mult).toBe(2);
    expect(joker.counters).toEqual({ streak: 2 });
  });

  it("leaves counters alone on a mirrored call", () => {
    const joker = new ConditionalBehavior(testIdentity("ride_the_bus"), {
      counters: { streak: 3 },
      rules: [{ on: "hand", update: { streak: "self.streak + 1" }, effect: { mult: "self.streak" } }],
    });
    const mirrored = createTestContext({ hand: pairHand }).mirror({ id: "ride_the_bus", slot: 0 });
    expect(joker.gameplay?.onHandPlayed(mirrored).mult).toBe(3);
    expect(joker.counters).toEqual({ streak: 3 });
  });

  it("has a lifecycle role and no gameplay role for round-end rules", () => {
    const joker = new ConditionalBehavior(testIdentity("golden_joker"), {
      rules: [{ on: "round_end", effect: { money: 4 } }],
    });
    expect(joker.gameplay).toBeUndefined();
    expect(joker.lifecycle?.onRoundEnd?.(createTestContext()).money).toBe(4);
  });

  it("fails construction on a rule that does not compile", () => {
    const build = () =>
      new ConditionalBehavior(testIdentity(), { rules: [{ on: "hand", when: "monye > 3" }] });
    expect(build).toThrow(ConstructionError);
    expect(build).toThrow("Invalid rule for joker: Unknown identifier: 'monye'");
  });

  it("fails construction on an update of an undeclared counter", () => {
    expect(
      () =>
        new ConditionalBehavior(testIdentity(), {
          rules: [{ on: "hand", update: { streak: "1" } }],
        })
    ).toThrow("Invalid rule for joker: Update of undeclared counter 'streak'");
  });

  it("round-trips its counters and rejects a payload missing one", () => {
    const joker = new ConditionalBehavior(testIdentity("ride_the_bus"), {
      counters: { streak: 0 },
      rules: [{ on: "hand", update: { streak: "self.streak + 1" } }],
    });
    joker.state?.deserializeState({ streak: 6 }, 1);
    expect(joker.state?.serializeState()).toEqual({ streak: 6 });
    expect(() => joker.state?.deserializeState({ other: 1 }, 1)).toThrow(StateDeserializeError);
    expect(joker.counters).toEqual({ streak: 6 });
  });
});
