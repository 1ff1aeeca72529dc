import { describe, it, expect } from "vitest";
import { IDENTITY_EFFECT } from "../engine/effect";
import { card, cards, createTestContext, testIdentity } from "../testing/fixtures";
import { StaticBehavior } from "./static";

describe("StaticBehavior", () => {
  it("pays a hand-scope bonus only when the condition holds", () => {
    const jolly = new StaticBehavior(testIdentity("jolly_joker"), {
      scope: "hand",
      condition: { kind: "contains_hand", handType: "pair" },
      mult: 8,
    });
    const pair = createTestContext({ hand: { played: cards("KS KH"), held: [] } });
    const single = createTestContext({ hand: { played: cards("KS"), held: [] } });
    expect(jolly.gameplay?.onHandPlayed(pair).mult).toBe(8);
    expect(jolly.gameplay?.onHandPlayed(single)).toBe(IDENTITY_EFFECT);
  });

  it("pays a card-scope bonus per matching card", () => {
    const greedy = new StaticBehavior(testIdentity("greedy_joker"), {
      scope: "card",
      condition: { kind: "suit", suit: "diamonds" },
      mult: 3,
    });
    const ctx = createTestContext();
    expect(greedy.gameplay?.onCardScored(ctx, card("4D")).mult).toBe(3);
    expect(greedy.gameplay?.onCardScored(ctx, card("4S"))).toBe(IDENTITY_EFFECT);
    expect(greedy.gameplay?.onHandPlayed(ctx)).toBe(IDENTITY_EFFECT);
  });

  it("treats both red suits as one under smeared suits", () => {
    const lusty = new StaticBehavior(testIdentity("lusty_joker"), {
      scope: "card",
      condition: { kind: "suit", suit: "hearts" },
      mult: 3,
    });
    const smeared = createTestContext({ rules: { flags: ["smeared_suits"] } });
    expect(lusty.gameplay?.onCardScored(smeared, card("9D")).mult).toBe(3);
  });

  it("has only a modifiers role when it pays nothing", () => {
    const juggler = new StaticBehavior(testIdentity("juggler"), {
      scope: "hand",
      condition: { kind: "always" },
      modifiers: { handSize: 1 },
    });
    expect(juggler.gameplay).toBeUndefined();
    expect(juggler.modifiers?.rules(createTestContext())).toEqual({ handSize: 1 });
  });

  it("limits max_cards to non-empty hands", () => {
    const half = new StaticBehavior(testIdentity("half_joker"), {
      scope: "hand",
      condition: { kind: "max_cards", count: 3 },
      mult: 20,
    });
    const three = createTestContext({ hand: { played: cards("2S 5H 9C"), held: [] } });
    const four = createTestContext({ hand: { played: cards("2S 5H 9C JD"), held: [] } });
    expect(half.gameplay?.onHandPlayed(three).mult).toBe(20);
    expect(half.gameplay?.onHandPlayed(four).mult).toBe(0);
  });
});
