import { describe, it, expect } from "vitest";
import type { PlayingCard } from "@jester/schema";
import { classifyHand, handBase } from "./hand-evaluator";
import { cards, makeCard } from "../testing/fixtures";
import type { RuleFlag } from "../types/rules";

function classify(hand: readonly PlayingCard[], ...flags: RuleFlag[]) {
  return classifyHand(hand, { flags: new Set(flags) });
}

describe("classifyHand", () => {
  it("classifies a lone high card", () => {
    expect(classify(cards("2H 9C 5D"))).toEqual({
      handType: "high_card",
      contains: ["high_card"],
      scoringIndices: [1],
    });
  });

  it("scores only the paired cards", () => {
    const result = classify(cards("KH KS 3D 7C 9H"));
    expect(result.handType).toBe("pair");
    expect(result.scoringIndices).toEqual([0, 1]);
  });

  it("lists every hand type a full house contains", () => {
    const result = classify(cards("QH QS QD 4C 4H"));
    expect(result.handType).toBe("full_house");
    expect(result.contains).toEqual([
      "high_card",
      "pair",
      "two_pair",
      "three_of_a_kind",
      "full_house",
    ]);
    expect(result.scoringIndices).toEqual([0, 1, 2, 3, 4]);
  });

  it("recognizes a royal straight flush", () => {
    const result = classify(cards("10S JS QS KS AS"));
    expect(result.handType).toBe("straight_flush");
    expect(result.contains).toContain("straight");
    expect(result.contains).toContain("flush");
  });

  it("plays the Ace low in a straight", () => {
    const result = classify(cards("AH 2C 3D 4S 5H"));
    expect(result.handType).toBe("straight");
    expect(result.scoringIndices).toEqual([0, 1, 2, 3, 4]);
  });

  it("does not wrap a straight around the Ace", () => {
    expect(classify(cards("QH KC AD 2S 3H")).handType).toBe("high_card");
  });

  it("needs four_fingers for a four-card flush", () => {
    const hand = cards("2H 6H 9H KH 4C");
    expect(classify(hand).handType).toBe("high_card");
    expect(classify(hand).scoringIndices).toEqual([3]);

    const withFlag = classify(hand, "four_fingers");
    expect(withFlag.handType).toBe("flush");
    expect(withFlag.scoringIndices).toEqual([0, 1, 2, 3]);
  });

  it("lets shortcut straights skip one rank", () => {
    const hand = cards("2H 4C 6D 8S 10H");
    expect(classify(hand).handType).toBe("high_card");
    expect(classify(hand, "shortcut").handType).toBe("straight");
  });

  it("merges suits of the same colour with smeared_suits", () => {
    const hand = cards("2H 6D 9H KD 4H");
    expect(classify(hand).handType).toBe("high_card");
    expect(classify(hand, "smeared_suits").handType).toBe("flush");
  });

  it("counts wild cards toward any flush", () => {
    const hand = [...cards("2S 6S 9S KS"), makeCard("4", "hearts", { enhancement: "wild" })];
    expect(classify(hand).handType).toBe("flush");
  });

  it("always scores stone cards, which have no rank", () => {
    const hand = [...cards("7H 7C"), makeCard("7", "spades", { enhancement: "stone" })];
    const result = classify(hand);
    expect(result.handType).toBe("pair");
    expect(result.scoringIndices).toEqual([0, 1, 2]);
  });

  it("scores every played card with splash", () => {
    expect(classify(cards("KH KS 3D"), "splash").scoringIndices).toEqual([0, 1, 2]);
  });

  it("recognizes a flush five", () => {
    const result = classify(cards("9D 9D 9D 9D 9D"));
    expect(result.handType).toBe("flush_five");
    expect(result.contains).toContain("five_of_a_kind");
  });

  it("returns high card with nothing scoring for an empty hand", () => {
    expect(classify([])).toEqual({ handType: "high_card", contains: ["high_card"], scoringIndices: [] });
  });
});

describe("handBase", () => {
  it("returns level 1 values by default", () => {
    expect(handBase("flush")).toEqual({ chips: 35, mult: 4 });
  });

  it("adds the per-level increase", () => {
    expect(handBase("pair", 3)).toEqual({ chips: 40, mult: 4 });
  });
});
