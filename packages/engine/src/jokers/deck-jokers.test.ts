import { describe, it, expect } from "vitest";
import { SUITS } from "@jester/schema";
import { JokerRun } from "../run/joker-run";
import { card, cards } from "../testing/fixtures";
import type { RuleFlag } from "../types/rules";
import { createRunSnapshot, type RunSnapshot } from "../types/snapshot";
import { coversSuits } from "./deck-jokers";

const snapshot = createRunSnapshot({ seed: 2 });
const plain = { flags: new Set<RuleFlag>() };

function play(ids: readonly string[], played: string, held = "", at: RunSnapshot = snapshot) {
  const run = new JokerRun();
  for (const id of ids) run.acquire(id);
  return run.process({ played: cards(played), held: held === "" ? [] : cards(held) }, at).effect;
}

describe("coversSuits", () => {
  it("spends a Wild card only on the missing suit", () => {
    expect(coversSuits([...cards("2S 3H 4D"), card("5S", "wild")], SUITS, plain)).toBe(true);
    expect(coversSuits(cards("2S 3H 4D 5S"), SUITS, plain)).toBe(false);
  });

  it("does not let one card stand for two suits", () => {
    expect(coversSuits([card("5S", "wild")], ["clubs", "hearts"], plain)).toBe(false);
  });
});

describe("deck jokers", () => {
  it("Steel Joker scales with steel cards in the full deck", () => {
    const fullDeck = [...cards("2S 3S", "steel"), ...cards("4S 5S")];
    expect(play(["steel_joker"], "KS", "", createRunSnapshot({ fullDeck })).multMultiplier).toBe(1.4);
  });

  it("Steel Joker rescans the deck only when its revision changes", () => {
    const run = new JokerRun();
    run.acquire("steel_joker");
    const hand = { played: cards("KS"), held: [] };
    const twoSteel = [...cards("2S 3S", "steel"), ...cards("4S 5S")];
    const oneSteel = [...cards("2S", "steel"), ...cards("3S 4S 5S")];

    const steelMult = (fullDeck: typeof twoSteel, deckRevision: number) =>
      run.process(hand, createRunSnapshot({ fullDeck, deckRevision })).effect.multMultiplier;

    expect(steelMult(twoSteel, 1)).toBe(1.4);
    expect(steelMult(oneSteel, 1)).toBe(1.4);
    expect(run.cacheStats().hits).toBe(1);
    expect(steelMult(oneSteel, 2)).toBe(1.2);
  });

  it("Blackboard needs every held card dark", () => {
    expect(play(["blackboard"], "KS", "2S 3C").multMultiplier).toBe(3);
    expect(play(["blackboard"], "KS", "2S 3H").multMultiplier).toBe(1);
  });

  it("Flower Pot needs all four suits among the scoring cards", () => {
    expect(play(["flower_pot"], "AS AH AD AC").multMultiplier).toBe(3);
    expect(play(["flower_pot"], "AS AH AD").multMultiplier).toBe(1);
  });

  it("Photograph doubles only the first scoring face card", () => {
    expect(play(["photograph"], "KS KH").multMultiplier).toBe(2);
  });

  it("Swashbuckler adds the sell value of the other jokers", () => {
    expect(play(["swashbuckler", "joker", "egg"], "KS").mult).toBe(7);
  });

  it("Joker Stencil counts empty slots and itself", () => {
    expect(play(["joker_stencil"], "KS").multMultiplier).toBe(5);
    expect(play(["joker_stencil", "joker", "egg"], "KS").multMultiplier).toBe(3);
  });
});
