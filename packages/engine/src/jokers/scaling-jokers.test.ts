import { describe, it, expect } from "vitest";
import { JokerRun } from "../run/joker-run";
import { cards } from "../testing/fixtures";
import { createRunSnapshot } from "../types/snapshot";

const snapshot = createRunSnapshot({ seed: 11 });

function play(run: JokerRun, text: string, held = "") {
  return run.process({ played: cards(text), held: held === "" ? [] : cards(held) }, snapshot);
}

describe("event counters", () => {
  it("Hit the Road gains ×0.5 per discarded Jack and resets at round end", () => {
    const run = new JokerRun();
    run.acquire("hit_the_road");
    run.discard(cards("JS JD 4C"), snapshot);
    expect(play(run, "KS").effect.multMultiplier).toBe(2);
    run.endRound(snapshot);
    expect(play(run, "KS").effect.multMultiplier).toBe(1);
  });

  it("Campfire resets when a boss is beaten", () => {
    const run = new JokerRun();
    run.acquire("campfire");
    run.emit({ kind: "joker_sold", id: "joker", slot: 9 }, snapshot);
    expect(play(run, "KS").effect.multMultiplier).toBe(1.25);
    run.emit({ kind: "boss_defeated" }, snapshot);
    expect(play(run, "KS").effect.multMultiplier).toBe(1);
  });
});

describe("bespoke scalers", () => {
  it("Raised Fist doubles the lowest held rank", () => {
    const run = new JokerRun();
    run.acquire("raised_fist");
    expect(play(run, "AS", "9S 3D KH").effect.mult).toBe(6);
  });

  it("Rocket pays more after each boss", () => {
    const run = new JokerRun();
    run.acquire("rocket");
    expect(run.endRound(snapshot).effect.money).toBe(1);
    run.emit({ kind: "boss_defeated" }, snapshot);
    expect(run.endRound(snapshot).effect.money).toBe(3);
  });

  it("Ramen loses a hundredth per discarded card", () => {
    const run = new JokerRun();
    run.acquire("ramen");
    run.discard(cards("2S 3S 4S 5S 7D"), snapshot);
    expect(play(run, "KS").effect.multMultiplier).toBe(1.95);
  });

  it("Turtle Bean's hand size shrinks each round", () => {
    const run = new JokerRun();
    run.acquire("turtle_bean");
    expect(run.rules(snapshot).handSize).toBe(13);
    run.endRound(snapshot);
    expect(run.rules(snapshot).handSize).toBe(12);
  });

  it("Wee Joker keeps the chips it gained from scoring twos", () => {
    const run = new JokerRun();
    run.acquire("wee_joker");
    expect(play(run, "2S 2H").effect.chips).toBe(16);
    expect(play(run, "KS").effect.chips).toBe(16);
  });

  it("Ceremonial Dagger eats the joker to its right on blind select", () => {
    const run = new JokerRun();
    run.acquire("ceremonial_dagger");
    const victim = run.acquire("joker");
    const result = run.emit({ kind: "blind_selected" }, snapshot);
    expect(result.settlement.removed).toEqual([victim]);
    expect(run.size).toBe(1);
    expect(play(run, "KS").effect.mult).toBe(2);
  });
});
