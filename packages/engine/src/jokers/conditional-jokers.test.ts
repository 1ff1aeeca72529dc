import { describe, it, expect } from "vitest";
import { JokerRun } from "../run/joker-run";
import { cards } from "../testing/fixtures";
import { createRunSnapshot, type RunSnapshot } from "../types/snapshot";

const snapshot = createRunSnapshot({ seed: 4 });

function runWith(...ids: string[]): JokerRun {
  const run = new JokerRun();
  for (const id of ids) run.acquire(id);
  return run;
}

function play(run: JokerRun, played: string, held = "", at: RunSnapshot = snapshot) {
  return run.process({ played: cards(played), held: held === "" ? [] : cards(held) }, at);
}

describe("run-state rules", () => {
  it("Banner pays 30 chips per remaining discard", () => {
    expect(play(runWith("banner"), "KS").effect.chips).toBe(90);
  });

  it("Mystic Summit needs no discards left", () => {
    expect(play(runWith("mystic_summit"), "KS").effect.mult).toBe(0);
    expect(play(runWith("mystic_summit"), "KS", "", createRunSnapshot({ discardsRemaining: 0 })).effect.mult).toBe(15);
  });

  it("Abstract Joker counts every joker, itself included", () => {
    expect(play(runWith("abstract_joker", "joker"), "KS").effect.mult).toBe(10);
  });

  it("Bootstraps pays 2 mult per $5", () => {
    expect(play(runWith("bootstraps"), "KS", "", createRunSnapshot({ money: 12 })).effect.mult).toBe(4);
  });
});

describe("held and scored card rules", () => {
  it("Shoot the Moon pays 13 mult per held Queen", () => {
    expect(play(runWith("shoot_the_moon"), "KS", "QS QH 4D").effect.mult).toBe(26);
  });

  it("Baron compounds ×1.5 per held King", () => {
    expect(play(runWith("baron"), "AS", "KS KH").effect.multMultiplier).toBe(2.25);
  });

  it("Hanging Chad retriggers the first scoring card twice", () => {
    expect(play(runWith("hanging_chad"), "KS KH").retriggers).toBe(2);
  });
});

describe("counter rules", () => {
  it("Green Joker gains on hands and loses on discards", () => {
    const run = runWith("green_joker");
    expect(play(run, "KS").effect.mult).toBe(1);
    expect(play(run, "KS").effect.mult).toBe(2);
    run.discard(cards("3D"), snapshot);
    expect(play(run, "KS").effect.mult).toBe(2);
  });

  it("Loyalty Card fires every sixth hand", () => {
    const run = runWith("loyalty_card");
    const multipliers: number[] = [];
    for (let i = 0; i < 7; i++) multipliers.push(play(run, "KS").effect.multMultiplier);
    expect(multipliers).toEqual([1, 1, 1, 1, 1, 4, 1]);
  });

  it("Ride the Bus starts from the counters it was given", () => {
    const run = new JokerRun();
    run.acquire("ride_the_bus", { counters: { streak: 4 } });
    expect(play(run, "2S").effect.mult).toBe(5);
    expect(play(run, "KS").effect.mult).toBe(0);
  });
});
