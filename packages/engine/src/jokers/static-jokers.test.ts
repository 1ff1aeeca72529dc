import { describe, it, expect } from "vitest";
import { JokerRun } from "../run/joker-run";
import { cards } from "../testing/fixtures";
import { createRunSnapshot } from "../types/snapshot";

const snapshot = createRunSnapshot({ seed: 1 });

function runWith(...ids: string[]): JokerRun {
  const run = new JokerRun();
  for (const id of ids) run.acquire(id);
  return run;
}

describe("static jokers", () => {
  it("Scholar pays chips and mult for each scoring Ace", () => {
    const result = runWith("scholar").process({ played: cards("AS"), held: [] }, snapshot);
    expect(result.effect.chips).toBe(20);
    expect(result.effect.mult).toBe(4);
  });

  it("Stuntman trades hand size for chips", () => {
    const run = runWith("stuntman");
    expect(run.rules(snapshot).handSize).toBe(6);
    expect(run.process({ played: cards("KS"), held: [] }, snapshot).effect.chips).toBe(250);
  });

  it("Mime doubles held-card payouts of other jokers", () => {
    const run = runWith("mime", "shoot_the_moon");
    expect(run.process({ played: cards("KS"), held: cards("QS") }, snapshot).effect.mult).toBe(26);
  });

  it("Pareidolia makes every card a face card", () => {
    const run = runWith("pareidolia", "smiley_face");
    expect(run.process({ played: cards("3S"), held: [] }, snapshot).effect.mult).toBe(5);
  });
});
