import { describe, it, expect } from "vitest";
import { JokerRun } from "../run/joker-run";
import { cards } from "../testing/fixtures";
import { createRunSnapshot } from "../types/snapshot";

const snapshot = createRunSnapshot({ seed: 3 });

function runWith(...ids: string[]): JokerRun {
  const run = new JokerRun();
  for (const id of ids) run.acquire(id);
  return run;
}

function play(run: JokerRun, text = "KS") {
  return run.process({ played: cards(text), held: [] }, snapshot);
}

describe("Blueprint", () => {
  it("copies the joker to its right", () => {
    expect(play(runWith("blueprint", "joker")).effect.mult).toBe(8);
  });

  it("copies nothing from a joker without gameplay hooks", () => {
    const result = play(runWith("blueprint", "egg"));
    expect(result.effect.mult).toBe(0);
    expect(result.effect.chips).toBe(0);
  });

  it("reads a stateful target without advancing it", () => {
    const run = runWith("blueprint", "ice_cream");
    expect(play(run).effect.chips).toBe(200);
    expect(run.serializeAll().entries[1]?.state).toEqual({ chips: 95 });
  });
});

describe("Brainstorm", () => {
  it("stops a copy cycle once the replay depth reaches the joker count", () => {
    expect(play(runWith("blueprint", "brainstorm", "joker")).effect.mult).toBe(4);
  });

  it("copies the leftmost joker", () => {
    expect(play(runWith("joker", "brainstorm")).effect.mult).toBe(8);
  });
});
