import { describe, it, expect } from "vitest";
import { ConstructionError } from "../errors";
import { ConditionalBehavior } from "../frameworks/conditional";
import { StaticBehavior } from "../frameworks/static";
import { createBehavior, tryCreateBehavior } from "./factory";

describe("createBehavior", () => {
  it("builds a fresh instance per call", () => {
    const a = createBehavior("joker");
    const b = createBehavior("joker");
    expect(a).toBeInstanceOf(StaticBehavior);
    expect(a).not.toBe(b);
    expect(a.identity).toBe(b.identity);
  });

  it("throws for an unknown identifier", () => {
    expect(() => createBehavior("jokerr")).toThrow(ConstructionError);
    expect(() => createBehavior("jokerr")).toThrow('Unknown joker identifier: "jokerr"');
  });

  it("refuses arguments for a joker that takes none", () => {
    const result = tryCreateBehavior("joker", { mult: 5 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.reason).toBe("invalid_arguments");
  });

  it("validates arguments for a parameterized joker", () => {
    const bus = createBehavior("ride_the_bus", { counters: { streak: 4 } });
    expect(bus).toBeInstanceOf(ConditionalBehavior);
    expect(bus.state?.serializeState()).toEqual({ streak: 4 });

    const bad = tryCreateBehavior("ride_the_bus", { counters: { laps: 1 } });
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.reason).toBe("invalid_arguments");
  });
});
