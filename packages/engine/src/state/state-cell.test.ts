import { describe, it, expect } from "vitest";
import { z } from "zod";
import { StateDeserializeError, UnsupportedVersionError } from "../errors";
import { StateCell } from "./state-cell";

const CounterSchema = z.object({
  mult: z.number().int().min(0),
  streak: z.number().int().min(0).default(0),
});

function makeCell(): StateCell<z.infer<typeof CounterSchema>> {
  return new StateCell({
    schema: CounterSchema,
    version: 2,
    initial: { mult: 0, streak: 0 },
    migrate: (raw, from) => {
      if (from === 1 && typeof raw === "number") return { mult: raw };
      return raw;
    },
  });
}

describe("StateCell", () => {
  it("round-trips its value", () => {
    const cell = makeCell();
    cell.set({ mult: 7, streak: 2 });
    const saved = cell.serialize();

    const other = makeCell();
    other.deserialize(saved, 2);
    expect(other.get()).toEqual({ mult: 7, streak: 2 });
  });

  it("serializes a copy", () => {
    const cell = makeCell();
    const saved = cell.serialize();
    cell.update((s) => ({ ...s, mult: s.mult + 1 }));
    expect(saved).toEqual({ mult: 0, streak: 0 });
  });

  it("migrates an older version", () => {
    const cell = makeCell();
    cell.deserialize(5, 1);
    expect(cell.get()).toEqual({ mult: 5, streak: 0 });
  });

  it("rejects a newer version without changing state", () => {
    const cell = makeCell();
    cell.set({ mult: 3, streak: 1 });
    expect(() => cell.deserialize({ mult: 9 }, 3)).toThrow(UnsupportedVersionError);
    expect(cell.get()).toEqual({ mult: 3, streak: 1 });
  });

  it("rejects a malformed payload without changing state", () => {
    const cell = makeCell();
    cell.set({ mult: 3, streak: 1 });
    const before = JSON.stringify(cell.serialize());
    expect(() => cell.deserialize({ mult: "lots" }, 2)).toThrow(StateDeserializeError);
    expect(() => cell.deserialize({ mult: -1 }, 2)).toThrow(/mult/);
    expect(JSON.stringify(cell.serialize())).toBe(before);
  });

  it("rejects a negative version tag", () => {
    expect(() => makeCell().deserialize({ mult: 1 }, -1)).toThrow(StateDeserializeError);
  });

  it("resets to the initial value", () => {
    const cell = makeCell();
    cell.set({ mult: 3, streak: 1 });
    cell.reset();
    expect(cell.get()).toEqual({ mult: 0, streak: 0 });
  });
});
