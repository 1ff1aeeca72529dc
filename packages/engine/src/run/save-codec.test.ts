import { describe, it, expect } from "vitest";
import pako from "pako";
import { SaveBlobError, UnsupportedVersionError } from "../errors";
import { createSaveBlob, decodeSave, encodeSave } from "./save-codec";

describe("save codec", () => {
  it("reads back the gzipped form", () => {
    const blob = createSaveBlob(4, [
      { id: "ice_cream", slot: 1, version: 1, sellBonus: 0, state: { chips: 85 } },
      { id: "egg", slot: 3, version: 0, sellBonus: 6, state: null },
    ]);
    const decoded = decodeSave(encodeSave(blob));
    expect(decoded.version).toBe(2);
    expect(decoded.nextSlot).toBe(4);
    expect(decoded.entries.map((e) => e.entry)).toEqual(blob.entries);
    expect(decoded.lost).toEqual([]);
  });

  it("migrates version 1 entries onto slots in entry order", () => {
    const decoded = decodeSave({
      format: "jester.jokers",
      version: 1,
      entries: [{ id: "ice_cream", version: 1, state: { chips: 80 } }, { id: "joker" }],
    });
    expect(decoded.version).toBe(1);
    expect(decoded.nextSlot).toBe(2);
    expect(decoded.entries).toEqual([
      { index: 0, entry: { id: "ice_cream", slot: 0, version: 1, sellBonus: 0, state: { chips: 80 } } },
      { index: 1, entry: { id: "joker", slot: 1, version: 0, sellBonus: 0, state: null } },
    ]);
  });

  it("keeps nextSlot past every saved slot", () => {
    const decoded = decodeSave({
      format: "jester.jokers",
      version: 2,
      nextSlot: 1,
      entries: [{ id: "joker", slot: 6, version: 0, state: null }],
    });
    expect(decoded.nextSlot).toBe(7);
    expect(decoded.entries[0]?.entry.sellBonus).toBe(0);
  });

  it("reports damaged entries and loads the rest", () => {
    const decoded = decodeSave({
      format: "jester.jokers",
      version: 2,
      entries: [
        { id: "joker", slot: 0, version: 0, state: null },
        { slot: "zero" },
        { id: "egg", slot: 0, version: 0, state: null },
      ],
    });
    expect(decoded.entries.map((e) => e.entry.id)).toEqual(["joker"]);
    expect(decoded.lost).toHaveLength(2);
    expect(decoded.lost[0]).toMatchObject({ index: 1, id: undefined });
    expect(decoded.lost[1]).toEqual({ index: 2, id: "egg", reason: "Slot 0 appears twice" });
  });

  it("refuses a blob newer than this build", () => {
    const blob = { format: "jester.jokers", version: 3, entries: [] };
    expect(() => decodeSave(blob)).toThrow(UnsupportedVersionError);
    expect(() => decodeSave(blob)).toThrow("Unsupported save blob version 3 (this build reads up to 2)");
  });

  it("refuses a foreign envelope", () => {
    expect(() => decodeSave({ format: "other", version: 2, entries: [] })).toThrow(SaveBlobError);
    expect(() => decodeSave("not a blob")).toThrow(SaveBlobError);
  });

  it("refuses bytes that are not gzip or not JSON", () => {
    expect(() => decodeSave(new Uint8Array([1, 2, 3, 4]))).toThrow(SaveBlobError);
    expect(() => decodeSave(pako.gzip("{ not json"))).toThrow("Save bytes do not hold JSON");
  });
});
