import { describe, it, expect } from "vitest";
import { createBehavior } from "../registry/factory";
import { BehaviorCollection } from "./behavior-collection";

describe("BehaviorCollection", () => {
  it("keeps native and bridged behaviors in acquisition order", () => {
    const collection = new BehaviorCollection();
    collection.add({ id: "joker", slot: 0 }, createBehavior("joker"));
    collection.add({ id: "ice_cream", slot: 1 }, createBehavior("ice_cream"));
    collection.add({ id: "hack", slot: 2 }, createBehavior("hack"));

    expect(collection.handles().map((h) => h.id)).toEqual(["joker", "ice_cream", "hack"]);
    expect(collection.bridged().map((e) => e.handle.id)).toEqual(["ice_cream"]);
    expect([...collection].every((e) => e.behavior.gameplay !== undefined)).toBe(true);
  });

  it("removes by slot and keeps the rest in order", () => {
    const collection = new BehaviorCollection();
    collection.add({ id: "joker", slot: 0 }, createBehavior("joker"));
    collection.add({ id: "hack", slot: 4 }, createBehavior("hack"));
    collection.add({ id: "egg", slot: 7 }, createBehavior("egg"));

    expect(collection.remove(4)?.handle).toEqual({ id: "hack", slot: 4 });
    expect(collection.remove(4)).toBeUndefined();
    expect(collection.indexOf(7)).toBe(1);
    expect(collection.size).toBe(2);
  });

  it("refuses a slot that is already taken", () => {
    const collection = new BehaviorCollection();
    collection.add({ id: "joker", slot: 0 }, createBehavior("joker"));
    expect(() => collection.add({ id: "hack", slot: 0 }, createBehavior("hack"))).toThrow(
      "Slot 0 is already in the collection"
    );
  });
});
