// ─── Behavior Collection ───────────────────────────────────────────
// The run's jokers in acquisition order. Native and bridged behaviors
// sit side by side behind the Behavior interface; the collection never
// looks inside them.

import type { InstanceHandle } from "@jester/schema";
import type { Behavior } from "../types/behavior";
import { LegacyBridge } from "./legacy-bridge";

export interface CollectionEntry {
  readonly handle: InstanceHandle;
  readonly behavior: Behavior;
}

export class BehaviorCollection implements Iterable<CollectionEntry> {
  private items: CollectionEntry[] = [];

  get size(): number {
    return this.items.length;
  }

  /** Appends in acquisition order. Throws if the slot is already present. */
  add(handle: InstanceHandle, behavior: Behavior): CollectionEntry {
    if (this.get(handle.slot) !== undefined) {
      throw new Error(`Slot ${handle.slot} is already in the collection`);
    }
    const entry: CollectionEntry = { handle, behavior };
    this.items.push(entry);
    return entry;
  }

  /** Removes and returns the entry at `slot`, if any. */
  remove(slot: number): CollectionEntry | undefined {
    const index = this.indexOf(slot);
    if (index < 0) return undefined;
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  get(slot: number): CollectionEntry | undefined {
    return this.items.find((e) => e.handle.slot === slot);
  }

  indexOf(slot: number): number {
    return this.items.findIndex((e) => e.handle.slot === slot);
  }

  /** A copy, so callers may remove entries while walking it. */
  entries(): readonly CollectionEntry[] {
    return [...this.items];
  }

  handles(): readonly InstanceHandle[] {
    return this.items.map((e) => e.handle);
  }

  /** Entries written in the legacy shape. */
  bridged(): readonly CollectionEntry[] {
    return this.items.filter((e) => e.behavior instanceof LegacyBridge);
  }

  clear(): void {
    this.items = [];
  }

  [Symbol.iterator](): Iterator<CollectionEntry> {
    return this.entries()[Symbol.iterator]();
  }
}
