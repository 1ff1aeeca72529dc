// ─── Behavior State Store ──────────────────────────────────────────
// Indexes the persistent state of every live instance in a run by
// (identifier, slot). Hooks get the read-only view; only the run
// registers and unregisters.

import type { InstanceHandle, JsonValue } from "@jester/schema";
import type { StateStoreView, Stateful } from "../types/behavior";

interface StoreEntry {
  readonly handle: InstanceHandle;
  readonly state: Stateful;
}

export class BehaviorStateStore implements StateStoreView {
  private readonly entries = new Map<number, StoreEntry>();

  register(handle: InstanceHandle, state: Stateful): void {
    this.entries.set(handle.slot, { handle, state });
  }

  unregister(handle: InstanceHandle): void {
    this.entries.delete(handle.slot);
  }

  clear(): void {
    this.entries.clear();
  }

  read(handle: InstanceHandle): JsonValue | undefined {
    const entry = this.entries.get(handle.slot);
    if (!entry || entry.handle.id !== handle.id) return undefined;
    return entry.state.serializeState();
  }

  handles(): readonly InstanceHandle[] {
    return [...this.entries.values()].map((e) => e.handle);
  }
}
