// ─── Advanced Framework ────────────────────────────────────────────
// Base classes for jokers that need rich context: rotating targets,
// counters driven by run events, sibling inspection, deck scans. State
// sits in a zod-typed StateCell; expensive derived values go through
// the run's ConditionCache, keyed by this instance's slot.

import type { JsonValue } from "@jester/schema";
import type { CachedValue } from "../state/condition-cache";
import { StateCell, type StateCellOptions } from "../state/state-cell";
import type {
  Behavior,
  Gameplay,
  Identity,
  Lifecycle,
  Modifiers,
  RunContext,
  Stateful,
} from "../types/behavior";

export abstract class AdvancedBehavior implements Behavior {
  readonly gameplay?: Gameplay;
  readonly lifecycle?: Lifecycle;
  readonly modifiers?: Modifiers;
  readonly state?: Stateful;

  constructor(readonly identity: Identity) {}

  /**
   * Looks `key` up in the run's cache under `fingerprint`, computing and
   * storing it on a miss. The fingerprint must cover every input
   * `compute` reads; the cache epoch covers the round.
   */
  protected cached<T extends CachedValue>(
    ctx: RunContext,
    key: string,
    fingerprint: string,
    compute: () => T,
    accept: (value: CachedValue) => value is T
  ): T {
    const hit = ctx.cache.lookup(ctx.self.slot, key, fingerprint);
    if (hit !== undefined && accept(hit)) return hit;
    const value = compute();
    ctx.cache.store(ctx.self.slot, key, fingerprint, value);
    return value;
  }

  protected cachedNumber(ctx: RunContext, key: string, fingerprint: string, compute: () => number): number {
    return this.cached(ctx, key, fingerprint, compute, isNumber);
  }

  protected cachedCondition(
    ctx: RunContext,
    key: string,
    fingerprint: string,
    compute: () => boolean
  ): boolean {
    return this.cached(ctx, key, fingerprint, compute, isBoolean);
  }
}

function isNumber(value: CachedValue): value is number {
  return typeof value === "number";
}

function isBoolean(value: CachedValue): value is boolean {
  return typeof value === "boolean";
}

/** An advanced joker with persistent state. */
export abstract class StatefulBehavior<S extends JsonValue> extends AdvancedBehavior {
  override readonly state: Stateful;
  protected readonly cell: StateCell<S>;

  constructor(identity: Identity, options: StateCellOptions<S>) {
    super(identity);
    const cell = new StateCell(options);
    this.cell = cell;
    this.state = {
      stateVersion: cell.version,
      serializeState: () => cell.serialize(),
      deserializeState: (raw, version) => cell.deserialize(raw, version),
    };
  }

  /** The current state value. */
  get current(): S {
    return this.cell.get();
  }

  /** Applies `fn` to the state unless the call is a mirror replay. */
  protected mutate(ctx: RunContext, fn: (previous: S) => S): void {
    if (ctx.mirrored) return;
    this.cell.update(fn);
  }
}
