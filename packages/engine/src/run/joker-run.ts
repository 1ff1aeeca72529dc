// ─── Joker Run ─────────────────────────────────────────────────────
// The engine-facing API for one run's jokers. Owns the ordered
// collection, the state store, the condition cache and the pipeline.
// Every pass settles itself: self-destroyed and destroyed jokers leave
// the run after the pass, never during it.

import type {
  InstanceHandle,
  JsonValue,
  PlayingCard,
  RunDirective,
  SavedJokerEntry,
  JokerSaveBlob,
} from "@jester/schema";
import { DEFAULT_CONFIG, type EngineConfig } from "../config";
import { BehaviorCollection, type CollectionEntry } from "../bridge/behavior-collection";
import { IDENTITY_EFFECT, accumulate } from "../engine/effect";
import {
  ScoringPipeline,
  type DispatchResult,
  type LifecycleCall,
  type PipelineEntry,
  type ProcessResult,
} from "../engine/scoring-pipeline";
import { AcquisitionError, ConstructionError, JesterError, StateDeserializeError } from "../errors";
import { logger } from "../logger";
import { getRegistry, type BehaviorRegistry } from "../registry/registry";
import { ConditionCache } from "../state/condition-cache";
import { BehaviorStateStore } from "../state/state-store";
import type { Behavior, RunEvent, SiblingChange } from "../types/behavior";
import type { ResolvedRules } from "../types/rules";
import { createRunSnapshot, type PlayedHand, type RunSnapshot } from "../types/snapshot";
import { createSaveBlob, decodeSave, encodeSave, type LostEntry } from "./save-codec";

export interface JokerRunOptions {
  readonly seed?: number;
  readonly config?: EngineConfig;
  readonly registry?: BehaviorRegistry;
}

export type AcquireResult =
  | { readonly ok: true; readonly handle: InstanceHandle }
  | { readonly ok: false; readonly error: ConstructionError | AcquisitionError };

/** What a pass changed in the run once it settled. */
export interface Settlement {
  readonly removed: readonly InstanceHandle[];
  readonly added: readonly InstanceHandle[];
  /** Directives the game engine still has to carry out. */
  readonly forwarded: readonly RunDirective[];
}

export type PassResult<R extends DispatchResult = DispatchResult> = R & {
  readonly settlement: Settlement;
};

export interface SellResult extends PassResult {
  /** Money the sale is worth, before the onSell effect's own money. */
  readonly value: number;
}

export interface LoadReport {
  readonly loaded: readonly InstanceHandle[];
  readonly lost: readonly LostEntry[];
}

export class JokerRun {
  readonly config: EngineConfig;
  private readonly registry: BehaviorRegistry;
  private readonly collection = new BehaviorCollection();
  private readonly sellBonus = new Map<number, number>();
  private readonly store = new BehaviorStateStore();
  private readonly cache: ConditionCache;
  private readonly pipeline: ScoringPipeline;
  private nextSlot = 0;
  private snapshot: RunSnapshot;
  private lostEntries: readonly LostEntry[] = [];

  constructor(options: JokerRunOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.registry = options.registry ?? getRegistry();
    this.cache = new ConditionCache(this.config.cacheEnabled);
    this.pipeline = new ScoringPipeline({ config: this.config, cache: this.cache, store: this.store });
    this.snapshot = createRunSnapshot({ seed: options.seed ?? 0 });
  }

  // ─── Queries ─────────────────────────────────────────────────────

  get size(): number {
    return this.collection.size;
  }

  handles(): readonly InstanceHandle[] {
    return this.collection.handles();
  }

  behavior(handle: InstanceHandle): Behavior | undefined {
    return this.find(handle)?.behavior;
  }

  /** Half the catalog price, at least 1, plus whatever was added since. */
  sellValue(handle: InstanceHandle): number | undefined {
    const entry = this.find(handle);
    if (entry === undefined) return undefined;
    return this.valueOf(entry);
  }

  rules(snapshot: RunSnapshot = this.snapshot): ResolvedRules {
    return this.pipeline.resolveRules(this.pipelineEntries(), snapshot);
  }

  cacheStats(): ReturnType<ConditionCache["stats"]> {
    return this.cache.stats();
  }

  /** Entries the last load could not restore. */
  lost(): readonly LostEntry[] {
    return this.lostEntries;
  }

  // ─── Membership ──────────────────────────────────────────────────

  /**
   * Adds a new instance of `id` at the end of the acquisition order.
   *
   * @throws {ConstructionError} when the identifier or arguments are bad.
   * @throws {AcquisitionError} when no slot is free, or when the joker is
   * already held and duplicates are not allowed.
   */
  acquire(id: string, args?: unknown, snapshot: RunSnapshot = this.snapshot): InstanceHandle {
    this.snapshot = snapshot;
    const behavior = this.construct(id, args);
    const rules = this.rules(snapshot);
    this.checkRoom(id, rules);
    if (!rules.flags.has("allow_duplicates") && this.holds(id)) {
      throw new AcquisitionError(`Joker "${id}" is already held`, "duplicate", id);
    }
    return this.insert(behavior, snapshot).handle;
  }

  tryAcquire(id: string, args?: unknown, snapshot: RunSnapshot = this.snapshot): AcquireResult {
    try {
      return { ok: true, handle: this.acquire(id, args, snapshot) };
    } catch (err) {
      if (err instanceof ConstructionError || err instanceof AcquisitionError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  /**
   * Sells a joker: its onSell effect, then removal, then a
   * `joker_sold` event for the jokers that remain.
   *
   * @throws {AcquisitionError} when the handle is not in the run.
   */
  sell(handle: InstanceHandle, snapshot: RunSnapshot = this.snapshot): SellResult {
    this.snapshot = snapshot;
    const entry = this.require(handle);
    const value = this.valueOf(entry);
    const sale = this.pipeline.single(this.pipelineEntries(), this.toPipeline(entry), snapshot, "onSell", (b, ctx) =>
      b.lifecycle?.onSell?.(ctx)
    );
    this.detach(entry, snapshot);
    logger.debug("Joker sold", { joker: handle.id, slot: handle.slot, value });

    const event: RunEvent = { kind: "joker_sold", id: handle.id, slot: handle.slot };
    const reaction = this.pipeline.lifecycle(this.pipelineEntries(), snapshot, "onRunEvent", (b, ctx) =>
      b.lifecycle?.onRunEvent?.(event, ctx)
    );
    return { ...this.settle(merge(sale, reaction, this.config.maxMult), snapshot), value };
  }

  /**
   * Destroys a joker outside a pass, running its onDestroy hook.
   *
   * @throws {AcquisitionError} when the handle is not in the run.
   */
  destroy(handle: InstanceHandle, snapshot: RunSnapshot = this.snapshot): void {
    this.snapshot = snapshot;
    const entry = this.require(handle);
    this.runDestroyHook(entry, snapshot);
    this.detach(entry, snapshot);
    logger.debug("Joker destroyed", { joker: handle.id, slot: handle.slot });
  }

  // ─── Passes ──────────────────────────────────────────────────────

  process(hand: PlayedHand, snapshot: RunSnapshot): PassResult<ProcessResult> {
    this.snapshot = snapshot;
    return this.settle(this.pipeline.process(this.pipelineEntries(), hand, snapshot), snapshot);
  }

  discard(cards: readonly PlayingCard[], snapshot: RunSnapshot): PassResult {
    this.snapshot = snapshot;
    return this.settle(this.pipeline.discard(this.pipelineEntries(), cards, snapshot), snapshot);
  }

  /** Starts a round; cached conditions from the previous round are dropped. */
  startRound(snapshot: RunSnapshot): PassResult {
    this.snapshot = snapshot;
    this.cache.bumpEpoch();
    return this.lifecyclePass(snapshot, "onRoundStart", (b, ctx) => b.lifecycle?.onRoundStart?.(ctx));
  }

  endRound(snapshot: RunSnapshot): PassResult {
    this.snapshot = snapshot;
    return this.lifecyclePass(snapshot, "onRoundEnd", (b, ctx) => b.lifecycle?.onRoundEnd?.(ctx));
  }

  emit(event: RunEvent, snapshot: RunSnapshot): PassResult {
    this.snapshot = snapshot;
    return this.lifecyclePass(snapshot, "onRunEvent", (b, ctx) => b.lifecycle?.onRunEvent?.(event, ctx));
  }

  /**
   * Carries out what a pass asked of the run: removes self-destroyed
   * jokers, then applies the directives that address jokers. Directives
   * for the rest of the game are returned untouched.
   */
  applyDirectives(
    result: Pick<DispatchResult, "removals" | "directives">,
    snapshot: RunSnapshot = this.snapshot
  ): Settlement {
    const removed: InstanceHandle[] = [];
    const added: InstanceHandle[] = [];
    const forwarded: RunDirective[] = [];

    const remove = (entry: CollectionEntry | undefined): void => {
      if (entry === undefined) return;
      this.runDestroyHook(entry, snapshot);
      this.detach(entry, snapshot);
      removed.push(entry.handle);
    };

    for (const handle of result.removals) remove(this.find(handle));

    for (const directive of result.directives) {
      switch (directive.kind) {
        case "destroy_joker":
          remove(this.entryAt(directive.slot));
          break;
        case "duplicate_joker": {
          const copy = this.duplicate(directive.slot, snapshot);
          if (copy !== undefined) added.push(copy);
          break;
        }
        case "add_sell_value":
          this.addSellValue(directive.target, directive.amount);
          break;
        default:
          forwarded.push(directive);
      }
    }
    return { removed, added, forwarded };
  }

  // ─── Persistence ─────────────────────────────────────────────────

  serializeAll(): JokerSaveBlob {
    const entries: SavedJokerEntry[] = this.collection.entries().map((entry) => {
      const state = entry.behavior.state;
      const payload: JsonValue = state === undefined ? null : state.serializeState();
      return {
        id: entry.handle.id,
        slot: entry.handle.slot,
        version: state?.stateVersion ?? 0,
        sellBonus: this.sellBonus.get(entry.handle.slot) ?? 0,
        state: payload,
      };
    });
    return createSaveBlob(this.nextSlot, entries);
  }

  /** The blob as gzipped JSON. */
  save(): Uint8Array {
    return encodeSave(this.serializeAll());
  }

  /**
   * Replaces the run's jokers with the ones in `blob` (bytes or value).
   * Entries that cannot be restored are reported and skipped.
   *
   * @throws {SaveBlobError} when the blob as a whole is unreadable.
   * @throws {UnsupportedVersionError} for a blob newer than this build.
   */
  deserializeAll(blob: unknown): LoadReport {
    const decoded = decodeSave(blob);
    this.collection.clear();
    this.sellBonus.clear();
    this.store.clear();
    this.cache.bumpEpoch();
    this.nextSlot = decoded.nextSlot;

    const loaded: InstanceHandle[] = [];
    const lost: LostEntry[] = [...decoded.lost];
    for (const { index, entry } of decoded.entries) {
      const restored = this.restore(entry);
      if (restored instanceof JesterError) {
        lost.push({ index, id: entry.id, reason: restored.message });
        continue;
      }
      loaded.push(restored);
    }
    lost.sort((a, b) => a.index - b.index);

    for (const entry of lost) {
      logger.error("Joker could not be restored", { index: entry.index, joker: entry.id, reason: entry.reason });
    }
    this.lostEntries = lost;
    return { loaded, lost };
  }

  // ─── Internals ───────────────────────────────────────────────────

  private construct(id: string, args: unknown): Behavior {
    const entry = this.registry.has(id) ? this.registry.entry(id) : undefined;
    if (entry === undefined) {
      throw new ConstructionError(`Unknown joker identifier: "${id}"`, "unknown_identifier", id);
    }
    return entry.construct(args);
  }

  private checkRoom(id: string, rules: ResolvedRules): void {
    if (this.collection.size >= rules.jokerSlots) {
      throw new AcquisitionError(
        `No free joker slot for "${id}" (${rules.jokerSlots} slots)`,
        "no_free_slot",
        id
      );
    }
  }

  private holds(id: string): boolean {
    return this.collection.handles().some((h) => h.id === id);
  }

  private insert(behavior: Behavior, snapshot: RunSnapshot, slot = this.nextSlot++): CollectionEntry {
    const handle: InstanceHandle = { id: behavior.identity.id, slot };
    this.collection.add(handle, behavior);
    if (behavior.state !== undefined) this.store.register(handle, behavior.state);
    const entry = this.require(handle);

    this.pipeline.single(this.pipelineEntries(), this.toPipeline(entry), snapshot, "onAcquire", (b, ctx) => {
      const lifecycle = b.lifecycle;
      if (lifecycle === undefined || lifecycle.onAcquire === undefined) return undefined;
      lifecycle.onAcquire(ctx);
      return IDENTITY_EFFECT;
    });
    this.notify({ kind: "added", handle }, snapshot);
    logger.debug("Joker acquired", { joker: handle.id, slot });
    return entry;
  }

  private restore(saved: SavedJokerEntry): InstanceHandle | JesterError {
    let behavior: Behavior;
    try {
      behavior = this.construct(saved.id, undefined);
      if (behavior.state !== undefined) {
        if (saved.state === null) {
          throw new StateDeserializeError(`Saved state for "${saved.id}" is missing`);
        }
        behavior.state.deserializeState(saved.state, saved.version);
      }
    } catch (err) {
      if (err instanceof JesterError) return err;
      throw err;
    }
    const handle: InstanceHandle = { id: behavior.identity.id, slot: saved.slot };
    this.collection.add(handle, behavior);
    if (behavior.state !== undefined) this.store.register(handle, behavior.state);
    if (saved.sellBonus !== 0) this.sellBonus.set(saved.slot, saved.sellBonus);
    return handle;
  }

  /** A fresh instance of the joker at `slot` carrying a copy of its state. */
  private duplicate(slot: number, snapshot: RunSnapshot): InstanceHandle | undefined {
    const source = this.entryAt(slot);
    if (source === undefined) return undefined;
    if (this.collection.size >= this.rules(snapshot).jokerSlots) {
      logger.debug("No room to duplicate joker", { joker: source.handle.id, slot });
      return undefined;
    }
    const copy = this.construct(source.handle.id, undefined);
    const state = source.behavior.state;
    if (state !== undefined && copy.state !== undefined) {
      copy.state.deserializeState(state.serializeState(), state.stateVersion);
    }
    return this.insert(copy, snapshot).handle;
  }

  private addSellValue(target: "all" | number, amount: number): void {
    const slots = target === "all" ? this.collection.handles().map((h) => h.slot) : [target];
    for (const slot of slots) {
      if (this.collection.get(slot) === undefined) continue;
      this.sellBonus.set(slot, (this.sellBonus.get(slot) ?? 0) + amount);
    }
  }

  private runDestroyHook(entry: CollectionEntry, snapshot: RunSnapshot): void {
    this.pipeline.single(this.pipelineEntries(), this.toPipeline(entry), snapshot, "onDestroy", (b, ctx) => {
      const lifecycle = b.lifecycle;
      if (lifecycle === undefined || lifecycle.onDestroy === undefined) return undefined;
      lifecycle.onDestroy(ctx);
      return IDENTITY_EFFECT;
    });
  }

  private detach(entry: CollectionEntry, snapshot: RunSnapshot): void {
    const { handle } = entry;
    this.collection.remove(handle.slot);
    this.store.unregister(handle);
    this.cache.forget(handle.slot);
    this.sellBonus.delete(handle.slot);
    this.notify({ kind: "removed", handle }, snapshot);
  }

  /** Tells every other joker that membership changed. */
  private notify(change: SiblingChange, snapshot: RunSnapshot): void {
    this.pipeline.lifecycle(this.pipelineEntries(), snapshot, "onSiblingsChanged", (b, ctx) => {
      const lifecycle = b.lifecycle;
      if (lifecycle === undefined || lifecycle.onSiblingsChanged === undefined) return undefined;
      if (ctx.self.slot === change.handle.slot) return undefined;
      lifecycle.onSiblingsChanged(change, ctx);
      return IDENTITY_EFFECT;
    });
  }

  private lifecyclePass(snapshot: RunSnapshot, hook: string, call: LifecycleCall): PassResult {
    return this.settle(this.pipeline.lifecycle(this.pipelineEntries(), snapshot, hook, call), snapshot);
  }

  private settle<R extends DispatchResult>(result: R, snapshot: RunSnapshot): PassResult<R> {
    return { ...result, settlement: this.applyDirectives(result, snapshot) };
  }

  private pipelineEntries(): PipelineEntry[] {
    return this.collection.entries().map((entry) => this.toPipeline(entry));
  }

  private toPipeline(entry: CollectionEntry): PipelineEntry {
    return { handle: entry.handle, behavior: entry.behavior, sellValue: this.valueOf(entry) };
  }

  private valueOf(entry: CollectionEntry): number {
    const base = Math.max(1, Math.floor(entry.behavior.identity.baseCost / 2));
    return base + (this.sellBonus.get(entry.handle.slot) ?? 0);
  }

  private find(handle: InstanceHandle): CollectionEntry | undefined {
    const entry = this.entryAt(handle.slot);
    return entry !== undefined && entry.handle.id === handle.id ? entry : undefined;
  }

  private entryAt(slot: number): CollectionEntry | undefined {
    return this.collection.get(slot);
  }

  private require(handle: InstanceHandle): CollectionEntry {
    const entry = this.find(handle);
    if (entry === undefined) {
      throw new AcquisitionError(
        `Joker "${handle.id}" is not in slot ${handle.slot}`,
        "unknown_instance",
        handle.id
      );
    }
    return entry;
  }
}

/** Two dispatch results as one, in order. */
function merge(a: DispatchResult, b: DispatchResult, maxMult: number): DispatchResult {
  return {
    effect: accumulate([a.effect, b.effect], maxMult),
    directives: [...a.directives, ...b.directives],
    removals: [...a.removals, ...b.removals],
    issues: [...a.issues, ...b.issues],
    jokersEvaluated: a.jokersEvaluated + b.jokersEvaluated,
  };
}
