// ─── Capability Roles ──────────────────────────────────────────────
// A behavior is an identity plus any subset of four optional roles.
// Dispatch asks whether a role is present (`behavior.gameplay !==
// undefined`) and never assumes a fixed shape.

import type {
  Effect,
  HandType,
  InstanceHandle,
  JokerId,
  JsonValue,
  PlayingCard,
  Rarity,
} from "@jester/schema";
import type { EngineConfig } from "../config";
import type { SeededRng } from "../engine/prng";
import type { ConditionCache } from "../state/condition-cache";
import type { ResolvedRules, RuleModifiers } from "./rules";
import type { HeldConsumable, RunSnapshot } from "./snapshot";

// ─── Identity ──────────────────────────────────────────────────────

/** Read from frozen catalog metadata; no computation, no allocation. */
export interface Identity {
  readonly id: JokerId;
  readonly name: string;
  readonly description: string;
  readonly rarity: Rarity;
  readonly baseCost: number;
  readonly copyable: boolean;
}

// ─── Context ───────────────────────────────────────────────────────

export interface SiblingView {
  readonly handle: InstanceHandle;
  readonly identity: Identity;
  readonly gameplay?: Gameplay;
  readonly sellValue: number;
}

/** Read-only view over the persisted state of every instance in the run. */
export interface StateStoreView {
  read(handle: InstanceHandle): JsonValue | undefined;
  handles(): readonly InstanceHandle[];
}

/** What every hook can see. Behaviors read it; only the pipeline binds it. */
export interface RunContext {
  readonly self: InstanceHandle;
  readonly snapshot: RunSnapshot;
  readonly rules: ResolvedRules;
  readonly config: EngineConfig;
  /** Every joker in acquisition order, `self` included. */
  readonly siblings: readonly SiblingView[];
  readonly rng: SeededRng;
  readonly store: StateStoreView;
  readonly cache: ConditionCache;
  /**
   * True while another joker (Blueprint, Brainstorm) is replaying this
   * joker's hook. Mirrored calls must not change the joker's own state.
   */
  readonly mirrored: boolean;
  /** Position of `self` among `siblings`, or -1. */
  selfIndex(): number;
}

export interface HandView {
  readonly played: readonly PlayingCard[];
  readonly held: readonly PlayingCard[];
  readonly scoring: readonly PlayingCard[];
  readonly handType: HandType;
  readonly contains: readonly HandType[];
  readonly base: { readonly chips: number; readonly mult: number };
}

export interface ScoringContext extends RunContext {
  readonly hand: HandView;
  /** Base chips plus everything accumulated so far. */
  readonly chips: number;
  /** Base mult plus additive mult so far, times the multiplier so far. */
  readonly mult: number;
  readonly card: PlayingCard | undefined;
  /** Index of `card` among the scoring cards, or -1 during hand hooks. */
  readonly cardIndex: number;
  /** 0 on a card's first pass, 1.. on retriggers. */
  readonly retrigger: number;
  /** How many replays deep this view is; 0 outside a mirror. */
  readonly mirrorDepth: number;
  /**
   * The same view with `mirrored` set and `self` rebound to `target`,
   * for replaying a sibling's hook as if it were that sibling's own call.
   */
  mirror(target: InstanceHandle): ScoringContext;
}

// ─── Roles ─────────────────────────────────────────────────────────

export type RunEvent =
  | { readonly kind: "blind_selected" }
  | { readonly kind: "blind_skipped" }
  | { readonly kind: "booster_opened" }
  | { readonly kind: "booster_skipped" }
  | { readonly kind: "shop_rerolled" }
  | { readonly kind: "shop_exited" }
  | { readonly kind: "boss_defeated" }
  | { readonly kind: "consumable_used"; readonly consumable: HeldConsumable }
  | { readonly kind: "cards_added"; readonly cards: readonly PlayingCard[] }
  | { readonly kind: "cards_destroyed"; readonly cards: readonly PlayingCard[] }
  | { readonly kind: "joker_sold"; readonly id: JokerId; readonly slot: number };

export type RunEventKind = RunEvent["kind"];

export interface SiblingChange {
  readonly kind: "added" | "removed";
  readonly handle: InstanceHandle;
}

/** Every hook is optional and may run zero or many times per round. */
export interface Lifecycle {
  onAcquire?(ctx: RunContext): void;
  onSell?(ctx: RunContext): Effect;
  onDestroy?(ctx: RunContext): void;
  onRoundStart?(ctx: RunContext): Effect;
  onRoundEnd?(ctx: RunContext): Effect;
  onSiblingsChanged?(change: SiblingChange, ctx: RunContext): void;
  onRunEvent?(event: RunEvent, ctx: RunContext): Effect;
}

export interface Gameplay {
  onHandPlayed(ctx: ScoringContext): Effect;
  onCardScored(ctx: ScoringContext, card: PlayingCard): Effect;
  onDiscard?(ctx: ScoringContext, cards: readonly PlayingCard[]): Effect;
}

/**
 * Passive adjustments, queried once per rules recomputation. The
 * context's `rules` are the base rules while resolution is running.
 */
export interface Modifiers {
  rules(ctx: RunContext): RuleModifiers;
}

/**
 * Persistent data. `deserializeState` throws StateDeserializeError or
 * UnsupportedVersionError and leaves the current state untouched.
 */
export interface Stateful {
  readonly stateVersion: number;
  serializeState(): JsonValue;
  deserializeState(raw: JsonValue, version: number): void;
}

export interface Behavior {
  readonly identity: Identity;
  readonly lifecycle?: Lifecycle;
  readonly gameplay?: Gameplay;
  readonly modifiers?: Modifiers;
  readonly state?: Stateful;
}
