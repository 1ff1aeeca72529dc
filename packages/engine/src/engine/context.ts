// ─── Game Context ──────────────────────────────────────────────────
// The per-evaluation view handed to every hook. Behaviors see it through
// the read-only RunContext / ScoringContext interfaces; the pipeline
// alone binds the current behavior and card and feeds in the running
// total between hooks.

import type { Effect, InstanceHandle, PlayingCard } from "@jester/schema";
import type { EngineConfig } from "../config";
import type { ConditionCache } from "../state/condition-cache";
import type {
  HandView,
  RunContext,
  ScoringContext,
  SiblingView,
  StateStoreView,
} from "../types/behavior";
import type { ResolvedRules } from "../types/rules";
import type { PlayedHand, RunSnapshot } from "../types/snapshot";
import { IDENTITY_EFFECT } from "./effect";
import { classifyHand, handBase } from "./hand-evaluator";
import { SeededRng, deriveSeed } from "./prng";

/** Handle used before the pipeline binds a behavior. */
const UNBOUND: InstanceHandle = { id: "joker", slot: -1 };

interface ContextFrame {
  readonly snapshot: RunSnapshot;
  readonly rules: ResolvedRules;
  readonly config: EngineConfig;
  readonly siblings: readonly SiblingView[];
  readonly store: StateStoreView;
  readonly cache: ConditionCache;
  readonly rng: SeededRng;
  readonly hand: HandView;
  self: InstanceHandle;
  card: PlayingCard | undefined;
  cardIndex: number;
  retrigger: number;
  accumulated: Effect;
}

export interface ContextOptions {
  readonly snapshot: RunSnapshot;
  readonly rules: ResolvedRules;
  readonly config: EngineConfig;
  readonly siblings: readonly SiblingView[];
  readonly store: StateStoreView;
  readonly cache: ConditionCache;
  /** Separates random streams of different passes over the same hand. */
  readonly passTag: string;
  readonly hand?: HandView;
}

// ─── Hand View ─────────────────────────────────────────────────────

export const EMPTY_HAND: HandView = Object.freeze({
  played: [],
  held: [],
  scoring: [],
  handType: "high_card",
  contains: [],
  base: handBase("high_card"),
});

/**
 * Resolves the caller's hand into the view behaviors read, running the
 * classifier unless the caller already supplied a classification.
 */
export function buildHandView(
  hand: PlayedHand,
  rules: ResolvedRules,
  snapshot: RunSnapshot
): HandView {
  const classification = hand.classification ?? classifyHand(hand.played, rules);
  const scoring: PlayingCard[] = [];
  for (const index of classification.scoringIndices) {
    const card = hand.played[index];
    if (card !== undefined) scoring.push(card);
  }
  return {
    played: hand.played,
    held: hand.held,
    scoring,
    handType: classification.handType,
    contains: classification.contains,
    base: handBase(
      classification.handType,
      snapshot.handLevels[classification.handType] ?? 1
    ),
  };
}

// ─── Context ───────────────────────────────────────────────────────

export class GameContext implements ScoringContext {
  private constructor(
    private readonly frame: ContextFrame,
    private readonly depth: number
  ) {}

  static create(options: ContextOptions): GameContext {
    const { snapshot } = options;
    return new GameContext(
      {
        snapshot,
        rules: options.rules,
        config: options.config,
        siblings: options.siblings,
        store: options.store,
        cache: options.cache,
        rng: new SeededRng(
          deriveSeed(snapshot.seed, snapshot.round, snapshot.handsPlayed, options.passTag)
        ),
        hand: options.hand ?? EMPTY_HAND,
        self: UNBOUND,
        card: undefined,
        cardIndex: -1,
        retrigger: 0,
        accumulated: IDENTITY_EFFECT,
      },
      0
    );
  }

  get self(): InstanceHandle {
    return this.frame.self;
  }
  get snapshot(): RunSnapshot {
    return this.frame.snapshot;
  }
  get rules(): ResolvedRules {
    return this.frame.rules;
  }
  get config(): EngineConfig {
    return this.frame.config;
  }
  get siblings(): readonly SiblingView[] {
    return this.frame.siblings;
  }
  get rng(): SeededRng {
    return this.frame.rng;
  }
  get store(): StateStoreView {
    return this.frame.store;
  }
  get cache(): ConditionCache {
    return this.frame.cache;
  }
  get hand(): HandView {
    return this.frame.hand;
  }
  get card(): PlayingCard | undefined {
    return this.frame.card;
  }
  get cardIndex(): number {
    return this.frame.cardIndex;
  }
  get retrigger(): number {
    return this.frame.retrigger;
  }
  get mirrored(): boolean {
    return this.depth > 0;
  }
  get mirrorDepth(): number {
    return this.depth;
  }

  get chips(): number {
    return this.frame.hand.base.chips + this.frame.accumulated.chips;
  }

  get mult(): number {
    const { base } = this.frame.hand;
    const { mult, multMultiplier } = this.frame.accumulated;
    return Math.min(this.frame.config.maxMult, (base.mult + mult) * multMultiplier);
  }

  selfIndex(): number {
    const slot = this.frame.self.slot;
    return this.frame.siblings.findIndex((s) => s.handle.slot === slot);
  }

  mirror(target: InstanceHandle): GameContext {
    return new GameContext({ ...this.frame, self: target }, this.depth + 1);
  }

  // ── Pipeline-only binding ──

  bindSelf(handle: InstanceHandle): void {
    this.frame.self = handle;
  }

  bindCard(card: PlayingCard | undefined, index: number, retrigger: number): void {
    this.frame.card = card;
    this.frame.cardIndex = index;
    this.frame.retrigger = retrigger;
  }

  setAccumulated(total: Effect): void {
    this.frame.accumulated = total;
  }
}

/**
 * A scoring view over a lifecycle context, for behaviors that evaluate
 * the same rules at round boundaries as during a hand. Outside a hand
 * there is no card and nothing accumulated.
 */
export function scoringView(ctx: RunContext): ScoringContext {
  if (ctx instanceof GameContext) return ctx;
  return lifecycleView(ctx, ctx.self, ctx.mirrored ? 1 : 0);
}

function lifecycleView(ctx: RunContext, self: InstanceHandle, depth: number): ScoringContext {
  return {
    self,
    snapshot: ctx.snapshot,
    rules: ctx.rules,
    config: ctx.config,
    siblings: ctx.siblings,
    rng: ctx.rng,
    store: ctx.store,
    cache: ctx.cache,
    mirrored: depth > 0,
    selfIndex: () => ctx.siblings.findIndex((s) => s.handle.slot === self.slot),
    hand: EMPTY_HAND,
    chips: 0,
    mult: 0,
    card: undefined,
    cardIndex: -1,
    retrigger: 0,
    mirrorDepth: depth,
    mirror: (target) => lifecycleView(ctx, target, depth + 1),
  };
}
