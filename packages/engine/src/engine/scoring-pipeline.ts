// ─── Scoring Pipeline ──────────────────────────────────────────────
// Runs a run's behaviors over one hand, discard or lifecycle event.
//
//   1. resolve passive rules from every Modifiers role
//   2. classify the hand (unless the caller supplied a classification)
//   3. pass 1: onHandPlayed for every joker, in acquisition order
//   4. pass 2: for every scoring card in hand order, onCardScored for
//      every joker; the card's pass repeats for the retriggers asked for
//      during its first pass, within the per-card and per-hand caps
//   5. collect self-destroys and directives; nothing is removed mid-pass
//
// A hook that throws contributes the identity effect and is reported as
// a `hook_failed` issue. A non-finite field keeps its previous value and
// is reported as a `numeric_bound` issue. Evaluation never aborts.

import type {
  Effect,
  InstanceHandle,
  PlayingCard,
  RunDirective,
} from "@jester/schema";
import type { EngineConfig } from "../config";
import { HookInvocationError, NumericBoundError, type JesterError } from "../errors";
import { logger } from "../logger";
import type { ConditionCache } from "../state/condition-cache";
import type {
  Behavior,
  HandView,
  RunContext,
  SiblingView,
  StateStoreView,
} from "../types/behavior";
import { resolveRules, type ResolvedRules, type RuleBase, type RuleModifiers } from "../types/rules";
import type { PlayedHand, RunSnapshot } from "../types/snapshot";
import { GameContext, buildHandView } from "./context";
import { EffectAccumulator, applyScore, type AppliedScore } from "./effect";

// ─── Types ─────────────────────────────────────────────────────────

/** One joker as the pipeline sees it. */
export interface PipelineEntry {
  readonly handle: InstanceHandle;
  readonly behavior: Behavior;
  readonly sellValue: number;
}

export interface EngineIssue {
  readonly code: "hook_failed" | "numeric_bound";
  readonly handle: InstanceHandle;
  readonly hook: string;
  readonly error: JesterError;
}

/** Outcome of one dispatch. */
export interface DispatchResult {
  /** Every contribution folded with the accumulator's bounds. */
  readonly effect: Effect;
  readonly directives: readonly RunDirective[];
  /** Jokers that asked to destroy themselves, in the order they asked. */
  readonly removals: readonly InstanceHandle[];
  readonly issues: readonly EngineIssue[];
  /** Jokers that had the dispatched hook. */
  readonly jokersEvaluated: number;
}

export interface ProcessResult extends DispatchResult {
  readonly hand: HandView;
  /** Base chips and mult of the hand with the joker total applied. */
  readonly score: AppliedScore;
  readonly retriggers: number;
}

export interface PipelineOptions {
  readonly config: EngineConfig;
  readonly cache: ConditionCache;
  readonly store: StateStoreView;
}

/** A lifecycle hook call, or undefined when the behavior lacks the hook. */
export type LifecycleCall = (behavior: Behavior, ctx: RunContext) => Effect | undefined;

// ─── Dispatch Bookkeeping ──────────────────────────────────────────

class Dispatch {
  readonly accumulator: EffectAccumulator;
  readonly removals: InstanceHandle[] = [];
  readonly issues: EngineIssue[] = [];
  private readonly evaluated = new Set<number>();

  constructor(
    maxMult: number,
    private readonly ctx: GameContext
  ) {
    this.accumulator = new EffectAccumulator(maxMult);
  }

  /**
   * Calls one hook for `entry` with `self` bound, folds its effect into
   * the total and returns the effect as folded.
   */
  invoke(entry: PipelineEntry, hook: string, call: () => Effect | undefined): Effect | undefined {
    this.ctx.bindSelf(entry.handle);
    this.ctx.setAccumulated(this.accumulator.total);

    let produced: Effect | undefined;
    try {
      produced = call();
    } catch (err) {
      this.evaluated.add(entry.handle.slot);
      const error = new HookInvocationError(hook, entry.handle.id, err);
      this.issues.push({ code: "hook_failed", handle: entry.handle, hook, error });
      logger.warn("Joker hook failed", { joker: entry.handle.id, slot: entry.handle.slot, hook, error: err });
      return undefined;
    }
    if (produced === undefined) return undefined;
    this.evaluated.add(entry.handle.slot);

    for (const rejected of this.accumulator.add(produced)) {
      const error = new NumericBoundError(rejected.field, rejected.value);
      this.issues.push({ code: "numeric_bound", handle: entry.handle, hook, error });
      logger.warn("Effect field out of bounds", {
        joker: entry.handle.id,
        slot: entry.handle.slot,
        hook,
        field: rejected.field,
        value: rejected.value,
      });
    }
    if (produced.destroySelf && !this.removals.some((h) => h.slot === entry.handle.slot)) {
      this.removals.push(entry.handle);
    }
    return produced;
  }

  result(): DispatchResult {
    const effect = this.accumulator.total;
    return {
      effect,
      directives: effect.directives,
      removals: this.removals,
      issues: this.issues,
      jokersEvaluated: this.evaluated.size,
    };
  }
}

// ─── Pipeline ──────────────────────────────────────────────────────

export class ScoringPipeline {
  constructor(private readonly options: PipelineOptions) {}

  private get ruleBase(): RuleBase {
    const { config } = this.options;
    return {
      baseHandSize: config.baseHandSize,
      baseDiscards: config.baseDiscards,
      baseHands: config.baseHands,
      jokerSlots: config.jokerSlots,
      consumableSlots: config.consumableSlots,
    };
  }

  /**
   * Folds every Modifiers role over the configured base. A failing
   * `rules()` call contributes nothing.
   */
  resolveRules(entries: readonly PipelineEntry[], snapshot: RunSnapshot): ResolvedRules {
    const base = resolveRules(this.ruleBase, []);
    const ctx = this.context(entries, snapshot, base, "rules");
    const patches: RuleModifiers[] = [];
    for (const entry of entries) {
      const modifiers = entry.behavior.modifiers;
      if (modifiers === undefined) continue;
      ctx.bindSelf(entry.handle);
      try {
        patches.push(modifiers.rules(ctx));
      } catch (err) {
        logger.warn("Joker rules failed", { joker: entry.handle.id, slot: entry.handle.slot, error: err });
      }
    }
    return resolveRules(this.ruleBase, patches);
  }

  /** Scores one played hand. */
  process(entries: readonly PipelineEntry[], hand: PlayedHand, snapshot: RunSnapshot): ProcessResult {
    const { config } = this.options;
    const rules = this.resolveRules(entries, snapshot);
    const view = buildHandView(hand, rules, snapshot);
    const ctx = this.context(entries, snapshot, rules, "score", view);
    const dispatch = new Dispatch(config.maxMult, ctx);
    const scorers = entries.filter((e) => e.behavior.gameplay !== undefined);

    // Pass 1: hand hooks.
    for (const entry of scorers) {
      dispatch.invoke(entry, "onHandPlayed", () => entry.behavior.gameplay?.onHandPlayed(ctx));
    }

    // Pass 2: card hooks with retriggers.
    let retriggers = 0;
    view.scoring.forEach((card, index) => {
      const requested = this.scoreCard(dispatch, ctx, scorers, card, index, 0);
      const allowed = Math.max(
        0,
        Math.min(requested, config.maxRetriggersPerCard, config.maxTotalRetriggers - retriggers)
      );
      for (let pass = 1; pass <= allowed; pass++) {
        this.scoreCard(dispatch, ctx, scorers, card, index, pass);
      }
      retriggers += allowed;
    });
    ctx.bindCard(undefined, -1, 0);

    // The aggregate reports applied retriggers, not requested ones.
    const dispatched = dispatch.result();
    const result = { ...dispatched, effect: { ...dispatched.effect, retriggers } };
    return {
      ...result,
      hand: view,
      score: applyScore(view.base, result.effect, config),
      retriggers,
    };
  }

  /** Runs onDiscard for every joker that has it. */
  discard(
    entries: readonly PipelineEntry[],
    cards: readonly PlayingCard[],
    snapshot: RunSnapshot
  ): DispatchResult {
    const rules = this.resolveRules(entries, snapshot);
    const view: HandView = { ...buildHandView({ played: cards, held: [] }, rules, snapshot), scoring: [] };
    const ctx = this.context(entries, snapshot, rules, "discard", view);
    const dispatch = new Dispatch(this.options.config.maxMult, ctx);
    for (const entry of entries) {
      if (entry.behavior.gameplay?.onDiscard === undefined) continue;
      dispatch.invoke(entry, "onDiscard", () => entry.behavior.gameplay?.onDiscard?.(ctx, cards));
    }
    return dispatch.result();
  }

  /**
   * Runs one lifecycle hook for every joker. `call` returns undefined
   * for behaviors without the hook; void hooks return the identity.
   */
  lifecycle(
    entries: readonly PipelineEntry[],
    snapshot: RunSnapshot,
    hook: string,
    call: LifecycleCall
  ): DispatchResult {
    const rules = this.resolveRules(entries, snapshot);
    const ctx = this.context(entries, snapshot, rules, hook);
    const dispatch = new Dispatch(this.options.config.maxMult, ctx);
    for (const entry of entries) {
      dispatch.invoke(entry, hook, () => call(entry.behavior, ctx));
    }
    return dispatch.result();
  }

  /**
   * Runs one lifecycle hook for a single joker, with every joker in
   * `entries` visible as a sibling.
   */
  single(
    entries: readonly PipelineEntry[],
    target: PipelineEntry,
    snapshot: RunSnapshot,
    hook: string,
    call: LifecycleCall
  ): DispatchResult {
    const rules = this.resolveRules(entries, snapshot);
    const ctx = this.context(entries, snapshot, rules, `${hook}:${target.handle.slot}`);
    const dispatch = new Dispatch(this.options.config.maxMult, ctx);
    dispatch.invoke(target, hook, () => call(target.behavior, ctx));
    return dispatch.result();
  }

  /** One pass of one card; returns the retriggers asked for on a first pass. */
  private scoreCard(
    dispatch: Dispatch,
    ctx: GameContext,
    scorers: readonly PipelineEntry[],
    card: PlayingCard,
    index: number,
    pass: number
  ): number {
    let requested = 0;
    for (const entry of scorers) {
      ctx.bindCard(card, index, pass);
      const produced = dispatch.invoke(entry, "onCardScored", () => {
        const gameplay = entry.behavior.gameplay;
        if (gameplay === undefined) return undefined;
        const result = gameplay.onCardScored(ctx, card);
        return pass === 0 || result.retriggers === 0 ? result : { ...result, retriggers: 0 };
      });
      if (pass === 0 && produced !== undefined && Number.isFinite(produced.retriggers)) {
        requested += Math.max(0, Math.floor(produced.retriggers));
      }
    }
    return requested;
  }

  private context(
    entries: readonly PipelineEntry[],
    snapshot: RunSnapshot,
    rules: ResolvedRules,
    passTag: string,
    hand?: HandView
  ): GameContext {
    const siblings: SiblingView[] = entries.map((entry) => ({
      handle: entry.handle,
      identity: entry.behavior.identity,
      sellValue: entry.sellValue,
      ...(entry.behavior.gameplay !== undefined ? { gameplay: entry.behavior.gameplay } : {}),
    }));
    return GameContext.create({
      snapshot,
      rules,
      config: this.options.config,
      siblings,
      store: this.options.store,
      cache: this.options.cache,
      passTag,
      ...(hand !== undefined ? { hand } : {}),
    });
  }
}
