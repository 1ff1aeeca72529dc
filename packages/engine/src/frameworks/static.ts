// ─── Static Framework ──────────────────────────────────────────────
// Jokers whose payout is a fixed formula with no state: a scope (once
// per hand or once per scoring card), one primitive condition and a
// constant effect. The effect is built once at construction, so an
// evaluation is one condition check.

import type { Effect, HandType, PlayingCard, Rank, Suit } from "@jester/schema";
import { IDENTITY_EFFECT, effect } from "../engine/effect";
import { cardHasRank, cardHasSuit, isFaceCard } from "../engine/card-utils";
import type {
  Behavior,
  Gameplay,
  Identity,
  Modifiers,
  ScoringContext,
} from "../types/behavior";
import type { RuleModifiers } from "../types/rules";

// ─── Spec Types ────────────────────────────────────────────────────

/** Primitive conditions. Discriminated on `kind`. */
export type StaticCondition =
  | { readonly kind: "always" }
  | { readonly kind: "suit"; readonly suit: Suit }
  | { readonly kind: "ranks"; readonly ranks: readonly Rank[] }
  | { readonly kind: "face" }
  | { readonly kind: "contains_hand"; readonly handType: HandType }
  | { readonly kind: "max_cards"; readonly count: number };

export interface StaticSpec {
  readonly scope: "hand" | "card";
  readonly condition: StaticCondition;
  readonly chips?: number;
  readonly mult?: number;
  readonly xmult?: number;
  readonly money?: number;
  readonly retriggers?: number;
  /** Passive rule changes; a joker may have these and nothing else. */
  readonly modifiers?: RuleModifiers;
}

// ─── Condition Evaluation ──────────────────────────────────────────

function cardMatches(condition: StaticCondition, card: PlayingCard, ctx: ScoringContext): boolean {
  switch (condition.kind) {
    case "always":
      return true;
    case "suit":
      return cardHasSuit(card, condition.suit, ctx.rules);
    case "ranks":
      return cardHasRank(card, condition.ranks);
    case "face":
      return isFaceCard(card, ctx.rules);
    case "contains_hand":
    case "max_cards":
      return handMatches(condition, ctx);
  }
}

/** Card conditions at hand scope ask whether any scoring card matches. */
function handMatches(condition: StaticCondition, ctx: ScoringContext): boolean {
  switch (condition.kind) {
    case "always":
      return true;
    case "contains_hand":
      return ctx.hand.contains.includes(condition.handType);
    case "max_cards":
      return ctx.hand.played.length > 0 && ctx.hand.played.length <= condition.count;
    case "suit":
    case "ranks":
    case "face":
      return ctx.hand.scoring.some((card) => cardMatches(condition, card, ctx));
  }
}

function hasPayout(spec: StaticSpec): boolean {
  return (
    spec.chips !== undefined ||
    spec.mult !== undefined ||
    spec.xmult !== undefined ||
    spec.money !== undefined ||
    spec.retriggers !== undefined
  );
}

// ─── Behavior ──────────────────────────────────────────────────────

export class StaticBehavior implements Behavior {
  readonly gameplay?: Gameplay;
  readonly modifiers?: Modifiers;
  private readonly payout: Effect;

  constructor(
    readonly identity: Identity,
    private readonly spec: StaticSpec
  ) {
    this.payout = Object.freeze(
      effect({
        chips: spec.chips ?? 0,
        mult: spec.mult ?? 0,
        multMultiplier: spec.xmult ?? 1,
        money: spec.money ?? 0,
        retriggers: spec.retriggers ?? 0,
      })
    );

    if (hasPayout(spec)) {
      this.gameplay =
        spec.scope === "hand"
          ? {
              onHandPlayed: (ctx) => (handMatches(spec.condition, ctx) ? this.payout : IDENTITY_EFFECT),
              onCardScored: () => IDENTITY_EFFECT,
            }
          : {
              onHandPlayed: () => IDENTITY_EFFECT,
              onCardScored: (ctx, card) =>
                cardMatches(spec.condition, card, ctx) ? this.payout : IDENTITY_EFFECT,
            };
    }

    const rules = spec.modifiers;
    if (rules !== undefined) {
      this.modifiers = { rules: () => rules };
    }
  }

  /** The declarative spec, for catalog tooling and tests. */
  get definition(): StaticSpec {
    return this.spec;
  }
}
