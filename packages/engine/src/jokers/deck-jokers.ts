// ─── Deck and Sibling Jokers ───────────────────────────────────────
// Stateless jokers that scan the full deck, the held cards, the scoring
// cards or the other jokers. Full-deck scans go through the condition
// cache, fingerprinted by the snapshot's deck revision.

import { SUITS, type PlayingCard, type Suit } from "@jester/schema";
import {
  cardHasSuit,
  countWhere,
  deckFingerprint,
  isFaceCard,
  type FlagView,
} from "../engine/card-utils";
import { IDENTITY_EFFECT, effect } from "../engine/effect";
import { AdvancedBehavior } from "../frameworks/advanced";
import { defineJoker, gameplay, type JokerDefinition } from "../frameworks/definition";
import type { ScoringContext } from "../types/behavior";
import { heldTriggers } from "./scaling-jokers";

/** ×0.2 for every Steel card in the full deck. */
class SteelJoker extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const deck = ctx.snapshot.fullDeck;
      const steel = this.cachedNumber(ctx, "steel", deckFingerprint(ctx.snapshot), () =>
        countWhere(deck, (card) => card.enhancement === "steel")
      );
      return steel > 0 ? effect({ multMultiplier: 1 + 0.2 * steel }) : IDENTITY_EFFECT;
    },
  });
}

/** ×3 with at least 16 enhanced cards in the full deck. */
class DriversLicense extends AdvancedBehavior {
  static readonly THRESHOLD = 16;

  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const deck = ctx.snapshot.fullDeck;
      const licensed = this.cachedCondition(
        ctx,
        "licensed",
        deckFingerprint(ctx.snapshot),
        () => countWhere(deck, (card) => card.enhancement !== undefined) >= DriversLicense.THRESHOLD
      );
      return licensed ? effect({ multMultiplier: 3 }) : IDENTITY_EFFECT;
    },
  });
}

/** ×3 when every held card is a Spade or a Club. */
class Blackboard extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const dark = ctx.hand.held.every(
        (card) => cardHasSuit(card, "spades", ctx.rules) || cardHasSuit(card, "clubs", ctx.rules)
      );
      return dark ? effect({ multMultiplier: 3 }) : IDENTITY_EFFECT;
    },
  });
}

/**
 * Whether distinct cards of `cards` can stand for every suit in `suits`.
 * Cards are tried against suits by backtracking, so a Wild card is only
 * spent where a natural suit is missing.
 */
export function coversSuits(cards: readonly PlayingCard[], suits: readonly Suit[], rules: FlagView): boolean {
  const used = new Set<number>();
  const assign = (index: number): boolean => {
    const suit = suits[index];
    if (suit === undefined) return true;
    for (const [i, card] of cards.entries()) {
      if (used.has(i) || !cardHasSuit(card, suit, rules)) continue;
      used.add(i);
      if (assign(index + 1)) return true;
      used.delete(i);
    }
    return false;
  };
  return assign(0);
}

/** ×3 when the scoring cards cover all four suits. */
class FlowerPot extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) =>
      coversSuits(ctx.hand.scoring, SUITS, ctx.rules) ? effect({ multMultiplier: 3 }) : IDENTITY_EFFECT,
  });
}

/** ×2 when the scoring cards hold a Club and a card of any other suit. */
class SeeingDouble extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const { scoring } = ctx.hand;
      const matched = SUITS.filter((suit) => suit !== "clubs").some((other) =>
        coversSuits(scoring, ["clubs", other], ctx.rules)
      );
      return matched ? effect({ multMultiplier: 2 }) : IDENTITY_EFFECT;
    },
  });
}

/** ×2 for the first scoring face card, on every pass of that card. */
class Photograph extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    card: (ctx, card) => {
      const first = ctx.hand.scoring.findIndex((c) => isFaceCard(c, ctx.rules));
      return first >= 0 && first === ctx.cardIndex && isFaceCard(card, ctx.rules)
        ? effect({ multMultiplier: 2 })
        : IDENTITY_EFFECT;
    },
  });
}

/** Each held face card has a 1 in 2 chance to pay $1. */
class ReservedParking extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const faces = countWhere(ctx.hand.held, (card) => isFaceCard(card, ctx.rules));
      let money = 0;
      for (let i = 0; i < faces * heldTriggers(ctx); i++) {
        if (ctx.rng.chance(1, 2, ctx.rules.probabilityScale)) money++;
      }
      return money > 0 ? effect({ money }) : IDENTITY_EFFECT;
    },
  });
}

/** Mult equal to the sell value of every other joker. */
class Swashbuckler extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      let total = 0;
      for (const sibling of ctx.siblings) {
        if (sibling.handle.slot !== ctx.self.slot) total += sibling.sellValue;
      }
      return total > 0 ? effect({ mult: total }) : IDENTITY_EFFECT;
    },
  });
}

/** ×1 per empty joker slot; every Joker Stencil counts as empty. */
class JokerStencil extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx: ScoringContext) => {
      const empty = Math.max(0, ctx.rules.jokerSlots - ctx.siblings.length);
      const stencils = countWhereSibling(ctx, "joker_stencil");
      const xmult = empty + stencils;
      return xmult > 1 ? effect({ multMultiplier: xmult }) : IDENTITY_EFFECT;
    },
  });
}

function countWhereSibling(ctx: ScoringContext, id: string): number {
  return ctx.siblings.filter((s) => s.identity.id === id).length;
}

export const DECK_JOKERS: readonly JokerDefinition[] = [
  defineJoker("steel_joker", (identity) => new SteelJoker(identity)),
  defineJoker("drivers_license", (identity) => new DriversLicense(identity)),
  defineJoker("blackboard", (identity) => new Blackboard(identity)),
  defineJoker("flower_pot", (identity) => new FlowerPot(identity)),
  defineJoker("seeing_double", (identity) => new SeeingDouble(identity)),
  defineJoker("photograph", (identity) => new Photograph(identity)),
  defineJoker("reserved_parking", (identity) => new ReservedParking(identity)),
  defineJoker("swashbuckler", (identity) => new Swashbuckler(identity)),
  defineJoker("joker_stencil", (identity) => new JokerStencil(identity)),
];
