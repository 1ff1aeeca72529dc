// ─── Rotating-Target Jokers ────────────────────────────────────────
// Jokers that pay for one hand type, rank or suit and pick a new target
// at the end of every round. The starting target can be fixed through
// construction arguments; targets drawn later come from the run's own
// deck when it has a usable card.

import { z } from "zod";
import {
  HAND_TYPES,
  HandTypeSchema,
  RANKS,
  RankSchema,
  SUITS,
  SuitSchema,
  type HandType,
  type PlayingCard,
  type Rank,
  type Suit,
} from "@jester/schema";
import { cardHasRank, cardHasSuit } from "../engine/card-utils";
import { IDENTITY_EFFECT, effect } from "../engine/effect";
import { StatefulBehavior } from "../frameworks/advanced";
import { defineParameterizedJoker, gameplay, type JokerDefinition } from "../frameworks/definition";
import type { Identity, Lifecycle, RunContext } from "../types/behavior";

/** Hand types To Do List may ask for; the secret hands are left out. */
const LISTABLE_HANDS: readonly HandType[] = HAND_TYPES.slice(0, HAND_TYPES.indexOf("five_of_a_kind"));

function deckCard(ctx: RunContext): PlayingCard | undefined {
  const candidates = ctx.snapshot.fullDeck.filter((card) => card.enhancement !== "stone");
  return candidates.length > 0 ? ctx.rng.pick(candidates) : undefined;
}

function pickOther<T>(ctx: RunContext, options: readonly T[], current: T): T {
  const others = options.filter((option) => option !== current);
  return others.length > 0 ? ctx.rng.pick(others) : current;
}

// ─── To Do List ────────────────────────────────────────────────────

const ToDoState = z.object({ handType: HandTypeSchema });

class ToDoList extends StatefulBehavior<z.infer<typeof ToDoState>> {
  override readonly gameplay = gameplay({
    hand: (ctx) => (ctx.hand.handType === this.current.handType ? effect({ money: 4 }) : IDENTITY_EFFECT),
  });
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: (ctx) => {
      this.mutate(ctx, (s) => ({ handType: pickOther(ctx, LISTABLE_HANDS, s.handType) }));
      return IDENTITY_EFFECT;
    },
  };

  constructor(identity: Identity, handType: HandType) {
    super(identity, { schema: ToDoState, version: 1, initial: { handType } });
  }
}

// ─── Mail-In Rebate ────────────────────────────────────────────────

const RebateState = z.object({ rank: RankSchema });

class MailInRebate extends StatefulBehavior<z.infer<typeof RebateState>> {
  override readonly gameplay = gameplay({
    discard: (_ctx, cards) => {
      const matches = cards.filter((card) => cardHasRank(card, [this.current.rank])).length;
      return matches > 0 ? effect({ money: 5 * matches }) : IDENTITY_EFFECT;
    },
  });
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: (ctx) => {
      const rank = deckCard(ctx)?.rank ?? ctx.rng.pick(RANKS);
      this.mutate(ctx, () => ({ rank }));
      return IDENTITY_EFFECT;
    },
  };

  constructor(identity: Identity, rank: Rank) {
    super(identity, { schema: RebateState, version: 1, initial: { rank } });
  }
}

// ─── Castle ────────────────────────────────────────────────────────

const CastleState = z.object({ suit: SuitSchema, chips: z.number().finite().min(0) });

/** +3 chips per discarded card of the target suit, kept permanently. */
class Castle extends StatefulBehavior<z.infer<typeof CastleState>> {
  override readonly gameplay = gameplay({
    hand: () => (this.current.chips > 0 ? effect({ chips: this.current.chips }) : IDENTITY_EFFECT),
    discard: (ctx, cards) => {
      const matches = cards.filter((card) => cardHasSuit(card, this.current.suit, ctx.rules)).length;
      if (matches > 0) this.mutate(ctx, (s) => ({ ...s, chips: s.chips + 3 * matches }));
      return IDENTITY_EFFECT;
    },
  });
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: (ctx) => {
      const suit = deckCard(ctx)?.suit ?? ctx.rng.pick(SUITS);
      this.mutate(ctx, (s) => ({ ...s, suit }));
      return IDENTITY_EFFECT;
    },
  };

  constructor(identity: Identity, suit: Suit, chips: number) {
    super(identity, { schema: CastleState, version: 1, initial: { suit, chips } });
  }
}

// ─── The Idol ──────────────────────────────────────────────────────

const IdolState = z.object({ rank: RankSchema, suit: SuitSchema });

class TheIdol extends StatefulBehavior<z.infer<typeof IdolState>> {
  override readonly gameplay = gameplay({
    card: (ctx, card) => {
      const { rank, suit } = this.current;
      return cardHasRank(card, [rank]) && cardHasSuit(card, suit, ctx.rules)
        ? effect({ multMultiplier: 2 })
        : IDENTITY_EFFECT;
    },
  });
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: (ctx) => {
      const card = deckCard(ctx);
      const next = card
        ? { rank: card.rank, suit: card.suit }
        : { rank: ctx.rng.pick(RANKS), suit: ctx.rng.pick(SUITS) };
      this.mutate(ctx, () => next);
      return IDENTITY_EFFECT;
    },
  };

  constructor(identity: Identity, rank: Rank, suit: Suit) {
    super(identity, { schema: IdolState, version: 1, initial: { rank, suit } });
  }
}

// ─── Ancient Joker ─────────────────────────────────────────────────

const AncientState = z.object({ suit: SuitSchema });

class AncientJoker extends StatefulBehavior<z.infer<typeof AncientState>> {
  override readonly gameplay = gameplay({
    card: (ctx, card) =>
      cardHasSuit(card, this.current.suit, ctx.rules) ? effect({ multMultiplier: 1.5 }) : IDENTITY_EFFECT,
  });
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: (ctx) => {
      this.mutate(ctx, (s) => ({ suit: pickOther(ctx, SUITS, s.suit) }));
      return IDENTITY_EFFECT;
    },
  };

  constructor(identity: Identity, suit: Suit) {
    super(identity, { schema: AncientState, version: 1, initial: { suit } });
  }
}

// ─── Definitions ───────────────────────────────────────────────────

export const ROTATING_JOKERS: readonly JokerDefinition[] = [
  defineParameterizedJoker(
    "to_do_list",
    z.object({ handType: HandTypeSchema.default("pair") }).strict().default({}),
    (identity, args) => new ToDoList(identity, args.handType)
  ),
  defineParameterizedJoker(
    "mail_in_rebate",
    z.object({ rank: RankSchema.default("A") }).strict().default({}),
    (identity, args) => new MailInRebate(identity, args.rank)
  ),
  defineParameterizedJoker(
    "castle",
    z
      .object({
        suit: SuitSchema.default("spades"),
        chips: z.number().finite().min(0).default(0),
      })
      .strict()
      .default({}),
    (identity, args) => new Castle(identity, args.suit, args.chips)
  ),
  defineParameterizedJoker(
    "the_idol",
    z.object({ rank: RankSchema.default("A"), suit: SuitSchema.default("spades") }).strict().default({}),
    (identity, args) => new TheIdol(identity, args.rank, args.suit)
  ),
  defineParameterizedJoker(
    "ancient_joker",
    z.object({ suit: SuitSchema.default("hearts") }).strict().default({}),
    (identity, args) => new AncientJoker(identity, args.suit)
  ),
];
