// ─── Builtin Functions ─────────────────────────────────────────────
// The function table of the joker expression language. All builtins are
// queries: they read the context and never change it. The table is built
// once and frozen; an expression's environment pairs it with the
// identifier bindings and the joker's own counter names.

import type { PlayingCard, Rank, Suit } from "@jester/schema";
import { EnhancementSchema, HandTypeSchema, RankSchema, RaritySchema, SuitSchema } from "@jester/schema";
import { IDENTIFIERS } from "./bindings";
import { cardHasRank, cardHasSuit, countWhere, hasEnhancement, isFaceCard } from "./card-utils";
import {
  ExpressionError,
  zoneCards,
  type BuiltinFunction,
  type EvalContext,
  type EvalResult,
  type ExpressionEnvironment,
} from "./expression-evaluator";

// ─── Helpers ───────────────────────────────────────────────────────

/**
 * Extracts a required numeric argument from an EvalResult.
 */
function requireNumber(arg: EvalResult | undefined, name: string): number {
  if (arg === undefined || arg.kind !== "number") {
    throw new ExpressionError(`Expected number for '${name}', got ${arg?.kind ?? "nothing"}`);
  }
  return arg.value;
}

/**
 * Extracts a required string argument from an EvalResult.
 */
function requireString(arg: EvalResult | undefined, name: string): string {
  if (arg === undefined || arg.kind !== "string") {
    throw new ExpressionError(`Expected string for '${name}', got ${arg?.kind ?? "nothing"}`);
  }
  return arg.value;
}

function requireSuit(arg: EvalResult | undefined): Suit {
  const parsed = SuitSchema.safeParse(requireString(arg, "suit"));
  if (!parsed.success) {
    throw new ExpressionError(`Unknown suit: '${requireString(arg, "suit")}'`);
  }
  return parsed.data;
}

/** Ranks may be written as numbers (`rank_in(2, 3, 5)`) or strings (`'A'`). */
function requireRank(arg: EvalResult | undefined): Rank {
  const text = arg?.kind === "number" ? String(arg.value) : requireString(arg, "rank");
  const parsed = RankSchema.safeParse(text);
  if (!parsed.success) {
    throw new ExpressionError(`Unknown rank: '${text}'`);
  }
  return parsed.data;
}

function requireCard(context: EvalContext, fn: string): PlayingCard {
  const card = context.game.card;
  if (card === undefined) {
    throw new ExpressionError(`${fn}() is only available while a card is scored`);
  }
  return card;
}

function zoneArg(context: EvalContext, arg: EvalResult | undefined): readonly PlayingCard[] {
  return zoneCards(context.game, requireString(arg, "zone"));
}

function num(value: number): EvalResult {
  return { kind: "number", value };
}

function bool(value: boolean): EvalResult {
  return { kind: "boolean", value };
}

// ─── Hand & Card Queries ───────────────────────────────────────────

const handBuiltins: Record<string, BuiltinFunction> = {
  /** contains(hand_type): whether the played hand contains that hand type. */
  contains: {
    minArgs: 1,
    maxArgs: 1,
    call: ([handType], { game }) => {
      const parsed = HandTypeSchema.safeParse(requireString(handType, "hand_type"));
      if (!parsed.success) {
        throw new ExpressionError(`Unknown hand type: '${requireString(handType, "hand_type")}'`);
      }
      return bool(game.hand.contains.includes(parsed.data));
    },
  },

  /** played_this_round(hand_type) */
  played_this_round: {
    minArgs: 1,
    maxArgs: 1,
    call: ([handType], { game }) => {
      const name = requireString(handType, "hand_type");
      return bool(game.snapshot.handTypesThisRound.some((t) => t === name));
    },
  },

  suit_is: {
    minArgs: 1,
    maxArgs: 1,
    call: ([suit], context) => {
      const card = requireCard(context, "suit_is");
      return bool(cardHasSuit(card, requireSuit(suit), context.game.rules));
    },
  },

  /** rank_in(rank, ...): whether the current card has one of the ranks. */
  rank_in: {
    minArgs: 1,
    call: (args, context) => {
      const card = requireCard(context, "rank_in");
      return bool(cardHasRank(card, args.map(requireRank)));
    },
  },

  is_face: {
    minArgs: 0,
    maxArgs: 0,
    call: (_args, context) => bool(isFaceCard(requireCard(context, "is_face"), context.game.rules)),
  },
};

// ─── Zone Counts ───────────────────────────────────────────────────

const countBuiltins: Record<string, BuiltinFunction> = {
  count_cards: {
    minArgs: 1,
    maxArgs: 1,
    call: ([zone], context) => num(zoneArg(context, zone).length),
  },

  count_suit: {
    minArgs: 2,
    maxArgs: 2,
    call: ([zone, suit], context) => {
      const target = requireSuit(suit);
      return num(
        countWhere(zoneArg(context, zone), (c) => cardHasSuit(c, target, context.game.rules))
      );
    },
  },

  /** count_rank(zone, rank, ...) */
  count_rank: {
    minArgs: 2,
    call: ([zone, ...ranks], context) => {
      const targets = ranks.map(requireRank);
      return num(countWhere(zoneArg(context, zone), (c) => cardHasRank(c, targets)));
    },
  },

  count_face: {
    minArgs: 1,
    maxArgs: 1,
    call: ([zone], context) =>
      num(countWhere(zoneArg(context, zone), (c) => isFaceCard(c, context.game.rules))),
  },

  count_enhancement: {
    minArgs: 2,
    maxArgs: 2,
    call: ([zone, enhancement], context) => {
      const name = requireString(enhancement, "enhancement");
      const parsed = EnhancementSchema.safeParse(name);
      if (!parsed.success) {
        throw new ExpressionError(`Unknown enhancement: '${name}'`);
      }
      const target = parsed.data;
      return num(countWhere(zoneArg(context, zone), (c) => hasEnhancement(c, target)));
    },
  },
};

// ─── Jokers & Randomness ───────────────────────────────────────────

const runBuiltins: Record<string, BuiltinFunction> = {
  has_joker: {
    minArgs: 1,
    maxArgs: 1,
    call: ([id], { game }) => {
      const name = requireString(id, "joker");
      return bool(game.siblings.some((s) => s.identity.id === name));
    },
  },

  count_rarity: {
    minArgs: 1,
    maxArgs: 1,
    call: ([rarity], { game }) => {
      const name = requireString(rarity, "rarity");
      const parsed = RaritySchema.safeParse(name);
      if (!parsed.success) {
        throw new ExpressionError(`Unknown rarity: '${name}'`);
      }
      const target = parsed.data;
      return num(game.siblings.filter((s) => s.identity.rarity === target).length);
    },
  },

  /** chance(numerator, denominator): scaled by the run's probability rules. */
  chance: {
    minArgs: 2,
    maxArgs: 2,
    call: ([n, d], { game }) =>
      bool(
        game.rng.chance(
          requireNumber(n, "numerator"),
          requireNumber(d, "denominator"),
          game.rules.probabilityScale
        )
      ),
  },

  /** random_int(min, max): inclusive on both ends. */
  random_int: {
    minArgs: 2,
    maxArgs: 2,
    call: ([lo, hi], { game }) => {
      const min = requireNumber(lo, "min");
      const max = requireNumber(hi, "max");
      if (max < min) {
        throw new ExpressionError(`random_int(): max (${max}) is below min (${min})`);
      }
      return num(game.rng.nextInt(min, max + 1));
    },
  },
};

// ─── Math ──────────────────────────────────────────────────────────

const mathBuiltins: Record<string, BuiltinFunction> = {
  min: {
    minArgs: 1,
    call: (args) => num(Math.min(...args.map((a) => requireNumber(a, "min")))),
  },
  max: {
    minArgs: 1,
    call: (args) => num(Math.max(...args.map((a) => requireNumber(a, "max")))),
  },
  floor: {
    minArgs: 1,
    maxArgs: 1,
    call: ([value]) => num(Math.floor(requireNumber(value, "value"))),
  },
  pow: {
    minArgs: 2,
    maxArgs: 2,
    call: ([base, exponent]) =>
      num(requireNumber(base, "base") ** requireNumber(exponent, "exponent")),
  },
};

// ─── Environment ───────────────────────────────────────────────────

export const BUILTINS: ReadonlyMap<string, BuiltinFunction> = new Map(
  Object.entries({ ...handBuiltins, ...countBuiltins, ...runBuiltins, ...mathBuiltins })
);

/** The environment joker expressions compile against. */
export function jokerEnvironment(counters: readonly string[] = []): ExpressionEnvironment {
  return { functions: BUILTINS, identifiers: IDENTIFIERS, counters };
}
