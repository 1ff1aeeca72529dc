// ─── Expression Bindings ───────────────────────────────────────────
// The context identifiers a joker expression can read. Each resolver
// pulls one value out of the ScoringContext; card_* names need a card
// to be bound and fail during hand-level hooks.

import type { PlayingCard } from "@jester/schema";
import { rankValue } from "@jester/schema";
import { rankChips } from "./card-utils";
import {
  ExpressionError,
  type EvalContext,
  type EvalResult,
  type IdentifierResolver,
} from "./expression-evaluator";

function num(value: number): EvalResult {
  return { kind: "number", value };
}

function str(value: string): EvalResult {
  return { kind: "string", value };
}

function bool(value: boolean): EvalResult {
  return { kind: "boolean", value };
}

function boundCard(context: EvalContext, name: string): PlayingCard {
  const card = context.game.card;
  if (card === undefined) {
    throw new ExpressionError(`'${name}' is only available while a card is scored`);
  }
  return card;
}

const ENTRIES: readonly (readonly [string, IdentifierResolver])[] = [
  // ── Run progression ──
  ["money", ({ game }) => num(game.snapshot.money)],
  ["ante", ({ game }) => num(game.snapshot.ante)],
  ["round", ({ game }) => num(game.snapshot.round)],
  ["stage", ({ game }) => str(game.snapshot.stage)],
  ["blind", ({ game }) => str(game.snapshot.blind.kind)],
  ["hands_remaining", ({ game }) => num(game.snapshot.handsRemaining)],
  ["discards_remaining", ({ game }) => num(game.snapshot.discardsRemaining)],
  ["hands_played", ({ game }) => num(game.snapshot.handsPlayed)],
  ["discards_used", ({ game }) => num(game.snapshot.discardsUsed)],
  ["first_hand", ({ game }) => bool(game.snapshot.handsPlayed === 0)],

  // ── Jokers ──
  ["joker_count", ({ game }) => num(game.siblings.length)],
  ["joker_slots", ({ game }) => num(game.rules.jokerSlots)],
  [
    "empty_slots",
    ({ game }) => num(Math.max(0, game.rules.jokerSlots - game.siblings.length)),
  ],

  // ── Deck ──
  ["deck_remaining", ({ game }) => num(game.snapshot.deck.length)],
  ["deck_size", ({ game }) => num(game.snapshot.fullDeck.length)],
  ["starting_deck_size", ({ game }) => num(game.config.startingDeckSize)],

  // ── Scoring so far ──
  ["chips", ({ game }) => num(game.chips)],
  ["mult", ({ game }) => num(game.mult)],

  // ── Hand ──
  ["played_count", ({ game }) => num(game.hand.played.length)],
  ["held_count", ({ game }) => num(game.hand.held.length)],
  ["scoring_count", ({ game }) => num(game.hand.scoring.length)],
  ["hand_type", ({ game }) => str(game.hand.handType)],
  [
    "hand_times_played",
    ({ game }) => num(game.snapshot.handTypeCounts[game.hand.handType] ?? 0),
  ],

  // held-card effects fire once plus the held retriggers
  ["held_triggers", ({ game }) => num(1 + game.rules.heldRetriggers)],

  // ── Current card ──
  ["retrigger", ({ game }) => num(game.retrigger)],
  ["card_index", ({ game }) => num(game.cardIndex)],
  ["card_rank", (ctx) => str(boundCard(ctx, "card_rank").rank)],
  ["card_value", (ctx) => num(rankValue(boundCard(ctx, "card_value").rank))],
  ["card_chips", (ctx) => num(rankChips(boundCard(ctx, "card_chips").rank))],
  ["card_suit", (ctx) => str(boundCard(ctx, "card_suit").suit)],
  [
    "card_enhancement",
    (ctx) => str(boundCard(ctx, "card_enhancement").enhancement ?? "none"),
  ],
];

/** Every identifier the joker expression language knows. */
export const IDENTIFIERS: ReadonlyMap<string, IdentifierResolver> = new Map(ENTRIES);
