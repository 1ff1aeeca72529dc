// ─── Card Predicates ───────────────────────────────────────────────
// Suit and face checks that respect enhancements and rule flags. Every
// joker that asks "is this a Heart" or "is this a face card" goes
// through here so Wild, Stone, Smeared Joker and Pareidolia agree.

import type { Enhancement, PlayingCard, Rank, Suit } from "@jester/schema";
import { isFaceRank } from "@jester/schema";
import type { RuleFlag } from "../types/rules";
import type { RunSnapshot } from "../types/snapshot";

export interface FlagView {
  readonly flags: ReadonlySet<RuleFlag>;
}

function isRed(suit: Suit): boolean {
  return suit === "hearts" || suit === "diamonds";
}

/** Stone cards have no suit; Wild cards have every suit. */
export function cardHasSuit(card: PlayingCard, suit: Suit, rules: FlagView): boolean {
  if (card.enhancement === "stone") return false;
  if (card.enhancement === "wild") return true;
  if (card.suit === suit) return true;
  return rules.flags.has("smeared_suits") && isRed(card.suit) === isRed(suit);
}

/** Stone cards have no rank. */
export function cardHasRank(card: PlayingCard, ranks: readonly Rank[]): boolean {
  return card.enhancement !== "stone" && ranks.includes(card.rank);
}

export function isFaceCard(card: PlayingCard, rules: FlagView): boolean {
  if (card.enhancement === "stone") return false;
  return rules.flags.has("all_faces") || isFaceRank(card.rank);
}

export function hasEnhancement(card: PlayingCard, enhancement: Enhancement): boolean {
  return card.enhancement === enhancement;
}

export function countWhere(
  cards: readonly PlayingCard[],
  predicate: (card: PlayingCard) => boolean
): number {
  let count = 0;
  for (const card of cards) if (predicate(card)) count++;
  return count;
}

/** Chip value a rank contributes when scored (Ace 11, faces 10). */
export function rankChips(rank: Rank): number {
  if (rank === "A") return 11;
  if (rank === "J" || rank === "Q" || rank === "K") return 10;
  return Number(rank);
}

/** Cache fingerprint for scans of the full deck. */
export function deckFingerprint(snapshot: RunSnapshot): string {
  return `${snapshot.deckRevision}:${snapshot.fullDeck.length}`;
}
