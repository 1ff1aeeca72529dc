// ─── Card Primitives ───────────────────────────────────────────────
// Playing cards as the scoring engine sees them: a suit, a rank and the
// modifiers (enhancement, edition, seal) that jokers read and rewrite.

/** Standard suit literals. */
export type Suit = "hearts" | "diamonds" | "clubs" | "spades";

export const SUITS: readonly Suit[] = ["hearts", "diamonds", "clubs", "spades"];

/** Standard rank literals (2 through Ace). */
export type Rank =
  | "2"
  | "3"
  | "4"
  | "5"
  | "6"
  | "7"
  | "8"
  | "9"
  | "10"
  | "J"
  | "Q"
  | "K"
  | "A";

export const RANKS: readonly Rank[] = [
  "2",
  "3",
  "4",
  "5",
  "6",
  "7",
  "8",
  "9",
  "10",
  "J",
  "Q",
  "K",
  "A",
];

/** Card enhancements applied by tarot cards or jokers. */
export type Enhancement =
  | "bonus"
  | "mult"
  | "wild"
  | "glass"
  | "steel"
  | "stone"
  | "gold"
  | "lucky";

export type Edition = "foil" | "holographic" | "polychrome" | "negative";

export type Seal = "gold" | "red" | "blue" | "purple";

// ─── Card ──────────────────────────────────────────────────────────

/** A unique identifier for a specific card instance in the run. */
export type CardInstanceId = string & { readonly __brand: unique symbol };

/**
 * A card instance. Each physical card gets a unique ID so directives can
 * address it even when the deck holds duplicate rank/suit pairs.
 */
export interface PlayingCard {
  readonly id: CardInstanceId;
  readonly rank: Rank;
  readonly suit: Suit;
  readonly enhancement?: Enhancement;
  readonly edition?: Edition;
  readonly seal?: Seal;
  /** Permanent chips added to this card (e.g. by Hiker). */
  readonly bonusChips?: number;
}

/**
 * Numeric value of a rank for ordering and straights.
 * Ace is 14; callers that need a low Ace check for 14 explicitly.
 */
export function rankValue(rank: Rank): number {
  switch (rank) {
    case "J":
      return 11;
    case "Q":
      return 12;
    case "K":
      return 13;
    case "A":
      return 14;
    default:
      return Number(rank);
  }
}

/** Jack, Queen and King. */
export function isFaceRank(rank: Rank): boolean {
  return rank === "J" || rank === "Q" || rank === "K";
}
