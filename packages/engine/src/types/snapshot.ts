// ─── Run Snapshot ──────────────────────────────────────────────────
// What the game engine hands over for every evaluation: progression,
// wallet, deck and blind. The engine owns this data; jokers only read it.

import type {
  ConsumableKind,
  HandType,
  PlayingCard,
} from "@jester/schema";

export type Stage = "blind_select" | "blind" | "shop" | "round_end";

export type BlindKind = "small" | "big" | "boss";

export interface BlindInfo {
  readonly kind: BlindKind;
  readonly name: string;
  readonly chipsRequired: number;
}

export interface HeldConsumable {
  readonly kind: ConsumableKind;
  readonly name: string;
}

export interface RunSnapshot {
  readonly seed: number;
  readonly money: number;
  readonly ante: number;
  readonly round: number;
  readonly stage: Stage;
  /** Hands left after the one being evaluated. */
  readonly handsRemaining: number;
  readonly discardsRemaining: number;
  /** Hands played this round before the one being evaluated. */
  readonly handsPlayed: number;
  /** Discards used so far this round. */
  readonly discardsUsed: number;
  /** Times each hand type was played this run, the current hand excluded. */
  readonly handTypeCounts: Readonly<Partial<Record<HandType, number>>>;
  /** Hand types played this round, the current hand excluded. */
  readonly handTypesThisRound: readonly HandType[];
  readonly handLevels: Readonly<Partial<Record<HandType, number>>>;
  /** Draw pile. */
  readonly deck: readonly PlayingCard[];
  /** Every card the player owns. */
  readonly fullDeck: readonly PlayingCard[];
  /**
   * Bumped by the game engine whenever a card in `fullDeck` is added,
   * removed or changed. Deck scans are cached against it.
   */
  readonly deckRevision: number;
  readonly blind: BlindInfo;
  /** Chips scored against the current blind so far. */
  readonly roundScore: number;
  readonly consumables: readonly HeldConsumable[];
  readonly flags: readonly string[];
}

/** Classification supplied by the caller instead of running the classifier. */
export interface HandClassification {
  readonly handType: HandType;
  /** Every hand type present, the classified one included. */
  readonly contains: readonly HandType[];
  /** Indices into `played` of the cards that score. */
  readonly scoringIndices: readonly number[];
}

export interface PlayedHand {
  readonly played: readonly PlayingCard[];
  readonly held: readonly PlayingCard[];
  readonly classification?: HandClassification;
}

/** A snapshot with neutral values, for callers that only care about a few fields. */
export function createRunSnapshot(overrides: Partial<RunSnapshot> = {}): RunSnapshot {
  return {
    seed: 0,
    money: 0,
    ante: 1,
    round: 1,
    stage: "blind",
    handsRemaining: 4,
    discardsRemaining: 3,
    handsPlayed: 0,
    discardsUsed: 0,
    handTypeCounts: {},
    handTypesThisRound: [],
    handLevels: {},
    deck: [],
    fullDeck: [],
    deckRevision: 0,
    blind: { kind: "small", name: "Small Blind", chipsRequired: 300 },
    roundScore: 0,
    consumables: [],
    flags: [],
    ...overrides,
  };
}
