// ─── Hand Evaluator ────────────────────────────────────────────────
// Classifies a played hand into its poker hand type, every hand type it
// contains, and the cards that score. Honors the passive rule flags:
// four_fingers, shortcut, smeared_suits and splash.

import type { HandType, PlayingCard, Suit } from "@jester/schema";
import { HAND_TYPES, handTypeStrength, rankValue } from "@jester/schema";
import type { RuleFlag } from "../types/rules";
import type { HandClassification } from "../types/snapshot";

export interface ClassifierRules {
  readonly flags: ReadonlySet<RuleFlag>;
}

// ─── Pattern Matching Helpers ──────────────────────────────────────

/** Groups card indices by rank. Stone cards have no rank and are skipped. */
function groupByRank(cards: readonly PlayingCard[]): Map<string, number[]> {
  const groups = new Map<string, number[]>();
  cards.forEach((card, index) => {
    if (card.enhancement === "stone") return;
    const group = groups.get(card.rank) ?? [];
    group.push(index);
    groups.set(card.rank, group);
  });
  return groups;
}

/** Suit key a card is grouped under; smeared suits merge by colour. */
function suitKey(suit: Suit, smeared: boolean): string {
  if (!smeared) return suit;
  return suit === "hearts" || suit === "diamonds" ? "red" : "black";
}

/**
 * Largest set of card indices sharing a suit. Wild cards join every
 * group; stone cards join none.
 */
function largestSuitGroup(cards: readonly PlayingCard[], smeared: boolean): number[] {
  const keys = new Set<string>();
  for (const card of cards) keys.add(suitKey(card.suit, smeared));

  let best: number[] = [];
  for (const key of keys) {
    const members: number[] = [];
    cards.forEach((card, index) => {
      if (card.enhancement === "stone") return;
      if (card.enhancement === "wild" || suitKey(card.suit, smeared) === key) {
        members.push(index);
      }
    });
    if (members.length > best.length) best = members;
  }
  return best;
}

/**
 * Splits sorted unique values into runs whose neighbours differ by at
 * most `maxStep`. Example (maxStep 1): [1, 2, 3, 7, 8] → [[1, 2, 3], [7, 8]]
 */
function findConsecutiveRuns(sortedValues: readonly number[], maxStep: number): number[][] {
  if (sortedValues.length === 0) return [];

  const runs: number[][] = [];
  let current: number[] = [sortedValues[0]!];

  for (let i = 1; i < sortedValues.length; i++) {
    const value = sortedValues[i]!;
    if (value - current[current.length - 1]! <= maxStep) {
      current.push(value);
    } else {
      runs.push(current);
      current = [value];
    }
  }
  runs.push(current);

  return runs;
}

/** Card indices forming the longest straight, or [] when there is none. */
function findStraight(
  cards: readonly PlayingCard[],
  size: number,
  shortcut: boolean
): number[] {
  const values = new Set<number>();
  for (const card of cards) {
    if (card.enhancement === "stone") continue;
    const value = rankValue(card.rank);
    values.add(value);
    if (value === 14) values.add(1);
  }

  const sorted = [...values].sort((a, b) => a - b);
  let best: number[] = [];
  for (const run of findConsecutiveRuns(sorted, shortcut ? 2 : 1)) {
    if (run.length >= best.length) best = run;
  }
  if (best.length < size) return [];

  const inRun = new Set(best);
  const indices: number[] = [];
  cards.forEach((card, index) => {
    if (card.enhancement === "stone") return;
    const value = rankValue(card.rank);
    if (inRun.has(value) || (value === 14 && inRun.has(1))) indices.push(index);
  });
  return indices;
}

function highestCard(cards: readonly PlayingCard[]): number[] {
  let best = -1;
  let bestValue = 0;
  cards.forEach((card, index) => {
    if (card.enhancement === "stone") return;
    const value = rankValue(card.rank);
    if (best === -1 || value > bestValue) {
      best = index;
      bestValue = value;
    }
  });
  return best === -1 ? [] : [best];
}

// ─── Classification ────────────────────────────────────────────────

/**
 * Classifies `cards` (at most five in normal play). Stone cards always
 * score; with `splash` every played card scores.
 */
export function classifyHand(
  cards: readonly PlayingCard[],
  rules: ClassifierRules
): HandClassification {
  const fourFingers = rules.flags.has("four_fingers");
  const patternSize = fourFingers ? 4 : 5;

  const groups = [...groupByRank(cards).values()].sort((a, b) => b.length - a.length);
  const largest = groups[0] ?? [];
  const second = groups[1] ?? [];
  const pairs = groups.filter((g) => g.length >= 2);

  const flushCards = largestSuitGroup(cards, rules.flags.has("smeared_suits"));
  const isFlush = flushCards.length >= patternSize;
  const straightCards = findStraight(cards, patternSize, rules.flags.has("shortcut"));
  const isStraight = straightCards.length > 0;

  const isFullHouse = largest.length >= 3 && second.length >= 2;
  const nonStone = cards.filter((c) => c.enhancement !== "stone").length;
  const wholeHandFlush = isFlush && flushCards.length === nonStone && nonStone >= 5;

  const present = new Map<HandType, number[]>();
  present.set("high_card", highestCard(cards));
  if (pairs.length >= 1) present.set("pair", largest);
  if (pairs.length >= 2) present.set("two_pair", pairs.flat());
  if (largest.length >= 3) present.set("three_of_a_kind", largest);
  if (isStraight) present.set("straight", straightCards);
  if (isFlush) present.set("flush", flushCards);
  if (isFullHouse) present.set("full_house", [...largest, ...second]);
  if (largest.length >= 4) present.set("four_of_a_kind", largest);
  if (isStraight && isFlush) {
    present.set("straight_flush", [...new Set([...straightCards, ...flushCards])]);
  }
  if (largest.length >= 5) present.set("five_of_a_kind", largest);
  if (isFullHouse && wholeHandFlush) present.set("flush_house", [...largest, ...second]);
  if (largest.length >= 5 && wholeHandFlush) present.set("flush_five", largest);

  const contains = HAND_TYPES.filter((type) => present.has(type));
  let handType: HandType = "high_card";
  for (const type of contains) {
    if (handTypeStrength(type) > handTypeStrength(handType)) handType = type;
  }

  const scoring = new Set(present.get(handType) ?? []);
  cards.forEach((card, index) => {
    if (card.enhancement === "stone" || rules.flags.has("splash")) scoring.add(index);
  });

  return {
    handType,
    contains,
    scoringIndices: [...scoring].sort((a, b) => a - b),
  };
}

// ─── Hand Base Values ──────────────────────────────────────────────

const HAND_BASE: Readonly<Record<HandType, readonly [number, number, number, number]>> = {
  // chips, mult, chips per level, mult per level
  high_card: [5, 1, 10, 1],
  pair: [10, 2, 15, 1],
  two_pair: [20, 2, 20, 1],
  three_of_a_kind: [30, 3, 20, 2],
  straight: [30, 4, 30, 3],
  flush: [35, 4, 15, 2],
  full_house: [40, 4, 25, 2],
  four_of_a_kind: [60, 7, 30, 3],
  straight_flush: [100, 8, 40, 4],
  five_of_a_kind: [120, 12, 35, 3],
  flush_house: [140, 14, 40, 4],
  flush_five: [160, 16, 50, 3],
};

/** Base chips and mult of a hand type at a level (1 = unlevelled). */
export function handBase(
  handType: HandType,
  level = 1
): { readonly chips: number; readonly mult: number } {
  const [chips, mult, chipsPerLevel, multPerLevel] = HAND_BASE[handType];
  const steps = Math.max(0, level - 1);
  return { chips: chips + chipsPerLevel * steps, mult: mult + multPerLevel * steps };
}
