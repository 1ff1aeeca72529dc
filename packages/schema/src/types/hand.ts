// ─── Poker Hands ───────────────────────────────────────────────────

/** Hand classifications, weakest first. */
export const HAND_TYPES = [
  "high_card",
  "pair",
  "two_pair",
  "three_of_a_kind",
  "straight",
  "flush",
  "full_house",
  "four_of_a_kind",
  "straight_flush",
  "five_of_a_kind",
  "flush_house",
  "flush_five",
] as const;

export type HandType = (typeof HAND_TYPES)[number];

/** Strength order of a hand type; higher is stronger. */
export function handTypeStrength(handType: HandType): number {
  return HAND_TYPES.indexOf(handType);
}
