// ─── Static Jokers ─────────────────────────────────────────────────
// Fixed-formula jokers: flat bonuses, suit and rank payouts, hand-type
// bonuses and pure rule modifiers.

import type { JokerId } from "@jester/schema";
import type { RuleModifiers } from "../types/rules";
import { defineJoker, type JokerDefinition } from "../frameworks/definition";
import { StaticBehavior, type StaticSpec } from "../frameworks/static";

export const STATIC_JOKERS: readonly JokerDefinition[] = [
  staticJoker("joker", { scope: "hand", condition: { kind: "always" }, mult: 4 }),

  // ── Suit payouts ──
  staticJoker("greedy_joker", { scope: "card", condition: { kind: "suit", suit: "diamonds" }, mult: 3 }),
  staticJoker("lusty_joker", { scope: "card", condition: { kind: "suit", suit: "hearts" }, mult: 3 }),
  staticJoker("wrathful_joker", { scope: "card", condition: { kind: "suit", suit: "spades" }, mult: 3 }),
  staticJoker("gluttonous_joker", { scope: "card", condition: { kind: "suit", suit: "clubs" }, mult: 3 }),
  staticJoker("rough_gem", { scope: "card", condition: { kind: "suit", suit: "diamonds" }, money: 1 }),
  staticJoker("arrowhead", { scope: "card", condition: { kind: "suit", suit: "spades" }, chips: 50 }),
  staticJoker("onyx_agate", { scope: "card", condition: { kind: "suit", suit: "clubs" }, mult: 7 }),

  // ── Hand-type bonuses ──
  staticJoker("jolly_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "pair" }, mult: 8 }),
  staticJoker("zany_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "three_of_a_kind" }, mult: 12 }),
  staticJoker("mad_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "two_pair" }, mult: 10 }),
  staticJoker("crazy_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "straight" }, mult: 12 }),
  staticJoker("droll_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "flush" }, mult: 10 }),
  staticJoker("sly_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "pair" }, chips: 50 }),
  staticJoker("wily_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "three_of_a_kind" }, chips: 100 }),
  staticJoker("clever_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "two_pair" }, chips: 80 }),
  staticJoker("devious_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "straight" }, chips: 100 }),
  staticJoker("crafty_joker", { scope: "hand", condition: { kind: "contains_hand", handType: "flush" }, chips: 80 }),
  staticJoker("the_duo", { scope: "hand", condition: { kind: "contains_hand", handType: "pair" }, xmult: 2 }),
  staticJoker("the_trio", { scope: "hand", condition: { kind: "contains_hand", handType: "three_of_a_kind" }, xmult: 3 }),
  staticJoker("the_family", { scope: "hand", condition: { kind: "contains_hand", handType: "four_of_a_kind" }, xmult: 4 }),
  staticJoker("the_order", { scope: "hand", condition: { kind: "contains_hand", handType: "straight" }, xmult: 3 }),
  staticJoker("the_tribe", { scope: "hand", condition: { kind: "contains_hand", handType: "flush" }, xmult: 2 }),
  staticJoker("half_joker", { scope: "hand", condition: { kind: "max_cards", count: 3 }, mult: 20 }),

  // ── Rank and face payouts ──
  staticJoker("scary_face", { scope: "card", condition: { kind: "face" }, chips: 30 }),
  staticJoker("smiley_face", { scope: "card", condition: { kind: "face" }, mult: 5 }),
  staticJoker("even_steven", { scope: "card", condition: { kind: "ranks", ranks: ["2", "4", "6", "8", "10"] }, mult: 4 }),
  staticJoker("odd_todd", { scope: "card", condition: { kind: "ranks", ranks: ["A", "3", "5", "7", "9"] }, chips: 31 }),
  staticJoker("scholar", { scope: "card", condition: { kind: "ranks", ranks: ["A"] }, chips: 20, mult: 4 }),
  staticJoker("walkie_talkie", { scope: "card", condition: { kind: "ranks", ranks: ["10", "4"] }, chips: 10, mult: 4 }),
  staticJoker("fibonacci", { scope: "card", condition: { kind: "ranks", ranks: ["A", "2", "3", "5", "8"] }, mult: 8 }),
  staticJoker("triboulet", { scope: "card", condition: { kind: "ranks", ranks: ["K", "Q"] }, xmult: 2 }),
  staticJoker("hack", { scope: "card", condition: { kind: "ranks", ranks: ["2", "3", "4", "5"] }, retriggers: 1 }),

  // ── Rule modifiers ──
  staticJoker("stuntman", {
    scope: "hand",
    condition: { kind: "always" },
    chips: 250,
    modifiers: { handSize: -2 },
  }),
  passive("credit_card", { creditLimit: 20 }),
  passive("chaos_the_clown", { freeRerolls: 1 }),
  passive("juggler", { handSize: 1 }),
  passive("drunkard", { discards: 1 }),
  passive("troubadour", { handSize: 2, hands: -1 }),
  passive("merry_andy", { discards: 3, handSize: -1 }),
  passive("mime", { heldRetriggers: 1 }),
  passive("oops_all_6s", { probabilityScale: 2 }),
  passive("four_fingers", { flags: ["four_fingers"] }),
  passive("shortcut", { flags: ["shortcut"] }),
  passive("smeared_joker", { flags: ["smeared_suits"] }),
  passive("pareidolia", { flags: ["all_faces"] }),
  passive("splash", { flags: ["splash"] }),
  passive("showman", { flags: ["allow_duplicates"] }),
  passive("astronomer", { flags: ["free_planets"] }),
  passive("chicot", { flags: ["disable_boss_blind"] }),
];

function staticJoker(id: JokerId, spec: StaticSpec): JokerDefinition {
  return defineJoker(id, (identity) => new StaticBehavior(identity, spec));
}

/** A joker that only changes the rules. */
function passive(id: JokerId, modifiers: RuleModifiers): JokerDefinition {
  return staticJoker(id, { scope: "hand", condition: { kind: "always" }, modifiers });
}
