// ─── Passive Rules ─────────────────────────────────────────────────
// Always-on adjustments contributed by Modifiers. Each joker returns a
// partial patch; the run folds the patches over the configured base
// values into one ResolvedRules per recomputation.

export const RULE_FLAGS = [
  "four_fingers",
  "shortcut",
  "smeared_suits",
  "all_faces",
  "splash",
  "allow_duplicates",
  "free_planets",
  "disable_boss_blind",
] as const;

export type RuleFlag = (typeof RULE_FLAGS)[number];

/**
 * A joker's contribution. Numeric fields are deltas added to the base,
 * except `probabilityScale`, which multiplies.
 */
export interface RuleModifiers {
  readonly handSize?: number;
  readonly discards?: number;
  readonly hands?: number;
  readonly jokerSlots?: number;
  readonly consumableSlots?: number;
  /** How far below zero the wallet may go. */
  readonly creditLimit?: number;
  readonly freeRerolls?: number;
  readonly probabilityScale?: number;
  /** Extra evaluations of held-in-hand card effects. */
  readonly heldRetriggers?: number;
  readonly flags?: readonly RuleFlag[];
}

export interface ResolvedRules {
  readonly handSize: number;
  readonly discards: number;
  readonly hands: number;
  readonly jokerSlots: number;
  readonly consumableSlots: number;
  readonly creditLimit: number;
  readonly freeRerolls: number;
  readonly probabilityScale: number;
  readonly heldRetriggers: number;
  readonly flags: ReadonlySet<RuleFlag>;
}

/** Base values a run starts from before any joker contributes. */
export interface RuleBase {
  readonly baseHandSize: number;
  readonly baseDiscards: number;
  readonly baseHands: number;
  readonly jokerSlots: number;
  readonly consumableSlots: number;
}

export function baseRules(base: RuleBase): ResolvedRules {
  return {
    handSize: base.baseHandSize,
    discards: base.baseDiscards,
    hands: base.baseHands,
    jokerSlots: base.jokerSlots,
    consumableSlots: base.consumableSlots,
    creditLimit: 0,
    freeRerolls: 0,
    probabilityScale: 1,
    heldRetriggers: 0,
    flags: new Set(),
  };
}

/** Folds joker contributions over the base, in the order given. */
export function resolveRules(
  base: RuleBase,
  contributions: readonly RuleModifiers[]
): ResolvedRules {
  const start = baseRules(base);
  let handSize = start.handSize;
  let discards = start.discards;
  let hands = start.hands;
  let jokerSlots = start.jokerSlots;
  let consumableSlots = start.consumableSlots;
  let creditLimit = 0;
  let freeRerolls = 0;
  let probabilityScale = 1;
  let heldRetriggers = 0;
  const flags = new Set<RuleFlag>();

  for (const patch of contributions) {
    handSize += patch.handSize ?? 0;
    discards += patch.discards ?? 0;
    hands += patch.hands ?? 0;
    jokerSlots += patch.jokerSlots ?? 0;
    consumableSlots += patch.consumableSlots ?? 0;
    creditLimit += patch.creditLimit ?? 0;
    freeRerolls += patch.freeRerolls ?? 0;
    probabilityScale *= patch.probabilityScale ?? 1;
    heldRetriggers += patch.heldRetriggers ?? 0;
    for (const flag of patch.flags ?? []) flags.add(flag);
  }

  return {
    handSize: Math.max(0, handSize),
    discards: Math.max(0, discards),
    hands: Math.max(1, hands),
    jokerSlots: Math.max(0, jokerSlots),
    consumableSlots: Math.max(0, consumableSlots),
    creditLimit: Math.max(0, creditLimit),
    freeRerolls: Math.max(0, freeRerolls),
    probabilityScale: Math.max(0, probabilityScale),
    heldRetriggers: Math.max(0, heldRetriggers),
    flags,
  };
}
