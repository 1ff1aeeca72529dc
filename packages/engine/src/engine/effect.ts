// ─── Effect Arithmetic ─────────────────────────────────────────────
// Identity, combination and clamped accumulation of Effects.
//
// Clamp order, applied to every accumulation step:
//   1. each field is combined with saturating arithmetic (±MAX_SAFE_INTEGER)
//   2. a non-finite result keeps the pre-accumulation value and is reported
//   3. additive mult is clamped to ±maxMult
//   4. the multiplier is clamped to [0, maxMult]
// and once more when the total is applied to a score:
//   5. (base mult + additive mult) × multiplier is clamped to [0, maxMult]

import type { Effect } from "@jester/schema";

export const MAX_SAFE = Number.MAX_SAFE_INTEGER;

export const IDENTITY_EFFECT: Effect = Object.freeze({
  chips: 0,
  mult: 0,
  multMultiplier: 1,
  money: 0,
  interestBonus: 0,
  retriggers: 0,
  handSizeDelta: 0,
  discardDelta: 0,
  handsDelta: 0,
  destroySelf: false,
  transforms: Object.freeze([]),
  consumables: Object.freeze([]),
  directives: Object.freeze([]),
});

/** Builds an effect from the fields that differ from identity. */
export function effect(fields: Partial<Effect> = {}): Effect {
  return { ...IDENTITY_EFFECT, ...fields };
}

export function isIdentityEffect(e: Effect): boolean {
  return (
    e.chips === 0 &&
    e.mult === 0 &&
    e.multMultiplier === 1 &&
    e.money === 0 &&
    e.interestBonus === 0 &&
    e.retriggers === 0 &&
    e.handSizeDelta === 0 &&
    e.discardDelta === 0 &&
    e.handsDelta === 0 &&
    !e.destroySelf &&
    e.transforms.length === 0 &&
    e.consumables.length === 0 &&
    e.directives.length === 0 &&
    (e.message === undefined || e.message === "")
  );
}

// ─── Saturating Arithmetic ─────────────────────────────────────────

function saturate(value: number): number {
  if (Number.isNaN(value)) return value;
  return Math.min(MAX_SAFE, Math.max(-MAX_SAFE, value));
}

/**
 * Sum clamped to ±MAX_SAFE_INTEGER. A non-finite operand yields NaN so
 * the caller can reject it rather than saturate it.
 */
export function saturatingAdd(a: number, b: number): number {
  if (!Number.isFinite(a) || !Number.isFinite(b)) return Number.NaN;
  return saturate(a + b);
}

export function saturatingMultiply(a: number, b: number): number {
  if (!Number.isFinite(a) || !Number.isFinite(b)) return Number.NaN;
  return saturate(a * b);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

// ─── Combination ───────────────────────────────────────────────────

/**
 * Field-wise combination without the mult bounds: sums, product for
 * the multiplier, OR for `destroySelf`, concatenation for lists, last
 * non-empty message. Non-finite sums come through as NaN.
 */
export function combineEffects(a: Effect, b: Effect): Effect {
  const message = b.message !== undefined && b.message !== "" ? b.message : a.message;
  return {
    chips: saturatingAdd(a.chips, b.chips),
    mult: saturatingAdd(a.mult, b.mult),
    multMultiplier: saturatingMultiply(a.multMultiplier, b.multMultiplier),
    money: saturatingAdd(a.money, b.money),
    interestBonus: saturatingAdd(a.interestBonus, b.interestBonus),
    retriggers: saturatingAdd(a.retriggers, b.retriggers),
    handSizeDelta: saturatingAdd(a.handSizeDelta, b.handSizeDelta),
    discardDelta: saturatingAdd(a.discardDelta, b.discardDelta),
    handsDelta: saturatingAdd(a.handsDelta, b.handsDelta),
    destroySelf: a.destroySelf || b.destroySelf,
    transforms: [...a.transforms, ...b.transforms],
    consumables: [...a.consumables, ...b.consumables],
    directives: [...a.directives, ...b.directives],
    ...(message !== undefined ? { message } : {}),
  };
}

// ─── Accumulator ───────────────────────────────────────────────────

export type NumericField =
  | "chips"
  | "mult"
  | "multMultiplier"
  | "money"
  | "interestBonus"
  | "retriggers"
  | "handSizeDelta"
  | "discardDelta"
  | "handsDelta";

const NUMERIC_FIELDS: readonly NumericField[] = [
  "chips",
  "mult",
  "multMultiplier",
  "money",
  "interestBonus",
  "retriggers",
  "handSizeDelta",
  "discardDelta",
  "handsDelta",
];

/** A field whose combined value was not finite and was left unchanged. */
export interface RejectedField {
  readonly field: NumericField;
  readonly value: number;
}

/**
 * Running total with the bounds applied after every step. The total
 * is always finite, additive mult stays within ±maxMult and the
 * multiplier within [0, maxMult].
 */
export class EffectAccumulator {
  private current: Effect = IDENTITY_EFFECT;

  constructor(private readonly maxMult: number) {}

  get total(): Effect {
    return this.current;
  }

  /** Folds `next` in and returns the fields that had to be rejected. */
  add(next: Effect): readonly RejectedField[] {
    const combined = combineEffects(this.current, next);
    const rejected: RejectedField[] = [];
    const numbers: Record<NumericField, number> = {
      chips: combined.chips,
      mult: combined.mult,
      multMultiplier: combined.multMultiplier,
      money: combined.money,
      interestBonus: combined.interestBonus,
      retriggers: combined.retriggers,
      handSizeDelta: combined.handSizeDelta,
      discardDelta: combined.discardDelta,
      handsDelta: combined.handsDelta,
    };

    for (const field of NUMERIC_FIELDS) {
      if (!Number.isFinite(numbers[field])) {
        rejected.push({ field, value: next[field] });
        numbers[field] = this.current[field];
      }
    }

    numbers.mult = clamp(numbers.mult, -this.maxMult, this.maxMult);
    numbers.multMultiplier = clamp(numbers.multMultiplier, 0, this.maxMult);

    this.current = { ...combined, ...numbers };
    return rejected;
  }
}

/** Folds a list of effects with the accumulator's bounds. */
export function accumulate(effects: readonly Effect[], maxMult: number): Effect {
  const acc = new EffectAccumulator(maxMult);
  for (const e of effects) acc.add(e);
  return acc.total;
}

// ─── Application ───────────────────────────────────────────────────

export interface ScoreBase {
  readonly chips: number;
  readonly mult: number;
}

export interface AppliedScore {
  readonly chips: number;
  readonly mult: number;
  readonly score: number;
}

/** Applies an aggregate effect to a hand's base chips and mult. */
export function applyScore(
  base: ScoreBase,
  total: Effect,
  config: { readonly maxMult: number }
): AppliedScore {
  const chips = Math.max(0, saturatingAdd(base.chips, total.chips));
  const product = saturatingMultiply(
    saturatingAdd(base.mult, total.mult),
    total.multMultiplier
  );
  const mult = Number.isFinite(product) ? clamp(product, 0, config.maxMult) : 0;
  const score = Number.isFinite(chips) ? saturatingMultiply(chips, mult) : 0;
  return { chips: Number.isFinite(chips) ? chips : 0, mult, score };
}

/**
 * Wallet after an effect's money and interest. Never below `floor`
 * (0, or minus the credit limit granted by Credit Card).
 */
export function applyToWallet(wallet: number, total: Effect, floor = 0): number {
  const next = saturatingAdd(saturatingAdd(wallet, total.money), total.interestBonus);
  if (!Number.isFinite(next)) return Math.max(floor, wallet);
  return Math.max(floor, next);
}
