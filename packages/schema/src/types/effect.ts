// ─── Effects ───────────────────────────────────────────────────────
// The net change one joker hook produces. Effects are plain values:
// the pipeline folds them together, the game engine applies the total.

import type { CardInstanceId, Enhancement, Rank, Seal, Suit } from "./card";
import type { HandType } from "./hand";
import type { Rarity } from "./joker";

export type ConsumableKind = "tarot" | "planet" | "spectral";

/** A request for the engine to create a consumable card. */
export interface ConsumableRequest {
  readonly kind: ConsumableKind;
  /** Negative copies do not take a consumable slot. */
  readonly negative?: boolean;
  /** A specific card name; omitted means "random of this kind". */
  readonly name?: string;
}

/** Shape of a playing card the engine should add to the deck. */
export interface CardTemplate {
  readonly rank?: Rank;
  readonly suit?: Suit;
  readonly enhancement?: Enhancement;
  readonly seal?: Seal;
}

/**
 * A change to a specific playing card, or a new card for the deck.
 * Discriminated on `kind`.
 */
export type CardTransform =
  | {
      readonly kind: "add_chips";
      readonly cardId: CardInstanceId;
      readonly amount: number;
    }
  | {
      readonly kind: "set_enhancement";
      readonly cardId: CardInstanceId;
      readonly enhancement: Enhancement | null;
    }
  | { readonly kind: "destroy_card"; readonly cardId: CardInstanceId }
  | { readonly kind: "copy_card"; readonly cardId: CardInstanceId }
  | { readonly kind: "add_card"; readonly template: CardTemplate };

/**
 * Run-level instructions that are not card transforms or consumables.
 * Joker targets are addressed by run-local instance slot.
 */
export type RunDirective =
  | { readonly kind: "destroy_joker"; readonly slot: number }
  | { readonly kind: "duplicate_joker"; readonly slot: number }
  | { readonly kind: "create_joker"; readonly rarity: Rarity; readonly count: number }
  | { readonly kind: "level_up_hand"; readonly handType: HandType; readonly levels: number }
  | {
      readonly kind: "add_sell_value";
      readonly target: "all" | number;
      readonly amount: number;
    }
  | { readonly kind: "prevent_death" }
  | { readonly kind: "create_tag"; readonly tag: string }
  | { readonly kind: "set_run_flag"; readonly flag: string }
  | { readonly kind: "disable_boss_blind" };

/**
 * The net change produced by one invocation, or by a whole pass once
 * accumulated. The identity effect has every number at 0 except
 * `multMultiplier` (1) and every list empty.
 */
export interface Effect {
  readonly chips: number;
  readonly mult: number;
  readonly multMultiplier: number;
  readonly money: number;
  /** Extra interest money paid at cash-out. */
  readonly interestBonus: number;
  readonly retriggers: number;
  readonly handSizeDelta: number;
  readonly discardDelta: number;
  readonly handsDelta: number;
  readonly destroySelf: boolean;
  readonly transforms: readonly CardTransform[];
  readonly consumables: readonly ConsumableRequest[];
  readonly directives: readonly RunDirective[];
  readonly message?: string;
}
