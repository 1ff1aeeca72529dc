// ─── Legacy Joker Shape ────────────────────────────────────────────
// The monolithic joker interface older definitions were written
// against: display fields and every hook on one object, each hook
// optional. New jokers use the capability roles instead; these reach
// the engine through LegacyBridge.

import type { Effect, JokerId, JsonValue, PlayingCard, Rarity } from "@jester/schema";
import type { RunContext, ScoringContext } from "../types/behavior";

export interface LegacyJoker {
  readonly id: JokerId;
  readonly name: string;
  readonly description: string;
  readonly rarity: Rarity;
  readonly cost: number;

  onHandPlayed?(ctx: ScoringContext): Effect;
  onCardScored?(ctx: ScoringContext, card: PlayingCard): Effect;
  onDiscard?(ctx: ScoringContext, cards: readonly PlayingCard[]): Effect;
  /** Called when a blind starts; maps to round start. */
  onBlindStart?(ctx: RunContext): Effect;
  onRoundEnd?(ctx: RunContext): Effect;
  onSell?(ctx: RunContext): Effect;
  /** Called once when the joker enters the run. */
  onCreated?(ctx: RunContext): void;

  /** Hand size delta while the joker is owned. */
  modifyHandSize?(): number;
  /** Discards-per-round delta while the joker is owned. */
  modifyDiscards?(): number;

  /** Version written next to `saveState()`; 0 when omitted. */
  readonly stateVersion?: number;
  saveState?(): JsonValue;
  /**
   * @throws {StateDeserializeError} when `raw` is malformed; the joker
   * keeps its previous state.
   */
  loadState?(raw: JsonValue, version: number): void;
}
