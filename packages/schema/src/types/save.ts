// ─── Save Blob ─────────────────────────────────────────────────────
// Persisted layout of a run's jokers. The blob is versioned as a whole
// and every entry carries its behavior's own state version, so a joker
// can migrate its state independently of the envelope.

/** Any value that survives a JSON round-trip. */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export const SAVE_FORMAT = "jester.jokers";

/** The blob version written by this build. */
export const CURRENT_SAVE_VERSION = 2;

/**
 * One persisted joker (blob version 2). `id` stays a plain string so an
 * entry whose identifier is no longer registered can still be reported.
 */
export interface SavedJokerEntry {
  readonly id: string;
  readonly slot: number;
  /** The behavior's `stateVersion` at save time. */
  readonly version: number;
  /** Sell value added on top of the catalog price (Egg, Gift Card). */
  readonly sellBonus: number;
  readonly state: JsonValue;
}

/** Blob version 1 entry: no slots, no sell bonus. */
export interface LegacySavedJokerEntry {
  readonly id: string;
  readonly version: number;
  readonly state: JsonValue;
}

export interface JokerSaveBlob {
  readonly format: typeof SAVE_FORMAT;
  readonly version: typeof CURRENT_SAVE_VERSION;
  /** Next slot the run will hand out; keeps slots unique after reload. */
  readonly nextSlot: number;
  readonly entries: readonly SavedJokerEntry[];
}
