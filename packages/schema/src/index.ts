// ─── @jester/schema ────────────────────────────────────────────────
// Canonical type definitions and Zod validation for the joker engine:
// cards, hand types, joker identifiers, effects and persisted state.
// All types and schemas are re-exported from this single entry point.

export * from "./types/index";
export * from "./schema/index";
