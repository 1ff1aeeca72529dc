// ─── @jester/engine ────────────────────────────────────────────────
// Joker behaviors, the scoring pipeline and the run facade.

export * from "./types/index";
export * from "./engine/index";
export * from "./frameworks/index";
export { BehaviorRegistry, getRegistry, resetRegistryForTests, isUnlocked, type RegistryEntry, type UnlockProgress } from "./registry/registry";
export { createBehavior, tryCreateBehavior, type CreateResult } from "./registry/factory";
export { readCatalog, parseCatalogJson, CATALOG_PATH } from "./registry/catalog";
export { ALL_DEFINITIONS } from "./jokers/index";
export { LegacyBridge, defineLegacyJoker, legacyIdentity } from "./bridge/legacy-bridge";
export { BehaviorCollection, type CollectionEntry } from "./bridge/behavior-collection";
export type { LegacyJoker } from "./bridge/legacy-joker";
export { BehaviorStateStore } from "./state/state-store";
export { ConditionCache, type CacheStats, type CachedValue } from "./state/condition-cache";
export { StateCell, type StateCellOptions } from "./state/state-cell";
export { JokerRun, type JokerRunOptions, type AcquireResult, type PassResult, type SellResult, type Settlement, type LoadReport } from "./run/joker-run";
export { encodeSave, decodeSave, createSaveBlob, type DecodedSave, type DecodedEntry, type LostEntry } from "./run/save-codec";
export { loadConfig, DEFAULT_CONFIG, EngineConfigSchema, type EngineConfig } from "./config";
export * from "./errors";
export { logger } from "./logger";
