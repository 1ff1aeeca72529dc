// ─── Engine Configuration ──────────────────────────────────────────
// Numeric bounds and base run values. Defaults are the shipped game's;
// JESTER_* environment variables override them, explicit overrides win
// over both.

import { z } from "zod";
import { formatZodIssues } from "@jester/schema";
import { JesterError } from "./errors";

export const EngineConfigSchema = z.object({
  /** Ceiling for additive mult, the multiplier and the applied mult. */
  maxMult: z.number().positive().default(1_000_000),
  maxRetriggersPerCard: z.number().int().min(0).default(10),
  maxTotalRetriggers: z.number().int().min(0).default(100),
  baseHandSize: z.number().int().min(1).default(8),
  baseDiscards: z.number().int().min(0).default(3),
  baseHands: z.number().int().min(1).default(4),
  jokerSlots: z.number().int().min(0).default(5),
  consumableSlots: z.number().int().min(0).default(2),
  startingDeckSize: z.number().int().min(1).default(52),
  cacheEnabled: z.boolean().default(true),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({});

const ENV_KEYS = {
  maxMult: "JESTER_MAX_MULT",
  maxRetriggersPerCard: "JESTER_MAX_RETRIGGERS_PER_CARD",
  maxTotalRetriggers: "JESTER_MAX_TOTAL_RETRIGGERS",
  baseHandSize: "JESTER_BASE_HAND_SIZE",
  baseDiscards: "JESTER_BASE_DISCARDS",
  baseHands: "JESTER_BASE_HANDS",
  jokerSlots: "JESTER_JOKER_SLOTS",
  consumableSlots: "JESTER_CONSUMABLE_SLOTS",
  startingDeckSize: "JESTER_STARTING_DECK_SIZE",
  cacheEnabled: "JESTER_CACHE_ENABLED",
} as const satisfies Record<keyof EngineConfig, string>;

function readEnvValue(raw: string | undefined, key: keyof EngineConfig): unknown {
  if (raw === undefined || raw.trim() === "") return undefined;
  if (key === "cacheEnabled") {
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    return raw;
  }
  return Number(raw);
}

/**
 * Builds the engine configuration from defaults, the environment and
 * explicit overrides, in that order of precedence (lowest first).
 *
 * @throws {JesterError} with code `invalid_config` when a value is out of range.
 */
export function loadConfig(
  overrides: Partial<EngineConfig> = {},
  env: Readonly<Record<string, string | undefined>> = process.env
): EngineConfig {
  const fromEnv: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const field = EngineConfigSchema.keyof().safeParse(key);
    if (!field.success) continue;
    const value = readEnvValue(env[envKey], field.data);
    if (value !== undefined) fromEnv[key] = value;
  }

  const result = EngineConfigSchema.safeParse({ ...fromEnv, ...overrides });
  if (!result.success) {
    throw new JesterError(formatZodIssues(result.error.issues), "invalid_config");
  }
  return result.data;
}
