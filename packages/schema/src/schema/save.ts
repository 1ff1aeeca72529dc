// ─── Save Blob Schemas ─────────────────────────────────────────────
// The envelope is validated first with entries left opaque, then every
// entry is parsed on its own so one damaged joker does not sink the
// whole run.

import { z } from "zod";
import type { JsonValue } from "../types/save";
import { SAVE_FORMAT } from "../types/save";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

export const SaveEnvelopeSchema = z.object({
  format: z.literal(SAVE_FORMAT),
  version: z.number().int().min(1),
  nextSlot: z.number().int().min(0).optional(),
  entries: z.array(z.unknown()),
});

export type SaveEnvelope = z.infer<typeof SaveEnvelopeSchema>;

export const SavedJokerEntrySchema = z.object({
  id: z.string().min(1),
  slot: z.number().int().min(0),
  version: z.number().int().min(0),
  sellBonus: z.number().int().default(0),
  state: JsonValueSchema,
});

export const LegacySavedJokerEntrySchema = z.object({
  id: z.string().min(1),
  version: z.number().int().min(0).default(0),
  state: JsonValueSchema.default(null),
});
