// ─── Catalog Schema ────────────────────────────────────────────────
// The joker catalog ships as JSON. This is its parse boundary: raw JSON
// enters, typed metadata exits. Cross-entry rules (one entry per
// identifier, legendaries never sold in the shop) are checked here too.

import { z } from "zod";
import { JOKER_IDS } from "../types/joker";
import {
  JokerIdSchema,
  RaritySchema,
  UnlockConditionSchema,
} from "./primitives";

export const JokerMetadataSchema = z
  .object({
    id: JokerIdSchema,
    name: z.string().min(1),
    description: z.string().min(1),
    rarity: RaritySchema,
    cost: z.number().int().min(1),
    unlock: UnlockConditionSchema,
    copyable: z.boolean(),
  })
  .refine(
    (entry) => entry.rarity !== "legendary" || entry.unlock.kind === "never_in_shop",
    { message: "legendary jokers must be never_in_shop", path: ["unlock"] }
  );

export const JokerCatalogSchema = z
  .array(JokerMetadataSchema)
  .superRefine((entries, ctx) => {
    const seen = new Set<string>();
    entries.forEach((entry, index) => {
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate identifier "${entry.id}"`,
          path: [index, "id"],
        });
      }
      seen.add(entry.id);
    });
    for (const id of JOKER_IDS) {
      if (!seen.has(id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `missing catalog entry for "${id}"`,
          path: [],
        });
      }
    }
  });

export type ParsedJokerMetadata = z.infer<typeof JokerMetadataSchema>;

/**
 * Parses raw catalog JSON. Throws a ZodError with detailed issues.
 */
export function parseCatalog(raw: unknown): ParsedJokerMetadata[] {
  return JokerCatalogSchema.parse(raw);
}

/** Safe parse variant: returns a discriminated result instead of throwing. */
export function safeParseCatalog(
  raw: unknown
): z.SafeParseReturnType<unknown, ParsedJokerMetadata[]> {
  return JokerCatalogSchema.safeParse(raw);
}
