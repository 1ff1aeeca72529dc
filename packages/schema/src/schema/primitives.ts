// ─── Primitive Schemas ─────────────────────────────────────────────
// Zod schemas for the literal unions shared by the catalog, the save
// blob and joker construction arguments.

import { z } from "zod";
import { HAND_TYPES } from "../types/hand";
import { JOKER_IDS } from "../types/joker";

export const SuitSchema = z.enum(["hearts", "diamonds", "clubs", "spades"]);

export const RankSchema = z.enum([
  "2",
  "3",
  "4",
  "5",
  "6",
  "7",
  "8",
  "9",
  "10",
  "J",
  "Q",
  "K",
  "A",
]);

export const EnhancementSchema = z.enum([
  "bonus",
  "mult",
  "wild",
  "glass",
  "steel",
  "stone",
  "gold",
  "lucky",
]);

export const HandTypeSchema = z.enum(HAND_TYPES);

export const JokerIdSchema = z.enum(JOKER_IDS);

export const RaritySchema = z.enum(["common", "uncommon", "rare", "legendary"]);

export const UnlockConditionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("always") }),
  z.object({ kind: z.literal("min_ante"), ante: z.number().int().min(1) }),
  z.object({ kind: z.literal("run_flag"), flag: z.string().min(1) }),
  z.object({ kind: z.literal("never_in_shop") }),
]);
