// ─── Joker Definitions ─────────────────────────────────────────────
// A definition pairs a joker identifier with the function that builds
// one instance of it. Parameterized jokers validate their construction
// arguments with a zod schema; the rest refuse arguments outright.

import type { z } from "zod";
import type { Effect, JokerId, JokerMetadata, PlayingCard } from "@jester/schema";
import { formatZodIssues } from "@jester/schema";
import { ConstructionError } from "../errors";
import { IDENTITY_EFFECT } from "../engine/effect";
import type { Behavior, Gameplay, Identity, ScoringContext } from "../types/behavior";

export interface JokerDefinition {
  readonly id: JokerId;
  readonly parameterized: boolean;
  /**
   * Builds a fresh instance. Mutates nothing outside the new instance.
   *
   * @throws {ConstructionError} when the arguments do not validate.
   */
  build(identity: Identity, args: unknown): Behavior;
}

export function defineJoker(id: JokerId, create: (identity: Identity) => Behavior): JokerDefinition {
  return {
    id,
    parameterized: false,
    build(identity, args) {
      if (args !== undefined) {
        throw new ConstructionError(`${id} takes no construction arguments`, "invalid_arguments", id);
      }
      return create(identity);
    },
  };
}

export function defineParameterizedJoker<A>(
  id: JokerId,
  schema: z.ZodType<A, z.ZodTypeDef, unknown>,
  create: (identity: Identity, args: A) => Behavior
): JokerDefinition {
  return {
    id,
    parameterized: true,
    build(identity, args) {
      const result = schema.safeParse(args);
      if (!result.success) {
        throw new ConstructionError(
          `Invalid arguments for ${id}: ${formatZodIssues(result.error.issues)}`,
          "invalid_arguments",
          id
        );
      }
      return create(identity, result.data);
    },
  };
}

/** Frozen identity for a catalog entry. */
export function identityFrom(metadata: JokerMetadata): Identity {
  return Object.freeze({
    id: metadata.id,
    name: metadata.name,
    description: metadata.description,
    rarity: metadata.rarity,
    baseCost: metadata.cost,
    copyable: metadata.copyable,
  });
}

// ─── Gameplay Helpers ──────────────────────────────────────────────

export interface GameplayHooks {
  hand?(ctx: ScoringContext): Effect;
  card?(ctx: ScoringContext, card: PlayingCard): Effect;
  discard?(ctx: ScoringContext, cards: readonly PlayingCard[]): Effect;
}

/** A Gameplay role from the hooks a joker cares about; the rest return identity. */
export function gameplay(hooks: GameplayHooks): Gameplay {
  const role: Gameplay = {
    onHandPlayed: (ctx) => (hooks.hand ? hooks.hand(ctx) : IDENTITY_EFFECT),
    onCardScored: (ctx, card) => (hooks.card ? hooks.card(ctx, card) : IDENTITY_EFFECT),
  };
  if (!hooks.discard) return role;
  return { ...role, onDiscard: (ctx, cards) => (hooks.discard ? hooks.discard(ctx, cards) : IDENTITY_EFFECT) };
}
