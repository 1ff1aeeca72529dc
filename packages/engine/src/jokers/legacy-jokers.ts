// ─── Legacy Jokers ─────────────────────────────────────────────────
// Food and decay jokers still written in the monolithic LegacyJoker
// shape. They reach the registry through the bridge.

import { z } from "zod";
import type { Effect, JsonValue, Rarity } from "@jester/schema";
import { formatZodIssues } from "@jester/schema";
import { IDENTITY_EFFECT, effect } from "../engine/effect";
import { StateDeserializeError } from "../errors";
import { defineLegacyJoker } from "../bridge/legacy-bridge";
import type { LegacyJoker } from "../bridge/legacy-joker";
import type { JokerDefinition } from "../frameworks/definition";
import type { RunContext, ScoringContext } from "../types/behavior";

export const GROS_MICHEL_EXTINCT = "gros_michel_extinct";

function parseState<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: JsonValue): T {
  const result = schema.safeParse(raw);
  if (!result.success) throw new StateDeserializeError(formatZodIssues(result.error.issues));
  return result.data;
}

export class GrosMichel implements LegacyJoker {
  readonly id = "gros_michel";
  readonly name = "Gros Michel";
  readonly description = "+15 Mult. 1 in 6 chance this is destroyed at the end of the round";
  readonly rarity: Rarity = "common";
  readonly cost = 5;

  onHandPlayed(): Effect {
    return effect({ mult: 15 });
  }

  onRoundEnd(ctx: RunContext): Effect {
    if (!ctx.rng.chance(1, 6, ctx.rules.probabilityScale)) return IDENTITY_EFFECT;
    return effect({
      destroySelf: true,
      directives: [{ kind: "set_run_flag", flag: GROS_MICHEL_EXTINCT }],
      message: "Extinct!",
    });
  }
}

export class Cavendish implements LegacyJoker {
  readonly id = "cavendish";
  readonly name = "Cavendish";
  readonly description = "X3 Mult. 1 in 1000 chance this card is destroyed at the end of the round";
  readonly rarity: Rarity = "common";
  readonly cost = 4;

  onHandPlayed(): Effect {
    return effect({ multMultiplier: 3 });
  }

  onRoundEnd(ctx: RunContext): Effect {
    return ctx.rng.chance(1, 1000, ctx.rules.probabilityScale)
      ? effect({ destroySelf: true, message: "Extinct!" })
      : IDENTITY_EFFECT;
  }
}

const IceCreamState = z.object({ chips: z.number().int().min(0) });

export class IceCream implements LegacyJoker {
  readonly id = "ice_cream";
  readonly name = "Ice Cream";
  readonly description = "+100 Chips. -5 Chips for every hand played";
  readonly rarity: Rarity = "common";
  readonly cost = 5;
  readonly stateVersion = 1;

  private chips = 100;

  onHandPlayed(ctx: ScoringContext): Effect {
    const payout = effect({ chips: this.chips });
    if (ctx.mirrored) return payout;
    this.chips = Math.max(0, this.chips - 5);
    return this.chips === 0 ? { ...payout, destroySelf: true, message: "Melted!" } : payout;
  }

  saveState(): JsonValue {
    return { chips: this.chips };
  }

  loadState(raw: JsonValue): void {
    this.chips = parseState(IceCreamState, raw).chips;
  }
}

const PopcornState = z.object({ mult: z.number().int().min(0) });

export class Popcorn implements LegacyJoker {
  readonly id = "popcorn";
  readonly name = "Popcorn";
  readonly description = "+20 Mult. -4 Mult per round played";
  readonly rarity: Rarity = "common";
  readonly cost = 5;
  readonly stateVersion = 1;

  private mult = 20;

  onHandPlayed(): Effect {
    return this.mult > 0 ? effect({ mult: this.mult }) : IDENTITY_EFFECT;
  }

  onRoundEnd(): Effect {
    this.mult = Math.max(0, this.mult - 4);
    return this.mult === 0 ? effect({ destroySelf: true, message: "Eaten!" }) : IDENTITY_EFFECT;
  }

  saveState(): JsonValue {
    return { mult: this.mult };
  }

  loadState(raw: JsonValue): void {
    this.mult = parseState(PopcornState, raw).mult;
  }
}

export class Egg implements LegacyJoker {
  readonly id = "egg";
  readonly name = "Egg";
  readonly description = "Gains $3 of sell value at end of round";
  readonly rarity: Rarity = "common";
  readonly cost = 4;

  onRoundEnd(ctx: RunContext): Effect {
    return effect({ directives: [{ kind: "add_sell_value", target: ctx.self.slot, amount: 3 }] });
  }
}

export const LEGACY_JOKERS: readonly JokerDefinition[] = [
  defineLegacyJoker("gros_michel", () => new GrosMichel()),
  defineLegacyJoker("cavendish", () => new Cavendish()),
  defineLegacyJoker("ice_cream", () => new IceCream()),
  defineLegacyJoker("popcorn", () => new Popcorn()),
  defineLegacyJoker("egg", () => new Egg()),
];
