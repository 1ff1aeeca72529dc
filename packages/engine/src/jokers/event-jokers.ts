// ─── Run-Event Jokers ──────────────────────────────────────────────
// Jokers whose value is not chips or mult but an instruction to the
// game engine: create cards, consumables, jokers or tags, level up a
// hand, change sell values, save the run. Most react to lifecycle
// events; a few produce their directives while a hand is scored.

import { z } from "zod";
import { RANKS, SUITS, type Effect, type Seal } from "@jester/schema";
import { isFaceCard } from "../engine/card-utils";
import { IDENTITY_EFFECT, effect } from "../engine/effect";
import { classifyHand } from "../engine/hand-evaluator";
import { AdvancedBehavior, StatefulBehavior } from "../frameworks/advanced";
import { defineJoker, gameplay, type JokerDefinition } from "../frameworks/definition";
import type { Identity, Lifecycle, RunContext, RunEventKind } from "../types/behavior";

const SEALS: readonly Seal[] = ["gold", "red", "blue", "purple"];

/** A joker that only answers one kind of run event. */
class EventJoker extends AdvancedBehavior {
  override readonly lifecycle: Lifecycle;

  constructor(identity: Identity, kind: RunEventKind, respond: (ctx: RunContext) => Effect) {
    super(identity);
    this.lifecycle = {
      onRunEvent: (event, ctx) => (event.kind === kind ? respond(ctx) : IDENTITY_EFFECT),
    };
  }
}

function onEvent(kind: RunEventKind, respond: (ctx: RunContext) => Effect) {
  return (identity: Identity) => new EventJoker(identity, kind, respond);
}

function emptySlots(ctx: RunContext): number {
  return Math.max(0, ctx.rules.jokerSlots - ctx.siblings.length);
}

// ─── Lifecycle-Only Jokers ─────────────────────────────────────────

class Certificate extends AdvancedBehavior {
  override readonly lifecycle: Lifecycle = {
    onRoundStart: (ctx) =>
      effect({
        transforms: [
          {
            kind: "add_card",
            template: {
              rank: ctx.rng.pick(RANKS),
              suit: ctx.rng.pick(SUITS),
              seal: ctx.rng.pick(SEALS),
            },
          },
        ],
      }),
  };
}

class Luchador extends AdvancedBehavior {
  override readonly lifecycle: Lifecycle = {
    onSell: (ctx) =>
      ctx.snapshot.blind.kind === "boss"
        ? effect({ directives: [{ kind: "disable_boss_blind" }] })
        : IDENTITY_EFFECT,
  };
}

class DietCola extends AdvancedBehavior {
  override readonly lifecycle: Lifecycle = {
    onSell: () => effect({ directives: [{ kind: "create_tag", tag: "double" }] }),
  };
}

class GiftCard extends AdvancedBehavior {
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: () => effect({ directives: [{ kind: "add_sell_value", target: "all", amount: 1 }] }),
  };
}

/**
 * Prevents death when at least a quarter of the blind's chips were
 * scored, then burns itself.
 */
class MrBones extends AdvancedBehavior {
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: (ctx) => {
      const { roundScore, blind } = ctx.snapshot;
      if (roundScore >= blind.chipsRequired || roundScore < blind.chipsRequired / 4) {
        return IDENTITY_EFFECT;
      }
      return effect({ directives: [{ kind: "prevent_death" }], destroySelf: true, message: "Saved by Mr. Bones" });
    },
  };
}

const SatelliteState = z.object({ planets: z.array(z.string()) });

/** $1 at round end per unique planet card used this run. */
class Satellite extends StatefulBehavior<z.infer<typeof SatelliteState>> {
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: () => {
      const count = this.current.planets.length;
      return count > 0 ? effect({ money: count }) : IDENTITY_EFFECT;
    },
    onRunEvent: (event, ctx) => {
      if (event.kind !== "consumable_used" || event.consumable.kind !== "planet") return IDENTITY_EFFECT;
      const { name } = event.consumable;
      this.mutate(ctx, (s) => (s.planets.includes(name) ? s : { planets: [...s.planets, name] }));
      return IDENTITY_EFFECT;
    },
  };

  constructor(identity: Identity) {
    super(identity, { schema: SatelliteState, version: 1, initial: { planets: [] } });
  }
}

const InvisibleState = z.object({ rounds: z.number().int().min(0) });

/** Selling it after two rounds duplicates a random other joker. */
class InvisibleJoker extends StatefulBehavior<z.infer<typeof InvisibleState>> {
  static readonly ROUNDS = 2;

  override readonly lifecycle: Lifecycle = {
    onRoundEnd: (ctx) => {
      this.mutate(ctx, (s) => ({ rounds: s.rounds + 1 }));
      return IDENTITY_EFFECT;
    },
    onSell: (ctx) => {
      if (this.current.rounds < InvisibleJoker.ROUNDS) return IDENTITY_EFFECT;
      const others = ctx.siblings.filter((s) => s.handle.slot !== ctx.self.slot);
      if (others.length === 0) return IDENTITY_EFFECT;
      const target = ctx.rng.pick(others);
      return effect({ directives: [{ kind: "duplicate_joker", slot: target.handle.slot }] });
    },
  };

  constructor(identity: Identity) {
    super(identity, { schema: InvisibleState, version: 1, initial: { rounds: 0 } });
  }
}

// ─── Scoring-Time Directives ───────────────────────────────────────

/** 1 in 4 chance to level up the played hand. */
class SpaceJoker extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) =>
      ctx.rng.chance(1, 4, ctx.rules.probabilityScale)
        ? effect({ directives: [{ kind: "level_up_hand", handType: ctx.hand.handType, levels: 1 }] })
        : IDENTITY_EFFECT,
  });
}

/** A single 6 as the round's first hand is destroyed for a spectral card. */
class SixthSense extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const [card, ...rest] = ctx.hand.played;
      if (ctx.snapshot.handsPlayed !== 0 || card === undefined || rest.length > 0 || card.rank !== "6") {
        return IDENTITY_EFFECT;
      }
      return effect({
        transforms: [{ kind: "destroy_card", cardId: card.id }],
        consumables: [{ kind: "spectral" }],
      });
    },
  });
}

/** A single card as the round's first hand is copied into the deck. */
class Dna extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const [card, ...rest] = ctx.hand.played;
      if (ctx.snapshot.handsPlayed !== 0 || card === undefined || rest.length > 0) return IDENTITY_EFFECT;
      return effect({ transforms: [{ kind: "copy_card", cardId: card.id }] });
    },
  });
}

/** Scoring face cards become Gold. */
class MidasMask extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const faces = ctx.hand.scoring.filter((card) => isFaceCard(card, ctx.rules) && card.enhancement !== "gold");
      if (faces.length === 0) return IDENTITY_EFFECT;
      return effect({
        transforms: faces.map((card) => ({ kind: "set_enhancement" as const, cardId: card.id, enhancement: "gold" as const })),
      });
    },
  });
}

/** Every scored card permanently gains +5 chips. */
class Hiker extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    card: (_ctx, card) => effect({ transforms: [{ kind: "add_chips", cardId: card.id, amount: 5 }] }),
  });
}

/** $8 when a boss blind's ability triggers. */
class Matador extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) =>
      ctx.snapshot.blind.kind === "boss" && ctx.snapshot.flags.includes("boss_ability_triggered")
        ? effect({ money: 8 })
        : IDENTITY_EFFECT,
  });
}

/** The round's first discard of a single card destroys it for $3. */
class TradingCard extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    discard: (ctx, cards) => {
      const [card, ...rest] = cards;
      if (ctx.snapshot.discardsUsed !== 0 || card === undefined || rest.length > 0) return IDENTITY_EFFECT;
      return effect({ money: 3, transforms: [{ kind: "destroy_card", cardId: card.id }] });
    },
  });
}

/** The round's first discarded poker hand is levelled up. */
class BurntJoker extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    discard: (ctx, cards) => {
      if (ctx.snapshot.discardsUsed !== 0 || cards.length === 0) return IDENTITY_EFFECT;
      const { handType } = classifyHand(cards, ctx.rules);
      return effect({ directives: [{ kind: "level_up_hand", handType, levels: 1 }] });
    },
  });
}

// ─── Definitions ───────────────────────────────────────────────────

export const EVENT_JOKERS: readonly JokerDefinition[] = [
  defineJoker(
    "riff_raff",
    onEvent("blind_selected", (ctx) => {
      const count = Math.min(2, emptySlots(ctx));
      return count > 0 ? effect({ directives: [{ kind: "create_joker", rarity: "common", count }] }) : IDENTITY_EFFECT;
    })
  ),
  defineJoker(
    "marble_joker",
    onEvent("blind_selected", () =>
      effect({ transforms: [{ kind: "add_card", template: { enhancement: "stone" } }] })
    )
  ),
  defineJoker(
    "burglar",
    onEvent("blind_selected", (ctx) => effect({ handsDelta: 3, discardDelta: -ctx.rules.discards }))
  ),
  defineJoker("cartomancer", onEvent("blind_selected", () => effect({ consumables: [{ kind: "tarot" }] }))),
  defineJoker(
    "hallucination",
    onEvent("booster_opened", (ctx) =>
      ctx.rng.chance(1, 2, ctx.rules.probabilityScale) ? effect({ consumables: [{ kind: "tarot" }] }) : IDENTITY_EFFECT
    )
  ),
  defineJoker(
    "perkeo",
    onEvent("shop_exited", (ctx) => {
      if (ctx.snapshot.consumables.length === 0) return IDENTITY_EFFECT;
      const { kind, name } = ctx.rng.pick(ctx.snapshot.consumables);
      return effect({ consumables: [{ kind, name, negative: true }] });
    })
  ),
  defineJoker("certificate", (identity) => new Certificate(identity)),
  defineJoker("luchador", (identity) => new Luchador(identity)),
  defineJoker("diet_cola", (identity) => new DietCola(identity)),
  defineJoker("gift_card", (identity) => new GiftCard(identity)),
  defineJoker("mr_bones", (identity) => new MrBones(identity)),
  defineJoker("satellite", (identity) => new Satellite(identity)),
  defineJoker("invisible_joker", (identity) => new InvisibleJoker(identity)),
  defineJoker("space_joker", (identity) => new SpaceJoker(identity)),
  defineJoker("sixth_sense", (identity) => new SixthSense(identity)),
  defineJoker("dna", (identity) => new Dna(identity)),
  defineJoker("midas_mask", (identity) => new MidasMask(identity)),
  defineJoker("hiker", (identity) => new Hiker(identity)),
  defineJoker("matador", (identity) => new Matador(identity)),
  defineJoker("trading_card", (identity) => new TradingCard(identity)),
  defineJoker("burnt_joker", (identity) => new BurntJoker(identity)),
];
