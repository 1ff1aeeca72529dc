// ─── Scaling Jokers ────────────────────────────────────────────────
// Jokers that grow (or decay) a single value in response to run events,
// discards or their own scoring, and pay that value out every hand.

import { z } from "zod";
import { rankValue, type Effect, type JokerId, type PlayingCard } from "@jester/schema";
import { cardHasRank, isFaceCard, rankChips } from "../engine/card-utils";
import { IDENTITY_EFFECT, effect } from "../engine/effect";
import { StatefulBehavior, AdvancedBehavior } from "../frameworks/advanced";
import {
  defineJoker,
  defineParameterizedJoker,
  gameplay,
  type JokerDefinition,
} from "../frameworks/definition";
import type {
  Gameplay,
  Identity,
  Lifecycle,
  Modifiers,
  RunContext,
  RunEvent,
  ScoringContext,
} from "../types/behavior";

/** Held-in-hand effects fire once plus once per held retrigger (Mime). */
export function heldTriggers(ctx: RunContext): number {
  return 1 + ctx.rules.heldRetriggers;
}

/** Two decimals, so repeated fractional steps do not drift. */
function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ─── Event Counters ────────────────────────────────────────────────

type Payout = "chips" | "mult" | "xmult";

interface CounterSpec {
  readonly initial: number;
  readonly payout: Payout;
  /** New value after `event`, or undefined when the event is irrelevant. */
  readonly onEvent?: (event: RunEvent, value: number, ctx: RunContext) => number | undefined;
  readonly onRoundEnd?: (value: number, ctx: RunContext) => number;
  readonly onDiscard?: (value: number, cards: readonly PlayingCard[], ctx: ScoringContext) => number;
}

const ValueState = z.object({ value: z.number().finite() });
type ValueState = z.infer<typeof ValueState>;

function payoutEffect(payout: Payout, value: number): Effect {
  switch (payout) {
    case "chips":
      return value === 0 ? IDENTITY_EFFECT : effect({ chips: value });
    case "mult":
      return value === 0 ? IDENTITY_EFFECT : effect({ mult: value });
    case "xmult":
      return value === 1 ? IDENTITY_EFFECT : effect({ multMultiplier: value });
  }
}

/** One number, grown by events and paid out every hand. */
export class CounterJoker extends StatefulBehavior<ValueState> {
  override readonly gameplay: Gameplay;
  override readonly lifecycle: Lifecycle;

  constructor(identity: Identity, spec: CounterSpec, initial = spec.initial) {
    super(identity, { schema: ValueState, version: 1, initial: { value: initial } });
    const { onDiscard } = spec;
    this.gameplay = gameplay({
      hand: () => payoutEffect(spec.payout, this.current.value),
      ...(onDiscard
        ? {
            discard: (ctx: ScoringContext, cards: readonly PlayingCard[]) => {
              this.mutate(ctx, (s) => ({ value: onDiscard(s.value, cards, ctx) }));
              return IDENTITY_EFFECT;
            },
          }
        : {}),
    });

    const { onEvent, onRoundEnd } = spec;
    this.lifecycle = {
      ...(onEvent
        ? {
            onRunEvent: (event: RunEvent, ctx: RunContext) => {
              const next = onEvent(event, this.current.value, ctx);
              if (next !== undefined) this.mutate(ctx, () => ({ value: next }));
              return IDENTITY_EFFECT;
            },
          }
        : {}),
      ...(onRoundEnd
        ? {
            onRoundEnd: (ctx: RunContext) => {
              this.mutate(ctx, (s) => ({ value: onRoundEnd(s.value, ctx) }));
              return IDENTITY_EFFECT;
            },
          }
        : {}),
    };
  }

  get value(): number {
    return this.current.value;
  }
}

const CounterArgs = z.object({ value: z.number().finite().optional() }).strict().default({});

function counterJoker(id: JokerId, spec: CounterSpec): JokerDefinition {
  return defineParameterizedJoker(id, CounterArgs, (identity, args) =>
    new CounterJoker(identity, spec, args.value ?? spec.initial)
  );
}

function countFaces(cards: readonly PlayingCard[], ctx: RunContext): number {
  return cards.filter((card) => isFaceCard(card, ctx.rules)).length;
}

// ─── Definitions ───────────────────────────────────────────────────

const counterJokers: readonly JokerDefinition[] = [
  counterJoker("red_card", {
    initial: 0,
    payout: "mult",
    onEvent: (event, value) => (event.kind === "booster_skipped" ? value + 3 : undefined),
  }),
  counterJoker("flash_card", {
    initial: 0,
    payout: "mult",
    onEvent: (event, value) => (event.kind === "shop_rerolled" ? value + 2 : undefined),
  }),
  counterJoker("fortune_teller", {
    initial: 0,
    payout: "mult",
    onEvent: (event, value) =>
      event.kind === "consumable_used" && event.consumable.kind === "tarot" ? value + 1 : undefined,
  }),
  counterJoker("constellation", {
    initial: 1,
    payout: "xmult",
    onEvent: (event, value) =>
      event.kind === "consumable_used" && event.consumable.kind === "planet"
        ? round2(value + 0.1)
        : undefined,
  }),
  counterJoker("hologram", {
    initial: 1,
    payout: "xmult",
    onEvent: (event, value) =>
      event.kind === "cards_added" ? value + 0.25 * event.cards.length : undefined,
  }),
  counterJoker("glass_joker", {
    initial: 1,
    payout: "xmult",
    onEvent: (event, value) => {
      if (event.kind !== "cards_destroyed") return undefined;
      const glass = event.cards.filter((card) => card.enhancement === "glass").length;
      return glass > 0 ? value + 0.75 * glass : undefined;
    },
  }),
  counterJoker("campfire", {
    initial: 1,
    payout: "xmult",
    onEvent: (event, value) => {
      if (event.kind === "joker_sold") return value + 0.25;
      if (event.kind === "boss_defeated") return 1;
      return undefined;
    },
  }),
  counterJoker("throwback", {
    initial: 1,
    payout: "xmult",
    onEvent: (event, value) => (event.kind === "blind_skipped" ? value + 0.25 : undefined),
  }),
  counterJoker("canio", {
    initial: 1,
    payout: "xmult",
    onEvent: (event, value, ctx) => {
      if (event.kind !== "cards_destroyed") return undefined;
      const faces = countFaces(event.cards, ctx);
      return faces > 0 ? value + faces : undefined;
    },
  }),
  counterJoker("hit_the_road", {
    initial: 1,
    payout: "xmult",
    onDiscard: (value, cards) => value + 0.5 * cards.filter((card) => cardHasRank(card, ["J"])).length,
    onRoundEnd: () => 1,
  }),
];

// ─── Bespoke Scalers ───────────────────────────────────────────────

/** Adds double the rank of the lowest held card to mult. */
class RaisedFist extends AdvancedBehavior {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      let lowest: PlayingCard | undefined;
      for (const card of ctx.hand.held) {
        if (card.enhancement === "stone") continue;
        if (lowest === undefined || rankValue(card.rank) < rankValue(lowest.rank)) lowest = card;
      }
      if (lowest === undefined) return IDENTITY_EFFECT;
      return effect({ mult: 2 * rankChips(lowest.rank) * heldTriggers(ctx) });
    },
  });
}

const RocketState = z.object({ payout: z.number().int().min(0) });

/** Pays at round end; the payout grows each time a boss is beaten. */
class Rocket extends StatefulBehavior<z.infer<typeof RocketState>> {
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: () => effect({ money: this.current.payout }),
    onRunEvent: (event, ctx) => {
      if (event.kind === "boss_defeated") this.mutate(ctx, (s) => ({ payout: s.payout + 2 }));
      return IDENTITY_EFFECT;
    },
  };

  constructor(identity: Identity) {
    super(identity, { schema: RocketState, version: 1, initial: { payout: 1 } });
  }
}

/**
 * Grows its multiplier each hand that is not the run's most played hand
 * type; playing the most played type resets it.
 */
class Obelisk extends StatefulBehavior<ValueState> {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const counts = ctx.snapshot.handTypeCounts;
      const played = (counts[ctx.hand.handType] ?? 0) + 1;
      let most = 0;
      for (const [type, count] of Object.entries(counts)) {
        if (type !== ctx.hand.handType && count !== undefined) most = Math.max(most, count);
      }
      this.mutate(ctx, (s) => ({ value: played >= most ? 1 : round2(s.value + 0.2) }));
      return payoutEffect("xmult", this.current.value);
    },
  });

  constructor(identity: Identity) {
    super(identity, { schema: ValueState, version: 1, initial: { value: 1 } });
  }
}

/** Starts at ×2 and loses 0.01 per discarded card; eaten at ×1. */
class Ramen extends StatefulBehavior<ValueState> {
  override readonly gameplay = gameplay({
    hand: () => payoutEffect("xmult", this.current.value),
    discard: (ctx, cards) => {
      this.mutate(ctx, (s) => ({ value: round2(s.value - 0.01 * cards.length) }));
      if (this.current.value > 1) return IDENTITY_EFFECT;
      return ctx.mirrored ? IDENTITY_EFFECT : effect({ destroySelf: true, message: "Eaten!" });
    },
  });

  constructor(identity: Identity) {
    super(identity, { schema: ValueState, version: 1, initial: { value: 2 } });
  }
}

const SeltzerState = z.object({ handsLeft: z.number().int().min(0) });

/** Retriggers every scored card for a fixed number of hands. */
class Seltzer extends StatefulBehavior<z.infer<typeof SeltzerState>> {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      this.mutate(ctx, (s) => ({ handsLeft: Math.max(0, s.handsLeft - 1) }));
      if (ctx.mirrored || this.current.handsLeft > 0) return IDENTITY_EFFECT;
      return effect({ destroySelf: true, message: "Drank!" });
    },
    card: () => effect({ retriggers: 1 }),
  });

  constructor(identity: Identity) {
    super(identity, { schema: SeltzerState, version: 1, initial: { handsLeft: 10 } });
  }
}

const TurtleBeanState = z.object({ handSize: z.number().int().min(0) });

/** Extra hand size that shrinks by one every round. */
class TurtleBean extends StatefulBehavior<z.infer<typeof TurtleBeanState>> {
  override readonly modifiers: Modifiers = {
    rules: () => ({ handSize: this.current.handSize }),
  };
  override readonly lifecycle: Lifecycle = {
    onRoundEnd: (ctx) => {
      this.mutate(ctx, (s) => ({ handSize: Math.max(0, s.handSize - 1) }));
      return this.current.handSize === 0 ? effect({ destroySelf: true, message: "Eaten!" }) : IDENTITY_EFFECT;
    },
  };

  constructor(identity: Identity) {
    super(identity, { schema: TurtleBeanState, version: 1, initial: { handSize: 5 } });
  }
}

const YorickState = z.object({
  xmult: z.number().finite(),
  discardsLeft: z.number().int().min(1),
});

/** Gains ×1 every 23 cards discarded. */
class Yorick extends StatefulBehavior<z.infer<typeof YorickState>> {
  static readonly EVERY = 23;

  override readonly gameplay = gameplay({
    hand: () => payoutEffect("xmult", this.current.xmult),
    discard: (ctx, cards) => {
      this.mutate(ctx, (s) => {
        let { xmult, discardsLeft } = s;
        for (let i = 0; i < cards.length; i++) {
          discardsLeft--;
          if (discardsLeft === 0) {
            xmult += 1;
            discardsLeft = Yorick.EVERY;
          }
        }
        return { xmult, discardsLeft };
      });
      return IDENTITY_EFFECT;
    },
  });

  constructor(identity: Identity) {
    super(identity, {
      schema: YorickState,
      version: 1,
      initial: { xmult: 1, discardsLeft: Yorick.EVERY },
    });
  }
}

/** When a blind is selected, destroys a random other joker and gains ×0.5. */
class Madness extends StatefulBehavior<ValueState> {
  override readonly gameplay = gameplay({
    hand: () => payoutEffect("xmult", this.current.value),
  });
  override readonly lifecycle: Lifecycle = {
    onRunEvent: (event, ctx) => {
      if (event.kind !== "blind_selected" || ctx.snapshot.blind.kind === "boss") return IDENTITY_EFFECT;
      this.mutate(ctx, (s) => ({ value: s.value + 0.5 }));
      const victims = ctx.siblings.filter((s) => s.handle.slot !== ctx.self.slot);
      if (victims.length === 0) return IDENTITY_EFFECT;
      const victim = ctx.rng.pick(victims);
      return effect({ directives: [{ kind: "destroy_joker", slot: victim.handle.slot }] });
    },
  };

  constructor(identity: Identity) {
    super(identity, { schema: ValueState, version: 1, initial: { value: 1 } });
  }
}

/**
 * Gains ×0.1 per enhanced card scored and strips the enhancement. Only
 * the hand's first pass feeds it.
 */
class Vampire extends StatefulBehavior<ValueState> {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const enhanced = ctx.hand.scoring.filter((card) => card.enhancement !== undefined);
      if (enhanced.length > 0) {
        this.mutate(ctx, (s) => ({ value: round2(s.value + 0.1 * enhanced.length) }));
      }
      const payout = payoutEffect("xmult", this.current.value);
      if (ctx.mirrored || enhanced.length === 0) return payout;
      return effect({
        ...payout,
        transforms: enhanced.map((card) => ({
          kind: "set_enhancement" as const,
          cardId: card.id,
          enhancement: null,
        })),
      });
    },
  });

  constructor(identity: Identity) {
    super(identity, { schema: ValueState, version: 1, initial: { value: 1 } });
  }
}

/** +8 chips permanently for every scoring 2. */
class WeeJoker extends StatefulBehavior<ValueState> {
  override readonly gameplay = gameplay({
    hand: (ctx) => {
      const twos = ctx.hand.scoring.filter((card) => cardHasRank(card, ["2"])).length;
      if (twos > 0) this.mutate(ctx, (s) => ({ value: s.value + 8 * twos }));
      return payoutEffect("chips", this.current.value);
    },
  });

  constructor(identity: Identity) {
    super(identity, { schema: ValueState, version: 1, initial: { value: 0 } });
  }
}

const DaggerState = z.object({ mult: z.number().finite().min(0) });

/**
 * When a blind is selected, destroys the joker to its right and adds
 * double that joker's sell value to its mult.
 */
class CeremonialDagger extends StatefulBehavior<z.infer<typeof DaggerState>> {
  override readonly gameplay = gameplay({
    hand: () => payoutEffect("mult", this.current.mult),
  });
  override readonly lifecycle: Lifecycle = {
    onRunEvent: (event, ctx) => {
      if (event.kind !== "blind_selected") return IDENTITY_EFFECT;
      const index = ctx.selfIndex();
      const victim = index >= 0 ? ctx.siblings[index + 1] : undefined;
      if (victim === undefined) return IDENTITY_EFFECT;
      this.mutate(ctx, (s) => ({ mult: s.mult + 2 * victim.sellValue }));
      return effect({ directives: [{ kind: "destroy_joker", slot: victim.handle.slot }] });
    },
  };

  constructor(identity: Identity) {
    super(identity, { schema: DaggerState, version: 1, initial: { mult: 0 } });
  }
}

export const SCALING_JOKERS: readonly JokerDefinition[] = [
  ...counterJokers,
  defineJoker("raised_fist", (identity) => new RaisedFist(identity)),
  defineJoker("rocket", (identity) => new Rocket(identity)),
  defineJoker("obelisk", (identity) => new Obelisk(identity)),
  defineJoker("ramen", (identity) => new Ramen(identity)),
  defineJoker("seltzer", (identity) => new Seltzer(identity)),
  defineJoker("turtle_bean", (identity) => new TurtleBean(identity)),
  defineJoker("yorick", (identity) => new Yorick(identity)),
  defineJoker("madness", (identity) => new Madness(identity)),
  defineJoker("vampire", (identity) => new Vampire(identity)),
  defineJoker("wee_joker", (identity) => new WeeJoker(identity)),
  defineJoker("ceremonial_dagger", (identity) => new CeremonialDagger(identity)),
];
