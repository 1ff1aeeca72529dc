// ─── Conditional Jokers ────────────────────────────────────────────
// Jokers written as trigger/condition/effect rules in the expression
// language. Jokers with counters accept `{ counters: { name: value } }`
// as construction arguments to start from a value other than the
// default.

import { z } from "zod";
import type { JokerId } from "@jester/schema";
import { ConditionalBehavior, type ConditionalSpec } from "../frameworks/conditional";
import {
  defineJoker,
  defineParameterizedJoker,
  type JokerDefinition,
} from "../frameworks/definition";

export const CONDITIONAL_JOKERS: readonly JokerDefinition[] = [
  // ── Run state ──
  conditionalJoker("banner", {
    rules: [{ on: "hand", effect: { chips: "discards_remaining * 30" } }],
  }),
  conditionalJoker("mystic_summit", {
    rules: [{ on: "hand", when: "discards_remaining == 0", effect: { mult: 15 } }],
  }),
  conditionalJoker("abstract_joker", {
    rules: [{ on: "hand", effect: { mult: "joker_count * 3" } }],
  }),
  conditionalJoker("blue_joker", {
    rules: [{ on: "hand", effect: { chips: "deck_remaining * 2" } }],
  }),
  conditionalJoker("erosion", {
    rules: [{ on: "hand", effect: { mult: "max(0, starting_deck_size - deck_size) * 4" } }],
  }),
  conditionalJoker("stone_joker", {
    rules: [{ on: "hand", effect: { chips: "count_enhancement('full_deck', 'stone') * 25" } }],
  }),
  conditionalJoker("bull", {
    rules: [{ on: "hand", effect: { chips: "max(0, money) * 2" } }],
  }),
  conditionalJoker("bootstraps", {
    rules: [{ on: "hand", effect: { mult: "floor(max(0, money) / 5) * 2" } }],
  }),
  conditionalJoker("baseball_card", {
    rules: [{ on: "hand", effect: { xmult: "pow(1.5, count_rarity('uncommon'))" } }],
  }),
  conditionalJoker("acrobat", {
    rules: [{ on: "hand", when: "hands_remaining == 0", effect: { xmult: 3 } }],
  }),
  conditionalJoker("misprint", {
    rules: [{ on: "hand", effect: { mult: "random_int(0, 23)" } }],
  }),

  // ── Hand composition ──
  conditionalJoker("supernova", {
    rules: [{ on: "hand", effect: { mult: "hand_times_played + 1" } }],
  }),
  conditionalJoker("card_sharp", {
    rules: [{ on: "hand", when: "played_this_round(hand_type)", effect: { xmult: 3 } }],
  }),
  conditionalJoker("superposition", {
    rules: [
      {
        on: "hand",
        when: { allOf: ["contains('straight')", "count_rank('scoring', 'A') > 0"] },
        effect: { consumable: "tarot" },
      },
    ],
  }),
  conditionalJoker("seance", {
    rules: [{ on: "hand", when: "hand_type == 'straight_flush'", effect: { consumable: "spectral" } }],
  }),
  conditionalJoker("vagabond", {
    rules: [{ on: "hand", when: "money <= 4", effect: { consumable: "tarot" } }],
  }),

  // ── Held cards ──
  conditionalJoker("shoot_the_moon", {
    rules: [{ on: "hand", effect: { mult: "count_rank('held', 'Q') * 13 * held_triggers" } }],
  }),
  conditionalJoker("baron", {
    rules: [{ on: "hand", effect: { xmult: "pow(1.5, count_rank('held', 'K') * held_triggers)" } }],
  }),

  // ── Scored cards ──
  conditionalJoker("eight_ball", {
    rules: [
      {
        on: "card",
        when: { allOf: ["rank_in(8)", "chance(1, 4)"] },
        effect: { consumable: "tarot" },
      },
    ],
  }),
  conditionalJoker("business_card", {
    rules: [{ on: "card", when: "is_face() && chance(1, 2)", effect: { money: 2 } }],
  }),
  conditionalJoker("golden_ticket", {
    rules: [{ on: "card", when: "card_enhancement == 'gold'", effect: { money: 4 } }],
  }),
  conditionalJoker("bloodstone", {
    rules: [{ on: "card", when: "suit_is('hearts') && chance(1, 2)", effect: { xmult: 1.5 } }],
  }),
  conditionalJoker("hanging_chad", {
    rules: [{ on: "card", when: "card_index == 0", effect: { retriggers: 2 } }],
  }),
  conditionalJoker("dusk", {
    rules: [{ on: "card", when: "hands_remaining == 0", effect: { retriggers: 1 } }],
  }),
  conditionalJoker("sock_and_buskin", {
    rules: [{ on: "card", when: "is_face()", effect: { retriggers: 1 } }],
  }),

  // ── Discards ──
  conditionalJoker("faceless_joker", {
    rules: [{ on: "discard", when: "count_face('played') >= 3", effect: { money: 5 } }],
  }),

  // ── Round end ──
  conditionalJoker("golden_joker", {
    rules: [{ on: "round_end", effect: { money: 4 } }],
  }),
  conditionalJoker("delayed_gratification", {
    rules: [
      { on: "round_end", when: "discards_used == 0", effect: { money: "discards_remaining * 2" } },
    ],
  }),
  conditionalJoker("cloud_9", {
    rules: [{ on: "round_end", effect: { money: "count_rank('full_deck', 9)" } }],
  }),
  conditionalJoker("to_the_moon", {
    rules: [{ on: "round_end", effect: { interestBonus: "floor(max(0, money) / 5)" } }],
  }),

  // ── Scaling ──
  conditionalJoker("ride_the_bus", {
    counters: { streak: 0 },
    rules: [
      {
        on: "hand",
        update: { streak: "if(count_face('scoring') > 0, 0, self.streak + 1)" },
        effect: { mult: "self.streak" },
      },
    ],
  }),
  conditionalJoker("runner", {
    counters: { chips: 0 },
    rules: [
      { on: "hand", when: "contains('straight')", update: { chips: "self.chips + 15" } },
      { on: "hand", effect: { chips: "self.chips" } },
    ],
  }),
  conditionalJoker("square_joker", {
    counters: { chips: 0 },
    rules: [
      { on: "hand", when: "played_count == 4", update: { chips: "self.chips + 4" } },
      { on: "hand", effect: { chips: "self.chips" } },
    ],
  }),
  conditionalJoker("spare_trousers", {
    counters: { mult: 0 },
    rules: [
      { on: "hand", when: "contains('two_pair')", update: { mult: "self.mult + 2" } },
      { on: "hand", effect: { mult: "self.mult" } },
    ],
  }),
  conditionalJoker("green_joker", {
    counters: { mult: 0 },
    rules: [
      { on: "hand", update: { mult: "self.mult + 1" }, effect: { mult: "self.mult" } },
      { on: "discard", update: { mult: "max(0, self.mult - 1)" } },
    ],
  }),
  conditionalJoker("loyalty_card", {
    counters: { remaining: 6 },
    rules: [
      { on: "hand", update: { remaining: "if(self.remaining == 0, 5, self.remaining - 1)" } },
      { on: "hand", when: "self.remaining == 0", effect: { xmult: 4 } },
    ],
  }),
  conditionalJoker("lucky_cat", {
    counters: { gain: 0 },
    rules: [
      {
        on: "card",
        when: "card_enhancement == 'lucky' && chance(1, 5)",
        update: { gain: "self.gain + 0.25" },
      },
      { on: "hand", effect: { xmult: "1 + self.gain" } },
    ],
  }),
];

function conditionalJoker(id: JokerId, spec: ConditionalSpec): JokerDefinition {
  const defaults = spec.counters;
  if (defaults === undefined) {
    return defineJoker(id, (identity) => new ConditionalBehavior(identity, spec));
  }
  const names = Object.keys(defaults);
  const schema = z
    .object({
      counters: z
        .record(z.string(), z.number().finite())
        .refine((value) => Object.keys(value).every((name) => names.includes(name)), {
          message: `counters must be among: ${names.join(", ")}`,
        })
        .default({}),
    })
    .strict()
    .default({});
  return defineParameterizedJoker(id, schema, (identity, args) =>
    new ConditionalBehavior(identity, { ...spec, counters: { ...defaults, ...args.counters } })
  );
}
