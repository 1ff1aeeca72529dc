// ─── Joker Identity ────────────────────────────────────────────────
// The identifier of every joker kind, plus the display metadata the
// registry and the shop read. Identifiers are persisted in saves, so
// existing literals must never be renamed or removed.

export const JOKER_IDS = [
  // common
  "joker",
  "greedy_joker",
  "lusty_joker",
  "wrathful_joker",
  "gluttonous_joker",
  "jolly_joker",
  "zany_joker",
  "mad_joker",
  "crazy_joker",
  "droll_joker",
  "sly_joker",
  "wily_joker",
  "clever_joker",
  "devious_joker",
  "crafty_joker",
  "half_joker",
  "credit_card",
  "banner",
  "mystic_summit",
  "eight_ball",
  "misprint",
  "raised_fist",
  "chaos_the_clown",
  "scary_face",
  "abstract_joker",
  "delayed_gratification",
  "gros_michel",
  "even_steven",
  "odd_todd",
  "scholar",
  "business_card",
  "supernova",
  "ride_the_bus",
  "egg",
  "runner",
  "ice_cream",
  "splash",
  "blue_joker",
  "faceless_joker",
  "green_joker",
  "superposition",
  "to_do_list",
  "cavendish",
  "red_card",
  "square_joker",
  "riff_raff",
  "photograph",
  "reserved_parking",
  "mail_in_rebate",
  "hallucination",
  "fortune_teller",
  "juggler",
  "drunkard",
  "golden_joker",
  "popcorn",
  "walkie_talkie",
  "smiley_face",
  "golden_ticket",
  "swashbuckler",
  "hanging_chad",
  "shoot_the_moon",
  // uncommon
  "joker_stencil",
  "four_fingers",
  "mime",
  "ceremonial_dagger",
  "marble_joker",
  "loyalty_card",
  "dusk",
  "fibonacci",
  "steel_joker",
  "hack",
  "pareidolia",
  "space_joker",
  "burglar",
  "blackboard",
  "sixth_sense",
  "constellation",
  "hiker",
  "card_sharp",
  "madness",
  "seance",
  "vampire",
  "shortcut",
  "hologram",
  "cloud_9",
  "rocket",
  "midas_mask",
  "luchador",
  "gift_card",
  "turtle_bean",
  "erosion",
  "to_the_moon",
  "stone_joker",
  "lucky_cat",
  "bull",
  "diet_cola",
  "trading_card",
  "flash_card",
  "spare_trousers",
  "ramen",
  "seltzer",
  "castle",
  "mr_bones",
  "acrobat",
  "sock_and_buskin",
  "troubadour",
  "certificate",
  "smeared_joker",
  "throwback",
  "rough_gem",
  "bloodstone",
  "arrowhead",
  "onyx_agate",
  "glass_joker",
  "showman",
  "flower_pot",
  "merry_andy",
  "oops_all_6s",
  "the_idol",
  "seeing_double",
  "matador",
  "satellite",
  "cartomancer",
  "astronomer",
  "bootstraps",
  // rare
  "dna",
  "vagabond",
  "baron",
  "obelisk",
  "baseball_card",
  "ancient_joker",
  "campfire",
  "blueprint",
  "wee_joker",
  "hit_the_road",
  "the_duo",
  "the_trio",
  "the_family",
  "the_order",
  "the_tribe",
  "stuntman",
  "invisible_joker",
  "brainstorm",
  "drivers_license",
  "burnt_joker",
  // legendary
  "canio",
  "triboulet",
  "yorick",
  "chicot",
  "perkeo",
] as const;

export type JokerId = (typeof JOKER_IDS)[number];

export type Rarity = "common" | "uncommon" | "rare" | "legendary";

export const RARITIES: readonly Rarity[] = [
  "common",
  "uncommon",
  "rare",
  "legendary",
];

/**
 * When a joker may appear in the shop. Discriminated on `kind`.
 * Legendaries are `never_in_shop`: only spectral cards create them.
 */
export type UnlockCondition =
  | { readonly kind: "always" }
  | { readonly kind: "min_ante"; readonly ante: number }
  | { readonly kind: "run_flag"; readonly flag: string }
  | { readonly kind: "never_in_shop" };

/** Display and shop metadata for one joker kind. */
export interface JokerMetadata {
  readonly id: JokerId;
  readonly name: string;
  readonly description: string;
  readonly rarity: Rarity;
  /** Shop price before discounts. */
  readonly cost: number;
  readonly unlock: UnlockCondition;
  /** Whether Blueprint and Brainstorm can mirror this joker's scoring. */
  readonly copyable: boolean;
}

/**
 * Handle to one joker instance inside a run. Slots are run-local and
 * never reused, so two copies of the same joker stay distinguishable.
 */
export interface InstanceHandle {
  readonly id: JokerId;
  readonly slot: number;
}
