import type { JokerDefinition } from "../frameworks/definition";
import { CONDITIONAL_JOKERS } from "./conditional-jokers";
import { COPY_JOKERS } from "./copy-jokers";
import { DECK_JOKERS } from "./deck-jokers";
import { EVENT_JOKERS } from "./event-jokers";
import { LEGACY_JOKERS } from "./legacy-jokers";
import { ROTATING_JOKERS } from "./rotating-jokers";
import { SCALING_JOKERS } from "./scaling-jokers";
import { STATIC_JOKERS } from "./static-jokers";

/** Every joker definition, one per identifier. */
export const ALL_DEFINITIONS: readonly JokerDefinition[] = [
  ...STATIC_JOKERS,
  ...CONDITIONAL_JOKERS,
  ...SCALING_JOKERS,
  ...ROTATING_JOKERS,
  ...DECK_JOKERS,
  ...COPY_JOKERS,
  ...EVENT_JOKERS,
  ...LEGACY_JOKERS,
];
