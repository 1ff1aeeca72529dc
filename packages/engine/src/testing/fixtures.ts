// ─── Test Fixtures ─────────────────────────────────────────────────
// Builders for cards, snapshots and contexts shared by the engine's
// test files.

import type {
  CardInstanceId,
  Enhancement,
  InstanceHandle,
  JokerId,
  PlayingCard,
  Rank,
  Suit,
} from "@jester/schema";
import { DEFAULT_CONFIG, type EngineConfig } from "../config";
import { GameContext, buildHandView } from "../engine/context";
import { ConditionCache } from "../state/condition-cache";
import { BehaviorStateStore } from "../state/state-store";
import type { Identity, SiblingView } from "../types/behavior";
import {
  baseRules,
  resolveRules,
  type ResolvedRules,
  type RuleModifiers,
} from "../types/rules";
import { createRunSnapshot, type PlayedHand, type RunSnapshot } from "../types/snapshot";

let nextCardId = 0;

/** A catalog-free identity for behaviors built directly in tests. */
export function testIdentity(id: JokerId = "joker", overrides: Partial<Identity> = {}): Identity {
  return {
    id,
    name: id,
    description: "",
    rarity: "common",
    baseCost: 4,
    copyable: true,
    ...overrides,
  };
}

export function makeCardId(id: string): CardInstanceId {
  return id as CardInstanceId;
}

export function makeCard(
  rank: Rank,
  suit: Suit,
  extras: Partial<Omit<PlayingCard, "rank" | "suit">> = {}
): PlayingCard {
  nextCardId++;
  return { id: makeCardId(`${rank}${suit[0]}-${nextCardId}`), rank, suit, ...extras };
}

/** Parses "AS 10H KD" style shorthand into cards. */
export function cards(text: string, enhancement?: Enhancement): PlayingCard[] {
  const suits: Record<string, Suit> = { H: "hearts", D: "diamonds", C: "clubs", S: "spades" };
  return text
    .split(/\s+/)
    .filter((t) => t.length > 0)
    .map((token) => {
      const suit = suits[token.slice(-1)];
      const rank = RANK_LOOKUP.get(token.slice(0, -1));
      if (suit === undefined || rank === undefined) {
        throw new Error(`Bad card shorthand: ${token}`);
      }
      return makeCard(rank, suit, enhancement === undefined ? {} : { enhancement });
    });
}

/** One card from shorthand such as "QH". */
export function card(text: string, enhancement?: Enhancement): PlayingCard {
  const [parsed] = cards(text, enhancement);
  if (parsed === undefined) throw new Error(`Bad card shorthand: ${text}`);
  return parsed;
}

const RANK_LOOKUP = new Map<string, Rank>([
  ["2", "2"],
  ["3", "3"],
  ["4", "4"],
  ["5", "5"],
  ["6", "6"],
  ["7", "7"],
  ["8", "8"],
  ["9", "9"],
  ["10", "10"],
  ["J", "J"],
  ["Q", "Q"],
  ["K", "K"],
  ["A", "A"],
]);

export function testRules(modifiers: RuleModifiers = {}, config: EngineConfig = DEFAULT_CONFIG): ResolvedRules {
  const base = {
    baseHandSize: config.baseHandSize,
    baseDiscards: config.baseDiscards,
    baseHands: config.baseHands,
    jokerSlots: config.jokerSlots,
    consumableSlots: config.consumableSlots,
  };
  return Object.keys(modifiers).length === 0 ? baseRules(base) : resolveRules(base, [modifiers]);
}

export interface TestContextOptions {
  readonly snapshot?: Partial<RunSnapshot>;
  readonly hand?: PlayedHand;
  readonly siblings?: readonly SiblingView[];
  readonly rules?: RuleModifiers;
  readonly config?: EngineConfig;
  readonly self?: InstanceHandle;
  readonly card?: { readonly card: PlayingCard; readonly index: number; readonly retrigger?: number };
  readonly passTag?: string;
}

/** A context with the given hand classified and, optionally, a card bound. */
export function createTestContext(options: TestContextOptions = {}): GameContext {
  const config = options.config ?? DEFAULT_CONFIG;
  const snapshot = createRunSnapshot(options.snapshot);
  const rules = testRules(options.rules, config);
  const ctx = GameContext.create({
    snapshot,
    rules,
    config,
    siblings: options.siblings ?? [],
    store: new BehaviorStateStore(),
    cache: new ConditionCache(),
    passTag: options.passTag ?? "test",
    ...(options.hand ? { hand: buildHandView(options.hand, rules, snapshot) } : {}),
  });
  if (options.self) ctx.bindSelf(options.self);
  if (options.card) {
    ctx.bindCard(options.card.card, options.card.index, options.card.retrigger ?? 0);
  }
  return ctx;
}
