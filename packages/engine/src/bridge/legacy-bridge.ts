// ─── Legacy Bridge ─────────────────────────────────────────────────
// Presents a LegacyJoker through the capability roles. Every hook
// forwards to the matching legacy method and returns its result object
// unchanged; a role is present only when the legacy joker implements
// at least one method behind it.

import type { JokerId, JsonValue, PlayingCard } from "@jester/schema";
import { IDENTITY_EFFECT } from "../engine/effect";
import { defineJoker, type JokerDefinition } from "../frameworks/definition";
import { StateDeserializeError, UnsupportedVersionError } from "../errors";
import type {
  Behavior,
  Gameplay,
  Identity,
  Lifecycle,
  Modifiers,
  RunContext,
  ScoringContext,
  Stateful,
} from "../types/behavior";
import type { RuleModifiers } from "../types/rules";
import type { LegacyJoker } from "./legacy-joker";

/** Identity read off the legacy joker's own display fields. */
export function legacyIdentity(legacy: LegacyJoker): Identity {
  return Object.freeze({
    id: legacy.id,
    name: legacy.name,
    description: legacy.description,
    rarity: legacy.rarity,
    baseCost: legacy.cost,
    copyable: legacy.onHandPlayed !== undefined || legacy.onCardScored !== undefined,
  });
}

export class LegacyBridge implements Behavior {
  readonly identity: Identity;
  readonly gameplay?: Gameplay;
  readonly lifecycle?: Lifecycle;
  readonly modifiers?: Modifiers;
  readonly state?: Stateful;

  constructor(
    readonly legacy: LegacyJoker,
    identity: Identity = legacyIdentity(legacy)
  ) {
    this.identity = identity;

    if (legacy.onHandPlayed || legacy.onCardScored || legacy.onDiscard) {
      this.gameplay = {
        onHandPlayed: (ctx) => (legacy.onHandPlayed ? legacy.onHandPlayed(ctx) : IDENTITY_EFFECT),
        onCardScored: (ctx, card) => (legacy.onCardScored ? legacy.onCardScored(ctx, card) : IDENTITY_EFFECT),
        ...(legacy.onDiscard
          ? {
              onDiscard: (ctx: ScoringContext, cards: readonly PlayingCard[]) =>
                legacy.onDiscard ? legacy.onDiscard(ctx, cards) : IDENTITY_EFFECT,
            }
          : {}),
      } satisfies Gameplay;
    }

    const lifecycle: Lifecycle = {
      ...(legacy.onCreated ? { onAcquire: (ctx: RunContext) => legacy.onCreated?.(ctx) } : {}),
      ...(legacy.onBlindStart
        ? { onRoundStart: (ctx: RunContext) => (legacy.onBlindStart ? legacy.onBlindStart(ctx) : IDENTITY_EFFECT) }
        : {}),
      ...(legacy.onRoundEnd
        ? { onRoundEnd: (ctx: RunContext) => (legacy.onRoundEnd ? legacy.onRoundEnd(ctx) : IDENTITY_EFFECT) }
        : {}),
      ...(legacy.onSell
        ? { onSell: (ctx: RunContext) => (legacy.onSell ? legacy.onSell(ctx) : IDENTITY_EFFECT) }
        : {}),
    } satisfies Lifecycle;
    if (Object.keys(lifecycle).length > 0) this.lifecycle = lifecycle;

    if (legacy.modifyHandSize || legacy.modifyDiscards) {
      this.modifiers = {
        rules: (): RuleModifiers => ({
          ...(legacy.modifyHandSize ? { handSize: legacy.modifyHandSize() } : {}),
          ...(legacy.modifyDiscards ? { discards: legacy.modifyDiscards() } : {}),
        }),
      };
    }

    const { saveState, loadState } = legacy;
    if (saveState && loadState) {
      const version = legacy.stateVersion ?? 0;
      this.state = {
        stateVersion: version,
        serializeState: (): JsonValue => saveState.call(legacy),
        deserializeState: (raw, found) => {
          if (!Number.isInteger(found) || found < 0) {
            throw new StateDeserializeError(`Invalid state version: ${found}`);
          }
          if (found > version) throw new UnsupportedVersionError(found, version);
          loadState.call(legacy, raw, found);
        },
      };
    }
  }
}

/** Registers a legacy joker; the factory supplies the catalog identity. */
export function defineLegacyJoker(id: JokerId, create: () => LegacyJoker): JokerDefinition {
  return defineJoker(id, (identity) => new LegacyBridge(create(), identity));
}
