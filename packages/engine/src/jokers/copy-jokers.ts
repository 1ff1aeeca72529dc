// ─── Copy Jokers ───────────────────────────────────────────────────
// Blueprint copies the joker to its right, Brainstorm the leftmost
// joker. A copy replays the target's gameplay hooks through a mirrored
// context, so the target's state is read but never advanced. Chains of
// copies stop once the replay depth reaches the number of jokers.

import type { Effect, PlayingCard } from "@jester/schema";
import { IDENTITY_EFFECT } from "../engine/effect";
import { AdvancedBehavior } from "../frameworks/advanced";
import { defineJoker, gameplay, type JokerDefinition } from "../frameworks/definition";
import type { Gameplay, ScoringContext, SiblingView } from "../types/behavior";

abstract class CopyBehavior extends AdvancedBehavior {
  protected abstract target(ctx: ScoringContext): SiblingView | undefined;

  override readonly gameplay = gameplay({
    hand: (ctx) => this.replay(ctx, (role, mirror) => role.onHandPlayed(mirror)),
    card: (ctx, card: PlayingCard) => this.replay(ctx, (role, mirror) => role.onCardScored(mirror, card)),
    discard: (ctx, cards) =>
      this.replay(ctx, (role, mirror) => (role.onDiscard ? role.onDiscard(mirror, cards) : IDENTITY_EFFECT)),
  });

  private replay(ctx: ScoringContext, call: (role: Gameplay, mirror: ScoringContext) => Effect): Effect {
    if (ctx.mirrorDepth >= ctx.siblings.length) return IDENTITY_EFFECT;
    const target = this.target(ctx);
    if (target === undefined || target.handle.slot === ctx.self.slot) return IDENTITY_EFFECT;
    if (!target.identity.copyable || target.gameplay === undefined) return IDENTITY_EFFECT;
    const copied = call(target.gameplay, ctx.mirror(target.handle));
    return copied.destroySelf ? { ...copied, destroySelf: false } : copied;
  }
}

class Blueprint extends CopyBehavior {
  protected target(ctx: ScoringContext): SiblingView | undefined {
    const index = ctx.selfIndex();
    return index < 0 ? undefined : ctx.siblings[index + 1];
  }
}

class Brainstorm extends CopyBehavior {
  protected target(ctx: ScoringContext): SiblingView | undefined {
    return ctx.siblings[0];
  }
}

export const COPY_JOKERS: readonly JokerDefinition[] = [
  defineJoker("blueprint", (identity) => new Blueprint(identity)),
  defineJoker("brainstorm", (identity) => new Brainstorm(identity)),
];
