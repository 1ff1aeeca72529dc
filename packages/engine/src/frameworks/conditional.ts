// ─── Conditional Framework ─────────────────────────────────────────
// Declarative trigger/condition/effect rules over the expression
// language. Every expression is compiled once when the joker is built;
// a malformed rule fails construction, never the first hand.
//
// A rule fires on one trigger. When its condition holds, its counter
// updates are applied first (all read the pre-update counters), then its
// effect is computed against the updated counters. Mirrored calls skip
// the updates.

import { z } from "zod";
import type { ConsumableKind, Effect, PlayingCard } from "@jester/schema";
import { ConstructionError } from "../errors";
import { jokerEnvironment } from "../engine/builtins";
import { scoringView } from "../engine/context";
import { IDENTITY_EFFECT, combineEffects, effect } from "../engine/effect";
import {
  ExpressionError,
  compileExpression,
  evaluateCondition,
  evaluateNumber,
  type CompiledExpression,
  type EvalContext,
  type ExpressionEnvironment,
} from "../engine/expression-evaluator";
import { StateCell } from "../state/state-cell";
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

// ─── Rule Shapes ───────────────────────────────────────────────────

export type Trigger = "hand" | "card" | "discard" | "round_end";

/** A literal, or an expression evaluated when the rule fires. */
export type NumericValue = number | string;

/** Composable condition: an expression, or AND/OR/NOT over conditions. */
export type ConditionSpec =
  | string
  | { readonly allOf: readonly ConditionSpec[] }
  | { readonly anyOf: readonly ConditionSpec[] }
  | { readonly not: ConditionSpec };

export interface ConditionalEffectSpec {
  readonly chips?: NumericValue;
  readonly mult?: NumericValue;
  readonly xmult?: NumericValue;
  readonly money?: NumericValue;
  readonly interestBonus?: NumericValue;
  readonly retriggers?: NumericValue;
  readonly consumable?: ConsumableKind;
  readonly destroySelf?: boolean;
  readonly message?: string;
}

export interface ConditionalRuleSpec {
  readonly on: Trigger;
  /** Defaults to always. */
  readonly when?: ConditionSpec;
  /** New counter values, as expressions over `self.<counter>`. */
  readonly update?: Readonly<Record<string, string>>;
  readonly effect?: ConditionalEffectSpec;
}

export interface ConditionalSpec {
  /** Counter names and their initial values. */
  readonly counters?: Readonly<Record<string, number>>;
  readonly rules: readonly ConditionalRuleSpec[];
  readonly modifiers?: RuleModifiers;
}

// ─── Compiled Conditions ───────────────────────────────────────────

export type Condition = (context: EvalContext) => boolean;

export function expression(compiled: CompiledExpression): Condition {
  return (context) => evaluateCondition(compiled, context);
}

export function allOf(...conditions: readonly Condition[]): Condition {
  return (context) => conditions.every((c) => c(context));
}

export function anyOf(...conditions: readonly Condition[]): Condition {
  return (context) => conditions.some((c) => c(context));
}

export function not(condition: Condition): Condition {
  return (context) => !condition(context);
}

const ALWAYS: Condition = () => true;

function compileCondition(spec: ConditionSpec, env: ExpressionEnvironment): Condition {
  if (typeof spec === "string") return expression(compileExpression(spec, env));
  if ("allOf" in spec) return allOf(...spec.allOf.map((s) => compileCondition(s, env)));
  if ("anyOf" in spec) return anyOf(...spec.anyOf.map((s) => compileCondition(s, env)));
  return not(compileCondition(spec.not, env));
}

type CompiledValue = number | CompiledExpression;

function compileValue(value: NumericValue | undefined, env: ExpressionEnvironment): CompiledValue | undefined {
  if (value === undefined || typeof value === "number") return value;
  return compileExpression(value, env);
}

function resolveValue(value: CompiledValue | undefined, fallback: number, context: EvalContext): number {
  if (value === undefined) return fallback;
  if (typeof value === "number") return value;
  return evaluateNumber(value, context);
}

interface CompiledRule {
  readonly on: Trigger;
  readonly when: Condition;
  readonly updates: readonly (readonly [string, CompiledExpression])[];
  readonly chips?: CompiledValue;
  readonly mult?: CompiledValue;
  readonly xmult?: CompiledValue;
  readonly money?: CompiledValue;
  readonly interestBonus?: CompiledValue;
  readonly retriggers?: CompiledValue;
  readonly consumable?: ConsumableKind;
  readonly destroySelf: boolean;
  readonly message?: string;
}

function compileRule(
  rule: ConditionalRuleSpec,
  env: ExpressionEnvironment,
  counters: readonly string[]
): CompiledRule {
  const updates = Object.entries(rule.update ?? {}).map(([name, source]) => {
    if (!counters.includes(name)) {
      throw new ExpressionError(`Update of undeclared counter '${name}'`);
    }
    return [name, compileExpression(source, env)] as const;
  });
  const fx = rule.effect ?? {};
  const compiled: CompiledRule = {
    on: rule.on,
    when: rule.when === undefined ? ALWAYS : compileCondition(rule.when, env),
    updates,
    chips: compileValue(fx.chips, env),
    mult: compileValue(fx.mult, env),
    xmult: compileValue(fx.xmult, env),
    money: compileValue(fx.money, env),
    interestBonus: compileValue(fx.interestBonus, env),
    retriggers: compileValue(fx.retriggers, env),
    destroySelf: fx.destroySelf ?? false,
    ...(fx.consumable !== undefined ? { consumable: fx.consumable } : {}),
    ...(fx.message !== undefined ? { message: fx.message } : {}),
  };
  return compiled;
}

// ─── Behavior ──────────────────────────────────────────────────────

type Counters = Record<string, number>;

const CountersSchema = z.record(z.string(), z.number().finite());

export class ConditionalBehavior implements Behavior {
  readonly gameplay?: Gameplay;
  readonly lifecycle?: Lifecycle;
  readonly modifiers?: Modifiers;
  readonly state?: Stateful;
  private readonly rules: readonly CompiledRule[];
  private readonly cell: StateCell<Counters>;

  /**
   * @throws {ConstructionError} with reason `invalid_definition` when a
   * rule does not compile.
   */
  constructor(
    readonly identity: Identity,
    spec: ConditionalSpec
  ) {
    const initial: Counters = { ...(spec.counters ?? {}) };
    const names = Object.keys(initial);
    const env = jokerEnvironment(names);
    try {
      this.rules = spec.rules.map((rule) => compileRule(rule, env, names));
    } catch (err) {
      if (err instanceof ExpressionError) {
        throw new ConstructionError(
          `Invalid rule for ${identity.id}: ${err.message}`,
          "invalid_definition",
          identity.id
        );
      }
      throw err;
    }

    this.cell = new StateCell<Counters>({
      schema: CountersSchema.superRefine((value, ctx) => {
        for (const name of names) {
          if (value[name] === undefined) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: "missing counter", path: [name] });
          }
        }
      }),
      version: 1,
      initial,
    });

    const triggers = new Set(this.rules.map((r) => r.on));
    if (triggers.has("hand") || triggers.has("card") || triggers.has("discard")) {
      this.gameplay = {
        onHandPlayed: (ctx) => this.fire("hand", ctx),
        onCardScored: (ctx) => this.fire("card", ctx),
        ...(triggers.has("discard")
          ? { onDiscard: (ctx: ScoringContext) => this.fire("discard", ctx) }
          : {}),
      };
    }
    if (triggers.has("round_end")) {
      this.lifecycle = {
        onRoundEnd: (ctx: RunContext) => this.fire("round_end", scoringView(ctx)),
      };
    }
    const rulesPatch = spec.modifiers;
    if (rulesPatch !== undefined) {
      this.modifiers = { rules: () => rulesPatch };
    }
    if (names.length > 0) {
      const cell = this.cell;
      this.state = {
        stateVersion: cell.version,
        serializeState: () => cell.serialize(),
        deserializeState: (raw, version) => cell.deserialize(raw, version),
      };
    }
  }

  /** Current counter values. */
  get counters(): Readonly<Counters> {
    return this.cell.get();
  }

  private fire(trigger: Trigger, game: ScoringContext): Effect {
    let total = IDENTITY_EFFECT;
    for (const rule of this.rules) {
      if (rule.on !== trigger) continue;
      const before: EvalContext = { game, counters: this.cell.get() };
      if (!rule.when(before)) continue;

      let context = before;
      if (rule.updates.length > 0 && !game.mirrored) {
        const next: Counters = { ...before.counters };
        for (const [name, compiled] of rule.updates) {
          next[name] = evaluateNumber(compiled, before);
        }
        this.cell.set(next);
        context = { game, counters: next };
      }
      total = combineEffects(total, this.payout(rule, context, game.mirrored));
    }
    return total;
  }

  private payout(rule: CompiledRule, context: EvalContext, mirrored: boolean): Effect {
    return effect({
      chips: resolveValue(rule.chips, 0, context),
      mult: resolveValue(rule.mult, 0, context),
      multMultiplier: resolveValue(rule.xmult, 1, context),
      money: resolveValue(rule.money, 0, context),
      interestBonus: resolveValue(rule.interestBonus, 0, context),
      retriggers: resolveValue(rule.retriggers, 0, context),
      destroySelf: rule.destroySelf && !mirrored,
      consumables: rule.consumable !== undefined ? [{ kind: rule.consumable }] : [],
      ...(rule.message !== undefined ? { message: rule.message } : {}),
    });
  }
}
