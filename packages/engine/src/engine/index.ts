export { ScoringPipeline, type PipelineEntry, type EngineIssue, type DispatchResult, type ProcessResult, type PipelineOptions, type LifecycleCall } from "./scoring-pipeline";
export { GameContext, buildHandView, scoringView, EMPTY_HAND, type ContextOptions } from "./context";
export { IDENTITY_EFFECT, effect, isIdentityEffect, combineEffects, accumulate, applyScore, applyToWallet, EffectAccumulator, type AppliedScore, type ScoreBase, type RejectedField, type NumericField } from "./effect";
export { classifyHand, handBase, type ClassifierRules } from "./hand-evaluator";
export { compileExpression, evaluateCondition, evaluateNumber, ExpressionError, type CompiledExpression, type EvalContext, type EvalResult } from "./expression-evaluator";
export { jokerEnvironment } from "./builtins";
export { SeededRng, createRng, deriveSeed } from "./prng";
export { cardHasSuit, cardHasRank, isFaceCard, rankChips } from "./card-utils";
