export { defineJoker, defineParameterizedJoker, identityFrom, gameplay, type JokerDefinition, type GameplayHooks } from "./definition";
export { StaticBehavior, type StaticSpec, type StaticCondition } from "./static";
export { ConditionalBehavior, expression, allOf, anyOf, not, type ConditionalSpec, type Condition } from "./conditional";
export { AdvancedBehavior, StatefulBehavior } from "./advanced";
