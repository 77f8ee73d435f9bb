export { BoundedTypesRemover } from "./boundedTypesRemover.js";
export { ConditionalEffectsRemover, conditionalEffectVariants } from "./conditionalEffectsRemover.js";
export { DisjunctiveConditionsRemover, FAKE_GOAL_NAME } from "./disjunctiveConditionsRemover.js";
export {
  Grounder,
  GrounderHelper,
  type GroundedAction,
  type GrounderHelperOptions,
  type GrounderOptions,
  type GroundingActionsMap,
} from "./grounder.js";
export {
  InterpretedFunctionsRemover,
  UNKNOWN_DURATION_BOUNDS,
  type InterpretedFunctionsRemoverOptions,
} from "./interpretedFunctionsRemover.js";
export { MAConditionalEffectsRemover } from "./maConditionalEffectsRemover.js";
export { MAQuantifiersRemover } from "./maQuantifiersRemover.js";
export { NegativeConditionsRemover, NegativeFluentRemover } from "./negativeConditionsRemover.js";
export { QuantifierExpander, QuantifiersRemover } from "./quantifiersRemover.js";
export { StateInvariantsRemover } from "./stateInvariantsRemover.js";
export { TimedToSequential } from "./timedToSequential.js";
export { TrajectoryConstraintsRemover } from "./trajectoryConstraintsRemover.js";
export { UsertypeFluentsRemover, UsertypeFluentsRewriter } from "./usertypeFluentsRemover.js";
export {
  addInvariantToProblem,
  checkAndSimplifyConditions,
  checkAndSimplifyPreconditions,
  fluentsSubstituter,
  getFreshName,
  liftActionInstance,
  mapActionExpressions,
  redeclareProblem,
  replaceAction,
  replaceAgentAction,
  rewriteQualityMetrics,
  updatedMinimizeActionCosts,
  type FluentReplacement,
  type LiftedAction,
  type NameSource,
  type SimplifiedConditions,
} from "./utils.js";
