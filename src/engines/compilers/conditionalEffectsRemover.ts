import { ProblemDefinitionError } from "../../errors.js";
import type { Action, DurativeAction, InstantaneousAction } from "../../model/action.js";
import { Effect } from "../../model/effect.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import type { Timing } from "../../model/timing.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import {
  checkAndSimplifyConditions,
  checkAndSimplifyPreconditions,
  getFreshName,
  powerset,
  replaceAction,
  rewriteQualityMetrics,
} from "./utils.js";

function instantaneousVariants(action: InstantaneousAction): InstantaneousAction[] {
  const environment = action.environment;
  const em = environment.expressions;
  const conditional = action.conditionalEffects;
  const variants: InstantaneousAction[] = [];
  for (const subset of powerset(conditional.length)) {
    const variant = action.clone();
    variant.clearEffects();
    action.unconditionalEffects.forEach((effect) => variant.addEffectInstance(effect));
    let consistent = true;
    conditional.forEach((effect, index) => {
      if (!subset.includes(index)) {
        variant.addPrecondition(em.not(effect.condition));
        return;
      }
      variant.addPrecondition(effect.condition);
      if (!variant.tryAddEffect(effect.with({ condition: em.trueExp() })).ok) {
        consistent = false;
      }
    });
    if (!consistent || variant.effects.length === 0) {
      continue;
    }
    const simplified = checkAndSimplifyPreconditions(environment, variant, environment.simplifier);
    if (!simplified.feasible) {
      continue;
    }
    variant.setPreconditions(simplified.conditions);
    variants.push(variant);
  }
  return variants;
}

function durativeVariants(action: DurativeAction): DurativeAction[] {
  const environment = action.environment;
  const em = environment.expressions;
  const conditional: { timing: Timing; effect: Effect }[] = action.effects.flatMap(({ timing, effects }) =>
    effects.filter((effect) => effect.isConditional()).map((effect) => ({ timing, effect })),
  );
  const variants: DurativeAction[] = [];
  for (const subset of powerset(conditional.length)) {
    const variant = action.clone();
    variant.clearEffects();
    for (const { timing, effects } of action.effects) {
      effects.filter((effect) => !effect.isConditional()).forEach((effect) => variant.addEffectInstance(timing, effect));
    }
    let consistent = true;
    conditional.forEach(({ timing, effect }, index) => {
      if (!subset.includes(index)) {
        variant.addCondition(timing, em.not(effect.condition));
        return;
      }
      variant.addCondition(timing, effect.condition);
      if (!variant.tryAddEffect(timing, effect.with({ condition: em.trueExp() })).ok) {
        consistent = false;
      }
    });
    if (!consistent || variant.allEffects.length === 0) {
      continue;
    }
    const simplified = checkAndSimplifyConditions(environment, variant, environment.simplifier);
    if (!simplified.feasible) {
      continue;
    }
    variant.clearConditions();
    simplified.conditions.forEach(({ interval, condition }) => variant.addCondition(interval, condition));
    variants.push(variant);
  }
  return variants;
}

/**
 * One variant of {@link action} per subset of its conditional effects: the
 * conditions of the chosen effects become preconditions, the negations of
 * the others too, and the chosen effects become unconditional. Variants with
 * conflicting or no effects, or with contradictory preconditions, are
 * discarded. Variants keep the name of {@link action}.
 */
export function conditionalEffectVariants(action: Action): Action[] {
  if (!action.isConditional()) {
    return [action.clone()];
  }
  return action.kind === "instantaneous" ? instantaneousVariants(action) : durativeVariants(action);
}

/**
 * Compiles conditional effects away by enumerating, for every action, the
 * subsets of its conditional effects that fire.
 */
export class ConditionalEffectsRemover extends Compiler {
  readonly name = "cerm";

  constructor(options: CompilerOptions = {}) {
    super("CONDITIONAL_EFFECTS_REMOVING", options);
  }

  supportedKind(): ProblemKind {
    return new ProblemKind([
      "ACTION_BASED",
      "FLAT_TYPING",
      "HIERARCHICAL_TYPING",
      "CONTINUOUS_NUMBERS",
      "DISCRETE_NUMBERS",
      "BOUNDED_TYPES",
      "NUMERIC_FLUENTS",
      "OBJECT_FLUENTS",
      "NEGATIVE_CONDITIONS",
      "DISJUNCTIVE_CONDITIONS",
      "EQUALITIES",
      "EXISTENTIAL_CONDITIONS",
      "UNIVERSAL_CONDITIONS",
      "CONDITIONAL_EFFECTS",
      "INCREASE_EFFECTS",
      "DECREASE_EFFECTS",
      "FLUENTS_IN_BOOLEAN_ASSIGNMENTS",
      "FLUENTS_IN_NUMERIC_ASSIGNMENTS",
      "FLUENTS_IN_OBJECT_ASSIGNMENTS",
      "CONTINUOUS_TIME",
      "INTERMEDIATE_CONDITIONS_AND_EFFECTS",
      "TIMED_EFFECTS",
      "TIMED_GOALS",
      "DURATION_INEQUALITIES",
      "STATIC_FLUENTS_IN_DURATIONS",
      "FLUENTS_IN_DURATIONS",
      "ACTIONS_COST",
      "STATIC_FLUENTS_IN_ACTIONS_COST",
      "FLUENTS_IN_ACTIONS_COST",
      "PLAN_LENGTH",
      "OVERSUBSCRIPTION",
      "TEMPORAL_OVERSUBSCRIPTION",
      "MAKESPAN",
      "FINAL_VALUE",
      "STATE_INVARIANTS",
    ]);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "CONDITIONAL_EFFECTS_REMOVING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    if (kind.has("CONDITIONAL_EFFECTS")) {
      kind.set("NEGATIVE_CONDITIONS");
      // Conditional timed effects read the fluent they assign.
      if (kind.has("TIMED_EFFECTS")) {
        kind.set("FLUENTS_IN_BOOLEAN_ASSIGNMENTS");
      }
    }
    return kind.unset("CONDITIONAL_EFFECTS");
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const environment = problem.environment;
    const em = environment.expressions;

    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;
    compiled.clearTimedEffects();
    compiled.clearActions();
    compiled.clearQualityMetrics();

    for (const { timing, effects } of problem.timedEffects) {
      for (const effect of effects) {
        if (!effect.isConditional()) {
          compiled.addTimedEffectInstance(timing, effect);
          continue;
        }
        if (effect.fluent.type.kind !== "bool") {
          throw new ProblemDefinitionError(
            `The condition of effect: ${effect.toString()} could not be removed without changing the problem.`,
            { effect: effect.toString() },
          );
        }
        const { condition, value, fluent } = effect;
        const merged = environment.simplifier.simplify(
          em.or(em.and(condition, value), em.and(em.not(condition), fluent)),
        );
        compiled.addTimedEffectInstance(timing, new Effect(fluent, merged, em.trueExp(), effect.kind));
      }
    }

    const newToOld = new Map<Action, Action>();
    const register = (variant: Action, original: Action, name: string): void => {
      const named = variant.clone(name);
      compiled.addAction(named);
      newToOld.set(named, original);
    };
    for (const action of problem.actions.filter((candidate) => !candidate.isConditional())) {
      register(action, action, action.name);
    }
    for (const action of problem.actions.filter((candidate) => candidate.isConditional())) {
      for (const variant of conditionalEffectVariants(action)) {
        register(variant, action, getFreshName(compiled, action.name));
      }
    }

    rewriteQualityMetrics(problem.qualityMetrics, newToOld).forEach((metric) => compiled.addQualityMetric(metric));

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }
}
