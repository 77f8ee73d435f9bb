import type { Action } from "../../model/action.js";
import type { ObjectSource } from "../../model/domain.js";
import type { Effect } from "../../model/effect.js";
import type { FNode } from "../../model/fnode.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import { QuantifiersRemover as ExpressionQuantifiersRemover } from "../../model/walkers/quantifiersRemover.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import { expandForallEffect, getFreshName, replaceAction, rewriteQualityMetrics } from "./utils.js";

/** Rewrites the quantified parts of actions and effects of one problem. */
export class QuantifierExpander {
  private readonly remover: ExpressionQuantifiersRemover;

  constructor(private readonly source: ObjectSource) {
    this.remover = new ExpressionQuantifiersRemover(source);
  }

  expression(node: FNode): FNode {
    return this.remover.removeQuantifiers(node);
  }

  /** Forall effects expanded, quantifiers removed from values and conditions. */
  effects(effect: Effect): Effect[] {
    return expandForallEffect(this.source, effect).map((instance) =>
      instance.with({
        value: this.expression(instance.value),
        condition: this.expression(instance.condition),
      }),
    );
  }

  /** Copy of {@link action} named {@link name} without quantifiers. */
  action(action: Action, name: string): Action {
    switch (action.kind) {
      case "instantaneous": {
        const copy = action.clone(name);
        copy.setPreconditions(action.preconditions.map((condition) => this.expression(condition)));
        copy.clearEffects();
        action.effects.flatMap((effect) => this.effects(effect)).forEach((effect) => copy.addEffectInstance(effect));
        return copy;
      }
      case "durative": {
        const copy = action.clone(name);
        copy.clearConditions();
        for (const { interval, conditions } of action.conditions) {
          conditions.forEach((condition) => copy.addCondition(interval, this.expression(condition)));
        }
        copy.clearEffects();
        for (const { timing, effects } of action.effects) {
          effects.flatMap((effect) => this.effects(effect)).forEach((effect) => copy.addEffectInstance(timing, effect));
        }
        return copy;
      }
    }
  }
}

/**
 * Expands `exists` into disjunctions and `forall` into conjunctions over the
 * objects of the problem, and forall effects into one effect per object
 * assignment.
 */
export class QuantifiersRemover extends Compiler {
  readonly name = "qurm";

  constructor(options: CompilerOptions = {}) {
    super("QUANTIFIERS_REMOVING", options);
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
      "FORALL_EFFECTS",
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
      "TRAJECTORY_CONSTRAINTS",
    ]);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "QUANTIFIERS_REMOVING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    if (kind.has("EXISTENTIAL_CONDITIONS")) {
      kind.set("DISJUNCTIVE_CONDITIONS");
    }
    return kind.unset("EXISTENTIAL_CONDITIONS", "UNIVERSAL_CONDITIONS", "FORALL_EFFECTS");
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const expander = new QuantifierExpander(problem);
    const rewrite = (node: FNode): FNode => expander.expression(node);

    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;
    compiled.clearActions();
    compiled.clearGoals();
    compiled.clearTimedGoals();
    compiled.clearTimedEffects();
    compiled.clearTrajectoryConstraints();
    compiled.clearQualityMetrics();

    const newToOld = new Map<Action, Action>();
    for (const action of problem.actions) {
      const copy = expander.action(action, getFreshName(compiled, action.name));
      compiled.addAction(copy);
      newToOld.set(copy, action);
    }
    for (const { timing, effects } of problem.timedEffects) {
      effects
        .flatMap((effect) => expander.effects(effect))
        .forEach((effect) => compiled.addTimedEffectInstance(timing, effect));
    }
    for (const { interval, goals } of problem.timedGoals) {
      goals.forEach((goal) => compiled.addTimedGoal(interval, rewrite(goal)));
    }
    problem.goals.forEach((goal) => compiled.addGoal(rewrite(goal)));
    problem.trajectoryConstraints.forEach((constraint) => compiled.addTrajectoryConstraint(rewrite(constraint)));
    rewriteQualityMetrics(problem.qualityMetrics, newToOld, rewrite).forEach((metric) =>
      compiled.addQualityMetric(metric),
    );

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }
}
