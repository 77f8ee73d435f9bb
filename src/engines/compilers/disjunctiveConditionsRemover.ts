import { UnsupportedProblemTypeError } from "../../errors.js";
import { InstantaneousAction, type Action, type DurativeAction } from "../../model/action.js";
import { cartesianProduct } from "../../model/domain.js";
import type { Effect } from "../../model/effect.js";
import { Fluent } from "../../model/fluent.js";
import type { FNode } from "../../model/fnode.js";
import { oversubscription, temporalOversubscription, type PlanQualityMetric } from "../../model/metrics.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import type { TimeInterval } from "../../model/timing.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import { getFreshName, replaceAction, updatedMinimizeActionCosts } from "./utils.js";

/** Name of the flag standing for a disjunctive goal. */
export const FAKE_GOAL_NAME = "dcrm_fake_goal";

const FAKE_ACTION_NAME = "fake_action";

/** A disjunctive goal replaced by a flag set by one action per disjunct. */
interface FakeGoal {
  readonly fluent: Fluent;
  readonly disjuncts: readonly FNode[];
}

function conjuncts(node: FNode): readonly FNode[] {
  if (node.isTrue()) {
    return [];
  }
  return node.isAnd() ? node.args : [node];
}

function disjunctsOf(node: FNode): readonly FNode[] {
  return node.isOr() ? node.args : [node];
}

/**
 * Splits every action whose conditions are disjunctive into one action per
 * disjunct of their disjunctive normal form. Disjunctive goals are replaced
 * by a fresh flag that only dedicated actions, one per disjunct, can set;
 * every other action resets it.
 */
export class DisjunctiveConditionsRemover extends Compiler {
  readonly name = "dcrm";

  constructor(options: CompilerOptions = {}) {
    super("DISJUNCTIVE_CONDITIONS_REMOVING", options);
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
    ]);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "DISJUNCTIVE_CONDITIONS_REMOVING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    return problemKind.clone().unset("DISJUNCTIVE_CONDITIONS");
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const environment = problem.environment;
    const dnf = (expressions: readonly FNode[]): FNode =>
      environment.dnf.getDnfExpression(environment.expressions.and(expressions));

    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;
    compiled.clearActions();
    compiled.clearGoals();
    compiled.clearTimedGoals();
    compiled.clearTimedEffects();
    compiled.clearQualityMetrics();

    const fakeGoals: FakeGoal[] = [];
    const replaceGoal = (goals: readonly FNode[]): readonly FNode[] => {
      const normalised = dnf(goals);
      if (!normalised.isOr()) {
        return goals;
      }
      const fluent = new Fluent(getFreshName(compiled, FAKE_GOAL_NAME), environment.types.boolType(), [], environment);
      compiled.addFluent(fluent, { defaultInitialValue: false });
      fakeGoals.push({ fluent, disjuncts: normalised.args });
      return [environment.expressions.fluentExp(fluent)];
    };
    const replaceSingleGoal = (goal: FNode): FNode => environment.expressions.and(replaceGoal([goal]));

    replaceGoal(problem.goals).forEach((goal) => compiled.addGoal(goal));
    for (const { interval, goals } of problem.timedGoals) {
      replaceGoal(goals).forEach((goal) => compiled.addTimedGoal(interval, goal));
    }
    const metrics: PlanQualityMetric[] = problem.qualityMetrics.map((metric) => {
      switch (metric.kind) {
        case "oversubscription":
          return oversubscription(
            metric.goals.map(({ goal, gain }) => ({ goal: replaceSingleGoal(goal), gain })),
          );
        case "temporal_oversubscription":
          return temporalOversubscription(
            metric.goals.map(({ interval, goal, gain }) => ({ interval, goal: replaceSingleGoal(goal), gain })),
          );
        default:
          return metric;
      }
    });

    for (const { timing, effects } of problem.timedEffects) {
      effects.flatMap((effect) => this.splitEffect(problem, effect)).forEach((effect) => {
        compiled.addTimedEffectInstance(timing, effect);
      });
    }

    const newToOld = new Map<Action, Action | null>();
    for (const action of problem.actions) {
      // Each split is added before the next one is named.
      const register = (split: Action): void => {
        this.addResets(split, fakeGoals);
        compiled.addAction(split);
        newToOld.set(split, action);
      };
      if (action.kind === "instantaneous") {
        this.splitInstantaneous(problem, compiled, action, dnf, register);
      } else {
        this.splitDurative(problem, compiled, action, dnf, register);
      }
    }

    for (const { fluent, disjuncts } of fakeGoals) {
      for (const disjunct of disjuncts) {
        const fake = new InstantaneousAction(getFreshName(compiled, FAKE_ACTION_NAME), [], environment);
        conjuncts(disjunct).forEach((condition) => fake.addPrecondition(condition));
        fake.addEffect(environment.expressions.fluentExp(fluent), true);
        compiled.addAction(fake);
        newToOld.set(fake, null);
      }
    }

    for (const metric of metrics) {
      compiled.addQualityMetric(
        metric.kind === "minimize_action_costs" ? updatedMinimizeActionCosts(metric, newToOld) : metric,
      );
    }

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }

  private splitInstantaneous(
    problem: Problem,
    compiled: Problem,
    action: InstantaneousAction,
    dnf: (expressions: readonly FNode[]) => FNode,
    register: (split: InstantaneousAction) => void,
  ): void {
    const precondition = dnf(action.preconditions);
    if (precondition.isFalse()) {
      return;
    }
    const effects = action.effects.flatMap((effect) => this.splitEffect(problem, effect));
    for (const disjunct of disjunctsOf(precondition)) {
      const split = action.clone(getFreshName(compiled, action.name));
      split.setPreconditions(conjuncts(disjunct));
      split.clearEffects();
      effects.forEach((effect) => split.addEffectInstance(effect));
      register(split);
    }
  }

  private splitDurative(
    problem: Problem,
    compiled: Problem,
    action: DurativeAction,
    dnf: (expressions: readonly FNode[]) => FNode,
    register: (split: DurativeAction) => void,
  ): void {
    const intervals: TimeInterval[] = [];
    const options: (readonly FNode[])[] = [];
    for (const { interval, conditions } of action.conditions) {
      const normalised = dnf(conditions);
      if (normalised.isFalse()) {
        return;
      }
      intervals.push(interval);
      options.push(disjunctsOf(normalised));
    }
    const effects = action.effects.map(({ timing, effects: list }) => ({
      timing,
      effects: list.flatMap((effect) => this.splitEffect(problem, effect)),
    }));
    for (const choice of cartesianProduct(options)) {
      const split = action.clone(getFreshName(compiled, action.name));
      split.clearConditions();
      choice.forEach((disjunct, index) => {
        const interval = intervals[index];
        if (interval) {
          conjuncts(disjunct).forEach((condition) => split.addCondition(interval, condition));
        }
      });
      split.clearEffects();
      for (const { timing, effects: list } of effects) {
        list.forEach((effect) => split.addEffectInstance(timing, effect));
      }
      register(split);
    }
  }

  /** One effect per disjunct of the condition of {@link effect}. */
  private splitEffect(problem: Problem, effect: Effect): Effect[] {
    if (!effect.isConditional()) {
      return [effect];
    }
    const environment = problem.environment;
    const condition = environment.dnf.getDnfExpression(effect.condition);
    if (condition.isFalse()) {
      return [];
    }
    if (!condition.isOr()) {
      return [effect.with({ condition })];
    }
    if (!effect.isAssignment()) {
      throw new UnsupportedProblemTypeError(
        `The disjunctive condition of effect: ${effect.toString()} cannot be split without repeating the update.`,
        { effect: effect.toString() },
      );
    }
    return condition.args.map((disjunct) => effect.with({ condition: disjunct }));
  }

  /** Makes every real action with effects reset the fake goals. */
  private addResets(action: Action, fakeGoals: readonly FakeGoal[]): void {
    if (fakeGoals.length === 0) {
      return;
    }
    const em = action.environment.expressions;
    switch (action.kind) {
      case "instantaneous":
        if (action.effects.length > 0) {
          fakeGoals.forEach(({ fluent }) => action.addEffect(em.fluentExp(fluent), false));
        }
        break;
      case "durative":
        for (const { timing } of action.effects) {
          fakeGoals.forEach(({ fluent }) => action.addEffect(timing, em.fluentExp(fluent), false));
        }
        break;
    }
  }
}
