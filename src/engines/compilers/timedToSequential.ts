import { UnsupportedProblemTypeError } from "../../errors.js";
import { InstantaneousAction, type Action, type DurativeAction } from "../../model/action.js";
import { Effect } from "../../model/effect.js";
import type { Environment } from "../../model/environment.js";
import type { FNode } from "../../model/fnode.js";
import { minimizeSequentialPlanLength, type PlanQualityMetric } from "../../model/metrics.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import { intervalToString, timingToString, type TimeInterval, type Timing } from "../../model/timing.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import { replaceAction, rewriteQualityMetrics } from "./utils.js";

type Side = "start" | "end";

function sideOf(timing: Timing): Side | null {
  if (timing.delay !== 0) {
    return null;
  }
  return timing.timepoint === "start" || timing.timepoint === "end" ? timing.timepoint : null;
}

/**
 * Replaces every fluent application assigned or updated by {@link effects}
 * with its value after the effects. Applications are matched syntactically.
 */
function regress(environment: Environment, node: FNode, effects: readonly Effect[]): FNode {
  const em = environment.expressions;
  const substitutions = new Map<FNode, FNode>();
  for (const effect of effects) {
    switch (effect.kind) {
      case "assign":
        substitutions.set(effect.fluent, effect.value);
        break;
      case "increase":
        substitutions.set(effect.fluent, em.plus(effect.fluent, effect.value));
        break;
      case "decrease":
        substitutions.set(effect.fluent, em.minus(effect.fluent, effect.value));
        break;
    }
  }
  return environment.simplifier.simplify(environment.substituter.substitute(node, substitutions));
}

/** Single effect equivalent to {@link first} followed by {@link second} on the same fluent. */
function compose(environment: Environment, first: Effect, second: Effect): Effect {
  const em = environment.expressions;
  const simplify = (node: FNode): FNode => environment.simplifier.simplify(node);
  if (second.isAssignment()) {
    return second;
  }
  if (first.isAssignment()) {
    const value = second.isIncrease() ? em.plus(first.value, second.value) : em.minus(first.value, second.value);
    return first.with({ value: simplify(value) });
  }
  if (first.kind === second.kind) {
    return first.with({ value: simplify(em.plus(first.value, second.value)) });
  }
  return first.with({ value: simplify(em.minus(first.value, second.value)) });
}

/**
 * Turns a temporal problem into a sequential one: every durative action
 * becomes one instantaneous action applying its start and end effects at
 * once, checking its start conditions and its other conditions against the
 * state after the start effects.
 */
export class TimedToSequential extends Compiler {
  readonly name = "t2s";

  constructor(options: CompilerOptions = {}) {
    super("TIMED_TO_SEQUENTIAL", options);
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
      "INCREASE_EFFECTS",
      "DECREASE_EFFECTS",
      "FLUENTS_IN_BOOLEAN_ASSIGNMENTS",
      "FLUENTS_IN_NUMERIC_ASSIGNMENTS",
      "FLUENTS_IN_OBJECT_ASSIGNMENTS",
      "CONTINUOUS_TIME",
      "DURATION_INEQUALITIES",
      "STATIC_FLUENTS_IN_DURATIONS",
      "FLUENTS_IN_DURATIONS",
      "ACTIONS_COST",
      "STATIC_FLUENTS_IN_ACTIONS_COST",
      "FLUENTS_IN_ACTIONS_COST",
      "PLAN_LENGTH",
      "OVERSUBSCRIPTION",
      "MAKESPAN",
      "FINAL_VALUE",
    ]);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "TIMED_TO_SEQUENTIAL";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    if (kind.has("MAKESPAN")) {
      kind.set("PLAN_LENGTH");
    }
    return kind.unset(
      "CONTINUOUS_TIME",
      "INTERMEDIATE_CONDITIONS_AND_EFFECTS",
      "TIMED_EFFECTS",
      "TIMED_GOALS",
      "DURATION_INEQUALITIES",
      "STATIC_FLUENTS_IN_DURATIONS",
      "FLUENTS_IN_DURATIONS",
      "INTERPRETED_FUNCTIONS_IN_DURATIONS",
      "MAKESPAN",
    );
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    if (problem.timedEffects.length > 0 || problem.timedGoals.length > 0) {
      throw new UnsupportedProblemTypeError(`${this.name} does not support timed effects or timed goals.`, {
        problem: problem.name,
      });
    }

    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;
    compiled.clearActions();
    compiled.clearQualityMetrics();

    const newToOld = new Map<Action, Action>();
    for (const action of problem.actions) {
      const sequential = action.kind === "durative" ? this.sequentialize(action) : action.clone();
      compiled.addAction(sequential);
      newToOld.set(sequential, action);
    }
    rewriteQualityMetrics(problem.qualityMetrics, newToOld)
      .map((metric): PlanQualityMetric => (metric.kind === "minimize_makespan" ? minimizeSequentialPlanLength() : metric))
      .forEach((metric) => compiled.addQualityMetric(metric));

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }

  private sequentialize(action: DurativeAction): InstantaneousAction {
    const environment = action.environment;
    const effects: Record<Side, Effect[]> = { start: [], end: [] };
    for (const { timing, effects: list } of action.effects) {
      const side = sideOf(timing);
      if (!side) {
        throw new UnsupportedProblemTypeError(
          `Effects of ${action.name} at ${timingToString(timing)} have no sequential counterpart.`,
          { action: action.name, timing: timingToString(timing) },
        );
      }
      for (const effect of list) {
        if (effect.isConditional() || effect.isForall()) {
          throw new UnsupportedProblemTypeError(
            `Effect ${effect.toString()} of ${action.name} must be unconditional.`,
            { action: action.name, effect: effect.toString() },
          );
        }
        effects[side].push(effect);
      }
    }

    const sequential = new InstantaneousAction(action.name, action.parameters, environment);
    const afterStart = (node: FNode): FNode => regress(environment, node, effects.start);
    for (const { interval, conditions } of action.conditions) {
      const { atStart, afterStartEffects } = this.placement(action, interval);
      for (const condition of conditions) {
        if (atStart) {
          sequential.addPrecondition(condition);
        }
        if (afterStartEffects) {
          sequential.addPrecondition(afterStart(condition));
        }
      }
    }

    const combined = new Map<FNode, Effect>();
    for (const effect of effects.start) {
      combined.set(effect.fluent, effect);
    }
    for (const effect of effects.end) {
      // Only the arguments of the target are evaluated after the start effects.
      const fluent = effect.fluent.isFluentExp()
        ? environment.expressions.fluentExp(effect.fluent.fluent(), effect.fluent.args.map(afterStart))
        : effect.fluent;
      const regressed = new Effect(fluent, afterStart(effect.value), effect.condition, effect.kind);
      const previous = combined.get(fluent);
      combined.set(fluent, previous ? compose(environment, previous, regressed) : regressed);
    }
    combined.forEach((effect) => sequential.addEffectInstance(effect));
    return sequential;
  }

  /** Where the conditions over {@link interval} are checked in the sequential action. */
  private placement(action: DurativeAction, interval: TimeInterval): { atStart: boolean; afterStartEffects: boolean } {
    const lower = sideOf(interval.lower);
    const upper = sideOf(interval.upper);
    if (lower === "start" && upper === "start") {
      return { atStart: true, afterStartEffects: false };
    }
    if (lower === "end" && upper === "end") {
      return { atStart: false, afterStartEffects: true };
    }
    if (lower === "start" && upper === "end") {
      return { atStart: !interval.isLeftOpen, afterStartEffects: true };
    }
    throw new UnsupportedProblemTypeError(
      `Conditions of ${action.name} over ${intervalToString(interval)} have no sequential counterpart.`,
      { action: action.name, interval: intervalToString(interval) },
    );
  }
}
