import type { Action, DurationInterval } from "./action.js";
import type { Effect } from "./effect.js";
import type { Fluent } from "./fluent.js";
import type { FNode } from "./fnode.js";
import type { PlanQualityMetric } from "./metrics.js";
import { ProblemKind } from "./problemKind.js";
import type { TimeInterval, Timing } from "./timing.js";
import type { PlanningType } from "./types.js";
import { collectFluentExpressions, collectOperators } from "./walkers/extractors.js";

/**
 * Accumulates the {@link ProblemKind} of a problem while its parts are fed in.
 * Shared by single- and multi-agent problems.
 */
export class KindCollector {
  public readonly kind: ProblemKind;

  constructor(
    private readonly staticFluents: ReadonlySet<Fluent>,
    problemClass: "ACTION_BASED" | "ACTION_BASED_MULTI_AGENT" = "ACTION_BASED",
  ) {
    this.kind = new ProblemKind([problemClass]);
  }

  userType(type: PlanningType): void {
    if (type.kind !== "user") {
      return;
    }
    this.kind.set(type.father ? "HIERARCHICAL_TYPING" : "FLAT_TYPING");
  }

  fluent(fluent: Fluent): void {
    const type = fluent.type;
    switch (type.kind) {
      case "int":
      case "real":
        this.kind.set("NUMERIC_FLUENTS", type.kind === "int" ? "DISCRETE_NUMBERS" : "CONTINUOUS_NUMBERS");
        if (type.lowerBound !== null || type.upperBound !== null) {
          this.kind.set("BOUNDED_TYPES");
        }
        break;
      case "user":
        this.kind.set("OBJECT_FLUENTS");
        this.userType(type);
        break;
      case "bool":
        break;
    }
    for (const parameter of fluent.signature) {
      this.userType(parameter.type);
    }
  }

  condition(expression: FNode): void {
    const operators = collectOperators(expression);
    // `implies` and `iff` negate an operand once expanded.
    if (operators.has("not") || operators.has("implies") || operators.has("iff")) {
      this.kind.set("NEGATIVE_CONDITIONS");
    }
    if (operators.has("or") || operators.has("implies") || operators.has("iff")) {
      this.kind.set("DISJUNCTIVE_CONDITIONS");
    }
    if (operators.has("equals")) {
      this.kind.set("EQUALITIES");
    }
    if (operators.has("exists")) {
      this.kind.set("EXISTENTIAL_CONDITIONS");
    }
    if (operators.has("forall")) {
      this.kind.set("UNIVERSAL_CONDITIONS");
    }
    if (operators.has("interpreted_function_exp")) {
      this.kind.set("INTERPRETED_FUNCTIONS_IN_CONDITIONS");
    }
  }

  effect(effect: Effect): void {
    if (effect.isConditional()) {
      this.kind.set("CONDITIONAL_EFFECTS");
      this.condition(effect.condition);
    }
    if (effect.isIncrease()) {
      this.kind.set("INCREASE_EFFECTS");
    } else if (effect.isDecrease()) {
      this.kind.set("DECREASE_EFFECTS");
    }
    if (effect.isForall()) {
      this.kind.set("FORALL_EFFECTS");
    }
    const valueOperators = collectOperators(effect.value);
    if (valueOperators.has("fluent_exp")) {
      const kind = effect.value.type.kind;
      this.kind.set(
        kind === "bool"
          ? "FLUENTS_IN_BOOLEAN_ASSIGNMENTS"
          : kind === "user"
            ? "FLUENTS_IN_OBJECT_ASSIGNMENTS"
            : "FLUENTS_IN_NUMERIC_ASSIGNMENTS",
      );
    }
    if (
      valueOperators.has("interpreted_function_exp") ||
      collectOperators(effect.fluent).has("interpreted_function_exp")
    ) {
      this.kind.set("INTERPRETED_FUNCTIONS_IN_EFFECTS");
    }
  }

  timing(timing: Timing): void {
    if (timing.delay !== 0) {
      this.kind.set("INTERMEDIATE_CONDITIONS_AND_EFFECTS");
    }
  }

  interval(interval: TimeInterval): void {
    this.timing(interval.lower);
    this.timing(interval.upper);
  }

  duration(duration: DurationInterval): void {
    if (duration.lower !== duration.upper) {
      this.kind.set("DURATION_INEQUALITIES");
    }
    for (const bound of [duration.lower, duration.upper]) {
      for (const fluentExpression of collectFluentExpressions(bound)) {
        this.kind.set(
          this.staticFluents.has(fluentExpression.fluent()) ? "STATIC_FLUENTS_IN_DURATIONS" : "FLUENTS_IN_DURATIONS",
        );
      }
      if (collectOperators(bound).has("interpreted_function_exp")) {
        this.kind.set("INTERPRETED_FUNCTIONS_IN_DURATIONS");
      }
    }
  }

  action(action: Action): void {
    for (const parameter of action.parameters) {
      this.userType(parameter.type);
    }
    switch (action.kind) {
      case "instantaneous":
        action.preconditions.forEach((precondition) => this.condition(precondition));
        action.effects.forEach((effect) => this.effect(effect));
        break;
      case "durative":
        this.kind.set("CONTINUOUS_TIME");
        this.duration(action.duration);
        for (const { interval, conditions } of action.conditions) {
          this.interval(interval);
          conditions.forEach((condition) => this.condition(condition));
        }
        for (const { timing, effects } of action.effects) {
          this.timing(timing);
          effects.forEach((effect) => this.effect(effect));
        }
        break;
    }
  }

  timedEffect(timing: Timing, effect: Effect): void {
    this.kind.set("CONTINUOUS_TIME", "TIMED_EFFECTS");
    this.timing(timing);
    this.effect(effect);
  }

  timedGoal(interval: TimeInterval, goal: FNode): void {
    this.kind.set("CONTINUOUS_TIME", "TIMED_GOALS");
    this.interval(interval);
    this.condition(goal);
  }

  trajectoryConstraint(constraint: FNode): void {
    if (constraint.kind === "always") {
      this.kind.set("STATE_INVARIANTS");
      this.condition(constraint.arg(0));
    } else {
      this.kind.set("TRAJECTORY_CONSTRAINTS");
    }
  }

  metric(metric: PlanQualityMetric): void {
    switch (metric.kind) {
      case "minimize_action_costs": {
        this.kind.set("ACTIONS_COST");
        const costs = [...metric.costs.values(), ...(metric.defaultCost ? [metric.defaultCost] : [])];
        for (const cost of costs) {
          for (const fluentExpression of collectFluentExpressions(cost)) {
            this.kind.set(
              this.staticFluents.has(fluentExpression.fluent())
                ? "STATIC_FLUENTS_IN_ACTIONS_COST"
                : "FLUENTS_IN_ACTIONS_COST",
            );
          }
        }
        break;
      }
      case "minimize_sequential_plan_length":
        this.kind.set("PLAN_LENGTH");
        break;
      case "minimize_makespan":
        this.kind.set("MAKESPAN");
        break;
      case "minimize_expression_on_final_state":
      case "maximize_expression_on_final_state":
        this.kind.set("FINAL_VALUE");
        break;
      case "oversubscription":
        this.kind.set("OVERSUBSCRIPTION");
        metric.goals.forEach(({ goal }) => this.condition(goal));
        break;
      case "temporal_oversubscription":
        this.kind.set("TEMPORAL_OVERSUBSCRIPTION");
        metric.goals.forEach(({ goal }) => this.condition(goal));
        break;
    }
  }
}
