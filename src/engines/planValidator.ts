import { ProblemDefinitionError, UnsupportedProblemTypeError } from "../errors.js";
import { StructuredLogger, createSilentLogger } from "../logger.js";
import type { InstantaneousAction } from "../model/action.js";
import type { Effect } from "../model/effect.js";
import type { FNode } from "../model/fnode.js";
import type { PlanQualityMetric } from "../model/metrics.js";
import type { Problem } from "../model/problem.js";
import { StateEvaluator } from "../model/walkers/stateEvaluator.js";
import type { ActionInstance } from "../plans/actionInstance.js";
import type { SequentialPlan } from "../plans/sequentialPlan.js";
import { expandForallEffect } from "./compilers/utils.js";

export type ValidationStatus = "valid" | "invalid";

export interface ValidationResult {
  readonly status: ValidationStatus;
  readonly engineName: string;
  /** Why the plan is invalid; `null` for a valid plan. */
  readonly reason: string | null;
  /** Last action instance applied before the failure, or the last one of a valid plan. */
  readonly lastExecutedAction: ActionInstance | null;
  /** Value of the single quality metric of the problem, when it can be computed. */
  readonly metricValue: number | null;
  /** State reached by a valid plan. */
  readonly finalState: ReadonlyMap<FNode, FNode> | null;
}

export interface PlanValidatorOptions {
  logger?: StructuredLogger;
}

type State = Map<FNode, FNode>;

type StepOutcome = { readonly ok: true; readonly state: State } | { readonly ok: false; readonly reason: string };

/**
 * Simulates a sequential plan of instantaneous actions from the initial state
 * and checks preconditions at every step and the goals at the end.
 */
export class SequentialPlanValidator {
  readonly name = "sequential_plan_validator";
  private readonly logger: StructuredLogger;

  constructor(options: PlanValidatorOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  validate(problem: Problem, plan: SequentialPlan): ValidationResult {
    if (problem.qualityMetrics.length > 1) {
      throw new ProblemDefinitionError("Plan validation supports at most one quality metric.", {
        problem: problem.name,
        metrics: problem.qualityMetrics.length,
      });
    }
    const metric = problem.qualityMetrics[0] ?? null;
    const evaluator = new StateEvaluator(problem);
    let state: State = problem.initialValues;
    let cost = 0;
    let last: ActionInstance | null = null;

    for (const [index, instance] of plan.actions.entries()) {
      const action = instance.action;
      if (action.kind !== "instantaneous") {
        throw new UnsupportedProblemTypeError(`Action ${action.name} is durative; only sequential plans are validated.`, {
          action: action.name,
        });
      }
      const outcome = this.apply(problem, evaluator, state, action, instance);
      if (!outcome.ok) {
        return this.invalid(`${index}-th action instance ${instance.toString()} ${outcome.reason}`, last);
      }
      if (metric?.kind === "minimize_action_costs") {
        const stepCost = metric.costs.get(action.name) ?? metric.defaultCost;
        if (stepCost) {
          const ground = this.ground(problem, action, instance, stepCost);
          cost += evaluator.evaluate(ground, this.lookup(state)).numericConstantValue();
        }
      }
      state = outcome.state;
      last = instance;
    }

    const unsatisfied = problem.goals.filter(
      (goal) => !evaluator.evaluate(goal, this.lookup(state)).boolConstantValue(),
    );
    if (unsatisfied.length > 0) {
      return this.invalid(
        `Goals ${unsatisfied.map((goal) => goal.toString()).join(", ")} are not satisfied by the plan.`,
        last,
      );
    }
    const result: ValidationResult = {
      status: "valid",
      engineName: this.name,
      reason: null,
      lastExecutedAction: last,
      metricValue: this.metricValue(metric, evaluator, state, plan, cost),
      finalState: state,
    };
    this.logger.info("plan_validated", { problem: problem.name, steps: plan.actions.length, status: result.status });
    return result;
  }

  private invalid(reason: string, last: ActionInstance | null): ValidationResult {
    this.logger.info("plan_rejected", { reason });
    return {
      status: "invalid",
      engineName: this.name,
      reason,
      lastExecutedAction: last,
      metricValue: null,
      finalState: null,
    };
  }

  private metricValue(
    metric: PlanQualityMetric | null,
    evaluator: StateEvaluator,
    state: State,
    plan: SequentialPlan,
    cost: number,
  ): number | null {
    if (!metric) {
      return null;
    }
    switch (metric.kind) {
      case "minimize_action_costs":
        return cost;
      case "minimize_sequential_plan_length":
        return plan.actions.length;
      case "minimize_expression_on_final_state":
      case "maximize_expression_on_final_state":
        return evaluator.evaluate(metric.expression, this.lookup(state)).numericConstantValue();
      default:
        return null;
    }
  }

  private lookup(state: State): (fluentExpression: FNode) => FNode {
    return (fluentExpression) => {
      const value = state.get(fluentExpression);
      if (!value) {
        throw new ProblemDefinitionError(`No value for fluent ${fluentExpression.toString()} in the current state.`, {
          fluent: fluentExpression.toString(),
        });
      }
      return value;
    };
  }

  /** {@link node} with the parameters of {@link action} replaced by the values of {@link instance}. */
  private ground(problem: Problem, action: InstantaneousAction, instance: ActionInstance, node: FNode): FNode {
    const em = problem.environment.expressions;
    const substitutions = new Map<FNode, FNode>();
    action.parameters.forEach((parameter, index) => {
      const value = instance.actualParameters[index];
      if (value) {
        substitutions.set(em.paramExp(parameter), value);
      }
    });
    return problem.environment.substituter.substitute(node, substitutions);
  }

  private apply(
    problem: Problem,
    evaluator: StateEvaluator,
    state: State,
    action: InstantaneousAction,
    instance: ActionInstance,
  ): StepOutcome {
    const em = problem.environment.expressions;
    const lookup = this.lookup(state);
    const ground = (node: FNode): FNode => this.ground(problem, action, instance, node);

    const unsatisfied = action.preconditions.filter(
      (precondition) => !evaluator.evaluate(ground(precondition), lookup).boolConstantValue(),
    );
    if (unsatisfied.length > 0) {
      return { ok: false, reason: `has unsatisfied preconditions ${unsatisfied.map((p) => p.toString()).join(", ")}.` };
    }

    const effects: Effect[] = action.effects.flatMap((effect) =>
      expandForallEffect(
        problem,
        effect.with({ fluent: ground(effect.fluent), value: ground(effect.value), condition: ground(effect.condition) }),
      ),
    );
    const assigned = new Map<FNode, FNode>();
    const updated = new Map<FNode, FNode>();
    for (const effect of effects) {
      if (!evaluator.evaluate(effect.condition, lookup).boolConstantValue()) {
        continue;
      }
      const target = effect.fluent.isDot() ? effect.fluent.arg(0) : effect.fluent;
      const fluent = em.fluentExp(
        target.fluent(),
        target.args.map((arg) => evaluator.evaluate(arg, lookup)),
      );
      const value = evaluator.evaluate(effect.value, lookup);
      if (effect.isAssignment()) {
        const previous = assigned.get(fluent);
        if ((previous && previous !== value) || updated.has(fluent)) {
          return { ok: false, reason: `creates conflicting effects on ${fluent.toString()}.` };
        }
        assigned.set(fluent, value);
        continue;
      }
      if (assigned.has(fluent)) {
        return { ok: false, reason: `creates conflicting effects on ${fluent.toString()}.` };
      }
      const current = updated.get(fluent) ?? lookup(fluent);
      const next = effect.isIncrease() ? em.plus(current, value) : em.minus(current, value);
      updated.set(fluent, evaluator.evaluate(next, lookup));
    }

    const next = new Map(state);
    for (const [fluent, value] of [...assigned, ...updated]) {
      const type = fluent.type;
      if (type.kind === "int" || type.kind === "real") {
        const number = value.numericConstantValue();
        if ((type.lowerBound !== null && number < type.lowerBound) || (type.upperBound !== null && number > type.upperBound)) {
          return { ok: false, reason: `sets ${fluent.toString()} to ${number}, outside its bounds.` };
        }
      }
      next.set(fluent, value);
    }
    return { ok: true, state: next };
  }
}
