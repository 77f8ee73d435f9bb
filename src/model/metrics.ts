import type { FNode } from "./fnode.js";
import type { TimeInterval } from "./timing.js";

/** Cost of every action, keyed by action name; unlisted actions cost {@link defaultCost}. */
export interface MinimizeActionCosts {
  readonly kind: "minimize_action_costs";
  readonly costs: ReadonlyMap<string, FNode>;
  readonly defaultCost: FNode | null;
}

export interface MinimizeSequentialPlanLength {
  readonly kind: "minimize_sequential_plan_length";
}

export interface MinimizeMakespan {
  readonly kind: "minimize_makespan";
}

export interface MinimizeExpressionOnFinalState {
  readonly kind: "minimize_expression_on_final_state";
  readonly expression: FNode;
}

export interface MaximizeExpressionOnFinalState {
  readonly kind: "maximize_expression_on_final_state";
  readonly expression: FNode;
}

export interface OversubscriptionGoal {
  readonly goal: FNode;
  readonly gain: number;
}

/** Soft goals with gains; the plan maximises the gain of the goals it reaches. */
export interface Oversubscription {
  readonly kind: "oversubscription";
  readonly goals: readonly OversubscriptionGoal[];
}

export interface TemporalOversubscriptionGoal extends OversubscriptionGoal {
  readonly interval: TimeInterval;
}

export interface TemporalOversubscription {
  readonly kind: "temporal_oversubscription";
  readonly goals: readonly TemporalOversubscriptionGoal[];
}

export type PlanQualityMetric =
  | MinimizeActionCosts
  | MinimizeSequentialPlanLength
  | MinimizeMakespan
  | MinimizeExpressionOnFinalState
  | MaximizeExpressionOnFinalState
  | Oversubscription
  | TemporalOversubscription;

export function minimizeActionCosts(
  costs: ReadonlyMap<string, FNode>,
  defaultCost: FNode | null = null,
): MinimizeActionCosts {
  return { kind: "minimize_action_costs", costs: new Map(costs), defaultCost };
}

export function minimizeSequentialPlanLength(): MinimizeSequentialPlanLength {
  return { kind: "minimize_sequential_plan_length" };
}

export function minimizeMakespan(): MinimizeMakespan {
  return { kind: "minimize_makespan" };
}

export function minimizeExpressionOnFinalState(expression: FNode): MinimizeExpressionOnFinalState {
  return { kind: "minimize_expression_on_final_state", expression };
}

export function maximizeExpressionOnFinalState(expression: FNode): MaximizeExpressionOnFinalState {
  return { kind: "maximize_expression_on_final_state", expression };
}

/** Builds an oversubscription metric, summing the gains of goals that coincide. */
export function oversubscription(goals: readonly OversubscriptionGoal[]): Oversubscription {
  const merged = new Map<FNode, number>();
  for (const { goal, gain } of goals) {
    merged.set(goal, (merged.get(goal) ?? 0) + gain);
  }
  return {
    kind: "oversubscription",
    goals: [...merged].map(([goal, gain]) => ({ goal, gain })),
  };
}

export function temporalOversubscription(
  goals: readonly TemporalOversubscriptionGoal[],
): TemporalOversubscription {
  return { kind: "temporal_oversubscription", goals: goals.map((goal) => ({ ...goal })) };
}

/** Cost of the named action under {@link metric}, or `null` when none applies. */
export function actionCost(metric: MinimizeActionCosts, actionName: string): FNode | null {
  return metric.costs.get(actionName) ?? metric.defaultCost;
}
