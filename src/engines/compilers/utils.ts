import { UsageError } from "../../errors.js";
import type { Action, DurativeAction, InstantaneousAction } from "../../model/action.js";
import { cartesianProduct, domainItems, type ObjectSource } from "../../model/domain.js";
import type { Effect } from "../../model/effect.js";
import type { Environment } from "../../model/environment.js";
import type { Fluent } from "../../model/fluent.js";
import type { FNode } from "../../model/fnode.js";
import type { MultiAgentProblem } from "../../model/multiAgent/maProblem.js";
import {
  maximizeExpressionOnFinalState,
  minimizeActionCosts,
  minimizeExpressionOnFinalState,
  oversubscription,
  temporalOversubscription,
  type MinimizeActionCosts,
  type PlanQualityMetric,
} from "../../model/metrics.js";
import { Problem } from "../../model/problem.js";
import { intervalKey, timePointInterval, type TimeInterval } from "../../model/timing.js";
import type { Simplifier } from "../../model/walkers/simplifier.js";
import { ActionInstance, type MapBackActionInstance } from "../../plans/actionInstance.js";

/** Anything owning a namespace of fluents, objects, actions and types. */
export interface NameSource {
  hasName(name: string): boolean;
}

const freshNameCounters = new WeakMap<NameSource, Map<string, number>>();

/**
 * Fresh name for {@link source}: `[base, ...parts]` joined with `_`, suffixed
 * with `_0`, `_1`, ... until unused.
 *
 * The suffix search resumes where the previous call for the same base
 * stopped; names are never removed from a problem between two calls, so
 * the result is the first unused candidate.
 */
export function getFreshName(source: NameSource, base: string, parts: readonly string[] = []): string {
  const name = [base, ...parts].join("_");
  if (!source.hasName(name)) {
    return name;
  }
  let counters = freshNameCounters.get(source);
  if (!counters) {
    counters = new Map();
    freshNameCounters.set(source, counters);
  }
  let count = counters.get(name) ?? 0;
  while (source.hasName(`${name}_${count}`)) {
    count += 1;
  }
  counters.set(name, count);
  return `${name}_${count}`;
}

export type SimplifiedConditions<T> = { readonly feasible: true; readonly conditions: T[] } | { readonly feasible: false };

function splitConjunction(node: FNode): FNode[] {
  if (node.isTrue()) {
    return [];
  }
  return node.isAnd() ? [...node.args] : [node];
}

/**
 * Simplifies the conjunction of the preconditions of {@link action}: a
 * contradiction is infeasible, a tautology leaves no precondition and a
 * conjunction is split back into its arguments.
 */
export function checkAndSimplifyPreconditions(
  environment: Environment,
  action: InstantaneousAction,
  simplifier: Simplifier,
): SimplifiedConditions<FNode> {
  if (action.preconditions.length === 0) {
    return { feasible: true, conditions: [] };
  }
  const simplified = simplifier.simplify(environment.expressions.and(action.preconditions));
  if (simplified.isFalse()) {
    return { feasible: false };
  }
  return { feasible: true, conditions: splitConjunction(simplified) };
}

/** Per-interval counterpart of {@link checkAndSimplifyPreconditions}. */
export function checkAndSimplifyConditions(
  environment: Environment,
  action: DurativeAction,
  simplifier: Simplifier,
): SimplifiedConditions<{ interval: TimeInterval; condition: FNode }> {
  const conditions: { interval: TimeInterval; condition: FNode }[] = [];
  for (const entry of action.conditions) {
    const simplified = simplifier.simplify(environment.expressions.and(entry.conditions));
    if (simplified.isFalse()) {
      return { feasible: false };
    }
    for (const condition of splitConjunction(simplified)) {
      conditions.push({ interval: entry.interval, condition });
    }
  }
  return { feasible: true, conditions };
}

/** Map-back that substitutes the action of an instance, keeping its parameters. */
export function replaceAction(map: ReadonlyMap<Action, Action | null>): MapBackActionInstance {
  return (instance) => {
    const replaced = map.get(instance.action);
    if (replaced === undefined) {
      throw new UsageError("The Action of the given ActionInstance does not have a valid replacement.", {
        action: instance.action.name,
      });
    }
    return replaced ? new ActionInstance(replaced, instance.actualParameters, instance.agent) : null;
  };
}

/**
 * Multi-agent counterpart of {@link replaceAction}: the agent of the instance
 * is replaced by the agent with the same name in {@link original}.
 */
export function replaceAgentAction(
  map: ReadonlyMap<Action, Action | null>,
  original: MultiAgentProblem,
): MapBackActionInstance {
  const replace = replaceAction(map);
  return (instance) => {
    const replaced = replace(instance);
    if (!replaced || !instance.agent) {
      return replaced;
    }
    return new ActionInstance(replaced.action, replaced.actualParameters, original.agent(instance.agent.name));
  };
}

/** Grounded action traced back to the lifted action and the values it was grounded with. */
export interface LiftedAction {
  readonly action: Action;
  readonly parameters: readonly FNode[];
}

/** Map-back from grounded instances to the lifted action applied to the recorded values. */
export function liftActionInstance(map: ReadonlyMap<Action, LiftedAction>): MapBackActionInstance {
  return (instance) => {
    const lifted = map.get(instance.action);
    if (!lifted) {
      throw new UsageError("The Action of the given ActionInstance does not have a valid replacement.", {
        action: instance.action.name,
      });
    }
    return new ActionInstance(lifted.action, lifted.parameters, instance.agent);
  };
}

/**
 * Re-keys an action-costs metric on the actions of a compiled problem: every
 * new action costs what its source action cost.
 */
export function updatedMinimizeActionCosts(
  metric: MinimizeActionCosts,
  newToOld: ReadonlyMap<Action, Action | null>,
  transform: (cost: FNode, source: Action) => FNode = (cost) => cost,
): MinimizeActionCosts {
  const costs = new Map<string, FNode>();
  for (const [created, source] of newToOld) {
    if (!source) {
      continue;
    }
    const cost = metric.costs.get(source.name) ?? metric.defaultCost;
    if (cost) {
      costs.set(created.name, transform(cost, source));
    }
  }
  return minimizeActionCosts(costs, metric.defaultCost);
}

/**
 * Carries the quality metrics of a problem over to its compiled version:
 * action costs follow {@link newToOld}, oversubscription goals go through
 * {@link rewriteGoal} and numeric expressions through {@link rewriteValue}.
 * Other metrics are shared.
 */
export function rewriteQualityMetrics(
  metrics: readonly PlanQualityMetric[],
  newToOld: ReadonlyMap<Action, Action | null>,
  rewriteGoal: (goal: FNode) => FNode = (goal) => goal,
  rewriteValue: (value: FNode) => FNode = (value) => value,
): PlanQualityMetric[] {
  return metrics.map((metric): PlanQualityMetric => {
    switch (metric.kind) {
      case "minimize_action_costs":
        return updatedMinimizeActionCosts(metric, newToOld, rewriteValue);
      case "minimize_expression_on_final_state":
        return minimizeExpressionOnFinalState(rewriteValue(metric.expression));
      case "maximize_expression_on_final_state":
        return maximizeExpressionOnFinalState(rewriteValue(metric.expression));
      case "oversubscription":
        return oversubscription(metric.goals.map(({ goal, gain }) => ({ goal: rewriteGoal(goal), gain })));
      case "temporal_oversubscription":
        return temporalOversubscription(
          metric.goals.map(({ interval, goal, gain }) => ({ interval, goal: rewriteGoal(goal), gain })),
        );
      default:
        return metric;
    }
  });
}

/**
 * Instances of a forall effect, one per assignment of its variables, with
 * conditions simplified; instances whose condition is `false` are dropped.
 */
export function expandForallEffect(source: ObjectSource, effect: Effect): Effect[] {
  if (!effect.isForall()) {
    return [effect];
  }
  const environment = source.environment;
  const em = environment.expressions;
  const variables = effect.forall.map((variable) => em.variableExp(variable));
  const assignments = cartesianProduct(effect.forall.map((variable) => domainItems(source, variable.type)));
  const instances: Effect[] = [];
  for (const values of assignments) {
    const substitutions = new Map<FNode, FNode>();
    variables.forEach((variable, index) => {
      const value = values[index];
      if (value) {
        substitutions.set(variable, value);
      }
    });
    const substitute = (node: FNode): FNode => environment.substituter.substitute(node, substitutions);
    const condition = environment.simplifier.simplify(substitute(effect.condition));
    if (condition.isFalse()) {
      continue;
    }
    instances.push(
      effect.with({
        fluent: substitute(effect.fluent),
        value: environment.simplifier.simplify(substitute(effect.value)),
        condition,
        forall: [],
      }),
    );
  }
  return instances;
}

/** Index subsets of `0..size-1`, by increasing size then lexicographically. */
export function* powerset(size: number): Generator<readonly number[]> {
  const extend = function* (prefix: number[], start: number, length: number): Generator<number[]> {
    if (prefix.length === length) {
      yield [...prefix];
      return;
    }
    for (let index = start; index < size; index += 1) {
      prefix.push(index);
      yield* extend(prefix, index + 1, length);
      prefix.pop();
    }
  };
  for (let length = 0; length <= size; length += 1) {
    yield* extend([], 0, length);
  }
}

/** Rewriting that points the applications of the replaced fluents at their replacements. */
export function fluentsSubstituter(
  environment: Environment,
  replacements: ReadonlyMap<Fluent, Fluent>,
): (node: FNode) => FNode {
  const em = environment.expressions;
  const memo = new Map<FNode, FNode>();
  const walk = (node: FNode): FNode => {
    const cached = memo.get(node);
    if (cached) {
      return cached;
    }
    const args = node.args.map(walk);
    const replacement = node.isFluentExp() ? replacements.get(node.fluent()) : undefined;
    const result = replacement ? em.fluentExp(replacement, args) : em.rebuild(node, args);
    memo.set(node, result);
    return result;
  };
  return walk;
}

/** Copy of {@link action} whose conditions, effects and duration went through {@link rewrite}. */
export function mapActionExpressions(action: Action, rewrite: (node: FNode) => FNode): Action {
  const rewriteEffect = (effect: Effect): Effect =>
    effect.with({ fluent: rewrite(effect.fluent), value: rewrite(effect.value), condition: rewrite(effect.condition) });
  const copy = action.clone();
  switch (copy.kind) {
    case "instantaneous": {
      const effects = copy.effects;
      copy.setPreconditions(copy.preconditions.map(rewrite));
      copy.clearEffects();
      effects.forEach((effect) => copy.addEffectInstance(rewriteEffect(effect)));
      return copy;
    }
    case "durative": {
      const { conditions, effects, duration } = copy;
      copy.setDuration({ ...duration, lower: rewrite(duration.lower), upper: rewrite(duration.upper) });
      copy.clearConditions();
      for (const { interval, conditions: list } of conditions) {
        list.forEach((condition) => copy.addCondition(interval, rewrite(condition)));
      }
      copy.clearEffects();
      for (const { timing, effects: list } of effects) {
        list.forEach((effect) => copy.addEffectInstance(timing, rewriteEffect(effect)));
      }
      return copy;
    }
  }
}

/** Fluent declared in place of another, with the default its groundings start from. */
export interface FluentReplacement {
  readonly fluent: Fluent;
  readonly defaultInitialValue?: FNode;
}

/**
 * New problem named {@link name} declaring the types, objects and fluents of
 * {@link source}, in order, with the fluents of {@link replacements} swapped.
 * Defaults and explicit initial values of the other fluents are carried over.
 */
export function redeclareProblem(
  source: Problem,
  name: string,
  replacements: ReadonlyMap<Fluent, FluentReplacement>,
): Problem {
  const target = new Problem(name, source.environment);
  source.userTypes.forEach((type) => target.addUserType(type));
  target.addObjects(source.allObjects);
  for (const fluent of source.fluents) {
    const replacement = replacements.get(fluent);
    if (replacement) {
      target.addFluent(
        replacement.fluent,
        replacement.defaultInitialValue ? { defaultInitialValue: replacement.defaultInitialValue } : {},
      );
      continue;
    }
    const defaultInitialValue = source.fluentDefaults.get(fluent);
    target.addFluent(fluent, defaultInitialValue ? { defaultInitialValue } : {});
  }
  for (const [fluentExpression, value] of source.explicitInitialValues) {
    if (!replacements.has(fluentExpression.fluent())) {
      target.setInitialValue(fluentExpression, value);
    }
  }
  return target;
}

function conjuncts(node: FNode): readonly FNode[] {
  if (node.isTrue()) {
    return [];
  }
  return node.isAnd() ? node.args : [node];
}

/**
 * Fills {@link target} with the actions, goals, timed goals, timed effects and
 * quality metrics of {@link source}, every expression passed through
 * {@link rewrite}, and checks {@link invariant} wherever the state can change:
 * every precondition, every durative condition and effect timing, every timed
 * effect, the goals and the soft goals. Actions whose conditions become
 * contradictory are left out. Returns the new actions mapped to their sources.
 */
export function addInvariantToProblem(
  source: Problem,
  target: Problem,
  invariant: FNode,
  rewrite: (node: FNode) => FNode = (node) => node,
): Map<Action, Action> {
  const environment = source.environment;
  const em = environment.expressions;
  const conjoin = (conditions: readonly FNode[]): FNode =>
    environment.simplifier.simplify(em.and([...conditions, invariant]));

  const newToOld = new Map<Action, Action>();
  for (const action of source.actions) {
    const copy = mapActionExpressions(action, rewrite);
    switch (copy.kind) {
      case "instantaneous": {
        const precondition = conjoin(copy.preconditions);
        if (precondition.isFalse()) {
          continue;
        }
        copy.setPreconditions(conjuncts(precondition));
        break;
      }
      case "durative": {
        const conditions = copy.conditions;
        copy.clearConditions();
        let feasible = true;
        for (const { interval, conditions: list } of conditions) {
          const condition = conjoin(list);
          if (condition.isFalse()) {
            feasible = false;
          }
          conjuncts(condition).forEach((node) => copy.addCondition(interval, node));
        }
        const constrained = new Set(conditions.map(({ interval }) => intervalKey(interval)));
        for (const { timing } of copy.effects) {
          const interval = timePointInterval(timing);
          if (!constrained.has(intervalKey(interval))) {
            copy.addCondition(interval, invariant);
          }
        }
        if (!feasible) {
          continue;
        }
        break;
      }
    }
    target.addAction(copy);
    newToOld.set(copy, action);
  }

  for (const { timing, effects } of source.timedEffects) {
    for (const effect of effects) {
      target.addTimedEffectInstance(
        timing,
        effect.with({
          fluent: rewrite(effect.fluent),
          value: rewrite(effect.value),
          condition: rewrite(effect.condition),
        }),
      );
    }
  }
  for (const { interval, goals } of source.timedGoals) {
    conjuncts(conjoin(goals.map(rewrite))).forEach((goal) => target.addTimedGoal(interval, goal));
  }
  const goalIntervals = new Set(source.timedGoals.map(({ interval }) => intervalKey(interval)));
  for (const { timing } of source.timedEffects) {
    const interval = timePointInterval(timing);
    if (!goalIntervals.has(intervalKey(interval))) {
      target.addTimedGoal(interval, invariant);
    }
  }
  conjuncts(conjoin(source.goals.map(rewrite))).forEach((goal) => target.addGoal(goal));
  const metrics = rewriteQualityMetrics(source.qualityMetrics, newToOld, (goal) => conjoin([rewrite(goal)]), rewrite);
  metrics.forEach((metric) => target.addQualityMetric(metric));
  return newToOld;
}
