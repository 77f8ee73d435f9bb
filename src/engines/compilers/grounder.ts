import { UsageError } from "../../errors.js";
import type { StructuredLogger } from "../../logger.js";
import { DurativeAction, InstantaneousAction, type Action } from "../../model/action.js";
import { cartesianProduct, domainItems } from "../../model/domain.js";
import type { Effect } from "../../model/effect.js";
import type { Expression } from "../../model/expression.js";
import type { FNode } from "../../model/fnode.js";
import { minimizeActionCosts, actionCost, type PlanQualityMetric } from "../../model/metrics.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import { Simplifier } from "../../model/walkers/simplifier.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import {
  checkAndSimplifyConditions,
  checkAndSimplifyPreconditions,
  getFreshName,
  liftActionInstance,
  type LiftedAction,
  type NameSource,
} from "./utils.js";

/** Explicit groundings, keyed by action name. An action absent from the map is not grounded at all. */
export type GroundingActionsMap = ReadonlyMap<string, readonly (readonly Expression[])[]>;

export interface GrounderHelperOptions {
  /** Replaces the enumeration of parameter domains with the listed tuples. */
  readonly groundingActionsMap?: GroundingActionsMap | null;
  /** Narrows parameter domains through static boolean preconditions. Defaults to `true`. */
  readonly prunesStaticFluents?: boolean;
  /** Receives `grounder_pruned_parameters` entries when pruning removes candidates. */
  readonly logger?: StructuredLogger;
}

/** One step of {@link GrounderHelper.getGroundedActions}. */
export interface GroundedAction {
  readonly original: Action;
  readonly parameters: readonly FNode[];
  readonly grounded: Action | null;
}

/**
 * Grounds the actions of a problem. Results are cached: grounding the same
 * action with the same values twice returns the same object, and `null`
 * marks an instantiation that is meaningless (contradictory conditions,
 * conflicting effects or no effect at all).
 */
export class GrounderHelper {
  public readonly simplifier: Simplifier;
  private readonly memo = new Map<string, Action | null>();
  private readonly groundingActionsMap: GroundingActionsMap | null;
  private readonly prunesStaticFluents: boolean;
  private readonly logger: StructuredLogger | null;
  private readonly issuedNames = new Set<string>();
  /** Names of the problem plus every name already given to a grounding. */
  private readonly names: NameSource;

  constructor(
    private readonly problem: Problem,
    options: GrounderHelperOptions = {},
  ) {
    this.simplifier = new Simplifier(problem.environment, problem);
    this.groundingActionsMap = options.groundingActionsMap ?? null;
    this.prunesStaticFluents = options.prunesStaticFluents ?? true;
    this.logger = options.logger ?? null;
    this.names = { hasName: (name) => problem.hasName(name) || this.issuedNames.has(name) };
  }

  groundAction(action: Action, parameterValues: readonly Expression[] = []): Action | null {
    if (parameterValues.length !== action.parameters.length) {
      throw new UsageError(
        `The number of given parameters for the grounding of ${action.name} is different from the action's parameters`,
        { action: action.name, expected: action.parameters.length, received: parameterValues.length },
      );
    }
    const em = this.problem.environment.expressions;
    const values = parameterValues.map((value) => em.promote(value));
    const key = `${action.name}|${values.map((value) => value.id).join(",")}`;
    const cached = this.memo.get(key);
    if (cached !== undefined) {
      return cached;
    }
    let grounded: Action | null;
    if (action.parameters.length === 0) {
      grounded = this.groundingActionsMap && !this.groundingActionsMap.has(action.name) ? null : action.clone();
    } else {
      grounded = this.instantiate(action, values);
    }
    this.memo.set(key, grounded);
    return grounded;
  }

  /** Candidate parameter tuples of {@link action}, in enumeration order. */
  *getPossibleParameters(action: Action): Generator<FNode[]> {
    const em = this.problem.environment.expressions;
    if (this.groundingActionsMap) {
      const tuples = this.groundingActionsMap.get(action.name);
      if (!tuples) {
        return;
      }
      for (const tuple of tuples) {
        if (tuple.length !== action.parameters.length) {
          throw new UsageError(`grounding of ${action.name} lists ${tuple.length} values`, {
            action: action.name,
            expected: action.parameters.length,
          });
        }
        yield tuple.map((value) => em.promote(value));
      }
      return;
    }
    if (action.parameters.length === 0) {
      yield [];
      return;
    }
    let candidates = action.parameters.map((parameter) => domainItems(this.problem, parameter.type));
    if (this.prunesStaticFluents) {
      candidates = this.prune(action, candidates);
    }
    yield* cartesianProduct(candidates);
  }

  /** Every grounding of every action, each `(action, parameters)` pair once. */
  *getGroundedActions(): Generator<GroundedAction> {
    for (const original of this.problem.actions) {
      for (const parameters of this.getPossibleParameters(original)) {
        yield { original, parameters, grounded: this.groundAction(original, parameters) };
      }
    }
  }

  private instantiate(action: Action, values: readonly FNode[]): Action | null {
    const em = this.problem.environment.expressions;
    const substitutions = new Map<FNode, FNode>();
    action.parameters.forEach((parameter, index) => {
      const value = values[index];
      if (value) {
        substitutions.set(em.paramExp(parameter), value);
      }
    });
    const substitute = (node: FNode): FNode => this.problem.environment.substituter.substitute(node, substitutions);
    const name = getFreshName(
      this.names,
      action.name,
      values.map((value) => value.toString()),
    );
    this.issuedNames.add(name);
    const groundEffect = (effect: Effect): Effect | null => {
      const condition = this.simplifier.simplify(substitute(effect.condition));
      if (condition.isFalse()) {
        return null;
      }
      return effect.with({ fluent: substitute(effect.fluent), value: substitute(effect.value), condition });
    };

    switch (action.kind) {
      case "instantaneous": {
        const grounded = new InstantaneousAction(name, [], action.environment);
        action.preconditions.forEach((precondition) => grounded.addPrecondition(substitute(precondition)));
        for (const effect of action.effects) {
          const created = groundEffect(effect);
          if (created && !grounded.tryAddEffect(created).ok) {
            return null;
          }
        }
        if (grounded.effects.length === 0) {
          return null;
        }
        const simplified = checkAndSimplifyPreconditions(this.problem.environment, grounded, this.simplifier);
        if (!simplified.feasible) {
          return null;
        }
        grounded.setPreconditions(simplified.conditions);
        return grounded;
      }
      case "durative": {
        const grounded = new DurativeAction(name, [], action.environment);
        const duration = action.duration;
        grounded.setDuration({ ...duration, lower: substitute(duration.lower), upper: substitute(duration.upper) });
        for (const { interval, conditions } of action.conditions) {
          conditions.forEach((condition) => grounded.addCondition(interval, substitute(condition)));
        }
        for (const { timing, effects } of action.effects) {
          for (const effect of effects) {
            const created = groundEffect(effect);
            if (created && !grounded.tryAddEffect(timing, created).ok) {
              return null;
            }
          }
        }
        if (grounded.allEffects.length === 0) {
          return null;
        }
        const simplified = checkAndSimplifyConditions(this.problem.environment, grounded, this.simplifier);
        if (!simplified.feasible) {
          return null;
        }
        grounded.clearConditions();
        simplified.conditions.forEach(({ interval, condition }) => grounded.addCondition(interval, condition));
        return grounded;
      }
    }
  }

  /**
   * Keeps, for each parameter, the values appearing at the matching position
   * of a true initial value of every static boolean fluent the action
   * requires on that parameter.
   */
  private prune(action: Action, candidates: FNode[][]): FNode[][] {
    const staticFluents = this.problem.getStaticFluents();
    const conjuncts =
      action.kind === "instantaneous"
        ? action.preconditions
        : action.conditions.flatMap(({ conditions }) => conditions);
    const literals = conjuncts
      .flatMap((condition) => (condition.isAnd() ? condition.args : [condition]))
      .filter(
        (condition) =>
          condition.isFluentExp() &&
          condition.type.kind === "bool" &&
          staticFluents.has(condition.fluent()) &&
          condition.args.some((arg) => arg.isParameterExp()),
      );
    if (literals.length === 0) {
      return candidates;
    }
    const pruned = candidates.map((list) => [...list]);
    let closure: ReadonlyMap<FNode, FNode> | null = null;
    for (const literal of literals) {
      const fluent = literal.fluent();
      const defaultValue = this.problem.fluentDefaults.get(fluent);
      let source: ReadonlyMap<FNode, FNode>;
      if (defaultValue?.isFalse()) {
        source = this.problem.explicitInitialValues;
      } else {
        closure ??= this.problem.initialValues;
        source = closure;
      }
      const trueApplications = [...source]
        .filter(([application, value]) => application.isFluentExp() && application.fluent() === fluent && value.isTrue())
        .map(([application]) => application);
      literal.args.forEach((arg, position) => {
        if (!arg.isParameterExp()) {
          return;
        }
        const index = action.parameters.indexOf(arg.parameter());
        const list = pruned[index];
        if (index < 0 || !list) {
          return;
        }
        const allowed = new Set(trueApplications.map((application) => application.args[position]));
        pruned[index] = list.filter((value) => allowed.has(value));
      });
    }
    const before = candidates.reduce((total, list) => total * list.length, 1);
    const after = pruned.reduce((total, list) => total * list.length, 1);
    if (after < before) {
      this.logger?.debug("grounder_pruned_parameters", {
        action: action.name,
        before,
        after,
        literals: literals.map((literal) => literal.toString()),
      });
    }
    return pruned;
  }
}

export interface GrounderOptions extends CompilerOptions {
  /** Explicit groundings replacing the enumeration of the parameter domains. */
  readonly groundingActionsMap?: GroundingActionsMap | null;
  /** Overrides the `groundingPruning` configuration entry. */
  readonly prunesStaticFluents?: boolean;
}

/**
 * Replaces every lifted action with its meaningful groundings. The map-back
 * lifts a grounded instance to the original action applied to the values it
 * was grounded with.
 */
export class Grounder extends Compiler {
  readonly name = "grounder";
  private readonly groundingActionsMap: GroundingActionsMap | null;
  private readonly prunesStaticFluents: boolean;

  constructor(options: GrounderOptions = {}) {
    super("GROUNDING", options);
    this.groundingActionsMap = options.groundingActionsMap ?? null;
    this.prunesStaticFluents = options.prunesStaticFluents ?? this.config.groundingPruning;
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
      "STATE_INVARIANTS",
      "TRAJECTORY_CONSTRAINTS",
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
    return compilationKind === "GROUNDING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    return problemKind.clone();
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const helper = new GrounderHelper(problem, {
      groundingActionsMap: this.groundingActionsMap,
      prunesStaticFluents: this.prunesStaticFluents,
      logger: this.logger,
    });
    const traceBack = new Map<Action, LiftedAction>();
    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;
    compiled.clearActions();
    for (const { original, parameters, grounded } of helper.getGroundedActions()) {
      if (grounded && !traceBack.has(grounded)) {
        compiled.addAction(grounded);
        traceBack.set(grounded, { action: original, parameters });
      }
    }

    compiled.clearQualityMetrics();
    for (const metric of problem.qualityMetrics) {
      compiled.addQualityMetric(this.groundMetric(problem, metric, traceBack, helper.simplifier));
    }

    return {
      problem: compiled,
      mapBackActionInstance: liftActionInstance(traceBack),
      engineName: this.name,
    };
  }

  private groundMetric(
    problem: Problem,
    metric: PlanQualityMetric,
    traceBack: ReadonlyMap<Action, LiftedAction>,
    simplifier: Simplifier,
  ): PlanQualityMetric {
    if (metric.kind !== "minimize_action_costs") {
      return metric;
    }
    const em = problem.environment.expressions;
    const costs = new Map<string, FNode>();
    for (const [grounded, { action, parameters }] of traceBack) {
      const cost = actionCost(metric, action.name);
      if (!cost) {
        continue;
      }
      const substitutions = new Map<FNode, FNode>();
      action.parameters.forEach((parameter, index) => {
        const value = parameters[index];
        if (value) {
          substitutions.set(em.paramExp(parameter), value);
        }
      });
      costs.set(grounded.name, simplifier.simplify(problem.environment.substituter.substitute(cost, substitutions)));
    }
    return minimizeActionCosts(costs);
  }
}
