import { ExpressionDefinitionError, ProblemDefinitionError } from "../../errors.js";
import type { Action } from "../../model/action.js";
import { Effect } from "../../model/effect.js";
import type { Environment } from "../../model/environment.js";
import { Fluent } from "../../model/fluent.js";
import type { FNode } from "../../model/fnode.js";
import type { PlanObject } from "../../model/object.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import { isNumericType, type UserType } from "../../model/types.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import { getFreshName, replaceAction, rewriteQualityMetrics } from "./utils.js";

/**
 * Rewrites the negation normal form of a condition so that no `not` is left:
 * negated fluents become twin fluents, negated comparisons are turned into
 * their positive counterparts.
 */
export class NegativeFluentRemover {
  private readonly mapping = new Map<Fluent, Fluent>();
  private readonly memo = new Map<FNode, FNode>();
  private readonly environment: Environment;

  constructor(private readonly problem: Problem) {
    this.environment = problem.environment;
  }

  /** Original fluent to the twin holding its negation, in creation order. */
  get fluentMapping(): ReadonlyMap<Fluent, Fluent> {
    return this.mapping;
  }

  removeNegativeFluents(expression: FNode): FNode {
    return this.walk(this.environment.nnf.getNnfExpression(expression));
  }

  /** Creates the twins {@link expressions} need; their rewriting is cached for later calls. */
  collectNegatedFluents(expressions: Iterable<FNode>): void {
    for (const expression of expressions) {
      this.removeNegativeFluents(expression);
    }
  }

  private walk(node: FNode): FNode {
    const cached = this.memo.get(node);
    if (cached) {
      return cached;
    }
    const result = node.isNot()
      ? this.negate(node)
      : this.environment.expressions.rebuild(
          node,
          node.args.map((arg) => this.walk(arg)),
        );
    this.memo.set(node, result);
    return result;
  }

  private negate(node: FNode): FNode {
    const em = this.environment.expressions;
    const inner = node.arg(0);
    switch (inner.kind) {
      case "fluent_exp":
        return em.fluentExp(this.twin(inner.fluent()), inner.args);
      case "le":
        return em.gt(inner.arg(0), inner.arg(1));
      case "lt":
        return em.ge(inner.arg(0), inner.arg(1));
      case "equals":
        return this.negatedEquality(inner.arg(0), inner.arg(1));
      default:
        throw new ExpressionDefinitionError(`Expression: ${node.toString()} is not in NNF.`, {
          expression: node.toString(),
        });
    }
  }

  private negatedEquality(left: FNode, right: FNode): FNode {
    const em = this.environment.expressions;
    if (isNumericType(left.type) && isNumericType(right.type)) {
      return em.or(em.gt(left, right), em.lt(left, right));
    }
    if (left.type.kind === "bool") {
      const difference = em.or(em.and(left, em.not(right)), em.and(em.not(left), right));
      return this.walk(this.environment.nnf.getNnfExpression(difference));
    }
    if (left.type.kind !== "user" || right.type.kind !== "user") {
      throw new ExpressionDefinitionError(`cannot negate the equality ${left.toString()} == ${right.toString()}`);
    }
    if (right.isObjectExp() && !left.isObjectExp()) {
      return this.differentFrom(left, left.type, right);
    }
    if (left.isObjectExp() && !right.isObjectExp()) {
      return this.differentFrom(right, right.type, left);
    }
    const leftObjects = this.objectsOf(left.type);
    const rightObjects = this.objectsOf(right.type);
    const pairs: FNode[] = [];
    for (const first of leftObjects) {
      for (const second of rightObjects) {
        if (first !== second) {
          pairs.push(em.and(em.equals(left, first), em.equals(right, second)));
        }
      }
    }
    return em.or(pairs);
  }

  private differentFrom(term: FNode, type: UserType, constant: FNode): FNode {
    const em = this.environment.expressions;
    const excluded = constant.object();
    return em.or(
      this.objectsOf(type)
        .filter((object) => object !== excluded)
        .map((object) => em.equals(term, object)),
    );
  }

  private objectsOf(type: UserType): readonly PlanObject[] {
    const objects = this.problem.objects(type);
    if (objects.length === 0) {
      throw new ProblemDefinitionError(`Type ${type.name} has no objects; a negated equality over it cannot be removed.`, {
        type: type.name,
      });
    }
    return objects;
  }

  private twin(fluent: Fluent): Fluent {
    const known = this.mapping.get(fluent);
    if (known) {
      return known;
    }
    const created = new Fluent(
      getFreshName(this.problem, `not_${fluent.name}`),
      fluent.type,
      fluent.signature,
      fluent.environment,
    );
    this.mapping.set(fluent, created);
    return created;
  }
}

/**
 * Removes negations from conditions and goals. Every negated fluent gets a
 * twin fluent kept equal to its negation by the initial state and by a twin
 * effect next to every effect on the original.
 */
export class NegativeConditionsRemover extends Compiler {
  readonly name = "ncrm";

  constructor(options: CompilerOptions = {}) {
    super("NEGATIVE_CONDITIONS_REMOVING", options);
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
    ]);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "NEGATIVE_CONDITIONS_REMOVING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    if (kind.has("NEGATIVE_CONDITIONS") && kind.has("EQUALITIES")) {
      kind.set("DISJUNCTIVE_CONDITIONS");
    }
    return kind.unset("NEGATIVE_CONDITIONS");
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const environment = problem.environment;
    const em = environment.expressions;
    const remover = new NegativeFluentRemover(problem);
    const rewrite = (expression: FNode): FNode => remover.removeNegativeFluents(expression);
    const rewriteEffect = (effect: Effect): Effect =>
      effect.isConditional() ? effect.with({ condition: rewrite(effect.condition) }) : effect;

    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;
    compiled.clearActions();
    compiled.clearGoals();
    compiled.clearTimedGoals();
    compiled.clearTimedEffects();
    compiled.clearQualityMetrics();

    const rewritten: Action[] = problem.actions.map((action) => {
      switch (action.kind) {
        case "instantaneous": {
          const copy = action.clone();
          copy.setPreconditions(action.preconditions.map(rewrite));
          copy.clearEffects();
          action.effects.forEach((effect) => copy.addEffectInstance(rewriteEffect(effect)));
          return copy;
        }
        case "durative": {
          const copy = action.clone();
          copy.clearConditions();
          for (const { interval, conditions } of action.conditions) {
            conditions.forEach((condition) => copy.addCondition(interval, rewrite(condition)));
          }
          copy.clearEffects();
          for (const { timing, effects } of action.effects) {
            effects.forEach((effect) => copy.addEffectInstance(timing, rewriteEffect(effect)));
          }
          return copy;
        }
      }
    });
    const timedEffects = problem.timedEffects.map(({ timing, effects }) => ({
      timing,
      effects: effects.map(rewriteEffect),
    }));
    const goals = problem.goals.map(rewrite);
    const timedGoals = problem.timedGoals.map(({ interval, goals: list }) => ({ interval, goals: list.map(rewrite) }));
    // Oversubscription goals are rewritten with the metrics, after the twins are declared.
    remover.collectNegatedFluents(
      problem.qualityMetrics.flatMap((metric) =>
        metric.kind === "oversubscription" || metric.kind === "temporal_oversubscription"
          ? metric.goals.map(({ goal }) => goal)
          : [],
      ),
    );

    const mapping = remover.fluentMapping;
    for (const [fluent, twin] of mapping) {
      const fallback = problem.fluentDefaults.get(fluent);
      compiled.addFluent(twin, fallback ? { defaultInitialValue: !fallback.boolConstantValue() } : {});
    }
    for (const [application, value] of problem.explicitInitialValues) {
      const twin = mapping.get(application.fluent());
      if (twin) {
        compiled.setInitialValue(em.fluentExp(twin, application.args), !value.boolConstantValue());
      }
    }

    const twinEffect = (effect: Effect): Effect | null => {
      if (!effect.fluent.isFluentExp()) {
        return null;
      }
      const twin = mapping.get(effect.fluent.fluent());
      if (!twin) {
        return null;
      }
      return new Effect(
        em.fluentExp(twin, effect.fluent.args),
        environment.simplifier.simplify(em.not(effect.value)),
        effect.condition,
        effect.kind,
        effect.forall,
      );
    };

    const newToOld = new Map<Action, Action>();
    problem.actions.forEach((original, index) => {
      const source = rewritten[index];
      if (!source) {
        return;
      }
      const action = source.clone(getFreshName(compiled, original.name));
      switch (action.kind) {
        case "instantaneous":
          for (const effect of [...action.effects]) {
            const created = twinEffect(effect);
            if (created) {
              action.addEffectInstance(created);
            }
          }
          break;
        case "durative":
          for (const { timing, effects } of action.effects) {
            for (const effect of effects) {
              const created = twinEffect(effect);
              if (created) {
                action.addEffectInstance(timing, created);
              }
            }
          }
          break;
      }
      compiled.addAction(action);
      newToOld.set(action, original);
    });

    for (const { timing, effects } of timedEffects) {
      for (const effect of effects) {
        compiled.addTimedEffectInstance(timing, effect);
        const created = twinEffect(effect);
        if (created) {
          compiled.addTimedEffectInstance(timing, created);
        }
      }
    }
    goals.forEach((goal) => compiled.addGoal(goal));
    for (const { interval, goals: list } of timedGoals) {
      list.forEach((goal) => compiled.addTimedGoal(interval, goal));
    }
    rewriteQualityMetrics(problem.qualityMetrics, newToOld, rewrite).forEach((metric) => compiled.addQualityMetric(metric));

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }
}
