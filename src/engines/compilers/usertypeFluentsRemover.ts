import { UnsupportedProblemTypeError } from "../../errors.js";
import type { Action } from "../../model/action.js";
import { cartesianProduct, domainItems, type ObjectSource } from "../../model/domain.js";
import type { Effect } from "../../model/effect.js";
import type { Environment } from "../../model/environment.js";
import { Fluent } from "../../model/fluent.js";
import type { FNode } from "../../model/fnode.js";
import { Parameter } from "../../model/parameter.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import type { UserType } from "../../model/types.js";
import { Variable } from "../../model/variable.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import {
  getFreshName,
  redeclareProblem,
  replaceAction,
  rewriteQualityMetrics,
  type FluentReplacement,
  type NameSource,
} from "./utils.js";

/** A term whose usertype fluents were replaced by variables. */
interface RewrittenTerm {
  readonly node: FNode;
  /** One variable per removed fluent application, standing for its value. */
  readonly variables: readonly Variable[];
  /** `f(args, v)` atoms tying each variable to the application it replaces. */
  readonly bindings: readonly FNode[];
}

function unique<T>(items: readonly T[]): T[] {
  return [...new Set(items)];
}

/**
 * Rewrites expressions over the boolean fluents that replace the usertype
 * ones: `f(args)` of type `T` is read through a variable `v` of type `T`
 * bound by `f(args, v)`. Boolean sub-expressions close the variables they
 * use under an `exists`, so each value is looked up where it is compared.
 */
export class UsertypeFluentsRewriter {
  private readonly memo = new Map<FNode, RewrittenTerm>();
  private readonly issuedNames = new Set<string>();
  private readonly names: NameSource;

  constructor(
    private readonly environment: Environment,
    private readonly replacements: ReadonlyMap<Fluent, Fluent>,
    names: NameSource,
  ) {
    this.names = { hasName: (name) => names.hasName(name) || this.issuedNames.has(name) };
  }

  /** Boolean {@link node} without usertype fluents. */
  condition(node: FNode): FNode {
    return this.environment.simplifier.simplify(this.close(this.term(node)));
  }

  /** Numeric {@link node}; a usertype fluent has no place to be looked up in it. */
  numeric(node: FNode): FNode {
    const rewritten = this.term(node);
    if (rewritten.variables.length > 0) {
      throw new UnsupportedProblemTypeError(
        `${node.toString()} reads a usertype fluent outside a condition or an effect`,
        { expression: node.toString() },
      );
    }
    return rewritten.node;
  }

  /**
   * Ground-value instances of {@link effect}: one per value of every variable
   * the rewriting introduced. Boolean values that are not constant become a
   * pair of conditional assignments to `true` and `false`.
   */
  effects(effect: Effect, source: ObjectSource): Effect[] {
    const environment = this.environment;
    const em = environment.expressions;
    const condition = this.condition(effect.condition);
    const target = effect.fluent;
    if (!target.isFluentExp()) {
      return [effect.with({ value: this.condition(effect.value), condition })];
    }
    const targetArgs = target.args.map((arg) => this.term(arg));
    const replacement = this.replacements.get(target.fluent());

    let fluent: FNode;
    let value: FNode;
    let variables: Variable[];
    let bindings: FNode[];
    if (replacement && target.type.kind === "user") {
      const slot = this.freshVariable(replacement, target.type);
      const slotExp = em.variableExp(slot);
      fluent = em.fluentExp(replacement, [...targetArgs.map(({ node }) => node), slotExp]);
      const assigned = effect.value;
      const valueReplacement = assigned.isFluentExp() ? this.replacements.get(assigned.fluent()) : undefined;
      let valueParts: RewrittenTerm[];
      if (valueReplacement) {
        valueParts = assigned.args.map((arg) => this.term(arg));
        value = em.fluentExp(valueReplacement, [...valueParts.map(({ node }) => node), slotExp]);
      } else {
        const rewrittenValue = this.term(assigned);
        valueParts = [rewrittenValue];
        value = em.equals(rewrittenValue.node, slotExp);
      }
      variables = [slot, ...[...targetArgs, ...valueParts].flatMap((part) => part.variables)];
      bindings = [...targetArgs, ...valueParts].flatMap((part) => part.bindings);
    } else {
      const rewrittenValue = this.term(effect.value);
      fluent = em.fluentExp(
        target.fluent(),
        targetArgs.map(({ node }) => node),
      );
      value = rewrittenValue.node;
      variables = [...targetArgs, rewrittenValue].flatMap((part) => part.variables);
      bindings = [...targetArgs, rewrittenValue].flatMap((part) => part.bindings);
    }
    variables = unique(variables);
    bindings = unique(bindings);
    if (variables.length === 0) {
      return [effect.with({ fluent, value, condition })];
    }

    const keys = variables.map((variable) => em.variableExp(variable));
    const instances: Effect[] = [];
    const add = (instance: Effect): void => {
      if (!instance.condition.isFalse() && !instances.some((existing) => existing.equals(instance))) {
        instances.push(instance);
      }
    };
    for (const values of cartesianProduct(variables.map((variable) => domainItems(source, variable.type)))) {
      const substitutions = new Map<FNode, FNode>();
      keys.forEach((key, index) => substitutions.set(key, values[index] ?? key));
      const ground = (node: FNode): FNode =>
        environment.simplifier.simplify(environment.substituter.substitute(node, substitutions));
      const groundFluent = ground(fluent);
      const groundValue = ground(value);
      const guard = ground(em.and(condition, ...bindings));
      if (groundValue.type.kind === "bool" && !groundValue.isBoolConstant()) {
        add(effect.with({ fluent: groundFluent, value: em.trueExp(), condition: ground(em.and(guard, groundValue)) }));
        add(
          effect.with({
            fluent: groundFluent,
            value: em.falseExp(),
            condition: ground(em.and(guard, em.not(groundValue))),
          }),
        );
      } else {
        add(effect.with({ fluent: groundFluent, value: groundValue, condition: guard }));
      }
    }
    return instances;
  }

  private term(node: FNode): RewrittenTerm {
    const cached = this.memo.get(node);
    if (cached) {
      return cached;
    }
    const em = this.environment.expressions;
    const parts = node.args.map((arg): RewrittenTerm => {
      const rewritten = this.term(arg);
      return arg.type.kind === "bool" ? { node: this.close(rewritten), variables: [], bindings: [] } : rewritten;
    });
    const args = parts.map((part) => part.node);
    const variables = unique(parts.flatMap((part) => part.variables));
    const bindings = unique(parts.flatMap((part) => part.bindings));
    const replacement = node.isFluentExp() ? this.replacements.get(node.fluent()) : undefined;

    let result: RewrittenTerm;
    if (replacement && node.type.kind === "user") {
      const variable = this.freshVariable(replacement, node.type);
      const value = em.variableExp(variable);
      result = {
        node: value,
        variables: [...variables, variable],
        bindings: [...bindings, em.fluentExp(replacement, [...args, value])],
      };
    } else {
      const rebuilt = em.rebuild(node, args);
      result =
        rebuilt.type.kind === "bool" && variables.length > 0
          ? { node: this.close({ node: rebuilt, variables, bindings }), variables: [], bindings: [] }
          : { node: rebuilt, variables, bindings };
    }
    this.memo.set(node, result);
    return result;
  }

  private close(term: RewrittenTerm): FNode {
    if (term.variables.length === 0) {
      return term.node;
    }
    const em = this.environment.expressions;
    return em.exists(em.and([term.node, ...term.bindings]), ...term.variables);
  }

  private freshVariable(replacement: Fluent, type: UserType): Variable {
    const base = `${replacement.name}_${type.name}`.toLowerCase();
    const name = getFreshName(this.names, base);
    this.issuedNames.add(name);
    return new Variable(name, type);
  }
}

/**
 * Replaces every fluent of a user type `T` by a boolean fluent with one more
 * parameter of type `T`: `f(args) = o` becomes `f(args, o)`. Conditions read
 * the value through an existential, assignments become one conditional effect
 * per object of `T`.
 */
export class UsertypeFluentsRemover extends Compiler {
  readonly name = "uftr";

  constructor(options: CompilerOptions = {}) {
    super("USERTYPE_FLUENTS_REMOVING", options);
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
      "TRAJECTORY_CONSTRAINTS",
    ]);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "USERTYPE_FLUENTS_REMOVING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    if (kind.has("OBJECT_FLUENTS")) {
      kind
        .unset("OBJECT_FLUENTS", "FLUENTS_IN_OBJECT_ASSIGNMENTS")
        .set("CONDITIONAL_EFFECTS", "EXISTENTIAL_CONDITIONS", "EQUALITIES", "NEGATIVE_CONDITIONS");
    }
    return kind;
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const environment = problem.environment;
    const em = environment.expressions;

    const replacements = new Map<Fluent, FluentReplacement>();
    const booleans = new Map<Fluent, Fluent>();
    for (const fluent of problem.fluents) {
      const type = fluent.type;
      if (type.kind !== "user") {
        continue;
      }
      const signatureNames: NameSource = {
        hasName: (name) => fluent.signature.some((parameter) => parameter.name === name),
      };
      const parameter = new Parameter(getFreshName(signatureNames, type.name.toLowerCase()), type);
      const signature = [...fluent.signature, parameter];
      const replacement = new Fluent(fluent.name, environment.types.boolType(), signature, environment);
      replacements.set(fluent, { fluent: replacement, defaultInitialValue: em.falseExp() });
      booleans.set(fluent, replacement);
    }

    const compiled = redeclareProblem(problem, `${problem.name}_${this.name}`, replacements);
    for (const [fluent, replacement] of booleans) {
      const groundings = cartesianProduct(fluent.signature.map((parameter) => domainItems(problem, parameter.type)));
      for (const args of groundings) {
        const value = problem.initialValue(em.fluentExp(fluent, args));
        compiled.setInitialValue(em.fluentExp(replacement, [...args, value]), true);
      }
    }

    const rewriter = new UsertypeFluentsRewriter(environment, booleans, problem);
    const condition = (node: FNode): FNode => rewriter.condition(node);
    const effects = (effect: Effect): Effect[] => rewriter.effects(effect, problem);

    const newToOld = new Map<Action, Action>();
    for (const action of problem.actions) {
      const copy = action.clone();
      switch (copy.kind) {
        case "instantaneous": {
          const original = copy.effects;
          copy.setPreconditions(copy.preconditions.map(condition));
          copy.clearEffects();
          original.flatMap(effects).forEach((effect) => copy.addEffectInstance(effect));
          break;
        }
        case "durative": {
          const { conditions, effects: timedEffects, duration } = copy;
          copy.setDuration({
            ...duration,
            lower: rewriter.numeric(duration.lower),
            upper: rewriter.numeric(duration.upper),
          });
          copy.clearConditions();
          for (const { interval, conditions: list } of conditions) {
            list.forEach((node) => copy.addCondition(interval, condition(node)));
          }
          copy.clearEffects();
          for (const { timing, effects: list } of timedEffects) {
            list.flatMap(effects).forEach((effect) => copy.addEffectInstance(timing, effect));
          }
          break;
        }
      }
      compiled.addAction(copy);
      newToOld.set(copy, action);
    }

    for (const { timing, effects: list } of problem.timedEffects) {
      list.flatMap(effects).forEach((effect) => compiled.addTimedEffectInstance(timing, effect));
    }
    for (const { interval, goals } of problem.timedGoals) {
      goals.forEach((goal) => compiled.addTimedGoal(interval, condition(goal)));
    }
    problem.goals.forEach((goal) => compiled.addGoal(condition(goal)));
    problem.trajectoryConstraints.forEach((constraint) => compiled.addTrajectoryConstraint(condition(constraint)));
    rewriteQualityMetrics(problem.qualityMetrics, newToOld, condition, (node) => rewriter.numeric(node)).forEach(
      (metric) => compiled.addQualityMetric(metric),
    );

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }
}
