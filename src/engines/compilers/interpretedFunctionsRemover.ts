import { UnsupportedProblemTypeError } from "../../errors.js";
import type { Action, InstantaneousAction } from "../../model/action.js";
import { cartesianProduct } from "../../model/domain.js";
import type { Effect } from "../../model/effect.js";
import type { FNode } from "../../model/fnode.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import { isCompatibleType, isNumericType, type PlanningType } from "../../model/types.js";
import { collectInterpretedFunctionExpressions } from "../../model/walkers/extractors.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import { checkAndSimplifyPreconditions, getFreshName, replaceAction, rewriteQualityMetrics } from "./utils.js";

/** Bounds given to a duration that depends on an interpreted function. */
export const UNKNOWN_DURATION_BOUNDS = { lower: 1, upper: 1_000_000 } as const;

export interface InterpretedFunctionsRemoverOptions extends CompilerOptions {
  /** Known values of ground interpreted-function applications. */
  knowledge?: ReadonlyMap<FNode, FNode>;
}

/** One way an application can be resolved: a known value under a guard, or unknown. */
interface Resolution {
  readonly application: FNode;
  readonly guard: FNode;
  readonly value: FNode | null;
}

function comparable(left: PlanningType, right: PlanningType): boolean {
  return (
    (isNumericType(left) && isNumericType(right)) ||
    (left.kind === "bool" && right.kind === "bool") ||
    isCompatibleType(left, right) ||
    isCompatibleType(right, left)
  );
}

function mentionsInterpretedFunction(node: FNode): boolean {
  return collectInterpretedFunctionExpressions(node).size > 0;
}

/** Top-level conjuncts of {@link node}, so that dropping one check keeps its siblings. */
function conjunctsOf(node: FNode): readonly FNode[] {
  return node.isAnd() ? node.args : [node];
}

/**
 * Removes interpreted functions from action preconditions. Every action is
 * split over the known values of the applications it checks, plus one
 * variant where the value is unknown and the checks are dropped. Durative
 * actions keep the conjuncts of their conditions that mention no
 * interpreted function.
 */
export class InterpretedFunctionsRemover extends Compiler {
  readonly name = "ifrm";
  private readonly knowledge: ReadonlyMap<FNode, FNode>;

  constructor(options: InterpretedFunctionsRemoverOptions = {}) {
    super("INTERPRETED_FUNCTIONS_REMOVING", options);
    this.knowledge = new Map(options.knowledge ?? []);
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
      "INTERPRETED_FUNCTIONS_IN_CONDITIONS",
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
      "INTERPRETED_FUNCTIONS_IN_DURATIONS",
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
    return compilationKind === "INTERPRETED_FUNCTIONS_REMOVING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    if (kind.has("INTERPRETED_FUNCTIONS_IN_CONDITIONS") && this.knowledge.size > 0) {
      kind.set("EQUALITIES", "NEGATIVE_CONDITIONS");
    }
    if (kind.has("INTERPRETED_FUNCTIONS_IN_DURATIONS")) {
      kind.set("DURATION_INEQUALITIES");
    }
    return kind.unset("INTERPRETED_FUNCTIONS_IN_CONDITIONS", "INTERPRETED_FUNCTIONS_IN_DURATIONS");
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    this.rejectUnsupportedUses(problem);

    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;
    compiled.clearActions();
    compiled.clearQualityMetrics();

    const newToOld = new Map<Action, Action>();
    for (const action of problem.actions) {
      if (action.kind === "instantaneous") {
        for (const variant of this.instantaneousVariants(action)) {
          const named = variant.clone(getFreshName(compiled, action.name));
          compiled.addAction(named);
          newToOld.set(named, action);
        }
        continue;
      }
      const copy = action.clone(getFreshName(compiled, action.name));
      copy.clearConditions();
      for (const { interval, conditions } of action.conditions) {
        conditions
          .flatMap(conjunctsOf)
          .filter((condition) => !mentionsInterpretedFunction(condition))
          .forEach((condition) => copy.addCondition(interval, condition));
      }
      const { lower, upper } = action.duration;
      if (mentionsInterpretedFunction(lower) || mentionsInterpretedFunction(upper)) {
        copy.setClosedDurationInterval(UNKNOWN_DURATION_BOUNDS.lower, UNKNOWN_DURATION_BOUNDS.upper);
      }
      compiled.addAction(copy);
      newToOld.set(copy, action);
    }
    rewriteQualityMetrics(problem.qualityMetrics, newToOld).forEach((metric) => compiled.addQualityMetric(metric));

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }

  private instantaneousVariants(action: InstantaneousAction): InstantaneousAction[] {
    const environment = action.environment;
    const applications = [
      ...new Set(action.preconditions.flatMap((precondition) => [...collectInterpretedFunctionExpressions(precondition)])),
    ];
    if (applications.length === 0) {
      return [action.clone()];
    }
    const variants: InstantaneousAction[] = [];
    for (const choice of cartesianProduct(applications.map((application) => this.resolutions(application)))) {
      const substitutions = new Map<FNode, FNode>();
      for (const { application, value } of choice) {
        if (value) {
          substitutions.set(application, value);
        }
      }
      const preconditions = action.preconditions
        .flatMap(conjunctsOf)
        .map((precondition) => environment.substituter.substitute(precondition, substitutions))
        .filter((precondition) => !mentionsInterpretedFunction(precondition));
      const variant = action.clone();
      variant.setPreconditions([...preconditions, ...choice.map(({ guard }) => guard)]);
      const simplified = checkAndSimplifyPreconditions(environment, variant, environment.simplifier);
      if (!simplified.feasible) {
        continue;
      }
      variant.setPreconditions(simplified.conditions);
      variants.push(variant);
    }
    return variants;
  }

  private resolutions(application: FNode): Resolution[] {
    const fn = application.interpretedFunction();
    const em = fn.environment.expressions;
    const known = [...this.knowledge].filter(
      ([key]) =>
        key.isInterpretedFunctionExp() &&
        key.interpretedFunction() === fn &&
        key.args.length === application.args.length &&
        key.args.every((arg, index) => comparable(arg.type, application.arg(index).type)),
    );
    const matches = (key: FNode): FNode =>
      em.and(application.args.map((arg, index) => em.equals(arg, key.arg(index))));
    return [
      ...known.map(([key, value]) => ({ application, guard: matches(key), value })),
      { application, guard: em.and(known.map(([key]) => em.not(matches(key)))), value: null },
    ];
  }

  /** Interpreted functions are only removable from conditions and durations. */
  private rejectUnsupportedUses(problem: Problem): void {
    const reject = (where: string, node: FNode): void => {
      if (mentionsInterpretedFunction(node)) {
        throw new UnsupportedProblemTypeError(`Interpreted function in ${where} ${node.toString()} cannot be removed.`, {
          where,
          expression: node.toString(),
        });
      }
    };
    const rejectEffect = (where: string, effect: Effect): void => {
      [effect.fluent, effect.value, effect.condition].forEach((node) => reject(where, node));
    };
    for (const action of problem.actions) {
      switch (action.kind) {
        case "instantaneous":
          action.effects.forEach((effect) => rejectEffect(`effect of ${action.name}`, effect));
          break;
        case "durative":
          action.allEffects.forEach((effect) => rejectEffect(`effect of ${action.name}`, effect));
          break;
      }
    }
    problem.goals.forEach((goal) => reject("goal", goal));
    for (const { goals } of problem.timedGoals) {
      goals.forEach((goal) => reject("timed goal", goal));
    }
    for (const { effects } of problem.timedEffects) {
      effects.forEach((effect) => rejectEffect("timed effect", effect));
    }
  }
}
