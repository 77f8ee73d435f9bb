import { cartesianProduct, domainItems } from "../../model/domain.js";
import { Fluent } from "../../model/fluent.js";
import type { FNode } from "../../model/fnode.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import {
  addInvariantToProblem,
  fluentsSubstituter,
  redeclareProblem,
  replaceAction,
  type FluentReplacement,
} from "./utils.js";

/**
 * Replaces every bounded numeric fluent by an unbounded one with the same
 * name and signature. The bounds of each grounding become an invariant,
 * checked wherever the state can change.
 */
export class BoundedTypesRemover extends Compiler {
  readonly name = "btrm";

  constructor(options: CompilerOptions = {}) {
    super("BOUNDED_TYPES_REMOVING", options);
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
    return compilationKind === "BOUNDED_TYPES_REMOVING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    if (kind.has("BOUNDED_TYPES") && kind.has("TIMED_EFFECTS")) {
      kind.set("TIMED_GOALS");
    }
    return kind.unset("BOUNDED_TYPES");
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const environment = problem.environment;
    const em = environment.expressions;
    const types = environment.types;

    const replacements = new Map<Fluent, FluentReplacement>();
    const renamed = new Map<Fluent, Fluent>();
    const bounds: FNode[] = [];
    for (const fluent of problem.fluents) {
      const type = fluent.type;
      if ((type.kind !== "int" && type.kind !== "real") || (type.lowerBound === null && type.upperBound === null)) {
        continue;
      }
      const unbounded = new Fluent(
        fluent.name,
        type.kind === "int" ? types.intType() : types.realType(),
        fluent.signature,
        environment,
      );
      const defaultInitialValue = problem.fluentDefaults.get(fluent);
      replacements.set(
        fluent,
        defaultInitialValue ? { fluent: unbounded, defaultInitialValue } : { fluent: unbounded },
      );
      renamed.set(fluent, unbounded);
      const groundings = cartesianProduct(fluent.signature.map((parameter) => domainItems(problem, parameter.type)));
      for (const args of groundings) {
        const application = em.fluentExp(unbounded, args);
        if (type.lowerBound !== null) {
          bounds.push(em.le(type.lowerBound, application));
        }
        if (type.upperBound !== null) {
          bounds.push(em.le(application, type.upperBound));
        }
      }
    }

    const substitute = fluentsSubstituter(environment, renamed);
    const compiled = redeclareProblem(problem, `${problem.name}_${this.name}`, replacements);
    for (const [fluentExpression, value] of problem.explicitInitialValues) {
      if (renamed.has(fluentExpression.fluent())) {
        compiled.setInitialValue(substitute(fluentExpression), value);
      }
    }
    problem.trajectoryConstraints.forEach((constraint) => compiled.addTrajectoryConstraint(substitute(constraint)));
    const newToOld = addInvariantToProblem(problem, compiled, em.and(bounds), substitute);

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }
}
