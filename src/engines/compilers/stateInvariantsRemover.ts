import type { FNode } from "../../model/fnode.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import { addInvariantToProblem, replaceAction } from "./utils.js";

/** Arguments of the `always` constraints found at the top of {@link constraints}. */
function stateInvariants(constraints: readonly FNode[]): { invariants: FNode[]; others: FNode[] } {
  const invariants: FNode[] = [];
  const others: FNode[] = [];
  const visit = (constraint: FNode): void => {
    if (constraint.kind === "always") {
      invariants.push(constraint.arg(0));
    } else if (constraint.isAnd()) {
      constraint.args.forEach(visit);
    } else {
      others.push(constraint);
    }
  };
  constraints.forEach(visit);
  return { invariants, others };
}

/**
 * Turns the `always` trajectory constraints into conditions checked wherever
 * the state can change: every action precondition, every durative condition
 * and effect timing, every timed effect, the goals and the soft goals.
 */
export class StateInvariantsRemover extends Compiler {
  readonly name = "sirm";

  constructor(options: CompilerOptions = {}) {
    super("STATE_INVARIANTS_REMOVING", options);
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
    ]);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "STATE_INVARIANTS_REMOVING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    // The invariant is checked as a timed goal wherever a timed effect happens.
    if (kind.has("STATE_INVARIANTS") && kind.has("TIMED_EFFECTS")) {
      kind.set("TIMED_GOALS");
    }
    return kind.unset("STATE_INVARIANTS");
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const environment = problem.environment;
    const { invariants, others } = stateInvariants(problem.trajectoryConstraints);
    const invariant = environment.simplifier.simplify(environment.expressions.and(invariants));

    const compiled = problem.clone();
    compiled.name = `${problem.name}_${this.name}`;
    compiled.clearActions();
    compiled.clearGoals();
    compiled.clearTimedGoals();
    compiled.clearTimedEffects();
    compiled.clearTrajectoryConstraints();
    compiled.clearQualityMetrics();
    others.forEach((constraint) => compiled.addTrajectoryConstraint(constraint));
    const newToOld = addInvariantToProblem(problem, compiled, invariant);

    return {
      problem: compiled,
      mapBackActionInstance: replaceAction(newToOld),
      engineName: this.name,
    };
  }
}
