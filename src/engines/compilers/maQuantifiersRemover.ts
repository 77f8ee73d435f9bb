import type { Action } from "../../model/action.js";
import type { MultiAgentProblem } from "../../model/multiAgent/maProblem.js";
import type { ProblemKind } from "../../model/problemKind.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import { QuantifierExpander, QuantifiersRemover } from "./quantifiersRemover.js";
import { replaceAgentAction } from "./utils.js";

/** {@link QuantifiersRemover} applied to the actions of every agent and to the goals. */
export class MAQuantifiersRemover extends Compiler<MultiAgentProblem> {
  readonly name = "ma_qurm";
  private readonly singleAgent: QuantifiersRemover;

  constructor(options: CompilerOptions = {}) {
    super("QUANTIFIERS_REMOVING", options);
    this.singleAgent = new QuantifiersRemover({ ...options, logger: this.logger });
  }

  supportedKind(): ProblemKind {
    return this.singleAgent.supportedKind().unset("ACTION_BASED").set("ACTION_BASED_MULTI_AGENT");
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return this.singleAgent.supportsCompilation(compilationKind);
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    return this.singleAgent.resultingProblemKind(problemKind);
  }

  protected compileProblem(problem: MultiAgentProblem): CompilerResult<MultiAgentProblem> {
    const expander = new QuantifierExpander(problem);

    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;
    compiled.clearGoals();

    const newToOld = new Map<Action, Action>();
    for (const agent of problem.agents) {
      const target = compiled.agent(agent.name);
      target.clearActions();
      for (const action of agent.actions) {
        const copy = target.addAction(expander.action(action, action.name));
        newToOld.set(copy, action);
      }
    }
    problem.goals.forEach((goal) => compiled.addGoal(expander.expression(goal)));

    return {
      problem: compiled,
      mapBackActionInstance: replaceAgentAction(newToOld, problem),
      engineName: this.name,
    };
  }
}
