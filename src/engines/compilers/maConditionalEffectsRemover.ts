import type { Action } from "../../model/action.js";
import type { MultiAgentProblem } from "../../model/multiAgent/maProblem.js";
import type { ProblemKind } from "../../model/problemKind.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import type { CompilerResult } from "../results.js";
import { ConditionalEffectsRemover, conditionalEffectVariants } from "./conditionalEffectsRemover.js";
import { getFreshName, replaceAgentAction } from "./utils.js";

/** {@link ConditionalEffectsRemover} applied to the actions of every agent. */
export class MAConditionalEffectsRemover extends Compiler<MultiAgentProblem> {
  readonly name = "ma_cerm";
  private readonly singleAgent: ConditionalEffectsRemover;

  constructor(options: CompilerOptions = {}) {
    super("CONDITIONAL_EFFECTS_REMOVING", options);
    this.singleAgent = new ConditionalEffectsRemover({ ...options, logger: this.logger });
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
    const compiled = problem.clone();
    compiled.name = `${this.name}_${problem.name}`;

    const newToOld = new Map<Action, Action>();
    for (const agent of problem.agents) {
      const target = compiled.agent(agent.name);
      target.clearActions();
      for (const action of agent.unconditionalActions) {
        const copy = target.addAction(action.clone());
        newToOld.set(copy, action);
      }
      for (const action of agent.conditionalActions) {
        for (const variant of conditionalEffectVariants(action)) {
          const named = target.addAction(variant.clone(getFreshName(target, action.name)));
          newToOld.set(named, action);
        }
      }
    }

    return {
      problem: compiled,
      mapBackActionInstance: replaceAgentAction(newToOld, problem),
      engineName: this.name,
    };
  }
}
