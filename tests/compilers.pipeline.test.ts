import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { Compiler } from "../src/engines/compiler.js";
import type { CompilationKind } from "../src/engines/compilationKind.js";
import { DisjunctiveConditionsRemover } from "../src/engines/compilers/disjunctiveConditionsRemover.js";
import { QuantifiersRemover } from "../src/engines/compilers/quantifiersRemover.js";
import { CompilersPipeline } from "../src/engines/compilersPipeline.js";
import type { CompilerResult } from "../src/engines/results.js";
import { UsageError } from "../src/errors.js";
import { createSilentLogger } from "../src/logger.js";
import { Parameter } from "../src/model/parameter.js";
import type { Problem } from "../src/model/problem.js";
import { ProblemKind, type ProblemKindFeature } from "../src/model/problemKind.js";
import { Variable } from "../src/model/variable.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { boolFluent, declareObjects, emptyProblem, instantaneous } from "./helpers/problems.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Stage proving every problem unsolvable. */
class UnsolvableStage extends Compiler {
  readonly name = "unsolvable";

  constructor(private readonly accepted: readonly ProblemKindFeature[]) {
    super("GROUNDING", { logger: createSilentLogger() });
  }

  supportedKind(): ProblemKind {
    return new ProblemKind(this.accepted);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "GROUNDING";
  }

  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    return problemKind.clone();
  }

  protected compileProblem(): CompilerResult<Problem> {
    return { problem: null, mapBackActionInstance: () => null, engineName: this.name };
  }
}

describe("compilers pipeline", () => {
  function survey() {
    const problem = emptyProblem("survey");
    const em = problem.environment.expressions;
    const { type } = declareObjects(problem, "Loc", "l1", "l2");
    const marked = boolFluent(problem, "marked", [new Parameter("where", type)]);
    const seen = boolFluent(problem, "seen");
    const v = new Variable("v", type);
    const check = instantaneous(problem, "check");
    check.addPrecondition(em.exists(marked.apply(v), v));
    check.addEffect(seen, true);
    return { problem, check };
  }

  it("chains the stages and composes their map-backs", () => {
    const { problem, check } = survey();
    const pipeline = new CompilersPipeline([new QuantifiersRemover(), new DisjunctiveConditionsRemover()]);

    const result = pipeline.compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(pipeline.name).to.equal("CompilersPipeline[qurm, dcrm]");
    expect(result.engineName).to.equal("CompilersPipeline[qurm, dcrm]");
    expect(compiled.name).to.equal("dcrm_qurm_survey");
    expect(compiled.actions.map((action) => action.name)).to.deep.equal(["check", "check_0"]);
    expect(result.mapBackActionInstance(new ActionInstance(compiled.action("check_0")))?.action).to.equal(check);
  });

  it("logs every completed stage", () => {
    const { problem } = survey();
    const logger = new RecordingLogger();
    const pipeline = new CompilersPipeline([new QuantifiersRemover(), new DisjunctiveConditionsRemover()], { logger });

    pipeline.compile(problem);

    expect(logger.entries.map((entry) => entry.payload)).to.deep.equal([
      { pipeline: "CompilersPipeline[qurm, dcrm]", stage: "qurm", compiled: "qurm_survey" },
      { pipeline: "CompilersPipeline[qurm, dcrm]", stage: "dcrm", compiled: "dcrm_qurm_survey" },
    ]);
  });

  it("refuses a stage that cannot handle the problem it receives", () => {
    const { problem } = survey();
    const pipeline = new CompilersPipeline([new DisjunctiveConditionsRemover()]);

    expect(() => pipeline.compile(problem))
      .to.throw(UsageError)
      .with.property("message", "dcrm cannot handle this kind of problem!");
  });

  it("stops at the first stage returning no problem", () => {
    const { problem } = survey();
    const later = new QuantifiersRemover();
    const spy = sinon.spy(later, "compile");
    const stage = new UnsolvableStage(["ACTION_BASED", "FLAT_TYPING", "EXISTENTIAL_CONDITIONS"]);
    const pipeline = new CompilersPipeline([stage, later]);

    const result = pipeline.compile(problem);

    expect(result.problem).to.equal(null);
    expect(spy.called).to.equal(false);
    spy.restore();
  });
});
