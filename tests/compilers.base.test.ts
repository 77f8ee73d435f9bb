import { describe, it } from "mocha";
import { expect } from "chai";

import { DisjunctiveConditionsRemover } from "../src/engines/compilers/disjunctiveConditionsRemover.js";
import { UnsupportedProblemTypeError, UsageError } from "../src/errors.js";
import { Parameter } from "../src/model/parameter.js";
import { Variable } from "../src/model/variable.js";
import { boolFluent, declareObjects, emptyProblem, instantaneous } from "./helpers/problems.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

/** Problem whose only feature outside the disjunctive remover's support is a forall effect. */
function forallProblem() {
  const problem = emptyProblem("sweep");
  const { type } = declareObjects(problem, "Loc", "l1", "l2");
  const dirty = boolFluent(problem, "dirty", [new Parameter("where", type)]);
  const v = new Variable("v", type);
  const clean = instantaneous(problem, "clean");
  clean.addEffect(dirty.apply(v), false, true, [v]);
  return problem;
}

describe("compiler base", () => {
  it("refuses an unsupported compilation kind", () => {
    const compiler = new DisjunctiveConditionsRemover({ logger: new RecordingLogger() });

    expect(() => compiler.compile(forallProblem(), "GROUNDING"))
      .to.throw(UsageError)
      .with.property("message", "dcrm cannot perform GROUNDING");
  });

  it("refuses problems outside its supported kind under strict checks", () => {
    const compiler = new DisjunctiveConditionsRemover({
      logger: new RecordingLogger(),
      config: { strictKindChecks: true },
    });

    expect(() => compiler.compile(forallProblem()))
      .to.throw(UnsupportedProblemTypeError)
      .with.property("message", "dcrm cannot handle this kind of problem!");
  });

  it("logs and proceeds when kind checks are relaxed", () => {
    const logger = new RecordingLogger();
    const compiler = new DisjunctiveConditionsRemover({ logger, config: { strictKindChecks: false } });

    const result = compiler.compile(forallProblem());

    expect(result.problem?.name).to.equal("dcrm_sweep");
    expect(result.engineName).to.equal("dcrm");
    expect(logger.entries.map(({ level, message, payload }) => ({ level, message, payload }))).to.deep.equal([
      {
        level: "warn",
        message: "kind_check_relaxed",
        payload: { compiler: "dcrm", problem: "sweep", unsupported: ["FORALL_EFFECTS"] },
      },
      {
        level: "info",
        message: "compiler_started",
        payload: { compiler: "dcrm", problem: "sweep", compilationKind: "DISJUNCTIVE_CONDITIONS_REMOVING" },
      },
      {
        level: "info",
        message: "compiler_completed",
        payload: { compiler: "dcrm", problem: "sweep", compiled: "dcrm_sweep" },
      },
    ]);
  });
});
