import { describe, it } from "mocha";
import { expect } from "chai";

import { SequentialPlanValidator } from "../src/engines/planValidator.js";
import { ProblemDefinitionError, UnsupportedProblemTypeError } from "../src/errors.js";
import { DurativeAction } from "../src/model/action.js";
import { minimizeActionCosts, minimizeSequentialPlanLength } from "../src/model/metrics.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { SequentialPlan } from "../src/plans/sequentialPlan.js";
import { boolFluent, emptyProblem, instantaneous, typedFluent } from "./helpers/problems.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("sequential plan validator", () => {
  function lamp() {
    const problem = emptyProblem("lamp");
    const em = problem.environment.expressions;
    const x = boolFluent(problem, "x");
    const a = instantaneous(problem, "a");
    a.addPrecondition(em.not(x));
    a.addEffect(x, true);
    problem.addGoal(x);
    return { problem, em, x, a };
  }

  function counter() {
    const problem = emptyProblem("counter");
    const n = typedFluent(problem, "n", problem.environment.types.intType(0, 2), 0);
    const inc = instantaneous(problem, "inc");
    inc.addIncreaseEffect(n, 1);
    return { problem, n, inc };
  }

  it("accepts a plan reaching the goals", () => {
    const { problem, em, x, a } = lamp();
    const logger = new RecordingLogger();
    const step = new ActionInstance(a);

    const result = new SequentialPlanValidator({ logger }).validate(problem, new SequentialPlan([step]));

    expect(result.status).to.equal("valid");
    expect(result.engineName).to.equal("sequential_plan_validator");
    expect(result.reason).to.equal(null);
    expect(result.lastExecutedAction).to.equal(step);
    expect(result.metricValue).to.equal(null);
    expect(result.finalState?.get(em.fluentExp(x))).to.equal(em.trueExp());
    expect(logger.entries.map((entry) => [entry.message, entry.payload])).to.deep.equal([
      ["plan_validated", { problem: "lamp", steps: 1, status: "valid" }],
    ]);
  });

  it("reports the first step with unsatisfied preconditions", () => {
    const { problem, a } = lamp();
    const first = new ActionInstance(a);
    const logger = new RecordingLogger();

    const result = new SequentialPlanValidator({ logger }).validate(
      problem,
      new SequentialPlan([first, new ActionInstance(a)]),
    );

    expect(result.status).to.equal("invalid");
    expect(result.reason).to.equal("1-th action instance a has unsatisfied preconditions (not x).");
    expect(result.lastExecutedAction).to.equal(first);
    expect(result.finalState).to.equal(null);
    expect(logger.messages()).to.deep.equal(["plan_rejected"]);
  });

  it("reports unreached goals", () => {
    const { problem } = lamp();

    const result = new SequentialPlanValidator().validate(problem, new SequentialPlan([]));

    expect(result.status).to.equal("invalid");
    expect(result.reason).to.equal("Goals x are not satisfied by the plan.");
    expect(result.lastExecutedAction).to.equal(null);
  });

  it("rejects updates leaving the bounds of a numeric fluent", () => {
    const { problem, inc } = counter();
    const steps = [new ActionInstance(inc), new ActionInstance(inc), new ActionInstance(inc)];

    const result = new SequentialPlanValidator().validate(problem, new SequentialPlan(steps));

    expect(result.status).to.equal("invalid");
    expect(result.reason).to.equal("2-th action instance inc sets n to 3, outside its bounds.");
    expect(result.lastExecutedAction).to.equal(steps[1]);
  });

  it("computes the action costs metric", () => {
    const { problem, inc } = counter();
    problem.addQualityMetric(minimizeActionCosts(new Map([["inc", problem.environment.expressions.int(2)]])));

    const result = new SequentialPlanValidator().validate(
      problem,
      new SequentialPlan([new ActionInstance(inc), new ActionInstance(inc)]),
    );

    expect(result.status).to.equal("valid");
    expect(result.metricValue).to.equal(4);
  });

  it("computes the plan length metric", () => {
    const { problem, inc } = counter();
    problem.addQualityMetric(minimizeSequentialPlanLength());

    const result = new SequentialPlanValidator().validate(
      problem,
      new SequentialPlan([new ActionInstance(inc), new ActionInstance(inc)]),
    );

    expect(result.metricValue).to.equal(2);
  });

  it("refuses problems with several quality metrics", () => {
    const { problem } = counter();
    problem.addQualityMetric(minimizeSequentialPlanLength());
    problem.addQualityMetric(minimizeSequentialPlanLength());

    expect(() => new SequentialPlanValidator().validate(problem, new SequentialPlan([]))).to.throw(
      ProblemDefinitionError,
    );
  });

  it("refuses durative steps", () => {
    const { problem } = counter();
    const wait = new DurativeAction("wait", [], problem.environment);
    wait.setFixedDuration(1);

    expect(() =>
      new SequentialPlanValidator().validate(problem, new SequentialPlan([new ActionInstance(wait)])),
    ).to.throw(UnsupportedProblemTypeError);
  });
});
