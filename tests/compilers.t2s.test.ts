import { describe, it } from "mocha";
import { expect } from "chai";

import { TimedToSequential } from "../src/engines/compilers/timedToSequential.js";
import { UnsupportedProblemTypeError } from "../src/errors.js";
import { DurativeAction } from "../src/model/action.js";
import { minimizeMakespan } from "../src/model/metrics.js";
import { closedTimeInterval, endTiming, globalStartTiming, startTiming } from "../src/model/timing.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { compileWithPredictedKind } from "./helpers/kinds.js";
import { boolFluent, emptyProblem, typedFluent } from "./helpers/problems.js";

describe("timed to sequential", () => {
  function kitchen() {
    const problem = emptyProblem("kitchen");
    const em = problem.environment.expressions;
    const hasFood = boolFluent(problem, "has_food");
    const stoveOn = boolFluent(problem, "stove_on");
    const busy = boolFluent(problem, "busy");
    const cooked = boolFluent(problem, "cooked");
    const cook = new DurativeAction("cook", [], problem.environment);
    cook.setFixedDuration(5);
    cook.addCondition(startTiming(), hasFood);
    cook.addCondition(closedTimeInterval(startTiming(), endTiming()), stoveOn);
    cook.addEffect(startTiming(), busy, true);
    cook.addEffect(endTiming(), busy, false);
    cook.addEffect(endTiming(), cooked, true);
    problem.addAction(cook);
    problem.addGoal(cooked);
    problem.addQualityMetric(minimizeMakespan());
    return { problem, em, hasFood, stoveOn, cook };
  }

  it("merges start and end into one instantaneous action", () => {
    const { problem, em, hasFood, stoveOn, cook } = kitchen();

    const result = new TimedToSequential().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(compiled.name).to.equal("t2s_kitchen");
    const action = compiled.action("cook");
    if (action.kind !== "instantaneous") throw new Error("expected an instantaneous action");
    expect(action.preconditions).to.deep.equal([em.fluentExp(hasFood), em.fluentExp(stoveOn)]);
    expect(action.effects.map((effect) => effect.toString())).to.deep.equal(["busy := false", "cooked := true"]);
    expect(result.mapBackActionInstance(new ActionInstance(action))?.action).to.equal(cook);
  });

  it("replaces makespan with plan length", () => {
    const { problem } = kitchen();

    const { compiled } = compileWithPredictedKind(new TimedToSequential(), problem);

    expect(compiled.qualityMetrics.map((metric) => metric.kind)).to.deep.equal(["minimize_sequential_plan_length"]);
    expect(compiled.kind.toString()).to.equal(["PROBLEM_CLASS: ACTION_BASED", "QUALITY_METRICS: PLAN_LENGTH"].join("\n"));
  });

  it("composes start and end updates on the same fluent", () => {
    const problem = emptyProblem("trip");
    const fuel = typedFluent(problem, "fuel", problem.environment.types.intType(), 10);
    const drive = new DurativeAction("drive", [], problem.environment);
    drive.setFixedDuration(3);
    drive.addDecreaseEffect(startTiming(), fuel, 2);
    drive.addDecreaseEffect(endTiming(), fuel, 3);
    problem.addAction(drive);

    const compiled = new TimedToSequential().compile(problem).problem;
    const action = compiled?.action("drive");

    expect(action?.kind === "instantaneous" ? action.effects.map((effect) => effect.toString()) : null).to.deep.equal([
      "fuel -= 5",
    ]);
  });

  it("refuses problems with timed effects", () => {
    const { problem } = kitchen();
    problem.addTimedEffect(globalStartTiming(2), problem.fluent("stove_on"), true);

    expect(() => new TimedToSequential().compile(problem)).to.throw(UnsupportedProblemTypeError);
  });
});
