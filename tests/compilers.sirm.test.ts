import { describe, it } from "mocha";
import { expect } from "chai";

import { StateInvariantsRemover } from "../src/engines/compilers/stateInvariantsRemover.js";
import { globalStartTiming, timePointInterval } from "../src/model/timing.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { compileWithPredictedKind } from "./helpers/kinds.js";
import { boolFluent, emptyProblem, instantaneous } from "./helpers/problems.js";

describe("state invariants remover", () => {
  function guarded() {
    const problem = emptyProblem("inv");
    const em = problem.environment.expressions;
    const x = boolFluent(problem, "x");
    const g = boolFluent(problem, "g");
    const safe = boolFluent(problem, "safe");
    problem.setInitialValue(safe, true);
    const go = instantaneous(problem, "go");
    go.addPrecondition(x);
    go.addEffect(g, true);
    const reckless = instantaneous(problem, "reckless");
    reckless.addPrecondition(em.not(safe));
    reckless.addEffect(g, true);
    problem.addGoal(g);
    problem.addTrajectoryConstraint(em.always(safe));
    return { problem, em, x, g, safe, go };
  }

  it("adds the invariant to every precondition and to the goals", () => {
    const { problem, em, x, g, safe, go } = guarded();

    const result = new StateInvariantsRemover().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(compiled.name).to.equal("inv_sirm");
    expect(compiled.trajectoryConstraints).to.deep.equal([]);
    const action = compiled.action("go");
    expect(action.kind === "instantaneous" ? action.preconditions : null).to.deep.equal([
      em.fluentExp(x),
      em.fluentExp(safe),
    ]);
    expect(compiled.goals).to.deep.equal([em.fluentExp(g), em.fluentExp(safe)]);
    expect(result.mapBackActionInstance(new ActionInstance(action))?.action).to.equal(go);
  });

  it("drops actions whose preconditions contradict the invariant", () => {
    const { problem } = guarded();

    const compiled = new StateInvariantsRemover().compile(problem).problem;

    expect(compiled?.actions.map((action) => action.name)).to.deep.equal(["go"]);
  });

  it("predicts the kind of the compiled problem", () => {
    const problem = emptyProblem("careful");
    const em = problem.environment.expressions;
    const x = boolFluent(problem, "x");
    const g = boolFluent(problem, "g");
    const broken = boolFluent(problem, "broken");
    const go = instantaneous(problem, "go");
    go.addPrecondition(x);
    go.addEffect(g, true);
    problem.addGoal(g);
    problem.addTrajectoryConstraint(em.always(em.not(broken)));

    const { compiled } = compileWithPredictedKind(new StateInvariantsRemover(), problem);

    expect(compiled.goals).to.deep.equal([em.fluentExp(g), em.not(broken)]);
    expect(compiled.kind.toString()).to.equal(
      ["PROBLEM_CLASS: ACTION_BASED", "CONDITIONS_KIND: NEGATIVE_CONDITIONS"].join("\n"),
    );
  });

  it("checks the invariant wherever a timed effect happens", () => {
    const problem = emptyProblem("tide");
    const em = problem.environment.expressions;
    const g = boolFluent(problem, "g");
    const safe = boolFluent(problem, "safe");
    problem.setInitialValue(safe, true);
    problem.addTimedEffect(globalStartTiming(2), g, true);
    problem.addGoal(g);
    problem.addTrajectoryConstraint(em.always(safe));

    const { compiled } = compileWithPredictedKind(new StateInvariantsRemover(), problem);

    expect(compiled.timedEffects.map(({ effects }) => effects.map((effect) => effect.toString()))).to.deep.equal([
      ["g := true"],
    ]);
    expect(compiled.timedGoals).to.deep.equal([
      { interval: timePointInterval(globalStartTiming(2)), goals: [em.fluentExp(safe)] },
    ]);
  });

  it("keeps the explicit initial values", () => {
    const { problem, em, safe } = guarded();

    const compiled = new StateInvariantsRemover().compile(problem).problem;

    expect(compiled?.explicitInitialValues.get(em.fluentExp(safe))).to.equal(em.trueExp());
  });
});
