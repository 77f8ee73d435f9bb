import { describe, it } from "mocha";
import { expect } from "chai";

import { TrajectoryConstraintsRemover } from "../src/engines/compilers/trajectoryConstraintsRemover.js";
import { SequentialPlanValidator } from "../src/engines/planValidator.js";
import type { Problem } from "../src/model/problem.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { SequentialPlan } from "../src/plans/sequentialPlan.js";
import { boolFluent, emptyProblem, instantaneous } from "./helpers/problems.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("trajectory constraints remover", () => {
  function compile(problem: Problem): Problem {
    const compiled = new TrajectoryConstraintsRemover().compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");
    return compiled;
  }

  function effectsOf(problem: Problem, name: string): string[] {
    const action = problem.action(name);
    if (action.kind !== "instantaneous") throw new Error("expected an instantaneous action");
    return action.effects.map(String);
  }

  function preconditionsOf(problem: Problem, name: string): string[] {
    const action = problem.action(name);
    if (action.kind !== "instantaneous") throw new Error("expected an instantaneous action");
    return action.preconditions.map(String);
  }

  function run(problem: Problem, ...names: string[]) {
    const plan = new SequentialPlan(names.map((name) => new ActionInstance(problem.action(name))));
    return new SequentialPlanValidator().validate(problem, plan);
  }

  function lab() {
    const problem = emptyProblem("lab");
    const em = problem.environment.expressions;
    const a = boolFluent(problem, "a");
    const b = boolFluent(problem, "b");
    instantaneous(problem, "make_b").addEffect(b, true);
    const makeA = instantaneous(problem, "make_a");
    makeA.addEffect(a, true);
    problem.addGoal(a);
    problem.addTrajectoryConstraint(em.sometimeBefore(a, b));
    return { problem, makeA };
  }

  it("guards a sometime-before formula with a monitor of the earlier one", () => {
    const { problem } = lab();
    const compiler = new TrajectoryConstraintsRemover();

    const compiled = compiler.compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(compiled.name).to.equal("lab_tcrm");
    expect(compiled.fluents.map((fluent) => fluent.name)).to.deep.equal(["a", "b", "seen_psi"]);
    expect(compiled.trajectoryConstraints).to.deep.equal([]);
    expect(preconditionsOf(compiled, "make_b_0")).to.deep.equal([]);
    expect(effectsOf(compiled, "make_b_0")).to.deep.equal(["b := true", "seen_psi := true"]);
    expect(preconditionsOf(compiled, "make_a_0")).to.deep.equal(["seen_psi"]);
    expect(effectsOf(compiled, "make_a_0")).to.deep.equal(["a := true"]);
    expect(compiled.kind.toString()).to.equal("PROBLEM_CLASS: ACTION_BASED");
    expect(compiled.kind.isSubsetOf(compiler.resultingProblemKind(problem.kind))).to.equal(true);
  });

  it("accepts only plans respecting the constraint order", () => {
    const compiled = compile(lab().problem);

    expect(run(compiled, "make_a_0").reason).to.equal(
      "0-th action instance make_a_0 has unsatisfied preconditions seen_psi.",
    );
    expect(run(compiled, "make_b_0", "make_a_0").status).to.equal("valid");
  });

  it("maps compiled actions back through the grounding", () => {
    const { problem, makeA } = lab();
    const result = new TrajectoryConstraintsRemover().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const mapped = result.mapBackActionInstance(new ActionInstance(compiled.action("make_a_0")));

    expect(mapped?.action).to.equal(makeA);
    expect(mapped?.actualParameters).to.deep.equal([]);
  });

  it("drops actions breaking an always constraint and tracks sometime in the goal", () => {
    const problem = emptyProblem("lamp");
    const em = problem.environment.expressions;
    const on = boolFluent(problem, "on");
    const broken = boolFluent(problem, "broken");
    instantaneous(problem, "switch_on").addEffect(on, true);
    instantaneous(problem, "switch_off").addEffect(on, false);
    instantaneous(problem, "smash").addEffect(broken, true);
    problem.addTrajectoryConstraint(em.always(em.not(broken)));
    problem.addTrajectoryConstraint(em.sometime(on));

    const compiled = compile(problem);

    expect(compiled.actions.map((action) => action.name)).to.deep.equal(["switch_on_0", "switch_off_0"]);
    expect(effectsOf(compiled, "switch_on_0")).to.deep.equal(["on := true", "hold := true"]);
    expect(effectsOf(compiled, "switch_off_0")).to.deep.equal(["on := false"]);
    expect(compiled.goals.map(String)).to.deep.equal(["hold"]);
    expect(run(compiled).reason).to.equal("Goals hold are not satisfied by the plan.");
    expect(run(compiled, "switch_on_0", "switch_off_0").status).to.equal("valid");
  });

  it("resets the sometime-after monitor until the later formula follows", () => {
    const problem = emptyProblem("request");
    const em = problem.environment.expressions;
    const asked = boolFluent(problem, "asked");
    const served = boolFluent(problem, "served");
    instantaneous(problem, "ask").addEffect(asked, true);
    instantaneous(problem, "serve").addEffect(served, true);
    instantaneous(problem, "reset").addEffect(served, false);
    problem.addTrajectoryConstraint(em.sometimeAfter(asked, served));

    const compiled = compile(problem);

    expect(compiled.initialValue(em.fluentExp(compiled.fluent("hold")))).to.equal(em.trueExp());
    expect(effectsOf(compiled, "ask_0")).to.deep.equal([
      "asked := true",
      "if served then hold := true",
      "if (not served) then hold := false",
    ]);
    expect(effectsOf(compiled, "serve_0")).to.deep.equal(["served := true", "hold := true"]);
    expect(effectsOf(compiled, "reset_0")).to.deep.equal(["served := false", "if asked then hold := false"]);
    expect(run(compiled, "ask_0").reason).to.equal("Goals hold are not satisfied by the plan.");
    expect(run(compiled, "ask_0", "serve_0").status).to.equal("valid");
    expect(run(compiled, "ask_0", "serve_0", "reset_0").status).to.equal("invalid");
  });

  it("lets an at-most-once formula hold during a single stretch", () => {
    const problem = emptyProblem("switch");
    const em = problem.environment.expressions;
    const on = boolFluent(problem, "on");
    instantaneous(problem, "switch_on").addEffect(on, true);
    instantaneous(problem, "switch_off").addEffect(on, false);
    problem.addTrajectoryConstraint(em.atMostOnce(on));

    const compiled = compile(problem);

    expect(preconditionsOf(compiled, "switch_on_0")).to.deep.equal(["((not seen_phi) or on)"]);
    expect(effectsOf(compiled, "switch_on_0")).to.deep.equal(["on := true", "seen_phi := true"]);
    expect(preconditionsOf(compiled, "switch_off_0")).to.deep.equal([]);
    expect(run(compiled, "switch_on_0", "switch_on_0", "switch_off_0").status).to.equal("valid");
    expect(run(compiled, "switch_on_0", "switch_off_0", "switch_on_0").reason).to.equal(
      "2-th action instance switch_on_0 has unsatisfied preconditions ((not seen_phi) or on).",
    );
  });

  it("reports no problem when the initial state breaks an always constraint", () => {
    const problem = emptyProblem("broken");
    const em = problem.environment.expressions;
    const x = boolFluent(problem, "x");
    instantaneous(problem, "fix").addEffect(x, true);
    problem.addTrajectoryConstraint(em.always(x));
    const logger = new RecordingLogger();

    const result = new TrajectoryConstraintsRemover({ logger }).compile(problem);

    expect(result.problem).to.equal(null);
    expect(
      logger.entries.filter((entry) => entry.level === "warn").map((entry) => [entry.message, entry.payload]),
    ).to.deep.equal([["trajectory_constraint_violated", { problem: "broken", constraint: "Always(x)" }]]);
  });
});
