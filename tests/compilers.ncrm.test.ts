import { describe, it } from "mocha";
import { expect } from "chai";

import { NegativeConditionsRemover, NegativeFluentRemover } from "../src/engines/compilers/negativeConditionsRemover.js";
import { SequentialPlanValidator } from "../src/engines/planValidator.js";
import { ProblemDefinitionError } from "../src/errors.js";
import { oversubscription } from "../src/model/metrics.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { SequentialPlan } from "../src/plans/sequentialPlan.js";
import { compileWithPredictedKind } from "./helpers/kinds.js";
import { boolFluent, declareObjects, emptyProblem, instantaneous, typedFluent } from "./helpers/problems.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("negative conditions remover", () => {
  function switchProblem() {
    const problem = emptyProblem("switch");
    const em = problem.environment.expressions;
    const x = boolFluent(problem, "x");
    const a = instantaneous(problem, "a");
    a.addPrecondition(em.not(x));
    a.addEffect(x, true);
    problem.addGoal(x);
    return { problem, em, a };
  }

  it("introduces a twin fluent kept equal to the negation of the original", () => {
    const { problem, em } = switchProblem();
    const compiler = new NegativeConditionsRemover({ logger: new RecordingLogger() });

    const { problem: compiled } = compiler.compile(problem);

    if (!compiled) throw new Error("expected a compiled problem");
    expect(compiled.name).to.equal("ncrm_switch");
    const twin = compiled.fluent("not_x");
    expect(compiled.fluentDefaults.get(twin)).to.equal(em.trueExp());
    const action = compiled.action("a");
    if (action.kind !== "instantaneous") throw new Error("expected an instantaneous action");
    expect(action.preconditions).to.deep.equal([em.fluentExp(twin)]);
    expect(action.effects.map((effect) => effect.toString())).to.deep.equal(["x := true", "not_x := false"]);
  });

  it("produces a problem whose plans validate and map back to the original actions", () => {
    const { problem, a } = switchProblem();
    const compiler = new NegativeConditionsRemover({ logger: new RecordingLogger() });
    const result = compiler.compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const plan = new SequentialPlan([new ActionInstance(compiled.action("a"))]);
    const validation = new SequentialPlanValidator().validate(compiled, plan);
    expect(validation.status).to.equal("valid");

    const mapped = plan.replaceActionInstances(result.mapBackActionInstance);
    expect(mapped.actions).to.have.length(1);
    expect(mapped.actions[0]?.action).to.equal(a);
  });

  it("predicts the kind of the compiled problem", () => {
    const { problem } = switchProblem();

    const { compiled } = compileWithPredictedKind(new NegativeConditionsRemover({ logger: new RecordingLogger() }), problem);

    expect(compiled.kind.toString()).to.equal("PROBLEM_CLASS: ACTION_BASED");
  });

  it("predicts the kind when the negation comes from an implication", () => {
    const problem = emptyProblem("gate");
    const em = problem.environment.expressions;
    const armed = boolFluent(problem, "armed");
    const open = boolFluent(problem, "open");
    const passed = boolFluent(problem, "passed");
    const pass = instantaneous(problem, "pass");
    pass.addPrecondition(em.implies(armed, open));
    pass.addEffect(passed, true);

    const { compiled } = compileWithPredictedKind(new NegativeConditionsRemover({ logger: new RecordingLogger() }), problem);

    const action = compiled.action("pass");
    expect(action.kind === "instantaneous" ? action.preconditions : null).to.deep.equal([
      em.or(compiled.fluent("not_armed"), open),
    ]);
    expect(compiled.kind.toString()).to.equal(
      ["PROBLEM_CLASS: ACTION_BASED", "CONDITIONS_KIND: DISJUNCTIVE_CONDITIONS"].join("\n"),
    );
  });

  it("keeps every twin opposite to its fluent along a plan", () => {
    const problem = emptyProblem("flip");
    const em = problem.environment.expressions;
    const x = boolFluent(problem, "x");
    const on = instantaneous(problem, "on");
    on.addPrecondition(em.not(x));
    on.addEffect(x, true);
    const off = instantaneous(problem, "off");
    off.addPrecondition(x);
    off.addEffect(x, false);
    const compiled = new NegativeConditionsRemover({ logger: new RecordingLogger() }).compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");
    const steps = ["on", "off", "on"].map((name) => new ActionInstance(compiled.action(name)));
    const fluent = em.fluentExp(x);
    const twin = em.fluentExp(compiled.fluent("not_x"));

    const states = [0, 1, 2, 3].map((length) => {
      const validation = new SequentialPlanValidator().validate(compiled, new SequentialPlan(steps.slice(0, length)));
      expect(validation.status).to.equal("valid");
      const state = validation.finalState;
      return [state?.get(fluent)?.toString(), state?.get(twin)?.toString()];
    });

    expect(states).to.deep.equal([
      ["false", "true"],
      ["true", "false"],
      ["false", "true"],
      ["true", "false"],
    ]);
  });

  it("creates the twins negated oversubscription goals need", () => {
    const problem = emptyProblem("bonus");
    const em = problem.environment.expressions;
    const x = boolFluent(problem, "x");
    const y = boolFluent(problem, "y");
    instantaneous(problem, "a").addEffect(x, true);
    problem.addQualityMetric(oversubscription([{ goal: em.not(y), gain: 2 }]));

    const compiled = new NegativeConditionsRemover({ logger: new RecordingLogger() }).compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const twin = compiled.fluent("not_y");
    expect(compiled.fluentDefaults.get(twin)).to.equal(em.trueExp());
    const [metric] = compiled.qualityMetrics;
    expect(metric?.kind === "oversubscription" ? metric.goals : null).to.deep.equal([
      { goal: em.fluentExp(twin), gain: 2 },
    ]);
  });

  it("logs the compiler lifecycle", () => {
    const { problem } = switchProblem();
    const logger = new RecordingLogger();
    new NegativeConditionsRemover({ logger }).compile(problem);

    expect(logger.messages()).to.deep.equal(["compiler_started", "compiler_completed"]);
    expect(logger.entries[1]?.payload).to.deep.equal({ compiler: "ncrm", problem: "switch", compiled: "ncrm_switch" });
  });

  it("turns a negated object equality into a disjunction over the other objects", () => {
    const problem = emptyProblem("robot");
    const em = problem.environment.expressions;
    const { type, objects } = declareObjects(problem, "Loc", "l1", "l2", "l3");
    const [l1, l2, l3] = objects;
    if (!l1 || !l2 || !l3) throw new Error("missing objects");
    const pos = typedFluent(problem, "pos", type, l1);

    const remover = new NegativeFluentRemover(problem);
    const rewritten = remover.removeNegativeFluents(em.not(em.equals(pos, l1)));

    expect(rewritten).to.equal(em.or(em.equals(pos, l2), em.equals(pos, l3)));
    expect(remover.fluentMapping.size).to.equal(0);
  });

  it("turns a negated numeric comparison into the strict opposite comparison", () => {
    const problem = emptyProblem("counter");
    const em = problem.environment.expressions;
    const n = typedFluent(problem, "n", problem.environment.types.intType(), 0);

    const rewritten = new NegativeFluentRemover(problem).removeNegativeFluents(em.not(em.le(n, 3)));

    expect(rewritten).to.equal(em.gt(n, 3));
  });

  it("rejects a negated equality over a type without objects", () => {
    const problem = emptyProblem("empty");
    const em = problem.environment.expressions;
    const type = problem.environment.types.userType("Loc", null);
    const first = typedFluent(problem, "pos", type);
    const second = typedFluent(problem, "pos2", type);

    expect(() => new NegativeFluentRemover(problem).removeNegativeFluents(em.not(em.equals(first, second)))).to.throw(
      ProblemDefinitionError,
    );
  });
});
