import { describe, it } from "mocha";
import { expect } from "chai";

import { Grounder, GrounderHelper } from "../src/engines/compilers/grounder.js";
import { SequentialPlanValidator } from "../src/engines/planValidator.js";
import { UsageError } from "../src/errors.js";
import { minimizeActionCosts } from "../src/model/metrics.js";
import { Parameter } from "../src/model/parameter.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { SequentialPlan } from "../src/plans/sequentialPlan.js";
import { compileWithPredictedKind } from "./helpers/kinds.js";
import { boolFluent, declareObjects, emptyProblem, instantaneous } from "./helpers/problems.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function linkProblem() {
  const problem = emptyProblem("links");
  const em = problem.environment.expressions;
  const { type, objects } = declareObjects(problem, "Obj", "o1", "o2");
  const [o1, o2] = objects;
  if (!o1 || !o2) throw new Error("missing objects");
  const x = new Parameter("x", type);
  const y = new Parameter("y", type);
  const linked = boolFluent(problem, "linked", [x, y]);
  const connect = instantaneous(problem, "connect", [x, y]);
  connect.addEffect(linked.apply(x, y), true);
  return { problem, em, type, o1, o2, connect };
}

function roadProblem() {
  const problem = emptyProblem("roads");
  const { type, objects } = declareObjects(problem, "Obj", "o1", "o2");
  const [o1, o2] = objects;
  if (!o1 || !o2) throw new Error("missing objects");
  const x = new Parameter("x", type);
  const y = new Parameter("y", type);
  const road = boolFluent(problem, "road", [new Parameter("from", type), new Parameter("to", type)]);
  const at = boolFluent(problem, "at", [new Parameter("where", type)]);
  problem.setInitialValue(road.apply(o1, o2), true);
  const drive = instantaneous(problem, "drive", [x, y]);
  drive.addPrecondition(road.apply(x, y));
  drive.addEffect(at.apply(y), true);
  return { problem, o1, o2, at, drive };
}

/** `move(x, y)` and `move_a(y)` over objects `a` and `b`: their groundings spell the same names. */
function clashProblem() {
  const problem = emptyProblem("moves");
  const { type } = declareObjects(problem, "Loc", "a", "b");
  const x = new Parameter("x", type);
  const y = new Parameter("y", type);
  const at = boolFluent(problem, "at", [new Parameter("where", type)]);
  const move = instantaneous(problem, "move", [x, y]);
  move.addPrecondition(at.apply(x));
  move.addEffect(at.apply(y), true);
  const moveA = instantaneous(problem, "move_a", [y]);
  moveA.addEffect(at.apply(y), true);
  return { problem, move, moveA };
}

describe("grounder", () => {
  it("enumerates every parameter tuple in domain order", () => {
    const { problem, o1, o2 } = linkProblem();
    const helper = new GrounderHelper(problem, { prunesStaticFluents: false });

    const grounded = [...helper.getGroundedActions()];

    expect(grounded.map(({ parameters }) => parameters.map((value) => value.toString()))).to.deep.equal([
      ["o1", "o1"],
      ["o1", "o2"],
      ["o2", "o1"],
      ["o2", "o2"],
    ]);
    expect(grounded.map(({ grounded: action }) => action?.name ?? null)).to.deep.equal([
      "connect_o1_o1",
      "connect_o1_o2",
      "connect_o2_o1",
      "connect_o2_o2",
    ]);
    const em = problem.environment.expressions;
    expect(grounded[1]?.parameters).to.deep.equal([em.objectExp(o1), em.objectExp(o2)]);
  });

  it("returns the same grounded action for the same values", () => {
    const { problem, o1, o2, connect } = linkProblem();
    const helper = new GrounderHelper(problem);

    const first = helper.groundAction(connect, [o1, o2]);
    const second = helper.groundAction(connect, [o1, o2]);

    expect(first).to.not.equal(null);
    expect(second).to.equal(first);
    expect(first?.kind === "instantaneous" ? first.effects.map((effect) => effect.toString()) : []).to.deep.equal([
      "linked(o1, o2) := true",
    ]);
  });

  it("rejects a grounding with the wrong number of values", () => {
    const { problem, o1, connect } = linkProblem();

    expect(() => new GrounderHelper(problem).groundAction(connect, [o1])).to.throw(UsageError);
  });

  it("prunes candidates through static preconditions and logs the reduction", () => {
    const { problem } = roadProblem();
    const logger = new RecordingLogger();
    const helper = new GrounderHelper(problem, { logger });

    const grounded = [...helper.getGroundedActions()];

    expect(grounded).to.have.length(1);
    expect(grounded[0]?.grounded?.name).to.equal("drive_o1_o2");
    const action = grounded[0]?.grounded;
    expect(action?.kind === "instantaneous" ? action.preconditions : null).to.deep.equal([]);
    expect(logger.entries.map(({ level, message, payload }) => ({ level, message, payload }))).to.deep.equal([
      {
        level: "debug",
        message: "grounder_pruned_parameters",
        payload: { action: "drive", before: 4, after: 1, literals: ["road(x, y)"] },
      },
    ]);
  });

  it("drops groundings whose static preconditions are false when pruning is off", () => {
    const { problem } = roadProblem();
    const helper = new GrounderHelper(problem, { prunesStaticFluents: false });

    const grounded = [...helper.getGroundedActions()];

    expect(grounded).to.have.length(4);
    expect(grounded.filter((entry) => entry.grounded === null)).to.have.length(3);
  });

  it("compiles a lifted problem and lifts grounded instances back", () => {
    const { problem, connect } = linkProblem();
    const result = new Grounder({ prunesStaticFluents: false }).compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(compiled.name).to.equal("grounder_links");
    expect(compiled.actions.map((action) => action.name)).to.deep.equal([
      "connect_o1_o1",
      "connect_o1_o2",
      "connect_o2_o1",
      "connect_o2_o2",
    ]);
    const lifted = result.mapBackActionInstance(new ActionInstance(compiled.action("connect_o1_o2")));
    expect(lifted?.action).to.equal(connect);
    expect(lifted?.toString()).to.equal("connect(o1, o2)");
  });

  it("grounds only the tuples listed in an explicit grounding map", () => {
    const { problem, o1, o2 } = linkProblem();
    const reset = instantaneous(problem, "reset");
    reset.addEffect(boolFluent(problem, "idle"), true);

    const compiled = new Grounder({ groundingActionsMap: new Map([["connect", [[o1, o2]]]]) }).compile(problem).problem;

    expect(compiled?.actions.map((action) => action.name)).to.deep.equal(["connect_o1_o2"]);
  });

  it("rejects grounding map tuples of the wrong arity", () => {
    const { problem, o1 } = linkProblem();
    const grounder = new Grounder({ groundingActionsMap: new Map([["connect", [[o1]]]]) });

    expect(() => grounder.compile(problem)).to.throw(UsageError);
  });

  it("names every grounding apart even when names built from values collide", () => {
    const { problem, moveA } = clashProblem();

    const result = new Grounder().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const names = compiled.actions.map((action) => action.name);
    expect(names).to.deep.equal(["move_a_a", "move_a_b", "move_b_a", "move_b_b", "move_a_a_0", "move_a_b_0"]);
    expect(new Set(names).size).to.equal(names.length);
    const lifted = result.mapBackActionInstance(new ActionInstance(compiled.action("move_a_a_0")));
    expect(lifted?.action).to.equal(moveA);
    expect(lifted?.toString()).to.equal("move_a(a)");
  });

  it("yields every action and parameter tuple once", () => {
    const { problem } = clashProblem();
    const helper = new GrounderHelper(problem);

    const pairs = [...helper.getGroundedActions()].map(
      ({ original, parameters }) => `${original.name}(${parameters.map((value) => value.toString()).join(", ")})`,
    );

    expect(pairs).to.deep.equal([
      "move(a, a)",
      "move(a, b)",
      "move(b, a)",
      "move(b, b)",
      "move_a(a)",
      "move_a(b)",
    ]);
    expect(new Set(pairs).size).to.equal(pairs.length);
  });

  it("predicts the kind of the compiled problem", () => {
    const { problem } = linkProblem();

    const { compiled } = compileWithPredictedKind(new Grounder({ prunesStaticFluents: false }), problem);

    expect(compiled.kind.toString()).to.equal(["PROBLEM_CLASS: ACTION_BASED", "TYPING: FLAT_TYPING"].join("\n"));
  });

  it("maps plans of the grounded problem back to valid lifted plans", () => {
    const { problem, o1, o2, at, drive } = roadProblem();
    problem.addGoal(at.apply(o2));
    const result = new Grounder().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");
    const plan = new SequentialPlan([new ActionInstance(compiled.action("drive_o1_o2"))]);
    const validator = new SequentialPlanValidator();

    expect(validator.validate(compiled, plan).status).to.equal("valid");
    const lifted = plan.replaceActionInstances(result.mapBackActionInstance);
    const em = problem.environment.expressions;
    expect(lifted.actions.map((instance) => [instance.action, instance.actualParameters])).to.deep.equal([
      [drive, [em.objectExp(o1), em.objectExp(o2)]],
    ]);
    expect(validator.validate(problem, lifted).status).to.equal("valid");
  });

  it("re-keys action costs on the grounded action names", () => {
    const { problem, em } = linkProblem();
    problem.addQualityMetric(minimizeActionCosts(new Map([["connect", em.int(2)]])));

    const compiled = new Grounder({ prunesStaticFluents: false }).compile(problem).problem;
    const metric = compiled?.qualityMetrics[0];

    if (metric?.kind !== "minimize_action_costs") throw new Error("expected an action costs metric");
    expect([...metric.costs.keys()]).to.deep.equal([
      "connect_o1_o1",
      "connect_o1_o2",
      "connect_o2_o1",
      "connect_o2_o2",
    ]);
    expect(metric.costs.get("connect_o1_o2")).to.equal(em.int(2));
  });
});
