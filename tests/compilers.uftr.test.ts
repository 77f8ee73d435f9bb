import { describe, it } from "mocha";
import { expect } from "chai";

import { UsertypeFluentsRemover } from "../src/engines/compilers/usertypeFluentsRemover.js";
import { SequentialPlanValidator } from "../src/engines/planValidator.js";
import { UnsupportedProblemTypeError } from "../src/errors.js";
import { minimizeActionCosts } from "../src/model/metrics.js";
import { Parameter } from "../src/model/parameter.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { SequentialPlan } from "../src/plans/sequentialPlan.js";
import { compileWithPredictedKind } from "./helpers/kinds.js";
import { boolFluent, declareObjects, emptyProblem, instantaneous, typedFluent } from "./helpers/problems.js";

describe("usertype fluents remover", () => {
  function robot() {
    const problem = emptyProblem("robot");
    const em = problem.environment.expressions;
    const { type: loc, objects } = declareObjects(problem, "Loc", "l1", "l2");
    const [l1, l2] = objects;
    if (!l1 || !l2) throw new Error("missing objects");
    const pos = typedFluent(problem, "pos", loc, l1);
    const home = typedFluent(problem, "home", loc, l2);
    const to = new Parameter("to", loc);
    const move = instantaneous(problem, "move", [to]);
    move.addPrecondition(em.not(em.equals(pos, to)));
    move.addEffect(pos, to);
    const goHome = instantaneous(problem, "go_home");
    goHome.addEffect(pos, home);
    problem.addGoal(em.equals(pos, l2));
    return { problem, em, loc, l1, l2, pos, move };
  }

  it("turns object fluents into boolean fluents over one more parameter", () => {
    const { problem, em, l1, l2, pos } = robot();

    const { compiled } = compileWithPredictedKind(new UsertypeFluentsRemover(), problem);

    expect(compiled.name).to.equal("robot_uftr");
    const replaced = compiled.fluent("pos");
    expect(replaced).to.not.equal(pos);
    expect(replaced.type).to.equal(problem.environment.types.boolType());
    expect(replaced.signature.map((parameter) => parameter.name)).to.deep.equal(["loc"]);
    expect(compiled.initialValue(replaced.apply(l1))).to.equal(em.trueExp());
    expect(compiled.initialValue(replaced.apply(l2))).to.equal(em.falseExp());
    expect(compiled.initialValue(compiled.fluent("home").apply(l2))).to.equal(em.trueExp());
    expect(compiled.kind.toString()).to.equal(
      [
        "PROBLEM_CLASS: ACTION_BASED",
        "CONDITIONS_KIND: NEGATIVE_CONDITIONS, EQUALITIES, EXISTENTIAL_CONDITIONS",
        "EFFECTS_KIND: CONDITIONAL_EFFECTS",
        "TYPING: FLAT_TYPING",
      ].join("\n"),
    );
  });

  it("reads object values through existentials and assigns them per object", () => {
    const { problem } = robot();

    const compiled = new UsertypeFluentsRemover().compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const move = compiled.action("move");
    if (move.kind !== "instantaneous") throw new Error("expected an instantaneous action");
    expect(move.preconditions.map(String)).to.deep.equal([
      "(not Exists (Loc pos_loc) ((pos_loc == to) and pos(pos_loc)))",
    ]);
    expect(move.effects.map(String)).to.deep.equal([
      "if (to == l1) then pos(l1) := true",
      "if (not (to == l1)) then pos(l1) := false",
      "if (to == l2) then pos(l2) := true",
      "if (not (to == l2)) then pos(l2) := false",
    ]);
    const goHome = compiled.action("go_home");
    if (goHome.kind !== "instantaneous") throw new Error("expected an instantaneous action");
    expect(goHome.effects.map(String)).to.deep.equal([
      "if home(l1) then pos(l1) := true",
      "if (not home(l1)) then pos(l1) := false",
      "if home(l2) then pos(l2) := true",
      "if (not home(l2)) then pos(l2) := false",
    ]);
    expect(compiled.goals.map(String)).to.deep.equal(["Exists (Loc pos_loc) ((pos_loc == l2) and pos(pos_loc))"]);
  });

  it("keeps plans of the original problem valid", () => {
    const { problem, l2 } = robot();
    const result = new UsertypeFluentsRemover().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");
    const validator = new SequentialPlanValidator();

    const moved = validator.validate(
      compiled,
      new SequentialPlan([new ActionInstance(compiled.action("move"), [l2])]),
    );
    const sentHome = validator.validate(compiled, new SequentialPlan([new ActionInstance(compiled.action("go_home"))]));
    const stayed = validator.validate(compiled, new SequentialPlan([]));

    expect(moved.status).to.equal("valid");
    expect(sentHome.status).to.equal("valid");
    expect(stayed.reason).to.equal(
      "Goals Exists (Loc pos_loc) ((pos_loc == l2) and pos(pos_loc)) are not satisfied by the plan.",
    );
  });

  it("maps compiled actions back to the original ones", () => {
    const { problem, l2, move } = robot();
    const result = new UsertypeFluentsRemover().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const mapped = result.mapBackActionInstance(new ActionInstance(compiled.action("move"), [l2]));

    expect(mapped?.action).to.equal(move);
    expect(mapped?.actualParameters.map(String)).to.deep.equal(["l2"]);
  });

  it("looks up object fluents nested in the arguments of other fluents", () => {
    const problem = emptyProblem("lights");
    const em = problem.environment.expressions;
    const { type: loc, objects } = declareObjects(problem, "Loc", "l1", "l2");
    const [l1] = objects;
    if (!l1) throw new Error("missing objects");
    const pos = typedFluent(problem, "pos", loc, l1);
    const lit = boolFluent(problem, "lit", [new Parameter("where", loc)]);
    const toggle = instantaneous(problem, "toggle");
    toggle.addPrecondition(em.not(lit.apply(pos)));
    toggle.addEffect(lit.apply(pos), true);

    const compiled = new UsertypeFluentsRemover().compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const compiledToggle = compiled.action("toggle");
    if (compiledToggle.kind !== "instantaneous") throw new Error("expected an instantaneous action");
    expect(compiledToggle.preconditions.map(String)).to.deep.equal([
      "(not Exists (Loc pos_loc) (lit(pos_loc) and pos(pos_loc)))",
    ]);
    expect(compiledToggle.effects.map(String)).to.deep.equal([
      "if pos(l1) then lit(l1) := true",
      "if pos(l2) then lit(l2) := true",
    ]);
    expect(compiled.fluent("lit")).to.equal(lit);
  });

  it("refuses numeric expressions reading an object fluent", () => {
    const { problem, loc, pos } = robot();
    const fuel = typedFluent(problem, "fuel", problem.environment.types.intType(), 3, [new Parameter("at", loc)]);
    problem.addQualityMetric(
      minimizeActionCosts(new Map([["move", problem.environment.expressions.fluentExp(fuel, [pos])]])),
    );

    expect(() => new UsertypeFluentsRemover().compile(problem))
      .to.throw(UnsupportedProblemTypeError)
      .with.property("message", "fuel(pos) reads a usertype fluent outside a condition or an effect");
  });
});
