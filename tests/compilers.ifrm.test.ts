import { describe, it } from "mocha";
import { expect } from "chai";

import { InterpretedFunctionsRemover } from "../src/engines/compilers/interpretedFunctionsRemover.js";
import { UnsupportedProblemTypeError } from "../src/errors.js";
import { DurativeAction, type Action } from "../src/model/action.js";
import { InterpretedFunction } from "../src/model/interpretedFunction.js";
import { Parameter } from "../src/model/parameter.js";
import { endTiming, startTiming } from "../src/model/timing.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { compileWithPredictedKind } from "./helpers/kinds.js";
import { boolFluent, declareObjects, emptyProblem, instantaneous } from "./helpers/problems.js";

function preconditionStrings(action: Action): string[] {
  if (action.kind !== "instantaneous") throw new Error(`${action.name} is not instantaneous`);
  return action.preconditions.map((precondition) => precondition.toString());
}

describe("interpreted functions remover", () => {
  function rover() {
    const problem = emptyProblem("rover");
    const em = problem.environment.expressions;
    const { type, objects } = declareObjects(problem, "Loc", "l1", "l2");
    const [l1] = objects;
    if (!l1) throw new Error("missing objects");
    const to = new Parameter("to", type);
    const at = boolFluent(problem, "at", [new Parameter("where", type)]);
    const distance = new InterpretedFunction(
      "distance",
      problem.environment.types.intType(),
      [new Parameter("target", type)],
      problem.environment,
    );
    const move = instantaneous(problem, "move", [to]);
    move.addPrecondition(em.lt(distance.apply(to), 5));
    move.addEffect(at.apply(to), true);
    const knowledge = new Map([[distance.apply(l1), em.int(3)]]);
    return { problem, em, to, l1, distance, move, knowledge };
  }

  it("splits an action over the known values and the unknown case", () => {
    const { problem, l1, move, knowledge } = rover();
    const compiler = new InterpretedFunctionsRemover({ knowledge });

    const result = compiler.compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(compiled.name).to.equal("ifrm_rover");
    expect(compiled.actions.map((action) => action.name)).to.deep.equal(["move", "move_0"]);
    expect(preconditionStrings(compiled.action("move"))).to.deep.equal(["(to == l1)"]);
    expect(preconditionStrings(compiled.action("move_0"))).to.deep.equal(["(not (to == l1))"]);
    for (const variant of compiled.actions) {
      expect(result.mapBackActionInstance(new ActionInstance(variant, [l1]))?.action).to.equal(move);
    }
  });

  it("predicts the kind of the compiled problem", () => {
    const { problem, knowledge } = rover();

    const { compiled } = compileWithPredictedKind(new InterpretedFunctionsRemover({ knowledge }), problem);

    expect(compiled.kind.toString()).to.equal(
      [
        "PROBLEM_CLASS: ACTION_BASED",
        "CONDITIONS_KIND: NEGATIVE_CONDITIONS, EQUALITIES",
        "TYPING: FLAT_TYPING",
      ].join("\n"),
    );
  });

  it("keeps the conjuncts of a precondition that need no interpreted function", () => {
    const { problem, em, to, distance, move } = rover();
    const ready = boolFluent(problem, "ready");
    move.setPreconditions([em.and(ready, em.lt(distance.apply(to), 5))]);

    const { compiled } = compileWithPredictedKind(new InterpretedFunctionsRemover(), problem);

    expect(compiled.actions.map((action) => action.name)).to.deep.equal(["move"]);
    expect(preconditionStrings(compiled.action("move"))).to.deep.equal(["ready"]);
  });

  it("drops only the interpreted conjuncts of durative conditions", () => {
    const problem = emptyProblem("convoy");
    const em = problem.environment.expressions;
    const { type } = declareObjects(problem, "Loc", "l1");
    const to = new Parameter("to", type);
    const at = boolFluent(problem, "at", [new Parameter("where", type)]);
    const ready = boolFluent(problem, "ready");
    const distance = new InterpretedFunction(
      "distance",
      problem.environment.types.intType(),
      [new Parameter("target", type)],
      problem.environment,
    );
    const drive = new DurativeAction("drive", [to], problem.environment);
    drive.setFixedDuration(2);
    drive.addCondition(startTiming(), em.and(ready, em.lt(distance.apply(to), 5)));
    drive.addEffect(endTiming(), at.apply(to), true);
    problem.addAction(drive);

    const { compiled } = compileWithPredictedKind(new InterpretedFunctionsRemover(), problem);

    const action = compiled.action("drive");
    if (action.kind !== "durative") throw new Error("expected a durative action");
    expect(action.conditions.flatMap(({ conditions }) => conditions)).to.deep.equal([em.fluentExp(ready)]);
  });

  it("drops the checks entirely when nothing is known", () => {
    const { problem } = rover();

    const compiled = new InterpretedFunctionsRemover().compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(compiled.actions.map((action) => action.name)).to.deep.equal(["move"]);
    expect(preconditionStrings(compiled.action("move"))).to.deep.equal([]);
  });

  it("rejects interpreted functions outside preconditions and durations", () => {
    const { problem, em, l1, distance } = rover();
    problem.addGoal(em.lt(distance.apply(l1), 5));

    expect(() => new InterpretedFunctionsRemover().compile(problem)).to.throw(UnsupportedProblemTypeError);
  });
});

