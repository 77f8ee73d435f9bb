import { describe, it } from "mocha";
import { expect } from "chai";

import { QuantifiersRemover } from "../src/engines/compilers/quantifiersRemover.js";
import type { Action } from "../src/model/action.js";
import { Parameter } from "../src/model/parameter.js";
import { Variable } from "../src/model/variable.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { compileWithPredictedKind } from "./helpers/kinds.js";
import { boolFluent, declareObjects, emptyProblem, instantaneous } from "./helpers/problems.js";

function instantaneousOf(action: Action) {
  if (action.kind !== "instantaneous") throw new Error(`${action.name} is not instantaneous`);
  return action;
}

describe("quantifiers remover", () => {
  function warehouse() {
    const problem = emptyProblem("warehouse");
    const em = problem.environment.expressions;
    const { type, objects } = declareObjects(problem, "Loc", "l1", "l2");
    const [l1, l2] = objects;
    if (!l1 || !l2) throw new Error("missing objects");
    const at = boolFluent(problem, "at", [new Parameter("where", type)]);
    const seen = boolFluent(problem, "seen");
    const v = new Variable("v", type);

    const check = instantaneous(problem, "check");
    check.addPrecondition(em.exists(at.apply(v), v));
    check.addEffect(seen, true);
    const clear = instantaneous(problem, "clear");
    clear.addEffect(at.apply(v), false, true, [v]);
    problem.addGoal(em.exists(at.apply(v), v));
    return { problem, em, at, l1, l2, check, clear };
  }

  it("expands existential conditions and goals into disjunctions over objects", () => {
    const { problem, em, at, l1, l2 } = warehouse();

    const compiled = new QuantifiersRemover().compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const expected = em.or(at.apply(l1), at.apply(l2));
    expect(compiled.name).to.equal("qurm_warehouse");
    expect(instantaneousOf(compiled.action("check")).preconditions).to.deep.equal([expected]);
    expect(compiled.goals).to.deep.equal([expected]);
  });

  it("expands forall effects into one effect per object", () => {
    const { problem } = warehouse();

    const compiled = new QuantifiersRemover().compile(problem).problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(instantaneousOf(compiled.action("clear")).effects.map((effect) => effect.toString())).to.deep.equal([
      "at(l1) := false",
      "at(l2) := false",
    ]);
  });

  it("keeps action names and maps instances back to the original actions", () => {
    const { problem, check, clear } = warehouse();

    const result = new QuantifiersRemover().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    expect(compiled.actions.map((action) => action.name)).to.deep.equal(["check", "clear"]);
    expect(result.mapBackActionInstance(new ActionInstance(compiled.action("check")))?.action).to.equal(check);
    expect(result.mapBackActionInstance(new ActionInstance(compiled.action("clear")))?.action).to.equal(clear);
  });

  it("predicts the kind of the compiled problem", () => {
    const { problem } = warehouse();

    const { compiled } = compileWithPredictedKind(new QuantifiersRemover(), problem);

    expect(compiled.kind.toString()).to.equal(
      ["PROBLEM_CLASS: ACTION_BASED", "CONDITIONS_KIND: DISJUNCTIVE_CONDITIONS", "TYPING: FLAT_TYPING"].join("\n"),
    );
  });
});
