import { describe, it } from "mocha";
import { expect } from "chai";

import { MAConditionalEffectsRemover } from "../src/engines/compilers/maConditionalEffectsRemover.js";
import { MAQuantifiersRemover } from "../src/engines/compilers/maQuantifiersRemover.js";
import { InstantaneousAction, type Action } from "../src/model/action.js";
import { createEnvironment } from "../src/model/environment.js";
import { Fluent } from "../src/model/fluent.js";
import { Agent } from "../src/model/multiAgent/agent.js";
import { MultiAgentProblem } from "../src/model/multiAgent/maProblem.js";
import { PlanObject } from "../src/model/object.js";
import { Parameter } from "../src/model/parameter.js";
import { Variable } from "../src/model/variable.js";
import { ActionInstance } from "../src/plans/actionInstance.js";
import { compileWithPredictedKind } from "./helpers/kinds.js";

function describeAction(action: Action): { name: string; preconditions: string[]; effects: string[] } {
  if (action.kind !== "instantaneous") throw new Error(`${action.name} is not instantaneous`);
  return {
    name: action.name,
    preconditions: action.preconditions.map((precondition) => precondition.toString()),
    effects: action.effects.map((effect) => effect.toString()),
  };
}

describe("multi-agent compilers", () => {
  function patrol() {
    const environment = createEnvironment();
    const em = environment.expressions;
    const bool = environment.types.boolType();
    const problem = new MultiAgentProblem("patrol", environment);

    const r1 = new Agent("r1", environment);
    const lit = r1.addFluent(new Fluent("lit", bool, [], environment));
    const alarm = r1.addFluent(new Fluent("alarm", bool, [], environment));
    const toggle = new InstantaneousAction("toggle", [], environment);
    toggle.addEffect(lit, true);
    toggle.addEffect(alarm, true, lit);
    r1.addAction(toggle);

    const r2 = new Agent("r2", environment);
    const rested = r2.addFluent(new Fluent("rested", bool, [], environment));
    const wait = new InstantaneousAction("wait", [], environment);
    wait.addEffect(rested, true);
    r2.addAction(wait);

    problem.addAgent(r1);
    problem.addAgent(r2);
    problem.setFluentDefault(lit, false);
    problem.setFluentDefault(alarm, false);
    problem.setFluentDefault(rested, false);
    problem.addGoal(em.dot(r1, alarm));
    return { problem, r1, toggle };
  }

  it("removes conditional effects agent by agent", () => {
    const { problem } = patrol();

    const { compiled } = compileWithPredictedKind(new MAConditionalEffectsRemover(), problem);

    expect(compiled.name).to.equal("ma_cerm_patrol");
    expect(compiled.agent("r1").actions.map(describeAction)).to.deep.equal([
      { name: "toggle", preconditions: ["(not lit)"], effects: ["lit := true"] },
      { name: "toggle_0", preconditions: ["lit"], effects: ["lit := true", "alarm := true"] },
    ]);
    expect(compiled.agent("r2").actions.map((action) => action.name)).to.deep.equal(["wait"]);
  });

  it("maps instances back to the original action and agent", () => {
    const { problem, r1, toggle } = patrol();

    const result = new MAConditionalEffectsRemover().compile(problem);
    const compiled = result.problem;
    if (!compiled) throw new Error("expected a compiled problem");

    const compiledAgent = compiled.agent("r1");
    const instance = new ActionInstance(compiledAgent.action("toggle_0"), [], compiledAgent);
    const mapped = result.mapBackActionInstance(instance);

    expect(mapped?.action).to.equal(toggle);
    expect(mapped?.agent).to.equal(r1);
    expect(mapped?.toString()).to.equal("r1.toggle");
  });

  it("expands quantifiers inside agent actions and goals", () => {
    const environment = createEnvironment();
    const em = environment.expressions;
    const loc = environment.types.userType("Loc", null);
    const problem = new MultiAgentProblem("survey", environment);
    const l1 = problem.addObject(new PlanObject("l1", loc));
    const l2 = problem.addObject(new PlanObject("l2", loc));
    const marked = problem.addEnvironmentFluent(
      new Fluent("marked", environment.types.boolType(), [new Parameter("where", loc)], environment),
      false,
    );
    const v = new Variable("v", loc);
    const robot = new Agent("robot", environment);
    const done = robot.addFluent(new Fluent("done", environment.types.boolType(), [], environment));
    const inspect = new InstantaneousAction("inspect", [], environment);
    inspect.addPrecondition(em.exists(marked.apply(v), v));
    inspect.addEffect(done, true);
    robot.addAction(inspect);
    problem.addAgent(robot);
    problem.addGoal(em.forall(marked.apply(v), v));

    const { compiled } = compileWithPredictedKind(new MAQuantifiersRemover(), problem);

    expect(compiled.name).to.equal("ma_qurm_survey");
    const action = compiled.agent("robot").action("inspect");
    expect(action.kind === "instantaneous" ? action.preconditions : null).to.deep.equal([
      em.or(marked.apply(l1), marked.apply(l2)),
    ]);
    expect(compiled.goals).to.deep.equal([em.and(marked.apply(l1), marked.apply(l2))]);
  });
});
