import { describe, it } from "mocha";
import { expect } from "chai";

import { PlanningTypeError } from "../src/errors.js";
import { createEnvironment } from "../src/model/environment.js";
import { Fluent } from "../src/model/fluent.js";
import { PlanObject } from "../src/model/object.js";
import { Parameter } from "../src/model/parameter.js";
import { Variable } from "../src/model/variable.js";
import { Simplifier } from "../src/model/walkers/simplifier.js";
import { boolFluent, emptyProblem, instantaneous } from "./helpers/problems.js";

describe("expressions", () => {
  function setup() {
    const environment = createEnvironment();
    const em = environment.expressions;
    const bool = environment.types.boolType();
    const a = new Fluent("a", bool, [], environment);
    const b = new Fluent("b", bool, [], environment);
    const c = new Fluent("c", bool, [], environment);
    const n = new Fluent("n", environment.types.intType(), [], environment);
    return { environment, em, a, b, c, n };
  }

  describe("construction", () => {
    it("shares structurally equal nodes", () => {
      const { em, a, b } = setup();
      const first = em.and(a, em.not(b));
      const size = em.size;

      const second = em.and(a, em.not(b));

      expect(second).to.equal(first);
      expect(em.size).to.equal(size);
      expect(em.int(3)).to.equal(em.int(3));
      expect(em.int(3)).to.not.equal(em.real(3));
    });

    it("collapses trivial connectives", () => {
      const { em, a, n } = setup();

      expect(em.and()).to.equal(em.trueExp());
      expect(em.or()).to.equal(em.falseExp());
      expect(em.and(a)).to.equal(em.fluentExp(a));
      expect(em.not(em.not(a))).to.equal(em.fluentExp(a));
      expect(em.gt(n, 1)).to.equal(em.lt(1, n));
    });

    it("rejects operands of the wrong type", () => {
      const { em, a, n } = setup();

      expect(() => em.and(a, 1)).to.throw(PlanningTypeError, "and expects boolean operands, got 1");
      expect(() => em.plus(n, a)).to.throw(PlanningTypeError, "plus expects numeric operands, got a");
      expect(() => em.exists(a)).to.throw(PlanningTypeError, "exists requires at least one variable");
    });

    it("prints expressions in infix form", () => {
      const { environment, em, a, b, n } = setup();
      const loc = environment.types.userType("Loc", null);
      const at = new Fluent("at", environment.types.boolType(), [new Parameter("where", loc)], environment);
      const v = new Variable("v", loc);
      const home = new PlanObject("home", loc);

      expect(em.and(a, em.not(b)).toString()).to.equal("(a and (not b))");
      expect(em.plus(n, 2).toString()).to.equal("(n + 2)");
      expect(em.equals(n, 4).toString()).to.equal("(n == 4)");
      expect(em.exists(at.apply(v), v).toString()).to.equal("Exists (Loc v) at(v)");
      expect(at.apply(home).toString()).to.equal("at(home)");
      expect(em.always(a).toString()).to.equal("Always(a)");
    });
  });

  describe("simplifier", () => {
    it("flattens and deduplicates conjunctions", () => {
      const { environment, em, a, b } = setup();

      const simplified = environment.simplifier.simplify(em.and(a, true, em.and(b, a)));

      expect(simplified).to.equal(em.and(a, b));
    });

    it("detects complementary literals", () => {
      const { environment, em, a } = setup();

      expect(environment.simplifier.simplify(em.and(a, em.not(a)))).to.equal(em.falseExp());
      expect(environment.simplifier.simplify(em.or(em.not(a), a))).to.equal(em.trueExp());
    });

    it("folds arithmetic over constants", () => {
      const { environment, em, a, n } = setup();

      expect(environment.simplifier.simplify(em.plus(n, 2, 3)).toString()).to.equal("(n + 5)");
      expect(environment.simplifier.simplify(em.lt(2, 3))).to.equal(em.trueExp());
      expect(environment.simplifier.simplify(em.times(n, 0))).to.equal(em.int(0));
      expect(environment.simplifier.simplify(em.implies(false, a))).to.equal(em.trueExp());
    });

    it("replaces ground static fluents by their initial value", () => {
      const problem = emptyProblem("roads");
      const em = problem.environment.expressions;
      const road = boolFluent(problem, "road");
      const x = boolFluent(problem, "x");
      instantaneous(problem, "go").addEffect(x, true);

      const simplified = new Simplifier(problem.environment, problem).simplify(em.or(road, x));

      expect(simplified).to.equal(em.fluentExp(x));
    });
  });

  describe("normal forms", () => {
    it("pushes negations down to the atoms", () => {
      const { environment, em, a, b, c } = setup();

      const nnf = environment.nnf.getNnfExpression(em.not(em.and(a, em.implies(b, c))));

      expect(nnf.toString()).to.equal("((not a) or (b and (not c)))");
    });

    it("dualises quantifiers under negation", () => {
      const { environment, em } = setup();
      const loc = environment.types.userType("Loc", null);
      const at = new Fluent("at", environment.types.boolType(), [new Parameter("where", loc)], environment);
      const v = new Variable("v", loc);

      const nnf = environment.nnf.getNnfExpression(em.not(em.exists(at.apply(v), v)));

      expect(nnf).to.equal(em.forall(em.not(at.apply(v)), v));
    });

    it("distributes conjunctions over disjunctions", () => {
      const { environment, em, a, b, c } = setup();

      const dnf = environment.dnf.getDnfExpression(em.and(em.or(a, b), c));

      expect(dnf.toString()).to.equal("((a and c) or (b and c))");
    });
  });
});
