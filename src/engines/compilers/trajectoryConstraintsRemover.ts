import { UnsupportedProblemTypeError } from "../../errors.js";
import type { Action } from "../../model/action.js";
import type { Effect } from "../../model/effect.js";
import type { ExpressionManager } from "../../model/expression.js";
import { Fluent } from "../../model/fluent.js";
import type { FNode } from "../../model/fnode.js";
import type { Problem } from "../../model/problem.js";
import { ProblemKind } from "../../model/problemKind.js";
import { QuantifiersRemover } from "../../model/walkers/quantifiersRemover.js";
import { StateEvaluator } from "../../model/walkers/stateEvaluator.js";
import type { CompilationKind } from "../compilationKind.js";
import { Compiler, type CompilerOptions } from "../compiler.js";
import { composeMapBacks } from "../compilersPipeline.js";
import type { CompilerResult } from "../results.js";
import { Grounder } from "./grounder.js";
import {
  checkAndSimplifyPreconditions,
  getFreshName,
  replaceAction,
  rewriteQualityMetrics,
  type NameSource,
} from "./utils.js";

/**
 * A ground trajectory constraint. Every kind but `always` is followed by a
 * monitoring fluent: `hold` for the ones the goal must confirm, `seen` for
 * the ones recording that a formula held in some earlier state.
 */
type MonitoredConstraint =
  | { readonly kind: "always"; readonly phi: FNode }
  | { readonly kind: "sometime"; readonly phi: FNode; readonly monitor: FNode }
  | { readonly kind: "at_most_once"; readonly phi: FNode; readonly monitor: FNode }
  | { readonly kind: "sometime_before"; readonly phi: FNode; readonly psi: FNode; readonly monitor: FNode }
  | { readonly kind: "sometime_after"; readonly phi: FNode; readonly psi: FNode; readonly monitor: FNode };

const MONITOR_NAMES = {
  sometime: "hold",
  sometime_after: "hold",
  sometime_before: "seen_psi",
  at_most_once: "seen_phi",
} as const;

function flatten(constraints: readonly FNode[]): FNode[] {
  return constraints.flatMap((constraint) => (constraint.isAnd() ? flatten(constraint.args) : [constraint]));
}

/**
 * Compiles the trajectory constraints of a problem into its actions. The
 * problem is grounded first; every action then checks, by regressing each
 * constraint formula through its effects, what the state it produces does to
 * the constraint. `always` and the "before" constraints become preconditions,
 * the others update monitoring fluents that the goal or later preconditions
 * read.
 */
export class TrajectoryConstraintsRemover extends Compiler {
  readonly name = "tcrm";

  constructor(options: CompilerOptions = {}) {
    super("TRAJECTORY_CONSTRAINTS_REMOVING", options);
  }

  supportedKind(): ProblemKind {
    return new ProblemKind([
      "ACTION_BASED",
      "FLAT_TYPING",
      "HIERARCHICAL_TYPING",
      "CONTINUOUS_NUMBERS",
      "DISCRETE_NUMBERS",
      "BOUNDED_TYPES",
      "NUMERIC_FLUENTS",
      "NEGATIVE_CONDITIONS",
      "DISJUNCTIVE_CONDITIONS",
      "EQUALITIES",
      "EXISTENTIAL_CONDITIONS",
      "UNIVERSAL_CONDITIONS",
      "CONDITIONAL_EFFECTS",
      "INCREASE_EFFECTS",
      "DECREASE_EFFECTS",
      "FLUENTS_IN_BOOLEAN_ASSIGNMENTS",
      "FLUENTS_IN_NUMERIC_ASSIGNMENTS",
      "FORALL_EFFECTS",
      "STATE_INVARIANTS",
      "TRAJECTORY_CONSTRAINTS",
      "ACTIONS_COST",
      "STATIC_FLUENTS_IN_ACTIONS_COST",
      "FLUENTS_IN_ACTIONS_COST",
      "PLAN_LENGTH",
      "OVERSUBSCRIPTION",
      "FINAL_VALUE",
    ]);
  }

  supportsCompilation(compilationKind: CompilationKind): boolean {
    return compilationKind === "TRAJECTORY_CONSTRAINTS_REMOVING";
  }

  /** Over-approximated: which monitors end up conditional depends on the actions. */
  resultingProblemKind(problemKind: ProblemKind): ProblemKind {
    const kind = problemKind.clone();
    if (kind.has("TRAJECTORY_CONSTRAINTS") || kind.has("STATE_INVARIANTS")) {
      kind
        .unset("TRAJECTORY_CONSTRAINTS", "STATE_INVARIANTS")
        .set("NEGATIVE_CONDITIONS", "DISJUNCTIVE_CONDITIONS", "CONDITIONAL_EFFECTS");
    }
    return kind;
  }

  protected compileProblem(problem: Problem): CompilerResult<Problem> {
    const grounding = new Grounder({ logger: this.logger, config: this.config }).compile(problem);
    const grounded = grounding.problem;
    if (!grounded) {
      return { problem: null, mapBackActionInstance: grounding.mapBackActionInstance, engineName: this.name };
    }
    const environment = grounded.environment;
    const em = environment.expressions;
    const simplifier = environment.simplifier;
    const expander = new QuantifiersRemover(grounded);
    const normalize = (node: FNode): FNode =>
      simplifier.simplify(environment.nnf.getNnfExpression(expander.removeQuantifiers(node)));
    const evaluator = new StateEvaluator(grounded);
    const holdsInitially = (node: FNode): boolean =>
      evaluator.evaluate(node, (fluentExpression) => grounded.initialValue(fluentExpression)).boolConstantValue();

    const issuedNames = new Set<string>();
    const names: NameSource = { hasName: (name) => grounded.hasName(name) || issuedNames.has(name) };
    const monitors: { fluent: Fluent; initial: boolean }[] = [];
    const monitor = (kind: keyof typeof MONITOR_NAMES, initial: boolean): FNode => {
      const name = getFreshName(names, MONITOR_NAMES[kind]);
      issuedNames.add(name);
      const fluent = new Fluent(name, environment.types.boolType(), [], environment);
      monitors.push({ fluent, initial });
      return em.fluentExp(fluent);
    };

    const constraints: MonitoredConstraint[] = [];
    for (const constraint of flatten(grounded.trajectoryConstraints)) {
      const [phi, psi] = constraint.args.map(normalize);
      if (!phi) {
        continue;
      }
      let violated = false;
      switch (constraint.kind) {
        case "always":
          violated = !holdsInitially(phi);
          constraints.push({ kind: "always", phi });
          break;
        case "sometime":
          constraints.push({ kind: "sometime", phi, monitor: monitor("sometime", holdsInitially(phi)) });
          break;
        case "at_most_once":
          constraints.push({ kind: "at_most_once", phi, monitor: monitor("at_most_once", holdsInitially(phi)) });
          break;
        case "sometime_before":
        case "sometime_after": {
          if (!psi) {
            continue;
          }
          if (constraint.kind === "sometime_before") {
            violated = holdsInitially(phi);
            const seen = monitor(constraint.kind, holdsInitially(psi));
            constraints.push({ kind: "sometime_before", phi, psi, monitor: seen });
          } else {
            const initial = !holdsInitially(phi) || holdsInitially(psi);
            constraints.push({ kind: "sometime_after", phi, psi, monitor: monitor(constraint.kind, initial) });
          }
          break;
        }
        default:
          throw new UnsupportedProblemTypeError(`${constraint.toString()} is not a trajectory constraint`, {
            constraint: constraint.toString(),
          });
      }
      if (violated) {
        this.logger.warn("trajectory_constraint_violated", {
          problem: problem.name,
          constraint: constraint.toString(),
        });
        return { problem: null, mapBackActionInstance: grounding.mapBackActionInstance, engineName: this.name };
      }
    }

    const groundedActions = grounded.actions;
    const groundedMetrics = grounded.qualityMetrics;
    const compiled = grounded;
    compiled.name = `${problem.name}_${this.name}`;
    compiled.clearActions();
    compiled.clearTrajectoryConstraints();
    compiled.clearQualityMetrics();
    for (const { fluent, initial } of monitors) {
      compiled.addFluent(fluent, { defaultInitialValue: false });
      if (initial) {
        compiled.setInitialValue(fluent, true);
      }
    }

    const newToOld = new Map<Action, Action>();
    for (const action of groundedActions) {
      const compiledAction = this.compileAction(action, constraints);
      if (compiledAction) {
        compiled.addAction(compiledAction);
        newToOld.set(compiledAction, action);
      }
    }
    for (const constraint of constraints) {
      if (constraint.kind === "sometime" || constraint.kind === "sometime_after") {
        compiled.addGoal(constraint.monitor);
      }
    }
    rewriteQualityMetrics(groundedMetrics, newToOld).forEach((metric) => compiled.addQualityMetric(metric));

    return {
      problem: compiled,
      mapBackActionInstance: composeMapBacks([replaceAction(newToOld), grounding.mapBackActionInstance]),
      engineName: this.name,
    };
  }

  private compileAction(action: Action, constraints: readonly MonitoredConstraint[]): Action | null {
    if (action.kind !== "instantaneous") {
      throw new UnsupportedProblemTypeError(`${action.name} is not instantaneous`, { action: action.name });
    }
    const environment = action.environment;
    const em = environment.expressions;
    const simplifier = environment.simplifier;
    const effects = action.effects;
    const regress = (node: FNode): FNode => simplifier.simplify(this.regression(em, node, effects));
    const copy = action.clone();
    const monitorUpdates: { monitor: FNode; value: boolean; condition: FNode }[] = [];

    for (const constraint of constraints) {
      const phi = regress(constraint.phi);
      const touchesPhi = phi !== constraint.phi;
      switch (constraint.kind) {
        case "always":
          if (touchesPhi) {
            copy.addPrecondition(phi);
          }
          break;
        case "sometime":
          if (touchesPhi) {
            monitorUpdates.push({ monitor: constraint.monitor, value: true, condition: phi });
          }
          break;
        case "at_most_once":
          if (touchesPhi) {
            copy.addPrecondition(simplifier.simplify(em.or(em.not(phi), em.not(constraint.monitor), constraint.phi)));
            monitorUpdates.push({ monitor: constraint.monitor, value: true, condition: phi });
          }
          break;
        case "sometime_before": {
          const psi = regress(constraint.psi);
          if (touchesPhi) {
            copy.addPrecondition(simplifier.simplify(em.or(em.not(phi), constraint.monitor)));
          }
          if (psi !== constraint.psi) {
            monitorUpdates.push({ monitor: constraint.monitor, value: true, condition: psi });
          }
          break;
        }
        case "sometime_after": {
          const psi = regress(constraint.psi);
          if (touchesPhi || psi !== constraint.psi) {
            monitorUpdates.push({ monitor: constraint.monitor, value: true, condition: psi });
            monitorUpdates.push({
              monitor: constraint.monitor,
              value: false,
              condition: simplifier.simplify(em.and(phi, em.not(psi))),
            });
          }
          break;
        }
      }
    }

    const preconditions = checkAndSimplifyPreconditions(environment, copy, simplifier);
    if (!preconditions.feasible) {
      return null;
    }
    copy.setPreconditions(preconditions.conditions);
    for (const { monitor, value, condition } of monitorUpdates) {
      if (!condition.isFalse()) {
        copy.addEffect(monitor, value, condition);
      }
    }
    return copy;
  }

  /** Formula that holds before {@link effects} exactly when {@link node} holds after them. */
  private regression(em: ExpressionManager, node: FNode, effects: readonly Effect[]): FNode {
    if (node.isBoolConstant()) {
      return node;
    }
    if (node.isFluentExp() && node.type.kind === "bool") {
      const added = this.achievers(em, node, effects, true);
      const deleted = this.achievers(em, node, effects, false);
      return em.or(added, em.and(node, em.not(deleted)));
    }
    if (node.isAnd() || node.isOr() || node.isNot()) {
      return em.rebuild(
        node,
        node.args.map((arg) => this.regression(em, arg, effects)),
      );
    }
    throw new UnsupportedProblemTypeError(`${node.toString()} cannot be regressed through an action`, {
      expression: node.toString(),
    });
  }

  /** Condition under which {@link effects} assign {@link value} to {@link atom}. */
  private achievers(em: ExpressionManager, atom: FNode, effects: readonly Effect[], value: boolean): FNode {
    const conditions: FNode[] = [];
    for (const effect of effects) {
      if (effect.fluent !== atom || !effect.isAssignment()) {
        continue;
      }
      if (effect.value.isBoolConstant()) {
        if (effect.value.boolConstantValue() === value) {
          conditions.push(effect.condition);
        }
        continue;
      }
      conditions.push(em.and(effect.condition, value ? effect.value : em.not(effect.value)));
    }
    return em.or(conditions);
  }
}
