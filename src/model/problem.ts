import { ConflictingEffectsError, PlanningTypeError, ProblemDefinitionError, UsageError } from "../errors.js";
import type { Action } from "./action.js";
import { cartesianProduct, domainItems } from "./domain.js";
import { createEffect, describeConflict, tryAddEffect, type Effect, type EffectKind } from "./effect.js";
import type { Environment } from "./environment.js";
import type { Expression } from "./expression.js";
import type { Fluent } from "./fluent.js";
import type { FNode } from "./fnode.js";
import { KindCollector } from "./kindCollector.js";
import type { PlanQualityMetric } from "./metrics.js";
import type { PlanObject } from "./object.js";
import type { ProblemKind } from "./problemKind.js";
import {
  intervalKey,
  intervalToString,
  timePointInterval,
  timingKey,
  timingToString,
  type TimeInterval,
  type Timing,
} from "./timing.js";
import { isCompatibleType, isSubtypeOf, typeToString, type PlanningType, type UserType } from "./types.js";

export interface TimedGoals {
  readonly interval: TimeInterval;
  readonly goals: readonly FNode[];
}

export interface ProblemTimedEffects {
  readonly timing: Timing;
  readonly effects: readonly Effect[];
}

export interface AddFluentOptions {
  /** Value of every grounding of the fluent that has no explicit initial value. */
  readonly defaultInitialValue?: Expression;
}

function isTiming(value: TimeInterval | Timing): value is Timing {
  return "timepoint" in value;
}

/**
 * Mutable planning problem. Compilers never mutate the problem they receive:
 * they {@link Problem.clone} it and edit the copy.
 */
export class Problem {
  private fluentList: Fluent[] = [];
  private fluentDefaultMap = new Map<Fluent, FNode>();
  private userTypeList: UserType[] = [];
  private objectList: PlanObject[] = [];
  private actionList: Action[] = [];
  private initialValueMap = new Map<FNode, FNode>();
  private goalList: FNode[] = [];
  private timedGoalMap = new Map<string, { interval: TimeInterval; goals: FNode[] }>();
  private timedEffectMap = new Map<string, { timing: Timing; effects: Effect[] }>();
  private trajectoryConstraintList: FNode[] = [];
  private qualityMetricList: PlanQualityMetric[] = [];

  constructor(
    public name: string,
    public readonly environment: Environment,
  ) {}

  // -- names --------------------------------------------------------------

  /** Whether {@link name} is already used by a fluent, object, action or user type. */
  hasName(name: string): boolean {
    return (
      this.fluentList.some((fluent) => fluent.name === name) ||
      this.objectList.some((object) => object.name === name) ||
      this.actionList.some((action) => action.name === name) ||
      this.userTypeList.some((type) => type.name === name)
    );
  }

  private claimName(name: string, what: string): void {
    if (this.hasName(name)) {
      throw new ProblemDefinitionError(`Name ${name} already defined! Cannot add ${what} ${name}.`, { name });
    }
  }

  // -- types --------------------------------------------------------------

  get userTypes(): readonly UserType[] {
    return this.userTypeList;
  }

  /** Registers {@link type} and its ancestors; primitive types are ignored. */
  addUserType(type: PlanningType): void {
    if (type.kind !== "user" || this.userTypeList.includes(type)) {
      return;
    }
    if (type.father) {
      this.addUserType(type.father);
    }
    this.claimName(type.name, "type");
    this.userTypeList.push(type);
  }

  // -- fluents ------------------------------------------------------------

  get fluents(): readonly Fluent[] {
    return this.fluentList;
  }

  get fluentDefaults(): ReadonlyMap<Fluent, FNode> {
    return this.fluentDefaultMap;
  }

  addFluent(fluent: Fluent, options: AddFluentOptions = {}): Fluent {
    this.claimName(fluent.name, "fluent");
    this.addUserType(fluent.type);
    for (const parameter of fluent.signature) {
      this.addUserType(parameter.type);
    }
    this.fluentList.push(fluent);
    if (options.defaultInitialValue !== undefined) {
      const value = this.environment.expressions.promote(options.defaultInitialValue);
      if (!isCompatibleType(fluent.type, value.type)) {
        throw new PlanningTypeError(`default ${value.toString()} is not compatible with fluent ${fluent.name}`);
      }
      this.fluentDefaultMap.set(fluent, value);
    }
    return fluent;
  }

  addFluents(fluents: readonly Fluent[]): void {
    fluents.forEach((fluent) => this.addFluent(fluent));
  }

  hasFluent(name: string): boolean {
    return this.fluentList.some((fluent) => fluent.name === name);
  }

  fluent(name: string): Fluent {
    const found = this.fluentList.find((fluent) => fluent.name === name);
    if (!found) {
      throw new UsageError(`fluent ${name} is not defined in problem ${this.name}`);
    }
    return found;
  }

  /** Fluents never modified by an action or a timed effect. */
  getStaticFluents(): Set<Fluent> {
    const modified = new Set<Fluent>();
    const mark = (effect: Effect): void => {
      const target = effect.fluent.isDot() ? effect.fluent.arg(0) : effect.fluent;
      modified.add(target.fluent());
    };
    for (const action of this.actionList) {
      const effects = action.kind === "instantaneous" ? action.effects : action.allEffects;
      effects.forEach(mark);
    }
    for (const { effects } of this.timedEffectMap.values()) {
      effects.forEach(mark);
    }
    return new Set(this.fluentList.filter((fluent) => !modified.has(fluent)));
  }

  // -- objects ------------------------------------------------------------

  get allObjects(): readonly PlanObject[] {
    return this.objectList;
  }

  addObject(object: PlanObject): PlanObject {
    this.claimName(object.name, "object");
    this.addUserType(object.type);
    this.objectList.push(object);
    return object;
  }

  addObjects(objects: readonly PlanObject[]): void {
    objects.forEach((object) => this.addObject(object));
  }

  hasObject(name: string): boolean {
    return this.objectList.some((object) => object.name === name);
  }

  object(name: string): PlanObject {
    const found = this.objectList.find((object) => object.name === name);
    if (!found) {
      throw new UsageError(`object ${name} is not defined in problem ${this.name}`);
    }
    return found;
  }

  /** Objects of {@link type}, objects of its subtypes included. */
  objects(type: UserType): readonly PlanObject[] {
    return this.objectList.filter((object) => isSubtypeOf(object.type, type));
  }

  // -- actions ------------------------------------------------------------

  get actions(): readonly Action[] {
    return this.actionList;
  }

  addAction(action: Action): Action {
    this.claimName(action.name, "action");
    for (const parameter of action.parameters) {
      this.addUserType(parameter.type);
    }
    this.actionList.push(action);
    return action;
  }

  addActions(actions: readonly Action[]): void {
    actions.forEach((action) => this.addAction(action));
  }

  hasAction(name: string): boolean {
    return this.actionList.some((action) => action.name === name);
  }

  action(name: string): Action {
    const found = this.actionList.find((action) => action.name === name);
    if (!found) {
      throw new UsageError(`action ${name} is not defined in problem ${this.name}`);
    }
    return found;
  }

  clearActions(): void {
    this.actionList = [];
  }

  // -- initial state ------------------------------------------------------

  setInitialValue(fluentExpression: Expression, value: Expression): void {
    const em = this.environment.expressions;
    const target = em.promote(fluentExpression);
    const node = em.promote(value);
    if (!target.isFluentExp() || !target.args.every((arg) => arg.isConstant())) {
      throw new UsageError(`initial value target ${target.toString()} must be a ground fluent expression`);
    }
    if (!node.isConstant()) {
      throw new UsageError(`initial value of ${target.toString()} must be a constant, got ${node.toString()}`);
    }
    if (!isCompatibleType(target.type, node.type)) {
      throw new PlanningTypeError(`initial value ${node.toString()} is not compatible with ${target.toString()}`);
    }
    this.initialValueMap.set(target, node);
  }

  /** Explicit value of {@link fluentExpression}, else its fluent default. */
  initialValue(fluentExpression: FNode): FNode {
    const explicit = this.initialValueMap.get(fluentExpression);
    if (explicit) {
      return explicit;
    }
    if (fluentExpression.isFluentExp()) {
      const fallback = this.fluentDefaultMap.get(fluentExpression.fluent());
      if (fallback) {
        return fallback;
      }
    }
    throw new ProblemDefinitionError(`Initial value not set for fluent: ${fluentExpression.toString()}`, {
      fluent: fluentExpression.toString(),
    });
  }

  get explicitInitialValues(): ReadonlyMap<FNode, FNode> {
    return this.initialValueMap;
  }

  /** Initial value of every grounding of every fluent. */
  get initialValues(): Map<FNode, FNode> {
    const em = this.environment.expressions;
    const values = new Map<FNode, FNode>();
    for (const fluent of this.fluentList) {
      const groundings = cartesianProduct(fluent.signature.map((parameter) => domainItems(this, parameter.type)));
      for (const args of groundings) {
        const application = em.fluentExp(fluent, args);
        values.set(application, this.initialValue(application));
      }
    }
    return values;
  }

  // -- goals --------------------------------------------------------------

  get goals(): readonly FNode[] {
    return this.goalList;
  }

  addGoal(goal: Expression): void {
    const node = this.requireBool(goal, "goal");
    if (!node.isTrue()) {
      this.goalList.push(node);
    }
  }

  clearGoals(): void {
    this.goalList = [];
  }

  get timedGoals(): readonly TimedGoals[] {
    return [...this.timedGoalMap.values()].map(({ interval, goals }) => ({ interval, goals: [...goals] }));
  }

  addTimedGoal(when: TimeInterval | Timing, goal: Expression): void {
    const interval = isTiming(when) ? timePointInterval(when) : when;
    const node = this.requireBool(goal, "timed goal");
    if (node.isTrue()) {
      return;
    }
    const key = intervalKey(interval);
    const entry = this.timedGoalMap.get(key);
    if (!entry) {
      this.timedGoalMap.set(key, { interval, goals: [node] });
    } else if (!entry.goals.includes(node)) {
      entry.goals.push(node);
    }
  }

  clearTimedGoals(): void {
    this.timedGoalMap = new Map();
  }

  // -- timed effects ------------------------------------------------------

  get timedEffects(): readonly ProblemTimedEffects[] {
    return [...this.timedEffectMap.values()].map(({ timing, effects }) => ({ timing, effects: [...effects] }));
  }

  addTimedEffect(timing: Timing, fluent: Expression, value: Expression, condition: Expression = true): void {
    this.addTimedEffectOfKind(timing, fluent, value, condition, "assign");
  }

  addIncreaseTimedEffect(timing: Timing, fluent: Expression, value: Expression, condition: Expression = true): void {
    this.addTimedEffectOfKind(timing, fluent, value, condition, "increase");
  }

  addDecreaseTimedEffect(timing: Timing, fluent: Expression, value: Expression, condition: Expression = true): void {
    this.addTimedEffectOfKind(timing, fluent, value, condition, "decrease");
  }

  addTimedEffectInstance(timing: Timing, effect: Effect): void {
    const key = timingKey(timing);
    const entry = this.timedEffectMap.get(key);
    const insertion = tryAddEffect(entry?.effects ?? [], effect);
    if (!insertion.ok) {
      throw new ConflictingEffectsError(describeConflict(insertion.conflict), {
        timing: timingToString(timing),
        reason: insertion.conflict.reason,
      });
    }
    this.timedEffectMap.set(key, { timing, effects: [...insertion.effects] });
  }

  clearTimedEffects(): void {
    this.timedEffectMap = new Map();
  }

  private addTimedEffectOfKind(
    timing: Timing,
    fluent: Expression,
    value: Expression,
    condition: Expression,
    kind: EffectKind,
  ): void {
    this.addTimedEffectInstance(timing, createEffect(this.environment, fluent, value, condition, kind));
  }

  // -- constraints and metrics --------------------------------------------

  get trajectoryConstraints(): readonly FNode[] {
    return this.trajectoryConstraintList;
  }

  addTrajectoryConstraint(constraint: FNode): void {
    this.trajectoryConstraintList.push(constraint);
  }

  clearTrajectoryConstraints(): void {
    this.trajectoryConstraintList = [];
  }

  get qualityMetrics(): readonly PlanQualityMetric[] {
    return this.qualityMetricList;
  }

  addQualityMetric(metric: PlanQualityMetric): void {
    this.qualityMetricList.push(metric);
  }

  clearQualityMetrics(): void {
    this.qualityMetricList = [];
  }

  // -- whole problem ------------------------------------------------------

  /** Features used by the problem, recomputed on every access. */
  get kind(): ProblemKind {
    const collector = new KindCollector(this.getStaticFluents());
    this.userTypeList.forEach((type) => collector.userType(type));
    this.fluentList.forEach((fluent) => collector.fluent(fluent));
    this.actionList.forEach((action) => collector.action(action));
    this.goalList.forEach((goal) => collector.condition(goal));
    for (const { interval, goals } of this.timedGoalMap.values()) {
      goals.forEach((goal) => collector.timedGoal(interval, goal));
    }
    for (const { timing, effects } of this.timedEffectMap.values()) {
      effects.forEach((effect) => collector.timedEffect(timing, effect));
    }
    this.trajectoryConstraintList.forEach((constraint) => collector.trajectoryConstraint(constraint));
    this.qualityMetricList.forEach((metric) => collector.metric(metric));
    return collector.kind;
  }

  /**
   * Copy sharing the immutable parts (fluents, objects, expressions, effects)
   * and owning fresh containers and cloned actions.
   */
  clone(): Problem {
    const copy = new Problem(this.name, this.environment);
    copy.fluentList = [...this.fluentList];
    copy.fluentDefaultMap = new Map(this.fluentDefaultMap);
    copy.userTypeList = [...this.userTypeList];
    copy.objectList = [...this.objectList];
    copy.actionList = this.actionList.map((action) => action.clone());
    copy.initialValueMap = new Map(this.initialValueMap);
    copy.goalList = [...this.goalList];
    for (const [key, { interval, goals }] of this.timedGoalMap) {
      copy.timedGoalMap.set(key, { interval, goals: [...goals] });
    }
    for (const [key, { timing, effects }] of this.timedEffectMap) {
      copy.timedEffectMap.set(key, { timing, effects: [...effects] });
    }
    copy.trajectoryConstraintList = [...this.trajectoryConstraintList];
    copy.qualityMetricList = [...this.qualityMetricList];
    return copy;
  }

  toString(): string {
    const lines = [`problem name = ${this.name}`, ""];
    if (this.userTypeList.length > 0) {
      lines.push(`types = [${this.userTypeList.map((type) => typeToString(type)).join(", ")}]`, "");
    }
    lines.push("fluents = [", ...this.fluentList.map((fluent) => `  ${typeToString(fluent.type)} ${fluent.toString()}`), "]", "");
    lines.push("actions = [", ...this.actionList.map((action) => action.toString()), "]", "");
    if (this.objectList.length > 0) {
      lines.push(`objects = [${this.objectList.map((object) => object.name).join(", ")}]`, "");
    }
    lines.push("initial values = [");
    for (const [fluent, value] of this.initialValueMap) {
      lines.push(`  ${fluent.toString()} := ${value.toString()}`);
    }
    lines.push("]", "", "goals = [", ...this.goalList.map((goal) => `  ${goal.toString()}`), "]");
    for (const { interval, goals } of this.timedGoalMap.values()) {
      lines.push(`timed goal ${intervalToString(interval)}: ${goals.map((goal) => goal.toString()).join(", ")}`);
    }
    for (const { timing, effects } of this.timedEffectMap.values()) {
      lines.push(`timed effect ${timingToString(timing)}: ${effects.map((effect) => effect.toString()).join(", ")}`);
    }
    return lines.join("\n");
  }

  private requireBool(expression: Expression, what: string): FNode {
    const node = this.environment.expressions.promote(expression);
    if (node.type.kind !== "bool") {
      throw new PlanningTypeError(`${what} ${node.toString()} is not boolean`);
    }
    return node;
  }
}
