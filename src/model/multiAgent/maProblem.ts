import { PlanningTypeError, ProblemDefinitionError, UsageError } from "../../errors.js";
import { cartesianProduct, domainItems } from "../domain.js";
import type { Environment } from "../environment.js";
import type { Expression } from "../expression.js";
import type { Fluent } from "../fluent.js";
import type { FNode } from "../fnode.js";
import { KindCollector } from "../kindCollector.js";
import type { PlanObject } from "../object.js";
import type { ProblemKind } from "../problemKind.js";
import { isCompatibleType, isSubtypeOf, type PlanningType, type UserType } from "../types.js";
import type { Agent } from "./agent.js";

/**
 * Problem shared by several agents. Fluents live either in the shared
 * environment or in an agent; initial values and goals reference agent
 * fluents through `dot` expressions.
 */
export class MultiAgentProblem {
  private agentList: Agent[] = [];
  private environmentFluentList: Fluent[] = [];
  private fluentDefaultMap = new Map<Fluent, FNode>();
  private userTypeList: UserType[] = [];
  private objectList: PlanObject[] = [];
  private initialValueMap = new Map<FNode, FNode>();
  private goalList: FNode[] = [];

  constructor(
    public name: string,
    public readonly environment: Environment,
  ) {}

  hasName(name: string): boolean {
    return (
      this.agentList.some((agent) => agent.name === name || agent.hasName(name)) ||
      this.environmentFluentList.some((fluent) => fluent.name === name) ||
      this.objectList.some((object) => object.name === name) ||
      this.userTypeList.some((type) => type.name === name)
    );
  }

  get agents(): readonly Agent[] {
    return this.agentList;
  }

  /** Adds {@link agent}, replacing an agent with the same name. */
  addAgent(agent: Agent): Agent {
    const index = this.agentList.findIndex((existing) => existing.name === agent.name);
    if (index >= 0) {
      this.agentList[index] = agent;
    } else {
      this.agentList.push(agent);
    }
    for (const fluent of agent.fluents) {
      this.registerFluentTypes(fluent);
    }
    return agent;
  }

  agent(name: string): Agent {
    const found = this.agentList.find((agent) => agent.name === name);
    if (!found) {
      throw new UsageError(`agent ${name} is not defined in problem ${this.name}`);
    }
    return found;
  }

  get environmentFluents(): readonly Fluent[] {
    return this.environmentFluentList;
  }

  addEnvironmentFluent(fluent: Fluent, defaultInitialValue?: Expression): Fluent {
    if (this.hasName(fluent.name)) {
      throw new ProblemDefinitionError(`Name ${fluent.name} already defined!`);
    }
    this.registerFluentTypes(fluent);
    this.environmentFluentList.push(fluent);
    if (defaultInitialValue !== undefined) {
      this.fluentDefaultMap.set(fluent, this.environment.expressions.promote(defaultInitialValue));
    }
    return fluent;
  }

  /** Default value for the agent fluent {@link fluent} across every agent. */
  setFluentDefault(fluent: Fluent, value: Expression): void {
    this.fluentDefaultMap.set(fluent, this.environment.expressions.promote(value));
  }

  get userTypes(): readonly UserType[] {
    return this.userTypeList;
  }

  addUserType(type: PlanningType): void {
    if (type.kind !== "user" || this.userTypeList.includes(type)) {
      return;
    }
    if (type.father) {
      this.addUserType(type.father);
    }
    this.userTypeList.push(type);
  }

  get allObjects(): readonly PlanObject[] {
    return this.objectList;
  }

  addObject(object: PlanObject): PlanObject {
    if (this.hasName(object.name)) {
      throw new ProblemDefinitionError(`Name ${object.name} already defined!`);
    }
    this.addUserType(object.type);
    this.objectList.push(object);
    return object;
  }

  addObjects(objects: readonly PlanObject[]): void {
    objects.forEach((object) => this.addObject(object));
  }

  objects(type: UserType): readonly PlanObject[] {
    return this.objectList.filter((object) => isSubtypeOf(object.type, type));
  }

  /** Sets the initial value of an environment fluent application or an agent `dot` expression. */
  setInitialValue(fluentExpression: Expression, value: Expression): void {
    const em = this.environment.expressions;
    const target = em.promote(fluentExpression);
    const node = em.promote(value);
    const application = target.isDot() ? target.arg(0) : target;
    if (!application.isFluentExp() || !application.args.every((arg) => arg.isConstant())) {
      throw new UsageError(`initial value target ${target.toString()} must be a ground fluent expression`);
    }
    if (!isCompatibleType(target.type, node.type)) {
      throw new PlanningTypeError(`initial value ${node.toString()} is not compatible with ${target.toString()}`);
    }
    this.initialValueMap.set(target, node);
  }

  initialValue(fluentExpression: FNode): FNode {
    const explicit = this.initialValueMap.get(fluentExpression);
    if (explicit) {
      return explicit;
    }
    const application = fluentExpression.isDot() ? fluentExpression.arg(0) : fluentExpression;
    const fallback = application.isFluentExp() ? this.fluentDefaultMap.get(application.fluent()) : undefined;
    if (fallback) {
      return fallback;
    }
    throw new ProblemDefinitionError(`Initial value not set for fluent: ${fluentExpression.toString()}`);
  }

  get explicitInitialValues(): ReadonlyMap<FNode, FNode> {
    return this.initialValueMap;
  }

  /** Initial value of every grounding of every environment and agent fluent. */
  get initialValues(): Map<FNode, FNode> {
    const em = this.environment.expressions;
    const values = new Map<FNode, FNode>();
    const groundings = (fluent: Fluent): FNode[] =>
      [...cartesianProduct(fluent.signature.map((parameter) => domainItems(this, parameter.type)))].map((args) =>
        em.fluentExp(fluent, args),
      );
    for (const fluent of this.environmentFluentList) {
      for (const application of groundings(fluent)) {
        values.set(application, this.initialValue(application));
      }
    }
    for (const agent of this.agentList) {
      for (const fluent of agent.fluents) {
        for (const application of groundings(fluent)) {
          const qualified = em.dot(agent, application);
          values.set(qualified, this.initialValue(qualified));
        }
      }
    }
    return values;
  }

  get goals(): readonly FNode[] {
    return this.goalList;
  }

  addGoal(goal: Expression): void {
    const node = this.environment.expressions.promote(goal);
    if (node.type.kind !== "bool") {
      throw new PlanningTypeError(`goal ${node.toString()} is not boolean`);
    }
    if (!node.isTrue()) {
      this.goalList.push(node);
    }
  }

  clearGoals(): void {
    this.goalList = [];
  }

  getStaticFluents(): Set<Fluent> {
    const modified = new Set<Fluent>();
    for (const agent of this.agentList) {
      for (const action of agent.actions) {
        const effects = action.kind === "instantaneous" ? action.effects : action.allEffects;
        for (const effect of effects) {
          modified.add((effect.fluent.isDot() ? effect.fluent.arg(0) : effect.fluent).fluent());
        }
      }
    }
    const all = [...this.environmentFluentList, ...this.agentList.flatMap((agent) => agent.fluents)];
    return new Set(all.filter((fluent) => !modified.has(fluent)));
  }

  get kind(): ProblemKind {
    const collector = new KindCollector(this.getStaticFluents(), "ACTION_BASED_MULTI_AGENT");
    this.userTypeList.forEach((type) => collector.userType(type));
    this.environmentFluentList.forEach((fluent) => collector.fluent(fluent));
    for (const agent of this.agentList) {
      agent.fluents.forEach((fluent) => collector.fluent(fluent));
      agent.actions.forEach((action) => collector.action(action));
    }
    this.goalList.forEach((goal) => collector.condition(goal));
    return collector.kind;
  }

  clone(): MultiAgentProblem {
    const copy = new MultiAgentProblem(this.name, this.environment);
    copy.agentList = this.agentList.map((agent) => agent.clone());
    copy.environmentFluentList = [...this.environmentFluentList];
    copy.fluentDefaultMap = new Map(this.fluentDefaultMap);
    copy.userTypeList = [...this.userTypeList];
    copy.objectList = [...this.objectList];
    copy.initialValueMap = new Map(this.initialValueMap);
    copy.goalList = [...this.goalList];
    return copy;
  }

  private registerFluentTypes(fluent: Fluent): void {
    this.addUserType(fluent.type);
    for (const parameter of fluent.signature) {
      this.addUserType(parameter.type);
    }
  }
}
