import { PlanningTypeError } from "../errors.js";
import { FNode, type FNodePayload } from "./fnode.js";
import { Fluent } from "./fluent.js";
import { InterpretedFunction } from "./interpretedFunction.js";
import type { Agent } from "./multiAgent/agent.js";
import { PlanObject } from "./object.js";
import type { OperatorKind } from "./operators.js";
import { Parameter } from "./parameter.js";
import { isCompatibleType, isNumericType, type PlanningType, type TypeManager } from "./types.js";
import { Variable } from "./variable.js";

/** Anything the manager can promote to an {@link FNode}. */
export type Expression = FNode | Fluent | Parameter | Variable | PlanObject | boolean | number;

/** Argument accepted by the n-ary constructors: a single expression or a list. */
export type ExpressionArgument = Expression | readonly Expression[];

function isExpressionList(value: ExpressionArgument): value is readonly Expression[] {
  return Array.isArray(value);
}

/**
 * Builds hash-consed expression nodes. Every constructor type-checks its
 * operands and returns the shared node when a structurally identical one
 * already exists.
 */
export class ExpressionManager {
  private readonly table = new Map<string, FNode>();
  private readonly identities = new WeakMap<object, number>();
  private nextNodeId = 0;
  private nextIdentity = 0;
  private readonly trueNode: FNode;
  private readonly falseNode: FNode;

  constructor(private readonly types: TypeManager) {
    this.trueNode = this.create("bool_constant", [], { tag: "bool", value: true }, types.boolType());
    this.falseNode = this.create("bool_constant", [], { tag: "bool", value: false }, types.boolType());
  }

  /** Number of distinct nodes created so far. */
  get size(): number {
    return this.table.size;
  }

  promote(expression: Expression): FNode {
    if (expression instanceof FNode) {
      return expression;
    }
    if (typeof expression === "boolean") {
      return expression ? this.trueNode : this.falseNode;
    }
    if (typeof expression === "number") {
      return Number.isInteger(expression) ? this.int(expression) : this.real(expression);
    }
    if (expression instanceof Fluent) {
      if (expression.arity !== 0) {
        throw new PlanningTypeError(`fluent ${expression.name} needs ${expression.arity} arguments`);
      }
      return this.fluentExp(expression, []);
    }
    if (expression instanceof Parameter) {
      return this.paramExp(expression);
    }
    if (expression instanceof Variable) {
      return this.variableExp(expression);
    }
    return this.objectExp(expression);
  }

  autoPromote(expressions: readonly ExpressionArgument[]): FNode[] {
    const result: FNode[] = [];
    for (const entry of expressions) {
      if (isExpressionList(entry)) {
        for (const nested of entry) {
          result.push(this.promote(nested));
        }
      } else {
        result.push(this.promote(entry));
      }
    }
    return result;
  }

  trueExp(): FNode {
    return this.trueNode;
  }

  falseExp(): FNode {
    return this.falseNode;
  }

  bool(value: boolean): FNode {
    return value ? this.trueNode : this.falseNode;
  }

  int(value: number): FNode {
    if (!Number.isInteger(value)) {
      throw new PlanningTypeError(`${value} is not an integer`);
    }
    return this.create("int_constant", [], { tag: "number", value }, this.types.intType());
  }

  real(value: number): FNode {
    if (!Number.isFinite(value)) {
      throw new PlanningTypeError(`${value} is not a finite number`);
    }
    return this.create("real_constant", [], { tag: "number", value }, this.types.realType());
  }

  /** Conjunction; `and()` is `true` and a single argument is returned as-is. */
  and(...args: ExpressionArgument[]): FNode {
    const nodes = this.requireBool("and", this.autoPromote(args));
    if (nodes.length === 0) {
      return this.trueNode;
    }
    if (nodes.length === 1) {
      return nodes[0] ?? this.trueNode;
    }
    return this.create("and", nodes, { tag: "none" }, this.types.boolType());
  }

  /** Disjunction; `or()` is `false` and a single argument is returned as-is. */
  or(...args: ExpressionArgument[]): FNode {
    const nodes = this.requireBool("or", this.autoPromote(args));
    if (nodes.length === 0) {
      return this.falseNode;
    }
    if (nodes.length === 1) {
      return nodes[0] ?? this.falseNode;
    }
    return this.create("or", nodes, { tag: "none" }, this.types.boolType());
  }

  /** Negation; a double negation collapses to the inner expression. */
  not(expression: Expression): FNode {
    const [node] = this.requireBool("not", [this.promote(expression)]);
    if (node === undefined) {
      throw new PlanningTypeError("not requires one argument");
    }
    if (node.isNot()) {
      return node.arg(0);
    }
    return this.create("not", [node], { tag: "none" }, this.types.boolType());
  }

  implies(left: Expression, right: Expression): FNode {
    const nodes = this.requireBool("implies", [this.promote(left), this.promote(right)]);
    return this.create("implies", nodes, { tag: "none" }, this.types.boolType());
  }

  iff(left: Expression, right: Expression): FNode {
    const nodes = this.requireBool("iff", [this.promote(left), this.promote(right)]);
    return this.create("iff", nodes, { tag: "none" }, this.types.boolType());
  }

  exists(body: Expression, ...variables: Variable[]): FNode {
    return this.quantifier("exists", body, variables);
  }

  forall(body: Expression, ...variables: Variable[]): FNode {
    return this.quantifier("forall", body, variables);
  }

  equals(left: Expression, right: Expression): FNode {
    const l = this.promote(left);
    const r = this.promote(right);
    const comparable =
      (isNumericType(l.type) && isNumericType(r.type)) ||
      (l.type.kind === "bool" && r.type.kind === "bool") ||
      (l.type.kind === "user" &&
        r.type.kind === "user" &&
        (isCompatibleType(l.type, r.type) || isCompatibleType(r.type, l.type)));
    if (!comparable) {
      throw new PlanningTypeError(`cannot compare ${l.toString()} with ${r.toString()}`);
    }
    return this.create("equals", [l, r], { tag: "none" }, this.types.boolType());
  }

  le(left: Expression, right: Expression): FNode {
    const nodes = this.requireNumeric("le", [this.promote(left), this.promote(right)]);
    return this.create("le", nodes, { tag: "none" }, this.types.boolType());
  }

  lt(left: Expression, right: Expression): FNode {
    const nodes = this.requireNumeric("lt", [this.promote(left), this.promote(right)]);
    return this.create("lt", nodes, { tag: "none" }, this.types.boolType());
  }

  /** `left >= right`, expressed as `right <= left`. */
  ge(left: Expression, right: Expression): FNode {
    return this.le(right, left);
  }

  /** `left > right`, expressed as `right < left`. */
  gt(left: Expression, right: Expression): FNode {
    return this.lt(right, left);
  }

  plus(...args: ExpressionArgument[]): FNode {
    const nodes = this.requireNumeric("plus", this.autoPromote(args));
    if (nodes.length === 0) {
      return this.int(0);
    }
    if (nodes.length === 1) {
      return nodes[0] ?? this.int(0);
    }
    return this.create("plus", nodes, { tag: "none" }, this.arithmeticType(nodes));
  }

  minus(left: Expression, right: Expression): FNode {
    const nodes = this.requireNumeric("minus", [this.promote(left), this.promote(right)]);
    return this.create("minus", nodes, { tag: "none" }, this.arithmeticType(nodes));
  }

  times(...args: ExpressionArgument[]): FNode {
    const nodes = this.requireNumeric("times", this.autoPromote(args));
    if (nodes.length === 0) {
      return this.int(1);
    }
    if (nodes.length === 1) {
      return nodes[0] ?? this.int(1);
    }
    return this.create("times", nodes, { tag: "none" }, this.arithmeticType(nodes));
  }

  div(left: Expression, right: Expression): FNode {
    const nodes = this.requireNumeric("div", [this.promote(left), this.promote(right)]);
    return this.create("div", nodes, { tag: "none" }, this.types.realType());
  }

  fluentExp(fluent: Fluent, args: readonly Expression[] = []): FNode {
    const nodes = this.checkSignature(fluent.name, fluent.signature, args);
    return this.create("fluent_exp", nodes, { tag: "fluent", fluent }, fluent.type);
  }

  interpretedFunctionExp(fn: InterpretedFunction, args: readonly Expression[] = []): FNode {
    const nodes = this.checkSignature(fn.name, fn.signature, args);
    return this.create("interpreted_function_exp", nodes, { tag: "interpreted_function", fn }, fn.returnType);
  }

  paramExp(parameter: Parameter): FNode {
    return this.create("param_exp", [], { tag: "parameter", parameter }, parameter.type);
  }

  variableExp(variable: Variable): FNode {
    return this.create("variable_exp", [], { tag: "variable", variable }, variable.type);
  }

  objectExp(object: PlanObject): FNode {
    return this.create("object_exp", [], { tag: "object", object }, object.type);
  }

  /** Reference to a fluent of another agent, e.g. `robot1.at(l1)`. */
  dot(agent: Agent, fluentExpression: Expression): FNode {
    const inner = this.promote(fluentExpression);
    if (!inner.isFluentExp()) {
      throw new PlanningTypeError(`dot expects a fluent expression, got ${inner.toString()}`);
    }
    return this.create("dot", [inner], { tag: "agent", agent }, inner.type);
  }

  always(expression: Expression): FNode {
    return this.trajectory("always", [expression]);
  }

  sometime(expression: Expression): FNode {
    return this.trajectory("sometime", [expression]);
  }

  sometimeBefore(phi: Expression, psi: Expression): FNode {
    return this.trajectory("sometime_before", [phi, psi]);
  }

  sometimeAfter(phi: Expression, psi: Expression): FNode {
    return this.trajectory("sometime_after", [phi, psi]);
  }

  atMostOnce(expression: Expression): FNode {
    return this.trajectory("at_most_once", [expression]);
  }

  /**
   * Rebuilds {@link node} with new arguments, keeping its operator and
   * payload. Walkers use it to reconstruct nodes whose children changed.
   */
  rebuild(node: FNode, args: readonly FNode[]): FNode {
    if (args.length === node.args.length && args.every((arg, index) => arg === node.args[index])) {
      return node;
    }
    switch (node.kind) {
      case "and":
        return this.and(args);
      case "or":
        return this.or(args);
      case "not":
        return this.not(this.single(node, args));
      case "implies":
        return this.implies(this.at(node, args, 0), this.at(node, args, 1));
      case "iff":
        return this.iff(this.at(node, args, 0), this.at(node, args, 1));
      case "exists":
        return this.exists(this.single(node, args), ...node.variables());
      case "forall":
        return this.forall(this.single(node, args), ...node.variables());
      case "equals":
        return this.equals(this.at(node, args, 0), this.at(node, args, 1));
      case "le":
        return this.le(this.at(node, args, 0), this.at(node, args, 1));
      case "lt":
        return this.lt(this.at(node, args, 0), this.at(node, args, 1));
      case "plus":
        return this.plus(args);
      case "minus":
        return this.minus(this.at(node, args, 0), this.at(node, args, 1));
      case "times":
        return this.times(args);
      case "div":
        return this.div(this.at(node, args, 0), this.at(node, args, 1));
      case "fluent_exp":
        return this.fluentExp(node.fluent(), args);
      case "interpreted_function_exp":
        return this.interpretedFunctionExp(node.interpretedFunction(), args);
      case "dot":
        return this.dot(node.agent(), this.single(node, args));
      case "always":
      case "sometime":
      case "at_most_once":
      case "sometime_before":
      case "sometime_after":
        return this.trajectory(node.kind, args);
      case "param_exp":
      case "variable_exp":
      case "object_exp":
      case "bool_constant":
      case "int_constant":
      case "real_constant":
        return node;
    }
  }

  private at(node: FNode, args: readonly FNode[], index: number): FNode {
    const value = args[index];
    if (value === undefined) {
      throw new PlanningTypeError(`cannot rebuild ${node.toString()}: missing argument ${index}`);
    }
    return value;
  }

  private single(node: FNode, args: readonly FNode[]): FNode {
    return this.at(node, args, 0);
  }

  private quantifier(kind: "exists" | "forall", body: Expression, variables: Variable[]): FNode {
    if (variables.length === 0) {
      throw new PlanningTypeError(`${kind} requires at least one variable`);
    }
    const nodes = this.requireBool(kind, [this.promote(body)]);
    return this.create(kind, nodes, { tag: "variables", variables: [...variables] }, this.types.boolType());
  }

  private trajectory(kind: OperatorKind, args: readonly Expression[]): FNode {
    const nodes = this.requireBool(kind, args.map((arg) => this.promote(arg)));
    const expected = kind === "sometime_before" || kind === "sometime_after" ? 2 : 1;
    if (nodes.length !== expected) {
      throw new PlanningTypeError(`${kind} takes ${expected} argument(s), got ${nodes.length}`);
    }
    return this.create(kind, nodes, { tag: "none" }, this.types.boolType());
  }

  private checkSignature(
    name: string,
    signature: readonly Parameter[],
    args: readonly Expression[],
  ): FNode[] {
    if (signature.length !== args.length) {
      throw new PlanningTypeError(`${name} expects ${signature.length} arguments, got ${args.length}`);
    }
    return args.map((arg, index) => {
      const node = this.promote(arg);
      const expected = signature[index];
      if (expected && !isCompatibleType(expected.type, node.type)) {
        throw new PlanningTypeError(
          `argument ${index} of ${name} is ${node.toString()}, which is not compatible with parameter ${expected.name}`,
        );
      }
      return node;
    });
  }

  private requireBool(operator: string, nodes: FNode[]): FNode[] {
    for (const node of nodes) {
      if (node.type.kind !== "bool") {
        throw new PlanningTypeError(`${operator} expects boolean operands, got ${node.toString()}`);
      }
    }
    return nodes;
  }

  private requireNumeric(operator: string, nodes: FNode[]): FNode[] {
    for (const node of nodes) {
      if (!isNumericType(node.type)) {
        throw new PlanningTypeError(`${operator} expects numeric operands, got ${node.toString()}`);
      }
    }
    return nodes;
  }

  private arithmeticType(nodes: readonly FNode[]): PlanningType {
    return nodes.some((node) => node.type.kind === "real") ? this.types.realType() : this.types.intType();
  }

  private identityOf(value: object): number {
    const known = this.identities.get(value);
    if (known !== undefined) {
      return known;
    }
    const created = this.nextIdentity;
    this.nextIdentity += 1;
    this.identities.set(value, created);
    return created;
  }

  private payloadKey(payload: FNodePayload): string {
    switch (payload.tag) {
      case "none":
        return "-";
      case "bool":
        return payload.value ? "T" : "F";
      case "number":
        return `n${payload.value}`;
      case "fluent":
        return `f${this.identityOf(payload.fluent)}`;
      case "parameter":
        return `p${this.identityOf(payload.parameter)}`;
      case "variable":
        return `v${this.identityOf(payload.variable)}`;
      case "object":
        return `o${this.identityOf(payload.object)}`;
      case "variables":
        return `q${payload.variables.map((v) => this.identityOf(v)).join(",")}`;
      case "interpreted_function":
        return `i${this.identityOf(payload.fn)}`;
      case "agent":
        // Agents are identified by name so that clones of a problem share dot nodes.
        return `a:${payload.agent.name}`;
    }
  }

  private create(
    kind: OperatorKind,
    args: readonly FNode[],
    payload: FNodePayload,
    type: PlanningType,
  ): FNode {
    const key = `${kind}|${this.payloadKey(payload)}|${args.map((arg) => arg.id).join(",")}`;
    const cached = this.table.get(key);
    if (cached) {
      return cached;
    }
    const node = new FNode(this.nextNodeId, kind, [...args], payload, type);
    this.nextNodeId += 1;
    this.table.set(key, node);
    return node;
  }
}
