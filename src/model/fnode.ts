import { ExpressionDefinitionError } from "../errors.js";
import type { Agent } from "./multiAgent/agent.js";
import type { Fluent } from "./fluent.js";
import type { InterpretedFunction } from "./interpretedFunction.js";
import type { PlanObject } from "./object.js";
import type { OperatorKind } from "./operators.js";
import type { Parameter } from "./parameter.js";
import type { PlanningType } from "./types.js";
import type { Variable } from "./variable.js";

/** Non-expression data carried by a node, tagged by what it holds. */
export type FNodePayload =
  | { readonly tag: "none" }
  | { readonly tag: "bool"; readonly value: boolean }
  | { readonly tag: "number"; readonly value: number }
  | { readonly tag: "fluent"; readonly fluent: Fluent }
  | { readonly tag: "parameter"; readonly parameter: Parameter }
  | { readonly tag: "variable"; readonly variable: Variable }
  | { readonly tag: "object"; readonly object: PlanObject }
  | { readonly tag: "variables"; readonly variables: readonly Variable[] }
  | { readonly tag: "interpreted_function"; readonly fn: InterpretedFunction }
  | { readonly tag: "agent"; readonly agent: Agent };

const INFIX_SYMBOLS: Partial<Record<OperatorKind, string>> = {
  and: "and",
  or: "or",
  implies: "implies",
  iff: "iff",
  plus: "+",
  minus: "-",
  times: "*",
  div: "/",
  le: "<=",
  lt: "<",
  equals: "==",
};

const TRAJECTORY_NAMES: Partial<Record<OperatorKind, string>> = {
  always: "Always",
  sometime: "Sometime",
  sometime_before: "Sometime-Before",
  sometime_after: "Sometime-After",
  at_most_once: "At-Most-Once",
};

/**
 * Immutable expression node. Nodes are hash-consed by the
 * {@link ExpressionManager} that created them: two structurally equal
 * expressions built by the same manager are the same object, so `===` is
 * structural equality and nodes can key maps and sets.
 */
export class FNode {
  constructor(
    /** Creation index; stable ordering key inside one manager. */
    public readonly id: number,
    public readonly kind: OperatorKind,
    public readonly args: readonly FNode[],
    public readonly payload: FNodePayload,
    public readonly type: PlanningType,
  ) {}

  arg(index: number): FNode {
    const value = this.args[index];
    if (value === undefined) {
      throw new ExpressionDefinitionError(`expression ${this.toString()} has no argument ${index}`);
    }
    return value;
  }

  isAnd(): boolean {
    return this.kind === "and";
  }

  isOr(): boolean {
    return this.kind === "or";
  }

  isNot(): boolean {
    return this.kind === "not";
  }

  isImplies(): boolean {
    return this.kind === "implies";
  }

  isIff(): boolean {
    return this.kind === "iff";
  }

  isExists(): boolean {
    return this.kind === "exists";
  }

  isForall(): boolean {
    return this.kind === "forall";
  }

  isEquals(): boolean {
    return this.kind === "equals";
  }

  isLe(): boolean {
    return this.kind === "le";
  }

  isLt(): boolean {
    return this.kind === "lt";
  }

  isFluentExp(): boolean {
    return this.kind === "fluent_exp";
  }

  isParameterExp(): boolean {
    return this.kind === "param_exp";
  }

  isVariableExp(): boolean {
    return this.kind === "variable_exp";
  }

  isObjectExp(): boolean {
    return this.kind === "object_exp";
  }

  isDot(): boolean {
    return this.kind === "dot";
  }

  isInterpretedFunctionExp(): boolean {
    return this.kind === "interpreted_function_exp";
  }

  isBoolConstant(): boolean {
    return this.kind === "bool_constant";
  }

  isIntConstant(): boolean {
    return this.kind === "int_constant";
  }

  isRealConstant(): boolean {
    return this.kind === "real_constant";
  }

  isNumericConstant(): boolean {
    return this.kind === "int_constant" || this.kind === "real_constant";
  }

  /** Literal values: booleans, numbers and objects. */
  isConstant(): boolean {
    return this.isBoolConstant() || this.isNumericConstant() || this.isObjectExp();
  }

  isTrue(): boolean {
    return this.payload.tag === "bool" && this.payload.value;
  }

  isFalse(): boolean {
    return this.payload.tag === "bool" && !this.payload.value;
  }

  boolConstantValue(): boolean {
    if (this.payload.tag !== "bool") {
      throw new ExpressionDefinitionError(`${this.toString()} is not a boolean constant`);
    }
    return this.payload.value;
  }

  numericConstantValue(): number {
    if (this.payload.tag !== "number") {
      throw new ExpressionDefinitionError(`${this.toString()} is not a numeric constant`);
    }
    return this.payload.value;
  }

  fluent(): Fluent {
    if (this.payload.tag !== "fluent") {
      throw new ExpressionDefinitionError(`${this.toString()} is not a fluent expression`);
    }
    return this.payload.fluent;
  }

  parameter(): Parameter {
    if (this.payload.tag !== "parameter") {
      throw new ExpressionDefinitionError(`${this.toString()} is not a parameter expression`);
    }
    return this.payload.parameter;
  }

  variable(): Variable {
    if (this.payload.tag !== "variable") {
      throw new ExpressionDefinitionError(`${this.toString()} is not a variable expression`);
    }
    return this.payload.variable;
  }

  object(): PlanObject {
    if (this.payload.tag !== "object") {
      throw new ExpressionDefinitionError(`${this.toString()} is not an object expression`);
    }
    return this.payload.object;
  }

  /** Variables bound by an `exists`/`forall` node. */
  variables(): readonly Variable[] {
    if (this.payload.tag !== "variables") {
      throw new ExpressionDefinitionError(`${this.toString()} is not a quantifier`);
    }
    return this.payload.variables;
  }

  interpretedFunction(): InterpretedFunction {
    if (this.payload.tag !== "interpreted_function") {
      throw new ExpressionDefinitionError(`${this.toString()} is not an interpreted function application`);
    }
    return this.payload.fn;
  }

  agent(): Agent {
    if (this.payload.tag !== "agent") {
      throw new ExpressionDefinitionError(`${this.toString()} is not a dot expression`);
    }
    return this.payload.agent;
  }

  toString(): string {
    const payload = this.payload;
    switch (payload.tag) {
      case "bool":
        return payload.value ? "true" : "false";
      case "number":
        return String(payload.value);
      case "fluent":
        return this.args.length === 0
          ? payload.fluent.name
          : `${payload.fluent.name}(${this.args.map((a) => a.toString()).join(", ")})`;
      case "parameter":
        return payload.parameter.name;
      case "variable":
        return payload.variable.name;
      case "object":
        return payload.object.name;
      case "variables": {
        const quantifier = this.kind === "exists" ? "Exists" : "Forall";
        const bound = payload.variables.map((v) => `${v.type.kind === "user" ? v.type.name : v.type.kind} ${v.name}`);
        return `${quantifier} (${bound.join(", ")}) ${this.arg(0).toString()}`;
      }
      case "interpreted_function":
        return `${payload.fn.name}(${this.args.map((a) => a.toString()).join(", ")})`;
      case "agent":
        return `${payload.agent.name}.${this.arg(0).toString()}`;
      case "none":
        break;
    }
    if (this.kind === "not") {
      return `(not ${this.arg(0).toString()})`;
    }
    const trajectory = TRAJECTORY_NAMES[this.kind];
    if (trajectory) {
      return `${trajectory}(${this.args.map((a) => a.toString()).join(", ")})`;
    }
    const symbol = INFIX_SYMBOLS[this.kind] ?? this.kind;
    return `(${this.args.map((a) => a.toString()).join(` ${symbol} `)})`;
  }
}
