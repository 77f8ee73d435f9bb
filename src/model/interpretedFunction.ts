import type { Environment } from "./environment.js";
import type { Expression } from "./expression.js";
import type { FNode } from "./fnode.js";
import type { Parameter } from "./parameter.js";
import type { PlanningType } from "./types.js";

/** Implementation backing an interpreted function; receives constant arguments. */
export type InterpretedFunctionImplementation = (...args: FNode[]) => FNode;

/**
 * Black-box function whose value is only known by calling
 * {@link InterpretedFunction.implementation}. Planners cannot reason about it,
 * which is why the interpreted-functions remover exists.
 */
export class InterpretedFunction {
  public readonly signature: readonly Parameter[];

  constructor(
    public readonly name: string,
    public readonly returnType: PlanningType,
    signature: readonly Parameter[],
    public readonly environment: Environment,
    public readonly implementation: InterpretedFunctionImplementation | null = null,
  ) {
    this.signature = [...signature];
  }

  apply(...args: Expression[]): FNode {
    return this.environment.expressions.interpretedFunctionExp(this, args);
  }

  toString(): string {
    return this.name;
  }
}
