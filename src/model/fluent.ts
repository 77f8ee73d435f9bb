import type { Environment } from "./environment.js";
import type { Expression } from "./expression.js";
import type { FNode } from "./fnode.js";
import type { Parameter } from "./parameter.js";
import type { PlanningType } from "./types.js";

/**
 * State variable of a planning problem. Fluents are immutable: compilers that
 * need a variant (a negated twin, a tracking flag) create a new fluent.
 */
export class Fluent {
  public readonly signature: readonly Parameter[];

  constructor(
    public readonly name: string,
    public readonly type: PlanningType,
    signature: readonly Parameter[],
    public readonly environment: Environment,
  ) {
    this.signature = [...signature];
  }

  get arity(): number {
    return this.signature.length;
  }

  /** Builds the application of this fluent to {@link args}. */
  apply(...args: Expression[]): FNode {
    return this.environment.expressions.fluentExp(this, args);
  }

  toString(): string {
    if (this.signature.length === 0) {
      return this.name;
    }
    return `${this.name}(${this.signature.map((p) => p.name).join(", ")})`;
  }
}
