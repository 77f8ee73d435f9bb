import { UsageError } from "../errors.js";
import type { Action } from "../model/action.js";
import type { Expression } from "../model/expression.js";
import type { FNode } from "../model/fnode.js";
import type { Agent } from "../model/multiAgent/agent.js";

/** Occurrence of an action in a plan, with ground actual parameters. */
export class ActionInstance {
  public readonly actualParameters: readonly FNode[];

  constructor(
    public readonly action: Action,
    actualParameters: readonly Expression[] = [],
    public readonly agent: Agent | null = null,
  ) {
    if (actualParameters.length !== action.parameters.length) {
      throw new UsageError(
        `action ${action.name} expects ${action.parameters.length} parameters, got ${actualParameters.length}`,
      );
    }
    const em = action.environment.expressions;
    this.actualParameters = actualParameters.map((parameter) => em.promote(parameter));
  }

  /** Whether both instances apply the same action object to the same parameters. */
  isSemanticallyEquivalent(other: ActionInstance): boolean {
    return (
      this.action === other.action &&
      this.agent?.name === other.agent?.name &&
      this.actualParameters.every((parameter, index) => parameter === other.actualParameters[index])
    );
  }

  toString(): string {
    const prefix = this.agent ? `${this.agent.name}.` : "";
    if (this.actualParameters.length === 0) {
      return `${prefix}${this.action.name}`;
    }
    return `${prefix}${this.action.name}(${this.actualParameters.map((p) => p.toString()).join(", ")})`;
  }
}

/** Translates an action instance of a compiled problem back to its source problem. */
export type MapBackActionInstance = (instance: ActionInstance) => ActionInstance | null;
