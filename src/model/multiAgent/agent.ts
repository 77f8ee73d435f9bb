import { ProblemDefinitionError, UsageError } from "../../errors.js";
import type { Action } from "../action.js";
import type { Environment } from "../environment.js";
import type { Fluent } from "../fluent.js";

/** Agent of a {@link MultiAgentProblem}: its private fluents and the actions it can perform. */
export class Agent {
  private fluentList: Fluent[] = [];
  private actionList: Action[] = [];

  constructor(
    public readonly name: string,
    public readonly environment: Environment,
  ) {}

  get fluents(): readonly Fluent[] {
    return this.fluentList;
  }

  get actions(): readonly Action[] {
    return this.actionList;
  }

  get conditionalActions(): readonly Action[] {
    return this.actionList.filter((action) => action.isConditional());
  }

  get unconditionalActions(): readonly Action[] {
    return this.actionList.filter((action) => !action.isConditional());
  }

  hasName(name: string): boolean {
    return (
      this.fluentList.some((fluent) => fluent.name === name) || this.actionList.some((action) => action.name === name)
    );
  }

  addFluent(fluent: Fluent): Fluent {
    if (this.hasName(fluent.name)) {
      throw new ProblemDefinitionError(`Name ${fluent.name} already defined in agent ${this.name}`);
    }
    this.fluentList.push(fluent);
    return fluent;
  }

  fluent(name: string): Fluent {
    const found = this.fluentList.find((fluent) => fluent.name === name);
    if (!found) {
      throw new UsageError(`agent ${this.name} has no fluent ${name}`);
    }
    return found;
  }

  addAction(action: Action): Action {
    if (this.hasName(action.name)) {
      throw new ProblemDefinitionError(`Name ${action.name} already defined in agent ${this.name}`);
    }
    this.actionList.push(action);
    return action;
  }

  action(name: string): Action {
    const found = this.actionList.find((action) => action.name === name);
    if (!found) {
      throw new UsageError(`agent ${this.name} has no action ${name}`);
    }
    return found;
  }

  hasAction(name: string): boolean {
    return this.actionList.some((action) => action.name === name);
  }

  clearActions(): void {
    this.actionList = [];
  }

  clone(): Agent {
    const copy = new Agent(this.name, this.environment);
    copy.fluentList = [...this.fluentList];
    copy.actionList = this.actionList.map((action) => action.clone());
    return copy;
  }

  toString(): string {
    return `Agent name = ${this.name}`;
  }
}
