import type { PlanningType } from "./types.js";

/** Typed formal parameter of an action, a fluent or an interpreted function. */
export class Parameter {
  constructor(
    public readonly name: string,
    public readonly type: PlanningType,
  ) {}

  toString(): string {
    return this.name;
  }
}
