import type { PlanningType } from "./types.js";

/** Variable bound by a quantifier or by a forall effect. */
export class Variable {
  constructor(
    public readonly name: string,
    public readonly type: PlanningType,
  ) {}

  toString(): string {
    return this.name;
  }
}
