import type { UserType } from "./types.js";

/** Named object of a user type. */
export class PlanObject {
  constructor(
    public readonly name: string,
    public readonly type: UserType,
  ) {}

  toString(): string {
    return this.name;
  }
}
