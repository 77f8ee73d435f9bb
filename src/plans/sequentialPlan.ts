import type { ActionInstance, MapBackActionInstance } from "./actionInstance.js";

/** Totally ordered list of action instances. */
export class SequentialPlan {
  public readonly actions: readonly ActionInstance[];

  constructor(actions: readonly ActionInstance[]) {
    this.actions = [...actions];
  }

  /** Applies {@link mapBack} to every step, dropping the steps it maps to `null`. */
  replaceActionInstances(mapBack: MapBackActionInstance): SequentialPlan {
    const replaced: ActionInstance[] = [];
    for (const instance of this.actions) {
      const mapped = mapBack(instance);
      if (mapped) {
        replaced.push(mapped);
      }
    }
    return new SequentialPlan(replaced);
  }

  toString(): string {
    return ["SequentialPlan:", ...this.actions.map((instance) => `    ${instance.toString()}`)].join("\n");
  }
}
