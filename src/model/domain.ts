import { ProblemDefinitionError } from "../errors.js";
import type { Environment } from "./environment.js";
import type { FNode } from "./fnode.js";
import type { PlanObject } from "./object.js";
import type { PlanningType, UserType } from "./types.js";

/** What domain enumeration needs from a problem. */
export interface ObjectSource {
  readonly environment: Environment;
  objects(type: UserType): readonly PlanObject[];
}

/**
 * Number of values of {@link type}: two for booleans, `ub - lb + 1` for a
 * bounded integer and the object count (subtypes included) for a user type.
 */
export function domainSize(problem: ObjectSource, type: PlanningType): number {
  switch (type.kind) {
    case "bool":
      return 2;
    case "int":
      if (type.lowerBound === null || type.upperBound === null) {
        throw new ProblemDefinitionError("Parameter not groundable!", { type: "int" });
      }
      return Math.max(0, type.upperBound - type.lowerBound + 1);
    case "user":
      return problem.objects(type).length;
    case "real":
      throw new ProblemDefinitionError("Parameter not groundable!", { type: "real" });
  }
}

/** The value of {@link type} at position {@link index}, as a constant expression. */
export function domainItem(problem: ObjectSource, type: PlanningType, index: number): FNode {
  const em = problem.environment.expressions;
  switch (type.kind) {
    case "bool":
      return em.bool(index !== 0);
    case "int":
      if (type.lowerBound === null || type.upperBound === null) {
        throw new ProblemDefinitionError("Parameter not groundable!", { type: "int" });
      }
      return em.int(type.lowerBound + index);
    case "user": {
      const object = problem.objects(type)[index];
      if (!object) {
        throw new ProblemDefinitionError(`type ${type.name} has no object at index ${index}`);
      }
      return em.objectExp(object);
    }
    case "real":
      throw new ProblemDefinitionError("Parameter not groundable!", { type: "real" });
  }
}

/** Every value of {@link type}. */
export function domainItems(problem: ObjectSource, type: PlanningType): FNode[] {
  const size = domainSize(problem, type);
  const items: FNode[] = [];
  for (let index = 0; index < size; index += 1) {
    items.push(domainItem(problem, type, index));
  }
  return items;
}

function* productFrom<T>(lists: readonly (readonly T[])[], position: number, prefix: readonly T[]): Generator<T[]> {
  const list = lists[position];
  if (!list) {
    yield [...prefix];
    return;
  }
  for (const item of list) {
    yield* productFrom(lists, position + 1, [...prefix, item]);
  }
}

/** Cartesian product of the given lists, the last list varying fastest. Tuples are produced lazily. */
export function* cartesianProduct<T>(lists: readonly (readonly T[])[]): Generator<T[]> {
  yield* productFrom(lists, 0, []);
}
