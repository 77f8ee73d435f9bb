import { PlanningTypeError } from "../errors.js";

export interface BoolType {
  readonly kind: "bool";
}

export interface IntType {
  readonly kind: "int";
  readonly lowerBound: number | null;
  readonly upperBound: number | null;
}

export interface RealType {
  readonly kind: "real";
  readonly lowerBound: number | null;
  readonly upperBound: number | null;
}

export interface UserType {
  readonly kind: "user";
  readonly name: string;
  readonly father: UserType | null;
}

/** Every value type an expression, fluent or parameter can have. */
export type PlanningType = BoolType | IntType | RealType | UserType;

export type NumericType = IntType | RealType;

/**
 * Interns types so that two structurally identical types are the same object
 * and can be compared with `===`.
 */
export class TypeManager {
  private readonly table = new Map<string, PlanningType>();
  private readonly boolInstance: BoolType = { kind: "bool" };

  boolType(): BoolType {
    return this.boolInstance;
  }

  intType(lowerBound: number | null = null, upperBound: number | null = null): IntType {
    if (lowerBound !== null && !Number.isInteger(lowerBound)) {
      throw new PlanningTypeError(`integer lower bound must be an integer, got ${lowerBound}`);
    }
    if (upperBound !== null && !Number.isInteger(upperBound)) {
      throw new PlanningTypeError(`integer upper bound must be an integer, got ${upperBound}`);
    }
    const key = `int:${lowerBound ?? "-inf"}:${upperBound ?? "+inf"}`;
    const cached = this.table.get(key);
    if (cached?.kind === "int") {
      return cached;
    }
    const created: IntType = { kind: "int", lowerBound, upperBound };
    this.table.set(key, created);
    return created;
  }

  realType(lowerBound: number | null = null, upperBound: number | null = null): RealType {
    const key = `real:${lowerBound ?? "-inf"}:${upperBound ?? "+inf"}`;
    const cached = this.table.get(key);
    if (cached?.kind === "real") {
      return cached;
    }
    const created: RealType = { kind: "real", lowerBound, upperBound };
    this.table.set(key, created);
    return created;
  }

  /** Declares (or retrieves, when {@link father} is omitted) a user type. */
  userType(name: string, father?: UserType | null): UserType {
    const key = `user:${name}`;
    const cached = this.table.get(key);
    if (cached?.kind === "user") {
      if (father !== undefined && cached.father !== father) {
        throw new PlanningTypeError(`user type ${name} already declared with a different father`, {
          type: name,
        });
      }
      return cached;
    }
    const created: UserType = { kind: "user", name, father: father ?? null };
    this.table.set(key, created);
    return created;
  }
}

export function isNumericType(type: PlanningType): type is NumericType {
  return type.kind === "int" || type.kind === "real";
}

/** Returns `true` when {@link type} is {@link ancestor} or one of its descendants. */
export function isSubtypeOf(type: UserType, ancestor: UserType): boolean {
  let current: UserType | null = type;
  while (current) {
    if (current === ancestor) {
      return true;
    }
    current = current.father;
  }
  return false;
}

/**
 * Whether a value of type {@link source} can be stored where {@link target} is
 * expected. Bounds are not checked: bounded numbers are validated by the
 * problem when values are assigned.
 */
export function isCompatibleType(target: PlanningType, source: PlanningType): boolean {
  if (target === source) {
    return true;
  }
  switch (target.kind) {
    case "bool":
      return source.kind === "bool";
    case "int":
      return source.kind === "int";
    case "real":
      return source.kind === "int" || source.kind === "real";
    case "user":
      return source.kind === "user" && isSubtypeOf(source, target);
  }
}

/** Whether the numeric type declares at least one bound. */
export function isBoundedNumeric(type: NumericType): boolean {
  return type.lowerBound !== null || type.upperBound !== null;
}

export function typeToString(type: PlanningType): string {
  switch (type.kind) {
    case "bool":
      return "bool";
    case "int":
    case "real":
      if (type.lowerBound === null && type.upperBound === null) {
        return type.kind;
      }
      return `${type.kind}[${type.lowerBound ?? "-inf"}, ${type.upperBound ?? "inf"}]`;
    case "user":
      return type.father ? `${type.name} - ${type.father.name}` : type.name;
  }
}
