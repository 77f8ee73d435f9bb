/** Tag of every expression node. */
export type OperatorKind =
  | "and"
  | "or"
  | "not"
  | "implies"
  | "iff"
  | "exists"
  | "forall"
  | "fluent_exp"
  | "param_exp"
  | "variable_exp"
  | "object_exp"
  | "bool_constant"
  | "int_constant"
  | "real_constant"
  | "plus"
  | "minus"
  | "times"
  | "div"
  | "le"
  | "lt"
  | "equals"
  | "dot"
  | "interpreted_function_exp"
  | "always"
  | "sometime"
  | "sometime_before"
  | "sometime_after"
  | "at_most_once";

export const BOOL_OPERATORS: ReadonlySet<OperatorKind> = new Set<OperatorKind>([
  "and",
  "or",
  "not",
  "implies",
  "iff",
  "exists",
  "forall",
]);

export const RELATIONS: ReadonlySet<OperatorKind> = new Set<OperatorKind>(["le", "lt", "equals"]);

export const ARITHMETIC_OPERATORS: ReadonlySet<OperatorKind> = new Set<OperatorKind>([
  "plus",
  "minus",
  "times",
  "div",
]);

export const CONSTANTS: ReadonlySet<OperatorKind> = new Set<OperatorKind>([
  "bool_constant",
  "int_constant",
  "real_constant",
  "object_exp",
]);

export const TRAJECTORY_CONSTRAINTS: ReadonlySet<OperatorKind> = new Set<OperatorKind>([
  "always",
  "sometime",
  "sometime_before",
  "sometime_after",
  "at_most_once",
]);
