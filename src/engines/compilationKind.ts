/** Transformations a compiler can perform. */
export const COMPILATION_KINDS = [
  "GROUNDING",
  "CONDITIONAL_EFFECTS_REMOVING",
  "DISJUNCTIVE_CONDITIONS_REMOVING",
  "NEGATIVE_CONDITIONS_REMOVING",
  "QUANTIFIERS_REMOVING",
  "TRAJECTORY_CONSTRAINTS_REMOVING",
  "USERTYPE_FLUENTS_REMOVING",
  "BOUNDED_TYPES_REMOVING",
  "STATE_INVARIANTS_REMOVING",
  "TIMED_TO_SEQUENTIAL",
  "INTERPRETED_FUNCTIONS_REMOVING",
] as const;

export type CompilationKind = (typeof COMPILATION_KINDS)[number];

export function isCompilationKind(value: string): value is CompilationKind {
  return COMPILATION_KINDS.some((kind) => kind === value);
}
