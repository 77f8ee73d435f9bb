/**
 * Catalogue of the modelling features a problem can use, grouped by category.
 * A {@link ProblemKind} is a subset of these features.
 */
export const PROBLEM_KIND_FEATURES = {
  PROBLEM_CLASS: ["ACTION_BASED", "ACTION_BASED_MULTI_AGENT"],
  TIME: [
    "CONTINUOUS_TIME",
    "INTERMEDIATE_CONDITIONS_AND_EFFECTS",
    "TIMED_EFFECTS",
    "TIMED_GOALS",
    "DURATION_INEQUALITIES",
  ],
  EXPRESSION_DURATION: [
    "STATIC_FLUENTS_IN_DURATIONS",
    "FLUENTS_IN_DURATIONS",
    "INTERPRETED_FUNCTIONS_IN_DURATIONS",
  ],
  NUMBERS: ["CONTINUOUS_NUMBERS", "DISCRETE_NUMBERS", "BOUNDED_TYPES"],
  CONDITIONS_KIND: [
    "NEGATIVE_CONDITIONS",
    "DISJUNCTIVE_CONDITIONS",
    "EQUALITIES",
    "EXISTENTIAL_CONDITIONS",
    "UNIVERSAL_CONDITIONS",
    "INTERPRETED_FUNCTIONS_IN_CONDITIONS",
  ],
  EFFECTS_KIND: [
    "CONDITIONAL_EFFECTS",
    "INCREASE_EFFECTS",
    "DECREASE_EFFECTS",
    "FLUENTS_IN_BOOLEAN_ASSIGNMENTS",
    "FLUENTS_IN_NUMERIC_ASSIGNMENTS",
    "FLUENTS_IN_OBJECT_ASSIGNMENTS",
    "FORALL_EFFECTS",
    "INTERPRETED_FUNCTIONS_IN_EFFECTS",
  ],
  TYPING: ["FLAT_TYPING", "HIERARCHICAL_TYPING"],
  FLUENTS_TYPE: ["NUMERIC_FLUENTS", "OBJECT_FLUENTS"],
  QUALITY_METRICS: [
    "ACTIONS_COST",
    "PLAN_LENGTH",
    "OVERSUBSCRIPTION",
    "TEMPORAL_OVERSUBSCRIPTION",
    "MAKESPAN",
    "FINAL_VALUE",
  ],
  ACTIONS_COST_KIND: ["STATIC_FLUENTS_IN_ACTIONS_COST", "FLUENTS_IN_ACTIONS_COST"],
  CONSTRAINTS_KIND: ["STATE_INVARIANTS", "TRAJECTORY_CONSTRAINTS"],
} as const;

export type ProblemKindCategory = keyof typeof PROBLEM_KIND_FEATURES;

export type ProblemKindFeature = (typeof PROBLEM_KIND_FEATURES)[ProblemKindCategory][number];

const CATEGORIES: readonly ProblemKindCategory[] = [
  "PROBLEM_CLASS",
  "TIME",
  "EXPRESSION_DURATION",
  "NUMBERS",
  "CONDITIONS_KIND",
  "EFFECTS_KIND",
  "TYPING",
  "FLUENTS_TYPE",
  "QUALITY_METRICS",
  "ACTIONS_COST_KIND",
  "CONSTRAINTS_KIND",
];

function featuresOf(category: ProblemKindCategory): readonly ProblemKindFeature[] {
  return PROBLEM_KIND_FEATURES[category];
}

const CATEGORY_BY_FEATURE = new Map<ProblemKindFeature, ProblemKindCategory>();
for (const category of CATEGORIES) {
  for (const feature of featuresOf(category)) {
    CATEGORY_BY_FEATURE.set(feature, category);
  }
}

/** Ordering of the catalogue, used to print kinds deterministically. */
const FEATURE_ORDER: readonly ProblemKindFeature[] = [...CATEGORY_BY_FEATURE.keys()];

export class ProblemKind {
  private readonly featureSet: Set<ProblemKindFeature>;

  constructor(features: Iterable<ProblemKindFeature> = []) {
    this.featureSet = new Set(features);
  }

  get features(): ReadonlySet<ProblemKindFeature> {
    return this.featureSet;
  }

  has(feature: ProblemKindFeature): boolean {
    return this.featureSet.has(feature);
  }

  /** Whether any feature of {@link category} is set. */
  hasAny(category: ProblemKindCategory): boolean {
    return featuresOf(category).some((feature) => this.featureSet.has(feature));
  }

  set(...features: ProblemKindFeature[]): this {
    for (const feature of features) {
      this.featureSet.add(feature);
    }
    return this;
  }

  unset(...features: ProblemKindFeature[]): this {
    for (const feature of features) {
      this.featureSet.delete(feature);
    }
    return this;
  }

  /** Partial order by feature inclusion: `this <= other`. */
  isSubsetOf(other: ProblemKind): boolean {
    for (const feature of this.featureSet) {
      if (!other.featureSet.has(feature)) {
        return false;
      }
    }
    return true;
  }

  equals(other: ProblemKind): boolean {
    return this.featureSet.size === other.featureSet.size && this.isSubsetOf(other);
  }

  union(other: ProblemKind): ProblemKind {
    return new ProblemKind([...this.featureSet, ...other.featureSet]);
  }

  /** Features of this kind that {@link other} lacks, in catalogue order. */
  difference(other: ProblemKind): ProblemKindFeature[] {
    return FEATURE_ORDER.filter((feature) => this.featureSet.has(feature) && !other.featureSet.has(feature));
  }

  clone(): ProblemKind {
    return new ProblemKind(this.featureSet);
  }

  toString(): string {
    const lines: string[] = [];
    for (const category of CATEGORIES) {
      const present = featuresOf(category).filter((feature) => this.featureSet.has(feature));
      if (present.length > 0) {
        lines.push(`${category}: ${present.join(", ")}`);
      }
    }
    return lines.join("\n");
  }
}

export function categoryOf(feature: ProblemKindFeature): ProblemKindCategory | undefined {
  return CATEGORY_BY_FEATURE.get(feature);
}
