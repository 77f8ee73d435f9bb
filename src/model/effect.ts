import { PlanningTypeError, UsageError } from "../errors.js";
import type { Environment } from "./environment.js";
import type { Expression } from "./expression.js";
import type { FNode } from "./fnode.js";
import { isCompatibleType, isNumericType } from "./types.js";
import type { Variable } from "./variable.js";

export type EffectKind = "assign" | "increase" | "decrease";

/**
 * Immutable effect `if condition then fluent (:=|+=|-=) value`, optionally
 * quantified over {@link Effect.forall} variables.
 */
export class Effect {
  public readonly forall: readonly Variable[];

  constructor(
    public readonly fluent: FNode,
    public readonly value: FNode,
    public readonly condition: FNode,
    public readonly kind: EffectKind = "assign",
    forall: readonly Variable[] = [],
  ) {
    this.forall = [...forall];
  }

  isConditional(): boolean {
    return !this.condition.isTrue();
  }

  isForall(): boolean {
    return this.forall.length > 0;
  }

  isAssignment(): boolean {
    return this.kind === "assign";
  }

  isIncrease(): boolean {
    return this.kind === "increase";
  }

  isDecrease(): boolean {
    return this.kind === "decrease";
  }

  equals(other: Effect): boolean {
    return (
      this.fluent === other.fluent &&
      this.value === other.value &&
      this.condition === other.condition &&
      this.kind === other.kind &&
      this.forall.length === other.forall.length &&
      this.forall.every((variable, index) => variable === other.forall[index])
    );
  }

  with(changes: Partial<Pick<Effect, "fluent" | "value" | "condition" | "kind" | "forall">>): Effect {
    return new Effect(
      changes.fluent ?? this.fluent,
      changes.value ?? this.value,
      changes.condition ?? this.condition,
      changes.kind ?? this.kind,
      changes.forall ?? this.forall,
    );
  }

  toString(): string {
    const operator = this.kind === "assign" ? ":=" : this.kind === "increase" ? "+=" : "-=";
    let text = `${this.fluent.toString()} ${operator} ${this.value.toString()}`;
    if (this.isConditional()) {
      text = `if ${this.condition.toString()} then ${text}`;
    }
    if (this.isForall()) {
      text = `forall ${this.forall.map((v) => v.name).join(", ")} ${text}`;
    }
    return text;
  }
}

/** Promotes and type-checks the operands of an effect before building it. */
export function createEffect(
  environment: Environment,
  fluent: Expression,
  value: Expression,
  condition: Expression = true,
  kind: EffectKind = "assign",
  forall: readonly Variable[] = [],
): Effect {
  const expressions = environment.expressions;
  const fluentNode = expressions.promote(fluent);
  const valueNode = expressions.promote(value);
  const conditionNode = expressions.promote(condition);
  if (!fluentNode.isFluentExp() && !fluentNode.isDot()) {
    throw new UsageError(`effect target ${fluentNode.toString()} must be a fluent expression`);
  }
  if (conditionNode.type.kind !== "bool") {
    throw new PlanningTypeError(`effect condition ${conditionNode.toString()} is not boolean`);
  }
  if (!isCompatibleType(fluentNode.type, valueNode.type)) {
    throw new PlanningTypeError(
      `effect value ${valueNode.toString()} is not compatible with fluent ${fluentNode.toString()}`,
    );
  }
  if (kind !== "assign" && !isNumericType(fluentNode.type)) {
    throw new PlanningTypeError(`${kind} effect on non-numeric fluent ${fluentNode.toString()}`);
  }
  return new Effect(fluentNode, valueNode, conditionNode, kind, forall);
}

export type EffectConflictReason = "conflicting_assignment" | "mixed_assignment_and_update";

export interface EffectConflict {
  readonly reason: EffectConflictReason;
  readonly effect: Effect;
  readonly existing: Effect;
}

export type EffectInsertion =
  | { readonly ok: true; readonly effects: readonly Effect[]; readonly duplicate: boolean }
  | { readonly ok: false; readonly conflict: EffectConflict };

/**
 * Pure insertion of {@link effect} into {@link effects}.
 *
 * Two effects on the same fluent application interfere when at least one is
 * unconditional or both share the same condition. Interfering assignments
 * conflict unless identical (the duplicate is then skipped); an assignment
 * interfering with an increase/decrease conflicts. Increases and decreases
 * accumulate.
 */
export function tryAddEffect(effects: readonly Effect[], effect: Effect): EffectInsertion {
  for (const existing of effects) {
    if (existing.equals(effect) && effect.isAssignment()) {
      return { ok: true, effects, duplicate: true };
    }
    if (existing.fluent !== effect.fluent) {
      continue;
    }
    const interfering =
      !existing.isConditional() || !effect.isConditional() || existing.condition === effect.condition;
    if (!interfering) {
      continue;
    }
    if (existing.isAssignment() && effect.isAssignment()) {
      return { ok: false, conflict: { reason: "conflicting_assignment", effect, existing } };
    }
    if (existing.isAssignment() || effect.isAssignment()) {
      return { ok: false, conflict: { reason: "mixed_assignment_and_update", effect, existing } };
    }
  }
  return { ok: true, effects: [...effects, effect], duplicate: false };
}

export function describeConflict(conflict: EffectConflict): string {
  return `Effect: ${conflict.effect.toString()} and effect: ${conflict.existing.toString()}, already in the action, are in conflict.`;
}
