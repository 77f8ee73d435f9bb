import { ConflictingEffectsError, PlanningTypeError, UsageError } from "../errors.js";
import {
  createEffect,
  describeConflict,
  tryAddEffect,
  type Effect,
  type EffectInsertion,
  type EffectKind,
} from "./effect.js";
import type { Environment } from "./environment.js";
import type { Expression } from "./expression.js";
import type { FNode } from "./fnode.js";
import type { Parameter } from "./parameter.js";
import {
  intervalKey,
  intervalToString,
  timePointInterval,
  timingKey,
  timingToString,
  type TimeInterval,
  type Timing,
} from "./timing.js";
import { isNumericType } from "./types.js";
import type { Variable } from "./variable.js";

/** Bounds of the duration of a {@link DurativeAction}. */
export interface DurationInterval {
  readonly lower: FNode;
  readonly upper: FNode;
  readonly isLeftOpen: boolean;
  readonly isRightOpen: boolean;
}

export interface TimedConditions {
  readonly interval: TimeInterval;
  readonly conditions: readonly FNode[];
}

export interface TimedEffects {
  readonly timing: Timing;
  readonly effects: readonly Effect[];
}

function isTiming(value: TimeInterval | Timing): value is Timing {
  return "timepoint" in value;
}

/** State shared by both action variants. */
abstract class ActionBase {
  public readonly parameters: readonly Parameter[];

  protected constructor(
    public readonly name: string,
    parameters: readonly Parameter[],
    public readonly environment: Environment,
  ) {
    const seen = new Set<string>();
    for (const parameter of parameters) {
      if (seen.has(parameter.name)) {
        throw new UsageError(`action ${name} declares parameter ${parameter.name} twice`);
      }
      seen.add(parameter.name);
    }
    this.parameters = [...parameters];
  }

  parameter(name: string): Parameter {
    const found = this.parameters.find((parameter) => parameter.name === name);
    if (!found) {
      throw new UsageError(`action ${this.name} has no parameter named ${name}`);
    }
    return found;
  }

  protected buildEffect(
    fluent: Expression,
    value: Expression,
    condition: Expression,
    kind: EffectKind,
    forall: readonly Variable[],
  ): Effect {
    return createEffect(this.environment, fluent, value, condition, kind, forall);
  }

  protected requireCondition(expression: Expression): FNode {
    const node = this.environment.expressions.promote(expression);
    if (node.type.kind !== "bool") {
      throw new PlanningTypeError(`condition ${node.toString()} of action ${this.name} is not boolean`);
    }
    return node;
  }

  protected signature(): string {
    if (this.parameters.length === 0) {
      return this.name;
    }
    return `${this.name}(${this.parameters.map((p) => p.name).join(", ")})`;
  }
}

export class InstantaneousAction extends ActionBase {
  public readonly kind = "instantaneous" as const;
  private preconditionList: FNode[] = [];
  private effectList: Effect[] = [];

  constructor(name: string, parameters: readonly Parameter[], environment: Environment) {
    super(name, parameters, environment);
  }

  get preconditions(): readonly FNode[] {
    return this.preconditionList;
  }

  get effects(): readonly Effect[] {
    return this.effectList;
  }

  get conditionalEffects(): readonly Effect[] {
    return this.effectList.filter((effect) => effect.isConditional());
  }

  get unconditionalEffects(): readonly Effect[] {
    return this.effectList.filter((effect) => !effect.isConditional());
  }

  isConditional(): boolean {
    return this.effectList.some((effect) => effect.isConditional());
  }

  /** Adds a precondition; `true` and already present preconditions are ignored. */
  addPrecondition(expression: Expression): void {
    const node = this.requireCondition(expression);
    if (node.isTrue() || this.preconditionList.includes(node)) {
      return;
    }
    this.preconditionList.push(node);
  }

  setPreconditions(preconditions: readonly FNode[]): void {
    this.preconditionList = [];
    for (const precondition of preconditions) {
      this.addPrecondition(precondition);
    }
  }

  clearPreconditions(): void {
    this.preconditionList = [];
  }

  clearEffects(): void {
    this.effectList = [];
  }

  addEffect(fluent: Expression, value: Expression, condition: Expression = true, forall: readonly Variable[] = []): void {
    this.addEffectInstance(this.buildEffect(fluent, value, condition, "assign", forall));
  }

  addIncreaseEffect(
    fluent: Expression,
    value: Expression,
    condition: Expression = true,
    forall: readonly Variable[] = [],
  ): void {
    this.addEffectInstance(this.buildEffect(fluent, value, condition, "increase", forall));
  }

  addDecreaseEffect(
    fluent: Expression,
    value: Expression,
    condition: Expression = true,
    forall: readonly Variable[] = [],
  ): void {
    this.addEffectInstance(this.buildEffect(fluent, value, condition, "decrease", forall));
  }

  /** Inserts an effect, throwing {@link ConflictingEffectsError} on conflict. */
  addEffectInstance(effect: Effect): void {
    const insertion = this.tryAddEffect(effect);
    if (!insertion.ok) {
      throw new ConflictingEffectsError(describeConflict(insertion.conflict), {
        action: this.name,
        reason: insertion.conflict.reason,
      });
    }
  }

  /** Inserts an effect when it does not conflict; the action is unchanged otherwise. */
  tryAddEffect(effect: Effect): EffectInsertion {
    const insertion = tryAddEffect(this.effectList, effect);
    if (insertion.ok) {
      this.effectList = [...insertion.effects];
    }
    return insertion;
  }

  clone(name: string = this.name): InstantaneousAction {
    const copy = new InstantaneousAction(name, this.parameters, this.environment);
    copy.preconditionList = [...this.preconditionList];
    copy.effectList = [...this.effectList];
    return copy;
  }

  override toString(): string {
    const lines = [`action ${this.signature()} {`, "  preconditions = ["];
    for (const precondition of this.preconditionList) {
      lines.push(`    ${precondition.toString()}`);
    }
    lines.push("  ]", "  effects = [");
    for (const effect of this.effectList) {
      lines.push(`    ${effect.toString()}`);
    }
    lines.push("  ]", "}");
    return lines.join("\n");
  }
}

export class DurativeAction extends ActionBase {
  public readonly kind = "durative" as const;
  private durationInterval: DurationInterval;
  private conditionMap = new Map<string, { interval: TimeInterval; conditions: FNode[] }>();
  private effectMap = new Map<string, { timing: Timing; effects: Effect[] }>();

  constructor(name: string, parameters: readonly Parameter[], environment: Environment) {
    super(name, parameters, environment);
    const zero = environment.expressions.int(0);
    this.durationInterval = { lower: zero, upper: zero, isLeftOpen: false, isRightOpen: false };
  }

  get duration(): DurationInterval {
    return this.durationInterval;
  }

  /** Conditions grouped by interval, in insertion order. */
  get conditions(): readonly TimedConditions[] {
    return [...this.conditionMap.values()].map(({ interval, conditions }) => ({
      interval,
      conditions: [...conditions],
    }));
  }

  /** Effects grouped by timing, in insertion order. */
  get effects(): readonly TimedEffects[] {
    return [...this.effectMap.values()].map(({ timing, effects }) => ({ timing, effects: [...effects] }));
  }

  get allEffects(): readonly Effect[] {
    return [...this.effectMap.values()].flatMap((entry) => entry.effects);
  }

  isConditional(): boolean {
    return this.allEffects.some((effect) => effect.isConditional());
  }

  setDuration(duration: DurationInterval): void {
    for (const bound of [duration.lower, duration.upper]) {
      if (!isNumericType(bound.type)) {
        throw new PlanningTypeError(`duration bound ${bound.toString()} of ${this.name} is not numeric`);
      }
    }
    this.durationInterval = duration;
  }

  setFixedDuration(value: Expression): void {
    const node = this.environment.expressions.promote(value);
    this.setDuration({ lower: node, upper: node, isLeftOpen: false, isRightOpen: false });
  }

  setClosedDurationInterval(lower: Expression, upper: Expression): void {
    const expressions = this.environment.expressions;
    this.setDuration({
      lower: expressions.promote(lower),
      upper: expressions.promote(upper),
      isLeftOpen: false,
      isRightOpen: false,
    });
  }

  addCondition(when: TimeInterval | Timing, expression: Expression): void {
    const interval = isTiming(when) ? timePointInterval(when) : when;
    const node = this.requireCondition(expression);
    if (node.isTrue()) {
      return;
    }
    const key = intervalKey(interval);
    const entry = this.conditionMap.get(key);
    if (!entry) {
      this.conditionMap.set(key, { interval, conditions: [node] });
    } else if (!entry.conditions.includes(node)) {
      entry.conditions.push(node);
    }
  }

  clearConditions(): void {
    this.conditionMap = new Map();
  }

  clearEffects(): void {
    this.effectMap = new Map();
  }

  addEffect(
    timing: Timing,
    fluent: Expression,
    value: Expression,
    condition: Expression = true,
    forall: readonly Variable[] = [],
  ): void {
    this.addEffectInstance(timing, this.buildEffect(fluent, value, condition, "assign", forall));
  }

  addIncreaseEffect(
    timing: Timing,
    fluent: Expression,
    value: Expression,
    condition: Expression = true,
    forall: readonly Variable[] = [],
  ): void {
    this.addEffectInstance(timing, this.buildEffect(fluent, value, condition, "increase", forall));
  }

  addDecreaseEffect(
    timing: Timing,
    fluent: Expression,
    value: Expression,
    condition: Expression = true,
    forall: readonly Variable[] = [],
  ): void {
    this.addEffectInstance(timing, this.buildEffect(fluent, value, condition, "decrease", forall));
  }

  addEffectInstance(timing: Timing, effect: Effect): void {
    const insertion = this.tryAddEffect(timing, effect);
    if (!insertion.ok) {
      throw new ConflictingEffectsError(describeConflict(insertion.conflict), {
        action: this.name,
        timing: timingToString(timing),
        reason: insertion.conflict.reason,
      });
    }
  }

  tryAddEffect(timing: Timing, effect: Effect): EffectInsertion {
    const key = timingKey(timing);
    const entry = this.effectMap.get(key);
    const insertion = tryAddEffect(entry?.effects ?? [], effect);
    if (insertion.ok) {
      this.effectMap.set(key, { timing, effects: [...insertion.effects] });
    }
    return insertion;
  }

  clone(name: string = this.name): DurativeAction {
    const copy = new DurativeAction(name, this.parameters, this.environment);
    copy.durationInterval = this.durationInterval;
    for (const [key, entry] of this.conditionMap) {
      copy.conditionMap.set(key, { interval: entry.interval, conditions: [...entry.conditions] });
    }
    for (const [key, entry] of this.effectMap) {
      copy.effectMap.set(key, { timing: entry.timing, effects: [...entry.effects] });
    }
    return copy;
  }

  override toString(): string {
    const { lower, upper, isLeftOpen, isRightOpen } = this.durationInterval;
    const lines = [
      `durative action ${this.signature()} {`,
      `  duration = ${isLeftOpen ? "(" : "["}${lower.toString()}, ${upper.toString()}${isRightOpen ? ")" : "]"}`,
      "  conditions = [",
    ];
    for (const { interval, conditions } of this.conditionMap.values()) {
      lines.push(`    ${intervalToString(interval)}: ${conditions.map((c) => c.toString()).join(", ")}`);
    }
    lines.push("  ]", "  effects = [");
    for (const { timing, effects } of this.effectMap.values()) {
      lines.push(`    ${timingToString(timing)}: ${effects.map((e) => e.toString()).join(", ")}`);
    }
    lines.push("  ]", "}");
    return lines.join("\n");
  }
}

/** Closed union of action variants; switch on `kind`. */
export type Action = InstantaneousAction | DurativeAction;
