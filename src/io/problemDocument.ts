import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { ERROR_CODES, ProblemDocumentError } from "../errors.js";
import { InstantaneousAction } from "../model/action.js";
import { Effect } from "../model/effect.js";
import { createEnvironment, type Environment } from "../model/environment.js";
import { Fluent } from "../model/fluent.js";
import type { FNode } from "../model/fnode.js";
import { minimizeActionCosts, minimizeSequentialPlanLength } from "../model/metrics.js";
import { PlanObject } from "../model/object.js";
import { Parameter } from "../model/parameter.js";
import { Problem } from "../model/problem.js";
import type { PlanningType, UserType } from "../model/types.js";
import { Variable } from "../model/variable.js";

/** Expression tree accepted in documents; strings name parameters, variables, objects or 0-ary fluents. */
export type ExpressionDocument =
  | boolean
  | number
  | string
  | { and: ExpressionDocument[] }
  | { or: ExpressionDocument[] }
  | { not: ExpressionDocument }
  | { implies: [ExpressionDocument, ExpressionDocument] }
  | { iff: [ExpressionDocument, ExpressionDocument] }
  | { equals: [ExpressionDocument, ExpressionDocument] }
  | { le: [ExpressionDocument, ExpressionDocument] }
  | { lt: [ExpressionDocument, ExpressionDocument] }
  | { ge: [ExpressionDocument, ExpressionDocument] }
  | { gt: [ExpressionDocument, ExpressionDocument] }
  | { plus: ExpressionDocument[] }
  | { minus: [ExpressionDocument, ExpressionDocument] }
  | { times: ExpressionDocument[] }
  | { div: [ExpressionDocument, ExpressionDocument] }
  | { fluent: string; args?: ExpressionDocument[] }
  | { exists: QuantifiedDocument }
  | { forall: QuantifiedDocument };

export interface QuantifiedDocument {
  vars: { name: string; type: string }[];
  body: ExpressionDocument;
}

const NameSchema = z.string().trim().min(1).max(200);

const TypedNameSchema = z.object({ name: NameSchema, type: NameSchema }).strict();

const pair = (): z.ZodTuple<[z.ZodType<ExpressionDocument>, z.ZodType<ExpressionDocument>]> =>
  z.tuple([ExpressionSchema, ExpressionSchema]);

const ExpressionSchema: z.ZodType<ExpressionDocument> = z.lazy(() =>
  z.union([
    z.boolean(),
    z.number().finite(),
    NameSchema,
    z.object({ and: z.array(ExpressionSchema) }).strict(),
    z.object({ or: z.array(ExpressionSchema) }).strict(),
    z.object({ not: ExpressionSchema }).strict(),
    z.object({ implies: pair() }).strict(),
    z.object({ iff: pair() }).strict(),
    z.object({ equals: pair() }).strict(),
    z.object({ le: pair() }).strict(),
    z.object({ lt: pair() }).strict(),
    z.object({ ge: pair() }).strict(),
    z.object({ gt: pair() }).strict(),
    z.object({ plus: z.array(ExpressionSchema) }).strict(),
    z.object({ minus: pair() }).strict(),
    z.object({ times: z.array(ExpressionSchema) }).strict(),
    z.object({ div: pair() }).strict(),
    z.object({ fluent: NameSchema, args: z.array(ExpressionSchema).optional() }).strict(),
    z.object({ exists: z.object({ vars: z.array(TypedNameSchema).min(1), body: ExpressionSchema }).strict() }).strict(),
    z.object({ forall: z.object({ vars: z.array(TypedNameSchema).min(1), body: ExpressionSchema }).strict() }).strict(),
  ]),
);

/** `bool`, `int`, `real` or a user type name, or a bounded number. */
const TypeReferenceSchema = z.union([
  NameSchema,
  z
    .object({
      kind: z.enum(["int", "real"]),
      lower: z.number().finite().optional(),
      upper: z.number().finite().optional(),
    })
    .strict(),
]);

const FluentApplicationSchema = z
  .object({ fluent: NameSchema, args: z.array(ExpressionSchema).default([]) })
  .strict();

const EffectSchema = z
  .object({
    fluent: FluentApplicationSchema,
    value: ExpressionSchema,
    kind: z.enum(["assign", "increase", "decrease"]).default("assign"),
    condition: ExpressionSchema.optional(),
    forall: z.array(TypedNameSchema).default([]),
  })
  .strict();

const ProblemDocumentSchema = z
  .object({
    name: NameSchema,
    types: z.array(z.object({ name: NameSchema, father: NameSchema.optional() }).strict()).default([]),
    objects: z.array(TypedNameSchema).default([]),
    fluents: z
      .array(
        z
          .object({
            name: NameSchema,
            type: TypeReferenceSchema.default("bool"),
            parameters: z.array(TypedNameSchema).default([]),
            default: ExpressionSchema.optional(),
          })
          .strict(),
      )
      .default([]),
    actions: z
      .array(
        z
          .object({
            name: NameSchema,
            parameters: z.array(TypedNameSchema).default([]),
            preconditions: z.array(ExpressionSchema).default([]),
            effects: z.array(EffectSchema).default([]),
          })
          .strict(),
      )
      .default([]),
    initial_values: z.array(z.object({ fluent: FluentApplicationSchema, value: ExpressionSchema }).strict()).default([]),
    goals: z.array(ExpressionSchema).default([]),
    metric: z
      .union([
        z.object({ kind: z.literal("plan_length") }).strict(),
        z
          .object({
            kind: z.literal("action_costs"),
            costs: z.record(z.number().finite()),
            default: z.number().finite().optional(),
          })
          .strict(),
      ])
      .optional(),
  })
  .strict();

export type ProblemDocument = z.infer<typeof ProblemDocumentSchema>;

type TypeReference = z.infer<typeof TypeReferenceSchema>;

type Scope = ReadonlyMap<string, Parameter | Variable>;

/** Re-exported so callers can validate documents without loading them. */
export const ProblemDocumentSchemas = {
  problem: ProblemDocumentSchema,
  expression: ExpressionSchema,
};

/** Attempt to parse a textual document as JSON first, then YAML. */
function parseStringDocument(source: string): unknown {
  try {
    return JSON.parse(source);
  } catch {
    try {
      return parseYaml(source);
    } catch (error) {
      throw new ProblemDocumentError("unable to parse problem document", ERROR_CODES.DOCUMENT_PARSE, {
        message: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/** Parses and validates a JSON or YAML document (or an already decoded object). */
export function parseProblemDocument(source: unknown): ProblemDocument {
  let payload: unknown;
  if (typeof source === "string") {
    const trimmed = source.trim();
    if (trimmed.length === 0) {
      throw new ProblemDocumentError("problem document is empty", ERROR_CODES.DOCUMENT_EMPTY);
    }
    payload = parseStringDocument(trimmed);
  } else {
    payload = source;
  }
  const parsed = ProblemDocumentSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ProblemDocumentError("problem document is invalid", ERROR_CODES.DOCUMENT_INVALID, parsed.error.flatten());
  }
  return parsed.data;
}

function unknownReference(what: string, name: string): ProblemDocumentError {
  return new ProblemDocumentError(`unknown ${what} ${name}`, ERROR_CODES.DOCUMENT_REFERENCE, { [what]: name });
}

/** Builds the {@link Problem} described by a validated document. */
class ProblemBuilder {
  private readonly userTypes = new Map<string, UserType>();
  private readonly objects = new Map<string, PlanObject>();
  private readonly fluents = new Map<string, Fluent>();
  readonly problem: Problem;

  constructor(
    private readonly document: ProblemDocument,
    private readonly environment: Environment,
  ) {
    this.problem = new Problem(document.name, environment);
  }

  build(): Problem {
    const { document, problem, environment } = this;
    const em = environment.expressions;
    for (const { name, father } of document.types) {
      const parent = father === undefined ? null : this.userType(father);
      this.userTypes.set(name, environment.types.userType(name, parent));
    }
    this.userTypes.forEach((type) => problem.addUserType(type));
    for (const { name, type } of document.objects) {
      const object = problem.addObject(new PlanObject(name, this.userType(type)));
      this.objects.set(name, object);
    }
    for (const declaration of document.fluents) {
      const fluent = new Fluent(
        declaration.name,
        this.type(declaration.type),
        declaration.parameters.map(({ name, type }) => new Parameter(name, this.type(type))),
        environment,
      );
      this.fluents.set(fluent.name, fluent);
      problem.addFluent(
        fluent,
        declaration.default === undefined ? {} : { defaultInitialValue: this.expression(declaration.default, new Map()) },
      );
    }
    for (const declaration of document.actions) {
      const parameters = declaration.parameters.map(({ name, type }) => new Parameter(name, this.type(type)));
      const scope: Scope = new Map(parameters.map((parameter) => [parameter.name, parameter]));
      const action = new InstantaneousAction(declaration.name, parameters, environment);
      declaration.preconditions.forEach((precondition) => action.addPrecondition(this.expression(precondition, scope)));
      for (const effect of declaration.effects) {
        const variables = effect.forall.map(({ name, type }) => new Variable(name, this.type(type)));
        const effectScope: Scope = new Map([...scope, ...variables.map((variable) => [variable.name, variable] as const)]);
        action.addEffectInstance(
          new Effect(
            this.application(effect.fluent, effectScope),
            this.expression(effect.value, effectScope),
            effect.condition === undefined ? em.trueExp() : this.expression(effect.condition, effectScope),
            effect.kind,
            variables,
          ),
        );
      }
      problem.addAction(action);
    }
    for (const { fluent, value } of document.initial_values) {
      problem.setInitialValue(this.application(fluent, new Map()), this.expression(value, new Map()));
    }
    document.goals.forEach((goal) => problem.addGoal(this.expression(goal, new Map())));
    const metric = document.metric;
    if (metric?.kind === "plan_length") {
      problem.addQualityMetric(minimizeSequentialPlanLength());
    } else if (metric?.kind === "action_costs") {
      const costs = new Map(Object.entries(metric.costs).map(([name, cost]) => [name, em.promote(cost)]));
      problem.addQualityMetric(
        minimizeActionCosts(costs, metric.default === undefined ? null : em.promote(metric.default)),
      );
    }
    return problem;
  }

  private userType(name: string): UserType {
    const type = this.userTypes.get(name);
    if (!type) {
      throw unknownReference("type", name);
    }
    return type;
  }

  private type(reference: TypeReference): PlanningType {
    const types = this.environment.types;
    if (typeof reference !== "string") {
      const lower = reference.lower ?? null;
      const upper = reference.upper ?? null;
      return reference.kind === "int" ? types.intType(lower, upper) : types.realType(lower, upper);
    }
    switch (reference) {
      case "bool":
        return types.boolType();
      case "int":
        return types.intType();
      case "real":
        return types.realType();
      default:
        return this.userType(reference);
    }
  }

  private application(document: { fluent: string; args: ExpressionDocument[] }, scope: Scope): FNode {
    const fluent = this.fluents.get(document.fluent);
    if (!fluent) {
      throw unknownReference("fluent", document.fluent);
    }
    return this.environment.expressions.fluentExp(
      fluent,
      document.args.map((arg) => this.expression(arg, scope)),
    );
  }

  private name(name: string, scope: Scope): FNode {
    const em = this.environment.expressions;
    const bound = scope.get(name);
    if (bound instanceof Parameter) {
      return em.paramExp(bound);
    }
    if (bound) {
      return em.variableExp(bound);
    }
    const object = this.objects.get(name);
    if (object) {
      return em.objectExp(object);
    }
    const fluent = this.fluents.get(name);
    if (fluent) {
      return em.fluentExp(fluent, []);
    }
    throw unknownReference("name", name);
  }

  private quantified(document: QuantifiedDocument, scope: Scope, universal: boolean): FNode {
    const em = this.environment.expressions;
    const variables = document.vars.map(({ name, type }) => new Variable(name, this.type(type)));
    const inner: Scope = new Map([...scope, ...variables.map((variable) => [variable.name, variable] as const)]);
    const body = this.expression(document.body, inner);
    return universal ? em.forall(body, ...variables) : em.exists(body, ...variables);
  }

  expression(document: ExpressionDocument, scope: Scope): FNode {
    const em = this.environment.expressions;
    const sub = (node: ExpressionDocument): FNode => this.expression(node, scope);
    if (typeof document === "boolean" || typeof document === "number") {
      return em.promote(document);
    }
    if (typeof document === "string") {
      return this.name(document, scope);
    }
    if ("and" in document) {
      return em.and(document.and.map(sub));
    }
    if ("or" in document) {
      return em.or(document.or.map(sub));
    }
    if ("not" in document) {
      return em.not(sub(document.not));
    }
    if ("implies" in document) {
      return em.implies(sub(document.implies[0]), sub(document.implies[1]));
    }
    if ("iff" in document) {
      return em.iff(sub(document.iff[0]), sub(document.iff[1]));
    }
    if ("equals" in document) {
      return em.equals(sub(document.equals[0]), sub(document.equals[1]));
    }
    if ("le" in document) {
      return em.le(sub(document.le[0]), sub(document.le[1]));
    }
    if ("lt" in document) {
      return em.lt(sub(document.lt[0]), sub(document.lt[1]));
    }
    if ("ge" in document) {
      return em.ge(sub(document.ge[0]), sub(document.ge[1]));
    }
    if ("gt" in document) {
      return em.gt(sub(document.gt[0]), sub(document.gt[1]));
    }
    if ("plus" in document) {
      return em.plus(document.plus.map(sub));
    }
    if ("minus" in document) {
      return em.minus(sub(document.minus[0]), sub(document.minus[1]));
    }
    if ("times" in document) {
      return em.times(document.times.map(sub));
    }
    if ("div" in document) {
      return em.div(sub(document.div[0]), sub(document.div[1]));
    }
    if ("exists" in document) {
      return this.quantified(document.exists, scope, false);
    }
    if ("forall" in document) {
      return this.quantified(document.forall, scope, true);
    }
    return this.application({ fluent: document.fluent, args: document.args ?? [] }, scope);
  }
}

/**
 * Loads a problem from a JSON or YAML document. Every failure to parse,
 * validate or resolve a name raises a {@link ProblemDocumentError}.
 */
export function loadProblemDocument(source: unknown, environment: Environment = createEnvironment()): Problem {
  const document = parseProblemDocument(source);
  return new ProblemBuilder(document, environment).build();
}
