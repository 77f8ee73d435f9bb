import type { Environment } from "../environment.js";
import type { ExpressionManager } from "../expression.js";
import type { Fluent } from "../fluent.js";
import type { FNode } from "../fnode.js";
import { collectFreeVariables } from "./extractors.js";

/** Source of static fluent values used to fold ground static applications. */
export interface StaticValueSource {
  getStaticFluents(): ReadonlySet<Fluent>;
  initialValue(fluentExpression: FNode): FNode;
}

/**
 * Constant folding and boolean normalisation. The result is equivalent to the
 * input; `and`/`or` are flattened and deduplicated, complementary literals
 * collapse and arithmetic over constants is evaluated.
 *
 * When built with a {@link StaticValueSource}, ground applications of static
 * fluents are replaced by their initial value.
 */
export class Simplifier {
  private readonly expressions: ExpressionManager;
  private readonly memo = new Map<FNode, FNode>();
  private readonly staticFluents: ReadonlySet<Fluent>;

  constructor(
    environment: Environment,
    private readonly problem: StaticValueSource | null = null,
  ) {
    this.expressions = environment.expressions;
    this.staticFluents = problem ? problem.getStaticFluents() : new Set();
  }

  simplify(expression: FNode): FNode {
    const cached = this.memo.get(expression);
    if (cached) {
      return cached;
    }
    const args = expression.args.map((arg) => this.simplify(arg));
    const result = this.visit(expression, args);
    this.memo.set(expression, result);
    return result;
  }

  private visit(node: FNode, args: FNode[]): FNode {
    const em = this.expressions;
    switch (node.kind) {
      case "and":
        return this.simplifyAnd(args);
      case "or":
        return this.simplifyOr(args);
      case "not":
        return this.simplifyNot(this.first(node, args));
      case "implies": {
        const [left, right] = this.pair(node, args);
        return this.simplifyOr([this.simplifyNot(left), right]);
      }
      case "iff": {
        const [left, right] = this.pair(node, args);
        if (left.isBoolConstant() && right.isBoolConstant()) {
          return em.bool(left.boolConstantValue() === right.boolConstantValue());
        }
        if (left === right) {
          return em.trueExp();
        }
        if (left.isTrue()) {
          return right;
        }
        if (right.isTrue()) {
          return left;
        }
        if (left.isFalse()) {
          return this.simplifyNot(right);
        }
        if (right.isFalse()) {
          return this.simplifyNot(left);
        }
        return em.iff(left, right);
      }
      case "exists":
      case "forall":
        return this.simplifyQuantifier(node, this.first(node, args));
      case "equals":
        return this.simplifyEquals(...this.pair(node, args));
      case "le":
      case "lt": {
        const [left, right] = this.pair(node, args);
        if (left.isNumericConstant() && right.isNumericConstant()) {
          const l = left.numericConstantValue();
          const r = right.numericConstantValue();
          return em.bool(node.kind === "le" ? l <= r : l < r);
        }
        if (left === right) {
          return em.bool(node.kind === "le");
        }
        return em.rebuild(node, args);
      }
      case "plus":
        return this.simplifyPlus(args);
      case "minus":
        return this.simplifyMinus(...this.pair(node, args));
      case "times":
        return this.simplifyTimes(args);
      case "div":
        return this.simplifyDiv(...this.pair(node, args));
      case "fluent_exp": {
        const rebuilt = em.rebuild(node, args);
        if (this.problem && this.staticFluents.has(node.fluent()) && args.every((arg) => arg.isConstant())) {
          return this.problem.initialValue(rebuilt);
        }
        return rebuilt;
      }
      default:
        return em.rebuild(node, args);
    }
  }

  private first(node: FNode, args: readonly FNode[]): FNode {
    return args[0] ?? node.arg(0);
  }

  private pair(node: FNode, args: readonly FNode[]): [FNode, FNode] {
    return [args[0] ?? node.arg(0), args[1] ?? node.arg(1)];
  }

  private simplifyAnd(args: readonly FNode[]): FNode {
    const em = this.expressions;
    const conjuncts: FNode[] = [];
    const seen = new Set<FNode>();
    const pending = [...args];
    while (pending.length > 0) {
      const arg = pending.shift();
      if (!arg || arg.isTrue() || seen.has(arg)) {
        continue;
      }
      if (arg.isFalse()) {
        return em.falseExp();
      }
      if (arg.isAnd()) {
        pending.unshift(...arg.args);
        continue;
      }
      seen.add(arg);
      conjuncts.push(arg);
    }
    for (const conjunct of conjuncts) {
      if (conjunct.isNot() && seen.has(conjunct.arg(0))) {
        return em.falseExp();
      }
    }
    return em.and(conjuncts);
  }

  private simplifyOr(args: readonly FNode[]): FNode {
    const em = this.expressions;
    const disjuncts: FNode[] = [];
    const seen = new Set<FNode>();
    const pending = [...args];
    while (pending.length > 0) {
      const arg = pending.shift();
      if (!arg || arg.isFalse() || seen.has(arg)) {
        continue;
      }
      if (arg.isTrue()) {
        return em.trueExp();
      }
      if (arg.isOr()) {
        pending.unshift(...arg.args);
        continue;
      }
      seen.add(arg);
      disjuncts.push(arg);
    }
    for (const disjunct of disjuncts) {
      if (disjunct.isNot() && seen.has(disjunct.arg(0))) {
        return em.trueExp();
      }
    }
    return em.or(disjuncts);
  }

  private simplifyNot(arg: FNode): FNode {
    const em = this.expressions;
    if (arg.isBoolConstant()) {
      return em.bool(!arg.boolConstantValue());
    }
    if (arg.isNot()) {
      return arg.arg(0);
    }
    return em.not(arg);
  }

  private simplifyQuantifier(node: FNode, body: FNode): FNode {
    if (body.isBoolConstant()) {
      return body;
    }
    const free = collectFreeVariables(body);
    const kept = node.variables().filter((variable) => free.has(variable));
    if (kept.length === 0) {
      return body;
    }
    return node.kind === "exists" ? this.expressions.exists(body, ...kept) : this.expressions.forall(body, ...kept);
  }

  private simplifyEquals(left: FNode, right: FNode): FNode {
    const em = this.expressions;
    if (left === right) {
      return em.trueExp();
    }
    if (left.isNumericConstant() && right.isNumericConstant()) {
      return em.bool(left.numericConstantValue() === right.numericConstantValue());
    }
    if (left.isConstant() && right.isConstant()) {
      return em.falseExp();
    }
    return em.equals(left, right);
  }

  private numeric(value: number, real: boolean): FNode {
    return real || !Number.isInteger(value) ? this.expressions.real(value) : this.expressions.int(value);
  }

  private simplifyPlus(args: readonly FNode[]): FNode {
    const others: FNode[] = [];
    let sum = 0;
    let real = false;
    let constants = 0;
    const pending = [...args];
    while (pending.length > 0) {
      const arg = pending.shift();
      if (!arg) {
        continue;
      }
      if (arg.kind === "plus") {
        pending.unshift(...arg.args);
      } else if (arg.isNumericConstant()) {
        sum += arg.numericConstantValue();
        real = real || arg.isRealConstant();
        constants += 1;
      } else {
        others.push(arg);
      }
    }
    if (others.length === 0) {
      return this.numeric(sum, real);
    }
    if (constants > 0 && sum !== 0) {
      others.push(this.numeric(sum, real));
    }
    return others.length === 1 && others[0] ? others[0] : this.expressions.plus(others);
  }

  private simplifyMinus(left: FNode, right: FNode): FNode {
    if (left.isNumericConstant() && right.isNumericConstant()) {
      return this.numeric(
        left.numericConstantValue() - right.numericConstantValue(),
        left.isRealConstant() || right.isRealConstant(),
      );
    }
    if (right.isNumericConstant() && right.numericConstantValue() === 0) {
      return left;
    }
    return this.expressions.minus(left, right);
  }

  private simplifyTimes(args: readonly FNode[]): FNode {
    const others: FNode[] = [];
    let product = 1;
    let real = false;
    const pending = [...args];
    while (pending.length > 0) {
      const arg = pending.shift();
      if (!arg) {
        continue;
      }
      if (arg.kind === "times") {
        pending.unshift(...arg.args);
      } else if (arg.isNumericConstant()) {
        product *= arg.numericConstantValue();
        real = real || arg.isRealConstant();
      } else {
        others.push(arg);
      }
    }
    if (others.length === 0 || product === 0) {
      return this.numeric(product, real);
    }
    if (product !== 1) {
      others.unshift(this.numeric(product, real));
    }
    return others.length === 1 && others[0] ? others[0] : this.expressions.times(others);
  }

  private simplifyDiv(left: FNode, right: FNode): FNode {
    if (right.isNumericConstant()) {
      const divisor = right.numericConstantValue();
      if (divisor === 1) {
        return left;
      }
      if (divisor !== 0 && left.isNumericConstant()) {
        const quotient = left.numericConstantValue() / divisor;
        return this.numeric(quotient, left.isRealConstant() || right.isRealConstant());
      }
    }
    return this.expressions.div(left, right);
  }
}
