import type { Environment } from "../environment.js";
import type { FNode } from "../fnode.js";
import { Simplifier } from "./simplifier.js";

/**
 * Negation normal form: negations are pushed down to atoms, `implies` and
 * `iff` are expanded and quantifiers are dualised under negation.
 */
export class Nnf {
  private readonly memo = new Map<FNode, FNode>();
  private readonly negatedMemo = new Map<FNode, FNode>();

  constructor(private readonly environment: Environment) {}

  getNnfExpression(expression: FNode): FNode {
    return this.convert(expression, false);
  }

  private convert(node: FNode, negate: boolean): FNode {
    const memo = negate ? this.negatedMemo : this.memo;
    const cached = memo.get(node);
    if (cached) {
      return cached;
    }
    const result = this.compute(node, negate);
    memo.set(node, result);
    return result;
  }

  private compute(node: FNode, negate: boolean): FNode {
    const em = this.environment.expressions;
    switch (node.kind) {
      case "and": {
        const args = node.args.map((arg) => this.convert(arg, negate));
        return negate ? em.or(args) : em.and(args);
      }
      case "or": {
        const args = node.args.map((arg) => this.convert(arg, negate));
        return negate ? em.and(args) : em.or(args);
      }
      case "not":
        return this.convert(node.arg(0), !negate);
      case "implies": {
        const [left, right] = [node.arg(0), node.arg(1)];
        return negate
          ? em.and(this.convert(left, false), this.convert(right, true))
          : em.or(this.convert(left, true), this.convert(right, false));
      }
      case "iff": {
        const [left, right] = [node.arg(0), node.arg(1)];
        const positiveLeft = this.convert(left, false);
        const negativeLeft = this.convert(left, true);
        const positiveRight = this.convert(right, false);
        const negativeRight = this.convert(right, true);
        return negate
          ? em.or(em.and(positiveLeft, negativeRight), em.and(negativeLeft, positiveRight))
          : em.or(em.and(positiveLeft, positiveRight), em.and(negativeLeft, negativeRight));
      }
      case "exists": {
        const body = this.convert(node.arg(0), negate);
        return negate ? em.forall(body, ...node.variables()) : em.exists(body, ...node.variables());
      }
      case "forall": {
        const body = this.convert(node.arg(0), negate);
        return negate ? em.exists(body, ...node.variables()) : em.forall(body, ...node.variables());
      }
      case "bool_constant":
        return negate ? em.bool(!node.boolConstantValue()) : node;
      default:
        return negate ? em.not(node) : node;
    }
  }
}

/**
 * Disjunctive normal form over the negation normal form of the input. The
 * result is either a single conjunction of literals or an `or` of them, with
 * disjuncts in the order the products are enumerated.
 */
export class Dnf {
  private readonly nnf: Nnf;
  private readonly simplifier: Simplifier;

  constructor(private readonly environment: Environment) {
    this.nnf = new Nnf(environment);
    this.simplifier = new Simplifier(environment);
  }

  getDnfExpression(expression: FNode): FNode {
    const normalised = this.nnf.getNnfExpression(expression);
    const disjuncts = this.disjuncts(normalised);
    return this.simplifier.simplify(this.environment.expressions.or(disjuncts));
  }

  private disjuncts(node: FNode): FNode[] {
    const em = this.environment.expressions;
    if (node.isOr()) {
      return node.args.flatMap((arg) => this.disjuncts(arg));
    }
    if (node.isAnd()) {
      let products: FNode[][] = [[]];
      for (const arg of node.args) {
        const options = this.disjuncts(arg);
        const next: FNode[][] = [];
        for (const prefix of products) {
          for (const option of options) {
            next.push([...prefix, option]);
          }
        }
        products = next;
      }
      return products.map((conjuncts) => this.simplifier.simplify(em.and(conjuncts)));
    }
    return [node];
  }
}
