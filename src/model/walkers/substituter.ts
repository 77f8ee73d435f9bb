import type { Environment } from "../environment.js";
import type { FNode } from "../fnode.js";

/**
 * Replaces sub-expressions according to a map. Keys are matched by node
 * identity; a replaced node is not visited further. Variables bound by a
 * quantifier are shielded from the substitution inside its body.
 */
export class Substituter {
  constructor(private readonly environment: Environment) {}

  substitute(expression: FNode, substitutions: ReadonlyMap<FNode, FNode>): FNode {
    if (substitutions.size === 0) {
      return expression;
    }
    return this.walk(expression, substitutions, new Map());
  }

  private walk(node: FNode, substitutions: ReadonlyMap<FNode, FNode>, memo: Map<FNode, FNode>): FNode {
    const replacement = substitutions.get(node);
    if (replacement) {
      return replacement;
    }
    const cached = memo.get(node);
    if (cached) {
      return cached;
    }
    let result: FNode;
    if (node.isExists() || node.isForall()) {
      const expressions = this.environment.expressions;
      const bound = new Set(node.variables().map((variable) => expressions.variableExp(variable)));
      const shielded = new Map([...substitutions].filter(([key]) => !bound.has(key)));
      result = expressions.rebuild(node, [this.walk(node.arg(0), shielded, new Map())]);
    } else {
      result = this.environment.expressions.rebuild(
        node,
        node.args.map((arg) => this.walk(arg, substitutions, memo)),
      );
    }
    memo.set(node, result);
    return result;
  }
}
