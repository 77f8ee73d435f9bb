import { cartesianProduct, domainItems, type ObjectSource } from "../domain.js";
import type { FNode } from "../fnode.js";
import { Substituter } from "./substituter.js";

/**
 * Expands `exists` into a disjunction and `forall` into a conjunction over
 * every assignment of the bound variables, innermost quantifiers first.
 * An empty domain yields `false` for `exists` and `true` for `forall`.
 */
export class QuantifiersRemover {
  private readonly substituter: Substituter;

  constructor(private readonly problem: ObjectSource) {
    this.substituter = new Substituter(problem.environment);
  }

  removeQuantifiers(expression: FNode): FNode {
    const memo = new Map<FNode, FNode>();
    const walk = (node: FNode): FNode => {
      const cached = memo.get(node);
      if (cached) {
        return cached;
      }
      const em = this.problem.environment.expressions;
      const args = node.args.map(walk);
      let result: FNode;
      if (node.isExists() || node.isForall()) {
        const variables = node.variables();
        const body = args[0] ?? node.arg(0);
        const variableNodes = variables.map((variable) => em.variableExp(variable));
        const assignments = cartesianProduct(variables.map((variable) => domainItems(this.problem, variable.type)));
        const instances = [...assignments].map((values) =>
          this.substituter.substitute(
            body,
            new Map(variableNodes.map((variableNode, index) => [variableNode, values[index] ?? variableNode])),
          ),
        );
        result = node.isExists() ? em.or(instances) : em.and(instances);
      } else {
        result = em.rebuild(node, args);
      }
      memo.set(node, result);
      return result;
    };
    return walk(expression);
  }
}
