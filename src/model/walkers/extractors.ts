import type { FNode } from "../fnode.js";
import type { OperatorKind } from "../operators.js";
import type { Variable } from "../variable.js";

function visitOnce(expression: FNode, visit: (node: FNode) => void): void {
  const seen = new Set<FNode>();
  const stack: FNode[] = [expression];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node || seen.has(node)) {
      continue;
    }
    seen.add(node);
    visit(node);
    stack.push(...node.args);
  }
}

/** Every operator occurring in {@link expression}. */
export function collectOperators(expression: FNode): Set<OperatorKind> {
  const operators = new Set<OperatorKind>();
  visitOnce(expression, (node) => operators.add(node.kind));
  return operators;
}

/** Fluent applications occurring in {@link expression}, outer ones included. */
export function collectFluentExpressions(expression: FNode): Set<FNode> {
  const found = new Set<FNode>();
  visitOnce(expression, (node) => {
    if (node.isFluentExp()) {
      found.add(node);
    }
  });
  return found;
}

export function collectInterpretedFunctionExpressions(expression: FNode): Set<FNode> {
  const found = new Set<FNode>();
  visitOnce(expression, (node) => {
    if (node.isInterpretedFunctionExp()) {
      found.add(node);
    }
  });
  return found;
}

/** Variables occurring in {@link expression} outside the quantifiers binding them. */
export function collectFreeVariables(expression: FNode): Set<Variable> {
  const memo = new Map<FNode, ReadonlySet<Variable>>();
  const walk = (node: FNode): ReadonlySet<Variable> => {
    const cached = memo.get(node);
    if (cached) {
      return cached;
    }
    const free = new Set<Variable>();
    if (node.isVariableExp()) {
      free.add(node.variable());
    }
    for (const arg of node.args) {
      for (const variable of walk(arg)) {
        free.add(variable);
      }
    }
    if (node.isExists() || node.isForall()) {
      for (const bound of node.variables()) {
        free.delete(bound);
      }
    }
    memo.set(node, free);
    return free;
  };
  return new Set(walk(expression));
}

/** Parameters referenced by {@link expression}. */
export function hasParameters(expression: FNode): boolean {
  let found = false;
  visitOnce(expression, (node) => {
    found = found || node.isParameterExp();
  });
  return found;
}
