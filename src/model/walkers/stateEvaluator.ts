import { ExpressionDefinitionError, UsageError } from "../../errors.js";
import { cartesianProduct, domainItems, type ObjectSource } from "../domain.js";
import type { FNode } from "../fnode.js";
import { Substituter } from "./substituter.js";

/** Value of a ground fluent application in some state. */
export type StateLookup = (fluentExpression: FNode) => FNode;

/**
 * Evaluates a ground expression to a constant in a given state. Interpreted
 * functions are called with their evaluated arguments.
 */
export class StateEvaluator {
  private readonly substituter: Substituter;

  constructor(private readonly problem: ObjectSource) {
    this.substituter = new Substituter(problem.environment);
  }

  evaluate(expression: FNode, state: StateLookup): FNode {
    const em = this.problem.environment.expressions;
    const value = (node: FNode): FNode => this.evaluate(node, state);
    const truth = (node: FNode): boolean => value(node).boolConstantValue();
    const number = (node: FNode): number => value(node).numericConstantValue();
    const numeric = (result: number, ...operands: FNode[]): FNode =>
      operands.some((operand) => operand.type.kind === "real") || !Number.isInteger(result)
        ? em.real(result)
        : em.int(result);

    switch (expression.kind) {
      case "bool_constant":
      case "int_constant":
      case "real_constant":
      case "object_exp":
        return expression;
      case "param_exp":
      case "variable_exp":
        throw new UsageError(`cannot evaluate non-ground expression ${expression.toString()}`);
      case "fluent_exp":
        return state(em.fluentExp(expression.fluent(), expression.args.map(value)));
      case "dot":
        return value(expression.arg(0));
      case "and":
        return em.bool(expression.args.every(truth));
      case "or":
        return em.bool(expression.args.some(truth));
      case "not":
        return em.bool(!truth(expression.arg(0)));
      case "implies":
        return em.bool(!truth(expression.arg(0)) || truth(expression.arg(1)));
      case "iff":
        return em.bool(truth(expression.arg(0)) === truth(expression.arg(1)));
      case "exists":
      case "forall": {
        const variables = expression.variables();
        const keys = variables.map((variable) => em.variableExp(variable));
        const instances = [...cartesianProduct(variables.map((variable) => domainItems(this.problem, variable.type)))].map(
          (values) =>
            this.substituter.substitute(
              expression.arg(0),
              new Map(keys.map((key, index) => [key, values[index] ?? key])),
            ),
        );
        return em.bool(expression.isExists() ? instances.some(truth) : instances.every(truth));
      }
      case "equals": {
        const left = value(expression.arg(0));
        const right = value(expression.arg(1));
        if (left.isNumericConstant() && right.isNumericConstant()) {
          return em.bool(left.numericConstantValue() === right.numericConstantValue());
        }
        return em.bool(left === right);
      }
      case "le":
        return em.bool(number(expression.arg(0)) <= number(expression.arg(1)));
      case "lt":
        return em.bool(number(expression.arg(0)) < number(expression.arg(1)));
      case "plus":
        return numeric(expression.args.reduce((sum, arg) => sum + number(arg), 0), ...expression.args);
      case "minus":
        return numeric(number(expression.arg(0)) - number(expression.arg(1)), ...expression.args);
      case "times":
        return numeric(expression.args.reduce((product, arg) => product * number(arg), 1), ...expression.args);
      case "div":
        return em.real(number(expression.arg(0)) / number(expression.arg(1)));
      case "interpreted_function_exp": {
        const fn = expression.interpretedFunction();
        if (!fn.implementation) {
          throw new ExpressionDefinitionError(`interpreted function ${fn.name} has no implementation`);
        }
        return em.promote(fn.implementation(...expression.args.map(value)));
      }
      case "always":
      case "sometime":
      case "sometime_before":
      case "sometime_after":
      case "at_most_once":
        throw new ExpressionDefinitionError(
          `trajectory constraint ${expression.toString()} cannot be evaluated in a single state`,
        );
    }
  }
}
