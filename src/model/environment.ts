import { ExpressionManager } from "./expression.js";
import { TypeManager } from "./types.js";
import { Dnf, Nnf } from "./walkers/normalForms.js";
import { Simplifier } from "./walkers/simplifier.js";
import { Substituter } from "./walkers/substituter.js";

/**
 * Owner of the type and expression managers. Every fluent, action and
 * problem is bound to one environment; nodes built by different environments
 * never compare equal.
 */
export class Environment {
  public readonly types = new TypeManager();
  public readonly expressions: ExpressionManager;
  private simplifierInstance: Simplifier | null = null;
  private substituterInstance: Substituter | null = null;
  private nnfInstance: Nnf | null = null;
  private dnfInstance: Dnf | null = null;

  constructor() {
    this.expressions = new ExpressionManager(this.types);
  }

  /** Problem-independent simplifier shared by the callers of this environment. */
  get simplifier(): Simplifier {
    this.simplifierInstance ??= new Simplifier(this);
    return this.simplifierInstance;
  }

  get substituter(): Substituter {
    this.substituterInstance ??= new Substituter(this);
    return this.substituterInstance;
  }

  get nnf(): Nnf {
    this.nnfInstance ??= new Nnf(this);
    return this.nnfInstance;
  }

  get dnf(): Dnf {
    this.dnfInstance ??= new Dnf(this);
    return this.dnfInstance;
  }
}

export function createEnvironment(): Environment {
  return new Environment();
}
