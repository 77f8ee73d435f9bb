import { loadCompilerConfig, type CompilerConfig } from "../config/compilerConfig.js";
import { UnsupportedProblemTypeError, UsageError } from "../errors.js";
import { StructuredLogger } from "../logger.js";
import type { Problem } from "../model/problem.js";
import type { ProblemKind } from "../model/problemKind.js";
import type { CompilationKind } from "./compilationKind.js";
import type { AnyProblem, CompilerResult } from "./results.js";

/** Options shared by every compiler. */
export interface CompilerOptions {
  /** Logger receiving the compiler lifecycle entries. Defaults to one built from the configuration. */
  logger?: StructuredLogger;
  /** Overrides applied on top of the environment configuration. */
  config?: Partial<CompilerConfig>;
}

/**
 * Base class of every problem transformation. Subclasses describe what they
 * accept through {@link supportedKind} and implement {@link compileProblem};
 * {@link compile} validates the input and logs the run.
 */
export abstract class Compiler<P extends AnyProblem = Problem> {
  abstract readonly name: string;
  protected readonly logger: StructuredLogger;
  protected readonly config: CompilerConfig;

  protected constructor(
    /** Kind applied when {@link compile} is called without one. */
    public readonly defaultCompilationKind: CompilationKind,
    options: CompilerOptions = {},
  ) {
    this.config = loadCompilerConfig(options.config);
    this.logger =
      options.logger ?? new StructuredLogger({ logFile: this.config.logFile, stdout: this.config.logToStdout });
  }

  abstract supportedKind(): ProblemKind;

  abstract supportsCompilation(compilationKind: CompilationKind): boolean;

  /** Kind of the problem this compiler outputs for an input of kind {@link problemKind}. */
  abstract resultingProblemKind(problemKind: ProblemKind, compilationKind?: CompilationKind): ProblemKind;

  supports(problemKind: ProblemKind): boolean {
    return problemKind.isSubsetOf(this.supportedKind());
  }

  compile(problem: P, compilationKind: CompilationKind = this.defaultCompilationKind): CompilerResult<P> {
    if (!this.supportsCompilation(compilationKind)) {
      throw new UsageError(`${this.name} cannot perform ${compilationKind}`, {
        compiler: this.name,
        compilationKind,
      });
    }
    const kind = problem.kind;
    if (!this.supports(kind)) {
      const unsupported = kind.difference(this.supportedKind());
      if (this.config.strictKindChecks) {
        throw new UnsupportedProblemTypeError(`${this.name} cannot handle this kind of problem!`, {
          compiler: this.name,
          problem: problem.name,
          unsupported,
        });
      }
      this.logger.warn("kind_check_relaxed", { compiler: this.name, problem: problem.name, unsupported });
    }
    this.logger.info("compiler_started", { compiler: this.name, problem: problem.name, compilationKind });
    const result = this.compileProblem(problem, compilationKind);
    this.logger.info("compiler_completed", {
      compiler: this.name,
      problem: problem.name,
      compiled: result.problem ? result.problem.name : null,
    });
    return result;
  }

  protected abstract compileProblem(problem: P, compilationKind: CompilationKind): CompilerResult<P>;
}
