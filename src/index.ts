export * from "./errors.js";
export { StructuredLogger, createSilentLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export { COMPILER_ENV_VARIABLES, loadCompilerConfig, type CompilerConfig } from "./config/compilerConfig.js";

export * from "./model/action.js";
export * from "./model/domain.js";
export * from "./model/effect.js";
export * from "./model/environment.js";
export * from "./model/expression.js";
export * from "./model/fluent.js";
export * from "./model/fnode.js";
export * from "./model/interpretedFunction.js";
export * from "./model/kindCollector.js";
export * from "./model/metrics.js";
export * from "./model/object.js";
export * from "./model/operators.js";
export * from "./model/parameter.js";
export * from "./model/problem.js";
export * from "./model/problemKind.js";
export * from "./model/timing.js";
export * from "./model/types.js";
export * from "./model/variable.js";
export * from "./model/multiAgent/agent.js";
export * from "./model/multiAgent/maProblem.js";
export * from "./model/walkers/extractors.js";
export * from "./model/walkers/normalForms.js";
export { QuantifiersRemover as ExpressionQuantifiersRemover } from "./model/walkers/quantifiersRemover.js";
export * from "./model/walkers/simplifier.js";
export * from "./model/walkers/stateEvaluator.js";
export * from "./model/walkers/substituter.js";

export * from "./plans/actionInstance.js";
export * from "./plans/sequentialPlan.js";

export * from "./engines/compilationKind.js";
export { Compiler, type CompilerOptions } from "./engines/compiler.js";
export * from "./engines/results.js";
export * from "./engines/compilersPipeline.js";
export * from "./engines/planValidator.js";
export * from "./engines/compilers/index.js";

export * from "./io/problemDocument.js";
