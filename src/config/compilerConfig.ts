import { readBool, readOptionalString } from "./env.js";

/** Runtime knobs shared by every compiler. */
export interface CompilerConfig {
  /**
   * When `true` a compiler refuses problems outside its supported kind;
   * when `false` it logs `kind_check_relaxed` and proceeds.
   */
  readonly strictKindChecks: boolean;
  /** Enables static-fluent pruning of candidate parameters in the grounder. */
  readonly groundingPruning: boolean;
  /** Optional file receiving a JSON-lines mirror of the compiler logs. */
  readonly logFile: string | null;
  /** Whether compiler logs are echoed on stdout. */
  readonly logToStdout: boolean;
}

/** Environment variables consulted by {@link loadCompilerConfig}. */
export const COMPILER_ENV_VARIABLES = {
  strictKindChecks: "PLANNING_STRICT_KIND_CHECKS",
  groundingPruning: "PLANNING_GROUNDER_PRUNING",
  logFile: "PLANNING_LOG_FILE",
  logToStdout: "PLANNING_LOG_STDOUT",
} as const;

/**
 * Resolves the compiler configuration from the environment, applying the
 * explicit overrides last.
 */
export function loadCompilerConfig(overrides: Partial<CompilerConfig> = {}): CompilerConfig {
  return {
    strictKindChecks:
      overrides.strictKindChecks ?? readBool(COMPILER_ENV_VARIABLES.strictKindChecks, true),
    groundingPruning:
      overrides.groundingPruning ?? readBool(COMPILER_ENV_VARIABLES.groundingPruning, true),
    logFile:
      overrides.logFile !== undefined
        ? overrides.logFile
        : readOptionalString(COMPILER_ENV_VARIABLES.logFile) ?? null,
    logToStdout: overrides.logToStdout ?? readBool(COMPILER_ENV_VARIABLES.logToStdout, false),
  };
}
