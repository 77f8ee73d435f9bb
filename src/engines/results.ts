import type { Problem } from "../model/problem.js";
import type { MultiAgentProblem } from "../model/multiAgent/maProblem.js";
import type { MapBackActionInstance } from "../plans/actionInstance.js";

/** Either kind of problem a compiler accepts and produces. */
export type AnyProblem = Problem | MultiAgentProblem;

/**
 * Output of a compilation. `problem` is `null` when the compiler proved the
 * input unsolvable; the map-back function then has nothing to translate.
 */
export interface CompilerResult<P extends AnyProblem = AnyProblem> {
  readonly problem: P | null;
  readonly mapBackActionInstance: MapBackActionInstance;
  readonly engineName: string;
}
