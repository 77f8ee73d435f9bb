import { UsageError } from "../errors.js";
import { StructuredLogger, createSilentLogger } from "../logger.js";
import type { Problem } from "../model/problem.js";
import type { ActionInstance, MapBackActionInstance } from "../plans/actionInstance.js";
import type { Compiler } from "./compiler.js";
import type { AnyProblem, CompilerResult } from "./results.js";

export interface CompilersPipelineOptions {
  logger?: StructuredLogger;
}

/** Applies every map-back in order, stopping at the first `null`. */
export function composeMapBacks(mapBacks: readonly MapBackActionInstance[]): MapBackActionInstance {
  return (instance) => {
    let current: ActionInstance | null = instance;
    for (const mapBack of mapBacks) {
      if (!current) {
        break;
      }
      current = mapBack(current);
    }
    return current;
  };
}

/**
 * Runs a fixed sequence of compilers, each on the output of the previous one,
 * and maps plans of the last problem back to the first.
 */
export class CompilersPipeline<P extends AnyProblem = Problem> {
  readonly name: string;
  private readonly logger: StructuredLogger;

  constructor(
    private readonly stages: readonly Compiler<P>[],
    options: CompilersPipelineOptions = {},
  ) {
    this.name = `CompilersPipeline[${stages.map((stage) => stage.name).join(", ")}]`;
    this.logger = options.logger ?? createSilentLogger();
  }

  compile(problem: P): CompilerResult<P> {
    let current: P = problem;
    const mapBacks: MapBackActionInstance[] = [];
    for (const stage of this.stages) {
      if (!stage.supports(current.kind)) {
        throw new UsageError(`${stage.name} cannot handle this kind of problem!`, {
          pipeline: this.name,
          stage: stage.name,
          unsupported: current.kind.difference(stage.supportedKind()),
        });
      }
      const result = stage.compile(current);
      mapBacks.unshift(result.mapBackActionInstance);
      this.logger.info("pipeline_stage_completed", {
        pipeline: this.name,
        stage: stage.name,
        compiled: result.problem ? result.problem.name : null,
      });
      if (!result.problem) {
        return { problem: null, mapBackActionInstance: composeMapBacks(mapBacks), engineName: this.name };
      }
      current = result.problem;
    }
    return { problem: current, mapBackActionInstance: composeMapBacks(mapBacks), engineName: this.name };
  }
}
