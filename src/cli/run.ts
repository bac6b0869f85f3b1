import { runPipeline, type PipelineDeps, type PipelineResult } from "../core/pipeline.js";
import { resolveRunConfig, type RunOptionsInput } from "../core/run-config.js";

export type RunCommandOptions = Pick<
  RunOptionsInput,
  "input" | "output" | "reference" | "threads" | "dryRun" | "config"
>;

/**
 * Resolves the run configuration and drives the pipeline. Configuration and
 * discovery errors propagate to the CLI entrypoint (non-zero exit); failed
 * samples do not change the exit code.
 */
export async function runCommand(
  opts: RunCommandOptions,
  deps: PipelineDeps = {},
): Promise<PipelineResult> {
  const config = await resolveRunConfig(opts);
  return runPipeline(config, deps);
}
