import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import { InputValidationError, StageExecutionError, type PipelineError } from "./errors.js";
import type { ExternalTool, ToolInvocation, ToolResult } from "./external-tool.js";
import type { TextLogFile } from "./logger.js";
import type { RunLogger } from "./run-logger.js";
import {
  STAGE_COUNT,
  artifactDisplayPath,
  buildProbeInvocation,
  type ArtifactSpec,
  type StageContext,
  type StageDefinition,
} from "./stages.js";
import { applyStageCeiling } from "./thread-budget.js";
import { fileSize, formatBytes, formatDuration, writeTextFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type StageReport =
  | { status: "completed"; durationMs: number; artifactBytes: number | null }
  | { status: "skipped"; artifactBytes: number | null }
  | { status: "dry_run" }
  | { status: "no_input"; reason: string }
  | { status: "failed"; error: PipelineError };

export type ArtifactCheck = {
  path: string;
  // Exists (and for files, is non-empty).
  present: boolean;
  // Meets the completion threshold.
  complete: boolean;
  sizeBytes: number | null;
};

export type StageRunnerDeps = {
  tool: ExternalTool;
  logger: RunLogger;
};

export type StageRunOptions = {
  dryRun: boolean;
};

// =============================================================================
// ARTIFACT CHECKS
// =============================================================================

export async function checkArtifact(target: ArtifactSpec): Promise<ArtifactCheck> {
  if (target.kind === "marker") {
    const markerPath = path.join(target.dir, target.marker);
    const present = await fse.pathExists(markerPath);
    return { path: markerPath, present, complete: present, sizeBytes: null };
  }

  const sizeBytes = await fileSize(target.path);
  const present = sizeBytes !== null && sizeBytes > 0;
  return {
    path: target.path,
    present,
    complete: present && sizeBytes !== null && sizeBytes > target.minBytes,
    sizeBytes,
  };
}

function describeArtifact(check: ArtifactCheck): string {
  return check.sizeBytes === null ? check.path : `${check.path} (${formatBytes(check.sizeBytes)})`;
}

// =============================================================================
// RUNNER
// =============================================================================

export class StageRunner {
  constructor(private readonly deps: StageRunnerDeps) {}

  async run(
    stage: StageDefinition,
    ctx: StageContext,
    unitLog: TextLogFile,
    opts: StageRunOptions,
  ): Promise<StageReport> {
    const { logger } = this.deps;
    const unit = ctx.unit;
    logger.info(`Step ${stage.index}/${STAGE_COUNT}: ${stage.title}`);

    const threads = applyStageCeiling(ctx.threads, stage.threadCeiling(ctx.settings));

    if (opts.dryRun) {
      logger.info(`  [DRY RUN] Would run ${stage.name} with ${threads} threads`);
      logger.event("stage.dry_run", unit, { stage: stage.name, threads });
      return { status: "dry_run" };
    }

    const target = stage.artifact(ctx);
    const existing = await checkArtifact(target);
    if (existing.complete) {
      logger.info(`  Already exists: ${describeArtifact(existing)}`);
      logger.event("stage.skip", unit, {
        stage: stage.name,
        artifact: existing.path,
        size_bytes: existing.sizeBytes,
      });
      return { status: "skipped", artifactBytes: existing.sizeBytes };
    }

    if (threads < ctx.threads) {
      logger.info(`  (${stage.name} limited to ${threads} threads)`);
    }

    unitLog.line(`=== Step ${stage.index}/${STAGE_COUNT}: ${stage.title} ===`);

    if (stage.name === "merge") {
      const prepared = await this.prepareMergeInputs(stage, ctx, unitLog);
      if (prepared) return prepared;
    }

    let durationMs = 0;
    for (const invocation of stage.buildInvocations(ctx, threads)) {
      const result = await this.invoke(invocation, unitLog);
      durationMs += result.durationMs;

      if (result.exitCode !== 0) {
        const error = new StageExecutionError(
          result.signal
            ? `${invocation.label} was killed by ${result.signal}`
            : `${invocation.label} exited with code ${result.exitCode}`,
          stage.name,
          result.exitCode,
          durationMs,
        );
        return this.fail(stage, ctx, unitLog, error);
      }
    }

    const produced = await checkArtifact(target);
    if (!produced.present) {
      const error = new StageExecutionError(
        `tool reported success but artifact is missing: ${artifactDisplayPath(target)}`,
        stage.name,
        0,
        durationMs,
      );
      return this.fail(stage, ctx, unitLog, error);
    }

    logger.info(`  Complete (${formatDuration(durationMs)}): ${describeArtifact(produced)}`);
    logger.event("stage.complete", unit, {
      stage: stage.name,
      duration_ms: durationMs,
      threads,
      artifact: produced.path,
      size_bytes: produced.sizeBytes,
    });
    return { status: "completed", durationMs, artifactBytes: produced.sizeBytes };
  }

  // ---------------------------------------------------------------------------

  private async invoke(invocation: ToolInvocation, unitLog: TextLogFile): Promise<ToolResult> {
    unitLog.line(`$ ${invocation.argv.join(" ")}`);
    const result = await this.deps.tool.invoke(invocation);
    unitLog.block(result.stdout);
    unitLog.block(result.stderr);
    unitLog.line(
      `[${invocation.label}] exit=${result.exitCode}${result.signal ? ` signal=${result.signal}` : ""} duration=${formatDuration(result.durationMs)}`,
    );
    return result;
  }

  private fail(
    stage: StageDefinition,
    ctx: StageContext,
    unitLog: TextLogFile,
    error: PipelineError,
  ): StageReport {
    this.deps.logger.info(`  FAILED: ${error.message}`);
    unitLog.line(`FAILED: ${error.message}`);
    this.deps.logger.event("stage.failed", ctx.unit, {
      stage: stage.name,
      reason: error.message,
      exit_code: error instanceof StageExecutionError ? error.exitCode : null,
      duration_ms: error instanceof StageExecutionError ? error.durationMs : null,
    });
    return { status: "failed", error };
  }

  /**
   * Finds and probes the unit's raw files, then writes the list of valid ones
   * for `samtools cat -b`. Returns a report only when the stage must stop.
   */
  private async prepareMergeInputs(
    stage: StageDefinition,
    ctx: StageContext,
    unitLog: TextLogFile,
  ): Promise<StageReport | null> {
    const { logger } = this.deps;
    const pattern = ctx.settings.layout.raw_file_glob;

    const rawFiles = (
      await fg(pattern, { cwd: ctx.unit.inputPath, absolute: true, onlyFiles: true })
    ).sort();
    logger.info(`  Found: ${rawFiles.length} BAM files`);

    const [first, ...rest] = rawFiles;
    if (first === undefined) {
      const reason = `no raw files matching ${pattern} in ${ctx.unit.inputPath}`;
      logger.warn(`${reason} - skipping this sample`);
      unitLog.line(reason);
      logger.event("stage.no_input", ctx.unit, { stage: stage.name, pattern });
      return { status: "no_input", reason };
    }

    const header = await this.invoke(buildProbeInvocation(ctx, first, true), unitLog);
    if (header.exitCode !== 0) {
      const error = new InputValidationError(`BAM header problem in ${first}`, first);
      return this.fail(stage, ctx, unitLog, error);
    }

    const valid = [first];
    const excluded: string[] = [];
    for (const file of rest) {
      const probe = await this.invoke(buildProbeInvocation(ctx, file, false), unitLog);
      if (probe.exitCode === 0) {
        valid.push(file);
        continue;
      }
      const error = new InputValidationError(`Corrupt BAM: ${file}`, file);
      excluded.push(file);
      unitLog.line(error.message);
      logger.warn(error.message);
    }

    if (excluded.length > 0) {
      logger.event("merge.inputs_excluded", ctx.unit, { excluded });
    }

    await writeTextFile(ctx.paths.rawFileList, `${valid.join("\n")}\n`);
    logger.info(`  Merging ${valid.length} BAM files (using ${ctx.threads} threads)...`);
    return null;
  }
}
