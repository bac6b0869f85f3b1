import { formatErrorMessage } from "./error-format.js";
import { ExecaExternalTool, type ExternalTool } from "./external-tool.js";
import type { TextLogFile } from "./logger.js";
import { logsRootDir, summaryPath, unitArtifactPaths, unitLogPath } from "./paths.js";
import type { RunConfig } from "./run-config.js";
import { RunLogger, type LineSink } from "./run-logger.js";
import { scanUnits } from "./scanner.js";
import { StageRunner, checkArtifact, type StageReport } from "./stage-runner.js";
import { STAGES, type StageContext, type StageName } from "./stages.js";
import {
  SummaryAccumulator,
  describeOutcome,
  formatSummaryLines,
  type RunSummary,
  type UnitOutcome,
} from "./summary.js";
import { resolveThreadBudget, type ThreadBudget } from "./thread-budget.js";
import type { WorkUnit } from "./unit-identity.js";
import { ensureDir, fileSize, formatBytes, writeJsonFile } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineDeps = {
  tool?: ExternalTool;
  env?: NodeJS.ProcessEnv;
  echo?: LineSink;
  echoWarning?: LineSink;
};

export type PipelineResult = {
  summary: RunSummary;
  units: WorkUnit[];
  budget: ThreadBudget;
  masterLogPath: string;
  eventsLogPath: string;
  summaryPath: string;
};

type UnitRunContext = {
  config: RunConfig;
  logger: RunLogger;
  runner: StageRunner;
  threads: number;
};

// =============================================================================
// DRIVER
// =============================================================================

/**
 * Run every discovered unit through merge → align → call-modifications → QC.
 *
 * Only configuration and discovery problems reject; per-unit failures end up
 * in the returned summary.
 */
export async function runPipeline(
  config: RunConfig,
  deps: PipelineDeps = {},
): Promise<PipelineResult> {
  const budget = resolveThreadBudget({
    requested: config.threads,
    resources: config.settings.resources,
    env: deps.env,
  });

  // Discovery touches nothing on disk, so a bad layout leaves no trace.
  const scan = await scanUnits(config.inputRoot, config.settings.layout);

  await ensureDir(logsRootDir(config.outputRoot));
  const logger = new RunLogger({
    outputRoot: config.outputRoot,
    timestamp: config.timestamp,
    echo: deps.echo,
    echoWarning: deps.echoWarning,
  });

  try {
    logger.banner("Nanopore modification pipeline");
    logger.info("Configuration:");
    logger.info(`  Input directory:    ${config.inputRoot}`);
    logger.info(`  Output directory:   ${config.outputRoot}`);
    const refSize = await fileSize(config.referenceGenome);
    logger.info(
      `  Reference genome:   ${config.referenceGenome}${refSize === null ? "" : ` (${formatBytes(refSize)})`}`,
    );
    logger.info(`  Threads:            ${budget.effective}`);
    logger.info(`  Dry run mode:       ${config.dryRun}`);
    logger.info(`  Master log:         ${logger.masterLogPath}`);
    logger.info();
    logger.event("run.start", undefined, {
      input_root: config.inputRoot,
      output_root: config.outputRoot,
      reference: config.referenceGenome,
      threads_requested: budget.requested,
      threads: budget.effective,
      allocation: budget.allocation,
      allocation_source: budget.allocationSource,
      dry_run: config.dryRun,
    });

    if (budget.warning) {
      logger.warn(budget.warning.message);
      logger.event("threads.clamped", undefined, {
        requested: budget.requested,
        allocation: budget.allocation,
      });
    }

    logDiscovery(logger, scan.units, scan.matcher.pattern);
    if (config.dryRun) {
      logger.banner("DRY RUN MODE - No processing will occur");
      logger.info();
    }

    const tool = deps.tool ?? new ExecaExternalTool(deps.env);
    const runner = new StageRunner({ tool, logger });
    const accumulator = new SummaryAccumulator(config.dryRun);
    const ctx: UnitRunContext = { config, logger, runner, threads: budget.effective };

    for (const [idx, unit] of scan.units.entries()) {
      const outcome = await processUnit(ctx, unit, idx + 1, scan.units.length);
      accumulator.record(unit, outcome);
    }

    const summary = accumulator.build();
    const outPath = summaryPath(config.outputRoot, config.timestamp);
    await writeJsonFile(outPath, { timestamp: config.timestamp, ...summary });

    logger.banner("Pipeline complete");
    logger.info(`Processed: ${summary.totals.units} sample(s)`);
    logger.info(`Threads used: ${budget.effective}`);
    logger.info(`Output directory: ${config.outputRoot}`);
    logger.info(`Master log: ${logger.masterLogPath}`);
    logger.info();
    for (const line of formatSummaryLines(summary)) logger.info(line);
    logger.event("run.complete", undefined, {
      units: summary.totals.units,
      completed: summary.totals.completed,
      skipped_no_input: summary.totals.skipped_no_input,
      failed_stage: summary.totals.failed_stage,
    });

    return {
      summary,
      units: scan.units,
      budget,
      masterLogPath: logger.masterLogPath,
      eventsLogPath: logger.eventsLogPath,
      summaryPath: outPath,
    };
  } finally {
    logger.close();
  }
}

function logDiscovery(logger: RunLogger, units: WorkUnit[], pattern: string): void {
  logger.info(`Found ${units.length} sample(s) to process (pattern ${pattern}/)`);

  const perLibrary = new Map<string, number>();
  for (const unit of units) {
    perLibrary.set(unit.libraryCode, (perLibrary.get(unit.libraryCode) ?? 0) + 1);
  }
  logger.info("Sample distribution by library:");
  const sorted = [...perLibrary.entries()].sort(([a], [b]) => a.localeCompare(b));
  for (const [library, count] of sorted) {
    logger.info(`  ${library}: ${count} sample(s)`);
  }
  logger.info();

  logger.event("run.discovery", undefined, {
    pattern,
    units: units.map((u) => u.relativePath),
  });
}

// =============================================================================
// UNIT
// =============================================================================

async function processUnit(
  ctx: UnitRunContext,
  unit: WorkUnit,
  position: number,
  total: number,
): Promise<UnitOutcome> {
  const { config, logger } = ctx;
  const paths = unitArtifactPaths(config.outputRoot, unit);

  logger.banner(`Sample ${position} of ${total}`);
  logger.info(`Sample ID:     ${unit.sampleName}`);
  logger.info(`Library:       ${unit.libraryCode}`);
  logger.info(`Batch:         ${unit.batchCode}`);
  logger.info(`Input path:    ${unit.inputPath}`);
  logger.info(`Output dir:    ${paths.outputDir}`);
  logger.info(`Sample log:    ${unitLogPath(config.outputRoot, unit)}`);
  logger.info();
  logger.event("unit.start", unit, { input_path: unit.inputPath, layout: unit.layout });

  const stageCtx: StageContext = {
    unit,
    paths,
    referenceGenome: config.referenceGenome,
    threads: ctx.threads,
    settings: config.settings,
  };
  const outcome = await runUnit(ctx, stageCtx);

  if (outcome.status === "completed") {
    logger.info(
      config.dryRun
        ? `Sample ${unit.sampleName} checked (dry run)`
        : `Sample ${unit.sampleName} complete!`,
    );
  } else {
    logger.info(`Sample ${unit.sampleName} ${describeOutcome(outcome)}`);
  }
  logger.info();
  logger.event("unit.outcome", unit, { ...outcome });
  return outcome;
}

async function runUnit(ctx: UnitRunContext, stageCtx: StageContext): Promise<UnitOutcome> {
  const { logger } = ctx;

  let unitLog: TextLogFile;
  try {
    await ensureDir(stageCtx.paths.outputDir);
    unitLog = logger.openUnitLog(stageCtx.unit);
  } catch (err) {
    // Nothing has run yet, so the unit is charged to the first stage.
    const first = STAGES[0];
    const reason = `could not prepare unit output: ${formatErrorMessage(err)}`;
    logger.info(`  FAILED: ${reason}`);
    logger.event("stage.failed", stageCtx.unit, { stage: first.name, reason, exit_code: null });
    return { status: "failed_stage", stageIndex: first.index, stage: first.name, reason };
  }

  try {
    return await runUnitStages(ctx, stageCtx, unitLog);
  } finally {
    logger.closeUnitLog(unitLog);
  }
}

async function runUnitStages(
  ctx: UnitRunContext,
  stageCtx: StageContext,
  unitLog: TextLogFile,
): Promise<UnitOutcome> {
  const { config, logger, runner } = ctx;
  const superseded = config.dryRun ? new Set<StageName>() : await findSupersededStages(stageCtx);

  for (const stage of STAGES) {
    if (superseded.has(stage.name)) {
      logger.info(`Step ${stage.index}/${STAGES.length}: ${stage.title}`);
      logger.info("  Not needed: downstream artifacts already complete");
      logger.event("stage.superseded", stageCtx.unit, { stage: stage.name });
      continue;
    }

    let report: StageReport;
    try {
      report = await runner.run(stage, stageCtx, unitLog, { dryRun: config.dryRun });
    } catch (err) {
      const reason = formatErrorMessage(err);
      logger.info(`  FAILED: ${reason}`);
      unitLog.line(`FAILED: ${reason}`);
      logger.event("stage.failed", stageCtx.unit, { stage: stage.name, reason, exit_code: null });
      return { status: "failed_stage", stageIndex: stage.index, stage: stage.name, reason };
    }

    logger.info();
    switch (report.status) {
      case "completed":
      case "skipped":
      case "dry_run":
        continue;
      case "no_input":
        return { status: "skipped_no_input", reason: report.reason };
      case "failed":
        return {
          status: "failed_stage",
          stageIndex: stage.index,
          stage: stage.name,
          reason: report.error.message,
        };
    }
  }

  return { status: "completed" };
}

/**
 * Stages whose artifact is incomplete but whose consumers are all satisfied,
 * e.g. a merged BAM deleted after the aligned BAM was produced.
 */
export async function findSupersededStages(ctx: StageContext): Promise<Set<StageName>> {
  const complete = new Map<StageName, boolean>();
  const satisfied = new Map<StageName, boolean>();

  for (const stage of [...STAGES].reverse()) {
    const check = await checkArtifact(stage.artifact(ctx));
    complete.set(stage.name, check.complete);
    const viaConsumers =
      stage.consumers.length > 0 && stage.consumers.every((name) => satisfied.get(name) === true);
    satisfied.set(stage.name, check.complete || viaConsumers);
  }

  const superseded = new Set<StageName>();
  for (const stage of STAGES) {
    if (!complete.get(stage.name) && satisfied.get(stage.name)) {
      superseded.add(stage.name);
    }
  }
  return superseded;
}
