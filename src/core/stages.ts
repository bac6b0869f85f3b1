import path from "node:path";

import type { PipelineSettings } from "./config.js";
import type { ToolInvocation } from "./external-tool.js";
import type { UnitArtifactPaths } from "./paths.js";
import type { WorkUnit } from "./unit-identity.js";
import { bashSingleQuote } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type StageName = "merge" | "align" | "call_modifications" | "quality_control";

export type ArtifactSpec =
  | { kind: "file"; path: string; minBytes: number }
  | { kind: "marker"; dir: string; marker: string };

export type StageContext = {
  unit: WorkUnit;
  paths: UnitArtifactPaths;
  referenceGenome: string;
  // Thread count after the run-level clamp; stage ceilings apply on top.
  threads: number;
  settings: PipelineSettings;
};

export type StageDefinition = {
  name: StageName;
  // 1-based position in the pipeline.
  index: number;
  title: string;
  // Stages that read this stage's artifact.
  consumers: StageName[];
  artifact(ctx: StageContext): ArtifactSpec;
  threadCeiling(settings: PipelineSettings): number | undefined;
  buildInvocations(ctx: StageContext, threads: number): ToolInvocation[];
};

export const STAGE_COUNT = 4;

// =============================================================================
// COMMAND HELPERS
// =============================================================================

function shellPipeline(shell: string, commands: string[][]): string[] {
  const script = commands.map((argv) => argv.map(bashSingleQuote).join(" ")).join(" | ");
  return [shell, "-c", `set -euo pipefail; ${script}`];
}

function indexInvocation(
  stage: StageName,
  ctx: StageContext,
  threads: number,
  bamPath: string,
): ToolInvocation {
  return {
    label: `${stage}:index`,
    argv: [ctx.settings.tools.samtools, "index", "-@", String(threads), bamPath],
    cwd: ctx.paths.outputDir,
    threads,
  };
}

export function buildProbeInvocation(
  ctx: StageContext,
  rawFile: string,
  headerOnly: boolean,
): ToolInvocation {
  const { samtools } = ctx.settings.tools;
  const threads = ctx.threads;
  // Header-only for the first file (it donates the merged header); a full
  // record count for the rest catches truncated or corrupt blocks.
  const argv = headerOnly
    ? [samtools, "view", "-@", String(threads), "-H", rawFile]
    : [samtools, "view", "-@", String(threads), "-c", rawFile];
  return { label: "merge:probe", argv, cwd: ctx.paths.outputDir, threads };
}

// =============================================================================
// STAGES
// =============================================================================

const mergeStage: StageDefinition = {
  name: "merge",
  index: 1,
  title: "Merging BAM files with methylation tags",
  consumers: ["align"],
  artifact: (ctx) => ({
    kind: "file",
    path: ctx.paths.merged,
    minBytes: ctx.settings.thresholds.merged_min_bytes,
  }),
  threadCeiling: () => undefined,
  buildInvocations(ctx, threads) {
    const { samtools, shell } = ctx.settings.tools;
    const t = String(threads);
    return [
      {
        label: "merge:cat-sort",
        argv: shellPipeline(shell, [
          [samtools, "cat", "-b", ctx.paths.rawFileList, "-o", "-"],
          [
            samtools,
            "sort",
            "-@",
            t,
            "-o",
            ctx.paths.merged,
            "-T",
            path.join(ctx.paths.outputDir, "merge.tmp"),
            "-",
          ],
        ]),
        cwd: ctx.paths.outputDir,
        threads,
      },
      indexInvocation("merge", ctx, threads, ctx.paths.merged),
    ];
  },
};

const alignStage: StageDefinition = {
  name: "align",
  index: 2,
  title: "Aligning reads with minimap2",
  consumers: ["call_modifications", "quality_control"],
  artifact: (ctx) => ({
    kind: "file",
    path: ctx.paths.aligned,
    minBytes: ctx.settings.thresholds.aligned_min_bytes,
  }),
  threadCeiling: () => undefined,
  buildInvocations(ctx, threads) {
    const { samtools, minimap2, shell } = ctx.settings.tools;
    const t = String(threads);
    return [
      {
        label: "align:map",
        // -T MM,ML carries the modification tags into FASTQ and -y copies
        // them back onto the aligned records.
        argv: shellPipeline(shell, [
          [samtools, "fastq", "-@", t, "-T", "MM,ML", ctx.paths.merged],
          [minimap2, "-ax", "map-ont", "-t", t, "-y", "--secondary=no", ctx.referenceGenome, "-"],
          [samtools, "view", "-@", t, "-b", "-"],
          [samtools, "sort", "-@", t, "-o", ctx.paths.aligned, "-T", ctx.paths.alignTmpPrefix, "-"],
        ]),
        cwd: ctx.paths.outputDir,
        threads,
      },
      indexInvocation("align", ctx, threads, ctx.paths.aligned),
    ];
  },
};

const callModificationsStage: StageDefinition = {
  name: "call_modifications",
  index: 3,
  title: "Calling methylation with modkit",
  consumers: [],
  artifact: (ctx) => ({
    kind: "file",
    path: ctx.paths.modifications,
    minBytes: ctx.settings.thresholds.modifications_min_bytes,
  }),
  threadCeiling: () => undefined,
  buildInvocations(ctx, threads) {
    return [
      {
        label: "call_modifications:pileup",
        argv: [
          ctx.settings.tools.modkit,
          "pileup",
          ctx.paths.aligned,
          ctx.paths.modifications,
          "--cpg",
          "--ref",
          ctx.referenceGenome,
          "-t",
          String(threads),
          "--combine-mods",
        ],
        cwd: ctx.paths.outputDir,
        threads,
      },
    ];
  },
};

const qualityControlStage: StageDefinition = {
  name: "quality_control",
  index: 4,
  title: "Running Qualimap QC",
  consumers: [],
  artifact: (ctx) => ({ kind: "marker", dir: ctx.paths.qcDir, marker: ctx.settings.qc.report_marker }),
  threadCeiling: (settings) => settings.qc.max_threads,
  buildInvocations(ctx, threads) {
    return [
      {
        label: "quality_control:bamqc",
        argv: [
          ctx.settings.tools.qualimap,
          "bamqc",
          "-bam",
          ctx.paths.aligned,
          "-nw",
          String(ctx.settings.qc.window_size),
          "-nt",
          String(threads),
          "-c",
          "-outdir",
          ctx.paths.qcDir,
        ],
        cwd: ctx.paths.outputDir,
        threads,
      },
    ];
  },
};

export const STAGES: readonly StageDefinition[] = [
  mergeStage,
  alignStage,
  callModificationsStage,
  qualityControlStage,
];

export function stageByName(name: StageName): StageDefinition {
  const stage = STAGES.find((s) => s.name === name);
  if (!stage) throw new Error(`unknown stage: ${name}`);
  return stage;
}

export function artifactDisplayPath(target: ArtifactSpec): string {
  return target.kind === "file" ? target.path : path.join(target.dir, target.marker);
}
