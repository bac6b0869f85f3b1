import path from "node:path";

import type { UnitIdentity } from "./unit-identity.js";

// =============================================================================
// RUN-LEVEL PATHS
// =============================================================================

export function logsRootDir(outputRoot: string): string {
  return path.join(outputRoot, "logs");
}

export function masterLogPath(outputRoot: string, timestamp: string): string {
  return path.join(logsRootDir(outputRoot), `pipeline_master_log_${timestamp}.txt`);
}

export function eventsLogPath(outputRoot: string, timestamp: string): string {
  return path.join(logsRootDir(outputRoot), `pipeline_events_${timestamp}.jsonl`);
}

export function summaryPath(outputRoot: string, timestamp: string): string {
  return path.join(logsRootDir(outputRoot), `run_summary_${timestamp}.json`);
}

// =============================================================================
// UNIT PATHS
// =============================================================================

export function unitOutputDir(outputRoot: string, unit: UnitIdentity): string {
  return path.join(outputRoot, unit.libraryCode, unit.batchCode, unit.sampleName);
}

export function unitLogDir(outputRoot: string, unit: UnitIdentity): string {
  return path.join(logsRootDir(outputRoot), unit.libraryCode, unit.batchCode);
}

export function unitLogPath(outputRoot: string, unit: UnitIdentity): string {
  return path.join(unitLogDir(outputRoot, unit), `${unit.sampleName}.log`);
}

export type UnitArtifactPaths = {
  outputDir: string;
  rawFileList: string;
  merged: string;
  aligned: string;
  alignTmpPrefix: string;
  modifications: string;
  qcDir: string;
};

export function unitArtifactPaths(outputRoot: string, unit: UnitIdentity): UnitArtifactPaths {
  const outputDir = unitOutputDir(outputRoot, unit);
  const sample = unit.sampleName;
  return {
    outputDir,
    rawFileList: path.join(outputDir, "bam_list.txt"),
    merged: path.join(outputDir, `${sample}.merged.bam`),
    aligned: path.join(outputDir, `${sample}.minimap.bam`),
    alignTmpPrefix: path.join(outputDir, "reads.tmp"),
    modifications: path.join(outputDir, `${sample}.CpG.bed`),
    qcDir: path.join(outputDir, "qualimap"),
  };
}
