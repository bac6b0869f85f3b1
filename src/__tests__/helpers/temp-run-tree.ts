import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { PipelineSettingsSchema, type PipelineSettings } from "../../core/config.js";
import type { RunConfig } from "../../core/run-config.js";

// =============================================================================
// TYPES
// =============================================================================

export type TempRunTree = {
  root: string;
  inputRoot: string;
  outputRoot: string;
  reference: string;
  // Relative sample dir -> raw file names to create inside it.
  addSample: (relDir: string, rawFiles: string[]) => Promise<string>;
  config: (overrides?: Partial<RunConfig>) => RunConfig;
  cleanup: () => Promise<void>;
};

export const PRIMARY_SUBPATH = "fastq_gpu_hac_only_5mc_mod";

// Thresholds low enough for the fake tools' artifacts to count as complete.
export function testSettings(): PipelineSettings {
  return PipelineSettingsSchema.parse({
    thresholds: { merged_min_bytes: 10, aligned_min_bytes: 10, modifications_min_bytes: 10 },
  });
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createTempRunTree(): Promise<TempRunTree> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "modpipe-run-"));
  const inputRoot = path.join(root, "input");
  const outputRoot = path.join(root, "output");
  const reference = path.join(root, "ref", "genome.fna");

  await fs.mkdir(inputRoot, { recursive: true });
  await fs.mkdir(path.dirname(reference), { recursive: true });
  await fs.writeFile(reference, ">chr1\nACGTACGTCGCG\n", "utf8");

  const addSample = async (relDir: string, rawFiles: string[]): Promise<string> => {
    const dir = path.join(inputRoot, relDir);
    await fs.mkdir(dir, { recursive: true });
    for (const name of rawFiles) {
      await fs.writeFile(path.join(dir, name), "BAM\u0001", "utf8");
    }
    return dir;
  };

  const config = (overrides: Partial<RunConfig> = {}): RunConfig => ({
    inputRoot,
    outputRoot,
    referenceGenome: reference,
    threads: 8,
    dryRun: false,
    settings: testSettings(),
    timestamp: "20260101_120000",
    ...overrides,
  });

  const cleanup = async (): Promise<void> => {
    await fs.rm(root, { recursive: true, force: true });
  };

  return { root, inputRoot, outputRoot, reference, addSample, config, cleanup };
}
