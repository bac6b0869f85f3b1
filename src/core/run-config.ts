import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import type { PipelineSettings } from "./config.js";
import { loadPipelineSettings } from "./config-loader.js";
import { ConfigurationError } from "./errors.js";
import { runTimestamp } from "./utils.js";

export type RunOptionsInput = {
  input?: string;
  output?: string;
  reference?: string;
  threads?: string | number;
  dryRun?: boolean;
  config?: string;
  settings?: PipelineSettings;
  now?: Date;
};

export type RunConfig = Readonly<{
  inputRoot: string;
  outputRoot: string;
  referenceGenome: string;
  threads: number;
  dryRun: boolean;
  settings: PipelineSettings;
  // YYYYMMDD_HHMMSS, names the run's log files.
  timestamp: string;
}>;

export function parseThreadCount(value: string | number): number {
  const raw = String(value).trim();
  if (!/^[0-9]+$/.test(raw)) {
    throw new ConfigurationError(`Thread count must be a positive integer (got "${raw}").`);
  }
  const n = Number.parseInt(raw, 10);
  if (n < 1) {
    throw new ConfigurationError(`Thread count must be a positive integer (got "${raw}").`);
  }
  return n;
}

export async function assertReadable(
  label: string,
  target: string,
  kind: "file" | "directory",
): Promise<void> {
  let stat: fs.Stats;
  try {
    stat = await fse.stat(target);
  } catch (err) {
    throw new ConfigurationError(`${label} not found: ${target}`, err);
  }

  const matchesKind = kind === "file" ? stat.isFile() : stat.isDirectory();
  if (!matchesKind) {
    throw new ConfigurationError(`${label} is not a ${kind}: ${target}`);
  }

  try {
    await fse.access(target, fs.constants.R_OK);
  } catch (err) {
    throw new ConfigurationError(`${label} is not readable: ${target}`, err);
  }
}

export async function resolveRunConfig(opts: RunOptionsInput): Promise<RunConfig> {
  const missing = [
    opts.input ? null : "--input",
    opts.output ? null : "--output",
    opts.reference ? null : "--reference",
  ].filter((flag): flag is string => flag !== null);
  if (missing.length > 0 || !opts.input || !opts.output || !opts.reference) {
    throw new ConfigurationError(`Missing required arguments: ${missing.join(", ")}`);
  }

  const settings = opts.settings ?? loadPipelineSettings(opts.config);
  const threads = parseThreadCount(opts.threads ?? settings.resources.default_threads);

  const inputRoot = path.resolve(opts.input);
  const outputRoot = path.resolve(opts.output);
  const referenceGenome = path.resolve(opts.reference);

  await assertReadable("Input directory", inputRoot, "directory");
  await assertReadable("Reference genome", referenceGenome, "file");

  if (await fse.pathExists(outputRoot)) {
    const stat = await fse.stat(outputRoot);
    if (!stat.isDirectory()) {
      throw new ConfigurationError(`Output path exists and is not a directory: ${outputRoot}`);
    }
  }

  return Object.freeze({
    inputRoot,
    outputRoot,
    referenceGenome,
    threads,
    dryRun: opts.dryRun ?? false,
    settings,
    timestamp: runTimestamp(opts.now),
  });
}
