import path from "node:path";

import { loadPipelineSettings } from "../core/config-loader.js";
import { assertReadable } from "../core/run-config.js";
import { scanUnits } from "../core/scanner.js";
import type { WorkUnit } from "../core/unit-identity.js";

export type ScanCommandOptions = {
  input: string;
  config?: string;
  json?: boolean;
  print?: (line: string) => void;
};

export function formatUnitLine(unit: WorkUnit): string {
  return `${unit.relativePath}\tlibrary=${unit.libraryCode}\tbatch=${unit.batchCode}\tsample=${unit.sampleName}`;
}

export async function scanCommand(opts: ScanCommandOptions): Promise<WorkUnit[]> {
  const print = opts.print ?? ((line: string) => console.log(line));
  const settings = loadPipelineSettings(opts.config);
  const inputRoot = path.resolve(opts.input);
  await assertReadable("Input directory", inputRoot, "directory");

  const { units, matcher } = await scanUnits(inputRoot, settings.layout);

  if (opts.json) {
    print(JSON.stringify({ input_root: inputRoot, layout: matcher.name, units }, null, 2));
    return units;
  }

  print(`Found ${units.length} sample(s) in ${inputRoot} (layout ${matcher.name}: ${matcher.pattern}/)`);
  for (const unit of units) {
    print(formatUnitLine(unit));
  }
  return units;
}
