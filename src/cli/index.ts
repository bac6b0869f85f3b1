import { Command, Option } from "commander";

import { runCommand } from "./run.js";
import { scanCommand } from "./scan.js";

const VERSION = "0.1.0";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("modpipe")
    .description(
      "Batch nanopore methylation pipeline: merge BAMs, align with minimap2, call CpG modifications with modkit, QC with qualimap",
    )
    .version(VERSION)
    .option("--debug", "Show error codes, causes and stack traces", false)
    .addHelpText(
      "after",
      "\nExample:\n  modpipe -i /data/nanopore -o /results -r /ref/genome.fna -t 32",
    );

  program
    .command("run", { isDefault: true })
    .description("Process every discovered sample through all four stages")
    .allowExcessArguments(false)
    .requiredOption("-i, --input <dir>", "Input directory containing library (SRR) folders")
    .requiredOption("-o, --output <dir>", "Output directory for processed data")
    .option("-r, --reference <file>", "Path to reference genome FASTA file")
    .addOption(new Option("--ref <file>", "Alias of --reference").hideHelp())
    .option("-t, --threads <n>", "Number of threads to use (default: 40)")
    .option("--dry-run", "Discover samples and create directories without running any tool", false)
    .option("--config <path>", "YAML pipeline settings (tools, thresholds, layout)")
    .option("--debug", "Show error codes, causes and stack traces", false)
    .action(async (opts) => {
      await runCommand({
        input: opts.input,
        output: opts.output,
        reference: opts.reference ?? opts.ref,
        threads: opts.threads,
        dryRun: opts.dryRun,
        config: opts.config,
      });
    });

  program
    .command("scan")
    .description("List the samples the pipeline would process, without creating anything")
    .allowExcessArguments(false)
    .requiredOption("-i, --input <dir>", "Input directory containing library (SRR) folders")
    .option("--config <path>", "YAML pipeline settings (tools, thresholds, layout)")
    .option("--json", "Print units as JSON", false)
    .option("--debug", "Show error codes, causes and stack traces", false)
    .action(async (opts) => {
      await scanCommand({ input: opts.input, config: opts.config, json: opts.json });
    });

  return program;
}
