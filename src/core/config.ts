import { z } from "zod";

const LayoutSchema = z.object({
  // Library directories directly under the input root, e.g. SRR12345678.
  library_glob: z.string().min(1).default("SRR*"),
  fixed_subpath: z.string().min(1).default("fastq_gpu_hac_only_5mc_mod"),
  // Sample names carry underscore-delimited metadata.
  sample_glob: z.string().min(1).default("*_*"),
  exclude_marker: z.string().min(1).default("unclassified"),
  raw_file_glob: z.string().min(1).default("**/*.bam"),
});

const ToolsSchema = z.object({
  shell: z.string().min(1).default("bash"),
  samtools: z.string().min(1).default("samtools"),
  minimap2: z.string().min(1).default("minimap2"),
  modkit: z.string().min(1).default("modkit"),
  qualimap: z.string().min(1).default("qualimap"),
});

const ResourcesSchema = z.object({
  default_threads: z.number().int().positive().default(40),
  default_allocation: z.number().int().positive().default(40),
  allocation_env: z.string().min(1).default("SLURM_CPUS_PER_TASK"),
});

const ThresholdsSchema = z.object({
  merged_min_bytes: z.number().int().nonnegative().default(100_000_000),
  aligned_min_bytes: z.number().int().nonnegative().default(100_000_000),
  modifications_min_bytes: z.number().int().nonnegative().default(100_000),
});

const QcSchema = z.object({
  window_size: z.number().int().positive().default(5000),
  // qualimap does not scale past this many threads.
  max_threads: z.number().int().positive().default(32),
  report_marker: z.string().min(1).default("qualimapReport.html"),
});

export const PipelineSettingsSchema = z
  .object({
    layout: LayoutSchema.default({}),
    tools: ToolsSchema.default({}),
    resources: ResourcesSchema.default({}),
    thresholds: ThresholdsSchema.default({}),
    qc: QcSchema.default({}),
  })
  .strict();

export type PipelineSettings = z.infer<typeof PipelineSettingsSchema>;
export type PipelineSettingsInput = z.input<typeof PipelineSettingsSchema>;

export function defaultPipelineSettings(): PipelineSettings {
  return PipelineSettingsSchema.parse({});
}
