import { describe, expect, it } from "vitest";

import { defaultPipelineSettings } from "./config.js";
import { unitArtifactPaths } from "./paths.js";
import { STAGES, buildProbeInvocation, stageByName, type StageContext } from "./stages.js";
import type { WorkUnit } from "./unit-identity.js";

const unit: WorkUnit = {
  libraryCode: "SRR1",
  batchCode: "20240115",
  sampleName: "sample_A",
  inputPath: "/in/SRR1/pass/sample_A",
  relativePath: "SRR1/pass/sample_A",
  layout: "direct-pass",
};

function context(): StageContext {
  return {
    unit,
    paths: unitArtifactPaths("/out", unit),
    referenceGenome: "/ref/genome.fna",
    threads: 8,
    settings: defaultPipelineSettings(),
  };
}

describe("STAGES", () => {
  it("runs merge, align, call_modifications, quality_control in order", () => {
    expect(STAGES.map((s) => [s.index, s.name])).toEqual([
      [1, "merge"],
      [2, "align"],
      [3, "call_modifications"],
      [4, "quality_control"],
    ]);
  });
});

describe("buildInvocations", () => {
  it("merges the listed raw files through a sort and indexes the result", () => {
    const [catSort, index] = stageByName("merge").buildInvocations(context(), 8);

    expect(catSort?.argv).toEqual([
      "bash",
      "-c",
      "set -euo pipefail; 'samtools' 'cat' '-b' '/out/SRR1/20240115/sample_A/bam_list.txt' '-o' '-' | " +
        "'samtools' 'sort' '-@' '8' '-o' '/out/SRR1/20240115/sample_A/sample_A.merged.bam' " +
        "'-T' '/out/SRR1/20240115/sample_A/merge.tmp' '-'",
    ]);
    expect(catSort?.cwd).toBe("/out/SRR1/20240115/sample_A");
    expect(index).toMatchObject({
      label: "merge:index",
      argv: ["samtools", "index", "-@", "8", "/out/SRR1/20240115/sample_A/sample_A.merged.bam"],
    });
  });

  it("carries modification tags through alignment", () => {
    const [map] = stageByName("align").buildInvocations(context(), 8);
    const script = map?.argv[2] ?? "";

    expect(map?.label).toBe("align:map");
    expect(script).toContain("'samtools' 'fastq' '-@' '8' '-T' 'MM,ML'");
    expect(script).toContain(
      "'minimap2' '-ax' 'map-ont' '-t' '8' '-y' '--secondary=no' '/ref/genome.fna' '-'",
    );
    expect(script).toContain("'-T' '/out/SRR1/20240115/sample_A/reads.tmp'");
  });

  it("calls CpG modifications against the reference", () => {
    const [pileup] = stageByName("call_modifications").buildInvocations(context(), 8);

    expect(pileup?.argv).toEqual([
      "modkit",
      "pileup",
      "/out/SRR1/20240115/sample_A/sample_A.minimap.bam",
      "/out/SRR1/20240115/sample_A/sample_A.CpG.bed",
      "--cpg",
      "--ref",
      "/ref/genome.fna",
      "-t",
      "8",
      "--combine-mods",
    ]);
  });

  it("caps qualimap at its thread ceiling", () => {
    const qc = stageByName("quality_control");
    const settings = defaultPipelineSettings();

    expect(qc.threadCeiling(settings)).toBe(32);
    expect(qc.artifact(context())).toEqual({
      kind: "marker",
      dir: "/out/SRR1/20240115/sample_A/qualimap",
      marker: "qualimapReport.html",
    });
  });
});

describe("buildProbeInvocation", () => {
  it("checks only the header of the first file and counts records of the rest", () => {
    expect(buildProbeInvocation(context(), "/in/a.bam", true).argv).toEqual([
      "samtools",
      "view",
      "-@",
      "8",
      "-H",
      "/in/a.bam",
    ]);
    expect(buildProbeInvocation(context(), "/in/b.bam", false).argv).toEqual([
      "samtools",
      "view",
      "-@",
      "8",
      "-c",
      "/in/b.bam",
    ]);
  });
});
