import { describe, expect, it } from "vitest";

import { deriveUnitIdentity, splitRelativePath, unitKey } from "./unit-identity.js";

describe("deriveUnitIdentity", () => {
  it("takes the batch from an 8-digit date anywhere in the path", () => {
    expect(
      deriveUnitIdentity("SRR100/fastq_gpu_hac_only_5mc_mod/pass/barcode01_20240115"),
    ).toEqual({
      libraryCode: "SRR100",
      batchCode: "20240115",
      sampleName: "barcode01_20240115",
    });
  });

  it("accepts a dashed date as the batch", () => {
    const identity = deriveUnitIdentity("SRR7/run_2023-11-02/pass/sample_A");
    expect(identity.batchCode).toBe("2023-11-02");
    expect(identity.libraryCode).toBe("SRR7");
    expect(identity.sampleName).toBe("sample_A");
  });

  it("uses the first date token when several are present", () => {
    expect(deriveUnitIdentity("SRR1/20240101/pass/s_20250202").batchCode).toBe("20240101");
  });

  it("falls back to the second segment without a date", () => {
    expect(deriveUnitIdentity("SRR1/fastq_gpu_hac_only_5mc_mod/pass/sample_A_meta")).toEqual({
      libraryCode: "SRR1",
      batchCode: "fastq_gpu_hac_only_5mc_mod",
      sampleName: "sample_A_meta",
    });
  });

  it("returns an empty batch for a single-segment path", () => {
    expect(deriveUnitIdentity("SRR1")).toEqual({
      libraryCode: "SRR1",
      batchCode: "",
      sampleName: "SRR1",
    });
  });

  it("never throws on an empty path", () => {
    expect(deriveUnitIdentity("")).toEqual({ libraryCode: "", batchCode: "", sampleName: "" });
  });
});

describe("splitRelativePath", () => {
  it("normalizes separators and drops empty and dot segments", () => {
    expect(splitRelativePath("./SRR1\\pass//s_1/")).toEqual(["SRR1", "pass", "s_1"]);
  });
});

describe("unitKey", () => {
  it("joins the non-empty identifiers", () => {
    expect(unitKey({ libraryCode: "SRR1", batchCode: "20240115", sampleName: "s_1" })).toBe(
      "SRR1/20240115/s_1",
    );
    expect(unitKey({ libraryCode: "SRR1", batchCode: "", sampleName: "s_1" })).toBe("SRR1/s_1");
  });
});
