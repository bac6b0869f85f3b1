import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { defaultPipelineSettings } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { parseThreadCount, resolveRunConfig } from "./run-config.js";

let root: string;
let inputRoot: string;
let reference: string;

beforeEach(async () => {
  root = await fs.mkdtemp(path.join(os.tmpdir(), "run-config-"));
  inputRoot = path.join(root, "input");
  reference = path.join(root, "genome.fna");
  await fs.mkdir(inputRoot);
  await fs.writeFile(reference, ">chr1\nACGT\n", "utf8");
});

afterEach(async () => {
  await fs.rm(root, { recursive: true, force: true });
});

describe("parseThreadCount", () => {
  it("accepts positive integers given as text or numbers", () => {
    expect(parseThreadCount("16")).toBe(16);
    expect(parseThreadCount(" 8 ")).toBe(8);
    expect(parseThreadCount(4)).toBe(4);
  });

  it.each(["0", "-2", "1.5", "many", ""])("rejects %j", (value) => {
    expect(() => parseThreadCount(value)).toThrow(ConfigurationError);
  });
});

describe("resolveRunConfig", () => {
  it("lists every missing required argument", async () => {
    await expect(resolveRunConfig({ input: inputRoot })).rejects.toThrow(
      "Missing required arguments: --output, --reference",
    );
  });

  it("resolves paths and defaults threads from the settings", async () => {
    const config = await resolveRunConfig({
      input: inputRoot,
      output: path.join(root, "out"),
      reference,
      settings: defaultPipelineSettings(),
      now: new Date(2024, 2, 9, 14, 3, 0),
    });

    expect(config).toMatchObject({
      inputRoot,
      outputRoot: path.join(root, "out"),
      referenceGenome: reference,
      threads: 40,
      dryRun: false,
      timestamp: "20240309_140300",
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("does not create the output directory", async () => {
    await resolveRunConfig({ input: inputRoot, output: path.join(root, "out"), reference, threads: "4" });

    await expect(fs.stat(path.join(root, "out"))).rejects.toThrow();
  });

  it("rejects a missing input directory", async () => {
    const missing = path.join(root, "nope");
    await expect(
      resolveRunConfig({ input: missing, output: path.join(root, "out"), reference }),
    ).rejects.toThrow(`Input directory not found: ${missing}`);
  });

  it("rejects a reference that is a directory", async () => {
    await expect(
      resolveRunConfig({ input: inputRoot, output: path.join(root, "out"), reference: inputRoot }),
    ).rejects.toThrow(`Reference genome is not a file: ${inputRoot}`);
  });

  it("rejects an output path that is a regular file", async () => {
    await expect(
      resolveRunConfig({ input: inputRoot, output: reference, reference }),
    ).rejects.toThrow(`Output path exists and is not a directory: ${reference}`);
  });
});
