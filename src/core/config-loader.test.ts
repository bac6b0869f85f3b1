import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { SETTINGS_PATH_ENV, loadPipelineSettings, parsePipelineSettings } from "./config-loader.js";
import { defaultPipelineSettings } from "./config.js";
import { ConfigurationError } from "./errors.js";

const tempDirs: string[] = [];

function writeSettings(contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-loader-"));
  tempDirs.push(dir);

  const settingsPath = path.join(dir, "modpipe.yaml");
  fs.writeFileSync(settingsPath, contents, "utf8");
  return settingsPath;
}

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  delete process.env.MODPIPE_TEST_SAMTOOLS;
});

describe("parsePipelineSettings", () => {
  it("treats an empty document as all defaults", () => {
    expect(parsePipelineSettings("", "test.yaml")).toEqual(defaultPipelineSettings());
  });

  it("merges partial sections over the defaults and expands env vars", () => {
    process.env.MODPIPE_TEST_SAMTOOLS = "/opt/samtools-1.19/bin/samtools";

    const settings = parsePipelineSettings(
      `
tools:
  samtools: \${MODPIPE_TEST_SAMTOOLS}
thresholds:
  merged_min_bytes: 2048
qc:
  max_threads: 16
`,
      "test.yaml",
    );

    expect(settings.tools.samtools).toBe("/opt/samtools-1.19/bin/samtools");
    expect(settings.tools.minimap2).toBe("minimap2");
    expect(settings.thresholds).toEqual({
      merged_min_bytes: 2048,
      aligned_min_bytes: 100_000_000,
      modifications_min_bytes: 100_000,
    });
    expect(settings.qc).toEqual({ window_size: 5000, max_threads: 16, report_marker: "qualimapReport.html" });
  });

  it("reports the unset variable and where it is referenced", () => {
    expect(() =>
      parsePipelineSettings("tools:\n  modkit: ${MODPIPE_TEST_UNSET_VAR}\n", "test.yaml"),
    ).toThrow(
      "Environment variable MODPIPE_TEST_UNSET_VAR is not set but is referenced in test.yaml (tools.modkit).",
    );
  });

  it("formats schema issues with their key paths", () => {
    expect(() => parsePipelineSettings("qc:\n  window_size: big\n", "test.yaml")).toThrow(
      "Invalid pipeline settings at test.yaml:\nqc.window_size: Expected number, received string",
    );
  });

  it("rejects unknown top-level sections", () => {
    expect(() => parsePipelineSettings("plugins: []\n", "test.yaml")).toThrow(
      "Invalid pipeline settings at test.yaml:\n<root>: Unrecognized keys: plugins",
    );
  });

  it("wraps YAML syntax errors in a configuration error", () => {
    let caught: unknown;
    try {
      parsePipelineSettings("layout: [unclosed\n", "test.yaml");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    expect(String(caught)).toMatch(/Failed to parse YAML settings at test\.yaml \(line \d+, column \d+\)/);
  });
});

describe("loadPipelineSettings", () => {
  it("returns defaults when no path is given", () => {
    expect(loadPipelineSettings()).toEqual(defaultPipelineSettings());
  });

  it("reads the settings path from the environment", () => {
    process.env[SETTINGS_PATH_ENV] = writeSettings("resources:\n  default_threads: 12\n");

    expect(loadPipelineSettings().resources.default_threads).toBe(12);
  });

  it("prefers an explicit path over the environment", () => {
    process.env[SETTINGS_PATH_ENV] = writeSettings("resources:\n  default_threads: 12\n");
    const explicit = writeSettings("resources:\n  default_threads: 6\n");

    expect(loadPipelineSettings(explicit).resources.default_threads).toBe(6);
  });

  it("fails when the file does not exist", () => {
    const missing = path.join(os.tmpdir(), "modpipe-missing-settings.yaml");
    expect(() => loadPipelineSettings(missing)).toThrow(
      `Pipeline settings file not found at ${missing}.`,
    );
  });
});
