import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { PipelineSettingsSchema, defaultPipelineSettings, type PipelineSettings } from "./config.js";
import { ConfigurationError } from "./errors.js";

export const SETTINGS_PATH_ENV = "MODPIPE_CONFIG";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigurationError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const { line, column } = error.mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function parsePipelineSettings(raw: string, source: string): PipelineSettings {
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    const location = resolveYamlErrorLocation(err);
    const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw new ConfigurationError(
      `Failed to parse YAML settings at ${source}${locationDetail}: ${detail}`,
      err,
    );
  }

  // An empty file means "all defaults".
  const expanded = expandEnv(doc ?? {}, { file: source, trail: [] });

  const parsed = PipelineSettingsSchema.safeParse(expanded);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    throw new ConfigurationError(`Invalid pipeline settings at ${source}:\n${details}`, parsed.error);
  }

  return parsed.data;
}

export function loadPipelineSettings(configPath?: string): PipelineSettings {
  const requested = configPath ?? process.env[SETTINGS_PATH_ENV];
  if (!requested) {
    return defaultPipelineSettings();
  }

  const absolutePath = path.resolve(requested);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Pipeline settings file not found at ${absolutePath}.`);
  }

  let raw: string;
  try {
    raw = fs.readFileSync(absolutePath, "utf8");
  } catch (err) {
    throw new ConfigurationError(`Failed to read pipeline settings at ${absolutePath}`, err);
  }

  return parsePipelineSettings(raw, absolutePath);
}
