import path from "node:path";

import fg from "fast-glob";

import type { PipelineSettings } from "./config.js";
import { DiscoveryError } from "./errors.js";
import { deriveUnitIdentity, splitRelativePath, type WorkUnit } from "./unit-identity.js";

// =============================================================================
// TYPES
// =============================================================================

type LayoutSettings = PipelineSettings["layout"];

export type LayoutMatcher = {
  name: string;
  // Glob relative to the input root, shown to the user when nothing matches.
  pattern: string;
  match(inputRoot: string, relativePath: string): WorkUnit | null;
};

export type ScanResult = {
  units: WorkUnit[];
  matcher: LayoutMatcher;
  patterns: string[];
};

// =============================================================================
// MATCHERS
// =============================================================================

function createLayoutMatcher(
  name: string,
  segments: string[],
  layout: LayoutSettings,
): LayoutMatcher {
  const pattern = segments.join("/");
  const marker = layout.exclude_marker;

  return {
    name,
    pattern,
    match(inputRoot, relativePath) {
      const parts = splitRelativePath(relativePath);
      if (parts.length !== segments.length) return null;
      if (parts.some((part) => part.includes(marker))) return null;

      const normalized = parts.join("/");
      return {
        ...deriveUnitIdentity(normalized),
        inputPath: path.join(inputRoot, ...parts),
        relativePath: normalized,
        layout: name,
      };
    },
  };
}

export function buildLayoutMatchers(layout: LayoutSettings): LayoutMatcher[] {
  const fixed = splitRelativePath(layout.fixed_subpath);
  return [
    createLayoutMatcher(
      "primary",
      [layout.library_glob, ...fixed, "pass", layout.sample_glob],
      layout,
    ),
    createLayoutMatcher("direct-pass", [layout.library_glob, "pass", layout.sample_glob], layout),
  ];
}

// =============================================================================
// SCAN
// =============================================================================

export async function scanWithMatcher(
  inputRoot: string,
  matcher: LayoutMatcher,
): Promise<WorkUnit[]> {
  const matches = await fg(matcher.pattern, {
    cwd: inputRoot,
    onlyDirectories: true,
    followSymbolicLinks: true,
    unique: true,
  });

  const byPath = new Map<string, WorkUnit>();
  for (const relativePath of matches) {
    const unit = matcher.match(inputRoot, relativePath);
    if (unit) byPath.set(unit.relativePath, unit);
  }

  return [...byPath.values()].sort((a, b) =>
    a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0,
  );
}

/**
 * Enumerate work units under `inputRoot`.
 *
 * Matchers are tried in order and the first one that finds anything wins for
 * the whole input root; a library that only fits a later layout is not mixed
 * in when an earlier layout matched elsewhere.
 */
export async function scanUnits(
  inputRoot: string,
  layout: LayoutSettings,
  matchers: LayoutMatcher[] = buildLayoutMatchers(layout),
): Promise<ScanResult> {
  const patterns = matchers.map((m) => m.pattern);

  for (const matcher of matchers) {
    const units = await scanWithMatcher(inputRoot, matcher);
    if (units.length > 0) {
      return { units, matcher, patterns };
    }
  }

  const listed = patterns.map((p, idx) => `  ${idx + 1}. ${p}/`).join("\n");
  throw new DiscoveryError(
    `No sample directories found in ${inputRoot}.\nLooked for patterns:\n${listed}`,
    inputRoot,
    patterns,
  );
}
