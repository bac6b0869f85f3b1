import type { StageName } from "./stages.js";
import { unitKey, type WorkUnit } from "./unit-identity.js";

// =============================================================================
// OUTCOMES
// =============================================================================

export type UnitOutcome =
  | { status: "completed" }
  | { status: "skipped_no_input"; reason: string }
  | { status: "failed_stage"; stageIndex: number; stage: StageName; reason: string };

export type UnitOutcomeStatus = UnitOutcome["status"];

export type OutcomeCounts = Record<UnitOutcomeStatus, number>;

export type RecordedOutcome = {
  unit: string;
  libraryCode: string;
  sampleName: string;
  outcome: UnitOutcome;
};

export type LibrarySummary = {
  libraryCode: string;
  units: number;
  counts: OutcomeCounts;
};

export type RunSummary = {
  dryRun: boolean;
  libraries: LibrarySummary[];
  totals: OutcomeCounts & { units: number };
  outcomes: RecordedOutcome[];
};

function emptyCounts(): OutcomeCounts {
  return { completed: 0, skipped_no_input: 0, failed_stage: 0 };
}

// =============================================================================
// ACCUMULATOR
// =============================================================================

/**
 * Collects one outcome per unit. Passed through the driver and turned into
 * the run summary once every unit has been processed.
 */
export class SummaryAccumulator {
  private readonly outcomes: RecordedOutcome[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly dryRun = false) {}

  record(unit: WorkUnit, outcome: UnitOutcome): void {
    const key = unitKey(unit);
    if (this.seen.has(key)) {
      throw new Error(`outcome already recorded for ${key}`);
    }
    this.seen.add(key);
    this.outcomes.push({
      unit: key,
      libraryCode: unit.libraryCode,
      sampleName: unit.sampleName,
      outcome,
    });
  }

  get size(): number {
    return this.outcomes.length;
  }

  build(): RunSummary {
    const byLibrary = new Map<string, LibrarySummary>();
    const totals = { units: 0, ...emptyCounts() };

    for (const recorded of this.outcomes) {
      let library = byLibrary.get(recorded.libraryCode);
      if (!library) {
        library = { libraryCode: recorded.libraryCode, units: 0, counts: emptyCounts() };
        byLibrary.set(recorded.libraryCode, library);
      }
      library.units += 1;
      library.counts[recorded.outcome.status] += 1;
      totals.units += 1;
      totals[recorded.outcome.status] += 1;
    }

    const libraries = [...byLibrary.values()].sort((a, b) =>
      a.libraryCode.localeCompare(b.libraryCode),
    );

    return { dryRun: this.dryRun, libraries, totals, outcomes: [...this.outcomes] };
  }
}

// =============================================================================
// FORMATTING
// =============================================================================

function pluralUnits(n: number): string {
  return n === 1 ? "1 unit" : `${n} units`;
}

export function formatCounts(counts: OutcomeCounts): string {
  const parts: string[] = [];
  if (counts.completed > 0) parts.push(`${counts.completed} completed`);
  if (counts.skipped_no_input > 0) parts.push(`${counts.skipped_no_input} skipped`);
  if (counts.failed_stage > 0) parts.push(`${counts.failed_stage} failed`);
  return parts.join(", ");
}

export function formatLibraryLine(library: LibrarySummary): string {
  return `${library.libraryCode}: ${pluralUnits(library.units)} (${formatCounts(library.counts)})`;
}

export function describeOutcome(outcome: UnitOutcome): string {
  switch (outcome.status) {
    case "completed":
      return "completed";
    case "skipped_no_input":
      return `skipped: ${outcome.reason}`;
    case "failed_stage":
      return `failed at stage ${outcome.stageIndex}/4 (${outcome.stage}): ${outcome.reason}`;
  }
}

export function formatSummaryLines(summary: RunSummary): string[] {
  const lines = ["Summary by library:"];
  for (const library of summary.libraries) {
    lines.push(`  ${formatLibraryLine(library)}`);
  }

  const { totals } = summary;
  lines.push(
    `Totals: ${pluralUnits(totals.units)} (${totals.completed} completed, ${totals.skipped_no_input} skipped, ${totals.failed_stage} failed)`,
  );
  if (summary.dryRun) {
    lines.push("Dry run: no stages were executed.");
  }

  const incomplete = summary.outcomes.filter((o) => o.outcome.status !== "completed");
  if (incomplete.length > 0) {
    lines.push("Incomplete units (re-run with the same output directory to retry):");
    for (const recorded of incomplete) {
      lines.push(`  ${recorded.unit}: ${describeOutcome(recorded.outcome)}`);
    }
  }

  return lines;
}
