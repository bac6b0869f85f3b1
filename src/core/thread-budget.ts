import type { PipelineSettings } from "./config.js";
import { ResourceConstraintWarning } from "./errors.js";

export type AllocationSource = "env" | "default";

export type ThreadBudget = {
  requested: number;
  allocation: number;
  allocationSource: AllocationSource;
  effective: number;
  warning: ResourceConstraintWarning | null;
};

export type ResolveThreadBudgetOptions = {
  requested: number;
  resources: PipelineSettings["resources"];
  env?: NodeJS.ProcessEnv;
};

function parsePositiveInt(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!/^[0-9]+$/.test(trimmed)) return null;
  const n = Number.parseInt(trimmed, 10);
  return n >= 1 ? n : null;
}

export function detectAllocation(
  resources: PipelineSettings["resources"],
  env: NodeJS.ProcessEnv = process.env,
): { allocation: number; source: AllocationSource } {
  const fromEnv = parsePositiveInt(env[resources.allocation_env]);
  if (fromEnv !== null) {
    return { allocation: fromEnv, source: "env" };
  }
  return { allocation: resources.default_allocation, source: "default" };
}

export function resolveThreadBudget(opts: ResolveThreadBudgetOptions): ThreadBudget {
  const { allocation, source } = detectAllocation(opts.resources, opts.env);
  const effective = Math.min(opts.requested, allocation);

  const warning =
    effective < opts.requested
      ? new ResourceConstraintWarning(
          `Requested threads (${opts.requested}) exceeds allocation (${allocation}); reducing to ${allocation} threads`,
          opts.requested,
          allocation,
        )
      : null;

  return {
    requested: opts.requested,
    allocation,
    allocationSource: source,
    effective,
    warning,
  };
}

export function applyStageCeiling(threads: number, ceiling: number | undefined): number {
  if (ceiling === undefined) return threads;
  return Math.min(threads, ceiling);
}
