import { afterEach, beforeEach } from "vitest";

// =============================================================================
// SCHEDULER / SETTINGS ENV ISOLATION
// =============================================================================

// A test run inside a Slurm job (or a shell with MODPIPE_CONFIG exported)
// must not change thread budgets or settings seen by the tests.
const ISOLATED_ENV_VARS = ["SLURM_CPUS_PER_TASK", "MODPIPE_CONFIG", "NO_COLOR"];

const saved = new Map<string, string | undefined>();

beforeEach(() => {
  for (const name of ISOLATED_ENV_VARS) {
    saved.set(name, process.env[name]);
    delete process.env[name];
  }
});

afterEach(() => {
  for (const name of ISOLATED_ENV_VARS) {
    const value = saved.get(name);
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
  saved.clear();
});
