#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";

import { CommanderError, type Command } from "commander";

import { renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// =============================================================================
// ERROR HANDLING
// =============================================================================

function configureCliErrorHandling(command: Command): void {
  command.configureOutput({
    outputError: () => undefined,
  });
  command.exitOverride();

  for (const sub of command.commands) {
    configureCliErrorHandling(sub);
  }
}

function isHelpOrVersionExit(error: unknown): boolean {
  if (!(error instanceof CommanderError)) {
    return false;
  }

  return (
    error.code === "commander.helpDisplayed" ||
    error.code === "commander.version" ||
    error.code === "commander.help"
  );
}

function resolveDebugFlagFromArgv(argv: string[]): boolean {
  let debugFlag = false;

  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}

function resolveExitCode(error: unknown): number {
  if (error && typeof error === "object" && "exitCode" in error) {
    const { exitCode } = error;
    if (typeof exitCode === "number" && Number.isFinite(exitCode)) {
      return exitCode;
    }
  }

  return 1;
}

// `-ref` is an accepted spelling of `--ref`; left alone, the short-flag
// parser reads it as `-r ef`.
export function normalizeArgv(argv: string[]): string[] {
  const [node = "node", script = "modpipe", ...rest] = argv;
  const endOfOptions = rest.indexOf("--");
  const optionEnd = endOfOptions === -1 ? rest.length : endOfOptions;
  return [
    node,
    script,
    ...rest.map((arg, idx) => (idx < optionEnd && arg === "-ref" ? "--ref" : arg)),
  ];
}

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  configureCliErrorHandling(program);

  try {
    await program.parseAsync(normalizeArgv(argv));
  } catch (error) {
    if (isHelpOrVersionExit(error)) {
      process.exitCode = resolveExitCode(error);
      return;
    }

    console.error(renderCliError(error, { debug: resolveDebugFlagFromArgv(argv) }));
    const exitCode = resolveExitCode(error);
    process.exitCode = exitCode === 0 ? 1 : exitCode;
  }
}

// =============================================================================
// DIRECT EXECUTION
// =============================================================================

function isDirectExecution(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isDirectExecution()) {
  void main(process.argv);
}
