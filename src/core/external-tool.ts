import { once } from "node:events";
import os from "node:os";
import type { Readable } from "node:stream";

import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type ToolInvocation = {
  // Short "<stage>:<step>" label used in logs and by test fakes.
  label: string;
  argv: string[];
  cwd: string;
  threads: number;
};

export type ToolResult = {
  // Shell convention: 127 when the command never started, 128 + n when
  // killed by signal n.
  exitCode: number;
  signal: string | null;
  stdout: string;
  stderr: string;
  durationMs: number;
  startedAt: string;
  finishedAt: string;
};

export interface ExternalTool {
  invoke(invocation: ToolInvocation): Promise<ToolResult>;
}

// Exit status reported when the command could not be started at all.
export const SPAWN_FAILURE_EXIT_CODE = 127;

// Only the tail of each stream is kept; verbose aligners can write gigabytes.
export const OUTPUT_TAIL_BYTES = 1024 * 1024;

// =============================================================================
// OUTPUT TAIL
// =============================================================================

export class OutputTail {
  private chunks: Buffer[] = [];
  private bytes = 0;
  private dropped = 0;

  constructor(private readonly limit: number = OUTPUT_TAIL_BYTES) {}

  push(chunk: Buffer | string): void {
    const buf = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    this.chunks.push(buf);
    this.bytes += buf.length;
    if (this.bytes <= this.limit) return;

    const joined = Buffer.concat(this.chunks);
    const keep = joined.subarray(joined.length - this.limit);
    this.dropped += joined.length - keep.length;
    this.chunks = [keep];
    this.bytes = keep.length;
  }

  text(): string {
    const body = Buffer.concat(this.chunks).toString("utf8").replace(/\n$/, "");
    if (this.dropped === 0) return body;
    return `[${this.dropped} bytes of earlier output truncated]\n${body}`;
  }
}

// =============================================================================
// EXECA BACKEND
// =============================================================================

function signalExitCode(signal: string): number {
  const entry = Object.entries(os.constants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

async function untilClosed(stream: Readable | null): Promise<void> {
  if (!stream || stream.closed) return;
  await once(stream, "close");
}

export class ExecaExternalTool implements ExternalTool {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async invoke(invocation: ToolInvocation): Promise<ToolResult> {
    const [command, ...args] = invocation.argv;
    if (!command) throw new Error(`${invocation.label}: argv must be non-empty`);

    const started = Date.now();
    const startedAt = new Date(started).toISOString();

    // Output is streamed into bounded tails instead of execa's buffers, so a
    // chatty tool is never killed for exceeding maxBuffer.
    const subprocess = execa(command, args, {
      cwd: invocation.cwd,
      env: this.env,
      stdin: "ignore",
      reject: false,
      buffer: false,
    });
    // A failed spawn (ENOENT, EACCES) never gets a pid.
    const spawned = subprocess.pid !== undefined;

    const stdout = new OutputTail();
    const stderr = new OutputTail();
    subprocess.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    subprocess.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

    const res = await subprocess;
    if (spawned) {
      // execa settles on "exit"; the pipes may still hold data.
      await Promise.all([untilClosed(subprocess.stdout), untilClosed(subprocess.stderr)]);
    }
    const finished = Date.now();

    let exitCode: number;
    let signal: string | null = null;
    if (!spawned) {
      exitCode = SPAWN_FAILURE_EXIT_CODE;
      stderr.push(`\nfailed to start ${command} (command not found or not executable)`);
    } else if (res.signal) {
      signal = res.signal;
      exitCode = signalExitCode(res.signal);
    } else {
      exitCode = res.exitCode;
    }

    return {
      exitCode,
      signal,
      stdout: stdout.text(),
      stderr: stderr.text().replace(/^\n/, ""),
      durationMs: finished - started,
      startedAt,
      finishedAt: new Date(finished).toISOString(),
    };
  }
}
