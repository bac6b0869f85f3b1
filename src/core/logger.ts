import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  unit?: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  runId?: string;
  unit?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  runId?: string;
  unit?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// APPEND-ONLY FILE
// =============================================================================

/**
 * Append-only file handle that fsyncs after every write, so nothing is lost
 * when the job is killed by the scheduler mid-run.
 */
class SyncedAppendFile {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(public readonly filePath: string) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveLoggerDebugEnabled();
  }

  write(chunk: string): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, chunk);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }
}

// =============================================================================
// LOGGERS
// =============================================================================

export class JsonlLogger {
  private readonly file: SyncedAppendFile;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    this.file = new SyncedAppendFile(filePath);
  }

  log(event: LogEventInput): void {
    this.file.write(`${JSON.stringify(eventWithTs(event, this.defaults))}\n`);
  }

  close(): void {
    this.file.close();
  }
}

export class TextLogFile {
  private readonly file: SyncedAppendFile;

  constructor(public readonly filePath: string) {
    this.file = new SyncedAppendFile(filePath);
  }

  line(text = ""): void {
    this.file.write(`${text}\n`);
  }

  // Multi-line tool output; trailing newline normalized.
  block(text: string): void {
    if (text.length === 0) return;
    this.file.write(text.endsWith("\n") ? text : `${text}\n`);
  }

  close(): void {
    this.file.close();
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, unit, payload, ts, type } = event;

  const runId = providedRunId ?? defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const normalizedTs =
    typeof ts === "string" ? ts : ts instanceof Date ? ts.toISOString() : isoNow();

  const resolvedUnit = unit ?? defaults.unit;

  const result: LogEvent = {
    ts: normalizedTs,
    type,
    run_id: runId,
  };

  if (resolvedUnit) {
    result.unit = resolvedUnit;
  }
  if (payload && Object.keys(payload).length > 0) {
    result.payload = payload;
  }

  return result;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel = action === "write" ? `write log entry to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}

function resolveLoggerDebugEnabled(): boolean {
  let debugFlag = false;

  for (const arg of process.argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}
