import { JsonlLogger, TextLogFile, type JsonObject } from "./logger.js";
import { eventsLogPath, masterLogPath, unitLogPath } from "./paths.js";
import { unitKey, type WorkUnit } from "./unit-identity.js";

export type LineSink = (line: string) => void;

export type RunLoggerOptions = {
  outputRoot: string;
  timestamp: string;
  // Console mirrors of the master log; default to console.log / console.warn.
  echo?: LineSink;
  echoWarning?: LineSink;
};

/**
 * Run-level logging: a human-readable master log mirrored to the console, a
 * JSONL event stream, and one log file per unit for tool output.
 */
export class RunLogger {
  readonly masterLogPath: string;
  readonly eventsLogPath: string;

  private readonly master: TextLogFile;
  private readonly events: JsonlLogger;
  private readonly echo: LineSink;
  private readonly echoWarning: LineSink;
  private readonly unitLogs: TextLogFile[] = [];

  constructor(private readonly opts: RunLoggerOptions) {
    this.masterLogPath = masterLogPath(opts.outputRoot, opts.timestamp);
    this.eventsLogPath = eventsLogPath(opts.outputRoot, opts.timestamp);
    this.master = new TextLogFile(this.masterLogPath);
    this.events = new JsonlLogger(this.eventsLogPath, { runId: opts.timestamp });
    this.echo = opts.echo ?? ((line) => console.log(line));
    this.echoWarning = opts.echoWarning ?? ((line) => console.warn(line));
  }

  info(text = ""): void {
    this.master.line(text);
    this.echo(text);
  }

  warn(text: string): void {
    const line = `Warning: ${text}`;
    this.master.line(line);
    this.echoWarning(line);
  }

  banner(title: string): void {
    const rule = "=".repeat(42);
    this.info(rule);
    this.info(title);
    this.info(rule);
  }

  event(type: string, unit?: WorkUnit, payload?: JsonObject): void {
    this.events.log({ type, unit: unit ? unitKey(unit) : undefined, payload });
  }

  openUnitLog(unit: WorkUnit): TextLogFile {
    const log = new TextLogFile(unitLogPath(this.opts.outputRoot, unit));
    this.unitLogs.push(log);
    return log;
  }

  closeUnitLog(log: TextLogFile): void {
    log.close();
    const idx = this.unitLogs.indexOf(log);
    if (idx !== -1) this.unitLogs.splice(idx, 1);
  }

  close(): void {
    for (const log of this.unitLogs) log.close();
    this.unitLogs.length = 0;
    this.events.close();
    this.master.close();
  }
}
