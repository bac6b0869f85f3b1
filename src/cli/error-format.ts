import { CommanderError } from "commander";

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
} from "../core/error-format.js";
import { USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

// Commander reports usage problems as "error: unknown option '--x'".
function normalizeCliError(error: unknown): unknown {
  if (!(error instanceof CommanderError)) {
    return error;
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.usage,
    title: "Invalid usage.",
    message: error.message.replace(/^error:\s*/i, ""),
    hint: "Run `modpipe --help` to see the available options.",
    cause: error,
  });
}

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(normalizeCliError(error), {
    mode: options.debug ? "debug" : "short",
  });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
      return `${format("Code:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "name":
      return `${format("Name:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "cause":
      return `${format("Cause:", ["dim"])} ${format(line.text, ["dim"])}`;
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text, 2), ["dim"])}`;
  }
}

function indent(value: string, spaces: number): string {
  const prefix = " ".repeat(spaces);
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
