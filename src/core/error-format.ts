import { UserFacingError, isFatalPipelineError, toUserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const normalized =
    error instanceof UserFacingError || isFatalPipelineError(error)
      ? toUserFacingError(error)
      : null;

  if (!normalized) {
    return formatPlainError(error, options.mode);
  }

  const lines: ErrorFormatLine[] = [
    { kind: "title", text: normalized.title },
    { kind: "message", text: normalized.message },
  ];
  if (normalized.hint) lines.push({ kind: "hint", text: normalized.hint });
  if (normalized.next) lines.push({ kind: "next", text: normalized.next });

  if (options.mode === "debug") {
    lines.push({ kind: "code", text: normalized.code });
    lines.push({ kind: "name", text: normalized.name });
    if (normalized.cause !== undefined) {
      lines.push({ kind: "cause", text: formatErrorMessage(normalized.cause) });
    }
    if (normalized.stack) {
      lines.push({ kind: "stack", text: normalized.stack });
    }
  }

  return lines;
}

function formatPlainError(error: unknown, mode: ErrorFormatMode): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [{ kind: "title", text: formatErrorMessage(error) }];
  if (mode !== "debug" || !(error instanceof Error)) {
    return lines;
  }

  lines.push({ kind: "name", text: error.name });
  if (error.cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(error.cause) });
  }
  if (error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }
  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(opts: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!opts.stream.isTTY) {
    return false;
  }
  if (opts.useColor !== undefined) {
    return opts.useColor;
  }
  return !process.env.NO_COLOR;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}
