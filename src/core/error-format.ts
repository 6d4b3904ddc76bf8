/*
Purpose: turn fatal errors into the `error:` report printed on stderr, plus the ANSI helpers the
reporters share.
Assumptions: only UserFacingError subclasses carry titles and hints; anything else is unexpected.
Usage: console.error(renderErrorReport(err, { debug })); createAnsiFormatter(useColor).
*/

import { DiffError, GraphError, RunnerNotInstalledError, UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFieldLabel =
  | "help"
  | "next"
  | "code"
  | "reason"
  | "unit"
  | "runner"
  | "name"
  | "caused by";

export type ErrorBlockLabel = "git stderr" | "stack";

export type ErrorLine =
  | { kind: "title"; text: string }
  | { kind: "message"; text: string }
  | { kind: "field"; label: ErrorFieldLabel; text: string }
  | { kind: "block"; label: ErrorBlockLabel; text: string };

export type ErrorReportOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export type AnsiStyle = "bold" | "dim" | "red" | "green" | "yellow" | "cyan";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  cyan: [36, 39],
};

const UNEXPECTED_ERROR_TITLE = "Unexpected error.";

// =============================================================================
// ERROR LINES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/** Lines of an error report; debug adds codes, domain details, the cause and the stack. */
export function formatErrorLines(error: unknown, options: { debug: boolean }): ErrorLine[] {
  const lines: ErrorLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    if (error.hint) lines.push({ kind: "field", label: "help", text: error.hint });
    if (error.next) lines.push({ kind: "field", label: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: UNEXPECTED_ERROR_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (!options.debug) {
    return lines;
  }

  if (error instanceof UserFacingError) {
    lines.push({ kind: "field", label: "code", text: error.code });
  }
  if (error instanceof GraphError) {
    lines.push({ kind: "field", label: "reason", text: error.reason });
    if (error.unitId) lines.push({ kind: "field", label: "unit", text: error.unitId });
  }
  if (error instanceof RunnerNotInstalledError) {
    lines.push({ kind: "field", label: "runner", text: error.runnerName });
  }

  if (error instanceof Error) {
    lines.push({ kind: "field", label: "name", text: error.name });
    if (error.cause !== undefined) {
      lines.push({ kind: "field", label: "caused by", text: formatErrorMessage(error.cause) });
    }
  }

  if (error instanceof DiffError && error.stderr.trim().length > 0) {
    lines.push({ kind: "block", label: "git stderr", text: error.stderr.trimEnd() });
  }
  if (error instanceof Error && error.stack) {
    lines.push({ kind: "block", label: "stack", text: error.stack });
  }

  return lines;
}

export function renderErrorReport(error: unknown, options: ErrorReportOptions = {}): string {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );

  return formatErrorLines(error, { debug: options.debug ?? false })
    .map((line) => renderErrorLine(line, format))
    .join("\n");
}

/** `--debug` anywhere before the `--` separator; the last of `--debug`/`--no-debug` wins. */
export function resolveDebugFlagFromArgv(argv: string[]): boolean | undefined {
  let debugFlag: boolean | undefined;

  for (const arg of argv) {
    if (arg === "--") break;
    if (arg === "--debug") debugFlag = true;
    if (arg === "--no-debug") debugFlag = false;
  }

  return debugFlag;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (input.stream.isTTY !== true) return false;
  if (input.useColor === false) return false;

  const noColor = process.env.NO_COLOR;
  if (noColor !== undefined && noColor.length > 0) return false;

  return true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((styled, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${styled}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderErrorLine(line: ErrorLine, format: AnsiFormatter): string {
  switch (line.kind) {
    case "title":
      return `${format("error:", ["bold", "red"])} ${format(line.text, ["bold"])}`;
    case "message":
      return indent(line.text, 2);
    case "field": {
      const style: AnsiStyle[] = line.label === "help" || line.label === "next" ? ["cyan"] : ["dim"];
      return `  ${format(`${line.label}:`, style)} ${line.text}`;
    }
    case "block":
      return `  ${format(`${line.label}:`, ["dim"])}\n${indent(line.text, 4)}`;
  }
}

function indent(text: string, spaces: number): string {
  const prefix = " ".repeat(spaces);
  return text
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
