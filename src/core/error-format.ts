/*
Purpose: turn arbitrary thrown values into ordered, labelled lines for CLI and log output.
Assumptions: UserFacingError carries title/hint/next; other errors only have a message.
Usage: formatErrorLines(err, { mode: "short" }) then render each line.
*/

import { IsolationError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "category"
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

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    const category = resolveFailureCategory(error);
    if (category) lines.push({ kind: "category", text: category });
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: formatErrorMessage(error) });
    const category = resolveFailureCategory(error);
    if (category) lines.push({ kind: "category", text: category });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (error instanceof UserFacingError) {
    lines.push({ kind: "code", text: error.code });
  }
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: describeCause(cause) });
  }

  const stack = resolveStack(error);
  if (stack) {
    lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

/**
 * Isolation failures are reported apart from task failures: `isolation (<kind>)` for the
 * innermost isolation error in the cause chain, `task` for failed jobs.
 */
export function resolveFailureCategory(error: unknown): string | undefined {
  const seen = new Set<unknown>();
  let isolation: IsolationError | undefined;

  for (let current: unknown = error; current instanceof Error; current = current.cause) {
    if (seen.has(current)) break;
    seen.add(current);
    if (current instanceof IsolationError) isolation = current;
  }

  if (isolation) return `isolation (${isolation.kind})`;
  if (error instanceof UserFacingError) {
    if (error.code === USER_FACING_ERROR_CODES.isolation) return "isolation";
    if (error.code === USER_FACING_ERROR_CODES.task) return "task";
  }
  return undefined;
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: NodeJS.ProcessEnv;
}): boolean {
  // Piped output never gets escape codes.
  if (options.stream?.isTTY !== true) return false;
  if (options.useColor !== undefined) return options.useColor;

  const env = options.env ?? process.env;
  return env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\u001b[${open}m${acc}\u001b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveCause(error: unknown): unknown {
  if (!(error instanceof Error)) return undefined;
  return error.cause;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (cause && typeof cause === "object") {
    const record = cause as Record<string, unknown>;
    const stderr = record.stderr;
    if (typeof stderr === "string" && stderr.trim().length > 0) {
      return stderr.trim();
    }
    return JSON.stringify(cause);
  }
  return String(cause);
}

function resolveStack(error: unknown): string | undefined {
  if (!(error instanceof Error) || !error.stack) return undefined;
  return error.stack;
}
