/*
Purpose: turn any thrown value into display lines for the CLI, with optional ANSI color.
Assumptions: library errors (ConfigError, WorkspaceError, MaterializeError) map onto
user-facing codes; debug mode adds the code, error name, cause and stack.
Usage: writeErrorLines(err, { mode: "debug", stream: process.stderr }).
*/

import {
  ConfigError,
  MaterializeError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  WorkspaceError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "name" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type OutputStream = {
  isTTY?: boolean;
  write(chunk: string): unknown;
};

// =============================================================================
// ANSI
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_CODES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

const LINE_STYLES: Record<ErrorFormatLineKind, AnsiStyle[]> = {
  title: ["bold", "red"],
  message: [],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  name: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

const LINE_PREFIXES: Partial<Record<ErrorFormatLineKind, string>> = {
  hint: "Hint: ",
  next: "Next: ",
  code: "Code: ",
  name: "Error: ",
  cause: "Cause: ",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value, styles = []) => {
    if (!enabled || styles.length === 0) return value;
    return `${styles.map((style) => ANSI_CODES[style]).join("")}${value}${ANSI_RESET}`;
  };
}

/** Color only on a TTY, and never when NO_COLOR is set or color is switched off. */
export function resolveColorEnabled(
  options: { stream?: { isTTY?: boolean }; useColor?: boolean; env?: NodeJS.ProcessEnv } = {},
): boolean {
  const env = options.env ?? process.env;
  if (env.NO_COLOR) return false;
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return options.useColor === false ? false : isTty;
}

// =============================================================================
// NORMALIZATION
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) return error;
  return new UserFacingError(describeError(error));
}

function describeError(error: unknown): UserFacingErrorInput {
  if (error instanceof MaterializeError) {
    return {
      code: USER_FACING_ERROR_CODES.disk,
      title: "Disk operation failed.",
      message: error.message,
      hint: "Check that the storage folder exists and is writable.",
      cause: error,
    };
  }
  if (error instanceof ConfigError) {
    return { code: USER_FACING_ERROR_CODES.config, title: "Configuration error.", message: error.message, cause: error };
  }
  if (error instanceof WorkspaceError) {
    return { code: USER_FACING_ERROR_CODES.workspace, title: "Workspace error.", message: error.message, cause: error };
  }
  if (error instanceof Error) {
    return {
      code: USER_FACING_ERROR_CODES.unknown,
      title: DEFAULT_TITLE,
      message: textOrDefault(error.message, error.name || DEFAULT_MESSAGE),
      cause: error,
    };
  }
  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_TITLE,
    message: typeof error === "string" ? textOrDefault(error, DEFAULT_MESSAGE) : DEFAULT_MESSAGE,
  };
}

// =============================================================================
// LINES
// =============================================================================

export function formatErrorLines(error: unknown, options: { mode?: ErrorFormatMode } = {}): ErrorFormatLine[] {
  const normalized = toUserFacingError(error);
  const title = textOrDefault(normalized.title, DEFAULT_TITLE);
  const message = textOrDefault(normalized.message, DEFAULT_MESSAGE);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: title }];

  if (message !== title) lines.push({ kind: "message", text: message });
  if (normalized.hint?.trim()) lines.push({ kind: "hint", text: normalized.hint.trim() });
  if (normalized.next?.trim()) lines.push({ kind: "next", text: normalized.next.trim() });

  if (options.mode !== "debug") return lines;

  lines.push({ kind: "code", text: normalized.code });
  const origin = error instanceof Error ? error : normalized;
  lines.push({ kind: "name", text: origin.name });

  const cause = normalized.cause;
  if (cause instanceof Error && cause !== error && cause.message.trim() && cause.message.trim() !== message) {
    lines.push({ kind: "cause", text: cause.message.trim() });
  }

  const stack = origin.stack ?? (cause instanceof Error ? cause.stack : undefined);
  if (stack) lines.push({ kind: "stack", text: stack });

  return lines;
}

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter = createAnsiFormatter(false)): string {
  return lines
    .map((line) => format(`${LINE_PREFIXES[line.kind] ?? ""}${line.text}`, LINE_STYLES[line.kind]))
    .join("\n");
}

export function writeErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode; stream?: OutputStream; useColor?: boolean } = {},
): void {
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));
  stream.write(`${renderErrorLines(formatErrorLines(error, { mode: options.mode }), format)}\n`);
}

// =============================================================================
// INTERNALS
// =============================================================================

const DEFAULT_TITLE = "Unexpected error";
const DEFAULT_MESSAGE = "An unexpected error occurred.";

function textOrDefault(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}
