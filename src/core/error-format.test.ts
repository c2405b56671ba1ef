import { describe, expect, it } from "vitest";

import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
  toUserFacingError,
  writeErrorLines,
} from "./error-format.js";
import { ConfigError, MaterializeError, USER_FACING_ERROR_CODES, UserFacingError, WorkspaceError } from "./errors.js";

describe("formatErrorLines", () => {
  it("formats user-facing errors in short mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Storage folder rejected.",
      message: "/tmp/nope: Directory is not writable",
      hint: "Choose a folder you can create and write to.",
      next: "lattice settings set-storage <dir>",
    });

    const lines = formatErrorLines(error);

    expect(lines).toEqual([
      { kind: "title", text: "Storage folder rejected." },
      { kind: "message", text: "/tmp/nope: Directory is not writable" },
      { kind: "hint", text: "Choose a folder you can create and write to." },
      { kind: "next", text: "lattice settings set-storage <dir>" },
    ]);
  });

  it("adds code, name and cause in debug mode", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.disk,
      title: "Couldn't rename file.",
      message: "Destination already exists: src/b.py",
      cause: new Error("EEXIST"),
    });

    const lines = formatErrorLines(error, { mode: "debug" });

    expect(lines.find((line) => line.kind === "code")?.text).toBe("DISK_ERROR");
    expect(lines.find((line) => line.kind === "name")?.text).toBe("UserFacingError");
    expect(lines.find((line) => line.kind === "cause")?.text).toBe("EEXIST");
    expect(lines.find((line) => line.kind === "stack")?.text).toContain("UserFacingError");
  });

  it("falls back to an unexpected error title for strings", () => {
    const lines = formatErrorLines("boom");

    expect(lines).toEqual([
      { kind: "title", text: "Unexpected error" },
      { kind: "message", text: "boom" },
    ]);
  });

  it("drops the message line when it repeats the title", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: "Node not found.",
      message: "Node not found.",
    });

    expect(formatErrorLines(error)).toEqual([{ kind: "title", text: "Node not found." }]);
  });
});

describe("toUserFacingError", () => {
  it("maps materialize errors to the disk code", () => {
    const error = toUserFacingError(new MaterializeError("EACCES: permission denied", "write", "/p/a.py"));

    expect(error.code).toBe("DISK_ERROR");
    expect(error.title).toBe("Disk operation failed.");
    expect(error.message).toBe("EACCES: permission denied");
  });

  it("maps config errors to the config code", () => {
    const error = toUserFacingError(new ConfigError("bad debounce"));

    expect(error.code).toBe("CONFIG_ERROR");
    expect(error.message).toBe("bad debounce");
  });

  it("maps workspace errors to the workspace code", () => {
    const error = toUserFacingError(new WorkspaceError("ids exhausted"));

    expect(error.code).toBe("WORKSPACE_ERROR");
    expect(error.title).toBe("Workspace error.");
  });

  it("returns user-facing errors unchanged", () => {
    const original = new UserFacingError({ code: USER_FACING_ERROR_CODES.unknown, title: "t", message: "m" });

    expect(toUserFacingError(original)).toBe(original);
  });
});

describe("rendering", () => {
  it("prefixes hint lines and leaves text plain without color", () => {
    const text = renderErrorLines([
      { kind: "title", text: "Settings invalid." },
      { kind: "hint", text: "Fix the file." },
    ]);

    expect(text).toBe("Settings invalid.\nHint: Fix the file.");
  });

  it("writes rendered lines to the given stream", () => {
    const chunks: string[] = [];
    writeErrorLines(new Error("disk full"), {
      stream: { isTTY: false, write: (chunk: string) => chunks.push(chunk) },
    });

    expect(chunks).toEqual(["Unexpected error\ndisk full\n"]);
  });
});

describe("resolveColorEnabled", () => {
  it("disables color for non-TTY streams", () => {
    expect(resolveColorEnabled({ stream: { isTTY: false }, env: {} })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true }, env: {} })).toBe(true);
  });

  it("respects useColor and NO_COLOR", () => {
    expect(resolveColorEnabled({ stream: { isTTY: true }, useColor: false, env: {} })).toBe(false);
    expect(resolveColorEnabled({ stream: { isTTY: true }, env: { NO_COLOR: "1" } })).toBe(false);
  });
});

describe("createAnsiFormatter", () => {
  it("returns input unchanged when disabled", () => {
    expect(createAnsiFormatter(false)("plain", ["red"])).toBe("plain");
  });

  it("wraps output with ANSI codes when enabled", () => {
    expect(createAnsiFormatter(true)("alert", ["red"])).toBe("\x1b[31malert\x1b[0m");
  });
});
