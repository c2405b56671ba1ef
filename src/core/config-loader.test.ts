import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  defaultSettings,
  loadSettings,
  parseSettings,
  resolveStorageLayout,
  saveSettings,
  setStorageRoot,
  validateStorageRoot,
} from "./config-loader.js";
import { ConfigError, UserFacingError } from "./errors.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

// =============================================================================
// TESTS
// =============================================================================

describe("loadSettings", () => {
  it("returns defaults when the file is missing", () => {
    const dir = makeTempDir("settings-missing-");

    expect(loadSettings(path.join(dir, "settings.json"))).toEqual({
      debounce_ms: 400,
      delete_policy: "orphan",
      detect_toolchains: true,
      create_environments: false,
      context_preview: { current: 200, connected: 100 },
    });
  });

  it("merges file values over defaults", () => {
    const dir = makeTempDir("settings-merge-");
    const filePath = path.join(dir, "settings.json");
    fs.writeFileSync(filePath, JSON.stringify({ debounce_ms: 50, context_preview: { current: 80 } }));

    expect(loadSettings(filePath)).toMatchObject({
      debounce_ms: 50,
      delete_policy: "orphan",
      context_preview: { current: 80, connected: 100 },
    });
  });

  it("wraps malformed JSON in a config error", () => {
    const dir = makeTempDir("settings-json-");
    const filePath = path.join(dir, "settings.json");
    fs.writeFileSync(filePath, "{ debounce_ms: ");

    const error = captureError(() => loadSettings(filePath));

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({ code: "CONFIG_ERROR", title: "Settings file unreadable." });
    expect(error instanceof UserFacingError && error.cause).toBeInstanceOf(ConfigError);
  });

  it("lists every invalid field", () => {
    const error = captureError(() =>
      parseSettings({ debounce_ms: -1, delete_policy: "shred", project_namespace: "../up", extra: true }, "settings.json"),
    );

    expect(error).toMatchObject({ code: "CONFIG_ERROR", title: "Settings invalid." });
    const message = error instanceof Error ? error.message : "";
    expect(message).toContain("- delete_policy: Expected one of \"orphan\", \"purge\", received \"shred\"");
    expect(message).toContain("- project_namespace: must be a single folder name without separators");
    expect(message).toContain("- <root>: Unrecognized keys: extra");
    expect(message.startsWith("settings.json has invalid values:\n")).toBe(true);
  });
});

describe("saveSettings", () => {
  it("writes validated settings that load back unchanged", async () => {
    const dir = makeTempDir("settings-save-");
    const filePath = path.join(dir, "home", "settings.json");

    const saved = await saveSettings(filePath, { delete_policy: "purge", enabled_frameworks: ["react"] });

    expect(loadSettings(filePath)).toEqual(saved);
    expect(saved.enabled_frameworks).toEqual(["react"]);
  });
});

describe("resolveStorageLayout", () => {
  it("prefers the environment override, then settings, then the default", () => {
    const settings = { ...defaultSettings(), storage_root: "/srv/projects", project_namespace: "team" };

    expect(resolveStorageLayout(settings, { LATTICE_STORAGE_ROOT: "/tmp/override" })).toEqual({
      storageRoot: "/tmp/override",
      projectNamespace: "team",
    });
    expect(resolveStorageLayout(settings, {})).toEqual({ storageRoot: "/srv/projects", projectNamespace: "team" });
    expect(resolveStorageLayout(defaultSettings(), {}).storageRoot).toBe(path.join(os.homedir(), "LatticeProjects"));
  });
});

describe("storage root validation", () => {
  it("creates missing folders and leaves no probe behind", async () => {
    const dir = makeTempDir("storage-ok-");
    const candidate = path.join(dir, "a", "b");

    await expect(validateStorageRoot(candidate)).resolves.toEqual({ ok: true, path: candidate });
    expect(fs.readdirSync(candidate)).toEqual([]);
  });

  it("rejects a path that is a file", async () => {
    const dir = makeTempDir("storage-file-");
    const filePath = path.join(dir, "not-a-dir");
    fs.writeFileSync(filePath, "x");

    await expect(validateStorageRoot(filePath)).resolves.toEqual({
      ok: false,
      path: filePath,
      reason: "Path exists and is not a directory.",
    });
  });

  it("persists an accepted root and refuses a rejected one", async () => {
    const dir = makeTempDir("storage-set-");
    const settingsFile = path.join(dir, "settings.json");
    const blocker = path.join(dir, "blocker");
    fs.writeFileSync(blocker, "x");

    const updated = await setStorageRoot(settingsFile, defaultSettings(), path.join(dir, "projects"));
    expect(updated.storage_root).toBe(path.join(dir, "projects"));
    expect(loadSettings(settingsFile).storage_root).toBe(path.join(dir, "projects"));

    await expect(setStorageRoot(settingsFile, updated, blocker)).rejects.toMatchObject({
      code: "CONFIG_ERROR",
      title: "Storage folder rejected.",
      message: `${blocker}: Path exists and is not a directory.`,
    });
    expect(loadSettings(settingsFile).storage_root).toBe(path.join(dir, "projects"));
  });
});
