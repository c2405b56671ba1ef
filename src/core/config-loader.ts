/*
Purpose: load, validate and persist user settings (settings.json under LATTICE_HOME).
Assumptions: a missing settings file means defaults; the storage root is only accepted
after it has been created and proven writable.
Usage: const settings = loadSettings(); const layout = resolveStorageLayout(settings);
*/

import path from "node:path";

import fse from "fs-extra";

import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { SettingsSchema, type Settings, type SettingsInput } from "./config.js";
import { defaultStorageRoot, settingsPath, type StorageLayout } from "./paths.js";
import { errorMessage, writeJsonFile } from "./utils.js";
import { formatSchemaIssues } from "../workspace/schema.js";

// =============================================================================
// TYPES
// =============================================================================

export type StorageRootCheck = { ok: true; path: string } | { ok: false; path: string; reason: string };

const CONFIG_HINT = "Fix or delete the settings file to fall back to defaults.";

// =============================================================================
// LOAD + SAVE
// =============================================================================

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

export function loadSettings(filePath: string = settingsPath()): Settings {
  if (!fse.existsSync(filePath)) {
    return defaultSettings();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fse.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw createSettingsError(
      "Settings file unreadable.",
      `Failed to parse ${filePath}: ${errorMessage(err)}`,
      new ConfigError(`Invalid JSON in ${filePath}`, err),
    );
  }

  return parseSettings(raw, filePath);
}

export function parseSettings(raw: unknown, source = "settings"): Settings {
  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues);
    throw createSettingsError(
      "Settings invalid.",
      `${source} has invalid values:\n${issues.map((issue) => `- ${issue}`).join("\n")}`,
      new ConfigError(`Settings validation failed for ${source}`, parsed.error),
    );
  }
  return parsed.data;
}

export async function saveSettings(filePath: string, settings: SettingsInput): Promise<Settings> {
  const validated = parseSettings(settings, filePath);
  await writeJsonFile(filePath, validated);
  return validated;
}

// =============================================================================
// STORAGE ROOT
// =============================================================================

export function resolveStorageLayout(
  settings: Settings,
  env: NodeJS.ProcessEnv = process.env,
): StorageLayout {
  const override = env.LATTICE_STORAGE_ROOT?.trim();
  const storageRoot = override || settings.storage_root || defaultStorageRoot();
  return {
    storageRoot: path.resolve(storageRoot),
    projectNamespace: settings.project_namespace,
  };
}

/** Creates the folder when missing and proves it is writable with a probe file. */
export async function validateStorageRoot(candidate: string): Promise<StorageRootCheck> {
  const resolved = path.resolve(candidate);

  try {
    if (await fse.pathExists(resolved)) {
      const stat = await fse.stat(resolved);
      if (!stat.isDirectory()) {
        return { ok: false, path: resolved, reason: "Path exists and is not a directory." };
      }
    }
    await fse.ensureDir(resolved);
  } catch (err) {
    return { ok: false, path: resolved, reason: `Cannot create directory: ${errorMessage(err)}` };
  }

  const probe = path.join(resolved, `.lattice-write-test-${process.pid}`);
  try {
    await fse.writeFile(probe, "ok", "utf8");
    await fse.remove(probe);
  } catch (err) {
    return { ok: false, path: resolved, reason: `Directory is not writable: ${errorMessage(err)}` };
  }

  return { ok: true, path: resolved };
}

export async function setStorageRoot(
  filePath: string,
  current: Settings,
  candidate: string,
): Promise<Settings> {
  const check = await validateStorageRoot(candidate);
  if (!check.ok) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Storage folder rejected.",
      message: `${check.path}: ${check.reason}`,
      hint: "Choose a folder you can create and write to.",
    });
  }

  return saveSettings(filePath, { ...current, storage_root: check.path });
}

// =============================================================================
// INTERNALS
// =============================================================================

function createSettingsError(title: string, message: string, cause: ConfigError): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title,
    message,
    hint: CONFIG_HINT,
    cause,
  });
}
