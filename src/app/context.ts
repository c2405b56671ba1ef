/*
Purpose: composition root wiring settings, logger, materializer and the workspace store.
Assumptions: one CLI invocation opens the workspace, applies a command, then saves it.
Usage: const ctx = createAppContext(); const store = await openWorkspace(ctx); ...; await saveWorkspace(ctx, store).
*/

import type { Settings } from "../core/config.js";
import { loadSettings, resolveStorageLayout } from "../core/config-loader.js";
import { JsonlLogger } from "../core/logger.js";
import { latticeHome, settingsPath, workspaceLogPath, workspaceSnapshotPath, type StorageLayout } from "../core/paths.js";
import { Materializer } from "../materializer/materializer.js";
import type { CommandRunner } from "../scaffold/toolchain.js";
import { loadWorkspaceSnapshot, saveWorkspaceSnapshot } from "../workspace/snapshot.js";
import { WorkspaceStore, type WorkspaceStoreDeps } from "../workspace/store.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  home: string;
  settingsFile: string;
  settings: Settings;
  layout: StorageLayout;
  snapshotFile: string;
  logger: JsonlLogger;
  disk: Materializer;
};

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv;
  runner?: CommandRunner;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(options: AppContextOptions = {}): AppContext {
  const env = options.env ?? process.env;
  const home = latticeHome(env);
  const settingsFile = settingsPath(home);
  const settings = loadSettings(settingsFile);
  return buildAppContext({ home, settingsFile, settings, env, runner: options.runner });
}

/** Rebuilds the context after settings changed (for example a new storage root). */
export function withSettings(ctx: AppContext, settings: Settings, options: AppContextOptions = {}): AppContext {
  return buildAppContext({
    home: ctx.home,
    settingsFile: ctx.settingsFile,
    settings,
    env: options.env ?? process.env,
    runner: options.runner,
  });
}

export function storeDeps(ctx: AppContext): WorkspaceStoreDeps {
  return {
    disk: ctx.disk,
    logger: ctx.logger,
    debounceMs: ctx.settings.debounce_ms,
    deletePolicy: ctx.settings.delete_policy,
    contextLimits: ctx.settings.context_preview,
  };
}

export async function openWorkspace(ctx: AppContext): Promise<WorkspaceStore> {
  const snapshot = await loadWorkspaceSnapshot(ctx.snapshotFile);
  return snapshot ? WorkspaceStore.fromSnapshot(snapshot, storeDeps(ctx)) : new WorkspaceStore(storeDeps(ctx));
}

/** Writes pending edits, waits for background disk work, then checkpoints the workspace. */
export async function saveWorkspace(ctx: AppContext, store: WorkspaceStore): Promise<string> {
  await store.close();
  await saveWorkspaceSnapshot(ctx.snapshotFile, store.toSnapshot());
  return ctx.snapshotFile;
}

// =============================================================================
// INTERNALS
// =============================================================================

function buildAppContext(input: {
  home: string;
  settingsFile: string;
  settings: Settings;
  env: NodeJS.ProcessEnv;
  runner?: CommandRunner;
}): AppContext {
  const layout = resolveStorageLayout(input.settings, input.env);
  const logger = new JsonlLogger(workspaceLogPath(layout));
  const disk = new Materializer({
    layout,
    logger,
    runner: input.runner,
    detectToolchains: input.settings.detect_toolchains,
    createEnvironments: input.settings.create_environments,
  });

  return {
    home: input.home,
    settingsFile: input.settingsFile,
    settings: input.settings,
    layout,
    snapshotFile: workspaceSnapshotPath(layout),
    logger,
    disk,
  };
}
