import fse from "fs-extra";

import { createAppContext, saveWorkspace, storeDeps, withSettings } from "../app/context.js";
import { setStorageRoot, validateStorageRoot } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { WorkspaceStore } from "../workspace/store.js";
import { createEmptyWorkspaceState, DEFAULT_PROJECT_NAME } from "../workspace/model.js";

export type InitOptions = {
  storage?: string;
  name?: string;
  force?: boolean;
};

export async function initCommand(opts: InitOptions): Promise<void> {
  let ctx = createAppContext();

  if (opts.storage) {
    const settings = await setStorageRoot(ctx.settingsFile, ctx.settings, opts.storage);
    ctx = withSettings(ctx, settings);
  } else {
    const check = await validateStorageRoot(ctx.layout.storageRoot);
    if (!check.ok) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Storage folder rejected.",
        message: `${check.path}: ${check.reason}`,
        hint: "Pass --storage <dir> to pick another folder.",
        next: "lattice init --storage <dir>",
      });
    }
  }

  if ((await fse.pathExists(ctx.snapshotFile)) && !opts.force) {
    console.log(`Workspace already exists at ${ctx.snapshotFile}`);
    console.log("Pass --force to start over with an empty workspace.");
    return;
  }

  const store = new WorkspaceStore(storeDeps(ctx), createEmptyWorkspaceState(opts.name?.trim() || DEFAULT_PROJECT_NAME));
  const snapshotFile = await saveWorkspace(ctx, store);
  console.log(`Created workspace "${store.getState().projectName}" at ${snapshotFile}`);
  console.log(`Projects will be written under ${ctx.layout.storageRoot}`);
}
