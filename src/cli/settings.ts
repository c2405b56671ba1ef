import { Command } from "commander";

import { createAppContext } from "../app/context.js";
import { parseSettings, saveSettings, setStorageRoot } from "../core/config-loader.js";

export function registerSettingsCommands(program: Command): void {
  const settings = program.command("settings").description("Inspect and change settings.json");

  settings
    .command("show")
    .description("Print the effective settings and resolved storage root")
    .action(() => {
      const ctx = createAppContext();
      console.log(`Settings file: ${ctx.settingsFile}`);
      console.log(`Storage root: ${ctx.layout.storageRoot}`);
      console.log(JSON.stringify(ctx.settings, null, 2));
    });

  settings
    .command("set-storage")
    .description("Validate a folder and use it as the storage root")
    .argument("<dir>", "Folder for project directories")
    .action(async (dir: string) => {
      const ctx = createAppContext();
      const updated = await setStorageRoot(ctx.settingsFile, ctx.settings, dir);
      console.log(`Storage root set to ${updated.storage_root ?? dir}`);
    });

  settings
    .command("set")
    .description("Set one settings key (value parsed as JSON when possible)")
    .argument("<key>", "Settings key, e.g. debounce_ms")
    .argument("<value>", "New value")
    .action(async (key: string, value: string) => {
      const ctx = createAppContext();
      const next = parseSettings({ ...ctx.settings, [key]: parseValue(value) }, ctx.settingsFile);
      await saveSettings(ctx.settingsFile, next);
      const entry = Object.entries(next).find(([name]) => name === key);
      console.log(`${key} = ${JSON.stringify(entry ? entry[1] : null)}`);
    });
}

function parseValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // Bare words such as `purge` are strings.
    return raw;
  }
}
