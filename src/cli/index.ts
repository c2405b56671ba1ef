import { Command } from "commander";

import { registerFileCommands } from "./files.js";
import { initCommand } from "./init.js";
import { registerNodeCommands } from "./nodes.js";
import { registerSettingsCommands } from "./settings.js";
import { registerWorkspaceCommands } from "./workspace.js";

export function buildCli(): Command {
  const program = new Command();

  program
    .name("lattice")
    .description("Arrange project nodes on a canvas and keep their folders on disk in sync")
    .version("0.1.0")
    .option("--debug", "Show error codes, causes and stack traces", false);

  program
    .command("init")
    .description("Create the workspace and pick a storage folder")
    .option("--storage <dir>", "Folder for project directories")
    .option("--name <project>", "Project name")
    .option("--force", "Replace an existing workspace", false)
    .action(async (opts: { storage?: string; name?: string; force: boolean }) => {
      await initCommand(opts);
    });

  registerNodeCommands(program);
  registerFileCommands(program);
  registerWorkspaceCommands(program);
  registerSettingsCommands(program);

  return program;
}
