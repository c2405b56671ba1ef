import { Command } from "commander";
import fse from "fs-extra";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { CODE_LANGUAGES, type CodeLanguage } from "../workspace/model.js";

import { expectApplied, resolveFileRef, resolveNodeRef, shortId, withWorkspace } from "./command-context.js";

export function registerFileCommands(program: Command): void {
  const file = program.command("file").description("Edit the files of a node");

  file
    .command("ls")
    .description("List a node's files (or what is on disk with --disk)")
    .argument("<node>", "Node id, id prefix or name")
    .option("--disk", "List the project folder instead of the workspace", false)
    .action(async (ref: string, opts: { disk: boolean }) => {
      await withWorkspace(
        async (store) => {
          const node = resolveNodeRef(store, ref);
          if (!opts.disk) {
            for (const entry of node.files) console.log(`${shortId(entry.id)}  ${entry.path}`);
            return;
          }
          const listed = expectApplied(await store.listDiskFiles(node.id), "List disk files");
          for (const relPath of listed ?? []) console.log(relPath);
        },
        { save: false },
      );
    });

  file
    .command("cat")
    .description("Print a file's content")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<file>", "File id, id prefix or path")
    .action(async (nodeRef: string, fileRef: string) => {
      await withWorkspace(
        (store) => {
          const target = resolveFileRef(resolveNodeRef(store, nodeRef), fileRef);
          process.stdout.write(target.content.endsWith("\n") ? target.content : `${target.content}\n`);
        },
        { save: false },
      );
    });

  file
    .command("add")
    .description("Add a file to a node and select it")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<path>", "Relative path inside the project")
    .option("--language <language>", `Override language (${CODE_LANGUAGES.join(", ")})`)
    .option("--content <text>", "Initial content", "")
    .action(async (nodeRef: string, filePath: string, opts: { language?: string; content: string }) => {
      await withWorkspace((store) => {
        const node = resolveNodeRef(store, nodeRef);
        const language = opts.language ? parseLanguage(opts.language) : undefined;
        const added = expectApplied(store.addFile(node.id, filePath, language, opts.content), "Add file");
        if (added) console.log(`Added ${added.path} (${shortId(added.id)}) to ${node.name}`);
      });
    });

  file
    .command("write")
    .description("Replace a file's content")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<file>", "File id, id prefix or path")
    .option("--content <text>", "New content")
    .option("--from <path>", "Read new content from a local file")
    .action(async (nodeRef: string, fileRef: string, opts: { content?: string; from?: string }) => {
      const content = await readContentOption(opts);
      await withWorkspace((store) => {
        const node = resolveNodeRef(store, nodeRef);
        const target = resolveFileRef(node, fileRef);
        const result = store.updateFileContent(node.id, target.id, content);
        if (result.status === "applied") console.log(`Updated ${target.path} (${content.length} chars)`);
        else expectApplied(result, "Write file");
      });
    });

  file
    .command("select")
    .description("Select a file in its node")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<file>", "File id, id prefix or path")
    .action(async (nodeRef: string, fileRef: string) => {
      await withWorkspace(async (store) => {
        const node = resolveNodeRef(store, nodeRef);
        const target = resolveFileRef(node, fileRef);
        expectApplied(await store.selectFile(node.id, target.id), "Select file");
        console.log(`Selected ${target.path}`);
      });
    });

  file
    .command("mv")
    .description("Rename a file within its directory")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<file>", "File id, id prefix or path")
    .argument("<name>", "New file name (no directories)")
    .action(async (nodeRef: string, fileRef: string, name: string) => {
      await withWorkspace(async (store) => {
        const node = resolveNodeRef(store, nodeRef);
        const target = resolveFileRef(node, fileRef);
        const renamed = expectApplied(await store.renameFile(node.id, target.id, name), "Rename file");
        if (renamed) console.log(`Renamed ${target.path} to ${renamed.path}`);
      });
    });

  file
    .command("rm")
    .description("Remove a file from a node and from disk")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<file>", "File id, id prefix or path")
    .action(async (nodeRef: string, fileRef: string) => {
      await withWorkspace((store) => {
        const node = resolveNodeRef(store, nodeRef);
        const target = resolveFileRef(node, fileRef);
        const outcome = expectApplied(store.removeFile(node.id, target.id), "Remove file");
        if (!outcome) return;
        console.log(`Removed ${outcome.removed.path}`);
        if (outcome.replacement) console.log(`Regenerated ${outcome.replacement.path}`);
      });
    });
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readContentOption(opts: { content?: string; from?: string }): Promise<string> {
  if (opts.content !== undefined && opts.from !== undefined) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: "Conflicting options.",
      message: "Pass either --content or --from, not both.",
    });
  }
  if (opts.from !== undefined) {
    return fse.readFile(opts.from, "utf8");
  }
  if (opts.content !== undefined) {
    return opts.content;
  }
  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.workspace,
    title: "No content given.",
    message: "Pass --content <text> or --from <path>.",
  });
}

function parseLanguage(value: string): CodeLanguage {
  const match = CODE_LANGUAGES.find((language) => language === value.trim().toLowerCase());
  if (!match) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: "Unknown language.",
      message: `"${value}" is not one of ${CODE_LANGUAGES.join(", ")}.`,
    });
  }
  return match;
}
