/*
Purpose: mirror each node's in-memory files into its own project directory.
Assumptions: every path is resolved inside the node's root; the root of a node never
contains another node's root; work for one node is serialized through a keyed queue.
Usage: const disk = new Materializer({ layout, logger }); await disk.createProjectStructure(node).
*/

import path from "node:path";

import fse from "fs-extra";
import { minimatch } from "minimatch";

import { MaterializeError, type MaterializeOperation } from "../core/errors.js";
import { logWorkspaceEvent, silentLogger, type EventLogger } from "../core/logger.js";
import { environmentsRoot, isInside, projectRootFor, projectsRoot, type StorageLayout } from "../core/paths.js";
import { KeyedSerialQueue } from "../core/serial-queue.js";
import { errorMessage, toPosixPath } from "../core/utils.js";
import { getScaffoldEntry, type RuntimeId, type ScaffoldTemplateFile } from "../scaffold/catalog.js";
import { buildScaffoldContext, renderScaffoldTemplate } from "../scaffold/templates.js";
import { detectRuntimeVersion, runCommand, type CommandRunner } from "../scaffold/toolchain.js";
import type { ProjectFile, WorkspaceNode } from "../workspace/model.js";

import type { DiskResult, ProjectDisk, ProjectStructureReport, SaveFileReport } from "./types.js";

// =============================================================================
// TYPES
// =============================================================================

export type MaterializerOptions = {
  layout: StorageLayout;
  logger?: EventLogger;
  runner?: CommandRunner;
  detectToolchains?: boolean;
  createEnvironments?: boolean;
  probeTimeoutMs?: number;
  environmentTimeoutMs?: number;
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const IGNORED_DIRECTORIES = [
  "node_modules",
  ".venv",
  "venv",
  "__pycache__",
  ".git",
  "dist",
  ".build",
  "target",
] as const;

export const IGNORED_FILES = ["*.pyc", ".DS_Store", "*.log"] as const;

const DEFAULT_ENVIRONMENT_TIMEOUT_MS = 120_000;

// =============================================================================
// MATERIALIZER
// =============================================================================

export class Materializer implements ProjectDisk {
  private readonly queue = new KeyedSerialQueue();
  private readonly logger: EventLogger;
  private readonly runner: CommandRunner;
  private readonly runtimeVersions = new Map<RuntimeId, Promise<string>>();

  constructor(private readonly options: MaterializerOptions) {
    this.logger = options.logger ?? silentLogger;
    this.runner = options.runner ?? runCommand;
  }

  projectRoot(node: WorkspaceNode): string {
    return node.projectPath ?? this.defaultProjectRoot(node.id);
  }

  defaultProjectRoot(nodeId: string): string {
    return projectRootFor(this.options.layout, nodeId);
  }

  createProjectStructure(node: WorkspaceNode): Promise<DiskResult<ProjectStructureReport>> {
    const root = this.projectRoot(node);
    return this.runForNode(node, "create", root, async () => {
      const entry = getScaffoldEntry(node.framework);
      await fse.ensureDir(root);
      for (const dir of entry.directories) {
        await fse.ensureDir(this.resolveInside(root, dir, "create"));
      }

      const ownPaths = new Set(node.files.map((file) => file.path));
      const onceFiles: ScaffoldTemplateFile[] = [];
      if (entry.manifest) onceFiles.push(entry.manifest);
      onceFiles.push(...entry.extras);

      const scaffolded: string[] = [];
      for (const once of onceFiles) {
        if (ownPaths.has(once.path)) continue;
        const target = this.resolveInside(root, once.path, "create");
        if (await fse.pathExists(target)) continue;

        const runtimeVersion =
          once === entry.manifest && entry.runtime ? await this.runtimeVersion(entry.runtime) : undefined;
        const context = buildScaffoldContext({
          entry,
          nodeName: node.name,
          nodeType: node.nodeType,
          runtimeVersion,
        });
        await fse.outputFile(target, renderScaffoldTemplate(once.template, context), "utf8");
        scaffolded.push(once.path);
      }

      const written: string[] = [];
      for (const file of node.files) {
        const changed = await this.writeIfChanged(this.resolveInside(root, file.path, "write"), file.content);
        if (changed) written.push(file.path);
      }

      logWorkspaceEvent(this.logger, "disk.project_created", {
        node_id: node.id,
        project_path: root,
        scaffolded,
        written: written.length,
      });
      return { projectPath: root, scaffolded, written };
    });
  }

  saveFile(node: WorkspaceNode, file: ProjectFile): Promise<DiskResult<SaveFileReport>> {
    const root = this.projectRoot(node);
    const filePath = file.path;
    const content = file.content;
    return this.runForNode(node, "write", path.join(root, filePath), async () => {
      const changed = await this.writeIfChanged(this.resolveInside(root, filePath, "write"), content);
      return { path: filePath, changed };
    });
  }

  deleteFile(node: WorkspaceNode, filePath: string): Promise<DiskResult<{ deleted: boolean }>> {
    const root = this.projectRoot(node);
    return this.runForNode(node, "delete", path.join(root, filePath), async () => {
      const target = this.resolveInside(root, filePath, "delete");
      if (!(await fse.pathExists(target))) {
        return { deleted: false };
      }
      await fse.remove(target);
      return { deleted: true };
    });
  }

  renameFile(
    node: WorkspaceNode,
    fromPath: string,
    toPath: string,
  ): Promise<DiskResult<{ moved: boolean }>> {
    const root = this.projectRoot(node);
    return this.runForNode(node, "rename", path.join(root, toPath), async () => {
      const source = this.resolveInside(root, fromPath, "rename");
      const destination = this.resolveInside(root, toPath, "rename");
      if (source === destination) return { moved: false };

      if (await fse.pathExists(destination)) {
        throw new MaterializeError(`Destination already exists: ${toPath}`, "rename", destination);
      }
      if (!(await fse.pathExists(source))) {
        return { moved: false };
      }

      await fse.move(source, destination);
      return { moved: true };
    });
  }

  removeProject(node: WorkspaceNode): Promise<DiskResult<{ removed: boolean }>> {
    const root = this.projectRoot(node);
    return this.runForNode(node, "remove-project", root, async () => {
      if (!isInside(projectsRoot(this.options.layout), root)) {
        throw new MaterializeError(
          `Refusing to remove a project outside the storage root: ${root}`,
          "remove-project",
          root,
        );
      }
      if (!(await fse.pathExists(root))) return { removed: false };
      await fse.remove(root);
      return { removed: true };
    });
  }

  listDiskFiles(node: WorkspaceNode): Promise<DiskResult<string[]>> {
    const root = this.projectRoot(node);
    return this.runForNode(node, "list", root, async () => {
      if (!(await fse.pathExists(root))) return [];
      const files: string[] = [];
      await collectFiles(root, "", files);
      return files.sort();
    });
  }

  async ensureEnvironment(node: WorkspaceNode): Promise<string | null> {
    const entry = getScaffoldEntry(node.framework);
    if (entry.environment !== "python-venv" || !this.options.createEnvironments) {
      return null;
    }

    const envPath = path.join(environmentsRoot(this.options.layout), node.id);
    if (await fse.pathExists(path.join(envPath, "pyvenv.cfg"))) {
      return envPath;
    }

    try {
      await fse.ensureDir(path.dirname(envPath));
      const result = await this.runner("python3", ["-m", "venv", envPath], {
        timeoutMs: this.options.environmentTimeoutMs ?? DEFAULT_ENVIRONMENT_TIMEOUT_MS,
      });
      if (result.exitCode !== 0) {
        logWorkspaceEvent(this.logger, "environment.failed", {
          node_id: node.id,
          exit_code: result.exitCode,
          stderr: result.stderr.trim(),
        });
        return null;
      }
    } catch (err) {
      logWorkspaceEvent(this.logger, "environment.failed", {
        node_id: node.id,
        message: errorMessage(err),
      });
      return null;
    }

    logWorkspaceEvent(this.logger, "environment.created", { node_id: node.id, path: envPath });
    return envPath;
  }

  async drain(): Promise<void> {
    await this.queue.drainAll();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private runForNode<T>(
    node: WorkspaceNode,
    operation: MaterializeOperation,
    targetPath: string,
    task: () => Promise<T>,
  ): Promise<DiskResult<T>> {
    return this.queue.run(node.id, async (): Promise<DiskResult<T>> => {
      try {
        return { ok: true, value: await task() };
      } catch (err) {
        const error =
          err instanceof MaterializeError
            ? err
            : new MaterializeError(errorMessage(err), operation, targetPath, err);
        logWorkspaceEvent(this.logger, `disk.${operation}_failed`, {
          node_id: node.id,
          path: error.targetPath,
          code: error.code ?? null,
          message: error.message,
        });
        return { ok: false, error };
      }
    });
  }

  private resolveInside(root: string, relativePath: string, operation: MaterializeOperation): string {
    const resolved = path.resolve(root, relativePath);
    if (!isInside(root, resolved)) {
      throw new MaterializeError(`Path escapes the project root: ${relativePath}`, operation, resolved);
    }
    return resolved;
  }

  private async writeIfChanged(target: string, content: string): Promise<boolean> {
    if (await fse.pathExists(target)) {
      const current = await fse.readFile(target, "utf8");
      if (current === content) return false;
    }
    await fse.outputFile(target, content, "utf8");
    return true;
  }

  private runtimeVersion(runtime: RuntimeId): Promise<string> {
    const cached = this.runtimeVersions.get(runtime);
    if (cached) return cached;

    const pending = detectRuntimeVersion(runtime, {
      runner: this.runner,
      enabled: this.options.detectToolchains ?? true,
      timeoutMs: this.options.probeTimeoutMs,
    });
    this.runtimeVersions.set(runtime, pending);
    return pending;
  }
}

// =============================================================================
// DISK LISTING
// =============================================================================

export function isIgnoredDirectory(name: string): boolean {
  return IGNORED_DIRECTORIES.some((pattern) => minimatch(name, pattern, { dot: true }));
}

export function isIgnoredFile(relativePath: string): boolean {
  return IGNORED_FILES.some((pattern) => minimatch(relativePath, pattern, { dot: true, matchBase: true }));
}

async function collectFiles(root: string, relativeDir: string, out: string[]): Promise<void> {
  const entries = await fse.readdir(path.join(root, relativeDir), { withFileTypes: true });
  for (const entry of entries) {
    const relative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      if (isIgnoredDirectory(entry.name)) continue;
      await collectFiles(root, relative, out);
    } else if (entry.isFile() && !isIgnoredFile(relative)) {
      out.push(toPosixPath(relative));
    }
  }
}
