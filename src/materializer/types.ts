import type { MaterializeError } from "../core/errors.js";
import type { ProjectFile, WorkspaceNode } from "../workspace/model.js";

export type DiskResult<T> = { ok: true; value: T } | { ok: false; error: MaterializeError };

export type ProjectStructureReport = {
  projectPath: string;
  /** Scaffold files (manifest, README, ignore files) written because they were absent. */
  scaffolded: string[];
  /** Node files whose content differed from disk and was written. */
  written: string[];
};

export type SaveFileReport = {
  path: string;
  changed: boolean;
};

/**
 * Disk port used by the store and the persistence coordinator.
 *
 * Work for one node runs in call order. Callers pass a node resolved from the
 * store immediately before the call, so queued work never overtakes newer state.
 */
export interface ProjectDisk {
  /** The node's recorded `projectPath`, else its default folder. */
  projectRoot(node: WorkspaceNode): string;
  defaultProjectRoot(nodeId: string): string;
  createProjectStructure(node: WorkspaceNode): Promise<DiskResult<ProjectStructureReport>>;
  saveFile(node: WorkspaceNode, file: ProjectFile): Promise<DiskResult<SaveFileReport>>;
  /** A file that is already gone counts as deleted. */
  deleteFile(node: WorkspaceNode, filePath: string): Promise<DiskResult<{ deleted: boolean }>>;
  /** `moved` is false when the source was never written; the destination must not exist. */
  renameFile(
    node: WorkspaceNode,
    fromPath: string,
    toPath: string,
  ): Promise<DiskResult<{ moved: boolean }>>;
  removeProject(node: WorkspaceNode): Promise<DiskResult<{ removed: boolean }>>;
  listDiskFiles(node: WorkspaceNode): Promise<DiskResult<string[]>>;
  /** Returns the environment path, or null when none applies or creation failed. */
  ensureEnvironment(node: WorkspaceNode): Promise<string | null>;
  /** Resolves once all queued disk work has settled. */
  drain(): Promise<void>;
}
