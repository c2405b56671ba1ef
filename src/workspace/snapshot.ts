/*
Purpose: checkpoint the workspace to JSON and restore it with every invariant repaired.
Assumptions: a snapshot may come from an older build or a hand edit; restoring never
fails on fixable problems, only on documents the schema rejects.
Usage: await saveWorkspaceSnapshot(file, store.toSnapshot()); const snap = await loadWorkspaceSnapshot(file).
*/

import path from "node:path";

import fse from "fs-extra";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { IdSource } from "../core/ids.js";
import { errorMessage, readJsonFile, writeJsonFile } from "../core/utils.js";

import { createMainFile } from "./files.js";
import {
  clampCanvasScale,
  fileNameOf,
  normalizeFilePath,
  pathsOverlap,
  type ProjectFile,
  type WorkspaceNode,
  type WorkspaceState,
} from "./model.js";
import {
  formatSchemaIssues,
  SNAPSHOT_VERSION,
  WorkspaceSnapshotSchema,
  type NodeSnapshot,
  type WorkspaceSnapshot,
} from "./schema.js";

// =============================================================================
// STATE <-> SNAPSHOT
// =============================================================================

export function createSnapshot(
  state: WorkspaceState,
  timestamps: { created: string; modified: string },
): WorkspaceSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    projectName: state.projectName,
    nodes: state.nodeOrder.map((id) => toNodeSnapshot(state.nodes[id])),
    selectedNodeId: state.selectedNodeId,
    canvasOffset: { ...state.canvasOffset },
    canvasScale: state.canvasScale,
    created: timestamps.created,
    modified: timestamps.modified,
  };
}

export type RestoreOptions = {
  /**
   * The folder a node materializes into when it has no recorded path. A recorded
   * `projectPath` that differs from it is dropped and re-derived on next materialize.
   */
  defaultProjectRoot?: (nodeId: string) => string;
};

/**
 * Rebuilds workspace state from a snapshot. Every id in the document is adopted
 * by the id source first, so ids generated during repair never collide with them.
 */
export function restoreWorkspaceState(
  snapshot: WorkspaceSnapshot,
  ids: IdSource,
  options: RestoreOptions = {},
): WorkspaceState {
  for (const node of snapshot.nodes) {
    ids.adopt(node.id);
    for (const file of node.files) ids.adopt(file.id);
  }

  const nodeIds = new Set<string>();
  const usedFileIds = new Set<string>();
  const nodes: Record<string, WorkspaceNode> = {};
  const nodeOrder: string[] = [];

  for (const raw of snapshot.nodes) {
    if (nodeIds.has(raw.id)) continue;
    nodeIds.add(raw.id);
  }

  const keptNodes = new Set<string>();
  const claimedRoots = new Set<string>();
  for (const raw of snapshot.nodes) {
    if (keptNodes.has(raw.id)) continue;
    keptNodes.add(raw.id);

    const files = restoreFiles(raw, ids, usedFileIds, nodeIds);
    const selectedFileId =
      raw.selectedFileId === null
        ? null
        : files.some((file) => file.id === raw.selectedFileId)
          ? raw.selectedFileId
          : files[0].id;

    const connections: string[] = [];
    for (const target of raw.connections) {
      if (target === raw.id || !nodeIds.has(target) || connections.includes(target)) continue;
      connections.push(target);
    }

    nodes[raw.id] = {
      id: raw.id,
      name: raw.name,
      nodeType: raw.nodeType,
      framework: raw.framework,
      language: raw.language,
      position: { ...raw.position },
      files,
      selectedFileId,
      connections,
      projectPath: restoreProjectPath(raw, claimedRoots, options),
      environmentPath: raw.environmentPath,
    };
    nodeOrder.push(raw.id);
  }

  const selectedNodeId =
    snapshot.selectedNodeId !== null && nodeIds.has(snapshot.selectedNodeId) ? snapshot.selectedNodeId : null;

  return {
    projectName: snapshot.projectName,
    nodes,
    nodeOrder,
    selectedNodeId,
    canvasOffset: { ...snapshot.canvasOffset },
    canvasScale: clampCanvasScale(snapshot.canvasScale),
  };
}

// =============================================================================
// FILE I/O
// =============================================================================

export async function saveWorkspaceSnapshot(filePath: string, snapshot: WorkspaceSnapshot): Promise<void> {
  await writeJsonFile(filePath, sortKeys(snapshot));
}

export async function loadWorkspaceSnapshot(filePath: string): Promise<WorkspaceSnapshot | null> {
  if (!(await fse.pathExists(filePath))) return null;

  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: "Workspace file unreadable.",
      message: `Failed to read ${filePath}: ${errorMessage(err)}`,
      hint: "Restore the file from a backup or move it aside to start a new workspace.",
      cause: err,
    });
  }

  const parsed = WorkspaceSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: "Workspace file invalid.",
      message: `${filePath} does not match the workspace format:\n${issues.map((issue) => `- ${issue}`).join("\n")}`,
      hint: "Fix the listed fields or move the file aside to start a new workspace.",
      cause: parsed.error,
    });
  }

  return parsed.data;
}

export function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = sortKeys(entry);
    }
    return sorted;
  }
  return value;
}

// =============================================================================
// INTERNALS
// =============================================================================

function toNodeSnapshot(node: WorkspaceNode): NodeSnapshot {
  return {
    id: node.id,
    name: node.name,
    nodeType: node.nodeType,
    framework: node.framework,
    language: node.language,
    position: { ...node.position },
    files: node.files.map((file) => ({ ...file })),
    selectedFileId: node.selectedFileId,
    connections: [...node.connections],
    projectPath: node.projectPath,
    environmentPath: node.environmentPath,
  };
}

/** No two nodes may share a project folder; later claimants lose the recorded path. */
function restoreProjectPath(raw: NodeSnapshot, claimedRoots: Set<string>, options: RestoreOptions): string | null {
  if (raw.projectPath === null) return null;
  const resolved = path.resolve(raw.projectPath);
  if (options.defaultProjectRoot && resolved !== path.resolve(options.defaultProjectRoot(raw.id))) return null;
  if (claimedRoots.has(resolved)) return null;
  claimedRoots.add(resolved);
  return raw.projectPath;
}

function restoreFiles(
  raw: NodeSnapshot,
  ids: IdSource,
  usedFileIds: Set<string>,
  nodeIds: Set<string>,
): ProjectFile[] {
  const files: ProjectFile[] = [];
  const paths: string[] = [];

  for (const file of raw.files) {
    const filePath = normalizeFilePath(file.path);
    if (!filePath || paths.some((kept) => pathsOverlap(kept, filePath))) continue;

    // A file id shared with another file or a node is replaced with a fresh one.
    const id = usedFileIds.has(file.id) || nodeIds.has(file.id) ? ids.next() : file.id;
    usedFileIds.add(id);
    paths.push(filePath);
    files.push({
      id,
      path: filePath,
      name: fileNameOf(filePath),
      content: file.content,
      language: file.language,
    });
  }

  if (files.length === 0) {
    const main = createMainFile({
      ids,
      framework: raw.framework,
      nodeName: raw.name,
      nodeType: raw.nodeType,
    });
    usedFileIds.add(main.id);
    files.push(main);
  }

  return files;
}
