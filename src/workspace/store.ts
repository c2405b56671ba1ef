/*
Purpose: the single owner and mutator of the node graph, its files, and selection.
Assumptions: synchronous mutations run to completion on the event loop; operations that
await disk run through one serial queue; every operation re-resolves ids when it starts
and again after each await.
Usage: const store = new WorkspaceStore({ disk }); const id = store.createNode("website", "react");
*/

import { createStore, type StoreApi } from "zustand/vanilla";

import { createDiskUserError, type UserFacingError } from "../core/errors.js";
import { IdSource } from "../core/ids.js";
import { logWorkspaceEvent, silentLogger, type EventLogger } from "../core/logger.js";
import { KeyedSerialQueue } from "../core/serial-queue.js";
import { errorMessage, isoNow } from "../core/utils.js";
import type { DiskResult, ProjectDisk, ProjectStructureReport } from "../materializer/types.js";
import { PersistenceCoordinator, type FailedWrite, type FileWriter } from "../persistence/coordinator.js";
import { conflictsWithScaffold, getScaffoldEntry } from "../scaffold/catalog.js";
import { languageForPath } from "../scaffold/languages.js";

import { buildNodeContext, DEFAULT_CONTEXT_LIMITS, type ContextPreviewLimits, type NodeContext } from "./context.js";
import { createMainFile, createProjectFile } from "./files.js";
import {
  clampCanvasScale,
  createEmptyWorkspaceState,
  findFile,
  findFileByPath,
  normalizeFilePath,
  pathsOverlap,
  replaceFileName,
  type CodeLanguage,
  type DeletePolicy,
  type Framework,
  type NodeType,
  type Position,
  type ProjectFile,
  type WorkspaceNode,
  type WorkspaceState,
} from "./model.js";
import type { WorkspaceSnapshot } from "./schema.js";
import { createSnapshot, restoreWorkspaceState } from "./snapshot.js";

// =============================================================================
// TYPES
// =============================================================================

export type NoopReason =
  | "node-not-found"
  | "file-not-found"
  | "invalid-path"
  | "invalid-name"
  | "invalid-position"
  | "path-exists"
  | "self-loop"
  | "unchanged";

export type MutationResult<T = void> =
  | { status: "applied"; value: T }
  | { status: "noop"; reason: NoopReason }
  | { status: "failed"; error: UserFacingError };

export type WorkspaceListener = (state: WorkspaceState, previous: WorkspaceState) => void;

export type WorkspaceStoreDeps = {
  disk: ProjectDisk;
  ids?: IdSource;
  logger?: EventLogger;
  debounceMs?: number;
  deletePolicy?: DeletePolicy;
  contextLimits?: ContextPreviewLimits;
};

export type CreateNodeOptions = {
  name?: string;
  position?: Position;
};

export type RemovedFile = {
  removed: ProjectFile;
  /** Main file created because the removed file was the node's last one. */
  replacement: ProjectFile | null;
};

export type MaterializeOutcome = {
  nodeId: string;
  result: MutationResult<ProjectStructureReport>;
};

const NODE_SPACING = 50;
const FIRST_NODE_OFFSET = 200;
const OPERATIONS_KEY = "workspace";

const APPLIED: MutationResult = { status: "applied", value: undefined };

function applied<T>(value: T): MutationResult<T> {
  return { status: "applied", value };
}

function noop(reason: NoopReason): { status: "noop"; reason: NoopReason } {
  return { status: "noop", reason };
}

// =============================================================================
// STORE
// =============================================================================

export class WorkspaceStore {
  private readonly store: StoreApi<WorkspaceState>;
  private readonly ids: IdSource;
  private readonly disk: ProjectDisk;
  private readonly logger: EventLogger;
  private readonly persistence: PersistenceCoordinator;
  private readonly operations = new KeyedSerialQueue();
  private readonly background = new Set<Promise<void>>();
  /** Paths held by renames whose disk step has not settled, per node. */
  private readonly reservedPaths = new Map<string, Set<string>>();
  private readonly deletePolicy: DeletePolicy;
  private readonly contextLimits: ContextPreviewLimits;
  private created: string;

  constructor(deps: WorkspaceStoreDeps, initial: WorkspaceState = createEmptyWorkspaceState()) {
    this.disk = deps.disk;
    this.ids = deps.ids ?? new IdSource();
    this.logger = deps.logger ?? silentLogger;
    this.deletePolicy = deps.deletePolicy ?? "orphan";
    this.contextLimits = deps.contextLimits ?? DEFAULT_CONTEXT_LIMITS;
    this.created = isoNow();
    this.store = createStore<WorkspaceState>()(() => initial);
    this.persistence = new PersistenceCoordinator({
      writer: this.writeFile,
      debounceMs: deps.debounceMs,
      logger: this.logger,
    });
  }

  static fromSnapshot(snapshot: WorkspaceSnapshot, deps: WorkspaceStoreDeps): WorkspaceStore {
    const ids = deps.ids ?? new IdSource();
    const state = restoreWorkspaceState(snapshot, ids, {
      defaultProjectRoot: (nodeId) => deps.disk.defaultProjectRoot(nodeId),
    });
    const store = new WorkspaceStore({ ...deps, ids }, state);
    store.created = snapshot.created;
    return store;
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  getState(): WorkspaceState {
    return this.store.getState();
  }

  getNode(nodeId: string): WorkspaceNode | null {
    return this.getState().nodes[nodeId] ?? null;
  }

  getFile(nodeId: string, fileId: string): ProjectFile | null {
    const node = this.getNode(nodeId);
    return node ? findFile(node, fileId) : null;
  }

  listNodes(): WorkspaceNode[] {
    const state = this.getState();
    return state.nodeOrder.map((id) => state.nodes[id]);
  }

  getSelectedNode(): WorkspaceNode | null {
    const selected = this.getState().selectedNodeId;
    return selected ? this.getNode(selected) : null;
  }

  getSelectedFile(): ProjectFile | null {
    const node = this.getSelectedNode();
    if (!node || !node.selectedFileId) return null;
    return findFile(node, node.selectedFileId);
  }

  subscribe(listener: WorkspaceListener): () => void {
    return this.store.subscribe(listener);
  }

  buildContext(nodeId: string, limits: ContextPreviewLimits = this.contextLimits): NodeContext | null {
    return buildNodeContext(this.getState(), nodeId, limits);
  }

  failedWrites(): FailedWrite[] {
    return this.persistence.failedWrites();
  }

  toSnapshot(): WorkspaceSnapshot {
    return createSnapshot(this.getState(), { created: this.created, modified: isoNow() });
  }

  // ===========================================================================
  // NODES
  // ===========================================================================

  createNode(nodeType: NodeType, framework: Framework, options: CreateNodeOptions = {}): string {
    const state = this.getState();
    const count = state.nodeOrder.length;
    const id = this.ids.next();
    const name = options.name?.trim() || `New Node ${count + 1}`;
    const mainFile = createMainFile({ ids: this.ids, framework, nodeName: name, nodeType, logger: this.logger });

    const node: WorkspaceNode = {
      id,
      name,
      nodeType,
      framework,
      language: getScaffoldEntry(framework).language,
      position: options.position ?? {
        x: FIRST_NODE_OFFSET + count * NODE_SPACING,
        y: FIRST_NODE_OFFSET + count * NODE_SPACING,
      },
      files: [mainFile],
      selectedFileId: mainFile.id,
      connections: [],
      projectPath: null,
      environmentPath: null,
    };

    this.startFlushOfSelection();
    this.store.setState({
      nodes: { ...state.nodes, [id]: node },
      nodeOrder: [...state.nodeOrder, id],
      selectedNodeId: id,
    });
    logWorkspaceEvent(this.logger, "node.created", { node_id: id, framework, node_type: nodeType });

    this.track(this.materialize(id).then(() => undefined));
    return id;
  }

  deleteNode(nodeId: string): MutationResult {
    const state = this.getState();
    const node = state.nodes[nodeId];
    if (!node) return noop("node-not-found");

    const cancelled = this.persistence.cancelNode(nodeId);

    const nodes: Record<string, WorkspaceNode> = {};
    for (const id of state.nodeOrder) {
      if (id === nodeId) continue;
      const other = state.nodes[id];
      nodes[id] = other.connections.includes(nodeId)
        ? { ...other, connections: other.connections.filter((target) => target !== nodeId) }
        : other;
    }

    this.store.setState({
      nodes,
      nodeOrder: state.nodeOrder.filter((id) => id !== nodeId),
      selectedNodeId: state.selectedNodeId === nodeId ? null : state.selectedNodeId,
    });
    logWorkspaceEvent(this.logger, "node.deleted", { node_id: nodeId, delete_policy: this.deletePolicy });

    if (this.deletePolicy === "purge") {
      this.track(
        (async () => {
          await cancelled;
          await this.disk.removeProject(node);
        })(),
      );
    } else {
      this.track(cancelled);
    }
    return APPLIED;
  }

  renameNode(nodeId: string, name: string): MutationResult<WorkspaceNode> {
    const node = this.getNode(nodeId);
    if (!node) return noop("node-not-found");
    const trimmed = name.trim();
    if (!trimmed) return noop("invalid-name");
    if (trimmed === node.name) return noop("unchanged");

    const updated = this.updateNode(nodeId, (current) => ({ ...current, name: trimmed }));
    logWorkspaceEvent(this.logger, "node.renamed", { node_id: nodeId, name: trimmed });
    return applied(updated);
  }

  moveNode(nodeId: string, position: Position): MutationResult<WorkspaceNode> {
    const node = this.getNode(nodeId);
    if (!node) return noop("node-not-found");
    if (!Number.isFinite(position.x) || !Number.isFinite(position.y)) return noop("invalid-position");
    if (node.position.x === position.x && node.position.y === position.y) return noop("unchanged");

    return applied(this.updateNode(nodeId, (current) => ({ ...current, position: { ...position } })));
  }

  /**
   * Switches the node's framework and language. The new framework's main file is
   * added when no file sits at its path; existing files are kept.
   */
  setFramework(nodeId: string, framework: Framework): MutationResult<WorkspaceNode> {
    const node = this.getNode(nodeId);
    if (!node) return noop("node-not-found");
    if (node.framework === framework) return noop("unchanged");

    const entry = getScaffoldEntry(framework);
    const mainFile =
      findFileByPath(node, entry.mainFile) || this.isPathTaken(node, entry.mainFile)
        ? null
        : createMainFile({
            ids: this.ids,
            framework,
            nodeName: node.name,
            nodeType: node.nodeType,
            logger: this.logger,
          });

    const updated = this.updateNode(nodeId, (current) => ({
      ...current,
      framework,
      language: entry.language,
      files: mainFile ? [...current.files, mainFile] : current.files,
      selectedFileId: mainFile ? mainFile.id : current.selectedFileId,
    }));
    logWorkspaceEvent(this.logger, "node.framework_changed", {
      node_id: nodeId,
      framework,
      main_file_added: mainFile !== null,
    });

    this.track(this.materialize(nodeId).then(() => undefined));
    return applied(updated);
  }

  connect(fromId: string, toId: string): MutationResult {
    const from = this.getNode(fromId);
    if (!from || !this.getNode(toId)) return noop("node-not-found");
    if (fromId === toId) return noop("self-loop");
    if (from.connections.includes(toId)) return noop("unchanged");

    this.updateNode(fromId, (current) => ({ ...current, connections: [...current.connections, toId] }));
    logWorkspaceEvent(this.logger, "connection.added", { node_id: fromId, target_id: toId });
    return APPLIED;
  }

  disconnect(fromId: string, toId: string): MutationResult {
    const from = this.getNode(fromId);
    if (!from) return noop("node-not-found");
    if (!from.connections.includes(toId)) return noop("unchanged");

    this.updateNode(fromId, (current) => ({
      ...current,
      connections: current.connections.filter((target) => target !== toId),
    }));
    logWorkspaceEvent(this.logger, "connection.removed", { node_id: fromId, target_id: toId });
    return APPLIED;
  }

  // ===========================================================================
  // SELECTION
  // ===========================================================================

  /** Flushes the previously selected node's pending edits before switching. */
  selectNode(nodeId: string | null): Promise<MutationResult> {
    return this.operations.run(OPERATIONS_KEY, async (): Promise<MutationResult> => {
      if (nodeId !== null && !this.getNode(nodeId)) return noop("node-not-found");
      const previous = this.getState().selectedNodeId;
      if (previous === nodeId) return noop("unchanged");

      if (previous) await this.persistence.flushNode(previous);

      if (nodeId !== null && !this.getNode(nodeId)) return noop("node-not-found");
      this.store.setState({ selectedNodeId: nodeId });
      return APPLIED;
    });
  }

  /** Selects a file and its node, flushing the previously selected file first. */
  selectFile(nodeId: string, fileId: string): Promise<MutationResult> {
    return this.operations.run(OPERATIONS_KEY, async (): Promise<MutationResult> => {
      const node = this.getNode(nodeId);
      if (!node) return noop("node-not-found");
      if (!findFile(node, fileId)) return noop("file-not-found");
      if (node.selectedFileId === fileId && this.getState().selectedNodeId === nodeId) {
        return noop("unchanged");
      }

      const flushes: Promise<void>[] = [];
      const selectedNode = this.getSelectedNode();
      if (selectedNode?.selectedFileId) {
        flushes.push(this.persistence.flush(selectedNode.id, selectedNode.selectedFileId));
      }
      if (node.selectedFileId && node.selectedFileId !== fileId) {
        flushes.push(this.persistence.flush(nodeId, node.selectedFileId));
      }
      await Promise.all(flushes);

      const current = this.getNode(nodeId);
      if (!current) return noop("node-not-found");
      if (!findFile(current, fileId)) return noop("file-not-found");

      this.updateNode(nodeId, (latest) => ({ ...latest, selectedFileId: fileId }));
      this.store.setState({ selectedNodeId: nodeId });
      return APPLIED;
    });
  }

  // ===========================================================================
  // FILES
  // ===========================================================================

  updateFileContent(nodeId: string, fileId: string, content: string): MutationResult {
    const node = this.getNode(nodeId);
    if (!node) return noop("node-not-found");
    const file = findFile(node, fileId);
    if (!file) return noop("file-not-found");
    if (file.content === content) return noop("unchanged");

    this.replaceFile(nodeId, fileId, (current) => ({ ...current, content }));
    this.persistence.submit(nodeId, fileId);
    return APPLIED;
  }

  addFile(
    nodeId: string,
    filePath: string,
    language?: CodeLanguage,
    content = "",
  ): MutationResult<ProjectFile> {
    const node = this.getNode(nodeId);
    if (!node) return noop("node-not-found");
    const normalized = normalizeFilePath(filePath);
    if (!normalized) return noop("invalid-path");
    if (this.isPathTaken(node, normalized)) return noop("path-exists");

    const file = createProjectFile({
      ids: this.ids,
      path: normalized,
      content,
      language: language ?? languageForPath(normalized, node.language),
    });

    if (node.selectedFileId) this.track(this.persistence.flush(nodeId, node.selectedFileId));
    this.updateNode(nodeId, (current) => ({
      ...current,
      files: [...current.files, file],
      selectedFileId: file.id,
    }));
    logWorkspaceEvent(this.logger, "file.added", { node_id: nodeId, file_id: file.id, path: normalized });

    this.persistence.submit(nodeId, file.id);
    this.track(this.persistence.flush(nodeId, file.id));
    return applied(file);
  }

  /**
   * Removes a file. Its pending write is cancelled before the disk copy is deleted;
   * removing the last file adds a fresh main file, written after the delete.
   */
  removeFile(nodeId: string, fileId: string): MutationResult<RemovedFile> {
    const node = this.getNode(nodeId);
    if (!node) return noop("node-not-found");
    const removed = findFile(node, fileId);
    if (!removed) return noop("file-not-found");

    const cancelled = this.persistence.cancel(nodeId, fileId);

    const remaining = node.files.filter((file) => file.id !== fileId);
    const replacement =
      remaining.length === 0
        ? createMainFile({
            ids: this.ids,
            framework: node.framework,
            nodeName: node.name,
            nodeType: node.nodeType,
            logger: this.logger,
          })
        : null;
    const files = replacement ? [replacement] : remaining;
    const selectedFileId =
      node.selectedFileId !== null && node.selectedFileId !== fileId ? node.selectedFileId : files[0].id;

    this.updateNode(nodeId, (current) => ({ ...current, files, selectedFileId }));
    logWorkspaceEvent(this.logger, "file.removed", {
      node_id: nodeId,
      file_id: fileId,
      path: removed.path,
      replacement_id: replacement?.id ?? null,
    });

    this.track(
      (async () => {
        await cancelled;
        const current = this.getNode(nodeId);
        if (!current) return;
        await this.disk.deleteFile(current, removed.path);
        if (replacement) {
          this.persistence.submit(nodeId, replacement.id);
          await this.persistence.flush(nodeId, replacement.id);
        }
      })(),
    );

    return applied({ removed, replacement });
  }

  /**
   * Renames a file within its directory. The in-memory rename is applied first and
   * rolled back when the disk rename fails; the old path stays reserved until then.
   */
  renameFile(nodeId: string, fileId: string, newName: string): Promise<MutationResult<ProjectFile>> {
    return this.operations.run(OPERATIONS_KEY, async (): Promise<MutationResult<ProjectFile>> => {
      const name = newName.trim();
      if (!isValidFileName(name)) return noop("invalid-name");

      const check = this.resolveRename(nodeId, fileId, name);
      if (check.status !== "applied") return check;

      await this.persistence.flush(nodeId, fileId);

      const recheck = this.resolveRename(nodeId, fileId, name);
      if (recheck.status !== "applied") return recheck;
      const { node, file, newPath } = recheck.value;

      const prior = { path: file.path, name: file.name, language: file.language };
      const renamed = this.replaceFile(nodeId, fileId, (current) => ({
        ...current,
        path: newPath,
        name,
        language: languageForPath(newPath, current.language),
      }));

      const reserved = this.reservePath(nodeId, prior.path);
      const result = await this.disk.renameFile(node, prior.path, newPath).finally(reserved.release);

      if (!result.ok) {
        this.rollBackRename(nodeId, fileId, newPath, prior);
        logWorkspaceEvent(this.logger, "file.rename_failed", {
          node_id: nodeId,
          file_id: fileId,
          from: prior.path,
          to: newPath,
          message: result.error.message,
        });
        return { status: "failed", error: createDiskUserError({ title: "Couldn't rename file.", error: result.error }) };
      }

      logWorkspaceEvent(this.logger, "file.renamed", { node_id: nodeId, file_id: fileId, from: prior.path, to: newPath });
      if (!result.value.moved) {
        this.persistence.submit(nodeId, fileId);
        await this.persistence.flush(nodeId, fileId);
      }
      return applied(this.getFile(nodeId, fileId) ?? renamed);
    });
  }

  // ===========================================================================
  // CANVAS
  // ===========================================================================

  setProjectName(name: string): MutationResult {
    const trimmed = name.trim();
    if (!trimmed) return noop("invalid-name");
    if (trimmed === this.getState().projectName) return noop("unchanged");
    this.store.setState({ projectName: trimmed });
    return APPLIED;
  }

  panCanvas(delta: Position): MutationResult<Position> {
    if (!Number.isFinite(delta.x) || !Number.isFinite(delta.y)) return noop("invalid-position");
    const { canvasOffset } = this.getState();
    const next = { x: canvasOffset.x + delta.x, y: canvasOffset.y + delta.y };
    this.store.setState({ canvasOffset: next });
    return applied(next);
  }

  setCanvasScale(scale: number): MutationResult<number> {
    const clamped = clampCanvasScale(scale);
    if (clamped === this.getState().canvasScale) return noop("unchanged");
    this.store.setState({ canvasScale: clamped });
    return applied(clamped);
  }

  resetCanvas(): MutationResult {
    this.store.setState({ canvasOffset: { x: 0, y: 0 }, canvasScale: 1 });
    return APPLIED;
  }

  // ===========================================================================
  // DISK
  // ===========================================================================

  async materializeNode(nodeId: string): Promise<MutationResult<ProjectStructureReport>> {
    const result = await this.materialize(nodeId);
    if (!result) return noop("node-not-found");
    if (!result.ok) {
      return {
        status: "failed",
        error: createDiskUserError({ title: "Couldn't create the project folder.", error: result.error }),
      };
    }
    return applied(result.value);
  }

  async materializeAll(): Promise<MaterializeOutcome[]> {
    const ids = [...this.getState().nodeOrder];
    return Promise.all(ids.map(async (nodeId) => ({ nodeId, result: await this.materializeNode(nodeId) })));
  }

  async listDiskFiles(nodeId: string): Promise<MutationResult<string[]>> {
    const node = this.getNode(nodeId);
    if (!node) return noop("node-not-found");
    const result = await this.disk.listDiskFiles(node);
    if (!result.ok) {
      return { status: "failed", error: createDiskUserError({ title: "Couldn't list project files.", error: result.error }) };
    }
    return applied(result.value);
  }

  async flushPendingWrites(): Promise<void> {
    await this.persistence.flushAll();
  }

  /** Resolves once background disk work started so far (and any it started) has settled. */
  async whenIdle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
    await this.disk.drain();
  }

  async close(): Promise<void> {
    await this.flushPendingWrites();
    await this.whenIdle();
    this.persistence.dispose();
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private readonly writeFile: FileWriter = async (nodeId, fileId) => {
    const node = this.getNode(nodeId);
    if (!node) return { status: "skipped", reason: "node-not-found" };
    const file = findFile(node, fileId);
    if (!file) return { status: "skipped", reason: "file-not-found" };

    const result = await this.disk.saveFile(node, file);
    return result.ok ? { status: "written" } : { status: "failed", error: result.error };
  };

  private async materialize(nodeId: string): Promise<DiskResult<ProjectStructureReport> | null> {
    const node = this.getNode(nodeId);
    if (!node) return null;

    const result = await this.disk.createProjectStructure(node);
    if (!result.ok) return result;

    const current = this.getNode(nodeId);
    if (!current) return result;
    if (current.projectPath === null) {
      this.updateNode(nodeId, (latest) => ({ ...latest, projectPath: result.value.projectPath }));
    }

    const withPath = this.getNode(nodeId);
    if (!withPath) return result;
    const environmentPath = await this.disk.ensureEnvironment(withPath);
    if (environmentPath) {
      const latest = this.getNode(nodeId);
      if (latest && latest.environmentPath !== environmentPath) {
        this.updateNode(nodeId, (fresh) => ({ ...fresh, environmentPath }));
      }
    }
    return result;
  }

  private resolveRename(
    nodeId: string,
    fileId: string,
    name: string,
  ): MutationResult<{ node: WorkspaceNode; file: ProjectFile; newPath: string }> {
    const node = this.getNode(nodeId);
    if (!node) return noop("node-not-found");
    const file = findFile(node, fileId);
    if (!file) return noop("file-not-found");

    const newPath = normalizeFilePath(replaceFileName(file.path, name));
    if (!newPath) return noop("invalid-path");
    if (newPath === file.path) return noop("unchanged");
    if (this.isPathTaken(node, newPath, fileId)) return noop("path-exists");
    return applied({ node, file, newPath });
  }

  /**
   * A path is taken when it overlaps another file of the node, a path reserved by a
   * rename in flight, or the framework's scaffold layout.
   */
  private isPathTaken(node: WorkspaceNode, candidate: string, ignoreFileId?: string): boolean {
    if (node.files.some((file) => file.id !== ignoreFileId && pathsOverlap(file.path, candidate))) return true;
    for (const reserved of this.reservedPaths.get(node.id) ?? []) {
      if (pathsOverlap(reserved, candidate)) return true;
    }
    return conflictsWithScaffold(getScaffoldEntry(node.framework), candidate);
  }

  private reservePath(nodeId: string, filePath: string): { release: () => void } {
    const held = this.reservedPaths.get(nodeId) ?? new Set<string>();
    held.add(filePath);
    this.reservedPaths.set(nodeId, held);
    return {
      release: () => {
        held.delete(filePath);
        if (held.size === 0) this.reservedPaths.delete(nodeId);
      },
    };
  }

  /**
   * Restores the pre-rename path. When another file already sits at that path the
   * file keeps its new path and is written there instead.
   */
  private rollBackRename(
    nodeId: string,
    fileId: string,
    newPath: string,
    prior: Pick<ProjectFile, "path" | "name" | "language">,
  ): void {
    const node = this.getNode(nodeId);
    const file = node ? findFile(node, fileId) : null;
    if (!node || !file || file.path !== newPath) return;

    if (node.files.some((other) => other.id !== fileId && pathsOverlap(other.path, prior.path))) {
      logWorkspaceEvent(this.logger, "file.rename_rollback_skipped", { node_id: nodeId, file_id: fileId, path: newPath });
      this.persistence.submit(nodeId, fileId);
      return;
    }
    this.replaceFile(nodeId, fileId, (current) => ({ ...current, ...prior }));
  }

  /** Starts writing the selected file's pending edit before selection moves away. */
  private startFlushOfSelection(): void {
    const selected = this.getSelectedNode();
    if (selected) this.track(this.persistence.flushNode(selected.id));
  }

  private updateNode(nodeId: string, update: (node: WorkspaceNode) => WorkspaceNode): WorkspaceNode {
    const state = this.getState();
    const node = state.nodes[nodeId];
    const next = update(node);
    this.store.setState({ nodes: { ...state.nodes, [nodeId]: next } });
    return next;
  }

  private replaceFile(
    nodeId: string,
    fileId: string,
    update: (file: ProjectFile) => ProjectFile,
  ): ProjectFile {
    const current = findFile(this.getState().nodes[nodeId], fileId);
    if (!current) throw new Error(`File ${fileId} is not part of node ${nodeId}.`);
    const next = update(current);
    this.updateNode(nodeId, (node) => ({
      ...node,
      files: node.files.map((file) => (file.id === fileId ? next : file)),
    }));
    return next;
  }

  private track(work: Promise<void>): void {
    const tracked = work.catch((err: unknown) => {
      logWorkspaceEvent(this.logger, "workspace.background_failed", { message: errorMessage(err) });
    });
    this.background.add(tracked);
    void tracked.then(() => {
      this.background.delete(tracked);
    });
  }
}

export function isValidFileName(name: string): boolean {
  return name.length > 0 && name !== "." && name !== ".." && !/[\\/]/.test(name);
}
