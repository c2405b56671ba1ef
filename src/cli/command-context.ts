import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { createAppContext, openWorkspace, saveWorkspace, type AppContext } from "../app/context.js";
import type { ProjectFile, WorkspaceNode } from "../workspace/model.js";
import type { MutationResult, NoopReason, WorkspaceStore } from "../workspace/store.js";

// =============================================================================
// WORKSPACE SESSION
// =============================================================================

/**
 * Opens the workspace, runs one command against it, then flushes disk work and
 * saves the snapshot. Read-only commands pass `save: false`.
 */
export async function withWorkspace<T>(
  run: (store: WorkspaceStore, ctx: AppContext) => Promise<T> | T,
  options: { save?: boolean; ctx?: AppContext } = {},
): Promise<T> {
  const ctx = options.ctx ?? createAppContext();
  const store = await openWorkspace(ctx);
  let result: T;
  try {
    result = await run(store, ctx);
  } catch (err) {
    await store.close();
    throw err;
  }

  if (options.save ?? true) {
    await saveWorkspace(ctx, store);
  } else {
    await store.close();
  }
  return result;
}

// =============================================================================
// REFERENCES
// =============================================================================

/** Resolves a node by exact id, then unique id prefix, then exact name. */
export function resolveNodeRef(store: WorkspaceStore, ref: string): WorkspaceNode {
  const exact = store.getNode(ref);
  if (exact) return exact;

  const nodes = store.listNodes();
  const byPrefix = nodes.filter((node) => node.id.startsWith(ref));
  if (byPrefix.length === 1) return byPrefix[0];

  const byName = nodes.filter((node) => node.name === ref);
  if (byName.length === 1) return byName[0];

  const ambiguous = byPrefix.length > 1 || byName.length > 1;
  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.workspace,
    title: ambiguous ? "Node reference is ambiguous." : "Node not found.",
    message: ambiguous ? `"${ref}" matches more than one node.` : `No node matches "${ref}".`,
    hint: "Use a longer id prefix; `lattice node list` shows ids.",
  });
}

/** Resolves a file by exact id, then unique id prefix, then path. */
export function resolveFileRef(node: WorkspaceNode, ref: string): ProjectFile {
  const exact = node.files.find((file) => file.id === ref);
  if (exact) return exact;

  const byPrefix = node.files.filter((file) => file.id.startsWith(ref));
  if (byPrefix.length === 1) return byPrefix[0];

  const byPath = node.files.find((file) => file.path === ref);
  if (byPath) return byPath;

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.workspace,
    title: "File not found.",
    message: `No file in "${node.name}" matches "${ref}".`,
    hint: `Run \`lattice node show ${node.id.slice(0, 8)}\` to list its files.`,
  });
}

// =============================================================================
// RESULTS
// =============================================================================

const NOOP_MESSAGES: Record<NoopReason, string> = {
  "node-not-found": "The node no longer exists.",
  "file-not-found": "The file no longer exists.",
  "invalid-path": "Paths must be relative and stay inside the project folder.",
  "invalid-name": "Names must be non-empty and must not contain path separators.",
  "invalid-position": "Positions must be finite numbers.",
  "path-exists": "That path is taken by another file or overlaps one of the project folders.",
  "self-loop": "A node cannot connect to itself.",
  unchanged: "Nothing to change.",
};

/**
 * Returns the applied value. "unchanged" is reported and treated as success;
 * every other no-op and every failure becomes a user-facing error.
 */
export function expectApplied<T>(result: MutationResult<T>, action: string): T | null {
  if (result.status === "applied") return result.value;
  if (result.status === "failed") throw result.error;

  if (result.reason === "unchanged") {
    console.log(`${action}: ${NOOP_MESSAGES.unchanged}`);
    return null;
  }

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.workspace,
    title: `${action} was not applied.`,
    message: NOOP_MESSAGES[result.reason],
  });
}

export function shortId(id: string): string {
  return id.slice(0, 8);
}

export function parseNumber(value: string, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: "Invalid number.",
      message: `${label} must be a number, got "${value}".`,
    });
  }
  return parsed;
}
