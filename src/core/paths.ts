import os from "node:os";
import path from "node:path";

// =============================================================================
// HOME + SETTINGS
// =============================================================================

export function latticeHome(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.LATTICE_HOME?.trim();
  return override ? path.resolve(override) : path.join(os.homedir(), ".lattice");
}

export function settingsPath(home: string = latticeHome()): string {
  return path.join(home, "settings.json");
}

export function defaultStorageRoot(): string {
  return path.join(os.homedir(), "LatticeProjects");
}

// =============================================================================
// STORAGE LAYOUT
// =============================================================================

export type StorageLayout = {
  storageRoot: string;
  projectNamespace?: string;
};

export function projectsRoot(layout: StorageLayout): string {
  const root = path.resolve(layout.storageRoot);
  return layout.projectNamespace ? path.join(root, layout.projectNamespace) : root;
}

export function projectRootFor(layout: StorageLayout, nodeId: string): string {
  return path.join(projectsRoot(layout), nodeId);
}

export function workspaceSnapshotPath(layout: StorageLayout): string {
  return path.join(projectsRoot(layout), "workspace.json");
}

export function workspaceLogPath(layout: StorageLayout): string {
  return path.join(path.resolve(layout.storageRoot), "logs", "workspace.jsonl");
}

export function environmentsRoot(layout: StorageLayout): string {
  return path.join(path.resolve(layout.storageRoot), ".environments");
}

export function isInside(parent: string, candidate: string): boolean {
  const rel = path.relative(parent, candidate);
  return rel.length > 0 && !rel.startsWith("..") && !path.isAbsolute(rel);
}
