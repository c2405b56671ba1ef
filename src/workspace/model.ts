/**
 * Workspace data model: nodes, their files, and the canvas transform.
 *
 * Values are replaced, never mutated in place. Anything outside the store that
 * holds a node or file must re-resolve it by id before using it again.
 */
import path from "node:path";

// =============================================================================
// ENUMERATIONS
// =============================================================================

export const NODE_TYPES = ["macos-app", "iphone-app", "website", "cloud-backend", "custom"] as const;
export type NodeType = (typeof NODE_TYPES)[number];

export const NODE_TYPE_LABELS: Record<NodeType, string> = {
  "macos-app": "macOS App",
  "iphone-app": "iPhone App",
  website: "Website",
  "cloud-backend": "Cloud Backend",
  custom: "Custom",
};

export const CODE_LANGUAGES = [
  "swift",
  "python",
  "javascript",
  "typescript",
  "html",
  "css",
  "json",
  "yaml",
  "dockerfile",
  "kubernetes",
  "terraform",
  "cloudformation",
  "sql",
  "bash",
  "markdown",
  "rust",
  "go",
  "java",
  "plaintext",
] as const;
export type CodeLanguage = (typeof CODE_LANGUAGES)[number];

export const FRAMEWORKS = [
  "nodejs",
  "angular",
  "react",
  "vue",
  "nextjs",
  "express",
  "nestjs",
  "django",
  "flask",
  "fastapi",
  "purepy",
  "rust",
  "swift",
  "swiftui",
  "go",
  "java",
  "spring",
  "docker",
  "kubernetes",
  "terraform",
] as const;
export type Framework = (typeof FRAMEWORKS)[number];

/** What happens to a node's project directory when the node is deleted. */
export const DELETE_POLICIES = ["orphan", "purge"] as const;
export type DeletePolicy = (typeof DELETE_POLICIES)[number];

// =============================================================================
// RECORDS
// =============================================================================

export type Position = {
  x: number;
  y: number;
};

export type ProjectFile = {
  readonly id: string;
  /** Relative POSIX path inside the node's project root, unique per node. */
  path: string;
  name: string;
  content: string;
  language: CodeLanguage;
};

export type WorkspaceNode = {
  readonly id: string;
  name: string;
  nodeType: NodeType;
  framework: Framework;
  language: CodeLanguage;
  position: Position;
  files: readonly ProjectFile[];
  selectedFileId: string | null;
  /** Ordered set of target node ids. Informational only; cycles are allowed. */
  connections: readonly string[];
  projectPath: string | null;
  environmentPath: string | null;
};

export type WorkspaceState = {
  projectName: string;
  nodes: Readonly<Record<string, WorkspaceNode>>;
  nodeOrder: readonly string[];
  selectedNodeId: string | null;
  canvasOffset: Position;
  canvasScale: number;
};

export const DEFAULT_PROJECT_NAME = "Untitled Project";
export const CANVAS_SCALE_MIN = 0.5;
export const CANVAS_SCALE_MAX = 2.0;

export function createEmptyWorkspaceState(projectName = DEFAULT_PROJECT_NAME): WorkspaceState {
  return {
    projectName,
    nodes: {},
    nodeOrder: [],
    selectedNodeId: null,
    canvasOffset: { x: 0, y: 0 },
    canvasScale: 1,
  };
}

// =============================================================================
// HELPERS
// =============================================================================

export function clampCanvasScale(scale: number): number {
  if (!Number.isFinite(scale)) return 1;
  return Math.min(CANVAS_SCALE_MAX, Math.max(CANVAS_SCALE_MIN, scale));
}

/**
 * Normalizes a node-relative file path. Returns null for paths that are empty,
 * absolute, or climb out of the project root.
 */
export function normalizeFilePath(input: string): string | null {
  const trimmed = input.trim().replace(/\\/g, "/");
  if (trimmed.length === 0 || trimmed.startsWith("/") || /^[A-Za-z]:/.test(trimmed)) {
    return null;
  }

  const normalized = path.posix.normalize(trimmed);
  if (normalized === "." || normalized === ".." || normalized.startsWith("../")) {
    return null;
  }
  if (normalized.endsWith("/")) {
    return null;
  }
  return normalized;
}

export function fileNameOf(filePath: string): string {
  return path.posix.basename(filePath);
}

export function replaceFileName(filePath: string, newName: string): string {
  const dir = path.posix.dirname(filePath);
  return dir === "." ? newName : `${dir}/${newName}`;
}

export function findFile(node: WorkspaceNode, fileId: string): ProjectFile | null {
  return node.files.find((file) => file.id === fileId) ?? null;
}

export function findFileByPath(node: WorkspaceNode, filePath: string): ProjectFile | null {
  return node.files.find((file) => file.path === filePath) ?? null;
}

/** True when one path is the other or a directory that contains it. */
export function pathsOverlap(a: string, b: string): boolean {
  return a === b || a.startsWith(`${b}/`) || b.startsWith(`${a}/`);
}
