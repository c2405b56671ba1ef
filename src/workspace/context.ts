/*
Purpose: assemble the read-only context an assistant integration receives for a node.
Assumptions: previews are prefixes of each node's main file; connected nodes are those
the node points to followed by those pointing at it, each listed once.
Usage: const context = buildNodeContext(store.getState(), nodeId); formatContextPrompt(context).
*/

import { getScaffoldEntry } from "../scaffold/catalog.js";
import { truncateText } from "../core/utils.js";

import {
  findFileByPath,
  NODE_TYPE_LABELS,
  type CodeLanguage,
  type Framework,
  type NodeType,
  type ProjectFile,
  type WorkspaceNode,
  type WorkspaceState,
} from "./model.js";

// =============================================================================
// TYPES
// =============================================================================

export type ContextPreviewLimits = {
  current: number;
  connected: number;
};

export type MainFilePreview = {
  path: string;
  preview: string;
  truncated: boolean;
};

export type NodeContextEntry = {
  id: string;
  name: string;
  nodeType: NodeType;
  framework: Framework;
  language: CodeLanguage;
  mainFile: MainFilePreview | null;
};

export type NodeContext = {
  node: NodeContextEntry;
  connected: NodeContextEntry[];
};

export const DEFAULT_CONTEXT_LIMITS: ContextPreviewLimits = { current: 200, connected: 100 };

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildNodeContext(
  state: WorkspaceState,
  nodeId: string,
  limits: ContextPreviewLimits = DEFAULT_CONTEXT_LIMITS,
): NodeContext | null {
  const node = state.nodes[nodeId];
  if (!node) return null;

  return {
    node: toContextEntry(node, limits.current),
    connected: connectedNodes(state, node).map((other) => toContextEntry(other, limits.connected)),
  };
}

/** The catalog main file when the node still has it, otherwise its first file. */
export function mainFileOf(node: WorkspaceNode): ProjectFile | null {
  const entry = getScaffoldEntry(node.framework);
  return findFileByPath(node, entry.mainFile) ?? node.files[0] ?? null;
}

export function formatContextPrompt(context: NodeContext): string {
  const lines: string[] = ["Context about the current project:", ""];

  if (context.connected.length > 0) {
    lines.push("Connected Nodes:");
    for (const entry of context.connected) {
      lines.push(`- ${entry.name} (${NODE_TYPE_LABELS[entry.nodeType]}): ${frameworkLabel(entry)}`);
      if (entry.mainFile && entry.mainFile.preview.length > 0) {
        lines.push(`  Code preview: ${previewText(entry.mainFile)}`);
      }
    }
    lines.push("");
  }

  const current = context.node;
  lines.push("Current Node:");
  lines.push(`- Name: ${current.name}`);
  lines.push(`- Type: ${NODE_TYPE_LABELS[current.nodeType]}`);
  lines.push(`- Framework: ${frameworkLabel(current)}`);
  if (current.mainFile && current.mainFile.preview.length > 0) {
    lines.push(`- Existing code: ${previewText(current.mainFile)}`);
  }

  return `${lines.join("\n")}\n`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function connectedNodes(state: WorkspaceState, node: WorkspaceNode): WorkspaceNode[] {
  const seen = new Set<string>([node.id]);
  const result: WorkspaceNode[] = [];

  const add = (id: string): void => {
    if (seen.has(id)) return;
    const other = state.nodes[id];
    if (!other) return;
    seen.add(id);
    result.push(other);
  };

  node.connections.forEach(add);
  for (const id of state.nodeOrder) {
    if (state.nodes[id]?.connections.includes(node.id)) add(id);
  }
  return result;
}

function toContextEntry(node: WorkspaceNode, limit: number): NodeContextEntry {
  const main = mainFileOf(node);
  let mainFile: MainFilePreview | null = null;
  if (main) {
    const { text, truncated } = truncateText(main.content, limit);
    mainFile = { path: main.path, preview: text, truncated };
  }

  return {
    id: node.id,
    name: node.name,
    nodeType: node.nodeType,
    framework: node.framework,
    language: node.language,
    mainFile,
  };
}

function frameworkLabel(entry: NodeContextEntry): string {
  return getScaffoldEntry(entry.framework).label;
}

function previewText(preview: MainFilePreview): string {
  return preview.truncated ? `${preview.preview}...` : preview.preview;
}
