import { Command } from "commander";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { getScaffoldEntry, isFramework } from "../scaffold/catalog.js";
import { NODE_TYPE_LABELS, NODE_TYPES, type Framework, type NodeType, type WorkspaceNode } from "../workspace/model.js";
import type { WorkspaceStore } from "../workspace/store.js";

import { expectApplied, parseNumber, resolveNodeRef, shortId, withWorkspace } from "./command-context.js";

export function registerNodeCommands(program: Command): void {
  const node = program.command("node").description("Create and manage workspace nodes");

  node
    .command("create")
    .description("Create a node with a scaffolded main file")
    .argument("<framework>", "Framework from `lattice frameworks`")
    .option("--type <type>", `Node type (${NODE_TYPES.join(", ")})`)
    .option("--name <name>", "Display name")
    .action(async (frameworkArg: string, opts: { type?: string; name?: string }) => {
      await withWorkspace((store, ctx) => {
        const framework = parseFramework(frameworkArg, ctx.settings.enabled_frameworks);
        const nodeType = opts.type ? parseNodeType(opts.type) : getScaffoldEntry(framework).defaultNodeType;
        const id = store.createNode(nodeType, framework, { name: opts.name });
        const created = store.getNode(id);
        if (created) {
          console.log(`Created ${created.name} (${shortId(id)}) with ${created.files[0].path}`);
        }
      });
    });

  node
    .command("list")
    .description("List nodes in creation order")
    .action(async () => {
      await withWorkspace((store) => printNodeTable(store), { save: false });
    });

  node
    .command("show")
    .description("Show a node, its files and its connections")
    .argument("<node>", "Node id, id prefix or name")
    .action(async (ref: string) => {
      await withWorkspace((store) => printNodeDetails(store, resolveNodeRef(store, ref)), { save: false });
    });

  node
    .command("select")
    .description("Select a node")
    .argument("<node>", "Node id, id prefix or name")
    .action(async (ref: string) => {
      await withWorkspace(async (store) => {
        const target = resolveNodeRef(store, ref);
        expectApplied(await store.selectNode(target.id), "Select node");
        console.log(`Selected ${target.name}`);
      });
    });

  node
    .command("delete")
    .description("Delete a node and drop every connection to it")
    .argument("<node>", "Node id, id prefix or name")
    .action(async (ref: string) => {
      await withWorkspace((store, ctx) => {
        const target = resolveNodeRef(store, ref);
        expectApplied(store.deleteNode(target.id), "Delete node");
        const diskNote = ctx.settings.delete_policy === "purge" ? "project folder removed" : "project folder kept";
        console.log(`Deleted ${target.name} (${diskNote})`);
      });
    });

  node
    .command("rename")
    .description("Rename a node")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<name>", "New display name")
    .action(async (ref: string, name: string) => {
      await withWorkspace((store) => {
        const target = resolveNodeRef(store, ref);
        const renamed = expectApplied(store.renameNode(target.id, name), "Rename node");
        if (renamed) console.log(`Renamed ${target.name} to ${renamed.name}`);
      });
    });

  node
    .command("move")
    .description("Move a node on the canvas")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<x>", "Canvas x")
    .argument("<y>", "Canvas y")
    .action(async (ref: string, x: string, y: string) => {
      await withWorkspace((store) => {
        const target = resolveNodeRef(store, ref);
        const position = { x: parseNumber(x, "x"), y: parseNumber(y, "y") };
        if (expectApplied(store.moveNode(target.id, position), "Move node")) {
          console.log(`Moved ${target.name} to (${position.x}, ${position.y})`);
        }
      });
    });

  node
    .command("connect")
    .description("Add a connection from one node to another")
    .argument("<from>", "Source node")
    .argument("<to>", "Target node")
    .action(async (fromRef: string, toRef: string) => {
      await withWorkspace((store) => {
        const from = resolveNodeRef(store, fromRef);
        const to = resolveNodeRef(store, toRef);
        const result = store.connect(from.id, to.id);
        if (result.status === "applied") console.log(`Connected ${from.name} -> ${to.name}`);
        else expectApplied(result, "Connect");
      });
    });

  node
    .command("disconnect")
    .description("Remove a connection between two nodes")
    .argument("<from>", "Source node")
    .argument("<to>", "Target node")
    .action(async (fromRef: string, toRef: string) => {
      await withWorkspace((store) => {
        const from = resolveNodeRef(store, fromRef);
        const to = resolveNodeRef(store, toRef);
        const result = store.disconnect(from.id, to.id);
        if (result.status === "applied") console.log(`Disconnected ${from.name} -> ${to.name}`);
        else expectApplied(result, "Disconnect");
      });
    });

  node
    .command("framework")
    .description("Switch a node to another framework")
    .argument("<node>", "Node id, id prefix or name")
    .argument("<framework>", "Framework from `lattice frameworks`")
    .action(async (ref: string, frameworkArg: string) => {
      await withWorkspace((store, ctx) => {
        const target = resolveNodeRef(store, ref);
        const framework = parseFramework(frameworkArg, ctx.settings.enabled_frameworks);
        const updated = expectApplied(store.setFramework(target.id, framework), "Change framework");
        if (updated) console.log(`${updated.name} now uses ${getScaffoldEntry(framework).label}`);
      });
    });
}

// =============================================================================
// OUTPUT
// =============================================================================

function printNodeTable(store: WorkspaceStore): void {
  const nodes = store.listNodes();
  if (nodes.length === 0) {
    console.log("No nodes yet. Create one with: lattice node create <framework>");
    return;
  }

  const selectedId = store.getState().selectedNodeId;
  const nameWidth = Math.max("Name".length, ...nodes.map((node) => node.name.length));
  console.log(`  ${"ID".padEnd(8)}  ${"Name".padEnd(nameWidth)}  ${"Type".padEnd(13)}  Framework`);
  for (const node of nodes) {
    const marker = node.id === selectedId ? "*" : " ";
    console.log(
      `${marker} ${shortId(node.id).padEnd(8)}  ${node.name.padEnd(nameWidth)}  ${NODE_TYPE_LABELS[node.nodeType].padEnd(13)}  ${getScaffoldEntry(node.framework).label}`,
    );
  }
}

function printNodeDetails(store: WorkspaceStore, node: WorkspaceNode): void {
  console.log(`Node: ${node.name} (${node.id})`);
  console.log(`Type: ${NODE_TYPE_LABELS[node.nodeType]}`);
  console.log(`Framework: ${getScaffoldEntry(node.framework).label} (${node.language})`);
  console.log(`Position: (${node.position.x}, ${node.position.y})`);
  console.log(`Project: ${node.projectPath ?? "(not created yet)"}`);
  if (node.environmentPath) console.log(`Environment: ${node.environmentPath}`);

  console.log("Files:");
  for (const file of node.files) {
    const marker = file.id === node.selectedFileId ? "*" : " ";
    console.log(`${marker} ${shortId(file.id).padEnd(8)}  ${file.path}  (${file.language}, ${file.content.length} chars)`);
  }

  const targets = node.connections.map((id) => store.getNode(id)?.name ?? id);
  console.log(`Connections: ${targets.length > 0 ? targets.join(", ") : "(none)"}`);
}

// =============================================================================
// PARSING
// =============================================================================

function parseFramework(value: string, enabled?: readonly Framework[]): Framework {
  const normalized = value.trim().toLowerCase();
  if (!isFramework(normalized)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: "Unknown framework.",
      message: `"${value}" is not a known framework.`,
      hint: "Run `lattice frameworks` to see the available ids.",
    });
  }
  if (enabled && !enabled.includes(normalized)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Framework disabled.",
      message: `"${normalized}" is not in enabled_frameworks.`,
      hint: "Add it to enabled_frameworks in settings.json.",
    });
  }
  return normalized;
}

function parseNodeType(value: string): NodeType {
  const match = NODE_TYPES.find((type) => type === value.trim().toLowerCase());
  if (!match) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.workspace,
      title: "Unknown node type.",
      message: `"${value}" is not one of ${NODE_TYPES.join(", ")}.`,
    });
  }
  return match;
}
