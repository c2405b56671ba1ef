import { describe, expect, it } from "vitest";

import { buildNodeContext, formatContextPrompt, mainFileOf } from "./context.js";
import type { Framework, NodeType, WorkspaceNode, WorkspaceState } from "./model.js";

// =============================================================================
// HELPERS
// =============================================================================

function makeNode(input: {
  id: string;
  name: string;
  nodeType: NodeType;
  framework: Framework;
  mainPath: string;
  content: string;
  connections?: string[];
}): WorkspaceNode {
  return {
    id: input.id,
    name: input.name,
    nodeType: input.nodeType,
    framework: input.framework,
    language: "javascript",
    position: { x: 0, y: 0 },
    files: [{ id: `${input.id}-main`, path: input.mainPath, name: input.mainPath, content: input.content, language: "javascript" }],
    selectedFileId: `${input.id}-main`,
    connections: input.connections ?? [],
    projectPath: null,
    environmentPath: null,
  };
}

function makeState(nodes: WorkspaceNode[]): WorkspaceState {
  return {
    projectName: "Demo",
    nodes: Object.fromEntries(nodes.map((node) => [node.id, node])),
    nodeOrder: nodes.map((node) => node.id),
    selectedNodeId: null,
    canvasOffset: { x: 0, y: 0 },
    canvasScale: 1,
  };
}

const web = makeNode({
  id: "web",
  name: "Web",
  nodeType: "website",
  framework: "react",
  mainPath: "src/index.js",
  content: "const app = 1;",
  connections: ["api"],
});
const api = makeNode({
  id: "api",
  name: "Api",
  nodeType: "cloud-backend",
  framework: "express",
  mainPath: "src/index.js",
  content: "x".repeat(150),
  connections: ["web"],
});
const image = makeNode({
  id: "image",
  name: "Image",
  nodeType: "cloud-backend",
  framework: "docker",
  mainPath: "Dockerfile",
  content: "FROM node:20",
  connections: ["web"],
});
const lone = makeNode({ id: "lone", name: "Lone", nodeType: "custom", framework: "go", mainPath: "main.go", content: "" });

const state = makeState([web, api, image, lone]);

// =============================================================================
// TESTS
// =============================================================================

describe("buildNodeContext", () => {
  it("lists outgoing then incoming connections once each", () => {
    const context = buildNodeContext(state, "web", { current: 5, connected: 100 });

    expect(context?.node.mainFile).toEqual({ path: "src/index.js", preview: "const", truncated: true });
    expect(context?.connected.map((entry) => entry.id)).toEqual(["api", "image"]);
    expect(context?.connected[0].mainFile?.preview).toHaveLength(100);
    expect(context?.connected[1].mainFile).toEqual({ path: "Dockerfile", preview: "FROM node:20", truncated: false });
  });

  it("returns null for unknown nodes", () => {
    expect(buildNodeContext(state, "missing")).toBeNull();
  });
});

describe("formatContextPrompt", () => {
  it("renders connected nodes and the current node", () => {
    const context = buildNodeContext(state, "web", { current: 5, connected: 100 });
    if (!context) throw new Error("expected context");

    expect(formatContextPrompt(context)).toBe(
      [
        "Context about the current project:",
        "",
        "Connected Nodes:",
        "- Api (Cloud Backend): Express",
        `  Code preview: ${"x".repeat(100)}...`,
        "- Image (Cloud Backend): Docker",
        "  Code preview: FROM node:20",
        "",
        "Current Node:",
        "- Name: Web",
        "- Type: Website",
        "- Framework: React",
        "- Existing code: const...",
        "",
      ].join("\n"),
    );
  });

  it("omits empty sections", () => {
    const context = buildNodeContext(state, "lone");
    if (!context) throw new Error("expected context");

    expect(formatContextPrompt(context)).toBe(
      "Context about the current project:\n\nCurrent Node:\n- Name: Lone\n- Type: Custom\n- Framework: Go\n",
    );
  });
});

describe("mainFileOf", () => {
  it("falls back to the first file when the catalog main file is gone", () => {
    const renamed = makeNode({
      id: "r",
      name: "R",
      nodeType: "website",
      framework: "react",
      mainPath: "src/app.js",
      content: "",
    });

    expect(mainFileOf(renamed)?.path).toBe("src/app.js");
    expect(mainFileOf({ ...renamed, files: [] })).toBeNull();
  });
});
