import { afterEach, describe, expect, it, vi } from "vitest";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { createSequentialIdSource } from "../core/ids.js";
import type { EventLogger, LogEvent } from "../core/logger.js";
import type { DiskResult, ProjectDisk } from "../materializer/types.js";
import { renderMainFile } from "../scaffold/templates.js";

import { createMainFile } from "./files.js";
import { WorkspaceStore } from "./store.js";

vi.mock("../scaffold/templates.js", () => ({ renderMainFile: vi.fn() }));

// =============================================================================
// TEST SETUP
// =============================================================================

const stores: WorkspaceStore[] = [];

afterEach(async () => {
  for (const store of stores) {
    await store.close();
  }
  stores.length = 0;
  vi.mocked(renderMainFile).mockReset();
});

// =============================================================================
// HELPERS
// =============================================================================

const ok = <T>(value: T): Promise<DiskResult<T>> => Promise.resolve({ ok: true, value });

const nullDisk: ProjectDisk = {
  projectRoot: (node) => `/fake/${node.id}`,
  defaultProjectRoot: (nodeId) => `/fake/${nodeId}`,
  createProjectStructure: (node) => ok({ projectPath: `/fake/${node.id}`, scaffolded: [], written: [] }),
  saveFile: (_node, file) => ok({ path: file.path, changed: true }),
  deleteFile: () => ok({ deleted: true }),
  renameFile: () => ok({ moved: true }),
  removeProject: () => ok({ removed: true }),
  listDiskFiles: () => ok([]),
  ensureEnvironment: () => Promise.resolve(null),
  drain: () => Promise.resolve(),
};

function recordingLogger(): EventLogger & { events: LogEvent[] } {
  const events: LogEvent[] = [];
  return { events, log: (event) => events.push(event) };
}

function failTemplates(): void {
  vi.mocked(renderMainFile).mockImplementation(() => {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.scaffold,
      title: "Scaffold template missing.",
      message: 'Scaffold template "main/go" not found.',
    });
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("createMainFile", () => {
  it("uses the rendered template as content", () => {
    vi.mocked(renderMainFile).mockReturnValue("package main\n");

    const file = createMainFile({ ids: createSequentialIdSource("f"), framework: "go", nodeName: "Svc", nodeType: "custom" });

    expect(file).toEqual({ id: "f-1", path: "main.go", name: "main.go", content: "package main\n", language: "go" });
  });

  it("falls back to an empty file and logs when the template fails", () => {
    failTemplates();
    const logger = recordingLogger();

    const file = createMainFile({
      ids: createSequentialIdSource("f"),
      framework: "go",
      nodeName: "Svc",
      nodeType: "custom",
      logger,
    });

    expect(file.content).toBe("");
    expect(logger.events).toEqual([
      {
        type: "scaffold.render_failed",
        nodeId: undefined,
        fileId: undefined,
        payload: { framework: "go", message: 'Scaffold template "main/go" not found.' },
      },
    ]);
  });
});

describe("WorkspaceStore.createNode without templates", () => {
  it("still creates the node with an empty main file", () => {
    failTemplates();
    const store = new WorkspaceStore({ disk: nullDisk, ids: createSequentialIdSource("id"), debounceMs: 60_000 });
    stores.push(store);

    const id = store.createNode("custom", "go");

    expect(store.getNode(id)?.files).toEqual([
      { id: "id-2", path: "main.go", name: "main.go", content: "", language: "go" },
    ]);
    expect(store.getNode(id)?.selectedFileId).toBe("id-2");
  });
});
