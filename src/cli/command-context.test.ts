import { afterEach, describe, expect, it, vi } from "vitest";

import { createSequentialIdSource } from "../core/ids.js";
import { UserFacingError } from "../core/errors.js";
import type { DiskResult, ProjectDisk } from "../materializer/types.js";
import { WorkspaceStore } from "../workspace/store.js";

import { expectApplied, parseNumber, resolveFileRef, resolveNodeRef, shortId } from "./command-context.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const stores: WorkspaceStore[] = [];

afterEach(async () => {
  for (const store of stores) {
    await store.close();
  }
  stores.length = 0;
  vi.restoreAllMocks();
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

function makeStore(): WorkspaceStore {
  const ids = createSequentialIdSource("node");
  const store = new WorkspaceStore({ disk: nullDisk, ids, debounceMs: 60_000 });
  stores.push(store);
  return store;
}

// =============================================================================
// TESTS
// =============================================================================

describe("resolveNodeRef", () => {
  it("matches exact ids, unique prefixes and names", () => {
    const store = makeStore();
    store.createNode("website", "react", { name: "Web" });
    store.createNode("cloud-backend", "express", { name: "Api" });

    expect(resolveNodeRef(store, "node-1").name).toBe("Web");
    expect(resolveNodeRef(store, "node-3").name).toBe("Api");
    expect(resolveNodeRef(store, "Api").id).toBe("node-3");
  });

  it("reports ambiguous and unknown references", () => {
    const store = makeStore();
    store.createNode("website", "react", { name: "Web" });
    store.createNode("website", "vue", { name: "Web" });

    expect(() => resolveNodeRef(store, "node-")).toThrow('"node-" matches more than one node.');
    expect(() => resolveNodeRef(store, "Web")).toThrow('"Web" matches more than one node.');
    expect(() => resolveNodeRef(store, "zzz")).toThrow('No node matches "zzz".');
  });
});

describe("resolveFileRef", () => {
  it("matches files by id or path", () => {
    const store = makeStore();
    const id = store.createNode("custom", "purepy", { name: "Tool" });
    store.addFile(id, "src/util.py");
    const node = store.getNode(id);
    if (!node) throw new Error("expected node");

    expect(resolveFileRef(node, "node-2").path).toBe("src/main.py");
    expect(resolveFileRef(node, "src/util.py").id).toBe("node-3");
    expect(() => resolveFileRef(node, "README.md")).toThrow('No file in "Tool" matches "README.md".');
  });
});

describe("expectApplied", () => {
  it("returns applied values and reports unchanged results", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    expect(expectApplied({ status: "applied", value: 3 }, "Zoom")).toBe(3);
    expect(expectApplied({ status: "noop", reason: "unchanged" }, "Zoom")).toBeNull();
    expect(log).toHaveBeenCalledWith("Zoom: Nothing to change.");
  });

  it("turns other no-ops and failures into user-facing errors", () => {
    const failure = new UserFacingError({ code: "DISK_ERROR", title: "Couldn't rename file.", message: "EACCES" });

    expect(() => expectApplied({ status: "noop", reason: "self-loop" }, "Connect")).toThrow(
      "A node cannot connect to itself.",
    );
    expect(() => expectApplied({ status: "failed", error: failure }, "Rename file")).toThrow(failure);
  });
});

describe("small parsers", () => {
  it("shortens ids and parses finite numbers", () => {
    expect(shortId("0123456789abcdef")).toBe("01234567");
    expect(parseNumber("-12.5", "x")).toBe(-12.5);
    expect(() => parseNumber("left", "x")).toThrow('x must be a number, got "left".');
  });
});
