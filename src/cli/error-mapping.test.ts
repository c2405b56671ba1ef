import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { formatErrorLines } from "../core/error-format.js";
import { MaterializeError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { createSequentialIdSource } from "../core/ids.js";
import { Materializer } from "../materializer/materializer.js";
import { WorkspaceStore } from "../workspace/store.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];
const stores: WorkspaceStore[] = [];

afterEach(async () => {
  for (const store of stores) {
    await store.close();
  }
  stores.length = 0;

  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

function storeOnBlockedStorage(): WorkspaceStore {
  const dir = makeTempDir("error-mapping-disk-");
  const blocker = path.join(dir, "storage");
  fs.writeFileSync(blocker, "not a folder");

  const disk = new Materializer({ layout: { storageRoot: blocker }, detectToolchains: false });
  const store = new WorkspaceStore({ disk, ids: createSequentialIdSource("id"), debounceMs: 60_000 });
  stores.push(store);
  return store;
}

// =============================================================================
// TESTS
// =============================================================================

describe("error mapping", () => {
  it("maps project folder failures to a user-facing disk error", async () => {
    const store = storeOnBlockedStorage();
    const id = store.createNode("custom", "purepy");

    const result = await store.materializeNode(id);

    expect(result.status).toBe("failed");
    if (result.status !== "failed") return;
    const userError = result.error;
    expect(userError).toBeInstanceOf(UserFacingError);
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.disk);
    expect(userError.title).toBe("Couldn't create the project folder.");
    expect(userError.hint).toBe("Check that the storage folder exists and is writable.");
    expect(userError.cause).toBeInstanceOf(MaterializeError);
    expect(userError.cause instanceof MaterializeError && userError.cause.operation).toBe("create");
  });

  it("keeps the node in memory when its folder cannot be created", async () => {
    const store = storeOnBlockedStorage();
    const id = store.createNode("custom", "go");
    await store.whenIdle();

    expect(store.getNode(id)?.projectPath).toBeNull();
    expect(store.getNode(id)?.files.map((file) => file.path)).toEqual(["main.go"]);
  });

  it("renders disk failures with their title first", async () => {
    const store = storeOnBlockedStorage();
    const id = store.createNode("custom", "purepy");

    const result = await store.materializeNode(id);
    if (result.status !== "failed") throw new Error("expected failure");

    const lines = formatErrorLines(result.error);
    expect(lines[0]).toEqual({ kind: "title", text: "Couldn't create the project folder." });
    expect(lines.at(-1)).toEqual({ kind: "hint", text: "Check that the storage folder exists and is writable." });
  });
});
