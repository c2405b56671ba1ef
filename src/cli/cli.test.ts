import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import type { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadWorkspaceSnapshot } from "../workspace/snapshot.js";

import { buildCli } from "./index.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const ENV_KEYS = ["LATTICE_HOME", "LATTICE_STORAGE_ROOT"] as const;
const savedEnv = new Map<string, string | undefined>();
const tempDirs: string[] = [];
let storageRoot = "";

beforeEach(() => {
  for (const key of ENV_KEYS) savedEnv.set(key, process.env[key]);

  const home = makeTempDir("cli-home-");
  storageRoot = makeTempDir("cli-storage-");
  process.env.LATTICE_HOME = home;
  process.env.LATTICE_STORAGE_ROOT = storageRoot;
  fs.writeFileSync(path.join(home, "settings.json"), JSON.stringify({ detect_toolchains: false }));
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = savedEnv.get(key);
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }

  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  vi.restoreAllMocks();
});

// =============================================================================
// HELPERS
// =============================================================================

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

async function runCli(args: string[]): Promise<void> {
  const program = buildCli();
  installExitOverride(program);
  await program.parseAsync(["node", "lattice", ...args]);
}

function installExitOverride(command: Command): void {
  command.exitOverride();

  for (const child of command.commands) {
    installExitOverride(child);
  }
}

function parseLastJsonLine(): unknown {
  const calls = vi.mocked(console.log).mock.calls;
  const last = calls[calls.length - 1] ?? [];
  return JSON.parse(last.map(String).join(" "));
}

async function nodeIdByName(name: string): Promise<string> {
  const snapshot = await loadWorkspaceSnapshot(path.join(storageRoot, "workspace.json"));
  const node = snapshot?.nodes.find((candidate) => candidate.name === name);
  if (!node) throw new Error(`node ${name} not in snapshot`);
  return node.id;
}

// =============================================================================
// TESTS
// =============================================================================

describe("lattice CLI", () => {
  it("creates a workspace, materializes nodes and edits files", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runCli(["init", "--name", "Atlas"]);
    await runCli(["node", "create", "purepy", "--name", "Billing"]);
    await runCli(["file", "write", "Billing", "src/main.py", "--content", "print('billing')\n"]);
    await runCli(["file", "mv", "Billing", "src/main.py", "app.py"]);

    const snapshot = await loadWorkspaceSnapshot(path.join(storageRoot, "workspace.json"));
    expect(snapshot?.projectName).toBe("Atlas");

    const billingRoot = path.join(storageRoot, await nodeIdByName("Billing"));
    expect(fs.readFileSync(path.join(billingRoot, "src", "app.py"), "utf8")).toBe("print('billing')\n");
    expect(fs.existsSync(path.join(billingRoot, "src", "main.py"))).toBe(false);
    expect(fs.existsSync(path.join(billingRoot, "requirements.txt"))).toBe(true);
  });

  it("prints connected context as JSON", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runCli(["init"]);
    await runCli(["node", "create", "react", "--name", "Web"]);
    await runCli(["node", "create", "express", "--name", "Api"]);
    await runCli(["node", "connect", "Web", "Api"]);
    await runCli(["context", "Api", "--json"]);

    const context = parseLastJsonLine();
    expect(context).toMatchObject({
      node: { name: "Api", framework: "express", mainFile: { path: "src/index.js" } },
      connected: [{ name: "Web", framework: "react" }],
    });
  });

  it("rejects disabled frameworks and unknown nodes", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    fs.writeFileSync(
      path.join(process.env.LATTICE_HOME ?? "", "settings.json"),
      JSON.stringify({ detect_toolchains: false, enabled_frameworks: ["go"] }),
    );

    await runCli(["init"]);

    await expect(runCli(["node", "create", "react"])).rejects.toMatchObject({
      code: "CONFIG_ERROR",
      title: "Framework disabled.",
    });
    await expect(runCli(["node", "show", "Nope"])).rejects.toMatchObject({
      code: "WORKSPACE_ERROR",
      title: "Node not found.",
    });
  });

  it("deletes nodes and keeps their folders by default", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    await runCli(["init"]);
    await runCli(["node", "create", "go", "--name", "Svc"]);
    const root = path.join(storageRoot, await nodeIdByName("Svc"));
    await runCli(["node", "delete", "Svc"]);

    const snapshot = await loadWorkspaceSnapshot(path.join(storageRoot, "workspace.json"));
    expect(snapshot?.nodes).toEqual([]);
    expect(fs.readFileSync(path.join(root, "main.go"), "utf8")).toContain("package main");
  });
});
