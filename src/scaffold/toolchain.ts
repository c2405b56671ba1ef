/*
Purpose: best-effort runtime version discovery for manifest pinning.
Assumptions: a missing or slow toolchain is normal; every failure degrades to the
catalog default and never reaches the caller as an error.
Usage: await detectRuntimeVersion("node", { runner, enabled: settings.detect_toolchains }).
*/

import { execa } from "execa";

import type { RuntimeId } from "./catalog.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: { timeoutMs: number; cwd?: string },
) => Promise<CommandResult>;

export type RuntimeProbe = {
  command: string;
  args: readonly string[];
  pattern: RegExp;
  fallback: string;
};

// =============================================================================
// PROBES
// =============================================================================

export const RUNTIME_PROBES: Record<RuntimeId, RuntimeProbe> = {
  node: { command: "node", args: ["--version"], pattern: /v?(\d+\.\d+\.\d+)/, fallback: "20.11.0" },
  python: { command: "python3", args: ["--version"], pattern: /Python (\d+\.\d+)/, fallback: "3.11" },
  swift: { command: "swift", args: ["--version"], pattern: /Swift version (\d+\.\d+)/, fallback: "5.9" },
  go: { command: "go", args: ["version"], pattern: /go(\d+\.\d+)/, fallback: "1.22" },
  rust: { command: "rustc", args: ["--version"], pattern: /rustc (\d+\.\d+\.\d+)/, fallback: "1.75.0" },
  // java prints its version banner on stderr
  java: { command: "java", args: ["-version"], pattern: /version "(\d+)/, fallback: "17" },
};

export const DEFAULT_PROBE_TIMEOUT_MS = 3_000;

// =============================================================================
// PUBLIC API
// =============================================================================

export const runCommand: CommandRunner = async (command, args, options) => {
  const result = await execa(command, [...args], {
    cwd: options.cwd,
    reject: false,
    stdio: "pipe",
    timeout: options.timeoutMs,
  });

  return {
    exitCode: result.exitCode ?? null,
    stdout: String(result.stdout ?? ""),
    stderr: String(result.stderr ?? ""),
  };
};

export async function detectRuntimeVersion(
  runtime: RuntimeId,
  options: { runner?: CommandRunner; enabled?: boolean; timeoutMs?: number } = {},
): Promise<string> {
  const probe = RUNTIME_PROBES[runtime];
  if (options.enabled === false) return probe.fallback;

  const runner = options.runner ?? runCommand;
  let result: CommandResult;
  try {
    result = await runner(probe.command, probe.args, {
      timeoutMs: options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS,
    });
  } catch {
    return probe.fallback;
  }

  if (result.exitCode !== 0) return probe.fallback;
  return parseRuntimeVersion(probe, `${result.stdout}\n${result.stderr}`);
}

export function parseRuntimeVersion(probe: RuntimeProbe, output: string): string {
  const match = probe.pattern.exec(output);
  return match?.[1] ?? probe.fallback;
}
