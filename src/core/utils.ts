import path from "node:path";

import fse from "fs-extra";

export function isoNow(): string {
  return new Date().toISOString();
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fse.ensureDir(dirPath);
}

export async function writeJsonFile(filePath: string, value: unknown): Promise<void> {
  await fse.outputFile(filePath, `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fse.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export function toPosixPath(input: string): string {
  return input.split(path.sep).join("/").replace(/\\/g, "/");
}

export function truncateText(text: string, limit: number): { text: string; truncated: boolean } {
  if (text.length <= limit) {
    return { text, truncated: false };
  }
  return { text: text.slice(0, limit), truncated: true };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
