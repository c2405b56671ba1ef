/*
Purpose: append-only JSONL event log for workspace and disk activity.
Assumptions: one process writes a given log file; log writes are synchronous so events
stay ordered with the mutations that produced them.
Usage: const log = new JsonlLogger(workspaceLogPath(root)); logWorkspaceEvent(log, "node.created", { node_id: id }).
*/

import path from "node:path";

import fse from "fs-extra";

import { errorMessage, isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  nodeId?: string;
  fileId?: string;
  payload?: JsonObject;
};

export interface EventLogger {
  log(event: LogEvent): void;
}

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private dirReady = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: JsonObject = {},
  ) {}

  log(event: LogEvent): void {
    const record: JsonObject = { ts: isoNow(), ...this.defaults, type: event.type };
    if (event.nodeId) record.node_id = event.nodeId;
    if (event.fileId) record.file_id = event.fileId;
    if (event.payload) record.payload = event.payload;

    try {
      if (!this.dirReady) {
        fse.ensureDirSync(path.dirname(this.filePath));
        this.dirReady = true;
      }
      fse.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
    } catch (err) {
      process.stderr.write(`[lattice] failed to write ${this.filePath}: ${errorMessage(err)}\n`);
    }
  }
}

export const silentLogger: EventLogger = {
  log: () => undefined,
};

/** Lifts `node_id` / `file_id` out of the payload into the top-level record fields. */
export function logWorkspaceEvent(logger: EventLogger, type: string, payload: JsonObject = {}): void {
  const { node_id: nodeId, file_id: fileId, ...rest } = payload;
  logger.log({
    type,
    nodeId: typeof nodeId === "string" ? nodeId : undefined,
    fileId: typeof fileId === "string" ? fileId : undefined,
    payload: Object.keys(rest).length > 0 ? rest : undefined,
  });
}

export async function readLogEvents(filePath: string): Promise<JsonObject[]> {
  if (!(await fse.pathExists(filePath))) return [];
  const raw = await fse.readFile(filePath, "utf8");
  return raw
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line): JsonObject => JSON.parse(line));
}
