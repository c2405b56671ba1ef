/*
Purpose: debounce and order file writes so rapid edits never block the mutation path.
Assumptions: the writer resolves the node and file from the store when it runs; writes
for one file are chained so they land in submission order.
Usage: coordinator.submit(nodeId, fileId); await coordinator.flushNode(nodeId) before switching selection.
*/

import { LatticeError } from "../core/errors.js";
import { logWorkspaceEvent, silentLogger, type EventLogger } from "../core/logger.js";
import { errorMessage, isoNow } from "../core/utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type WriteSkipReason = "node-not-found" | "file-not-found";

export type WriteOutcome =
  | { status: "written" }
  | { status: "skipped"; reason: WriteSkipReason }
  | { status: "failed"; error: LatticeError };

/** Resolves the current node and file and writes the file's content. */
export type FileWriter = (nodeId: string, fileId: string) => Promise<WriteOutcome>;

export type FailedWrite = {
  nodeId: string;
  fileId: string;
  message: string;
  failedAt: string;
};

export type PersistenceOptions = {
  writer: FileWriter;
  debounceMs?: number;
  logger?: EventLogger;
};

export const DEFAULT_DEBOUNCE_MS = 400;

type PendingWrite = {
  nodeId: string;
  fileId: string;
  timer: ReturnType<typeof setTimeout>;
};

// =============================================================================
// COORDINATOR
// =============================================================================

export class PersistenceCoordinator {
  private readonly pending = new Map<string, PendingWrite>();
  private readonly inFlight = new Map<string, Promise<WriteOutcome>>();
  private readonly failures = new Map<string, FailedWrite>();
  private readonly debounceMs: number;
  private readonly logger: EventLogger;
  private closed = false;

  constructor(private readonly options: PersistenceOptions) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Schedules a write of the file's current content. A newer submit for the same
   * file restarts the debounce window; only the latest content is written.
   */
  submit(nodeId: string, fileId: string): void {
    if (this.closed) return;
    const key = writeKey(nodeId, fileId);
    const existing = this.pending.get(key);
    if (existing) clearTimeout(existing.timer);

    const timer = setTimeout(() => {
      void this.startWrite(key);
    }, this.debounceMs);
    this.pending.set(key, { nodeId, fileId, timer });
  }

  async flush(nodeId: string, fileId: string): Promise<void> {
    await this.flushKey(writeKey(nodeId, fileId));
  }

  async flushNode(nodeId: string): Promise<void> {
    const keys = this.keysForNode(nodeId);
    await Promise.all(keys.map((key) => this.flushKey(key)));
  }

  async flushAll(): Promise<void> {
    const keys = new Set([...this.pending.keys(), ...this.inFlight.keys()]);
    await Promise.all([...keys].map((key) => this.flushKey(key)));
  }

  /** Drops a pending write and waits for any write already running for the file. */
  async cancel(nodeId: string, fileId: string): Promise<void> {
    const key = writeKey(nodeId, fileId);
    this.dropPending(key);
    this.failures.delete(key);
    await this.inFlight.get(key);
  }

  async cancelNode(nodeId: string): Promise<void> {
    const keys = this.keysForNode(nodeId);
    for (const key of keys) {
      this.dropPending(key);
      this.failures.delete(key);
    }
    await Promise.all(keys.map((key) => this.inFlight.get(key)));
  }

  hasPending(nodeId?: string, fileId?: string): boolean {
    if (nodeId && fileId) return this.pending.has(writeKey(nodeId, fileId));
    if (nodeId) return [...this.pending.values()].some((entry) => entry.nodeId === nodeId);
    return this.pending.size > 0;
  }

  failedWrites(): FailedWrite[] {
    return [...this.failures.values()];
  }

  /** Clears timers without writing. Callers flush first when pending content matters. */
  dispose(): void {
    this.closed = true;
    for (const key of [...this.pending.keys()]) {
      this.dropPending(key);
    }
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async flushKey(key: string): Promise<void> {
    if (this.pending.has(key)) {
      await this.startWrite(key);
      return;
    }
    await this.inFlight.get(key);
  }

  private startWrite(key: string): Promise<WriteOutcome> {
    const entry = this.pending.get(key);
    const previous = this.inFlight.get(key);
    if (!entry) {
      return previous ?? Promise.resolve<WriteOutcome>({ status: "skipped", reason: "file-not-found" });
    }
    this.dropPending(key);

    const run = async (): Promise<WriteOutcome> => {
      if (previous) await previous;
      let outcome: WriteOutcome;
      try {
        outcome = await this.options.writer(entry.nodeId, entry.fileId);
      } catch (err) {
        outcome = { status: "failed", error: new LatticeError(errorMessage(err), err) };
      }
      this.recordOutcome(key, entry, outcome);
      return outcome;
    };

    const write = run();
    this.inFlight.set(key, write);
    void write.then(() => {
      if (this.inFlight.get(key) === write) this.inFlight.delete(key);
    });
    return write;
  }

  private recordOutcome(key: string, entry: PendingWrite, outcome: WriteOutcome): void {
    if (outcome.status === "failed") {
      this.failures.set(key, {
        nodeId: entry.nodeId,
        fileId: entry.fileId,
        message: outcome.error.message,
        failedAt: isoNow(),
      });
      logWorkspaceEvent(this.logger, "persistence.write_failed", {
        node_id: entry.nodeId,
        file_id: entry.fileId,
        message: outcome.error.message,
      });
      return;
    }

    this.failures.delete(key);
    if (outcome.status === "skipped") {
      logWorkspaceEvent(this.logger, "persistence.write_skipped", {
        node_id: entry.nodeId,
        file_id: entry.fileId,
        reason: outcome.reason,
      });
    }
  }

  private dropPending(key: string): void {
    const entry = this.pending.get(key);
    if (!entry) return;
    clearTimeout(entry.timer);
    this.pending.delete(key);
  }

  private keysForNode(nodeId: string): string[] {
    const prefix = `${nodeId}\u0000`;
    const keys = new Set([...this.pending.keys(), ...this.inFlight.keys()]);
    return [...keys].filter((key) => key.startsWith(prefix));
  }
}

function writeKey(nodeId: string, fileId: string): string {
  return `${nodeId}\u0000${fileId}`;
}
