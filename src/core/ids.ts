import crypto from "node:crypto";

import { WorkspaceError } from "./errors.js";

/**
 * Issues opaque ids for nodes and files. Every id handed out (or adopted from a
 * loaded snapshot) is remembered, so an id is never issued twice in a session.
 */
export class IdSource {
  private readonly issued = new Set<string>();

  constructor(private readonly generate: () => string = () => crypto.randomUUID()) {}

  next(): string {
    const limit = this.issued.size + 16;
    for (let attempt = 0; attempt < limit; attempt += 1) {
      const candidate = this.generate();
      if (!this.issued.has(candidate)) {
        this.issued.add(candidate);
        return candidate;
      }
    }
    throw new WorkspaceError("Id generator keeps returning ids that were already issued.");
  }

  adopt(id: string): void {
    this.issued.add(id);
  }

  has(id: string): boolean {
    return this.issued.has(id);
  }
}

export function createSequentialIdSource(prefix = "id"): IdSource {
  let counter = 0;
  return new IdSource(() => {
    counter += 1;
    return `${prefix}-${counter}`;
  });
}
