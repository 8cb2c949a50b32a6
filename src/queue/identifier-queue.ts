import type { IdentifierInput, WorkIdentifier } from "../schemas/index.js";
import { QueueError } from "./errors.js";
import { normalizeIdentifier } from "./normalize.js";

export interface EnqueueResult {
  item: WorkIdentifier;
  duplicate: boolean;
}

/**
 * Ordered set of work identifiers awaiting fetch.
 * Deduplicated by normalized identifier; the first enqueue wins and keeps
 * its batch label. Items are frozen once enqueued.
 */
export class IdentifierQueue implements Iterable<WorkIdentifier> {
  private readonly items = new Map<string, WorkIdentifier>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  static fromInput(
    input: IdentifierInput,
    defaultBatch: string,
    now?: () => Date,
  ): IdentifierQueue {
    const queue = new IdentifierQueue(now);
    for (const entry of input) {
      if (typeof entry === "string") {
        queue.enqueue(entry, defaultBatch);
      } else {
        queue.enqueue(entry.identifier, entry.batch ?? defaultBatch);
      }
    }
    return queue;
  }

  enqueue(identifier: string, batch: string): EnqueueResult {
    const key = normalizeIdentifier(identifier);
    if (key.length === 0) {
      throw new QueueError(
        "EMPTY_IDENTIFIER",
        `Identifier must not be empty: ${JSON.stringify(identifier)}`,
      );
    }
    const existing = this.items.get(key);
    if (existing) {
      return { item: existing, duplicate: true };
    }
    const item: WorkIdentifier = Object.freeze({
      identifier: identifier.trim(),
      batch,
      created_at: this.now().toISOString(),
    });
    this.items.set(key, item);
    return { item, duplicate: false };
  }

  enqueueAll(identifiers: Iterable<string>, batch: string): number {
    let added = 0;
    for (const identifier of identifiers) {
      if (!this.enqueue(identifier, batch).duplicate) added++;
    }
    return added;
  }

  has(identifier: string): boolean {
    return this.items.has(normalizeIdentifier(identifier));
  }

  get size(): number {
    return this.items.size;
  }

  toArray(): WorkIdentifier[] {
    return [...this.items.values()];
  }

  [Symbol.iterator](): Iterator<WorkIdentifier> {
    return this.items.values();
  }
}
