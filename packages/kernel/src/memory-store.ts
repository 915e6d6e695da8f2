import { KernelError } from "./errors";
import type { EventStore } from "./events";
import type { EventKind, WorkEvent } from "./types";

// Array-backed log with the same ordering and key rules as the SQLite store.
// Used by tests and anything that wants a throwaway log.
export class MemoryEventStore implements EventStore {
  private events: WorkEvent[] = [];

  constructor(seed: WorkEvent[] = []) {
    for (const event of seed) {
      this.insert(event);
    }
  }

  insert(event: WorkEvent): void {
    if (this.events.some((existing) => existing.kind === event.kind && existing.ts === event.ts)) {
      throw new KernelError(
        "DUPLICATE_KEY",
        `An "${event.kind}" event at ${new Date(event.ts).toISOString()} is already recorded`,
      );
    }
    this.events.push({ kind: event.kind, ts: event.ts });
  }

  lastEvent(): WorkEvent | null {
    const ordered = this.ordered();
    return ordered[ordered.length - 1] ?? null;
  }

  eventsInRange(from: number, to: number): WorkEvent[] {
    return this.ordered().filter((event) => event.ts >= from && event.ts < to);
  }

  firstEventOfKind(kind: EventKind, from: number, to: number): WorkEvent | null {
    return this.eventsInRange(from, to).find((event) => event.kind === kind) ?? null;
  }

  count(): number {
    return this.events.length;
  }

  transaction<T>(work: () => T): T {
    const snapshot = [...this.events];
    try {
      return work();
    } catch (error) {
      this.events = snapshot;
      throw error;
    }
  }

  close(): void {
    this.events = [];
  }

  // Array.prototype.sort is stable, so equal timestamps keep insertion order
  private ordered(): WorkEvent[] {
    return [...this.events].sort((a, b) => a.ts - b.ts);
  }
}
