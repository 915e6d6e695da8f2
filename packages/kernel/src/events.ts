import Database from "better-sqlite3";
import { and, asc, desc, eq, gte, lt, sql } from "drizzle-orm";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import { KernelError } from "./errors";
import { CREATE_WORK_EVENTS_SQL, CURRENT_SCHEMA_VERSION, workEvents } from "./schema";
import type { EventKind, WorkEvent } from "./types";

interface EventStore {
  insert(event: WorkEvent): void;
  lastEvent(): WorkEvent | null;
  /** Events with `from <= ts < to`, oldest first. */
  eventsInRange(from: number, to: number): WorkEvent[];
  firstEventOfKind(kind: EventKind, from: number, to: number): WorkEvent | null;
  count(): number;
  /** Runs `work` holding the log exclusively; a throw rolls everything back. */
  transaction<T>(work: () => T): T;
  close(): void;
}

type SqliteEventStoreOptions = {
  debug?: boolean;
};

function isPrimaryKeyViolation(error: unknown): boolean {
  if (error instanceof Database.SqliteError) {
    return error.code === "SQLITE_CONSTRAINT_PRIMARYKEY";
  }
  if (error instanceof Error && error.cause !== undefined) {
    return isPrimaryKeyViolation(error.cause);
  }
  return false;
}

class SqliteEventStore implements EventStore {
  private sqlite: Database.Database;
  private db: BetterSQLite3Database;
  private debug: boolean;

  constructor(filename: string, options: SqliteEventStoreOptions = {}) {
    this.sqlite = new Database(filename);
    this.db = drizzle(this.sqlite);
    this.debug = options.debug ?? false;
    this.migrate(filename);
  }

  insert(event: WorkEvent): void {
    try {
      this.db.insert(workEvents).values({ kind: event.kind, ts: event.ts }).run();
    } catch (error) {
      if (isPrimaryKeyViolation(error)) {
        throw new KernelError(
          "DUPLICATE_KEY",
          `An "${event.kind}" event at ${new Date(event.ts).toISOString()} is already recorded`,
          error,
        );
      }
      throw error;
    }
    this.log(`inserted ${event.kind}@${event.ts}`);
  }

  lastEvent(): WorkEvent | null {
    const row = this.db
      .select()
      .from(workEvents)
      .orderBy(desc(workEvents.ts), desc(sql`rowid`))
      .limit(1)
      .get();
    return row ?? null;
  }

  eventsInRange(from: number, to: number): WorkEvent[] {
    return this.db
      .select()
      .from(workEvents)
      .where(and(gte(workEvents.ts, from), lt(workEvents.ts, to)))
      .orderBy(asc(workEvents.ts), asc(sql`rowid`))
      .all();
  }

  firstEventOfKind(kind: EventKind, from: number, to: number): WorkEvent | null {
    const row = this.db
      .select()
      .from(workEvents)
      .where(and(eq(workEvents.kind, kind), gte(workEvents.ts, from), lt(workEvents.ts, to)))
      .orderBy(asc(workEvents.ts))
      .limit(1)
      .get();
    return row ?? null;
  }

  count(): number {
    const row = this.db
      .select({ count: sql<number>`count(*)` })
      .from(workEvents)
      .get();
    return row?.count ?? 0;
  }

  transaction<T>(work: () => T): T {
    return this.db.transaction(() => work(), { behavior: "exclusive" });
  }

  close(): void {
    this.sqlite.close();
  }

  private migrate(filename: string): void {
    const version = this.sqlite.pragma("user_version", { simple: true });
    if (version === CURRENT_SCHEMA_VERSION) return;

    if (version === 0) {
      this.sqlite
        .transaction(() => {
          this.sqlite.exec(CREATE_WORK_EVENTS_SQL);
          this.sqlite.pragma(`user_version = ${CURRENT_SCHEMA_VERSION}`);
        })
        .exclusive();
      this.log(`initialized ${filename} at schema v${CURRENT_SCHEMA_VERSION}`);
      return;
    }
    // upgrades from older versions branch here

    throw new Error(
      `Event log ${filename} has schema version ${String(version)}, expected ${CURRENT_SCHEMA_VERSION}`,
    );
  }

  private log(message: string): void {
    if (this.debug) {
      console.error(`[event-store] ${message}`);
    }
  }
}

export function openEventStore(filename: string, options?: SqliteEventStoreOptions): EventStore {
  return new SqliteEventStore(filename, options);
}

export { SqliteEventStore };
export type { EventStore, SqliteEventStoreOptions };
