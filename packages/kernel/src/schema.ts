import { integer, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

import { EVENT_KINDS } from "./types";

export const CURRENT_SCHEMA_VERSION = 1;

export const workEvents = sqliteTable(
  "work_events",
  {
    kind: text("kind", { enum: ["arrive", "break_start", "break_end", "leave"] }).notNull(),
    ts: integer("ts").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.kind, table.ts] }),
  }),
);

export const CREATE_WORK_EVENTS_SQL = `
  CREATE TABLE IF NOT EXISTS work_events (
      kind TEXT NOT NULL CHECK (kind IN (${EVENT_KINDS.map((kind) => `'${kind}'`).join(", ")}))
    , ts INTEGER NOT NULL
    , PRIMARY KEY (kind, ts)
  );
  CREATE INDEX IF NOT EXISTS work_events_by_ts ON work_events (ts);
`;
