import { MemoryEventStore } from "../src/memory-store";
import type { EventKind, WorkEvent } from "../src/types";

export const HOUR = 60 * 60 * 1000;
export const MINUTE = 60 * 1000;

// Local wall-clock instant; months are 1-based here
export function at(year: number, month: number, day: number, hour: number, minute = 0): number {
  return new Date(year, month - 1, day, hour, minute).getTime();
}

export function localDay(year: number, month: number, day: number): Date {
  return new Date(year, month - 1, day);
}

export function createStoreFixture(events: Array<[EventKind, number]> = []): MemoryEventStore {
  return new MemoryEventStore(events.map(([kind, ts]): WorkEvent => ({ kind, ts })));
}

// Arrive/leave pair on one day, with optional breaks given as [startHour, endHour]
export function workday(
  year: number,
  month: number,
  day: number,
  from: number,
  to: number,
  breaks: Array<[number, number]> = [],
): Array<[EventKind, number]> {
  const events: Array<[EventKind, number]> = [["arrive", at(year, month, day, from)]];
  for (const [start, end] of breaks) {
    events.push(["break_start", at(year, month, day, start)]);
    events.push(["break_end", at(year, month, day, end)]);
  }
  events.push(["leave", at(year, month, day, to)]);
  return events;
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}
