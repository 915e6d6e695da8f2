import { formatYYYYMMDD, shiftDay, startOfDay } from "./calendar";
import { KernelError } from "./errors";
import type { EventStore } from "./events";
import type { DayReport, Duration, WorkEvent } from "./types";

type ReplayState = {
  openStart: number | null;
  worked: Duration;
  onBreak: boolean;
};

function inconsistent(event: WorkEvent, expected: string): KernelError {
  return new KernelError(
    "INCONSISTENT_SEQUENCE",
    `Found "${event.kind}" at ${new Date(event.ts).toISOString()} where ${expected} was expected`,
  );
}

export function reduceDay(prev: ReplayState, event: WorkEvent): ReplayState {
  switch (event.kind) {
    case "arrive":
    case "break_end": {
      if (prev.openStart !== null) throw inconsistent(event, "a break start or leave");
      return { openStart: event.ts, worked: prev.worked, onBreak: false };
    }
    case "break_start":
    case "leave": {
      if (prev.openStart === null) throw inconsistent(event, "an arrival or break end");
      return {
        openStart: null,
        worked: prev.worked + (event.ts - prev.openStart),
        onBreak: event.kind === "break_start",
      };
    }
  }
}

/**
 * Replays the events of `day` (local calendar date) into worked time.
 * Throws `NO_ARRIVAL_FOR_DATE` when nobody arrived that day and
 * `INCONSISTENT_SEQUENCE` when the log does not alternate properly.
 */
export function computeDayReport(store: EventStore, day: Date, now: number = Date.now()): DayReport {
  const dayStart = startOfDay(day);
  const dayEnd = shiftDay(dayStart, 1).getTime();
  const date = formatYYYYMMDD(dayStart);

  const arrival = store.firstEventOfKind("arrive", dayStart.getTime(), dayEnd);
  if (!arrival) {
    throw new KernelError("NO_ARRIVAL_FOR_DATE", `No arrival recorded on ${date}`);
  }

  const candidates = store.eventsInRange(arrival.ts, dayEnd);
  // another kind may share the arrival's timestamp and sort ahead of it
  const arrivalIndex = candidates.findIndex((event) => event.kind === "arrive" && event.ts === arrival.ts);
  const rows = candidates.slice(Math.max(0, arrivalIndex));

  let state: ReplayState = { openStart: arrival.ts, worked: 0, onBreak: false };
  for (const event of rows.slice(1)) {
    state = reduceDay(state, event);
  }

  const currentlyPresent = state.openStart !== null;
  const totalWorked =
    state.openStart !== null ? state.worked + Math.max(0, now - state.openStart) : state.worked;

  return { date, rows, currentlyPresent, onBreak: state.onBreak, totalWorked };
}

export type { ReplayState };
