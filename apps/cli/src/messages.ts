import {
  parseYYYYMMDD,
  type CommandName,
  type DayReport,
  type EventKind,
  type RejectionCode,
  type WeekReport,
  type WorkEvent,
} from "@timeclock/kernel";

import { formatClock, formatDuration, formatLongDate, formatSignedDuration, formatWeekday } from "./lib/date";
import messages from "./messages.json";

export type RandomSource = () => number;

export type SuccessFact = { event: WorkEvent; priorTs?: number };
export type FailureFact = { code: RejectionCode; currentState: EventKind | null };

const STATE_LABELS: Record<EventKind, string> = {
  arrive: "working",
  break_start: "on a break",
  break_end: "working",
  leave: "gone for the day",
};

const EVENT_LABELS: Record<EventKind, string> = {
  arrive: "Arrived",
  break_start: "Break",
  break_end: "Resumed",
  leave: "Left",
};

export const ACTION_WORDS: Record<CommandName, string> = {
  start_day: "morning",
  start_break: "break",
  end_break: "resume",
  end_day: "closing",
};

export function stateLabel(state: EventKind | null): string {
  return state === null ? "not clocked in" : STATE_LABELS[state];
}

// Variant choice is cosmetic: it never feeds back into what gets recorded
export function pickVariant(variants: readonly string[], random: RandomSource = Math.random): string {
  const index = Math.min(variants.length - 1, Math.floor(random() * variants.length));
  return variants[Math.max(0, index)] ?? "";
}

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

export function renderSuccess(fact: SuccessFact, random?: RandomSource): string {
  const { event, priorTs } = fact;
  const since = priorTs === undefined ? "a while" : formatDuration(event.ts - priorTs);
  return fill(pickVariant(messages.success[event.kind], random), {
    time: formatClock(event.ts),
    since,
  });
}

export function renderFailure(
  fact: FailureFact,
  allowed: readonly CommandName[],
  random?: RandomSource,
): string[] {
  const lines = [fill(pickVariant(messages.failure[fact.code], random), { state: stateLabel(fact.currentState) })];
  if (allowed.length > 0) {
    lines.push(`Possible actions: ${allowed.map((name) => ACTION_WORDS[name]).join(", ")}`);
  }
  return lines;
}

export function renderDayReport(report: DayReport): string[] {
  const lines = [formatLongDate(parseYYYYMMDD(report.date))];
  for (const row of report.rows) {
    lines.push(`  ${formatClock(row.ts)}  ${EVENT_LABELS[row.kind]}`);
  }
  lines.push(`Worked: ${formatDuration(report.totalWorked)}`);
  if (report.currentlyPresent) {
    lines.push("Still clocked in.");
  } else if (report.onBreak) {
    lines.push("On a break.");
  }
  return lines;
}

const LABEL_WIDTH = 16;
const VALUE_WIDTH = 7;

function row(label: string, ...values: string[]): string {
  const cells = values.map((value) => value.padStart(VALUE_WIDTH)).join(" ");
  return `${label.padEnd(LABEL_WIDTH)}${cells}`.trimEnd();
}

export function renderWeekReport(report: WeekReport): string[] {
  const lines = [`Week ${report.weekNumber} (${report.weekId})`];

  for (const day of report.rows) {
    const label = `${formatWeekday(parseYYYYMMDD(day.date))} ${day.date}`;
    lines.push(day.absent ? row(label) : row(label, formatDuration(day.worked), formatSignedDuration(day.delta)));
  }

  lines.push("-".repeat(LABEL_WIDTH + VALUE_WIDTH * 2 + 1));
  lines.push(row("Total", formatDuration(report.weekTotal), formatSignedDuration(report.weekDelta)));
  if (report.expectedSoFar !== undefined) {
    lines.push(row("Expected so far", formatDuration(report.expectedSoFar)));
  }
  if (report.remaining !== undefined) {
    lines.push(row("Remaining", formatDuration(report.remaining)));
  }
  if (report.remainingPerDay !== undefined) {
    lines.push(row("Per day", formatDuration(report.remainingPerDay)));
  }
  return lines;
}
