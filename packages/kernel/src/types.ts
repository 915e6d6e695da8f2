// Event kinds, in the order a day normally runs through them
export type EventKind = "arrive" | "break_start" | "break_end" | "leave";

export const EVENT_KINDS: readonly EventKind[] = ["arrive", "break_start", "break_end", "leave"];

export type WorkEvent = { kind: EventKind; ts: number };

// Milliseconds
export type Duration = number;

export type KernelCommand =
  | { cmd: "start_day" }
  | { cmd: "start_break" }
  | { cmd: "end_break" }
  | { cmd: "end_day" };

export type RejectionCode = "ALREADY_PRESENT" | "NOT_WORKING" | "NOT_BREAKING";

export type KernelErrorCode =
  | RejectionCode
  | "NO_ARRIVAL_FOR_DATE"
  | "INCONSISTENT_SEQUENCE"
  | "DUPLICATE_KEY";

export type CommandResult =
  | { success: true; event: WorkEvent; priorTs?: number }
  | { success: false; code: RejectionCode; currentState: EventKind | null };

export type WorkQuota = {
  weekHours: number;
  workDays: number;
};

export type DayReport = {
  date: string;
  rows: WorkEvent[];
  currentlyPresent: boolean;
  onBreak: boolean;
  totalWorked: Duration;
};

export type WeekRow =
  | { date: string; absent: false; worked: Duration; delta: Duration }
  | { date: string; absent: true };

export type WeekReport = {
  weekNumber: number;
  weekId: string;
  rows: WeekRow[];
  daysSoFar: number;
  currentlyPresent: boolean;
  weekTotal: Duration;
  weekDelta: Duration;
  expectedSoFar?: Duration;
  remaining?: Duration;
  remainingPerDay?: Duration;
};
