export * from "./types";

export { KernelError, isKernelError } from "./errors";

export { openEventStore, SqliteEventStore } from "./events";
export type { EventStore, SqliteEventStoreOptions } from "./events";
export { MemoryEventStore } from "./memory-store";

export { executeCommand, availableCommands, COMMAND_NAMES } from "./commands";
export type { CommandName } from "./commands";

export { computeDayReport, reduceDay } from "./reducer";
export type { ReplayState } from "./reducer";

export { computeWeekReport, dailyQuotaOf, DEFAULT_QUOTA } from "./week";

export {
  MILLISECONDS_IN_DAY,
  MILLISECONDS_IN_HOUR,
  formatYYYYMMDD,
  getISOWeek,
  getISOWeekIdFromDate,
  isWeekend,
  parseYYYYMMDD,
  shiftDay,
  startOfDay,
  startOfWeek,
} from "./calendar";
