import {
  MILLISECONDS_IN_HOUR,
  formatYYYYMMDD,
  getISOWeek,
  getISOWeekIdFromDate,
  isWeekend,
  shiftDay,
  startOfDay,
  startOfWeek,
} from "./calendar";
import { isKernelError } from "./errors";
import type { EventStore } from "./events";
import { computeDayReport } from "./reducer";
import type { DayReport, Duration, WeekReport, WeekRow, WorkQuota } from "./types";

export const DEFAULT_QUOTA: WorkQuota = { weekHours: 40, workDays: 5 };

export function dailyQuotaOf(quota: WorkQuota): Duration {
  return (quota.weekHours * MILLISECONDS_IN_HOUR) / quota.workDays;
}

/**
 * Worked time per day of a week against the quota. `offset` counts weeks
 * back from the current one. Days after today are never evaluated.
 */
export function computeWeekReport(
  store: EventStore,
  offset = 0,
  quota: WorkQuota = DEFAULT_QUOTA,
  now: number = Date.now(),
): WeekReport {
  if (!Number.isInteger(offset) || offset > 0) {
    throw new Error("Week offset must be 0 or a negative whole number");
  }

  const today = startOfDay(now);
  const weekStart = startOfWeek(shiftDay(today, offset * 7));
  const weekEnd = Math.min(shiftDay(today, 1).getTime(), shiftDay(weekStart, 7).getTime());
  const dailyQuota = dailyQuotaOf(quota);

  const rows: WeekRow[] = [];
  let daysSoFar = 0;
  let weekTotal: Duration = 0;
  let extraHours: Duration = 0;
  let lastCounted: DayReport | null = null;

  for (let day = weekStart; day.getTime() < weekEnd; day = shiftDay(day, 1)) {
    let report: DayReport;
    try {
      report = computeDayReport(store, day, now);
    } catch (error) {
      if (!isKernelError(error, "NO_ARRIVAL_FOR_DATE")) throw error;
      if (!isWeekend(day)) {
        rows.push({ date: formatYYYYMMDD(day), absent: true });
      }
      continue;
    }

    daysSoFar += 1;
    weekTotal += report.totalWorked;
    extraHours += report.totalWorked - dailyQuota;
    lastCounted = report;
    rows.push({
      date: report.date,
      absent: false,
      worked: report.totalWorked,
      delta: report.totalWorked - dailyQuota,
    });
  }

  const currentlyPresent = lastCounted?.currentlyPresent ?? false;
  const result: WeekReport = {
    weekNumber: getISOWeek(weekStart).week,
    weekId: getISOWeekIdFromDate(weekStart),
    rows,
    daysSoFar,
    currentlyPresent,
    weekTotal,
    weekDelta: extraHours,
  };

  const incomplete = daysSoFar < quota.workDays;
  if (incomplete) {
    result.expectedSoFar = dailyQuota * daysSoFar;
  }
  if (incomplete || (daysSoFar === quota.workDays && currentlyPresent)) {
    result.remaining = quota.weekHours * MILLISECONDS_IN_HOUR - weekTotal;
    if (daysSoFar < quota.workDays - 1) {
      result.remainingPerDay = result.remaining / (quota.workDays - daysSoFar);
    }
  }

  return result;
}
