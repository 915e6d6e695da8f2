import { describe, expect, it } from "@jest/globals";

import { isKernelError } from "../src/errors";
import type { EventKind } from "../src/types";
import { computeWeekReport, dailyQuotaOf, DEFAULT_QUOTA } from "../src/week";
import { at, captureError, createStoreFixture, HOUR, workday } from "./fixtures";

// Monday 5 to Friday 9 January 2026, ISO week 2
function fullWeek(): Array<[EventKind, number]> {
  return [5, 6, 7, 8, 9].flatMap((day) => workday(2026, 1, day, 8, 17, [[12, 13]]));
}

describe("computeWeekReport", () => {
  it("balances a complete week of eight-hour days", () => {
    const store = createStoreFixture(fullWeek());

    const report = computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 9, 18));

    expect(report.weekNumber).toBe(2);
    expect(report.weekId).toBe("2026-02");
    expect(report.daysSoFar).toBe(5);
    expect(report.weekTotal).toBe(40 * HOUR);
    expect(report.weekDelta).toBe(0);
    expect(report.expectedSoFar).toBeUndefined();
    expect(report.remaining).toBeUndefined();
    expect(report.remainingPerDay).toBeUndefined();
    expect(report.rows).toHaveLength(5);
  });

  it("skips an empty weekend silently", () => {
    const store = createStoreFixture(fullWeek());

    const report = computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 11, 20));

    expect(report.rows.map((row) => row.date)).toEqual([
      "2026-01-05",
      "2026-01-06",
      "2026-01-07",
      "2026-01-08",
      "2026-01-09",
    ]);
  });

  it("projects the rest of a week that has just started", () => {
    const store = createStoreFixture(workday(2026, 1, 5, 9, 15));

    const report = computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 5, 18));

    expect(report.rows).toEqual([{ date: "2026-01-05", absent: false, worked: 6 * HOUR, delta: -2 * HOUR }]);
    expect(report.daysSoFar).toBe(1);
    expect(report.expectedSoFar).toBe(8 * HOUR);
    expect(report.weekDelta).toBe(-2 * HOUR);
    expect(report.remaining).toBe(34 * HOUR);
    expect(report.remainingPerDay).toBe(8.5 * HOUR);
  });

  it("shows a missed weekday as a blank row", () => {
    const store = createStoreFixture([...workday(2026, 1, 5, 8, 16), ...workday(2026, 1, 7, 8, 16)]);

    const report = computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 7, 18));

    expect(report.rows).toEqual([
      { date: "2026-01-05", absent: false, worked: 8 * HOUR, delta: 0 },
      { date: "2026-01-06", absent: true },
      { date: "2026-01-07", absent: false, worked: 8 * HOUR, delta: 0 },
    ]);
    expect(report.daysSoFar).toBe(2);
    expect(report.expectedSoFar).toBe(16 * HOUR);
    expect(report.remaining).toBe(24 * HOUR);
    expect(report.remainingPerDay).toBe(8 * HOUR);
  });

  it("keeps counting down while the last day of a full week is still open", () => {
    const store = createStoreFixture([
      ...[5, 6, 7, 8].flatMap((day) => workday(2026, 1, day, 8, 16)),
      ["arrive", at(2026, 1, 9, 8)],
    ]);

    const report = computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 9, 12));

    expect(report.daysSoFar).toBe(5);
    expect(report.currentlyPresent).toBe(true);
    expect(report.weekTotal).toBe(36 * HOUR);
    expect(report.expectedSoFar).toBeUndefined();
    expect(report.remaining).toBe(4 * HOUR);
    expect(report.remainingPerDay).toBeUndefined();
  });

  it("drops the per-day target on the last day but one", () => {
    const store = createStoreFixture([5, 6, 7, 8].flatMap((day) => workday(2026, 1, day, 8, 16)));

    const report = computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 8, 18));

    expect(report.daysSoFar).toBe(4);
    expect(report.remaining).toBe(8 * HOUR);
    expect(report.remainingPerDay).toBeUndefined();
  });

  it("never looks at days after today", () => {
    const store = createStoreFixture(workday(2026, 1, 5, 8, 16));

    const report = computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 6, 9));

    expect(report.rows.map((row) => row.date)).toEqual(["2026-01-05", "2026-01-06"]);
  });

  it("reports a past week by offset", () => {
    const store = createStoreFixture([...fullWeek(), ...workday(2026, 1, 12, 8, 10)]);

    const report = computeWeekReport(store, -1, DEFAULT_QUOTA, at(2026, 1, 12, 11));

    expect(report.weekId).toBe("2026-02");
    expect(report.weekTotal).toBe(40 * HOUR);
    expect(report.rows).toHaveLength(5);
  });

  it("counts weekend work toward the week", () => {
    const store = createStoreFixture([...fullWeek(), ...workday(2026, 1, 10, 10, 12)]);

    const report = computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 10, 13));

    expect(report.daysSoFar).toBe(6);
    expect(report.weekTotal).toBe(42 * HOUR);
    expect(report.weekDelta).toBe(-6 * HOUR);
    expect(report.remaining).toBeUndefined();
  });

  it("spreads a custom quota over its own number of days", () => {
    const quota = { weekHours: 30, workDays: 4 };
    const store = createStoreFixture(workday(2026, 1, 5, 8, 16));

    const report = computeWeekReport(store, 0, quota, at(2026, 1, 5, 18));

    expect(dailyQuotaOf(quota)).toBe(7.5 * HOUR);
    expect(report.weekDelta).toBe(0.5 * HOUR);
    expect(report.expectedSoFar).toBe(7.5 * HOUR);
    expect(report.remaining).toBe(22 * HOUR);
    expect(report.remainingPerDay).toBe((22 * HOUR) / 3);
  });

  it("lets integrity faults through the per-day loop", () => {
    const store = createStoreFixture([
      ["arrive", at(2026, 1, 5, 8)],
      ["break_start", at(2026, 1, 5, 12)],
      ["leave", at(2026, 1, 5, 16)],
    ]);

    const error = captureError(() => computeWeekReport(store, 0, DEFAULT_QUOTA, at(2026, 1, 6, 9)));

    expect(isKernelError(error, "INCONSISTENT_SEQUENCE")).toBe(true);
  });

  it("refuses future weeks", () => {
    const store = createStoreFixture();

    expect(() => computeWeekReport(store, 1, DEFAULT_QUOTA, at(2026, 1, 5, 9))).toThrow(
      "Week offset must be 0 or a negative whole number",
    );
  });
});
