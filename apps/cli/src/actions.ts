import {
  availableCommands,
  computeDayReport,
  computeWeekReport,
  executeCommand,
  parseYYYYMMDD,
  type CommandName,
  type EventStore,
  type WorkQuota,
} from "@timeclock/kernel";

import { renderDayReport, renderFailure, renderSuccess, renderWeekReport, type RandomSource } from "./messages";

export type ActionContext = {
  store: EventStore;
  quota: WorkQuota;
  now: number;
  random?: RandomSource;
};

export type ActionOutcome = {
  exitCode: number;
  stdout: string[];
  stderr: string[];
};

type Action = (ctx: ActionContext, args: string[]) => ActionOutcome;

function record(cmd: CommandName): Action {
  return (ctx) => {
    const result = executeCommand(ctx.store, { cmd }, ctx.now);
    if (result.success) {
      return { exitCode: 0, stdout: [renderSuccess(result, ctx.random)], stderr: [] };
    }

    const [message = "", ...hints] = renderFailure(result, availableCommands(result.currentState), ctx.random);
    return { exitCode: 1, stdout: [], stderr: [`Error: ${message}`, ...hints] };
  };
}

const showDay: Action = (ctx, args) => {
  const [dayArg] = args;
  const day = dayArg ? parseYYYYMMDD(dayArg) : new Date(ctx.now);
  return { exitCode: 0, stdout: renderDayReport(computeDayReport(ctx.store, day, ctx.now)), stderr: [] };
};

const showWeek: Action = (ctx, args) => {
  const [offsetArg = "0"] = args;
  if (!/^-?\d+$/.test(offsetArg)) {
    throw new Error(`Week offset must be a whole number, got "${offsetArg}"`);
  }
  const report = computeWeekReport(ctx.store, Number(offsetArg), ctx.quota, ctx.now);
  return { exitCode: 0, stdout: renderWeekReport(report), stderr: [] };
};

export const USAGE = [
  "usage: timeclock <action> [argument]",
  "",
  "  morning            start tracking for the day",
  "  break              start a break",
  "  resume, continue   end the current break",
  "  closing            end tracking for the day",
  "  day [YYYY-MM-DD]   worked time for a day (default today)",
  "  week [offset]      worked time for a week, -1 is last week (default 0)",
];

export const actions: Record<string, Action> = {
  morning: record("start_day"),
  break: record("start_break"),
  resume: record("end_break"),
  continue: record("end_break"),
  closing: record("end_day"),
  day: showDay,
  week: showWeek,
};
