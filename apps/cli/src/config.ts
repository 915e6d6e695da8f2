import os from "node:os";
import path from "node:path";

import type { WorkQuota } from "@timeclock/kernel";
import { z } from "zod";

const envSchema = z.object({
  TIMECLOCK_DB: z
    .string()
    .min(1)
    .default("~/.timetrack.db")
    .transform((value) => (value.startsWith("~/") ? path.join(os.homedir(), value.slice(2)) : value)),
  TIMECLOCK_WEEK_HOURS: z.coerce.number().positive().max(168).default(40),
  TIMECLOCK_WORK_DAYS: z.coerce.number().int().min(1).max(7).default(5),
  TIMECLOCK_DEBUG: z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((value) => value === "true" || value === "1"),
});

export type CliConfig = {
  dbPath: string;
  quota: WorkQuota;
  debug: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration (${details})`);
  }

  return {
    dbPath: parsed.data.TIMECLOCK_DB,
    quota: {
      weekHours: parsed.data.TIMECLOCK_WEEK_HOURS,
      workDays: parsed.data.TIMECLOCK_WORK_DAYS,
    },
    debug: parsed.data.TIMECLOCK_DEBUG,
  };
}
