#!/usr/bin/env node
import { openEventStore, type EventStore } from "@timeclock/kernel";

import { actions, USAGE, type ActionOutcome } from "./actions";
import { loadConfig } from "./config";
import type { RandomSource } from "./messages";

export function formatAbort(error: unknown): string[] {
  const message = error instanceof Error ? error.message : String(error);
  const lines = [`Error: ${message}`];
  if (error instanceof Error && error.cause !== undefined) {
    const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    lines.push(`       ${cause}`);
  }
  return lines;
}

type RunOptions = {
  env?: NodeJS.ProcessEnv;
  now?: number;
  /** Log to use instead of opening the configured database; left open afterwards. */
  store?: EventStore;
  random?: RandomSource;
};

export function run(argv: string[], options: RunOptions = {}): ActionOutcome {
  const [name, ...args] = argv;

  if (name === undefined || name === "help" || name === "--help" || name === "-h") {
    return { exitCode: name === undefined ? 1 : 0, stdout: USAGE, stderr: [] };
  }

  const action = Object.hasOwn(actions, name) ? actions[name] : undefined;
  if (!action) {
    return {
      exitCode: 1,
      stdout: [],
      stderr: [`Unsupported action "${name}". Use --help to get usage information.`],
    };
  }

  const opened: EventStore[] = [];
  try {
    const config = loadConfig(options.env);
    if (config.debug) {
      console.error(`[cli] action=${name} db=${config.dbPath}`);
    }
    let store = options.store;
    if (!store) {
      store = openEventStore(config.dbPath, { debug: config.debug });
      opened.push(store);
    }
    return action(
      { store, quota: config.quota, now: options.now ?? Date.now(), random: options.random },
      args,
    );
  } catch (error) {
    return { exitCode: 1, stdout: [], stderr: formatAbort(error) };
  } finally {
    for (const store of opened) store.close();
  }
}

function main(): void {
  process.on("SIGINT", () => {
    console.log();
    process.exit(255);
  });

  const outcome = run(process.argv.slice(2));
  for (const line of outcome.stdout) console.log(line);
  for (const line of outcome.stderr) console.error(line);
  process.exitCode = outcome.exitCode;
}

if (require.main === module) {
  main();
}
