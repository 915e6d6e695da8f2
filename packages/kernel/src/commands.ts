import type { EventStore } from "./events";
import type { CommandResult, EventKind, KernelCommand, RejectionCode, WorkEvent } from "./types";

type CommandName = KernelCommand["cmd"];

interface CommandHandler {
  guardrails(lastKind: EventKind | null): { pass: true } | { pass: false; code: RejectionCode };
  execute(now: number): WorkEvent;
}

function allowOnly(allowed: Array<EventKind | null>, code: RejectionCode): CommandHandler["guardrails"] {
  return (lastKind) => (allowed.includes(lastKind) ? { pass: true } : { pass: false, code });
}

const commandHandlers: { [K in CommandName]: CommandHandler } = {
  start_day: {
    guardrails: allowOnly([null, "leave"], "ALREADY_PRESENT"),
    execute: (now) => ({ kind: "arrive", ts: now }),
  },
  start_break: {
    guardrails: allowOnly(["arrive", "break_end"], "NOT_WORKING"),
    execute: (now) => ({ kind: "break_start", ts: now }),
  },
  end_break: {
    guardrails: allowOnly(["break_start"], "NOT_BREAKING"),
    execute: (now) => ({ kind: "break_end", ts: now }),
  },
  end_day: {
    guardrails: allowOnly(["arrive", "break_end"], "NOT_WORKING"),
    execute: (now) => ({ kind: "leave", ts: now }),
  },
};

export const COMMAND_NAMES: readonly CommandName[] = ["start_day", "start_break", "end_break", "end_day"];

export function availableCommands(lastKind: EventKind | null): CommandName[] {
  return COMMAND_NAMES.filter((name) => commandHandlers[name].guardrails(lastKind).pass);
}

/**
 * Validates `command` against the most recent event and appends its event.
 * Read, check and append share one exclusive transaction, so a rejected
 * command leaves the log untouched. Integrity faults from the store
 * (`DUPLICATE_KEY`) are thrown, not returned.
 */
export function executeCommand(
  store: EventStore,
  command: KernelCommand,
  now: number = Date.now(),
): CommandResult {
  const handler = commandHandlers[command.cmd];

  return store.transaction((): CommandResult => {
    const last = store.lastEvent();
    const currentState = last?.kind ?? null;

    const guardrails = handler.guardrails(currentState);
    if (!guardrails.pass) {
      return { success: false, code: guardrails.code, currentState };
    }

    const event = handler.execute(now);
    store.insert(event);

    return last ? { success: true, event, priorTs: last.ts } : { success: true, event };
  });
}

export type { CommandName, CommandResult };
