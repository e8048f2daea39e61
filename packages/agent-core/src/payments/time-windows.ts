import { ValidationError } from "../errors.js";

/**
 * Escrow deadlines. `payByTime < submitResultTime < unlockTime <
 * externalDisputeUnlockTime` must hold for every window that is present.
 */
export interface TimeWindows {
  payByTime: Date;
  submitResultTime: Date;
  unlockTime?: Date;
  externalDisputeUnlockTime?: Date;
}

export type CompleteTimeWindows = Required<TimeWindows>;

export interface TimeWindowOffsets {
  payByMinutes: number;
  submitResultMinutes: number;
  unlockMinutes: number;
  externalDisputeUnlockMinutes: number;
}

export const DEFAULT_TIME_WINDOW_OFFSETS: TimeWindowOffsets = {
  payByMinutes: 10,
  submitResultMinutes: 60,
  unlockMinutes: 120,
  externalDisputeUnlockMinutes: 1440
};

const WINDOW_ORDER = [
  "payByTime",
  "submitResultTime",
  "unlockTime",
  "externalDisputeUnlockTime"
] as const;

export function timeWindowIssues(windows: TimeWindows): string[] {
  const issues: string[] = [];
  let previous: { name: string; time: number } | undefined;

  for (const name of WINDOW_ORDER) {
    const value = windows[name];
    if (value === undefined) continue;

    const time = value.getTime();
    if (!Number.isFinite(time)) {
      issues.push(`${name} is not a valid date`);
      continue;
    }
    if (previous && time <= previous.time) {
      issues.push(`${previous.name} must be earlier than ${name}`);
    }
    previous = { name, time };
  }

  return issues;
}

export function assertTimeWindows(windows: TimeWindows): void {
  const issues = timeWindowIssues(windows);
  if (issues.length > 0) {
    throw new ValidationError("Invalid time windows", issues);
  }
}

export function assertCompleteTimeWindows(
  windows: Partial<CompleteTimeWindows>
): asserts windows is CompleteTimeWindows {
  const missing = WINDOW_ORDER.filter((name) => windows[name] === undefined);
  if (missing.length > 0) {
    throw new ValidationError(
      "Invalid time windows",
      missing.map((name) => `${name} is required`)
    );
  }
}

export function buildTimeWindows(
  now: Date = new Date(),
  offsets: TimeWindowOffsets = DEFAULT_TIME_WINDOW_OFFSETS
): CompleteTimeWindows {
  const at = (minutes: number) => new Date(now.getTime() + minutes * 60_000);
  const windows: CompleteTimeWindows = {
    payByTime: at(offsets.payByMinutes),
    submitResultTime: at(offsets.submitResultMinutes),
    unlockTime: at(offsets.unlockMinutes),
    externalDisputeUnlockTime: at(offsets.externalDisputeUnlockMinutes)
  };
  assertTimeWindows(windows);
  return windows;
}

/** ISO-8601 form for payment creation. An invalid date is passed through for the window check to report. */
export function toIsoTimeString(value: Date): string {
  return Number.isFinite(value.getTime()) ? value.toISOString() : String(value);
}

/** Milliseconds since the epoch as a decimal string, the form purchase creation expects. */
export function toEpochMillisString(value: Date): string {
  return String(value.getTime());
}
