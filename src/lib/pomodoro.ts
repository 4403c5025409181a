import { SESSION_TYPES, type SessionType } from "./session-types";

export const MIN_TIMER_MINUTES = 1;
export const MAX_TIMER_MINUTES = 120;
export const DEFAULT_WORK_MINUTES = 25;
export const DEFAULT_SHORT_BREAK_MINUTES = 5;
export const DEFAULT_LONG_BREAK_MINUTES = 15;

export const DEFAULT_DURATIONS: Record<SessionType, number> = {
  work: DEFAULT_WORK_MINUTES,
  short_break: DEFAULT_SHORT_BREAK_MINUTES,
  long_break: DEFAULT_LONG_BREAK_MINUTES,
};

const SESSION_TYPE_SET = new Set<string>(SESSION_TYPES);

export const isValidSessionType = (value: unknown): value is SessionType => {
  return typeof value === "string" && SESSION_TYPE_SET.has(value);
};

export const defaultDurationForType = (type: unknown) => {
  return isValidSessionType(type)
    ? DEFAULT_DURATIONS[type]
    : DEFAULT_WORK_MINUTES;
};

export const clampTimerMinutes = (value: number) => {
  if (!Number.isFinite(value)) return MIN_TIMER_MINUTES;
  const rounded = Math.round(value);
  return Math.min(MAX_TIMER_MINUTES, Math.max(MIN_TIMER_MINUTES, rounded));
};
