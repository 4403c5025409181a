import { v4 as uuid } from "uuid";
import { addMinutes, isCalendarDate } from "./dates";
import { SessionParseError } from "./errors";
import { isValidSessionType } from "./pomodoro";
import type { Session, SessionRecord } from "./session-types";

const ISO_TIMESTAMP =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

export const createSession = (
  type: string,
  durationMinutes: number,
  description = "",
  now: Date = new Date(),
): Session => {
  return {
    id: uuid(),
    type,
    durationMinutes,
    description,
    startTime: new Date(now.getTime()),
    endTime: null,
    completed: false,
    interruptionCount: 0,
  };
};

export const validateSession = (session: Session) => {
  if (!isValidSessionType(session.type)) return false;
  if (!(session.durationMinutes > 0)) return false;
  if (session.interruptionCount < 0) return false;
  return true;
};

// Completing twice keeps the latest end time.
export const completeSession = (session: Session, now: Date = new Date()) => {
  session.completed = true;
  session.endTime = new Date(now.getTime());
  return session;
};

export const addInterruption = (session: Session) => {
  session.interruptionCount += 1;
  return session;
};

export const expectedEndTime = (session: Session) => {
  return addMinutes(session.startTime, session.durationMinutes);
};

export const serializeSession = (session: Session): SessionRecord => {
  return {
    session_id: session.id,
    session_type: session.type,
    duration_minutes: session.durationMinutes,
    task_description: session.description,
    start_time: session.startTime.toISOString(),
    end_time: session.endTime ? session.endTime.toISOString() : null,
    completed: session.completed,
    interruptions: session.interruptionCount,
  };
};

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === "object" && value !== null && !Array.isArray(value);
};

export const parseTimestamp = (value: unknown, field: string) => {
  if (typeof value !== "string") {
    throw new SessionParseError(`${field} must be an ISO-8601 string`, field);
  }
  const match = ISO_TIMESTAMP.exec(value.trim());
  if (!match) {
    throw new SessionParseError(`${field} is not ISO-8601: ${value}`, field);
  }
  const [, day, hoursMinutes = "00:00", seconds = "00", fraction, zone] = match;
  const [hours, minutes] = hoursMinutes.split(":").map(Number);
  if (
    !isCalendarDate(day) ||
    hours > 23 ||
    minutes > 59 ||
    Number(seconds) > 59
  ) {
    throw new SessionParseError(`${field} is not a valid date: ${value}`, field);
  }
  const millis = (fraction ?? "").padEnd(3, "0").slice(0, 3);
  const offset = !zone || zone === "Z" ? "Z" : normalizeOffset(zone);
  const normalized = `${day}T${hoursMinutes}:${seconds}.${millis}${offset}`;
  const time = Date.parse(normalized);
  if (Number.isNaN(time)) {
    throw new SessionParseError(`${field} is not a valid date: ${value}`, field);
  }
  return new Date(time);
};

const normalizeOffset = (zone: string) => {
  return zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
};

const requireString = (data: Record<string, unknown>, field: string) => {
  const value = data[field];
  if (typeof value !== "string") {
    throw new SessionParseError(`${field} is required`, field);
  }
  return value;
};

const optional = <T>(
  data: Record<string, unknown>,
  field: string,
  fallback: T,
  guard: (value: unknown) => value is T,
): T => {
  const value = data[field];
  if (value === undefined) return fallback;
  if (!guard(value)) {
    throw new SessionParseError(`${field} has an unexpected type`, field);
  }
  return value;
};

const isString = (value: unknown): value is string => typeof value === "string";
const isBoolean = (value: unknown): value is boolean =>
  typeof value === "boolean";
const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

export const deserializeSession = (data: unknown): Session => {
  if (!isRecord(data)) {
    throw new SessionParseError("Session record must be an object");
  }
  const id = requireString(data, "session_id");
  const type = requireString(data, "session_type");
  const durationMinutes = data.duration_minutes;
  if (!isFiniteNumber(durationMinutes)) {
    throw new SessionParseError(
      "duration_minutes is required",
      "duration_minutes",
    );
  }
  const startTime = parseTimestamp(data.start_time, "start_time");
  const endTime =
    data.end_time === undefined || data.end_time === null
      ? null
      : parseTimestamp(data.end_time, "end_time");

  return {
    id,
    type,
    durationMinutes,
    description: optional<string>(data, "task_description", "", isString),
    startTime,
    endTime,
    completed: optional<boolean>(data, "completed", false, isBoolean),
    interruptionCount: optional<number>(data, "interruptions", 0, isFiniteNumber),
  };
};
