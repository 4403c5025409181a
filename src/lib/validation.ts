import { z } from "zod";
import type { CalendarDate } from "./dates";
import {
  SessionParseError,
  SessionValidationError,
  type ValidationIssue,
} from "./errors";
import { parseTimestamp } from "./session";
import { SESSION_TYPES, type CreateSessionRequest } from "./session-types";

export const DEFAULT_READ_LIMIT = 100;

const createSessionSchema = z.object({
  session_type: z.enum(SESSION_TYPES, {
    errorMap: () => ({ message: "Invalid session type" }),
  }),
  duration_minutes: z
    .number({
      required_error: "Invalid duration",
      invalid_type_error: "Invalid duration",
    })
    .int("Invalid duration")
    .positive("Invalid duration"),
  task_description: z.string().default(""),
  completed: z.boolean().default(false),
  interruptions: z.number().int().nonnegative().default(0),
});

const limitSchema = z.coerce
  .number({ invalid_type_error: "Invalid limit" })
  .int("Invalid limit")
  .positive("Invalid limit");

export const toValidationIssues = (error: z.ZodError): ValidationIssue[] => {
  return error.issues.map((issue) => ({
    field: issue.path.join(".") || "request",
    message: issue.message,
  }));
};

export const parseCreateSessionRequest = (
  input: unknown,
): CreateSessionRequest => {
  if (
    typeof input !== "object" ||
    input === null ||
    Object.keys(input).length === 0
  ) {
    throw new SessionValidationError("Request data is required", [
      { field: "request", message: "Request data is required" },
    ]);
  }
  const parsed = createSessionSchema.safeParse(input);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    throw new SessionValidationError(
      issues[0]?.message ?? "Invalid request",
      issues,
    );
  }
  return parsed.data;
};

export const parseReadLimit = (value: unknown) => {
  if (value === undefined || value === null || value === "") {
    return DEFAULT_READ_LIMIT;
  }
  const parsed = limitSchema.safeParse(value);
  if (!parsed.success) {
    throw new SessionValidationError(
      "Invalid limit",
      toValidationIssues(parsed.error).map((issue) => ({
        ...issue,
        field: "limit",
      })),
    );
  }
  return parsed.data;
};

// Accepts "YYYY-MM-DD", optionally followed by a valid ISO time.
export const parseCalendarDate = (value: unknown): CalendarDate | null => {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  try {
    parseTimestamp(trimmed, "date");
  } catch (error) {
    if (error instanceof SessionParseError) return null;
    throw error;
  }
  return trimmed.slice(0, 10);
};
