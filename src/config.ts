import { z } from "zod";
import { ConfigError } from "./lib/errors";
import { LOG_LEVELS, type LogLevel } from "./lib/logging";
import {
  DEFAULT_LONG_BREAK_MINUTES,
  DEFAULT_SHORT_BREAK_MINUTES,
  DEFAULT_WORK_MINUTES,
} from "./lib/pomodoro";
import type { TimerPreferences } from "./lib/session-types";
import { toValidationIssues } from "./lib/validation";

export const DEFAULT_LOG_FILE_PATH = "logs/pomodoro_sessions.log";

export type AppConfig = Readonly<{
  logFilePath: string;
  logLevel: LogLevel;
  timerDefaults: Readonly<TimerPreferences>;
  preferencesDir?: string;
}>;

type Env = Record<string, string | undefined>;

const blankAsUnset = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const minutes = (fallback: number) =>
  z.preprocess(
    blankAsUnset,
    z.coerce
      .number({ invalid_type_error: "Must be a number" })
      .int("Must be a whole number of minutes")
      .positive("Must be greater than 0")
      .default(fallback),
  );

const envSchema = z.object({
  LOG_FILE_PATH: z.preprocess(
    blankAsUnset,
    z.string().default(DEFAULT_LOG_FILE_PATH),
  ),
  LOG_LEVEL: z.preprocess(
    (value) => {
      const raw = blankAsUnset(value);
      return typeof raw === "string" ? raw.trim().toLowerCase() : raw;
    },
    z.enum(LOG_LEVELS).default("info"),
  ),
  DEFAULT_WORK_MINUTES: minutes(DEFAULT_WORK_MINUTES),
  DEFAULT_SHORT_BREAK_MINUTES: minutes(DEFAULT_SHORT_BREAK_MINUTES),
  DEFAULT_LONG_BREAK_MINUTES: minutes(DEFAULT_LONG_BREAK_MINUTES),
  PREFERENCES_DIR: z.preprocess(blankAsUnset, z.string().optional()),
});

export const loadConfig = (env: Env = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = toValidationIssues(parsed.error);
    const summary = issues
      .map((issue) => `${issue.field}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration (${summary})`, issues);
  }
  const values = parsed.data;
  return Object.freeze({
    logFilePath: values.LOG_FILE_PATH,
    logLevel: values.LOG_LEVEL,
    timerDefaults: Object.freeze({
      work: values.DEFAULT_WORK_MINUTES,
      short_break: values.DEFAULT_SHORT_BREAK_MINUTES,
      long_break: values.DEFAULT_LONG_BREAK_MINUTES,
    }),
    preferencesDir: values.PREFERENCES_DIR,
  });
};
