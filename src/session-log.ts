import fs from "node:fs";
import path from "node:path";
import type { CalendarDate } from "./lib/dates";
import { describeError } from "./lib/errors";
import { createNoopLogger, type Logger } from "./lib/logging";
import { deserializeSession, serializeSession } from "./lib/session";
import type {
  Session,
  SessionLogFailure,
  SessionLogResult,
} from "./lib/session-types";
import { sessionDate } from "./lib/statistics";
import { DEFAULT_READ_LIMIT } from "./lib/validation";

export const MAX_LOG_BYTES = 10 * 1024 * 1024;
export const DATE_FILTER_WINDOW = 1000;

export type SessionLogOptions = {
  filePath: string;
  logger?: Logger;
  maxBytes?: number;
};

export type SessionLog = {
  readonly filePath: string;
  readonly rotatedPath: string;
  ensureDirectory(): SessionLogResult;
  append(session: Session): SessionLogResult;
  read(limit?: number): Session[];
  readByDate(day: CalendarDate): Session[];
  readAll(): Session[];
  rotateIfOversized(): SessionLogResult;
  validate(): SessionLogResult;
};

const ok = (): SessionLogResult => ({ ok: true });

const failure = (
  reason: SessionLogFailure,
  error: unknown,
  line?: number,
): SessionLogResult => ({
  ok: false,
  reason,
  error: describeError(error),
  ...(line === undefined ? {} : { line }),
});

export const createLogEntry = (session: Session) => {
  return JSON.stringify(serializeSession(session));
};

export const parseLogEntry = (line: string): Session | null => {
  try {
    return deserializeSession(JSON.parse(line));
  } catch {
    return null;
  }
};

const splitLines = (content: string) => {
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
};

export const createSessionLog = ({
  filePath,
  logger = createNoopLogger(),
  maxBytes = MAX_LOG_BYTES,
}: SessionLogOptions): SessionLog => {
  const rotatedPath = `${filePath}.old`;

  const readLines = () => {
    if (!fs.existsSync(filePath)) return [];
    return splitLines(fs.readFileSync(filePath, "utf8"));
  };

  const decode = (lines: string[]) => {
    const sessions: Session[] = [];
    for (const raw of lines) {
      const line = raw.trim();
      if (!line) continue;
      const session = parseLogEntry(line);
      if (session) {
        sessions.push(session);
      } else {
        logger.warn("Skipping unreadable log line", line);
      }
    }
    return sessions;
  };

  const ensureDirectory = (): SessionLogResult => {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      return ok();
    } catch (error) {
      logger.error("Failed to create log directory", error);
      return failure("directory-failed", error);
    }
  };

  const append = (session: Session): SessionLogResult => {
    try {
      fs.appendFileSync(filePath, `${createLogEntry(session)}\n`, "utf8");
      return ok();
    } catch (error) {
      logger.error("Failed to log session", error);
      return failure("write-failed", error);
    }
  };

  const read = (limit: number = DEFAULT_READ_LIMIT) => {
    const safeLimit =
      Number.isFinite(limit) && limit >= 1
        ? Math.floor(limit)
        : DEFAULT_READ_LIMIT;
    try {
      return decode(readLines().slice(-safeLimit).reverse());
    } catch (error) {
      logger.error("Failed to read sessions", error);
      return [];
    }
  };

  // Only the newest DATE_FILTER_WINDOW records are searched.
  const readByDate = (day: CalendarDate) => {
    return read(DATE_FILTER_WINDOW).filter(
      (session) => sessionDate(session) === day,
    );
  };

  const readAll = () => {
    try {
      return decode(readLines());
    } catch (error) {
      logger.error("Failed to read sessions", error);
      return [];
    }
  };

  const rotateIfOversized = (): SessionLogResult => {
    if (!fs.existsSync(filePath)) return ok();
    try {
      const { size } = fs.statSync(filePath);
      if (size > maxBytes) {
        fs.renameSync(filePath, rotatedPath);
        logger.info(`Rotated session log to ${rotatedPath}`);
      }
      return ok();
    } catch (error) {
      logger.error("Failed to rotate log file", error);
      return failure("rotate-failed", error);
    }
  };

  const validate = (): SessionLogResult => {
    let lines: string[];
    try {
      lines = readLines();
    } catch (error) {
      logger.error("Failed to validate log file", error);
      return failure("read-failed", error);
    }
    for (const [index, raw] of lines.entries()) {
      const line = raw.trim();
      if (!line) continue;
      try {
        JSON.parse(line);
      } catch (error) {
        return failure("invalid-format", error, index + 1);
      }
    }
    return ok();
  };

  return {
    filePath,
    rotatedPath,
    ensureDirectory,
    append,
    read,
    readByDate,
    readAll,
    rotateIfOversized,
    validate,
  };
};

export const openSessionLog = (options: SessionLogOptions) => {
  const log = createSessionLog(options);
  return { log, result: log.ensureDirectory() };
};
