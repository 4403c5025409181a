import fs from "node:fs/promises";
import { toCalendarDate } from "./lib/dates";
import { createNoopLogger, type Logger } from "./lib/logging";
import { DEFAULT_DURATIONS } from "./lib/pomodoro";
import {
  completeSession,
  createSession,
  deserializeSession,
  serializeSession,
  validateSession,
} from "./lib/session";
import type {
  CreateSessionResult,
  Session,
  SessionExportDocument,
  SessionList,
  SessionListQuery,
  SessionStatsSummary,
  SessionTransferResult,
  TimerPreferences,
} from "./lib/session-types";
import {
  calculateDailyStats,
  calculateWeeklyStats,
  getAverageCompletedDuration,
  getCompletionRate,
  getPeakProductivityHour,
  getProductivityTrend,
  getTypeDistribution,
  sessionDate,
  type DailyStats,
  type PeakHour,
  type ProductivityTrend,
  type TypeDistribution,
  type WeeklyStats,
} from "./lib/statistics";
import {
  parseCalendarDate,
  parseCreateSessionRequest,
  parseReadLimit,
} from "./lib/validation";
import type { PreferencesStore } from "./preferences-store";
import { DATE_FILTER_WINDOW, type SessionLog } from "./session-log";

export type SessionInsights = {
  daily: DailyStats;
  weekly: WeeklyStats;
  trend: ProductivityTrend;
  distribution: TypeDistribution;
  peak: PeakHour;
  averageCompletedMinutes: number;
  completionRate: number;
};

export type SessionServiceOptions = {
  log: SessionLog;
  logger?: Logger;
  preferences?: PreferencesStore;
  now?: () => Date;
};

export type SessionService = {
  createSession(request: unknown): CreateSessionResult;
  listSessions(query?: SessionListQuery): SessionList;
  getStats(): SessionStatsSummary;
  getInsights(): SessionInsights;
  getTimerDefaults(): TimerPreferences;
  updateTimerDefaults(value: Partial<TimerPreferences>): TimerPreferences;
  exportSessions(filePath: string): Promise<SessionTransferResult>;
  importSessions(filePath: string): Promise<SessionTransferResult>;
};

const EXPORT_VERSION = 1;

type ExtractedSessions = {
  sessions: Session[];
  recognized: boolean;
  sourceCount: number;
  skipped: number;
};

const extractSessions = (payload: unknown): ExtractedSessions => {
  if (!payload || typeof payload !== "object" || !("sessions" in payload)) {
    return { sessions: [], recognized: false, sourceCount: 0, skipped: 0 };
  }
  const entries = payload.sessions;
  if (!Array.isArray(entries)) {
    return { sessions: [], recognized: false, sourceCount: 0, skipped: 0 };
  }

  const sessions: Session[] = [];
  let skipped = 0;
  for (const entry of entries) {
    try {
      const session = deserializeSession(entry);
      if (validateSession(session)) {
        sessions.push(session);
      } else {
        skipped += 1;
      }
    } catch {
      skipped += 1;
    }
  }
  return { sessions, recognized: true, sourceCount: entries.length, skipped };
};

const sortByStartTime = (sessions: Session[]) => {
  return sessions
    .slice()
    .sort((a, b) => a.startTime.getTime() - b.startTime.getTime());
};

export const createSessionService = ({
  log,
  logger = createNoopLogger(),
  preferences,
  now = () => new Date(),
}: SessionServiceOptions): SessionService => {
  const createSessionFromRequest = (request: unknown): CreateSessionResult => {
    const data = parseCreateSessionRequest(request);
    const session = createSession(
      data.session_type,
      data.duration_minutes,
      data.task_description,
      now(),
    );
    if (data.completed) {
      completeSession(session, now());
    }
    session.interruptionCount = data.interruptions;

    const rotation = log.rotateIfOversized();
    if (!rotation.ok) {
      logger.warn("Continuing without log rotation", rotation.error);
    }
    const result = log.append(session);
    if (result.ok) {
      logger.debug(`Logged ${session.type} session ${session.id}`);
    } else {
      logger.warn(`Session ${session.id} was not written to the log`);
    }
    return {
      success: result.ok,
      session_id: session.id,
      message: result.ok
        ? "Session logged successfully"
        : "Failed to log session",
    };
  };

  const listSessions = (query: SessionListQuery = {}): SessionList => {
    const limit = parseReadLimit(query.limit);
    const day = parseCalendarDate(query.date);
    const sessions = day ? log.readByDate(day) : log.read(limit);
    return {
      sessions: sessions.map(serializeSession),
      total: sessions.length,
    };
  };

  const getStats = (): SessionStatsSummary => {
    const sessions = log.read(DATE_FILTER_WINDOW);
    const today = toCalendarDate(now());
    const completed = sessions.filter((session) => session.completed);
    return {
      total_sessions: sessions.length,
      completed_sessions: completed.length,
      total_focus_minutes: completed
        .filter((session) => session.type === "work")
        .reduce((total, session) => total + session.durationMinutes, 0),
      completion_rate: getCompletionRate(sessions),
      today_sessions: sessions.filter(
        (session) => sessionDate(session) === today,
      ).length,
    };
  };

  const getInsights = (): SessionInsights => {
    const sessions = log.read(DATE_FILTER_WINDOW);
    const current = now();
    return {
      daily: calculateDailyStats(sessions, current),
      weekly: calculateWeeklyStats(sessions, current),
      trend: getProductivityTrend(sessions, current),
      distribution: getTypeDistribution(sessions),
      peak: getPeakProductivityHour(sessions),
      averageCompletedMinutes: getAverageCompletedDuration(sessions),
      completionRate: getCompletionRate(sessions),
    };
  };

  const getTimerDefaults = () => {
    return preferences ? preferences.get() : { ...DEFAULT_DURATIONS };
  };

  const updateTimerDefaults = (value: Partial<TimerPreferences>) => {
    if (!preferences) {
      return getTimerDefaults();
    }
    return preferences.set(value);
  };

  const exportSessions = async (
    filePath: string,
  ): Promise<SessionTransferResult> => {
    const sessions = log.readAll();
    const payload: SessionExportDocument = {
      version: EXPORT_VERSION,
      exportedAt: now().toISOString(),
      sessions: sessions.map(serializeSession),
    };
    try {
      await fs.writeFile(filePath, JSON.stringify(payload, null, 2), "utf8");
      return { ok: true, count: sessions.length, filePath };
    } catch (error) {
      logger.error("Failed to export sessions", error);
      return { ok: false, reason: "write-failed" };
    }
  };

  /**
   * Appends the sessions of an exported document that the log does not hold
   * yet. Appends are not transactional: on `write-failed`, the sessions
   * written before the failure stay in the log.
   */
  const importSessions = async (
    filePath: string,
  ): Promise<SessionTransferResult> => {
    let raw = "";
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      logger.error("Failed to read sessions file", error);
      return { ok: false, reason: "read-failed" };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.error("Failed to parse sessions file", error);
      return { ok: false, reason: "invalid-format" };
    }

    const { sessions, recognized, sourceCount, skipped } =
      extractSessions(parsed);
    if (!recognized || (sourceCount > 0 && sessions.length === 0)) {
      return { ok: false, reason: "invalid-format" };
    }
    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} unreadable sessions during import`);
    }

    const existingIds = new Set(log.readAll().map((session) => session.id));
    const uniqueSessions = sessions.filter((session) => {
      if (existingIds.has(session.id)) {
        return false;
      }
      existingIds.add(session.id);
      return true;
    });

    const rotation = log.rotateIfOversized();
    if (!rotation.ok) {
      logger.warn("Continuing without log rotation", rotation.error);
    }
    for (const session of sortByStartTime(uniqueSessions)) {
      const result = log.append(session);
      if (!result.ok) {
        return { ok: false, reason: "write-failed" };
      }
    }
    return { ok: true, count: uniqueSessions.length };
  };

  return {
    createSession: createSessionFromRequest,
    listSessions,
    getStats,
    getInsights,
    getTimerDefaults,
    updateTimerDefaults,
    exportSessions,
    importSessions,
  };
};
