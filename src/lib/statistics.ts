import {
  addDays,
  startOfIsoWeek,
  toCalendarDate,
  type CalendarDate,
  type Weekday,
} from "./dates";
import { isValidSessionType } from "./pomodoro";
import type { Session, SessionType } from "./session-types";

export type StatsTotals = {
  totalSessions: number;
  completedSessions: number;
  totalFocusMinutes: number;
  completionRate: number;
};

export type DailyStats = StatsTotals & {
  date: CalendarDate;
  workSessions: number;
  breakSessions: number;
};

export type DayBreakdown = {
  sessions: number;
  completed: number;
};

export type WeeklyStats = StatsTotals & {
  weekStart: CalendarDate;
  workSessions: number;
  breakSessions: number;
  dailyBreakdown: Record<Weekday, DayBreakdown>;
};

export type Trend = "improving" | "declining" | "stable";

export type ProductivityTrend = {
  trend: Trend;
  change: number;
  description: string;
};

export type PeakHour = {
  peakHour: number | null;
  sessionsCount: number;
  hourlyDistribution?: Record<number, number>;
};

export type TypeDistribution = Record<SessionType, number>;

const TREND_THRESHOLD = 10;
const TREND_WINDOW_DAYS = 14;
const WEEK_DAYS = 7;

// Exact halves round to even; everything else rounds to the nearest tenth.
const roundToTenth = (value: number) => {
  const isHalf = Number.isInteger(value * 4) && !Number.isInteger(value * 2);
  if (isHalf) {
    const down = Math.floor(value * 10);
    return (down % 2 === 0 ? down : down + 1) / 10;
  }
  return Number(value.toFixed(1));
};

export const sessionDate = (session: Session): CalendarDate =>
  toCalendarDate(session.startTime);

const isCompletedWork = (session: Session) =>
  session.type === "work" && session.completed;

export const createEmptyStats = (): StatsTotals => ({
  totalSessions: 0,
  completedSessions: 0,
  totalFocusMinutes: 0,
  completionRate: 0,
});

export const getCompletionRate = (sessions: readonly Session[]) => {
  if (sessions.length === 0) return 0;
  const completed = sessions.filter((session) => session.completed).length;
  return roundToTenth((completed / sessions.length) * 100);
};

export const getAverageCompletedDuration = (sessions: readonly Session[]) => {
  const completed = sessions.filter((session) => session.completed);
  if (completed.length === 0) return 0;
  const totalMinutes = completed.reduce(
    (total, session) => total + session.durationMinutes,
    0,
  );
  return roundToTenth(totalMinutes / completed.length);
};

const summarize = (sessions: readonly Session[]) => {
  const completedWork = sessions.filter(isCompletedWork);
  return {
    totalSessions: sessions.length,
    completedSessions: sessions.filter((session) => session.completed).length,
    totalFocusMinutes: completedWork.reduce(
      (total, session) => total + session.durationMinutes,
      0,
    ),
    completionRate: getCompletionRate(sessions),
    workSessions: completedWork.length,
    breakSessions: sessions.filter((session) => session.type !== "work")
      .length,
  };
};

export const calculateDailyStats = (
  sessions: readonly Session[],
  now: Date = new Date(),
): DailyStats => {
  const today = toCalendarDate(now);
  const todaySessions = sessions.filter(
    (session) => sessionDate(session) === today,
  );
  return { date: today, ...summarize(todaySessions) };
};

export const calculateWeeklyStats = (
  sessions: readonly Session[],
  now: Date = new Date(),
): WeeklyStats => {
  const today = toCalendarDate(now);
  const weekStart = startOfIsoWeek(today);
  const weekSessions = filterByDateRange(sessions, weekStart, today);

  const breakdownFor = (index: number): DayBreakdown => {
    const day = addDays(weekStart, index);
    const daySessions = weekSessions.filter(
      (session) => sessionDate(session) === day,
    );
    return {
      sessions: daySessions.length,
      completed: daySessions.filter((session) => session.completed).length,
    };
  };
  const dailyBreakdown: Record<Weekday, DayBreakdown> = {
    Monday: breakdownFor(0),
    Tuesday: breakdownFor(1),
    Wednesday: breakdownFor(2),
    Thursday: breakdownFor(3),
    Friday: breakdownFor(4),
    Saturday: breakdownFor(5),
    Sunday: breakdownFor(6),
  };

  return { weekStart, ...summarize(weekSessions), dailyBreakdown };
};

export const classifyTrend = (change: number): Trend => {
  if (change > TREND_THRESHOLD) return "improving";
  if (change < -TREND_THRESHOLD) return "declining";
  return "stable";
};

export const getProductivityTrend = (
  sessions: readonly Session[],
  now: Date = new Date(),
): ProductivityTrend => {
  if (sessions.length === 0) {
    return { trend: "stable", change: 0, description: "No data available" };
  }

  const today = toCalendarDate(now);
  const windowStart = addDays(today, -TREND_WINDOW_DAYS);
  const recent = sessions.filter(
    (session) => sessionDate(session) >= windowStart,
  );
  if (recent.length < 2) {
    return { trend: "stable", change: 0, description: "Insufficient data" };
  }

  const oneWeekAgo = addDays(today, -WEEK_DAYS);
  let lastWeekCompleted = 0;
  let thisWeekCompleted = 0;
  for (const session of recent) {
    if (!session.completed) continue;
    if (sessionDate(session) < oneWeekAgo) {
      lastWeekCompleted += 1;
    } else {
      thisWeekCompleted += 1;
    }
  }

  if (lastWeekCompleted === 0) {
    return thisWeekCompleted > 0
      ? {
          trend: "improving",
          change: 100,
          description: "Started completing sessions",
        }
      : { trend: "stable", change: 0, description: "No completed sessions" };
  }

  const change =
    ((thisWeekCompleted - lastWeekCompleted) / lastWeekCompleted) * 100;
  const trend = classifyTrend(change);
  const description =
    trend === "improving"
      ? `Completed sessions increased by ${change.toFixed(1)}%`
      : trend === "declining"
        ? `Completed sessions decreased by ${Math.abs(change).toFixed(1)}%`
        : "Completion rate is stable";

  return { trend, change: roundToTenth(change), description };
};

export const filterByDateRange = (
  sessions: readonly Session[],
  start: CalendarDate,
  end: CalendarDate,
) => {
  return sessions.filter((session) => {
    const day = sessionDate(session);
    return day >= start && day <= end;
  });
};

export const getTypeDistribution = (
  sessions: readonly Session[],
): TypeDistribution => {
  const distribution: TypeDistribution = {
    work: 0,
    short_break: 0,
    long_break: 0,
  };
  for (const session of sessions) {
    if (isValidSessionType(session.type)) {
      distribution[session.type] += 1;
    }
  }
  return distribution;
};

export const getPeakProductivityHour = (
  sessions: readonly Session[],
): PeakHour => {
  // Map keeps insertion order, so ties go to the hour seen first.
  const hourlyCounts = new Map<number, number>();
  for (const session of sessions) {
    if (!isCompletedWork(session)) continue;
    const hour = session.startTime.getUTCHours();
    hourlyCounts.set(hour, (hourlyCounts.get(hour) ?? 0) + 1);
  }

  let peakHour: number | null = null;
  let sessionsCount = 0;
  for (const [hour, count] of hourlyCounts) {
    if (count > sessionsCount) {
      peakHour = hour;
      sessionsCount = count;
    }
  }

  if (peakHour === null) {
    return { peakHour: null, sessionsCount: 0 };
  }
  return {
    peakHour,
    sessionsCount,
    hourlyDistribution: Object.fromEntries(hourlyCounts),
  };
};
