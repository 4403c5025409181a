export const SESSION_TYPES = ["work", "short_break", "long_break"] as const;
export type SessionType = (typeof SESSION_TYPES)[number];

export type Session = {
  readonly id: string;
  // Any string is accepted at construction; validateSession checks membership.
  type: string;
  durationMinutes: number;
  description: string;
  readonly startTime: Date;
  endTime: Date | null;
  completed: boolean;
  interruptionCount: number;
};

export type SessionRecord = {
  session_id: string;
  session_type: string;
  duration_minutes: number;
  task_description: string;
  start_time: string;
  end_time: string | null;
  completed: boolean;
  interruptions: number;
};

export type SessionLogFailure =
  | "directory-failed"
  | "write-failed"
  | "rotate-failed"
  | "read-failed"
  | "invalid-format";

export type SessionLogResult =
  | { ok: true }
  | { ok: false; reason: SessionLogFailure; error: string; line?: number };

export type CreateSessionRequest = {
  session_type: SessionType;
  duration_minutes: number;
  task_description: string;
  completed: boolean;
  interruptions: number;
};

export type CreateSessionResult = {
  success: boolean;
  session_id: string;
  message: string;
};

export type SessionListQuery = {
  limit?: number | string;
  date?: string;
};

export type SessionList = {
  sessions: SessionRecord[];
  total: number;
};

export type SessionStatsSummary = {
  total_sessions: number;
  completed_sessions: number;
  total_focus_minutes: number;
  completion_rate: number;
  today_sessions: number;
};

export type SessionExportDocument = {
  version: 1;
  exportedAt: string;
  sessions: SessionRecord[];
};

export type SessionTransferResult = {
  ok: boolean;
  count?: number;
  filePath?: string;
  reason?: "read-failed" | "invalid-format" | "write-failed";
};

export type TimerPreferences = Record<SessionType, number>;
