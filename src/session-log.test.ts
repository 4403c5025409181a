import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Logger } from "./lib/logging";
import { completeSession, createSession, serializeSession } from "./lib/session";
import {
  MAX_LOG_BYTES,
  createLogEntry,
  createSessionLog,
  openSessionLog,
  parseLogEntry,
} from "./session-log";

const createSpyLogger = () => ({
  trace: vi.fn<Logger["trace"]>(),
  debug: vi.fn<Logger["debug"]>(),
  info: vi.fn<Logger["info"]>(),
  warn: vi.fn<Logger["warn"]>(),
  error: vi.fn<Logger["error"]>(),
});

const sessionAt = (iso: string, description = "") => {
  const session = createSession("work", 25, description, new Date(iso));
  return completeSession(session, new Date(iso));
};

let tempDir = "";
let filePath = "";

beforeEach(() => {
  tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pomodoro-log-"));
  filePath = path.join(tempDir, "logs", "sessions.log");
});

afterEach(() => {
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe("openSessionLog", () => {
  it("creates the parent directory", () => {
    const { log, result } = openSessionLog({ filePath });

    expect(result).toEqual({ ok: true });
    expect(fs.statSync(path.dirname(filePath)).isDirectory()).toBe(true);
    expect(log.filePath).toBe(filePath);
  });

  it("reports a directory it cannot create", () => {
    fs.writeFileSync(path.join(tempDir, "blocker"), "");
    const logger = createSpyLogger();

    const { result } = openSessionLog({
      filePath: path.join(tempDir, "blocker", "logs", "sessions.log"),
      logger,
    });

    expect(result).toMatchObject({ ok: false, reason: "directory-failed" });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe("append", () => {
  it("writes one compact line per session", () => {
    const { log } = openSessionLog({ filePath });
    const first = sessionAt("2025-11-28T09:00:00.000Z");
    const second = sessionAt("2025-11-28T10:00:00.000Z");

    expect(log.append(first)).toEqual({ ok: true });
    expect(log.append(second)).toEqual({ ok: true });

    const content = fs.readFileSync(filePath, "utf8");
    expect(content).toBe(
      `${JSON.stringify(serializeSession(first))}\n${JSON.stringify(serializeSession(second))}\n`,
    );
  });

  it("keeps multi-line descriptions on a single line", () => {
    const { log } = openSessionLog({ filePath });
    const session = sessionAt(
      "2025-11-28T09:00:00.000Z",
      'Plan "Q1"\nthen 休憩 ☕',
    );

    log.append(session);

    expect(fs.readFileSync(filePath, "utf8").split("\n")).toHaveLength(2);
    expect(log.read(1)[0]).toEqual(session);
  });

  it("reports a write failure instead of throwing", () => {
    const logger = createSpyLogger();
    const { log } = openSessionLog({ filePath, logger });
    fs.mkdirSync(filePath);

    const result = log.append(sessionAt("2025-11-28T09:00:00.000Z"));

    expect(result).toMatchObject({ ok: false, reason: "write-failed" });
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to log session",
      expect.any(Error),
    );
  });
});

describe("read", () => {
  it("returns the newest sessions first", () => {
    const { log } = openSessionLog({ filePath });
    const a = sessionAt("2025-11-28T09:00:00.000Z");
    const b = sessionAt("2025-11-28T10:00:00.000Z");
    const c = sessionAt("2025-11-28T11:00:00.000Z");
    [a, b, c].forEach((session) => log.append(session));

    expect(log.read(3).map((session) => session.id)).toEqual([c.id, b.id, a.id]);
  });

  it("limits the result to the most recent appends", () => {
    const { log } = openSessionLog({ filePath });
    const sessions = Array.from({ length: 5 }, (_, index) =>
      sessionAt(`2025-11-28T${String(9 + index).padStart(2, "0")}:00:00.000Z`),
    );
    sessions.forEach((session) => log.append(session));

    expect(log.read(2).map((session) => session.id)).toEqual([
      sessions[4].id,
      sessions[3].id,
    ]);
  });

  it("reads at most one hundred sessions by default", () => {
    const { log } = openSessionLog({ filePath });
    const lines = Array.from({ length: 105 }, (_, index) =>
      createLogEntry(sessionAt(new Date(Date.UTC(2025, 10, 1, 0, index)).toISOString())),
    );
    fs.writeFileSync(filePath, `${lines.join("\n")}\n`);

    const sessions = log.read();

    expect(sessions).toHaveLength(100);
    expect(sessions[0].startTime.toISOString()).toBe("2025-11-01T01:44:00.000Z");
  });

  it("falls back to the default limit for a non-positive limit", () => {
    const { log } = openSessionLog({ filePath });
    log.append(sessionAt("2025-11-28T09:00:00.000Z"));
    log.append(sessionAt("2025-11-28T10:00:00.000Z"));

    expect(log.read(0)).toHaveLength(2);
    expect(log.read(Number.NaN)).toHaveLength(2);
  });

  it("returns nothing when the file does not exist", () => {
    const { log } = openSessionLog({ filePath });

    expect(log.read()).toEqual([]);
  });

  it("skips corrupt and blank lines", () => {
    const logger = createSpyLogger();
    const { log } = openSessionLog({ filePath, logger });
    const first = sessionAt("2025-11-28T09:00:00.000Z");
    const second = sessionAt("2025-11-28T10:00:00.000Z");
    fs.writeFileSync(
      filePath,
      [
        createLogEntry(first),
        "{not valid json",
        "",
        JSON.stringify({ session_id: "x", session_type: "work" }),
        createLogEntry(second),
        "",
      ].join("\n"),
    );

    expect(log.read().map((session) => session.id)).toEqual([
      second.id,
      first.id,
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
  });

  it("reports a read failure as an empty history", () => {
    const logger = createSpyLogger();
    fs.mkdirSync(filePath, { recursive: true });
    const log = createSessionLog({ filePath, logger });

    expect(log.read()).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      "Failed to read sessions",
      expect.any(Error),
    );
  });
});

describe("readByDate", () => {
  it("keeps sessions that started on the given UTC day", () => {
    const { log } = openSessionLog({ filePath });
    const before = sessionAt("2025-11-27T23:59:00.000Z");
    const morning = sessionAt("2025-11-28T00:00:00.000Z");
    const evening = sessionAt("2025-11-28T23:00:00.000Z");
    const after = sessionAt("2025-11-29T00:00:00.000Z");
    [before, morning, evening, after].forEach((session) => log.append(session));

    expect(log.readByDate("2025-11-28").map((session) => session.id)).toEqual([
      evening.id,
      morning.id,
    ]);
    expect(log.readByDate("2025-11-01")).toEqual([]);
  });
});

describe("readAll", () => {
  it("returns every session oldest first", () => {
    const { log } = openSessionLog({ filePath });
    const a = sessionAt("2025-11-28T09:00:00.000Z");
    const b = sessionAt("2025-11-28T10:00:00.000Z");
    log.append(a);
    log.append(b);

    expect(log.readAll().map((session) => session.id)).toEqual([a.id, b.id]);
  });
});

describe("rotateIfOversized", () => {
  it("succeeds when there is no file yet", () => {
    const { log } = openSessionLog({ filePath });

    expect(log.rotateIfOversized()).toEqual({ ok: true });
    expect(fs.existsSync(log.rotatedPath)).toBe(false);
  });

  it("leaves a file at the threshold in place", () => {
    const { log } = openSessionLog({ filePath });
    fs.writeFileSync(filePath, "");
    fs.truncateSync(filePath, MAX_LOG_BYTES);

    expect(log.rotateIfOversized()).toEqual({ ok: true });
    expect(fs.statSync(filePath).size).toBe(MAX_LOG_BYTES);
    expect(fs.existsSync(log.rotatedPath)).toBe(false);
  });

  it("moves an oversized file aside and starts fresh", () => {
    const { log } = openSessionLog({ filePath });
    fs.writeFileSync(filePath, "");
    fs.truncateSync(filePath, MAX_LOG_BYTES + 1);
    fs.writeFileSync(log.rotatedPath, "older rotation\n");

    expect(log.rotateIfOversized()).toEqual({ ok: true });
    expect(log.rotatedPath).toBe(`${filePath}.old`);
    expect(fs.statSync(log.rotatedPath).size).toBe(MAX_LOG_BYTES + 1);
    expect(fs.existsSync(filePath)).toBe(false);

    const session = sessionAt("2025-11-28T09:00:00.000Z");
    log.append(session);
    expect(fs.readFileSync(filePath, "utf8")).toBe(`${createLogEntry(session)}\n`);
  });

  it("honors a custom size limit", () => {
    const { log } = openSessionLog({ filePath, maxBytes: 10 });
    log.append(sessionAt("2025-11-28T09:00:00.000Z"));

    expect(log.rotateIfOversized()).toEqual({ ok: true });
    expect(fs.existsSync(filePath)).toBe(false);
    expect(fs.existsSync(log.rotatedPath)).toBe(true);
  });

  it("reports a rename failure", () => {
    const logger = createSpyLogger();
    const { log } = openSessionLog({ filePath, logger, maxBytes: 10 });
    log.append(sessionAt("2025-11-28T09:00:00.000Z"));
    fs.mkdirSync(log.rotatedPath);
    fs.writeFileSync(path.join(log.rotatedPath, "keep"), "");

    expect(log.rotateIfOversized()).toMatchObject({
      ok: false,
      reason: "rotate-failed",
    });
    expect(fs.existsSync(filePath)).toBe(true);
    expect(logger.error).toHaveBeenCalledTimes(1);
  });
});

describe("validate", () => {
  it("accepts a missing file", () => {
    const { log } = openSessionLog({ filePath });

    expect(log.validate()).toEqual({ ok: true });
  });

  it("accepts JSON lines separated by blank lines", () => {
    const { log } = openSessionLog({ filePath });
    fs.writeFileSync(filePath, '{"a":1}\n\n{"b":2}\n');

    expect(log.validate()).toEqual({ ok: true });
  });

  it("points at the first invalid line", () => {
    const { log } = openSessionLog({ filePath });
    fs.writeFileSync(filePath, '{"a":1}\nnot json\n{"b":2}\n');

    expect(log.validate()).toMatchObject({
      ok: false,
      reason: "invalid-format",
      line: 2,
    });
  });
});

describe("log entry codec", () => {
  it("round-trips a session", () => {
    const session = sessionAt("2025-11-28T09:00:00.000Z", "Écrire « notes »");

    expect(parseLogEntry(createLogEntry(session))).toEqual(session);
  });

  it.each([["not json"], [""], ["[]"], ['{"session_id":"x"}']])(
    "returns null for %j",
    (line) => {
      expect(parseLogEntry(line)).toBeNull();
    },
  );

  it("returns null for a malformed timestamp", () => {
    const record = {
      ...serializeSession(sessionAt("2025-11-28T09:00:00.000Z")),
      start_time: "28/11/2025 09:00",
    };

    expect(parseLogEntry(JSON.stringify(record))).toBeNull();
  });

  it("keeps pending sessions pending", () => {
    const session = createSession(
      "short_break",
      5,
      "",
      new Date("2025-11-28T09:00:00.000Z"),
    );
    const restored = parseLogEntry(createLogEntry(session));

    expect(restored?.completed).toBe(false);
    expect(restored?.endTime).toBeNull();
  });
});
