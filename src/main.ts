import { loadConfig, type AppConfig } from "./config";
import { createLogger, type Logger } from "./lib/logging";
import { createPreferencesStore } from "./preferences-store";
import { createSessionService, type SessionService } from "./session-service";
import { openSessionLog, type SessionLog } from "./session-log";

export type App = {
  config: AppConfig;
  logger: Logger;
  log: SessionLog;
  service: SessionService;
};

export type BootstrapOptions = {
  env?: Record<string, string | undefined>;
  now?: () => Date;
};

export const bootstrap = ({ env, now }: BootstrapOptions = {}): App => {
  const config = loadConfig(env);
  const logger = createLogger(config.logLevel);

  const { log, result } = openSessionLog({
    filePath: config.logFilePath,
    logger,
  });
  if (!result.ok) {
    logger.warn(
      `Session log directory unavailable, sessions will not be recorded: ${result.error}`,
    );
  }

  const preferences = createPreferencesStore({
    defaults: config.timerDefaults,
    cwd: config.preferencesDir,
  });
  const service = createSessionService({ log, logger, preferences, now });

  logger.info(`Recording sessions to ${log.filePath}`);
  return { config, logger, log, service };
};

export { loadConfig } from "./config";
export { createLogger } from "./lib/logging";
export * from "./lib/errors";
export * from "./lib/pomodoro";
export * from "./lib/session";
export * from "./lib/statistics";
export * from "./lib/session-types";
export { parseCalendarDate, parseCreateSessionRequest } from "./lib/validation";
export { createPreferencesStore } from "./preferences-store";
export { createSessionLog, openSessionLog } from "./session-log";
export { createSessionService } from "./session-service";
