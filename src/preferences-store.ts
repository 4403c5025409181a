import Conf from "conf";
import { clampTimerMinutes, DEFAULT_DURATIONS } from "./lib/pomodoro";
import {
  SESSION_TYPES,
  type TimerPreferences,
} from "./lib/session-types";

export type PreferencesStoreOptions = {
  defaults?: Readonly<TimerPreferences>;
  cwd?: string;
};

export type PreferencesStore = {
  readonly path: string;
  get(): TimerPreferences;
  set(value: Partial<TimerPreferences>): TimerPreferences;
  reset(): TimerPreferences;
};

export const createPreferencesStore = ({
  defaults = DEFAULT_DURATIONS,
  cwd,
}: PreferencesStoreOptions = {}): PreferencesStore => {
  const seed: TimerPreferences = {
    work: clampTimerMinutes(defaults.work),
    short_break: clampTimerMinutes(defaults.short_break),
    long_break: clampTimerMinutes(defaults.long_break),
  };
  const store = new Conf<TimerPreferences>({
    projectName: "pomodoro-log",
    configName: "preferences",
    cwd,
    defaults: seed,
  });

  const get = (): TimerPreferences => ({
    work: store.get("work"),
    short_break: store.get("short_break"),
    long_break: store.get("long_break"),
  });

  const set = (value: Partial<TimerPreferences>) => {
    const current = get();
    const next = { ...current };
    for (const type of SESSION_TYPES) {
      const minutes = value[type];
      if (minutes !== undefined) {
        next[type] = clampTimerMinutes(minutes);
      }
    }
    store.set(next);
    return next;
  };

  const reset = () => {
    store.set(seed);
    return get();
  };

  return { path: store.path, get, set, reset };
};
