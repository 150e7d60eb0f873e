import { join } from 'node:path';
import { DEFAULT_PAY_WINDOW, type PayWindowPolicy } from '../core/types';
import { clampMinuteOfDay, max0, num } from '../state/number';
import { isObject } from '../state/from-json';
import { readJsonFile, writeFileAtomic } from '../store/fileStore';
import { createLogger } from '../logger';

const log = createLogger('settings');

export const SETTINGS_FILE = 'settings.json';

export type Settings = {
  wagePerHour: number; // 0 = not set yet
  payWindow: PayWindowPolicy;
};

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  wagePerHour: 0,
  payWindow: DEFAULT_PAY_WINDOW,
});

/** A zero wage means first run: the caller should ask for one. */
export const needsSetup = (s: Settings) => s.wagePerHour === 0;

/** Merges partial or untyped input over the defaults. */
export function normalizeSettings(raw: unknown): Settings {
  if (!isObject(raw)) return { ...DEFAULT_SETTINGS, payWindow: { ...DEFAULT_PAY_WINDOW } };
  const pw: Record<string, unknown> = isObject(raw.payWindow) ? raw.payWindow : {};
  return {
    wagePerHour: max0(num(raw.wagePerHour)),
    payWindow: {
      enabled: pw.enabled === true,
      startMinutes:
        pw.startMinutes == null ? DEFAULT_PAY_WINDOW.startMinutes : clampMinuteOfDay(pw.startMinutes),
      endMinutes:
        pw.endMinutes == null ? DEFAULT_PAY_WINDOW.endMinutes : clampMinuteOfDay(pw.endMinutes),
    },
  };
}

export interface SettingsStore {
  load(): Settings;
  save(settings: Settings): void;
}

export class JsonFileSettingsStore implements SettingsStore {
  constructor(readonly path: string) {}

  static inDir(dir: string) {
    return new JsonFileSettingsStore(join(dir, SETTINGS_FILE));
  }

  load(): Settings {
    const data = readJsonFile(this.path);
    if (data === undefined) log.debug(`no settings at ${this.path}, using defaults`);
    return normalizeSettings(data);
  }

  save(settings: Settings): void {
    writeFileAtomic(this.path, JSON.stringify(normalizeSettings(settings), null, 2));
  }
}
