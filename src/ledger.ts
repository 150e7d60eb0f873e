import type { PayWindowPolicy } from './core/types';
import { type EnvConfig, loadEnvConfig } from './config/env';
import { JsonFileSettingsStore, type Settings, type SettingsStore } from './config/settings';
import { JsonFileRecordPersistence, type RecordPersistence } from './store/fileStore';
import { type ApplyToRecordsResult, RecordStore } from './store/recordStore';
import { ClockSession, type Clock } from './session/clock';
import { currentYearMonth } from './summarize/helpers';
import { createLogger, setLogLevel } from './logger';
import { describeError } from './errors';

const log = createLogger('ledger');

export type Ledger = {
  records: RecordStore;
  settings: SettingsStore;
  clock: ClockSession;
};

export type LedgerParts = {
  records: RecordPersistence;
  settings: SettingsStore;
  now?: Clock;
};

export function createLedger(parts: LedgerParts): Ledger {
  const records = new RecordStore(parts.records);
  return { records, settings: parts.settings, clock: new ClockSession(records, parts.now) };
}

/** File-backed ledger under config.dataDir; applies the configured log level. */
export function openLedger(config: EnvConfig = loadEnvConfig()): Ledger {
  setLogLevel(config.logLevel);
  return createLedger({
    records: JsonFileRecordPersistence.inDir(config.dataDir),
    settings: JsonFileSettingsStore.inDir(config.dataDir),
  });
}

export type WageUpdate = {
  wagePerHour: number;
  payWindow?: PayWindowPolicy;
  scope: 'none' | 'currentMonth' | 'all';
  applyToModifiedHourly?: boolean;
  now?: Date;
};

export type WageUpdateResult = {
  settings: Settings;
  settingsSaved: boolean;
  applied: ApplyToRecordsResult | null;
};

/**
 * Saves the new wage (and optionally the window policy), then recomputes the
 * chosen slice of records with those values passed explicitly.
 */
export function updateWage(ledger: Ledger, update: WageUpdate): WageUpdateResult {
  const prev = ledger.settings.load();
  const settings: Settings = {
    wagePerHour: update.wagePerHour,
    payWindow: update.payWindow ?? prev.payWindow,
  };

  let settingsSaved = true;
  try {
    ledger.settings.save(settings);
  } catch (err) {
    settingsSaved = false;
    log.warn(`settings not saved: ${describeError(err)}`);
  }

  const force = update.applyToModifiedHourly ?? false;
  let applied: ApplyToRecordsResult | null = null;
  if (update.scope === 'all') {
    applied = ledger.records.applyToAll(settings.wagePerHour, force, settings.payWindow);
  } else if (update.scope === 'currentMonth') {
    const { year, month } = currentYearMonth(update.now);
    applied = ledger.records.applyToMonth(year, month, settings.wagePerHour, force, settings.payWindow);
  }
  return { settings, settingsSaved, applied };
}
