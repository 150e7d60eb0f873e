import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createLedger,
  LogLevel,
  MemoryRecordPersistence,
  needsSetup,
  normalizeSettings,
  openLedger,
  setLogLevel,
  updateWage,
  type Settings,
  type SettingsStore,
} from '../src';
import { at, makeRecord, NINE_TO_SIX } from './helpers/factories';

class MemorySettings implements SettingsStore {
  current: Settings = normalizeSettings(undefined);
  load() {
    return this.current;
  }
  save(settings: Settings) {
    this.current = settings;
  }
}

function ledgerWith() {
  const settings = new MemorySettings();
  const ledger = createLedger({
    records: new MemoryRecordPersistence([
      makeRecord({ id: 'feb', start: at(3, 9, 0, 2), end: at(3, 17, 0, 2), hourly: 100 }),
      makeRecord({ id: 'jan', start: at(15, 9), end: at(15, 17, 30), hourly: 100 }),
      makeRecord({ id: 'jan-manual', start: at(16, 9), end: at(16, 10), hourly: 120, modifiedHourly: true }),
    ]),
    settings,
  });
  return { ledger, settings };
}

describe('updateWage', () => {
  beforeEach(() => {
    setLogLevel(LogLevel.SILENT);
  });

  it('saves the wage and recomputes only the current month', () => {
    const { ledger, settings } = ledgerWith();
    const res = updateWage(ledger, { wagePerHour: 200, scope: 'currentMonth', now: at(20, 12) });

    expect(settings.current.wagePerHour).toBe(200);
    expect(res.settingsSaved).toBe(true);
    expect(res.applied?.changed).toBe(1);
    expect(ledger.records.get('jan')?.salary).toBe(1700);
    expect(ledger.records.get('jan-manual')?.hourly).toBe(120);
    expect(ledger.records.get('feb')?.hourly).toBe(100);
  });

  it('can force every record and switch the window policy', () => {
    const { ledger, settings } = ledgerWith();
    const res = updateWage(ledger, {
      wagePerHour: 200,
      payWindow: NINE_TO_SIX,
      scope: 'all',
      applyToModifiedHourly: true,
    });

    expect(settings.current.payWindow).toEqual(NINE_TO_SIX);
    expect(res.applied?.changed).toBe(3);
    expect(ledger.records.get('jan-manual')?.hourly).toBe(200);
    // 09:00-17:00 is inside 09:00-18:00
    expect(ledger.records.get('feb')?.salary).toBe(1600);
  });

  it("scope 'none' only stores the wage", () => {
    const { ledger, settings } = ledgerWith();
    const res = updateWage(ledger, { wagePerHour: 210, scope: 'none' });
    expect(res.applied).toBeNull();
    expect(settings.current.wagePerHour).toBe(210);
    expect(ledger.records.get('jan')?.hourly).toBe(100);
  });

  it('reports a settings write failure without stopping the recompute', () => {
    const { ledger } = ledgerWith();
    ledger.settings.save = () => {
      throw new Error('read-only');
    };
    const res = updateWage(ledger, { wagePerHour: 200, scope: 'all' });
    expect(res.settingsSaved).toBe(false);
    expect(res.applied?.changed).toBe(2);
  });
});

describe('openLedger', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'timecard-ledger-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts empty and unconfigured in a fresh data dir, and reopens what it saved', () => {
    const first = openLedger({ dataDir: dir, logLevel: LogLevel.SILENT });
    expect(first.records.size).toBe(0);
    expect(needsSetup(first.settings.load())).toBe(true);

    first.records.add(makeRecord({ id: 'persisted' }));
    first.settings.save({ ...first.settings.load(), wagePerHour: 200 });

    const second = openLedger({ dataDir: dir, logLevel: LogLevel.SILENT });
    expect(second.records.list().map((r) => r.id)).toEqual(['persisted']);
    expect(second.settings.load().wagePerHour).toBe(200);
  });
});
