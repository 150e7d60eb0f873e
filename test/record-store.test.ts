import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  editRecord,
  MemoryRecordPersistence,
  PersistenceError,
  RecordStore,
  setLogLevel,
  LogLevel,
  type RecordPersistence,
  type WorkRecord,
} from '../src';
import { at, makeRecord, WINDOW_OFF } from './helpers/factories';

class FlakyPersistence implements RecordPersistence {
  failing = true;
  saved: readonly WorkRecord[] = [];
  load(): WorkRecord[] {
    return [];
  }
  save(records: readonly WorkRecord[]): void {
    if (this.failing) throw new PersistenceError('/tmp/records.json', new Error('EROFS'));
    this.saved = records;
  }
}

function storeWith(records: WorkRecord[]) {
  const persistence = new MemoryRecordPersistence(records);
  return { store: new RecordStore(persistence), persistence };
}

describe('RecordStore', () => {
  beforeEach(() => {
    setLogLevel(LogLevel.SILENT);
  });

  it('loads the persisted collection in order', () => {
    const { store } = storeWith([makeRecord({ id: 'b' }), makeRecord({ id: 'a' })]);
    expect(store.list().map((r) => r.id)).toEqual(['b', 'a']);
    expect(store.size).toBe(2);
    expect(store.get('a')?.id).toBe('a');
    expect(store.get('zzz')).toBeUndefined();
  });

  describe('add', () => {
    it('inserts most-recent-first and persists', () => {
      const { store, persistence } = storeWith([]);
      store.add(makeRecord({ id: 'first' }));
      const res = store.add(makeRecord({ id: 'second' }));

      expect(res.ok).toBe(true);
      expect(res.ok && res.persisted).toBe(true);
      expect(store.list().map((r) => r.id)).toEqual(['second', 'first']);
      expect(persistence.saves).toBe(2);
      expect(persistence.saved.map((r) => r.id)).toEqual(['second', 'first']);
    });

    it('re-derives date from startTime', () => {
      const { store } = storeWith([]);
      const stale = { ...makeRecord({ id: 'stale' }), date: '2024-12-31' };
      const res = store.add(stale);

      expect(res.ok).toBe(true);
      if (res.ok) expect(res.record.date).toBe('2025-01-15');
      expect(store.recordsForMonth(2025, 1).map((r) => r.id)).toEqual(['stale']);
    });

    it('rejects an id that is already stored', () => {
      const { store, persistence } = storeWith([makeRecord({ id: 'dup' })]);
      const res = store.add(makeRecord({ id: 'dup', description: 'second' }));

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe('DUPLICATE_ID');
      expect(store.size).toBe(1);
      expect(store.get('dup')?.description).toBe('');
      expect(persistence.saves).toBe(0);
    });

    it('returns an unparsable timestamp as INVALID_INTERVAL instead of throwing', () => {
      const { store, persistence } = storeWith([]);
      const res = store.add({ ...makeRecord(), startTime: 'garbage' });

      expect(res.ok).toBe(false);
      if (!res.ok) {
        expect(res.error.code).toBe('INVALID_INTERVAL');
        expect(res.error.message).toContain('garbage');
      }
      expect(store.size).toBe(0);
      expect(persistence.saves).toBe(0);
    });

    it('rejects a record whose end is not after its start', () => {
      const { store, persistence } = storeWith([]);
      const bad = { ...makeRecord(), endTime: at(15, 9).toISOString() };
      const res = store.add(bad);

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe('INVALID_INTERVAL');
      expect(store.size).toBe(0);
      expect(persistence.saves).toBe(0);
    });
  });

  describe('remove', () => {
    it('deletes by position in the current ordering', () => {
      const { store, persistence } = storeWith([
        makeRecord({ id: 'x' }),
        makeRecord({ id: 'y' }),
        makeRecord({ id: 'z' }),
      ]);
      const res = store.remove([2, 0]);

      expect(res.ok).toBe(true);
      if (res.ok) expect(res.removed.map((r) => r.id)).toEqual(['x', 'z']);
      expect(store.list().map((r) => r.id)).toEqual(['y']);
      expect(persistence.saves).toBe(1);
    });

    it('fails with NOT_FOUND on an out-of-range index and changes nothing', () => {
      const { store, persistence } = storeWith([makeRecord({ id: 'x' })]);
      const res = store.remove([0, 1]);

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe('NOT_FOUND');
      expect(store.size).toBe(1);
      expect(persistence.saves).toBe(0);
    });
  });

  describe('replace', () => {
    it('overwrites in place by id', () => {
      const { store } = storeWith([makeRecord({ id: 'x' }), makeRecord({ id: 'y' })]);
      const current = store.get('y');
      expect(current).toBeDefined();
      if (!current) return;

      const edited = editRecord(current, { description: 'late delivery', hourly: 220 }, WINDOW_OFF);
      const res = store.replace(edited);

      expect(res.ok).toBe(true);
      expect(store.list()[1]).toBe(edited);
      expect(store.list()[1].modifiedHourly).toBe(true);
    });

    it('moves a record to the month of its new start time', () => {
      const { store } = storeWith([makeRecord({ id: 'x', hourly: 100 })]);
      const moved = {
        ...makeRecord({ id: 'x', hourly: 100 }),
        startTime: at(3, 9, 0, 2).toISOString(),
        endTime: at(3, 17, 0, 2).toISOString(),
      };
      expect(moved.date).toBe('2025-01-15');

      const res = store.replace(moved);
      expect(res.ok).toBe(true);
      expect(store.get('x')?.date).toBe('2025-02-03');

      const applied = store.applyToMonth(2025, 2, 300, false, WINDOW_OFF);
      expect(applied.changed).toBe(1);
      expect(store.get('x')?.salary).toBe(2400);
      expect(store.recordsForMonth(2025, 1)).toEqual([]);
    });

    it('rejects an invalid interval and changes nothing', () => {
      const original = makeRecord({ id: 'x' });
      const { store, persistence } = storeWith([original]);
      const res = store.replace({ ...original, endTime: original.startTime });

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe('INVALID_INTERVAL');
      expect(store.get('x')).toBe(original);
      expect(persistence.saves).toBe(0);
    });

    it('fails with NOT_FOUND for an unknown id', () => {
      const { store, persistence } = storeWith([makeRecord({ id: 'x' })]);
      const res = store.replace(makeRecord({ id: 'ghost' }));

      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe('NOT_FOUND');
      expect(store.list().map((r) => r.id)).toEqual(['x']);
      expect(persistence.saves).toBe(0);
    });
  });

  describe('applyToAll', () => {
    it('leaves manually rated records completely unchanged', () => {
      const manual = makeRecord({ id: 'm', hourly: 150, modifiedHourly: true });
      const { store, persistence } = storeWith([makeRecord({ id: 'p', hourly: 100 }), manual]);

      const res = store.applyToAll(200, false, WINDOW_OFF);

      expect(res.changed).toBe(1);
      expect(res.persisted).toBe(true);
      expect(persistence.saves).toBe(1);
      expect(store.get('p')?.hourly).toBe(200);
      expect(store.get('p')?.salary).toBe(1700);
      expect(store.get('m')).toBe(manual);
      expect(store.get('m')?.hourly).toBe(150);
      expect(store.get('m')?.salary).toBe(8.5 * 150);
    });

    it('updates manually rated records when forced', () => {
      const { store } = storeWith([makeRecord({ id: 'm', hourly: 150, modifiedHourly: true })]);
      expect(store.applyToAll(200, true, WINDOW_OFF).changed).toBe(1);
      expect(store.get('m')?.salary).toBe(1700);
    });
  });

  describe('applyToMonth', () => {
    it('selects by record date, so a session crossing into the next month stays in its start month', () => {
      const lateJan = makeRecord({ id: 'late-jan', start: at(31, 23), end: at(1, 2, 0, 2), hourly: 100 });
      const feb = makeRecord({ id: 'feb', start: at(3, 9, 0, 2), end: at(3, 11, 0, 2), hourly: 100 });
      const { store } = storeWith([feb, lateJan]);

      const res = store.applyToMonth(2025, 1, 300, false, WINDOW_OFF);

      expect(res.changed).toBe(1);
      expect(store.get('late-jan')?.salary).toBe(900);
      expect(store.get('feb')?.salary).toBe(200);
      expect(store.recordsForMonth(2025, 2).map((r) => r.id)).toEqual(['feb']);
    });

    it('returns 0 for a month with no records', () => {
      const { store } = storeWith([makeRecord()]);
      expect(store.applyToMonth(2024, 12, 300, true, WINDOW_OFF).changed).toBe(0);
    });
  });

  describe('persistence failures', () => {
    it('keep the in-memory change and report persisted=false', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      setLogLevel(LogLevel.WARN);
      const persistence = new FlakyPersistence();
      const store = new RecordStore(persistence);

      const res = store.add(makeRecord({ id: 'kept' }));

      expect(res.ok).toBe(true);
      if (res.ok) expect(res.persisted).toBe(false);
      expect(store.list().map((r) => r.id)).toEqual(['kept']);
      expect(store.lastPersistError?.code).toBe('PERSISTENCE_FAILURE');
      expect(warn).toHaveBeenCalledTimes(1);

      persistence.failing = false;
      const next = store.applyToAll(250, false, WINDOW_OFF);
      expect(next.persisted).toBe(true);
      expect(store.lastPersistError).toBeNull();
      expect(persistence.saved.map((r) => r.id)).toEqual(['kept']);
      warn.mockRestore();
    });

    it('a failing load starts with an empty collection', () => {
      const store = new RecordStore({
        load: () => {
          throw new Error('corrupt');
        },
        save: () => {},
      });
      expect(store.size).toBe(0);
    });
  });
});
