import { produce } from 'immer';
import type { PayWindowPolicy } from '../core/types';
import type { RecordChangeDiff, WorkRecord } from '../state/record-types';
import { invalidInterval, isInMonth, isValidInterval, withRecordDate } from '../state/record';
import { applyWage } from '../orchestrator/applyWage';
import type { RecordPersistence } from './fileStore';
import {
  NotFoundError,
  PersistenceError,
  TimecardError,
  describeError,
} from '../errors';
import { createLogger } from '../logger';

const log = createLogger('recordStore');

export type StoreFailure = { ok: false; error: TimecardError };
export type StoreSuccess<T> = { ok: true; persisted: boolean } & T;
export type StoreResult<T> = StoreSuccess<T> | StoreFailure;

export type ApplyToRecordsResult = StoreSuccess<{
  changed: number;
  diff: RecordChangeDiff[];
}>;

/**
 * Ordered (most recent first) collection of work records. In memory is the
 * source of truth: every mutation writes through to the persistence layer
 * once, and a failed write is reported on the result, never rolled back.
 *
 * `date` is always re-derived from startTime on the way in.
 * Expected failures (bad interval, unknown or duplicate id, bad index) come back as
 * `{ ok: false }` and leave the collection untouched.
 */
export class RecordStore {
  private records: readonly WorkRecord[];
  private lastError: PersistenceError | null = null;

  constructor(private readonly persistence: RecordPersistence) {
    this.records = loadOrEmpty(persistence);
  }

  list(): readonly WorkRecord[] {
    return this.records;
  }

  get size() {
    return this.records.length;
  }

  get(id: string): WorkRecord | undefined {
    return this.records.find((r) => r.id === id);
  }

  recordsForMonth(year: number, month: number): WorkRecord[] {
    return this.records.filter((r) => isInMonth(r, year, month));
  }

  /** The error of the most recent failed write, cleared by the next good one. */
  get lastPersistError(): PersistenceError | null {
    return this.lastError;
  }

  add(input: WorkRecord): StoreResult<{ record: WorkRecord }> {
    if (!isValidInterval(input.startTime, input.endTime)) {
      return fail(invalidInterval(input.startTime, input.endTime));
    }
    if (this.records.some((r) => r.id === input.id)) {
      return fail(new TimecardError('DUPLICATE_ID', `[store] id already present: ${input.id}`));
    }
    const record = withRecordDate(input);
    this.records = produce(this.records, (draft) => {
      draft.unshift(record);
    });
    log.debug(`added ${record.id} (${record.date})`);
    return { ok: true, persisted: this.persist(), record };
  }

  remove(indices: readonly number[]): StoreResult<{ removed: WorkRecord[] }> {
    const unique = [...new Set(indices)].sort((a, b) => b - a);
    const bad = unique.find((i) => !Number.isInteger(i) || i < 0 || i >= this.records.length);
    if (bad !== undefined) return fail(new NotFoundError(`index ${bad}`));

    const removed = unique.map((i) => this.records[i]).reverse();
    this.records = produce(this.records, (draft) => {
      for (const i of unique) draft.splice(i, 1);
    });
    log.debug(`removed ${removed.length} record(s)`);
    return { ok: true, persisted: this.persist(), removed };
  }

  replace(input: WorkRecord): StoreResult<{ record: WorkRecord }> {
    const idx = this.records.findIndex((r) => r.id === input.id);
    if (idx < 0) return fail(new NotFoundError(`record ${input.id}`));
    if (!isValidInterval(input.startTime, input.endTime)) {
      return fail(invalidInterval(input.startTime, input.endTime));
    }
    const record = withRecordDate(input);
    this.records = produce(this.records, (draft) => {
      draft[idx] = record;
    });
    log.debug(`replaced ${record.id}`);
    return { ok: true, persisted: this.persist(), record };
  }

  applyToAll(hourly: number, applyToModifiedHourly: boolean, policy: PayWindowPolicy): ApplyToRecordsResult {
    return this.applyWhere(hourly, applyToModifiedHourly, policy);
  }

  /** month is 1..12; membership follows record.date (local calendar). */
  applyToMonth(
    year: number,
    month: number,
    hourly: number,
    applyToModifiedHourly: boolean,
    policy: PayWindowPolicy,
  ): ApplyToRecordsResult {
    return this.applyWhere(hourly, applyToModifiedHourly, policy, (r) => isInMonth(r, year, month));
  }

  private applyWhere(
    hourly: number,
    applyToModifiedHourly: boolean,
    policy: PayWindowPolicy,
    filter?: (r: WorkRecord) => boolean,
  ): ApplyToRecordsResult {
    const { next, changed, diff } = applyWage(this.records, {
      hourly,
      applyToModifiedHourly,
      policy,
      filter,
    });
    this.records = next;
    log.info(`recomputed ${changed} record(s) at hourly=${hourly}`);
    return { ok: true, persisted: this.persist(), changed, diff };
  }

  private persist(): boolean {
    try {
      this.persistence.save(this.records);
      this.lastError = null;
      return true;
    } catch (err) {
      this.lastError =
        err instanceof PersistenceError ? err : new PersistenceError('(records)', err);
      log.warn(`persist failed, keeping in-memory state: ${describeError(err)}`);
      return false;
    }
  }
}

const fail = (error: TimecardError): StoreFailure => ({ ok: false, error });

function loadOrEmpty(persistence: RecordPersistence): WorkRecord[] {
  try {
    return persistence.load();
  } catch (err) {
    log.warn(`could not load records, starting empty: ${describeError(err)}`);
    return [];
  }
}
