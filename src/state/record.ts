import { randomUUID } from 'node:crypto';
import { format } from 'date-fns';
import type { Instant, PayWindowPolicy } from '../core/types';
import { toDate, tryDate } from '../core/payWindow';
import { clampMinuteOfDay } from './number';
import { InvalidIntervalError } from '../errors';
import type { NewRecordInput, WorkRecord } from './record-types';
import { recompute } from '../orchestrator/recompute';

export const recordDate = (start: Instant) => format(toDate(start), 'yyyy-MM-dd');

export const toIso = (t: Instant) => toDate(t).toISOString();

/** False for unparsable timestamps as well as for end <= start. */
export function isValidInterval(start: Instant, end: Instant): boolean {
  const s = tryDate(start);
  const e = tryDate(end);
  return s !== null && e !== null && e.getTime() > s.getTime();
}

const label = (t: Instant) => tryDate(t)?.toISOString() ?? String(t);

export function invalidInterval(start: Instant, end: Instant) {
  return new InvalidIntervalError(label(start), label(end));
}

export function assertValidInterval(start: Instant, end: Instant): void {
  if (!isValidInterval(start, end)) throw invalidInterval(start, end);
}

/** The record with `date` re-derived from its startTime; same value if it already matches. */
export function withRecordDate(record: WorkRecord): WorkRecord {
  const date = recordDate(record.startTime);
  return record.date === date ? record : { ...record, date };
}

export type CreateRecordOptions = {
  id?: string;
};

/**
 * Builds a record from a finished session. Derived fields come from
 * recompute() so a new record and a recomputed one can never disagree.
 */
export function createRecord(
  input: NewRecordInput,
  policy: PayWindowPolicy,
  opts: CreateRecordOptions = {},
): WorkRecord {
  assertValidInterval(input.startTime, input.endTime);
  const base: WorkRecord = {
    id: opts.id ?? randomUUID(),
    date: recordDate(input.startTime),
    startTime: toIso(input.startTime),
    endTime: toIso(input.endTime),
    totalSeconds: 0,
    hoursAndMinutesDisplay: '',
    halfHourDecimal: 0,
    hourly: 0,
    salary: 0,
    modifiedHourly: false,
    description: input.description ?? '',
    usesCustomPayWindow: input.customWindow != null,
    ...(input.customWindow
      ? {
          customPayStartMinutes: clampMinuteOfDay(input.customWindow.startMinutes),
          customPayEndMinutes: clampMinuteOfDay(input.customWindow.endMinutes),
        }
      : {}),
  };
  return recompute(base, input.hourly, policy);
}

// "2025-01"
export const monthKey = (year: number, month: number) =>
  `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;

/** Month membership is decided by the record's date alone. */
export const isInMonth = (record: Pick<WorkRecord, 'date'>, year: number, month: number) =>
  record.date.startsWith(`${monthKey(year, month)}-`);
