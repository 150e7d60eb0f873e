import { isValid, parseISO } from 'date-fns';
import type { WorkRecord } from './record-types';
import { clampMinuteOfDay, max0, num } from './number';
import { recordDate } from './record';
import { formatDuration, halfHourFloor } from '../core/time';

type Json = Record<string, unknown>;

export const isObject = (v: unknown): v is Json =>
  typeof v === 'object' && v !== null && !Array.isArray(v);

const str = (v: unknown, fallback = '') => (typeof v === 'string' ? v : fallback);

// numeric timestamps in the bare-array layout count seconds from 2001-01-01T00:00:00Z
const LEGACY_EPOCH_MS = Date.UTC(2001, 0, 1);

function isoOrNull(v: unknown): string | null {
  let d: Date;
  if (typeof v === 'string') d = parseISO(v);
  else if (typeof v === 'number' && Number.isFinite(v)) d = new Date(LEGACY_EPOCH_MS + v * 1000);
  else return null;
  return isValid(d) ? d.toISOString() : null;
}

/**
 * Stored JSON -> WorkRecord. Returns null for entries that cannot be a
 * record (no id, unparsable or non-increasing times). `date` always comes
 * from startTime, whatever was stored. Missing derived fields are filled
 * from totalSeconds; `modified` is the older name of `modifiedHourly`.
 */
export function fromJsonRecord(raw: unknown): WorkRecord | null {
  if (!isObject(raw)) return null;
  const id = str(raw.id);
  const startTime = isoOrNull(raw.startTime);
  const endTime = isoOrNull(raw.endTime);
  if (!id || !startTime || !endTime) return null;
  if (Date.parse(endTime) <= Date.parse(startTime)) return null;

  const totalSeconds = Math.trunc(max0(num(raw.totalSeconds)));
  const hourly = num(raw.hourly);
  const halfHourDecimal =
    typeof raw.halfHourDecimal === 'number' ? raw.halfHourDecimal : halfHourFloor(totalSeconds);
  const usesCustomPayWindow = raw.usesCustomPayWindow === true;

  return {
    id,
    date: recordDate(startTime),
    startTime,
    endTime,
    totalSeconds,
    hoursAndMinutesDisplay: str(raw.hoursAndMinutesDisplay, formatDuration(totalSeconds)),
    halfHourDecimal,
    hourly,
    salary: typeof raw.salary === 'number' ? raw.salary : halfHourDecimal * hourly,
    modifiedHourly: raw.modifiedHourly === true || raw.modified === true,
    description: str(raw.description),
    usesCustomPayWindow,
    ...(raw.customPayStartMinutes != null
      ? { customPayStartMinutes: clampMinuteOfDay(raw.customPayStartMinutes) }
      : {}),
    ...(raw.customPayEndMinutes != null
      ? { customPayEndMinutes: clampMinuteOfDay(raw.customPayEndMinutes) }
      : {}),
  };
}
