import { addDays, differenceInSeconds, isValid, max, min, parseISO, set, startOfDay } from 'date-fns';
import type { Instant, MinuteOfDay, PayWindowPolicy } from './types';
import type { WorkRecord } from '../state/record-types';

/** Parsed date, or null when the value is not a valid timestamp. */
export function tryDate(t: Instant): Date | null {
  const d = typeof t === 'string' ? parseISO(t) : t;
  return isValid(d) ? d : null;
}

export function toDate(t: Instant): Date {
  const d = tryDate(t);
  if (!d) throw new Error(`[payWindow] invalid timestamp: ${String(t)}`);
  return d;
}

// wall-clock time on the day of `midnight`, so 09:00 stays 09:00 across a DST change
const atMinute = (midnight: Date, minutes: MinuteOfDay) =>
  set(midnight, { hours: Math.floor(minutes / 60), minutes: minutes % 60, seconds: 0, milliseconds: 0 });

/**
 * The window for the calendar day of `start`. An end at or before the start
 * minute (22:00 -> 06:00) closes on the following day.
 */
export function windowBounds(
  start: Instant,
  windowStartMin: MinuteOfDay,
  windowEndMin: MinuteOfDay,
): { windowStart: Date; windowEnd: Date } {
  const midnight = startOfDay(toDate(start));
  const windowStart = atMinute(midnight, windowStartMin);
  let windowEnd = atMinute(midnight, windowEndMin);
  if (windowEnd.getTime() <= windowStart.getTime()) windowEnd = addDays(windowEnd, 1);
  return { windowStart, windowEnd };
}

/** Whole seconds of [start, end] that fall inside the pay window. */
export function paidSeconds(
  start: Instant,
  end: Instant,
  enabled: boolean,
  windowStartMin: MinuteOfDay,
  windowEndMin: MinuteOfDay,
): number {
  const s = toDate(start);
  const e = toDate(end);
  if (e.getTime() <= s.getTime()) return 0;
  if (!enabled) return differenceInSeconds(e, s);

  const { windowStart, windowEnd } = windowBounds(s, windowStartMin, windowEndMin);
  const effectiveStart = max([s, windowStart]);
  const effectiveEnd = min([e, windowEnd]);
  return Math.max(0, differenceInSeconds(effectiveEnd, effectiveStart));
}

type WindowFields = Pick<
  WorkRecord,
  'usesCustomPayWindow' | 'customPayStartMinutes' | 'customPayEndMinutes'
>;

/**
 * The per-record override wins whenever its flag is on, and is always
 * enabled; otherwise the global policy applies as-is.
 */
export function resolvePayWindow(record: WindowFields, global: PayWindowPolicy): PayWindowPolicy {
  if (record.usesCustomPayWindow) {
    return {
      enabled: true,
      startMinutes: record.customPayStartMinutes ?? global.startMinutes,
      endMinutes: record.customPayEndMinutes ?? global.endMinutes,
    };
  }
  return { enabled: global.enabled, startMinutes: global.startMinutes, endMinutes: global.endMinutes };
}
