import type { MinuteOfDay } from './types';
import { MINUTES_PER_DAY } from '../state/number';

export const SECONDS_PER_HOUR = 3600;

// "8h 30m": whole hours, remainder minutes, truncated
export function formatDuration(totalSeconds: number): string {
  const s = Math.max(0, Math.trunc(totalSeconds));
  const hours = Math.floor(s / SECONDS_PER_HOUR);
  const minutes = Math.floor((s % SECONDS_PER_HOUR) / 60);
  return `${hours}h ${minutes}m`;
}

/**
 * Payable hours floored to the nearest half hour. Never rounds up:
 * 29m59s is 0, 1h29m is 1.
 */
export function halfHourFloor(totalSeconds: number): number {
  const hours = Math.max(0, totalSeconds) / SECONDS_PER_HOUR;
  return Math.floor(hours / 0.5) * 0.5;
}

// "09:30" -> 570
export function toMinuteOfDay(hhmm: string | undefined): MinuteOfDay | null {
  if (!hhmm) return null;
  const m = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(hhmm.trim());
  if (!m) return null;
  return Number(m[1]) * 60 + Number(m[2]);
}

// 570 -> "09:30"
export function fromMinuteOfDay(minutes: MinuteOfDay): string {
  const m = ((Math.trunc(minutes) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  const hh = String(Math.floor(m / 60)).padStart(2, '0');
  const mm = String(m % 60).padStart(2, '0');
  return `${hh}:${mm}`;
}
