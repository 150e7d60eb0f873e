import type { MinuteOfDay } from '../core/types';

export const MINUTES_PER_DAY = 1440;

export const num = (v: unknown): number => (Number.isFinite(Number(v)) ? Number(v) : 0);

export const max0 = (x: number) => Math.max(0, x);

/** Integer minute in 0..1439; fractional input is truncated. */
export const clampMinuteOfDay = (v: unknown): MinuteOfDay =>
  Math.max(0, Math.min(MINUTES_PER_DAY - 1, Math.trunc(num(v))));

export const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0);
