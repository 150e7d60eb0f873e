/** ISO-8601 string or Date; strings are parsed with date-fns parseISO. */
export type Instant = Date | string;

/** Minutes since local midnight, 0..1439. */
export type MinuteOfDay = number;

export interface PayWindowPolicy {
  enabled: boolean;
  startMinutes: MinuteOfDay; // 540 = 09:00
  endMinutes: MinuteOfDay; // end <= start rolls over into the next day
}

export interface CustomPayWindow {
  startMinutes: MinuteOfDay;
  endMinutes: MinuteOfDay;
}

export const DEFAULT_PAY_WINDOW: Readonly<PayWindowPolicy> = Object.freeze({
  enabled: false,
  startMinutes: 540,
  endMinutes: 1080,
});
