import { differenceInSeconds } from 'date-fns';
import type { PayWindowPolicy } from '../core/types';
import type { WorkRecord } from '../state/record-types';
import { createRecord } from '../state/record';
import type { RecordStore, StoreFailure, StoreResult } from '../store/recordStore';
import { InvalidIntervalError, TimecardError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('clock');

export type Clock = () => Date;

export type ClockInResult = { ok: true; startTime: Date } | StoreFailure;

/**
 * Punch-in / punch-out. A record only exists once a session is closed with
 * a positive whole-second duration; an invalid close discards the session.
 */
export class ClockSession {
  private startedAt: Date | null = null;

  constructor(
    private readonly store: RecordStore,
    private readonly now: Clock = () => new Date(),
  ) {}

  get openSince(): Date | null {
    return this.startedAt;
  }

  get isOpen() {
    return this.startedAt !== null;
  }

  punchIn(): ClockInResult {
    if (this.startedAt) {
      return {
        ok: false,
        error: new TimecardError('ALREADY_CLOCKED_IN', '[clock] already clocked in; clock out first'),
      };
    }
    const startTime = this.now();
    this.startedAt = startTime;
    log.debug(`clocked in at ${startTime.toISOString()}`);
    return { ok: true, startTime };
  }

  punchOut(hourly: number, policy: PayWindowPolicy, description = ''): StoreResult<{ record: WorkRecord }> {
    const start = this.startedAt;
    if (!start) {
      return {
        ok: false,
        error: new TimecardError('NOT_CLOCKED_IN', '[clock] not clocked in; clock in first'),
      };
    }
    const end = this.now();
    this.startedAt = null;

    if (differenceInSeconds(end, start) <= 0) {
      log.warn(`discarding session ${start.toISOString()} -> ${end.toISOString()}`);
      return { ok: false, error: new InvalidIntervalError(start.toISOString(), end.toISOString()) };
    }

    const record = createRecord({ startTime: start, endTime: end, hourly, description }, policy);
    return this.store.add(record);
  }

  /** Drops an open session without creating a record. */
  cancel(): void {
    this.startedAt = null;
  }
}
