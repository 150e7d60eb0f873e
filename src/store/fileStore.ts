import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { WorkRecord } from '../state/record-types';
import { fromJsonRecord, isObject } from '../state/from-json';
import { PersistenceError, describeError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('fileStore');

export const RECORDS_FILE = 'work_records.json';
const FORMAT_VERSION = 1;

export interface RecordPersistence {
  load(): WorkRecord[];
  /** Throws PersistenceError when the write did not complete. */
  save(records: readonly WorkRecord[]): void;
}

/** Write to a sibling temp file, then rename over the target. */
export function writeFileAtomic(path: string, contents: string): void {
  const tmp = join(dirname(path), `.${Date.now()}-${process.pid}.tmp`);
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(tmp, contents, 'utf8');
    renameSync(tmp, path);
  } catch (err) {
    if (existsSync(tmp)) rmSync(tmp, { force: true });
    throw new PersistenceError(path, err);
  }
}

/** Parsed JSON, or undefined when the file is missing or unreadable. */
export function readJsonFile(path: string): unknown {
  if (!existsSync(path)) return undefined;
  try {
    return JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    log.warn(`unreadable file ${path}, ignoring: ${describeError(err)}`);
    return undefined;
  }
}

export class JsonFileRecordPersistence implements RecordPersistence {
  constructor(readonly path: string) {}

  static inDir(dir: string) {
    return new JsonFileRecordPersistence(join(dir, RECORDS_FILE));
  }

  load(): WorkRecord[] {
    const data = readJsonFile(this.path);
    if (data === undefined) return [];

    // bare arrays are the pre-versioned layout
    const rawRecords = Array.isArray(data)
      ? data
      : isObject(data) && Array.isArray(data.records)
        ? data.records
        : undefined;
    if (!rawRecords) {
      log.warn(`unexpected layout in ${this.path}, starting empty`);
      return [];
    }

    const out: WorkRecord[] = [];
    rawRecords.forEach((raw, i) => {
      const rec = fromJsonRecord(raw);
      if (rec) out.push(rec);
      else log.warn(`skipping invalid record at index ${i} in ${this.path}`);
    });
    log.debug(`loaded ${out.length} records from ${this.path}`);
    return out;
  }

  save(records: readonly WorkRecord[]): void {
    const body = JSON.stringify({ version: FORMAT_VERSION, records }, null, 2);
    writeFileAtomic(this.path, body);
  }
}

/** Keeps the last saved snapshot in memory; used where no file is wanted. */
export class MemoryRecordPersistence implements RecordPersistence {
  saved: readonly WorkRecord[];
  saves = 0;

  constructor(initial: readonly WorkRecord[] = []) {
    this.saved = initial;
  }

  load(): WorkRecord[] {
    return [...this.saved];
  }

  save(records: readonly WorkRecord[]): void {
    this.saved = records;
    this.saves++;
  }
}
