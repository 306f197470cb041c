import type { DailyRecord, DailyRecordWrite } from '../shared.js';
import { dailyRecordSchema } from '../shared.js';
import { MalformedPersistedStateError } from '../types/errors.js';
import { isRecord } from '../utils/type-guards.js';
import { JsonFileRepository } from './json-file.repository.js';

const EXTENSION = '.json';

/**
 * One JSON document per date: `{ date, summary, detailed_sleep, detailed_workouts }`.
 *
 * Values are stored exactly as given; unit conversion happens in extraction.
 * Merge writes are read-modify-write and are not safe against a concurrent
 * writer for the same date.
 */
export class DailyRecordRepository extends JsonFileRepository {
  findByDate(date: string): DailyRecord | null {
    const filePath = this.pathFor(date, EXTENSION);
    const raw = this.readJson(filePath);
    if (raw === null) {
      return null;
    }
    if (!isRecord(raw)) {
      throw new MalformedPersistedStateError(filePath, 'record is not an object');
    }

    // Older files may omit `date`; the file name is authoritative.
    const result = dailyRecordSchema.safeParse({ ...raw, date });
    if (!result.success) {
      throw new MalformedPersistedStateError(filePath, result.error.message);
    }
    return result.data;
  }

  /** Existing records among `dates`, in the order given. */
  findByDates(dates: string[]): DailyRecord[] {
    const records: DailyRecord[] = [];
    for (const date of dates) {
      const record = this.findByDate(date);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  /**
   * Write a record.
   *
   * Without `merge` the record becomes exactly the supplied fields, with
   * empty defaults for the rest. With `merge` each supplied field replaces
   * the stored one (summary merges key by key) and unsupplied fields keep
   * their stored value.
   */
  write(date: string, fields: DailyRecordWrite, merge = false): DailyRecord {
    const existing = merge ? this.findByDate(date) : null;

    const record: DailyRecord = {
      date,
      summary:
        fields.summary != null
          ? { ...(existing?.summary ?? {}), ...fields.summary }
          : existing?.summary ?? {},
      detailed_sleep: fields.detailed_sleep ?? existing?.detailed_sleep ?? {},
      detailed_workouts: fields.detailed_workouts ?? existing?.detailed_workouts ?? [],
    };

    this.writeJson(this.pathFor(date, EXTENSION), record);
    return record;
  }

  delete(date: string): boolean {
    return this.removeFile(this.pathFor(date, EXTENSION));
  }

  listDates(): string[] {
    return this.listDatesWithExtension(EXTENSION);
  }
}
