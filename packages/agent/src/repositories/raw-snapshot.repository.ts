import type { DeviceData } from '../shared.js';
import { JsonFileRepository } from './json-file.repository.js';

const EXTENSION = '.json';

/**
 * Raw device payloads as fetched, one per brief date. A replaceable cache:
 * everything in it has already been extracted into daily records.
 */
export class RawSnapshotRepository extends JsonFileRepository {
  save(date: string, data: DeviceData): void {
    this.writeJson(this.pathFor(date, EXTENSION), data);
  }

  exists(date: string): boolean {
    return this.fileExists(this.pathFor(date, EXTENSION));
  }

  delete(date: string): boolean {
    return this.removeFile(this.pathFor(date, EXTENSION));
  }

  listDates(): string[] {
    return this.listDatesWithExtension(EXTENSION);
  }
}
