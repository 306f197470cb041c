import type { BaselineSet, BaselineSetDocument } from '../shared.js';
import { baselineSetSchema } from '../shared.js';
import { MalformedPersistedStateError } from '../types/errors.js';
import { readJsonFile, writeJsonFile } from './json-file.repository.js';

/**
 * The single baselines document. Reads validate shape but do not migrate;
 * schema migration belongs to the baseline service.
 */
export class BaselineRepository {
  constructor(private readonly filePath: string) {}

  read(): BaselineSetDocument | null {
    const raw = readJsonFile(this.filePath);
    if (raw === null) {
      return null;
    }

    const result = baselineSetSchema.safeParse(raw);
    if (!result.success) {
      throw new MalformedPersistedStateError(this.filePath, result.error.message);
    }
    return result.data;
  }

  write(baselines: BaselineSet): void {
    writeJsonFile(this.filePath, baselines);
  }
}
