import fs from 'node:fs';
import { info, warn } from 'firebase-functions/logger';
import type { InterventionEntry } from '../shared.js';
import {
  interventionDayDocumentSchema,
  interventionEntrySchema,
  legacyInterventionDocumentSchema,
} from '../shared.js';
import { MalformedPersistedStateError } from '../types/errors.js';
import { localVolume, type VolumeSync } from '../storage/volume.js';
import { JsonFileRepository } from './json-file.repository.js';

const TAG = '[Interventions]';
const LOG_EXTENSION = '.jsonl';
const LEGACY_EXTENSION = '.json';

/**
 * Interventions as one append-only JSONL file per local date.
 *
 * Days written before the line format existed are a single JSON document
 * (`<date>.json`). Those are still readable, and are rewritten as JSONL the
 * first time an entry is appended to that date.
 */
export class InterventionRepository extends JsonFileRepository {
  constructor(
    directory: string,
    private readonly volume: VolumeSync = localVolume
  ) {
    super(directory);
  }

  findByDate(date: string): InterventionEntry[] {
    const logPath = this.pathFor(date, LOG_EXTENSION);
    if (this.fileExists(logPath)) {
      return this.readLog(logPath);
    }
    return this.readLegacy(date);
  }

  /**
   * Append one entry. Reloads shared state first so entries committed by
   * another process are not shadowed, and never rewrites existing lines.
   */
  append(date: string, entry: InterventionEntry): InterventionEntry {
    this.volume.reload();
    this.ensureDirectory();
    this.migrateLegacy(date);

    fs.appendFileSync(this.pathFor(date, LOG_EXTENSION), `${JSON.stringify(entry)}\n`, 'utf-8');
    this.volume.commit();
    return entry;
  }

  /**
   * Convert a legacy day document to JSONL. Does nothing when the day has
   * no legacy file or already has a log; safe to call repeatedly.
   */
  migrateLegacy(date: string): number {
    const legacyPath = this.pathFor(date, LEGACY_EXTENSION);
    const logPath = this.pathFor(date, LOG_EXTENSION);
    if (!this.fileExists(legacyPath) || this.fileExists(logPath)) {
      return 0;
    }

    const entries = this.readLegacy(date);
    if (entries.length > 0) {
      const lines = entries.map((entry) => `${JSON.stringify(entry)}\n`).join('');
      fs.writeFileSync(logPath, lines, 'utf-8');
      info(`${TAG} Migrated legacy interventions`, { date, entries: entries.length });
    }
    this.removeFile(legacyPath);
    return entries.length;
  }

  /** Remove a day's entries in either format. */
  deleteByDate(date: string): boolean {
    const removedLog = this.removeFile(this.pathFor(date, LOG_EXTENSION));
    const removedLegacy = this.removeFile(this.pathFor(date, LEGACY_EXTENSION));
    return removedLog || removedLegacy;
  }

  listDates(): string[] {
    const dates = new Set([
      ...this.listDatesWithExtension(LOG_EXTENSION),
      ...this.listDatesWithExtension(LEGACY_EXTENSION),
    ]);
    return [...dates].sort();
  }

  private readLog(logPath: string): InterventionEntry[] {
    const entries: InterventionEntry[] = [];
    const lines = fs.readFileSync(logPath, 'utf-8').split('\n');

    lines.forEach((line, index) => {
      const trimmed = line.trim();
      if (!trimmed) {
        return;
      }
      const entry = parseLogLine(trimmed);
      if (entry) {
        entries.push(entry);
      } else {
        warn(`${TAG} Skipped corrupt line`, { file: logPath, line: index + 1 });
      }
    });

    return entries;
  }

  private readLegacy(date: string): InterventionEntry[] {
    const legacyPath = this.pathFor(date, LEGACY_EXTENSION);
    const raw = this.readJson(legacyPath);
    if (raw === null) {
      return [];
    }

    const current = interventionDayDocumentSchema.safeParse(raw);
    if (current.success) {
      return current.data.entries;
    }

    const legacy = legacyInterventionDocumentSchema.safeParse(raw);
    if (legacy.success) {
      return legacy.data.interventions.map((item) => {
        const name = item.name ?? '';
        const text = item.details ? `${name} (${item.details})` : name;
        return { time: clockTimeOf(item.timestamp), raw: text, cleaned: text };
      });
    }

    throw new MalformedPersistedStateError(legacyPath, 'unrecognized intervention document');
  }
}

function parseLogLine(line: string): InterventionEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  const result = interventionEntrySchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/** `HH:MM` from an ISO timestamp, or empty when it has no time part. */
function clockTimeOf(timestamp: string | undefined): string {
  if (!timestamp || !timestamp.includes('T')) {
    return '';
  }
  return timestamp.split('T')[1]?.slice(0, 5) ?? '';
}
