import fs from 'node:fs';
import path from 'node:path';
import { MalformedPersistedStateError } from '../types/errors.js';
import { isDateString } from '../utils/dates.js';

/**
 * Parse a JSON file. Returns null when the file does not exist; a file that
 * exists but does not parse is malformed state.
 */
export function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  const raw = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedPersistedStateError(filePath, reason);
  }
}

/** Write through a temp file so readers never see a half-written document. */
export function writeJsonFile(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp`;
  fs.writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
  fs.renameSync(tempPath, filePath);
}

/**
 * Base for stores that keep one file per calendar date in a directory.
 */
export abstract class JsonFileRepository {
  constructor(protected readonly directory: string) {}

  protected ensureDirectory(): void {
    fs.mkdirSync(this.directory, { recursive: true });
  }

  protected pathFor(name: string, extension: string): string {
    return path.join(this.directory, `${name}${extension}`);
  }

  protected readJson(filePath: string): unknown {
    return readJsonFile(filePath);
  }

  protected writeJson(filePath: string, data: unknown): void {
    writeJsonFile(filePath, data);
  }

  protected fileExists(filePath: string): boolean {
    return fs.existsSync(filePath);
  }

  protected removeFile(filePath: string): boolean {
    if (!fs.existsSync(filePath)) {
      return false;
    }
    fs.unlinkSync(filePath);
    return true;
  }

  /** Dates that have a file with the given extension, ascending. */
  protected listDatesWithExtension(extension: string): string[] {
    if (!fs.existsSync(this.directory)) {
      return [];
    }
    return fs
      .readdirSync(this.directory)
      .filter((name) => name.endsWith(extension))
      .map((name) => name.slice(0, -extension.length))
      .filter(isDateString)
      .sort();
  }
}
