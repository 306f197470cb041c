import fs from 'node:fs';
import type { Brief } from '../shared.js';
import { JsonFileRepository } from './json-file.repository.js';

const EXTENSION = '.md';

/** Generated morning briefs as markdown, one `<date>.md` per day. */
export class BriefRepository extends JsonFileRepository {
  save(date: string, content: string): Brief {
    this.ensureDirectory();
    fs.writeFileSync(this.pathFor(date, EXTENSION), content, 'utf-8');
    return { date, content };
  }

  findByDate(date: string): Brief | null {
    const filePath = this.pathFor(date, EXTENSION);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    return { date, content: fs.readFileSync(filePath, 'utf-8') };
  }

  /** Most recently written brief. */
  findLatest(): Brief | null {
    let latest: { date: string; mtimeMs: number } | null = null;
    for (const date of this.listDates()) {
      const { mtimeMs } = fs.statSync(this.pathFor(date, EXTENSION));
      if (latest === null || mtimeMs > latest.mtimeMs) {
        latest = { date, mtimeMs };
      }
    }
    return latest ? this.findByDate(latest.date) : null;
  }

  /** Dates with a brief; other markdown in the directory is ignored. */
  listDates(): string[] {
    return this.listDatesWithExtension(EXTENSION);
  }
}
