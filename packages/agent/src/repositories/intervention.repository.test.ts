import fs from 'node:fs';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { warn } from 'firebase-functions/logger';
import { InterventionRepository } from './intervention.repository.js';
import { MalformedPersistedStateError } from '../types/errors.js';
import type { VolumeSync } from '../storage/volume.js';
import { createTempDataDir, type TempDataDir } from '../__tests__/utils/index.js';

describe('InterventionRepository', () => {
  let dataDir: TempDataDir;
  let directory: string;
  let volume: VolumeSync;
  let repository: InterventionRepository;

  const magnesium = { time: '21:30', raw: 'mag 400', cleaned: 'Magnesium 400mg' };
  const sauna = { time: '18:00', raw: 'sauna 20m', cleaned: 'Sauna 20 min' };

  function writeFile(name: string, content: string): void {
    fs.mkdirSync(directory, { recursive: true });
    fs.writeFileSync(path.join(directory, name), content);
  }

  beforeEach(() => {
    dataDir = createTempDataDir('daybrief-interventions-');
    directory = dataDir.paths.interventionsDir;
    volume = { reload: vi.fn(), commit: vi.fn() };
    repository = new InterventionRepository(directory, volume);
  });

  afterEach(() => {
    dataDir.cleanup();
  });

  describe('append', () => {
    it('should write one JSON line per entry', () => {
      repository.append('2026-01-15', magnesium);
      repository.append('2026-01-15', sauna);

      const content = fs.readFileSync(path.join(directory, '2026-01-15.jsonl'), 'utf-8');
      expect(content).toBe(`${JSON.stringify(magnesium)}\n${JSON.stringify(sauna)}\n`);
    });

    it('should reload shared state before writing and commit after', () => {
      const order: string[] = [];
      vi.mocked(volume.reload).mockImplementation(() => {
        order.push('reload');
      });
      vi.mocked(volume.commit).mockImplementation(() => {
        order.push(fs.existsSync(path.join(directory, '2026-01-15.jsonl')) ? 'commit-after-write' : 'commit');
      });

      repository.append('2026-01-15', magnesium);

      expect(order).toEqual(['reload', 'commit-after-write']);
    });

    it('should keep lines appended by another writer', () => {
      writeFile('2026-01-15.jsonl', `${JSON.stringify(sauna)}\n`);

      repository.append('2026-01-15', magnesium);

      expect(repository.findByDate('2026-01-15')).toEqual([sauna, magnesium]);
    });

    it('should migrate a legacy day document before the first append', () => {
      writeFile('2026-01-15.json', JSON.stringify({ date: '2026-01-15', entries: [sauna] }));

      repository.append('2026-01-15', magnesium);

      expect(fs.existsSync(path.join(directory, '2026-01-15.json'))).toBe(false);
      expect(repository.findByDate('2026-01-15')).toEqual([sauna, magnesium]);
    });
  });

  describe('findByDate', () => {
    it('should return an empty list for a day with nothing logged', () => {
      expect(repository.findByDate('2026-01-15')).toEqual([]);
    });

    it('should skip blank and corrupt lines with a warning', () => {
      writeFile(
        '2026-01-15.jsonl',
        `${JSON.stringify(magnesium)}\n\n{"time": "22:00", \n${JSON.stringify({ time: '1' })}\n${JSON.stringify(sauna)}\n`
      );

      expect(repository.findByDate('2026-01-15')).toEqual([magnesium, sauna]);
      expect(warn).toHaveBeenCalledTimes(2);
    });

    it('should read a legacy entries document', () => {
      writeFile('2026-01-14.json', JSON.stringify({ date: '2026-01-14', entries: [magnesium] }));

      expect(repository.findByDate('2026-01-14')).toEqual([magnesium]);
    });

    it('should convert the oldest interventions document into entries', () => {
      writeFile(
        '2026-01-14.json',
        JSON.stringify({
          interventions: [
            { timestamp: '2026-01-14T21:45:00', name: 'Magnesium', details: '400mg' },
            { timestamp: '2026-01-14', name: 'Cold plunge' },
          ],
        })
      );

      expect(repository.findByDate('2026-01-14')).toEqual([
        { time: '21:45', raw: 'Magnesium (400mg)', cleaned: 'Magnesium (400mg)' },
        { time: '', raw: 'Cold plunge', cleaned: 'Cold plunge' },
      ]);
    });

    it('should prefer the line log when both formats exist', () => {
      writeFile('2026-01-15.json', JSON.stringify({ entries: [sauna] }));
      writeFile('2026-01-15.jsonl', `${JSON.stringify(magnesium)}\n`);

      expect(repository.findByDate('2026-01-15')).toEqual([magnesium]);
    });

    it('should throw for an unreadable legacy document', () => {
      writeFile('2026-01-14.json', '{ broken');

      expect(() => repository.findByDate('2026-01-14')).toThrow(MalformedPersistedStateError);
    });
  });

  describe('migrateLegacy', () => {
    it('should be idempotent', () => {
      writeFile('2026-01-14.json', JSON.stringify({ entries: [magnesium, sauna] }));

      expect(repository.migrateLegacy('2026-01-14')).toBe(2);
      expect(repository.migrateLegacy('2026-01-14')).toBe(0);
      expect(repository.findByDate('2026-01-14')).toEqual([magnesium, sauna]);
    });

    it('should not touch a legacy file when a log already exists', () => {
      writeFile('2026-01-14.json', JSON.stringify({ entries: [sauna] }));
      writeFile('2026-01-14.jsonl', `${JSON.stringify(magnesium)}\n`);

      expect(repository.migrateLegacy('2026-01-14')).toBe(0);
      expect(fs.existsSync(path.join(directory, '2026-01-14.json'))).toBe(true);
    });

    it('should drop an empty legacy file without creating a log', () => {
      writeFile('2026-01-14.json', JSON.stringify({ entries: [] }));

      repository.migrateLegacy('2026-01-14');

      expect(fs.existsSync(path.join(directory, '2026-01-14.json'))).toBe(false);
      expect(fs.existsSync(path.join(directory, '2026-01-14.jsonl'))).toBe(false);
    });
  });

  describe('deleteByDate', () => {
    it('should remove both formats', () => {
      writeFile('2026-01-15.json', JSON.stringify({ entries: [] }));
      writeFile('2026-01-15.jsonl', `${JSON.stringify(magnesium)}\n`);

      expect(repository.deleteByDate('2026-01-15')).toBe(true);
      expect(repository.findByDate('2026-01-15')).toEqual([]);
    });

    it('should report false when there was nothing to delete', () => {
      expect(repository.deleteByDate('2026-01-15')).toBe(false);
    });
  });

  describe('listDates', () => {
    it('should list each date once across formats', () => {
      writeFile('2026-01-14.json', JSON.stringify({ entries: [] }));
      writeFile('2026-01-15.jsonl', '');
      writeFile('2026-01-15.json', JSON.stringify({ entries: [] }));

      expect(repository.listDates()).toEqual(['2026-01-14', '2026-01-15']);
    });
  });
});
