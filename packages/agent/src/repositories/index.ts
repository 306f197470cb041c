import { getConfig, type DataPaths } from '../config.js';
import { localVolume, type VolumeSync } from '../storage/volume.js';
import { BaselineRepository } from './baseline.repository.js';
import { BriefRepository } from './brief.repository.js';
import { DailyRecordRepository } from './daily-record.repository.js';
import { InterventionRepository } from './intervention.repository.js';
import { RawSnapshotRepository } from './raw-snapshot.repository.js';

export { BaselineRepository } from './baseline.repository.js';
export { BriefRepository } from './brief.repository.js';
export { DailyRecordRepository } from './daily-record.repository.js';
export { InterventionRepository } from './intervention.repository.js';
export { RawSnapshotRepository } from './raw-snapshot.repository.js';

export interface Repositories {
  dailyRecords: DailyRecordRepository;
  baselines: BaselineRepository;
  interventions: InterventionRepository;
  briefs: BriefRepository;
  rawSnapshots: RawSnapshotRepository;
}

export function createRepositories(
  paths: DataPaths,
  volume: VolumeSync = localVolume
): Repositories {
  return {
    dailyRecords: new DailyRecordRepository(paths.metricsDir),
    baselines: new BaselineRepository(paths.baselinesFile),
    interventions: new InterventionRepository(paths.interventionsDir, volume),
    briefs: new BriefRepository(paths.briefsDir),
    rawSnapshots: new RawSnapshotRepository(paths.rawDir),
  };
}

// Singleton set for the configured data directory
let repositories: Repositories | null = null;

// Reset repository singletons (for testing)
export function resetRepositories(): void {
  repositories = null;
}

export function getRepositories(): Repositories {
  if (!repositories) {
    repositories = createRepositories(getConfig().paths);
  }
  return repositories;
}

export function getDailyRecordRepository(): DailyRecordRepository {
  return getRepositories().dailyRecords;
}

export function getBaselineRepository(): BaselineRepository {
  return getRepositories().baselines;
}

export function getInterventionRepository(): InterventionRepository {
  return getRepositories().interventions;
}

export function getBriefRepository(): BriefRepository {
  return getRepositories().briefs;
}

export function getRawSnapshotRepository(): RawSnapshotRepository {
  return getRepositories().rawSnapshots;
}
