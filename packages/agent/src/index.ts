export { createApp } from './app.js';
export { getConfig, loadConfig, setConfig, resetConfig, resolveDataPaths } from './config.js';
export type { AgentConfig, DataPaths } from './config.js';
export {
  AppError,
  NotFoundError,
  MalformedPersistedStateError,
  SourceUnavailableError,
} from './types/errors.js';

export {
  extractMetrics,
  extractSleepMetrics,
  extractActivityMetrics,
  extractDetailedSleep,
  extractDetailedWorkouts,
} from './services/metric-extraction.service.js';
export { resolveBriefDates, dateForSource } from './services/date-convention.service.js';
export {
  getDefaultBaselines,
  migrateBaselines,
  updateBaselines,
  computeDeviations,
  loadBaselines,
  saveBaselines,
  resetBaselines,
} from './services/baseline.service.js';
export {
  loadHistoricalRecords,
  loadHistoricalInterventions,
  loadRecentBriefs,
} from './services/history.service.js';
export { pruneRawSnapshots } from './services/retention.service.js';
export { logIntervention, getTodayInterventions } from './services/intervention.service.js';
export { runMorningBrief, backfillHistory } from './services/morning-brief.service.js';
export type { MorningBriefDeps } from './services/morning-brief.service.js';
export { OuraClient, createOuraClient } from './services/oura.service.js';
export type { DeviceDataSource } from './services/oura.service.js';
export { OpenAiBriefGenerator, createBriefGenerator } from './services/brief-generator.service.js';
export type { BriefContext, BriefGenerator } from './services/brief-generator.service.js';
export { executeAgentTool } from './services/agent-tools.service.js';
export type { AgentToolResult } from './services/agent-tools.service.js';
