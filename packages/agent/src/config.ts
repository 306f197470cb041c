/**
 * Runtime configuration.
 *
 * Parsed once from the environment and cached. Every date-keyed lookup in
 * the agent uses `timezone` as its notion of "today".
 */
import path from 'node:path';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  DAYBRIEF_DATA_DIR: z.string().min(1).default('./data'),
  DAYBRIEF_TIMEZONE: z.string().min(1).default('America/New_York'),
  BASELINE_WINDOW_DAYS: positiveInt.default(60),
  RAW_WINDOW_DAYS: positiveInt.default(28),
  BRIEF_HISTORY_DAYS: positiveInt.default(28),
  RECENT_BRIEFS_DAYS: positiveInt.default(3),
  OURA_ACCESS_TOKEN: z.string().optional(),
  OURA_API_BASE: z.string().url().default('https://api.ouraring.com/v2/usercollection'),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().min(1).default('gpt-4o'),
  PORT: positiveInt.default(3000),
});

export interface DataPaths {
  root: string;
  metricsDir: string;
  rawDir: string;
  briefsDir: string;
  interventionsDir: string;
  baselinesFile: string;
}

export interface AgentConfig {
  dataDir: string;
  timezone: string;
  baselineWindowDays: number;
  rawWindowDays: number;
  briefHistoryDays: number;
  recentBriefsDays: number;
  ouraAccessToken: string | undefined;
  ouraApiBase: string;
  openaiApiKey: string | undefined;
  openaiModel: string;
  port: number;
  paths: DataPaths;
}

export function resolveDataPaths(root: string): DataPaths {
  return {
    root,
    metricsDir: path.join(root, 'metrics'),
    rawDir: path.join(root, 'raw'),
    briefsDir: path.join(root, 'briefs'),
    interventionsDir: path.join(root, 'interventions'),
    baselinesFile: path.join(root, 'baselines.json'),
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const parsed = envSchema.parse(env);
  const dataDir = path.resolve(parsed.DAYBRIEF_DATA_DIR);

  return {
    dataDir,
    timezone: parsed.DAYBRIEF_TIMEZONE,
    baselineWindowDays: parsed.BASELINE_WINDOW_DAYS,
    rawWindowDays: parsed.RAW_WINDOW_DAYS,
    briefHistoryDays: parsed.BRIEF_HISTORY_DAYS,
    recentBriefsDays: parsed.RECENT_BRIEFS_DAYS,
    ouraAccessToken: parsed.OURA_ACCESS_TOKEN,
    ouraApiBase: parsed.OURA_API_BASE,
    openaiApiKey: parsed.OPENAI_API_KEY,
    openaiModel: parsed.OPENAI_MODEL,
    port: parsed.PORT,
    paths: resolveDataPaths(dataDir),
  };
}

let cachedConfig: AgentConfig | null = null;

export function getConfig(): AgentConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/** Install an explicit config (tests, scripts with flags). */
export function setConfig(config: AgentConfig): void {
  cachedConfig = config;
}

export function resetConfig(): void {
  cachedConfig = null;
}
