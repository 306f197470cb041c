/**
 * Oura Service
 *
 * Client for the Oura v2 user-collection API, plus the per-convention
 * source fetchers used by the ingestion jobs:
 * - sleep and readiness by wake-date
 * - activity, stress, workouts and daytime heart rate by calendar date
 *
 * A failing endpoint never fails the fetch. Its source degrades to an empty
 * list and a warning is logged.
 */

import { warn } from 'firebase-functions/logger';
import type {
  ActivitySourceData,
  RawDeviceRecord,
  SleepSourceData,
} from '../shared.js';
import { getConfig, type AgentConfig } from '../config.js';
import { AppError, SourceUnavailableError } from '../types/errors.js';
import { localDayBounds } from '../utils/dates.js';
import { isRecord, readRecordArray, readString } from '../utils/type-guards.js';
import { sleepSessionRange, workoutRange } from './date-convention.service.js';
import { selectMainSleepSession } from './metric-extraction.service.js';

const TAG = '[Oura]';
const MAX_ATTEMPTS = 3;
const BASE_DELAY_MS = 1000;
const REQUEST_TIMEOUT_MS = 30_000;

/**
 * Error thrown when an Oura API request fails.
 * `statusCode` is 0 when no response was received.
 */
export class DeviceApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'DeviceApiError';
  }
}

/** Where the ingestion jobs get device data from. */
export interface DeviceDataSource {
  fetchSleepSources(wakeDate: string): Promise<SleepSourceData>;
  fetchActivitySources(calendarDate: string): Promise<ActivitySourceData>;
}

export interface OuraClientOptions {
  accessToken: string;
  baseUrl: string;
  timezone: string;
  baseDelayMs?: number;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Server errors and rate limiting are worth another attempt; other 4xx are not. */
export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export class OuraClient implements DeviceDataSource {
  private readonly baseDelayMs: number;

  constructor(private readonly options: OuraClientOptions) {
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
  }

  /**
   * GET one collection endpoint and return its `data` array.
   *
   * @throws SourceUnavailableError once retries are exhausted or the API
   *   refuses the request
   */
  async fetchCollection(
    endpoint: string,
    params: Record<string, string>
  ): Promise<RawDeviceRecord[]> {
    const url = new URL(`${this.options.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }

    let lastError: DeviceApiError | null = null;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        return await this.request(url);
      } catch (error) {
        lastError =
          error instanceof DeviceApiError
            ? error
            : new DeviceApiError(
                error instanceof Error ? error.message : 'Unknown error',
                0,
                error
              );

        const retryable = lastError.statusCode === 0 || isRetryableStatus(lastError.statusCode);
        if (!retryable || attempt === MAX_ATTEMPTS) {
          break;
        }

        warn(`${TAG} Retrying ${endpoint}`, {
          attempt,
          max_attempts: MAX_ATTEMPTS,
          status: lastError.statusCode,
          error_message: lastError.message,
        });
        await sleep(this.baseDelayMs * Math.pow(2, attempt - 1));
      }
    }

    throw new SourceUnavailableError(endpoint, lastError?.message ?? 'exhausted retries');
  }

  private async request(url: URL): Promise<RawDeviceRecord[]> {
    const response = await fetch(url.toString(), {
      headers: { Authorization: `Bearer ${this.options.accessToken}` },
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new DeviceApiError(`Oura API error: ${response.status}`, response.status);
    }

    const body: unknown = await response.json();
    if (!isRecord(body)) {
      throw new DeviceApiError('Oura API returned an unexpected body', response.status);
    }
    return readRecordArray(body, 'data');
  }

  /**
   * Sleep and readiness for the night that ended on `wakeDate`.
   * `sleep` holds at most the one selected main session.
   */
  async fetchSleepSources(wakeDate: string): Promise<SleepSourceData> {
    const sessions = sleepSessionRange(wakeDate);

    const [dailySleep, dailyReadiness, sleepSessions] = await Promise.all([
      this.fetchSource('daily_sleep', () =>
        this.fetchCollection('daily_sleep', { start_date: wakeDate, end_date: wakeDate })
      ),
      this.fetchSource('daily_readiness', () =>
        this.fetchCollection('daily_readiness', { start_date: wakeDate, end_date: wakeDate })
      ),
      this.fetchSource('sleep', () =>
        this.fetchCollection('sleep', { start_date: sessions.start, end_date: sessions.end })
      ),
    ]);

    const main = selectMainSleepSession(sleepSessions, wakeDate);
    return {
      daily_sleep: dailySleep,
      daily_readiness: dailyReadiness,
      sleep: main ? [main] : [],
    };
  }

  /** Activity, stress, workouts and non-sleep heart rate for one calendar day. */
  async fetchActivitySources(calendarDate: string): Promise<ActivitySourceData> {
    const workouts = workoutRange(calendarDate);
    const bounds = localDayBounds(calendarDate, this.options.timezone);

    const [dailyActivity, dailyStress, workoutList, heartRate] = await Promise.all([
      this.fetchSource('daily_activity', () =>
        this.fetchCollection('daily_activity', { start_date: calendarDate, end_date: calendarDate })
      ),
      this.fetchSource('daily_stress', () =>
        this.fetchCollection('daily_stress', { start_date: calendarDate, end_date: calendarDate })
      ),
      this.fetchSource('workouts', () =>
        this.fetchCollection('workout', { start_date: workouts.start, end_date: workouts.end })
      ),
      this.fetchSource('daytime_hr', () =>
        this.fetchCollection('heartrate', {
          start_datetime: bounds.start,
          end_datetime: bounds.end,
        })
      ),
    ]);

    return {
      daily_activity: dailyActivity,
      daily_stress: dailyStress,
      workouts: workoutList,
      daytime_hr: heartRate.filter((sample) => readString(sample, 'source') !== 'sleep'),
    };
  }

  private async fetchSource(
    source: string,
    load: () => Promise<RawDeviceRecord[]>
  ): Promise<RawDeviceRecord[]> {
    try {
      return await load();
    } catch (error) {
      if (!(error instanceof SourceUnavailableError)) {
        throw error;
      }
      warn(`${TAG} Source unavailable, continuing without it`, {
        source,
        error_message: error.message,
      });
      return [];
    }
  }
}

/** A client for the configured account. */
export function createOuraClient(config: AgentConfig = getConfig()): OuraClient {
  if (!config.ouraAccessToken) {
    throw new AppError(500, 'MISSING_CONFIGURATION', 'OURA_ACCESS_TOKEN is not set');
  }
  return new OuraClient({
    accessToken: config.ouraAccessToken,
    baseUrl: config.ouraApiBase,
    timezone: config.timezone,
  });
}
