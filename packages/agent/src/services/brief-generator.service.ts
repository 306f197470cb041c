/**
 * Brief Generator Service
 *
 * Turns the morning's metrics and their context into a short markdown
 * brief. The generator is an injected collaborator so the ingestion jobs
 * can run without a model behind them.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions.js';
import { info, warn } from 'firebase-functions/logger';
import type {
  BaselineSnapshot,
  Brief,
  DailyRecord,
  DetailedSleep,
  DetailedWorkout,
  EmptyDetailedSleep,
  InterventionsByDate,
  MetricDeviation,
  MetricSummary,
} from '../shared.js';
import { getConfig, type AgentConfig } from '../config.js';
import { AppError } from '../types/errors.js';

const TAG = '[BriefGenerator]';
const MAX_RETRIES = 3;
const BASE_DELAY_MS = 1000;

export interface BriefContext {
  date: string;
  metrics: MetricSummary;
  detailedSleep: DetailedSleep | EmptyDetailedSleep;
  detailedWorkouts: DetailedWorkout[];
  baselines: BaselineSnapshot;
  deviations: MetricDeviation[];
  /** Recent daily records, newest first. */
  history: DailyRecord[];
  interventions: InterventionsByDate;
  recentBriefs: Brief[];
}

export interface BriefGenerator {
  /** Resolves to the brief's markdown; rejects when no brief could be produced. */
  generate(context: BriefContext): Promise<string>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function buildBriefSystemPrompt(): string {
  return `You write a short morning health brief from wearable data.

- Lead with last night's sleep and today's readiness.
- Mention only deviations marked "flagged" as notable; treat the rest as normal.
- Relate logged interventions to changes in the metrics where the timing fits.
- Yesterday's activity and workouts are context for today's recovery.
- Do not repeat advice given in the recent briefs.
- Markdown, under 250 words, no tables.`;
}

export function buildBriefMessages(context: BriefContext): ChatCompletionMessageParam[] {
  return [
    { role: 'system', content: buildBriefSystemPrompt() },
    { role: 'user', content: JSON.stringify(context, null, 2) },
  ];
}

export class OpenAiBriefGenerator implements BriefGenerator {
  private readonly client: OpenAI;

  constructor(
    apiKey: string,
    private readonly model: string,
    private readonly baseDelayMs: number = BASE_DELAY_MS
  ) {
    this.client = new OpenAI({ apiKey });
  }

  async generate(context: BriefContext): Promise<string> {
    info(`${TAG} Generating brief`, {
      date: context.date,
      metric_count: Object.keys(context.metrics).length,
      flagged: context.deviations.filter((deviation) => deviation.flagged).length,
      history_days: context.history.length,
    });

    return this.callWithRetry(buildBriefMessages(context));
  }

  private async callWithRetry(messages: ChatCompletionMessageParam[]): Promise<string> {
    for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
      try {
        const start = Date.now();
        const response = await this.client.chat.completions.create({
          model: this.model,
          messages,
        });

        const content = response.choices[0]?.message?.content?.trim() ?? '';
        if (!content) {
          throw new Error('Empty completion');
        }

        info(`${TAG} Completion received`, {
          elapsed_ms: Date.now() - start,
          attempt,
          model: this.model,
          total_tokens: response.usage?.total_tokens,
        });
        return content;
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        warn(`${TAG} Completion failed`, {
          attempt,
          max_retries: MAX_RETRIES,
          error_message: message,
        });

        if (attempt === MAX_RETRIES) {
          throw new Error(`OpenAI API call failed after ${MAX_RETRIES} attempts: ${message}`);
        }

        await sleep(this.baseDelayMs * Math.pow(2, attempt - 1));
      }
    }

    throw new Error('OpenAI API call failed: exhausted retries');
  }
}

/** The generator for the configured OpenAI account. */
export function createBriefGenerator(config: AgentConfig = getConfig()): BriefGenerator {
  if (!config.openaiApiKey) {
    throw new AppError(500, 'MISSING_CONFIGURATION', 'OPENAI_API_KEY is not set');
  }
  return new OpenAiBriefGenerator(config.openaiApiKey, config.openaiModel);
}
