/**
 * Agent Tools Service
 *
 * The read and log operations a conversational agent may call. Inputs are
 * validated with the shared zod schemas; every call resolves to a
 * JSON-serializable result, and failures come back as `{ ok: false }`
 * rather than being thrown at the agent.
 */

import { error as logError, warn } from 'firebase-functions/logger';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';
import type { AgentToolName } from '../shared.js';
import {
  AGENT_TOOL_NAMES,
  dateRangeSchema,
  emptyToolInputSchema,
  getDetailedSleepSchema,
  getRecentBriefsSchema,
  hasDetailedSleep,
  logInterventionToolSchema,
} from '../shared.js';
import { getDailyRecordRepository } from '../repositories/index.js';
import { loadBaselines, toBaselineSnapshot } from './baseline.service.js';
import {
  loadInterventionsInRange,
  loadRecentBriefs,
  loadRecordsInRange,
} from './history.service.js';
import { getTodayInterventions, logIntervention } from './intervention.service.js';

const TAG = '[AgentTools]';

export type AgentToolResult = { ok: true; data: unknown } | { ok: false; error: string };

/** A tool ran but has nothing to return for the given input. */
class ToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolError';
  }
}

type ToolHandler = (input: unknown, now: Date) => unknown;

function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  return schema.parse(input ?? {});
}

const TOOL_HANDLERS: Record<AgentToolName, ToolHandler> = {
  get_metrics: (input) => {
    const range = parseInput(dateRangeSchema, input);
    return loadRecordsInRange(range.start_date, range.end_date).map((record) => ({
      date: record.date,
      summary: record.summary,
    }));
  },

  get_detailed_sleep: (input) => {
    const { date } = parseInput(getDetailedSleepSchema, input);
    const record = getDailyRecordRepository().findByDate(date);
    if (!record) {
      throw new ToolError(`No data found for ${date}`);
    }
    if (!hasDetailedSleep(record.detailed_sleep)) {
      throw new ToolError(`No detailed sleep data for ${date}`);
    }
    return record.detailed_sleep;
  },

  get_interventions: (input) => {
    const range = parseInput(dateRangeSchema, input);
    return loadInterventionsInRange(range.start_date, range.end_date);
  },

  get_baselines: (input) => {
    parseInput(emptyToolInputSchema, input);
    return toBaselineSnapshot(loadBaselines());
  },

  log_intervention: (input, now) => {
    const { raw_text, normalized } = parseInput(logInterventionToolSchema, input);
    const { entry } = logIntervention(raw_text, normalized, now);
    return { status: 'logged', time: entry.time, normalized: entry.cleaned };
  },

  get_today_interventions: (input, now) => {
    parseInput(emptyToolInputSchema, input);
    return getTodayInterventions(now);
  },

  get_recent_briefs: (input, now) => {
    const { days } = parseInput(getRecentBriefsSchema, input);
    return loadRecentBriefs(days, now);
  },
};

export function isAgentToolName(name: string): name is AgentToolName {
  return AGENT_TOOL_NAMES.some((tool) => tool === name);
}

function describeValidationError(error: ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function executeAgentTool(
  name: string,
  input: unknown,
  now: Date = new Date()
): AgentToolResult {
  if (!isAgentToolName(name)) {
    warn(`${TAG} Unknown tool requested`, { tool: name });
    return { ok: false, error: `Unknown tool: ${name}` };
  }

  try {
    return { ok: true, data: TOOL_HANDLERS[name](input, now) };
  } catch (err) {
    if (err instanceof ZodError) {
      return { ok: false, error: `Invalid input: ${describeValidationError(err)}` };
    }
    if (err instanceof ToolError) {
      return { ok: false, error: err.message };
    }
    const message = err instanceof Error ? err.message : String(err);
    logError(`${TAG} Tool execution failed`, { tool: name, error_message: message });
    return { ok: false, error: message };
  }
}
