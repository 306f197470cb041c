import type { MetricSummary } from './daily-record.js';

export interface Brief {
  date: string;
  content: string;
}

export type MorningBriefOutcome =
  | {
      status: 'success';
      date: string;
      brief: string;
      metrics: MetricSummary;
    }
  | {
      status: 'delayed';
      date: string;
      reason: 'sleep_data_not_available';
      message: string;
    }
  | {
      status: 'partial';
      date: string;
      reason: string;
      message: string;
      metrics: MetricSummary;
    };

export interface BackfillResult {
  daysRequested: number;
  daysWithSleep: number;
  dataPoints: number;
}

export interface PruneResult {
  cutoff: string;
  pruned: number;
}
