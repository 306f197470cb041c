export interface MetricBaseline {
  mean: number;
  std: number;
  /** Most recent observations, oldest first. */
  values: number[];
}

export interface BaselineSet {
  last_updated: string | null;
  /** Days that contributed to the window, oldest first. */
  dates: string[];
  data_points: number;
  window_days: number;
  metrics: Record<string, MetricBaseline>;
}

export interface BaselineStats {
  mean: number;
  std: number;
}

/** Baselines without the raw value history, as handed to the agent. */
export interface BaselineSnapshot {
  metrics: Record<string, BaselineStats>;
  data_points: number;
  last_updated: string | null;
}

export interface MetricDeviation {
  metric: string;
  value: number;
  mean: number;
  std: number;
  zScore: number;
  flagged: boolean;
}
