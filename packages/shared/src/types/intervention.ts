export interface InterventionEntry {
  /** Local wall-clock time, `HH:MM`. */
  time: string;
  raw: string;
  cleaned: string;
}

export interface InterventionDay {
  date: string;
  entries: InterventionEntry[];
}

export type InterventionsByDate = Record<string, InterventionEntry[]>;
