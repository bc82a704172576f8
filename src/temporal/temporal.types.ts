export type TemporalResult = {
  /** Matched text of the temporal expression ("next Friday at 8pm") */
  expression: string;
  /** Resolved date, ISO 8601 UTC ("2026-02-16T20:00:00.000Z") */
  resolvedDate: string;
};
