/**
 * History Types
 *
 * Local record of what each collection run wrote to InfluxDB. Only series
 * keys and numbers are stored.
 */

import type { MetricSource } from '../orchestrator/types.js';

export interface RunRecord {
  id: number;
  /** Unix seconds of the points written by this run. */
  timestamp: number;
  sampleCount: number;
  failureCount: number;
  createdAt: string;
}

export interface StoredSample {
  runId: number;
  timestamp: number;
  series: string;
  source: MetricSource;
  value: number;
}
