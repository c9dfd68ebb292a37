/**
 * Collection Types
 *
 * One collection run produces a sample per metric it could read and a
 * failure per metric it could not. Only samples are written.
 */

export type MetricSource = 'jira' | 'github';

export interface MetricSample {
  series: string;
  source: MetricSource;
  value: number;
}

export interface MetricFailure {
  series: string;
  source: MetricSource;
  error: string;
}

export interface MetricBatch {
  samples: MetricSample[];
  failures: MetricFailure[];
}

export interface CollectionResult extends MetricBatch {
  /** Unix seconds shared by every point of the run. */
  timestamp: number;
  dryRun: boolean;
}
