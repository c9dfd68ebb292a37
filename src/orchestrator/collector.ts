/**
 * Collector
 *
 * One collection run: read every configured JIRA and GitHub metric,
 * stamp the results with a single shared timestamp and write them to
 * InfluxDB as one batch.
 *
 * Metrics are isolated from each other. A metric that fails (after
 * retrying transient errors) is reported as a failure and the rest are
 * still written.
 */

import { ApiClientError, isRetryableError } from '../clients/errors.js';
import type { GitHubClient } from '../clients/github-client.js';
import type { InfluxClient } from '../clients/influx-client.js';
import type { JiraClient } from '../clients/jira-client.js';
import { parseSeriesKey, type Point } from '../clients/line-protocol.js';
import { expandGitHubCounts } from '../config/pulse-config.js';
import type {
  GitHubCountQuery,
  JiraConfig,
  JiraCountQuery,
  JiraVelocityConfig,
  PulseConfig,
} from '../config/types.js';
import type { HistoryStore } from '../history/history-store.js';
import { moduleLogger } from '../logging/logger.js';
import { retry, type RetryOptions } from './retry.js';
import type { CollectionResult, MetricBatch, MetricFailure, MetricSource } from './types.js';

const log = moduleLogger('collector');

export class CollectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CollectionError';
  }
}

interface MetricTask {
  series: string;
  source: MetricSource;
  read: () => Promise<number>;
}

// ─── Helpers ─────────────────────────────────────────────

/** Round to `decimals` places, ties to even (0.125 -> 0.12, 0.375 -> 0.38). */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const floor = Math.floor(scaled);
  const diff = scaled - floor;
  const rounded = diff > 0.5 || (diff === 0.5 && floor % 2 !== 0) ? floor + 1 : floor;
  return rounded / factor;
}

function describeFailure(error: unknown): string {
  if (error instanceof ApiClientError && (error.statusCode === 401 || error.statusCode === 403)) {
    return `authorization error (${error.statusCode})`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run every task concurrently. Series keys are validated before any
 * request is made; an invalid key fails only its own metric.
 */
async function settle(tasks: MetricTask[], retryOptions: RetryOptions): Promise<MetricBatch> {
  const batch: MetricBatch = { samples: [], failures: [] };

  const results = await Promise.allSettled(
    tasks.map(async (task) => {
      parseSeriesKey(task.series);
      return retry(task.read, {
        ...retryOptions,
        shouldRetry: isRetryableError,
        onRetry: (attempt, error) =>
          log.debug({ series: task.series, attempt, err: describeFailure(error) }, 'Retrying metric'),
      });
    })
  );

  results.forEach((result, index) => {
    const task = tasks[index];
    if (!task) return;
    if (result.status === 'fulfilled') {
      batch.samples.push({ series: task.series, source: task.source, value: result.value });
    } else {
      const error = describeFailure(result.reason);
      log.warn({ series: task.series, source: task.source, err: error }, 'Metric collection failed');
      batch.failures.push({ series: task.series, source: task.source, error });
    }
  });

  return batch;
}

// ─── JIRA ────────────────────────────────────────────────

/**
 * Resolves the JQL for a count or sum. Saved filters are looked up once
 * per run however many metrics share them.
 */
function createJqlResolver(client: JiraClient): (query: JiraCountQuery) => Promise<string> {
  const filters = new Map<number, Promise<string>>();

  return (query) => {
    if (query.jql) return Promise.resolve(query.jql);
    const filterId = query.filterId;
    if (filterId === undefined) {
      return Promise.reject(new CollectionError(`${query.series} has neither filterId nor jql`));
    }

    let jql = filters.get(filterId);
    if (!jql) {
      jql = client.getFilterJql(filterId);
      // A failed lookup is not cached, so a retry asks again.
      void jql.catch(() => filters.delete(filterId));
      filters.set(filterId, jql);
    }
    return jql;
  };
}

/**
 * Average completed estimate over the most recent closed sprints.
 *
 * Sprints are filtered by name (pattern anchored at the start), limited to
 * closed ones, ordered newest first by id, and the first `window` are
 * averaged. Sprints whose report has no estimate are left out of the
 * average.
 */
export async function computeSprintVelocity(
  client: JiraClient,
  velocity: JiraVelocityConfig
): Promise<number> {
  const pattern = velocity.sprintPattern ? new RegExp(`^(?:${velocity.sprintPattern})`) : null;
  const sprints = await client.getSprints(velocity.boardId);

  const recent = sprints
    .filter((s) => s.state.toLowerCase() === 'closed')
    .filter((s) => !pattern || pattern.test(s.name))
    .sort((a, b) => b.id - a.id)
    .slice(0, velocity.window);

  const estimates: number[] = [];
  for (const sprint of recent) {
    const estimate = await client.getCompletedEstimateSum(velocity.boardId, sprint.id);
    if (estimate !== null) {
      estimates.push(estimate);
    }
  }

  if (estimates.length === 0) {
    throw new CollectionError('no completed sprint estimates');
  }
  const average = estimates.reduce((sum, v) => sum + v, 0) / estimates.length;
  return roundTo(average, 1);
}

export async function collectJiraMetrics(
  client: JiraClient,
  config: JiraConfig,
  retryOptions: RetryOptions = {}
): Promise<MetricBatch> {
  const resolveJql = createJqlResolver(client);
  const tasks: MetricTask[] = [];

  for (const query of config.counts) {
    tasks.push({
      series: query.series,
      source: 'jira',
      read: async () => client.countIssues(await resolveJql(query)),
    });
  }

  for (const query of config.sums) {
    tasks.push({
      series: query.series,
      source: 'jira',
      read: async () => {
        const sum = await client.sumField(await resolveJql(query), query.field);
        return query.decimals === undefined ? sum : roundTo(sum, query.decimals);
      },
    });
  }

  const velocity = config.velocity;
  if (velocity) {
    tasks.push({
      series: velocity.series,
      source: 'jira',
      read: () => computeSprintVelocity(client, velocity),
    });
  }

  return settle(tasks, retryOptions);
}

/** Every configured JIRA series, failed with the same reason. */
function failAllJira(config: JiraConfig, error: string): MetricBatch {
  const series = [
    ...config.counts.map((q) => q.series),
    ...config.sums.map((q) => q.series),
    ...(config.velocity ? [config.velocity.series] : []),
  ];
  return {
    samples: [],
    failures: series.map((s): MetricFailure => ({ series: s, source: 'jira', error })),
  };
}

/**
 * Validate credentials before the run. If JIRA rejects them (401), fall
 * back to anonymous access for this run instead of failing every metric.
 */
export async function prepareJiraClient(client: JiraClient): Promise<JiraClient> {
  if (!client.authenticated) return client;

  try {
    const me = await client.getMyself();
    log.debug({ user: me.displayName }, 'JIRA credentials accepted');
    return client;
  } catch (error) {
    if (error instanceof ApiClientError && error.statusCode === 401) {
      log.warn('JIRA authentication failed, continuing unauthenticated');
      return client.anonymous();
    }
    log.warn({ err: describeFailure(error) }, 'Could not validate JIRA credentials');
    return client;
  }
}

// ─── GitHub ──────────────────────────────────────────────

export async function collectGitHubMetrics(
  client: GitHubClient,
  counts: GitHubCountQuery[],
  retryOptions: RetryOptions = {}
): Promise<MetricBatch> {
  return settle(
    counts.map((count): MetricTask => ({
      series: count.series,
      source: 'github',
      read: () => client.countIssues(count.query),
    })),
    retryOptions
  );
}

// ─── Run ─────────────────────────────────────────────────

export interface CollectorDeps {
  config: PulseConfig;
  /** Null when no JIRA host is configured. */
  jira: JiraClient | null;
  github: GitHubClient;
  influx: InfluxClient;
  history?: HistoryStore;
  now?: () => number;
  retry?: RetryOptions;
}

export function toPoints(result: CollectionResult): Point[] {
  return result.samples.map((sample) => ({
    ...parseSeriesKey(sample.series),
    value: sample.value,
    timestamp: result.timestamp,
  }));
}

function hasJiraMetrics(config: JiraConfig): boolean {
  return config.counts.length > 0 || config.sums.length > 0 || config.velocity !== undefined;
}

/**
 * Collect all metrics and, unless dryRun, write them to InfluxDB and the
 * local history. A failed InfluxDB write rejects; per-metric failures do
 * not.
 */
export async function runCollection(
  deps: CollectorDeps,
  options: { dryRun?: boolean } = {}
): Promise<CollectionResult> {
  const dryRun = options.dryRun ?? false;
  const { config } = deps;
  const retryOptions = deps.retry ?? {};
  const githubCounts = expandGitHubCounts(config);

  log.info(
    {
      jiraMetrics: config.jira.counts.length + config.jira.sums.length + (config.jira.velocity ? 1 : 0),
      githubMetrics: githubCounts.length,
      dryRun,
    },
    'Collection started'
  );

  let jiraBatch: Promise<MetricBatch>;
  if (!hasJiraMetrics(config.jira)) {
    jiraBatch = Promise.resolve({ samples: [], failures: [] });
  } else if (!deps.jira) {
    jiraBatch = Promise.resolve(failAllJira(config.jira, 'JIRA host not configured'));
  } else {
    const client = deps.jira;
    jiraBatch = prepareJiraClient(client).then((ready) =>
      collectJiraMetrics(ready, config.jira, retryOptions)
    );
  }

  const [jira, github] = await Promise.all([
    jiraBatch,
    collectGitHubMetrics(deps.github, githubCounts, retryOptions),
  ]);

  // One timestamp for the whole run keeps every series aligned on the dashboard.
  const now = deps.now ?? Date.now;
  const result: CollectionResult = {
    timestamp: Math.floor(now() / 1000),
    dryRun,
    samples: [...jira.samples, ...github.samples],
    failures: [...jira.failures, ...github.failures],
  };

  if (!dryRun) {
    const points = toPoints(result);
    await retry(() => deps.influx.write(points), {
      ...retryOptions,
      shouldRetry: isRetryableError,
      onRetry: (attempt, error) =>
        log.warn({ attempt, err: describeFailure(error) }, 'Retrying InfluxDB write'),
    });
    deps.history?.recordRun(result);
  }

  log.info(
    { samples: result.samples.length, failures: result.failures.length, timestamp: result.timestamp },
    dryRun ? 'Collection finished (dry run, nothing written)' : 'Collection written'
  );

  return result;
}
