/**
 * Collector Configuration Manager
 *
 * Reads and writes ~/.ticket-pulse/pulse.json.
 * Validates with Zod on read; validates again before write.
 */

import { readFileSync, writeFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { GitHubCountQuery, InfluxConfig, InfluxCredentials, PulseConfig } from './types.js';
import { ensureConfigDir, pulseConfigPath } from './paths.js';
import { formatSeries, parseSeriesKey, SeriesKeyError } from '../clients/line-protocol.js';

export const DEFAULT_INFLUX_URL = 'http://localhost:8086';
export const DEFAULT_INFLUX_DATABASE = 'inforad';
export const DEFAULT_CRON = '*/15 * * * *';
export const DEFAULT_VELOCITY_WINDOW = 3;

// ─── Zod Schemas ─────────────────────────────────────────────

/** Canonical form of a series key (tags sorted), or null when it does not parse. */
function canonicalSeries(key: string): string | null {
  try {
    return formatSeries(parseSeriesKey(key));
  } catch (error) {
    if (error instanceof SeriesKeyError) return null;
    throw error;
  }
}

const seriesKey = z
  .string()
  .min(1, 'series must not be empty')
  .superRefine((key, ctx) => {
    try {
      parseSeriesKey(key);
    } catch (error) {
      if (!(error instanceof SeriesKeyError)) throw error;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    }
  });

const hasOneSource = (q: { filterId?: number; jql?: string }): boolean =>
  (q.filterId === undefined) !== (q.jql === undefined);

const SOURCE_MESSAGE = 'exactly one of filterId or jql is required';

const JiraCountBase = z.object({
  series: seriesKey,
  filterId: z.number().int().positive().optional(),
  jql: z.string().min(1).optional(),
});

const JiraCountQuerySchema = JiraCountBase.refine(hasOneSource, { message: SOURCE_MESSAGE });

const JiraSumQuerySchema = JiraCountBase.extend({
  field: z.string().min(1),
  decimals: z.number().int().min(0).max(10).optional(),
}).refine(hasOneSource, { message: SOURCE_MESSAGE });

const JiraVelocitySchema = z.object({
  series: seriesKey,
  boardId: z.number().int().positive(),
  sprintPattern: z.string().optional(),
  window: z.number().int().positive().default(DEFAULT_VELOCITY_WINDOW),
});

const PulseConfigSchema = z.object({
  version: z.literal(1),
  influx: z.object({
    url: z.string().url().default(DEFAULT_INFLUX_URL),
    database: z.string().min(1).default(DEFAULT_INFLUX_DATABASE),
    username: z.string().optional(),
    password: z.string().optional(),
  }),
  jira: z.object({
    host: z.string().default(''),
    counts: z.array(JiraCountQuerySchema).default([]),
    sums: z.array(JiraSumQuerySchema).default([]),
    velocity: JiraVelocitySchema.optional(),
  }),
  github: z.object({
    repos: z
      .array(z.string().regex(/^[\w.-]+\/[\w.-]+$/, 'repos must be in owner/repo form'))
      .default([]),
    counts: z.array(z.object({ series: seriesKey, query: z.string().min(1) })).default([]),
  }),
  schedule: z.object({
    cron: z.string().min(1).default(DEFAULT_CRON),
  }),
  grafana: z.object({
    url: z.string().url().default('http://localhost:3000'),
    title: z.string().min(1).default('Ticket Pulse'),
    datasource: z.string().min(1).default('InfluxDB'),
  }),
}).superRefine((config, ctx) => {
  // Two metrics on one series would write two points with the same key and
  // timestamp; InfluxDB keeps only the last.
  const series = [
    ...config.jira.counts.map((q) => q.series),
    ...config.jira.sums.map((q) => q.series),
    ...(config.jira.velocity ? [config.jira.velocity.series] : []),
    ...expandGitHubCounts(config).map((q) => q.series),
  ];
  const seen = new Set<string>();
  for (const key of series) {
    const canonical = canonicalSeries(key);
    if (canonical === null) continue;
    if (seen.has(canonical)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `series "${key}" is configured more than once` });
    }
    seen.add(canonical);
  }
});

export { PulseConfigSchema };

// ─── Read / Write ────────────────────────────────────────────

/**
 * Read and validate ~/.ticket-pulse/pulse.json.
 * Returns null if the file doesn't exist.
 * Throws on invalid JSON or schema validation failure.
 */
export function readPulseConfig(): PulseConfig | null {
  const filePath = pulseConfigPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return PulseConfigSchema.parse(parsed);
}

/**
 * Write pulse.json, creating the config directory if needed.
 * Validates before writing so a bad config never lands on disk.
 */
export function writePulseConfig(config: PulseConfig): void {
  PulseConfigSchema.parse(config);
  ensureConfigDir();
  writeFileSync(pulseConfigPath(), JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

export function pulseConfigExists(): boolean {
  return existsSync(pulseConfigPath());
}

/** Scaffold written by `ticket-pulse init`. */
export function createDefaultConfig(): PulseConfig {
  return {
    version: 1,
    influx: {
      url: DEFAULT_INFLUX_URL,
      database: DEFAULT_INFLUX_DATABASE,
    },
    jira: {
      host: '',
      counts: [],
      sums: [],
    },
    github: {
      repos: [],
      counts: [],
    },
    schedule: {
      cron: DEFAULT_CRON,
    },
    grafana: {
      url: 'http://localhost:3000',
      title: 'Ticket Pulse',
      datasource: 'InfluxDB',
    },
  };
}

// ─── Derived Settings ────────────────────────────────────────

/**
 * All GitHub counts to collect: one open-PR count per listed repo,
 * followed by the explicit search counts.
 */
export function expandGitHubCounts(config: Pick<PulseConfig, 'github'>): GitHubCountQuery[] {
  const repoCounts = config.github.repos.map((repo) => ({
    series: `pull_requests,repo=${repo},state=open`,
    query: `repo:${repo} is:pr is:open`,
  }));
  return [...repoCounts, ...config.github.counts];
}

/**
 * Effective InfluxDB settings: INFLUX_URL / INFLUX_DATABASE override the
 * file, and resolved credentials override any username/password in it.
 */
export function resolveInfluxConfig(
  config: PulseConfig,
  credentials?: InfluxCredentials
): InfluxConfig {
  const resolved: InfluxConfig = {
    url: process.env['INFLUX_URL'] || config.influx.url,
    database: process.env['INFLUX_DATABASE'] || config.influx.database,
  };
  const username = credentials?.username ?? config.influx.username;
  const password = credentials?.password ?? config.influx.password;
  if (username && password !== undefined) {
    resolved.username = username;
    resolved.password = password;
  }
  return resolved;
}
