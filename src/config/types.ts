/**
 * Configuration Types
 *
 * Shape of the collector config (pulse.json) and credentials
 * (credentials.json). Zod schemas in pulse-config.ts and credentials.ts
 * validate against these.
 */

/** InfluxDB 1.x write target. */
export interface InfluxConfig {
  url: string;
  database: string;
  username?: string;
  password?: string;
}

/**
 * A JIRA issue count. Exactly one of filterId (a saved filter whose JQL is
 * looked up at collection time) or jql must be set.
 */
export interface JiraCountQuery {
  series: string;
  filterId?: number;
  jql?: string;
}

/** Sum of a numeric issue field (story points, custom scores). */
export interface JiraSumQuery extends JiraCountQuery {
  field: string;
  decimals?: number;
}

/** Average completed estimate over the last `window` closed sprints of a board. */
export interface JiraVelocityConfig {
  series: string;
  boardId: number;
  sprintPattern?: string;
  window: number;
}

export interface JiraConfig {
  host: string;
  counts: JiraCountQuery[];
  sums: JiraSumQuery[];
  velocity?: JiraVelocityConfig;
}

/** A GitHub search-API count, e.g. `repo:acme/api is:pr is:open`. */
export interface GitHubCountQuery {
  series: string;
  query: string;
}

export interface GitHubConfig {
  repos: string[];
  counts: GitHubCountQuery[];
}

export interface ScheduleConfig {
  cron: string;
}

export interface GrafanaConfig {
  url: string;
  title: string;
  datasource: string;
}

/** Root collector configuration — stored in ~/.ticket-pulse/pulse.json */
export interface PulseConfig {
  version: 1;
  influx: InfluxConfig;
  jira: JiraConfig;
  github: GitHubConfig;
  schedule: ScheduleConfig;
  grafana: GrafanaConfig;
}

export interface GitHubCredentials {
  token: string;
}

/** JIRA basic auth: email + API token. */
export interface JiraCredentials {
  host: string;
  email: string;
  apiToken: string;
}

export interface InfluxCredentials {
  username: string;
  password: string;
}

export interface GrafanaCredentials {
  apiKey: string;
}

/** Root credentials — stored in ~/.ticket-pulse/credentials.json */
export interface CredentialsConfig {
  github?: GitHubCredentials;
  jira?: JiraCredentials;
  influx?: InfluxCredentials;
  grafana?: GrafanaCredentials;
}
