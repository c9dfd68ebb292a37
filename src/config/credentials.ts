/**
 * Credentials Resolver
 *
 * Resolves API credentials in order:
 * 1. Environment variables
 * 2. ~/.ticket-pulse/credentials.json
 *
 * The credentials file is written with 600 permissions.
 */

import { readFileSync, writeFileSync, existsSync, chmodSync } from 'node:fs';
import { z } from 'zod';
import type {
  CredentialsConfig,
  GitHubCredentials,
  GrafanaCredentials,
  InfluxCredentials,
  JiraCredentials,
} from './types.js';
import { ensureConfigDir, credentialsPath } from './paths.js';

// ─── Zod Schema ──────────────────────────────────────────────

const CredentialsSchema = z.object({
  github: z.object({ token: z.string().min(1) }).optional(),
  jira: z
    .object({
      host: z.string().min(1),
      email: z.string().email(),
      apiToken: z.string().min(1),
    })
    .optional(),
  influx: z.object({ username: z.string().min(1), password: z.string() }).optional(),
  grafana: z.object({ apiKey: z.string().min(1) }).optional(),
});

// ─── Environment Variable Names ──────────────────────────────

const ENV_GITHUB_TOKEN = 'GITHUB_TOKEN';
const ENV_JIRA_API_TOKEN = 'JIRA_API_TOKEN';
const ENV_JIRA_EMAIL = 'JIRA_EMAIL';
const ENV_JIRA_HOST = 'JIRA_HOST';
const ENV_INFLUX_USERNAME = 'INFLUX_USERNAME';
const ENV_INFLUX_PASSWORD = 'INFLUX_PASSWORD';
const ENV_GRAFANA_API_KEY = 'GRAFANA_API_KEY';

// ─── Resolve ─────────────────────────────────────────────────

export function resolveGitHubCredentials(): GitHubCredentials | null {
  const envToken = process.env[ENV_GITHUB_TOKEN];
  if (envToken) {
    return { token: envToken };
  }
  return readCredentialsFile()?.github ?? null;
}

/** All three JIRA variables must be set for the environment to win. */
export function resolveJiraCredentials(): JiraCredentials | null {
  const envToken = process.env[ENV_JIRA_API_TOKEN];
  const envEmail = process.env[ENV_JIRA_EMAIL];
  const envHost = process.env[ENV_JIRA_HOST];

  if (envToken && envEmail && envHost) {
    return { host: envHost, email: envEmail, apiToken: envToken };
  }
  return readCredentialsFile()?.jira ?? null;
}

export function resolveInfluxCredentials(): InfluxCredentials | null {
  const username = process.env[ENV_INFLUX_USERNAME];
  const password = process.env[ENV_INFLUX_PASSWORD];
  if (username && password !== undefined) {
    return { username, password };
  }
  return readCredentialsFile()?.influx ?? null;
}

export function resolveGrafanaCredentials(): GrafanaCredentials | null {
  const apiKey = process.env[ENV_GRAFANA_API_KEY];
  if (apiKey) {
    return { apiKey };
  }
  return readCredentialsFile()?.grafana ?? null;
}

/** Everything that resolves. Missing services are left undefined. */
export function resolveCredentials(): CredentialsConfig {
  return {
    github: resolveGitHubCredentials() ?? undefined,
    jira: resolveJiraCredentials() ?? undefined,
    influx: resolveInfluxCredentials() ?? undefined,
    grafana: resolveGrafanaCredentials() ?? undefined,
  };
}

// ─── File Operations ─────────────────────────────────────────

/**
 * Read credentials.json. Returns null when the file is missing or fails
 * validation.
 */
function readCredentialsFile(): CredentialsConfig | null {
  const filePath = credentialsPath();
  if (!existsSync(filePath)) {
    return null;
  }

  const parsed: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  const result = CredentialsSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export function writeCredentials(config: CredentialsConfig): void {
  ensureConfigDir();
  const filePath = credentialsPath();
  writeFileSync(filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  chmodSync(filePath, 0o600);
}

/**
 * Merge new credentials into credentials.json. Services present in
 * newCreds replace the stored ones; the rest are preserved.
 */
export function mergeCredentials(newCreds: CredentialsConfig): void {
  const merged: CredentialsConfig = { ...(readCredentialsFile() ?? {}) };

  if (newCreds.github) merged.github = newCreds.github;
  if (newCreds.jira) merged.jira = newCreds.jira;
  if (newCreds.influx) merged.influx = newCreds.influx;
  if (newCreds.grafana) merged.grafana = newCreds.grafana;

  writeCredentials(merged);
}
