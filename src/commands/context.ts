/**
 * Collector wiring shared by the CLI and the MCP server: loads config
 * and credentials and builds the clients a collection run needs.
 */

import { resolveCredentials } from '../config/credentials.js';
import { readPulseConfig, resolveInfluxConfig } from '../config/pulse-config.js';
import { pulseConfigPath } from '../config/paths.js';
import type { PulseConfig } from '../config/types.js';
import { GitHubClient } from '../clients/github-client.js';
import { JiraClient } from '../clients/jira-client.js';
import { InfluxClient } from '../clients/influx-client.js';
import { GrafanaClient } from '../clients/grafana-client.js';
import { HistoryStore } from '../history/history-store.js';
import type { CollectorDeps } from '../orchestrator/collector.js';

export function requireConfig(): PulseConfig {
  const config = readPulseConfig();
  if (!config) {
    throw new Error(`No config found at ${pulseConfigPath()}. Run "ticket-pulse init" first.`);
  }
  return config;
}

/**
 * JIRA client for the configured host. Credentials apply only when they
 * were issued for that host (or when pulse.json names no host).
 */
export function createJiraClient(config: PulseConfig): JiraClient | null {
  const creds = resolveCredentials().jira;
  const host = config.jira.host || creds?.host;
  if (!host) return null;

  if (creds && sameHost(creds.host, host)) {
    return new JiraClient(host, creds.email, creds.apiToken);
  }
  return new JiraClient(host);
}

function sameHost(a: string, b: string): boolean {
  const normalize = (h: string) => h.replace(/^https?:\/\//, '').replace(/\/+$/, '').toLowerCase();
  return normalize(a) === normalize(b);
}

export function createInfluxClient(config: PulseConfig): InfluxClient {
  return new InfluxClient(resolveInfluxConfig(config, resolveCredentials().influx));
}

export function createGrafanaClient(config: PulseConfig): GrafanaClient {
  const creds = resolveCredentials().grafana;
  if (!creds) {
    throw new Error('Grafana API key required. Run "ticket-pulse auth grafana" or set GRAFANA_API_KEY.');
  }
  return new GrafanaClient(config.grafana.url, creds.apiKey);
}

/** Everything runCollection needs. The caller closes `history`. */
export function createCollectorDeps(
  config: PulseConfig,
  options: { history?: boolean } = {}
): CollectorDeps {
  const deps: CollectorDeps = {
    config,
    jira: createJiraClient(config),
    github: new GitHubClient(resolveCredentials().github?.token ?? null),
    influx: createInfluxClient(config),
  };
  if (options.history ?? true) {
    deps.history = new HistoryStore();
  }
  return deps;
}
