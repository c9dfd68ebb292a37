/**
 * ticket-pulse auth — store credentials in ~/.ticket-pulse/credentials.json
 *
 *   auth github    GitHub token (validated against /user)
 *   auth jira      JIRA host, email and API token (validated against /myself)
 *   auth influx    InfluxDB username and password (validated with /ping)
 *   auth grafana   Grafana API key / service-account token
 *
 * Environment variables still take precedence over anything stored here.
 */

import type { Interface } from 'node:readline/promises';
import { mergeCredentials } from '../config/credentials.js';
import { readPulseConfig, resolveInfluxConfig, createDefaultConfig } from '../config/pulse-config.js';
import { GitHubClient } from '../clients/github-client.js';
import { JiraClient } from '../clients/jira-client.js';
import { InfluxClient } from '../clients/influx-client.js';
import {
  createPrompt,
  ask,
  askSecret,
  printHeader,
  printSuccess,
  printWarning,
  printInfo,
} from './prompt.js';

export const AUTH_SERVICES = ['github', 'jira', 'influx', 'grafana'] as const;

export type AuthService = (typeof AUTH_SERVICES)[number];

export function isAuthService(value: string): value is AuthService {
  return AUTH_SERVICES.some((s) => s === value);
}

export async function runAuth(service: AuthService): Promise<void> {
  printHeader(`ticket-pulse auth ${service}`);
  const rl = createPrompt();

  try {
    switch (service) {
      case 'github':
        await authGitHub(rl);
        break;
      case 'jira':
        await authJira(rl);
        break;
      case 'influx':
        await authInflux(rl);
        break;
      case 'grafana':
        await authGrafana(rl);
        break;
    }
  } finally {
    rl.close();
  }
}

async function authGitHub(rl: Interface): Promise<void> {
  printInfo('Create a token at https://github.com/settings/tokens (scope: repo, for private repos)');
  const token = await askSecret(rl, 'GitHub token');
  if (!token) throw new Error('No token entered');

  const user = await new GitHubClient(token).getAuthenticatedUser();
  mergeCredentials({ github: { token } });
  printSuccess(`GitHub token saved (authenticated as @${user.login})`);
}

async function authJira(rl: Interface): Promise<void> {
  const configuredHost = readPulseConfig()?.jira.host;
  const host = await ask(rl, 'JIRA host', { required: true, defaultValue: configuredHost || undefined });
  const email = await ask(rl, 'JIRA user / email', { required: true });
  const apiToken = await askSecret(rl, 'JIRA API token or password');
  if (!apiToken) throw new Error('No token entered');

  const me = await new JiraClient(host, email, apiToken).getMyself();
  mergeCredentials({ jira: { host, email, apiToken } });
  printSuccess(`JIRA credentials saved (authenticated as ${me.displayName})`);
}

async function authInflux(rl: Interface): Promise<void> {
  const username = await ask(rl, 'InfluxDB username', { required: true });
  const password = await askSecret(rl, 'InfluxDB password');

  const config = readPulseConfig() ?? createDefaultConfig();
  const influx = resolveInfluxConfig(config, { username, password });
  await new InfluxClient(influx).ping();
  mergeCredentials({ influx: { username, password } });
  printSuccess(`InfluxDB credentials saved (${influx.url} reachable)`);
}

async function authGrafana(rl: Interface): Promise<void> {
  const apiKey = await askSecret(rl, 'Grafana API key / service-account token');
  if (!apiKey) throw new Error('No key entered');

  mergeCredentials({ grafana: { apiKey } });
  printSuccess('Grafana API key saved');
  printWarning('The key is checked on the next `ticket-pulse dashboard --import`.');
}
