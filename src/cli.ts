#!/usr/bin/env node

/**
 * ticket-pulse CLI
 *
 * Usage:
 *   ticket-pulse collect [--dry-run]
 *   ticket-pulse schedule
 *   ticket-pulse cron install|remove|show
 *   ticket-pulse dashboard [--out file] [--import]
 *   ticket-pulse status
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  createDefaultConfig,
  expandGitHubCounts,
  pulseConfigExists,
  readPulseConfig,
  resolveInfluxConfig,
  writePulseConfig,
} from './config/pulse-config.js';
import { resolveCredentials } from './config/credentials.js';
import { ensureConfigDir, pulseConfigPath, resolveConfigDir } from './config/paths.js';
import {
  createCollectorDeps,
  createGrafanaClient,
  createInfluxClient,
  requireConfig,
} from './commands/context.js';
import { parseArgs, parseLimit } from './commands/args.js';
import { runCollectCommand } from './commands/collect.js';
import { AUTH_SERVICES, isAuthService, runAuth } from './commands/auth.js';
import { formatLatestValues, formatRuns, formatSeriesHistory } from './commands/format.js';
import { buildDashboard, renderDashboard } from './dashboard/dashboard-builder.js';
import { HistoryStore } from './history/history-store.js';
import { runCollection } from './orchestrator/collector.js';
import { CollectorScheduler } from './scheduler/collector-scheduler.js';
import { buildCronLine, installCronJob, removeCronJob, showCronJob } from './scheduler/crontab.js';
import { logger } from './logging/logger.js';

const VERSION = '1.0.0';

// ─── Commands ───────────────────────────────────────────────

async function runSchedule(): Promise<void> {
  const config = requireConfig();
  const deps = createCollectorDeps(config);
  const scheduler = new CollectorScheduler(config.schedule.cron, () => runCollection(deps));

  scheduler.start();
  console.log(`Collecting on "${config.schedule.cron}". Press Ctrl+C to stop.`);

  await new Promise<void>((resolve) => {
    const shutdown = (): void => {
      scheduler.stop();
      deps.history?.close();
      resolve();
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
}

function runCron(positional: string[], flags: Record<string, string>): string {
  const action = positional[0] ?? 'show';

  switch (action) {
    case 'install': {
      const config = requireConfig();
      const env: Record<string, string> = {};
      const home = process.env['TICKET_PULSE_HOME'];
      if (home) env['TICKET_PULSE_HOME'] = home;

      const line = buildCronLine({
        schedule: config.schedule.cron,
        command: [process.execPath, fileURLToPath(import.meta.url), 'collect'],
        env,
        logFile: flags['log'] || join(ensureConfigDir(), 'collect.log'),
      });
      const replaced = installCronJob(line);
      return `${replaced ? 'Replaced' : 'Installed'} crontab entry:\n  ${line}`;
    }
    case 'remove':
      return removeCronJob() ? 'Removed crontab entry.' : 'No ticket-pulse crontab entry installed.';
    case 'show': {
      const line = showCronJob();
      return line ? line : 'No ticket-pulse crontab entry installed.';
    }
    default:
      throw new Error(`Unknown cron action: ${action} (expected install, remove or show)`);
  }
}

async function runSetupDb(): Promise<string> {
  const config = requireConfig();
  const influx = createInfluxClient(config);
  await influx.ping();
  await influx.createDatabase();
  return `InfluxDB database "${influx.database}" is ready.`;
}

async function runDashboard(flags: Record<string, string>): Promise<string> {
  const config = requireConfig();

  if (flags['import'] !== undefined) {
    const result = await createGrafanaClient(config).importDashboard(buildDashboard(config));
    return `Dashboard imported: ${config.grafana.url.replace(/\/+$/, '')}${result.url} (${result.status})`;
  }

  const json = renderDashboard(config);
  const out = flags['out'];
  if (out) {
    writeFileSync(out, json, 'utf-8');
    return `Dashboard written to ${out}`;
  }
  return json.trimEnd();
}

function runInitConfig(): string {
  if (pulseConfigExists()) {
    return `Config already exists at ${pulseConfigPath()}`;
  }
  writePulseConfig(createDefaultConfig());
  return [
    `Wrote ${pulseConfigPath()}`,
    '',
    'Next steps:',
    '  1. Add JIRA counts/sums and GitHub repos to pulse.json',
    '  2. ticket-pulse auth jira && ticket-pulse auth github',
    '  3. ticket-pulse setup-db',
    '  4. ticket-pulse collect --dry-run',
    '  5. ticket-pulse cron install',
    '  6. ticket-pulse dashboard --import',
  ].join('\n');
}

function runHistory(flags: Record<string, string>): string {
  const store = new HistoryStore();
  try {
    const series = flags['series'];
    if (series) {
      return formatSeriesHistory(series, store.getSeriesHistory(series, parseLimit(flags['limit'], 20)));
    }
    const lines = ['Latest values:', formatLatestValues(store.getLatestValues()), ''];
    lines.push('Recent runs:', formatRuns(store.getRecentRuns(parseLimit(flags['limit'], 10))));
    return lines.join('\n');
  } finally {
    store.close();
  }
}

function runStatus(): string {
  const config = pulseConfigExists() ? readPulseConfig() : null;
  const creds = resolveCredentials();

  const lines: string[] = [];
  lines.push(`ticket-pulse v${VERSION}`);
  lines.push('');
  lines.push(`Config dir:  ${resolveConfigDir()}`);
  lines.push(`Config:      ${config ? pulseConfigPath() : 'Not configured (run "ticket-pulse init")'}`);
  lines.push(`GitHub:      ${creds.github ? 'Token configured' : 'Anonymous (set GITHUB_TOKEN)'}`);
  lines.push(`JIRA:        ${creds.jira ? `${creds.jira.email} @ ${creds.jira.host}` : 'Anonymous'}`);
  lines.push(`Grafana:     ${creds.grafana ? 'API key configured' : 'No API key (import disabled)'}`);

  if (config) {
    const influx = resolveInfluxConfig(config, creds.influx);
    lines.push(`InfluxDB:    ${influx.url} (db: ${influx.database})`);
    lines.push(`Schedule:    ${config.schedule.cron}`);
    lines.push(`Crontab:     ${showCronJob() ? 'installed' : 'not installed'}`);
    lines.push('');
    lines.push(`JIRA host:   ${config.jira.host || creds.jira?.host || 'none'}`);
    lines.push(
      `JIRA:        ${config.jira.counts.length} count(s), ${config.jira.sums.length} sum(s), velocity ${config.jira.velocity ? 'on' : 'off'}`
    );
    lines.push(`GitHub:      ${expandGitHubCounts(config).length} count(s)`);
  }

  return lines.join('\n');
}

// ─── Help ───────────────────────────────────────────────────

function showHelp(topic?: string): string {
  const help = topic ? COMMAND_HELP[topic] : undefined;
  if (help) {
    return help;
  }
  if (topic) {
    return `Unknown command: ${topic}\n\n${MAIN_HELP}`;
  }
  return MAIN_HELP;
}

const MAIN_HELP = `ticket-pulse - JIRA and GitHub counts into InfluxDB, with a Grafana dashboard

Usage:
  ticket-pulse <command> [options]
  ticket-pulse help <command>

Setup:
  init              Write a default ~/.ticket-pulse/pulse.json
  auth <service>    Store credentials (${AUTH_SERVICES.join(', ')})
  setup-db          Create the InfluxDB database
  cron <action>     install, remove or show the crontab entry

Collection:
  collect           Poll JIRA and GitHub once and write the counts
  schedule          Collect on the configured cron expression until stopped

Dashboard:
  dashboard         Print, save or import the Grafana dashboard

Info:
  history           Latest values and recent runs from the local history
  status            Show config, credentials and schedule
  help [command]    Show help for a specific command

Environment Variables:
  TICKET_PULSE_HOME   Config directory (default: ~/.ticket-pulse)
  GITHUB_TOKEN        GitHub token
  JIRA_HOST           JIRA host (with JIRA_EMAIL and JIRA_API_TOKEN)
  INFLUX_URL          InfluxDB URL override
  INFLUX_DATABASE     InfluxDB database override
  GRAFANA_API_KEY     Grafana API key for dashboard import
  LOG_LEVEL           Log level for stderr logs (default: info)`;

const COMMAND_HELP: Record<string, string> = {
  collect: `ticket-pulse collect — Poll once and write

  Reads every configured JIRA count, sum and sprint velocity and every
  GitHub search count, then writes them to InfluxDB as one batch with a
  shared timestamp.

  Options:
    --dry-run     Print the values without writing anything

  Exit codes:
    0   all metrics written
    1   fatal error (no config, InfluxDB unreachable)
    2   some metrics failed; the rest were written`,

  schedule: `ticket-pulse schedule — In-process scheduler

  Runs "collect" on schedule.cron from pulse.json until SIGINT/SIGTERM.
  A tick is skipped while the previous run is still in flight.`,

  cron: `ticket-pulse cron — Manage the crontab entry

  Usage:
    ticket-pulse cron install [--log <file>]
    ticket-pulse cron remove
    ticket-pulse cron show

  The entry runs "ticket-pulse collect" on schedule.cron and appends its
  output to ~/.ticket-pulse/collect.log unless --log is given. It is
  tagged with "# ticket-pulse" and replaced on reinstall.`,

  dashboard: `ticket-pulse dashboard — Grafana dashboard

  Options:
    --out <file>  Write the dashboard JSON to a file
    --import      Import it through the Grafana API (needs GRAFANA_API_KEY)

  Without options the JSON is printed to stdout.`,

  history: `ticket-pulse history — Local sample history

  Options:
    --series <key>  Values of one series, most recent first
    --limit <n>     Number of rows (default: 20 values / 10 runs)`,

  auth: `ticket-pulse auth <service> — Store credentials

  Services: ${AUTH_SERVICES.join(', ')}

  Tokens are prompted for (masked on a terminal, read from stdin when
  piped) and saved to ~/.ticket-pulse/credentials.json with mode 600.`,

  'setup-db': `ticket-pulse setup-db — Create the InfluxDB database

  Pings InfluxDB and runs CREATE DATABASE for influx.database.`,
};

// ─── Main ───────────────────────────────────────────────────

async function main(): Promise<void> {
  const { command, positional, flags } = parseArgs(process.argv);

  try {
    let output: string;

    switch (command) {
      case 'collect':
        process.exitCode = await runCollectCommand({ dryRun: flags['dry-run'] !== undefined });
        return;
      case 'schedule':
        await runSchedule();
        return;
      case 'auth': {
        const service = positional[0] ?? '';
        if (!isAuthService(service)) {
          throw new Error(`Usage: ticket-pulse auth <${AUTH_SERVICES.join('|')}>`);
        }
        await runAuth(service);
        return;
      }
      case 'cron':
        output = runCron(positional, flags);
        break;
      case 'setup-db':
        output = await runSetupDb();
        break;
      case 'dashboard':
        output = await runDashboard(flags);
        break;
      case 'init':
        output = runInitConfig();
        break;
      case 'history':
        output = runHistory(flags);
        break;
      case 'status':
        output = runStatus();
        break;
      case 'help':
      case '--help':
      case '-h':
        output = showHelp(positional[0]);
        break;
      case '--version':
        output = VERSION;
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        output = showHelp();
        process.exitCode = 1;
    }

    console.log(output);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.debug({ err: error }, 'Command failed');
    console.error(`Error: ${message}`);
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
