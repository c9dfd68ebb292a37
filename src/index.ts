#!/usr/bin/env node

/**
 * ticket-pulse MCP Server
 *
 * Exposes collection and the local history over MCP stdio so an
 * assistant can trigger a run or answer "how many blockers are open".
 *
 * Tools:
 *   Collection: collect_metrics
 *   History:    latest_metrics, metric_history
 *   Dashboard:  render_dashboard
 *   Info:       get_capabilities
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { resolveCredentials } from './config/credentials.js';
import { expandGitHubCounts, pulseConfigExists, readPulseConfig } from './config/pulse-config.js';
import { pulseConfigPath, resolveConfigDir } from './config/paths.js';
import { createCollectorDeps, requireConfig } from './commands/context.js';
import {
  formatCollectionResult,
  formatLatestValues,
  formatRuns,
  formatSeriesHistory,
} from './commands/format.js';
import { renderDashboard } from './dashboard/dashboard-builder.js';
import { HistoryStore } from './history/history-store.js';
import { runCollection } from './orchestrator/collector.js';
import { moduleLogger } from './logging/logger.js';
import {
  CollectMetricsArgsSchema,
  LatestMetricsArgsSchema,
  MetricHistoryArgsSchema,
  parseToolArgs,
} from './validators.js';

const VERSION = '1.0.0';

const log = moduleLogger('mcp');

type ToolResult = { content: Array<{ type: 'text'; text: string }> };

const SERVER_INSTRUCTIONS = `ticket-pulse polls JIRA and GitHub for ticket and pull request counts and stores them in InfluxDB.

Use ticket-pulse tools when the user asks about:
- Current counts (open blockers, open PRs, story points) → latest_metrics
- How a count changed over time → metric_history
- Refreshing the numbers now → collect_metrics
- The Grafana dashboard → render_dashboard
- Configuration or credential status → get_capabilities`;

const server = new Server(
  { name: 'ticket-pulse', version: VERSION },
  {
    capabilities: { tools: {} },
    instructions: SERVER_INSTRUCTIONS,
  }
);

// ─── Tool Definitions ────────────────────────────────────────

server.setRequestHandler(ListToolsRequestSchema, () => {
  return {
    tools: [
      {
        name: 'collect_metrics',
        description:
          'Poll every configured JIRA and GitHub metric now and write the values to InfluxDB. Use dryRun to read the values without writing them.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            dryRun: {
              type: 'boolean' as const,
              description: 'Read the values without writing to InfluxDB or the history',
            },
          },
        },
      },
      {
        name: 'latest_metrics',
        description:
          'Latest stored value of every series, plus the most recent collection runs. Does not poll JIRA or GitHub.',
        inputSchema: {
          type: 'object' as const,
          properties: {
            runs: {
              type: 'number' as const,
              description: 'Number of recent runs to list (default: 5)',
            },
          },
        },
      },
      {
        name: 'metric_history',
        description:
          'Stored values of one series, most recent first. Series keys look like "CA,priority=Blocker" or "pull_requests,repo=owner/repo,state=open".',
        inputSchema: {
          type: 'object' as const,
          properties: {
            series: {
              type: 'string' as const,
              description: 'Series key, as shown by latest_metrics',
            },
            limit: {
              type: 'number' as const,
              description: 'Number of values (default: 20)',
            },
          },
          required: ['series'],
        },
      },
      {
        name: 'render_dashboard',
        description: 'Grafana dashboard JSON with one panel per configured series.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
      {
        name: 'get_capabilities',
        description: 'Returns available tools, config status and credential status.',
        inputSchema: {
          type: 'object' as const,
          properties: {},
        },
      },
    ],
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'collect_metrics':
        return await handleCollectMetrics(args);
      case 'latest_metrics':
        return handleLatestMetrics(args);
      case 'metric_history':
        return handleMetricHistory(args);
      case 'render_dashboard':
        return handleRenderDashboard();
      case 'get_capabilities':
        return handleGetCapabilities();
      default:
        throw new Error(`Unknown tool: ${name}`);
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    log.warn({ tool: name, err: errorMessage }, 'Tool call failed');
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage}` }],
      isError: true,
    };
  }
});

// ─── Handlers ────────────────────────────────────────────────

function text(body: string): ToolResult {
  return { content: [{ type: 'text', text: body }] };
}

async function handleCollectMetrics(args: unknown): Promise<ToolResult> {
  const { dryRun } = parseToolArgs(CollectMetricsArgsSchema, args);
  const deps = createCollectorDeps(requireConfig(), { history: !dryRun });

  try {
    const result = await runCollection(deps, { dryRun });
    return text(formatCollectionResult(result));
  } finally {
    deps.history?.close();
  }
}

function withHistory<T>(fn: (store: HistoryStore) => T): T {
  const store = new HistoryStore();
  try {
    return fn(store);
  } finally {
    store.close();
  }
}

function handleLatestMetrics(args: unknown): ToolResult {
  const { runs } = parseToolArgs(LatestMetricsArgsSchema, args);

  return withHistory((store) => {
    const parts: string[] = [];
    parts.push('Latest values:');
    parts.push(formatLatestValues(store.getLatestValues()));
    parts.push('');
    parts.push('Recent runs:');
    parts.push(formatRuns(store.getRecentRuns(runs)));
    return text(parts.join('\n'));
  });
}

function handleMetricHistory(args: unknown): ToolResult {
  const { series, limit } = parseToolArgs(MetricHistoryArgsSchema, args);
  return withHistory((store) => text(formatSeriesHistory(series, store.getSeriesHistory(series, limit))));
}

function handleRenderDashboard(): ToolResult {
  return text(renderDashboard(requireConfig()));
}

function handleGetCapabilities(): ToolResult {
  const config = pulseConfigExists() ? readPulseConfig() : null;
  const creds = resolveCredentials();

  const parts: string[] = [];
  parts.push(`# ticket-pulse v${VERSION}`);
  parts.push('');
  parts.push('## Status');
  parts.push('');
  parts.push('| Component | Status |');
  parts.push('|-----------|--------|');
  parts.push(`| Config directory | \`${resolveConfigDir()}\` |`);
  parts.push(`| pulse.json | ${config ? 'Configured' : `Not found at \`${pulseConfigPath()}\``} |`);
  parts.push(`| GitHub | ${creds.github ? 'Token configured' : 'Anonymous (low rate limit)'} |`);
  parts.push(`| JIRA | ${creds.jira ? creds.jira.host : 'Anonymous'} |`);
  parts.push(`| Grafana | ${creds.grafana ? 'API key configured' : 'No API key'} |`);

  if (config) {
    parts.push('');
    parts.push('## Metrics');
    parts.push('');
    parts.push(`- InfluxDB: ${config.influx.url} (db: ${config.influx.database})`);
    parts.push(`- Schedule: \`${config.schedule.cron}\``);
    parts.push(`- JIRA counts: ${config.jira.counts.length}`);
    parts.push(`- JIRA sums: ${config.jira.sums.length}`);
    parts.push(`- Sprint velocity: ${config.jira.velocity ? config.jira.velocity.series : 'off'}`);
    parts.push(`- GitHub counts: ${expandGitHubCounts(config).length}`);
  } else {
    parts.push('');
    parts.push('## Getting Started');
    parts.push('');
    parts.push('Run `ticket-pulse init`, add metrics to pulse.json, then `ticket-pulse setup-db`.');
  }

  parts.push('');
  parts.push('## Tools');
  parts.push('');
  parts.push('- `collect_metrics` poll now (dryRun to preview)');
  parts.push('- `latest_metrics` latest stored values and recent runs');
  parts.push('- `metric_history` values of one series');
  parts.push('- `render_dashboard` Grafana dashboard JSON');

  return text(parts.join('\n'));
}

// ─── Start Server ────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ version: VERSION }, 'MCP server started');
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'MCP server failed to start');
  process.exit(1);
});
