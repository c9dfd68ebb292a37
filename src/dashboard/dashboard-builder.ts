/**
 * Dashboard Builder
 *
 * Generates the Grafana dashboard definition for the configured series:
 * a JIRA row and a GitHub row, one time-series panel per series, each
 * backed by a raw InfluxQL query against the `value` field.
 */

import { expandGitHubCounts } from '../config/pulse-config.js';
import type { PulseConfig } from '../config/types.js';
import { parseSeriesKey, type SeriesKey } from '../clients/line-protocol.js';
import type { GrafanaDashboard, Panel, TimeSeriesPanel } from './types.js';

const SCHEMA_VERSION = 39;
const PANEL_WIDTH = 8;
const PANEL_HEIGHT = 8;
const PANELS_PER_ROW = 24 / PANEL_WIDTH;
const DEFAULT_REFRESH = '15m';

interface PanelSpec {
  series: string;
  decimals?: number;
}

// ─── InfluxQL ────────────────────────────────────────────

function quoteIdentifier(name: string): string {
  return `"${name.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Latest value per interval, carried forward across gaps so a missed
 * collection run doesn't break the line.
 */
export function buildInfluxQuery(series: SeriesKey): string {
  const conditions = Object.keys(series.tags)
    .sort()
    .map((key) => `${quoteIdentifier(key)} = ${quoteString(series.tags[key] ?? '')}`);
  const where = conditions.length > 0 ? `(${conditions.join(' AND ')}) AND ` : '';

  return `SELECT last("value") FROM ${quoteIdentifier(series.measurement)} WHERE ${where}$timeFilter GROUP BY time($__interval) fill(previous)`;
}

// ─── Refresh ─────────────────────────────────────────────

/**
 * Dashboard refresh matching the collection interval for the common cron
 * shapes (`*\/N * * * *`, `0 * * * *`, `0 *\/N * * *`); anything else
 * refreshes every 15 minutes.
 */
export function refreshInterval(cron: string): string {
  const fields = cron.trim().split(/\s+/);
  if (fields.length !== 5) return DEFAULT_REFRESH;
  const [minute = '', hour = '', ...rest] = fields;
  if (!rest.every((f) => f === '*')) return DEFAULT_REFRESH;

  const everyMinutes = /^\*\/(\d+)$/.exec(minute);
  if (everyMinutes && hour === '*') return `${everyMinutes[1]}m`;
  if (minute === '*' && hour === '*') return '1m';
  if (/^\d+$/.test(minute)) {
    if (hour === '*') return '1h';
    const everyHours = /^\*\/(\d+)$/.exec(hour);
    if (everyHours) return `${everyHours[1]}h`;
  }
  return DEFAULT_REFRESH;
}

// ─── Panels ──────────────────────────────────────────────

function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return (slug || 'ticket-pulse').slice(0, 40);
}

function jiraPanels(config: PulseConfig): PanelSpec[] {
  const specs: PanelSpec[] = config.jira.counts.map((q) => ({ series: q.series, decimals: 0 }));
  for (const sum of config.jira.sums) {
    specs.push({ series: sum.series, decimals: sum.decimals });
  }
  if (config.jira.velocity) {
    specs.push({ series: config.jira.velocity.series, decimals: 1 });
  }
  return specs;
}

export function buildDashboard(config: PulseConfig): GrafanaDashboard {
  const panels: Panel[] = [];
  let nextId = 1;
  let y = 0;

  const sections: Array<[string, PanelSpec[]]> = [
    ['JIRA', jiraPanels(config)],
    ['GitHub', expandGitHubCounts(config).map((c) => ({ series: c.series, decimals: 0 }))],
  ];

  for (const [title, specs] of sections) {
    if (specs.length === 0) continue;

    panels.push({
      id: nextId++,
      type: 'row',
      title,
      collapsed: false,
      gridPos: { h: 1, w: 24, x: 0, y },
      panels: [],
    });
    y += 1;

    specs.forEach((spec, index) => {
      const column = index % PANELS_PER_ROW;
      if (index > 0 && column === 0) y += PANEL_HEIGHT;
      panels.push(timeSeriesPanel(nextId++, spec, config.grafana.datasource, {
        h: PANEL_HEIGHT,
        w: PANEL_WIDTH,
        x: column * PANEL_WIDTH,
        y,
      }));
    });
    y += PANEL_HEIGHT;
  }

  return {
    uid: slugify(config.grafana.title),
    title: config.grafana.title,
    tags: ['ticket-pulse'],
    timezone: 'browser',
    schemaVersion: SCHEMA_VERSION,
    refresh: refreshInterval(config.schedule.cron),
    time: { from: 'now-30d', to: 'now' },
    panels,
  };
}

function timeSeriesPanel(
  id: number,
  spec: PanelSpec,
  datasource: string,
  gridPos: TimeSeriesPanel['gridPos']
): TimeSeriesPanel {
  const defaults: TimeSeriesPanel['fieldConfig']['defaults'] = {
    custom: { lineInterpolation: 'stepAfter', fillOpacity: 10 },
  };
  if (spec.decimals !== undefined) {
    defaults.decimals = spec.decimals;
  }

  return {
    id,
    type: 'timeseries',
    title: spec.series,
    datasource,
    gridPos,
    targets: [
      {
        refId: 'A',
        query: buildInfluxQuery(parseSeriesKey(spec.series)),
        rawQuery: true,
        resultFormat: 'time_series',
      },
    ],
    fieldConfig: { defaults, overrides: [] },
    options: { legend: { showLegend: false } },
  };
}

/** Pretty-printed JSON, ready for Grafana's "Import dashboard" screen. */
export function renderDashboard(config: PulseConfig): string {
  return JSON.stringify(buildDashboard(config), null, 2) + '\n';
}
