/**
 * Plain-text rendering of collection results and history, shared by the
 * CLI and the MCP tools.
 */

import type { CollectionResult } from '../orchestrator/types.js';
import type { RunRecord, StoredSample } from '../history/types.js';

function isoTime(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString();
}

function pad(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) =>
    row
      .map((cell, i) => (i === row.length - 1 ? cell : cell.padEnd(widths[i] ?? 0)))
      .join('  ')
  );
}

export function formatCollectionResult(result: CollectionResult): string {
  const lines: string[] = [];
  const verb = result.dryRun ? 'Retrieved (dry run, not written)' : 'Written';
  lines.push(`${verb} at ${isoTime(result.timestamp)}: ${result.samples.length} metric(s)`);

  if (result.samples.length > 0) {
    lines.push('');
    lines.push(...pad(result.samples.map((s) => [s.source, s.series, String(s.value)])));
  }

  if (result.failures.length > 0) {
    lines.push('');
    lines.push(`Failed: ${result.failures.length} metric(s)`);
    lines.push(...pad(result.failures.map((f) => [f.source, f.series, f.error])));
  }

  return lines.join('\n');
}

export function formatLatestValues(samples: StoredSample[]): string {
  if (samples.length === 0) {
    return 'No samples recorded yet. Run "ticket-pulse collect" first.';
  }
  return pad(samples.map((s) => [s.series, String(s.value), isoTime(s.timestamp)])).join('\n');
}

export function formatSeriesHistory(series: string, samples: StoredSample[]): string {
  if (samples.length === 0) {
    return `No samples recorded for ${series}.`;
  }
  return [series, ...pad(samples.map((s) => [isoTime(s.timestamp), String(s.value)]))].join('\n');
}

export function formatRuns(runs: RunRecord[]): string {
  if (runs.length === 0) {
    return 'No collection runs recorded yet.';
  }
  return pad(
    runs.map((r) => [
      `#${r.id}`,
      isoTime(r.timestamp),
      `${r.sampleCount} written`,
      r.failureCount > 0 ? `${r.failureCount} failed` : '',
    ])
  )
    .map((line) => line.trimEnd())
    .join('\n');
}
