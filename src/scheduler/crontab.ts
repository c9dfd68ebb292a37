/**
 * Crontab Installer
 *
 * Manages the one crontab line that triggers `ticket-pulse collect`.
 * The line is identified by a trailing `# ticket-pulse` marker so it can be
 * replaced or removed without touching the user's other entries.
 */

import { execFileSync } from 'node:child_process';

export const CRON_MARKER = '# ticket-pulse';

export interface CronLineOptions {
  schedule: string;
  /** Program and arguments, e.g. [process.execPath, '/opt/ticket-pulse/dist/cli.js', 'collect']. */
  command: string[];
  /** Environment to set on the line, e.g. { TICKET_PULSE_HOME: '/srv/pulse' }. */
  env?: Record<string, string>;
  /** Append stdout and stderr here instead of letting cron mail them. */
  logFile?: string;
}

/** Single-quote a word for /bin/sh when it contains anything special. */
export function shellQuote(word: string): string {
  if (/^[\w@%+=:,./-]+$/.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

export function buildCronLine(options: CronLineOptions): string {
  const env = Object.entries(options.env ?? {}).map(([k, v]) => `${k}=${shellQuote(v)}`);
  const command = options.command.map(shellQuote);
  const redirect = options.logFile ? [`>> ${shellQuote(options.logFile)} 2>&1`] : [];

  // cron turns an unescaped % in the command into a newline, even inside quotes.
  const commandPart = [...env, ...command, ...redirect].join(' ').replace(/%/g, '\\%');

  return [options.schedule, commandPart, CRON_MARKER].join(' ');
}

// ─── crontab(1) ──────────────────────────────────────────

function isNoCrontab(error: unknown): boolean {
  if (!error || typeof error !== 'object' || !('stderr' in error)) return false;
  return String(error.stderr).includes('no crontab');
}

/** Current user's crontab; empty when none exists yet. */
export function readCrontab(): string {
  try {
    return execFileSync('crontab', ['-l'], { encoding: 'utf-8', stdio: 'pipe' });
  } catch (error) {
    if (isNoCrontab(error)) return '';
    throw error;
  }
}

function writeCrontab(content: string): void {
  execFileSync('crontab', ['-'], { input: content, stdio: 'pipe' });
}

function isManaged(line: string): boolean {
  return line.trimEnd().endsWith(CRON_MARKER);
}

/** Lines of a crontab, without the empty string after the final newline. */
function splitLines(crontab: string): string[] {
  const lines = crontab.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}

/** The installed ticket-pulse line, or null. */
export function showCronJob(): string | null {
  return splitLines(readCrontab()).find(isManaged) ?? null;
}

/**
 * Install the line, replacing a previously installed one. Other entries,
 * comments and blank lines are kept as they are.
 * Returns true when an existing line was replaced.
 */
export function installCronJob(line: string): boolean {
  const lines = splitLines(readCrontab());
  const kept = lines.filter((l) => !isManaged(l));
  writeCrontab([...kept, line].join('\n') + '\n');
  return kept.length !== lines.length;
}

/** Remove the installed line. Returns false when none was installed. */
export function removeCronJob(): boolean {
  const lines = splitLines(readCrontab());
  const kept = lines.filter((l) => !isManaged(l));
  if (kept.length === lines.length) {
    return false;
  }
  writeCrontab(kept.length > 0 ? kept.join('\n') + '\n' : '');
  return true;
}
