export interface ParsedArgs {
  command: string;
  positional: string[];
  flags: Record<string, string>;
}

/** Flags that take the following argument as their value. */
const VALUE_FLAGS = new Set(['out', 'series', 'limit', 'log']);

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const command = args[0] ?? 'help';
  const positional: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = 1; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      // Boolean flags (--dry-run) vs value flags (--out file)
      if (next !== undefined && !next.startsWith('--') && VALUE_FLAGS.has(key)) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = '';
      }
    } else {
      positional.push(arg);
    }
  }

  return { command, positional, flags };
}

export function parseLimit(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const limit = Number.parseInt(raw, 10);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`--limit must be a positive integer, got "${raw}"`);
  }
  return limit;
}
