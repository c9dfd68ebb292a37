/**
 * InfluxDB Line Protocol
 *
 * Series keys are written the way InfluxDB prints them,
 * `measurement[,tag=value...]`, e.g. `CA,priority=Blocker`. A backslash
 * escapes a literal comma, equals sign or space inside a name.
 *
 * Every point carries a single float field named `value` so counts and
 * sums of the same measurement never conflict on field type.
 */

export interface SeriesKey {
  measurement: string;
  tags: Record<string, string>;
}

export interface Point extends SeriesKey {
  value: number;
  /** Unix timestamp in seconds (written with precision=s). */
  timestamp: number;
}

export class SeriesKeyError extends Error {
  constructor(key: string, reason: string) {
    super(`Invalid series key "${key}": ${reason}`);
    this.name = 'SeriesKeyError';
  }
}

// ─── Parsing ─────────────────────────────────────────────

/** Split on `sep` wherever it is not backslash-escaped. Escapes stay in place. */
function splitUnescaped(input: string, sep: string): string[] {
  const parts: string[] = [];
  let start = 0;

  for (let i = 0; i < input.length; i++) {
    const char = input.charAt(i);
    if (char === '\\') {
      i++;
    } else if (char === sep) {
      parts.push(input.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(input.slice(start));
  return parts;
}

function unescapeName(text: string): string {
  return text.replace(/\\(.)/g, '$1');
}

export function parseSeriesKey(key: string): SeriesKey {
  const [rawMeasurement = '', ...rawTags] = splitUnescaped(key.trim(), ',');
  const measurement = unescapeName(rawMeasurement);
  if (!measurement) {
    throw new SeriesKeyError(key, 'measurement is empty');
  }

  const tags: Record<string, string> = {};
  for (const rawTag of rawTags) {
    const pair = splitUnescaped(rawTag, '=').map(unescapeName);
    const [tagKey, tagValue] = pair;
    if (pair.length !== 2 || !tagKey || !tagValue) {
      throw new SeriesKeyError(key, `tag "${rawTag}" must be key=value`);
    }
    if (tagKey in tags) {
      throw new SeriesKeyError(key, `tag "${tagKey}" is repeated`);
    }
    tags[tagKey] = tagValue;
  }

  return { measurement, tags };
}

// ─── Formatting ──────────────────────────────────────────

function escapeMeasurement(name: string): string {
  return name.replace(/[, ]/g, (c) => `\\${c}`);
}

function escapeTag(text: string): string {
  return text.replace(/[,= ]/g, (c) => `\\${c}`);
}

function formatFloat(value: number): string {
  return Number.isInteger(value) ? `${value}.0` : String(value);
}

/** `measurement,tag=value...` with tags sorted by key, as InfluxDB stores them. */
export function formatSeries(series: SeriesKey): string {
  const tagSet = Object.keys(series.tags)
    .sort()
    .map((key) => `,${escapeTag(key)}=${escapeTag(series.tags[key] ?? '')}`)
    .join('');
  return `${escapeMeasurement(series.measurement)}${tagSet}`;
}

/** One line of line protocol. */
export function formatPoint(point: Point): string {
  if (!Number.isFinite(point.value)) {
    throw new RangeError(`Cannot write non-finite value ${point.value} to ${point.measurement}`);
  }
  return `${formatSeries(point)} value=${formatFloat(point.value)} ${point.timestamp}`;
}
