/**
 * InfluxDB 1.x HTTP Client
 *
 * Writes points through the /write endpoint in line protocol and manages
 * the target database through /query. Credentials, when configured, are
 * sent as HTTP basic auth.
 */

import type { InfluxConfig } from '../config/types.js';
import {
  ApiClientError,
  NO_RESPONSE,
  describeTransportError,
  isRetryableStatus,
} from './errors.js';
import { formatPoint, type Point } from './line-protocol.js';

const DEFAULT_TIMEOUT_MS = 10_000;

export class InfluxClientError extends ApiClientError {
  constructor(message: string, statusCode: number, retryable: boolean) {
    super(message, statusCode, retryable);
    this.name = 'InfluxClientError';
  }
}

export class InfluxClient {
  private readonly baseUrl: string;

  constructor(private readonly config: InfluxConfig) {
    this.baseUrl = config.url.replace(/\/+$/, '');
  }

  get database(): string {
    return this.config.database;
  }

  /** Resolves when the server answers /ping with 204. */
  async ping(): Promise<void> {
    await this.send('GET', '/ping', [204]);
  }

  /** CREATE DATABASE is a no-op on the server when it already exists. */
  async createDatabase(): Promise<void> {
    const body = new URLSearchParams({ q: `CREATE DATABASE "${this.config.database.replace(/"/g, '\\"')}"` });
    await this.send('POST', '/query', [200], body);
  }

  /**
   * Write a batch of points in one request, timestamps in seconds.
   * An empty batch is not sent.
   */
  async write(points: Point[]): Promise<void> {
    if (points.length === 0) return;

    const params = new URLSearchParams({ db: this.config.database, precision: 's' });
    const body = points.map(formatPoint).join('\n');
    await this.send('POST', `/write?${params.toString()}`, [204], body);
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async send(
    method: 'GET' | 'POST',
    path: string,
    expected: number[],
    body?: string | URLSearchParams
  ): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);

    const headers: Record<string, string> = {};
    if (this.config.username) {
      const pair = `${this.config.username}:${this.config.password ?? ''}`;
      headers['Authorization'] = `Basic ${Buffer.from(pair).toString('base64')}`;
    }
    if (typeof body === 'string') {
      headers['Content-Type'] = 'text/plain; charset=utf-8';
    }

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}${path}`, {
          method,
          headers,
          body,
          signal: controller.signal,
        });
      } catch (error) {
        throw new InfluxClientError(
          `InfluxDB unreachable at ${this.baseUrl}: ${describeTransportError(error)}`,
          NO_RESPONSE,
          true
        );
      }

      if (!expected.includes(response.status)) {
        const detail = await readErrorDetail(response);
        throw new InfluxClientError(
          `InfluxDB error: ${response.status} ${response.statusText} for ${method} ${path.split('?')[0]}${detail}`,
          response.status,
          isRetryableStatus(response.status)
        );
      }
    } finally {
      clearTimeout(timeout);
    }
  }
}

/** InfluxDB reports failures as `{"error": "..."}`; other bodies are passed through. */
async function readErrorDetail(response: Response): Promise<string> {
  const text = (await response.text()).trim();
  if (!text) return '';

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return `: ${text}`;
  }
  if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') {
    return `: ${parsed.error}`;
  }
  return `: ${text}`;
}
