/**
 * Grafana HTTP API Client
 *
 * Imports the generated dashboard through POST /api/dashboards/db using a
 * service-account token or API key.
 */

import type { GrafanaDashboard } from '../dashboard/types.js';
import { GrafanaImportResultSchema, type GrafanaImportResult } from './types.js';
import {
  ApiClientError,
  NO_RESPONSE,
  describeTransportError,
  isRetryableStatus,
} from './errors.js';

const DEFAULT_TIMEOUT_MS = 30_000;

export class GrafanaClientError extends ApiClientError {
  constructor(message: string, statusCode: number, retryable: boolean) {
    super(message, statusCode, retryable);
    this.name = 'GrafanaClientError';
  }
}

export class GrafanaClient {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly apiKey: string
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  /**
   * Create or update a dashboard. With overwrite, an existing dashboard
   * with the same uid is replaced instead of rejected with 412.
   */
  async importDashboard(
    dashboard: GrafanaDashboard,
    options: { overwrite?: boolean; folderUid?: string } = {}
  ): Promise<GrafanaImportResult> {
    const payload: Record<string, unknown> = {
      dashboard: { ...dashboard, id: null },
      overwrite: options.overwrite ?? true,
      message: 'Imported by ticket-pulse',
    };
    if (options.folderUid) {
      payload['folderUid'] = options.folderUid;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/api/dashboards/db`, {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            Accept: 'application/json',
            'Content-Type': 'application/json',
          },
          body: JSON.stringify(payload),
          signal: controller.signal,
        });
      } catch (error) {
        throw new GrafanaClientError(
          `Grafana unreachable at ${this.baseUrl}: ${describeTransportError(error)}`,
          NO_RESPONSE,
          true
        );
      }

      if (!response.ok) {
        throw new GrafanaClientError(
          `Grafana API error: ${response.status} ${response.statusText} importing "${dashboard.title}"`,
          response.status,
          isRetryableStatus(response.status)
        );
      }

      const parsed = GrafanaImportResultSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GrafanaClientError('Unexpected Grafana import response', response.status, false);
      }
      return parsed.data;
    } finally {
      clearTimeout(timeout);
    }
  }
}
