/**
 * JIRA REST API Client
 *
 * Read-only client for the queries the collector runs: saved filter
 * lookup, issue counts, field sums, board sprints and sprint reports.
 * Works against JIRA Server/Data Center and Cloud (REST v2 + Agile API).
 *
 * Without credentials the client runs anonymously and only sees what
 * the instance exposes to anonymous users.
 */

import type { z } from 'zod';
import {
  JiraApiFilterSchema,
  JiraApiSearchResultSchema,
  JiraApiSprintListSchema,
  JiraApiSprintReportSchema,
  JiraApiUserSchema,
  type JiraApiSprint,
} from './types.js';
import {
  ApiClientError,
  NO_RESPONSE,
  describeTransportError,
  isRetryableStatus,
} from './errors.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const SEARCH_PAGE_SIZE = 100;
const SPRINT_PAGE_SIZE = 50;

export class JiraClientError extends ApiClientError {
  constructor(message: string, statusCode: number, retryable: boolean) {
    super(message, statusCode, retryable);
    this.name = 'JiraClientError';
  }
}

export class JiraClient {
  readonly baseUrl: string;
  private readonly authHeader: string | null;

  constructor(host: string, email?: string, apiToken?: string) {
    const withScheme = /^https?:\/\//.test(host) ? host : `https://${host}`;
    this.baseUrl = withScheme.replace(/\/+$/, '');
    this.authHeader =
      email && apiToken ? `Basic ${Buffer.from(`${email}:${apiToken}`).toString('base64')}` : null;
  }

  get authenticated(): boolean {
    return this.authHeader !== null;
  }

  /** Same instance, no Authorization header. */
  anonymous(): JiraClient {
    return new JiraClient(this.baseUrl);
  }

  // ─── Authentication ─────────────────────────────────────

  /** Used to validate credentials before a collection run. */
  async getMyself(): Promise<{ displayName: string }> {
    const user = await this.request('GET', '/rest/api/2/myself', JiraApiUserSchema);
    return { displayName: user.displayName };
  }

  // ─── Queries ────────────────────────────────────────────

  /** Look up the JQL behind a saved filter. */
  async getFilterJql(filterId: number): Promise<string> {
    const filter = await this.request('GET', `/rest/api/2/filter/${filterId}`, JiraApiFilterSchema);
    return filter.jql;
  }

  /** Number of issues matching the JQL. Fetches no issue bodies. */
  async countIssues(jql: string): Promise<number> {
    const result = await this.request('POST', '/rest/api/2/search', JiraApiSearchResultSchema, {
      jql,
      startAt: 0,
      maxResults: 0,
      fields: ['key'],
    });
    return result.total;
  }

  /**
   * Sum a numeric field over every issue matching the JQL.
   * Issues where the field is unset or not a number contribute nothing.
   */
  async sumField(jql: string, field: string): Promise<number> {
    let sum = 0;
    let startAt = 0;

    for (;;) {
      const page = await this.request('POST', '/rest/api/2/search', JiraApiSearchResultSchema, {
        jql,
        startAt,
        maxResults: SEARCH_PAGE_SIZE,
        fields: [field],
      });

      for (const issue of page.issues) {
        const value = issue.fields[field];
        if (typeof value === 'number' && Number.isFinite(value)) {
          sum += value;
        }
      }

      startAt += page.issues.length;
      if (page.issues.length === 0 || startAt >= page.total) {
        return sum;
      }
    }
  }

  /** Every sprint on a board, across all pages. */
  async getSprints(boardId: number): Promise<JiraApiSprint[]> {
    const sprints: JiraApiSprint[] = [];
    let startAt = 0;

    for (;;) {
      const page = await this.request(
        'GET',
        `/rest/agile/1.0/board/${boardId}/sprint?startAt=${startAt}&maxResults=${SPRINT_PAGE_SIZE}`,
        JiraApiSprintListSchema
      );
      sprints.push(...page.values);
      startAt += page.values.length;

      if (page.isLast !== false || page.values.length === 0) {
        return sprints;
      }
    }
  }

  /**
   * Sum of estimates of issues completed in a sprint, from the board's
   * sprint report. Null when the report carries no estimate.
   */
  async getCompletedEstimateSum(boardId: number, sprintId: number): Promise<number | null> {
    const report = await this.request(
      'GET',
      `/rest/greenhopper/1.0/rapid/charts/sprintreport?rapidViewId=${boardId}&sprintId=${sprintId}`,
      JiraApiSprintReportSchema
    );
    return report.contents.completedIssuesEstimateSum?.value ?? null;
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.authHeader) {
      headers['Authorization'] = this.authHeader;
    }
    const init: RequestInit = { method, headers, signal: controller.signal };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(body);
    }

    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}${path}`, init);
      } catch (error) {
        throw new JiraClientError(
          `JIRA request failed: ${describeTransportError(error)} for ${path}`,
          NO_RESPONSE,
          true
        );
      }

      if (!response.ok) {
        throw new JiraClientError(
          `JIRA API error: ${response.status} ${response.statusText} for ${path}`,
          response.status,
          isRetryableStatus(response.status)
        );
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new JiraClientError(
          `Unexpected JIRA response for ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
          response.status,
          false
        );
      }
      return parsed.data;
    } finally {
      clearTimeout(timeout);
    }
  }
}
