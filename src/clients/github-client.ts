/**
 * GitHub REST API Client
 *
 * Counts issues and pull requests through the search API. A search with
 * per_page=1 returns total_count without paging through results, so every
 * count costs one request regardless of size.
 */

import type { z } from 'zod';
import { GitHubApiSearchCountSchema, GitHubApiUserSchema } from './types.js';
import {
  ApiClientError,
  NO_RESPONSE,
  describeTransportError,
  isRetryableStatus,
} from './errors.js';

const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;

export class GitHubClientError extends ApiClientError {
  constructor(message: string, statusCode: number, retryable: boolean) {
    super(message, statusCode, retryable);
    this.name = 'GitHubClientError';
  }
}

export class GitHubClient {
  private readonly apiUrl: string;

  constructor(
    private readonly token: string | null,
    apiUrl: string = GITHUB_API
  ) {
    this.apiUrl = apiUrl.replace(/\/+$/, '');
  }

  /** The token's user. Used to validate the token is working. */
  async getAuthenticatedUser(): Promise<{ login: string; name: string | null }> {
    const user = await this.get('/user', GitHubApiUserSchema);
    return { login: user.login, name: user.name };
  }

  /**
   * Number of issues/PRs matching a search query, e.g.
   * `repo:acme/api is:pr is:open`.
   */
  async countIssues(query: string): Promise<number> {
    const params = new URLSearchParams({ q: query, per_page: '1' });
    const result = await this.get(`/search/issues?${params.toString()}`, GitHubApiSearchCountSchema);
    return result.total_count;
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), DEFAULT_TIMEOUT_MS);

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    try {
      let response: Response;
      try {
        response = await fetch(`${this.apiUrl}${path}`, { headers, signal: controller.signal });
      } catch (error) {
        throw new GitHubClientError(
          `GitHub request failed: ${describeTransportError(error)} for ${path}`,
          NO_RESPONSE,
          true
        );
      }

      if (!response.ok) {
        // An exhausted rate limit comes back as 403 with x-ratelimit-remaining: 0.
        const rateLimited =
          response.status === 403 && response.headers.get('x-ratelimit-remaining') === '0';
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${path}`,
          response.status,
          rateLimited || isRetryableStatus(response.status)
        );
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new GitHubClientError(
          `Unexpected GitHub response for ${path}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
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
