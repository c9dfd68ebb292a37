import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  collectGitHubMetrics,
  computeSprintVelocity,
  roundTo,
  runCollection,
  type CollectorDeps,
} from './collector.js';
import { GitHubClient, GitHubClientError } from '../clients/github-client.js';
import { JiraClient, JiraClientError } from '../clients/jira-client.js';
import { InfluxClientError, type InfluxClient } from '../clients/influx-client.js';
import type { HistoryStore } from '../history/history-store.js';
import { createDefaultConfig } from '../config/pulse-config.js';
import type { PulseConfig } from '../config/types.js';

function createMockJiraClient(authenticated = false) {
  return {
    authenticated,
    getMyself: vi.fn(),
    anonymous: vi.fn(),
    getFilterJql: vi.fn(),
    countIssues: vi.fn(),
    sumField: vi.fn(),
    getSprints: vi.fn(),
    getCompletedEstimateSum: vi.fn(),
  };
}

function createMockGitHubClient() {
  return { countIssues: vi.fn() };
}

type MockJira = ReturnType<typeof createMockJiraClient>;
type MockGitHub = ReturnType<typeof createMockGitHubClient>;

function asJira(mock: MockJira): JiraClient {
  return mock as unknown as JiraClient;
}

function asGitHub(mock: MockGitHub): GitHubClient {
  return mock as unknown as GitHubClient;
}

function makeConfig(): PulseConfig {
  const config = createDefaultConfig();
  config.jira = {
    host: 'jira.example.com',
    counts: [
      { series: 'CA,priority=Blocker', filterId: 10100 },
      { series: 'CA,priority=Critical', filterId: 10100 },
    ],
    sums: [{ series: 'points', jql: 'project = CA', field: 'customfield_10002', decimals: 1 }],
  };
  config.github = { repos: ['acme/api'], counts: [] };
  return config;
}

describe('collector', () => {
  let jira: MockJira;
  let github: MockGitHub;
  let influx: { write: ReturnType<typeof vi.fn> };
  let history: { recordRun: ReturnType<typeof vi.fn> };
  let deps: CollectorDeps;

  beforeEach(() => {
    jira = createMockJiraClient();
    github = createMockGitHubClient();
    influx = { write: vi.fn().mockResolvedValue(undefined) };
    history = { recordRun: vi.fn().mockReturnValue(1) };

    jira.getFilterJql.mockResolvedValue('priority = Blocker');
    jira.countIssues.mockResolvedValue(4);
    jira.sumField.mockResolvedValue(12.345);
    github.countIssues.mockResolvedValue(7);

    deps = {
      config: makeConfig(),
      jira: asJira(jira),
      github: asGitHub(github),
      influx: influx as unknown as InfluxClient,
      history: history as unknown as HistoryStore,
      now: () => 1_700_000_000_500,
      retry: { delayMs: 0 },
    };
  });

  describe('runCollection', () => {
    it('writes every metric as one batch with a shared timestamp', async () => {
      const result = await runCollection(deps);

      expect(result).toEqual({
        timestamp: 1_700_000_000,
        dryRun: false,
        samples: [
          { series: 'CA,priority=Blocker', source: 'jira', value: 4 },
          { series: 'CA,priority=Critical', source: 'jira', value: 4 },
          { series: 'points', source: 'jira', value: 12.3 },
          { series: 'pull_requests,repo=acme/api,state=open', source: 'github', value: 7 },
        ],
        failures: [],
      });

      expect(influx.write).toHaveBeenCalledTimes(1);
      expect(influx.write).toHaveBeenCalledWith([
        { measurement: 'CA', tags: { priority: 'Blocker' }, value: 4, timestamp: 1_700_000_000 },
        { measurement: 'CA', tags: { priority: 'Critical' }, value: 4, timestamp: 1_700_000_000 },
        { measurement: 'points', tags: {}, value: 12.3, timestamp: 1_700_000_000 },
        {
          measurement: 'pull_requests',
          tags: { repo: 'acme/api', state: 'open' },
          value: 7,
          timestamp: 1_700_000_000,
        },
      ]);
      expect(history.recordRun).toHaveBeenCalledWith(result);
    });

    it('looks up a shared saved filter once', async () => {
      await runCollection(deps);

      expect(jira.getFilterJql).toHaveBeenCalledTimes(1);
      expect(jira.getFilterJql).toHaveBeenCalledWith(10100);
      expect(jira.countIssues).toHaveBeenCalledWith('priority = Blocker');
      expect(jira.sumField).toHaveBeenCalledWith('project = CA', 'customfield_10002');
      expect(github.countIssues).toHaveBeenCalledWith('repo:acme/api is:pr is:open');
    });

    it('writes nothing on a dry run', async () => {
      const result = await runCollection(deps, { dryRun: true });

      expect(result.dryRun).toBe(true);
      expect(result.samples).toHaveLength(4);
      expect(influx.write).not.toHaveBeenCalled();
      expect(history.recordRun).not.toHaveBeenCalled();
    });

    it('keeps the other metrics when one fails', async () => {
      github.countIssues.mockRejectedValue(
        new GitHubClientError('GitHub API error: 422 Unprocessable Entity for /search/issues', 422, false)
      );

      const result = await runCollection(deps);

      expect(result.samples.map((s) => s.series)).toEqual([
        'CA,priority=Blocker',
        'CA,priority=Critical',
        'points',
      ]);
      expect(result.failures).toEqual([
        {
          series: 'pull_requests,repo=acme/api,state=open',
          source: 'github',
          error: 'GitHub API error: 422 Unprocessable Entity for /search/issues',
        },
      ]);
      expect(github.countIssues).toHaveBeenCalledTimes(1);
      expect(influx.write).toHaveBeenCalledTimes(1);
    });

    it('retries transient errors', async () => {
      github.countIssues
        .mockRejectedValueOnce(new GitHubClientError('GitHub API error: 503', 503, true))
        .mockResolvedValue(9);

      const result = await runCollection(deps);

      expect(result.failures).toEqual([]);
      expect(result.samples[3]).toEqual({
        series: 'pull_requests,repo=acme/api,state=open',
        source: 'github',
        value: 9,
      });
      expect(github.countIssues).toHaveBeenCalledTimes(2);
    });

    it('reports permission errors as authorization errors', async () => {
      jira.sumField.mockRejectedValue(new JiraClientError('JIRA API error: 403 Forbidden', 403, false));

      const result = await runCollection(deps);
      expect(result.failures).toEqual([
        { series: 'points', source: 'jira', error: 'authorization error (403)' },
      ]);
    });

    it('fails a metric with an invalid series key without querying', async () => {
      deps.config.jira.counts = [{ series: 'CA,priority', jql: 'priority = Blocker' }];
      deps.config.jira.sums = [];

      const result = await runCollection(deps);
      expect(result.failures).toEqual([
        {
          series: 'CA,priority',
          source: 'jira',
          error: 'Invalid series key "CA,priority": tag "priority" must be key=value',
        },
      ]);
      expect(jira.countIssues).not.toHaveBeenCalled();
    });

    it('fails every JIRA metric when no host is configured', async () => {
      deps.jira = null;

      const result = await runCollection(deps);
      expect(result.failures).toEqual([
        { series: 'CA,priority=Blocker', source: 'jira', error: 'JIRA host not configured' },
        { series: 'CA,priority=Critical', source: 'jira', error: 'JIRA host not configured' },
        { series: 'points', source: 'jira', error: 'JIRA host not configured' },
      ]);
      expect(result.samples).toHaveLength(1);
    });

    it('falls back to anonymous JIRA access when credentials are rejected', async () => {
      const authed = createMockJiraClient(true);
      const anonymous = createMockJiraClient();
      authed.getMyself.mockRejectedValue(new JiraClientError('JIRA API error: 401 Unauthorized', 401, false));
      authed.anonymous.mockReturnValue(asJira(anonymous));
      anonymous.getFilterJql.mockResolvedValue('priority = Blocker');
      anonymous.countIssues.mockResolvedValue(2);
      anonymous.sumField.mockResolvedValue(5);
      deps.jira = asJira(authed);

      const result = await runCollection(deps);

      expect(result.failures).toEqual([]);
      expect(result.samples.slice(0, 3).map((s) => s.value)).toEqual([2, 2, 5]);
      expect(authed.countIssues).not.toHaveBeenCalled();
    });

    it('retries a transient InfluxDB write failure', async () => {
      influx.write
        .mockRejectedValueOnce(
          new InfluxClientError('InfluxDB error: 503 Service Unavailable for POST /write', 503, true)
        )
        .mockResolvedValue(undefined);

      const result = await runCollection(deps);

      expect(influx.write).toHaveBeenCalledTimes(2);
      expect(influx.write.mock.calls[1]?.[0]).toEqual(influx.write.mock.calls[0]?.[0]);
      expect(history.recordRun).toHaveBeenCalledWith(result);
    });

    it('does not retry a rejected InfluxDB write', async () => {
      influx.write.mockRejectedValue(
        new InfluxClientError('InfluxDB error: 400 Bad Request for POST /write', 400, false)
      );

      await expect(runCollection(deps)).rejects.toThrow('InfluxDB error: 400');
      expect(influx.write).toHaveBeenCalledTimes(1);
    });

    it('rejects when the InfluxDB write fails and records no history', async () => {
      influx.write.mockRejectedValue(new Error('InfluxDB unreachable at http://localhost:8086: fetch failed'));

      await expect(runCollection(deps)).rejects.toThrow('InfluxDB unreachable');
      expect(history.recordRun).not.toHaveBeenCalled();
    });
  });

  describe('collectGitHubMetrics', () => {
    it('returns an empty batch without counts', async () => {
      await expect(collectGitHubMetrics(asGitHub(github), [])).resolves.toEqual({
        samples: [],
        failures: [],
      });
    });
  });

  describe('computeSprintVelocity', () => {
    beforeEach(() => {
      jira.getSprints.mockResolvedValue([
        { id: 1, name: 'CA Sprint 1', state: 'closed' },
        { id: 2, name: 'CA Sprint 2', state: 'closed' },
        { id: 3, name: 'Other 3', state: 'closed' },
        { id: 4, name: 'CA Sprint 4', state: 'CLOSED' },
        { id: 5, name: 'CA Sprint 5', state: 'active' },
      ]);
    });

    it('averages the latest closed sprints matching the pattern', async () => {
      const estimates: Record<number, number | null> = { 4: 30, 2: null, 1: 21 };
      jira.getCompletedEstimateSum.mockImplementation((_board: number, sprintId: number) =>
        Promise.resolve(estimates[sprintId] ?? null)
      );

      const velocity = await computeSprintVelocity(asJira(jira), {
        series: 'velocity',
        boardId: 7,
        sprintPattern: 'CA Sprint',
        window: 3,
      });

      expect(velocity).toBe(25.5);
      expect(jira.getCompletedEstimateSum.mock.calls).toEqual([
        [7, 4],
        [7, 2],
        [7, 1],
      ]);
    });

    it('fails when no sprint has an estimate', async () => {
      jira.getCompletedEstimateSum.mockResolvedValue(null);

      await expect(
        computeSprintVelocity(asJira(jira), { series: 'velocity', boardId: 7, window: 2 })
      ).rejects.toThrow('no completed sprint estimates');
    });
  });

  describe('roundTo', () => {
    it('rounds to the given decimals', () => {
      expect(roundTo(12.345, 1)).toBe(12.3);
      expect(roundTo(12.36, 1)).toBe(12.4);
      expect(roundTo(7, 2)).toBe(7);
    });

    it('rounds ties to even', () => {
      expect(roundTo(0.125, 2)).toBe(0.12);
      expect(roundTo(0.375, 2)).toBe(0.38);
      expect(roundTo(25.25, 1)).toBe(25.2);
      expect(roundTo(2.5, 0)).toBe(2);
      expect(roundTo(3.5, 0)).toBe(4);
      expect(roundTo(-2.5, 0)).toBe(-2);
    });
  });
});
