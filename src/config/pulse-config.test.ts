import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('node:fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
  writeFileSync: vi.fn(),
  mkdirSync: vi.fn(),
  chmodSync: vi.fn(),
}));

vi.mock('./paths.js', () => ({
  pulseConfigPath: vi.fn(() => '/mock/.ticket-pulse/pulse.json'),
  ensureConfigDir: vi.fn(() => '/mock/.ticket-pulse'),
  resolveConfigDir: vi.fn(() => '/mock/.ticket-pulse'),
}));

import {
  readPulseConfig,
  writePulseConfig,
  pulseConfigExists,
  createDefaultConfig,
  expandGitHubCounts,
  resolveInfluxConfig,
} from './pulse-config.js';
import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import type { PulseConfig } from './types.js';

const validConfig: PulseConfig = {
  version: 1,
  influx: { url: 'http://localhost:8086', database: 'inforad' },
  jira: {
    host: 'issues.example.com',
    counts: [
      { series: 'dc_inbox', filterId: 101 },
      { series: 'CA,priority=Blocker', jql: 'project = CA AND priority = Blocker' },
    ],
    sums: [{ series: 'backlog_depth', filterId: 202, field: 'customfield_100', decimals: 2 }],
    velocity: { series: 'sprint_velocity', boardId: 70, sprintPattern: 'team\\s.+', window: 3 },
  },
  github: {
    repos: ['acme/api'],
    counts: [{ series: 'bugs,repo=acme/web', query: 'repo:acme/web is:issue is:open label:bug' }],
  },
  schedule: { cron: '*/15 * * * *' },
  grafana: { url: 'http://localhost:3000', title: 'Ticket Pulse', datasource: 'InfluxDB' },
};

function mockConfigFile(content: unknown): void {
  vi.mocked(existsSync).mockReturnValue(true);
  vi.mocked(readFileSync).mockReturnValue(JSON.stringify(content));
}

describe('pulse-config', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('readPulseConfig', () => {
    it('returns null when the file does not exist', () => {
      vi.mocked(existsSync).mockReturnValue(false);
      expect(readPulseConfig()).toBeNull();
      expect(pulseConfigExists()).toBe(false);
    });

    it('reads a valid config unchanged', () => {
      mockConfigFile(validConfig);
      expect(readPulseConfig()).toEqual(validConfig);
    });

    it('fills defaults for omitted sections', () => {
      mockConfigFile({
        version: 1,
        influx: {},
        jira: {},
        github: {},
        schedule: {},
        grafana: {},
      });

      expect(readPulseConfig()).toEqual(createDefaultConfig());
    });

    it('defaults the velocity window to 3', () => {
      mockConfigFile({
        ...validConfig,
        jira: { ...validConfig.jira, velocity: { series: 'sprint_velocity', boardId: 70 } },
      });

      expect(readPulseConfig()?.jira.velocity?.window).toBe(3);
    });

    it('rejects a count with both filterId and jql', () => {
      mockConfigFile({
        ...validConfig,
        jira: { ...validConfig.jira, counts: [{ series: 'x', filterId: 1, jql: 'project = X' }] },
      });

      expect(() => readPulseConfig()).toThrow(/exactly one of filterId or jql/);
    });

    it('rejects a sum with neither filterId nor jql', () => {
      mockConfigFile({
        ...validConfig,
        jira: { ...validConfig.jira, sums: [{ series: 'x', field: 'customfield_1' }] },
      });

      expect(() => readPulseConfig()).toThrow(/exactly one of filterId or jql/);
    });

    it('rejects repos not in owner/repo form', () => {
      mockConfigFile({ ...validConfig, github: { repos: ['just-a-name'], counts: [] } });
      expect(() => readPulseConfig()).toThrow(/owner\/repo/);
    });

    it('rejects a series key that does not parse', () => {
      mockConfigFile({
        ...validConfig,
        jira: { ...validConfig.jira, counts: [{ series: 'CA,priority', jql: 'project = CA' }] },
      });

      expect(() => readPulseConfig()).toThrow(
        'Invalid series key \\"CA,priority\\": tag \\"priority\\" must be key=value'
      );
    });

    it('rejects a series configured twice across JIRA metrics', () => {
      mockConfigFile({
        ...validConfig,
        jira: {
          ...validConfig.jira,
          sums: [{ series: 'dc_inbox', filterId: 202, field: 'customfield_100' }],
        },
      });

      expect(() => readPulseConfig()).toThrow('series \\"dc_inbox\\" is configured more than once');
    });

    it('rejects an explicit GitHub count that repeats a repo open-PR series', () => {
      mockConfigFile({
        ...validConfig,
        github: {
          repos: ['acme/api'],
          counts: [{ series: 'pull_requests,state=open,repo=acme/api', query: 'repo:acme/api is:pr' }],
        },
      });

      expect(() => readPulseConfig()).toThrow(
        'series \\"pull_requests,state=open,repo=acme/api\\" is configured more than once'
      );
    });

    it('throws on invalid JSON', () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue('{ nope');
      expect(() => readPulseConfig()).toThrow();
    });
  });

  describe('writePulseConfig', () => {
    it('writes pretty-printed JSON with a trailing newline', () => {
      writePulseConfig(validConfig);

      expect(writeFileSync).toHaveBeenCalledWith(
        '/mock/.ticket-pulse/pulse.json',
        JSON.stringify(validConfig, null, 2) + '\n',
        'utf-8'
      );
    });

    it('refuses to write an invalid config', () => {
      const bad = { ...validConfig, influx: { url: 'not a url', database: 'inforad' } };
      expect(() => writePulseConfig(bad)).toThrow();
      expect(writeFileSync).not.toHaveBeenCalled();
    });
  });

  describe('expandGitHubCounts', () => {
    it('adds an open-PR count per repo ahead of explicit counts', () => {
      expect(expandGitHubCounts(validConfig)).toEqual([
        { series: 'pull_requests,repo=acme/api,state=open', query: 'repo:acme/api is:pr is:open' },
        { series: 'bugs,repo=acme/web', query: 'repo:acme/web is:issue is:open label:bug' },
      ]);
    });
  });

  describe('resolveInfluxConfig', () => {
    const saved = { url: process.env['INFLUX_URL'], db: process.env['INFLUX_DATABASE'] };

    beforeEach(() => {
      delete process.env['INFLUX_URL'];
      delete process.env['INFLUX_DATABASE'];
    });

    afterEach(() => {
      if (saved.url === undefined) delete process.env['INFLUX_URL'];
      else process.env['INFLUX_URL'] = saved.url;
      if (saved.db === undefined) delete process.env['INFLUX_DATABASE'];
      else process.env['INFLUX_DATABASE'] = saved.db;
    });

    it('uses the file values by default', () => {
      expect(resolveInfluxConfig(validConfig)).toEqual({
        url: 'http://localhost:8086',
        database: 'inforad',
      });
    });

    it('lets env vars and credentials override the file', () => {
      process.env['INFLUX_URL'] = 'http://influx.internal:8086';
      process.env['INFLUX_DATABASE'] = 'metrics';

      expect(resolveInfluxConfig(validConfig, { username: 'writer', password: 'test-secret' })).toEqual({
        url: 'http://influx.internal:8086',
        database: 'metrics',
        username: 'writer',
        password: 'test-secret',
      });
    });
  });
});
