import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GrafanaClient, GrafanaClientError } from './grafana-client.js';
import type { GrafanaDashboard } from '../dashboard/types.js';

// Mock global fetch
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function jsonResponse(data: unknown, status = 200): Response {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Precondition Failed',
    json: () => Promise.resolve(data),
    headers: new Headers(),
  } as Response;
}

const dashboard: GrafanaDashboard = {
  uid: 'ticket-pulse',
  title: 'Ticket Pulse',
  tags: ['ticket-pulse'],
  timezone: 'browser',
  schemaVersion: 39,
  refresh: '15m',
  time: { from: 'now-30d', to: 'now' },
  panels: [],
};

describe('GrafanaClient', () => {
  let client: GrafanaClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new GrafanaClient('http://grafana.local:3000/', 'test-secret');
  });

  it('posts the dashboard with overwrite and a bearer token', async () => {
    mockFetch.mockResolvedValue(
      jsonResponse({ id: 3, uid: 'ticket-pulse', url: '/d/ticket-pulse/ticket-pulse', status: 'success', version: 2 })
    );

    const result = await client.importDashboard(dashboard);
    expect(result).toEqual({
      id: 3,
      uid: 'ticket-pulse',
      url: '/d/ticket-pulse/ticket-pulse',
      status: 'success',
      version: 2,
    });

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('http://grafana.local:3000/api/dashboards/db');
    expect(init.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(JSON.parse(init.body)).toEqual({
      dashboard: { ...dashboard, id: null },
      overwrite: true,
      message: 'Imported by ticket-pulse',
    });
  });

  it('passes folderUid and overwrite through', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ uid: 'ticket-pulse', url: '/d/x', status: 'success' }));

    await client.importDashboard(dashboard, { overwrite: false, folderUid: 'ops' });
    const body: unknown = JSON.parse(mockFetch.mock.calls[0]?.[1]?.body);
    expect(body).toMatchObject({ overwrite: false, folderUid: 'ops' });
  });

  it('throws on a rejected import', async () => {
    mockFetch.mockResolvedValue(jsonResponse({ message: 'version-mismatch' }, 412));

    const error = await client.importDashboard(dashboard).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GrafanaClientError);
    expect(error).toMatchObject({
      message: 'Grafana API error: 412 Precondition Failed importing "Ticket Pulse"',
      statusCode: 412,
      retryable: false,
    });
  });
});
