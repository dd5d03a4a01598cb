/**
 * E2E Tests: version-sync run
 *
 * Drives the run command end to end (service list parsing, Socket.io
 * session, tag reconciliation) against the in-process Uptime Kuma stand-in.
 * Version endpoints are replaced by a lookup table.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { CommandContext } from '../../src/types.js';
import { runCommand, type RunCommandOptions } from '../../src/commands/run.js';
import { validateCommand } from '../../src/commands/validate.js';
import { createKumaConnector } from '../../src/api/client.js';
import { FetchError } from '../../src/api/errors.js';
import { createLogger } from '../../src/api/logger.js';
import { FakeKumaServer, TEST_PASSWORD, TEST_TOKEN, TEST_USERNAME } from './harness.js';

// =============================================================================
// Helpers
// =============================================================================

const quietLogger = createLogger({ level: 'error' });

function createTestContext(): CommandContext {
  return {
    options: { json: true, verbose: false },
    outputFormat: 'json',
  };
}

function servicesJson(...services: Array<Record<string, unknown>>): string {
  return JSON.stringify(services);
}

function fakeVersions(versions: Record<string, string>) {
  return vi.fn(async (endpoint: URL): Promise<string> => {
    const version = versions[endpoint.host];
    if (version === undefined) {
      throw new FetchError(endpoint.toString(), 'HTTP 404', { status: 404 });
    }
    return version;
  });
}

function run(
  server: FakeKumaServer,
  options: RunCommandOptions,
  fetchVersion: (endpoint: URL) => Promise<string>
) {
  return runCommand(
    createTestContext(),
    { username: 'admin', password: TEST_PASSWORD, url: 'http://kuma.test', ...options },
    {
      connector: createKumaConnector({ logger: quietLogger, openTransport: server.openTransport }),
      fetchVersion,
      logger: quietLogger,
    }
  );
}

// =============================================================================
// Tests
// =============================================================================

describe('version-sync run', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('replaces the version tag of a deployed service', async () => {
    const server = new FakeKumaServer({
      monitors: [{ id: 12, name: 'API Service', tags: ['version-1.0.0', 'env-prod'] }],
    });

    const result = await run(
      server,
      { servicesJson: servicesJson({ monitorName: 'API Service', versionEndpoint: 'http://api/version' }) },
      fakeVersions({ api: '1.1.0' })
    );

    expect(result.success).toBe(true);
    expect(result.message).toBe('Synced 1 service(s), 1 changed');
    expect(server.tagsOf(12)).toEqual(['env-prod', 'version-1.1.0']);
    expect(server.mutations().map((request) => request.event)).toEqual([
      'deleteMonitorTag',
      'addTag',
      'addMonitorTag',
    ]);
    expect(server.connections).toBe(1);
    expect(server.closed).toBe(1);
  });

  it('changes nothing when run again', async () => {
    const server = new FakeKumaServer({
      monitors: [{ id: 12, name: 'API Service', tags: ['version-1.0.0'] }],
    });
    const options = {
      servicesJson: servicesJson({ monitorName: 'API Service', versionEndpoint: 'http://api/version' }),
    };

    await run(server, options, fakeVersions({ api: '1.1.0' }));
    const mutationsAfterFirstRun = server.mutations().length;
    const second = await run(server, options, fakeVersions({ api: '1.1.0' }));

    expect(second.success).toBe(true);
    expect(second.data?.changed).toBe(0);
    expect(server.mutations()).toHaveLength(mutationsAfterFirstRun);
    expect(server.tagsOf(12)).toEqual(['version-1.1.0']);
  });

  it('reports an unreachable version endpoint and continues', async () => {
    const server = new FakeKumaServer({
      monitors: [
        { id: 1, name: 'API Service', tags: ['version-1.0.0'] },
        { id: 2, name: 'Web Frontend', tags: [] },
      ],
    });

    const result = await run(
      server,
      {
        servicesJson: servicesJson(
          { monitorName: 'API Service', versionEndpoint: 'http://api/version' },
          { monitorName: 'Web Frontend', versionEndpoint: 'http://web/version' }
        ),
      },
      fakeVersions({ web: '4.2.0' })
    );

    expect(result.success).toBe(false);
    expect(result.message).toBe('1 of 2 service(s) failed');
    expect(result.errors).toEqual([
      'API Service: Failed to fetch version from http://api/version: HTTP 404',
    ]);
    expect(server.tagsOf(1)).toEqual(['version-1.0.0']);
    expect(server.tagsOf(2)).toEqual(['version-4.2.0']);
  });

  it('reports a monitor that does not exist', async () => {
    const server = new FakeKumaServer({ monitors: [{ id: 1, name: 'API Service' }] });

    const result = await run(
      server,
      { servicesJson: servicesJson({ monitorName: 'Nonexistent', versionEndpoint: 'http://x/version' }) },
      fakeVersions({ x: '1.0.0' })
    );

    expect(result.success).toBe(false);
    expect(result.data?.results).toEqual([
      expect.objectContaining({
        status: 'failure',
        monitorName: 'Nonexistent',
        step: 'resolve',
        kind: 'MonitorNotFound',
      }),
    ]);
    expect(server.mutations()).toEqual([]);
  });

  it('aborts the run when authentication fails', async () => {
    const server = new FakeKumaServer({ monitors: [{ id: 1, name: 'API Service' }] });
    const fetchVersion = fakeVersions({ api: '1.0.0' });

    const result = await run(
      server,
      {
        password: 'wrong',
        servicesJson: servicesJson({ monitorName: 'API Service', versionEndpoint: 'http://api/version' }),
      },
      fetchVersion
    );

    expect(result).toEqual({
      success: false,
      message:
        'Authentication with Uptime Kuma failed: Authentication failed: Incorrect username or password.',
    });
    expect(fetchVersion).not.toHaveBeenCalled();
    expect(server.mutations()).toEqual([]);
  });

  it('authenticates with a token when one is configured', async () => {
    const server = new FakeKumaServer({ monitors: [{ id: 1, name: 'API Service' }] });

    const result = await run(
      server,
      {
        password: undefined,
        apiToken: TEST_TOKEN,
        servicesJson: servicesJson({ monitorName: 'API Service', versionEndpoint: 'http://api/version' }),
      },
      fakeVersions({ api: '2.0.0' })
    );

    expect(result.success).toBe(true);
    expect(server.requests[0]).toEqual({
      event: 'login',
      args: [{ username: TEST_USERNAME, password: TEST_TOKEN, token: '' }],
    });
    expect(server.tagsOf(1)).toEqual(['version-2.0.0']);
  });

  it('reconciles valid entries and reports invalid ones', async () => {
    const server = new FakeKumaServer({ monitors: [{ id: 1, name: 'API Service' }] });

    const result = await run(
      server,
      {
        servicesJson: servicesJson(
          { monitorName: 'API Service', versionEndpoint: 'http://api/version' },
          { versionEndpoint: 'http://orphan/version' }
        ),
      },
      fakeVersions({ api: '1.0.0' })
    );

    expect(result.success).toBe(false);
    expect(result.data?.total).toBe(2);
    expect(result.data?.succeeded).toBe(1);
    expect(result.errors).toEqual(['services[1]: Invalid service config: missing monitorName']);
    expect(server.tagsOf(1)).toEqual(['version-1.0.0']);
  });

  it('rejects a nested prefix on the same monitor and stays converged', async () => {
    const server = new FakeKumaServer({
      monitors: [{ id: 5, name: 'API Service', tags: ['version-1.0', 'version-beta-2.0'] }],
    });
    const options = {
      servicesJson: servicesJson(
        { monitorName: 'API Service', versionEndpoint: 'http://stable/version' },
        {
          monitorName: 'API Service',
          versionEndpoint: 'http://beta/version',
          tagPrefix: 'version-beta',
        }
      ),
    };
    const versions = { stable: 'beta-7', beta: '3.0' };

    const first = await run(server, options, fakeVersions(versions));

    expect(first.success).toBe(false);
    expect(first.errors).toEqual([
      "API Service: Invalid service config: tagPrefix 'version-beta' overlaps 'version' of services[0] on the same monitor",
    ]);
    expect(server.tagsOf(5)).toEqual(['version-beta-7']);

    const mutationsAfterFirstRun = server.mutations().length;
    await run(server, options, fakeVersions(versions));

    expect(server.mutations()).toHaveLength(mutationsAfterFirstRun);
    expect(server.tagsOf(5)).toEqual(['version-beta-7']);
  });

  it('previews changes in dry-run mode', async () => {
    const server = new FakeKumaServer({
      monitors: [{ id: 12, name: 'API Service', tags: ['version-1.0.0'] }],
    });

    const result = await run(
      server,
      {
        dryRun: true,
        servicesJson: servicesJson({ monitorName: 'API Service', versionEndpoint: 'http://api/version' }),
      },
      fakeVersions({ api: '1.1.0' })
    );

    expect(result.message).toBe('Synced 1 service(s), 1 changed (dry run)');
    expect(server.tagsOf(12)).toEqual(['version-1.0.0']);
    expect(server.mutations()).toEqual([]);
  });

  it('fails before connecting when credentials are missing', async () => {
    const server = new FakeKumaServer();

    const result = await runCommand(
      createTestContext(),
      {
        url: 'http://kuma.test',
        servicesJson: servicesJson({ monitorName: 'API Service', versionEndpoint: 'http://api/version' }),
      },
      { connector: createKumaConnector({ logger: quietLogger, openTransport: server.openTransport }) }
    );

    expect(result.success).toBe(false);
    expect(result.message).toMatch(/^Missing Uptime Kuma credentials/);
    expect(server.connections).toBe(0);
  });
});

describe('version-sync validate', () => {
  it('lists valid and invalid entries without connecting', async () => {
    const result = await validateCommand(createTestContext(), {
      username: 'admin',
      password: TEST_PASSWORD,
      servicesJson: servicesJson(
        { monitorName: 'API Service', versionEndpoint: 'http://api/version' },
        { monitorName: 'Web', versionEndpoint: 'web/version' }
      ),
    });

    expect(result.success).toBe(false);
    expect(result.message).toBe('1 of 2 service(s) invalid');
    expect(result.data?.services).toEqual([
      {
        index: 0,
        monitorName: 'API Service',
        valid: true,
        tagPrefix: 'version',
        versionEndpoint: 'http://api/version',
        issues: [],
      },
      {
        index: 1,
        monitorName: 'Web',
        valid: false,
        issues: ['versionEndpoint is not a valid URL: web/version'],
      },
    ]);
  });

  it('flags missing credentials', async () => {
    const result = await validateCommand(createTestContext(), {
      servicesJson: servicesJson({ monitorName: 'API Service', versionEndpoint: 'http://api/version' }),
    });

    expect(result.success).toBe(false);
    expect(result.message).toBe('0 of 1 service(s) invalid, connection settings incomplete');
    expect(result.data?.connectionError).toMatch(/^Missing Uptime Kuma credentials/);
  });
});
