/**
 * Unit Tests: Version Tag Apply
 *
 * Tests reconciling a monitor's version tag through a session:
 * - Replacing a stale tag (remove before add)
 * - Idempotence: a second pass issues no mutations
 * - Dry-run mode
 * - Failures surface as TagApplyError with earlier changes kept
 */

import { describe, it, expect, vi } from 'vitest';
import { reconcileVersionTag, formatAppliedTag } from '../../src/reconcilers/tags/apply.js';
import { TagApplyError } from '../../src/api/errors.js';
import { createLogger } from '../../src/api/logger.js';
import type { MonitorId, Session } from '../../src/api/types.js';

// =============================================================================
// Fake Session Factory
// =============================================================================

const quietLogger = createLogger({ level: 'error' });

function createFakeSession(initialTags: Record<MonitorId, string[]> = {}) {
  const state = new Map<MonitorId, string[]>(
    Object.entries(initialTags).map(([id, tags]) => [id, [...tags]])
  );
  const calls: string[] = [];

  const tags = {
    list: vi.fn(async (monitorId: MonitorId) => [...(state.get(monitorId) ?? [])]),
    add: vi.fn(async (monitorId: MonitorId, name: string, _options?: { color?: string }) => {
      calls.push(`add ${name}`);
      const current = state.get(monitorId) ?? [];
      if (!current.includes(name)) current.push(name);
      state.set(monitorId, current);
    }),
    remove: vi.fn(async (monitorId: MonitorId, name: string) => {
      calls.push(`remove ${name}`);
      state.set(
        monitorId,
        (state.get(monitorId) ?? []).filter((tag) => tag !== name)
      );
    }),
  };

  const session: Session = {
    baseUrl: 'http://kuma.test',
    verifyTls: false,
    authMode: 'password',
    monitors: { list: vi.fn(async () => []) },
    tags,
    close: vi.fn(async () => undefined),
  };

  return { session, state, tags, calls };
}

// =============================================================================
// Tests
// =============================================================================

describe('reconcileVersionTag', () => {
  it('replaces the old version tag and keeps unrelated tags', async () => {
    const { session, state, calls } = createFakeSession({ '12': ['version-1.0.0', 'env-prod'] });

    const applied = await reconcileVersionTag(session, '12', 'version', '1.1.0', {
      logger: quietLogger,
    });

    expect(calls).toEqual(['remove version-1.0.0', 'add version-1.1.0']);
    expect(state.get('12')).toEqual(['env-prod', 'version-1.1.0']);
    expect(applied).toEqual({
      monitorId: '12',
      tag: 'version-1.1.0',
      added: ['version-1.1.0'],
      removed: ['version-1.0.0'],
      preserved: ['env-prod'],
      mutations: 2,
      converged: false,
      dryRun: false,
    });
  });

  it('adds the tag to a monitor with no version tag', async () => {
    const { session, state } = createFakeSession({ '3': [] });

    const applied = await reconcileVersionTag(session, '3', 'version', '2.0.0', {
      logger: quietLogger,
    });

    expect(state.get('3')).toEqual(['version-2.0.0']);
    expect(applied.mutations).toBe(1);
  });

  it('issues no mutations on a second pass', async () => {
    const { session, tags } = createFakeSession({ '12': ['version-1.0.0'] });

    await reconcileVersionTag(session, '12', 'version', '1.1.0', { logger: quietLogger });
    tags.add.mockClear();
    tags.remove.mockClear();

    const second = await reconcileVersionTag(session, '12', 'version', '1.1.0', {
      logger: quietLogger,
    });

    expect(second.converged).toBe(true);
    expect(second.mutations).toBe(0);
    expect(tags.add).not.toHaveBeenCalled();
    expect(tags.remove).not.toHaveBeenCalled();
  });

  it('passes the tag color to add', async () => {
    const { session, tags } = createFakeSession({ '5': [] });

    await reconcileVersionTag(session, '5', 'version', '1.0.0', {
      tagColor: '#ff0000',
      logger: quietLogger,
    });

    expect(tags.add).toHaveBeenCalledWith('5', 'version-1.0.0', { color: '#ff0000' });
  });

  it('leaves tags of other prefixes on the same monitor untouched', async () => {
    const { session, state } = createFakeSession({
      '7': ['version-1.0', 'api-version-2.0'],
    });

    await reconcileVersionTag(session, '7', 'version', '1.1', { logger: quietLogger });

    expect(state.get('7')).toEqual(['api-version-2.0', 'version-1.1']);
  });

  it('plans without mutating in dry-run mode', async () => {
    const { session, state, tags } = createFakeSession({ '12': ['version-1.0.0'] });

    const applied = await reconcileVersionTag(session, '12', 'version', '1.1.0', {
      dryRun: true,
      logger: quietLogger,
    });

    expect(tags.add).not.toHaveBeenCalled();
    expect(tags.remove).not.toHaveBeenCalled();
    expect(state.get('12')).toEqual(['version-1.0.0']);
    expect(applied.dryRun).toBe(true);
    expect(applied.added).toEqual(['version-1.1.0']);
    expect(applied.removed).toEqual(['version-1.0.0']);
    expect(applied.mutations).toBe(0);
  });

  it('wraps a listing failure', async () => {
    const { session, tags } = createFakeSession();
    tags.list.mockRejectedValueOnce(new Error('socket closed'));

    await expect(
      reconcileVersionTag(session, '9', 'version', '1.0.0', { logger: quietLogger })
    ).rejects.toThrow("Failed to list tags of monitor 9: socket closed");
  });

  it('keeps earlier removals when the add fails', async () => {
    const { session, state, tags } = createFakeSession({ '12': ['version-1.0.0'] });
    tags.add.mockRejectedValueOnce(new Error('addMonitorTag version-1.1.0 failed: denied'));

    const error = await reconcileVersionTag(session, '12', 'version', '1.1.0', {
      logger: quietLogger,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TagApplyError);
    expect(error).toMatchObject({
      kind: 'TagApplyError',
      operation: 'add',
      tag: 'version-1.1.0',
      monitorId: '12',
    });
    expect(state.get('12')).toEqual([]);
  });

  it('converges on the next pass after a partial failure', async () => {
    const { session, state, tags } = createFakeSession({ '12': ['version-1.0.0'] });
    tags.add.mockRejectedValueOnce(new Error('denied'));

    await expect(
      reconcileVersionTag(session, '12', 'version', '1.1.0', { logger: quietLogger })
    ).rejects.toBeInstanceOf(TagApplyError);

    const retry = await reconcileVersionTag(session, '12', 'version', '1.1.0', {
      logger: quietLogger,
    });

    expect(retry.added).toEqual(['version-1.1.0']);
    expect(retry.removed).toEqual([]);
    expect(state.get('12')).toEqual(['version-1.1.0']);
  });

  it('stops at the first failed removal', async () => {
    const { session, tags } = createFakeSession({ '4': ['version-0.9', 'version-1.0'] });
    tags.remove.mockRejectedValueOnce(new Error('timeout'));

    await expect(
      reconcileVersionTag(session, '4', 'version', '1.1', { logger: quietLogger })
    ).rejects.toThrow("Failed to remove tag 'version-0.9' on monitor 4: timeout");
    expect(tags.add).not.toHaveBeenCalled();
  });
});

describe('formatAppliedTag', () => {
  it('describes unchanged, changed and dry-run outcomes', async () => {
    const unchanged = createFakeSession({ '1': ['version-1.0'] });
    const changed = createFakeSession({ '1': ['version-0.9'] });
    const planned = createFakeSession({ '1': ['version-0.9'] });

    const options = { logger: quietLogger };
    expect(
      formatAppliedTag(await reconcileVersionTag(unchanged.session, '1', 'version', '1.0', options))
    ).toBe('version-1.0 (unchanged)');
    expect(
      formatAppliedTag(await reconcileVersionTag(changed.session, '1', 'version', '1.0', options))
    ).toBe('version-1.0 (-version-0.9, +version-1.0)');
    expect(
      formatAppliedTag(
        await reconcileVersionTag(planned.session, '1', 'version', '1.0', {
          ...options,
          dryRun: true,
        })
      )
    ).toBe('version-1.0 (-version-0.9, +version-1.0, dry run)');
  });
});
