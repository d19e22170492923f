/**
 * OperationInvoker tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { buildCacheKey } from '../cacheKey.js';
import { HttpStatusError } from '../errors.js';
import { OperationInvoker } from '../invoker.js';
import { ResultCache } from '../resultCache.js';
import { ok, validateDatasetRef } from '../validator.js';
import { createClock, createTestLogger } from './helpers.js';

interface DatasetView {
  ref: string;
  version: number;
}

/**
 * Remote stand-in that counts calls and can be held open
 */
function createFakeRemote() {
  let calls = 0;
  let gate: Promise<void> | null = null;
  let open: () => void = () => {};
  return {
    get calls() {
      return calls;
    },
    hold() {
      gate = new Promise<void>((resolve) => {
        open = resolve;
      });
    },
    release() {
      open();
    },
    async view(owner: string, name: string): Promise<DatasetView> {
      calls++;
      const version = calls;
      if (gate) await gate;
      return { ref: `${owner}/${name}`, version };
    },
  };
}

describe('OperationInvoker', () => {
  let clock: ReturnType<typeof createClock>;
  let cache: ResultCache;
  let invoker: OperationInvoker;
  let remote: ReturnType<typeof createFakeRemote>;

  beforeEach(() => {
    clock = createClock();
    cache = new ResultCache({ now: clock.now });
    invoker = new OperationInvoker({
      cache,
      logger: createTestLogger(),
      defaultTtlMs: 60_000,
      retry: { maxAttempts: 3 },
      sleep: async () => {},
    });
    remote = createFakeRemote();
  });

  function defineView(ttlMs?: number) {
    return invoker.define({
      name: 'get_dataset_details',
      ...(ttlMs !== undefined ? { ttlMs } : {}),
      validate: (args: { datasetRef: string }) => validateDatasetRef(args.datasetRef),
      call: ({ owner, name }) => remote.view(owner, name),
    });
  }

  describe('define()', () => {
    it('should expose operation metadata', () => {
      const view = defineView(5_000);

      expect(view.operationName).toBe('get_dataset_details');
      expect(view.ttlMs).toBe(5_000);
      expect(view.cacheable).toBe(true);
      expect(invoker.listOperations()).toEqual(['get_dataset_details']);
    });

    it('should fall back to the default TTL', () => {
      expect(defineView().ttlMs).toBe(60_000);
    });

    it('should refuse duplicate names', () => {
      defineView();
      expect(() => defineView()).toThrow('Operation already defined: get_dataset_details');
    });
  });

  describe('validation', () => {
    it('should short-circuit before the remote call', async () => {
      const view = defineView();

      const result = await view({ datasetRef: 'titanic' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('Validation');
      }
      expect(remote.calls).toBe(0);
    });
  });

  describe('caching', () => {
    it('should call the remote once for repeated calls within the TTL', async () => {
      const view = defineView();

      const first = await view({ datasetRef: 'owner/titanic' });
      const second = await view({ datasetRef: 'owner/titanic' });

      expect(first).toEqual({ ok: true, value: { ref: 'owner/titanic', version: 1 }, cached: false });
      expect(second).toEqual({ ok: true, value: { ref: 'owner/titanic', version: 1 }, cached: true });
      expect(remote.calls).toBe(1);
    });

    it('should key on validated arguments', async () => {
      const view = defineView();

      await view({ datasetRef: 'Owner/Titanic' });
      await view({ datasetRef: ' owner/titanic ' });

      expect(remote.calls).toBe(1);
    });

    it('should call again after the TTL expires and refresh the entry', async () => {
      const view = defineView(1_000);

      await view({ datasetRef: 'owner/titanic' });
      clock.advance(1_000);
      const refreshed = await view({ datasetRef: 'owner/titanic' });
      const cached = await view({ datasetRef: 'owner/titanic' });

      expect(remote.calls).toBe(2);
      expect(refreshed).toEqual({ ok: true, value: { ref: 'owner/titanic', version: 2 }, cached: false });
      expect(cached).toEqual({ ok: true, value: { ref: 'owner/titanic', version: 2 }, cached: true });
    });

    it('should make exactly one fresh call after invalidation', async () => {
      const view = defineView();
      await view({ datasetRef: 'owner/titanic' });

      cache.invalidate(buildCacheKey('get_dataset_details', { owner: 'owner', name: 'titanic' }));
      const afterInvalidate = await view({ datasetRef: 'owner/titanic' });
      const next = await view({ datasetRef: 'owner/titanic' });

      expect(remote.calls).toBe(2);
      expect(afterInvalidate.ok && afterInvalidate.cached).toBe(false);
      expect(next.ok && next.cached).toBe(true);
    });

    it('should refresh when skipCache is set', async () => {
      const view = defineView();
      await view({ datasetRef: 'owner/titanic' });

      const forced = await view({ datasetRef: 'owner/titanic' }, { skipCache: true });
      const after = await view({ datasetRef: 'owner/titanic' });

      expect(remote.calls).toBe(2);
      expect(forced).toEqual({ ok: true, value: { ref: 'owner/titanic', version: 2 }, cached: false });
      expect(after).toEqual({ ok: true, value: { ref: 'owner/titanic', version: 2 }, cached: true });
    });

    it('should drop an operation from the cache through invalidate()', async () => {
      const view = defineView();
      await view({ datasetRef: 'owner/a' });
      await view({ datasetRef: 'owner/b' });

      expect(invoker.invalidate('get_dataset_details')).toBe(2);
      await view({ datasetRef: 'owner/a' });
      expect(remote.calls).toBe(3);
    });

    it('should not cache uncacheable operations', async () => {
      const download = invoker.define({
        name: 'download_dataset',
        cacheable: false,
        validate: (args: { datasetRef: string }) => validateDatasetRef(args.datasetRef),
        call: ({ owner, name }) => remote.view(owner, name),
      });

      await download({ datasetRef: 'owner/titanic' });
      await download({ datasetRef: 'owner/titanic' });

      expect(remote.calls).toBe(2);
      expect(cache.size).toBe(0);
    });
  });

  describe('failures', () => {
    it('should return an envelope and not cache failures', async () => {
      let calls = 0;
      const op = invoker.define({
        name: 'flaky',
        validate: (args: { id: string }) => ok(args),
        call: async () => {
          calls++;
          if (calls === 1) throw new HttpStatusError(404, 'Not Found');
          return 'found';
        },
      });

      const failed = await op({ id: 'x' });
      const succeeded = await op({ id: 'x' });

      expect(failed.ok).toBe(false);
      if (!failed.ok) {
        expect(failed.error.kind).toBe('NotFound');
      }
      expect(succeeded).toEqual({ ok: true, value: 'found', cached: false });
    });

    it('should retry rate-limited calls up to the configured bound', async () => {
      let calls = 0;
      const op = invoker.define({
        name: 'limited',
        validate: (args: { id: string }) => ok(args),
        call: async () => {
          calls++;
          throw new HttpStatusError(429, 'Too Many Requests');
        },
      });

      const result = await op({ id: 'x' });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.kind).toBe('RateLimited');
      }
      expect(calls).toBe(3);
    });
  });

  describe('concurrency', () => {
    it('should share one remote call between parallel misses on the same key', async () => {
      const view = defineView();
      remote.hold();

      const pending = Array.from({ length: 5 }, () => view({ datasetRef: 'owner/titanic' }));
      remote.release();
      const results = await Promise.all(pending);

      expect(remote.calls).toBe(1);
      expect(cache.size).toBe(1);
      for (const result of results) {
        expect(result.ok && result.value).toEqual({ ref: 'owner/titanic', version: 1 });
      }
    });

    it('should not let a slow key stall other keys', async () => {
      const view = defineView();
      remote.hold();

      const slow = view({ datasetRef: 'owner/slow' });
      cache.put(buildCacheKey('get_dataset_details', { owner: 'owner', name: 'fast' }), { ref: 'owner/fast', version: 0 }, 60_000);
      const fast = await view({ datasetRef: 'owner/fast' });

      expect(fast).toEqual({ ok: true, value: { ref: 'owner/fast', version: 0 }, cached: true });
      remote.release();
      await slow;
    });

    it('should not write back a result started before invalidation', async () => {
      const view = defineView();
      remote.hold();

      const stale = view({ datasetRef: 'owner/titanic' });
      await vi.waitFor(() => expect(remote.calls).toBe(1));
      invoker.invalidate();
      remote.release();
      await stale;

      expect(cache.size).toBe(0);
      expect(cache.stats().pendingWrites).toBe(0);
    });

    it('should not write back after the operation was invalidated by name', async () => {
      const view = defineView();
      remote.hold();

      const stale = view({ datasetRef: 'owner/titanic' });
      await vi.waitFor(() => expect(remote.calls).toBe(1));
      expect(cache.stats().pendingWrites).toBe(1);
      invoker.invalidate('get_dataset_details');
      remote.release();
      await stale;

      expect(cache.size).toBe(0);
      expect(cache.stats().pendingWrites).toBe(0);
    });

    it('should keep no bookkeeping for keys invalidated between calls', async () => {
      const view = defineView();

      for (let i = 0; i < 5; i++) {
        await view({ datasetRef: `owner/set-${i}` });
        invoker.invalidate('get_dataset_details');
      }

      expect(cache.size).toBe(0);
      expect(cache.stats().pendingWrites).toBe(0);
    });

    it('should separate flights whose identity differs only in case', async () => {
      const fetchFile = invoker.define({
        name: 'download_file',
        cacheable: false,
        validate: (args: { fileName: string }) => ok(args.fileName),
        flightKey: (fileName) => fileName,
        call: async (fileName) => {
          await remote.view('owner', fileName);
          return fileName;
        },
      });
      remote.hold();

      const upper = fetchFile({ fileName: 'Train.csv' });
      const lower = fetchFile({ fileName: 'train.csv' });
      remote.release();

      expect(await upper).toEqual({ ok: true, value: 'Train.csv', cached: false });
      expect(await lower).toEqual({ ok: true, value: 'train.csv', cached: false });
      expect(remote.calls).toBe(2);
    });

    it('should fold case in the default flight identity', async () => {
      const fetchFile = invoker.define({
        name: 'download_file',
        cacheable: false,
        validate: (args: { fileName: string }) => ok(args.fileName),
        call: async (fileName) => {
          await remote.view('owner', fileName);
          return fileName;
        },
      });
      remote.hold();

      const upper = fetchFile({ fileName: 'Train.csv' });
      const lower = fetchFile({ fileName: 'train.csv' });
      remote.release();
      await Promise.all([upper, lower]);

      expect(remote.calls).toBe(1);
    });
  });
});
