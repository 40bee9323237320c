/**
 * Tests for quota-based usage reporting.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { QuotaUsageProvider, createUsageProvider } from '../../src/storage/quotaUsage.js';
import { DiskUsageProvider, StaticDiskUsageProvider } from '../../src/storage/diskUsage.js';

const fixedMeasure = (bytes: bigint) => async () => bytes;

describe('QuotaUsageProvider', () => {
  it('should clamp used bytes to the quota', async () => {
    const provider = new QuotaUsageProvider(10n, fixedMeasure(15n));

    assert.deepStrictEqual(await provider.getUsage('/data'), { freeBytes: 0n, usedBytes: 10n });
  });

  it('should report the remainder as free', async () => {
    const provider = new QuotaUsageProvider(10n, fixedMeasure(4n));

    assert.deepStrictEqual(await provider.getUsage('/data'), { freeBytes: 6n, usedBytes: 4n });
  });

  it('should report a full quota when usage matches it exactly', async () => {
    const provider = new QuotaUsageProvider(10n, fixedMeasure(10n));

    assert.deepStrictEqual(await provider.getUsage('/data'), { freeBytes: 0n, usedBytes: 10n });
  });

  it('should measure the path it is asked about', async () => {
    const measured: string[] = [];
    const provider = new QuotaUsageProvider(100n, async (root) => {
      measured.push(root);
      return 1n;
    });

    await provider.getUsage('/srv/share');

    assert.deepStrictEqual(measured, ['/srv/share']);
  });

  it('should propagate measurement failures', async () => {
    const provider = new QuotaUsageProvider(100n, async () => {
      throw new Error('walk failed');
    });

    await assert.rejects(provider.getUsage('/data'), /walk failed/);
  });

  it('should walk a real directory by default', async () => {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'davgate-quota-'));
    try {
      await fs.writeFile(path.join(root, 'hello.txt'), 'hello');

      const usage = await new QuotaUsageProvider(1000n).getUsage(root);

      assert.deepStrictEqual(usage, { freeBytes: 995n, usedBytes: 5n });
    } finally {
      await fs.rm(root, { recursive: true, force: true });
    }
  });
});

describe('createUsageProvider', () => {
  it('should report the quota when one is set', () => {
    const provider = createUsageProvider({ quotaBytes: 2048n });

    assert.ok(provider instanceof QuotaUsageProvider);
    assert.strictEqual(provider.quotaBytes, 2048n);
  });

  it('should fall back to the filesystem without a quota', () => {
    assert.ok(createUsageProvider({ quotaBytes: 0n, platform: 'linux' }) instanceof DiskUsageProvider);
    assert.ok(createUsageProvider({ platform: 'win32' }) instanceof StaticDiskUsageProvider);
  });
});
