import * as fs from 'fs/promises';
import { AUsageProvider } from './AUsageProvider.js';
import { STORAGE } from '../config/constants.js';
import type { BigIntStatsFs } from 'fs';
import type { UsageStats } from './AUsageProvider.js';

export type StatfsFunction = (path: string) => Promise<Pick<BigIntStatsFs, 'bsize' | 'blocks' | 'bavail'>>;

const STATFS_PLATFORMS: ReadonlySet<NodeJS.Platform> = new Set<NodeJS.Platform>([
  'linux',
  'darwin',
  'freebsd',
  'openbsd',
  'sunos',
  'aix',
]);

const defaultStatfs: StatfsFunction = (path) => fs.statfs(path, { bigint: true });

/**
 * Volume statistics for the filesystem holding a path.
 *
 * free = available blocks × block size (what an unprivileged user can write);
 * used = total blocks × block size − free.
 */
export class DiskUsageProvider extends AUsageProvider {
  constructor(private readonly statfs: StatfsFunction = defaultStatfs) {
    super();
  }

  async getUsage(path: string): Promise<UsageStats> {
    const stats = await this.statfs(path);
    const freeBytes = stats.bavail * stats.bsize;
    const totalBytes = stats.blocks * stats.bsize;
    return {
      freeBytes,
      usedBytes: totalBytes > freeBytes ? totalBytes - freeBytes : 0n,
    };
  }
}

/**
 * Fixed figures for platforms without statfs.
 */
export class StaticDiskUsageProvider extends AUsageProvider {
  async getUsage(_path: string): Promise<UsageStats> {
    return { freeBytes: STORAGE.STATIC_FREE_BYTES, usedBytes: 0n };
  }
}

export function supportsStatfs(platform: NodeJS.Platform = process.platform): boolean {
  return STATFS_PLATFORMS.has(platform);
}

export function createDiskUsageProvider(platform: NodeJS.Platform = process.platform): AUsageProvider {
  return supportsStatfs(platform) ? new DiskUsageProvider() : new StaticDiskUsageProvider();
}
