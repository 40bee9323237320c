import { AUsageProvider } from './AUsageProvider.js';
import { createDiskUsageProvider } from './diskUsage.js';
import { getDirectoryUsedBytes } from './directoryUsage.js';
import type { UsageStats } from './AUsageProvider.js';

export type DirectoryMeasure = (root: string) => Promise<bigint>;

/**
 * Reports a fixed quota against the bytes stored under a directory.
 *
 * used = min(directory size, quota); free = quota − used.
 */
export class QuotaUsageProvider extends AUsageProvider {
  constructor(
    readonly quotaBytes: bigint,
    private readonly measure: DirectoryMeasure = getDirectoryUsedBytes
  ) {
    super();
  }

  async getUsage(path: string): Promise<UsageStats> {
    const directoryBytes = await this.measure(path);
    const usedBytes = directoryBytes < this.quotaBytes ? directoryBytes : this.quotaBytes;
    return {
      freeBytes: this.quotaBytes - usedBytes,
      usedBytes,
    };
  }
}

export interface UsageProviderOptions {
  /** 0n (or absent) reports the host filesystem */
  quotaBytes?: bigint;
  platform?: NodeJS.Platform;
}

export function createUsageProvider(options: UsageProviderOptions = {}): AUsageProvider {
  const quotaBytes = options.quotaBytes ?? 0n;
  if (quotaBytes > 0n) {
    return new QuotaUsageProvider(quotaBytes);
  }
  return createDiskUsageProvider(options.platform);
}
