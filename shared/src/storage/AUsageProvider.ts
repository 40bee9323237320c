import { AService } from '../services/abstracts/AService.js';

/**
 * Free and used byte counts for a volume or directory.
 */
export interface UsageStats {
  freeBytes: bigint;
  usedBytes: bigint;
}

/**
 * Reports storage usage for an absolute path.
 *
 * @see DiskUsageProvider for volume statistics
 * @see QuotaUsageProvider for a fixed quota measured against a directory
 */
export abstract class AUsageProvider extends AService {
  abstract getUsage(path: string): Promise<UsageStats>;
}
