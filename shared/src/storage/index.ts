export { AUsageProvider, type UsageStats } from './AUsageProvider.js';
export {
  DiskUsageProvider,
  StaticDiskUsageProvider,
  createDiskUsageProvider,
  supportsStatfs,
  type StatfsFunction,
} from './diskUsage.js';
export { getDirectoryUsedBytes } from './directoryUsage.js';
export {
  QuotaUsageProvider,
  createUsageProvider,
  type DirectoryMeasure,
  type UsageProviderOptions,
} from './quotaUsage.js';
