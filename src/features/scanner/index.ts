export {
  createConcurrencyLimiter,
  runDirectoryQueue,
  type ConcurrencyLimiter
} from './concurrency-limiter';
export type {
  EntrySource,
  ScanOptions,
  WalkEntry,
  WalkError,
  WalkResult
} from './scanner-types';
export {
  createFsEntrySource,
  defaultWalkLimits,
  toWalkError,
  walkEntries,
  type WalkLimits
} from './walk-entries';
