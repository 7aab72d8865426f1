// Shared types for the tierstack cache and locking libraries

export type {
  CacheKey,
  CacheValue,
  EvictedEntry,
  EvictionPolicyName,
  TierSnapshot,
  CascadeEvent,
  DropEvent,
  PromotionEvent,
  TierCreatedEvent
} from './cache';

export {
  ErrorCode,
  ErrorSeverity,
  TierstackError,
  InvalidConfigurationError,
  ValidationError,
  LockTimeoutError,
  LockCancelledError,
  NotFoundError,
  SlotUnavailableError,
  isTierstackError,
  isRetryableError
} from './errors';
export type { ErrorContext, SlotUnavailableReason } from './errors';
