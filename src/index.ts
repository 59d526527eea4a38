export { createPhotoLoader, PhotoLoaderImpl } from './loader/photo-loader.js'
export { RequestTracker, type ContactEntity } from './loader/request-tracker.js'
export { IdentityArena } from './loader/identity-arena.js'
export {
  Dispatcher,
  type DispatcherOptions,
  type DispatcherState,
} from './loader/dispatcher.js'
export {
  CompletionRouter,
  type CompletionRouterOptions,
} from './loader/completion-router.js'
export { TaskQueueDeliveryContext } from './loader/delivery-context.js'
export {
  CallerInfoCache,
  type CallerInfoCacheConfig,
} from './loader/caller-info-cache.js'
export {
  RedisPhotoStore,
  type PhotoRecord,
  type PhotoStoreClient,
} from './loader/redis-photo-store.js'
export {
  SniffingImageDecoder,
  detectImageFormat,
  type SniffingImageDecoderConfig,
} from './loader/image-decoder.js'
export { CircuitBreaker, type CircuitState } from './loader/circuit-breaker.js'
export { Deduplicator } from './loader/deduplicator.js'
export {
  createSerializer,
  jsonSerializer,
  superjsonSerializer,
  type Serializer,
} from './loader/serializer.js'
export {
  PhotoLoaderError,
  ResourceUnavailableError,
  DecodeFailureError,
  DispatcherStoppedError,
  type PhotoLoaderErrorCode,
} from './loader/errors.js'
export {
  buildPhotoLocator,
  parsePhotoLocator,
  buildStoreKey,
  validateLocator,
  type PhotoVariant,
} from './utils/locator.js'
export type * from './types/photo.js'
export type * from './types/events.js'
export type * from './types/config.js'
