import type { Redis, RedisOptions } from 'ioredis'
import type { Serializer } from '../loader/serializer.js'
import type {
  DeliveryContext,
  ImageDecoder,
  ResourceOpener,
} from './photo.js'
import type {
  PhotoLoaderEventHandler,
  LoadCompleteEvent,
  LoadErrorEvent,
  LoadFinishedEvent,
  LoadRejectedEvent,
  LoadSubmitEvent,
} from './events.js'

export type RedisConfig = string | Redis | RedisOptions

export interface CallerInfoConfig {
  maxSize?: number
}

export interface CircuitBreakerConfig {
  threshold?: number
  timeout?: number
  halfOpenRequests?: number
}

export interface ErrorHandlingConfig {
  circuitBreaker?: CircuitBreakerConfig
}

export interface PhotoLoaderHooks {
  onSubmit?: PhotoLoaderEventHandler<LoadSubmitEvent>
  onLoad?: PhotoLoaderEventHandler<LoadFinishedEvent>
  onComplete?: PhotoLoaderEventHandler<LoadCompleteEvent>
  onRejected?: PhotoLoaderEventHandler<LoadRejectedEvent>
  onError?: PhotoLoaderEventHandler<LoadErrorEvent>
}

export interface PhotoLoaderConfig {
  /** Redis holding photo records; ignored when `opener` is given */
  store?: RedisConfig
  opener?: ResourceOpener
  decoder?: ImageDecoder
  delivery?: DeliveryContext
  prefix?: string
  serializer?: 'json' | 'superjson' | Serializer
  concurrency?: number
  dedupe?: boolean
  callerInfo?: CallerInfoConfig
  onError?: ErrorHandlingConfig
  debug?: boolean
  hooks?: PhotoLoaderHooks
}
