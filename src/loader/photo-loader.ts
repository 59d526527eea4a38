import { EventEmitter } from 'node:events'
import type { Redis } from 'ioredis'
import type {
  CallerInfoEntry,
  IdentityHandle,
  LoadRequest,
  PhotoLoader,
  PhotoLoadListener,
  ResourceOpener,
} from '../types/photo.js'
import type { PhotoLoaderConfig } from '../types/config.js'
import type {
  PhotoLoaderEventHandler,
  PhotoLoaderEventName,
  PhotoLoaderListener,
  LoadCompleteEvent,
  LoadErrorEvent,
  LoadFinishedEvent,
  LoadRejectedEvent,
  LoadSubmitEvent,
} from '../types/events.js'
import { createRedisClient } from './redis-client.js'
import { createSerializer } from './serializer.js'
import { RedisPhotoStore } from './redis-photo-store.js'
import { SniffingImageDecoder } from './image-decoder.js'
import { TaskQueueDeliveryContext } from './delivery-context.js'
import { CallerInfoCache } from './caller-info-cache.js'
import { CircuitBreaker } from './circuit-breaker.js'
import { CompletionRouter } from './completion-router.js'
import { Dispatcher } from './dispatcher.js'
import { IdentityArena } from './identity-arena.js'
import type { RequestTracker } from './request-tracker.js'
import { toError } from './errors.js'
import { validateLocator } from '../utils/locator.js'

export class PhotoLoaderImpl extends EventEmitter implements PhotoLoader {
  readonly identities = new IdentityArena<object>()
  private dispatcher: Dispatcher
  private router: CompletionRouter
  private callerInfo: CallerInfoCache
  private delivery: TaskQueueDeliveryContext | undefined
  private redis?: Redis
  private prefix: string
  private debug: boolean

  constructor(config: PhotoLoaderConfig) {
    super()

    this.prefix = config.prefix || 'contact-photos'
    this.debug = config.debug || false

    // Resolve the photo source
    let opener: ResourceOpener
    if (config.opener) {
      opener = config.opener
    } else if (config.store) {
      const { client, owned } = createRedisClient(config.store)
      if (owned) {
        this.redis = client
      }
      opener = new RedisPhotoStore(
        client,
        createSerializer(config.serializer || 'superjson'),
        this.prefix
      )
    } else {
      throw new Error('Photo loader needs either `opener` or `store`')
    }

    // Delivery context: our own loop unless the caller owns one
    let delivery = config.delivery
    if (!delivery) {
      this.delivery = new TaskQueueDeliveryContext()
      this.delivery.setErrorHandler((error) => {
        this.report('error', {
          error: toError(error),
          operation: 'deliver',
          timestamp: Date.now(),
        })
      })
      delivery = this.delivery
    }

    this.callerInfo = new CallerInfoCache(config.callerInfo || {})

    this.router = new CompletionRouter({
      callerInfo: this.callerInfo,
      onComplete: (event) => this.report('complete', event),
      log: (message, data) => this.log(message, data),
    })

    const cbConfig = config.onError?.circuitBreaker
    const circuitBreaker = new CircuitBreaker(
      cbConfig?.threshold,
      cbConfig?.timeout,
      cbConfig?.halfOpenRequests
    )
    circuitBreaker.setStateChangeHandler((state) => {
      this.log('Photo store circuit changed', { state })
    })

    this.dispatcher = new Dispatcher({
      opener,
      decoder: config.decoder || new SniffingImageDecoder(),
      delivery,
      onResult: (result) => this.router.onResult(result),
      concurrency: config.concurrency,
      dedupe: config.dedupe,
      circuitBreaker,
      onLoad: (event) => this.report('load', event),
      onError: (event) => this.report('error', event),
      log: (message, data) => this.log(message, data),
    })

    // Setup event hooks
    if (config.hooks) {
      if (config.hooks.onSubmit) this.on('submit', config.hooks.onSubmit)
      if (config.hooks.onLoad) this.on('load', config.hooks.onLoad)
      if (config.hooks.onComplete) this.on('complete', config.hooks.onComplete)
      if (config.hooks.onRejected) this.on('rejected', config.hooks.onRejected)
      if (config.hooks.onError) this.on('error', config.hooks.onError)
    }

    this.dispatcher.start()

    this.log('Photo loader initialized', {
      prefix: this.prefix,
      concurrency: config.concurrency ?? 1,
    })
  }

  requestLoad<TCookie>(
    identity: IdentityHandle | null,
    token: number,
    locator: string | null | undefined,
    cookie: TCookie,
    listener: PhotoLoadListener<TCookie> | null
  ): void {
    const validation = validateLocator(locator)
    if (!locator || !validation.valid) {
      const reason = validation.error || 'Locator is missing'
      this.log('Not loading photo', { token, reason })
      this.report('rejected', { token, reason, timestamp: Date.now() })
      return
    }

    const request: LoadRequest<TCookie> = Object.freeze({
      token,
      identity,
      locator,
      cookie,
      listener,
    })

    this.log('Begin loading photo', { token, locator })
    this.report('submit', {
      token,
      identity,
      locator,
      timestamp: Date.now(),
    })
    this.dispatcher.submit(request)
  }

  loadIfChanged<TCookie>(
    tracker: RequestTracker,
    identity: IdentityHandle | null,
    token: number,
    locator: string | null | undefined,
    cookie: TCookie,
    listener: PhotoLoadListener<TCookie> | null
  ): boolean {
    if (!tracker.shouldLoad(identity)) {
      return false
    }

    tracker.setIdentity(identity)
    this.requestLoad(identity, token, locator, cookie, listener)
    return true
  }

  getCallerInfo(identity: IdentityHandle): CallerInfoEntry | undefined {
    return this.callerInfo.get(identity)
  }

  /**
   * Forget an identity and its cached photo. Results still in flight for
   * it are delivered but recreate a caller-info entry.
   */
  release(identity: IdentityHandle): boolean {
    this.callerInfo.delete(identity)
    return this.identities.release(identity)
  }

  /**
   * Resolves once the worker has nothing left and every result it posted
   * has been delivered. With a caller-owned delivery context only the
   * worker side is awaited.
   */
  async idle(): Promise<void> {
    await this.dispatcher.idle()
    if (this.delivery) {
      await this.delivery.idle()
    }
  }

  // EventEmitter overrides for type safety
  override on(event: 'submit', handler: PhotoLoaderEventHandler<LoadSubmitEvent>): this
  override on(event: 'load', handler: PhotoLoaderEventHandler<LoadFinishedEvent>): this
  override on(
    event: 'complete',
    handler: PhotoLoaderEventHandler<LoadCompleteEvent>
  ): this
  override on(
    event: 'rejected',
    handler: PhotoLoaderEventHandler<LoadRejectedEvent>
  ): this
  override on(event: 'error', handler: PhotoLoaderEventHandler<LoadErrorEvent>): this
  override on(event: PhotoLoaderEventName, handler: PhotoLoaderListener): this {
    return super.on(event, handler)
  }

  override off(event: PhotoLoaderEventName, handler: PhotoLoaderListener): this {
    return super.off(event, handler)
  }

  // Each listener runs in its own try; an unheard 'error' is only logged
  private report(event: 'submit', data: LoadSubmitEvent): void
  private report(event: 'load', data: LoadFinishedEvent): void
  private report(event: 'complete', data: LoadCompleteEvent): void
  private report(event: 'rejected', data: LoadRejectedEvent): void
  private report(event: 'error', data: LoadErrorEvent): void
  private report(event: PhotoLoaderEventName, data: unknown): void {
    const listeners = this.rawListeners(event)
    if (event === 'error' && listeners.length === 0) {
      this.log('Unhandled loader error', data)
      return
    }
    for (const listener of listeners) {
      try {
        listener.call(this, data)
      } catch (error) {
        console.error(`[photo-loader] '${event}' handler failed`, error)
      }
    }
  }

  private log(message: string, data?: unknown): void {
    if (this.debug) {
      console.log(`[photo-loader] ${message}`, data || '')
    }
  }

  async close(): Promise<void> {
    this.log('Closing photo loader')

    await this.dispatcher.stop()
    if (this.delivery) {
      await this.delivery.idle()
    }

    if (this.redis) {
      await this.redis.quit()
    }
  }
}

export function createPhotoLoader(config: PhotoLoaderConfig): PhotoLoader {
  return new PhotoLoaderImpl(config)
}
