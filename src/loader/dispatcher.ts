import type {
  ByteStream,
  DeliveryContext,
  ImageDecoder,
  LoadRequest,
  LoadResult,
  Outcome,
  ResourceOpener,
} from '../types/photo.js'
import type { LoadErrorEvent, LoadFinishedEvent } from '../types/events.js'
import { CircuitBreaker } from './circuit-breaker.js'
import { Deduplicator } from './deduplicator.js'
import {
  DecodeFailureError,
  DispatcherStoppedError,
  ResourceUnavailableError,
  toError,
} from './errors.js'

export interface DispatcherOptions {
  opener: ResourceOpener
  decoder: ImageDecoder
  delivery: DeliveryContext
  onResult: (result: LoadResult) => void
  concurrency?: number
  dedupe?: boolean
  circuitBreaker?: CircuitBreaker
  onLoad?: (event: LoadFinishedEvent) => void
  onError?: (event: LoadErrorEvent) => void
  log?: (message: string, data?: unknown) => void
}

export type DispatcherState = 'created' | 'running' | 'stopping' | 'stopped'

interface Job {
  request: LoadRequest
  sequence: number
}

const ABSENT: Outcome = Object.freeze({ kind: 'absent' })

/**
 * Background worker for photo loads. `submit` only enqueues; jobs are
 * picked up on a later macrotask, opened and decoded off the caller's
 * stack, and every job posts exactly one result to the delivery context.
 * Open and decode failures become absent outcomes and never stop the
 * worker. With one worker (the default) jobs run and deliver in
 * submission order.
 */
export class Dispatcher {
  private queue: Job[] = []
  private running = 0
  private sequence = 0
  private scheduled = false
  private state: DispatcherState = 'created'
  private idleWaiters: Array<() => void> = []
  private deduplicator = new Deduplicator<Outcome>()
  private circuitBreaker: CircuitBreaker
  private concurrency: number
  private dedupe: boolean

  constructor(private options: DispatcherOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1))
    this.dedupe = options.dedupe ?? true
    this.circuitBreaker = options.circuitBreaker ?? new CircuitBreaker()
  }

  start(): void {
    if (this.state !== 'created') return
    this.state = 'running'
    this.schedule()
  }

  /**
   * Drains queued and running jobs, then stops. Later submissions are not
   * run; each still gets an absent result.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopped') return
    this.state = 'stopping'
    this.schedule()
    await this.idle()
    this.state = 'stopped'
  }

  submit(request: LoadRequest): void {
    const job: Job = { request, sequence: ++this.sequence }

    if (this.state === 'stopping' || this.state === 'stopped') {
      this.reportError(request, 'submit', new DispatcherStoppedError(request.locator))
      this.post(job, ABSENT)
      return
    }

    this.queue.push(job)
    this.schedule()
  }

  /**
   * Resolves when nothing is queued or running. Jobs submitted before
   * `start` keep this pending until the dispatcher starts.
   */
  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve()
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve)
    })
  }

  get pending(): number {
    return this.queue.length + this.running
  }

  getState(): DispatcherState {
    return this.state
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.running === 0
  }

  private schedule(): void {
    if (this.scheduled || this.state === 'created') return
    this.scheduled = true
    setImmediate(() => {
      this.scheduled = false
      this.pump()
    })
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const job = this.queue.shift()
      if (!job) break

      this.running++
      void this.execute(job)
        .catch((error: unknown) => {
          this.reportError(job.request, 'deliver', error)
        })
        .finally(() => this.finish())
    }

    this.notifyIfIdle()
  }

  private finish(): void {
    this.running--
    if (this.queue.length > 0) {
      this.schedule()
    } else {
      this.notifyIfIdle()
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) {
      resolve()
    }
  }

  private async execute(job: Job): Promise<void> {
    const { request } = job
    const started = Date.now()

    let outcome = ABSENT
    try {
      outcome = this.dedupe
        ? await this.deduplicator.run(request.locator, () => this.load(request))
        : await this.load(request)

      this.notify(this.options.onLoad, {
        token: request.token,
        locator: request.locator,
        present: outcome.kind === 'image',
        latency: Date.now() - started,
        timestamp: Date.now(),
      })
    } finally {
      // Every job posts exactly once, whatever failed above
      this.post(job, outcome)
    }
  }

  private async load(request: LoadRequest): Promise<Outcome> {
    const stream = await this.circuitBreaker.execute<ByteStream | null>(
      () => this.open(request),
      async () => null
    )

    if (!stream) {
      this.log('No photo, using default', {
        token: request.token,
        locator: request.locator,
      })
      return ABSENT
    }

    try {
      const image = await this.options.decoder.decode(stream, request.locator)
      this.log('Loaded photo', {
        token: request.token,
        locator: request.locator,
      })
      return { kind: 'image', image }
    } catch (error) {
      this.reportError(
        request,
        'decode',
        error instanceof DecodeFailureError
          ? error
          : new DecodeFailureError(request.locator, toError(error).message, error)
      )
      return ABSENT
    }
  }

  private async open(request: LoadRequest): Promise<ByteStream | null> {
    try {
      return await this.options.opener.openResourceStream(request.locator)
    } catch (error) {
      const unavailable =
        error instanceof ResourceUnavailableError
          ? error
          : new ResourceUnavailableError(
              request.locator,
              toError(error).message,
              error
            )
      this.reportError(request, 'open', unavailable)
      throw unavailable
    }
  }

  private reportError(
    request: LoadRequest,
    operation: LoadErrorEvent['operation'],
    error: unknown
  ): void {
    this.notify(this.options.onError, {
      error: toError(error),
      operation,
      token: request.token,
      locator: request.locator,
      timestamp: Date.now(),
    })
  }

  // A throwing observer must not cost a job its result
  private notify<E>(callback: ((event: E) => void) | undefined, event: E): void {
    if (!callback) return
    try {
      callback(event)
    } catch (error) {
      console.error('[photo-loader] Event handler failed', error)
    }
  }

  private post(job: Job, outcome: Outcome): void {
    const { request } = job
    const result: LoadResult = Object.freeze({
      token: request.token,
      cookie: request.cookie,
      identity: request.identity,
      outcome,
      request,
      sequence: job.sequence,
    })
    this.options.delivery.postTask(() => this.options.onResult(result))
  }

  private log(message: string, data?: unknown): void {
    this.options.log?.(message, data)
  }
}
