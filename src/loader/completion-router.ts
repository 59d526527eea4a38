import type { CallerInfoSink, LoadResult } from '../types/photo.js'
import type { LoadCompleteEvent } from '../types/events.js'

export interface CompletionRouterOptions {
  callerInfo?: CallerInfoSink
  onComplete?: (event: LoadCompleteEvent) => void
  log?: (message: string, data?: unknown) => void
}

/**
 * Applies load results on the delivery context: caches the photo on the
 * caller identity, marks that cache current and notifies the listener.
 *
 * It does not check whether the result's identity is still the one a slot
 * wants. Listeners that care compare the token or cookie they get against
 * their own state.
 */
export class CompletionRouter {
  private delivered = new WeakSet<LoadResult>()

  constructor(private options: CompletionRouterOptions = {}) {}

  onResult(result: LoadResult): void {
    if (this.delivered.has(result)) {
      this.log('Ignoring repeated result', { token: result.token })
      return
    }
    this.delivered.add(result)

    const image = result.outcome.kind === 'image' ? result.outcome.image : null
    const { callerInfo } = this.options

    if (callerInfo && result.identity !== null) {
      if (image) {
        callerInfo.attachCachedImage(result.identity, image)
      }
      // An absent photo is a known answer too
      callerInfo.markCacheCurrent(result.identity)
    }

    this.options.onComplete?.({
      token: result.token,
      identity: result.identity,
      present: image !== null,
      timestamp: Date.now(),
    })

    const { listener } = result.request
    if (listener) {
      this.log('Notifying listener', {
        token: result.token,
        locator: result.request.locator,
      })
      listener.onComplete(result.token, result.cookie, image)
    }
  }

  private log(message: string, data?: unknown): void {
    this.options.log?.(message, data)
  }
}
