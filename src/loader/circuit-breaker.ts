export type CircuitState = 'closed' | 'open' | 'half-open'

/**
 * Circuit breaker stops hammering a failing photo store: after `threshold`
 * consecutive failures it fails fast to the fallback until `timeout` ms
 * pass, then lets probes through.
 */
export class CircuitBreaker {
  private state: CircuitState = 'closed'
  private failures = 0
  private nextAttempt = 0
  private halfOpenSuccesses = 0
  private onError?: (error: unknown) => void
  private onStateChange?: (state: CircuitState) => void

  constructor(
    private threshold = 5,
    private timeout = 30000,
    private halfOpenRequests = 3
  ) {}

  setErrorHandler(handler: (error: unknown) => void): void {
    this.onError = handler
  }

  setStateChangeHandler(handler: (state: CircuitState) => void): void {
    this.onStateChange = handler
  }

  async execute<T>(
    fn: () => Promise<T>,
    fallback: () => Promise<T>
  ): Promise<T> {
    if (this.state === 'open') {
      if (Date.now() < this.nextAttempt) {
        return fallback()
      }
      // Time to test if the store recovered
      this.transition('half-open')
      this.halfOpenSuccesses = 0
    }

    try {
      const result = await fn()
      this.onSuccess()
      return result
    } catch (error) {
      this.onFailure()
      this.onError?.(error)
      return fallback()
    }
  }

  private onSuccess(): void {
    if (this.state === 'half-open') {
      this.halfOpenSuccesses++
      if (this.halfOpenSuccesses >= this.halfOpenRequests) {
        this.transition('closed')
        this.failures = 0
      }
    } else {
      this.failures = 0
    }
  }

  private onFailure(): void {
    this.failures++
    if (this.state === 'half-open' || this.failures >= this.threshold) {
      this.transition('open')
      this.nextAttempt = Date.now() + this.timeout
    }
  }

  private transition(state: CircuitState): void {
    if (this.state === state) return
    this.state = state
    this.onStateChange?.(state)
  }

  getState(): CircuitState {
    return this.state
  }

  reset(): void {
    this.state = 'closed'
    this.failures = 0
    this.nextAttempt = 0
    this.halfOpenSuccesses = 0
  }
}
