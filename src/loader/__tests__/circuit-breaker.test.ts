import { describe, it, expect, vi, beforeEach } from 'vitest'
import { CircuitBreaker, type CircuitState } from '../circuit-breaker.js'

describe('CircuitBreaker', () => {
  let circuitBreaker: CircuitBreaker

  const failing = () =>
    vi.fn(async (): Promise<string> => {
      throw new Error('store down')
    })

  beforeEach(() => {
    circuitBreaker = new CircuitBreaker(3, 100, 2)
  })

  it('should start in closed state', () => {
    expect(circuitBreaker.getState()).toBe('closed')
  })

  it('should execute function successfully when closed', async () => {
    const fn = vi.fn(async () => 'success')
    const fallback = vi.fn(async () => 'fallback')

    const result = await circuitBreaker.execute(fn, fallback)

    expect(result).toBe('success')
    expect(fallback).not.toHaveBeenCalled()
  })

  it('should return the fallback and report the error when fn fails', async () => {
    const onError = vi.fn()
    circuitBreaker.setErrorHandler(onError)

    const result = await circuitBreaker.execute(failing(), async () => 'fallback')

    expect(result).toBe('fallback')
    expect(onError).toHaveBeenCalledWith(new Error('store down'))
    expect(circuitBreaker.getState()).toBe('closed')
  })

  it('should open after threshold failures and skip fn while open', async () => {
    const fn = failing()
    const fallback = vi.fn(async () => 'fallback')

    await circuitBreaker.execute(fn, fallback)
    await circuitBreaker.execute(fn, fallback)
    await circuitBreaker.execute(fn, fallback)

    expect(circuitBreaker.getState()).toBe('open')

    const result = await circuitBreaker.execute(fn, fallback)

    expect(result).toBe('fallback')
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it('should close again after successful half-open probes', async () => {
    const fn = failing()
    const fallback = vi.fn(async () => 'fallback')
    const states: CircuitState[] = []
    circuitBreaker.setStateChangeHandler((state) => states.push(state))

    await circuitBreaker.execute(fn, fallback)
    await circuitBreaker.execute(fn, fallback)
    await circuitBreaker.execute(fn, fallback)

    await new Promise((resolve) => setTimeout(resolve, 150))

    const successFn = vi.fn(async () => 'success')
    await circuitBreaker.execute(successFn, fallback)
    expect(circuitBreaker.getState()).toBe('half-open')

    await circuitBreaker.execute(successFn, fallback)
    expect(circuitBreaker.getState()).toBe('closed')
    expect(states).toEqual(['open', 'half-open', 'closed'])
  })

  it('should reopen when a half-open probe fails', async () => {
    const fn = failing()
    const fallback = vi.fn(async () => 'fallback')

    await circuitBreaker.execute(fn, fallback)
    await circuitBreaker.execute(fn, fallback)
    await circuitBreaker.execute(fn, fallback)

    await new Promise((resolve) => setTimeout(resolve, 150))

    await circuitBreaker.execute(fn, fallback)

    expect(circuitBreaker.getState()).toBe('open')
    expect(fn).toHaveBeenCalledTimes(4)
  })

  it('should reset circuit', async () => {
    const cb = new CircuitBreaker(1, 1000, 1)
    await cb.execute(failing(), async () => 'fallback')
    expect(cb.getState()).toBe('open')

    cb.reset()

    expect(cb.getState()).toBe('closed')
  })
})
