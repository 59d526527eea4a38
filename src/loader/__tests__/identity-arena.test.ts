import { describe, it, expect, beforeEach } from 'vitest'
import { IdentityArena } from '../identity-arena.js'

interface Call {
  number: string
}

describe('IdentityArena', () => {
  let arena: IdentityArena<Call>

  beforeEach(() => {
    arena = new IdentityArena<Call>()
  })

  it('should return the same handle for the same entity', () => {
    const call = { number: '555-0100' }

    expect(arena.acquire(call)).toBe(arena.acquire(call))
    expect(arena.size).toBe(1)
  })

  it('should give structurally equal entities different handles', () => {
    const first = arena.acquire({ number: '555-0100' })
    const second = arena.acquire({ number: '555-0100' })

    expect(first).not.toBe(second)
    expect(arena.size).toBe(2)
  })

  it('should resolve handles back to their entity', () => {
    const call = { number: '555-0100' }
    const handle = arena.acquire(call)

    expect(arena.resolve(handle)).toBe(call)
    expect(arena.has(handle)).toBe(true)
  })

  it('should forget released entities', () => {
    const call = { number: '555-0100' }
    const handle = arena.acquire(call)

    expect(arena.release(handle)).toBe(true)
    expect(arena.resolve(handle)).toBeUndefined()
    expect(arena.release(handle)).toBe(false)
    expect(arena.size).toBe(0)
  })

  it('should not reuse handles after release', () => {
    const call = { number: '555-0100' }
    const first = arena.acquire(call)
    arena.release(first)

    const second = arena.acquire(call)

    expect(second).not.toBe(first)
    expect(second).toBe(first + 1)
  })

  it('should clear all entities', () => {
    arena.acquire({ number: '1' })
    arena.acquire({ number: '2' })

    arena.clear()

    expect(arena.size).toBe(0)
  })
})
