import type { IdentityHandle } from '../types/photo.js'

/**
 * Issues value-comparable handles for long-lived entities. The same entity
 * object maps to the same handle until released; structurally equal but
 * distinct objects get different handles. Handles are never reused, so a
 * released entity that comes back is a new identity.
 */
export class IdentityArena<T extends object> {
  private handles = new Map<T, IdentityHandle>()
  private entities = new Map<IdentityHandle, T>()
  private nextHandle = 1

  acquire(entity: T): IdentityHandle {
    const existing = this.handles.get(entity)
    if (existing !== undefined) {
      return existing
    }

    const handle = this.nextHandle++
    this.handles.set(entity, handle)
    this.entities.set(handle, entity)
    return handle
  }

  resolve(handle: IdentityHandle): T | undefined {
    return this.entities.get(handle)
  }

  has(handle: IdentityHandle): boolean {
    return this.entities.has(handle)
  }

  release(handle: IdentityHandle): boolean {
    const entity = this.entities.get(handle)
    if (entity === undefined) return false

    this.entities.delete(handle)
    this.handles.delete(entity)
    return true
  }

  clear(): void {
    this.handles.clear()
    this.entities.clear()
  }

  get size(): number {
    return this.entities.size
  }
}
