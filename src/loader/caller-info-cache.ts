import { LRUCache } from 'lru-cache'
import type {
  CallerInfoEntry,
  CallerInfoSink,
  IdentityHandle,
  ImageHandle,
} from '../types/photo.js'

export interface CallerInfoCacheConfig {
  maxSize?: number
}

/**
 * Photo state attached to caller identities: the last decoded photo and
 * whether it is current. Bounded, so identities nobody releases age out.
 * Written only from the delivery context.
 */
export class CallerInfoCache implements CallerInfoSink {
  private cache: LRUCache<IdentityHandle, CallerInfoEntry>

  constructor(config: CallerInfoCacheConfig = {}) {
    this.cache = new LRUCache<IdentityHandle, CallerInfoEntry>({
      max: config.maxSize || 500,
      updateAgeOnGet: false,
      updateAgeOnHas: false,
    })
  }

  attachCachedImage(identity: IdentityHandle, image: ImageHandle): void {
    const entry = this.entryFor(identity)
    entry.cachedPhoto = image
  }

  markCacheCurrent(identity: IdentityHandle): void {
    const entry = this.entryFor(identity)
    entry.isCachedPhotoCurrent = true
  }

  get(identity: IdentityHandle): CallerInfoEntry | undefined {
    return this.cache.get(identity)
  }

  /**
   * Keep the cached photo but mark it stale, e.g. after the contact changed
   */
  invalidate(identity: IdentityHandle): boolean {
    const entry = this.cache.get(identity)
    if (!entry) return false
    entry.isCachedPhotoCurrent = false
    return true
  }

  delete(identity: IdentityHandle): boolean {
    return this.cache.delete(identity)
  }

  clear(): void {
    this.cache.clear()
  }

  get size(): number {
    return this.cache.size
  }

  private entryFor(identity: IdentityHandle): CallerInfoEntry {
    let entry = this.cache.get(identity)
    if (!entry) {
      entry = { cachedPhoto: null, isCachedPhotoCurrent: false }
      this.cache.set(identity, entry)
    }
    return entry
  }
}
