import type { DisplayMode, IdentityHandle } from '../types/photo.js'
import type { IdentityArena } from './identity-arena.js'
import { buildPhotoLocator } from '../utils/locator.js'

export interface ContactEntity {
  personId?: number | null
}

/**
 * Per-slot record of which identity the slot is showing or loading.
 * Lets callers skip a load when the slot already belongs to the same
 * identity, and reload as soon as the identity changes.
 */
export class RequestTracker {
  private currentIdentity: IdentityHandle | null = null
  private displayMode: DisplayMode = 'undefined'

  /**
   * True when `identity` is not the one recorded by the last
   * {@link setIdentity}. `null` only matches `null`.
   */
  shouldLoad(identity: IdentityHandle | null): boolean {
    return this.currentIdentity !== identity
  }

  setIdentity(identity: IdentityHandle | null): void {
    this.currentIdentity = identity
  }

  getIdentity(): IdentityHandle | null {
    return this.currentIdentity
  }

  setDisplayMode(mode: DisplayMode): void {
    this.displayMode = mode
  }

  getDisplayMode(): DisplayMode {
    return this.displayMode
  }

  /**
   * Photo locator for the current identity, or null when there is none
   * or it carries no contact id.
   */
  getPhotoLocator(arena: IdentityArena<ContactEntity>): string | null {
    if (this.currentIdentity === null) return null

    const entity = arena.resolve(this.currentIdentity)
    if (entity?.personId === undefined || entity.personId === null) {
      return null
    }
    return buildPhotoLocator(entity.personId)
  }
}
