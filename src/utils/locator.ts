/**
 * Utility functions for contact photo locators and store keys
 */

export const PHOTO_LOCATOR_PREFIX = 'content://contacts/'

export type PhotoVariant = 'display' | 'thumbnail'

/**
 * Build the locator of a contact's photo
 */
export function buildPhotoLocator(personId: number): string {
  return `${PHOTO_LOCATOR_PREFIX}${personId}`
}

/**
 * Parse a photo locator into the contact id it points at
 */
export function parsePhotoLocator(
  locator: string
): { personId: number } | null {
  if (!locator.startsWith(PHOTO_LOCATOR_PREFIX)) return null

  const rest = locator.slice(PHOTO_LOCATOR_PREFIX.length)
  if (!/^\d+$/.test(rest)) return null

  const personId = Number(rest)
  if (!Number.isSafeInteger(personId)) return null

  return { personId }
}

/**
 * Build the store key holding one variant of a contact's photo
 */
export function buildStoreKey(
  prefix: string,
  personId: number,
  variant: PhotoVariant
): string {
  return `${prefix}:photo:${personId}:${variant}`
}

/**
 * Validate locator format
 */
export function validateLocator(locator: string | null | undefined): {
  valid: boolean
  error?: string
} {
  if (!locator || locator.trim().length === 0) {
    return { valid: false, error: 'Locator is missing' }
  }

  if (locator.length > 2048) {
    return { valid: false, error: 'Locator too long (max 2048 characters)' }
  }

  if (/\s/.test(locator)) {
    return { valid: false, error: 'Locator cannot contain whitespace' }
  }

  if (!/^[a-z][a-z0-9+.-]*:/i.test(locator)) {
    return { valid: false, error: 'Locator must start with a scheme' }
  }

  return { valid: true }
}
