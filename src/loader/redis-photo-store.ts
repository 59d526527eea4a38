import type { ByteStream, ResourceOpener } from '../types/photo.js'
import type { Serializer } from './serializer.js'
import { ResourceUnavailableError, toError } from './errors.js'
import {
  buildStoreKey,
  parsePhotoLocator,
  type PhotoVariant,
} from '../utils/locator.js'

/**
 * The part of an ioredis client the store reads through
 */
export interface PhotoStoreClient {
  get(key: string): Promise<string | null>
}

export interface PhotoRecord {
  contentType: string
  /** Base64 image bytes */
  data: string
  updatedAt: Date
}

// High-resolution photo first, thumbnail as fallback
const VARIANTS: PhotoVariant[] = ['display', 'thumbnail']

const CHUNK_SIZE = 64 * 1024

function isPhotoRecord(value: unknown): value is PhotoRecord {
  if (typeof value !== 'object' || value === null) return false
  return (
    'contentType' in value &&
    typeof value.contentType === 'string' &&
    'data' in value &&
    typeof value.data === 'string' &&
    'updatedAt' in value &&
    value.updatedAt instanceof Date
  )
}

async function* chunked(bytes: Buffer): ByteStream {
  for (let offset = 0; offset < bytes.length; offset += CHUNK_SIZE) {
    yield bytes.subarray(offset, offset + CHUNK_SIZE)
  }
}

/**
 * Opens contact photos stored in Redis. A locator that is not a contact
 * photo locator, an unreachable server or a malformed record is a
 * `ResourceUnavailableError`; a contact with no stored photo opens to null.
 */
export class RedisPhotoStore implements ResourceOpener {
  constructor(
    private client: PhotoStoreClient,
    private serializer: Serializer,
    private prefix: string
  ) {}

  async openResourceStream(locator: string): Promise<ByteStream | null> {
    const parsed = parsePhotoLocator(locator)
    if (!parsed) {
      throw new ResourceUnavailableError(locator, 'not a contact photo locator')
    }

    for (const variant of VARIANTS) {
      const key = buildStoreKey(this.prefix, parsed.personId, variant)
      const raw = await this.read(locator, key)
      if (raw === null) continue

      const record = this.parse(locator, raw)
      return chunked(Buffer.from(record.data, 'base64'))
    }

    return null
  }

  private async read(locator: string, key: string): Promise<string | null> {
    try {
      return await this.client.get(key)
    } catch (error) {
      throw new ResourceUnavailableError(locator, toError(error).message, error)
    }
  }

  private parse(locator: string, raw: string): PhotoRecord {
    let value: unknown
    try {
      value = this.serializer.deserialize(raw)
    } catch (error) {
      throw new ResourceUnavailableError(locator, 'unreadable photo record', error)
    }

    if (!isPhotoRecord(value)) {
      throw new ResourceUnavailableError(locator, 'malformed photo record')
    }
    return value
  }
}
