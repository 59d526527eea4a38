import superjson from 'superjson'
import type { PhotoRecord } from './redis-photo-store.js'

/**
 * Encodes photo records for Redis. `deserialize` returns whatever was
 * stored; `RedisPhotoStore` checks its shape before use.
 */
export interface Serializer {
  serialize: (record: PhotoRecord) => string
  deserialize: (raw: string) => unknown
}

export const superjsonSerializer: Serializer = {
  serialize: (record) => superjson.stringify(record),
  deserialize: (raw) => superjson.parse<unknown>(raw),
}

// JSON keeps `updatedAt` as an ISO string
function reviveUpdatedAt(key: string, value: unknown): unknown {
  return key === 'updatedAt' && typeof value === 'string' ? new Date(value) : value
}

export const jsonSerializer: Serializer = {
  serialize: (record) => JSON.stringify(record),
  deserialize: (raw) => {
    const value: unknown = JSON.parse(raw, reviveUpdatedAt)
    return value
  },
}

export function createSerializer(
  type: 'json' | 'superjson' | Serializer
): Serializer {
  if (typeof type === 'object') {
    return type
  }
  return type === 'json' ? jsonSerializer : superjsonSerializer
}
