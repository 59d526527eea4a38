import { Redis } from 'ioredis'
import type { RedisConfig } from '../types/config.js'

export type { RedisConfig }

/**
 * Redis connection for reading photo records. `owned` is false when the
 * caller passed in its own client, which the loader then leaves open.
 */
export function createRedisClient(config: RedisConfig): {
  client: Redis
  owned: boolean
} {
  if (typeof config === 'string') {
    return { client: new Redis(config), owned: true }
  } else if (config instanceof Redis) {
    return { client: config, owned: false }
  } else {
    return { client: new Redis(config), owned: true }
  }
}
