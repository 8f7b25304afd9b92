import { LRU } from 'tiny-lru'
import createLogger from './logger.js'

const logger = createLogger('cache')

const maxItems = 1000
const defaultTtl = 1000 * 60 * 60 * 24 // 24 hours
const defaultResetTtl = true

type CacheKeys = {
  state: string
  autoDiscovery: string
}

/**
 * Last published payloads, stored serialized so comparisons are by value
 */
export class Cache {
  private readonly lru: LRU<string>

  constructor(max = maxItems, ttl = defaultTtl, resetTtl = defaultResetTtl) {
    this.lru = new LRU<string>(max, ttl, resetTtl)
  }

  cacheKey(serialNumber: string): CacheKeys {
    return {
      state: `${serialNumber}:state`,
      autoDiscovery: `${serialNumber}:auto-discovery`,
    }
  }

  /**
   * True when `value` equals the cached value; otherwise stores it and
   * returns false
   */
  matchByValue(key: string, value: unknown): boolean {
    const serialized = JSON.stringify(value)
    if (this.lru.get(key) === serialized) {
      logger.debug(`Key "${key}" value has not changed.`)
      return true
    }

    this.lru.set(key, serialized, false, true)
    return false
  }

  get(key: string): unknown {
    const value = this.lru.get(key)
    return value === undefined ? undefined : JSON.parse(value)
  }

  set(key: string, value: unknown): this {
    this.lru.set(key, JSON.stringify(value), false, true)
    logger.debug(`Set "${key}" value:`, value)
    return this
  }

  has(key: string): boolean {
    return this.lru.has(key)
  }

  delete(key: string): this {
    this.lru.delete(key)
    return this
  }

  clear(): this {
    this.lru.clear()
    return this
  }
}

export const cache = new Cache()
