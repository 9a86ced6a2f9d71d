import NodeCache from 'node-cache';
import { logger } from '../utils/logger';
import { config } from '../config/app.config';

export class CacheService {
  private cache: NodeCache;
  private defaultTTL: number;

  constructor(defaultTTL: number = config.cache.pageTTL) {
    this.defaultTTL = defaultTTL;
    this.cache = new NodeCache({
      stdTTL: defaultTTL,
      checkperiod: 60, // Check for expired keys every 60s
      useClones: false,
    });

    logger.info('Cache service initialized');
  }

  async get<T>(key: string): Promise<T | undefined> {
    const value = this.cache.get<T>(key);
    if (value !== undefined) {
      logger.debug(`Cache HIT: ${key}`);
    } else {
      logger.debug(`Cache MISS: ${key}`);
    }
    return value;
  }

  async set<T>(key: string, value: T, ttl?: number): Promise<boolean> {
    const seconds = ttl ?? this.defaultTTL;
    const result = this.cache.set(key, value, seconds);
    if (result) {
      logger.debug(`Cache SET: ${key} (TTL: ${seconds}s)`);
    }
    return result;
  }

  async flush(): Promise<void> {
    this.cache.flushAll();
    logger.info('Cache flushed');
  }

  getStats(): NodeCache.Stats {
    return this.cache.getStats();
  }

  // Stops the expiry timer so the process can exit
  close(): void {
    this.cache.close();
  }
}
