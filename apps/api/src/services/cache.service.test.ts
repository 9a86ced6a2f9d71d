import { afterEach, describe, it, expect } from 'vitest';
import { CacheService } from './cache.service';

describe('CacheService', () => {
  let cache: CacheService | null = null;

  afterEach(() => {
    cache?.close();
    cache = null;
  });

  it('stores pages until the cache is flushed', async () => {
    cache = new CacheService(60);

    expect(await cache.set('page:201', '<html>201</html>')).toBe(true);
    expect(await cache.get<string>('page:201')).toBe('<html>201</html>');
    expect(cache.getStats().keys).toBe(1);

    await cache.flush();

    expect(await cache.get<string>('page:201')).toBeUndefined();
    expect(cache.getStats().keys).toBe(0);
  });
});
