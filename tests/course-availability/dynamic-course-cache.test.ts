import { TelemetrySink } from '../../src/common/types';
import { DynamicCourseCache } from '../../src/course-availability/dynamic-course-cache';

interface Entry {
  ids: string[];
}

function clock(start = Date.parse('2026-01-01T00:00:00.000Z')) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('DynamicCourseCache', () => {
  it('returns stored values and counts hits and misses', async () => {
    const cache = new DynamicCourseCache<Entry>();
    await cache.set('a', { ids: ['c1'] });

    expect(await cache.get('a')).toEqual({ ids: ['c1'] });
    expect(await cache.get('b')).toBeNull();

    const stats = await cache.getStats();
    expect(stats.totalRequests).toBe(2);
    expect(stats.hits).toBe(1);
    expect(stats.misses).toBe(1);
    expect(stats.hitRate).toBe(0.5);
    expect(stats.activeItems).toBe(1);
  });

  it('hands out copies so callers cannot change stored values', async () => {
    const cache = new DynamicCourseCache<Entry>();
    const stored = { ids: ['c1'] };
    await cache.set('a', stored);
    stored.ids.push('c2');

    const first = await cache.get('a');
    first?.ids.push('c3');

    expect(await cache.get('a')).toEqual({ ids: ['c1'] });
  });

  it('expires entries older than the ttl on read', async () => {
    const time = clock();
    const cache = new DynamicCourseCache<Entry>({ ttlMs: 1000, now: time.now });
    await cache.set('a', { ids: ['c1'] });

    time.advance(1000);
    expect(await cache.get('a')).toEqual({ ids: ['c1'] });

    time.advance(1);
    expect(await cache.get('a')).toBeNull();
    expect(cache.size).toBe(0);
    expect((await cache.getStats()).misses).toBe(1);
  });

  it('evicts the least recently used key at capacity', async () => {
    const cache = new DynamicCourseCache<Entry>({ maxSize: 2 });
    await cache.set('a', { ids: ['1'] });
    await cache.set('b', { ids: ['2'] });
    await cache.get('a');
    await cache.set('c', { ids: ['3'] });

    expect(cache.size).toBe(2);
    expect(await cache.get('b')).toBeNull();
    expect(await cache.get('a')).toEqual({ ids: ['1'] });
    expect(await cache.get('c')).toEqual({ ids: ['3'] });
  });

  it('overwrites an existing key without evicting', async () => {
    const cache = new DynamicCourseCache<Entry>({ maxSize: 2 });
    await cache.set('a', { ids: ['1'] });
    await cache.set('b', { ids: ['2'] });
    await cache.set('a', { ids: ['1b'] });

    expect(cache.size).toBe(2);
    await cache.set('c', { ids: ['3'] });

    expect(await cache.get('b')).toBeNull();
    expect(await cache.get('a')).toEqual({ ids: ['1b'] });
  });

  it('keeps size bounded under concurrent writes', async () => {
    const cache = new DynamicCourseCache<Entry>({ maxSize: 5 });
    await Promise.all(Array.from({ length: 20 }, (_, i) => cache.set(`k${i}`, { ids: [String(i)] })));

    expect(cache.size).toBe(5);
    expect(await cache.get('k19')).toEqual({ ids: ['19'] });
    expect(await cache.get('k0')).toBeNull();
  });

  it('removes expired entries on cleanup', async () => {
    const time = clock();
    const cache = new DynamicCourseCache<Entry>({ ttlMs: 1000, now: time.now });
    await cache.set('old', { ids: [] });
    time.advance(600);
    await cache.set('new', { ids: [] });
    time.advance(600);

    expect(await cache.cleanupExpired()).toBe(1);
    expect(cache.size).toBe(1);
    expect((await cache.getStats()).expiredCleaned).toBe(1);
    expect(await cache.cleanupExpired()).toBe(0);
  });

  it('resets items and stats on clear', async () => {
    const cache = new DynamicCourseCache<Entry>();
    await cache.set('a', { ids: [] });
    await cache.get('a');
    await cache.clear();

    expect(cache.size).toBe(0);
    const stats = await cache.getStats();
    expect(stats.totalRequests).toBe(0);
    expect(stats.hits).toBe(0);
    expect(stats.hitRate).toBe(0);
    expect(stats.memoryEstimateMb).toBe(0);
  });

  it('lists the most accessed items first', async () => {
    const time = clock();
    const cache = new DynamicCourseCache<Entry>({ now: time.now });
    await cache.set('a', { ids: ['c1'] });
    await cache.set('b', { ids: [] });
    time.advance(90_000);
    await cache.get('b');
    await cache.get('b');

    const top = await cache.getTopItems(1);

    expect(top).toEqual([
      {
        cacheKey: 'b',
        accessCount: 3,
        ageMinutes: 1.5,
        lastAccess: '2026-01-01T00:01:30.000Z',
        dataSizeBytes: JSON.stringify({ ids: [] }).length,
      },
    ]);
    expect(await cache.getTopItems()).toHaveLength(2);
  });

  it('reports cache operations to telemetry', async () => {
    const record = jest.fn();
    const cache = new DynamicCourseCache<Entry>({}, { record });
    await cache.set('a', { ids: [] });
    await cache.get('a');

    expect(record).toHaveBeenCalledTimes(2);
    expect(record).toHaveBeenLastCalledWith(
      'DynamicCacheOperation',
      expect.objectContaining({ operation: 'cache_hit', cache_size: 1, hit_rate: 1 }),
    );
  });

  it('keeps working when telemetry throws', async () => {
    const telemetry: TelemetrySink = {
      record: () => {
        throw new Error('sink down');
      },
    };
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const cache = new DynamicCourseCache<Entry>({}, telemetry);

    await cache.set('a', { ids: ['c1'] });
    expect(await cache.get('a')).toEqual({ ids: ['c1'] });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenLastCalledWith('[DynamicCourseCache] Telemetry error', expect.any(Error));
    warn.mockRestore();
  });
});
