/**
 * CountCache Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CountCache } from '../../../src/infrastructure/cache/CountCache.js';
import { ManualClock, silentLogger } from '../../helpers/fixtures.js';

describe('CountCache', () => {
  let clock: ManualClock;
  let cache: CountCache;

  beforeEach(() => {
    clock = new ManualClock(0);
    cache = new CountCache(silentLogger, { capacity: 3, ttlMs: 5000 }, clock);
  });

  describe('get/put', () => {
    it('should store and retrieve counts', () => {
      cache.put('home', 7);
      expect(cache.get('home')).toBe(7);
    });

    it('should return undefined for missing keys', () => {
      expect(cache.get('nonexistent')).toBeUndefined();
    });

    it('should overwrite an existing entry without evicting', () => {
      cache.put('a', 1);
      cache.put('b', 2);
      cache.put('c', 3);
      cache.put('a', 10);

      expect(cache.size).toBe(3);
      expect(cache.get('a')).toBe(10);
      expect(cache.stats().evictions).toBe(0);
    });
  });

  describe('TTL expiration', () => {
    it('should serve an entry exactly at the TTL and expire it just after', () => {
      cache.put('home', 4);

      clock.set(5000);
      expect(cache.get('home')).toBe(4);

      clock.set(5001);
      expect(cache.get('home')).toBeUndefined();
      expect(cache.size).toBe(0);
      expect(cache.stats().expirations).toBe(1);
    });

    it('should expire an entry while other keys are written and read around it', () => {
      const roomy = new CountCache(silentLogger, { capacity: 10, ttlMs: 5000 }, clock);
      roomy.put('home', 9);

      for (let t = 1000; t <= 6000; t += 1000) {
        clock.set(t);
        roomy.put(`page-${t}`, t);
        roomy.put('about', t);
        expect(roomy.get('about')).toBe(t);
        expect(roomy.get(`page-${t}`)).toBe(t);
      }

      // 'home' is now the LRU entry and 6000ms old
      expect(roomy.peek('home')).toBeUndefined();
      expect(roomy.get('home')).toBeUndefined();
      expect(roomy.stats()).toMatchObject({ expirations: 1, misses: 1, evictions: 0 });
      expect(roomy.get('about')).toBe(6000);
    });

    it('should restart the TTL on put', () => {
      cache.put('home', 1);
      clock.set(4000);
      cache.put('home', 2);
      clock.set(8000);

      expect(cache.get('home')).toBe(2);
    });
  });

  describe('peek', () => {
    it('should read a live entry without counting or refreshing it', () => {
      cache.put('a', 1);
      cache.put('b', 2);
      cache.put('c', 3);

      expect(cache.peek('a')).toBe(1);
      expect(cache.peek('missing')).toBeUndefined();
      expect(cache.stats()).toMatchObject({ hits: 0, misses: 0 });

      // 'a' stays least recently used
      cache.put('d', 4);
      expect(cache.peek('a')).toBeUndefined();
      expect(cache.peek('b')).toBe(2);
    });
  });

  describe('increment', () => {
    it('should seed an absent entry with the increment', () => {
      expect(cache.increment('home', 1)).toBe(1);
      expect(cache.get('home')).toBe(1);
    });

    it('should add to a live entry and restart its TTL', () => {
      cache.put('home', 5);
      clock.set(4000);
      expect(cache.increment('home', 1)).toBe(6);

      clock.set(8000);
      expect(cache.get('home')).toBe(6);
    });

    it('should reseed an expired entry instead of adding to it', () => {
      cache.put('home', 5);
      clock.set(6000);

      expect(cache.increment('home', 1)).toBe(1);
    });
  });

  describe('LRU eviction', () => {
    it('should evict the least recently used entry when full', () => {
      cache.put('a', 1);
      cache.put('b', 2);
      cache.put('c', 3);

      // Touch 'a' so 'b' becomes the oldest
      cache.get('a');
      cache.put('d', 4);

      expect(cache.get('a')).toBe(1);
      expect(cache.get('b')).toBeUndefined();
      expect(cache.get('c')).toBe(3);
      expect(cache.get('d')).toBe(4);
      expect(cache.stats().evictions).toBe(1);
    });

    it('should evict when incrementing a new key into a full cache', () => {
      cache.put('a', 1);
      cache.put('b', 2);
      cache.put('c', 3);
      cache.increment('d', 1);

      expect(cache.size).toBe(3);
      expect(cache.get('a')).toBeUndefined();
    });

    it('should reject a non-positive capacity', () => {
      expect(() => new CountCache(silentLogger, { capacity: 0 })).toThrow(RangeError);
    });
  });

  describe('invalidate and clear', () => {
    it('should report whether an entry was removed', () => {
      cache.put('home', 1);
      expect(cache.invalidate('home')).toBe(true);
      expect(cache.invalidate('home')).toBe(false);
      expect(cache.get('home')).toBeUndefined();
    });

    it('should clear every entry', () => {
      cache.put('a', 1);
      cache.put('b', 2);
      cache.clear();
      expect(cache.size).toBe(0);
    });
  });

  describe('stats', () => {
    it('should track hits, misses and hit rate', () => {
      cache.put('home', 1);
      cache.get('home');
      cache.get('home');
      cache.get('about');
      cache.get('contact');

      expect(cache.stats()).toEqual({
        hits: 2,
        misses: 2,
        size: 1,
        capacity: 3,
        evictions: 0,
        expirations: 0,
        hitRate: 0.5,
      });
    });

    it('should report a zero hit rate before any lookup', () => {
      expect(cache.stats().hitRate).toBe(0);
    });
  });
});
