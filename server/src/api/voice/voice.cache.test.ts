import { describe, it, expect, vi, beforeEach } from 'vitest';

const { FakeRedis } = vi.hoisted(() => {
  class FakeRedis {
    static instances: FakeRedis[] = [];
    status = 'wait';
    readonly store = new Map<string, { value: string; ttl: number }>();

    constructor(readonly url: string) {
      FakeRedis.instances.push(this);
    }

    on() {
      return this;
    }

    connect = vi.fn(async () => {
      this.status = 'ready';
    });

    quit = vi.fn(async () => {
      this.status = 'end';
      return 'OK';
    });

    async set(key: string, value: string, _mode: string, ttl: number) {
      this.store.set(key, { value, ttl });
      return 'OK';
    }

    async get(key: string) {
      return this.store.get(key)?.value ?? null;
    }

    async del(key: string) {
      return this.store.delete(key) ? 1 : 0;
    }
  }
  return { FakeRedis };
});

vi.mock('ioredis', () => ({ default: FakeRedis }));

import { MemoryVoiceCache, RedisVoiceCache, createVoiceCache, parseVoiceProfile, type VoiceProfile } from './voice.cache';

const profile: VoiceProfile = {
  voice_id: '64b7f0c2a1b2c3d4e5f60718',
  cache_path: '/tmp/voice_cache/64b7f0c2a1b2c3d4e5f60718.json',
  sample_rate: 22050,
  channels: 1,
  bits_per_sample: 16,
  duration: 2.5,
};

describe('api/voice/voice.cache', () => {
  beforeEach(() => {
    FakeRedis.instances.length = 0;
  });

  describe('parseVoiceProfile', () => {
    it('accepts a stored profile', () => {
      expect(parseVoiceProfile(JSON.stringify(profile))).toEqual(profile);
    });

    it('rejects malformed JSON and incomplete profiles', () => {
      expect(parseVoiceProfile('{not json')).toBeNull();
      expect(parseVoiceProfile(JSON.stringify({ voice_id: 'x' }))).toBeNull();
    });
  });

  describe('MemoryVoiceCache', () => {
    it('expires entries after the ttl', async () => {
      let now = 1000;
      const cache = new MemoryVoiceCache(10, () => now);

      await cache.set(profile);
      now += 9999;
      expect(await cache.get(profile.voice_id)).toEqual(profile);

      now += 1;
      expect(await cache.get(profile.voice_id)).toBeNull();
    });

    it('deletes entries', async () => {
      const cache = new MemoryVoiceCache(60);
      await cache.set(profile);
      await cache.delete(profile.voice_id);

      expect(await cache.get(profile.voice_id)).toBeNull();
    });
  });

  describe('RedisVoiceCache', () => {
    it('is chosen when a redis url is configured', () => {
      const cache = createVoiceCache({ redisUrl: 'redis://cache.test:6379', ttlSeconds: 60 });

      expect(cache).toBeInstanceOf(RedisVoiceCache);
      expect(FakeRedis.instances[0]?.url).toBe('redis://cache.test:6379');
    });

    it('falls back to memory without a redis url', () => {
      expect(createVoiceCache({ redisUrl: '', ttlSeconds: 60 })).toBeInstanceOf(MemoryVoiceCache);
      expect(FakeRedis.instances).toHaveLength(0);
    });

    it('stores profiles as JSON under voice:<id>:cache with the ttl', async () => {
      const cache = createVoiceCache({ redisUrl: 'redis://cache.test:6379', ttlSeconds: 60 });
      const redis = FakeRedis.instances[0];

      await cache.set(profile);

      expect(redis?.store.get('voice:64b7f0c2a1b2c3d4e5f60718:cache')).toEqual({
        value: JSON.stringify(profile),
        ttl: 60,
      });
      expect(await cache.get(profile.voice_id)).toEqual(profile);
      expect(redis?.connect).toHaveBeenCalledTimes(1);
    });

    it('treats a corrupted entry as a miss', async () => {
      const cache = createVoiceCache({ redisUrl: 'redis://cache.test:6379', ttlSeconds: 60 });
      FakeRedis.instances[0]?.store.set('voice:abc:cache', { value: 'garbage', ttl: 60 });

      expect(await cache.get('abc')).toBeNull();
    });

    it('deletes entries and quits on close', async () => {
      const cache = createVoiceCache({ redisUrl: 'redis://cache.test:6379', ttlSeconds: 60 });
      const redis = FakeRedis.instances[0];

      await cache.set(profile);
      await cache.delete(profile.voice_id);
      expect(redis?.store.size).toBe(0);

      await cache.close();
      expect(redis?.quit).toHaveBeenCalledTimes(1);
    });

    it('does not connect just to close', async () => {
      const cache = createVoiceCache({ redisUrl: 'redis://cache.test:6379', ttlSeconds: 60 });

      await cache.close();

      expect(FakeRedis.instances[0]?.connect).not.toHaveBeenCalled();
      expect(FakeRedis.instances[0]?.quit).not.toHaveBeenCalled();
    });
  });
});
