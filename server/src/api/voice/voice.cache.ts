import type IORedis from 'ioredis';
import { z } from 'zod';
import config from '../../config';
import { createRedisClient } from '../../utils/redis';
import { voiceCacheKey } from './voice.model';

export const voiceProfileSchema = z.object({
  voice_id: z.string(),
  cache_path: z.string(),
  sample_rate: z.number(),
  channels: z.number(),
  bits_per_sample: z.number(),
  duration: z.number(),
});

export type VoiceProfile = z.infer<typeof voiceProfileSchema>;

export interface VoiceCache {
  set(profile: VoiceProfile): Promise<void>;
  get(voiceId: string): Promise<VoiceProfile | null>;
  delete(voiceId: string): Promise<void>;
  close(): Promise<void>;
}

export const parseVoiceProfile = (raw: string): VoiceProfile | null => {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = voiceProfileSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
};

export class RedisVoiceCache implements VoiceCache {
  private connecting: Promise<void> | null = null;

  constructor(
    private readonly redis: IORedis,
    private readonly ttlSeconds: number
  ) {}

  // lazyConnect: connect on first use, once.
  private async ready(): Promise<IORedis> {
    if (this.redis.status === 'wait') {
      if (!this.connecting) {
        this.connecting = this.redis.connect().catch((err: unknown) => {
          this.connecting = null;
          throw err;
        });
      }
      await this.connecting;
    }
    return this.redis;
  }

  async set(profile: VoiceProfile): Promise<void> {
    const redis = await this.ready();
    await redis.set(voiceCacheKey(profile.voice_id), JSON.stringify(profile), 'EX', this.ttlSeconds);
  }

  async get(voiceId: string): Promise<VoiceProfile | null> {
    const redis = await this.ready();
    const raw = await redis.get(voiceCacheKey(voiceId));
    return raw ? parseVoiceProfile(raw) : null;
  }

  async delete(voiceId: string): Promise<void> {
    const redis = await this.ready();
    await redis.del(voiceCacheKey(voiceId));
  }

  async close(): Promise<void> {
    if (this.redis.status === 'wait' || this.redis.status === 'end') return;
    await this.redis.quit();
  }
}

export class MemoryVoiceCache implements VoiceCache {
  private readonly entries = new Map<string, { profile: VoiceProfile; expiresAt: number }>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  async set(profile: VoiceProfile): Promise<void> {
    this.entries.set(voiceCacheKey(profile.voice_id), {
      profile,
      expiresAt: this.now() + this.ttlSeconds * 1000,
    });
  }

  async get(voiceId: string): Promise<VoiceProfile | null> {
    const key = voiceCacheKey(voiceId);
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.profile;
  }

  async delete(voiceId: string): Promise<void> {
    this.entries.delete(voiceCacheKey(voiceId));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

export const createVoiceCache = (options: { redisUrl: string; ttlSeconds: number }): VoiceCache => {
  if (options.redisUrl) {
    return new RedisVoiceCache(createRedisClient(options.redisUrl), options.ttlSeconds);
  }
  console.log('[voices] REDIS_URL not set, using in-process voice cache');
  return new MemoryVoiceCache(options.ttlSeconds);
};

export const voiceCache = createVoiceCache({
  redisUrl: config.redis.url,
  ttlSeconds: config.redis.voiceCacheTtlSeconds,
});
