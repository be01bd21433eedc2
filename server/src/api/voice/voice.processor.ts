import fs from 'fs';
import path from 'path';
import config from '../../config';
import { parseWavHeader } from '../../utils/wav';
import { voiceRepository } from './voice.repository';
import { parseVoiceProfile, voiceCache, type VoiceProfile } from './voice.cache';
import type { VoiceRecord, VoiceStatus } from './voice.model';

const readProfileFile = async (cachePath: string): Promise<VoiceProfile | null> => {
  try {
    return parseVoiceProfile(await fs.promises.readFile(cachePath, 'utf8'));
  } catch (error) {
    console.warn(`[voices] Cannot read voice profile ${cachePath}:`, error);
    return null;
  }
};

const cacheSafely = async (profile: VoiceProfile): Promise<void> => {
  try {
    await voiceCache.set(profile);
  } catch (error) {
    console.warn(`[voices] Cannot cache voice ${profile.voice_id}:`, error);
  }
};

// Voice deleted while its profile was being built.
const discardProfile = async (voiceId: string, cachePath: string): Promise<null> => {
  console.warn(`[voices] Voice ${voiceId} was deleted during processing; discarding its profile`);
  await fs.promises.rm(cachePath, { force: true });
  await voiceCache.delete(voiceId).catch((error: unknown) => {
    console.warn(`[voices] Cannot evict voice ${voiceId} from cache:`, error);
  });
  return null;
};

export const voiceProcessor = {
  /**
   * Turns an uploaded sample into a cached voice profile.
   * Moves the voice through processing to ready, or to failed; never rejects.
   * Returns null when the voice no longer exists.
   */
  async processVoice(voiceId: string): Promise<VoiceStatus | null> {
    const voice = await voiceRepository.findById(voiceId);
    if (!voice || !(await voiceRepository.updateById(voice.id, { status: 'processing' }))) {
      console.warn(`[voices] Voice ${voiceId} disappeared before processing`);
      return null;
    }

    const cachePath = path.join(config.voices.cacheDir, `${voice.id}.json`);
    try {
      const audio = await fs.promises.readFile(voice.originalFilePath);
      const wav = parseWavHeader(audio);
      if (!wav) {
        throw new Error('Uploaded sample is not a valid WAV file');
      }

      const profile: VoiceProfile = {
        voice_id: voice.id,
        cache_path: cachePath,
        sample_rate: wav.sampleRate,
        channels: wav.channels,
        bits_per_sample: wav.bitsPerSample,
        duration: wav.duration,
      };

      await fs.promises.mkdir(config.voices.cacheDir, { recursive: true });
      await fs.promises.writeFile(cachePath, JSON.stringify(profile), 'utf8');
      if (!(await voiceRepository.updateById(voice.id, { status: 'ready', cacheFilePath: cachePath }))) {
        return discardProfile(voice.id, cachePath);
      }
      await cacheSafely(profile);
      // A delete may have slipped in between the status update and the cache write.
      if (!(await voiceRepository.findById(voice.id))) {
        return discardProfile(voice.id, cachePath);
      }

      console.log(`[voices] Voice ${voice.id} is ready (${wav.duration}s sample)`);
      return 'ready';
    } catch (error) {
      console.error(`[voices] Error processing voice ${voice.id}:`, error);
      if (!(await voiceRepository.updateById(voice.id, { status: 'failed' }))) {
        return discardProfile(voice.id, cachePath);
      }
      return 'failed';
    }
  },

  /** Cache first, then the profile file on disk (re-cached on hit). A cache outage counts as a miss. */
  async getProfile(voice: VoiceRecord): Promise<VoiceProfile | null> {
    try {
      const cached = await voiceCache.get(voice.id);
      if (cached) return cached;
    } catch (error) {
      console.warn(`[voices] Voice cache lookup failed for ${voice.id}, reading profile file:`, error);
    }
    if (!voice.cacheFilePath) return null;

    const profile = await readProfileFile(voice.cacheFilePath);
    if (profile) await cacheSafely(profile);
    return profile;
  },

  /** Loads every ready voice into the cache. Returns how many were cached. */
  async loadAllVoicesToCache(): Promise<number> {
    const voices = await voiceRepository.listByStatus('ready');
    let loaded = 0;
    for (const voice of voices) {
      if (!voice.cacheFilePath) continue;
      const profile = await readProfileFile(voice.cacheFilePath);
      if (!profile) continue;
      await voiceCache.set(profile);
      loaded += 1;
    }
    console.log(`[voices] Cached ${loaded} of ${voices.length} ready voices`);
    return loaded;
  },
};
