import fs from 'fs';
import { NotFoundError } from '../../utils/errors';
import { voiceRepository } from './voice.repository';
import { voiceCache } from './voice.cache';
import { toVoiceResponse, type VoiceLanguage, type VoiceRecord, type VoiceResponse } from './voice.model';

export type CreateVoiceInput = {
  name: string;
  language: VoiceLanguage;
  description: string | null;
  sampleText: string;
  originalFilePath: string;
};

const cleanUp = async (what: string, task: () => Promise<void>) => {
  try {
    await task();
  } catch (error) {
    console.error(`[voices] Failed to remove ${what}:`, error);
  }
};

export const voiceService = {
  async create(userId: string, input: CreateVoiceInput): Promise<VoiceRecord> {
    return voiceRepository.create({ userId, ...input });
  },

  async list(userId: string, skip: number, limit: number): Promise<VoiceResponse[]> {
    const voices = await voiceRepository.listByUser(userId, skip, limit);
    return voices.map(toVoiceResponse);
  },

  /** The caller's voice; someone else's voice is reported as missing. */
  async getOwned(userId: string, voiceId: string): Promise<VoiceRecord> {
    const voice = await voiceRepository.findById(voiceId);
    if (!voice || voice.userId !== userId) {
      throw new NotFoundError('Voice not found');
    }
    return voice;
  },

  async remove(userId: string, voiceId: string): Promise<void> {
    const voice = await this.getOwned(userId, voiceId);

    // The record goes first; leftovers below only cost disk or cache space.
    await voiceRepository.deleteById(voice.id);

    await cleanUp(`cached profile of voice ${voice.id}`, () => voiceCache.delete(voice.id));
    await cleanUp(voice.originalFilePath, () => fs.promises.rm(voice.originalFilePath, { force: true }));
    const cacheFilePath = voice.cacheFilePath;
    if (cacheFilePath) {
      await cleanUp(cacheFilePath, () => fs.promises.rm(cacheFilePath, { force: true }));
    }
  },
};
