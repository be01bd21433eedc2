import { NotFoundError } from '../../utils/errors';
import { userRepository } from '../user/user.repository';
import type { UserRecord } from '../user/user.model';
import { apiKeyRepository } from './apiKey.repository';
import { generateApiKey, getApiKeyPrefix, hashApiKey } from './apiKey.crypto';
import { isApiKeyExpired, toApiKeyResponse, type ApiKeyResponse } from './apiKey.model';

export type CreateApiKeyInput = {
  name: string;
  isActive?: boolean;
  expiresAt?: Date | null;
};

export type ApiKeyCheckResult =
  | { status: 'not_found'; message: string; hashed_key_prefix: string }
  | {
      status: 'found';
      is_active: boolean;
      expires_at: string | null;
      user_email: string | null;
      user_active: boolean | null;
      hashed_key_prefix: string;
      stored_key_prefix: string;
    };

export const apiKeyService = {
  async create(userId: string, input: CreateApiKeyInput): Promise<ApiKeyResponse & { key: string }> {
    const { rawKey, keyHash } = generateApiKey();
    const created = await apiKeyRepository.create({
      name: input.name,
      keyHash,
      prefix: getApiKeyPrefix(rawKey),
      userId,
      isActive: input.isActive ?? true,
      expiresAt: input.expiresAt ?? null,
    });

    // The raw key is only ever returned here.
    return { ...toApiKeyResponse(created), key: rawKey };
  },

  async list(userId: string, skip: number, limit: number): Promise<ApiKeyResponse[]> {
    const keys = await apiKeyRepository.listByUser(userId, skip, limit);
    return keys.map(toApiKeyResponse);
  },

  async remove(userId: string, apiKeyId: string): Promise<void> {
    const apiKey = await apiKeyRepository.findById(apiKeyId);
    if (!apiKey || apiKey.userId !== userId) {
      throw new NotFoundError('API key not found');
    }
    await apiKeyRepository.deleteById(apiKeyId);
  },

  /** Resolves the owner of a raw API key, or null when the key is unknown, inactive, expired or its owner is inactive. */
  async authenticate(rawKey: string, now: Date = new Date()): Promise<UserRecord | null> {
    const prefix = getApiKeyPrefix(rawKey);
    const apiKey = await apiKeyRepository.findByHash(hashApiKey(rawKey));

    if (!apiKey) {
      console.warn(`[api-keys] unknown key ${prefix}...`);
      return null;
    }
    if (!apiKey.isActive) {
      console.warn(`[api-keys] inactive key ${prefix}...`);
      return null;
    }
    if (isApiKeyExpired(apiKey, now)) {
      console.warn(`[api-keys] expired key ${prefix}...`);
      return null;
    }

    await apiKeyRepository.touchLastUsed(apiKey.id, now);

    const user = await userRepository.findById(apiKey.userId);
    if (!user || !user.isActive) {
      console.warn(`[api-keys] key ${prefix}... belongs to a missing or inactive user`);
      return null;
    }
    return user;
  },

  async check(rawKey: string): Promise<ApiKeyCheckResult> {
    const keyHash = hashApiKey(rawKey);
    const apiKey = await apiKeyRepository.findByHash(keyHash);
    if (!apiKey) {
      return {
        status: 'not_found',
        message: 'API key not found in database',
        hashed_key_prefix: keyHash.slice(0, 8),
      };
    }

    const user = await userRepository.findById(apiKey.userId);
    return {
      status: 'found',
      is_active: apiKey.isActive,
      expires_at: apiKey.expiresAt ? apiKey.expiresAt.toISOString() : null,
      user_email: user ? user.email : null,
      user_active: user ? user.isActive : null,
      hashed_key_prefix: keyHash.slice(0, 8),
      stored_key_prefix: apiKey.keyHash.slice(0, 8),
    };
  },
};
