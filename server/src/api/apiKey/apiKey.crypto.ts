import crypto from 'crypto';

const API_KEY_PREFIX = 'sk_';
const DISPLAY_PREFIX_LENGTH = 8;

const sha256Hex = (s: string) => crypto.createHash('sha256').update(s, 'utf8').digest('hex');

export const hashApiKey = (raw: string): string => sha256Hex(raw);

export const getApiKeyPrefix = (raw: string): string => raw.slice(0, DISPLAY_PREFIX_LENGTH);

export const generateApiKey = (): { rawKey: string; keyHash: string } => {
  const rawKey = `${API_KEY_PREFIX}${crypto.randomBytes(32).toString('base64url')}`;
  return { rawKey, keyHash: hashApiKey(rawKey) };
};
