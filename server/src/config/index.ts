import dotenv from 'dotenv';
import type { SignOptions } from 'jsonwebtoken';

dotenv.config();

type TrustProxySetting = boolean | number | string;

export type TtsEngineKind = 'sample' | 'upstream';

const TEN_YEARS_SECONDS = 60 * 60 * 24 * 365 * 10;

const parsePort = (raw: string | undefined, fallback: number): number => {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const parsePositiveInt = (raw: string | undefined, fallback: number): number => {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw.trim(), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const parseJwtExpiresIn = (raw: string | undefined): NonNullable<SignOptions['expiresIn']> => {
  // 8 days
  if (!raw) return 60 * 60 * 24 * 8;
  const trimmed = raw.trim();
  if (/^\d+$/.test(trimmed)) return Number.parseInt(trimmed, 10);
  return trimmed as NonNullable<SignOptions['expiresIn']>;
};

const parseBoolean = (raw: string | undefined, fallback: boolean): boolean => {
  if (raw === undefined) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  return fallback;
};

const parseCsv = (raw: string | undefined): string[] =>
  (raw || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

const parseTrustProxy = (raw: string | undefined): TrustProxySetting => {
  if (raw === undefined || raw.trim() === '') {
    // Only trust loopback proxies unless told otherwise.
    return 'loopback';
  }

  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(normalized)) return false;
  if (/^\d+$/.test(normalized)) return Number.parseInt(normalized, 10);
  return raw.trim();
};

const parseTtsEngine = (raw: string | undefined): TtsEngineKind => {
  const normalized = (raw || '').trim().toLowerCase();
  return normalized === 'upstream' ? 'upstream' : 'sample';
};

const normalizePrefix = (raw: string | undefined): string => {
  const trimmed = (raw || '/api/v1').trim().replace(/\/+$/, '');
  if (!trimmed) return '';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
};

export type ConfigEnv = Record<string, string | undefined>;

export const createConfig = (env: ConfigEnv = process.env) => {
  const isProduction = (env.NODE_ENV || '').toLowerCase() === 'production';

  const config = {
    env: env.NODE_ENV || 'development',
    projectName: env.PROJECT_NAME || 'Speechbox TTS API',
    apiPrefix: normalizePrefix(env.API_PREFIX),
    mongoUri: env.MONGO_URI || 'mongodb://localhost:27017/speechbox',
    port: parsePort(env.PORT, 8000),
    jwtSecret: env.JWT_SECRET || (isProduction ? '' : 'dev-jwt-secret'),
    jwtExpiresIn: parseJwtExpiresIn(env.JWT_EXPIRES_IN),
    allowUserRegistration: parseBoolean(env.ALLOW_USER_REGISTRATION, true),
    enableRateLimit: parseBoolean(env.ENABLE_RATE_LIMIT, isProduction),
    trustProxy: parseTrustProxy(env.TRUST_PROXY),
    firstSuperuser: {
      email: (env.FIRST_SUPERUSER || 'admin@example.com').trim().toLowerCase(),
      password: env.FIRST_SUPERUSER_PASSWORD || 'admin',
    },
    cors: {
      allowedOrigins: [] as string[],
      allowAnyOrigin: false,
    },
    redis: {
      url: (env.REDIS_URL || '').trim(),
      voiceCacheTtlSeconds: parsePositiveInt(env.VOICE_CACHE_TTL, TEN_YEARS_SECONDS),
    },
    voices: {
      uploadDir: env.VOICE_UPLOAD_DIR || 'data/voice_uploads',
      cacheDir: env.VOICE_CACHE_DIR || 'data/voice_cache',
      maxFileSize: parsePositiveInt(env.MAX_VOICE_FILE_SIZE, 100 * 1024 * 1024),
      allowedMimeTypes: ['audio/wav', 'audio/x-wav'],
    },
    tts: {
      engine: parseTtsEngine(env.TTS_ENGINE),
      outputDir: env.TTS_OUTPUT_DIR || 'data/tts_output',
      sampleFile: env.TTS_SAMPLE_FILE || 'static/example.wav',
      upstreamUrl: (env.TTS_UPSTREAM_URL || '').trim(),
      upstreamApiKey: env.TTS_UPSTREAM_API_KEY || '',
      maxTextLength: 2000,
    },
  };

  const corsOrigins = parseCsv(env.CORS_ORIGINS);
  config.cors.allowAnyOrigin = corsOrigins.includes('*') || (!isProduction && corsOrigins.length === 0);
  config.cors.allowedOrigins = corsOrigins.filter((o) => o !== '*');

  if (isProduction) {
    if (!config.jwtSecret) {
      throw new Error('Missing required env: JWT_SECRET');
    }
    if (config.tts.engine === 'upstream' && !config.tts.upstreamUrl) {
      throw new Error('Missing required env: TTS_UPSTREAM_URL');
    }
  }

  return config;
};

export type AppConfig = ReturnType<typeof createConfig>;

const config = createConfig(process.env);
export default config;
