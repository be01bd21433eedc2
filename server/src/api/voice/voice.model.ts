import mongoose, { Schema, type Types } from 'mongoose';

export const VOICE_STATUSES = ['pending', 'processing', 'ready', 'failed'] as const;
export type VoiceStatus = (typeof VOICE_STATUSES)[number];

export const VOICE_LANGUAGES = ['en', 'uk', 'ru'] as const;
export type VoiceLanguage = (typeof VOICE_LANGUAGES)[number];

export interface IVoice {
  userId: Types.ObjectId;
  name: string;
  language: VoiceLanguage;
  description: string | null;
  sampleText: string;
  status: VoiceStatus;
  originalFilePath: string;
  cacheFilePath: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type VoiceRecord = Omit<IVoice, 'userId'> & { id: string; userId: string };

export type NewVoice = Pick<
  VoiceRecord,
  'userId' | 'name' | 'language' | 'description' | 'sampleText' | 'originalFilePath'
>;

export type VoiceChanges = Partial<Pick<VoiceRecord, 'status' | 'cacheFilePath'>>;

export type VoiceResponse = {
  id: string;
  name: string;
  language: VoiceLanguage;
  description: string | null;
  status: VoiceStatus;
  created_at: string;
  updated_at: string;
};

export const toVoiceResponse = (voice: VoiceRecord): VoiceResponse => ({
  id: voice.id,
  name: voice.name,
  language: voice.language,
  description: voice.description,
  status: voice.status,
  created_at: voice.createdAt.toISOString(),
  updated_at: voice.updatedAt.toISOString(),
});

export const voiceCacheKey = (voiceId: string) => `voice:${voiceId}:cache`;

const VoiceSchema = new Schema<IVoice>(
  {
    userId: { type: Schema.Types.ObjectId, ref: 'User', required: true, index: true },
    name: { type: String, required: true, trim: true, index: true },
    language: { type: String, enum: [...VOICE_LANGUAGES], required: true },
    description: { type: String, default: null },
    sampleText: { type: String, required: true },
    status: { type: String, enum: [...VOICE_STATUSES], default: 'pending', index: true },
    originalFilePath: { type: String, required: true },
    cacheFilePath: { type: String, default: null },
  },
  { timestamps: true }
);

export default mongoose.model<IVoice>('Voice', VoiceSchema);
