import mongoose, { Schema, type Types } from 'mongoose';

export interface IApiKey {
  name: string;
  keyHash: string;
  prefix: string;
  userId: Types.ObjectId;
  isActive: boolean;
  expiresAt: Date | null;
  lastUsedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type ApiKeyRecord = {
  id: string;
  name: string;
  keyHash: string;
  prefix: string;
  userId: string;
  isActive: boolean;
  expiresAt: Date | null;
  lastUsedAt: Date | null;
  createdAt: Date;
};

export type NewApiKey = Pick<ApiKeyRecord, 'name' | 'keyHash' | 'prefix' | 'userId' | 'isActive' | 'expiresAt'>;

export type ApiKeyResponse = {
  id: string;
  name: string;
  is_active: boolean;
  expires_at: string | null;
  created_at: string;
  last_used_at: string | null;
  prefix: string;
};

export const toApiKeyResponse = (apiKey: ApiKeyRecord): ApiKeyResponse => ({
  id: apiKey.id,
  name: apiKey.name,
  is_active: apiKey.isActive,
  expires_at: apiKey.expiresAt ? apiKey.expiresAt.toISOString() : null,
  created_at: apiKey.createdAt.toISOString(),
  last_used_at: apiKey.lastUsedAt ? apiKey.lastUsedAt.toISOString() : null,
  prefix: apiKey.prefix,
});

export const isApiKeyExpired = (apiKey: Pick<ApiKeyRecord, 'expiresAt'>, now: Date = new Date()): boolean =>
  apiKey.expiresAt !== null && apiKey.expiresAt.getTime() < now.getTime();

const ApiKeySchema = new Schema<IApiKey>(
  {
    name: { type: String, required: true, trim: true, index: true },
    keyHash: { type: String, required: true, unique: true, index: true },
    prefix: { type: String, required: true },
    userId: { type: Schema.Types.ObjectId, ref: 'User', required: true, index: true },
    isActive: { type: Boolean, default: true },
    expiresAt: { type: Date, default: null },
    lastUsedAt: { type: Date, default: null },
  },
  { timestamps: true }
);

export default mongoose.model<IApiKey>('ApiKey', ApiKeySchema);
