import { Types, type HydratedDocument } from 'mongoose';
import ApiKey, { type ApiKeyRecord, type IApiKey, type NewApiKey } from './apiKey.model';

const toApiKeyRecord = (doc: HydratedDocument<IApiKey>): ApiKeyRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  keyHash: doc.keyHash,
  prefix: doc.prefix,
  userId: doc.userId.toString(),
  isActive: doc.isActive,
  expiresAt: doc.expiresAt ?? null,
  lastUsedAt: doc.lastUsedAt ?? null,
  createdAt: doc.createdAt,
});

export class ApiKeyRepository {
  public async create(data: NewApiKey): Promise<ApiKeyRecord> {
    const doc = await ApiKey.create({ ...data, userId: new Types.ObjectId(data.userId) });
    return toApiKeyRecord(doc);
  }

  public async findById(apiKeyId: string): Promise<ApiKeyRecord | null> {
    const doc = await ApiKey.findById(apiKeyId);
    return doc ? toApiKeyRecord(doc) : null;
  }

  public async findByHash(keyHash: string): Promise<ApiKeyRecord | null> {
    const doc = await ApiKey.findOne({ keyHash });
    return doc ? toApiKeyRecord(doc) : null;
  }

  public async listByUser(userId: string, skip: number, limit: number): Promise<ApiKeyRecord[]> {
    const docs = await ApiKey.find({ userId: new Types.ObjectId(userId) })
      .sort({ createdAt: 1 })
      .skip(skip)
      .limit(limit);
    return docs.map(toApiKeyRecord);
  }

  public async touchLastUsed(apiKeyId: string, at: Date): Promise<void> {
    await ApiKey.updateOne({ _id: apiKeyId }, { $set: { lastUsedAt: at } });
  }

  public async deleteById(apiKeyId: string): Promise<void> {
    await ApiKey.deleteOne({ _id: apiKeyId });
  }
}

export const apiKeyRepository = new ApiKeyRepository();
