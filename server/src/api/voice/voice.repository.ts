import { Types, type HydratedDocument } from 'mongoose';
import Voice, { type IVoice, type NewVoice, type VoiceChanges, type VoiceRecord, type VoiceStatus } from './voice.model';

const toVoiceRecord = (doc: HydratedDocument<IVoice>): VoiceRecord => ({
  id: doc._id.toString(),
  userId: doc.userId.toString(),
  name: doc.name,
  language: doc.language,
  description: doc.description ?? null,
  sampleText: doc.sampleText,
  status: doc.status,
  originalFilePath: doc.originalFilePath,
  cacheFilePath: doc.cacheFilePath ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class VoiceRepository {
  public async create(data: NewVoice): Promise<VoiceRecord> {
    const doc = await Voice.create({ ...data, userId: new Types.ObjectId(data.userId), status: 'pending' });
    return toVoiceRecord(doc);
  }

  public async findById(voiceId: string): Promise<VoiceRecord | null> {
    const doc = await Voice.findById(voiceId);
    return doc ? toVoiceRecord(doc) : null;
  }

  public async listByUser(userId: string, skip: number, limit: number): Promise<VoiceRecord[]> {
    const docs = await Voice.find({ userId: new Types.ObjectId(userId) })
      .sort({ createdAt: 1 })
      .skip(skip)
      .limit(limit);
    return docs.map(toVoiceRecord);
  }

  public async listByStatus(status: VoiceStatus): Promise<VoiceRecord[]> {
    const docs = await Voice.find({ status });
    return docs.map(toVoiceRecord);
  }

  public async updateById(voiceId: string, changes: VoiceChanges): Promise<VoiceRecord | null> {
    const doc = await Voice.findByIdAndUpdate(voiceId, changes, { new: true, runValidators: true });
    return doc ? toVoiceRecord(doc) : null;
  }

  public async deleteById(voiceId: string): Promise<void> {
    await Voice.deleteOne({ _id: voiceId });
  }
}

export const voiceRepository = new VoiceRepository();
