import type { HydratedDocument } from 'mongoose';
import User, { type IUser, type NewUser, type UserChanges, type UserCredentials, type UserRecord } from './user.model';

const toUserRecord = (doc: HydratedDocument<IUser>): UserRecord => ({
  id: doc._id.toString(),
  email: doc.email,
  isActive: doc.isActive,
  isSuperuser: doc.isSuperuser,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toUserCredentials = (doc: HydratedDocument<IUser>): UserCredentials => ({
  ...toUserRecord(doc),
  hashedPassword: doc.hashedPassword,
});

export class UserRepository {
  public async findById(userId: string): Promise<UserRecord | null> {
    const doc = await User.findById(userId);
    return doc ? toUserRecord(doc) : null;
  }

  public async findByEmail(email: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ email });
    return doc ? toUserRecord(doc) : null;
  }

  public async findByEmailWithPassword(email: string): Promise<UserCredentials | null> {
    const doc = await User.findOne({ email }).select('+hashedPassword');
    return doc ? toUserCredentials(doc) : null;
  }

  public async create(userData: NewUser): Promise<UserRecord> {
    const doc = await User.create(userData);
    return toUserRecord(doc);
  }

  public async updateById(userId: string, changes: UserChanges): Promise<UserRecord | null> {
    const doc = await User.findByIdAndUpdate(userId, changes, { new: true, runValidators: true, context: 'query' });
    return doc ? toUserRecord(doc) : null;
  }

  public async list(skip: number, limit: number): Promise<UserRecord[]> {
    const docs = await User.find().sort({ createdAt: 1 }).skip(skip).limit(limit);
    return docs.map(toUserRecord);
  }
}

export const userRepository = new UserRepository();
