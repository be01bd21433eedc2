import mongoose, { Schema } from 'mongoose';

export interface IUser {
  email: string;
  hashedPassword: string;
  isActive: boolean;
  isSuperuser: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type UserRecord = Omit<IUser, 'hashedPassword'> & { id: string };
export type UserCredentials = UserRecord & { hashedPassword: string };

export type NewUser = Pick<IUser, 'email' | 'hashedPassword'> & Partial<Pick<IUser, 'isActive' | 'isSuperuser'>>;
export type UserChanges = Partial<Pick<IUser, 'email' | 'hashedPassword' | 'isActive' | 'isSuperuser'>>;

export type UserResponse = {
  id: string;
  email: string;
  is_active: boolean;
  is_superuser: boolean;
  created_at: string;
};

export const toUserResponse = (user: UserRecord): UserResponse => ({
  id: user.id,
  email: user.email,
  is_active: user.isActive,
  is_superuser: user.isSuperuser,
  created_at: user.createdAt.toISOString(),
});

const UserSchema = new Schema<IUser>(
  {
    email: { type: String, required: true, unique: true, trim: true, lowercase: true },
    hashedPassword: { type: String, required: true, select: false },
    isActive: { type: Boolean, default: true },
    isSuperuser: { type: Boolean, default: false },
  },
  { timestamps: true }
);

export default mongoose.model<IUser>('User', UserSchema);
