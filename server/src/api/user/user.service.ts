import config from '../../config';
import { ConflictError, NotFoundError } from '../../utils/errors';
import { isDuplicateKeyError } from '../../utils/db';
import { DUPLICATE_EMAIL_MESSAGE, hashPassword } from '../auth/auth.service';
import { userRepository } from './user.repository';
import { toUserResponse, type UserChanges, type UserResponse } from './user.model';

export type UpdateUserInput = {
  email?: string;
  password?: string;
  isActive?: boolean;
  isSuperuser?: boolean;
};

const userService = {
  async getMe(userId: string): Promise<UserResponse> {
    const user = await userRepository.findById(userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toUserResponse(user);
  },

  async listUsers(skip: number, limit: number): Promise<UserResponse[]> {
    const users = await userRepository.list(skip, limit);
    return users.map(toUserResponse);
  },

  async updateUser(userId: string, input: UpdateUserInput): Promise<UserResponse> {
    const current = await userRepository.findById(userId);
    if (!current) {
      throw new NotFoundError('User not found');
    }

    const changes: UserChanges = {};
    if (input.email !== undefined && input.email !== current.email) {
      const taken = await userRepository.findByEmail(input.email);
      if (taken && taken.id !== userId) {
        throw new ConflictError(DUPLICATE_EMAIL_MESSAGE);
      }
      changes.email = input.email;
    }
    if (input.password !== undefined) changes.hashedPassword = await hashPassword(input.password);
    if (input.isActive !== undefined) changes.isActive = input.isActive;
    if (input.isSuperuser !== undefined) changes.isSuperuser = input.isSuperuser;

    try {
      const updated = await userRepository.updateById(userId, changes);
      if (!updated) {
        throw new NotFoundError('User not found');
      }
      return toUserResponse(updated);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(DUPLICATE_EMAIL_MESSAGE);
      }
      throw error;
    }
  },

  /** Creates the configured first superuser unless an account with that email exists. Returns true when created. */
  async ensureFirstSuperuser(): Promise<boolean> {
    const { email, password } = config.firstSuperuser;
    const existing = await userRepository.findByEmail(email);
    if (existing) return false;

    try {
      await userRepository.create({
        email,
        hashedPassword: await hashPassword(password),
        isActive: true,
        isSuperuser: true,
      });
    } catch (error) {
      // Another instance seeded it first.
      if (isDuplicateKeyError(error)) return false;
      throw error;
    }
    console.log(`[seed] Created first superuser ${email}`);
    return true;
  },
};

export default userService;
