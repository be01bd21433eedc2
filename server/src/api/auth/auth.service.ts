import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import config from '../../config';
import { ConflictError, UnauthorizedError } from '../../utils/errors';
import { isDuplicateKeyError } from '../../utils/db';
import { userRepository } from '../user/user.repository';
import { toUserResponse } from '../user/user.model';

const BCRYPT_ROUNDS = 10;

export const DUPLICATE_EMAIL_MESSAGE = 'The user with this email already exists in the system.';

export type AccessTokenResponse = { access_token: string; token_type: 'bearer' };

export const hashPassword = (password: string): Promise<string> => bcrypt.hash(password, BCRYPT_ROUNDS);

export const verifyPassword = (password: string, hashedPassword: string): Promise<boolean> =>
  bcrypt.compare(password, hashedPassword);

export const signAccessToken = (userId: string): string =>
  jwt.sign({ sub: userId }, config.jwtSecret, { algorithm: 'HS256', expiresIn: config.jwtExpiresIn });

/** Returns the user id carried in `sub`, or null for a bad signature, expired token or missing subject. */
export const verifyAccessToken = (token: string): string | null => {
  try {
    const payload = jwt.verify(token, config.jwtSecret, { algorithms: ['HS256'] });
    if (typeof payload === 'string' || typeof payload.sub !== 'string' || !payload.sub) return null;
    return payload.sub;
  } catch {
    return null;
  }
};

export const login = async (credentials: { username: string; password: string }): Promise<AccessTokenResponse> => {
  const email = credentials.username.trim().toLowerCase();

  const user = await userRepository.findByEmailWithPassword(email);
  if (!user || !(await verifyPassword(credentials.password, user.hashedPassword))) {
    throw new UnauthorizedError('Incorrect email or password');
  }
  if (!user.isActive) {
    throw new UnauthorizedError('Inactive user');
  }

  return { access_token: signAccessToken(user.id), token_type: 'bearer' };
};

export const register = async (userData: { email: string; password: string }) => {
  const email = userData.email.trim().toLowerCase();

  const existing = await userRepository.findByEmail(email);
  if (existing) {
    throw new ConflictError(DUPLICATE_EMAIL_MESSAGE);
  }

  try {
    const user = await userRepository.create({
      email,
      hashedPassword: await hashPassword(userData.password),
      isSuperuser: false,
    });
    return toUserResponse(user);
  } catch (error) {
    // Lost a race with a concurrent registration.
    if (isDuplicateKeyError(error)) {
      throw new ConflictError(DUPLICATE_EMAIL_MESSAGE);
    }
    throw error;
  }
};
