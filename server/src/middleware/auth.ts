import type { Request, Response, NextFunction } from 'express';
import asyncHandler from '../utils/asyncHandler';
import { ForbiddenError, UnauthorizedError } from '../utils/errors';
import { verifyAccessToken } from '../api/auth/auth.service';
import { userRepository } from '../api/user/user.repository';
import { apiKeyService } from '../api/apiKey/apiKey.service';
import type { UserRecord } from '../api/user/user.model';

export type AuthUser = { id: string; email: string; isSuperuser: boolean };

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export const API_KEY_HEADER = 'x-api-key';

const NOT_AUTHENTICATED = 'Not authenticated';
const INVALID_CREDENTIALS = 'Could not validate credentials';

const toAuthUser = (user: UserRecord): AuthUser => ({ id: user.id, email: user.email, isSuperuser: user.isSuperuser });

export const readBearerToken = (req: Request): string | null => {
  const header = req.headers.authorization;
  if (!header) return null;
  const [scheme, token] = header.trim().split(/\s+/, 2);
  if (!scheme || scheme.toLowerCase() !== 'bearer' || !token) return null;
  return token;
};

const readApiKey = (req: Request): string | null => {
  const raw = req.headers[API_KEY_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return value && value.trim() ? value.trim() : null;
};

const resolveBearerUser = async (token: string): Promise<UserRecord | null> => {
  const userId = verifyAccessToken(token);
  if (!userId) return null;
  const user = await userRepository.findById(userId);
  return user && user.isActive ? user : null;
};

/** Returns the authenticated user set by `protect` / `protectWithApiKey`. */
export const requireAuthUser = (req: Request): AuthUser => {
  if (!req.user) {
    throw new UnauthorizedError(NOT_AUTHENTICATED);
  }
  return req.user;
};

export const protect = asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
  const token = readBearerToken(req);
  if (!token) {
    throw new UnauthorizedError(NOT_AUTHENTICATED);
  }

  const user = await resolveBearerUser(token);
  if (!user) {
    throw new UnauthorizedError(INVALID_CREDENTIALS);
  }

  req.user = toAuthUser(user);
  next();
});

// Bearer token first, then the X-API-Key header.
export const protectWithApiKey = asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
  const token = readBearerToken(req);
  const apiKey = readApiKey(req);
  if (!token && !apiKey) {
    throw new UnauthorizedError(NOT_AUTHENTICATED);
  }

  if (token) {
    const user = await resolveBearerUser(token);
    if (user) {
      req.user = toAuthUser(user);
      return next();
    }
  }

  if (apiKey) {
    const user = await apiKeyService.authenticate(apiKey);
    if (user) {
      req.user = toAuthUser(user);
      return next();
    }
  }

  throw new UnauthorizedError(INVALID_CREDENTIALS);
});

export const requireSuperuser = (req: Request, res: Response, next: NextFunction) => {
  if (!req.user) {
    return next(new UnauthorizedError(NOT_AUTHENTICATED));
  }
  if (!req.user.isSuperuser) {
    return next(new ForbiddenError("The user doesn't have enough privileges"));
  }
  next();
};
