import type { Request, Response } from 'express';
import * as authService from './auth.service';
import asyncHandler from '../../utils/asyncHandler';
import config from '../../config';
import { ForbiddenError } from '../../utils/errors';

export const loginAccessTokenHandler = asyncHandler(async (req: Request, res: Response) => {
  const token = await authService.login(req.body);
  res.setHeader('Cache-Control', 'no-store');
  res.status(200).json(token);
});

export const registerHandler = asyncHandler(async (req: Request, res: Response) => {
  if (!config.allowUserRegistration) {
    throw new ForbiddenError('User registration is disabled.');
  }
  const user = await authService.register(req.body);
  res.status(201).json(user);
});
