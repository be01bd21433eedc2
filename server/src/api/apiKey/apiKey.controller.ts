import type { Request, Response } from 'express';
import asyncHandler from '../../utils/asyncHandler';
import { requireAuthUser } from '../../middleware/auth';
import { readPagination } from '../../utils/validation';
import { apiKeyService } from './apiKey.service';

export const createApiKeyHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  const created = await apiKeyService.create(user.id, {
    name: req.body.name,
    isActive: req.body.is_active,
    expiresAt: req.body.expires_at,
  });
  res.status(201).json(created);
});

export const listApiKeysHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  const { skip, limit } = readPagination(req.query);
  res.status(200).json(await apiKeyService.list(user.id, skip, limit));
});

export const deleteApiKeyHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  await apiKeyService.remove(user.id, String(req.params.apiKeyId));
  res.status(204).end();
});

export const checkApiKeyHandler = asyncHandler(async (req: Request, res: Response) => {
  res.status(200).json(await apiKeyService.check(String(req.params.apiKey)));
});
