import type { Request, Response } from 'express';
import asyncHandler from '../../utils/asyncHandler';
import { requireAuthUser } from '../../middleware/auth';
import { readPagination } from '../../utils/validation';
import userService from './user.service';

export const getMeHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  res.status(200).json(await userService.getMe(user.id));
});

export const listUsersHandler = asyncHandler(async (req: Request, res: Response) => {
  const { skip, limit } = readPagination(req.query);
  res.status(200).json(await userService.listUsers(skip, limit));
});

export const updateUserHandler = asyncHandler(async (req: Request, res: Response) => {
  const updated = await userService.updateUser(String(req.params.userId), {
    email: req.body.email,
    password: req.body.password,
    isActive: req.body.is_active,
    isSuperuser: req.body.is_superuser,
  });
  res.status(200).json(updated);
});
