import type { Request, Response } from 'express';
import asyncHandler from '../../utils/asyncHandler';
import { BadRequestError } from '../../utils/errors';
import { runInBackground } from '../../utils/background';
import { requireAuthUser } from '../../middleware/auth';
import { discardUpload } from '../../middleware/upload';
import { readPagination } from '../../utils/validation';
import { createVoiceBodySchema } from './voice.validation';
import { voiceService } from './voice.service';
import { voiceProcessor } from './voice.processor';
import { toVoiceResponse } from './voice.model';

export const createVoiceHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  const file = req.file;
  if (!file) {
    throw new BadRequestError('audio_file is required');
  }

  const parsed = createVoiceBodySchema.safeParse(req.body ?? {});
  if (!parsed.success) {
    await discardUpload(file);
    throw new BadRequestError(parsed.error.issues[0]?.message || 'Validation error');
  }

  const voice = await voiceService.create(user.id, {
    name: parsed.data.name,
    language: parsed.data.language,
    description: parsed.data.description,
    sampleText: parsed.data.sample_text,
    originalFilePath: file.path,
  });

  runInBackground('voices', () => voiceProcessor.processVoice(voice.id));

  res.status(201).json(toVoiceResponse(voice));
});

export const listVoicesHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  const { skip, limit } = readPagination(req.query);
  res.status(200).json(await voiceService.list(user.id, skip, limit));
});

export const getVoiceHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  const voice = await voiceService.getOwned(user.id, String(req.params.voiceId));
  res.status(200).json(toVoiceResponse(voice));
});

export const deleteVoiceHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  await voiceService.remove(user.id, String(req.params.voiceId));
  res.status(204).end();
});
