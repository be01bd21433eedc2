import { pipeline } from 'stream/promises';
import type { Request, Response, NextFunction } from 'express';
import asyncHandler from '../../utils/asyncHandler';
import { requireAuthUser } from '../../middleware/auth';
import { ttsService } from './tts.service';

export const generateSpeechHandler = asyncHandler(async (req: Request, res: Response) => {
  const user = requireAuthUser(req);
  const input = { text: req.body.text, voiceId: req.body.voice_id };

  if (!req.body.stream) {
    res.status(200).json(await ttsService.generate(user.id, input));
    return;
  }

  const request = await ttsService.buildRequest(user.id, input);
  // Rejects with a JSON-able error until the engine has produced a WAV header.
  const audio = await ttsService.openStream(request);

  res.status(200);
  res.setHeader('Content-Type', 'audio/wav');
  res.setHeader('Content-Disposition', 'attachment; filename="speech.wav"');
  res.setHeader('Cache-Control', 'no-store');

  try {
    await pipeline(audio, res);
  } catch (error) {
    // Headers are out; pipeline has already destroyed both ends.
    console.error('[tts] Audio stream aborted:', error);
  }
});

export const downloadAudioHandler = asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
  const user = requireAuthUser(req);
  const filePath = await ttsService.resolveDownload(user.id, String(req.params.filename));

  res.download(filePath, 'speech.wav', { headers: { 'Content-Type': 'audio/wav' } }, (err) => {
    if (err) next(err);
  });
});
