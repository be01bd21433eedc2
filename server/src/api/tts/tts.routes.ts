import { Router } from 'express';
import validate from '../../middleware/validate';
import { protectWithApiKey } from '../../middleware/auth';
import { downloadAudioHandler, generateSpeechHandler } from './tts.controller';
import { downloadAudioSchema, generateSpeechSchema } from './tts.validation';

const router = Router();

router.use(protectWithApiKey);

router.post('/generate_speech', validate(generateSpeechSchema), generateSpeechHandler);
router.get('/download/:filename', validate(downloadAudioSchema), downloadAudioHandler);

export default router;
