import { Router } from 'express';
import validate from '../../middleware/validate';
import { protectWithApiKey } from '../../middleware/auth';
import { uploadVoiceSample } from '../../middleware/upload';
import { createVoiceHandler, deleteVoiceHandler, getVoiceHandler, listVoicesHandler } from './voice.controller';
import { listVoicesSchema, voiceIdParamsSchema } from './voice.validation';

const router = Router();

router.use(protectWithApiKey);

router.post('/', uploadVoiceSample.single('audio_file'), createVoiceHandler);
router.get('/', validate(listVoicesSchema), listVoicesHandler);
router.get('/:voiceId', validate(voiceIdParamsSchema), getVoiceHandler);
router.delete('/:voiceId', validate(voiceIdParamsSchema), deleteVoiceHandler);

export default router;
