import { Router } from 'express';
import validate from '../../middleware/validate';
import { protect, requireSuperuser } from '../../middleware/auth';
import { checkApiKeyHandler, createApiKeyHandler, deleteApiKeyHandler, listApiKeysHandler } from './apiKey.controller';
import { apiKeyIdParamsSchema, checkApiKeySchema, createApiKeySchema, listApiKeysSchema } from './apiKey.validation';

const router = Router();

router.use(protect);

router.post('/', validate(createApiKeySchema), createApiKeyHandler);
router.get('/', validate(listApiKeysSchema), listApiKeysHandler);
router.get('/check/:apiKey', requireSuperuser, validate(checkApiKeySchema), checkApiKeyHandler);
router.delete('/:apiKeyId', validate(apiKeyIdParamsSchema), deleteApiKeyHandler);

export default router;
