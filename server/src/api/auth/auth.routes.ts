import { Router } from 'express';
import { registerHandler, loginAccessTokenHandler } from './auth.controller';
import validate from '../../middleware/validate';
import { registerSchema, loginSchema } from './auth.validation';

const router = Router();

router.post('/register', validate(registerSchema), registerHandler);
router.post('/login/access-token', validate(loginSchema), loginAccessTokenHandler);

export default router;
