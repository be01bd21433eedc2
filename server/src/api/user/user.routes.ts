import { Router } from 'express';
import validate from '../../middleware/validate';
import { protect, requireSuperuser } from '../../middleware/auth';
import { getMeHandler, listUsersHandler, updateUserHandler } from './user.controller';
import { listUsersSchema, updateUserSchema } from './user.validation';

const router = Router();

// All routes in this file are protected
router.use(protect);

router.get('/me', getMeHandler);
router.get('/', requireSuperuser, validate(listUsersSchema), listUsersHandler);
router.patch('/:userId', requireSuperuser, validate(updateUserSchema), updateUserHandler);

export default router;
