import { Router } from 'express';
import { login, me, register } from '../controllers/authController';
import { asyncHandler } from '../middlewares/asyncHandler';
import { requireAuth } from '../middlewares/authMiddleware';

const authRouter = Router();

authRouter.post('/register', asyncHandler(register));
authRouter.post('/login', asyncHandler(login));
authRouter.get('/me', requireAuth, asyncHandler(me));

export { authRouter };
