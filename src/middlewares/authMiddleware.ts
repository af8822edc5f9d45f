import { NextFunction, Request, Response } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { requireJwtSecret } from '../config/env';
import { USER_TIERS } from '../models/User';

const tokenPayloadSchema = z.object({
  userId: z.string().min(1),
  email: z.string().min(1),
  tier: z.enum(USER_TIERS).default('free'),
});

export function requireAuth(req: Request, res: Response, next: NextFunction): void {
  const authorization = req.headers.authorization;

  if (!authorization) {
    res.status(401).json({ message: 'Missing Authorization header' });
    return;
  }

  const [scheme, token] = authorization.split(' ');

  if (scheme !== 'Bearer' || !token) {
    res.status(401).json({ message: 'Invalid Authorization format' });
    return;
  }

  const secret = requireJwtSecret();
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret);
  } catch {
    res.status(401).json({ message: 'Invalid or expired token' });
    return;
  }

  const payload = tokenPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    res.status(401).json({ message: 'Invalid token payload' });
    return;
  }

  req.auth = payload.data;
  next();
}
