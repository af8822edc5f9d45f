import type { UserTier } from '../models/User';

declare global {
  namespace Express {
    interface Request {
      auth?: {
        userId: string;
        email: string;
        tier: UserTier;
      };
    }
  }
}

export {};
