import { RequestHandler } from 'express';
import { utcDay, type QuotaLimits, type UsageCounter } from '../services/usage/usageCounter';
import { asyncHandler } from './asyncHandler';

/**
 * Counts one question against the caller's daily allowance. The question is
 * given back when the response ends with an error status, so rejected or
 * unanswered questions cost nothing. Must run after `requireAuth`.
 */
export function createQuotaGuard(
  counter: UsageCounter,
  limits: QuotaLimits,
  now: () => Date = () => new Date()
): RequestHandler {
  return asyncHandler(async (req, res, next) => {
    if (!req.auth?.userId) {
      res.status(401).json({ message: 'Unauthorized' });
      return;
    }

    const { userId, tier } = req.auth;
    const limit = limits[tier];
    const day = utcDay(now());
    const used = await counter.increment(userId, day);

    res.on('close', () => {
      if (res.statusCode >= 400) {
        counter.release(userId, day).catch((error: unknown) => {
          console.error(`[quota] could not give back a question for ${userId}:`, error);
        });
      }
    });

    if (limit > 0 && used > limit) {
      console.warn(`[quota] ${userId} exceeded ${tier} limit of ${limit}`);
      res.status(429).json({ message: 'Daily question quota exceeded', tier, limit });
      return;
    }

    res.setHeader('X-Quota-Remaining', limit > 0 ? String(limit - used) : 'unlimited');
    next();
  });
}
