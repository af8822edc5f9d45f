import type { Env } from '../../config/env';
import { UsageRecord } from '../../models/UsageRecord';
import type { UserTier } from '../../models/User';

/** Daily question limit per tier; 0 means unlimited. */
export type QuotaLimits = Readonly<Record<UserTier, number>>;

export interface UsageCounter {
  /** Counts one more question for `userId` on `day` and returns the day's total. */
  increment(userId: string, day: string): Promise<number>;
  /** Gives back one question counted by `increment`. */
  release(userId: string, day: string): Promise<void>;
}

export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function quotaLimitsFromEnv(source: Env): QuotaLimits {
  return {
    free: source.QUOTA_FREE_DAILY,
    pro: source.QUOTA_PRO_DAILY,
    enterprise: source.QUOTA_ENTERPRISE_DAILY,
  };
}

export class MongoUsageCounter implements UsageCounter {
  async increment(userId: string, day: string): Promise<number> {
    const record = await UsageRecord.findOneAndUpdate(
      { userId, day },
      { $inc: { count: 1 } },
      { upsert: true, new: true }
    ).lean();
    return record?.count ?? 1;
  }

  async release(userId: string, day: string): Promise<void> {
    await UsageRecord.updateOne({ userId, day, count: { $gt: 0 } }, { $inc: { count: -1 } });
  }
}

export class MemoryUsageCounter implements UsageCounter {
  private readonly counts = new Map<string, number>();

  async increment(userId: string, day: string): Promise<number> {
    const key = `${userId}|${day}`;
    const next = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, next);
    return next;
  }

  async release(userId: string, day: string): Promise<void> {
    const key = `${userId}|${day}`;
    const current = this.counts.get(key) ?? 0;
    if (current > 0) {
      this.counts.set(key, current - 1);
    }
  }
}
