/**
 * Daily Tool Quota
 *
 * Process-wide budget of executor turns per UTC day. One permitted turn
 * consumes one unit no matter how many tools it runs.
 */

import { QuotaExceededError } from '../../core/errors.js';

export type QuotaStatus = {
  date: string;
  used: number;
  limit: number;
  remaining: number;
};

function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class DailyToolQuota {
  private dateKey: string;
  private used = 0;

  constructor(
    private readonly limit: number,
    private readonly now: () => Date = () => new Date()
  ) {
    this.dateKey = utcDateKey(this.now());
  }

  /**
   * Reset on the first access of a new UTC day. Check, reset and increment
   * run in one synchronous call, so concurrent events cannot interleave.
   */
  private rollover(): void {
    const today = utcDateKey(this.now());
    if (today !== this.dateKey) {
      this.dateKey = today;
      this.used = 0;
    }
  }

  tryConsume(): boolean {
    this.rollover();
    if (this.used >= this.limit) {
      return false;
    }
    this.used += 1;
    return true;
  }

  /**
   * Like tryConsume, but throws QuotaExceededError when exhausted.
   */
  consume(): void {
    if (!this.tryConsume()) {
      throw new QuotaExceededError(this.limit);
    }
  }

  status(): QuotaStatus {
    this.rollover();
    return {
      date: this.dateKey,
      used: this.used,
      limit: this.limit,
      remaining: Math.max(0, this.limit - this.used),
    };
  }
}

let sharedQuota: DailyToolQuota | null = null;

/**
 * Process-wide quota; created on first access with the given limit.
 */
export function getDailyToolQuota(limit: number): DailyToolQuota {
  if (!sharedQuota) {
    sharedQuota = new DailyToolQuota(limit);
  }
  return sharedQuota;
}

export function resetDailyToolQuota(): void {
  sharedQuota = null;
}
