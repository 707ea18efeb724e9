import { AccountId } from '../types';
import { secondsToMs } from '../utils/time';

export interface InviteSpamOptions {
  windowSec: number;
  maxInWindow: number;
  capacity: number;
}

/**
 * Sliding window of invite posts per account. Windows are purged lazily when
 * the owner posts again; `sweep` reclaims accounts that went quiet.
 */
export class InviteSpamDetector {
  private readonly windows = new Map<AccountId, number[]>();

  constructor(private readonly options: InviteSpamOptions) {}

  recordPost(accountId: AccountId, nowTs: number): void {
    let window = this.windows.get(accountId);
    if (!window) {
      window = [];
      this.windows.set(accountId, window);
    }

    window.push(nowTs);
    if (window.length > this.options.capacity) {
      window.splice(0, window.length - this.options.capacity);
    }

    const windowMs = secondsToMs(this.options.windowSec);
    let expired = 0;
    while (expired < window.length && nowTs - window[expired] > windowMs) {
      expired += 1;
    }
    if (expired > 0) {
      window.splice(0, expired);
    }
  }

  isOverThreshold(accountId: AccountId): boolean {
    return this.countInWindow(accountId) >= this.options.maxInWindow;
  }

  countInWindow(accountId: AccountId): number {
    return this.windows.get(accountId)?.length ?? 0;
  }

  sweep(nowTs: number): number {
    const windowMs = secondsToMs(this.options.windowSec);
    let dropped = 0;

    for (const [accountId, window] of this.windows.entries()) {
      const newest = window[window.length - 1];
      if (newest === undefined || nowTs - newest > windowMs) {
        this.windows.delete(accountId);
        dropped += 1;
      }
    }

    return dropped;
  }

  get trackedAccounts(): number {
    return this.windows.size;
  }
}
