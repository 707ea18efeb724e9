import { AccountId } from '../types';

export class WebhookViolationTracker {
  private readonly attempts = new Map<AccountId, number>();

  constructor(private readonly maxAttempts: number) {}

  recordViolation(accountId: AccountId): number {
    const next = (this.attempts.get(accountId) ?? 0) + 1;
    this.attempts.set(accountId, next);
    return next;
  }

  shouldKick(count: number): boolean {
    return count >= this.maxAttempts;
  }

  reset(accountId: AccountId): void {
    this.attempts.delete(accountId);
  }

  count(accountId: AccountId): number {
    return this.attempts.get(accountId) ?? 0;
  }
}
