import { Repositories } from '../repos';
import { AuditCorrelator } from '../moderation/audit-correlator';
import { InviteSpamDetector } from '../moderation/invite-spam';
import { InMemoryIdempotencyGuard } from './idempotency';
import { ModerationLogger } from './logger';

const JOURNAL_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

export interface CleanupResult {
  inviteWindowsDropped: number;
  throttleEntriesDropped: number;
  idempotencyKeysDropped: number;
  journalRowsDropped: number;
}

export class CleanupService {
  private runInProgress = false;

  constructor(
    private readonly repos: Repositories,
    private readonly inviteSpam: InviteSpamDetector,
    private readonly correlator: AuditCorrelator,
    private readonly idempotency: InMemoryIdempotencyGuard,
    private readonly logger: ModerationLogger,
  ) {}

  async run(nowTs: number = Date.now()): Promise<CleanupResult | undefined> {
    if (this.runInProgress) {
      return undefined;
    }

    this.runInProgress = true;
    try {
      const result: CleanupResult = {
        inviteWindowsDropped: this.inviteSpam.sweep(nowTs),
        throttleEntriesDropped: this.correlator.purgeThrottle(nowTs),
        idempotencyKeysDropped: this.idempotency.purgeExpired(nowTs),
        journalRowsDropped: this.repos.moderationActions.purgeOlderThan(nowTs - JOURNAL_RETENTION_MS),
      };

      await this.logger.info('Cleanup finished', { ...result });
      return result;
    } finally {
      this.runInProgress = false;
    }
  }
}
