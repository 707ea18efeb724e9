import {
  AccountId,
  CommunityId,
  EnforcementOutcome,
  EnforcementTarget,
  MessageRef,
  PlatformErrorKind,
  PlatformGateway,
  Snowflake,
} from '../types';
import { Repositories } from '../repos';
import { KeyedLock } from '../services/keyed-lock';
import { ModerationLogger } from '../services/logger';
import { classifyPlatformError, errorMessage } from '../utils/platform-error';
import { sleep } from '../utils/time';
import { TrustRegistry } from './trust-registry';

const DELETE_MESSAGE_RETRY_DELAYS_MS = [350, 1_200] as const;

interface DeleteMessageResult {
  deleted: boolean;
  attempts: number;
  lastError?: string;
}

type MembershipCheck = 'member' | 'departed' | 'unknown';

type AttemptResult = { ok: true } | { ok: false; errorKind: PlatformErrorKind; error: string };

export interface TimeoutOrKickMeta {
  timeoutHours?: number;
  [key: string]: unknown;
}

/**
 * Applies sanctions against one account. Every public method resolves with a
 * definite result; platform failures are logged here and never rethrown.
 */
export class EnforcementService {
  private readonly targetLock = new KeyedLock();

  constructor(
    private readonly gateway: PlatformGateway,
    private readonly trust: TrustRegistry,
    private readonly repos: Repositories,
    private readonly logger: ModerationLogger,
    private readonly wait: (ms: number) => Promise<void> = sleep,
    private readonly now: () => number = Date.now,
  ) {}

  async timeoutOrKick(
    target: EnforcementTarget,
    durationMs: number,
    reason: string,
    meta: TimeoutOrKickMeta = {},
  ): Promise<EnforcementOutcome> {
    return this.targetLock.run(this.lockKey(target), async () => {
      if (!(await this.canActOn(target, 'timeout'))) {
        return 'no_action';
      }

      const untilTs = this.now() + durationMs;
      const timeoutResult = await this.attempt(() => this.gateway.timeoutMember(
        target.communityId,
        target.accountId,
        untilTs,
        reason,
      ));

      if (timeoutResult.ok) {
        this.recordAndLog(target, 'timeout', reason, { ...meta, untilTs });
        return 'timed_out';
      }

      if (timeoutResult.errorKind === 'not_found') {
        await this.logger.info('Timeout skipped: member already gone', {
          guildId: target.communityId,
          userId: target.accountId,
        });
        return 'no_action';
      }

      await this.logger.warn('Timeout failed, falling back to kick', {
        guildId: target.communityId,
        userId: target.accountId,
        errorKind: timeoutResult.errorKind,
        error: timeoutResult.error,
      });

      const kicked = await this.kickUnlocked(target, reason, { ...meta, fallbackFrom: 'timeout' });
      return kicked ? 'kicked' : 'no_action';
    });
  }

  async kick(target: EnforcementTarget, reason: string, meta: Record<string, unknown> = {}): Promise<boolean> {
    return this.targetLock.run(this.lockKey(target), async () => {
      if (!(await this.canActOn(target, 'kick'))) {
        return false;
      }

      return this.kickUnlocked(target, reason, meta);
    });
  }

  async deleteMessage(ref: MessageRef, accountId: AccountId, reason: string): Promise<boolean> {
    const result = await this.deleteMessageSafe(ref);
    if (result.deleted) {
      this.recordAndLog({ communityId: ref.communityId, accountId }, 'delete_message', reason, {
        channelId: ref.channelId,
        messageId: ref.messageId,
        attempts: result.attempts,
      });
    }
    return result.deleted;
  }

  async deleteWebhook(
    communityId: CommunityId,
    webhookId: Snowflake,
    creatorId: AccountId,
    reason: string,
  ): Promise<boolean> {
    const result = await this.attempt(() => this.gateway.deleteWebhook(communityId, webhookId, reason));
    if (result.ok) {
      this.recordAndLog({ communityId, accountId: creatorId }, 'delete_webhook', reason, { webhookId });
      return true;
    }

    await this.logger.warn(
      result.errorKind === 'permission_denied' ? 'Missing permission to delete webhook' : 'Webhook deletion failed',
      {
        guildId: communityId,
        webhookId,
        errorKind: result.errorKind,
        error: result.error,
      },
    );
    return false;
  }

  private async kickUnlocked(
    target: EnforcementTarget,
    reason: string,
    meta: Record<string, unknown>,
  ): Promise<boolean> {
    const result = await this.attempt(() => this.gateway.kickMember(target.communityId, target.accountId, reason));
    if (result.ok) {
      this.recordAndLog(target, 'kick', reason, meta);
      return true;
    }

    await this.logger.warn(
      result.errorKind === 'permission_denied' ? 'Kick forbidden: missing permissions?' : 'Kick failed',
      {
        guildId: target.communityId,
        userId: target.accountId,
        errorKind: result.errorKind,
        error: result.error,
      },
    );
    return false;
  }

  private async canActOn(target: EnforcementTarget, action: 'timeout' | 'kick'): Promise<boolean> {
    if (this.trust.isTrusted(target.accountId) || target.accountId === this.gateway.selfAccountId()) {
      await this.logger.info('Enforcement skipped for exempt account', {
        guildId: target.communityId,
        userId: target.accountId,
        action,
      });
      return false;
    }

    const membership = await this.checkMembership(target);
    if (membership === 'member') {
      return true;
    }

    await this.logger.info(
      membership === 'departed'
        ? 'Enforcement skipped: account is no longer a member'
        : 'Enforcement skipped: membership could not be verified',
      {
        guildId: target.communityId,
        userId: target.accountId,
        action,
      },
    );
    return false;
  }

  private async checkMembership(target: EnforcementTarget): Promise<MembershipCheck> {
    try {
      return (await this.gateway.isMember(target.communityId, target.accountId)) ? 'member' : 'departed';
    } catch (error) {
      if (classifyPlatformError(error) === 'not_found') {
        return 'departed';
      }

      await this.logger.warn('Membership check failed', {
        guildId: target.communityId,
        userId: target.accountId,
        error: errorMessage(error),
      });
      return 'unknown';
    }
  }

  private async deleteMessageSafe(ref: MessageRef): Promise<DeleteMessageResult> {
    let attempts = 0;
    let lastError: string | undefined;

    for (let index = 0; index <= DELETE_MESSAGE_RETRY_DELAYS_MS.length; index += 1) {
      attempts += 1;

      const result = await this.attempt(() => this.gateway.deleteMessage(ref));
      if (result.ok) {
        return { deleted: true, attempts };
      }

      if (result.errorKind === 'not_found') {
        return { deleted: true, attempts };
      }

      if (result.errorKind === 'permission_denied') {
        return { deleted: false, attempts, lastError: result.error };
      }

      lastError = result.error;

      const retryDelay = DELETE_MESSAGE_RETRY_DELAYS_MS[index];
      if (retryDelay !== undefined) {
        await this.wait(retryDelay);
      }
    }

    await this.logger.warn('Failed to delete message', {
      guildId: ref.communityId,
      channelId: ref.channelId,
      messageId: ref.messageId,
      attempts,
      error: lastError ?? 'unknown',
    });

    return { deleted: false, attempts, lastError };
  }

  private async attempt(call: () => Promise<void>): Promise<AttemptResult> {
    try {
      await call();
      return { ok: true };
    } catch (error) {
      return { ok: false, errorKind: classifyPlatformError(error), error: errorMessage(error) };
    }
  }

  private recordAndLog(
    target: EnforcementTarget,
    action: string,
    reason: string,
    meta: Record<string, unknown>,
  ): void {
    const entry = {
      communityId: target.communityId,
      accountId: target.accountId,
      action,
      reason,
      meta,
    };

    try {
      this.repos.moderationActions.record(entry, this.now());
    } catch (error) {
      void this.logger.error('Failed to journal moderation action', {
        guildId: target.communityId,
        userId: target.accountId,
        action,
        error: errorMessage(error),
      });
    }

    void this.logger.moderation(entry);
  }

  private lockKey(target: EnforcementTarget): string {
    return `${target.communityId}:${target.accountId}`;
  }
}
