import {
  AccountId,
  AuditActionKind,
  BotConfig,
  ChannelDeletedEvent,
  CommunityId,
  MemberBannedEvent,
  MemberJoinedEvent,
  MemberRemovedEvent,
  MessageCreatedEvent,
  PlatformEvent,
  PlatformGateway,
  RoleDeletedEvent,
  Snowflake,
  WebhookRef,
  WebhooksUpdatedEvent,
} from '../types';
import { InMemoryIdempotencyGuard } from '../services/idempotency';
import { KeyedLock } from '../services/keyed-lock';
import { ModerationLogger } from '../services/logger';
import { classifyPlatformError, errorMessage } from '../utils/platform-error';
import { hoursToMs, sleep } from '../utils/time';
import { AuditCorrelator } from './audit-correlator';
import { EnforcementService } from './enforcement';
import { containsInvite, extractInviteCodes } from './invite-detector';
import { InviteSpamDetector } from './invite-spam';
import { TrustRegistry } from './trust-registry';
import { WebhookViolationTracker } from './webhook-violations';

interface AttributedKickPolicy {
  kind: AuditActionKind;
  reason: string;
}

const ATTRIBUTED_KICK_POLICIES = {
  channel_deleted: { kind: 'channel_delete', reason: 'Channel deleted by untrusted account' },
  role_deleted: { kind: 'role_delete', reason: 'Role deleted by untrusted account' },
  member_banned: { kind: 'member_ban', reason: 'Ban issued by untrusted account' },
  member_removed: { kind: 'member_kick', reason: 'Kick issued by untrusted account' },
} as const satisfies Record<string, AttributedKickPolicy>;

const BOT_INVITE_BOT_REASON = 'Bot added by untrusted account';
const BOT_INVITE_INVITER_REASON = 'Added a bot without being trusted';
const WEBHOOK_DELETE_REASON = 'Webhook created by untrusted account';
const WEBHOOK_KICK_REASON = 'Repeated unauthorized webhook creation';

export interface ModerationEngineDeps {
  config: BotConfig;
  gateway: PlatformGateway;
  trust: TrustRegistry;
  inviteSpam: InviteSpamDetector;
  correlator: AuditCorrelator;
  enforcement: EnforcementService;
  webhookViolations: WebhookViolationTracker;
  idempotency: InMemoryIdempotencyGuard;
  logger: ModerationLogger;
  wait?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Routes platform events to detection, attribution and enforcement. Each
 * handler is independent; nothing here throws for platform failures.
 */
export class ModerationEngine {
  private readonly config: BotConfig;
  private readonly gateway: PlatformGateway;
  private readonly trust: TrustRegistry;
  private readonly inviteSpam: InviteSpamDetector;
  private readonly correlator: AuditCorrelator;
  private readonly enforcement: EnforcementService;
  private readonly webhookViolations: WebhookViolationTracker;
  private readonly idempotency: InMemoryIdempotencyGuard;
  private readonly logger: ModerationLogger;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly webhookLock = new KeyedLock();

  constructor(deps: ModerationEngineDeps) {
    this.config = deps.config;
    this.gateway = deps.gateway;
    this.trust = deps.trust;
    this.inviteSpam = deps.inviteSpam;
    this.correlator = deps.correlator;
    this.enforcement = deps.enforcement;
    this.webhookViolations = deps.webhookViolations;
    this.idempotency = deps.idempotency;
    this.logger = deps.logger;
    this.wait = deps.wait ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  async dispatch(event: PlatformEvent): Promise<void> {
    switch (event.type) {
      case 'message_created':
        return this.handleMessage(event);
      case 'member_joined':
        return this.handleMemberJoined(event);
      case 'member_removed':
      case 'member_banned':
      case 'channel_deleted':
      case 'role_deleted':
        return this.handleAttributedDeletion(event);
      case 'webhooks_updated':
        return this.handleWebhooksUpdated(event);
    }
  }

  async handleMessage(event: MessageCreatedEvent): Promise<void> {
    if (event.authorIsBot || !containsInvite(event.content)) {
      return;
    }

    if (this.isExempt(event.authorId)) {
      return;
    }

    const nowTs = this.now();
    if (!this.idempotency.tryMark(`message:${event.communityId}`, event.messageId, nowTs)) {
      return;
    }

    await this.enforcement.deleteMessage(
      { communityId: event.communityId, channelId: event.channelId, messageId: event.messageId },
      event.authorId,
      'invite_link',
    );

    this.inviteSpam.recordPost(event.authorId, nowTs);
    if (!this.inviteSpam.isOverThreshold(event.authorId)) {
      return;
    }

    const reason = `Invite-Spam: ≥${this.config.inviteMaxInWindow} in ${this.config.inviteWindowSec}s`;
    const outcome = await this.enforcement.timeoutOrKick(
      { communityId: event.communityId, accountId: event.authorId },
      hoursToMs(this.config.timeoutHours),
      reason,
      {
        timeoutHours: this.config.timeoutHours,
        invitesInWindow: this.inviteSpam.countInWindow(event.authorId),
        inviteCodes: extractInviteCodes(event.content),
      },
    );

    await this.logger.info('Invite spam threshold crossed', {
      guildId: event.communityId,
      userId: event.authorId,
      outcome,
    });
  }

  async handleMemberJoined(event: MemberJoinedEvent): Promise<void> {
    if (!event.isBot) {
      return;
    }

    const actorId = await this.attributeAfterPropagation(event.communityId, 'bot_add', event.accountId);
    if (!actorId || this.isExempt(actorId)) {
      return;
    }

    await this.enforcement.kick(
      { communityId: event.communityId, accountId: event.accountId },
      BOT_INVITE_BOT_REASON,
      { inviterId: actorId },
    );
    await this.enforcement.kick(
      { communityId: event.communityId, accountId: actorId },
      BOT_INVITE_INVITER_REASON,
      { botId: event.accountId },
    );
  }

  async handleAttributedDeletion(
    event: ChannelDeletedEvent | RoleDeletedEvent | MemberBannedEvent | MemberRemovedEvent,
  ): Promise<void> {
    const policy = ATTRIBUTED_KICK_POLICIES[event.type];
    const targetId = this.resolveTargetId(event);

    const actorId = await this.attributeAfterPropagation(event.communityId, policy.kind, targetId);
    if (!actorId || this.isExempt(actorId)) {
      return;
    }

    await this.enforcement.kick(
      { communityId: event.communityId, accountId: actorId },
      policy.reason,
      { auditKind: policy.kind, targetId },
    );
  }

  async handleWebhooksUpdated(event: WebhooksUpdatedEvent): Promise<void> {
    await this.wait(this.config.auditPropagationDelayMs);

    const records = await this.correlator.listFresh({
      communityId: event.communityId,
      kind: 'webhook_create',
      limit: this.config.webhookAuditPageSize,
      freshnessSec: this.config.webhookAuditFreshnessSec,
    });

    for (const record of records) {
      const actorId = record.actorId;
      const webhookId = record.targetId;
      if (!actorId || !webhookId) {
        continue;
      }

      if (this.isExempt(actorId)) {
        continue;
      }

      if (!this.idempotency.tryMark(`audit:${event.communityId}`, record.id, this.now())) {
        continue;
      }

      await this.webhookLock.run(`${event.communityId}:${actorId}`, async () => {
        await this.removeWebhook(event, webhookId, actorId);
        await this.escalateWebhookViolation(event.communityId, actorId);
      });
    }
  }

  private async removeWebhook(event: WebhooksUpdatedEvent, webhookId: Snowflake, actorId: AccountId): Promise<void> {
    const webhook = await this.locateWebhook(event.communityId, event.channelId, webhookId);
    if (!webhook) {
      await this.logger.info('Webhook from untrusted account not found; it may already be gone', {
        guildId: event.communityId,
        channelId: event.channelId,
        webhookId,
        userId: actorId,
      });
      return;
    }

    await this.enforcement.deleteWebhook(event.communityId, webhook.id, actorId, WEBHOOK_DELETE_REASON);
  }

  private async escalateWebhookViolation(communityId: CommunityId, actorId: AccountId): Promise<void> {
    const attempts = this.webhookViolations.recordViolation(actorId);
    if (!this.webhookViolations.shouldKick(attempts)) {
      await this.logger.info('Webhook violation recorded', {
        guildId: communityId,
        userId: actorId,
        attempts,
        threshold: this.config.webhookMaxAttempts,
      });
      return;
    }

    await this.enforcement.kick(
      { communityId, accountId: actorId },
      WEBHOOK_KICK_REASON,
      { attempts },
    );
    this.webhookViolations.reset(actorId);
  }

  /**
   * Looks in the channel that fired the event first, then walks text channels
   * until the webhook turns up or the search bound is reached.
   */
  private async locateWebhook(
    communityId: CommunityId,
    channelId: Snowflake,
    webhookId: Snowflake,
  ): Promise<WebhookRef | undefined> {
    const fromTrigger = await this.findWebhookInChannel(communityId, channelId, webhookId);
    if (fromTrigger) {
      return fromTrigger;
    }

    let channelIds: Snowflake[];
    try {
      channelIds = await this.gateway.listTextChannelIds(communityId);
    } catch (error) {
      await this.logger.warn('Failed to list text channels for webhook search', {
        guildId: communityId,
        error: errorMessage(error),
      });
      return undefined;
    }

    const candidates = channelIds
      .filter((id) => id !== channelId)
      .slice(0, this.config.webhookSearchMaxChannels);

    for (const candidateId of candidates) {
      const found = await this.findWebhookInChannel(communityId, candidateId, webhookId);
      if (found) {
        return found;
      }
    }

    return undefined;
  }

  private async findWebhookInChannel(
    communityId: CommunityId,
    channelId: Snowflake,
    webhookId: Snowflake,
  ): Promise<WebhookRef | undefined> {
    try {
      const webhooks = await this.gateway.listChannelWebhooks(communityId, channelId);
      return webhooks.find((webhook) => webhook.id === webhookId);
    } catch (error) {
      const errorKind = classifyPlatformError(error);
      if (errorKind !== 'permission_denied') {
        await this.logger.warn('Failed to list channel webhooks', {
          guildId: communityId,
          channelId,
          errorKind,
          error: errorMessage(error),
        });
      }
      return undefined;
    }
  }

  private async attributeAfterPropagation(
    communityId: CommunityId,
    kind: AuditActionKind,
    targetId: Snowflake,
  ): Promise<AccountId | undefined> {
    await this.wait(this.config.auditPropagationDelayMs);
    return this.correlator.attribute({ communityId, kind, targetId });
  }

  private resolveTargetId(
    event: ChannelDeletedEvent | RoleDeletedEvent | MemberBannedEvent | MemberRemovedEvent,
  ): Snowflake {
    switch (event.type) {
      case 'channel_deleted':
        return event.channelId;
      case 'role_deleted':
        return event.roleId;
      case 'member_banned':
      case 'member_removed':
        return event.accountId;
    }
  }

  private isExempt(accountId: AccountId): boolean {
    return this.trust.isTrusted(accountId) || accountId === this.gateway.selfAccountId();
  }
}
