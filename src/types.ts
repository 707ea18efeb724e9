export type Snowflake = string;

export type AccountId = Snowflake;

export type CommunityId = Snowflake;

export type AuditActionKind =
  | 'bot_add'
  | 'channel_delete'
  | 'role_delete'
  | 'member_ban'
  | 'member_kick'
  | 'webhook_create';

export type EnforcementOutcome = 'timed_out' | 'kicked' | 'no_action';

export type PlatformErrorKind = 'permission_denied' | 'not_found' | 'transient';

export interface BotConfig {
  botToken: string;
  trustedAccountIds: AccountId[];
  logChannelId?: Snowflake;
  inviteWindowSec: number;
  inviteMaxInWindow: number;
  inviteHistoryCapacity: number;
  timeoutHours: number;
  webhookMaxAttempts: number;
  auditPropagationDelayMs: number;
  auditLookupIntervalMs: number;
  auditFreshnessSec: number;
  auditPageSize: number;
  auditRetryCount: number;
  auditRetryDelayMs: number;
  webhookAuditFreshnessSec: number;
  webhookAuditPageSize: number;
  webhookSearchMaxChannels: number;
  cleanupIntervalSec: number;
}

export interface AuditRecord {
  id: Snowflake;
  kind: AuditActionKind;
  actorId: AccountId | null;
  targetId: Snowflake | null;
  createdAtTs: number;
}

export interface WebhookRef {
  id: Snowflake;
  channelId: Snowflake;
}

export interface MessageRef {
  communityId: CommunityId;
  channelId: Snowflake;
  messageId: Snowflake;
}

export interface EnforcementTarget {
  communityId: CommunityId;
  accountId: AccountId;
}

export interface MessageCreatedEvent {
  type: 'message_created';
  communityId: CommunityId;
  channelId: Snowflake;
  messageId: Snowflake;
  authorId: AccountId;
  authorIsBot: boolean;
  content: string | null;
}

export interface MemberJoinedEvent {
  type: 'member_joined';
  communityId: CommunityId;
  accountId: AccountId;
  isBot: boolean;
}

export interface MemberRemovedEvent {
  type: 'member_removed';
  communityId: CommunityId;
  accountId: AccountId;
}

export interface MemberBannedEvent {
  type: 'member_banned';
  communityId: CommunityId;
  accountId: AccountId;
}

export interface ChannelDeletedEvent {
  type: 'channel_deleted';
  communityId: CommunityId;
  channelId: Snowflake;
}

export interface RoleDeletedEvent {
  type: 'role_deleted';
  communityId: CommunityId;
  roleId: Snowflake;
}

export interface WebhooksUpdatedEvent {
  type: 'webhooks_updated';
  communityId: CommunityId;
  channelId: Snowflake;
}

export type PlatformEvent =
  | MessageCreatedEvent
  | MemberJoinedEvent
  | MemberRemovedEvent
  | MemberBannedEvent
  | ChannelDeletedEvent
  | RoleDeletedEvent
  | WebhooksUpdatedEvent;

export interface ModerationActionRecord {
  communityId: CommunityId;
  accountId: AccountId;
  action: string;
  reason: string;
  meta?: Record<string, unknown>;
}

export interface ModerationActionSummary {
  action: string;
  count: number;
}

/**
 * Calls the moderation core makes back into the platform. Implementations throw
 * the platform's own errors; callers classify them with `classifyPlatformError`.
 */
export interface PlatformGateway {
  selfAccountId(): AccountId | undefined;
  deleteMessage(ref: MessageRef): Promise<void>;
  isMember(communityId: CommunityId, accountId: AccountId): Promise<boolean>;
  timeoutMember(communityId: CommunityId, accountId: AccountId, untilTs: number, reason: string): Promise<void>;
  kickMember(communityId: CommunityId, accountId: AccountId, reason: string): Promise<void>;
  listChannelWebhooks(communityId: CommunityId, channelId: Snowflake): Promise<WebhookRef[]>;
  listTextChannelIds(communityId: CommunityId): Promise<Snowflake[]>;
  deleteWebhook(communityId: CommunityId, webhookId: Snowflake, reason: string): Promise<void>;
  sendToChannel(channelId: Snowflake, text: string): Promise<void>;
}

export interface AuditDirectory {
  /** Newest first. */
  fetchRecent(communityId: CommunityId, kind: AuditActionKind, limit: number): Promise<AuditRecord[]>;
}
