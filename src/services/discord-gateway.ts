import { AuditLogEvent, ChannelType, Client, Guild } from 'discord.js';
import {
  AccountId,
  AuditActionKind,
  AuditDirectory,
  AuditRecord,
  CommunityId,
  MessageRef,
  PlatformGateway,
  Snowflake,
  WebhookRef,
} from '../types';
import { classifyPlatformError } from '../utils/platform-error';

const AUDIT_EVENT_BY_KIND: Record<AuditActionKind, AuditLogEvent> = {
  bot_add: AuditLogEvent.BotAdd,
  channel_delete: AuditLogEvent.ChannelDelete,
  role_delete: AuditLogEvent.RoleDelete,
  member_ban: AuditLogEvent.MemberBanAdd,
  member_kick: AuditLogEvent.MemberKick,
  webhook_create: AuditLogEvent.WebhookCreate,
};

export class DiscordGateway implements PlatformGateway, AuditDirectory {
  constructor(private readonly client: Client) {}

  selfAccountId(): AccountId | undefined {
    return this.client.user?.id;
  }

  async deleteMessage(ref: MessageRef): Promise<void> {
    const guild = await this.resolveGuild(ref.communityId);
    const channel = await guild.channels.fetch(ref.channelId);
    if (!channel || !channel.isTextBased()) {
      throw new Error(`Unknown text channel ${ref.channelId}`);
    }

    await channel.messages.delete(ref.messageId);
  }

  async isMember(communityId: CommunityId, accountId: AccountId): Promise<boolean> {
    const guild = await this.resolveGuild(communityId);

    try {
      await guild.members.fetch({ user: accountId, force: true });
      return true;
    } catch (error) {
      if (classifyPlatformError(error) === 'not_found') {
        return false;
      }
      throw error;
    }
  }

  async timeoutMember(communityId: CommunityId, accountId: AccountId, untilTs: number, reason: string): Promise<void> {
    const guild = await this.resolveGuild(communityId);
    await guild.members.edit(accountId, {
      communicationDisabledUntil: untilTs,
      reason,
    });
  }

  async kickMember(communityId: CommunityId, accountId: AccountId, reason: string): Promise<void> {
    const guild = await this.resolveGuild(communityId);
    await guild.members.kick(accountId, reason);
  }

  async listChannelWebhooks(communityId: CommunityId, channelId: Snowflake): Promise<WebhookRef[]> {
    const guild = await this.resolveGuild(communityId);
    const channel = await guild.channels.fetch(channelId);
    if (!channel || !('fetchWebhooks' in channel)) {
      return [];
    }

    const refs: WebhookRef[] = [];
    const webhooks = await channel.fetchWebhooks();
    for (const webhook of webhooks.values()) {
      refs.push({ id: webhook.id, channelId: webhook.channelId });
    }
    return refs;
  }

  async listTextChannelIds(communityId: CommunityId): Promise<Snowflake[]> {
    const guild = await this.resolveGuild(communityId);
    return guild.channels.cache
      .filter((channel) => channel.type === ChannelType.GuildText)
      .map((channel) => channel.id);
  }

  async deleteWebhook(_communityId: CommunityId, webhookId: Snowflake, reason: string): Promise<void> {
    await this.client.deleteWebhook(webhookId, { reason });
  }

  async sendToChannel(channelId: Snowflake, text: string): Promise<void> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || !('send' in channel)) {
      throw new Error(`Channel ${channelId} does not accept messages`);
    }

    await channel.send(text);
  }

  async fetchRecent(communityId: CommunityId, kind: AuditActionKind, limit: number): Promise<AuditRecord[]> {
    const guild = await this.resolveGuild(communityId);
    const logs = await guild.fetchAuditLogs({ type: AUDIT_EVENT_BY_KIND[kind], limit });

    const records: AuditRecord[] = [];
    for (const entry of logs.entries.values()) {
      records.push({
        id: entry.id,
        kind,
        actorId: entry.executorId,
        targetId: entry.targetId,
        createdAtTs: entry.createdTimestamp,
      });
    }
    return records;
  }

  private resolveGuild(communityId: CommunityId): Promise<Guild> {
    return this.client.guilds.fetch(communityId);
  }
}
