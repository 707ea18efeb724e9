import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import { BotConfig, PlatformEvent } from './types';
import { SqliteDatabase } from './db/sqlite';
import { createRepositories, Repositories } from './repos';
import { BotLogger } from './services/logger';
import { CleanupService } from './services/cleanup';
import { DiscordGateway } from './services/discord-gateway';
import { InMemoryIdempotencyGuard } from './services/idempotency';
import { AuditCorrelator } from './moderation/audit-correlator';
import { EnforcementService } from './moderation/enforcement';
import { InviteSpamDetector } from './moderation/invite-spam';
import { ModerationEngine } from './moderation/moderation-engine';
import { TrustRegistry } from './moderation/trust-registry';
import { WebhookViolationTracker } from './moderation/webhook-violations';
import { errorMessage } from './utils/platform-error';

export interface Runtime {
  client: Client;
  db: SqliteDatabase;
  repos: Repositories;
  logger: BotLogger;
  trust: TrustRegistry;
  engine: ModerationEngine;
  cleanupService: CleanupService;
}

const INTENTS = [
  GatewayIntentBits.Guilds,
  GatewayIntentBits.GuildMembers,
  GatewayIntentBits.GuildMessages,
  GatewayIntentBits.MessageContent,
  GatewayIntentBits.GuildModeration,
  GatewayIntentBits.GuildWebhooks,
];

export function createRuntime(config: BotConfig): Runtime {
  // In-memory only: enforcement history does not survive a restart.
  const db = new SqliteDatabase();
  const repos = createRepositories(db.db);

  const client = new Client({
    intents: INTENTS,
    partials: [Partials.GuildMember],
  });
  const gateway = new DiscordGateway(client);
  const logger = new BotLogger(gateway, () => config.logChannelId);

  const trust = new TrustRegistry(config.trustedAccountIds);
  const inviteSpam = new InviteSpamDetector({
    windowSec: config.inviteWindowSec,
    maxInWindow: config.inviteMaxInWindow,
    capacity: config.inviteHistoryCapacity,
  });
  const correlator = new AuditCorrelator(gateway, logger, {
    lookupIntervalMs: config.auditLookupIntervalMs,
    pageSize: config.auditPageSize,
    freshnessSec: config.auditFreshnessSec,
    retryCount: config.auditRetryCount,
    retryDelayMs: config.auditRetryDelayMs,
  });
  const idempotency = new InMemoryIdempotencyGuard();
  const enforcement = new EnforcementService(gateway, trust, repos, logger);
  const engine = new ModerationEngine({
    config,
    gateway,
    trust,
    inviteSpam,
    correlator,
    enforcement,
    webhookViolations: new WebhookViolationTracker(config.webhookMaxAttempts),
    idempotency,
    logger,
  });
  const cleanupService = new CleanupService(repos, inviteSpam, correlator, idempotency, logger);

  const dispatch = (event: PlatformEvent): void => {
    engine.dispatch(event).catch((error) => {
      void logger.error('Unhandled moderation error', {
        eventType: event.type,
        guildId: event.communityId,
        error: errorMessage(error),
      });
    });
  };

  client.once(Events.ClientReady, (readyClient) => {
    void logger.info('Logged in', {
      userTag: readyClient.user.tag,
      userId: readyClient.user.id,
      trustedAccounts: config.trustedAccountIds,
    });
  });

  client.on(Events.MessageCreate, (message) => {
    if (!message.inGuild()) return;

    dispatch({
      type: 'message_created',
      communityId: message.guildId,
      channelId: message.channelId,
      messageId: message.id,
      authorId: message.author.id,
      authorIsBot: message.author.bot,
      content: message.content,
    });
  });

  client.on(Events.GuildMemberAdd, (member) => {
    dispatch({
      type: 'member_joined',
      communityId: member.guild.id,
      accountId: member.id,
      isBot: member.user.bot,
    });
  });

  client.on(Events.GuildMemberRemove, (member) => {
    dispatch({ type: 'member_removed', communityId: member.guild.id, accountId: member.id });
  });

  client.on(Events.GuildBanAdd, (ban) => {
    dispatch({ type: 'member_banned', communityId: ban.guild.id, accountId: ban.user.id });
  });

  client.on(Events.ChannelDelete, (channel) => {
    if (channel.isDMBased()) return;
    dispatch({ type: 'channel_deleted', communityId: channel.guild.id, channelId: channel.id });
  });

  client.on(Events.GuildRoleDelete, (role) => {
    dispatch({ type: 'role_deleted', communityId: role.guild.id, roleId: role.id });
  });

  client.on(Events.WebhooksUpdate, (channel) => {
    dispatch({ type: 'webhooks_updated', communityId: channel.guild.id, channelId: channel.id });
  });

  client.on(Events.Error, (error) => {
    void logger.error('Gateway client error', { error: error.message });
  });

  client.on(Events.ShardDisconnect, (_event, shardId) => {
    void logger.warn('Gateway shard disconnected', { shardId });
  });

  return {
    client,
    db,
    repos,
    logger,
    trust,
    engine,
    cleanupService,
  };
}
