import { BotConfig } from './types';

const SNOWFLAKE_REGEX = /^\d{15,21}$/;

// Discord refuses member timeouts longer than 28 days.
const MAX_TIMEOUT_HOURS = 28 * 24;

function parsePositiveInt(value: string | undefined, fallback: number, key: string): number {
  if (!value || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer`);
  }
  return parsed;
}

function parseBoundedInt(value: string | undefined, fallback: number, max: number, key: string): number {
  const parsed = parsePositiveInt(value, fallback, key);
  if (parsed > max) {
    throw new Error(`Environment variable ${key} must not exceed ${max}`);
  }
  return parsed;
}

function parseNonNegativeInt(value: string | undefined, fallback: number, key: string): number {
  if (!value || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Environment variable ${key} must be a non-negative integer`);
  }
  return parsed;
}

function parseOptionalSnowflake(value: string | undefined, key: string): string | undefined {
  if (!value || value.trim() === '') return undefined;
  const normalized = value.trim();
  if (!SNOWFLAKE_REGEX.test(normalized)) {
    throw new Error(`Environment variable ${key} must be a snowflake id`);
  }
  return normalized;
}

export function parseSnowflakeList(value: string | undefined, key: string): string[] {
  if (!value || value.trim() === '') return [];

  const ids = new Set<string>();
  for (const item of value.split(/[\s,;]+/)) {
    if (item === '') continue;
    if (!SNOWFLAKE_REGEX.test(item)) {
      throw new Error(`Environment variable ${key} contains an invalid id: ${item}`);
    }
    ids.add(item);
  }

  return [...ids];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const botToken = env.DISCORD_TOKEN?.trim();
  if (!botToken) {
    throw new Error('DISCORD_TOKEN is required');
  }

  return {
    botToken,
    trustedAccountIds: parseSnowflakeList(env.TRUSTED_ACCOUNT_IDS, 'TRUSTED_ACCOUNT_IDS'),
    logChannelId: parseOptionalSnowflake(env.LOG_CHANNEL_ID, 'LOG_CHANNEL_ID'),
    inviteWindowSec: parsePositiveInt(env.INVITE_WINDOW_SEC, 15, 'INVITE_WINDOW_SEC'),
    inviteMaxInWindow: parsePositiveInt(env.INVITE_MAX_IN_WINDOW, 5, 'INVITE_MAX_IN_WINDOW'),
    inviteHistoryCapacity: 50,
    timeoutHours: parseBoundedInt(env.TIMEOUT_HOURS, 1, MAX_TIMEOUT_HOURS, 'TIMEOUT_HOURS'),
    webhookMaxAttempts: parsePositiveInt(env.WEBHOOK_MAX_ATTEMPTS, 3, 'WEBHOOK_MAX_ATTEMPTS'),
    auditPropagationDelayMs: parseNonNegativeInt(env.AUDIT_PROPAGATION_DELAY_MS, 1_000, 'AUDIT_PROPAGATION_DELAY_MS'),
    auditLookupIntervalMs: 1_000,
    auditFreshnessSec: parsePositiveInt(env.AUDIT_FRESHNESS_SEC, 20, 'AUDIT_FRESHNESS_SEC'),
    auditPageSize: 8,
    auditRetryCount: parseNonNegativeInt(env.AUDIT_RETRY_COUNT, 0, 'AUDIT_RETRY_COUNT'),
    auditRetryDelayMs: 1_000,
    webhookAuditFreshnessSec: parsePositiveInt(env.WEBHOOK_AUDIT_FRESHNESS_SEC, 30, 'WEBHOOK_AUDIT_FRESHNESS_SEC'),
    webhookAuditPageSize: 6,
    webhookSearchMaxChannels: parsePositiveInt(env.WEBHOOK_SEARCH_MAX_CHANNELS, 50, 'WEBHOOK_SEARCH_MAX_CHANNELS'),
    cleanupIntervalSec: parsePositiveInt(env.CLEANUP_INTERVAL_SEC, 300, 'CLEANUP_INTERVAL_SEC'),
  };
}
