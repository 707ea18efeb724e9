import { describe, expect, it } from 'vitest';
import { loadConfig, parseSnowflakeList } from '../src/config';

describe('config', () => {
  it('requires a bot token', () => {
    expect(() => loadConfig({})).toThrow('DISCORD_TOKEN is required');
  });

  it('applies defaults', () => {
    const config = loadConfig({ DISCORD_TOKEN: 'test-token' });

    expect(config).toMatchObject({
      botToken: 'test-token',
      trustedAccountIds: [],
      logChannelId: undefined,
      inviteWindowSec: 15,
      inviteMaxInWindow: 5,
      timeoutHours: 1,
      webhookMaxAttempts: 3,
      auditPropagationDelayMs: 1_000,
      auditFreshnessSec: 20,
      auditRetryCount: 0,
      webhookAuditFreshnessSec: 30,
      webhookSearchMaxChannels: 50,
      cleanupIntervalSec: 300,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      DISCORD_TOKEN: 'test-token',
      TRUSTED_ACCOUNT_IDS: '200000000000000001, 200000000000000002',
      LOG_CHANNEL_ID: '700000000000000001',
      INVITE_MAX_IN_WINDOW: '3',
      AUDIT_PROPAGATION_DELAY_MS: '0',
      AUDIT_RETRY_COUNT: '2',
    });

    expect(config.trustedAccountIds).toEqual(['200000000000000001', '200000000000000002']);
    expect(config.logChannelId).toBe('700000000000000001');
    expect(config.inviteMaxInWindow).toBe(3);
    expect(config.auditPropagationDelayMs).toBe(0);
    expect(config.auditRetryCount).toBe(2);
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ DISCORD_TOKEN: 'test-token', INVITE_WINDOW_SEC: '0' }))
      .toThrow('Environment variable INVITE_WINDOW_SEC must be a positive integer');
    expect(() => loadConfig({ DISCORD_TOKEN: 'test-token', AUDIT_RETRY_COUNT: '-1' }))
      .toThrow('Environment variable AUDIT_RETRY_COUNT must be a non-negative integer');
  });

  it('caps the timeout at 28 days', () => {
    expect(loadConfig({ DISCORD_TOKEN: 'test-token', TIMEOUT_HOURS: '672' }).timeoutHours).toBe(672);
    expect(() => loadConfig({ DISCORD_TOKEN: 'test-token', TIMEOUT_HOURS: '673' }))
      .toThrow('Environment variable TIMEOUT_HOURS must not exceed 672');
  });

  it('rejects a malformed log channel id', () => {
    expect(() => loadConfig({ DISCORD_TOKEN: 'test-token', LOG_CHANNEL_ID: 'general' }))
      .toThrow('Environment variable LOG_CHANNEL_ID must be a snowflake id');
  });
});

describe('parseSnowflakeList', () => {
  it('splits on commas, semicolons and whitespace and drops duplicates', () => {
    expect(parseSnowflakeList('200000000000000001;200000000000000002\n200000000000000001', 'IDS'))
      .toEqual(['200000000000000001', '200000000000000002']);
  });

  it('returns an empty list for blank input', () => {
    expect(parseSnowflakeList(undefined, 'IDS')).toEqual([]);
    expect(parseSnowflakeList('   ', 'IDS')).toEqual([]);
  });

  it('rejects entries that are not ids', () => {
    expect(() => parseSnowflakeList('200000000000000001,admin', 'IDS'))
      .toThrow('Environment variable IDS contains an invalid id: admin');
  });
});
