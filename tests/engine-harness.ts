import { SqliteDatabase } from '../src/db/sqlite';
import { AuditCorrelator } from '../src/moderation/audit-correlator';
import { EnforcementService } from '../src/moderation/enforcement';
import { InviteSpamDetector } from '../src/moderation/invite-spam';
import { ModerationEngine } from '../src/moderation/moderation-engine';
import { TrustRegistry } from '../src/moderation/trust-registry';
import { WebhookViolationTracker } from '../src/moderation/webhook-violations';
import { createRepositories } from '../src/repos';
import { InMemoryIdempotencyGuard } from '../src/services/idempotency';
import { BotConfig } from '../src/types';
import { FakeAuditDirectory, FakeGateway, makeLogger, testConfig } from './fakes';

export interface EngineHarnessOptions {
  members?: string[];
  trusted?: string[];
  config?: Partial<BotConfig>;
  nowTs?: number;
}

export function createEngineHarness(options: EngineHarnessOptions = {}) {
  const config: BotConfig = {
    ...testConfig,
    trustedAccountIds: options.trusted ?? [],
    ...options.config,
  };
  let nowTs = options.nowTs ?? 1_700_000_000_000;
  const clock = {
    now: () => nowTs,
    advance: (ms: number) => {
      nowTs += ms;
    },
  };
  const noWait = async (_ms: number): Promise<void> => {};

  const db = new SqliteDatabase();
  const repos = createRepositories(db.db);
  const gateway = new FakeGateway(options.members ?? []);
  const directory = new FakeAuditDirectory();
  const logger = makeLogger();
  const trust = new TrustRegistry(config.trustedAccountIds);
  const inviteSpam = new InviteSpamDetector({
    windowSec: config.inviteWindowSec,
    maxInWindow: config.inviteMaxInWindow,
    capacity: config.inviteHistoryCapacity,
  });
  const correlator = new AuditCorrelator(
    directory,
    logger,
    {
      lookupIntervalMs: config.auditLookupIntervalMs,
      pageSize: config.auditPageSize,
      freshnessSec: config.auditFreshnessSec,
      retryCount: config.auditRetryCount,
      retryDelayMs: config.auditRetryDelayMs,
    },
    clock.now,
    noWait,
  );
  const webhookViolations = new WebhookViolationTracker(config.webhookMaxAttempts);
  const enforcement = new EnforcementService(gateway, trust, repos, logger, noWait, clock.now);
  const engine = new ModerationEngine({
    config,
    gateway,
    trust,
    inviteSpam,
    correlator,
    enforcement,
    webhookViolations,
    idempotency: new InMemoryIdempotencyGuard(),
    logger,
    wait: noWait,
    now: clock.now,
  });

  return {
    config,
    clock,
    db,
    repos,
    gateway,
    directory,
    logger,
    inviteSpam,
    webhookViolations,
    engine,
  };
}
