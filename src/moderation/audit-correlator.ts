import { AccountId, AuditActionKind, AuditDirectory, AuditRecord, CommunityId, Snowflake } from '../types';
import { ModerationLogger } from '../services/logger';
import { classifyPlatformError, errorMessage } from '../utils/platform-error';
import { secondsToMs, sleep } from '../utils/time';

export interface AuditCorrelatorOptions {
  lookupIntervalMs: number;
  pageSize: number;
  freshnessSec: number;
  retryCount: number;
  retryDelayMs: number;
}

export interface AttributionRequest {
  communityId: CommunityId;
  kind: AuditActionKind;
  targetId?: Snowflake;
  nowTs?: number;
  freshnessSec?: number;
}

export interface FreshRecordsRequest {
  communityId: CommunityId;
  kind: AuditActionKind;
  limit: number;
  freshnessSec: number;
  nowTs?: number;
}

type FetchResult = { ok: true; records: AuditRecord[] } | { ok: false };

/**
 * Maps an observed side effect to the account that caused it. Audit entries are
 * written asynchronously, so callers wait for propagation before asking, and
 * entries outside the freshness window are never attributed.
 */
export class AuditCorrelator {
  private readonly lastLookupAt = new Map<string, number>();

  constructor(
    private readonly directory: AuditDirectory,
    private readonly logger: ModerationLogger,
    private readonly options: AuditCorrelatorOptions,
    private readonly now: () => number = Date.now,
    private readonly wait: (ms: number) => Promise<void> = sleep,
  ) {}

  async attribute(request: AttributionRequest): Promise<AccountId | undefined> {
    await this.throttle(request);

    const freshnessSec = request.freshnessSec ?? this.options.freshnessSec;

    for (let attempt = 0; attempt <= this.options.retryCount; attempt += 1) {
      if (attempt > 0) {
        await this.wait(this.options.retryDelayMs);
      }

      const nowTs = attempt === 0 ? request.nowTs ?? this.now() : this.now();
      const result = await this.fetch(request.communityId, request.kind, this.options.pageSize);
      if (!result.ok) {
        return undefined;
      }

      const match = result.records.find((record) => (
        this.isFresh(record, nowTs, freshnessSec)
        && (request.targetId === undefined || record.targetId === request.targetId)
        && record.actorId !== null
      ));

      if (match?.actorId) {
        return match.actorId;
      }
    }

    await this.logger.info('No fresh audit record matched', {
      guildId: request.communityId,
      kind: request.kind,
      targetId: request.targetId ?? null,
      freshnessSec,
    });

    return undefined;
  }

  async listFresh(request: FreshRecordsRequest): Promise<AuditRecord[]> {
    const nowTs = request.nowTs ?? this.now();
    const result = await this.fetch(request.communityId, request.kind, request.limit);
    if (!result.ok) {
      return [];
    }

    return result.records.filter((record) => this.isFresh(record, nowTs, request.freshnessSec));
  }

  purgeThrottle(nowTs: number): number {
    let purged = 0;
    for (const [key, lookupTs] of this.lastLookupAt.entries()) {
      if (nowTs - lookupTs >= this.options.lookupIntervalMs) {
        this.lastLookupAt.delete(key);
        purged += 1;
      }
    }
    return purged;
  }

  /**
   * Claims the next lookup slot for the key before waiting, so concurrent
   * callers for one key queue up one interval apart.
   */
  private async throttle(request: AttributionRequest): Promise<void> {
    const key = `${request.communityId}:${request.kind}:${request.targetId ?? '*'}`;
    const nowTs = this.now();
    const previousTs = this.lastLookupAt.get(key);
    const slotTs = previousTs === undefined
      ? nowTs
      : Math.max(nowTs, previousTs + this.options.lookupIntervalMs);

    this.lastLookupAt.set(key, slotTs);

    if (slotTs > nowTs) {
      await this.wait(slotTs - nowTs);
    }
  }

  private isFresh(record: AuditRecord, nowTs: number, freshnessSec: number): boolean {
    return nowTs - record.createdAtTs <= secondsToMs(freshnessSec);
  }

  private async fetch(communityId: CommunityId, kind: AuditActionKind, limit: number): Promise<FetchResult> {
    try {
      const records = await this.directory.fetchRecent(communityId, kind, limit);
      return { ok: true, records: records.slice(0, limit) };
    } catch (error) {
      const errorKind = classifyPlatformError(error);
      await this.logger.warn(
        errorKind === 'permission_denied' ? 'Missing permission: View Audit Log' : 'Audit log lookup failed',
        {
          guildId: communityId,
          kind,
          errorKind,
          error: errorMessage(error),
        },
      );
      return { ok: false };
    }
  }
}
