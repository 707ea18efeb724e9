import { BetterSqliteDb } from '../db/sqlite';
import { ModerationActionRecord, ModerationActionSummary } from '../types';

export class ModerationActionsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  record(entry: ModerationActionRecord, nowTs: number = Date.now()): void {
    this.db.prepare(`
      INSERT INTO moderation_actions (guild_id, user_id, action, reason, meta_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      entry.communityId,
      entry.accountId,
      entry.action,
      entry.reason,
      entry.meta ? JSON.stringify(entry.meta) : null,
      nowTs,
    );
  }

  summarizeSince(sinceTs: number): ModerationActionSummary[] {
    return this.db.prepare(`
      SELECT action, COUNT(*) AS count
      FROM moderation_actions
      WHERE created_at >= ?
      GROUP BY action
      ORDER BY action
    `).all(sinceTs) as ModerationActionSummary[];
  }

  purgeOlderThan(cutoffTs: number): number {
    return this.db.prepare('DELETE FROM moderation_actions WHERE created_at < ?').run(cutoffTs).changes;
  }
}
