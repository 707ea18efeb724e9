import { BetterSqliteDb } from '../db/sqlite';
import { ModerationActionsRepo } from './moderation-actions-repo';

export interface Repositories {
  moderationActions: ModerationActionsRepo;
}

export function createRepositories(db: BetterSqliteDb): Repositories {
  return {
    moderationActions: new ModerationActionsRepo(db),
  };
}
