import { Repositories, Store } from '../db/store';
import { ActivityEntry, NewActivityEntry } from '../types/activity';

/**
 * Append-only activity record.
 * Exposes no update or delete; reads exist for display only.
 */
export class Ledger {
  constructor(private store: Store) {}

  /**
   * Appends inside the caller's transaction so the entry commits with the change it describes
   */
  async record(repos: Repositories, entry: NewActivityEntry): Promise<ActivityEntry> {
    return repos.activityLog.append(entry);
  }

  async append(entry: NewActivityEntry): Promise<ActivityEntry> {
    return this.store.withTransaction(repos => this.record(repos, entry));
  }

  async history(options: { opportunityId?: number; limit?: number } = {}): Promise<ActivityEntry[]> {
    return this.store.withTransaction(repos =>
      repos.activityLog.list({ opportunityId: options.opportunityId, limit: options.limit ?? 50 })
    );
  }
}
