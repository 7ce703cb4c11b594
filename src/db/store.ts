import { ActivityEntry, NewActivityEntry } from '../types/activity';
import { Contact, NewContact, OutreachCadence, ResponseStatus } from '../types/contact';
import { IsoDate, NewOpportunity, Opportunity, StageState } from '../types/opportunity';

/**
 * Repository contracts the domain depends on.
 * A repository set is always bound to one transaction.
 */
export interface OpportunitiesRepository {
  findById(id: number): Promise<Opportunity | null>;
  /** Exact-string match on the stored posting URL */
  findByPostingUrl(url: string): Promise<Opportunity | null>;
  /** Serializes dedup-check-and-create for one URL until the transaction ends */
  lockPostingUrl(url: string): Promise<void>;
  create(input: NewOpportunity): Promise<Opportunity>;
  updateStage(id: number, state: StageState, dateApplied: IsoDate | null): Promise<Opportunity>;
  updateNextAction(id: number, nextAction: string | null, nextActionDate: IsoDate | null): Promise<Opportunity>;
  listOpen(): Promise<Opportunity[]>;
}

export interface ContactFilter {
  opportunityId?: number;
  responseStatuses?: readonly ResponseStatus[];
  withOutreach?: boolean;
}

export interface ContactsRepository {
  findById(id: number): Promise<Contact | null>;
  create(input: NewContact): Promise<Contact>;
  list(filter?: ContactFilter): Promise<Contact[]>;
  updateCadence(id: number, cadence: OutreachCadence): Promise<Contact>;
  updateResponseStatus(id: number, status: ResponseStatus): Promise<Contact>;
}

/** Append-only: entries are never updated or deleted */
export interface ActivityLogRepository {
  append(entry: NewActivityEntry): Promise<ActivityEntry>;
  list(options: { opportunityId?: number; limit: number }): Promise<ActivityEntry[]>;
}

export interface SchedulerStateRepository {
  /** Reads the watermark, holding it until the transaction ends */
  getLastRunDate(): Promise<IsoDate | null>;
  setLastRunDate(date: IsoDate): Promise<void>;
}

export interface Repositories {
  opportunities: OpportunitiesRepository;
  contacts: ContactsRepository;
  activityLog: ActivityLogRepository;
  schedulerState: SchedulerStateRepository;
}

/**
 * Runs `work` in one transaction: everything it writes commits together or not at all
 */
export interface Store {
  withTransaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
}
