import {
  ActivityLogRepository,
  ContactFilter,
  ContactsRepository,
  OpportunitiesRepository,
  Repositories,
  SchedulerStateRepository,
  Store,
} from '../db/store';
import { ActivityEntry, NewActivityEntry } from '../types/activity';
import { Contact, NewContact, OutreachCadence, ResponseStatus } from '../types/contact';
import { IsoDate, NewOpportunity, Opportunity, StageState } from '../types/opportunity';
import { Clock, systemClock } from '../utils/dates';
import { NotFoundError } from '../utils/errors';

interface MemoryState {
  opportunities: Opportunity[];
  contacts: Contact[];
  activity: ActivityEntry[];
  lastRunDate: IsoDate | null;
  nextId: { opportunity: number; contact: number; activity: number };
}

function emptyState(): MemoryState {
  return {
    opportunities: [],
    contacts: [],
    activity: [],
    lastRunDate: null,
    nextId: { opportunity: 1, contact: 1, activity: 1 },
  };
}

/**
 * In-process Store for tests.
 * Each transaction works on a copy of the state that replaces it only on success,
 * and transactions run one at a time.
 */
export class MemoryStore implements Store {
  private state: MemoryState = emptyState();
  private queue: Promise<void> = Promise.resolve();

  constructor(private clock: Clock = systemClock) {}

  withTransaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const draft = structuredClone(this.state);
      const result = await work(createMemoryRepositories(draft, this.clock));
      this.state = draft;
      return result;
    };
    const next = this.queue.then(run);
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  /** Committed state, for assertions */
  get snapshot(): Readonly<MemoryState> {
    return structuredClone(this.state);
  }
}

function replace<T extends { id: number }>(rows: T[], updated: T): T {
  const index = rows.findIndex(row => row.id === updated.id);
  rows[index] = updated;
  return updated;
}

class MemoryOpportunities implements OpportunitiesRepository {
  constructor(private state: MemoryState, private clock: Clock) {}

  async findById(id: number): Promise<Opportunity | null> {
    return this.state.opportunities.find(row => row.id === id) ?? null;
  }

  async findByPostingUrl(url: string): Promise<Opportunity | null> {
    return this.state.opportunities.find(row => row.jdUrl === url) ?? null;
  }

  async lockPostingUrl(): Promise<void> {
    // transactions are already serialized
  }

  async create(input: NewOpportunity): Promise<Opportunity> {
    const now = this.clock.now();
    const created: Opportunity = {
      id: this.state.nextId.opportunity++,
      company: input.company,
      roleTitle: input.roleTitle,
      jobFamily: input.jobFamily ?? null,
      tier: input.tier ?? null,
      source: input.source ?? null,
      dateAdded: input.dateAdded,
      dateApplied: input.dateApplied ?? null,
      fitScore: input.fitScore ?? null,
      salaryRange: input.salaryRange ?? null,
      jdUrl: input.jdUrl ?? null,
      jdRaw: input.jdRaw ?? null,
      jdKeywords: input.jdKeywords ?? null,
      resumeVersion: input.resumeVersion ?? null,
      nextAction: input.nextAction ?? null,
      nextActionDate: input.nextActionDate ?? null,
      notes: input.notes ?? null,
      aiFitSummary: input.aiFitSummary ?? null,
      stage: input.stage,
      closeReason: null,
      dateClosed: null,
      createdAt: now,
      updatedAt: now,
    };
    this.state.opportunities.push(created);
    return created;
  }

  async updateStage(id: number, state: StageState, dateApplied: IsoDate | null): Promise<Opportunity> {
    const current = await this.require(id);
    return replace(this.state.opportunities, {
      ...current,
      ...state,
      dateApplied,
      updatedAt: this.clock.now(),
    });
  }

  async updateNextAction(
    id: number,
    nextAction: string | null,
    nextActionDate: IsoDate | null
  ): Promise<Opportunity> {
    const current = await this.require(id);
    return replace(this.state.opportunities, {
      ...current,
      nextAction,
      nextActionDate,
      updatedAt: this.clock.now(),
    });
  }

  async listOpen(): Promise<Opportunity[]> {
    return this.state.opportunities.filter(row => row.stage !== 'Closed');
  }

  private async require(id: number): Promise<Opportunity> {
    const current = await this.findById(id);
    if (!current) {
      throw new NotFoundError('Opportunity', id);
    }
    return current;
  }
}

class MemoryContacts implements ContactsRepository {
  constructor(private state: MemoryState, private clock: Clock) {}

  async findById(id: number): Promise<Contact | null> {
    return this.state.contacts.find(row => row.id === id) ?? null;
  }

  async create(input: NewContact): Promise<Contact> {
    const now = this.clock.now();
    const created: Contact = {
      id: this.state.nextId.contact++,
      opportunityId: input.opportunityId ?? null,
      fullName: input.fullName,
      title: input.title ?? null,
      company: input.company ?? null,
      linkedinUrl: input.linkedinUrl ?? null,
      email: input.email ?? null,
      contactType: input.contactType ?? null,
      cadence: input.cadence ?? { lastStep: null },
      responseStatus: input.responseStatus ?? 'Pending',
      callCompleted: input.callCompleted ?? false,
      referralAsked: input.referralAsked ?? false,
      referralGiven: input.referralGiven ?? false,
      notes: input.notes ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.state.contacts.push(created);
    return created;
  }

  async list(filter: ContactFilter = {}): Promise<Contact[]> {
    return this.state.contacts.filter(row =>
      (filter.opportunityId === undefined || row.opportunityId === filter.opportunityId) &&
      (filter.responseStatuses === undefined || filter.responseStatuses.includes(row.responseStatus)) &&
      (!filter.withOutreach || row.cadence.lastStep !== null)
    );
  }

  async updateCadence(id: number, cadence: OutreachCadence): Promise<Contact> {
    const current = await this.require(id);
    return replace(this.state.contacts, { ...current, cadence, updatedAt: this.clock.now() });
  }

  async updateResponseStatus(id: number, status: ResponseStatus): Promise<Contact> {
    const current = await this.require(id);
    return replace(this.state.contacts, { ...current, responseStatus: status, updatedAt: this.clock.now() });
  }

  private async require(id: number): Promise<Contact> {
    const current = await this.findById(id);
    if (!current) {
      throw new NotFoundError('Contact', id);
    }
    return current;
  }
}

class MemoryActivityLog implements ActivityLogRepository {
  constructor(private state: MemoryState, private clock: Clock) {}

  async append(entry: NewActivityEntry): Promise<ActivityEntry> {
    const created: ActivityEntry = {
      id: this.state.nextId.activity++,
      opportunityId: entry.opportunityId ?? null,
      contactId: entry.contactId ?? null,
      activityType: entry.activityType,
      description: entry.description ?? null,
      metadata: entry.metadata ?? null,
      createdAt: this.clock.now(),
    };
    this.state.activity.push(created);
    return created;
  }

  async list(options: { opportunityId?: number; limit: number }): Promise<ActivityEntry[]> {
    return this.state.activity
      .filter(row => options.opportunityId === undefined || row.opportunityId === options.opportunityId)
      .sort((a, b) => b.id - a.id)
      .slice(0, options.limit);
  }
}

class MemorySchedulerState implements SchedulerStateRepository {
  constructor(private state: MemoryState) {}

  async getLastRunDate(): Promise<IsoDate | null> {
    return this.state.lastRunDate;
  }

  async setLastRunDate(date: IsoDate): Promise<void> {
    this.state.lastRunDate = date;
  }
}

function createMemoryRepositories(state: MemoryState, clock: Clock): Repositories {
  return {
    opportunities: new MemoryOpportunities(state, clock),
    contacts: new MemoryContacts(state, clock),
    activityLog: new MemoryActivityLog(state, clock),
    schedulerState: new MemorySchedulerState(state),
  };
}
