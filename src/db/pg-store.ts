import { Pool, PoolClient } from 'pg';
import { ActivityEntry, NewActivityEntry } from '../types/activity';
import { cadenceToColumns } from '../types/cadence';
import { Contact, NewContact, OutreachCadence, ResponseStatus } from '../types/contact';
import { IsoDate, NewOpportunity, Opportunity, StageState } from '../types/opportunity';
import { NotFoundError } from '../utils/errors';
import { withTransaction } from './client';
import {
  ActivityRow,
  ContactRow,
  OpportunityRow,
  mapActivityRow,
  mapContactRow,
  mapOpportunityRow,
} from './rows';
import {
  ActivityLogRepository,
  ContactFilter,
  ContactsRepository,
  OpportunitiesRepository,
  Repositories,
  SchedulerStateRepository,
  Store,
} from './store';

const OPPORTUNITY_COLUMNS = `
  id, company, role_title, job_family, tier, stage, source,
  date_added, date_applied, date_closed, close_reason, fit_score,
  salary_range, jd_url, jd_raw, jd_keywords, resume_version,
  next_action, next_action_date, notes, ai_fit_summary, created_at, updated_at`;

const CONTACT_COLUMNS = `
  id, opportunity_id, full_name, title, company, linkedin_url, email,
  contact_type, outreach_day0, outreach_day3, outreach_day7, response_status,
  call_completed, referral_asked, referral_given, notes, created_at, updated_at`;

const ACTIVITY_COLUMNS = `
  id, opportunity_id, contact_id, activity_type, description, metadata, created_at`;

/**
 * Database operations for opportunities
 */
export class PgOpportunitiesRepository implements OpportunitiesRepository {
  constructor(private client: PoolClient) {}

  async findById(id: number): Promise<Opportunity | null> {
    const result = await this.client.query<OpportunityRow>(
      `SELECT ${OPPORTUNITY_COLUMNS} FROM opportunities WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? mapOpportunityRow(result.rows[0]) : null;
  }

  async findByPostingUrl(url: string): Promise<Opportunity | null> {
    const result = await this.client.query<OpportunityRow>(
      `SELECT ${OPPORTUNITY_COLUMNS} FROM opportunities WHERE jd_url = $1 ORDER BY id LIMIT 1`,
      [url]
    );
    return result.rows.length > 0 ? mapOpportunityRow(result.rows[0]) : null;
  }

  async lockPostingUrl(url: string): Promise<void> {
    await this.client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [url]);
  }

  async create(input: NewOpportunity): Promise<Opportunity> {
    const result = await this.client.query<OpportunityRow>(
      `INSERT INTO opportunities (
        company, role_title, job_family, tier, stage, source, date_added,
        date_applied, fit_score, salary_range, jd_url, jd_raw, jd_keywords,
        resume_version, next_action, next_action_date, notes, ai_fit_summary
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18)
      RETURNING ${OPPORTUNITY_COLUMNS}`,
      [
        input.company,
        input.roleTitle,
        input.jobFamily ?? null,
        input.tier ?? null,
        input.stage,
        input.source ?? null,
        input.dateAdded,
        input.dateApplied ?? null,
        input.fitScore ?? null,
        input.salaryRange ?? null,
        input.jdUrl ?? null,
        input.jdRaw ?? null,
        input.jdKeywords ?? null,
        input.resumeVersion ?? null,
        input.nextAction ?? null,
        input.nextActionDate ?? null,
        input.notes ?? null,
        input.aiFitSummary ?? null,
      ]
    );
    return mapOpportunityRow(result.rows[0]);
  }

  async updateStage(id: number, state: StageState, dateApplied: IsoDate | null): Promise<Opportunity> {
    const result = await this.client.query<OpportunityRow>(
      `UPDATE opportunities
       SET stage = $2, close_reason = $3, date_closed = $4, date_applied = $5
       WHERE id = $1
       RETURNING ${OPPORTUNITY_COLUMNS}`,
      [id, state.stage, state.closeReason, state.dateClosed, dateApplied]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('Opportunity', id);
    }
    return mapOpportunityRow(result.rows[0]);
  }

  async updateNextAction(
    id: number,
    nextAction: string | null,
    nextActionDate: IsoDate | null
  ): Promise<Opportunity> {
    const result = await this.client.query<OpportunityRow>(
      `UPDATE opportunities
       SET next_action = $2, next_action_date = $3
       WHERE id = $1
       RETURNING ${OPPORTUNITY_COLUMNS}`,
      [id, nextAction, nextActionDate]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('Opportunity', id);
    }
    return mapOpportunityRow(result.rows[0]);
  }

  async listOpen(): Promise<Opportunity[]> {
    const result = await this.client.query<OpportunityRow>(
      `SELECT ${OPPORTUNITY_COLUMNS}
       FROM opportunities
       WHERE stage != 'Closed'
       ORDER BY id`
    );
    return result.rows.map(mapOpportunityRow);
  }
}

/**
 * Database operations for contacts
 */
export class PgContactsRepository implements ContactsRepository {
  constructor(private client: PoolClient) {}

  async findById(id: number): Promise<Contact | null> {
    const result = await this.client.query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts WHERE id = $1`,
      [id]
    );
    return result.rows.length > 0 ? mapContactRow(result.rows[0]) : null;
  }

  async create(input: NewContact): Promise<Contact> {
    const cadence = cadenceToColumns(input.cadence ?? { lastStep: null });
    const result = await this.client.query<ContactRow>(
      `INSERT INTO contacts (
        opportunity_id, full_name, title, company, linkedin_url, email, contact_type,
        outreach_day0, outreach_day3, outreach_day7, response_status,
        call_completed, referral_asked, referral_given, notes
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15)
      RETURNING ${CONTACT_COLUMNS}`,
      [
        input.opportunityId ?? null,
        input.fullName,
        input.title ?? null,
        input.company ?? null,
        input.linkedinUrl ?? null,
        input.email ?? null,
        input.contactType ?? null,
        cadence.outreachDay0,
        cadence.outreachDay3,
        cadence.outreachDay7,
        input.responseStatus ?? 'Pending',
        input.callCompleted ?? false,
        input.referralAsked ?? false,
        input.referralGiven ?? false,
        input.notes ?? null,
      ]
    );
    return mapContactRow(result.rows[0]);
  }

  async list(filter: ContactFilter = {}): Promise<Contact[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.opportunityId !== undefined) {
      params.push(filter.opportunityId);
      conditions.push(`opportunity_id = $${params.length}`);
    }
    if (filter.responseStatuses !== undefined) {
      params.push([...filter.responseStatuses]);
      conditions.push(`response_status = ANY($${params.length})`);
    }
    if (filter.withOutreach) {
      conditions.push('outreach_day0 IS NOT NULL');
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.client.query<ContactRow>(
      `SELECT ${CONTACT_COLUMNS} FROM contacts ${where} ORDER BY id`,
      params
    );
    return result.rows.map(mapContactRow);
  }

  async updateCadence(id: number, cadence: OutreachCadence): Promise<Contact> {
    const columns = cadenceToColumns(cadence);
    const result = await this.client.query<ContactRow>(
      `UPDATE contacts
       SET outreach_day0 = $2, outreach_day3 = $3, outreach_day7 = $4
       WHERE id = $1
       RETURNING ${CONTACT_COLUMNS}`,
      [id, columns.outreachDay0, columns.outreachDay3, columns.outreachDay7]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('Contact', id);
    }
    return mapContactRow(result.rows[0]);
  }

  async updateResponseStatus(id: number, status: ResponseStatus): Promise<Contact> {
    const result = await this.client.query<ContactRow>(
      `UPDATE contacts SET response_status = $2 WHERE id = $1 RETURNING ${CONTACT_COLUMNS}`,
      [id, status]
    );
    if (result.rows.length === 0) {
      throw new NotFoundError('Contact', id);
    }
    return mapContactRow(result.rows[0]);
  }
}

/**
 * Database operations for the activity log
 * Insert and select only
 */
export class PgActivityLogRepository implements ActivityLogRepository {
  constructor(private client: PoolClient) {}

  async append(entry: NewActivityEntry): Promise<ActivityEntry> {
    const result = await this.client.query<ActivityRow>(
      `INSERT INTO activity_log (opportunity_id, contact_id, activity_type, description, metadata)
       VALUES ($1, $2, $3, $4, $5)
       RETURNING ${ACTIVITY_COLUMNS}`,
      [
        entry.opportunityId ?? null,
        entry.contactId ?? null,
        entry.activityType,
        entry.description ?? null,
        entry.metadata ? JSON.stringify(entry.metadata) : null,
      ]
    );
    return mapActivityRow(result.rows[0]);
  }

  async list(options: { opportunityId?: number; limit: number }): Promise<ActivityEntry[]> {
    const result = options.opportunityId === undefined
      ? await this.client.query<ActivityRow>(
          `SELECT ${ACTIVITY_COLUMNS} FROM activity_log ORDER BY created_at DESC, id DESC LIMIT $1`,
          [options.limit]
        )
      : await this.client.query<ActivityRow>(
          `SELECT ${ACTIVITY_COLUMNS} FROM activity_log
           WHERE opportunity_id = $1
           ORDER BY created_at DESC, id DESC LIMIT $2`,
          [options.opportunityId, options.limit]
        );
    return result.rows.map(mapActivityRow);
  }
}

/**
 * Single-row watermark owned by the scheduler
 */
export class PgSchedulerStateRepository implements SchedulerStateRepository {
  constructor(private client: PoolClient) {}

  async getLastRunDate(): Promise<IsoDate | null> {
    await this.client.query(
      'INSERT INTO scheduler_state (id) VALUES (1) ON CONFLICT (id) DO NOTHING'
    );
    const result = await this.client.query<{ last_run_date: string | null }>(
      'SELECT last_run_date FROM scheduler_state WHERE id = 1 FOR UPDATE'
    );
    return result.rows[0].last_run_date;
  }

  async setLastRunDate(date: IsoDate): Promise<void> {
    await this.client.query(
      'UPDATE scheduler_state SET last_run_date = $1, updated_at = NOW() WHERE id = 1',
      [date]
    );
  }
}

export function createPgRepositories(client: PoolClient): Repositories {
  return {
    opportunities: new PgOpportunitiesRepository(client),
    contacts: new PgContactsRepository(client),
    activityLog: new PgActivityLogRepository(client),
    schedulerState: new PgSchedulerStateRepository(client),
  };
}

export class PgStore implements Store {
  constructor(private pool: Pool) {}

  withTransaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    return withTransaction(this.pool, client => work(createPgRepositories(client)));
  }
}
