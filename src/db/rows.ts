import { ActivityEntry, ACTIVITY_TYPES, ActivityMetadata } from '../types/activity';
import { cadenceFromColumns } from '../types/cadence';
import { Contact, CONTACT_TYPES, RESPONSE_STATUSES } from '../types/contact';
import { parseEnum, parseOptionalEnum } from '../types/enums';
import {
  CLOSE_REASONS,
  JOB_FAMILIES,
  OPPORTUNITY_SOURCES,
  Opportunity,
  STAGES,
  StageState,
  Tier,
  TIERS,
} from '../types/opportunity';
import { ConsistencyViolation, ValidationError } from '../utils/errors';

/**
 * Raw row shapes as returned by pg (DATE columns arrive as strings)
 */
export type OpportunityRow = {
  id: number;
  company: string;
  role_title: string;
  job_family: string | null;
  tier: number | null;
  stage: string;
  source: string | null;
  date_added: string;
  date_applied: string | null;
  date_closed: string | null;
  close_reason: string | null;
  fit_score: number | null;
  salary_range: string | null;
  jd_url: string | null;
  jd_raw: string | null;
  jd_keywords: string | null;
  resume_version: string | null;
  next_action: string | null;
  next_action_date: string | null;
  notes: string | null;
  ai_fit_summary: string | null;
  created_at: Date;
  updated_at: Date;
};

export type ContactRow = {
  id: number;
  opportunity_id: number | null;
  full_name: string;
  title: string | null;
  company: string | null;
  linkedin_url: string | null;
  email: string | null;
  contact_type: string | null;
  outreach_day0: string | null;
  outreach_day3: string | null;
  outreach_day7: string | null;
  response_status: string;
  call_completed: boolean;
  referral_asked: boolean;
  referral_given: boolean;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
};

export type ActivityRow = {
  id: number;
  opportunity_id: number | null;
  contact_id: number | null;
  activity_type: string;
  description: string | null;
  metadata: string | null;
  created_at: Date;
};

function parseTier(value: number | null): Tier | null {
  if (value === null) return null;
  const tier = TIERS.find(candidate => candidate === value);
  if (tier === undefined) {
    throw new ValidationError(`Unknown tier "${value}". Expected one of: ${TIERS.join(', ')}`);
  }
  return tier;
}

function parseStageState(row: OpportunityRow): StageState {
  const stage = parseEnum(STAGES, row.stage, 'stage');
  if (stage === 'Closed') {
    if (row.close_reason === null || row.date_closed === null) {
      throw new ConsistencyViolation(`Opportunity ${row.id} is Closed without a close reason and date`);
    }
    return {
      stage,
      closeReason: parseEnum(CLOSE_REASONS, row.close_reason, 'close reason'),
      dateClosed: row.date_closed,
    };
  }
  if (row.close_reason !== null) {
    throw new ConsistencyViolation(`Opportunity ${row.id} has a close reason while in stage ${stage}`);
  }
  return { stage, closeReason: null, dateClosed: null };
}

export function mapOpportunityRow(row: OpportunityRow): Opportunity {
  return {
    id: row.id,
    company: row.company,
    roleTitle: row.role_title,
    jobFamily: parseOptionalEnum(JOB_FAMILIES, row.job_family, 'job family'),
    tier: parseTier(row.tier),
    source: parseOptionalEnum(OPPORTUNITY_SOURCES, row.source, 'source'),
    dateAdded: row.date_added,
    dateApplied: row.date_applied,
    fitScore: row.fit_score,
    salaryRange: row.salary_range,
    jdUrl: row.jd_url,
    jdRaw: row.jd_raw,
    jdKeywords: row.jd_keywords,
    resumeVersion: row.resume_version,
    nextAction: row.next_action,
    nextActionDate: row.next_action_date,
    notes: row.notes,
    aiFitSummary: row.ai_fit_summary,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    ...parseStageState(row),
  };
}

export function mapContactRow(row: ContactRow): Contact {
  return {
    id: row.id,
    opportunityId: row.opportunity_id,
    fullName: row.full_name,
    title: row.title,
    company: row.company,
    linkedinUrl: row.linkedin_url,
    email: row.email,
    contactType: parseOptionalEnum(CONTACT_TYPES, row.contact_type, 'contact type'),
    cadence: cadenceFromColumns(
      {
        outreachDay0: row.outreach_day0,
        outreachDay3: row.outreach_day3,
        outreachDay7: row.outreach_day7,
      },
      row.id
    ),
    responseStatus: parseEnum(RESPONSE_STATUSES, row.response_status, 'response status'),
    callCompleted: row.call_completed,
    referralAsked: row.referral_asked,
    referralGiven: row.referral_given,
    notes: row.notes,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isMetadata(value: unknown): value is ActivityMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseMetadata(raw: string | null): ActivityMetadata | null {
  if (raw === null) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    return isMetadata(parsed) ? parsed : { value: parsed };
  } catch {
    return { raw };
  }
}

export function mapActivityRow(row: ActivityRow): ActivityEntry {
  return {
    id: row.id,
    opportunityId: row.opportunity_id,
    contactId: row.contact_id,
    activityType: parseEnum(ACTIVITY_TYPES, row.activity_type, 'activity type'),
    description: row.description,
    metadata: parseMetadata(row.metadata),
    createdAt: row.created_at,
  };
}
