/**
 * Opportunity schema
 * Mirrors the opportunities table field for field
 */

export type IsoDate = string;

export const STAGES = [
  'Prospect',
  'Warm Lead',
  'Applied',
  'Recruiter Screen',
  'HM Interview',
  'Loop',
  'Offer Pending',
  'Closed',
] as const;

export type Stage = (typeof STAGES)[number];
export type OpenStage = Exclude<Stage, 'Closed'>;

export const JOB_FAMILIES = ['A', 'B', 'C', 'D', 'E'] as const;
export type JobFamily = (typeof JOB_FAMILIES)[number];

export const JOB_FAMILY_LABELS: Record<JobFamily, string> = {
  A: 'Analytics Manager',
  B: 'Data Manager',
  C: 'BI Manager',
  D: 'Decision Science',
  E: 'Director Stretch',
};

export const TIERS = [1, 2, 3] as const;
export type Tier = (typeof TIERS)[number];

export const OPPORTUNITY_SOURCES = [
  'LinkedIn',
  'Referral',
  'Job Board',
  'Outbound',
  'Other',
] as const;
export type OpportunitySource = (typeof OPPORTUNITY_SOURCES)[number];

/** Source recorded for postings created from a job feed */
export const FEED_SOURCE: OpportunitySource = 'Other';

export const CLOSE_REASONS = [
  'Accepted',
  'Declined',
  'Rejected',
  'Ghosted',
  'Withdrew',
] as const;
export type CloseReason = (typeof CLOSE_REASONS)[number];

/**
 * A closed opportunity always carries its reason and date; an open one never does
 */
export type StageState =
  | { stage: OpenStage; closeReason: null; dateClosed: null }
  | { stage: 'Closed'; closeReason: CloseReason; dateClosed: IsoDate };

export interface OpportunityFields {
  company: string;
  roleTitle: string;
  jobFamily: JobFamily | null;
  tier: Tier | null;
  source: OpportunitySource | null;
  dateAdded: IsoDate;
  dateApplied: IsoDate | null;
  fitScore: number | null;
  salaryRange: string | null;
  jdUrl: string | null;
  jdRaw: string | null;
  jdKeywords: string | null;
  resumeVersion: string | null;
  nextAction: string | null;
  nextActionDate: IsoDate | null;
  notes: string | null;
  aiFitSummary: string | null;
}

export type Opportunity = OpportunityFields &
  StageState & {
    id: number;
    createdAt: Date;
    updatedAt: Date;
  };

/**
 * Input for creating an opportunity; new opportunities always start open
 */
export type NewOpportunity = Partial<OpportunityFields> &
  Pick<OpportunityFields, 'company' | 'roleTitle' | 'dateAdded'> & {
    stage: OpenStage;
  };

export function isOpenStage(stage: Stage): stage is OpenStage {
  return stage !== 'Closed';
}
