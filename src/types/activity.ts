export const ACTIVITY_TYPES = [
  'Stage Change',
  'Outreach Sent',
  'Follow-Up Sent',
  'Response Received',
  'Call Completed',
  'Application Submitted',
  'Interview Scheduled',
  'Interview Completed',
  'Offer Received',
  'AI Action',
  'Note Added',
] as const;
export type ActivityType = (typeof ACTIVITY_TYPES)[number];

export type ActivityMetadata = Record<string, unknown>;

/**
 * Immutable ledger row
 */
export interface ActivityEntry {
  readonly id: number;
  readonly opportunityId: number | null;
  readonly contactId: number | null;
  readonly activityType: ActivityType;
  readonly description: string | null;
  readonly metadata: ActivityMetadata | null;
  readonly createdAt: Date;
}

export interface NewActivityEntry {
  activityType: ActivityType;
  description?: string;
  opportunityId?: number | null;
  contactId?: number | null;
  metadata?: ActivityMetadata;
}
