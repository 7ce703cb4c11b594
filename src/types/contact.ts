import { IsoDate } from './opportunity';

export const CONTACT_TYPES = [
  'Hiring Manager',
  'Peer',
  'Recruiter',
  'Alumni',
  'Referral Source',
  'Other',
] as const;
export type ContactType = (typeof CONTACT_TYPES)[number];

export const RESPONSE_STATUSES = [
  'Pending',
  'Responded',
  'No Response',
  'Meeting Scheduled',
] as const;
export type ResponseStatus = (typeof RESPONSE_STATUSES)[number];

/** Statuses that are still chased by follow-ups */
export const CHASEABLE_STATUSES: readonly ResponseStatus[] = ['Pending', 'No Response'];

export const CADENCE_STEPS = ['day0', 'day3', 'day7'] as const;
export type CadenceStep = (typeof CADENCE_STEPS)[number];

/**
 * Outreach cadence keyed by the last step actually sent.
 * Each later variant carries every earlier date, so day7 without day3 cannot be built.
 */
export type OutreachCadence =
  | { lastStep: null }
  | { lastStep: 'day0'; day0: IsoDate }
  | { lastStep: 'day3'; day0: IsoDate; day3: IsoDate }
  | { lastStep: 'day7'; day0: IsoDate; day3: IsoDate; day7: IsoDate };

export interface Contact {
  id: number;
  opportunityId: number | null;
  fullName: string;
  title: string | null;
  company: string | null;
  linkedinUrl: string | null;
  email: string | null;
  contactType: ContactType | null;
  cadence: OutreachCadence;
  responseStatus: ResponseStatus;
  callCompleted: boolean;
  referralAsked: boolean;
  referralGiven: boolean;
  notes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewContact = Pick<Contact, 'fullName'> &
  Partial<Omit<Contact, 'id' | 'fullName' | 'createdAt' | 'updatedAt'>>;
