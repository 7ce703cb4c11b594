import { Store } from '../db/store';
import { advanceCadence } from '../types/cadence';
import {
  CadenceStep,
  CHASEABLE_STATUSES,
  Contact,
  OutreachCadence,
  RESPONSE_STATUSES,
  ResponseStatus,
} from '../types/contact';
import { parseEnum } from '../types/enums';
import { IsoDate, Opportunity } from '../types/opportunity';
import { Clock, daysBetween, systemClock, toIsoDate } from '../utils/dates';
import { NotFoundError, TransientIOError, ValidationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { EmailSender } from './collaborators';
import { Ledger } from './ledger';

export interface DueFollowUp {
  contact: Contact;
  step: Exclude<CadenceStep, 'day0'>;
  daysSinceFirstOutreach: number;
}

export interface WaitingOn {
  contact: Contact;
  opportunity: Opportunity | null;
  daysWaiting: number;
}

/** Days after day0 at which each follow-up becomes due; both anchored to day0 */
export const FOLLOW_UP_OFFSETS = { day3: 3, day7: 7 } as const;

const log = logger.child('follow-up');

/**
 * Pure due-step rule for one contact on `today`
 */
export function dueStep(cadence: OutreachCadence, today: IsoDate): DueFollowUp['step'] | null {
  if (cadence.lastStep === 'day0' && daysBetween(cadence.day0, today) >= FOLLOW_UP_OFFSETS.day3) {
    return 'day3';
  }
  if (cadence.lastStep === 'day3' && daysBetween(cadence.day0, today) >= FOLLOW_UP_OFFSETS.day7) {
    return 'day7';
  }
  return null;
}

/**
 * Tracks the Day 0 / Day 3 / Day 7 outreach cadence of contacts
 */
export class FollowUpTracker {
  constructor(
    private store: Store,
    private ledger: Ledger,
    private clock: Clock = systemClock
  ) {}

  /**
   * Contacts still being chased whose next follow-up has come due
   */
  async dueFollowUps(): Promise<DueFollowUp[]> {
    const today = this.today();
    const contacts = await this.store.withTransaction(repos =>
      repos.contacts.list({ responseStatuses: CHASEABLE_STATUSES, withOutreach: true })
    );

    const due: DueFollowUp[] = [];
    for (const contact of contacts) {
      if (!CHASEABLE_STATUSES.includes(contact.responseStatus) || contact.cadence.lastStep === null) {
        continue;
      }
      const step = dueStep(contact.cadence, today);
      if (step) {
        due.push({
          contact,
          step,
          daysSinceFirstOutreach: daysBetween(contact.cadence.day0, today),
        });
      }
    }

    return due.sort((a, b) =>
      b.daysSinceFirstOutreach - a.daysSinceFirstOutreach || a.contact.id - b.contact.id
    );
  }

  /**
   * Records a cadence step as sent today.
   * A step that is already recorded is left as is and logs nothing.
   */
  async markSent(contactId: number, step: CadenceStep): Promise<Contact> {
    const today = this.today();

    return this.store.withTransaction(async (repos) => {
      const contact = await repos.contacts.findById(contactId);
      if (!contact) {
        throw new NotFoundError('Contact', contactId);
      }

      const cadence = advanceCadence(contact.cadence, step, today);
      if (!cadence) {
        log.debug('Cadence step already recorded', { contactId, step });
        return contact;
      }

      const updated = await repos.contacts.updateCadence(contactId, cadence);
      await this.ledger.record(repos, {
        activityType: step === 'day0' ? 'Outreach Sent' : 'Follow-Up Sent',
        opportunityId: contact.opportunityId,
        contactId,
        description: step === 'day0'
          ? `Outreach sent to ${contact.fullName}`
          : `${stepLabel(step)} follow-up sent to ${contact.fullName}`,
        metadata: { step, date: today },
      });
      return updated;
    });
  }

  /**
   * Pending contacts first reached at least `minDays` ago. Read-only.
   */
  async staleWaitingOn(minDays: number = 2): Promise<WaitingOn[]> {
    const today = this.today();

    return this.store.withTransaction(async (repos) => {
      const contacts = await repos.contacts.list({ responseStatuses: ['Pending'], withOutreach: true });
      const waiting: WaitingOn[] = [];

      for (const contact of contacts) {
        if (contact.responseStatus !== 'Pending' || contact.cadence.lastStep === null) {
          continue;
        }
        const daysWaiting = daysBetween(contact.cadence.day0, today);
        if (daysWaiting < minDays) {
          continue;
        }
        const opportunity = contact.opportunityId === null
          ? null
          : await repos.opportunities.findById(contact.opportunityId);
        waiting.push({ contact, opportunity, daysWaiting });
      }

      return waiting.sort((a, b) => b.daysWaiting - a.daysWaiting || a.contact.id - b.contact.id);
    });
  }

  /**
   * Sends one cadence message through the email collaborator and records the
   * step only when the send succeeds
   */
  async sendFollowUp(
    contactId: number,
    step: CadenceStep,
    message: { subject: string; body: string },
    email: EmailSender
  ): Promise<Contact> {
    const contact = await this.store.withTransaction(repos => repos.contacts.findById(contactId));
    if (!contact) {
      throw new NotFoundError('Contact', contactId);
    }
    if (!contact.email) {
      throw new ValidationError(`Contact ${contactId} has no email address`);
    }
    // Out-of-order steps fail here, before anything is sent
    if (!advanceCadence(contact.cadence, step, this.today())) {
      return contact;
    }

    let sent: boolean;
    try {
      sent = await email.send(contact.email, message.subject, message.body);
    } catch (error) {
      throw new TransientIOError(`Email to contact ${contactId} failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!sent) {
      throw new TransientIOError(`Email to contact ${contactId} was not accepted`);
    }

    return this.markSent(contactId, step);
  }

  async recordResponse(contactId: number, status: string): Promise<Contact> {
    const responseStatus: ResponseStatus = parseEnum(RESPONSE_STATUSES, status, 'response status');

    return this.store.withTransaction(async (repos) => {
      const contact = await repos.contacts.findById(contactId);
      if (!contact) {
        throw new NotFoundError('Contact', contactId);
      }
      if (contact.responseStatus === responseStatus) {
        return contact;
      }

      const updated = await repos.contacts.updateResponseStatus(contactId, responseStatus);
      await this.ledger.record(repos, {
        activityType: 'Response Received',
        opportunityId: contact.opportunityId,
        contactId,
        description: `${contact.fullName}: ${contact.responseStatus} → ${responseStatus}`,
        metadata: { from: contact.responseStatus, to: responseStatus },
      });
      return updated;
    });
  }

  private today(): IsoDate {
    return toIsoDate(this.clock.now());
  }
}

function stepLabel(step: CadenceStep): string {
  switch (step) {
    case 'day0':
      return 'Day 0';
    case 'day3':
      return 'Day 3';
    case 'day7':
      return 'Day 7';
  }
}
