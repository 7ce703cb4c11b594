import { beforeEach, describe, expect, it, vi } from 'vitest';
import { at, FakeClock } from '../test-utils/clock';
import { MemoryStore } from '../test-utils/memory-store';
import { NewContact, OutreachCadence, ResponseStatus } from '../types/contact';
import { ConsistencyViolation, NotFoundError, TransientIOError, ValidationError } from '../utils/errors';
import { EmailSender } from './collaborators';
import { FollowUpTracker } from './follow-up-tracker';
import { Ledger } from './ledger';

describe('FollowUpTracker', () => {
  let clock: FakeClock;
  let store: MemoryStore;
  let tracker: FollowUpTracker;

  beforeEach(() => {
    clock = new FakeClock(at(2026, 3, 10));
    store = new MemoryStore(clock);
    tracker = new FollowUpTracker(store, new Ledger(store), clock);
  });

  async function seedContact(
    cadence: OutreachCadence,
    responseStatus: ResponseStatus = 'Pending',
    extra: Partial<NewContact> = {}
  ): Promise<number> {
    return store.withTransaction(async (repos) => {
      const opportunity = await repos.opportunities.create({
        company: 'Acme',
        roleTitle: 'Data Manager',
        stage: 'Warm Lead',
        dateAdded: '2026-03-01',
      });
      const contact = await repos.contacts.create({
        fullName: 'Dana Reyes',
        opportunityId: opportunity.id,
        email: 'dana@example.com',
        cadence,
        responseStatus,
        ...extra,
      });
      return contact.id;
    });
  }

  describe('dueFollowUps', () => {
    it('reports day3 once three days have passed since first outreach', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-06' });

      const due = await tracker.dueFollowUps();

      expect(due).toHaveLength(1);
      expect(due[0].contact.id).toBe(id);
      expect(due[0].step).toBe('day3');
      expect(due[0].daysSinceFirstOutreach).toBe(4);
    });

    it('leaves out contacts who already responded', async () => {
      await seedContact({ lastStep: 'day0', day0: '2026-03-06' }, 'Responded');
      await seedContact({ lastStep: 'day0', day0: '2026-03-06' }, 'Meeting Scheduled');

      expect(await tracker.dueFollowUps()).toEqual([]);
    });

    it('still chases contacts marked No Response', async () => {
      await seedContact({ lastStep: 'day0', day0: '2026-03-07' }, 'No Response');

      const due = await tracker.dueFollowUps();
      expect(due.map(item => item.step)).toEqual(['day3']);
    });

    it('does not report a contact first reached two days ago', async () => {
      await seedContact({ lastStep: 'day0', day0: '2026-03-08' });

      expect(await tracker.dueFollowUps()).toEqual([]);
    });

    it('proposes day3 rather than day7 when day3 was never sent', async () => {
      await seedContact({ lastStep: 'day0', day0: '2026-03-01' });

      const due = await tracker.dueFollowUps();
      expect(due.map(item => item.step)).toEqual(['day3']);
    });

    it('reports day7 seven days after first outreach, not after day3', async () => {
      await seedContact({ lastStep: 'day3', day0: '2026-03-03', day3: '2026-03-08' });
      await seedContact({ lastStep: 'day3', day0: '2026-03-04', day3: '2026-03-07' });

      const due = await tracker.dueFollowUps();
      expect(due.map(item => [item.contact.id, item.step])).toEqual([[1, 'day7']]);
    });

    it('has nothing left once day7 is sent', async () => {
      await seedContact({ lastStep: 'day7', day0: '2026-02-20', day3: '2026-02-23', day7: '2026-02-27' });

      expect(await tracker.dueFollowUps()).toEqual([]);
    });
  });

  describe('markSent', () => {
    it('records the step with today and logs a follow-up entry', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-06' });

      const updated = await tracker.markSent(id, 'day3');

      expect(updated.cadence).toEqual({ lastStep: 'day3', day0: '2026-03-06', day3: '2026-03-10' });
      const entries = store.snapshot.activity;
      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        activityType: 'Follow-Up Sent',
        contactId: id,
        opportunityId: 1,
        description: 'Day 3 follow-up sent to Dana Reyes',
      });
    });

    it('logs the first outreach as Outreach Sent', async () => {
      const id = await seedContact({ lastStep: null });

      const updated = await tracker.markSent(id, 'day0');

      expect(updated.cadence).toEqual({ lastStep: 'day0', day0: '2026-03-10' });
      expect(store.snapshot.activity[0].activityType).toBe('Outreach Sent');
    });

    it('is a no-op when called again for the same step', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-06' });

      const first = await tracker.markSent(id, 'day3');
      const second = await tracker.markSent(id, 'day3');

      expect(second.cadence).toEqual(first.cadence);
      expect(store.snapshot.activity).toHaveLength(1);
    });

    it('refuses day7 when first outreach was never sent', async () => {
      const id = await seedContact({ lastStep: null });

      await expect(tracker.markSent(id, 'day7')).rejects.toThrow(ConsistencyViolation);

      expect(store.snapshot.contacts[0].cadence).toEqual({ lastStep: null });
      expect(store.snapshot.activity).toHaveLength(0);
    });

    it('refuses day7 before day3', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-01' });

      await expect(tracker.markSent(id, 'day7')).rejects.toThrow(ConsistencyViolation);
    });

    it('rejects unknown contacts', async () => {
      await expect(tracker.markSent(42, 'day0')).rejects.toThrow(NotFoundError);
    });
  });

  describe('staleWaitingOn', () => {
    it('lists pending contacts first reached at least two days ago', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-07' });

      const waiting = await tracker.staleWaitingOn();

      expect(waiting).toHaveLength(1);
      expect(waiting[0].contact.id).toBe(id);
      expect(waiting[0].daysWaiting).toBe(3);
      expect(waiting[0].opportunity?.company).toBe('Acme');
    });

    it('skips contacts reached yesterday and contacts that replied', async () => {
      await seedContact({ lastStep: 'day0', day0: '2026-03-09' });
      await seedContact({ lastStep: 'day0', day0: '2026-03-01' }, 'Responded');
      await seedContact({ lastStep: null });

      expect(await tracker.staleWaitingOn()).toEqual([]);
    });

    it('does not write anything', async () => {
      await seedContact({ lastStep: 'day0', day0: '2026-03-01' });
      const before = store.snapshot;

      await tracker.staleWaitingOn();

      expect(store.snapshot).toEqual(before);
    });
  });

  describe('sendFollowUp', () => {
    const message = { subject: 'Following up', body: 'Hi Dana' };

    it('marks the step sent after the email is accepted', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-06' });
      const email: EmailSender = { send: vi.fn().mockResolvedValue(true) };

      const updated = await tracker.sendFollowUp(id, 'day3', message, email);

      expect(email.send).toHaveBeenCalledWith('dana@example.com', 'Following up', 'Hi Dana');
      expect(updated.cadence.lastStep).toBe('day3');
    });

    it('records nothing when the email is not accepted', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-06' });
      const email: EmailSender = { send: vi.fn().mockResolvedValue(false) };

      await expect(tracker.sendFollowUp(id, 'day3', message, email)).rejects.toThrow(TransientIOError);

      expect(store.snapshot.contacts[0].cadence).toEqual({ lastStep: 'day0', day0: '2026-03-06' });
      expect(store.snapshot.activity).toHaveLength(0);
    });

    it('wraps transport errors as transient', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-06' });
      const email: EmailSender = { send: vi.fn().mockRejectedValue(new Error('connection refused')) };

      await expect(tracker.sendFollowUp(id, 'day3', message, email)).rejects.toThrow(
        'Email to contact 1 failed: connection refused'
      );
    });

    it('does not send an out-of-order step', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-01' });
      const email: EmailSender = { send: vi.fn().mockResolvedValue(true) };

      await expect(tracker.sendFollowUp(id, 'day7', message, email)).rejects.toThrow(ConsistencyViolation);
      expect(email.send).not.toHaveBeenCalled();
    });

    it('requires an email address', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-06' }, 'Pending', { email: null });
      const email: EmailSender = { send: vi.fn().mockResolvedValue(true) };

      await expect(tracker.sendFollowUp(id, 'day3', message, email)).rejects.toThrow(ValidationError);
    });
  });

  describe('recordResponse', () => {
    it('updates the status and logs the response', async () => {
      const id = await seedContact({ lastStep: 'day0', day0: '2026-03-06' });

      const updated = await tracker.recordResponse(id, 'Responded');

      expect(updated.responseStatus).toBe('Responded');
      expect(store.snapshot.activity[0]).toMatchObject({
        activityType: 'Response Received',
        description: 'Dana Reyes: Pending → Responded',
      });
      expect(await tracker.dueFollowUps()).toEqual([]);
    });

    it('rejects unknown statuses', async () => {
      const id = await seedContact({ lastStep: null });

      await expect(tracker.recordResponse(id, 'Maybe')).rejects.toThrow(ValidationError);
    });
  });
});
