import { beforeEach, describe, expect, it } from 'vitest';
import { at, FakeClock } from '../test-utils/clock';
import { MemoryStore } from '../test-utils/memory-store';
import { NewOpportunity } from '../types/opportunity';
import { PipelineQueries } from './pipeline-queries';

describe('PipelineQueries', () => {
  let clock: FakeClock;
  let store: MemoryStore;
  let queries: PipelineQueries;

  beforeEach(() => {
    clock = new FakeClock(at(2026, 3, 10));
    store = new MemoryStore(clock);
    queries = new PipelineQueries(store);
  });

  function seed(input: NewOpportunity, contacts: Array<{ name: string; day0?: string }> = []): Promise<number> {
    return store.withTransaction(async (repos) => {
      const opportunity = await repos.opportunities.create(input);
      for (const contact of contacts) {
        await repos.contacts.create({
          fullName: contact.name,
          opportunityId: opportunity.id,
          cadence: contact.day0 ? { lastStep: 'day0', day0: contact.day0 } : { lastStep: null },
        });
      }
      return opportunity.id;
    });
  }

  describe('todayQueue', () => {
    it('orders by tier, untiered last, then next action date', async () => {
      await seed({ company: 'Untiered', roleTitle: 'R', stage: 'Prospect', dateAdded: '2026-03-01', nextActionDate: '2026-03-01' });
      await seed({ company: 'Tier2', roleTitle: 'R', stage: 'Prospect', dateAdded: '2026-03-01', tier: 2, nextActionDate: '2026-03-05' });
      await seed({ company: 'Tier1Late', roleTitle: 'R', stage: 'Prospect', dateAdded: '2026-03-01', tier: 1, nextActionDate: '2026-03-10' });
      await seed({ company: 'Tier1Early', roleTitle: 'R', stage: 'Prospect', dateAdded: '2026-03-01', tier: 1, nextActionDate: '2026-03-02' });

      const queue = await queries.todayQueue('2026-03-10');

      expect(queue.map(item => item.opportunity.company)).toEqual(['Tier1Early', 'Tier1Late', 'Tier2', 'Untiered']);
    });

    it('leaves out actions due later', async () => {
      await seed({ company: 'Later', roleTitle: 'R', stage: 'Applied', dateAdded: '2026-03-01', nextActionDate: '2026-03-11' });
      await seed({ company: 'None', roleTitle: 'R', stage: 'Applied', dateAdded: '2026-03-01' });

      expect(await queries.todayQueue('2026-03-10')).toEqual([]);
    });

    it('includes contacts first reached exactly three or seven days ago', async () => {
      await seed(
        { company: 'Acme', roleTitle: 'R', stage: 'Warm Lead', dateAdded: '2026-03-01', nextActionDate: '2026-03-20' },
        [
          { name: 'Three', day0: '2026-03-07' },
          { name: 'Seven', day0: '2026-03-03' },
          { name: 'Four', day0: '2026-03-06' },
          { name: 'Never' },
        ]
      );

      const queue = await queries.todayQueue('2026-03-10');

      expect(queue.map(item => item.contact?.fullName)).toEqual(['Three', 'Seven']);
    });

    it('lists one row per contact when the action is due', async () => {
      await seed(
        { company: 'Acme', roleTitle: 'R', stage: 'Warm Lead', dateAdded: '2026-03-01', nextActionDate: '2026-03-10' },
        [{ name: 'Dana' }, { name: 'Sam' }]
      );

      const queue = await queries.todayQueue('2026-03-10');

      expect(queue.map(item => item.contact?.fullName)).toEqual(['Dana', 'Sam']);
    });
  });

  it('lists warm leads and applied opportunities with their contacts', async () => {
    await seed({ company: 'Cold', roleTitle: 'R', stage: 'Prospect', dateAdded: '2026-03-01' });
    await seed({ company: 'Warm', roleTitle: 'R', stage: 'Warm Lead', dateAdded: '2026-03-01' }, [{ name: 'Dana' }]);
    await seed({ company: 'Applied', roleTitle: 'R', stage: 'Applied', dateAdded: '2026-03-01' });

    const leads = await queries.warmLeads();

    expect(leads.map(item => [item.opportunity.company, item.contact?.fullName ?? null])).toEqual([
      ['Warm', 'Dana'],
      ['Applied', null],
    ]);
  });

  it('summarizes open stages in funnel order', async () => {
    await seed({ company: 'A', roleTitle: 'R', stage: 'Loop', dateAdded: '2026-02-10', fitScore: 9 });
    await seed({ company: 'B', roleTitle: 'R', stage: 'Prospect', dateAdded: '2026-03-05', fitScore: 6 });
    await seed({ company: 'C', roleTitle: 'R', stage: 'Prospect', dateAdded: '2026-03-02', fitScore: 7 });
    await seed({ company: 'D', roleTitle: 'R', stage: 'Prospect', dateAdded: '2026-03-08' });
    await seed({ company: 'E', roleTitle: 'R', stage: 'Applied', dateAdded: '2026-03-01' });

    expect(await queries.pipelineSummary()).toEqual([
      { stage: 'Prospect', count: 3, avgFit: 6.5, oldest: '2026-03-02' },
      { stage: 'Applied', count: 1, avgFit: null, oldest: '2026-03-01' },
      { stage: 'Loop', count: 1, avgFit: 9, oldest: '2026-02-10' },
    ]);
  });

  it('finds opportunities untouched for the given number of days', async () => {
    clock.set(at(2026, 3, 1));
    await seed({ company: 'Old', roleTitle: 'R', stage: 'Applied', dateAdded: '2026-03-01' });
    clock.set(at(2026, 3, 5));
    await seed({ company: 'Recent', roleTitle: 'R', stage: 'Applied', dateAdded: '2026-03-05' });

    const stale = await queries.staleOpportunities('2026-03-08', 7);

    expect(stale.map(item => item.company)).toEqual(['Old']);
  });
});
