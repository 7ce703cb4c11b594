import { Store } from '../db/store';
import { Contact } from '../types/contact';
import { IsoDate, OpenStage, Opportunity, STAGES, Stage, Tier, isOpenStage } from '../types/opportunity';
import { addDays, daysBetween, toIsoDate } from '../utils/dates';

export interface QueueItem {
  opportunity: Opportunity;
  contact: Contact | null;
}

export interface StageSummary {
  stage: OpenStage;
  count: number;
  avgFit: number | null;
  oldest: IsoDate;
}

const WARM_STAGES: readonly Stage[] = ['Warm Lead', 'Applied'];

function byTierThenDate(a: Opportunity, b: Opportunity): number {
  const tierOrder = (tier: Tier | null) => tier ?? Number.MAX_SAFE_INTEGER;
  const tierDiff = tierOrder(a.tier) - tierOrder(b.tier);
  if (tierDiff !== 0) return tierDiff;
  const aDate = a.nextActionDate ?? '9999-12-31';
  const bDate = b.nextActionDate ?? '9999-12-31';
  return aDate < bDate ? -1 : aDate > bDate ? 1 : a.id - b.id;
}

/**
 * Read-only pipeline views used by the daily reports
 */
export class PipelineQueries {
  constructor(private store: Store) {}

  /**
   * Open opportunities needing attention today: next action due, or a
   * contact first reached exactly 3 or 7 days ago
   */
  async todayQueue(today: IsoDate): Promise<QueueItem[]> {
    const followUpDays = new Set([addDays(today, -3), addDays(today, -7)]);

    return this.store.withTransaction(async (repos) => {
      const opportunities = (await repos.opportunities.listOpen()).sort(byTierThenDate);
      const items: QueueItem[] = [];

      for (const opportunity of opportunities) {
        const contacts = await repos.contacts.list({ opportunityId: opportunity.id });
        const actionDue = opportunity.nextActionDate !== null && opportunity.nextActionDate <= today;
        const rows: Array<Contact | null> = contacts.length > 0 ? contacts : [null];

        for (const contact of rows) {
          const cadenceDue = contact !== null &&
            contact.cadence.lastStep !== null &&
            followUpDays.has(contact.cadence.day0);
          if (actionDue || cadenceDue) {
            items.push({ opportunity, contact });
          }
        }
      }

      return items;
    });
  }

  async warmLeads(): Promise<QueueItem[]> {
    return this.store.withTransaction(async (repos) => {
      const opportunities = await repos.opportunities.listOpen();
      const items: QueueItem[] = [];
      for (const opportunity of opportunities) {
        if (!WARM_STAGES.includes(opportunity.stage)) continue;
        const contacts = await repos.contacts.list({ opportunityId: opportunity.id });
        if (contacts.length === 0) {
          items.push({ opportunity, contact: null });
        }
        for (const contact of contacts) {
          items.push({ opportunity, contact });
        }
      }
      return items;
    });
  }

  /**
   * Count, average fit score and oldest add date per open stage, in funnel order
   */
  async pipelineSummary(): Promise<StageSummary[]> {
    const opportunities = await this.store.withTransaction(repos => repos.opportunities.listOpen());
    const summaries: StageSummary[] = [];

    for (const stage of STAGES) {
      if (!isOpenStage(stage)) continue;
      const inStage = opportunities.filter(opportunity => opportunity.stage === stage);
      if (inStage.length === 0) continue;

      const scores = inStage
        .map(opportunity => opportunity.fitScore)
        .filter((score): score is number => score !== null);
      summaries.push({
        stage,
        count: inStage.length,
        avgFit: scores.length > 0 ? scores.reduce((sum, score) => sum + score, 0) / scores.length : null,
        oldest: inStage.map(opportunity => opportunity.dateAdded).sort()[0],
      });
    }

    return summaries;
  }

  /**
   * Open opportunities whose row has not changed for at least `days` days
   */
  async staleOpportunities(today: IsoDate, days: number): Promise<Opportunity[]> {
    const opportunities = await this.store.withTransaction(repos => repos.opportunities.listOpen());
    return opportunities
      .filter(opportunity => daysBetween(toIsoDate(opportunity.updatedAt), today) >= days)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime());
  }
}
