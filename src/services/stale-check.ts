import { Opportunity } from '../types/opportunity';
import { Clock, systemClock, toIsoDate } from '../utils/dates';
import { logger } from '../utils/logger';
import { FollowUpTracker, WaitingOn } from './follow-up-tracker';
import { Notifier } from './notifier';
import { PipelineQueries } from './pipeline-queries';

export interface StaleReport {
  waitingOn: WaitingOn[];
  staleOpportunities: Opportunity[];
}

const log = logger.child('stale-check');

/**
 * Read-only daily check for contacts and opportunities that have gone quiet
 */
export class StaleCheck {
  constructor(
    private tracker: FollowUpTracker,
    private queries: PipelineQueries,
    private notifier: Notifier,
    private options: { waitingOnDays: number; staleOpportunityDays: number },
    private clock: Clock = systemClock
  ) {}

  async run(): Promise<StaleReport> {
    const today = toIsoDate(this.clock.now());
    const report: StaleReport = {
      waitingOn: await this.tracker.staleWaitingOn(this.options.waitingOnDays),
      staleOpportunities: await this.queries.staleOpportunities(today, this.options.staleOpportunityDays),
    };

    if (report.waitingOn.length === 0 && report.staleOpportunities.length === 0) {
      log.info('Stale check: nothing stale');
      return report;
    }

    log.warn('Stale records found', {
      waitingOn: report.waitingOn.length,
      staleOpportunities: report.staleOpportunities.length,
    });
    await this.notifier.notify(`Stale check — ${today}`, formatStaleReport(report, this.options.staleOpportunityDays));
    return report;
  }
}

export function formatStaleReport(report: StaleReport, staleDays: number): string {
  const lines: string[] = [];

  if (report.waitingOn.length > 0) {
    lines.push(`Waiting on (${report.waitingOn.length})`);
    for (const { contact, opportunity, daysWaiting } of report.waitingOn) {
      const where = opportunity ? ` at ${opportunity.company} (${opportunity.roleTitle})` : '';
      lines.push(`- ${contact.fullName}${where}: ${daysWaiting} days without reply`);
    }
  }

  if (report.staleOpportunities.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(`No update in ${staleDays}+ days (${report.staleOpportunities.length})`);
    for (const opportunity of report.staleOpportunities) {
      lines.push(`- ${opportunity.company} — ${opportunity.roleTitle} (stage: ${opportunity.stage})`);
    }
  }

  return lines.join('\n');
}
