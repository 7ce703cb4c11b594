import { JOB_FAMILY_LABELS } from '../types/opportunity';
import { AiCollaborator, DigestContext } from './collaborators';

/**
 * Plain-text digest used when no AI collaborator is wired in
 */
export class PlainDigestWriter implements AiCollaborator {
  async summarize(context: DigestContext): Promise<string> {
    const lines: string[] = [];

    lines.push(`Today's queue (${context.todayQueue.length})`);
    for (const { opportunity, contact } of context.todayQueue) {
      const family = opportunity.jobFamily ? ` [${JOB_FAMILY_LABELS[opportunity.jobFamily]}]` : '';
      const action = opportunity.nextAction ? `: ${opportunity.nextAction}` : '';
      const who = contact ? ` (${contact.fullName})` : '';
      lines.push(`- ${opportunity.company} — ${opportunity.roleTitle}${family}${who}${action}`);
    }

    lines.push('', `Follow-ups due (${context.followUps.length})`);
    for (const { contact, step, daysSinceFirstOutreach } of context.followUps) {
      lines.push(`- ${contact.fullName}: ${step} (${daysSinceFirstOutreach} days since first outreach)`);
    }

    lines.push('', 'Pipeline');
    for (const summary of context.pipeline) {
      const fit = summary.avgFit === null ? '' : `, avg fit ${summary.avgFit.toFixed(1)}`;
      lines.push(`- ${summary.stage}: ${summary.count}${fit}, oldest ${summary.oldest}`);
    }

    return lines.join('\n');
  }
}
