import type { IsoDate } from '../types/opportunity';
import type { DueFollowUp } from './follow-up-tracker';
import type { QueueItem, StageSummary } from './pipeline-queries';

/**
 * Everything the digest writer gets to see
 */
export interface DigestContext {
  date: IsoDate;
  todayQueue: QueueItem[];
  followUps: DueFollowUp[];
  pipeline: StageSummary[];
}

/**
 * Text generation collaborator; output is stored and shown as-is
 */
export interface AiCollaborator {
  summarize(context: DigestContext): Promise<string>;
}

/**
 * Outbound email; resolves false when the message was not accepted
 */
export interface EmailSender {
  send(to: string, subject: string, body: string): Promise<boolean>;
}
