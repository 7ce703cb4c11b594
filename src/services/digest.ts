import { Clock, systemClock, toIsoDate } from '../utils/dates';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { AiCollaborator, DigestContext } from './collaborators';
import { FollowUpTracker } from './follow-up-tracker';
import { Ledger } from './ledger';
import { Notifier } from './notifier';
import { PipelineQueries } from './pipeline-queries';

export const EMPTY_PIPELINE_MESSAGE = 'No active opportunities in pipeline.';

export interface DigestResult {
  text: string;
  generated: boolean;
}

const log = logger.child('digest');

/**
 * Daily digest: gathers the queues and hands them to the AI collaborator for text
 */
export class DigestService {
  constructor(
    private queries: PipelineQueries,
    private tracker: FollowUpTracker,
    private ledger: Ledger,
    private ai: AiCollaborator,
    private notifier: Notifier,
    private options: { aiTimeoutMs: number },
    private clock: Clock = systemClock
  ) {}

  async buildContext(): Promise<DigestContext> {
    const date = toIsoDate(this.clock.now());
    return {
      date,
      todayQueue: await this.queries.todayQueue(date),
      followUps: await this.tracker.dueFollowUps(),
      pipeline: await this.queries.pipelineSummary(),
    };
  }

  async run(): Promise<DigestResult> {
    const context = await this.buildContext();

    if (context.todayQueue.length === 0 && context.followUps.length === 0 && context.pipeline.length === 0) {
      log.info(EMPTY_PIPELINE_MESSAGE);
      return { text: EMPTY_PIPELINE_MESSAGE, generated: false };
    }

    const text = await withTimeout(this.ai.summarize(context), this.options.aiTimeoutMs, 'Digest summarize');

    await this.ledger.append({
      activityType: 'AI Action',
      description: `Daily digest generated for ${context.date}`,
      metadata: {
        digest: text,
        todayQueue: context.todayQueue.length,
        followUps: context.followUps.length,
        openStages: context.pipeline.length,
      },
    });
    await this.notifier.notify(`Job search digest — ${context.date}`, text);

    log.info('Digest generated', { date: context.date, length: text.length });
    return { text, generated: true };
  }
}
