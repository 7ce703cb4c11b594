import { Config } from '../config';
import { logger } from '../utils/logger';
import { DigestService } from './digest';
import { FeedIngester, PollResult } from './feed-ingester';
import { ScheduledJob } from './scheduler';
import { StaleCheck } from './stale-check';

const log = logger.child('feed-poll');

/**
 * The daily sequence, in run order: stale check, digest, feed poll
 */
export function createDailyJobs(deps: {
  staleCheck: StaleCheck;
  digest: DigestService;
  ingester: FeedIngester;
  feeds: Pick<Config['feeds'], 'urls' | 'keywords'>;
}): ScheduledJob[] {
  return [
    {
      name: 'stale-check',
      run: () => deps.staleCheck.run(),
    },
    {
      name: 'digest',
      run: () => deps.digest.run(),
    },
    {
      name: 'feed-poll',
      run: async (): Promise<PollResult | null> => {
        if (deps.feeds.urls.length === 0) {
          log.info('No feed URLs configured, skipping poll');
          return null;
        }
        const result = await deps.ingester.poll(deps.feeds.urls, deps.feeds.keywords);
        if (result.errors.length > 0) {
          log.warn(`Feed poll finished with ${result.errors.length} error(s)`, { errors: result.errors });
        }
        for (const title of result.added) {
          log.info(`+ ${title}`);
        }
        return result;
      },
    },
  ];
}
