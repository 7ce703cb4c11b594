import 'dotenv/config';
import { loadConfig } from './config';
import { closePool, getPool } from './db/client';
import { PgStore } from './db/pg-store';
import { createDailyJobs } from './services/daily-jobs';
import { DigestService } from './services/digest';
import { PlainDigestWriter } from './services/digest-writer';
import { FeedIngester } from './services/feed-ingester';
import { FollowUpTracker } from './services/follow-up-tracker';
import { Ledger } from './services/ledger';
import { createNotifier } from './services/notifier';
import { PipelineQueries } from './services/pipeline-queries';
import { Scheduler } from './services/scheduler';
import { StaleCheck } from './services/stale-check';
import { createFeedReader } from './sources';
import { logger } from './utils/logger';

/**
 * Background process: runs the daily job sequence until SIGINT/SIGTERM
 */
async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('Configuration loaded', {
    feedUrls: config.feeds.urls.length,
    keywords: config.feeds.keywords,
    telegram: config.telegram !== null,
  });

  const store = new PgStore(getPool({ databaseUrl: config.databaseUrl, ssl: config.databaseSsl }));
  const ledger = new Ledger(store);
  const tracker = new FollowUpTracker(store, ledger);
  const queries = new PipelineQueries(store);
  const notifier = createNotifier(config);

  const jobs = createDailyJobs({
    staleCheck: new StaleCheck(tracker, queries, notifier, {
      waitingOnDays: config.digest.waitingOnDays,
      staleOpportunityDays: config.digest.staleOpportunityDays,
    }),
    digest: new DigestService(queries, tracker, ledger, new PlainDigestWriter(), notifier, {
      aiTimeoutMs: config.digest.aiTimeoutMs,
    }),
    ingester: new FeedIngester(store, ledger, createFeedReader(config)),
    feeds: config.feeds,
  });

  const scheduler = new Scheduler(store, jobs, config.scheduler);
  scheduler.start();

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    await scheduler.stop();
    await closePool();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Startup failed', error);
  process.exit(1);
});
