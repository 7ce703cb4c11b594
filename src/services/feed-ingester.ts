import { Store } from '../db/store';
import { KeywordFilter } from '../filters/keyword-filter';
import { FeedPosting, FeedReader } from '../sources/base';
import { splitTitleAndCompany, stripHtml } from '../sources/title';
import { FEED_SOURCE, IsoDate } from '../types/opportunity';
import { Clock, systemClock, toIsoDate } from '../utils/dates';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { Ledger } from './ledger';
import { nextActionFor } from './next-action-policy';

export interface PollError {
  source: string;
  error: string;
}

export interface PollResult {
  created: number;
  /** Postings dropped by the keyword filter or already ingested */
  skipped: number;
  errors: PollError[];
  /** "Company — Role" for every posting created */
  added: string[];
}

const log = logger.child('feed-ingester');

/**
 * Turns feed postings into Prospect opportunities, once per posting URL.
 * No AI calls happen here.
 */
export class FeedIngester {
  constructor(
    private store: Store,
    private ledger: Ledger,
    private reader: FeedReader,
    private clock: Clock = systemClock
  ) {}

  /**
   * Polls each source in order. Failures are collected per source and never thrown.
   */
  async poll(feedUrls: readonly string[], keywords: readonly string[] = []): Promise<PollResult> {
    const filter = new KeywordFilter(keywords);
    const result: PollResult = { created: 0, skipped: 0, errors: [], added: [] };

    for (const source of feedUrls) {
      if (!source.trim()) continue;

      let postings: FeedPosting[];
      try {
        postings = await this.reader.read(source);
      } catch (error) {
        log.error(`Feed ${source} failed`, error);
        result.errors.push({ source, error: errorMessage(error) });
        continue;
      }

      const matching = filter.filter(postings);
      result.skipped += postings.length - matching.length;

      for (const posting of matching) {
        try {
          const label = await this.ingest(posting, source);
          if (label === null) {
            result.skipped++;
          } else {
            result.created++;
            result.added.push(label);
          }
        } catch (error) {
          log.error(`Could not create opportunity for ${posting.url}`, error, { source });
          result.errors.push({ source, error: `${posting.url}: ${errorMessage(error)}` });
        }
      }
    }

    log.info('Feed poll complete', {
      sources: feedUrls.length,
      created: result.created,
      skipped: result.skipped,
      errors: result.errors.length,
    });
    return result;
  }

  /**
   * Creates the opportunity unless one with the same posting URL exists.
   * Returns null for duplicates.
   */
  private async ingest(posting: FeedPosting, source: string): Promise<string | null> {
    const today: IsoDate = toIsoDate(this.clock.now());
    const { roleTitle, company } = splitTitleAndCompany(posting.title);
    const { nextAction, nextActionDate } = nextActionFor('Prospect', today);

    return this.store.withTransaction(async (repos) => {
      await repos.opportunities.lockPostingUrl(posting.url);
      if (await repos.opportunities.findByPostingUrl(posting.url)) {
        log.debug('Posting already ingested', { url: posting.url });
        return null;
      }

      const opportunity = await repos.opportunities.create({
        company: company ?? 'Unknown',
        roleTitle: roleTitle || posting.url,
        stage: 'Prospect',
        source: FEED_SOURCE,
        dateAdded: today,
        jdUrl: posting.url,
        jdRaw: stripHtml(posting.description) || posting.title,
        jdKeywords: JSON.stringify([]),
        nextAction,
        nextActionDate,
      });

      await this.ledger.record(repos, {
        activityType: 'Note Added',
        opportunityId: opportunity.id,
        description: `Auto-added from job feed: ${posting.title}`,
        metadata: { feed: source, url: posting.url },
      });

      return `${opportunity.company} — ${opportunity.roleTitle}`;
    });
  }
}
