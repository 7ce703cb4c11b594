import fetch from 'node-fetch';
import Parser from 'rss-parser';
import { TransientIOError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { FeedPosting, FeedReader } from './base';

export interface FetchResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchFn = (
  url: string,
  init: { headers: Record<string, string>; timeout: number }
) => Promise<FetchResponse>;

export interface RssFeedReaderOptions {
  timeoutMs: number;
  maxItems: number;
  fetch?: FetchFn;
}

type FeedItem = {
  description?: string;
};

const USER_AGENT = 'job-pipeline/1.0 (personal job search tracker)';

const log = logger.child('rss');

/**
 * RSS 2.0 / Atom reader
 * Fetches with a bounded timeout and parses with rss-parser
 */
export class RssFeedReader implements FeedReader {
  private readonly parser: Parser<Record<string, unknown>, FeedItem>;
  private readonly fetch: FetchFn;

  constructor(private options: RssFeedReaderOptions) {
    this.parser = new Parser<Record<string, unknown>, FeedItem>({
      customFields: {
        item: ['description'],
      },
    });
    this.fetch = options.fetch ?? fetch;
  }

  async read(feedUrl: string): Promise<FeedPosting[]> {
    const xml = await this.download(feedUrl);
    const feed = await this.parser.parseString(xml);

    const postings: FeedPosting[] = [];
    let skippedInvalid = 0;

    for (const item of feed.items) {
      const url = item.link?.trim();
      if (!url) {
        skippedInvalid++;
        continue;
      }
      postings.push({
        title: item.title?.trim() ?? '',
        url,
        description: item.contentSnippet ?? item.summary ?? item.description ?? '',
      });
      if (postings.length >= this.options.maxItems) {
        break;
      }
    }

    log.info(`Read ${postings.length} postings`, {
      feedUrl,
      totalItems: feed.items.length,
      skippedInvalid,
    });
    return postings;
  }

  private async download(feedUrl: string): Promise<string> {
    let response: FetchResponse;
    try {
      response = await this.fetch(feedUrl, {
        headers: { 'User-Agent': USER_AGENT },
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      throw new TransientIOError(`Fetching ${feedUrl} failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new TransientIOError(`Fetching ${feedUrl} returned HTTP ${response.status}`);
    }
    return response.text();
  }
}
