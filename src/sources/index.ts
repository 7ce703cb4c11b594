import { Config } from '../config';
import { FeedReader } from './base';
import { RssFeedReader } from './rss';

/**
 * Factory for the feed reader used by scheduled polls
 */
export function createFeedReader(config: Config): FeedReader {
  return new RssFeedReader({
    timeoutMs: config.feeds.timeoutMs,
    maxItems: config.feeds.maxItemsPerFeed,
  });
}
