import { FeedPosting } from '../sources/base';
import { logger } from '../utils/logger';

/**
 * Keyword filter for feed postings
 * Case-insensitive substring match against the title; no keywords accepts everything
 */
export class KeywordFilter {
  private readonly keywords: string[];

  constructor(keywords: readonly string[]) {
    this.keywords = keywords
      .map(keyword => keyword.trim().toLowerCase())
      .filter(keyword => keyword.length > 0);
  }

  matches(posting: FeedPosting): boolean {
    if (this.keywords.length === 0) {
      return true;
    }

    const title = posting.title.toLowerCase();
    const hasKeyword = this.keywords.some(keyword => title.includes(keyword));
    if (!hasKeyword) {
      logger.debug(`Posting filtered out: no matching keywords`, { title: posting.title });
    }
    return hasKeyword;
  }

  filter(postings: FeedPosting[]): FeedPosting[] {
    return postings.filter(posting => this.matches(posting));
  }
}
