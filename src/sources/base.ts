/**
 * One posting as read from an external feed
 */
export interface FeedPosting {
  title: string;
  /** Canonical posting URL, used verbatim as the dedup key */
  url: string;
  description: string;
}

/**
 * Reads postings from a feed URL.
 * Network and parse failures reject; the ingester isolates them per source.
 */
export interface FeedReader {
  read(feedUrl: string): Promise<FeedPosting[]>;
}
