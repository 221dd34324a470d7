/**
 * Ingestion collaborator contract
 * Fetching and parsing (HTML, RSS, transcripts) live outside this package;
 * implementations hand back normalized records and let failures propagate.
 */

export interface IngestedRecord {
  title: string;
  content: string;
  url: string;
  wordCount?: number;
  publishedAt?: Date;
  author?: string;
  videoId?: string;
}

export interface IngestionClient {
  /**
   * Fetch a web page and extract its title and main text
   */
  fetchUrl(url: string): Promise<IngestedRecord>;

  /**
   * Parse a feed and return up to maxEntries entries
   */
  fetchFeed(feedUrl: string, maxEntries: number): Promise<IngestedRecord[]>;

  /**
   * Fetch a video transcript and title
   */
  fetchTranscript(videoId: string): Promise<IngestedRecord>;
}
