/** Scalar JSON values a record field may carry. */
export type FieldValue = string | number | boolean | null;

/**
 * One parsed archived tweet, as written by the parser that consumes the
 * Wayback Machine CDX API.
 */
export interface TweetRecord {
  archived_urlkey: string;
  archived_timestamp: string;
  parsed_archived_timestamp?: string;
  archived_tweet_url: string;
  parsed_archived_tweet_url: string;
  original_tweet_url: string;
  parsed_tweet_url: string;
  available_tweet_text: string | null | false;
  available_tweet_is_RT: boolean | string | null;
  available_tweet_info: string | null;
  archived_mimetype: string;
  archived_statuscode: string | number;
  archived_digest: string;
  archived_length: string | number;
}

export type TweetField = Exclude<keyof TweetRecord, 'parsed_archived_timestamp'>;

/** A decoded JSON element whose shape has not been checked yet. */
export type RawRecord = Record<string, unknown>;

export interface PageRange {
  /** 1-based page number */
  page: number;
  start: number;
  /** exclusive */
  end: number;
}

export interface Pagination {
  totalPages: number;
  pageSize: number;
  pages: PageRange[];
}
