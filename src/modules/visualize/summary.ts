import { paginate, TWEETS_PER_PAGE } from './paginator.js';
import type { RawRecord } from './types.js';

export interface ReportSummary {
  records: number;
  pages: number;
  tweetsPerPage: number;
  /** records whose live tweet text was retrieved */
  withLiveText: number;
  /** records rendered with archive iframes instead */
  withArchiveFrames: number;
}

export function summarizeRecords(records: readonly RawRecord[], tweetsPerPage = TWEETS_PER_PAGE): ReportSummary {
  const { totalPages } = paginate(records.length, tweetsPerPage);
  const withLiveText = records.filter((r) => Boolean(r.available_tweet_text)).length;

  return {
    records: records.length,
    pages: totalPages,
    tweetsPerPage,
    withLiveText,
    withArchiveFrames: records.length - withLiveText,
  };
}
