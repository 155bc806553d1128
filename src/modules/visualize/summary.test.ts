import { describe, expect, it } from 'vitest';
import { summarizeRecords } from './summary.js';

describe('summarizeRecords', () => {
  it('counts pages and live-text coverage', () => {
    const records = [
      { available_tweet_text: 'hello' },
      { available_tweet_text: null },
      { available_tweet_text: '' },
      {},
    ];

    expect(summarizeRecords(records, 3)).toEqual({
      records: 4,
      pages: 2,
      tweetsPerPage: 3,
      withLiveText: 1,
      withArchiveFrames: 3,
    });
  });

  it('reports zero pages for no records', () => {
    expect(summarizeRecords([])).toEqual({
      records: 0,
      pages: 0,
      tweetsPerPage: 24,
      withLiveText: 0,
      withArchiveFrames: 0,
    });
  });
});
