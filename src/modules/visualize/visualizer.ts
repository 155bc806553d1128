import { VisualizerError } from './errors.js';
import { loadTweetRecords } from './loader.js';
import { saveHtml } from './persister.js';
import { paginate, TWEETS_PER_PAGE } from './paginator.js';
import { renderTweetsHtml } from './renderer.js';
import type { Pagination, RawRecord } from './types.js';

export interface VisualizerOptions {
  tweetsPerPage?: number;
}

/**
 * Builds the HTML report for one user's archived tweets.
 *
 * Records are read once, when the visualizer is constructed. `jsonPath`
 * may be a path to a JSON file or the JSON text itself.
 */
export class TweetsVisualizer {
  readonly username: string;
  readonly records: readonly RawRecord[];
  readonly htmlFilePath: string | undefined;
  readonly tweetsPerPage: number;

  constructor(username: string, jsonPath: string, htmlFilePath?: string, options: VisualizerOptions = {}) {
    this.username = username;
    this.records = loadTweetRecords(jsonPath);
    this.htmlFilePath = htmlFilePath;
    this.tweetsPerPage = options.tweetsPerPage ?? TWEETS_PER_PAGE;
  }

  pagination(): Pagination {
    return paginate(this.records.length, this.tweetsPerPage);
  }

  generate(): string {
    return renderTweetsHtml(this.username, this.records, { tweetsPerPage: this.tweetsPerPage });
  }

  save(htmlContent: string): void {
    if (!this.htmlFilePath) {
      throw new VisualizerError(`No output path configured for @${this.username}'s report`);
    }
    saveHtml(this.htmlFilePath, htmlContent);
  }
}
