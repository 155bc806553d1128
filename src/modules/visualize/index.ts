export { TweetsVisualizer, type VisualizerOptions } from './visualizer.js';
export { loadTweetRecords } from './loader.js';
export { paginate, TWEETS_PER_PAGE } from './paginator.js';
export { renderTweetCard, renderTweetsHtml, type RenderOptions } from './renderer.js';
export { saveHtml } from './persister.js';
export { summarizeRecords, type ReportSummary } from './summary.js';
export { MissingFieldError, RecordLoadError, VisualizerError } from './errors.js';
export type { FieldValue, PageRange, Pagination, RawRecord, TweetField, TweetRecord } from './types.js';
