import { escapeHtml, escapeScriptString } from '../../utils/html.js';
import { parseArchiveTimestamp } from '../../utils/timestamp.js';
import { MissingFieldError } from './errors.js';
import { paginate, TWEETS_PER_PAGE } from './paginator.js';
import type { FieldValue, PageRange, RawRecord, TweetField } from './types.js';

const STYLES = `body { font-family: monospace; background-color: whitesmoke; color: #1c1e21; margin: 0; padding: 20px; }
.container { display: flex; flex-wrap: wrap; gap: 20px; }
.tweet { flex: 0 1 calc(33.33% - 20px); background-color: #ffffff; border: 1px solid #e2e2e2; border-radius: 10px; padding: 15px; overflow-wrap: break-word; margin: auto; width: 600px; }
.tweet strong { font-weight: bold; }
.tweet a { color: #000000; text-decoration: none; }
.content { color: #000000; }
.source { font-size: 12px; text-align: center; }
.tweet a:hover { text-decoration: underline; }
h1, h3 { text-align: center; }
iframe { width: 600px; height: 600px; }
input { position: absolute; opacity: 0; z-index: -1; }
.accordion { margin: 10px; border-radius: 5px; overflow: hidden; box-shadow: 0 4px 4px -2px rgba(0, 0, 0, 0.4); }
.accordion-label { display: flex; justify-content: space-between; padding: 1em; font-weight: bold; cursor: pointer; background: #000000; color: #ffffff; }
.accordion-content { max-height: 0; padding: 0 1em; background: white; transition: all 0.35s; }
input:checked ~ .accordion-content { max-height: 100vh; padding: 1em; }
.pagination { text-align: center; margin-top: 20px; }
.pagination a { margin: 0 5px; text-decoration: none; color: #000000; padding: 1px 2px; border-radius: 5px; }
.pagination a:hover { background-color: #e2e2e2; }
.pagination a.selected { background-color: #e2e2e2; color: #000000; font-weight: bold; }
`;

// Runs in the browser viewing the report, never in this process
function paginationScript(totalPages: number): string {
  return /* html */ `<script>
// Shows the selected page and hides the others
function showPage(page) {
  for (let i = 1; i <= ${totalPages}; i++) {
    document.getElementById('page_' + i).style.display = 'none';
    document.getElementById('page_link_' + i).classList.remove('selected');
  }

  document.getElementById('page_' + page).style.display = 'block';
  document.getElementById('page_link_' + page).classList.add('selected');
}

document.addEventListener('DOMContentLoaded', () => {
  if (${totalPages} > 0) showPage(1);
  document.getElementById('loading_first_page').style.display = 'none';
});
</script>
`;
}

/** Accordion label → record field holding the iframe URL, in render order. */
const TWEET_URLS: ReadonlyArray<readonly [string, TweetField]> = [
  ['Archived Tweet', 'archived_tweet_url'],
  ['Parsed Archived Tweet', 'parsed_archived_tweet_url'],
  ['Original Tweet', 'original_tweet_url'],
  ['Parsed Tweet', 'parsed_tweet_url'],
];

export interface RenderOptions {
  tweetsPerPage?: number;
}

function field(record: RawRecord, name: TweetField, index: number): FieldValue {
  if (!Object.prototype.hasOwnProperty.call(record, name)) {
    throw new MissingFieldError(name, index);
  }
  const value = record[name];
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (value === undefined) return null;
  // Nested JSON is shown as JSON rather than "[object Object]"
  return JSON.stringify(value);
}

function text(value: FieldValue): string {
  return value === null ? '' : String(value);
}

function renderAccordion(index: number, label: string, url: string): string {
  const key = `${index}_${label.replace(/ /g, '_')}`;
  return /* html */ `<div class="accordion">
<input type="checkbox" id="tab_${key}" />
<label class="accordion-label" for="tab_${key}">Click to load the iframe from ${label}</label>
<div class="accordion-content">
<div id="loading_${key}" class="loading">Loading...</div>
<iframe id="iframe_${key}" frameborder="0" scrolling="auto" loading="lazy" style="display: none;" onload="document.getElementById('loading_${key}').style.display='none'; this.style.display='block';"></iframe>
</div>
</div>
<script>
// Loads the iframe only once its accordion is opened
document.getElementById('tab_${key}').addEventListener('change', function() {
  if (this.checked) {
    document.getElementById('loading_${key}').style.display = 'block';
    document.getElementById('iframe_${key}').src = '${escapeScriptString(url)}';
  }
});
</script>
`;
}

/**
 * Render one tweet card. `index` is the record's position in the whole
 * report, which keeps element ids unique across pages.
 */
export function renderTweetCard(record: RawRecord, index: number): string {
  const get = (name: TweetField): FieldValue => field(record, name, index);
  const esc = (name: TweetField): string => escapeHtml(text(get(name)));

  let html = '<div class="tweet">\n';

  // Both branches test the same flag: a card shows archive frames or live text, never both
  const liveText = get('available_tweet_text');
  if (!liveText) {
    for (const [label, name] of TWEET_URLS) {
      html += renderAccordion(index, label, text(get(name)));
    }
  }

  if (liveText) {
    html += '<br>\n';
    html += `<p><strong class="content">Available Tweet Content:</strong> ${escapeHtml(text(liveText))}</p>\n`;
    html += `<p><strong class="content">Available Tweet Is Retweet:</strong> ${esc('available_tweet_is_RT')}</p>\n`;
    html += `<p><strong class="content">Available Tweet Username:</strong> ${esc('available_tweet_info')}</p>\n`;
  }

  html += '<br>\n';
  for (const [label, name] of TWEET_URLS) {
    const url = esc(name);
    html += `<p><strong>${label}:</strong> <a href="${url}" target="_blank">${url}</a></p>\n`;
  }

  const rawTimestamp = text(get('archived_timestamp'));
  const readable = parseArchiveTimestamp(rawTimestamp) ?? 'unknown';

  html += `<p><strong>Archived URL Key:</strong> ${esc('archived_urlkey')}</p>\n`;
  html += `<p><strong>Archived Timestamp:</strong> ${readable} (${escapeHtml(rawTimestamp)})</p>\n`;
  html += `<p><strong>Archived mimetype:</strong> ${esc('archived_mimetype')}</p>\n`;
  html += `<p><strong>Archived Statuscode:</strong> ${esc('archived_statuscode')}</p>\n`;
  html += `<p><strong>Archived Digest:</strong> ${esc('archived_digest')}</p>\n`;
  html += `<p><strong>Archived Length:</strong> ${esc('archived_length')}</p>\n`;
  html += '</div>\n';

  return html;
}

function renderPage(records: readonly RawRecord[], range: PageRange): string {
  const cards = records
    .slice(range.start, range.end)
    .map((record, offset) => renderTweetCard(record, range.start + offset))
    .join('');
  return `<div id="page_${range.page}" style="display:none;">\n<div class="container">\n${cards}</div>\n</div>\n`;
}

/**
 * Render the whole report as one standalone HTML document: every page
 * container up front, with client-side script switching between them.
 */
export function renderTweetsHtml(
  username: string,
  records: readonly RawRecord[],
  options: RenderOptions = {}
): string {
  const { totalPages, pages } = paginate(records.length, options.tweetsPerPage ?? TWEETS_PER_PAGE);
  const title = `@${escapeHtml(username)}'s archived tweets`;

  const body = pages.map((range) => renderPage(records, range)).join('');

  const links = pages
    .map(({ page }) => `<a href="#" id="page_link_${page}" onclick="showPage(${page})">${page}</a>\n`)
    .join('');

  return /* html */ `<!DOCTYPE html>
<html lang="en">
<!-- Generated by wayback-tweets-report -->
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${title}</title>
<style>
${STYLES}</style>
</head>
<body>
<h1>${title}</h1>
<p id="loading_first_page">Building pagination with JavaScript...</p>
${body}<br>
<div class="pagination">
${links}</div>
<br><p class="source">generated by wayback-tweets-report</p>
${paginationScript(totalPages)}</body>
</html>`;
}
