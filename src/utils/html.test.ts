import { describe, expect, it } from 'vitest';
import { escapeHtml, escapeScriptString } from './html.js';

describe('escapeHtml', () => {
  it('escapes markup delimiters and quotes', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
  });

  it('leaves plain URLs untouched', () => {
    expect(escapeHtml('https://twitter.com/jack/status/20')).toBe('https://twitter.com/jack/status/20');
  });
});

describe('escapeScriptString', () => {
  it('keeps a value inside a single-quoted literal', () => {
    expect(escapeScriptString("a'b\\c")).toBe("a\\'b\\\\c");
  });

  it('cannot close the surrounding script element', () => {
    expect(escapeScriptString('</script><script>alert(1)</script>')).toBe(
      '\\u003c/script\\u003e\\u003cscript\\u003ealert(1)\\u003c/script\\u003e'
    );
  });

  it('escapes line terminators', () => {
    expect(escapeScriptString('a\nb\u2028c')).toBe('a\\nb\\u2028c');
  });
});
