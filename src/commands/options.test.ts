import path from 'node:path';
import { InvalidArgumentError } from 'commander';
import { describe, expect, it } from 'vitest';
import { normalizeUsername, parsePositiveInt, resolveOutputPath } from './options.js';

describe('parsePositiveInt', () => {
  it('parses positive integers', () => {
    expect(parsePositiveInt('12')).toBe(12);
  });

  it('rejects zero, fractions and text', () => {
    expect(() => parsePositiveInt('0')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('1.5')).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt('many')).toThrow('Must be a positive integer.');
  });
});

describe('normalizeUsername', () => {
  it('drops a leading @ and surrounding whitespace', () => {
    expect(normalizeUsername(' @jack ')).toBe('jack');
    expect(normalizeUsername('jack')).toBe('jack');
  });
});

describe('resolveOutputPath', () => {
  it('names the report after the user inside the output directory', () => {
    expect(resolveOutputPath('@jack', undefined, '/tmp/reports')).toBe(path.join('/tmp/reports', 'jack_tweets.html'));
  });

  it('prefers an explicit output path', () => {
    expect(resolveOutputPath('jack', '/tmp/custom.html', '/tmp/reports')).toBe(path.resolve('/tmp/custom.html'));
  });
});
