import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig } from './config.js';

describe('loadConfig', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'tweets-config-'));
    vi.stubEnv('LOG_LEVEL', '');
    vi.stubEnv('OUTPUT_DIR', '');
    vi.stubEnv('TWEETS_PER_PAGE', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('falls back to defaults', () => {
    expect(loadConfig({ projectRoot: root })).toEqual({
      projectRoot: root,
      outputDir: path.join(root, 'output'),
      tweetsPerPage: 24,
      logLevel: 'info',
    });
  });

  it('reads the rc file', () => {
    fs.writeFileSync(
      path.join(root, '.waybackrc.json'),
      JSON.stringify({ OUTPUT_DIR: 'reports', TWEETS_PER_PAGE: 12, LOG_LEVEL: 'debug' })
    );

    const config = loadConfig({ projectRoot: root });
    expect(config.outputDir).toBe(path.join(root, 'reports'));
    expect(config.tweetsPerPage).toBe(12);
    expect(config.logLevel).toBe('debug');
  });

  it('lets environment variables win over the rc file', () => {
    fs.writeFileSync(path.join(root, '.waybackrc.json'), JSON.stringify({ TWEETS_PER_PAGE: 12 }));
    vi.stubEnv('TWEETS_PER_PAGE', '6');

    expect(loadConfig({ projectRoot: root }).tweetsPerPage).toBe(6);
  });

  it('loads variables from a .env file', () => {
    fs.writeFileSync(path.join(root, '.env'), '# report settings\nOUTPUT_DIR=/tmp/tweet-reports\n');

    expect(loadConfig({ projectRoot: root }).outputDir).toBe('/tmp/tweet-reports');
  });

  it('ignores page sizes that are not positive integers', () => {
    vi.stubEnv('TWEETS_PER_PAGE', '-3');
    expect(loadConfig({ projectRoot: root }).tweetsPerPage).toBe(24);
  });

  it('applies explicit overrides last', () => {
    vi.stubEnv('TWEETS_PER_PAGE', '6');
    expect(loadConfig({ projectRoot: root, tweetsPerPage: 10, logLevel: 'warn' })).toMatchObject({
      tweetsPerPage: 10,
      logLevel: 'warn',
    });
  });

  it('rejects an rc file that is not an object', () => {
    fs.writeFileSync(path.join(root, '.waybackrc.json'), '[1, 2]');
    expect(() => loadConfig({ projectRoot: root })).toThrow('.waybackrc.json must contain a JSON object');
  });
});
