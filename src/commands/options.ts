import path from 'node:path';
import { InvalidArgumentError } from 'commander';

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return n;
}

/** `@jack` and `jack` name the same account. */
export function normalizeUsername(username: string): string {
  return username.trim().replace(/^@/, '');
}

/**
 * An explicit --output wins; otherwise the report goes to
 * `<outputDir>/<username>_tweets.html`.
 */
export function resolveOutputPath(username: string, output: string | undefined, outputDir: string): string {
  if (output) return path.resolve(output);
  return path.join(outputDir, `${normalizeUsername(username)}_tweets.html`);
}
