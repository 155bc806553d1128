import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { TWEETS_PER_PAGE } from './modules/visualize/paginator.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// Project root sits one level above both src/ and dist/
const PROJECT_ROOT = path.resolve(__dirname, '..');

export interface Config {
  // Paths
  projectRoot: string;
  outputDir: string;

  // Report layout
  tweetsPerPage: number;

  // Logging
  logLevel: string;
}

function loadEnvFile(root: string): void {
  const envPath = path.resolve(root, '.env');
  let envText: string;
  try {
    envText = fs.readFileSync(envPath, 'utf-8');
  } catch {
    return; // .env is optional
  }

  for (const line of envText.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq > 0) {
      const key = trimmed.slice(0, eq).trim();
      const val = trimmed.slice(eq + 1).trim();
      if (!process.env[key]) process.env[key] = val;
    }
  }
}

function loadRcFile(root: string): Record<string, unknown> {
  const rcPath = path.resolve(root, '.waybackrc.json');
  let raw: string;
  try {
    raw = fs.readFileSync(rcPath, 'utf-8');
  } catch {
    return {};
  }
  const parsed: unknown = JSON.parse(raw);
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`${rcPath} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

export function loadConfig(overrides: Partial<Config> = {}): Config {
  const root = overrides.projectRoot ?? PROJECT_ROOT;
  loadEnvFile(root);
  const rc = loadRcFile(root);

  const str = (envKey: string, fallback: string): string => {
    const fromEnv = process.env[envKey];
    if (fromEnv) return fromEnv;
    const fromRc = rc[envKey];
    return typeof fromRc === 'string' && fromRc ? fromRc : fallback;
  };

  const int = (envKey: string, fallback: number): number => {
    const value = Number(process.env[envKey] || rc[envKey]);
    return Number.isInteger(value) && value > 0 ? value : fallback;
  };

  return {
    projectRoot: root,
    outputDir: overrides.outputDir ?? path.resolve(root, str('OUTPUT_DIR', 'output')),
    tweetsPerPage: overrides.tweetsPerPage ?? int('TWEETS_PER_PAGE', TWEETS_PER_PAGE),
    logLevel: overrides.logLevel ?? str('LOG_LEVEL', 'info'),
  };
}
