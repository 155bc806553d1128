import type { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { loadTweetRecords } from '../modules/visualize/loader.js';
import { summarizeRecords } from '../modules/visualize/summary.js';
import { parsePositiveInt } from './options.js';

interface StatsOptions {
  json?: boolean;
  perPage?: number;
}

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Summarize a parsed tweets file without rendering it')
    .argument('<json>', 'Path to the parsed tweets JSON file, or the JSON text itself')
    .option('--per-page <n>', 'Tweets per page', parsePositiveInt)
    .option('--json', 'Output as JSON (for machine consumption)')
    .action((json: string, opts: StatsOptions) => {
      const config = loadConfig(opts.perPage ? { tweetsPerPage: opts.perPage } : {});
      const log = createLogger(config.logLevel);

      try {
        const summary = summarizeRecords(loadTweetRecords(json), config.tweetsPerPage);

        if (opts.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        console.log(chalk.bold('\nArchived tweets'));
        console.log(chalk.dim('━'.repeat(40)));
        console.log(`  Records:         ${chalk.cyan(summary.records)}`);
        console.log(`  Pages:           ${chalk.cyan(summary.pages)} ${chalk.dim(`(${summary.tweetsPerPage} per page)`)}`);
        console.log(`  Live text:       ${chalk.green(summary.withLiveText)}`);
        console.log(`  Archive frames:  ${chalk.yellow(summary.withArchiveFrames)}`);
      } catch (err) {
        log.error({ err }, 'stats failed');
        process.exitCode = 1;
      }
    });
}
