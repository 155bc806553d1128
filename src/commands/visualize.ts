import fs from 'node:fs';
import path from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { TweetsVisualizer } from '../modules/visualize/visualizer.js';
import { normalizeUsername, parsePositiveInt, resolveOutputPath } from './options.js';

interface VisualizeOptions {
  output?: string;
  perPage?: number;
  stdout?: boolean;
}

export function registerVisualizeCommand(program: Command): void {
  program
    .command('visualize')
    .description("Render a paginated HTML report of a user's archived tweets")
    .argument('<username>', 'Account the tweets belong to (with or without @)')
    .argument('<json>', 'Path to the parsed tweets JSON file, or the JSON text itself')
    .option('-o, --output <file>', 'Where to write the report (default: <OUTPUT_DIR>/<username>_tweets.html)')
    .option('--per-page <n>', 'Tweets per page', parsePositiveInt)
    .option('--stdout', 'Print the HTML to stdout instead of writing a file')
    .action((rawUsername: string, json: string, opts: VisualizeOptions) => {
      const config = loadConfig(opts.perPage ? { tweetsPerPage: opts.perPage } : {});
      const log = createLogger(config.logLevel);
      const username = normalizeUsername(rawUsername);
      const htmlPath = opts.stdout ? undefined : resolveOutputPath(username, opts.output, config.outputDir);

      const spinner = ora(`Building report for @${username}...`).start();
      try {
        const visualizer = new TweetsVisualizer(username, json, htmlPath, {
          tweetsPerPage: config.tweetsPerPage,
        });
        const html = visualizer.generate();
        const { totalPages } = visualizer.pagination();

        if (!htmlPath) {
          spinner.stop();
          process.stdout.write(html);
          return;
        }

        fs.mkdirSync(path.dirname(htmlPath), { recursive: true });
        visualizer.save(html);
        spinner.succeed(`Report for @${username} written`);

        console.log(`  Tweets: ${chalk.cyan(visualizer.records.length)}`);
        console.log(`  Pages:  ${chalk.cyan(totalPages)} ${chalk.dim(`(${config.tweetsPerPage} per page)`)}`);
        console.log(`  File:   ${chalk.underline(htmlPath)}`);
      } catch (err) {
        spinner.fail('Report generation failed');
        log.error({ err, username }, 'visualize failed');
        process.exitCode = 1;
      }
    });
}
