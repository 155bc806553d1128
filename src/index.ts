#!/usr/bin/env node
import { Command } from 'commander';
import { registerVisualizeCommand } from './commands/visualize.js';
import { registerStatsCommand } from './commands/stats.js';

const program = new Command();

program
  .name('wayback-tweets-report')
  .description('Turn parsed Wayback Machine tweet archives into browsable HTML reports')
  .version('0.1.0');

registerVisualizeCommand(program);
registerStatsCommand(program);

program.parse();
