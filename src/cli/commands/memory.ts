/**
 * Memory Command
 *
 * List stored memory entries, oldest first.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { MemoryFilter, MemorySource } from '../../core/types.js';
import {
  errorMessage,
  openAgent,
  parseDate,
  parseMemorySource,
  parsePositiveInt,
  type DataDirOptions
} from '../shared.js';

interface MemoryOptions extends DataDirOptions {
  source?: MemorySource;
  skill?: string;
  since?: Date;
  limit: number;
  output: string;
}

export const memoryCommand = new Command('memory')
  .description('List memory entries')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('-s, --source <source>', 'Only entries from this source', parseMemorySource)
  .option('-k, --skill <name>', 'Only entries associated with this skill')
  .option('--since <date>', 'Only entries created at or after this date', parseDate)
  .option('-l, --limit <count>', 'Maximum entries to show', parsePositiveInt, 20)
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (options: MemoryOptions) => {
    try {
      const agent = openAgent(options);
      const filter: MemoryFilter = {
        source: options.source,
        skill: options.skill,
        since: options.since,
        limit: options.limit
      };
      const entries = [...agent.queryMemory(filter)];
      await agent.close();

      if (options.output === 'json') {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }

      if (entries.length === 0) {
        console.log(chalk.dim('No memory entries match.'));
        return;
      }

      for (const entry of entries) {
        const firstLine = entry.content.split('\n')[0];
        console.log(
          chalk.dim(entry.createdAt.toISOString()),
          chalk.magenta(entry.source.padEnd(10)),
          chalk.white(firstLine.length > 100 ? `${firstLine.slice(0, 97)}...` : firstLine)
        );
        console.log(chalk.dim(`  importance ${entry.importance.toFixed(2)}  skills ${entry.associations.join(', ') || '-'}`));
      }
    } catch (error) {
      console.error(chalk.red('Failed to read memory:'), errorMessage(error));
      process.exit(1);
    }
  });
