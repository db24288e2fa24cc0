/**
 * Cycles Command
 *
 * Show recent learning cycles and their phase reports.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { LearningCycle } from '../../scheduler/types.js';
import { errorMessage, formatOutcome, openAgent, parsePositiveInt, type DataDirOptions } from '../shared.js';

interface CyclesOptions extends DataDirOptions {
  limit: number;
  verbose?: boolean;
  output: string;
}

function printCycle(cycle: LearningCycle, verbose: boolean): void {
  const duration = cycle.endedAt ? `${cycle.endedAt.getTime() - cycle.startedAt.getTime()}ms` : '-';
  console.log(
    chalk.white(`#${cycle.cycleId}`.padEnd(6)),
    formatOutcome(cycle.outcome),
    chalk.dim(cycle.startedAt.toISOString()),
    chalk.dim(duration),
    chalk.dim(`+${cycle.stats.entriesInserted} memories`)
  );

  if (!verbose) return;

  if (cycle.focus) {
    console.log(chalk.dim(`    focus: ${cycle.focus}`));
  }
  for (const topic of cycle.topics) {
    const origin = topic.origin === 'curriculum' ? '' : ` (${topic.origin})`;
    console.log(chalk.dim(`    ? ${topic.skill}: ${topic.query}${origin}`));
  }
  for (const report of cycle.phases) {
    const result = report.result === 'skipped' ? chalk.dim('skipped') : formatOutcome(report.result);
    console.log(`    ${report.phase.padEnd(16)} ${result} ${chalk.dim(report.detail ?? '')}`);
    for (const message of report.errors) {
      console.log(chalk.red(`      ${message}`));
    }
  }
}

export const cyclesCommand = new Command('cycles')
  .description('List recent learning cycles')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('-l, --limit <count>', 'Number of cycles to show', parsePositiveInt, 10)
  .option('-v, --verbose', 'Show topics and phase reports')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (options: CyclesOptions) => {
    try {
      const agent = openAgent(options);
      const cycles = agent.getCycles().list(options.limit);
      const outcomes = agent.getCycles().countByOutcome();
      await agent.close();

      if (options.output === 'json') {
        console.log(JSON.stringify({ outcomes, cycles }, null, 2));
        return;
      }

      console.log(
        chalk.dim('Totals:'),
        chalk.green(`${outcomes.success} success`),
        chalk.yellow(`${outcomes.partial} partial`),
        chalk.red(`${outcomes.failed} failed`)
      );
      for (const cycle of cycles) {
        printCycle(cycle, options.verbose ?? false);
      }
    } catch (error) {
      console.error(chalk.red('Failed to list cycles:'), errorMessage(error));
      process.exit(1);
    }
  });
