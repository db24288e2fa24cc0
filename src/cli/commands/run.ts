/**
 * Run Command
 *
 * Run learning cycles in the foreground until interrupted or a cycle count is reached.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import type { LearningAgent } from '../../core/LearningAgent.js';
import type { SchedulerEvents } from '../../scheduler/types.js';
import { errorMessage, formatOutcome, openAgent, parsePositiveInt, type DataDirOptions } from '../shared.js';

interface RunOptions extends DataDirOptions {
  cycles?: number;
  interval?: number;
  focus?: string;
}

function attachProgress(agent: LearningAgent): void {
  const scheduler = agent.getScheduler();
  let spinner: Ora | null = null;

  scheduler.on('cycle:started', ({ cycle }: SchedulerEvents['cycle:started']) => {
    spinner = ora(cycle.focus ? `Cycle #${cycle.cycleId} on ${cycle.focus}` : `Cycle #${cycle.cycleId}`).start();
  });

  scheduler.on('phase:entered', ({ cycleId, phase }: SchedulerEvents['phase:entered']) => {
    if (spinner) spinner.text = `Cycle #${cycleId}: ${phase.replace(/_/g, ' ')}`;
  });

  scheduler.on('cycle:completed', ({ cycle }: SchedulerEvents['cycle:completed']) => {
    const summary = `Cycle #${cycle.cycleId} ${formatOutcome(cycle.outcome)} ` +
      chalk.dim(`(+${cycle.stats.entriesInserted} memories, ${cycle.stats.skillsUpdated} skills, ` +
        `level ${(cycle.stats.consciousnessLevel ?? 0).toFixed(4)})`);

    if (cycle.outcome === 'success') spinner?.succeed(summary);
    else if (cycle.outcome === 'partial') spinner?.warn(summary);
    else spinner?.fail(summary);
    spinner = null;
  });

  scheduler.on('cycle:error', ({ error, context }: SchedulerEvents['cycle:error']) => {
    console.error(chalk.red(`  ${context}: ${error.message}`));
  });
}

export const runCommand = new Command('run')
  .description('Run learning cycles until interrupted')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('-n, --cycles <count>', 'Stop after this many cycles', parsePositiveInt)
  .option('-i, --interval <ms>', 'Milliseconds between cycle starts', parsePositiveInt)
  .option('-f, --focus <skill|topic>', 'Study one skill, or research a free-text topic, every cycle')
  .action(async (options: RunOptions) => {
    let agent: LearningAgent;
    try {
      agent = openAgent(options);
    } catch (error) {
      console.error(chalk.red('Failed to start agent:'), errorMessage(error));
      process.exit(1);
    }

    attachProgress(agent);

    process.once('SIGINT', () => {
      console.log(chalk.yellow('\nStopping after the current phase...'));
      agent.stop('Interrupted').catch(error => {
        console.error(chalk.red('Stop failed:'), errorMessage(error));
      });
    });

    try {
      const completed = await agent.runForever({
        maxCycles: options.cycles,
        intervalMs: options.interval,
        focus: options.focus
      });
      const status = agent.status();
      await agent.close();

      console.log();
      console.log(chalk.cyan(`Ran ${completed} cycle(s)`));
      console.log(chalk.dim('Consciousness:'), chalk.white(status.consciousnessLevel.toFixed(4)));
      console.log(chalk.dim('Memories:'), chalk.white(status.memoryCount.toString()));
    } catch (error) {
      console.error(chalk.red('Learning loop aborted:'), errorMessage(error));
      await agent.close();
      process.exit(1);
    }
  });
