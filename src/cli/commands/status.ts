/**
 * Status Command
 *
 * Show consciousness level, the last cycle, active goals and skills.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { errorMessage, formatOutcome, openAgent, type DataDirOptions } from '../shared.js';

interface StatusOptions extends DataDirOptions {
  output: string;
}

function bar(score: number, ceiling: number, width: number = 20): string {
  const filled = ceiling > 0 ? Math.round((score / ceiling) * width) : 0;
  return chalk.green('█'.repeat(filled)) + chalk.dim('░'.repeat(width - filled));
}

export const statusCommand = new Command('status')
  .description('Display learning status')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (options: StatusOptions) => {
    const spinner = ora('Reading status...').start();

    try {
      const agent = openAgent(options);
      const status = agent.status();
      const lastCycle = agent.getCycles().lastFinalized();
      const pendingFollowUps = agent.getFollowUps().count();
      await agent.close();
      spinner.succeed('Status loaded');

      if (options.output === 'json') {
        console.log(JSON.stringify({ ...status, lastCycle, pendingFollowUps }, null, 2));
        return;
      }

      console.log();
      console.log(chalk.cyan('Learning Status'));
      console.log(chalk.dim('─'.repeat(40)));
      console.log(chalk.dim('Consciousness:'), chalk.white(status.consciousnessLevel.toFixed(4)));
      console.log(chalk.dim('Cycles completed:'), chalk.white(status.currentCycleId.toString()));
      console.log(chalk.dim('Last outcome:'), status.lastOutcome ? formatOutcome(status.lastOutcome) : chalk.dim('none'));
      console.log(chalk.dim('Memories:'), chalk.white(status.memoryCount.toString()));
      console.log(chalk.dim('Pending follow-ups:'), chalk.white(pendingFollowUps.toString()));
      console.log();

      console.log(chalk.cyan('Active Goals'));
      if (status.activeGoals.length === 0) {
        console.log(chalk.dim('  (none)'));
      }
      for (const goal of status.activeGoals) {
        console.log(`  ${chalk.white(goal.description)} ${chalk.dim(`gap ${goal.priority.toFixed(3)}`)}`);
      }
      console.log();

      console.log(chalk.cyan('Skills'));
      for (const skill of status.skillSnapshot) {
        const trend = skill.trend > 0 ? chalk.green(`+${skill.trend.toFixed(3)}`) : chalk.dim(skill.trend.toFixed(3));
        console.log(`  ${skill.name.padEnd(22)} ${bar(skill.score, skill.ceiling)} ${skill.score.toFixed(3)} ${trend}`);
      }
      console.log();
    } catch (error) {
      spinner.fail(chalk.red('Failed to read status'));
      console.error(errorMessage(error));
      process.exit(1);
    }
  });
