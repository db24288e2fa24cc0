/**
 * Goals Command
 *
 * List goals, set one by hand, or abandon one.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { Goal, GoalStatus } from '../../core/types.js';
import { errorMessage, openAgent, type DataDirOptions } from '../shared.js';

interface ListOptions extends DataDirOptions {
  all?: boolean;
}

interface AddOptions extends DataDirOptions {
  description?: string;
}

const STATUS_COLORS: Record<GoalStatus, (text: string) => string> = {
  active: chalk.green,
  satisfied: chalk.cyan,
  abandoned: chalk.dim
};

function printGoal(goal: Goal): void {
  console.log(
    STATUS_COLORS[goal.status](goal.status.padEnd(9)),
    chalk.white(goal.description),
    chalk.dim(`[${goal.targetSkill}] gap ${goal.priority.toFixed(3)} ${goal.id}`)
  );
}

const listCommand = new Command('list')
  .description('List goals (active only unless --all)')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('-a, --all', 'Include satisfied and abandoned goals')
  .action(async (options: ListOptions) => {
    try {
      const agent = openAgent(options);
      const goals = options.all ? agent.getGoals().listGoals() : agent.getGoals().activeGoals();
      await agent.close();

      if (goals.length === 0) {
        console.log(chalk.dim('No goals.'));
      }
      goals.forEach(printGoal);
    } catch (error) {
      console.error(chalk.red('Failed to list goals:'), errorMessage(error));
      process.exit(1);
    }
  });

const addCommand = new Command('add')
  .description('Set an active goal for a skill')
  .argument('<skill>', 'Skill name')
  .option('-d, --data-dir <path>', 'Data directory path')
  .option('--description <text>', 'Goal description')
  .action(async (skill: string, options: AddOptions) => {
    try {
      const agent = openAgent(options);
      const goal = agent.proposeGoal(skill, options.description);
      await agent.close();
      printGoal(goal);
    } catch (error) {
      console.error(chalk.red('Failed to add goal:'), errorMessage(error));
      process.exit(1);
    }
  });

const abandonCommand = new Command('abandon')
  .description('Abandon an active goal')
  .argument('<id>', 'Goal id')
  .option('-d, --data-dir <path>', 'Data directory path')
  .action(async (id: string, options: DataDirOptions) => {
    try {
      const agent = openAgent(options);
      const goal = agent.getGoals().abandonGoal(id);
      await agent.close();

      if (!goal) {
        console.error(chalk.yellow(`No active goal with id ${id}`));
        process.exit(1);
      }
      printGoal(goal);
    } catch (error) {
      console.error(chalk.red('Failed to abandon goal:'), errorMessage(error));
      process.exit(1);
    }
  });

export const goalsCommand = new Command('goals')
  .description('Manage improvement goals')
  .addCommand(listCommand, { isDefault: true })
  .addCommand(addCommand)
  .addCommand(abandonCommand);
