#!/usr/bin/env node
/**
 * Autodidact CLI
 *
 * Command-line interface for the self-directed learning agent.
 */

import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { memoryCommand } from './commands/memory.js';
import { goalsCommand } from './commands/goals.js';
import { cyclesCommand } from './commands/cycles.js';

const program = new Command();

program
  .name('autodidact')
  .description('Autodidact - self-directed learning agent')
  .version('0.1.0');

program.addCommand(runCommand);
program.addCommand(statusCommand);
program.addCommand(memoryCommand);
program.addCommand(goalsCommand);
program.addCommand(cyclesCommand);

program.parse();
