/**
 * Helpers shared by the CLI commands
 */

import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { LearningAgent } from '../core/LearningAgent.js';
import { getDefaultConfig } from '../core/config.js';
import { MEMORY_SOURCES, type MemorySource } from '../core/types.js';
import type { CycleOutcome } from '../scheduler/types.js';

export interface DataDirOptions {
  dataDir?: string;
}

export function openAgent(options: DataDirOptions): LearningAgent {
  const agent = new LearningAgent({ config: getDefaultConfig(options.dataDir) });
  agent.initialize();
  return agent;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseMemorySource(value: string): MemorySource {
  const source = MEMORY_SOURCES.find(candidate => candidate === value);
  if (!source) {
    throw new InvalidArgumentError(`Must be one of: ${MEMORY_SOURCES.join(', ')}.`);
  }
  return source;
}

export function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError('Must be an ISO date, e.g. 2024-05-01.');
  }
  return date;
}

export function formatOutcome(outcome: CycleOutcome | null | undefined): string {
  switch (outcome) {
    case 'success':
      return chalk.green('success');
    case 'partial':
      return chalk.yellow('partial');
    case 'failed':
      return chalk.red('failed');
    default:
      return chalk.dim('running');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
