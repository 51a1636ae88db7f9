/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createServeCommand } from './commands/serve.js';
import { createStatsCommand } from './commands/stats.js';
import { createOutboxCommand } from './commands/outbox.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Message hub for connected apps, with an offline-first client outbox');

  program.addCommand(createServeCommand());
  program.addCommand(createStatsCommand());
  program.addCommand(createOutboxCommand());

  return program;
}

export async function main(): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
