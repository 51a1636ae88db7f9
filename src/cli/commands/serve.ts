/**
 * `switchyard serve` — Run the communication hub.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { createLogger, setLogger } from '../../core/logger.js';
import { errorMessage } from '../../core/result.js';
import { createHubServer } from '../../bootstrap.js';
import { NAME } from '../../version.js';
import { parsePort } from './options.js';

interface ServeCommandOptions {
  port?: number;
  host?: string;
  dir: string;
  verbose?: boolean;
}

export function createServeCommand(): Command {
  const cmd = new Command('serve');

  cmd
    .description('Start the communication hub')
    .option('-p, --port <port>', 'Port to listen on', parsePort)
    .option('-H, --host <host>', 'Interface to bind')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-v, --verbose', 'Log to the console')
    .action(async (options: ServeCommandOptions) => {
      await serve(options);
    });

  return cmd;
}

async function serve(options: ServeCommandOptions): Promise<void> {
  const configManager = new ConfigManager(resolve(options.dir));
  const config = configManager.load({
    server: {
      ...(options.port !== undefined ? { port: options.port } : {}),
      ...(options.host !== undefined ? { host: options.host } : {}),
    },
  });

  if (options.verbose || config.ui.verbose) {
    setLogger(createLogger(NAME, true));
  }

  const server = createHubServer(config);

  try {
    const url = await server.start();
    console.log(`\n  Hub listening at: ${url}`);
    console.log(`  Apps: ${config.handlers.recordSyncApps.join(', ') || '(none)'}`);
    console.log('  Press Ctrl+C to stop\n');
  } catch (error) {
    console.error(`\n  Failed to start hub: ${errorMessage(error)}\n`);
    process.exitCode = 1;
    return;
  }

  await new Promise<void>((resolveStop) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      console.log(`\n  ${signal} received, stopping hub...`);
      server.stop().then(
        () => {
          console.log('  Hub stopped.\n');
          resolveStop();
        },
        (err: unknown) => {
          console.error(`  Error while stopping: ${errorMessage(err)}`);
          process.exitCode = 1;
          resolveStop();
        },
      );
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });
}
