/**
 * `switchyard outbox` — Inspect and retry the local outbox.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { FileCacheStore } from '../../sync/cache-store.js';

interface OutboxCommandOptions {
  cacheDir?: string;
  dir: string;
  json?: boolean;
}

export function createOutboxCommand(): Command {
  const cmd = new Command('outbox');
  cmd.description('Inspect the local outbox');

  cmd
    .command('status')
    .description('Show pending, failed and synced item counts')
    .option('-c, --cache-dir <path>', 'Outbox directory (defaults to client.cacheDir)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (options: OutboxCommandOptions) => {
      await showStatus(options);
    });

  cmd
    .command('retry')
    .description('Move every failed item back to pending')
    .option('-c, --cache-dir <path>', 'Outbox directory (defaults to client.cacheDir)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .action(async (options: OutboxCommandOptions) => {
      await retryFailed(options);
    });

  return cmd;
}

function openStore(options: OutboxCommandOptions): FileCacheStore {
  const configManager = new ConfigManager(resolve(options.dir));
  const config = configManager.load();
  const cacheDir = options.cacheDir ?? config.client.cacheDir ?? configManager.getDefaultCacheDir();
  return new FileCacheStore(resolve(cacheDir));
}

async function showStatus(options: OutboxCommandOptions): Promise<void> {
  const store = openStore(options);
  const stats = await store.getStats();

  if (options.json) {
    console.log(JSON.stringify({ dir: store.dir, ...stats }, null, 2));
    return;
  }

  console.log('\n  Outbox');
  console.log('  ======');
  console.log(`  Directory: ${store.dir}`);
  console.log(`  Pending:   ${stats.pending}`);
  console.log(`  Failed:    ${stats.failed}`);
  console.log(`  Synced:    ${stats.synced}`);
  console.log(`  Total:     ${stats.total}`);

  const failed = (await store.list()).filter(item => item.state.status === 'failed');
  if (failed.length > 0) {
    console.log('\n  Failed items:');
    for (const item of failed) {
      const reason = item.state.status === 'failed' ? item.state.reason : '';
      console.log(`    ${item.id}  ${item.messageType} → ${item.targetApp}  (${reason})`);
    }
  }
  console.log('');
}

async function retryFailed(options: OutboxCommandOptions): Promise<void> {
  const store = openStore(options);
  const count = await store.requeueFailed();
  console.log(`\n  Requeued ${count} failed item${count === 1 ? '' : 's'}.\n`);
}
