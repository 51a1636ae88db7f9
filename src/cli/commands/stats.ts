/**
 * `switchyard stats` — Connect as a diagnostic client and print server stats.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { unwrap } from '../../core/errors.js';
import { HubClient } from '../../client/hub-client.js';
import type { ServerStats } from '../../hub/types.js';

interface StatsCommandOptions {
  url?: string;
  dir: string;
  json?: boolean;
}

export function createStatsCommand(): Command {
  const cmd = new Command('stats');

  cmd
    .description('Show connection statistics of a running hub')
    .option('-u, --url <url>', 'Hub URL (defaults to client.serverUrl)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Output as JSON')
    .action(async (options: StatsCommandOptions) => {
      await showStats(options);
    });

  return cmd;
}

async function showStats(options: StatsCommandOptions): Promise<void> {
  const config = new ConfigManager(resolve(options.dir)).load();
  const url = options.url ?? config.client.serverUrl;
  const client = new HubClient({
    path: config.server.path,
    responseTimeoutMs: config.client.responseTimeoutMs,
  });

  unwrap(await client.connect(url));

  try {
    const stats = unwrap(await client.getServerStats());
    if (options.json) {
      console.log(JSON.stringify(stats, null, 2));
    } else {
      console.log(formatStats(stats));
    }
  } finally {
    await client.disconnect();
  }
}

export function formatStats(stats: ServerStats): string {
  const lines = [
    '',
    '  Hub Stats',
    '  =========',
    `  Connections:     ${stats.totalConnections}`,
    `  Registered apps: ${stats.registeredApps.join(', ') || '(none)'}`,
    `  Server time:     ${new Date(stats.serverTime).toISOString()}`,
  ];
  const apps = Object.entries(stats.appConnectionCounts).sort(([a], [b]) => a.localeCompare(b));
  if (apps.length > 0) {
    lines.push('', '  Per app:');
    for (const [app, count] of apps) {
      lines.push(`    ${app.padEnd(20)} ${count}`);
    }
  }
  lines.push('');
  return lines.join('\n');
}
