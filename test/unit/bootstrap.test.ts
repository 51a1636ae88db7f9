import { describe, it, expect } from 'vitest';
import { createHubServer } from '../../src/bootstrap.js';
import { SwitchyardConfigSchema } from '../../src/core/types.js';

describe('createHubServer', () => {
  it('should serve the default client target app with stock configuration', () => {
    const config = SwitchyardConfigSchema.parse({});
    const server = createHubServer(config);

    expect(server.health().registeredApps).toEqual(['Server']);
    expect(server.health().registeredApps).toContain(config.client.targetApp);
  });

  it('should bind every configured record-sync app', () => {
    const server = createHubServer(SwitchyardConfigSchema.parse({
      handlers: { recordSyncApps: ['Inventory', 'Scanner'] },
    }));

    expect(server.health().registeredApps).toEqual(['Inventory', 'Scanner']);
  });
});
