import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { SwitchyardConfigSchema, type SwitchyardConfig } from './types.js';
import { ConfigError } from './errors.js';

type RawConfig = Record<string, unknown>;

export class ConfigManager {
  private config: SwitchyardConfig | null = null;
  private globalDir: string;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, options: { globalDir?: string; env?: NodeJS.ProcessEnv } = {}) {
    this.globalDir = options.globalDir ?? join(homedir(), '.switchyard');
    this.projectDir = projectDir || process.cwd();
    this.env = options.env ?? process.env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: RawConfig): SwitchyardConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.switchyard.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const parsed = SwitchyardConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`);
      throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, parsed.error);
    }

    this.config = parsed.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): SwitchyardConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  /** Default location of the client outbox when `client.cacheDir` is unset. */
  getDefaultCacheDir(): string {
    return join(this.globalDir, 'outbox');
  }

  /**
   * Create default global config if it doesn't exist
   */
  createDefaultConfig(): void {
    if (!existsSync(this.globalDir)) {
      mkdirSync(this.globalDir, { recursive: true });
    }
    const configPath = join(this.globalDir, 'config.yaml');
    if (!existsSync(configPath)) {
      const defaultConfig = `# switchyard configuration
server:
  port: 5080
  path: /hubs/universal

sweeper:
  cleanupIntervalMs: 300000
  maxConnectionAgeMs: 1800000

handlers:
  recordSyncApps: [Server]
  conflictPolicy: last-write-wins

client:
  serverUrl: ws://localhost:5080
  # appName: MyApp
`;
      writeFileSync(configPath, defaultConfig, 'utf-8');
    }
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};
    try {
      const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
      return isRecord(parsed) ? parsed : {};
    } catch (err) {
      throw new ConfigError(
        `Failed to parse ${label} config at ${path}`,
        err instanceof Error ? err : undefined,
      );
    }
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const server = isRecord(raw.server) ? { ...raw.server } : {};
    const client = isRecord(raw.client) ? { ...raw.client } : {};
    const ui = isRecord(raw.ui) ? { ...raw.ui } : {};

    if (this.env.SWITCHYARD_HOST) {
      server.host = this.env.SWITCHYARD_HOST;
    }
    if (this.env.SWITCHYARD_PORT) {
      server.port = Number(this.env.SWITCHYARD_PORT);
    }
    if (this.env.SWITCHYARD_SERVER_URL) {
      client.serverUrl = this.env.SWITCHYARD_SERVER_URL;
    }
    if (this.env.SWITCHYARD_APP_NAME) {
      client.appName = this.env.SWITCHYARD_APP_NAME;
    }
    if (this.env.SWITCHYARD_CACHE_DIR) {
      client.cacheDir = this.env.SWITCHYARD_CACHE_DIR;
    }
    if (this.env.SWITCHYARD_VERBOSE) {
      ui.verbose = this.env.SWITCHYARD_VERBOSE === '1' || this.env.SWITCHYARD_VERBOSE === 'true';
    }

    return { ...raw, server, client, ui };
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result: RawConfig = { ...target };
    for (const key of Object.keys(source)) {
      const sourceValue = source[key];
      const targetValue = target[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        result[key] = this.deepMerge(targetValue, sourceValue);
      } else {
        result[key] = sourceValue;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
