/**
 * ConfigManager - Client configuration resolution
 *
 * Merges, from highest to lowest precedence: explicit overrides, PKGDB_*
 * environment variables, the configuration file, built-in defaults.
 */

import type { ConfigStore } from '../config_store/config_store';
import { DEFAULT_SESSION_FILE } from '../session_store';
import { DEFAULT_PACKAGEDB_URL } from '../package_db';
import type {
  ClientConfig,
  ClientConfigFile,
  ConfigEnvironment,
  ConfigOverrides,
  IConfigManager,
} from './config_manager.types';

export const CONFIG_ENV_VARS = {
  baseUrl: 'PKGDB_URL',
  username: 'PKGDB_USERNAME',
  password: 'PKGDB_PASSWORD',
  sessionFile: 'PKGDB_SESSION_FILE',
  debug: 'PKGDB_DEBUG',
} as const;

const DEFAULTS: ClientConfig = {
  baseUrl: DEFAULT_PACKAGEDB_URL,
  username: undefined,
  password: undefined,
  userAgent: undefined,
  sessionFile: DEFAULT_SESSION_FILE,
  cacheSession: true,
  debug: false,
};

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}

/**
 * Copies the defined entries of each layer over the previous ones.
 */
function layer(base: ClientConfig, ...layers: ConfigOverrides[]): ClientConfig {
  const result: ClientConfig = { ...base };
  for (const current of layers) {
    if (current.baseUrl !== undefined) result.baseUrl = current.baseUrl;
    if (current.username !== undefined) result.username = current.username;
    if (current.password !== undefined) result.password = current.password;
    if (current.userAgent !== undefined) result.userAgent = current.userAgent;
    if (current.sessionFile !== undefined) result.sessionFile = current.sessionFile;
    if (current.cacheSession !== undefined) result.cacheSession = current.cacheSession;
    if (current.debug !== undefined) result.debug = current.debug;
  }
  return result;
}

/**
 * @example
 * ```typescript
 * const manager = new ConfigManager(new FsConfigStore());
 * const config = await manager.resolve({ username: 'alice' });
 * const pkgdb = new PackageDB({ ...config, sessionStore: new FsSessionStore({ sessionFile: config.sessionFile }) });
 * ```
 */
export class ConfigManager implements IConfigManager {
  constructor(
    private readonly configStore: ConfigStore,
    private readonly env: ConfigEnvironment = process.env
  ) {}

  /**
   * Resolves the effective settings.
   */
  async resolve(overrides: ConfigOverrides = {}): Promise<ClientConfig> {
    const file = (await this.configStore.loadConfig()) ?? {};
    return layer(DEFAULTS, file, this.fromEnvironment(), overrides);
  }

  /**
   * Merges `changes` into the stored file. Passwords cannot be stored.
   */
  async updateConfig(changes: ClientConfigFile): Promise<void> {
    const current = (await this.configStore.loadConfig()) ?? {};
    await this.configStore.saveConfig({ ...current, ...changes });
  }

  private fromEnvironment(): ConfigOverrides {
    return {
      baseUrl: nonEmpty(this.env[CONFIG_ENV_VARS.baseUrl]),
      username: nonEmpty(this.env[CONFIG_ENV_VARS.username]),
      password: nonEmpty(this.env[CONFIG_ENV_VARS.password]),
      sessionFile: nonEmpty(this.env[CONFIG_ENV_VARS.sessionFile]),
      debug: parseFlag(this.env[CONFIG_ENV_VARS.debug]),
    };
  }
}
