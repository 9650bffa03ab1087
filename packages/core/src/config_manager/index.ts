/**
 * ConfigManager - Client configuration
 *
 * @example
 * ```typescript
 * import { ConfigManager, FsConfigStore } from '@pkgdb-client/core';
 *
 * const config = await new ConfigManager(new FsConfigStore()).resolve();
 * ```
 */
export { ConfigManager, CONFIG_ENV_VARS } from './config_manager';
export type {
  IConfigManager,
  ClientConfig,
  ClientConfigFile,
  ConfigOverrides,
  ConfigEnvironment,
} from './config_manager.types';
