/**
 * ConfigStore Interface
 *
 * Abstraction for persistence of the user configuration file, so the
 * ConfigManager can run against the filesystem or memory (tests).
 *
 * NOTE: Session cookies are handled by SessionStore, not ConfigStore.
 */

import type { ClientConfigFile } from '../config_manager/config_manager.types';

export interface ConfigStore {
  /**
   * Load the configuration file
   *
   * @returns The stored settings, or null if not found/invalid
   */
  loadConfig(): Promise<ClientConfigFile | null>;

  saveConfig(config: ClientConfigFile): Promise<void>;
}
