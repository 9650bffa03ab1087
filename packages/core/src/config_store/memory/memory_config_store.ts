/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * Useful for tests and for callers that configure the client purely from
 * code.
 */

import type { ConfigStore } from '../config_store';
import type { ClientConfigFile } from '../../config_manager/config_manager.types';

/**
 * @example
 * ```typescript
 * const store = new MemoryConfigStore();
 * store.setConfig({ baseUrl: 'https://pkgdb.example.org/pkgdb/' });
 * const manager = new ConfigManager(store, {});
 * ```
 */
export class MemoryConfigStore implements ConfigStore {
  private config: ClientConfigFile | null = null;

  async loadConfig(): Promise<ClientConfigFile | null> {
    return this.config ? { ...this.config } : null;
  }

  async saveConfig(config: ClientConfigFile): Promise<void> {
    this.config = { ...config };
  }

  // ==================== Test Helper Methods ====================

  /**
   * Set config directly (for test setup)
   */
  setConfig(config: ClientConfigFile | null): void {
    this.config = config ? { ...config } : null;
  }

  /**
   * Get current config (for test assertions)
   */
  getConfig(): ClientConfigFile | null {
    return this.config;
  }

  clear(): void {
    this.config = null;
  }
}
