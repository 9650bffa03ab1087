/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads and writes ~/.config/pkgdb/config.json.
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { ClientConfigFile } from '../../config_manager/config_manager.types';
import { validateClientConfigFile } from '../../schemas';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';
import { errorMessage } from '../../errors';

export const DEFAULT_CONFIG_FILE = path.join(os.homedir(), '.config', 'pkgdb', 'config.json');

export interface FsConfigStoreOptions {
  configFile?: string;
  logger?: Logger;
}

/**
 * Filesystem-based ConfigStore.
 *
 * A missing file reads as null. An unparsable or invalid one also reads as
 * null, with a warning.
 *
 * @example
 * ```typescript
 * const store = new FsConfigStore();
 * const config = await store.loadConfig();
 * if (config?.username) {
 *   console.log(config.username);
 * }
 * ```
 */
export class FsConfigStore implements ConfigStore {
  readonly configFile: string;
  private readonly logger: Logger;

  constructor(options: FsConfigStoreOptions = {}) {
    this.configFile = options.configFile ?? DEFAULT_CONFIG_FILE;
    this.logger = options.logger ?? createLogger('[Config] ');
  }

  async loadConfig(): Promise<ClientConfigFile | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configFile, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      this.logger.warn(`Unable to read ${this.configFile}: ${errorMessage(error)}`);
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      this.logger.warn(`Ignoring ${this.configFile}: ${errorMessage(error)}`);
      return null;
    }

    const result = validateClientConfigFile(data);
    if (!result.valid) {
      this.logger.warn(`Ignoring ${this.configFile}: ${result.errors.join('; ')}`);
      return null;
    }
    return result.value;
  }

  async saveConfig(config: ClientConfigFile): Promise<void> {
    await fs.mkdir(path.dirname(this.configFile), { recursive: true });
    await fs.writeFile(this.configFile, JSON.stringify(config, null, 2), 'utf-8');
  }
}
