import {
  ConfigManager,
  FsConfigStore,
  FsSessionStore,
  MemorySessionStore,
  PackageDB,
  createLogger,
} from '@pkgdb-client/core';
import type { ClientConfig, ConfigOverrides } from '@pkgdb-client/core';

/** Environment variable naming an alternative configuration file */
export const CONFIG_FILE_ENV = 'PKGDB_CONFIG';

/**
 * Dependency Injection Service for the pkgdb CLI
 *
 * Resolves the client configuration and builds the PackageDB client the
 * commands talk to.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private configManager: ConfigManager | null = null;
  private packageDB: PackageDB | null = null;

  private constructor() { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Drops the singleton (for tests)
   */
  static resetInstance(): void {
    DependencyInjectionService.instance = null;
  }

  getConfigManager(): ConfigManager {
    if (!this.configManager) {
      const configFile = process.env[CONFIG_FILE_ENV];
      this.configManager = new ConfigManager(
        new FsConfigStore(configFile ? { configFile } : {})
      );
    }
    return this.configManager;
  }

  async getConfig(overrides: ConfigOverrides = {}): Promise<ClientConfig> {
    return this.getConfigManager().resolve(overrides);
  }

  /**
   * Returns the PackageDB client. Overrides (e.g. login credentials) build
   * a fresh client that replaces the cached one.
   */
  async getPackageDB(overrides: ConfigOverrides = {}): Promise<PackageDB> {
    const hasOverrides = Object.values(overrides).some((value) => value !== undefined);
    if (this.packageDB && !hasOverrides) {
      return this.packageDB;
    }

    const config = await this.getConfig(overrides);
    const logger = createLogger('[pkgdb] ', config.debug ? 'debug' : undefined);
    this.packageDB = new PackageDB({
      baseUrl: config.baseUrl,
      username: config.username,
      password: config.password,
      userAgent: config.userAgent,
      debug: config.debug,
      logger,
      sessionStore: config.cacheSession
        ? new FsSessionStore({ sessionFile: config.sessionFile, logger })
        : new MemorySessionStore(),
    });
    return this.packageDB;
  }
}
