/**
 * Contents of the user configuration file. Every field is optional and
 * passwords are never stored here.
 */
export type ClientConfigFile = {
  baseUrl?: string;
  username?: string;
  userAgent?: string;
  sessionFile?: string;
  cacheSession?: boolean;
  debug?: boolean;
};

/**
 * Fully resolved client settings.
 */
export type ClientConfig = {
  baseUrl: string;
  username: string | undefined;
  password: string | undefined;
  userAgent: string | undefined;
  sessionFile: string;
  cacheSession: boolean;
  debug: boolean;
};

/**
 * Values given explicitly (e.g. command-line flags). Undefined entries do
 * not override anything.
 */
export type ConfigOverrides = {
  [K in keyof ClientConfig]?: ClientConfig[K] | undefined;
};

export type ConfigEnvironment = Record<string, string | undefined>;

/**
 * ConfigManager interface
 */
export interface IConfigManager {
  resolve(overrides?: ConfigOverrides): Promise<ClientConfig>;
  updateConfig(changes: ClientConfigFile): Promise<void>;
}
