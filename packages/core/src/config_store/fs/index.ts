export { FsConfigStore, DEFAULT_CONFIG_FILE } from './fs_config_store';
export type { FsConfigStoreOptions } from './fs_config_store';
